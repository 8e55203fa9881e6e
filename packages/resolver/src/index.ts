export { ActionResolver, DEFAULT_SEMANTIC_TIMEOUT_MS } from "./action-resolver.js";
export type { ActionResolverConfig } from "./action-resolver.js";
export {
  ACTION_VERBS,
  DETERMINISTIC_STAGES,
  foldUtterance,
  matchExactId,
  matchHeuristic,
  matchKeyword,
} from "./stages.js";
export type { MatchFn, MatchStage } from "./stages.js";
export {
  NO_MATCH_TOKEN,
  RESOLUTION_SYSTEM_PROMPT,
  buildResolutionRequest,
  buildResolutionPrompt,
  parseResolutionToken,
  StaticSemanticResolver,
} from "./semantic.js";

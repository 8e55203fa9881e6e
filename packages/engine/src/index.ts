export {
  SessionEngine,
  DEFAULT_HISTORY_LIMIT,
  CLARIFICATION_TEXT,
  DEFAULT_RESTART_TEXT,
  SESSION_ENDED_TEXT,
} from "./session-engine.js";
export type { SessionEngineConfig } from "./session-engine.js";
export { NarrativeComposer, TURN_PROMPT, VOID_SCENE_TEXT, predicateHolds } from "./narrative-composer.js";
export { applyEffect, applyEffects } from "./effect-engine.js";
export { createSessionState, cloneSessionState, generateSessionId } from "./session-state.js";
export type { SessionStateOptions } from "./session-state.js";
export { ToolSurface, TOOL_DEFINITIONS } from "./tool-surface.js";

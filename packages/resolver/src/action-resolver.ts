import type { Logger, ResolutionOutcome, SemanticResolver } from "@storyloom/schemas";
import { ConsoleLogger, withTimeout } from "@storyloom/schemas";
import type { Scene } from "@storyloom/world";
import { DETERMINISTIC_STAGES, foldUtterance } from "./stages.js";
import type { MatchStage } from "./stages.js";
import { buildResolutionRequest, parseResolutionToken } from "./semantic.js";

export const DEFAULT_SEMANTIC_TIMEOUT_MS = 5000;

export interface ActionResolverConfig {
  /** Last-resort collaborator; without one the pipeline ends after the keyword stage. */
  semantic?: SemanticResolver;
  semanticTimeoutMs?: number;
  stages?: readonly MatchStage[];
  logger?: Logger;
}

type SemanticReply = { ok: true; text: string } | { ok: false; error: string };

function unresolved(reason: string): ResolutionOutcome {
  return { status: "unresolved", reason };
}

/**
 * Maps a freeform utterance onto one choice of the given scene. Stages run in
 * order and the first match wins; only choices of `scene` are candidates.
 * Never throws: every failure is an "unresolved" outcome.
 */
export class ActionResolver {
  private semantic: SemanticResolver | undefined;
  private timeoutMs: number;
  private stages: readonly MatchStage[];
  private logger: Logger;

  constructor(config: ActionResolverConfig = {}) {
    this.semantic = config.semantic;
    this.timeoutMs = config.semanticTimeoutMs ?? DEFAULT_SEMANTIC_TIMEOUT_MS;
    this.stages = config.stages ?? DETERMINISTIC_STAGES;
    this.logger = config.logger ?? new ConsoleLogger("resolver");
  }

  async resolve(scene: Scene, utterance: string): Promise<ResolutionOutcome> {
    const folded = foldUtterance(utterance);
    if (folded.length === 0) return unresolved("empty utterance");

    for (const stage of this.stages) {
      const choiceId = stage.match(scene, folded);
      if (choiceId !== undefined) {
        this.logger.debug(`Resolved "${folded}" to ${choiceId}`, { stage: stage.name, scene: scene.scene_id });
        return { status: "resolved", choice_id: choiceId, stage: stage.name };
      }
    }

    return this.resolveSemantically(scene, utterance.trim());
  }

  private async resolveSemantically(scene: Scene, utterance: string): Promise<ResolutionOutcome> {
    const semantic = this.semantic;
    if (!semantic) return unresolved("no stage matched");

    const request = buildResolutionRequest(scene, utterance);
    const reply = await withTimeout(
      async (signal) => semantic.resolve(request, signal),
      this.timeoutMs,
      `Semantic resolution via ${semantic.name}`,
    ).then(
      (text): SemanticReply => ({ ok: true, text }),
      (err: unknown): SemanticReply => ({ ok: false, error: err instanceof Error ? err.message : String(err) }),
    );

    if (!reply.ok) {
      this.logger.warn("Semantic resolution failed", { utterance, scene: scene.scene_id, error: reply.error });
      return unresolved(reply.error);
    }

    const choiceId = parseResolutionToken(reply.text, scene.choices.keys());
    if (choiceId === undefined) {
      this.logger.info(`Semantic resolver could not resolve action "${utterance}"`, { reply: reply.text });
      return unresolved(`semantic resolver answered "${reply.text.trim()}"`);
    }

    this.logger.info(`Semantic resolver resolved action "${utterance}" to ${choiceId}`);
    return { status: "resolved", choice_id: choiceId, stage: "semantic" };
  }
}

import type { Logger, SessionState } from "@storyloom/schemas";
import { ConsoleLogger } from "@storyloom/schemas";
import type { Choice, WorldGraph } from "@storyloom/world";
import type { ActionResolver } from "@storyloom/resolver";
import { applyEffects } from "./effect-engine.js";
import { NarrativeComposer, TURN_PROMPT } from "./narrative-composer.js";
import { cloneSessionState, createSessionState, generateSessionId } from "./session-state.js";

export const DEFAULT_HISTORY_LIMIT = 6;

export const CLARIFICATION_TEXT =
  "I need a clearer action to move the story forward. Please choose one of the options I presented, " +
  "or use a very simple phrase related to the options, like 'take the map' or 'descend'.";

export const DEFAULT_RESTART_TEXT =
  "The world resets. A new tide laps at the shore. You stand once more at the beginning.";

export const SESSION_ENDED_TEXT = `This adventure has ended. Start a new one to keep playing. ${TURN_PROMPT}`;

export interface SessionEngineConfig {
  world: WorldGraph;
  resolver: ActionResolver;
  composer?: NarrativeComposer;
  historyLimit?: number;
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

/**
 * One player's traversal of a world. Turns are serialized by the host; the
 * only suspension point is the resolver's semantic fallback.
 */
export class SessionEngine {
  readonly world: WorldGraph;
  private resolver: ActionResolver;
  private composer: NarrativeComposer;
  private historyLimit: number;
  private now: () => Date;
  private generateId: () => string;
  private logger: Logger;
  private state: SessionState;
  /** Bumped on every reset and commit so an in-flight turn can tell it went stale. */
  private generation = 0;
  private disposed = false;

  constructor(config: SessionEngineConfig) {
    this.world = config.world;
    this.resolver = config.resolver;
    this.composer = config.composer ?? new NarrativeComposer(config.world);
    this.historyLimit = config.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.now = config.now ?? (() => new Date());
    this.generateId = config.generateId ?? generateSessionId;
    this.logger = config.logger ?? new ConsoleLogger("engine");
    // Usable before start(): the player stands at the entry scene
    this.state = this.freshState(null);
  }

  get sessionId(): string {
    return this.state.session_id;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /** Deep copy of the current state. */
  snapshot(): SessionState {
    return cloneSessionState(this.state);
  }

  start(playerName?: string): string {
    const name = playerName?.trim() || this.state.player_name;
    this.reset(name);
    this.logger.info("Adventure started", { session_id: this.state.session_id });
    const welcome = this.world.greeting ?? "A new adventure begins now.";
    return `Greetings ${name ?? "traveler"}. Welcome to '${this.world.title}'. ${welcome}\n\n` +
      this.composer.renderScene(this.state.current_scene_id, this.state);
  }

  restart(): string {
    this.reset(this.state.player_name);
    this.logger.info("Adventure restarted", { session_id: this.state.session_id });
    return `${this.world.restartText ?? DEFAULT_RESTART_TEXT}\n\n` +
      this.composer.renderScene(this.state.current_scene_id, this.state);
  }

  getCurrentScene(): string {
    return this.composer.renderScene(this.state.current_scene_id, this.state);
  }

  showJournal(): string {
    return this.composer.renderJournal(this.state, this.historyLimit);
  }

  async playerAction(utterance: string): Promise<string> {
    if (this.disposed) return SESSION_ENDED_TEXT;

    const generation = this.generation;
    // Resolve against the scene the player was actually shown
    const shownSceneId = this.composer.resolveSceneId(this.state.current_scene_id, this.state);
    const scene = this.world.getScene(shownSceneId);
    if (!scene) {
      this.logger.error("Current scene missing from world; restarting", { scene: shownSceneId });
      return this.restart();
    }

    const outcome = await this.resolver.resolve(scene, utterance);

    if (this.disposed) return SESSION_ENDED_TEXT;
    if (generation !== this.generation) {
      this.logger.warn("Dropping resolution for a session that changed mid-turn", { utterance });
      return this.getCurrentScene();
    }

    const choice = outcome.status === "resolved" ? scene.choices.get(outcome.choice_id) : undefined;
    if (!choice) {
      const reason = outcome.status === "unresolved" ? outcome.reason : `unknown choice ${outcome.choice_id}`;
      this.logger.info("Action unresolved", { utterance, scene: scene.scene_id, reason });
      return `${CLARIFICATION_TEXT}\n\n${this.getCurrentScene()}`;
    }

    this.commitTransition(choice);
    this.logger.debug("Transition", { from: scene.scene_id, choice: choice.choice_id, to: choice.result_scene_id });
    const note = this.composer.renderTransition(scene.scene_id, choice.choice_id);
    return `${note}\n\n${this.getCurrentScene()}`;
  }

  /** Ends the session. A turn still awaiting resolution will not mutate state. */
  dispose(): void {
    this.disposed = true;
    this.generation++;
  }

  private freshState(playerName: string | null): SessionState {
    return createSessionState(this.world.entrySceneId, {
      playerName,
      now: this.now,
      generateId: this.generateId,
    });
  }

  private reset(playerName: string | null): void {
    this.generation++;
    this.state = this.freshState(playerName);
  }

  /** Effects, history, choices and scene change land together or not at all. */
  private commitTransition(choice: Choice): void {
    const draft = cloneSessionState(this.state);
    applyEffects(choice.effects, draft);
    draft.history.push({
      from_scene_id: draft.current_scene_id,
      choice_id: choice.choice_id,
      to_scene_id: choice.result_scene_id,
      timestamp: this.now().toISOString(),
    });
    draft.choices_made.push(choice.choice_id);
    draft.current_scene_id = choice.result_scene_id;
    this.state = draft;
    // Any turn resolved against the previous scene is now stale
    this.generation++;
  }
}

/**
 * Storyloom Core Types
 *
 * Canonical data models shared by the world graph, the resolver, the
 * session engine and the hosts that drive it.
 */

// ─── Effects ────────────────────────────────────────────────────────

export type Effect =
  | { type: "append_journal"; text: string }
  | { type: "add_inventory_item"; item_id: string };

export type EffectType = Effect["type"];

// ─── World ──────────────────────────────────────────────────────────

export interface ChoiceDefinition {
  choice_id: string;
  description: string;
  result_scene_id: string;
  effects?: Effect[];
}

export interface SceneDefinition {
  scene_id: string;
  title: string;
  description: string;
  choices: ChoiceDefinition[];
}

export type StatePredicate =
  | { type: "journal_includes"; entry: string }
  | { type: "inventory_includes"; item_id: string }
  | { type: "choice_made"; choice_id: string };

/** Render `render_as` in place of `scene_id` while `when` holds. */
export interface SceneOverrideRule {
  scene_id: string;
  when: StatePredicate;
  render_as: string;
}

export interface WorldDefinition {
  title: string;
  entry_scene_id: string;
  scenes: SceneDefinition[];
  overrides?: SceneOverrideRule[];
  greeting?: string;
  restart_text?: string;
}

// ─── Session ────────────────────────────────────────────────────────

export interface HistoryEntry {
  from_scene_id: string;
  choice_id: string;
  to_scene_id: string;
  timestamp: string;
}

export interface SessionState {
  session_id: string;
  player_name: string | null;
  current_scene_id: string;
  history: HistoryEntry[];
  journal: string[];
  inventory: Set<string>;
  choices_made: string[];
  started_at: string;
}

// ─── Resolution ─────────────────────────────────────────────────────

export type ResolutionStage = "exact" | "heuristic" | "keyword" | "semantic";

export interface ResolutionRequest {
  scene_title: string;
  choice_map: Record<string, string>;
  utterance: string;
}

export type ResolutionOutcome =
  | { status: "resolved"; choice_id: string; stage: ResolutionStage }
  | { status: "unresolved"; reason: string };

/**
 * External language-model collaborator for the last resolution stage.
 * Must answer with a single choice id from `choice_map` or `NONE`.
 */
export interface SemanticResolver {
  readonly name: string;
  resolve(request: ResolutionRequest, signal: AbortSignal): Promise<string>;
}

// ─── Tools ──────────────────────────────────────────────────────────

export type ToolName =
  | "start_adventure"
  | "get_scene"
  | "player_action"
  | "show_journal"
  | "restart_adventure";

export interface ToolDefinition {
  name: ToolName;
  description: string;
  input_schema: Record<string, unknown>;
}

export type ToolErrorCode = "TOOL_NOT_FOUND" | "INVALID_INPUT";

export type ToolInvocationResult =
  | { ok: true; text: string }
  | { ok: false; error: { code: ToolErrorCode; message: string } };

// ─── Logging ────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

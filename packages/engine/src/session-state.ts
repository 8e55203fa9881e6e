import { v4 as uuid } from "uuid";
import type { SessionState } from "@storyloom/schemas";

export interface SessionStateOptions {
  playerName?: string | null;
  now?: () => Date;
  generateId?: () => string;
}

/** Short opaque token; regenerated on every start and restart. */
export function generateSessionId(): string {
  return uuid().slice(0, 8);
}

export function createSessionState(entrySceneId: string, opts: SessionStateOptions = {}): SessionState {
  const now = opts.now ?? (() => new Date());
  return {
    session_id: (opts.generateId ?? generateSessionId)(),
    player_name: opts.playerName ?? null,
    current_scene_id: entrySceneId,
    history: [],
    journal: [],
    inventory: new Set(),
    choices_made: [],
    started_at: now().toISOString(),
  };
}

export function cloneSessionState(state: SessionState): SessionState {
  return {
    ...state,
    history: state.history.map((entry) => ({ ...entry })),
    journal: [...state.journal],
    inventory: new Set(state.inventory),
    choices_made: [...state.choices_made],
  };
}

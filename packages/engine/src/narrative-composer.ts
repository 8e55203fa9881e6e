import type { SessionState, StatePredicate } from "@storyloom/schemas";
import type { WorldGraph } from "@storyloom/world";

export const TURN_PROMPT = "What do you do?";
export const VOID_SCENE_TEXT = `You are in a featureless void. ${TURN_PROMPT}`;

const ACQUIRE_MARKERS = ["take", "pick"];
const TRAVEL_MARKERS = ["approach", "walk", "go_to"];

export function predicateHolds(predicate: StatePredicate, state: SessionState): boolean {
  switch (predicate.type) {
    case "journal_includes":
      return state.journal.includes(predicate.entry);
    case "inventory_includes":
      return state.inventory.has(predicate.item_id);
    case "choice_made":
      return state.choices_made.includes(predicate.choice_id);
    default: {
      const exhaustive: never = predicate;
      throw new Error(`Unhandled predicate: ${JSON.stringify(exhaustive)}`);
    }
  }
}

function stripTerminalPunctuation(text: string): string {
  return text.trim().replace(/[.!?]+$/, "");
}

function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

/**
 * Turns world data and session state into spoken-friendly text: plain
 * sentences, line breaks and "- " list dashes only.
 */
export class NarrativeComposer {
  private world: WorldGraph;

  constructor(world: WorldGraph) {
    this.world = world;
  }

  /** Follows override rules from `sceneId` to the scene that should be shown. */
  resolveSceneId(sceneId: string, state: SessionState): string {
    const seen = new Set<string>([sceneId]);
    let current = sceneId;
    for (;;) {
      const rule = this.world.overrides.find((r) => r.scene_id === current && predicateHolds(r.when, state));
      if (!rule || seen.has(rule.render_as)) return current;
      seen.add(rule.render_as);
      current = rule.render_as;
    }
  }

  renderScene(sceneId: string, state: SessionState): string {
    const scene = this.world.getScene(this.resolveSceneId(sceneId, state));
    if (!scene) return VOID_SCENE_TEXT;

    let text = `${scene.description}\n\nChoices:\n`;
    for (const choice of scene.choices.values()) {
      text += `- ${choice.description}\n`;
    }
    return `${text}\n${TURN_PROMPT}`;
  }

  /** One sentence about the action taken, built only from the choice's own description. */
  renderTransition(fromSceneId: string, choiceId: string): string {
    const choice = this.world.getScene(fromSceneId)?.choices.get(choiceId);
    if (!choice) return "The scene changes.";

    const bare = stripTerminalPunctuation(choice.description);
    const id = choice.choice_id.toLowerCase();
    if (ACQUIRE_MARKERS.some((m) => id.includes(m))) {
      return `You ${lowerFirst(bare)}, and a new path opens.`;
    }
    if (TRAVEL_MARKERS.some((m) => id.includes(m))) {
      return `You ${lowerFirst(bare)} and proceed.`;
    }
    return `You chose to '${bare}', and the scene changes.`;
  }

  renderJournal(state: SessionState, historyLimit: number): string {
    const lines: string[] = [];
    lines.push(`Session: ${state.session_id} | Started at: ${state.started_at}`);
    if (state.player_name) {
      lines.push(`Player: ${state.player_name}`);
    }

    if (state.journal.length > 0) {
      lines.push("\nJournal entries:");
      for (const entry of state.journal) lines.push(`- ${entry}`);
    } else {
      lines.push("\nJournal is empty.");
    }

    if (state.inventory.size > 0) {
      lines.push("\nInventory:");
      for (const item of state.inventory) lines.push(`- ${item}`);
    } else {
      lines.push("\nNo items in inventory.");
    }

    lines.push("\nRecent choices:");
    const recent = historyLimit > 0 ? state.history.slice(-historyLimit) : [];
    if (recent.length === 0) {
      lines.push("No choices made yet.");
    }
    for (const h of recent) {
      lines.push(`- ${h.timestamp} | from ${h.from_scene_id} -> ${h.to_scene_id} via ${h.choice_id}`);
    }

    lines.push(`\n${TURN_PROMPT}`);
    return lines.join("\n");
  }
}

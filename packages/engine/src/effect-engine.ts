import type { Effect, SessionState } from "@storyloom/schemas";

export function applyEffect(effect: Effect, state: SessionState): void {
  switch (effect.type) {
    case "append_journal":
      // Repeated beats are kept: the journal is a log, not a set
      state.journal.push(effect.text);
      return;
    case "add_inventory_item":
      state.inventory.add(effect.item_id);
      return;
    default: {
      const exhaustive: never = effect;
      throw new Error(`Unhandled effect: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/** Applies effects in listed order. */
export function applyEffects(effects: readonly Effect[], state: SessionState): void {
  for (const effect of effects) {
    applyEffect(effect, state);
  }
}

import type { ResolutionStage } from "@storyloom/schemas";
import type { Scene } from "@storyloom/world";

/** Verbs that may tie an utterance to a choice anywhere in its description. */
export const ACTION_VERBS = [
  "take", "pick", "open", "go", "return", "leave", "fight", "flee", "search", "descend", "close",
] as const;

const DESCRIPTION_LEAD_WORDS = 4;
const MIN_LEAD_WORD_LENGTH = 3;

/** A pure matcher: given the folded utterance, the first choice it selects, if any. */
export type MatchFn = (scene: Scene, folded: string) => string | undefined;

export interface MatchStage {
  name: Exclude<ResolutionStage, "semantic">;
  match: MatchFn;
}

export function foldUtterance(utterance: string): string {
  return utterance.trim().toLowerCase();
}

export const matchExactId: MatchFn = (scene, folded) => {
  for (const choiceId of scene.choices.keys()) {
    if (choiceId.toLowerCase() === folded) return choiceId;
  }
  return undefined;
};

function leadWords(description: string): string[] {
  return description
    .toLowerCase()
    .split(/\s+/)
    .filter((w) => w.length > 0)
    .slice(0, DESCRIPTION_LEAD_WORDS)
    .filter((w) => w.length >= MIN_LEAD_WORD_LENGTH);
}

export const matchHeuristic: MatchFn = (scene, folded) => {
  for (const [choiceId, choice] of scene.choices) {
    if (folded.includes(choiceId.toLowerCase())) return choiceId;
    if (leadWords(choice.description).some((w) => folded.includes(w))) return choiceId;
  }
  return undefined;
};

export const matchKeyword: MatchFn = (scene, folded) => {
  for (const [choiceId, choice] of scene.choices) {
    const description = choice.description.toLowerCase();
    if (ACTION_VERBS.some((verb) => folded.includes(verb) && description.includes(verb))) {
      return choiceId;
    }
  }
  return undefined;
};

/** Deterministic stages, in the order they run. */
export const DETERMINISTIC_STAGES: readonly MatchStage[] = [
  { name: "exact", match: matchExactId },
  { name: "heuristic", match: matchHeuristic },
  { name: "keyword", match: matchKeyword },
];

import type { ResolutionRequest, SemanticResolver, WorldDefinition } from "@storyloom/schemas";
import { silentLogger } from "@storyloom/schemas";
import { WorldGraph } from "@storyloom/world";
import { ActionResolver } from "@storyloom/resolver";
import { SessionEngine } from "./session-engine.js";
import type { SessionEngineConfig } from "./session-engine.js";

export const FIXED_TIME = "2026-01-02T03:04:05.000Z";

/** Sequential ids: s-1, s-2, ... */
export function sequentialIds(): () => string {
  let n = 0;
  return () => `s-${++n}`;
}

/** A small workshop world with a self-looping choice that carries effects. */
export function workshopWorld(): WorldGraph {
  const definition: WorldDefinition = {
    title: "The Workshop",
    entry_scene_id: "bench",
    scenes: [
      {
        scene_id: "bench",
        title: "Workbench",
        description: "Tools hang above a scarred bench.",
        choices: [
          {
            choice_id: "polish_gear",
            description: "Polish the brass gear.",
            result_scene_id: "bench",
            effects: [
              { type: "append_journal", text: "Polished the gear." },
              { type: "add_inventory_item", item_id: "brass_gear" },
            ],
          },
          { choice_id: "open_drawer", description: "Open the drawer.", result_scene_id: "drawer" },
        ],
      },
      {
        scene_id: "drawer",
        title: "Drawer",
        description: "The drawer holds a rolled blueprint.",
        choices: [
          { choice_id: "close_drawer", description: "Close the drawer.", result_scene_id: "bench" },
        ],
      },
    ],
  };
  return new WorldGraph(definition);
}

export function stubSemantic(
  impl: (request: ResolutionRequest, signal: AbortSignal) => Promise<string>,
): SemanticResolver {
  return { name: "stub", resolve: impl };
}

export interface TestEngineOptions {
  semantic?: SemanticResolver;
  semanticTimeoutMs?: number;
  historyLimit?: SessionEngineConfig["historyLimit"];
}

export function makeEngine(world: WorldGraph, opts: TestEngineOptions = {}): SessionEngine {
  return new SessionEngine({
    world,
    resolver: new ActionResolver({
      semantic: opts.semantic,
      semanticTimeoutMs: opts.semanticTimeoutMs,
      logger: silentLogger,
    }),
    historyLimit: opts.historyLimit,
    now: () => new Date(FIXED_TIME),
    generateId: sequentialIds(),
    logger: silentLogger,
  });
}

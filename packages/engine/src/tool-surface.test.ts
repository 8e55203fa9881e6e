import { describe, it, expect, beforeAll } from "vitest";
import type { WorldGraph } from "@storyloom/world";
import { loadDefaultWorld } from "@storyloom/world";
import { ToolSurface, TOOL_DEFINITIONS } from "./tool-surface.js";
import { makeEngine } from "./test-fixtures.js";

let brinmere: WorldGraph;

beforeAll(async () => {
  brinmere = await loadDefaultWorld();
});

describe("ToolSurface", () => {
  it("lists the five tools in order", () => {
    const surface = new ToolSurface(makeEngine(brinmere));
    expect(surface.list().map((t) => t.name)).toEqual([
      "start_adventure",
      "get_scene",
      "player_action",
      "show_journal",
      "restart_adventure",
    ]);
    expect(surface.get("player_action")).toBe(TOOL_DEFINITIONS[2]);
    expect(surface.get("cast_spell")).toBeUndefined();
  });

  it("dispatches to the engine", async () => {
    const engine = makeEngine(brinmere);
    const surface = new ToolSurface(engine);

    const started = await surface.invoke("start_adventure", { player_name: "Ada" });
    expect(started.ok).toBe(true);
    expect(engine.snapshot().player_name).toBe("Ada");

    const moved = await surface.invoke("player_action", { action: "inspect_box" });
    expect(moved).toEqual({ ok: true, text: expect.stringContaining("and the scene changes.") });
    expect(engine.snapshot().current_scene_id).toBe("box");

    expect(await surface.invoke("get_scene")).toEqual({ ok: true, text: engine.getCurrentScene() });
    expect(await surface.invoke("show_journal", {})).toEqual({ ok: true, text: engine.showJournal() });

    const restarted = await surface.invoke("restart_adventure");
    expect(restarted.ok).toBe(true);
    expect(engine.snapshot().current_scene_id).toBe("intro");
  });

  it("rejects an unknown tool", async () => {
    const surface = new ToolSurface(makeEngine(brinmere));
    expect(await surface.invoke("cast_spell", {})).toEqual({
      ok: false,
      error: { code: "TOOL_NOT_FOUND", message: 'Tool "cast_spell" not registered' },
    });
  });

  it("rejects player_action without an action", async () => {
    const surface = new ToolSurface(makeEngine(brinmere));
    expect(await surface.invoke("player_action", {})).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Input validation failed: /: must have required property 'action'" },
    });
  });

  it("rejects unexpected fields and wrong types", async () => {
    const surface = new ToolSurface(makeEngine(brinmere));
    const extra = await surface.invoke("get_scene", { verbose: true });
    expect(extra.ok).toBe(false);
    const wrongType = await surface.invoke("start_adventure", { player_name: 42 });
    expect(wrongType).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Input validation failed: /player_name: must be string" },
    });
  });

  it("passes an empty action through as unresolved", async () => {
    const engine = makeEngine(brinmere);
    const surface = new ToolSurface(engine);
    await surface.invoke("start_adventure");
    const result = await surface.invoke("player_action", { action: "" });
    expect(result.ok).toBe(true);
    expect(engine.snapshot().current_scene_id).toBe("intro");
  });
});

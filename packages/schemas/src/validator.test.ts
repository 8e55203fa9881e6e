import { describe, it, expect } from "vitest";
import {
  validateWorldDefinitionData,
  isWorldDefinition,
  validateToolInput,
} from "./validator.js";

describe("validateWorldDefinitionData", () => {
  const validWorld = () => ({
    title: "Test World",
    entry_scene_id: "start",
    scenes: [
      {
        scene_id: "start",
        title: "Start",
        description: "A bare room.",
        choices: [
          {
            choice_id: "wait",
            description: "Wait a moment.",
            result_scene_id: "start",
            effects: [
              { type: "append_journal", text: "You waited." },
              { type: "add_inventory_item", item_id: "patience" },
            ],
          },
        ],
      },
    ],
    overrides: [
      { scene_id: "start", when: { type: "choice_made", choice_id: "wait" }, render_as: "start" },
    ],
  });

  it("accepts a valid world", () => {
    const result = validateWorldDefinitionData(validWorld());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(isWorldDefinition(validWorld())).toBe(true);
  });

  it("rejects a world missing required fields", () => {
    const result = validateWorldDefinitionData({ title: "x" });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/: must have required property 'entry_scene_id'");
  });

  it("rejects an unknown effect variant", () => {
    const world = validWorld();
    const effects: unknown[] = [{ type: "add_gold", amount: 5 }];
    const data = {
      ...world,
      scenes: [{ ...world.scenes[0], choices: [{ ...world.scenes[0]!.choices[0], effects }] }],
    };
    const result = validateWorldDefinitionData(data);
    expect(result.valid).toBe(false);
    expect(result.errors.some((e) => e.startsWith("/scenes/0/choices/0/effects/0"))).toBe(true);
  });

  it("rejects an effect carrying an extra key", () => {
    const world = validWorld();
    const effects = [{ type: "append_journal", text: "x", add_inventory: "key" }];
    const data = {
      ...world,
      scenes: [{ ...world.scenes[0], choices: [{ ...world.scenes[0]!.choices[0], effects }] }],
    };
    expect(validateWorldDefinitionData(data).valid).toBe(false);
  });

  it("rejects a scene without choices", () => {
    const world = validWorld();
    const data = { ...world, scenes: [{ ...world.scenes[0], choices: [] }] };
    const result = validateWorldDefinitionData(data);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/scenes/0/choices: must NOT have fewer than 1 items");
  });

  it("rejects identifiers with spaces or capitals", () => {
    const world = validWorld();
    expect(validateWorldDefinitionData({ ...world, entry_scene_id: "Big Room" }).valid).toBe(false);
  });

  it("rejects an unknown override predicate", () => {
    const world = validWorld();
    const data = {
      ...world,
      overrides: [{ scene_id: "start", when: { type: "moon_phase", phase: "full" }, render_as: "start" }],
    };
    expect(validateWorldDefinitionData(data).valid).toBe(false);
  });
});

describe("validateToolInput", () => {
  it("accepts matching input", () => {
    expect(validateToolInput("player_action", { action: "descend" })).toEqual({ valid: true, errors: [] });
    expect(validateToolInput("start_adventure", {})).toEqual({ valid: true, errors: [] });
  });

  it("reports the missing property", () => {
    const result = validateToolInput("player_action", {});
    expect(result).toEqual({ valid: false, errors: ["/: must have required property 'action'"] });
  });

  it("reports a wrong property type with its path", () => {
    const result = validateToolInput("player_action", { action: 7 });
    expect(result).toEqual({ valid: false, errors: ["/action: must be string"] });
  });

  it("rejects input for tools that take none", () => {
    const result = validateToolInput("show_journal", { verbose: true });
    expect(result).toEqual({ valid: false, errors: ["/: must NOT have additional properties"] });
  });

  it("bounds the player name length", () => {
    expect(validateToolInput("start_adventure", { player_name: "a".repeat(81) })).toEqual({
      valid: false,
      errors: ["/player_name: must NOT have more than 80 characters"],
    });
  });
});

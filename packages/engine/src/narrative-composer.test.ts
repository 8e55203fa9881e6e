import { describe, it, expect, beforeAll } from "vitest";
import { WorldGraph, loadDefaultWorld } from "@storyloom/world";
import { NarrativeComposer, VOID_SCENE_TEXT, predicateHolds } from "./narrative-composer.js";
import { createSessionState } from "./session-state.js";
import { FIXED_TIME } from "./test-fixtures.js";

function stateAt(sceneId: string) {
  return createSessionState(sceneId, { generateId: () => "s-9", now: () => new Date(FIXED_TIME) });
}

describe("predicateHolds", () => {
  it("checks journal, inventory and past choices", () => {
    const state = stateAt("a");
    state.journal.push("Saw a gull.");
    state.inventory.add("rope");
    state.choices_made.push("climb");
    expect(predicateHolds({ type: "journal_includes", entry: "Saw a gull." }, state)).toBe(true);
    expect(predicateHolds({ type: "journal_includes", entry: "Saw a crow." }, state)).toBe(false);
    expect(predicateHolds({ type: "inventory_includes", item_id: "rope" }, state)).toBe(true);
    expect(predicateHolds({ type: "inventory_includes", item_id: "hook" }, state)).toBe(false);
    expect(predicateHolds({ type: "choice_made", choice_id: "climb" }, state)).toBe(true);
    expect(predicateHolds({ type: "choice_made", choice_id: "dive" }, state)).toBe(false);
  });
});

describe("NarrativeComposer with override chains", () => {
  const world = new WorldGraph({
    title: "Layers",
    entry_scene_id: "hall",
    scenes: [
      { scene_id: "hall", title: "Hall", description: "A plain hall.", choices: [{ choice_id: "wait", description: "Wait.", result_scene_id: "hall" }] },
      { scene_id: "hall_lit", title: "Lit Hall", description: "Lamps burn in the hall.", choices: [{ choice_id: "wait", description: "Wait.", result_scene_id: "hall" }] },
      { scene_id: "hall_open", title: "Open Hall", description: "A door stands open.", choices: [{ choice_id: "leave", description: "Leave.", result_scene_id: "hall" }] },
    ],
    overrides: [
      { scene_id: "hall", when: { type: "choice_made", choice_id: "light_lamp" }, render_as: "hall_lit" },
      { scene_id: "hall_lit", when: { type: "inventory_includes", item_id: "door_key" }, render_as: "hall_open" },
    ],
  });
  const composer = new NarrativeComposer(world);

  it("shows the stored scene when no rule fires", () => {
    expect(composer.resolveSceneId("hall", stateAt("hall"))).toBe("hall");
  });

  it("follows a single rule", () => {
    const state = stateAt("hall");
    state.choices_made.push("light_lamp");
    expect(composer.resolveSceneId("hall", state)).toBe("hall_lit");
    expect(composer.renderScene("hall", state)).toBe(
      "Lamps burn in the hall.\n\nChoices:\n- Wait.\n\nWhat do you do?",
    );
  });

  it("follows chained rules to the last scene", () => {
    const state = stateAt("hall");
    state.choices_made.push("light_lamp");
    state.inventory.add("door_key");
    expect(composer.resolveSceneId("hall", state)).toBe("hall_open");
  });

  it("does not apply a later rule when the earlier one does not fire", () => {
    const state = stateAt("hall");
    state.inventory.add("door_key");
    expect(composer.resolveSceneId("hall", state)).toBe("hall");
  });
});

describe("NarrativeComposer on the bundled world", () => {
  let world: WorldGraph;
  let composer: NarrativeComposer;

  beforeAll(async () => {
    world = await loadDefaultWorld();
    composer = new NarrativeComposer(world);
  });

  it("renders description, choice list and prompt", () => {
    const text = composer.renderScene("intro", stateAt("intro"));
    expect(text.startsWith("You awake on the damp shore of Brinmere")).toBe(true);
    expect(text.endsWith(
      "\n\nChoices:\n" +
        "- Inspect the carved wooden box at the water's edge.\n" +
        "- Head inland towards the smoldering watchtower.\n" +
        "- Follow the path east towards the cottages.\n" +
        "\nWhat do you do?",
    )).toBe(true);
  });

  it("renders the void for an unknown scene", () => {
    expect(composer.renderScene("nowhere", stateAt("nowhere"))).toBe(VOID_SCENE_TEXT);
  });

  it("shows the guided approach at the tower once the map is found", () => {
    const state = stateAt("tower");
    state.journal.push("Found map fragment: 'Beneath the tower, the latch sings.'");
    expect(composer.resolveSceneId("tower", state)).toBe("tower_approach");
    expect(composer.renderScene("tower", state).startsWith("Clutching the map")).toBe(true);
  });

  it("phrases acquisitions as a new path", () => {
    expect(composer.renderTransition("box", "take_map")).toBe("You take the map and keep it, and a new path opens.");
    expect(composer.renderTransition("cellar", "take_key")).toBe("You pick up the brass key, and a new path opens.");
  });

  it("phrases travel as proceeding", () => {
    expect(composer.renderTransition("intro", "approach_tower")).toBe(
      "You head inland towards the smoldering watchtower and proceed.",
    );
    expect(composer.renderTransition("intro", "walk_to_cottages")).toBe(
      "You follow the path east towards the cottages and proceed.",
    );
  });

  it("quotes any other choice", () => {
    expect(composer.renderTransition("intro", "inspect_box")).toBe(
      "You chose to 'Inspect the carved wooden box at the water's edge', and the scene changes.",
    );
  });

  it("falls back when the choice is unknown", () => {
    expect(composer.renderTransition("intro", "fly_away")).toBe("The scene changes.");
  });

  it("renders an empty journal", () => {
    expect(composer.renderJournal(stateAt("intro"), 6)).toBe(
      `Session: s-9 | Started at: ${FIXED_TIME}\n` +
        "\nJournal is empty.\n" +
        "\nNo items in inventory.\n" +
        "\nRecent choices:\nNo choices made yet.\n" +
        "\nWhat do you do?",
    );
  });

  it("renders entries, items and only the most recent choices", () => {
    const state = stateAt("intro");
    state.player_name = "Wren";
    state.journal.push("Found brass key on plinth.");
    state.inventory.add("brass_key");
    for (let i = 1; i <= 3; i++) {
      state.history.push({ from_scene_id: "intro", choice_id: `step_${i}`, to_scene_id: "intro", timestamp: `t${i}` });
    }
    expect(composer.renderJournal(state, 2)).toBe(
      `Session: s-9 | Started at: ${FIXED_TIME}\n` +
        "Player: Wren\n" +
        "\nJournal entries:\n- Found brass key on plinth.\n" +
        "\nInventory:\n- brass_key\n" +
        "\nRecent choices:\n" +
        "- t2 | from intro -> intro via step_2\n" +
        "- t3 | from intro -> intro via step_3\n" +
        "\nWhat do you do?",
    );
  });
});

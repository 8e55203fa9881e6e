import type { ToolName } from "./types.js";

const NoInputSchema = { type: "object", properties: {}, additionalProperties: false } as const;

export const StartAdventureInputSchema = {
  type: "object",
  properties: { player_name: { type: "string", maxLength: 80, description: "Player name" } },
  additionalProperties: false,
} as const;

export const PlayerActionInputSchema = {
  type: "object",
  required: ["action"],
  properties: {
    action: {
      type: "string",
      maxLength: 2000,
      description: "Player spoken action (e.g., 'I want to check the wooden box' or 'fight the monster')",
    },
  },
  additionalProperties: false,
} as const;

export const ToolInputSchemas = {
  start_adventure: StartAdventureInputSchema,
  get_scene: NoInputSchema,
  player_action: PlayerActionInputSchema,
  show_journal: NoInputSchema,
  restart_adventure: NoInputSchema,
} as const satisfies Record<ToolName, Record<string, unknown>>;

const IdSchema = { type: "string", pattern: "^[a-z0-9][a-z0-9_]*$", maxLength: 64 } as const;
const TextSchema = { type: "string", minLength: 1 } as const;

const EffectSchema = {
  oneOf: [
    {
      type: "object",
      required: ["type", "text"],
      properties: {
        type: { const: "append_journal" },
        text: TextSchema,
      },
      additionalProperties: false,
    },
    {
      type: "object",
      required: ["type", "item_id"],
      properties: {
        type: { const: "add_inventory_item" },
        item_id: IdSchema,
      },
      additionalProperties: false,
    },
  ],
} as const;

const StatePredicateSchema = {
  oneOf: [
    {
      type: "object",
      required: ["type", "entry"],
      properties: { type: { const: "journal_includes" }, entry: TextSchema },
      additionalProperties: false,
    },
    {
      type: "object",
      required: ["type", "item_id"],
      properties: { type: { const: "inventory_includes" }, item_id: IdSchema },
      additionalProperties: false,
    },
    {
      type: "object",
      required: ["type", "choice_id"],
      properties: { type: { const: "choice_made" }, choice_id: IdSchema },
      additionalProperties: false,
    },
  ],
} as const;

export const WorldDefinitionSchema = {
  type: "object",
  required: ["title", "entry_scene_id", "scenes"],
  properties: {
    title: TextSchema,
    entry_scene_id: IdSchema,
    greeting: TextSchema,
    restart_text: TextSchema,
    scenes: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["scene_id", "title", "description", "choices"],
        properties: {
          scene_id: IdSchema,
          title: TextSchema,
          description: TextSchema,
          choices: {
            type: "array",
            minItems: 1,
            items: {
              type: "object",
              required: ["choice_id", "description", "result_scene_id"],
              properties: {
                choice_id: IdSchema,
                description: TextSchema,
                result_scene_id: IdSchema,
                effects: { type: "array", items: EffectSchema },
              },
              additionalProperties: false,
            },
          },
        },
        additionalProperties: false,
      },
    },
    overrides: {
      type: "array",
      items: {
        type: "object",
        required: ["scene_id", "when", "render_as"],
        properties: {
          scene_id: IdSchema,
          when: StatePredicateSchema,
          render_as: IdSchema,
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const;

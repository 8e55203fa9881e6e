import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import type { ToolName, WorldDefinition } from "./types.js";
import { WorldDefinitionSchema } from "./world.schema.js";
import { ToolInputSchemas } from "./tool-input.schema.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });

const validateWorld = ajv.compile<WorldDefinition>(WorldDefinitionSchema);

const toolInputValidators: Record<ToolName, ValidateFunction> = {
  start_adventure: ajv.compile(ToolInputSchemas.start_adventure),
  get_scene: ajv.compile(ToolInputSchemas.get_scene),
  player_action: ajv.compile(ToolInputSchemas.player_action),
  show_journal: ajv.compile(ToolInputSchemas.show_journal),
  restart_adventure: ajv.compile(ToolInputSchemas.restart_adventure),
};

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateWorldDefinitionData(data: unknown): ValidationResult {
  const valid = validateWorld(data);
  return toResult(valid, validateWorld.errors);
}

/** Type guard over the world schema, for callers that already reported errors. */
export function isWorldDefinition(data: unknown): data is WorldDefinition {
  return validateWorld(data);
}

export function validateToolInput(tool: ToolName, input: unknown): ValidationResult {
  const validate = toolInputValidators[tool];
  const valid = validate(input);
  return toResult(valid, validate.errors);
}

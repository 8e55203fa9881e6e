import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import type { WorldDefinition } from "@storyloom/schemas";
import { WorldIntegrityError, isWorldDefinition, validateWorldDefinitionData } from "@storyloom/schemas";
import { WorldGraph } from "./world-graph.js";

export const DEFAULT_WORLD_PATH = fileURLToPath(new URL("../worlds/brinmere.yaml", import.meta.url));

/** Parses world text (YAML or JSON) into a checked definition. */
export function parseWorldDefinition(content: string, source = "<inline>"): WorldDefinition {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new WorldIntegrityError([`unparseable world file: ${message}`], source);
  }
  if (!isWorldDefinition(data)) {
    throw new WorldIntegrityError(validateWorldDefinitionData(data).errors, source);
  }
  return data;
}

export async function loadWorldFile(filePath: string): Promise<WorldGraph> {
  if (!existsSync(filePath)) throw new Error(`World file not found: ${filePath}`);
  const content = await readFile(filePath, "utf-8");
  return new WorldGraph(parseWorldDefinition(content, filePath), filePath);
}

export function loadDefaultWorld(): Promise<WorldGraph> {
  return loadWorldFile(DEFAULT_WORLD_PATH);
}

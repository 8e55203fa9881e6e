import type { ToolDefinition, ToolInvocationResult, ToolName } from "@storyloom/schemas";
import { ToolInputSchemas, validateToolInput } from "@storyloom/schemas";
import type { SessionEngine } from "./session-engine.js";

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: "start_adventure",
    description: "Initialize a new adventure session for the player and return the opening description.",
    input_schema: ToolInputSchemas.start_adventure,
  },
  {
    name: "get_scene",
    description: "Return the current scene description (useful for 'remind me where I am').",
    input_schema: ToolInputSchemas.get_scene,
  },
  {
    name: "player_action",
    description:
      "Accept the player's spoken action, resolve it to one of the scene's choices, advance the story " +
      "and return the next description.",
    input_schema: ToolInputSchemas.player_action,
  },
  {
    name: "show_journal",
    description: "Show the session journal, inventory and recent choices.",
    input_schema: ToolInputSchemas.show_journal,
  },
  {
    name: "restart_adventure",
    description: "Reset the adventure and start again from the beginning.",
    input_schema: ToolInputSchemas.restart_adventure,
  },
];

function readString(input: unknown, key: string): string | undefined {
  if (typeof input !== "object" || input === null) return undefined;
  const value: unknown = Reflect.get(input, key);
  return typeof value === "string" ? value : undefined;
}

/** The five operations a host conversational runtime may call on one session. */
export class ToolSurface {
  private engine: SessionEngine;
  private tools = new Map<string, ToolDefinition>(TOOL_DEFINITIONS.map((t) => [t.name, t]));

  constructor(engine: SessionEngine) {
    this.engine = engine;
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  async invoke(name: string, input: unknown = {}): Promise<ToolInvocationResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, error: { code: "TOOL_NOT_FOUND", message: `Tool "${name}" not registered` } };
    }
    const validation = validateToolInput(tool.name, input);
    if (!validation.valid) {
      return {
        ok: false,
        error: { code: "INVALID_INPUT", message: `Input validation failed: ${validation.errors.join(", ")}` },
      };
    }
    return { ok: true, text: await this.dispatch(tool.name, input) };
  }

  private async dispatch(name: ToolName, input: unknown): Promise<string> {
    switch (name) {
      case "start_adventure":
        return this.engine.start(readString(input, "player_name"));
      case "get_scene":
        return this.engine.getCurrentScene();
      case "player_action":
        return this.engine.playerAction(readString(input, "action") ?? "");
      case "show_journal":
        return this.engine.showJournal();
      case "restart_adventure":
        return this.engine.restart();
      default: {
        const exhaustive: never = name;
        throw new Error(`Unhandled tool: ${String(exhaustive)}`);
      }
    }
  }
}

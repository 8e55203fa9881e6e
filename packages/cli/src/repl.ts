import * as readline from "node:readline";
import type { ToolName } from "@storyloom/schemas";
import type { ToolSurface } from "@storyloom/engine";

export type ReplCommand =
  | { kind: "tool"; tool: ToolName; input: Record<string, unknown> }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "skip" };

export const REPL_HELP = [
  "Type what you want to do, or one of:",
  "  /scene    describe where you are",
  "  /journal  show journal, inventory and recent choices",
  "  /restart  start the adventure over",
  "  /quit     leave the game",
].join("\n");

const SLASH_COMMANDS: Record<string, ReplCommand> = {
  "/scene": { kind: "tool", tool: "get_scene", input: {} },
  "/journal": { kind: "tool", tool: "show_journal", input: {} },
  "/restart": { kind: "tool", tool: "restart_adventure", input: {} },
  "/help": { kind: "help" },
  "/quit": { kind: "quit" },
  "/exit": { kind: "quit" },
};

export function parseReplLine(line: string): ReplCommand {
  const trimmed = line.trim();
  if (trimmed.length === 0) return { kind: "skip" };
  const command = SLASH_COMMANDS[trimmed.toLowerCase()];
  if (command) return command;
  return { kind: "tool", tool: "player_action", input: { action: trimmed } };
}

export interface ReplOptions {
  tools: ToolSurface;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  playerName?: string;
  prompt?: string;
}

/** Terminal play loop. Lines are handled one at a time, in order. */
export async function runRepl(opts: ReplOptions): Promise<void> {
  const { tools, input, output } = opts;
  const prompt = opts.prompt ?? "> ";
  const say = (text: string) => output.write(`${text}\n\n${prompt}`);

  const startInput = opts.playerName ? { player_name: opts.playerName } : {};
  const started = await tools.invoke("start_adventure", startInput);
  say(started.ok ? started.text : `Error: ${started.error.message}`);

  const rl = readline.createInterface({ input, terminal: false });
  try {
    for await (const line of rl) {
      const command = parseReplLine(line);
      if (command.kind === "skip") { output.write(prompt); continue; }
      if (command.kind === "quit") break;
      if (command.kind === "help") { say(REPL_HELP); continue; }
      const result = await tools.invoke(command.tool, command.input);
      say(result.ok ? result.text : `Error: ${result.error.message}`);
    }
  } finally {
    rl.close();
  }
  output.write("Farewell, traveler.\n");
}

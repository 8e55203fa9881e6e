import { Command } from "commander";
import { ConsoleLogger, WorldIntegrityError } from "@storyloom/schemas";
import { loadWorldFile } from "@storyloom/world";
import { ActionResolver } from "@storyloom/resolver";
import { SessionEngine, ToolSurface } from "@storyloom/engine";
import { GameServer } from "@storyloom/api";
import { resolveConfig } from "./config.js";
import type { CliOptions, StoryloomConfig } from "./config.js";
import { createSemanticResolver } from "./llm-adapters.js";
import { runRepl } from "./repl.js";

function buildResolver(config: StoryloomConfig): ActionResolver {
  return new ActionResolver({
    semantic: createSemanticResolver({ resolver: config.resolver, model: config.model }),
    semanticTimeoutMs: config.resolverTimeoutMs,
    logger: new ConsoleLogger("resolver", { level: config.logLevel }),
  });
}

export function buildProgram(): Command {
  const program = new Command();
  program.name("storyloom").description("Storyloom: turn-based interactive narrative engine").version("0.1.0");

  program.command("play").description("Play an adventure in the terminal")
    .option("--world <path>", "World file (YAML or JSON)")
    .option("--resolver <type>", "Semantic resolver: mock, claude, openai, gemini")
    .option("--model <name>", "Model name for the semantic resolver")
    .option("--name <player>", "Player name")
    .option("--timeout-ms <ms>", "Semantic resolver timeout in milliseconds")
    .option("--log-level <level>", "Log level: debug, info, warn, error, silent")
    .action(async (opts: CliOptions & { name?: string }) => {
      const config = resolveConfig(opts);
      const world = await loadWorldFile(config.worldPath);
      const engine = new SessionEngine({
        world,
        resolver: buildResolver(config),
        logger: new ConsoleLogger("engine", { level: config.logLevel }),
      });
      await runRepl({
        tools: new ToolSurface(engine),
        input: process.stdin,
        output: process.stdout,
        playerName: opts.name,
      });
      engine.dispose();
    });

  program.command("validate").description("Check a world file and report every integrity issue")
    .argument("<world>", "World file (YAML or JSON)")
    .action(async (worldPath: string) => {
      try {
        const world = await loadWorldFile(worldPath);
        console.log(`World "${world.title}" is valid: ${world.sceneCount} scenes, ${world.choiceCount} choices.`);
      } catch (err) {
        if (err instanceof WorldIntegrityError) {
          console.error(`World "${worldPath}" has ${err.issues.length} issue(s):`);
          for (const issue of err.issues) console.error(`  - ${issue}`);
        } else {
          console.error(err instanceof Error ? err.message : String(err));
        }
        process.exitCode = 1;
      }
    });

  program.command("serve").description("Start the HTTP API")
    .option("-p, --port <port>", "Port number")
    .option("--world <path>", "World file (YAML or JSON)")
    .option("--resolver <type>", "Semantic resolver: mock, claude, openai, gemini")
    .option("--model <name>", "Model name for the semantic resolver")
    .option("--log-level <level>", "Log level: debug, info, warn, error, silent")
    .action(async (opts: CliOptions) => {
      const config = resolveConfig(opts);
      const logger = new ConsoleLogger("api", { level: config.logLevel });
      const world = await loadWorldFile(config.worldPath);
      const server = new GameServer({ world, resolver: buildResolver(config), logger });
      await server.listen(config.port);

      const shutdown = async () => {
        logger.info("Shutting down...");
        await server.shutdown();
        process.exit(0);
      };
      const onSignal = () => {
        shutdown().catch((err: unknown) => {
          logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
      };
      process.on("SIGTERM", onSignal);
      process.on("SIGINT", onSignal);
    });

  return program;
}

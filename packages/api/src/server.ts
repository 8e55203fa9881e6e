import express from "express";
import type { NextFunction, Request, Response } from "express";
import { v4 as uuid } from "uuid";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger, ToolInvocationResult } from "@storyloom/schemas";
import { ConsoleLogger } from "@storyloom/schemas";
import type { WorldGraph } from "@storyloom/world";
import type { ActionResolver } from "@storyloom/resolver";
import { SessionEngine, ToolSurface, TOOL_DEFINITIONS } from "@storyloom/engine";

const MAX_BODY = "16kb";
const MAX_CONVERSATIONS = 1000;

export interface GameServerConfig {
  world: WorldGraph;
  resolver: ActionResolver;
  historyLimit?: number;
  maxConversations?: number;
  logger?: Logger;
}

interface Conversation {
  engine: SessionEngine;
  tools: ToolSurface;
  /** Tail of this conversation's tool calls; each call waits for the one before it. */
  queue: Promise<void>;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function errorStatus(result: Extract<ToolInvocationResult, { ok: false }>): number {
  return result.error.code === "TOOL_NOT_FOUND" ? 404 : 400;
}

/** HTTP surface: one SessionEngine per conversation, driven through the five tools. */
export class GameServer {
  private app: express.Express;
  private world: WorldGraph;
  private resolver: ActionResolver;
  private historyLimit: number | undefined;
  private maxConversations: number;
  private logger: Logger;
  private conversations = new Map<string, Conversation>();
  private httpServer?: Server;

  constructor(config: GameServerConfig) {
    this.world = config.world;
    this.resolver = config.resolver;
    this.historyLimit = config.historyLimit;
    this.maxConversations = config.maxConversations ?? MAX_CONVERSATIONS;
    this.logger = config.logger ?? new ConsoleLogger("api");

    this.app = express();
    this.app.use(express.json({ limit: MAX_BODY }));
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("Cache-Control", "no-store");
      next();
    });
    this.setupRoutes();
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = statusOf(err);
      if (status === 413) { res.status(413).json({ error: "Request body too large" }); return; }
      if (status === 400) { res.status(400).json({ error: "Request body must be valid JSON" }); return; }
      this.logger.error("Unhandled request error", { error: err instanceof Error ? err.message : String(err) });
      res.status(500).json({ error: "Internal server error" });
    });
  }

  get conversationCount(): number {
    return this.conversations.size;
  }

  listen(port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port);
      server.once("listening", () => {
        const addr: AddressInfo | string | null = server.address();
        const actualPort = typeof addr === "object" && addr ? addr.port : port;
        this.logger.info(`Storyloom API listening on http://localhost:${actualPort}`);
        resolve(server);
      });
      server.once("error", reject);
      this.httpServer = server;
    });
  }

  async shutdown(): Promise<void> {
    for (const conversation of this.conversations.values()) conversation.engine.dispose();
    this.conversations.clear();
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      this.httpServer = undefined;
    }
  }

  private setupRoutes(): void {
    const router = express.Router();

    router.get("/health", (_req, res) => {
      res.json({
        status: "ok",
        world: this.world.title,
        scenes: this.world.sceneCount,
        conversations: this.conversations.size,
      });
    });

    router.get("/tools", (_req, res) => {
      res.json({ tools: TOOL_DEFINITIONS });
    });

    router.post("/conversations", async (req, res) => {
      try {
        if (this.conversations.size >= this.maxConversations) {
          res.status(429).json({ error: "Too many active conversations" });
          return;
        }
        const engine = new SessionEngine({
          world: this.world,
          resolver: this.resolver,
          historyLimit: this.historyLimit,
          logger: this.logger,
        });
        const tools = new ToolSurface(engine);
        const body: unknown = req.body ?? {};
        const result = await tools.invoke("start_adventure", body);
        if (!result.ok) {
          engine.dispose();
          res.status(errorStatus(result)).json({ error: result.error.message });
          return;
        }
        const conversationId = uuid();
        this.conversations.set(conversationId, { engine, tools, queue: Promise.resolve() });
        res.status(201).json({ conversation_id: conversationId, text: result.text });
      } catch (err) {
        this.logError("POST /conversations", err);
        res.status(500).json({ error: "Internal server error" });
      }
    });

    router.post("/conversations/:id/tools/:name", async (req, res) => {
      try {
        const conversation = this.findConversation(req.params.id);
        if (!conversation) { res.status(404).json({ error: "Conversation not found" }); return; }
        const input: unknown = req.body ?? {};
        const name = req.params.name ?? "";
        const result = await this.serialize(conversation, () => conversation.tools.invoke(name, input));
        if (!result.ok) {
          res.status(errorStatus(result)).json({ error: result.error.message });
          return;
        }
        res.json({ text: result.text });
      } catch (err) {
        this.logError("POST /conversations/:id/tools/:name", err);
        res.status(500).json({ error: "Internal server error" });
      }
    });

    router.get("/conversations/:id/state", (req, res) => {
      const conversation = this.findConversation(req.params.id);
      if (!conversation) { res.status(404).json({ error: "Conversation not found" }); return; }
      const state = conversation.engine.snapshot();
      res.json({ ...state, inventory: [...state.inventory] });
    });

    router.delete("/conversations/:id", (req, res) => {
      const id = req.params.id ?? "";
      const conversation = this.findConversation(id);
      if (!conversation) { res.status(404).json({ error: "Conversation not found" }); return; }
      conversation.engine.dispose();
      this.conversations.delete(id);
      res.status(204).end();
    });

    this.app.use("/api", router);
  }

  /** Runs `task` after every earlier call on the same conversation has settled. */
  private serialize<T>(conversation: Conversation, task: () => Promise<T>): Promise<T> {
    const run = conversation.queue.then(task);
    conversation.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private findConversation(id: string | undefined): Conversation | undefined {
    return id === undefined ? undefined : this.conversations.get(id);
  }

  private logError(label: string, err: unknown): void {
    this.logger.error(`${label} failed`, { error: err instanceof Error ? err.message : String(err) });
  }
}

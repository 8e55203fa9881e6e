import { resolve } from "node:path";
import type { LogLevel } from "@storyloom/schemas";
import { ConfigError, isLogLevel, LOG_LEVELS } from "@storyloom/schemas";
import { DEFAULT_WORLD_PATH } from "@storyloom/world";
import { DEFAULT_SEMANTIC_TIMEOUT_MS } from "@storyloom/resolver";

export const RESOLVER_KINDS = ["mock", "claude", "openai", "gemini"] as const;
export type ResolverKind = (typeof RESOLVER_KINDS)[number];

export const DEFAULT_PORT = 3200;

/** Raw option strings as commander hands them over. */
export interface CliOptions {
  world?: string;
  resolver?: string;
  model?: string;
  timeoutMs?: string;
  port?: string;
  logLevel?: string;
}

export interface StoryloomConfig {
  worldPath: string;
  resolver: ResolverKind;
  model?: string;
  resolverTimeoutMs: number;
  port: number;
  logLevel: LogLevel;
}

export function isResolverKind(value: string): value is ResolverKind {
  return RESOLVER_KINDS.some((kind) => kind === value);
}

/** First value that is set and not blank. */
function pick(...values: Array<string | undefined>): string | undefined {
  return values.find((v) => v !== undefined && v.trim().length > 0)?.trim();
}

export function parsePort(value: string, label = "port"): number {
  const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be 1-65535)`);
  }
  return port;
}

export function parseNonNegativeInt(value: string, label: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`Invalid ${label}: "${value}" (must be a non-negative integer)`);
  }
  return parseInt(value, 10);
}

/** Merges CLI options over STORYLOOM_* environment variables over defaults. */
export function resolveConfig(options: CliOptions = {}, env: NodeJS.ProcessEnv = process.env): StoryloomConfig {
  const resolver = pick(options.resolver, env.STORYLOOM_RESOLVER) ?? (pick(env.ANTHROPIC_API_KEY) ? "claude" : "mock");
  if (!isResolverKind(resolver)) {
    throw new ConfigError(`Unknown resolver "${resolver}". Valid options: ${RESOLVER_KINDS.join(", ")}`);
  }

  const logLevel = pick(options.logLevel, env.STORYLOOM_LOG_LEVEL) ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Unknown log level "${logLevel}". Valid options: ${LOG_LEVELS.join(", ")}`);
  }

  const timeout = pick(options.timeoutMs, env.STORYLOOM_RESOLVER_TIMEOUT_MS);
  const port = pick(options.port, env.STORYLOOM_PORT);
  const worldPath = pick(options.world, env.STORYLOOM_WORLD_PATH);

  return {
    worldPath: worldPath ? resolve(worldPath) : DEFAULT_WORLD_PATH,
    resolver,
    model: pick(options.model, env.STORYLOOM_MODEL),
    resolverTimeoutMs: timeout === undefined
      ? DEFAULT_SEMANTIC_TIMEOUT_MS
      : parseNonNegativeInt(timeout, "resolver timeout"),
    port: port === undefined ? DEFAULT_PORT : parsePort(port),
    logLevel,
  };
}

import type { LogLevel, Logger } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class ConsoleLogger implements Logger {
  private prefix: string;
  private threshold: number;

  constructor(scope: string, opts?: { level?: LogLevel }) {
    // Scope ends up at the start of every line; keep it on one line
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[storyloom:${safeScope}]`;
    this.threshold = LEVEL_ORDER[opts?.level ?? "info"];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.error) return;
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export const silentLogger: Logger = new ConsoleLogger("silent", { level: "silent" });

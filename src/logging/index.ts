/**
 * Structured logging for the discussion stream.
 * Logs rounds, turns, LLM/TTS calls, egress and errors with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error (default: info)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function envLevel(): LogLevel {
  const v = process.env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? "info";
}

const defaultConfig: Required<LoggerConfig> = {
  level: envLevel(),
  // Pretty output spawns a transport worker; keep it out of tests and production.
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const level = config.level ?? defaultConfig.level;
  const opts: pino.LoggerOptions = {
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      level,
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ level, stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      level,
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Message of an unknown thrown value. */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Shorten utterance text for log lines. */
export function preview(text: string, max = 80): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

/** Log LLM request/response (summary only). */
export function logLlmCall(log: pino.Logger, personaId: string, responseLength: number, durationMs?: number): void {
  log.info({ event: "LLM_CALL", personaId, responseLength, durationMs }, "LLM completed");
}

/** Log TTS call. */
export function logTtsCall(log: pino.Logger, voiceId: string, textLength: number, audioBytes: number, durationMs?: number): void {
  log.info({ event: "TTS_CALL", voiceId, textLength, audioBytes, durationMs }, "TTS completed");
}

/** Log turn start/end. */
export function logTurn(log: pino.Logger, phase: "start" | "end", round: number, agentId: string): void {
  log.info({ event: "TURN", phase, round, agentId }, phase === "start" ? "Turn start" : "Turn end");
}

/** Log error. */
export function logError(log: pino.Logger, err: unknown, context?: Record<string, unknown>): void {
  const stack = err instanceof Error ? err.stack : undefined;
  log.error({ err: errMessage(err), stack, ...context }, "Error");
}

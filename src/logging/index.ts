/**
 * Structured logging for the gateway.
 * Logs STT, LLM, TTS, turn and session events with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = pino.Logger;

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function envLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return LEVELS.find((l) => l === raw) ?? (process.env.NODE_ENV === "test" ? "silent" : "info");
}

const defaultConfig: LoggerConfig = {
  level: envLevel(),
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log STT result (transcript length only; the text may carry PII). */
export function logSttResult(log: Logger, textLength: number, durationMs?: number): void {
  log.info({ event: "STT_RESULT", textLength, durationMs }, "STT completed");
}

/** Log LLM request/response (summary only). */
export function logLlmCall(log: Logger, messageCount: number, responseLength: number, durationMs?: number): void {
  log.info({ event: "LLM_CALL", messageCount, responseLength, durationMs }, "LLM completed");
}

export function logTtsCall(log: Logger, textLength: number, audioBytes: number, durationMs?: number): void {
  log.info({ event: "TTS_CALL", textLength, audioBytes, durationMs }, "TTS completed");
}

/** Log turn start/end. */
export function logTurn(log: Logger, phase: "start" | "end", input?: "voice" | "text"): void {
  log.info({ event: "TURN", phase, input }, phase === "start" ? "Turn start" : "Turn end");
}

export function logError(log: Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, name: err.name, stack: err.stack, ...context }, "Error");
}

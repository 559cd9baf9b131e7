/**
 * Error taxonomy for the gateway.
 * Only ConfigError (and a failed port bind) may end the process; everything else is scoped to one session or one turn.
 */

export type ProviderName = "stt" | "llm" | "tts" | "automation";

export type ProviderErrorKind = "Timeout" | "RateLimited" | "InvalidResponse" | "Unavailable";

/** Malformed client message. Reported to the client as a control message; the session stays open. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export interface ProviderErrorOptions {
  /** Delay requested by the provider (Retry-After), when present. */
  retryAfterMs?: number;
  /** HTTP status when the failure came from a response. */
  status?: number;
  cause?: unknown;
}

export class ProviderError extends Error {
  readonly retryAfterMs?: number;
  readonly status?: number;

  constructor(
    public readonly provider: ProviderName,
    public readonly kind: ProviderErrorKind,
    message: string,
    options: ProviderErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ProviderError";
    this.retryAfterMs = options.retryAfterMs;
    this.status = options.status;
  }
}

/** The session was closed while a turn was in flight. Never counts against provider health. */
export class TurnCancelledError extends Error {
  constructor(message = "Turn cancelled") {
    super(message);
    this.name = "TurnCancelledError";
  }
}

export class CapacityExceededError extends Error {
  constructor(public readonly maxSessions: number) {
    super(`Session capacity reached (${maxSessions})`);
    this.name = "CapacityExceededError";
  }
}

/** Overlapping input while a turn is in flight (backpressure, not a fault). */
export class TurnConflictError extends Error {
  constructor(
    message: string,
    public readonly disposition: "queued" | "rejected"
  ) {
    super(message);
    this.name = "TurnConflictError";
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly sessionId?: string
  ) {
    super(message);
    this.name = "TransportError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Call policy shared by every stage adapter: per-attempt timeout, error classification,
 * bounded retry with exponential backoff, and ProviderHealth bookkeeping.
 */

import { ProviderError, TurnCancelledError, errorMessage } from "../errors";
import type { ProviderErrorKind, ProviderName } from "../errors";
import type { ProviderHealthTracker } from "../health/provider-health";
import type { Logger } from "../logging";

export interface RetryPolicy {
  /** Total attempts for Timeout / Unavailable (first call included). */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface InvokeContext {
  provider: ProviderName;
  correlationId: string;
  timeoutMs: number;
  policy: RetryPolicy;
  health: ProviderHealthTracker;
  log: Logger;
  /** Session-level cancellation; aborting it ends the invocation with TurnCancelledError. */
  signal?: AbortSignal;
}

export interface InvokeOutcome<T> {
  value: T;
  attempts: number;
}

const NETWORK_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "EPIPE", "ETIMEDOUT", "UND_ERR_SOCKET"]);

function readField(obj: unknown, key: string): unknown {
  if (typeof obj !== "object" || obj === null) return undefined;
  const value: unknown = Reflect.get(obj, key);
  return value;
}

/** Parse a Retry-After header value (seconds or HTTP date) into ms. */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const at = Date.parse(value);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (headers && typeof headers === "object" && "get" in headers && typeof headers.get === "function") {
    const v: unknown = headers.get(name);
    return typeof v === "string" ? v : undefined;
  }
  const v = readField(headers, name);
  return typeof v === "string" ? v : undefined;
}

export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 429) return "RateLimited";
  if (status === 408) return "Timeout";
  if (status >= 500) return "Unavailable";
  return "InvalidResponse";
}

/** Build a ProviderError from a non-ok fetch Response (used by the REST adapters). */
export async function providerErrorFromResponse(provider: ProviderName, response: Response): Promise<ProviderError> {
  let body = "";
  try {
    body = (await response.text()).slice(0, 200);
  } catch (err) {
    body = `<unreadable body: ${errorMessage(err)}>`;
  }
  return new ProviderError(provider, kindForStatus(response.status), `${provider} returned ${response.status} ${body}`.trim(), {
    status: response.status,
    retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
  });
}

/**
 * Map anything a provider SDK or fetch can throw onto the ProviderError taxonomy.
 * SDK errors carry `status` and `headers`; network failures carry a `code`.
 */
export function classifyProviderError(provider: ProviderName, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  const message = errorMessage(err);
  const status = readField(err, "status");
  if (typeof status === "number") {
    return new ProviderError(provider, kindForStatus(status), message, {
      status,
      retryAfterMs: parseRetryAfter(headerValue(readField(err, "headers"), "retry-after")),
      cause: err,
    });
  }
  const code = readField(err, "code") ?? readField(readField(err, "cause"), "code");
  if (typeof code === "string" && NETWORK_ERROR_CODES.has(code)) {
    return new ProviderError(provider, "Unavailable", message, { cause: err });
  }
  if (err instanceof SyntaxError) {
    return new ProviderError(provider, "InvalidResponse", message, { cause: err });
  }
  const name = readField(err, "name");
  if (name === "APIConnectionTimeoutError" || /timed? ?out/i.test(message)) {
    return new ProviderError(provider, "Timeout", message, { cause: err });
  }
  return new ProviderError(provider, "Unavailable", message, { cause: err });
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.backoffBaseMs * Math.pow(2, attempt - 1), policy.backoffMaxMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TurnCancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TurnCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run one attempt with its own AbortController. The attempt is aborted on timeout or
 * when the session signal fires; the race does not rely on the provider honouring the signal.
 */
function attemptWithTimeout<T>(
  call: (signal: AbortSignal) => Promise<T>,
  ctx: Pick<InvokeContext, "provider" | "timeoutMs" | "signal">
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;
    const finish = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ctx.signal?.removeEventListener("abort", onCancel);
      fn();
    };
    const onCancel = (): void => {
      controller.abort();
      finish(() => reject(new TurnCancelledError()));
    };
    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new ProviderError(ctx.provider, "Timeout", `${ctx.provider} timed out after ${ctx.timeoutMs}ms`)));
    }, ctx.timeoutMs);
    if (ctx.signal?.aborted) {
      onCancel();
      return;
    }
    ctx.signal?.addEventListener("abort", onCancel, { once: true });
    let pending: Promise<T>;
    try {
      pending = call(controller.signal);
    } catch (err) {
      finish(() => reject(err));
      return;
    }
    void pending.then(
      (v) => finish(() => resolve(v)),
      (e: unknown) => finish(() => reject(e))
    );
  });
}

/**
 * Invoke a provider call under the retry policy.
 * Timeout / Unavailable: up to maxAttempts with exponential backoff.
 * RateLimited: one retry after the provider's Retry-After (or the base backoff), capped at backoffMaxMs.
 * InvalidResponse: surfaced immediately.
 */
export async function invokeWithPolicy<T>(call: (signal: AbortSignal) => Promise<T>, ctx: InvokeContext): Promise<InvokeOutcome<T>> {
  const { provider, correlationId, policy, health, log } = ctx;
  let attempt = 0;
  let rateLimitRetried = false;
  for (;;) {
    attempt++;
    let failure: ProviderError;
    try {
      const value = await attemptWithTimeout(call, ctx);
      health.recordSuccess(provider);
      return { value, attempts: attempt };
    } catch (err) {
      if (err instanceof TurnCancelledError || ctx.signal?.aborted) throw new TurnCancelledError();
      failure = classifyProviderError(provider, err);
    }
    health.recordFailure(provider);

    let delayMs: number | undefined;
    if (failure.kind === "RateLimited" && !rateLimitRetried) {
      rateLimitRetried = true;
      delayMs = Math.min(failure.retryAfterMs ?? backoffDelay(attempt, policy), policy.backoffMaxMs);
    } else if ((failure.kind === "Timeout" || failure.kind === "Unavailable") && attempt < policy.maxAttempts) {
      delayMs = backoffDelay(attempt, policy);
    }

    if (delayMs === undefined) {
      log.warn(
        { event: "PROVIDER_FAILED", provider, correlationId, kind: failure.kind, attempts: attempt, err: failure.message },
        "Provider call failed"
      );
      throw failure;
    }
    log.debug(
      { event: "PROVIDER_RETRY", provider, correlationId, kind: failure.kind, attempt, delayMs },
      "Retrying provider call"
    );
    await sleep(delayMs, ctx.signal);
  }
}

/**
 * Process-wide table of active sessions. Bounds concurrency and sweeps idle sessions.
 * All structural changes go through open()/close(); both are synchronous, so the
 * event loop serialises them.
 */

import { randomUUID } from "crypto";
import { CapacityExceededError, errorMessage } from "../errors";
import { logger as rootLogger } from "../logging";
import type { Logger } from "../logging";
import { Transcript } from "../memory/transcript";
import { SessionLock } from "./lock";
import type { CloseReason, Session, SessionMode, TeardownHook } from "./types";

export interface SessionRegistryConfig {
  maxSessions: number;
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  log?: Logger;
}

interface RegistryEntry {
  session: Session;
  lock: SessionLock;
  hooks: TeardownHook[];
}

/** A fresh idle session with an empty transcript. */
export function createSession(mode: SessionMode = "text", now: Date = new Date()): Session {
  return {
    id: randomUUID(),
    mode,
    state: "idle",
    createdAt: now,
    lastActivityAt: now,
    transcript: new Transcript(),
  };
}

export class SessionRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly log: Logger;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly config: SessionRegistryConfig) {
    this.log = config.log ?? rootLogger;
  }

  get maxSessions(): number {
    return this.config.maxSessions;
  }

  open(mode: SessionMode = "text", now: Date = new Date()): Session {
    if (this.entries.size >= this.config.maxSessions) {
      this.log.warn({ event: "SESSION_REJECTED", active: this.entries.size, max: this.config.maxSessions }, "Session capacity reached");
      throw new CapacityExceededError(this.config.maxSessions);
    }
    const session = createSession(mode, now);
    this.entries.set(session.id, { session, lock: new SessionLock(), hooks: [] });
    this.log.info({ event: "SESSION_OPENED", sessionId: session.id, active: this.entries.size }, "Session opened");
    return session;
  }

  get(id: string): Session | undefined {
    return this.entries.get(id)?.session;
  }

  lockFor(id: string): SessionLock | undefined {
    return this.entries.get(id)?.lock;
  }

  list(): Session[] {
    return [...this.entries.values()].map((e) => e.session);
  }

  activeCount(): number {
    return this.entries.size;
  }

  touch(id: string, now: Date = new Date()): void {
    const entry = this.entries.get(id);
    if (entry) entry.session.lastActivityAt = now;
  }

  /** Register a teardown hook. Returns false when the session is already gone. */
  onClose(id: string, hook: TeardownHook): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    entry.hooks.push(hook);
    return true;
  }

  /** Remove the session and run its hooks once. Returns false when it was already closed. */
  close(id: string, reason: CloseReason): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    this.entries.delete(id);
    for (const hook of entry.hooks) {
      try {
        hook(reason);
      } catch (err) {
        this.log.error({ event: "SESSION_TEARDOWN_FAILED", sessionId: id, err: errorMessage(err) }, "Teardown hook failed");
      }
    }
    this.log.info({ event: "SESSION_CLOSED", sessionId: id, reason, active: this.entries.size }, "Session closed");
    return true;
  }

  /**
   * Close every session idle for at least idleTimeoutMs. Each close runs under the
   * session's lock and re-checks idleness once the lock is held.
   */
  async sweepIdle(now: () => number = Date.now): Promise<string[]> {
    const closed: string[] = [];
    const isIdle = (s: Session): boolean => now() - s.lastActivityAt.getTime() >= this.config.idleTimeoutMs;
    const candidates = [...this.entries.values()].filter((e) => isIdle(e.session));
    await Promise.all(
      candidates.map((entry) =>
        entry.lock.runExclusive(() => {
          const { session } = entry;
          if (this.entries.get(session.id) !== entry || !isIdle(session)) return;
          if (this.close(session.id, "idle-timeout")) closed.push(session.id);
        })
      )
    );
    return closed;
  }

  startSweep(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweepIdle().catch((err: unknown) => {
        this.log.error({ event: "SESSION_SWEEP_FAILED", err: errorMessage(err) }, "Idle sweep failed");
      });
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  closeAll(reason: CloseReason = "shutdown"): number {
    const ids = [...this.entries.keys()];
    for (const id of ids) this.close(id, reason);
    return ids.length;
  }
}

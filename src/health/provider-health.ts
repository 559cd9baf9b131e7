/**
 * ProviderHealth bookkeeping, one entry per external provider.
 * Stage adapters record every call attempt; the reporter only reads.
 */

import type { ProviderName } from "../errors";
import { logger } from "../logging";

export type HealthStatus = "up" | "degraded" | "down";

export interface ProviderHealth {
  provider: ProviderName;
  status: HealthStatus;
  /** ISO-8601 time of the last recorded attempt; null before the first call. */
  lastCheckedAt: string | null;
  consecutiveFailures: number;
}

export interface ProviderHealthThresholds {
  /** Consecutive failures after which the provider is degraded. */
  degradedAfter: number;
  /** Consecutive failures after which the provider is down. */
  downAfter: number;
}

export class ProviderHealthTracker {
  private readonly entries = new Map<ProviderName, ProviderHealth>();

  constructor(private readonly thresholds: ProviderHealthThresholds) {}

  /** Start tracking a provider (status up, no checks yet). Re-registering keeps the existing entry. */
  register(provider: ProviderName): void {
    this.require(provider);
  }

  recordSuccess(provider: ProviderName, at: Date = new Date()): void {
    const prev = this.require(provider);
    if (prev.status !== "up") {
      logger.info({ event: "PROVIDER_RECOVERED", provider, previous: prev.status }, "Provider recovered");
    }
    this.entries.set(provider, { provider, status: "up", lastCheckedAt: at.toISOString(), consecutiveFailures: 0 });
  }

  recordFailure(provider: ProviderName, at: Date = new Date()): void {
    const prev = this.require(provider);
    const consecutiveFailures = prev.consecutiveFailures + 1;
    const status = this.statusFor(consecutiveFailures);
    if (status !== prev.status) {
      logger.warn({ event: "PROVIDER_STATUS_CHANGED", provider, status, consecutiveFailures }, "Provider health changed");
    }
    this.entries.set(provider, { provider, status, lastCheckedAt: at.toISOString(), consecutiveFailures });
  }

  get(provider: ProviderName): ProviderHealth | undefined {
    const entry = this.entries.get(provider);
    return entry ? { ...entry } : undefined;
  }

  /** Copies of all entries, in registration order. */
  all(): ProviderHealth[] {
    return [...this.entries.values()].map((e) => ({ ...e }));
  }

  private statusFor(failures: number): HealthStatus {
    if (failures >= this.thresholds.downAfter) return "down";
    if (failures >= this.thresholds.degradedAfter) return "degraded";
    return "up";
  }

  private require(provider: ProviderName): ProviderHealth {
    let entry = this.entries.get(provider);
    if (!entry) {
      entry = { provider, status: "up", lastCheckedAt: null, consecutiveFailures: 0 };
      this.entries.set(provider, entry);
    }
    return entry;
  }
}

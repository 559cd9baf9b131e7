/**
 * Health/status snapshot derived from the session registry and provider health.
 * Read-only: computing a snapshot never changes state.
 */

import type { HealthStatus, ProviderHealth, ProviderHealthTracker } from "./provider-health";

export interface SessionCounts {
  active: number;
  max: number;
}

export interface StatusSnapshot {
  status: HealthStatus;
  sessions: SessionCounts;
  providers: Record<string, ProviderHealth>;
}

export interface RegistryView {
  activeCount(): number;
  readonly maxSessions: number;
}

export interface HealthReporterConfig {
  /** Fraction of maxSessions treated as near capacity. */
  nearCapacityRatio: number;
}

export function nearCapacity(active: number, max: number, ratio: number): boolean {
  return active >= max || active >= Math.ceil(max * ratio);
}

export function overallStatus(providers: ProviderHealth[], sessions: SessionCounts, ratio: number): HealthStatus {
  if (providers.some((p) => p.status === "down")) return "down";
  if (providers.some((p) => p.status === "degraded")) return "degraded";
  if (nearCapacity(sessions.active, sessions.max, ratio)) return "degraded";
  return "up";
}

export class HealthReporter {
  constructor(
    private readonly registry: RegistryView,
    private readonly providers: ProviderHealthTracker,
    private readonly config: HealthReporterConfig
  ) {}

  /** Overall status only (GET /health). */
  status(): HealthStatus {
    return this.snapshot().status;
  }

  snapshot(): StatusSnapshot {
    const sessions = { active: this.registry.activeCount(), max: this.registry.maxSessions };
    const entries = this.providers.all();
    const providers: Record<string, ProviderHealth> = {};
    for (const entry of entries) providers[entry.provider] = entry;
    return { status: overallStatus(entries, sessions, this.config.nearCapacityRatio), sessions, providers };
  }
}

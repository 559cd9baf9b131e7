/**
 * Per-turn latency metrics, logged for shipping.
 */

import { logger } from "../logging";

/** Last turn timing (ms). */
export interface TurnMetrics {
  sessionId?: string;
  input?: "voice" | "text";
  sttLatencyMs?: number;
  llmLatencyMs?: number;
  ttsLatencyMs?: number;
  /** Automation hand-off latency when the reply was delegated. */
  automationLatencyMs?: number;
  /** Turn start (utterance ready / text received) to reply sent. */
  turnLatencyMs?: number;
  outcome?: "completed" | "failed" | "cancelled";
}

export function recordTurnMetrics(metrics: TurnMetrics): void {
  logger.info(
    {
      event: "TURN_METRICS",
      session_id: metrics.sessionId,
      input: metrics.input,
      stt_latency_ms: metrics.sttLatencyMs,
      llm_latency_ms: metrics.llmLatencyMs,
      tts_latency_ms: metrics.ttsLatencyMs,
      automation_latency_ms: metrics.automationLatencyMs,
      turn_latency_ms: metrics.turnLatencyMs,
      outcome: metrics.outcome,
    },
    "Turn latency"
  );
}

/**
 * Session orchestrator: drives one session's turns.
 * voice: listening -> transcribing -> thinking -> synthesizing -> responding -> idle
 * text:  thinking -> responding -> idle
 * Any adapter error passes through failed, reports an error to the client and returns to idle.
 * At most one turn is in flight; it runs under the session lock.
 */

import { ProviderError, TransportError, TurnCancelledError, TurnConflictError, errorMessage } from "../errors";
import type { ProviderName } from "../errors";
import type { Logger } from "../logging";
import { logError, logLlmCall, logSttResult, logTtsCall, logTurn } from "../logging";
import { recordTurnMetrics } from "../metrics";
import type { TurnMetrics } from "../metrics";
import type { PromptManager } from "../prompts/prompt-manager";
import type { Session, SessionState } from "../sessions/types";
import type { SessionLock } from "../sessions/lock";
import type { TaskTracker } from "../tasks/tracker";
import type { ServerMessage } from "../transport/protocol";
import { controlReply, errorReply, textReply, voiceReply } from "../transport/protocol";
import type { AssemblerEvent, AudioBufferAssembler, Utterance } from "./assembler";
import { pcmDurationMs } from "./audio-utils";
import type { PipelineStages } from "./stages";

export const NOT_UNDERSTOOD_MESSAGE = "Sorry, I didn't catch that. Could you say it again?";

const STAGE_LABELS: Record<ProviderName, string> = {
  stt: "Speech recognition",
  llm: "The assistant",
  tts: "Speech synthesis",
  automation: "The automation service",
};

/** Client-facing text for a failed turn. */
export function failureMessage(err: unknown): string {
  if (err instanceof ProviderError) {
    const label = STAGE_LABELS[err.provider];
    switch (err.kind) {
      case "Timeout":
        return `${label} took too long to respond. Please try again.`;
      case "RateLimited":
        return `${label} is busy right now. Please try again in a moment.`;
      case "InvalidResponse":
        return `${label} returned an unusable response. Please try again.`;
      case "Unavailable":
        return `${label} is unavailable right now. Please try again later.`;
    }
  }
  return "Sorry, something went wrong. Please try again.";
}

/** A text turn with `speak` set replies with synthesized audio. */
type TurnInput = { kind: "voice"; utterance: Utterance } | { kind: "text"; text: string; speak: boolean };

export interface OrchestratorDeps {
  session: Session;
  stages: PipelineStages;
  prompts: PromptManager;
  assembler: AudioBufferAssembler;
  lock: SessionLock;
  /** Delivers a message to the client; throws TransportError when the socket is gone. */
  send: (message: ServerMessage) => void;
  log: Logger;
  tasks?: TaskTracker;
  /** Called when a turn finishes, to refresh the session's idle clock. */
  onActivity?: () => void;
}

export type StateListener = (state: SessionState, previous: SessionState) => void;

export class SessionOrchestrator {
  private readonly session: Session;
  private readonly log: Logger;
  private readonly listeners: StateListener[] = [];
  private turn: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private pendingText: { text: string; speak: boolean } | null = null;
  private closed = false;

  constructor(private readonly deps: OrchestratorDeps) {
    this.session = deps.session;
    this.log = deps.log;
  }

  get state(): SessionState {
    return this.session.state;
  }

  /** True while a turn is running or queued. */
  get busy(): boolean {
    return this.turn !== null;
  }

  onStateChange(listener: StateListener): void {
    this.listeners.push(listener);
  }

  /** Feed PCM. A complete chunk (whole WAV recording) is followed by an implicit end-of-turn. */
  handleVoice(pcm: Buffer, complete = false): void {
    if (this.closed) return;
    if (this.turn) {
      this.conflict(new TurnConflictError("Voice input while a turn is in flight", "rejected"));
      return;
    }
    this.session.mode = "voice";
    if (this.state === "idle") this.setState("listening");
    if (!complete) {
      this.consume(this.deps.assembler.push(pcm));
      return;
    }
    const event = this.deps.assembler.complete(pcm);
    this.consume(event ? [event] : []);
    if (!this.turn && this.state === "listening") this.setState("idle");
  }

  /** Explicit end-of-turn: flush the assembler. */
  handleEndOfTurn(): void {
    if (this.closed) return;
    if (this.turn) {
      this.log.debug({ event: "END_OF_TURN_IGNORED", state: this.state }, "End-of-turn while a turn is in flight");
      return;
    }
    const event = this.deps.assembler.endOfTurn();
    this.consume(event ? [event] : []);
    if (!this.turn && this.state === "listening") this.setState("idle");
  }

  handleText(text: string, speak = false): void {
    if (this.closed) return;
    if (this.turn) {
      if (this.pendingText === null) {
        this.pendingText = { text, speak };
        this.conflict(new TurnConflictError("Text queued behind the current turn", "queued"));
      } else {
        this.conflict(new TurnConflictError("A text message is already queued", "rejected"));
      }
      return;
    }
    if (this.state === "listening") {
      const dropped = this.deps.assembler.reset();
      this.log.debug({ event: "LISTENING_INTERRUPTED", droppedBytes: dropped }, "Text input discarded partial audio");
    }
    this.session.mode = "text";
    this.start({ kind: "text", text, speak });
  }

  /** Abort the in-flight turn (session closing). No further input is accepted. */
  cancel(): void {
    this.closed = true;
    this.pendingText = null;
    this.deps.assembler.reset();
    this.controller?.abort();
  }

  /** Resolves once no turn is running or queued. */
  async whenIdle(): Promise<void> {
    while (this.turn) await this.turn;
  }

  /** Utterances cut from one chunk run as a single turn. */
  private consume(events: AssemblerEvent[]): void {
    const ready: Utterance[] = [];
    for (const event of events) {
      if (event.kind === "discarded") {
        this.log.debug({ event: "AUDIO_DISCARDED", bytes: event.pcm.length, reason: event.reason }, "Discarded audio without speech");
      } else {
        ready.push(event.utterance);
      }
    }
    if (ready.length === 0) return;
    if (this.turn) {
      this.conflict(new TurnConflictError("Utterance ready while a turn is in flight", "rejected"));
      return;
    }
    const pcm = ready.length === 1 ? ready[0].pcm : Buffer.concat(ready.map((u) => u.pcm));
    const { reason } = ready[ready.length - 1];
    this.start({ kind: "voice", utterance: { pcm, durationMs: pcmDurationMs(pcm.length), reason } });
  }

  private conflict(err: TurnConflictError): void {
    this.log.debug({ event: "TURN_CONFLICT", disposition: err.disposition, state: this.state }, err.message);
    this.trySend(controlReply("busy", err.disposition));
  }

  private start(input: TurnInput): void {
    // State moves synchronously so input arriving before the lock is granted sees a busy session.
    this.setState(input.kind === "voice" ? "transcribing" : "thinking");
    const run = this.deps.lock
      .runExclusive(() => this.runTurn(input))
      .catch((err: unknown) => {
        logError(this.log, err instanceof Error ? err : new Error(errorMessage(err)), { event: "TURN_CRASHED" });
      })
      .finally(() => {
        if (this.turn === run) this.turn = null;
        const next = this.pendingText;
        this.pendingText = null;
        if (next !== null && !this.closed) {
          this.session.mode = "text";
          this.start({ kind: "text", text: next.text, speak: next.speak });
        }
      });
    this.turn = run;
  }

  private async runTurn(input: TurnInput): Promise<void> {
    const controller = new AbortController();
    this.controller = controller;
    const { signal } = controller;
    const sessionId = this.session.id;
    const { stages, prompts, session } = this.deps;
    const started = Date.now();
    const metrics: TurnMetrics = { sessionId, input: input.kind };
    logTurn(this.log, "start", input.kind);

    try {
      if (signal.aborted || this.closed) throw new TurnCancelledError();
      let userText: string;
      if (input.kind === "voice") {
        this.setState("transcribing");
        const stt = await stages.stt.invoke({ correlationId: sessionId, payload: input.utterance.pcm, signal });
        metrics.sttLatencyMs = stt.latencyMs;
        logSttResult(this.log, stt.value.length, stt.latencyMs);
        if (!stt.value) {
          this.log.info({ event: "STT_EMPTY", utteranceMs: input.utterance.durationMs }, "Empty transcript");
          this.trySend(errorReply(NOT_UNDERSTOOD_MESSAGE));
          this.setState("idle");
          metrics.outcome = "completed";
          return;
        }
        userText = stt.value;
      } else {
        userText = input.text;
      }

      this.setState("thinking");
      session.transcript.append("user", userText);
      const messages = prompts.buildMessages(session.transcript);
      const llm = await stages.llm.invoke({ correlationId: sessionId, payload: messages, signal });
      metrics.llmLatencyMs = llm.latencyMs;
      logLlmCall(this.log, messages.length, llm.value.length, llm.latencyMs);

      let reply = llm.value;
      const task = prompts.parseDelegation(reply);
      if (task !== null && stages.automation) {
        const delegated = await this.delegate(task, signal);
        metrics.automationLatencyMs = delegated.latencyMs;
        reply = delegated.reply;
      }
      session.transcript.append("assistant", reply);

      if (input.kind === "voice" || input.speak) {
        this.setState("synthesizing");
        const tts = await stages.tts.invoke({ correlationId: sessionId, payload: reply, signal });
        metrics.ttsLatencyMs = tts.latencyMs;
        logTtsCall(this.log, reply.length, tts.value.length, tts.latencyMs);
        this.setState("responding");
        this.deps.send(tts.value.length > 0 ? voiceReply(reply, tts.value) : textReply(reply));
      } else {
        this.setState("responding");
        this.deps.send(textReply(reply));
      }
      this.setState("idle");
      metrics.outcome = "completed";
    } catch (err) {
      if (err instanceof TurnCancelledError || signal.aborted) {
        this.setState("failed");
        metrics.outcome = "cancelled";
        this.log.info({ event: "TURN_CANCELLED" }, "Turn cancelled by session teardown");
        return;
      }
      metrics.outcome = "failed";
      this.setState("failed");
      if (err instanceof TransportError) {
        this.log.warn({ event: "TURN_UNDELIVERED", err: err.message }, "Reply could not be delivered");
      } else {
        this.log.warn(
          {
            event: "TURN_FAILED",
            provider: err instanceof ProviderError ? err.provider : undefined,
            kind: err instanceof ProviderError ? err.kind : undefined,
            err: errorMessage(err),
          },
          "Turn failed"
        );
        this.trySend(errorReply(failureMessage(err)));
      }
      if (!this.closed) this.setState("idle");
    } finally {
      if (this.controller === controller) this.controller = null;
      metrics.turnLatencyMs = Date.now() - started;
      recordTurnMetrics(metrics);
      logTurn(this.log, "end", input.kind);
      this.deps.onActivity?.();
    }
  }

  /** Hand a task to the automation service; the reply becomes an acknowledgement with the task id. */
  private async delegate(description: string, signal: AbortSignal): Promise<{ reply: string; latencyMs: number }> {
    const automation = this.deps.stages.automation;
    if (!automation) throw new Error("Automation stage is not configured");
    const tracker = this.deps.tasks;
    const taskId = tracker?.nextId() ?? `task_${Date.now()}`;
    const createdAt = new Date().toISOString();
    const base = { taskId, sessionId: this.session.id, description, createdAt };
    try {
      const result = await automation.invoke({
        correlationId: this.session.id,
        payload: { description, conversationId: `voice_${taskId}` },
        signal,
      });
      tracker?.record({ ...base, status: "delegated", message: result.value.message });
      this.log.info({ event: "TASK_DELEGATED", taskId, latencyMs: result.latencyMs }, "Task delegated");
      return { reply: `I've handed that off to the automation service. Task ID: ${taskId}`, latencyMs: result.latencyMs };
    } catch (err) {
      if (!(err instanceof TurnCancelledError)) {
        tracker?.record({ ...base, status: "failed", message: errorMessage(err) });
      }
      throw err;
    }
  }

  private trySend(message: ServerMessage): void {
    try {
      this.deps.send(message);
    } catch (err) {
      this.log.debug({ event: "SEND_SKIPPED", type: message.type, err: errorMessage(err) }, "Message not delivered");
    }
  }

  private setState(next: SessionState): void {
    const previous = this.session.state;
    if (previous === next) return;
    this.session.state = next;
    this.log.debug({ event: "SESSION_STATE", from: previous, to: next }, "Session state changed");
    for (const listener of this.listeners) listener(next, previous);
  }
}

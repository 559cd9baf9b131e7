/**
 * Unit tests for the session orchestrator: turn state machine, transcript,
 * backpressure, failure reporting, delegation and cancellation.
 */

import { SessionOrchestrator, NOT_UNDERSTOOD_MESSAGE } from "../../../src/pipeline/orchestrator";
import { AudioBufferAssembler } from "../../../src/pipeline/assembler";
import { FRAME_SIZE_BYTES, extractPcmFromWav, pcmToWav } from "../../../src/pipeline/audio-utils";
import { createPipelineStages } from "../../../src/pipeline/stages";
import type { StageProviders } from "../../../src/pipeline/stages";
import { ProviderHealthTracker } from "../../../src/health/provider-health";
import { PromptManager } from "../../../src/prompts/prompt-manager";
import { SessionRegistry } from "../../../src/sessions/registry";
import { SessionLock } from "../../../src/sessions/lock";
import type { SessionState } from "../../../src/sessions/types";
import { TaskTracker } from "../../../src/tasks/tracker";
import { StubLLM } from "../../../src/adapters/llm";
import type { ILLM, Message, ChatOptions } from "../../../src/adapters/llm";
import { StubSTT } from "../../../src/adapters/stt";
import type { ISTT, TranscribeOptions } from "../../../src/adapters/stt";
import { StubTTS } from "../../../src/adapters/tts";
import type { ITTS } from "../../../src/adapters/tts";
import type { AutomationTask, IAutomation } from "../../../src/adapters/automation";
import { decodeInbound } from "../../../src/transport/protocol";
import type { ServerMessage } from "../../../src/transport/protocol";
import { ProviderError } from "../../../src/errors";
import { logger } from "../../../src/logging";
import { silence, speech } from "../../helpers/audio";

interface Harness {
  orchestrator: SessionOrchestrator;
  sent: ServerMessage[];
  states: SessionState[];
  health: ProviderHealthTracker;
  tasks: TaskTracker;
  transcript: () => Array<[string, string]>;
}

function setup(providers: Partial<StageProviders> = {}, timeoutMs = 1000): Harness {
  const health = new ProviderHealthTracker({ degradedAfter: 3, downAfter: 6 });
  const stages = createPipelineStages(
    {
      stt: providers.stt ?? new StubSTT(),
      llm: providers.llm ?? new StubLLM(),
      tts: providers.tts ?? new StubTTS(),
      automation: providers.automation,
    },
    {
      timeouts: { sttMs: timeoutMs, llmMs: timeoutMs, ttsMs: timeoutMs, automationMs: timeoutMs },
      llm: { maxTokens: 150, temperature: 0.1 },
    },
    { health, policy: { maxAttempts: 3, backoffBaseMs: 0, backoffMaxMs: 0 }, log: logger }
  );
  const registry = new SessionRegistry({ maxSessions: 5, idleTimeoutMs: 60_000, sweepIntervalMs: 60_000 });
  const session = registry.open("text");
  const sent: ServerMessage[] = [];
  const states: SessionState[] = [];
  const tasks = new TaskTracker();
  const orchestrator = new SessionOrchestrator({
    session,
    stages,
    prompts: new PromptManager({ delegationEnabled: providers.automation !== undefined, maxContextMessages: 20 }),
    assembler: new AudioBufferAssembler({ silenceMs: 500, maxUtteranceMs: 30_000 }),
    lock: new SessionLock(),
    send: (m) => sent.push(m),
    log: logger,
    tasks,
  });
  orchestrator.onStateChange((state) => states.push(state));
  return {
    orchestrator,
    sent,
    states,
    health,
    tasks,
    transcript: () => session.transcript.all().map((m): [string, string] => [m.role, m.content]),
  };
}

class FixedSTT implements ISTT {
  calls = 0;
  readonly received: Buffer[] = [];
  constructor(private readonly text: string) {}
  async transcribe(wav: Buffer): Promise<{ text: string }> {
    this.calls++;
    this.received.push(wav);
    return { text: this.text };
  }
}

/** Never answers; rejects when the attempt is aborted. */
class HangingSTT implements ISTT {
  calls = 0;
  transcribe(_wav: Buffer, options?: TranscribeOptions): Promise<{ text: string }> {
    this.calls++;
    return new Promise((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    });
  }
}

class ScriptedLLM implements ILLM {
  calls = 0;
  constructor(private readonly reply: string) {}
  async chat(): Promise<{ text: string }> {
    this.calls++;
    return { text: this.reply };
  }
}

describe("SessionOrchestrator", () => {
  it("text Hello: idle -> thinking -> responding -> idle with one text reply", async () => {
    const h = setup();
    expect(h.orchestrator.state).toBe("idle");
    h.orchestrator.handleText("Hello");
    await h.orchestrator.whenIdle();

    expect(h.states).toEqual(["thinking", "responding", "idle"]);
    expect(h.transcript()).toEqual([
      ["user", "Hello"],
      ["assistant", "You said: Hello"],
    ]);
    expect(h.sent).toHaveLength(1);
    expect(h.sent[0]).toMatchObject({ type: "text", content: "You said: Hello", audio: null });
    expect(typeof h.sent[0].timestamp).toBe("string");
  });

  it("voice turn runs transcribing -> thinking -> synthesizing -> responding and replies with audio", async () => {
    const h = setup({ stt: new FixedSTT("What time is it") });
    h.orchestrator.handleVoice(speech(10), true);
    await h.orchestrator.whenIdle();

    expect(h.states).toEqual(["listening", "transcribing", "thinking", "synthesizing", "responding", "idle"]);
    expect(h.sent).toHaveLength(1);
    expect(h.sent[0].type).toBe("voice");
    expect(h.sent[0].content).toBe("You said: What time is it");
    const audio = Buffer.from(h.sent[0].audio ?? "", "base64");
    expect(audio.toString("ascii", 0, 4)).toBe("RIFF");
    expect(audio.length).toBe(44 + 3200);
  });

  it("sends the reply as text when TTS returns no audio", async () => {
    const silentTts: ITTS = { synthesize: async () => Buffer.alloc(0) };
    const h = setup({ stt: new FixedSTT("hi"), tts: silentTts });
    h.orchestrator.handleVoice(speech(10), true);
    await h.orchestrator.whenIdle();
    expect(h.sent).toEqual([expect.objectContaining({ type: "text", content: "You said: hi", audio: null })]);
  });

  it("a WAV recording with inner pauses runs as a single turn", async () => {
    const stt = new FixedSTT("two sentences");
    const h = setup({ stt });
    const wav = pcmToWav(Buffer.concat([speech(25), silence(30), speech(25)]));
    const item = decodeInbound(JSON.stringify({ type: "voice", content: wav.toString("base64") }), { maxTextChars: 100 });
    if (item.kind !== "voice") throw new Error(`expected voice, got ${item.kind}`);
    h.orchestrator.handleVoice(item.pcm, item.complete);
    await h.orchestrator.whenIdle();

    expect(stt.calls).toBe(1);
    expect(stt.received.map((w) => extractPcmFromWav(w)?.length)).toEqual([80 * FRAME_SIZE_BYTES]);
    expect(h.sent.map((m) => [m.type, m.content])).toEqual([["voice", "You said: two sentences"]]);
  });

  it("utterances cut from one raw chunk run as one turn", async () => {
    const stt = new FixedSTT("both");
    const h = setup({ stt });
    h.orchestrator.handleVoice(Buffer.concat([speech(10), silence(25), speech(10), silence(25)]));
    await h.orchestrator.whenIdle();

    expect(stt.calls).toBe(1);
    expect(stt.received.map((w) => extractPcmFromWav(w)?.length)).toEqual([70 * FRAME_SIZE_BYTES]);
    expect(h.sent.map((m) => m.type)).toEqual(["voice"]);
  });

  it("a silent recording returns to idle without a turn", async () => {
    const stt = new FixedSTT("unused");
    const h = setup({ stt });
    h.orchestrator.handleVoice(silence(40), true);
    await h.orchestrator.whenIdle();
    expect(stt.calls).toBe(0);
    expect(h.states).toEqual(["listening", "idle"]);
    expect(h.sent).toEqual([]);
  });

  it("a spoken text turn replies with synthesized audio", async () => {
    const h = setup();
    h.orchestrator.handleText("Hello", true);
    await h.orchestrator.whenIdle();
    expect(h.states).toEqual(["thinking", "synthesizing", "responding", "idle"]);
    expect(h.sent).toEqual([expect.objectContaining({ type: "voice", content: "You said: Hello" })]);
  });

  it("a TTS failure keeps the exchange in the transcript and reports the synthesis error", async () => {
    const tts: ITTS = {
      synthesize: async () => {
        throw new ProviderError("tts", "InvalidResponse", "malformed audio");
      },
    };
    const h = setup({ stt: new FixedSTT("hi"), tts });
    h.orchestrator.handleVoice(speech(10), true);
    await h.orchestrator.whenIdle();

    expect(h.transcript()).toEqual([
      ["user", "hi"],
      ["assistant", "You said: hi"],
    ]);
    expect(h.sent).toEqual([
      expect.objectContaining({ type: "error", content: "Speech synthesis returned an unusable response. Please try again." }),
    ]);
    expect(h.states).toEqual(["listening", "transcribing", "thinking", "synthesizing", "failed", "idle"]);
    expect(h.health.get("tts")).toMatchObject({ consecutiveFailures: 1 });
  });

  it("STT timing out on every attempt fails the turn and leaves the transcript unchanged", async () => {
    const stt = new HangingSTT();
    const h = setup({ stt }, 20);
    h.orchestrator.handleVoice(speech(10), true);
    await h.orchestrator.whenIdle();

    expect(stt.calls).toBe(3);
    expect(h.states).toEqual(["listening", "transcribing", "failed", "idle"]);
    expect(h.sent).toEqual([
      expect.objectContaining({ type: "error", content: "Speech recognition took too long to respond. Please try again." }),
    ]);
    expect(h.transcript()).toEqual([]);
    expect(h.health.get("stt")).toMatchObject({ status: "degraded", consecutiveFailures: 3 });
    expect(h.health.get("llm")).toMatchObject({ status: "up", consecutiveFailures: 0 });
  });

  it("an empty transcript is reported without touching the transcript", async () => {
    const h = setup();
    h.orchestrator.handleVoice(speech(10), true);
    await h.orchestrator.whenIdle();
    expect(h.sent).toEqual([expect.objectContaining({ type: "error", content: NOT_UNDERSTOOD_MESSAGE })]);
    expect(h.transcript()).toEqual([]);
    expect(h.orchestrator.state).toBe("idle");
  });

  it("keeps the user message when the LLM reply is unusable", async () => {
    const llm = new ScriptedLLM("   ");
    const h = setup({ llm });
    h.orchestrator.handleText("Hello");
    await h.orchestrator.whenIdle();
    expect(llm.calls).toBe(1);
    expect(h.transcript()).toEqual([["user", "Hello"]]);
    expect(h.sent).toEqual([
      expect.objectContaining({ type: "error", content: "The assistant returned an unusable response. Please try again." }),
    ]);
    expect(h.orchestrator.state).toBe("idle");
  });

  it("queues one text message behind a turn and rejects the next", async () => {
    let active = 0;
    let maxActive = 0;
    const llm: ILLM = {
      async chat(messages: Message[], _options?: ChatOptions) {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((r) => setTimeout(r, 10));
        active--;
        const last = messages[messages.length - 1];
        return { text: `echo ${last.content}` };
      },
    };
    const h = setup({ llm });
    h.orchestrator.handleText("one");
    h.orchestrator.handleText("two");
    h.orchestrator.handleText("three");
    await h.orchestrator.whenIdle();

    expect(maxActive).toBe(1);
    expect(h.sent.map((m) => [m.type, m.content, m.detail])).toEqual([
      ["control", "busy", "queued"],
      ["control", "busy", "rejected"],
      ["text", "echo one", undefined],
      ["text", "echo two", undefined],
    ]);
    expect(h.transcript().map(([role]) => role)).toEqual(["user", "assistant", "user", "assistant"]);
  });

  it("rejects voice input while a turn is in flight", async () => {
    const h = setup();
    h.orchestrator.handleText("Hello");
    h.orchestrator.handleVoice(speech(5));
    await h.orchestrator.whenIdle();
    expect(h.sent[0]).toMatchObject({ type: "control", content: "busy", detail: "rejected" });
    expect(h.sent[1]).toMatchObject({ type: "text", content: "You said: Hello" });
  });

  it("text while listening discards the partial audio and runs a text turn", async () => {
    const stt = new FixedSTT("unused");
    const h = setup({ stt });
    h.orchestrator.handleVoice(speech(5));
    expect(h.orchestrator.state).toBe("listening");
    h.orchestrator.handleText("typed instead");
    await h.orchestrator.whenIdle();
    h.orchestrator.handleEndOfTurn();
    expect(stt.calls).toBe(0);
    expect(h.sent).toEqual([expect.objectContaining({ type: "text", content: "You said: typed instead" })]);
    expect(h.orchestrator.state).toBe("idle");
  });

  it("after N successful turns the transcript has 2N alternating entries", async () => {
    const h = setup();
    const n = 5;
    for (let i = 0; i < n; i++) {
      h.orchestrator.handleText(`message ${i}`);
      await h.orchestrator.whenIdle();
    }
    const entries = h.transcript();
    expect(entries).toHaveLength(2 * n);
    entries.forEach(([role], i) => expect(role).toBe(i % 2 === 0 ? "user" : "assistant"));
    expect(entries[4]).toEqual(["user", "message 2"]);
    expect(entries[5]).toEqual(["assistant", "You said: message 2"]);
  });

  it("delegates DELEGATE: replies to the automation service", async () => {
    const submitted: AutomationTask[] = [];
    const automation: IAutomation = {
      async submit(task) {
        submitted.push(task);
        return { message: "accepted" };
      },
    };
    const h = setup({ llm: new ScriptedLLM("DELEGATE: Build a sales report"), automation });
    h.orchestrator.handleText("Build me a sales report");
    await h.orchestrator.whenIdle();

    const [task] = h.tasks.list();
    expect(task).toMatchObject({ description: "Build a sales report", status: "delegated", message: "accepted" });
    expect(submitted).toEqual([{ description: "Build a sales report", conversationId: `voice_${task.taskId}` }]);
    const ack = `I've handed that off to the automation service. Task ID: ${task.taskId}`;
    expect(h.sent).toEqual([expect.objectContaining({ type: "text", content: ack })]);
    expect(h.transcript()).toEqual([
      ["user", "Build me a sales report"],
      ["assistant", ack],
    ]);
  });

  it("cancel aborts the in-flight turn without sending or counting a provider failure", async () => {
    let entered: () => void = () => undefined;
    const inLlm = new Promise<void>((resolve) => {
      entered = resolve;
    });
    const llm: ILLM = {
      chat(_messages: Message[], options?: ChatOptions) {
        entered();
        return new Promise((_resolve, reject) => {
          options?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        });
      },
    };
    const h = setup({ llm });
    h.orchestrator.handleText("Hello");
    await inLlm;
    h.orchestrator.cancel();
    await h.orchestrator.whenIdle();

    expect(h.orchestrator.state).toBe("failed");
    expect(h.sent).toEqual([]);
    expect(h.transcript()).toEqual([["user", "Hello"]]);
    expect(h.health.get("llm")).toMatchObject({ status: "up", consecutiveFailures: 0 });
  });
});

/**
 * Pipeline stage adapters: uniform invoke(request, timeoutMs?) wrappers around the
 * STT, LLM, TTS and automation providers. Each invocation runs under the shared call
 * policy (timeout, retry, health) and validates the provider's result.
 */

import type { AppConfig } from "../config";
import { ProviderError } from "../errors";
import type { ProviderName } from "../errors";
import type { ProviderHealthTracker } from "../health/provider-health";
import type { Logger } from "../logging";
import { invokeWithPolicy } from "../adapters/policy";
import type { RetryPolicy } from "../adapters/policy";
import type { ISTT } from "../adapters/stt";
import type { ILLM, Message } from "../adapters/llm";
import type { ITTS } from "../adapters/tts";
import type { IAutomation, AutomationTask, AutomationReceipt } from "../adapters/automation";
import { pcmToWav, SAMPLE_RATE_HZ } from "./audio-utils";

export interface PipelineRequest<T> {
  /** Owning session id; used for logging only. */
  correlationId: string;
  payload: T;
  /** Session cancellation. */
  signal?: AbortSignal;
}

export interface PipelineResult<T> {
  correlationId: string;
  value: T;
  attempts: number;
  latencyMs: number;
}

export interface StageAdapter<TIn, TOut> {
  readonly provider: ProviderName;
  invoke(request: PipelineRequest<TIn>, timeoutMs?: number): Promise<PipelineResult<TOut>>;
}

export interface StageDeps {
  health: ProviderHealthTracker;
  policy: RetryPolicy;
  log: Logger;
}

/** Calls the provider once per attempt; throws ProviderError("InvalidResponse") on a bad result. */
export type StageCall<TIn, TOut> = (payload: TIn, signal: AbortSignal) => Promise<TOut>;

export class PolicyStage<TIn, TOut> implements StageAdapter<TIn, TOut> {
  constructor(
    readonly provider: ProviderName,
    private readonly call: StageCall<TIn, TOut>,
    private readonly defaultTimeoutMs: number,
    private readonly deps: StageDeps
  ) {
    deps.health.register(provider);
  }

  async invoke(request: PipelineRequest<TIn>, timeoutMs?: number): Promise<PipelineResult<TOut>> {
    const start = Date.now();
    const { value, attempts } = await invokeWithPolicy((signal) => this.call(request.payload, signal), {
      provider: this.provider,
      correlationId: request.correlationId,
      timeoutMs: timeoutMs ?? this.defaultTimeoutMs,
      policy: this.deps.policy,
      health: this.deps.health,
      log: this.deps.log,
      signal: request.signal,
    });
    return { correlationId: request.correlationId, value, attempts, latencyMs: Date.now() - start };
  }
}

export interface PipelineStages {
  stt: StageAdapter<Buffer, string>;
  llm: StageAdapter<Message[], string>;
  tts: StageAdapter<string, Buffer>;
  /** Present only when the automation service is configured. */
  automation?: StageAdapter<AutomationTask, AutomationReceipt>;
}

export interface StageProviders {
  stt: ISTT;
  llm: ILLM;
  tts: ITTS;
  automation?: IAutomation;
}

export interface StageOptions {
  timeouts: AppConfig["providers"]["timeouts"];
  llm: { maxTokens: number; temperature: number };
}

/** STT takes raw utterance PCM; the provider receives it as WAV. Returns the trimmed transcript. */
export function sttCall(stt: ISTT): StageCall<Buffer, string> {
  return async (pcm, signal) => {
    const result = await stt.transcribe(pcmToWav(pcm, SAMPLE_RATE_HZ), { signal });
    if (typeof result?.text !== "string") {
      throw new ProviderError("stt", "InvalidResponse", "STT returned no transcript text");
    }
    return result.text.trim();
  };
}

export function llmCall(llm: ILLM, opts: StageOptions["llm"]): StageCall<Message[], string> {
  return async (messages, signal) => {
    const result = await llm.chat(messages, { maxTokens: opts.maxTokens, temperature: opts.temperature, signal });
    const text = typeof result?.text === "string" ? result.text.trim() : "";
    if (!text) throw new ProviderError("llm", "InvalidResponse", "LLM returned an empty reply");
    return text;
  };
}

export function ttsCall(tts: ITTS): StageCall<string, Buffer> {
  return async (text, signal) => {
    const audio = await tts.synthesize(text, { signal });
    if (!Buffer.isBuffer(audio)) throw new ProviderError("tts", "InvalidResponse", "TTS returned non-buffer audio");
    return audio;
  };
}

export function automationCall(automation: IAutomation): StageCall<AutomationTask, AutomationReceipt> {
  return (task, signal) => automation.submit(task, { signal });
}

export function createPipelineStages(providers: StageProviders, options: StageOptions, deps: StageDeps): PipelineStages {
  const { timeouts } = options;
  return {
    stt: new PolicyStage("stt", sttCall(providers.stt), timeouts.sttMs, deps),
    llm: new PolicyStage("llm", llmCall(providers.llm, options.llm), timeouts.llmMs, deps),
    tts: new PolicyStage("tts", ttsCall(providers.tts), timeouts.ttsMs, deps),
    automation: providers.automation
      ? new PolicyStage("automation", automationCall(providers.automation), timeouts.automationMs, deps)
      : undefined,
  };
}

/** Stage options and policy from the loaded config. */
export function stageSettings(config: AppConfig): { options: StageOptions; policy: RetryPolicy } {
  return {
    options: {
      timeouts: config.providers.timeouts,
      llm: { maxTokens: config.llm.maxTokens, temperature: config.llm.temperature },
    },
    policy: {
      maxAttempts: config.providers.maxAttempts,
      backoffBaseMs: config.providers.backoffBaseMs,
      backoffMaxMs: config.providers.backoffMaxMs,
    },
  };
}

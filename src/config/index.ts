/**
 * Env-based configuration for the voice session gateway.
 * Load from .env.local (or process.env). Do not commit secrets.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { ConfigError } from "../errors";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export type SttProvider = "openai" | "stub";
export type LlmProvider = "openai" | "anthropic" | "stub";
export type TtsProvider = "openai" | "google" | "azure" | "stub";

export interface AppConfig {
  server: {
    host: string;
    port: number;
    /** HTTP path accepting WebSocket upgrades. */
    wsPath: string;
    /** Interval (ms) between WebSocket pings; a socket that missed the previous pong is terminated. */
    heartbeatIntervalMs: number;
  };

  /** Speech-to-text provider and options */
  stt: {
    provider: SttProvider;
    apiKey?: string;
    /** OpenAI-compatible base URL (any host serving /audio/transcriptions). */
    baseUrl?: string;
    model: string;
    language?: string;
  };

  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    openaiModel: string;
    anthropicApiKey?: string;
    anthropicModel: string;
    maxTokens: number;
    temperature: number;
    /** Overrides the built-in assistant prompt. */
    systemPrompt?: string;
  };

  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    openaiModel: string;
    openaiVoice: string;
    googleApiKey?: string;
    googleVoiceName: string;
    azureKey?: string;
    azureRegion?: string;
    azureVoiceName?: string;
  };

  /** Core automation service for tasks delegated beyond conversation. Disabled when baseUrl is unset. */
  automation: {
    baseUrl?: string;
    token?: string;
  };

  sessions: {
    maxSessions: number;
    idleTimeoutMs: number;
    sweepIntervalMs: number;
    /** Recent transcript entries handed to the LLM as context. */
    maxContextMessages: number;
    /** Longest accepted text message (characters). */
    maxTextChars: number;
  };

  /** Audio assembly (16kHz mono 16-bit PCM). */
  audio: {
    vadSilenceMs: number;
    /** RMS threshold (16-bit PCM); frames above it count as speech. */
    vadEnergyThreshold: number;
    maxUtteranceMs: number;
  };

  /** Timeout, retry and health policy shared by all stage adapters. */
  providers: {
    timeouts: { sttMs: number; llmMs: number; ttsMs: number; automationMs: number };
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    degradedAfterFailures: number;
    downAfterFailures: number;
  };

  health: {
    /** Fraction of maxSessions at which the registry counts as near capacity. */
    nearCapacityRatio: number;
  };
}

function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  if (v === undefined || v === "") return defaultValue;
  return v.trim();
}

/** Positive integer from env; falls back to the default when unset or invalid. */
function getEnvInt(key: string, defaultValue: number, min = 1): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) || n < min ? defaultValue : n;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const v = getEnv(key);
  if (v === undefined) return defaultValue;
  const n = parseFloat(v);
  return Number.isFinite(n) ? n : defaultValue;
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const v = (value ?? "").toLowerCase();
  return allowed.find((a) => a === v) ?? fallback;
}

/**
 * Build config from environment variables.
 * STT_PROVIDER, LLM_PROVIDER, TTS_PROVIDER select adapters (openai, anthropic, google, azure, stub).
 */
export function loadConfig(): AppConfig {
  const openaiKey = getEnv("OPENAI_API_KEY");
  const ratio = getEnvFloat("HEALTH_NEAR_CAPACITY_RATIO", 0.9);

  return {
    server: {
      host: getEnv("HOST") || "0.0.0.0",
      port: getEnvInt("PORT", 8000, 0),
      wsPath: getEnv("WS_PATH") || "/ws",
      heartbeatIntervalMs: getEnvInt("HEARTBEAT_INTERVAL_MS", 30_000),
    },
    stt: {
      provider: pick(getEnv("STT_PROVIDER"), ["openai", "stub"] as const, "openai"),
      apiKey: getEnv("STT_API_KEY") || openaiKey,
      baseUrl: getEnv("STT_BASE_URL"),
      model: getEnv("STT_MODEL") || "whisper-1",
      language: getEnv("STT_LANGUAGE"),
    },
    llm: {
      provider: pick(getEnv("LLM_PROVIDER"), ["openai", "anthropic", "stub"] as const, "openai"),
      openaiApiKey: getEnv("LLM_API_KEY") || openaiKey,
      openaiBaseUrl: getEnv("LLM_BASE_URL"),
      openaiModel: getEnv("OPENAI_MODEL_NAME") || "gpt-4o-mini",
      anthropicApiKey: getEnv("ANTHROPIC_API_KEY"),
      anthropicModel: getEnv("ANTHROPIC_MODEL_NAME") || "claude-3-5-sonnet-20241022",
      maxTokens: getEnvInt("LLM_MAX_TOKENS", 150),
      temperature: getEnvFloat("LLM_TEMPERATURE", 0.1),
      systemPrompt: getEnv("SYSTEM_PROMPT"),
    },
    tts: {
      provider: pick(getEnv("TTS_PROVIDER"), ["openai", "google", "azure", "stub"] as const, "openai"),
      openaiApiKey: getEnv("TTS_API_KEY") || openaiKey,
      openaiBaseUrl: getEnv("TTS_BASE_URL"),
      openaiModel: getEnv("TTS_MODEL") || "tts-1",
      openaiVoice: getEnv("TTS_VOICE") || "alloy",
      googleApiKey: getEnv("GOOGLE_CLOUD_TTS_API_KEY"),
      googleVoiceName: getEnv("GOOGLE_TTS_VOICE_NAME") || "en-US-Neural2-D",
      azureKey: getEnv("AZURE_TTS_KEY"),
      azureRegion: getEnv("AZURE_TTS_REGION"),
      azureVoiceName: getEnv("AZURE_TTS_VOICE_NAME"),
    },
    automation: {
      baseUrl: getEnv("AUTOMATION_URL"),
      token: getEnv("AUTOMATION_TOKEN"),
    },
    sessions: {
      maxSessions: getEnvInt("MAX_SESSIONS", 10),
      idleTimeoutMs: getEnvInt("SESSION_IDLE_TIMEOUT_MS", 300_000),
      sweepIntervalMs: getEnvInt("SESSION_SWEEP_INTERVAL_MS", 30_000),
      maxContextMessages: getEnvInt("MAX_CONTEXT_MESSAGES", 20),
      maxTextChars: getEnvInt("MAX_TEXT_CHARS", 4000),
    },
    audio: {
      vadSilenceMs: getEnvInt("VAD_SILENCE_MS", 500),
      vadEnergyThreshold: getEnvInt("VAD_ENERGY_THRESHOLD", 500),
      maxUtteranceMs: getEnvInt("MAX_UTTERANCE_MS", 30_000),
    },
    providers: {
      timeouts: {
        sttMs: getEnvInt("STT_TIMEOUT_MS", 20_000),
        llmMs: getEnvInt("LLM_TIMEOUT_MS", 25_000),
        ttsMs: getEnvInt("TTS_TIMEOUT_MS", 20_000),
        automationMs: getEnvInt("AUTOMATION_TIMEOUT_MS", 30_000),
      },
      maxAttempts: getEnvInt("PROVIDER_MAX_ATTEMPTS", 3),
      backoffBaseMs: getEnvInt("PROVIDER_BACKOFF_BASE_MS", 250, 0),
      backoffMaxMs: getEnvInt("PROVIDER_BACKOFF_MAX_MS", 4_000, 0),
      degradedAfterFailures: getEnvInt("PROVIDER_DEGRADED_AFTER", 3),
      downAfterFailures: getEnvInt("PROVIDER_DOWN_AFTER", 6),
    },
    health: {
      nearCapacityRatio: ratio > 0 && ratio <= 1 ? ratio : 0.9,
    },
  };
}

/**
 * Fail fast on configuration the gateway cannot run with.
 * Called once at startup, before the listener is bound.
 */
export function validateConfig(config: AppConfig): void {
  const missing: string[] = [];
  if (config.stt.provider === "openai" && !config.stt.apiKey) missing.push("OPENAI_API_KEY (or STT_API_KEY) for STT_PROVIDER=openai");
  if (config.llm.provider === "openai" && !config.llm.openaiApiKey) missing.push("OPENAI_API_KEY (or LLM_API_KEY) for LLM_PROVIDER=openai");
  if (config.llm.provider === "anthropic" && !config.llm.anthropicApiKey) missing.push("ANTHROPIC_API_KEY for LLM_PROVIDER=anthropic");
  if (config.tts.provider === "openai" && !config.tts.openaiApiKey) missing.push("OPENAI_API_KEY (or TTS_API_KEY) for TTS_PROVIDER=openai");
  if (config.tts.provider === "azure" && !(config.tts.azureKey && config.tts.azureRegion)) {
    missing.push("AZURE_TTS_KEY and AZURE_TTS_REGION for TTS_PROVIDER=azure");
  }
  if (missing.length > 0) {
    throw new ConfigError(`Missing required env: ${missing.join("; ")}`);
  }
  if (config.providers.downAfterFailures < config.providers.degradedAfterFailures) {
    throw new ConfigError("PROVIDER_DOWN_AFTER must be >= PROVIDER_DEGRADED_AFTER");
  }
}

/**
 * WebSocket wire protocol. Inbound envelopes are validated here and turned into
 * a closed set of InboundItem variants; nothing downstream sees raw JSON.
 */

import { z } from "zod";
import { ProtocolError } from "../errors";
import { extractPcmFromWav, isWav } from "../pipeline/audio-utils";

export const CONTROL_COMMANDS = ["end-of-turn", "disconnect", "ping"] as const;
export type ControlCommand = (typeof CONTROL_COMMANDS)[number];

const envelopeSchema = z.object({
  type: z.enum(["voice", "text", "control"]),
  content: z.string(),
  // Clients send ISO-8601, but the value is informational and not parsed.
  timestamp: z.string().optional(),
});

export type InboundEnvelope = z.infer<typeof envelopeSchema>;

/** Body of POST /api/text and POST /api/voice. */
const restBodySchema = z.object({
  content: z.string(),
  timestamp: z.string().optional(),
});

export type InboundItem =
  /** `complete` is true for a whole WAV recording: audio plus an implicit end-of-turn. */
  | { kind: "voice"; pcm: Buffer; complete: boolean }
  | { kind: "text"; text: string }
  | { kind: "control"; command: ControlCommand }
  | { kind: "protocol-error"; error: ProtocolError };

export type ServerMessageType = "text" | "voice" | "error" | "control";

export interface ServerMessage {
  type: ServerMessageType;
  content: string;
  timestamp: string;
  /** Base64 WAV; set only for `voice`. */
  audio: string | null;
  detail?: string;
}

/** Control contents sent by the server. */
export type ServerControl = "session-opened" | "pong" | "busy" | "protocol-error" | "capacity-exceeded";

export interface DecodeOptions {
  maxTextChars: number;
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

function protocolError(message: string): Extract<InboundItem, { kind: "protocol-error" }> {
  return { kind: "protocol-error", error: new ProtocolError(message) };
}

function isControlCommand(value: string): value is ControlCommand {
  return CONTROL_COMMANDS.some((c) => c === value);
}

function decodeVoice(content: string): InboundItem {
  const compact = content.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_RE.test(compact)) {
    return protocolError("voice content is not valid base64");
  }
  const bytes = Buffer.from(compact, "base64");
  if (isWav(bytes)) {
    const pcm = extractPcmFromWav(bytes);
    if (!pcm) return protocolError("voice content is a WAV file without a data chunk");
    if (pcm.length % 2 !== 0) return protocolError("WAV data has an odd byte count for 16-bit PCM");
    return { kind: "voice", pcm, complete: true };
  }
  if (bytes.length % 2 !== 0) return protocolError("voice content has an odd byte count for 16-bit PCM");
  return { kind: "voice", pcm: bytes, complete: false };
}

function decodeText(content: string, options: DecodeOptions): Extract<InboundItem, { kind: "text" | "protocol-error" }> {
  const text = content.trim();
  if (!text) return protocolError("text content is empty");
  if (text.length > options.maxTextChars) return protocolError(`text content exceeds ${options.maxTextChars} characters`);
  return { kind: "text", text };
}

function issueMessage(prefix: string, error: z.ZodError): string {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
  return `${prefix}: ${where}: ${issue?.message ?? "malformed"}`;
}

/** Decode a REST turn body into its trimmed text. Never throws. */
export function decodeRestBody(raw: string, options: DecodeOptions): { text: string } | { error: ProtocolError } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { error: new ProtocolError("body is not valid JSON") };
  }
  const parsed = restBodySchema.safeParse(json);
  if (!parsed.success) return { error: new ProtocolError(issueMessage("invalid body", parsed.error)) };
  const item = decodeText(parsed.data.content, options);
  return item.kind === "text" ? { text: item.text } : { error: item.error };
}

/** Decode one WebSocket frame. Never throws; malformed input becomes a protocol-error item. */
export function decodeInbound(raw: string | Buffer, options: DecodeOptions): InboundItem {
  let json: unknown;
  try {
    json = JSON.parse(typeof raw === "string" ? raw : raw.toString("utf8"));
  } catch {
    return protocolError("message is not valid JSON");
  }
  const parsed = envelopeSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "message";
    return protocolError(`invalid envelope: ${where}: ${issue?.message ?? "malformed"}`);
  }
  const { type, content } = parsed.data;
  switch (type) {
    case "voice":
      return decodeVoice(content);
    case "text":
      return decodeText(content, options);
    case "control": {
      const command = content.trim();
      if (!isControlCommand(command)) return protocolError(`unknown control command: ${command}`);
      return { kind: "control", command };
    }
  }
}

function now(): string {
  return new Date().toISOString();
}

export function textReply(content: string): ServerMessage {
  return { type: "text", content, timestamp: now(), audio: null };
}

export function voiceReply(content: string, wav: Buffer): ServerMessage {
  return { type: "voice", content, timestamp: now(), audio: wav.toString("base64") };
}

export function errorReply(content: string): ServerMessage {
  return { type: "error", content, timestamp: now(), audio: null };
}

export function controlReply(content: ServerControl, detail?: string): ServerMessage {
  const message: ServerMessage = { type: "control", content, timestamp: now(), audio: null };
  if (detail !== undefined) message.detail = detail;
  return message;
}

export function encodeOutbound(message: ServerMessage): string {
  return JSON.stringify(message);
}

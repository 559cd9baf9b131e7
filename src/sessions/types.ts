/**
 * Session data model.
 */

import type { Transcript } from "../memory/transcript";

export type SessionMode = "voice" | "text";

export type SessionState = "idle" | "listening" | "transcribing" | "thinking" | "synthesizing" | "responding" | "failed";

export interface Session {
  readonly id: string;
  mode: SessionMode;
  state: SessionState;
  readonly createdAt: Date;
  lastActivityAt: Date;
  readonly transcript: Transcript;
}

export type CloseReason = "disconnect" | "socket-closed" | "idle-timeout" | "shutdown" | "transport-error";

/** Runs once when the session is removed from the registry. */
export type TeardownHook = (reason: CloseReason) => void;

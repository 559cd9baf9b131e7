/**
 * Transport sessions: one WebSocket per session, keyed by session id.
 * Inbound frames are decoded and queued per connection; receive() drains the queue
 * lazily until the socket closes. Liveness is checked with ping/pong.
 */

import { WebSocket } from "ws";
import { CapacityExceededError, TransportError, errorMessage } from "../errors";
import { logger as rootLogger } from "../logging";
import type { Logger } from "../logging";
import type { SessionRegistry } from "../sessions/registry";
import type { CloseReason } from "../sessions/types";
import { controlReply, decodeInbound, encodeOutbound } from "./protocol";
import type { InboundItem, ServerMessage } from "./protocol";

/** The subset of a `ws` WebSocket the transport uses. */
export interface SocketLike {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  ping(): void;
  on(event: string, listener: (...args: never[]) => void): unknown;
}

export interface TransportConfig {
  heartbeatIntervalMs: number;
  maxTextChars: number;
  log?: Logger;
}

/** WebSocket close codes. */
export const CLOSE_NORMAL = 1000;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_TRY_AGAIN_LATER = 1013;

interface Connection {
  socket: SocketLike;
  queue: InboundItem[];
  wake: (() => void) | null;
  ended: boolean;
  receiving: boolean;
  alive: boolean;
}

function closeCodeFor(reason: CloseReason): number {
  return reason === "shutdown" ? CLOSE_GOING_AWAY : CLOSE_NORMAL;
}

/** Normalise the `ws` RawData variants to text. */
function frameText(data: unknown): string | null {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  if (Array.isArray(data) && data.every((d) => Buffer.isBuffer(d))) return Buffer.concat(data).toString("utf8");
  return null;
}

export class Transport {
  private readonly connections = new Map<string, Connection>();
  private readonly log: Logger;
  private heartbeat: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly config: TransportConfig
  ) {
    this.log = config.log ?? rootLogger;
  }

  /**
   * Register a new connection as a session. When the registry is full the client
   * is told so, the socket is closed with 1013, and CapacityExceededError is thrown.
   */
  open(socket: SocketLike): string {
    let sessionId: string;
    try {
      sessionId = this.registry.open("text").id;
    } catch (err) {
      if (err instanceof CapacityExceededError) {
        this.sendRaw(socket, controlReply("capacity-exceeded"));
        socket.close(CLOSE_TRY_AGAIN_LATER, "capacity exceeded");
      }
      throw err;
    }

    const conn: Connection = { socket, queue: [], wake: null, ended: false, receiving: false, alive: true };
    this.connections.set(sessionId, conn);
    this.registry.onClose(sessionId, (reason) => this.teardown(sessionId, reason));

    socket.on("message", (data: unknown) => {
      if (conn.ended) return;
      this.registry.touch(sessionId);
      this.enqueue(conn, decodeInbound(frameText(data) ?? "", { maxTextChars: this.config.maxTextChars }));
    });
    socket.on("pong", () => {
      conn.alive = true;
    });
    socket.on("error", (err: Error) => {
      this.log.warn({ event: "WS_ERROR", sessionId, err: err.message }, "WebSocket error");
    });
    socket.on("close", () => {
      this.close(sessionId, "socket-closed");
    });

    this.send(sessionId, controlReply("session-opened", sessionId));
    return sessionId;
  }

  /** Send one message. Throws TransportError when the connection is gone or not open. */
  send(sessionId: string, message: ServerMessage): void {
    const conn = this.connections.get(sessionId);
    if (!conn || conn.ended || conn.socket.readyState !== WebSocket.OPEN) {
      throw new TransportError(`Connection for session ${sessionId} is not open`, sessionId);
    }
    conn.socket.send(encodeOutbound(message), (err) => {
      if (!err) return;
      this.log.warn({ event: "WS_SEND_FAILED", sessionId, err: err.message }, "WebSocket send failed");
      this.close(sessionId, "transport-error");
    });
  }

  /**
   * Inbound items in arrival order; ends when the socket closes. One consumer per
   * session: a second call throws TransportError.
   */
  receive(sessionId: string): AsyncIterable<InboundItem> {
    const conn = this.connections.get(sessionId);
    if (!conn) throw new TransportError(`Unknown session ${sessionId}`, sessionId);
    if (conn.receiving) throw new TransportError(`Session ${sessionId} already has a receiver`, sessionId);
    conn.receiving = true;
    return this.drain(conn);
  }

  /** Deregister and close the socket. Idempotent. */
  close(sessionId: string, reason: CloseReason): void {
    if (!this.registry.close(sessionId, reason)) this.teardown(sessionId, reason);
  }

  isOpen(sessionId: string): boolean {
    const conn = this.connections.get(sessionId);
    return conn !== undefined && !conn.ended;
  }

  startHeartbeat(): void {
    if (this.heartbeat) return;
    this.heartbeat = setInterval(() => this.checkLiveness(), this.config.heartbeatIntervalMs);
    this.heartbeat.unref();
  }

  stopHeartbeat(): void {
    if (this.heartbeat) clearInterval(this.heartbeat);
    this.heartbeat = null;
  }

  /** One heartbeat round: terminate sockets that missed the last ping, ping the rest. */
  checkLiveness(): void {
    for (const [sessionId, conn] of [...this.connections]) {
      if (!conn.alive) {
        this.log.info({ event: "WS_HEARTBEAT_MISSED", sessionId }, "Terminating unresponsive socket");
        conn.socket.terminate();
        this.close(sessionId, "transport-error");
        continue;
      }
      conn.alive = false;
      try {
        conn.socket.ping();
      } catch (err) {
        this.log.warn({ event: "WS_PING_FAILED", sessionId, err: errorMessage(err) }, "WebSocket ping failed");
        this.close(sessionId, "transport-error");
      }
    }
  }

  private async *drain(conn: Connection): AsyncGenerator<InboundItem> {
    for (;;) {
      const next = conn.queue.shift();
      if (next) {
        yield next;
        continue;
      }
      if (conn.ended) return;
      await new Promise<void>((resolve) => {
        conn.wake = resolve;
      });
    }
  }

  private enqueue(conn: Connection, item: InboundItem): void {
    conn.queue.push(item);
    this.wakeReceiver(conn);
  }

  private wakeReceiver(conn: Connection): void {
    const wake = conn.wake;
    conn.wake = null;
    wake?.();
  }

  private teardown(sessionId: string, reason: CloseReason): void {
    const conn = this.connections.get(sessionId);
    if (!conn) return;
    this.connections.delete(sessionId);
    conn.ended = true;
    conn.queue.length = 0;
    this.wakeReceiver(conn);
    if (conn.socket.readyState === WebSocket.OPEN || conn.socket.readyState === WebSocket.CONNECTING) {
      conn.socket.close(closeCodeFor(reason), reason);
    }
  }

  private sendRaw(socket: SocketLike, message: ServerMessage): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(encodeOutbound(message), (err) => {
      if (err) this.log.debug({ event: "WS_SEND_FAILED", err: err.message }, "WebSocket send failed");
    });
  }
}

/**
 * HTTP surface: liveness, status, delegated tasks and stateless REST turns.
 * WebSocket upgrades on the configured path are handed to the gateway.
 * GET  /               -> {status: "running", service, providers}
 * GET  /health         -> {status}; 200 for up/degraded, 503 for down.
 * GET  /status         -> {status, sessions, providers}
 * GET  /api/tasks      -> {tasks}
 * GET  /api/tasks/:id  -> task, 404, or 400 for a malformed id
 * POST /api/text       -> {type, content, timestamp, audio}; 502 when the turn failed
 * POST /api/voice      -> same, with the reply synthesized into `audio`
 */

import * as http from "http";
import type { Duplex } from "stream";
import { errorMessage } from "./errors";
import type { HealthReporter } from "./health/reporter";
import type { TaskTracker } from "./tasks/tracker";
import { logger as rootLogger } from "./logging";
import type { Logger } from "./logging";
import { decodeRestBody } from "./transport/protocol";
import type { ServerMessage } from "./transport/protocol";

export interface ServiceInfo {
  service: string;
  providers: { stt: string; llm: string; tts: string };
}

/** Runs one turn outside any session; `speak` asks for a synthesized reply. */
export type RestTurnHandler = (text: string, speak: boolean) => Promise<ServerMessage>;

export interface HttpServerOptions {
  reporter: HealthReporter;
  tasks: TaskTracker;
  wsPath: string;
  /** Called for upgrade requests on wsPath. */
  onUpgrade: (req: http.IncomingMessage, socket: Duplex, head: Buffer) => void;
  info: ServiceInfo;
  runTurn: RestTurnHandler;
  maxTextChars: number;
  log?: Logger;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function pathOf(req: http.IncomingMessage): string {
  const url = req.url ?? "/";
  const q = url.indexOf("?");
  return q === -1 ? url : url.slice(0, q);
}

/** Null when the segment holds a bad percent-escape. */
function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

/** Request body as UTF-8; null once it exceeds `limitBytes` (the rest is drained). */
function readBody(req: http.IncomingMessage, limitBytes: number): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limitBytes) chunks.push(chunk);
    });
    req.on("end", () => resolve(size > limitBytes ? null : Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

export function createHttpServer(options: HttpServerOptions): http.Server {
  const log = options.log ?? rootLogger;
  const { reporter, tasks, info } = options;
  // A character takes at most 6 bytes as a JSON escape; 1KB covers the envelope.
  const bodyLimit = options.maxTextChars * 6 + 1024;

  async function handleTurn(req: http.IncomingMessage, res: http.ServerResponse, speak: boolean): Promise<void> {
    const raw = await readBody(req, bodyLimit);
    if (raw === null) {
      sendJson(res, 413, { error: "body too large" });
      return;
    }
    const decoded = decodeRestBody(raw, { maxTextChars: options.maxTextChars });
    if ("error" in decoded) {
      sendJson(res, 400, { error: decoded.error.message });
      return;
    }
    const reply = await options.runTurn(decoded.text, speak);
    sendJson(res, reply.type === "error" ? 502 : 200, reply);
  }

  async function route(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const path = pathOf(req);
    if (req.method === "POST" && (path === "/api/text" || path === "/api/voice")) {
      await handleTurn(req, res, path === "/api/voice");
      return;
    }
    if (req.method !== "GET") {
      sendJson(res, 404, { error: "not found" });
      return;
    }
    if (path === "/") {
      sendJson(res, 200, { status: "running", service: info.service, providers: info.providers });
      return;
    }
    if (path === "/health") {
      const status = reporter.status();
      sendJson(res, status === "down" ? 503 : 200, { status });
      return;
    }
    if (path === "/status") {
      sendJson(res, 200, reporter.snapshot());
      return;
    }
    if (path === "/api/tasks") {
      sendJson(res, 200, { tasks: tasks.list() });
      return;
    }
    if (path.startsWith("/api/tasks/")) {
      const id = decodeSegment(path.slice("/api/tasks/".length));
      if (id === null) {
        sendJson(res, 400, { error: "malformed task id" });
        return;
      }
      const task = tasks.get(id);
      if (task) sendJson(res, 200, task);
      else sendJson(res, 404, { error: "task not found" });
      return;
    }
    sendJson(res, 404, { error: "not found" });
  }

  const server = http.createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      log.error({ event: "HTTP_REQUEST_FAILED", path: pathOf(req), err: errorMessage(err) }, "HTTP request failed");
      if (res.headersSent) res.end();
      else sendJson(res, 500, { error: "internal error" });
    });
  });

  server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    if (pathOf(req) !== options.wsPath) {
      log.debug({ event: "WS_UPGRADE_REJECTED", path: pathOf(req) }, "Upgrade on unknown path");
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
      socket.destroy();
      return;
    }
    options.onUpgrade(req, socket, head);
  });

  return server;
}

import { EventEmitter } from "events";
import { WebSocket } from "ws";
import { CapacityExceededError, TransportError } from "../../../src/errors";
import { SessionRegistry } from "../../../src/sessions/registry";
import type { InboundItem, ServerMessage } from "../../../src/transport/protocol";
import { textReply } from "../../../src/transport/protocol";
import { CLOSE_GOING_AWAY, CLOSE_NORMAL, CLOSE_TRY_AGAIN_LATER, Transport } from "../../../src/transport/transport";

/** In-process stand-in for a `ws` server-side socket. */
class FakeSocket extends EventEmitter {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  closedWith: number | null = null;
  terminated = false;
  pings = 0;

  send(data: string, cb?: (err?: Error) => void): void {
    this.sent.push(data);
    cb?.();
  }

  close(code?: number): void {
    if (this.readyState === WebSocket.CLOSED) return;
    this.closedWith = code ?? null;
    this.readyState = WebSocket.CLOSED;
    this.emit("close");
  }

  terminate(): void {
    this.terminated = true;
    this.close(1006);
  }

  ping(): void {
    this.pings++;
  }

  messages(): ServerMessage[] {
    return this.sent.map((s) => {
      const parsed: ServerMessage = JSON.parse(s);
      return parsed;
    });
  }

  deliver(message: unknown): void {
    this.emit("message", Buffer.from(JSON.stringify(message)));
  }
}

function setup(maxSessions = 2): { registry: SessionRegistry; transport: Transport } {
  const registry = new SessionRegistry({ maxSessions, idleTimeoutMs: 60_000, sweepIntervalMs: 60_000 });
  const transport = new Transport(registry, { heartbeatIntervalMs: 60_000, maxTextChars: 100 });
  return { registry, transport };
}

async function collect(iterable: AsyncIterable<InboundItem>): Promise<InboundItem[]> {
  const items: InboundItem[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe("Transport", () => {
  it("opens a session and announces its id", () => {
    const { registry, transport } = setup();
    const socket = new FakeSocket();
    const id = transport.open(socket);
    expect(registry.get(id)).toBeDefined();
    expect(transport.isOpen(id)).toBe(true);
    expect(socket.messages()).toEqual([expect.objectContaining({ type: "control", content: "session-opened", detail: id })]);
  });

  it("tells the client and closes with 1013 at capacity", () => {
    const { transport } = setup(1);
    transport.open(new FakeSocket());
    const rejected = new FakeSocket();
    expect(() => transport.open(rejected)).toThrow(CapacityExceededError);
    expect(rejected.messages()).toEqual([expect.objectContaining({ type: "control", content: "capacity-exceeded" })]);
    expect(rejected.closedWith).toBe(CLOSE_TRY_AGAIN_LATER);
  });

  it("yields inbound items in order and ends when the socket closes", async () => {
    const { registry, transport } = setup();
    const socket = new FakeSocket();
    const id = transport.open(socket);
    const received = collect(transport.receive(id));
    socket.deliver({ type: "text", content: "one", timestamp: "T0" });
    socket.deliver({ type: "control", content: "ping" });
    socket.emit("message", Buffer.from("garbage"));
    await new Promise((r) => setImmediate(r));
    socket.close(CLOSE_NORMAL);

    const items = await received;
    expect(items.map((i) => i.kind)).toEqual(["text", "control", "protocol-error"]);
    expect(items[0]).toEqual({ kind: "text", text: "one" });
    expect(registry.get(id)).toBeUndefined();
    expect(transport.isOpen(id)).toBe(false);
  });

  it("allows one receiver per session", () => {
    const { transport } = setup();
    const id = transport.open(new FakeSocket());
    transport.receive(id);
    expect(() => transport.receive(id)).toThrow(TransportError);
  });

  it("send throws TransportError once the connection is closed", () => {
    const { transport } = setup();
    const socket = new FakeSocket();
    const id = transport.open(socket);
    transport.send(id, textReply("hi"));
    transport.close(id, "disconnect");
    expect(() => transport.send(id, textReply("late"))).toThrow(TransportError);
    expect(socket.messages().map((m) => m.content)).toEqual(["session-opened", "hi"]);
  });

  it("close is idempotent and uses 1001 for shutdown", () => {
    const { registry, transport } = setup();
    const socket = new FakeSocket();
    const id = transport.open(socket);
    transport.close(id, "shutdown");
    transport.close(id, "shutdown");
    expect(socket.closedWith).toBe(CLOSE_GOING_AWAY);
    expect(registry.activeCount()).toBe(0);
  });

  it("closes the socket when the registry closes the session", () => {
    const { registry, transport } = setup();
    const socket = new FakeSocket();
    const id = transport.open(socket);
    registry.close(id, "idle-timeout");
    expect(socket.closedWith).toBe(CLOSE_NORMAL);
    expect(transport.isOpen(id)).toBe(false);
  });

  it("terminates sockets that miss a heartbeat", () => {
    const { registry, transport } = setup();
    const responsive = new FakeSocket();
    const silent = new FakeSocket();
    const a = transport.open(responsive);
    const b = transport.open(silent);

    transport.checkLiveness();
    expect(responsive.pings).toBe(1);
    expect(silent.pings).toBe(1);
    responsive.emit("pong");

    transport.checkLiveness();
    expect(responsive.pings).toBe(2);
    expect(silent.terminated).toBe(true);
    expect(registry.get(a)).toBeDefined();
    expect(registry.get(b)).toBeUndefined();
  });
});

/**
 * Composition root: wires providers, stage adapters, registry, transport,
 * orchestrators and the HTTP/WebSocket listener.
 */

import type * as http from "http";
import { WebSocketServer } from "ws";
import type { AppConfig } from "./config";
import { CapacityExceededError, errorMessage } from "./errors";
import { createSTT } from "./adapters/stt";
import { createLLM } from "./adapters/llm";
import { createTTS } from "./adapters/tts";
import { createAutomation } from "./adapters/automation";
import { ProviderHealthTracker } from "./health/provider-health";
import { HealthReporter } from "./health/reporter";
import { createHttpServer } from "./http-server";
import { logger as rootLogger, logError } from "./logging";
import type { Logger } from "./logging";
import { AudioBufferAssembler } from "./pipeline/assembler";
import { SessionOrchestrator, failureMessage } from "./pipeline/orchestrator";
import { createPipelineStages, stageSettings } from "./pipeline/stages";
import type { PipelineStages, StageProviders } from "./pipeline/stages";
import { PromptManager } from "./prompts/prompt-manager";
import { SessionLock } from "./sessions/lock";
import { SessionRegistry, createSession } from "./sessions/registry";
import { TaskTracker } from "./tasks/tracker";
import { controlReply, errorReply } from "./transport/protocol";
import type { ControlCommand, ServerMessage } from "./transport/protocol";
import { Transport } from "./transport/transport";
import type { SocketLike } from "./transport/transport";

export interface GatewayOverrides {
  /** Replace configured providers (tests, embedding). */
  providers?: Partial<StageProviders>;
  log?: Logger;
}

export const SERVICE_NAME = "voice-session-gateway";

export class VoiceGateway {
  readonly registry: SessionRegistry;
  readonly providerHealth: ProviderHealthTracker;
  readonly reporter: HealthReporter;
  readonly tasks: TaskTracker;
  readonly transport: Transport;
  readonly stages: PipelineStages;
  private readonly prompts: PromptManager;
  private readonly log: Logger;
  private readonly orchestrators = new Map<string, SessionOrchestrator>();
  private readonly wss: WebSocketServer;
  private server: http.Server | null = null;

  constructor(
    private readonly config: AppConfig,
    overrides: GatewayOverrides = {}
  ) {
    this.log = overrides.log ?? rootLogger;
    const providers: StageProviders = {
      stt: overrides.providers?.stt ?? createSTT(config),
      llm: overrides.providers?.llm ?? createLLM(config),
      tts: overrides.providers?.tts ?? createTTS(config),
      automation: overrides.providers?.automation ?? createAutomation(config),
    };
    this.providerHealth = new ProviderHealthTracker({
      degradedAfter: config.providers.degradedAfterFailures,
      downAfter: config.providers.downAfterFailures,
    });
    const { options, policy } = stageSettings(config);
    this.stages = createPipelineStages(providers, options, { health: this.providerHealth, policy, log: this.log });
    this.prompts = new PromptManager({
      systemPrompt: config.llm.systemPrompt,
      delegationEnabled: this.stages.automation !== undefined,
      maxContextMessages: config.sessions.maxContextMessages,
    });
    this.registry = new SessionRegistry({
      maxSessions: config.sessions.maxSessions,
      idleTimeoutMs: config.sessions.idleTimeoutMs,
      sweepIntervalMs: config.sessions.sweepIntervalMs,
      log: this.log,
    });
    this.reporter = new HealthReporter(this.registry, this.providerHealth, { nearCapacityRatio: config.health.nearCapacityRatio });
    this.tasks = new TaskTracker();
    this.transport = new Transport(this.registry, {
      heartbeatIntervalMs: config.server.heartbeatIntervalMs,
      maxTextChars: config.sessions.maxTextChars,
      log: this.log,
    });
    this.wss = new WebSocketServer({ noServer: true });
  }

  /** Bind the listener. Resolves with the bound port; rejects when the port cannot be bound. */
  start(): Promise<number> {
    const { host, port, wsPath } = this.config.server;
    const server = createHttpServer({
      reporter: this.reporter,
      tasks: this.tasks,
      wsPath,
      maxTextChars: this.config.sessions.maxTextChars,
      info: {
        service: SERVICE_NAME,
        providers: { stt: this.config.stt.provider, llm: this.config.llm.provider, tts: this.config.tts.provider },
      },
      runTurn: (text, speak) => this.runRestTurn(text, speak),
      log: this.log,
      onUpgrade: (req, socket, head) => {
        this.wss.handleUpgrade(req, socket, head, (ws) => {
          this.accept(ws);
        });
      },
    });
    this.server = server;

    return new Promise<number>((resolve, reject) => {
      const onError = (err: Error): void => {
        this.server = null;
        reject(err);
      };
      server.once("error", onError);
      server.listen(port, host, () => {
        server.off("error", onError);
        server.on("error", (err: Error) => logError(this.log, err, { event: "HTTP_SERVER_ERROR" }));
        const addr = server.address();
        const bound = typeof addr === "object" && addr ? addr.port : port;
        this.registry.startSweep();
        this.transport.startHeartbeat();
        this.log.info({ event: "GATEWAY_STARTED", host, port: bound, wsPath }, "Voice gateway listening");
        resolve(bound);
      });
    });
  }

  /** Close every session, then the listener. */
  async stop(): Promise<void> {
    this.registry.stopSweep();
    this.transport.stopHeartbeat();
    const running = [...this.orchestrators.values()];
    const closed = this.registry.closeAll("shutdown");
    await Promise.all(running.map((o) => o.whenIdle()));
    this.wss.close();
    const server = this.server;
    this.server = null;
    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
    this.log.info({ event: "GATEWAY_STOPPED", closedSessions: closed }, "Voice gateway stopped");
  }

  /**
   * Start a session for an accepted socket. Returns the session id, or null when the
   * registry was full (the client has been told and the socket closed).
   */
  accept(socket: SocketLike): string | null {
    let sessionId: string;
    try {
      sessionId = this.transport.open(socket);
    } catch (err) {
      if (err instanceof CapacityExceededError) return null;
      throw err;
    }
    const session = this.registry.get(sessionId);
    const lock = this.registry.lockFor(sessionId);
    if (!session || !lock) return null;

    const log = this.log.child({ sessionId });
    const orchestrator = new SessionOrchestrator({
      session,
      lock,
      stages: this.stages,
      prompts: this.prompts,
      tasks: this.tasks,
      assembler: this.createAssembler(log),
      send: (message) => this.transport.send(sessionId, message),
      onActivity: () => this.registry.touch(sessionId),
      log,
    });
    this.orchestrators.set(sessionId, orchestrator);
    this.registry.onClose(sessionId, () => {
      orchestrator.cancel();
      this.orchestrators.delete(sessionId);
    });

    this.runSession(sessionId, orchestrator, log).catch((err: unknown) => {
      log.error({ event: "SESSION_LOOP_FAILED", err: errorMessage(err) }, "Session receive loop failed");
      this.transport.close(sessionId, "transport-error");
    });
    return sessionId;
  }

  /**
   * One turn for the REST routes: a throwaway session with an empty transcript,
   * outside the registry. Resolves with the reply or the error message.
   */
  async runRestTurn(text: string, speak: boolean): Promise<ServerMessage> {
    const session = createSession("text");
    const log = this.log.child({ sessionId: session.id, surface: "rest" });
    const sent: ServerMessage[] = [];
    const orchestrator = new SessionOrchestrator({
      session,
      lock: new SessionLock(),
      stages: this.stages,
      prompts: this.prompts,
      tasks: this.tasks,
      assembler: this.createAssembler(log),
      send: (message) => sent.push(message),
      log,
    });
    orchestrator.handleText(text, speak);
    await orchestrator.whenIdle();
    return sent.pop() ?? errorReply(failureMessage(null));
  }

  /** Session orchestrator for an open session (inspection and tests). */
  orchestratorFor(sessionId: string): SessionOrchestrator | undefined {
    return this.orchestrators.get(sessionId);
  }

  private createAssembler(log: Logger): AudioBufferAssembler {
    return new AudioBufferAssembler({
      silenceMs: this.config.audio.vadSilenceMs,
      maxUtteranceMs: this.config.audio.maxUtteranceMs,
      energyThreshold: this.config.audio.vadEnergyThreshold,
      log,
    });
  }

  private async runSession(sessionId: string, orchestrator: SessionOrchestrator, log: Logger): Promise<void> {
    for await (const item of this.transport.receive(sessionId)) {
      switch (item.kind) {
        case "voice":
          orchestrator.handleVoice(item.pcm, item.complete);
          break;
        case "text":
          orchestrator.handleText(item.text);
          break;
        case "control":
          this.handleControl(sessionId, orchestrator, item.command);
          break;
        case "protocol-error":
          log.debug({ event: "PROTOCOL_ERROR", err: item.error.message }, "Malformed client message");
          this.trySend(sessionId, controlReply("protocol-error", item.error.message), log);
          break;
      }
    }
    log.debug({ event: "SESSION_LOOP_ENDED" }, "Receive loop ended");
  }

  private handleControl(sessionId: string, orchestrator: SessionOrchestrator, command: ControlCommand): void {
    switch (command) {
      case "end-of-turn":
        orchestrator.handleEndOfTurn();
        return;
      case "ping":
        this.trySend(sessionId, controlReply("pong"), this.log);
        return;
      case "disconnect":
        this.transport.close(sessionId, "disconnect");
        return;
    }
  }

  private trySend(sessionId: string, message: ServerMessage, log: Logger): void {
    try {
      this.transport.send(sessionId, message);
    } catch (err) {
      log.debug({ event: "SEND_SKIPPED", err: errorMessage(err) }, "Control message not delivered");
    }
  }
}

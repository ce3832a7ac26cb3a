import { EventEmitter } from "node:events";
import type { IncomingMessage } from "node:http";
import WebSocket, { WebSocketServer } from "ws";
import {
  ConnectionSession,
  createLogger,
  DEFAULT_CALL_TIMEOUT_MS,
  JsonSchemaValidator,
  OCPP_SUBPROTOCOL,
  ProtocolError,
  type BootNotificationRequest,
  type BootNotificationResponse,
  type ChangeConfigurationResponse,
  type ConfigValue,
  type GetConfigurationResponse,
  type Logger,
  type PayloadValidator,
  type SessionHandlers,
  type WireSocket,
} from "@ocpp-lite/protocol";
import type { DeviceAdmin, DeviceSummary } from "./admin.js";
import { PeerRegistry } from "./registry.js";

export const DEFAULT_HEARTBEAT_INTERVAL = 300;

export type CentralSession = ConnectionSession<"central">;

export type CentralEventMap = {
  listening: [number];
  connected: [CentralSession];
  booted: [string, BootNotificationRequest];
  disconnected: [CentralSession, string[]];
};

export interface CentralSystemOptions {
  host?: string;
  port?: number;
  /** Heartbeat interval, in seconds, handed to every device that boots. */
  heartbeatInterval?: number;
  callTimeoutMs?: number;
  validator?: PayloadValidator;
  logger?: Logger;
  now?: () => Date;
}

export class CentralSystem extends EventEmitter implements DeviceAdmin {
  readonly registry = new PeerRegistry<CentralSession>();

  private readonly host: string;
  private readonly port: number;
  private readonly heartbeatInterval: number;
  private readonly callTimeoutMs: number;
  private readonly validator: PayloadValidator;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly handlers: SessionHandlers<"central">;
  private readonly sessions = new Set<CentralSession>();
  private readonly devices = new WeakMap<CentralSession, BootNotificationRequest>();
  private server: WebSocketServer | null = null;

  constructor(options: CentralSystemOptions = {}) {
    super();
    this.host = options.host ?? "localhost";
    this.port = options.port ?? 9000;
    this.heartbeatInterval = options.heartbeatInterval ?? DEFAULT_HEARTBEAT_INTERVAL;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("central");
    this.validator = options.validator ?? new JsonSchemaValidator({ logger: this.logger });
    this.now = options.now ?? (() => new Date());
    this.handlers = {
      BootNotification: (payload, { session }) => this.handleBootNotification(payload, session),
      Heartbeat: () => ({ currentTime: this.now().toISOString() }),
    };
  }

  on<EventName extends keyof CentralEventMap>(
    event: EventName,
    listener: (...args: CentralEventMap[EventName]) => void,
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  once<EventName extends keyof CentralEventMap>(
    event: EventName,
    listener: (...args: CentralEventMap[EventName]) => void,
  ): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  off<EventName extends keyof CentralEventMap>(
    event: EventName,
    listener: (...args: CentralEventMap[EventName]) => void,
  ): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }

  emit<EventName extends keyof CentralEventMap>(
    event: EventName,
    ...args: CentralEventMap[EventName]
  ): boolean {
    return super.emit(event, ...args);
  }

  get connectionCount(): number {
    return this.sessions.size;
  }

  /** Starts the WebSocket server and resolves with the port it bound. */
  listen(): Promise<number> {
    if (this.server) {
      return Promise.reject(new Error("Central system is already listening"));
    }

    return new Promise<number>((resolve, reject) => {
      const server = new WebSocketServer({
        host: this.host,
        port: this.port,
        handleProtocols: (protocols: Set<string>) =>
          protocols.has(OCPP_SUBPROTOCOL) ? OCPP_SUBPROTOCOL : false,
      });
      this.server = server;

      server.on("connection", (socket: WebSocket, request: IncomingMessage) => {
        this.logger.info("connection opened", {
          remoteAddress: request.socket.remoteAddress,
          path: request.url,
          protocol: socket.protocol,
        });
        this.attach(socket);
      });
      server.once("error", (error: Error) => {
        this.server = null;
        reject(error);
      });
      server.once("listening", () => {
        const address = server.address();
        const port = typeof address === "object" && address !== null ? address.port : this.port;
        this.logger.info(`Central system listening on ws://${this.host}:${port}`);
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  /** Wires a session for an accepted connection. */
  attach(socket: WireSocket): CentralSession {
    const session = new ConnectionSession({
      role: "central",
      socket,
      handlers: this.handlers,
      validator: this.validator,
      callTimeoutMs: this.callTimeoutMs,
      logger: this.logger,
    });

    this.sessions.add(session);
    session.once("close", () => this.handleSessionClose(session));
    this.emit("connected", session);
    return session;
  }

  async close(): Promise<void> {
    for (const session of Array.from(this.sessions)) {
      session.close(1001, "central system shutting down");
    }

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }

  async listDevices(): Promise<DeviceSummary[]> {
    return this.registry.list().map(([identity, session]) => {
      const device = this.devices.get(session);
      return {
        identity,
        model: device?.chargePointModel ?? "",
        vendor: device?.chargePointVendor ?? "",
        connectedAt: session.connectedAt.toISOString(),
      };
    });
  }

  async getConfiguration(identity: string, keys?: string[]): Promise<GetConfigurationResponse> {
    const session = this.requireSession(identity);
    return session.call("GetConfiguration", keys && keys.length > 0 ? { key: keys } : {});
  }

  async changeConfiguration(
    identity: string,
    key: string,
    value: ConfigValue,
  ): Promise<ChangeConfigurationResponse> {
    const session = this.requireSession(identity);
    return session.call("ChangeConfiguration", { key, value });
  }

  private requireSession(identity: string): CentralSession {
    const session = this.registry.lookup(identity);
    if (!session || !session.isOpen) {
      throw new ProtocolError(`Device ${identity} is not connected`, { code: "NotConnected" });
    }
    return session;
  }

  private handleBootNotification(
    payload: BootNotificationRequest,
    session: CentralSession,
  ): BootNotificationResponse {
    const identity = payload.chargePointSerialNumber;
    session.identify(identity);
    this.devices.set(session, payload);

    const previous = this.registry.upsert(identity, session);
    if (previous) {
      this.logger.warn(`Identity ${identity} claimed by a new connection; replacing the previous one`);
    }

    this.logger.info(`BootNotification from ${identity}`, {
      model: payload.chargePointModel,
      vendor: payload.chargePointVendor,
    });
    this.emit("booted", identity, payload);

    return {
      status: "Accepted",
      currentTime: this.now().toISOString(),
      interval: this.heartbeatInterval,
    };
  }

  private handleSessionClose(session: CentralSession): void {
    this.sessions.delete(session);
    const removed = this.registry.removeSession(session);
    this.logger.info(`[${session.label}] disconnected`, { removed });
    this.emit("disconnected", session, removed);
  }
}

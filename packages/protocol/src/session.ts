import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import WebSocket, { type RawData } from "ws";
import {
  isValidResponse,
  type InboundAction,
  type OutboundAction,
  type RequestOf,
  type ResponseOf,
  type Role,
} from "./actions.js";
import { ConfigurationStore } from "./configuration.js";
import { CorrelationTable, DEFAULT_CALL_TIMEOUT_MS } from "./correlation.js";
import { ActionDispatcher, type HandlerMap } from "./dispatcher.js";
import {
  decode,
  encodeCall,
  encodeError,
  encodeResult,
  MessageType,
  type CallFrame,
} from "./envelope.js";
import { ProtocolError, toProtocolError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { PayloadValidator } from "./validator.js";

/** The slice of a `ws` WebSocket a session needs. */
export interface WireSocket {
  readonly readyState: number;
  send(data: string, cb?: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData) => void): this;
  on(event: "close", listener: (code: number, reason: Buffer) => void): this;
  on(event: "error", listener: (error: Error) => void): this;
}

export type SessionEventMap = {
  call: [CallFrame];
  identified: [string];
  close: [];
};

export interface SessionContext<R extends Role> {
  session: ConnectionSession<R>;
}

export type SessionHandlers<R extends Role> = HandlerMap<InboundAction<R>, SessionContext<R>>;

export interface CallOptions {
  timeoutMs?: number;
}

export interface ConnectionSessionOptions<R extends Role> {
  role: R;
  socket: WireSocket;
  handlers: SessionHandlers<R>;
  validator: PayloadValidator;
  configuration?: ConfigurationStore;
  callTimeoutMs?: number;
  logger?: Logger;
  generateId?: () => string;
}

/**
 * One peer connection. Inbound calls are dispatched and answered on the same
 * socket; outbound calls are correlated with their result by id. Every frame
 * leaves through a single serialized writer.
 */
export class ConnectionSession<R extends Role> extends EventEmitter {
  readonly id = randomUUID();
  readonly role: R;
  readonly configuration: ConfigurationStore;
  readonly correlation: CorrelationTable;
  readonly connectedAt = new Date();

  private readonly socket: WireSocket;
  private readonly dispatcher: ActionDispatcher<InboundAction<R>, SessionContext<R>>;
  private readonly validator: PayloadValidator;
  private readonly callTimeoutMs: number;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly abortController = new AbortController();
  private outbound: Promise<void> = Promise.resolve();
  private closed = false;
  private currentIdentity: string | undefined;

  constructor(options: ConnectionSessionOptions<R>) {
    super();
    this.role = options.role;
    this.socket = options.socket;
    this.validator = options.validator;
    this.configuration = options.configuration ?? new ConfigurationStore();
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger(`session:${options.role}`);
    this.generateId = options.generateId ?? randomUUID;
    this.correlation = new CorrelationTable({
      defaultTimeoutMs: this.callTimeoutMs,
      logger: this.logger,
    });
    this.dispatcher = new ActionDispatcher({
      handlers: options.handlers,
      validator: options.validator,
      logger: this.logger,
    });

    this.socket.on("message", (data: RawData) => {
      this.handleFrame(data).catch((error: unknown) => {
        this.logger.error(`[${this.label}] failed to handle frame`, error);
      });
    });
    this.socket.on("close", (code: number, reason: Buffer) => {
      this.handleClose(code, reason.toString("utf8"));
    });
    this.socket.on("error", (error: Error) => {
      this.logger.error(`[${this.label}] socket error`, error);
      this.handleClose();
    });
  }

  on<EventName extends keyof SessionEventMap>(
    event: EventName,
    listener: (...args: SessionEventMap[EventName]) => void,
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  once<EventName extends keyof SessionEventMap>(
    event: EventName,
    listener: (...args: SessionEventMap[EventName]) => void,
  ): this {
    return super.once(event, listener as (...args: unknown[]) => void);
  }

  off<EventName extends keyof SessionEventMap>(
    event: EventName,
    listener: (...args: SessionEventMap[EventName]) => void,
  ): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }

  emit<EventName extends keyof SessionEventMap>(
    event: EventName,
    ...args: SessionEventMap[EventName]
  ): boolean {
    return super.emit(event, ...args);
  }

  get identity(): string | undefined {
    return this.currentIdentity;
  }

  get label(): string {
    return this.currentIdentity ?? this.id.slice(0, 8);
  }

  get isOpen(): boolean {
    return !this.closed && this.socket.readyState === WebSocket.OPEN;
  }

  /** Aborted once the connection is gone; duties bound to the session stop on it. */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  identify(identity: string): void {
    if (this.currentIdentity === identity) {
      return;
    }
    this.currentIdentity = identity;
    this.emit("identified", identity);
  }

  async call<K extends OutboundAction<R>>(
    action: K,
    payload: RequestOf<K>,
    options: CallOptions = {},
  ): Promise<ResponseOf<K>> {
    if (this.closed) {
      throw new ProtocolError(`Connection ${this.label} is closed`, { code: "ConnectionClosed" });
    }

    const id = this.generateId();
    if (this.correlation.has(id)) {
      throw new ProtocolError(`Call id ${id} is already outstanding`, { code: "ProtocolError" });
    }
    const settlement = this.correlation.register(id, action, {
      timeoutMs: options.timeoutMs ?? this.callTimeoutMs,
    });
    const sent = this.send(encodeCall(id, action, payload)).catch((error: unknown) => {
      this.correlation.cancel(id, toProtocolError(error, "ConnectionClosed"));
    });

    const [outcome] = await Promise.all([settlement, sent]);
    if (outcome.kind === "error") {
      throw ProtocolError.fromCallError(outcome.payload);
    }
    if (!isValidResponse(this.validator, action, outcome.payload)) {
      throw new ProtocolError(`Response to ${action} failed validation`, {
        code: "FormationViolation",
        details: outcome.payload,
      });
    }
    return outcome.payload;
  }

  close(code = 1000, reason = "session closed"): void {
    if (this.closed) {
      return;
    }
    this.socket.close(code, reason);
    this.handleClose(code, reason);
  }

  /** Queues a frame behind every frame sent before it. */
  send(frame: string): Promise<void> {
    const write = this.outbound.then(() => this.write(frame));
    // the caller sees a failed write through `write`; the queue itself keeps draining
    this.outbound = write.catch(() => undefined);
    return write;
  }

  private write(frame: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.isOpen) {
        reject(new ProtocolError(`Connection ${this.label} is closed`, { code: "ConnectionClosed" }));
        return;
      }
      this.socket.send(frame, (error?: Error) => {
        if (error) {
          reject(toProtocolError(error, "ConnectionClosed"));
        } else {
          resolve();
        }
      });
    });
  }

  private async handleFrame(data: RawData): Promise<void> {
    const decoded = decode(data);
    if (!decoded.ok) {
      this.logger.warn(`[${this.label}] dropping malformed frame: ${decoded.error.reason}`);
      return;
    }

    const envelope = decoded.envelope;
    switch (envelope.type) {
      case MessageType.Call:
        await this.handleCall(envelope);
        return;
      case MessageType.CallResult:
        this.correlation.resolve(envelope.id, envelope.payload, false);
        return;
      case MessageType.CallError:
        this.correlation.resolve(envelope.id, envelope.payload, true);
        return;
    }
  }

  private async handleCall(call: CallFrame): Promise<void> {
    this.emit("call", call);
    const outcome = await this.dispatcher.dispatch(call, { session: this });
    if (this.closed) {
      this.logger.debug(`[${this.label}] connection closed before ${call.action} reply was sent`);
      return;
    }
    const frame =
      outcome.kind === "result"
        ? encodeResult(call.id, outcome.payload)
        : encodeError(call.id, outcome.payload);
    await this.send(frame);
  }

  private handleClose(code?: number, reason?: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.abortController.abort();
    this.correlation.failAll(
      new ProtocolError(`Connection ${this.label} closed`, { code: "ConnectionClosed" }),
    );
    this.logger.info(
      `[${this.label}] connection closed`,
      code === undefined ? {} : { code, reason: reason ?? "" },
    );
    this.emit("close");
  }
}

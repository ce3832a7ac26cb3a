import { once } from "node:events";
import WebSocket from "ws";
import {
  clampTimerDelay,
  ConfigurationStore,
  ConnectionSession,
  createLogger,
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_INTERVAL_SECONDS,
  HEARTBEAT_INTERVAL_KEY,
  JsonSchemaValidator,
  LivenessScheduler,
  OCPP_SUBPROTOCOL,
  sleep as defaultSleep,
  type BootNotificationRequest,
  type Logger,
  type PayloadValidator,
  type RegistrationStatus,
  type SessionHandlers,
  type Sleep,
  type WireSocket,
} from "@ocpp-lite/protocol";

export type PointSession = ConnectionSession<"point">;

export interface ChargePointOptions {
  /** Central system endpoint, e.g. ws://localhost:9000. */
  uri: string;
  model: string;
  vendor: string;
  serialNumber: string;
  firmwareVersion?: string;
  configuration?: ConfigurationStore;
  validator?: PayloadValidator;
  logger?: Logger;
  callTimeoutMs?: number;
  sleep?: Sleep;
}

export function defaultConfiguration(model: string, vendor: string): ConfigurationStore {
  return new ConfigurationStore([
    { key: HEARTBEAT_INTERVAL_KEY, value: DEFAULT_HEARTBEAT_INTERVAL_SECONDS, readonly: false },
    { key: "ConnectionTimeOut", value: 60, readonly: false },
    { key: "NumberOfConnectors", value: 1, readonly: true },
    { key: "ChargePointModel", value: model, readonly: true },
    { key: "ChargePointVendor", value: vendor, readonly: true },
  ]);
}

/**
 * A charging station. Each connection starts with BootNotification, retried
 * until the central system accepts it, followed by heartbeats for as long as
 * the connection lasts.
 */
export class ChargePoint {
  readonly uri: string;
  readonly serialNumber: string;
  readonly configuration: ConfigurationStore;

  private readonly model: string;
  private readonly vendor: string;
  private readonly firmwareVersion: string | undefined;
  private readonly validator: PayloadValidator;
  private readonly logger: Logger;
  private readonly callTimeoutMs: number;
  private readonly sleep: Sleep;
  private readonly handlers: SessionHandlers<"point">;
  private session: PointSession | undefined;
  private scheduler: LivenessScheduler | undefined;
  private status: RegistrationStatus | undefined;

  constructor(options: ChargePointOptions) {
    this.uri = options.uri;
    this.model = options.model;
    this.vendor = options.vendor;
    this.serialNumber = options.serialNumber;
    this.firmwareVersion = options.firmwareVersion;
    this.configuration = options.configuration ?? defaultConfiguration(options.model, options.vendor);
    this.logger = options.logger ?? createLogger(`point:${options.serialNumber}`);
    this.validator = options.validator ?? new JsonSchemaValidator({ logger: this.logger });
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.handlers = {
      GetConfiguration: (payload) => this.configuration.read(payload.key),
      ChangeConfiguration: (payload) => {
        const status = this.configuration.change(payload.key, payload.value);
        this.logger.info(`ChangeConfiguration ${payload.key}=${payload.value}: ${status}`);
        return { status };
      },
    };
  }

  get registrationStatus(): RegistrationStatus | undefined {
    return this.status;
  }

  get heartbeatsSent(): number {
    return this.scheduler?.heartbeatsSent ?? 0;
  }

  get isConnected(): boolean {
    return this.session?.isOpen ?? false;
  }

  /** Opens a connection to {@link uri} and runs it until it closes. */
  async connect(): Promise<void> {
    const socket = new WebSocket(this.uri, OCPP_SUBPROTOCOL);
    await once(socket, "open");
    this.logger.info(`Connected to ${this.uri}`, { protocol: socket.protocol });
    await this.run(socket);
  }

  /** Drives one connection: boot, then heartbeats. Resolves once it closes. */
  async run(socket: WireSocket): Promise<void> {
    const session = new ConnectionSession({
      role: "point",
      socket,
      handlers: this.handlers,
      validator: this.validator,
      configuration: this.configuration,
      callTimeoutMs: this.callTimeoutMs,
      logger: this.logger,
    });
    this.session = session;
    this.status = undefined;
    session.identify(this.serialNumber);

    const closed = new Promise<void>((resolve) => {
      if (session.signal.aborted) {
        resolve();
        return;
      }
      session.signal.addEventListener("abort", () => resolve(), { once: true });
    });

    if (await this.bootUntilAccepted(session)) {
      this.scheduler = new LivenessScheduler(session, { sleep: this.sleep, logger: this.logger });
      await this.scheduler.run();
    }
    await closed;
  }

  close(): void {
    this.session?.close(1000, "charge point shutting down");
  }

  private bootPayload(): BootNotificationRequest {
    const payload: BootNotificationRequest = {
      chargePointVendor: this.vendor,
      chargePointModel: this.model,
      chargePointSerialNumber: this.serialNumber,
    };
    if (this.firmwareVersion !== undefined) {
      payload.firmwareVersion = this.firmwareVersion;
    }
    return payload;
  }

  private storedIntervalSeconds(): number {
    const configured = this.configuration.getInteger(HEARTBEAT_INTERVAL_KEY);
    return configured !== undefined && configured > 0 ? configured : DEFAULT_HEARTBEAT_INTERVAL_SECONDS;
  }

  private async bootUntilAccepted(session: PointSession): Promise<boolean> {
    const signal = session.signal;

    while (!signal.aborted) {
      let retrySeconds: number;
      try {
        const response = await session.call("BootNotification", this.bootPayload());
        this.status = response.status;
        if (response.status === "Accepted") {
          if (response.interval > 0) {
            this.configuration.assign(HEARTBEAT_INTERVAL_KEY, response.interval);
          }
          this.logger.info(`Boot accepted; heartbeat every ${this.storedIntervalSeconds()}s`);
          return true;
        }
        retrySeconds = response.interval > 0 ? response.interval : this.storedIntervalSeconds();
        this.logger.warn(`Boot ${response.status}; retrying in ${retrySeconds}s`);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        retrySeconds = this.storedIntervalSeconds();
        this.logger.warn(`BootNotification failed; retrying in ${retrySeconds}s`, error);
      }

      try {
        await this.sleep(clampTimerDelay(retrySeconds * 1000), signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        throw error;
      }
    }
    return false;
  }
}

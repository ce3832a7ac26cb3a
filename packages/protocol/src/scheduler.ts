import { setTimeout as delay } from "node:timers/promises";
import { clampTimerDelay } from "./correlation.js";
import type { ConnectionSession } from "./session.js";
import { createLogger, type Logger } from "./logger.js";

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const HEARTBEAT_INTERVAL_KEY = "HeartbeatInterval";
export const DEFAULT_HEARTBEAT_INTERVAL_SECONDS = 30;

export const sleep: Sleep = async (ms, signal) => {
  await delay(clampTimerDelay(ms), undefined, { signal });
};

export interface LivenessSchedulerOptions {
  sleep?: Sleep;
  logger?: Logger;
  /** Used when the session's configuration holds no positive interval. */
  fallbackIntervalSeconds?: number;
}

/**
 * Sends a Heartbeat, then sleeps for the session's current HeartbeatInterval,
 * until the session closes. The interval is read when each sleep begins, so a
 * change applies from the next cycle; a sleep already running is not cut short.
 */
export class LivenessScheduler {
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly fallbackIntervalSeconds: number;
  private running: Promise<void> | undefined;
  private beats = 0;

  constructor(
    private readonly session: ConnectionSession<"point">,
    options: LivenessSchedulerOptions = {},
  ) {
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger("liveness");
    this.fallbackIntervalSeconds =
      options.fallbackIntervalSeconds ?? DEFAULT_HEARTBEAT_INTERVAL_SECONDS;
  }

  get heartbeatsSent(): number {
    return this.beats;
  }

  intervalSeconds(): number {
    const configured = this.session.configuration.getInteger(HEARTBEAT_INTERVAL_KEY);
    return configured !== undefined && configured > 0 ? configured : this.fallbackIntervalSeconds;
  }

  /** Resolves once the session's signal aborts. Calling it again joins the same loop. */
  run(): Promise<void> {
    this.running ??= this.loop();
    return this.running;
  }

  private async loop(): Promise<void> {
    const signal = this.session.signal;
    while (!signal.aborted) {
      await this.beat();
      if (signal.aborted) {
        break;
      }

      const seconds = this.intervalSeconds();
      try {
        await this.sleep(clampTimerDelay(seconds * 1000), signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        throw error;
      }
    }
    this.logger.debug(`[${this.session.label}] liveness stopped after ${this.beats} heartbeats`);
  }

  private async beat(): Promise<void> {
    this.beats += 1;
    try {
      const response = await this.session.call("Heartbeat", {});
      this.logger.debug(`[${this.session.label}] heartbeat acknowledged at ${response.currentTime}`);
    } catch (error) {
      this.logger.warn(`[${this.session.label}] heartbeat failed`, error);
    }
  }
}

import { ProtocolError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

/** Longest delay a Node timer honours; anything above it fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  return Math.min(Math.max(ms, 0), MAX_TIMER_MS);
}

export interface PendingCall {
  id: string;
  action: string;
  createdAt: number;
}

export type CallSettlement =
  | { kind: "result"; payload: unknown }
  | { kind: "error"; payload: unknown };

export interface RegisterOptions {
  timeoutMs?: number;
}

interface PendingEntry extends PendingCall {
  resolve: (settlement: CallSettlement) => void;
  reject: (error: ProtocolError) => void;
}

export interface CorrelationTableOptions {
  defaultTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Outstanding calls of one connection, keyed by call id. Every entry is
 * settled exactly once: by a matching result or error, by its deadline, by
 * `cancel`, or by `failAll` when the connection goes away.
 */
export class CorrelationTable {
  private readonly pending = new Map<string, PendingEntry>();
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: CorrelationTableOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("correlation");
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.pending.size;
  }

  has(id: string): boolean {
    return this.pending.has(id);
  }

  list(): PendingCall[] {
    return Array.from(this.pending.values(), ({ id, action, createdAt }) => ({
      id,
      action,
      createdAt,
    }));
  }

  register(id: string, action: string, options: RegisterOptions = {}): Promise<CallSettlement> {
    if (this.pending.has(id)) {
      return Promise.reject(
        new ProtocolError(`Call id ${id} is already outstanding`, { code: "ProtocolError" }),
      );
    }

    const timeoutMs = clampTimerDelay(options.timeoutMs ?? this.defaultTimeoutMs);

    return new Promise<CallSettlement>((resolve, reject) => {
      const timeout = setTimeout(() => {
        if (this.pending.get(id) !== entry) {
          return;
        }
        this.pending.delete(id);
        this.logger.warn(`${action} call ${id} timed out after ${timeoutMs}ms`);
        reject(
          new ProtocolError(`${action} call ${id} timed out after ${timeoutMs}ms`, {
            code: "Timeout",
          }),
        );
      }, timeoutMs);

      const entry: PendingEntry = {
        id,
        action,
        createdAt: this.now(),
        resolve: (settlement) => {
          clearTimeout(timeout);
          resolve(settlement);
        },
        reject: (error) => {
          clearTimeout(timeout);
          reject(error);
        },
      };

      this.pending.set(id, entry);
    });
  }

  /** Returns false when nothing was waiting on `id`; the frame is dropped. */
  resolve(id: string, payload: unknown, isError: boolean): boolean {
    const entry = this.pending.get(id);
    if (!entry) {
      this.logger.warn(`Dropping ${isError ? "error" : "result"} for unknown call id ${id}`);
      return false;
    }

    this.pending.delete(id);
    entry.resolve(isError ? { kind: "error", payload } : { kind: "result", payload });
    return true;
  }

  cancel(id: string, error: ProtocolError): boolean {
    const entry = this.pending.get(id);
    if (!entry) {
      return false;
    }
    this.pending.delete(id);
    entry.reject(error);
    return true;
  }

  failAll(error: ProtocolError): void {
    const entries = Array.from(this.pending.values());
    this.pending.clear();
    for (const entry of entries) {
      entry.reject(error);
    }
  }
}

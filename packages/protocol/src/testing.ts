import { EventEmitter } from "node:events";
import WebSocket from "ws";
import type { Logger } from "./logger.js";
import type { WireSocket } from "./session.js";

export const silentLogger: Logger = {
  error() {},
  warn() {},
  info() {},
  debug() {},
};

interface SentWaiter {
  count: number;
  resolve: (frames: string[]) => void;
}

/**
 * In-process stand-in for a WebSocket. Frames written to one end of a pair
 * arrive on the other end on a later turn of the event loop.
 */
export class LoopbackSocket extends EventEmitter implements WireSocket {
  readyState: number = WebSocket.OPEN;
  peer: LoopbackSocket | undefined;
  readonly sent: string[] = [];
  private waiters: SentWaiter[] = [];

  send(data: string, cb?: (error?: Error) => void): void {
    if (this.readyState !== WebSocket.OPEN) {
      cb?.(new Error("LoopbackSocket is not open"));
      return;
    }

    this.sent.push(data);
    this.notifyWaiters();

    const peer = this.peer;
    setImmediate(() => {
      if (peer && peer.readyState === WebSocket.OPEN) {
        peer.emit("message", Buffer.from(data), false);
      }
      cb?.();
    });
  }

  /** Delivers a frame as if the remote side had sent it. */
  receive(frame: string | readonly unknown[]): void {
    const text = typeof frame === "string" ? frame : JSON.stringify(frame);
    this.emit("message", Buffer.from(text), false);
  }

  close(code = 1000, reason = ""): void {
    if (this.readyState === WebSocket.CLOSED) {
      return;
    }
    this.readyState = WebSocket.CLOSED;
    const peer = this.peer;
    setImmediate(() => {
      this.emit("close", code, Buffer.from(reason));
      peer?.close(code, reason);
    });
  }

  sentFrames(): unknown[] {
    return this.sent.map((frame): unknown => JSON.parse(frame));
  }

  /** Resolves once `count` frames in total have been written to this end. */
  waitForSent(count: number, timeoutMs = 2_000): Promise<string[]> {
    if (this.sent.length >= count) {
      return Promise.resolve([...this.sent]);
    }
    return new Promise<string[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((waiter) => waiter !== entry);
        reject(new Error(`expected ${count} frames, saw ${this.sent.length}`));
      }, timeoutMs);
      const entry: SentWaiter = {
        count,
        resolve: (frames) => {
          clearTimeout(timer);
          resolve(frames);
        },
      };
      this.waiters.push(entry);
    });
  }

  private notifyWaiters(): void {
    const ready = this.waiters.filter((waiter) => this.sent.length >= waiter.count);
    this.waiters = this.waiters.filter((waiter) => this.sent.length < waiter.count);
    for (const waiter of ready) {
      waiter.resolve([...this.sent]);
    }
  }
}

export function createSocketPair(): [LoopbackSocket, LoopbackSocket] {
  const left = new LoopbackSocket();
  const right = new LoopbackSocket();
  left.peer = right;
  right.peer = left;
  return [left, right];
}

/** Polls `condition` on every turn of the event loop until it holds. */
export async function waitFor(condition: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

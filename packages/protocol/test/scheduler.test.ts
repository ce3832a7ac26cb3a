import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ConfigurationStore } from "../src/configuration.js";
import { LivenessScheduler, type Sleep } from "../src/scheduler.js";
import { ConnectionSession, type SessionHandlers } from "../src/session.js";
import { createSocketPair, LoopbackSocket, silentLogger, waitFor } from "../src/testing.js";
import { JsonSchemaValidator } from "../src/validator.js";

const validator = new JsonSchemaValidator({ logger: silentLogger });

const pointHandlers: SessionHandlers<"point"> = {
  GetConfiguration: (payload, { session }) => session.configuration.read(payload.key),
  ChangeConfiguration: (payload, { session }) => ({
    status: session.configuration.change(payload.key, payload.value),
  }),
};

function heartbeatCounter() {
  const received: string[] = [];
  const handlers: SessionHandlers<"central"> = {
    BootNotification: () => ({ status: "Accepted", currentTime: new Date().toISOString(), interval: 5 }),
    Heartbeat: () => {
      received.push("Heartbeat");
      return { currentTime: new Date().toISOString() };
    },
  };
  return { received, handlers };
}

/** A sleep that only ends when the test releases it. */
function manualSleep() {
  const requested: number[] = [];
  const releases: Array<() => void> = [];
  const sleep: Sleep = (ms, signal) => {
    requested.push(ms);
    return new Promise<void>((resolve, reject) => {
      releases.push(resolve);
      signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  };
  return { sleep, requested, releases };
}

function pointSession(socket: LoopbackSocket, interval: number, callTimeoutMs = 1_000) {
  return new ConnectionSession({
    role: "point",
    socket,
    handlers: pointHandlers,
    validator,
    configuration: new ConfigurationStore([{ key: "HeartbeatInterval", value: interval, readonly: false }]),
    callTimeoutMs,
    logger: silentLogger,
  });
}

describe("LivenessScheduler", () => {
  it("applies an interval change from the next cycle, not the current sleep", async () => {
    const [pointSocket, centralSocket] = createSocketPair();
    const counter = heartbeatCounter();
    new ConnectionSession({
      role: "central",
      socket: centralSocket,
      handlers: counter.handlers,
      validator,
      logger: silentLogger,
    });
    const session = pointSession(pointSocket, 5);
    const { sleep, requested, releases } = manualSleep();
    const scheduler = new LivenessScheduler(session, { sleep, logger: silentLogger });

    const running = scheduler.run();
    await waitFor(() => requested.length === 1);
    assert.deepEqual(requested, [5000]);
    assert.deepEqual(counter.received, ["Heartbeat"]);

    assert.equal(session.configuration.change("HeartbeatInterval", "1"), "Accepted");
    for (let i = 0; i < 5; i += 1) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
    assert.deepEqual(requested, [5000]);
    assert.equal(scheduler.heartbeatsSent, 1);
    assert.deepEqual(counter.received, ["Heartbeat"]);

    releases[0]?.();
    await waitFor(() => requested.length === 2);
    assert.deepEqual(requested, [5000, 1000]);
    assert.deepEqual(counter.received, ["Heartbeat", "Heartbeat"]);

    session.close();
    await running;
    assert.equal(scheduler.heartbeatsSent, 2);
  });

  it("keeps beating when a heartbeat goes unanswered", async () => {
    const socket = new LoopbackSocket();
    const session = pointSession(socket, 7, 10);
    const { sleep, requested, releases } = manualSleep();
    const scheduler = new LivenessScheduler(session, { sleep, logger: silentLogger });

    const running = scheduler.run();
    await waitFor(() => requested.length === 1);
    releases[0]?.();
    await waitFor(() => requested.length === 2);

    assert.deepEqual(requested, [7000, 7000]);
    assert.equal(socket.sent.length, 2);

    session.close();
    await running;
  });

  it("caps an interval longer than a timer can wait", async () => {
    const socket = new LoopbackSocket();
    const session = pointSession(socket, 3_000_000, 10);
    const { sleep, requested } = manualSleep();
    const scheduler = new LivenessScheduler(session, { sleep, logger: silentLogger });

    const running = scheduler.run();
    await waitFor(() => requested.length === 1);
    assert.deepEqual(requested, [2_147_483_647]);

    session.close();
    await running;
  });

  it("falls back to the default interval when none is configured", async () => {
    const session = new ConnectionSession({
      role: "point",
      socket: new LoopbackSocket(),
      handlers: pointHandlers,
      validator,
      logger: silentLogger,
    });
    const scheduler = new LivenessScheduler(session, { fallbackIntervalSeconds: 12, logger: silentLogger });
    assert.equal(scheduler.intervalSeconds(), 12);
    const running = scheduler.run();
    assert.equal(scheduler.run(), running);
    session.close();
    await running;
  });
});

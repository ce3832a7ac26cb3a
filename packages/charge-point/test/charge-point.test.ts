import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { CentralSystem } from "@ocpp-lite/central-system";
import {
  ConnectionSession,
  JsonSchemaValidator,
  ProtocolError,
  type BootNotificationRequest,
  type BootNotificationResponse,
  type Sleep,
} from "@ocpp-lite/protocol";
import { createSocketPair, LoopbackSocket, silentLogger, waitFor } from "@ocpp-lite/protocol/testing";
import { ChargePoint, defaultConfiguration } from "../src/charge-point.js";

const validator = new JsonSchemaValidator({ logger: silentLogger });
const now = "2024-07-09T12:00:00.000Z";

/**
 * Records every requested sleep. The first `immediate` sleeps return at once;
 * later ones last until the connection goes away.
 */
function scriptedSleep(immediate = 0) {
  const requested: number[] = [];
  const sleep: Sleep = (ms, signal) => {
    requested.push(ms);
    if (requested.length <= immediate) {
      return Promise.resolve();
    }
    return new Promise<void>((_resolve, reject) => {
      if (signal.aborted) {
        reject(new Error("aborted"));
        return;
      }
      signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  };
  return { sleep, requested };
}

/** Central side of a loopback pair that answers BootNotification from a script. */
function centralStandIn(socket: LoopbackSocket, replies: Array<BootNotificationResponse | Error>) {
  const boots: BootNotificationRequest[] = [];
  let heartbeats = 0;
  const session = new ConnectionSession({
    role: "central",
    socket,
    handlers: {
      BootNotification: (payload) => {
        boots.push(payload);
        const reply = replies[Math.min(boots.length, replies.length) - 1];
        if (reply === undefined || reply instanceof Error) {
          throw new ProtocolError(reply?.message ?? "no reply scripted", { code: "GenericError" });
        }
        return reply;
      },
      Heartbeat: () => {
        heartbeats += 1;
        return { currentTime: now };
      },
    },
    validator,
    logger: silentLogger,
  });
  return {
    session,
    boots,
    get heartbeats() {
      return heartbeats;
    },
  };
}

function createPoint(sleep: Sleep) {
  return new ChargePoint({
    uri: "ws://localhost:9000",
    model: "AC-1",
    vendor: "Acme",
    serialNumber: "SN-1",
    validator,
    logger: silentLogger,
    callTimeoutMs: 1_000,
    sleep,
  });
}

describe("ChargePoint", () => {
  it("starts with the default configuration", () => {
    const store = defaultConfiguration("AC-1", "Acme");

    assert.deepEqual(store.read(), {
      configurationKey: [
        { key: "HeartbeatInterval", value: 30, readonly: false },
        { key: "ConnectionTimeOut", value: 60, readonly: false },
        { key: "NumberOfConnectors", value: 1, readonly: true },
        { key: "ChargePointModel", value: "AC-1", readonly: true },
        { key: "ChargePointVendor", value: "Acme", readonly: true },
      ],
      unknownKey: [],
    });
  });

  it("boots with its identity, adopts the interval and starts heartbeats", async () => {
    const [centralSide, pointSide] = createSocketPair();
    const central = centralStandIn(centralSide, [{ status: "Accepted", currentTime: now, interval: 120 }]);
    const { sleep, requested } = scriptedSleep();
    const point = createPoint(sleep);

    const running = point.run(pointSide);
    await waitFor(() => requested.length === 1);

    assert.deepEqual(central.boots, [
      { chargePointVendor: "Acme", chargePointModel: "AC-1", chargePointSerialNumber: "SN-1" },
    ]);
    assert.equal(point.registrationStatus, "Accepted");
    assert.equal(point.configuration.get("HeartbeatInterval"), 120);
    assert.equal(central.heartbeats, 1);
    assert.equal(point.heartbeatsSent, 1);
    assert.deepEqual(requested, [120_000]);

    centralSide.close();
    await running;
    assert.equal(point.isConnected, false);
  });

  it("answers GetConfiguration with known and unknown keys", async () => {
    const [centralSide, pointSide] = createSocketPair();
    const central = centralStandIn(centralSide, [{ status: "Accepted", currentTime: now, interval: 30 }]);
    const { sleep, requested } = scriptedSleep();
    const point = createPoint(sleep);
    const running = point.run(pointSide);
    await waitFor(() => requested.length === 1);

    const response = await central.session.call("GetConfiguration", {
      key: ["HeartbeatInterval", "Nonexistent"],
    });

    assert.deepEqual(response, {
      configurationKey: [{ key: "HeartbeatInterval", value: 30, readonly: false }],
      unknownKey: ["Nonexistent"],
    });

    point.close();
    await running;
  });

  it("applies ChangeConfiguration and refuses unknown or readonly keys", async () => {
    const [centralSide, pointSide] = createSocketPair();
    const central = centralStandIn(centralSide, [{ status: "Accepted", currentTime: now, interval: 30 }]);
    const { sleep, requested } = scriptedSleep();
    const point = createPoint(sleep);
    const running = point.run(pointSide);
    await waitFor(() => requested.length === 1);

    const changed = await central.session.call("ChangeConfiguration", { key: "HeartbeatInterval", value: "60" });
    const unknown = await central.session.call("ChangeConfiguration", { key: "NoSuchKey", value: "1" });
    const readonly = await central.session.call("ChangeConfiguration", { key: "ChargePointModel", value: "X" });
    const mistyped = await central.session.call("ChangeConfiguration", { key: "ConnectionTimeOut", value: "soon" });

    assert.deepEqual(changed, { status: "Accepted" });
    assert.deepEqual(unknown, { status: "Rejected" });
    assert.deepEqual(readonly, { status: "Rejected" });
    assert.deepEqual(mistyped, { status: "Rejected" });
    assert.equal(point.configuration.get("HeartbeatInterval"), 60);
    assert.equal(point.configuration.get("ChargePointModel"), "AC-1");
    assert.equal(point.configuration.get("ConnectionTimeOut"), 60);

    point.close();
    await running;
  });

  it("boots again after Pending, waiting the interval the central system asked for", async () => {
    const [centralSide, pointSide] = createSocketPair();
    const central = centralStandIn(centralSide, [
      { status: "Pending", currentTime: now, interval: 5 },
      { status: "Accepted", currentTime: now, interval: 60 },
    ]);
    const { sleep, requested } = scriptedSleep(1);
    const point = createPoint(sleep);

    const running = point.run(pointSide);
    await waitFor(() => requested.length === 2);

    assert.equal(central.boots.length, 2);
    assert.deepEqual(requested, [5_000, 60_000]);
    assert.equal(point.registrationStatus, "Accepted");
    assert.equal(central.heartbeats, 1);

    centralSide.close();
    await running;
  });

  it("boots again after a failed BootNotification, waiting the stored interval", async () => {
    const [centralSide, pointSide] = createSocketPair();
    const central = centralStandIn(centralSide, [
      new Error("busy"),
      { status: "Accepted", currentTime: now, interval: 45 },
    ]);
    const { sleep, requested } = scriptedSleep(1);
    const point = createPoint(sleep);

    const running = point.run(pointSide);
    await waitFor(() => requested.length === 2);

    assert.equal(central.boots.length, 2);
    assert.deepEqual(requested, [30_000, 45_000]);

    centralSide.close();
    await running;
  });

  it("caps a retry interval longer than a timer can wait", async () => {
    const [centralSide, pointSide] = createSocketPair();
    centralStandIn(centralSide, [{ status: "Pending", currentTime: now, interval: 3_000_000 }]);
    const { sleep, requested } = scriptedSleep();
    const point = createPoint(sleep);

    const running = point.run(pointSide);
    await waitFor(() => requested.length === 1);
    assert.deepEqual(requested, [2_147_483_647]);

    centralSide.close();
    await running;
  });

  it("stops booting when the connection closes during a retry wait", async () => {
    const [centralSide, pointSide] = createSocketPair();
    const central = centralStandIn(centralSide, [{ status: "Rejected", currentTime: now, interval: 10 }]);
    const { sleep, requested } = scriptedSleep();
    const point = createPoint(sleep);

    const running = point.run(pointSide);
    await waitFor(() => requested.length === 1);
    centralSide.close();
    await running;

    assert.equal(central.boots.length, 1);
    assert.equal(point.registrationStatus, "Rejected");
    assert.equal(point.heartbeatsSent, 0);
  });

  it("is registered by the central system and configurable through it", async () => {
    const central = new CentralSystem({ heartbeatInterval: 90, validator, logger: silentLogger, callTimeoutMs: 1_000 });
    const [centralSide, pointSide] = createSocketPair();
    central.attach(centralSide);
    const { sleep, requested } = scriptedSleep();
    const point = createPoint(sleep);

    const running = point.run(pointSide);
    await waitFor(() => requested.length === 1);

    assert.equal(central.registry.size, 1);
    assert.equal(point.configuration.get("HeartbeatInterval"), 90);
    assert.deepEqual(await central.changeConfiguration("SN-1", "HeartbeatInterval", 15), {
      status: "Accepted",
    });
    assert.equal(point.configuration.get("HeartbeatInterval"), 15);
    assert.deepEqual(await central.getConfiguration("SN-1", ["ChargePointVendor"]), {
      configurationKey: [{ key: "ChargePointVendor", value: "Acme", readonly: true }],
      unknownKey: [],
    });

    point.close();
    await running;
    await waitFor(() => central.registry.size === 0);
  });
});

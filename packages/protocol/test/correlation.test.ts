import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { clampTimerDelay, CorrelationTable, MAX_TIMER_MS } from "../src/correlation.js";
import { ProtocolError } from "../src/errors.js";
import { silentLogger } from "../src/testing.js";

function table(timeoutMs = 1_000): CorrelationTable {
  return new CorrelationTable({ defaultTimeoutMs: timeoutMs, logger: silentLogger, now: () => 42 });
}

describe("CorrelationTable", () => {
  it("wakes the waiter on the first resolution only", async () => {
    const correlation = table();
    const waiter = correlation.register("x", "Heartbeat");

    assert.equal(correlation.resolve("x", { currentTime: "first" }, false), true);
    assert.equal(correlation.resolve("x", { currentTime: "second" }, false), false);

    assert.deepEqual(await waiter, { kind: "result", payload: { currentTime: "first" } });
    assert.equal(correlation.size, 0);
  });

  it("drops a resolution for an id that was never registered", async () => {
    const correlation = table();
    const waiter = correlation.register("known", "GetConfiguration");

    assert.equal(correlation.resolve("stranger", {}, true), false);
    assert.deepEqual(correlation.list(), [{ id: "known", action: "GetConfiguration", createdAt: 42 }]);

    correlation.resolve("known", { configurationKey: [], unknownKey: [] }, false);
    assert.deepEqual(await waiter, {
      kind: "result",
      payload: { configurationKey: [], unknownKey: [] },
    });
  });

  it("passes CallError payloads through as error settlements", async () => {
    const correlation = table();
    const waiter = correlation.register("e", "ChangeConfiguration");
    correlation.resolve("e", { code: "FormationViolation", description: "bad" }, true);
    assert.deepEqual(await waiter, {
      kind: "error",
      payload: { code: "FormationViolation", description: "bad" },
    });
  });

  it("refuses a second outstanding call with the same id", async () => {
    const correlation = table();
    const first = correlation.register("dup", "Heartbeat");
    await assert.rejects(correlation.register("dup", "Heartbeat"), (error: unknown) => {
      assert.ok(error instanceof ProtocolError);
      assert.equal(error.code, "ProtocolError");
      return true;
    });
    correlation.resolve("dup", {}, false);
    assert.deepEqual(await first, { kind: "result", payload: {} });
  });

  it("rejects with a timeout once the deadline passes", async () => {
    const correlation = table(20);
    const waiter = correlation.register("slow", "Heartbeat");
    await assert.rejects(waiter, (error: unknown) => {
      assert.ok(error instanceof ProtocolError);
      assert.equal(error.code, "Timeout");
      assert.equal(error.message, "Heartbeat call slow timed out after 20ms");
      return true;
    });
    assert.equal(correlation.has("slow"), false);
    assert.equal(correlation.resolve("slow", {}, false), false);
  });

  it("honours a per-call deadline over the default", async () => {
    const correlation = table(60_000);
    const waiter = correlation.register("quick", "Heartbeat", { timeoutMs: 10 });
    await assert.rejects(waiter, { code: "Timeout" });
  });

  it("holds a call whose deadline exceeds the longest timer delay", async () => {
    const correlation = table();
    const waiter = correlation.register("far", "GetConfiguration", { timeoutMs: 1e12 });
    await new Promise<void>((resolve) => setTimeout(resolve, 20));

    assert.equal(correlation.has("far"), true);
    correlation.resolve("far", { configurationKey: [], unknownKey: [] }, false);
    assert.deepEqual(await waiter, { kind: "result", payload: { configurationKey: [], unknownKey: [] } });
  });

  it("clamps timer delays into the range Node accepts", () => {
    assert.equal(clampTimerDelay(1_500), 1_500);
    assert.equal(clampTimerDelay(-5), 0);
    assert.equal(clampTimerDelay(3_000_000 * 1000), MAX_TIMER_MS);
  });

  it("fails every pending call at once", async () => {
    const correlation = table();
    const a = correlation.register("a", "Heartbeat");
    const b = correlation.register("b", "BootNotification");
    correlation.failAll(new ProtocolError("gone", { code: "ConnectionClosed" }));

    await assert.rejects(a, { code: "ConnectionClosed", message: "gone" });
    await assert.rejects(b, { code: "ConnectionClosed", message: "gone" });
    assert.equal(correlation.size, 0);
  });

  it("cancels a single call without touching the others", async () => {
    const correlation = table();
    const a = correlation.register("a", "Heartbeat");
    const b = correlation.register("b", "Heartbeat");

    assert.equal(correlation.cancel("a", new ProtocolError("write failed", { code: "ConnectionClosed" })), true);
    assert.equal(correlation.cancel("a", new ProtocolError("again", { code: "ConnectionClosed" })), false);
    await assert.rejects(a, { message: "write failed" });

    correlation.resolve("b", { currentTime: "now" }, false);
    assert.deepEqual(await b, { kind: "result", payload: { currentTime: "now" } });
  });
});

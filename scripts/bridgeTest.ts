import test from "node:test";
import assert from "node:assert/strict";
import type { ErrorSignal } from "../src/types.js";
import { encodeActionRequest, parseBridgeMessage } from "../src/bridge/bridgeProtocol.js";
import { GameBridge } from "../src/bridge/gameBridge.js";
import { TimeoutError } from "../src/utils/errors.js";
import { fakeSocket } from "./testHelpers.js";

test("parses an observation frame and fills the timestamp", () => {
  const msg = parseBridgeMessage(
    JSON.stringify({ type: "observation", label: "in_town", confidence: 0.9, readouts: { health: 80 } }),
    1234
  );
  assert.deepEqual(msg, {
    type: "observation",
    observation: { label: "in_town", confidence: 0.9, timestamp: 1234, readouts: { health: 80 } },
  });
});

test("rejects malformed frames", () => {
  assert.equal(parseBridgeMessage("not json"), null);
  assert.equal(parseBridgeMessage("[]"), null);
  assert.equal(parseBridgeMessage(JSON.stringify({ type: "observation", label: "x", confidence: 1.5 })), null);
  assert.equal(parseBridgeMessage(JSON.stringify({ type: "observation", label: "x", confidence: 0.5, readouts: { hp: "low" } })), null);
  assert.equal(parseBridgeMessage(JSON.stringify({ type: "action_result", id: 1.5, ok: true })), null);
  assert.equal(parseBridgeMessage(JSON.stringify({ type: "fault", kind: "stuck" })), null);
  assert.equal(parseBridgeMessage(JSON.stringify({ type: "mystery" })), null);
});

test("parses results and faults", () => {
  assert.deepEqual(parseBridgeMessage(JSON.stringify({ type: "action_result", id: 3, ok: false, error: "miss" })), {
    type: "action_result",
    id: 3,
    ok: false,
    error: "miss",
  });
  assert.deepEqual(parseBridgeMessage(JSON.stringify({ type: "fault", kind: "process-crash" })), {
    type: "fault",
    kind: "process-crash",
  });
});

test("encodes action requests", () => {
  assert.equal(
    encodeActionRequest(7, { type: "press", key: "t" }),
    '{"type":"action","id":7,"action":{"type":"press","key":"t"}}'
  );
});

/** In-process socket: records sent frames and exposes the bridge's handlers. */
test("actions fail fast until the socket opens", async () => {
  const socket = fakeSocket();
  const bridge = new GameBridge({ url: "ws://test", socketFactory: socket.factory });
  bridge.connect();

  assert.deepEqual(await bridge.perform({ type: "press", key: "a" }), { ok: false, error: "bridge not connected" });
  assert.equal(await bridge.observe(), "UNKNOWN");
  bridge.close();
  assert.equal(socket.closedCount(), 1);
});

test("action request resolves on its matching result", async () => {
  const socket = fakeSocket();
  const bridge = new GameBridge({ url: "ws://test", socketFactory: socket.factory });
  bridge.connect();
  socket.get().onOpen();
  assert.equal(bridge.isConnected(), true);

  const pending = bridge.perform({ type: "click", x: 5, y: 6 });
  assert.deepEqual(JSON.parse(socket.sent[0] ?? "null"), { type: "action", id: 1, action: { type: "click", x: 5, y: 6 } });
  socket.get().onMessage(JSON.stringify({ type: "action_result", id: 1, ok: true }));

  assert.deepEqual(await pending, { ok: true });
  bridge.close();
});

test("unanswered action times out", async () => {
  const socket = fakeSocket();
  const bridge = new GameBridge({ url: "ws://test", socketFactory: socket.factory, actionTimeoutMs: 20 });
  bridge.connect();
  socket.get().onOpen();

  await assert.rejects(bridge.perform({ type: "press", key: "a" }), (err: unknown) => {
    return err instanceof TimeoutError && err.message === "bridge action #1 timed out after 20ms";
  });
  bridge.close();
});

test("stale snapshots read as UNKNOWN", async () => {
  let t = 10_000;
  const bridge = new GameBridge({ url: "ws://test", socketFactory: fakeSocket().factory, staleAfterMs: 1000, now: () => t });
  bridge.handleFrame(JSON.stringify({ type: "observation", label: "field", confidence: 0.8 }));

  t = 10_500;
  const fresh = await bridge.observe();
  assert.notEqual(fresh, "UNKNOWN");
  if (fresh !== "UNKNOWN") assert.equal(fresh.label, "field");

  t = 12_000;
  assert.equal(await bridge.observe(), "UNKNOWN");
});

test("explicit unknown frame replaces the snapshot", async () => {
  const bridge = new GameBridge({ url: "ws://test", socketFactory: fakeSocket().factory });
  bridge.handleFrame(JSON.stringify({ type: "observation", label: "field", confidence: 0.8 }));
  bridge.handleFrame(JSON.stringify({ type: "unknown" }));
  assert.equal(await bridge.observe(), "UNKNOWN");
});

test("fault frames reach the fault sink, garbage is counted", () => {
  const faults: ErrorSignal[] = [];
  const bridge = new GameBridge({ url: "ws://test", socketFactory: fakeSocket().factory, onFault: (s) => faults.push(s) });

  bridge.handleFrame(JSON.stringify({ type: "fault", kind: "disconnect", message: "server gone" }));
  bridge.handleFrame("{oops");

  assert.deepEqual(faults, [{ kind: "disconnect", message: "server gone", source: "bridge" }]);
  assert.equal(bridge.getDroppedFrames(), 1);
});

test("disconnect fails pending actions", async () => {
  const socket = fakeSocket();
  const bridge = new GameBridge({ url: "ws://test", socketFactory: socket.factory });
  bridge.connect();
  socket.get().onOpen();

  const pending = bridge.perform({ type: "press", key: "a" });
  socket.get().onClose(1006, "");

  assert.deepEqual(await pending, { ok: false, error: "bridge disconnected before result #1" });
  assert.equal(bridge.isConnected(), false);
  bridge.close();
});

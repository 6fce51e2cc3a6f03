import test from "node:test";
import assert from "node:assert/strict";
import { InvalidTransitionError, type TransitionRecord } from "../src/orchestrator/stateMachine.js";
import { EventCollector, TO_RUNNING, driveTo, makeMachine, obs, wait } from "./testHelpers.js";

test("starts in IDLE and commits a legal transition", async () => {
  const events = new EventCollector();
  const sm = makeMachine(events);
  const records: TransitionRecord[] = [];
  sm.onTransition((r) => records.push(r));

  assert.equal(sm.currentState(), "IDLE");
  const outcome = await sm.requestTransition("STARTING", "normal", "test");

  assert.equal(outcome.accepted, true);
  assert.equal(sm.currentState(), "STARTING");
  assert.equal(sm.previousState(), "IDLE");
  assert.equal(sm.transitionCount(), 1);
  assert.equal(records.length, 1);
  assert.equal(records[0]?.seq, 1);
  assert.equal(records[0]?.from, "IDLE");
  assert.equal(records[0]?.to, "STARTING");
  assert.equal(records[0]?.requestedBy, "test");
  assert.equal(events.ofType("TRANSITION").length, 1);
});

test("illegal transition is rejected without changing state", async () => {
  const events = new EventCollector();
  const sm = makeMachine(events);
  const outcome = await sm.requestTransition("RUNNING");

  assert.equal(outcome.accepted, false);
  if (outcome.accepted) return;
  assert.equal(outcome.reason, "invalid_transition");
  assert.ok(outcome.error instanceof InvalidTransitionError);
  assert.equal(outcome.error.from, "IDLE");
  assert.equal(outcome.error.to, "RUNNING");
  assert.equal(sm.currentState(), "IDLE");
  assert.equal(sm.transitionCount(), 0);
  assert.equal(sm.recentRejections().length, 1);
  assert.equal(events.ofType("TRANSITION_REJECTED")[0]?.data.reason, "invalid_transition");
});

test("self-transition is rejected", async () => {
  const sm = makeMachine();
  await sm.requestTransition("STARTING");
  const outcome = await sm.requestTransition("STARTING");
  assert.equal(outcome.accepted, false);
  if (!outcome.accepted) assert.equal(outcome.reason, "already_in_state");
  assert.equal(sm.canTransition("STARTING"), false);
});

test("guard failure rejects until the observation satisfies it", async () => {
  const sm = makeMachine();
  await sm.requestTransition("STARTING");

  const early = await sm.requestTransition("IN_TOWN");
  assert.equal(early.accepted, false);
  if (!early.accepted) assert.equal(early.reason, "guard_failed");

  sm.updateObservation(obs("in_town"));
  assert.equal(sm.canTransition("IN_TOWN"), true);
  const later = await sm.requestTransition("IN_TOWN");
  assert.equal(later.accepted, true);
});

test("exit hook runs before entry hook", async () => {
  const sm = makeMachine();
  const calls: string[] = [];
  sm.onExit("IDLE", (from, to) => {
    calls.push(`exit:${from}->${to}`);
  });
  sm.onEnter("STARTING", (from, to) => {
    calls.push(`entry:${from}->${to}`);
  });
  await sm.requestTransition("STARTING");
  assert.deepEqual(calls, ["exit:IDLE->STARTING", "entry:IDLE->STARTING"]);
});

test("a hung or throwing hook does not block the transition", async () => {
  const sm = makeMachine(null, 20);
  sm.onEnter("STARTING", () => new Promise<void>(() => {}));
  sm.onExit("STARTING", () => {
    throw new Error("hook blew up");
  });

  const first = await sm.requestTransition("STARTING");
  assert.equal(first.accepted, true);
  assert.equal(sm.isBusy(), false);

  const second = await sm.requestTransition("DISCONNECTED");
  assert.equal(second.accepted, true);
  assert.equal(sm.currentState(), "DISCONNECTED");
});

test("a throwing listener does not affect the transition", async () => {
  const sm = makeMachine();
  sm.onTransition(() => {
    throw new Error("listener blew up");
  });
  const outcome = await sm.requestTransition("STARTING");
  assert.equal(outcome.accepted, true);
});

test("unsubscribed listener is not called", async () => {
  const sm = makeMachine();
  let calls = 0;
  const off = sm.onTransition(() => calls++);
  off();
  await sm.requestTransition("STARTING");
  assert.equal(calls, 0);
});

test("normal request while a transition is in flight is rejected as busy", async () => {
  const sm = makeMachine();
  sm.onEnter("STARTING", () => wait(30));

  const first = sm.requestTransition("STARTING");
  const second = await sm.requestTransition("STOPPED");

  assert.equal(second.accepted, false);
  if (!second.accepted) assert.equal(second.reason, "busy");
  assert.equal((await first).accepted, true);
  assert.equal(sm.currentState(), "STARTING");
});

test("preemptive request supersedes an uncommitted normal one", async () => {
  const sm = makeMachine();
  await driveTo(sm, TO_RUNNING);
  let exits = 0;
  sm.onExit("RUNNING", async () => {
    exits++;
    await wait(30);
  });

  const normal = sm.requestTransition("FIGHTING", "normal", "run");
  const preempt = sm.requestTransition("CHICKENED", "preemptive", "health");

  const [n, p] = await Promise.all([normal, preempt]);
  assert.equal(n.accepted, false);
  if (!n.accepted) assert.equal(n.reason, "superseded");
  assert.equal(p.accepted, true);
  assert.equal(sm.currentState(), "CHICKENED");
  assert.equal(sm.previousState(), "RUNNING");
  assert.equal(exits, 1);
});

test("second preemptive request loses the tie", async () => {
  const sm = makeMachine();
  await driveTo(sm, TO_RUNNING);
  sm.onExit("RUNNING", () => wait(30));

  const normal = sm.requestTransition("LOOTING");
  const first = sm.requestTransition("CHICKENED", "preemptive", "health");
  const second = await sm.requestTransition("DEAD", "preemptive", "recovery");

  assert.equal(second.accepted, false);
  if (!second.accepted) assert.equal(second.reason, "lost_tie");
  assert.equal((await first).accepted, true);
  assert.equal((await normal).accepted, false);
  assert.equal(sm.currentState(), "CHICKENED");
});

test("stop waits for a parked preemptive transition and still ends in STOPPED", async () => {
  const sm = makeMachine();
  await driveTo(sm, TO_RUNNING);
  sm.onExit("RUNNING", () => wait(30));
  const seen: string[] = [];
  sm.onTransition((r) => seen.push(`${r.from}->${r.to}`));

  const normal = sm.requestTransition("FIGHTING", "normal", "run");
  const preempt = sm.requestTransition("CHICKENED", "preemptive", "health");
  await sm.stop("test");

  assert.equal(sm.currentState(), "STOPPED");
  assert.equal(sm.isStopped(), true);
  assert.equal((await preempt).accepted, true);
  const n = await normal;
  assert.equal(n.accepted, false);
  if (!n.accepted) assert.equal(n.reason, "superseded");
  assert.deepEqual(seen, ["RUNNING->CHICKENED", "CHICKENED->STOPPED"]);
});

test("requests made while stopping are refused", async () => {
  const sm = makeMachine();
  await driveTo(sm, TO_RUNNING);
  sm.onExit("RUNNING", () => wait(20));

  const normal = sm.requestTransition("FIGHTING", "normal", "run");
  const stopping = sm.stop("test");
  const late = await sm.requestTransition("DEAD", "preemptive", "recovery");

  assert.equal(late.accepted, false);
  if (!late.accepted) assert.equal(late.reason, "stopped");
  assert.equal((await normal).accepted, true);
  await stopping;
  assert.equal(sm.currentState(), "STOPPED");
  assert.equal(sm.previousState(), "FIGHTING");
});

test("committed transitions form a single ordered sequence", async () => {
  const sm = makeMachine();
  const seen: number[] = [];
  sm.onTransition((r) => seen.push(r.seq));
  await driveTo(sm, [...TO_RUNNING, "FIGHTING", "LOOTING", "RETURNING", "IN_TOWN"]);
  assert.deepEqual(seen, [1, 2, 3, 4, 5, 6, 7]);
});

test("stop is terminal", async () => {
  const sm = makeMachine();
  await driveTo(sm, TO_RUNNING);
  await sm.stop("test");

  assert.equal(sm.currentState(), "STOPPED");
  assert.equal(sm.isStopped(), true);
  const after = await sm.requestTransition("IDLE", "preemptive");
  assert.equal(after.accepted, false);
  if (!after.accepted) assert.equal(after.reason, "stopped");

  await sm.stop("again");
  assert.equal(sm.transitionCount(), 4);
});

import test from "node:test";
import assert from "node:assert/strict";
import type { ActionPort, HealthReading } from "../src/types.js";
import type { HealthConfig } from "../src/config.js";
import { HealthPreemptionController, observationHealthSampler, type HealthSampler } from "../src/health/healthPreemption.js";
import { buildEscapeSteps } from "../src/health/escapeSequence.js";
import type { BotStateMachine } from "../src/orchestrator/stateMachine.js";
import {
  EventCollector,
  FakeActions,
  FakeReporter,
  QueueObserver,
  TEST_HEALTH,
  TO_RUNNING,
  driveTo,
  makeMachine,
  obs,
  wait,
} from "./testHelpers.js";

/** Hands out queued health values, then repeats the last one. null = no readout. */
class QueueSampler implements HealthSampler {
  constructor(private readonly values: (number | null)[]) {}

  async sample(): Promise<HealthReading | null> {
    const next = this.values.length > 1 ? this.values.shift() : this.values[0];
    if (next === null || next === undefined) return null;
    return { healthPercent: next, timestamp: Date.now() };
  }
}

const escapeSteps = buildEscapeSteps({
  cancelKey: "escape",
  saveExitTemplate: "save_and_exit",
  saveExitPosition: { x: 960, y: 540 },
  cancelRepeat: 2,
});

type Overrides = {
  sampler: HealthSampler;
  sm: BotStateMachine;
  actions?: ActionPort | null;
  config?: Partial<HealthConfig>;
  now?: () => number;
};

function controller(o: Overrides) {
  const events = new EventCollector();
  const errors = new FakeReporter();
  const health = new HealthPreemptionController({
    sampler: o.sampler,
    stateMachine: o.sm,
    config: { ...TEST_HEALTH, ...o.config },
    escapeSteps,
    actions: o.actions === undefined ? new FakeActions() : o.actions,
    errors,
    events,
    instanceId: "test",
    sleep: async () => {},
    now: o.now,
  });
  return { health, events, errors };
}

async function runningMachine(): Promise<BotStateMachine> {
  const sm = makeMachine();
  await driveTo(sm, TO_RUNNING);
  return sm;
}

test("status thresholds", async () => {
  const { health } = controller({ sampler: new QueueSampler([100]), sm: makeMachine(), config: { chickenManaPercent: 10 } });
  assert.equal(health.evaluate(null), "UNKNOWN");
  assert.equal(health.evaluate({ healthPercent: 25, timestamp: 0 }), "CRITICAL");
  assert.equal(health.evaluate({ healthPercent: 30, timestamp: 0 }), "CRITICAL");
  assert.equal(health.evaluate({ healthPercent: 45, timestamp: 0 }), "WARNING");
  assert.equal(health.evaluate({ healthPercent: 80, timestamp: 0 }), "SAFE");
  assert.equal(health.evaluate({ healthPercent: 80, manaPercent: 5, timestamp: 0 }), "CRITICAL");
});

test("critical health chickens and escapes when the rejuv fails", async () => {
  const sm = await runningMachine();
  const actions = new FakeActions((a) => (a.type === "press" && a.key === "3" ? { ok: false, error: "belt empty" } : { ok: true }));
  const { health, events } = controller({ sampler: new QueueSampler([20]), sm, actions });

  const result = await health.checkNow();

  assert.equal(result.action, "chicken");
  assert.equal(sm.currentState(), "CHICKENED");
  assert.equal(health.isChickenTriggered(), true);
  const history = health.getChickenHistory();
  assert.equal(history.length, 1);
  assert.equal(history[0]?.potionAttempted, false);
  assert.equal(history[0]?.transitionAccepted, true);
  assert.deepEqual(history[0]?.escape, { ok: true, step: "template-exit", attempts: 1 });
  assert.deepEqual(actions.performed.slice(1), [
    { type: "press", key: "escape" },
    { type: "template-click", template: "save_and_exit" },
  ]);

  const chicken = events.ofType("CHICKEN");
  assert.equal(chicken.length, 1);
  assert.equal(chicken[0]?.data.healthPercent, 20);
  assert.equal(chicken[0]?.data.escaped, true);
  assert.equal(chicken[0]?.data.escapeStep, "template-exit");
});

test("a rejuv that restores health avoids the chicken", async () => {
  const sm = await runningMachine();
  const actions = new FakeActions();
  const { health, events } = controller({ sampler: new QueueSampler([20, 70]), sm, actions });

  const result = await health.checkNow();

  assert.equal(result.action, "rejuv-saved");
  assert.equal(sm.currentState(), "RUNNING");
  assert.equal(health.isChickenTriggered(), false);
  assert.deepEqual(actions.performed, [{ type: "press", key: "3" }]);
  assert.equal(events.ofType("CHICKEN").length, 0);
});

test("latch holds one chicken per excursion and re-arms above the floor", async () => {
  const sm = await runningMachine();
  let level = 20;
  const sampler: HealthSampler = { sample: async () => ({ healthPercent: level, timestamp: Date.now() }) };
  const { health, errors } = controller({ sampler, sm, actions: null });

  assert.equal((await health.checkNow()).action, "chicken");
  assert.deepEqual(
    errors.submitted.map((s) => s.kind),
    ["escape-failed", "escape-failed", "escape-failed", "escape-exhausted"]
  );
  assert.equal((await health.checkNow()).action, "latched");

  // Still CHICKENED: a safe reading does not re-arm yet.
  level = 80;
  await health.checkNow();
  assert.equal(health.isChickenTriggered(), true);

  await sm.requestTransition("STARTING");
  await health.checkNow();
  assert.equal(health.isChickenTriggered(), false);

  // STARTING -> CHICKENED is not in the graph.
  level = 10;
  const rejected = await health.checkNow();
  assert.equal(rejected.action, "chicken-rejected");
  assert.equal(health.getChickenHistory()[1]?.transitionAccepted, false);
  assert.equal(sm.currentState(), "STARTING");
});

test("warning drinks a health potion with a cooldown", async () => {
  let t = 0;
  const sm = await runningMachine();
  const actions = new FakeActions();
  const { health } = controller({ sampler: new QueueSampler([45]), sm, actions, now: () => t });

  assert.equal((await health.checkNow()).action, "potion");
  assert.equal((await health.checkNow()).action, "none");
  t = 1500;
  assert.equal((await health.checkNow()).action, "potion");
  assert.deepEqual(actions.performed, [
    { type: "press", key: "1" },
    { type: "press", key: "1" },
  ]);
});

test("sample timeout is reported and cleared by the next good sample", async () => {
  const sm = await runningMachine();
  let hang = true;
  const sampler: HealthSampler = {
    sample: () => (hang ? new Promise<HealthReading | null>(() => {}) : Promise.resolve({ healthPercent: 90, timestamp: 1 })),
  };
  const { health, errors } = controller({ sampler, sm, config: { sampleTimeoutMs: 20 } });

  const first = await health.checkNow();
  assert.equal(first.status, "UNKNOWN");
  assert.equal(first.action, "none");
  assert.equal(errors.submitted[0]?.kind, "health-sample-timeout");

  hang = false;
  const second = await health.checkNow();
  assert.equal(second.status, "SAFE");
  assert.deepEqual(errors.confirmed, ["health-sample-timeout"]);
});

test("chicken preempts an in-flight normal transition", async () => {
  const sm = await runningMachine();
  sm.onExit("RUNNING", () => wait(30));
  const { health } = controller({ sampler: new QueueSampler([10]), sm, actions: null });

  const normal = sm.requestTransition("FIGHTING", "normal", "run");
  const result = await health.checkNow();
  const n = await normal;

  assert.equal(result.action, "chicken");
  assert.equal(n.accepted, false);
  if (!n.accepted) assert.equal(n.reason, "superseded");
  assert.equal(sm.currentState(), "CHICKENED");
});

test("overlapping checks share one pass", async () => {
  const sm = await runningMachine();
  let calls = 0;
  const sampler: HealthSampler = {
    sample: async () => {
      calls++;
      await wait(10);
      return { healthPercent: 90, timestamp: 1 };
    },
  };
  const { health } = controller({ sampler, sm });
  const [a, b] = await Promise.all([health.checkNow(), health.checkNow()]);
  assert.equal(calls, 1);
  assert.equal(a, b);
});

test("sample buffer keeps the newest readings", async () => {
  const sm = await runningMachine();
  const { health } = controller({ sampler: new QueueSampler([91, 92, 93, 94, 95, 96, 97]), sm });
  for (let i = 0; i < 7; i++) await health.checkNow();
  assert.deepEqual(
    health.getSamples().map((s) => s.healthPercent),
    [93, 94, 95, 96, 97]
  );
});

test("monitor samples on its own timer until stopped", async () => {
  const sm = await runningMachine();
  const { health } = controller({ sampler: new QueueSampler([90]), sm });
  health.start();
  assert.equal(health.isRunning(), true);
  await wait(60);
  health.stop();
  assert.equal(health.isRunning(), false);
  assert.ok(health.getSamples().length >= 1);
});

test("observation sampler reads health and mana readouts", async () => {
  const sampler = observationHealthSampler(new QueueObserver([obs("fighting", { health: 64, mana: 12 })]));
  const reading = await sampler.sample();
  assert.equal(reading?.healthPercent, 64);
  assert.equal(reading?.manaPercent, 12);

  const blind = observationHealthSampler(new QueueObserver(["UNKNOWN"]));
  assert.equal(await blind.sample(), null);
});

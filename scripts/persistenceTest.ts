import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { EngineEvent, EngineEventType } from "../src/types.js";
import { SessionStats } from "../src/stats/sessionStats.js";
import { StateStore } from "../src/persistence/stateStore.js";
import type { PersistedEngineState } from "../src/persistence/persistedState.js";
import { announceStartupThrottled } from "../src/utils/startupAnnounce.js";
import type { TelegramBotLike } from "../src/telegram/sendTelegramMessageSafe.js";

function ev(type: EngineEventType, data: Record<string, unknown>): EngineEvent {
  return { type, timestamp: 0, instanceId: "test", data };
}

async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "farm-autopilot-"));
}

test("stats follow engine events", () => {
  let t = 0;
  const stats = new SessionStats(() => t);

  stats.publish(ev("RUN_COMPLETE", { success: true, durationMs: 40_000 }));
  stats.publish(ev("CHICKEN", { healthPercent: 20 }));
  stats.publish(ev("RUN_COMPLETE", { success: false, durationMs: 20_000 }));
  stats.publish(ev("ERROR_EVENT", { kind: "character-death" }));
  stats.publish(ev("RUN_COMPLETE", { success: false, durationMs: 30_000 }));
  stats.publish(ev("ERROR_EVENT", { kind: "not-a-kind" }));
  t = 1_800_000;

  const s = stats.snapshot();
  assert.equal(s.runs, 3);
  assert.equal(s.successfulRuns, 1);
  assert.equal(s.chickenedRuns, 1);
  assert.equal(s.failedRuns, 1);
  assert.equal(s.deaths, 1);
  assert.equal(s.chickens, 1);
  assert.deepEqual(s.errorsByKind, { "character-death": 1 });
  assert.equal(s.avgRunMs, 30_000);
  assert.equal(s.runsPerHour, 6);
  assert.ok(stats.format().includes("Runs: 3 (ok 1, failed 1, chickened 1)"));
});

test("restored totals carry over but the hourly rate does not", () => {
  const stats = new SessionStats(() => 3_600_000);
  stats.restore({
    runs: 10,
    successfulRuns: 9,
    failedRuns: 1,
    chickenedRuns: 0,
    totalRunMs: 400_000,
    deaths: 0,
    chickens: 0,
    errorsByKind: { stuck: 2 },
  });
  stats.recordRun(true, 40_000);

  const s = stats.snapshot();
  assert.equal(s.runs, 11);
  assert.equal(s.sessionRuns, 1);
  assert.deepEqual(stats.export().errorsByKind, { stuck: 2 });
});

function sampleState(): PersistedEngineState {
  return {
    version: 1,
    instanceId: "test",
    savedAt: 1,
    stats: new SessionStats().export(),
    governor: { dedupe: { "test_CHICKEN_1": 1 } },
  };
}

test("state round-trips through the store", async () => {
  const dir = await tempDir();
  const store = new StateStore("test", path.join(dir, "nested", "state.json"));

  assert.equal(await store.load(), null);
  await store.save(sampleState());
  assert.deepEqual(await store.load(), sampleState());
});

test("unknown versions and corrupt files load as null", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "state.json");
  const store = new StateStore("test", file);

  await fs.writeFile(file, JSON.stringify({ version: 2 }), "utf8");
  assert.equal(await store.load(), null);
  await fs.writeFile(file, "{", "utf8");
  assert.equal(await store.load(), null);
});

test("default state path is per instance", () => {
  assert.equal(new StateStore("farm-9").getPath(), "/tmp/autopilot-state-farm-9.json");
});

test("startup announcement is throttled", async () => {
  const dir = await tempDir();
  const stateFile = path.join(dir, "startup.json");
  const sent: string[] = [];
  const bot: TelegramBotLike = {
    sendMessage: async (_chatId, text) => {
      sent.push(text);
      return {};
    },
  };
  const opts = { bot, chatId: 1, instanceId: "test", text: "online", stateFile, cooldownMs: 60_000 };

  assert.equal((await announceStartupThrottled({ ...opts, now: 1_000 })).reason, "sent");
  assert.equal((await announceStartupThrottled({ ...opts, now: 30_000 })).reason, "cooldown");
  assert.equal((await announceStartupThrottled({ ...opts, now: 90_000 })).reason, "sent");
  assert.deepEqual(sent, ["online", "online"]);

  await fs.writeFile(stateFile, "{", "utf8");
  assert.equal((await announceStartupThrottled({ ...opts, now: 200_000 })).reason, "state_read_error");
});

test("a new route or alert mode is announced inside the cooldown", async () => {
  const dir = await tempDir();
  const stateFile = path.join(dir, "startup.json");
  const sent: string[] = [];
  const bot: TelegramBotLike = {
    sendMessage: async (_chatId, text) => {
      sent.push(text);
      return {};
    },
  };
  const opts = { bot, chatId: 1, instanceId: "test", text: "online", stateFile, cooldownMs: 60_000 };
  const base = { route: "red-portal", alertMode: "QUIET", runLimit: 0 };

  assert.equal((await announceStartupThrottled({ ...opts, profile: base, now: 1_000 })).reason, "sent");
  assert.equal((await announceStartupThrottled({ ...opts, profile: base, now: 2_000 })).reason, "cooldown");
  assert.equal((await announceStartupThrottled({ ...opts, profile: { ...base, route: "cellar" }, now: 3_000 })).reason, "sent");
  assert.equal(
    (await announceStartupThrottled({ ...opts, profile: { ...base, route: "cellar", alertMode: "VERBOSE" }, now: 4_000 })).reason,
    "sent"
  );
  assert.equal(
    (await announceStartupThrottled({ ...opts, profile: { ...base, route: "cellar", alertMode: "VERBOSE" }, now: 5_000 })).reason,
    "cooldown"
  );
  assert.deepEqual(JSON.parse(await fs.readFile(stateFile, "utf8")), { lastSentAt: 4_000, profile: "cellar|VERBOSE|0" });
  assert.equal(sent.length, 3);
});

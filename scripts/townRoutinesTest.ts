import test from "node:test";
import assert from "node:assert/strict";
import type { GameAction } from "../src/types.js";
import {
  DEFAULT_TOWN_SETTINGS,
  InventoryRoutine,
  LevelUpRoutine,
  RejoinRoutine,
  ReturnRoutine,
  TownRoutine,
  type TownSettings,
} from "../src/runs/townRoutines.js";
import { FakeActions, fakeContext, obs } from "./testHelpers.js";

const FAST: TownSettings = { ...DEFAULT_TOWN_SETTINGS, arrivalTimeoutMs: 20, pollMs: 1 };

function describeAction(a: GameAction): string {
  switch (a.type) {
    case "press":
      return `press ${a.key}`;
    case "template-click":
      return `click ${a.template}`;
    default:
      return a.type;
  }
}

test("town picks inventory first, then leveling, then the next run", async () => {
  const town = new TownRoutine(FAST);

  const full = await town.execute(fakeContext({ state: "IN_TOWN", observation: obs("in_town", { inventoryFree: 2, statPoints: 5 }) }).ctx);
  assert.deepEqual(full, { success: true, next: "MANAGING_INVENTORY", note: "2 free slots" });

  const levels = await town.execute(fakeContext({ state: "IN_TOWN", observation: obs("in_town", { inventoryFree: 10, statPoints: 1 }) }).ctx);
  assert.deepEqual(levels, { success: true, next: "LEVELING_UP", note: "1 stat / 0 skill points" });

  const ready = await town.execute(fakeContext({ state: "IN_TOWN", observation: null }).ctx);
  assert.deepEqual(ready, { success: true, next: "RUNNING" });
});

test("inventory stashes and returns to town", async () => {
  const f = fakeContext({ state: "MANAGING_INVENTORY" });
  const result = await new InventoryRoutine(FAST).execute(f.ctx);

  assert.deepEqual(result, { success: true, next: "IN_TOWN" });
  assert.deepEqual(f.actions.performed.map(describeAction), ["click stash", "press i", "click stash_all", "press escape"]);
});

test("inventory failure still goes back to town", async () => {
  const actions = new FakeActions((a) => (a.type === "template-click" ? { ok: false, error: "not found" } : { ok: true }));
  const result = await new InventoryRoutine(FAST).execute(fakeContext({ state: "MANAGING_INVENTORY", actions }).ctx);

  assert.deepEqual(result, { success: false, next: "IN_TOWN", note: "stash failed (template-click: not found)" });
  assert.equal(actions.performed.length, 1);
});

test("aborted routine performs nothing", async () => {
  const f = fakeContext({ state: "MANAGING_INVENTORY" });
  f.controller.abort();
  const result = await new InventoryRoutine(FAST).execute(f.ctx);

  assert.deepEqual(result, { success: false, aborted: true });
  assert.equal(f.actions.performed.length, 0);
});

test("level up spends every point", async () => {
  const f = fakeContext({ state: "LEVELING_UP", observation: obs("in_town", { statPoints: 2, skillPoints: 1 }) });
  const result = await new LevelUpRoutine(FAST).execute(f.ctx);

  assert.deepEqual(result, { success: true, next: "IN_TOWN", note: "2 stat / 1 skill points" });
  assert.deepEqual(f.actions.performed.map(describeAction), [
    "press c",
    "click stat_plus",
    "click stat_plus",
    "press escape",
    "press k",
    "click skill_plus",
    "press escape",
  ]);
});

test("return portals home and waits for town", async () => {
  const hooks = { onAction: (_a: GameAction) => {} };
  const actions = new FakeActions((a) => {
    hooks.onAction(a);
    return { ok: true };
  });
  const f = fakeContext({ state: "RETURNING", observation: obs("field"), actions });
  hooks.onAction = (a) => {
    if (a.type === "template-click") f.setObservation(obs("in_town"));
  };

  const result = await new ReturnRoutine(FAST).execute(f.ctx);

  assert.deepEqual(result, { success: true, next: "IN_TOWN" });
  assert.deepEqual(actions.performed.map(describeAction), ["press t", "click town_portal"]);
});

test("return skips the portal when already in town", async () => {
  const f = fakeContext({ state: "RETURNING", observation: obs("in_town") });
  const result = await new ReturnRoutine(FAST).execute(f.ctx);

  assert.deepEqual(result, { success: true, next: "IN_TOWN" });
  assert.equal(f.actions.performed.length, 0);
});

test("return that never reaches town is an unknown state", async () => {
  const f = fakeContext({ state: "RETURNING", observation: obs("field") });
  const result = await new ReturnRoutine(FAST).execute(f.ctx);

  assert.deepEqual(result, {
    success: false,
    error: { kind: "unknown-state", message: "town not seen within 20ms" },
  });
});

test("rejoin moves DEAD and CHICKENED back to STARTING", async () => {
  const dead = fakeContext({ state: "DEAD" });
  assert.deepEqual(await new RejoinRoutine(FAST).execute(dead.ctx), { success: true, next: "STARTING" });
  assert.deepEqual(dead.actions.performed.map(describeAction), ["press escape"]);

  const chickened = fakeContext({ state: "CHICKENED" });
  assert.deepEqual(await new RejoinRoutine(FAST).execute(chickened.ctx), { success: true, next: "STARTING" });
  assert.equal(chickened.actions.performed.length, 0);
});

test("rejoin creates a game from STARTING", async () => {
  const hooks = { onAction: (_a: GameAction) => {} };
  const actions = new FakeActions((a) => {
    hooks.onAction(a);
    return { ok: true };
  });
  const f = fakeContext({ state: "STARTING", actions });
  hooks.onAction = (a) => {
    if (a.type === "template-click" && a.template === "create_game") f.setObservation(obs("in_town"));
  };

  const result = await new RejoinRoutine(FAST).execute(f.ctx);

  assert.deepEqual(result, { success: true, next: "IN_TOWN" });
  assert.deepEqual(actions.performed.map(describeAction), ["click play", "click create_game"]);
});

test("failed game creation reads as a disconnect", async () => {
  const actions = new FakeActions(() => ({ ok: false, error: "lobby down" }));
  const result = await new RejoinRoutine(FAST).execute(fakeContext({ state: "STARTING", actions }).ctx);

  assert.deepEqual(result, {
    success: false,
    error: { kind: "disconnect", message: "create game failed (template-click: lobby down)" },
  });
});

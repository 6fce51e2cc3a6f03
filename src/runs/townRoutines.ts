import type { BotState, GameAction, Observation, RunResult } from "../types.js";
import type { DomainHandler, HandlerContext } from "./domainHandler.js";

export type TownSettings = {
  townPortalKey: string;
  cancelKey: string;
  minFreeSlots: number;
  arrivalTimeoutMs: number;
  pollMs: number;
};

export const DEFAULT_TOWN_SETTINGS: TownSettings = {
  townPortalKey: "t",
  cancelKey: "escape",
  minFreeSlots: 4,
  arrivalTimeoutMs: 15000,
  pollMs: 250,
};

function readout(obs: Observation | null, key: string): number | null {
  const value = obs?.readouts[key];
  return typeof value === "number" ? value : null;
}

async function performAll(ctx: HandlerContext, actions: GameAction[]): Promise<string | null> {
  for (const action of actions) {
    if (ctx.signal.aborted) return "aborted";
    const result = await ctx.perform(action);
    if (!result.ok) return `${action.type}: ${result.error}`;
  }
  return null;
}

/** Polls observations until the label shows up; false on timeout or abort. */
async function waitForLabel(ctx: HandlerContext, label: string, timeoutMs: number, pollMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (!ctx.signal.aborted) {
    if (ctx.observation()?.label === label) return true;
    if (Date.now() >= deadline) return false;
    await ctx.sleep(pollMs);
  }
  return false;
}

/** In town between runs: pick inventory, leveling or the next run. */
export class TownRoutine implements DomainHandler {
  readonly name = "town";
  readonly kind = "routine" as const;

  constructor(private readonly settings: TownSettings = DEFAULT_TOWN_SETTINGS) {}

  async execute(ctx: HandlerContext): Promise<RunResult> {
    const obs = ctx.observation();
    const free = readout(obs, "inventoryFree");
    if (free !== null && free < this.settings.minFreeSlots) {
      return { success: true, next: "MANAGING_INVENTORY", note: `${free} free slots` };
    }
    const statPoints = readout(obs, "statPoints") ?? 0;
    const skillPoints = readout(obs, "skillPoints") ?? 0;
    if (statPoints > 0 || skillPoints > 0) {
      return { success: true, next: "LEVELING_UP", note: `${statPoints} stat / ${skillPoints} skill points` };
    }
    return { success: true, next: "RUNNING" };
  }
}

/** Stash everything, refill the belt, back to IN_TOWN. */
export class InventoryRoutine implements DomainHandler {
  readonly name = "inventory";
  readonly kind = "routine" as const;

  constructor(private readonly settings: TownSettings = DEFAULT_TOWN_SETTINGS) {}

  async execute(ctx: HandlerContext): Promise<RunResult> {
    const failure = await performAll(ctx, [
      { type: "template-click", template: "stash" },
      { type: "press", key: "i" },
      { type: "template-click", template: "stash_all" },
      { type: "press", key: this.settings.cancelKey },
    ]);
    if (failure === "aborted") return { success: false, aborted: true };
    if (failure) return { success: false, next: "IN_TOWN", note: `stash failed (${failure})` };
    return { success: true, next: "IN_TOWN" };
  }
}

/** Spend pending stat and skill points. */
export class LevelUpRoutine implements DomainHandler {
  readonly name = "level-up";
  readonly kind = "routine" as const;

  constructor(private readonly settings: TownSettings = DEFAULT_TOWN_SETTINGS) {}

  async execute(ctx: HandlerContext): Promise<RunResult> {
    const obs = ctx.observation();
    const statPoints = readout(obs, "statPoints") ?? 0;
    const skillPoints = readout(obs, "skillPoints") ?? 0;

    const actions: GameAction[] = [];
    if (statPoints > 0) {
      actions.push({ type: "press", key: "c" });
      for (let i = 0; i < statPoints; i++) actions.push({ type: "template-click", template: "stat_plus" });
      actions.push({ type: "press", key: this.settings.cancelKey });
    }
    if (skillPoints > 0) {
      actions.push({ type: "press", key: "k" });
      for (let i = 0; i < skillPoints; i++) actions.push({ type: "template-click", template: "skill_plus" });
      actions.push({ type: "press", key: this.settings.cancelKey });
    }

    const failure = await performAll(ctx, actions);
    if (failure === "aborted") return { success: false, aborted: true };
    if (failure) return { success: false, next: "IN_TOWN", note: `allocation failed (${failure})` };
    return { success: true, next: "IN_TOWN", note: `${statPoints} stat / ${skillPoints} skill points` };
  }
}

/** Town portal home, then wait for the town screen. */
export class ReturnRoutine implements DomainHandler {
  readonly name = "return";
  readonly kind = "routine" as const;

  constructor(private readonly settings: TownSettings = DEFAULT_TOWN_SETTINGS) {}

  async execute(ctx: HandlerContext): Promise<RunResult> {
    if (ctx.observation()?.label !== "in_town") {
      const failure = await performAll(ctx, [
        { type: "press", key: this.settings.townPortalKey },
        { type: "template-click", template: "town_portal" },
      ]);
      if (failure === "aborted") return { success: false, aborted: true };
      if (failure) {
        return { success: false, error: { kind: "unknown-state", message: `town portal failed (${failure})` } };
      }
    }

    const arrived = await waitForLabel(ctx, "in_town", this.settings.arrivalTimeoutMs, this.settings.pollMs);
    if (ctx.signal.aborted) return { success: false, aborted: true };
    if (!arrived) {
      return {
        success: false,
        error: { kind: "unknown-state", message: `town not seen within ${this.settings.arrivalTimeoutMs}ms` },
      };
    }
    return { success: true, next: "IN_TOWN" };
  }
}

const LEAVE_STATES: ReadonlySet<BotState> = new Set(["IDLE", "DEAD", "CHICKENED", "DISCONNECTED"]);

/**
 * Gets the character back into a game: leaves DEAD, CHICKENED,
 * DISCONNECTED or IDLE for STARTING, then creates a game and waits for town.
 */
export class RejoinRoutine implements DomainHandler {
  readonly name = "rejoin";
  readonly kind = "routine" as const;

  constructor(private readonly settings: TownSettings = DEFAULT_TOWN_SETTINGS) {}

  async execute(ctx: HandlerContext): Promise<RunResult> {
    if (LEAVE_STATES.has(ctx.state)) {
      if (ctx.state === "DEAD" || ctx.state === "DISCONNECTED") {
        const failure = await performAll(ctx, [{ type: "press", key: this.settings.cancelKey }]);
        if (failure === "aborted") return { success: false, aborted: true };
      }
      return { success: true, next: "STARTING" };
    }

    if (ctx.observation()?.label !== "in_town") {
      const failure = await performAll(ctx, [
        { type: "template-click", template: "play" },
        { type: "template-click", template: "create_game" },
      ]);
      if (failure === "aborted") return { success: false, aborted: true };
      if (failure) return { success: false, error: { kind: "disconnect", message: `create game failed (${failure})` } };
    }

    const arrived = await waitForLabel(ctx, "in_town", this.settings.arrivalTimeoutMs, this.settings.pollMs);
    if (ctx.signal.aborted) return { success: false, aborted: true };
    if (!arrived) return { success: false, error: { kind: "disconnect", message: "game did not load" } };
    return { success: true, next: "IN_TOWN" };
  }
}

import { promises as fs } from "node:fs";
import type { BotState, GameAction } from "../types.js";
import { ConfigError, describeError } from "../utils/errors.js";

export type RouteStep = {
  state?: BotState; // mid-run state to enter before the action
  action: GameAction;
  repeat?: number;
  settleMs?: number;
};

export type Route = {
  name: string;
  steps: RouteStep[];
};

const STEP_STATES: ReadonlySet<string> = new Set(["RUNNING", "FIGHTING", "LOOTING"]);

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function num(obj: Json, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) throw new Error(`${where}: "${key}" must be a number`);
  return value;
}

function str(obj: Json, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string" || value.length === 0) throw new Error(`${where}: "${key}" must be a non-empty string`);
  return value;
}

function parseAction(raw: unknown, where: string): GameAction {
  if (!isObject(raw)) throw new Error(`${where}: action must be an object`);
  switch (raw.type) {
    case "click":
      return { type: "click", x: num(raw, "x", where), y: num(raw, "y", where), button: raw.button === "right" ? "right" : "left" };
    case "move":
      return { type: "move", x: num(raw, "x", where), y: num(raw, "y", where) };
    case "press":
      return typeof raw.holdMs === "number"
        ? { type: "press", key: str(raw, "key", where), holdMs: raw.holdMs }
        : { type: "press", key: str(raw, "key", where) };
    case "cast":
      return { type: "cast", key: str(raw, "key", where), x: num(raw, "x", where), y: num(raw, "y", where) };
    case "template-click":
      return { type: "template-click", template: str(raw, "template", where) };
    case "wait":
      return { type: "wait", ms: num(raw, "ms", where) };
    default:
      throw new Error(`${where}: unknown action type ${JSON.stringify(raw.type)}`);
  }
}

function isStepState(value: string): value is "RUNNING" | "FIGHTING" | "LOOTING" {
  return STEP_STATES.has(value);
}

export function parseRoute(raw: unknown): Route {
  if (!isObject(raw)) throw new Error("route must be an object");
  const name = str(raw, "name", "route");
  if (!Array.isArray(raw.steps) || raw.steps.length === 0) throw new Error(`route ${name}: "steps" must be a non-empty array`);

  const steps = raw.steps.map((entry: unknown, i: number): RouteStep => {
    const where = `route ${name} step ${i + 1}`;
    if (!isObject(entry)) throw new Error(`${where}: must be an object`);
    const step: RouteStep = { action: parseAction(entry.action, where) };
    if (entry.state !== undefined) {
      if (typeof entry.state !== "string" || !isStepState(entry.state)) {
        throw new Error(`${where}: state must be one of ${[...STEP_STATES].join(", ")}`);
      }
      step.state = entry.state;
    }
    if (entry.repeat !== undefined) {
      const repeat = num(entry, "repeat", where);
      if (!Number.isInteger(repeat) || repeat < 1) throw new Error(`${where}: "repeat" must be a positive integer`);
      step.repeat = repeat;
    }
    if (entry.settleMs !== undefined) step.settleMs = num(entry, "settleMs", where);
    return step;
  });

  return { name, steps };
}

export async function loadRoute(file: string): Promise<Route> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err: unknown) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "unknown";
    throw new ConfigError("ROUTE_FILE", `cannot read ${file} (${code})`);
  }
  try {
    return parseRoute(JSON.parse(raw));
  } catch (err: unknown) {
    throw new ConfigError("ROUTE_FILE", `${file}: ${describeError(err)}`);
  }
}

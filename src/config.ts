import { ConfigError } from "./utils/errors.js";

export type AlertMode = "QUIET" | "VERBOSE";

export type RecoveryConfig = {
  threshold: number;
  waitMs: number;
  maxConsecutiveRunFailures: number;
  maxDeathsPerSession: number;
  escapeBounds: { minX: number; maxX: number; minY: number; maxY: number };
};

export type HealthConfig = {
  intervalMs: number;
  sampleTimeoutMs: number;
  actionTimeoutMs: number;
  chickenHealthPercent: number;
  chickenManaPercent: number;
  warningHealthPercent: number;
  potionCooldownMs: number;
  potionSettleMs: number;
  healthPotionKey: string;
  rejuvPotionKey: string;
  bufferSize: number;
};

export type EscapeConfig = {
  cancelKey: string;
  saveExitTemplate: string;
  saveExitPosition: { x: number; y: number };
  cancelRepeat: number;
};

export type EngineConfig = {
  instanceId: string;
  tickIntervalMs: number;
  observationTimeoutMs: number;
  actionTimeoutMs: number;
  hookTimeoutMs: number;
  confidenceFloor: number;
  recovery: RecoveryConfig;
  health: HealthConfig;
  escape: EscapeConfig;
  stuck: { windowSize: number; epsilon: number };
  guards: { minHealthToStartRun: number };
  keys: { townPortal: string; cancel: string };
  runTimeoutMs: number;
  runCount: number;
  routeFile: string;
  bridgeUrl: string;
  alertMode: AlertMode;
  stateFile?: string;
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) throw new ConfigError(name, `expected an integer, got "${raw}"`);
  if (parsed < min) throw new ConfigError(name, `must be >= ${min}, got ${parsed}`);
  return parsed;
}

function readRatio(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigError(name, `expected a number in [0, 1], got "${raw}"`);
  }
  return parsed;
}

function readPercent(env: Env, name: string, fallback: number): number {
  const value = readInt(env, name, fallback);
  if (value > 100) throw new ConfigError(name, `must be <= 100, got ${value}`);
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === "object" && !Object.isFrozen(value)) deepFreeze(value);
  }
  return Object.freeze(obj);
}

/**
 * Read every engine option once. The returned object is frozen; components
 * copy what they need at construction.
 */
export function loadEngineConfig(env: Env = process.env): Readonly<EngineConfig> {
  const chickenHealthPercent = readPercent(env, "CHICKEN_HEALTH_PERCENT", 30);
  const warningHealthPercent = readPercent(env, "WARNING_HEALTH_PERCENT", Math.min(60, chickenHealthPercent + 20));
  if (warningHealthPercent < chickenHealthPercent) {
    throw new ConfigError("WARNING_HEALTH_PERCENT", `must be >= CHICKEN_HEALTH_PERCENT (${chickenHealthPercent})`);
  }

  const alertModeRaw = readString(env, "ALERT_MODE", "QUIET").toUpperCase();
  if (alertModeRaw !== "QUIET" && alertModeRaw !== "VERBOSE") {
    throw new ConfigError("ALERT_MODE", `expected QUIET or VERBOSE, got "${alertModeRaw}"`);
  }

  const actionTimeoutMs = readInt(env, "ACTION_TIMEOUT_MS", 3000, 1);
  const cancelKey = readString(env, "CANCEL_KEY", "escape");

  const config: EngineConfig = {
    instanceId: readString(env, "INSTANCE_ID", "autopilot-001"),
    tickIntervalMs: readInt(env, "TICK_INTERVAL_MS", 250, 1),
    observationTimeoutMs: readInt(env, "OBSERVATION_TIMEOUT_MS", 2000, 1),
    actionTimeoutMs,
    hookTimeoutMs: readInt(env, "HOOK_TIMEOUT_MS", 1000, 1),
    confidenceFloor: readRatio(env, "CONFIDENCE_FLOOR", 0.6),
    recovery: {
      threshold: readInt(env, "RETRY_THRESHOLD", 3, 1),
      waitMs: readInt(env, "RETRY_WAIT_MS", 1000),
      maxConsecutiveRunFailures: readInt(env, "MAX_CONSECUTIVE_RUN_FAILURES", 6, 1),
      maxDeathsPerSession: readInt(env, "MAX_DEATHS_PER_SESSION", 5, 1),
      escapeBounds: { minX: 400, maxX: 1500, minY: 200, maxY: 800 },
    },
    health: {
      intervalMs: readInt(env, "HEALTH_INTERVAL_MS", 100, 1),
      sampleTimeoutMs: readInt(env, "HEALTH_SAMPLE_TIMEOUT_MS", 500, 1),
      actionTimeoutMs,
      chickenHealthPercent,
      chickenManaPercent: readPercent(env, "CHICKEN_MANA_PERCENT", 0),
      warningHealthPercent,
      potionCooldownMs: readInt(env, "POTION_COOLDOWN_MS", 1000),
      potionSettleMs: 300,
      healthPotionKey: readString(env, "HEALTH_POTION_KEY", "1"),
      rejuvPotionKey: readString(env, "REJUV_POTION_KEY", "3"),
      bufferSize: 50,
    },
    escape: {
      cancelKey,
      saveExitTemplate: readString(env, "SAVE_EXIT_TEMPLATE", "save_and_exit"),
      saveExitPosition: { x: readInt(env, "SAVE_EXIT_X", 960), y: readInt(env, "SAVE_EXIT_Y", 540) },
      cancelRepeat: readInt(env, "CANCEL_REPEAT", 3, 1),
    },
    stuck: {
      windowSize: readInt(env, "STUCK_WINDOW", 5, 2),
      epsilon: readInt(env, "STUCK_EPSILON", 10),
    },
    guards: { minHealthToStartRun: readPercent(env, "MIN_HEALTH_TO_START_RUN", 50) },
    keys: { townPortal: readString(env, "TOWN_PORTAL_KEY", "t"), cancel: cancelKey },
    runTimeoutMs: readInt(env, "RUN_TIMEOUT_MS", 120000, 1),
    runCount: readInt(env, "RUN_COUNT", 0),
    routeFile: readString(env, "ROUTE_FILE", "config/routes/default.json"),
    bridgeUrl: readString(env, "BRIDGE_URL", "ws://127.0.0.1:8765"),
    alertMode: alertModeRaw,
    stateFile: env.STATE_FILE?.trim() || undefined,
  };

  return deepFreeze(config);
}

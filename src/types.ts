export const BOT_STATES = [
  "IDLE",
  "STARTING",
  "IN_TOWN",
  "RUNNING",
  "FIGHTING",
  "LOOTING",
  "RETURNING",
  "MANAGING_INVENTORY",
  "LEVELING_UP",
  "DEAD",
  "CHICKENED",
  "DISCONNECTED",
  "ERROR",
  "STOPPED",
] as const;

export type BotState = (typeof BOT_STATES)[number];

export type TransitionPriority = "normal" | "preemptive";

export const UNKNOWN = "UNKNOWN" as const;
export type Unknown = typeof UNKNOWN;

export type Observation = {
  label: string;
  confidence: number; // 0..1
  timestamp: number;
  readouts: Record<string, number>;
  activity?: string; // coarse activity marker when no coordinates are available
};

export type ObservationResult = Observation | Unknown;

export interface ObservationPort {
  observe(): Promise<ObservationResult>;
}

export type GameAction =
  | { type: "click"; x: number; y: number; button?: "left" | "right" }
  | { type: "move"; x: number; y: number }
  | { type: "press"; key: string; holdMs?: number }
  | { type: "cast"; key: string; x: number; y: number }
  | { type: "template-click"; template: string }
  | { type: "wait"; ms: number };

export type ActionResult = { ok: true } | { ok: false; error: string };

export interface ActionPort {
  /** Rejects with a TimeoutError when the game never answers. */
  perform(action: GameAction): Promise<ActionResult>;
}

export const ERROR_SEVERITIES = ["Critical", "RunEnding", "Recoverable"] as const;
export type ErrorSeverity = (typeof ERROR_SEVERITIES)[number];

export const ERROR_KINDS = [
  "stuck",
  "observation-timeout",
  "action-timeout",
  "inventory-full",
  "character-death",
  "disconnect",
  "process-crash",
  "unknown-state",
  "handler-fault",
  "health-sample-timeout",
  "escape-failed",
  "escape-exhausted",
] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

const ERROR_KIND_SET: ReadonlySet<string> = new Set<string>(ERROR_KINDS);

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KIND_SET.has(value);
}

/** Raw fault as reported by a component, before classification. */
export type ErrorSignal = {
  kind: ErrorKind;
  message?: string;
  source?: string;
  severity?: ErrorSeverity; // explicit override, otherwise looked up in the catalog
};

export type ErrorEvent = {
  id: number;
  kind: ErrorKind;
  severity: ErrorSeverity;
  originState: BotState;
  timestamp: number;
  message: string;
  source: string;
};

export type RunResult = {
  success: boolean;
  next?: BotState;
  error?: ErrorSignal;
  aborted?: boolean;
  durationMs?: number;
  note?: string;
};

export type HealthReading = {
  healthPercent: number;
  manaPercent?: number;
  timestamp: number;
};

export type EngineEventType =
  | "STARTUP"
  | "TRANSITION"
  | "TRANSITION_REJECTED"
  | "ERROR_EVENT"
  | "RECOVERY"
  | "ESCALATION"
  | "CRITICAL"
  | "CHICKEN"
  | "RUN_COMPLETE"
  | "PAUSED"
  | "RESUMED"
  | "STOPPED";

export type EngineEvent = {
  type: EngineEventType;
  timestamp: number;
  instanceId: string;
  data: Record<string, unknown>;
};

/** Fire-and-forget collaborator for logs and operator alerts. */
export interface EngineEventSink {
  publish(event: EngineEvent): void;
}

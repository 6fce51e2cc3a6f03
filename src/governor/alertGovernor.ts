import type { AlertMode } from "../config.js";
import type { EngineEvent, EngineEventType } from "../types.js";
import type { GovernorPersistedState } from "../persistence/persistedState.js";

// STARTUP goes out through the throttled startup announcement instead.
const QUIET_TYPES: ReadonlySet<EngineEventType> = new Set<EngineEventType>(["CRITICAL", "CHICKEN", "RESUMED"]);
const VERBOSE_TYPES: ReadonlySet<EngineEventType> = new Set<EngineEventType>([
  ...QUIET_TYPES,
  "ESCALATION",
  "RUN_COMPLETE",
  "PAUSED",
  "STOPPED",
]);

export type AlertGovernorOptions = {
  dedupeTtlMs?: number;
  dedupeMaxKeys?: number;
  now?: () => number;
};

export class AlertGovernor {
  private mode: AlertMode;
  private dedupe: Map<string, number> = new Map();
  private readonly dedupeMaxKeys: number;
  private readonly dedupeTtlMs: number;
  private readonly now: () => number;

  constructor(mode: AlertMode, initial?: GovernorPersistedState, opts: AlertGovernorOptions = {}) {
    this.mode = mode;
    this.dedupeMaxKeys = opts.dedupeMaxKeys ?? 500;
    this.dedupeTtlMs = opts.dedupeTtlMs ?? 6 * 60 * 60 * 1000; // 6h
    this.now = opts.now ?? Date.now;

    if (initial?.dedupe) {
      for (const [k, v] of Object.entries(initial.dedupe)) {
        if (typeof v === "number" && Number.isFinite(v)) this.dedupe.set(k, v);
      }
      this.pruneDedupe(this.now());
    }
  }

  setMode(mode: AlertMode): void {
    this.mode = mode;
  }

  getMode(): AlertMode {
    return this.mode;
  }

  exportState(): GovernorPersistedState {
    const dedupe: Record<string, number> = {};
    for (const [k, v] of this.dedupe.entries()) dedupe[k] = v;
    return { dedupe: Object.keys(dedupe).length ? dedupe : undefined };
  }

  /**
   * Single choke point for operator alerts.
   * Returns true if the event should be sent, false if blocked.
   */
  shouldSend(event: EngineEvent): boolean {
    const allowed = this.mode === "VERBOSE" ? VERBOSE_TYPES : QUIET_TYPES;
    if (!allowed.has(event.type)) return false;

    // Non-fatal escalations only go out in VERBOSE, fatal ones arrive as CRITICAL anyway.
    if (event.type === "ESCALATION" && event.data.to !== "RunEnding") return false;

    const key = this.getDedupeKey(event);
    if (this.hasDedupe(key)) return false;
    this.markDedupe(key, this.now());
    return true;
  }

  private getDedupeKey(event: EngineEvent): string {
    const kind = typeof event.data.kind === "string" ? event.data.kind : "";
    // Repeats of the same fault within a minute collapse into one alert.
    if (event.type === "CRITICAL" || event.type === "ESCALATION") {
      return `${event.instanceId}_${event.type}_${kind}_${Math.floor(event.timestamp / 60000)}`;
    }
    return `${event.instanceId}_${event.type}_${event.timestamp}`;
  }

  private pruneDedupe(nowMs: number): void {
    for (const [k, v] of this.dedupe.entries()) {
      if (nowMs - v > this.dedupeTtlMs) this.dedupe.delete(k);
    }

    if (this.dedupe.size <= this.dedupeMaxKeys) return;
    const entries = [...this.dedupe.entries()].sort((a, b) => a[1] - b[1]);
    const toRemove = this.dedupe.size - this.dedupeMaxKeys;
    for (let i = 0; i < toRemove; i++) this.dedupe.delete(entries[i]![0]);
  }

  private hasDedupe(key: string): boolean {
    const v = this.dedupe.get(key);
    if (typeof v !== "number") return false;
    if (this.now() - v > this.dedupeTtlMs) {
      this.dedupe.delete(key);
      return false;
    }
    return true;
  }

  private markDedupe(key: string, atMs: number): void {
    this.dedupe.set(key, atMs);
    this.pruneDedupe(atMs);
  }
}

import type { EngineEvent, EngineEventSink, ErrorKind } from "../types.js";
import { isErrorKind } from "../types.js";
import type { StatsPersistedState } from "../persistence/persistedState.js";

export type StatsSnapshot = StatsPersistedState & {
  sessionStartedAt: number;
  sessionRuns: number;
  successRate: number; // percent
  avgRunMs: number;
  runsPerHour: number; // this session
};

function emptyTotals(): StatsPersistedState {
  return {
    runs: 0,
    successfulRuns: 0,
    failedRuns: 0,
    chickenedRuns: 0,
    totalRunMs: 0,
    deaths: 0,
    chickens: 0,
    errorsByKind: {},
  };
}

/**
 * Farming statistics. Totals survive restarts through StateStore; the
 * per-hour rate only counts this process.
 *
 * Also an EngineEventSink: RUN_COMPLETE, CHICKEN and ERROR_EVENT feed it.
 */
export class SessionStats implements EngineEventSink {
  private totals: StatsPersistedState = emptyTotals();
  private readonly sessionStartedAt: number;
  private sessionRuns = 0;
  private chickenSinceLastRun = false;

  constructor(private readonly now: () => number = Date.now) {
    this.sessionStartedAt = this.now();
  }

  restore(state: StatsPersistedState): void {
    this.totals = { ...emptyTotals(), ...state, errorsByKind: { ...state.errorsByKind } };
  }

  export(): StatsPersistedState {
    return { ...this.totals, errorsByKind: { ...this.totals.errorsByKind } };
  }

  recordRun(success: boolean, durationMs: number, chickened = false): void {
    this.totals.runs += 1;
    this.sessionRuns += 1;
    this.totals.totalRunMs += Math.max(0, durationMs);
    if (success) this.totals.successfulRuns += 1;
    else if (chickened) this.totals.chickenedRuns += 1;
    else this.totals.failedRuns += 1;
  }

  recordDeath(): void {
    this.totals.deaths += 1;
  }

  recordChicken(): void {
    this.totals.chickens += 1;
  }

  recordError(kind: ErrorKind): void {
    this.totals.errorsByKind[kind] = (this.totals.errorsByKind[kind] ?? 0) + 1;
  }

  snapshot(): StatsSnapshot {
    const t = this.totals;
    const hours = (this.now() - this.sessionStartedAt) / 3_600_000;
    return {
      ...this.export(),
      sessionStartedAt: this.sessionStartedAt,
      sessionRuns: this.sessionRuns,
      successRate: t.runs > 0 ? (t.successfulRuns / t.runs) * 100 : 0,
      avgRunMs: t.runs > 0 ? t.totalRunMs / t.runs : 0,
      runsPerHour: hours > 0 ? this.sessionRuns / hours : 0,
    };
  }

  publish(event: EngineEvent): void {
    const d = event.data;
    switch (event.type) {
      case "RUN_COMPLETE": {
        const success = d.success === true;
        const durationMs = typeof d.durationMs === "number" ? d.durationMs : 0;
        this.recordRun(success, durationMs, !success && this.chickenSinceLastRun);
        this.chickenSinceLastRun = false;
        break;
      }
      case "CHICKEN":
        this.recordChicken();
        this.chickenSinceLastRun = true;
        break;
      case "ERROR_EVENT": {
        const kind = d.kind;
        if (typeof kind !== "string" || !isErrorKind(kind)) break;
        this.recordError(kind);
        if (kind === "character-death") this.recordDeath();
        break;
      }
      default:
        break;
    }
  }

  format(): string {
    const s = this.snapshot();
    const errors = Object.entries(s.errorsByKind)
      .sort((a, b) => (b[1] ?? 0) - (a[1] ?? 0))
      .map(([kind, count]) => `${kind}=${count}`)
      .join(", ");
    return [
      "=== Session Stats ===",
      `Runs: ${s.runs} (ok ${s.successfulRuns}, failed ${s.failedRuns}, chickened ${s.chickenedRuns})`,
      `Success rate: ${s.successRate.toFixed(1)}%`,
      `Avg run: ${(s.avgRunMs / 1000).toFixed(1)}s`,
      `This session: ${s.sessionRuns} runs, ${s.runsPerHour.toFixed(1)}/h`,
      `Deaths: ${s.deaths} | Chickens: ${s.chickens}`,
      `Errors: ${errors || "none"}`,
    ].join("\n");
  }
}

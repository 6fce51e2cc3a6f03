import type {
  ActionPort,
  BotState,
  EngineEventSink,
  EngineEventType,
  ErrorEvent,
  ErrorKind,
  ErrorSeverity,
  ErrorSignal,
  GameAction,
} from "../types.js";
import type { RecoveryConfig } from "../config.js";
import type { TransitionRequester } from "../orchestrator/stateMachine.js";
import { DEFAULT_ERROR_CATALOG, classify, type ErrorCatalog, type RecoveryAction } from "./errorCatalog.js";
import { RetryBudget, type RetryBudgetSnapshot } from "./retryBudget.js";
import { orderErrorEvents } from "./eventOrder.js";
import { describeError } from "../utils/errors.js";
import { sleep as defaultSleep, withTimeout } from "../utils/timeouts.js";

export type RecoveryPhase = "Detected" | "Classified" | "RecoveryAttempted" | "Resolved" | "Escalated";

export type RecoveryResolution = "continue" | "end-run" | "pause" | "suppressed";

export type RecoveryRecord = {
  event: ErrorEvent;
  phases: RecoveryPhase[];
  severity: ErrorSeverity; // effective severity after any escalation
  escalatedFrom?: ErrorSeverity;
  recovery?: RecoveryAction;
  recovered: boolean;
  resolution: RecoveryResolution;
  note?: string;
};

export type RecoveryCoordinatorOptions = {
  stateMachine: TransitionRequester;
  config: RecoveryConfig;
  actions?: ActionPort | null;
  events?: EngineEventSink | null;
  catalog?: ErrorCatalog;
  instanceId?: string;
  actionTimeoutMs?: number;
  cancelKey?: string;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  historySize?: number;
};

const RUN_STATES: BotState[] = ["RUNNING", "FIGHTING", "LOOTING", "RETURNING"];
// budgets that only count within one run
const RUN_SCOPED_KINDS: ErrorKind[] = ["stuck", "inventory-full"];

/**
 * Single consumer of every ErrorEvent in the engine. Owns all retry budgets.
 *
 * Degraded behaviour: without an ActionPort, random-escape and
 * cancel-and-retry cannot act and count as failed recoveries; without an
 * event sink, alerts only reach the console.
 */
export class RecoveryCoordinator {
  private readonly sm: TransitionRequester;
  private readonly config: RecoveryConfig;
  private readonly actions: ActionPort | null;
  private readonly events: EngineEventSink | null;
  private readonly catalog: ErrorCatalog;
  private readonly instanceId: string;
  private readonly actionTimeoutMs: number;
  private readonly cancelKey: string;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly historySize: number;

  private budgets = new Map<ErrorKind, RetryBudget>();
  private queue: ErrorEvent[] = [];
  private eventSeq = 0;
  private paused = false;
  private pauseReason: string | null = null;
  private processing: Promise<RecoveryRecord[]> | null = null;

  private runEndingTally = 0; // this run
  private consecutiveRunFailures = 0; // across runs, reset by a successful run
  private deaths = 0;
  private history: RecoveryRecord[] = [];
  private pauseListeners: ((reason: string) => void)[] = [];

  constructor(opts: RecoveryCoordinatorOptions) {
    this.sm = opts.stateMachine;
    this.config = opts.config;
    this.actions = opts.actions ?? null;
    this.events = opts.events ?? null;
    this.catalog = opts.catalog ?? DEFAULT_ERROR_CATALOG;
    this.instanceId = opts.instanceId ?? "local";
    this.actionTimeoutMs = opts.actionTimeoutMs ?? 3000;
    this.cancelKey = opts.cancelKey ?? "escape";
    this.random = opts.random ?? Math.random;
    this.sleep = opts.sleep ?? defaultSleep;
    this.now = opts.now ?? Date.now;
    this.historySize = opts.historySize ?? 200;
  }

  /** Normalize a raw signal into an ErrorEvent and queue it. Never throws. */
  submit(signal: ErrorSignal): ErrorEvent {
    const entry = classify(signal.kind, this.catalog);
    const event: ErrorEvent = {
      id: ++this.eventSeq,
      kind: signal.kind,
      severity: signal.severity ?? entry.severity,
      originState: this.sm.currentState(),
      timestamp: this.now(),
      message: signal.message ?? entry.description,
      source: signal.source ?? "unknown",
    };
    this.queue.push(event);
    console.warn(`[Recovery] detected ${event.kind} (${event.severity}) in ${event.originState} from ${event.source}: ${event.message}`);
    this.emit("ERROR_EVENT", { ...event });
    return event;
  }

  pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Drain the queue, most severe first. Each event is consumed exactly once.
   * Concurrent callers share one drain.
   */
  async processPending(): Promise<RecoveryRecord[]> {
    if (this.processing) return this.processing;
    this.processing = this.drain();
    try {
      return await this.processing;
    } finally {
      this.processing = null;
    }
  }

  /** Submit and process immediately. */
  async handle(signal: ErrorSignal): Promise<RecoveryRecord | undefined> {
    const event = this.submit(signal);
    const records = await this.processPending();
    return records.find((r) => r.event.id === event.id);
  }

  /** The fault condition for this kind was observed cleared after a recovery. */
  confirmRecovered(kind: ErrorKind): void {
    const budget = this.budgets.get(kind);
    if (!budget) return;
    if (budget.snapshot().consecutiveFailures > 0) {
      console.log(`[Recovery] ${kind} recovered, budget reset`);
    }
    budget.reset();
  }

  /** A run finished cleanly: run-level tallies start over. */
  recordRunSuccess(): void {
    this.runEndingTally = 0;
    this.consecutiveRunFailures = 0;
  }

  /** A new run is starting: the per-run tally and run-scoped budgets start over. */
  beginRun(): void {
    this.runEndingTally = 0;
    for (const kind of RUN_SCOPED_KINDS) this.budgets.get(kind)?.reset();
  }

  isPaused(): boolean {
    return this.paused;
  }

  getPauseReason(): string | null {
    return this.pauseReason;
  }

  onPause(listener: (reason: string) => void): void {
    this.pauseListeners.push(listener);
  }

  /** Operator pause; same effect as a Critical error without the ERROR transition. */
  pause(reason: string): void {
    if (this.paused) return;
    this.paused = true;
    this.pauseReason = reason;
    console.warn(`[Recovery] paused: ${reason}`);
    this.emit("PAUSED", { reason });
    for (const listener of this.pauseListeners) {
      try {
        listener(reason);
      } catch (err: unknown) {
        console.error(`[Recovery] pause listener error: ${describeError(err)}`);
      }
    }
  }

  /** External resume after a Critical pause. Clears budgets and tallies; leaves ERROR for IDLE. */
  async resume(): Promise<boolean> {
    if (!this.paused) return false;
    this.paused = false;
    const reason = this.pauseReason;
    this.pauseReason = null;
    this.queue = [];
    for (const budget of this.budgets.values()) budget.reset();
    this.runEndingTally = 0;
    this.consecutiveRunFailures = 0;

    if (this.sm.currentState() === "ERROR") {
      const outcome = await this.sm.requestTransition("IDLE", "normal", "recovery");
      if (!outcome.accepted) console.warn(`[Recovery] resume could not leave ERROR: ${outcome.error.message}`);
    }
    console.log(`[Recovery] resumed (was: ${reason ?? "n/a"})`);
    this.emit("RESUMED", { previousReason: reason });
    return true;
  }

  getBudget(kind: ErrorKind): RetryBudgetSnapshot {
    return this.budgetFor(kind).snapshot();
  }

  getHistory(): RecoveryRecord[] {
    return [...this.history];
  }

  getTallies(): { runEnding: number; consecutiveRunFailures: number; deaths: number } {
    return {
      runEnding: this.runEndingTally,
      consecutiveRunFailures: this.consecutiveRunFailures,
      deaths: this.deaths,
    };
  }

  /** Percentage of attempted recoveries whose action went through. */
  getRecoveryRate(): number {
    const attempted = this.history.filter((r) => r.phases.includes("RecoveryAttempted"));
    if (attempted.length === 0) return 0;
    return (attempted.filter((r) => r.recovered).length / attempted.length) * 100;
  }

  private budgetFor(kind: ErrorKind): RetryBudget {
    let budget = this.budgets.get(kind);
    if (!budget) {
      budget = new RetryBudget(this.config.threshold, this.now);
      this.budgets.set(kind, budget);
    }
    return budget;
  }

  private async drain(): Promise<RecoveryRecord[]> {
    const records: RecoveryRecord[] = [];
    while (this.queue.length > 0) {
      const batch = orderErrorEvents(this.queue);
      this.queue = [];
      for (const event of batch) {
        const record = this.paused ? this.suppress(event) : await this.process(event);
        records.push(record);
        this.remember(record);
      }
    }
    return records;
  }

  private suppress(event: ErrorEvent): RecoveryRecord {
    console.warn(`[Recovery] ${event.kind} dropped while paused (${this.pauseReason ?? "n/a"})`);
    return {
      event,
      phases: ["Detected"],
      severity: event.severity,
      recovered: false,
      resolution: "suppressed",
      note: "engine paused",
    };
  }

  private async process(event: ErrorEvent): Promise<RecoveryRecord> {
    const phases: RecoveryPhase[] = ["Detected", "Classified"];
    switch (event.severity) {
      case "Recoverable":
        return this.processRecoverable(event, phases);
      case "RunEnding":
        return this.processRunEnding(event, phases, undefined);
      case "Critical":
        return this.processCritical(event, phases, undefined, event.message);
    }
  }

  private async processRecoverable(event: ErrorEvent, phases: RecoveryPhase[]): Promise<RecoveryRecord> {
    const budget = this.budgetFor(event.kind);
    if (budget.recordFailure()) {
      const note = `${event.kind} failed more than ${budget.threshold} consecutive times`;
      console.warn(`[Recovery] escalating ${event.kind}: ${note}`);
      this.emit("ESCALATION", { kind: event.kind, from: "Recoverable", to: "RunEnding", note });
      return this.processRunEnding(event, [...phases, "Escalated"], "Recoverable", note);
    }

    const recovery = classify(event.kind, this.catalog).recovery;
    phases.push("RecoveryAttempted");
    let recovered = false;
    let note: string | undefined;
    try {
      recovered = await this.attemptRecovery(recovery, event);
    } catch (err: unknown) {
      note = describeError(err);
      console.error(`[Recovery] ${recovery} for ${event.kind} threw: ${note}`);
    }
    phases.push("Resolved");

    const snapshot = budget.snapshot();
    console.log(
      `[Recovery] ${event.kind}: ${recovery} ${recovered ? "done" : "failed"} (${snapshot.consecutiveFailures}/${snapshot.threshold})`
    );
    const record: RecoveryRecord = {
      event,
      phases,
      severity: "Recoverable",
      recovery,
      recovered,
      resolution: "continue",
      note,
    };
    this.emit("RECOVERY", {
      kind: event.kind,
      recovery,
      recovered,
      consecutiveFailures: snapshot.consecutiveFailures,
      threshold: snapshot.threshold,
    });
    return record;
  }

  private async processRunEnding(
    event: ErrorEvent,
    phases: RecoveryPhase[],
    escalatedFrom: ErrorSeverity | undefined,
    note?: string
  ): Promise<RecoveryRecord> {
    this.runEndingTally += 1;
    this.consecutiveRunFailures += 1;
    if (event.kind === "character-death") this.deaths += 1;

    if (this.deaths > this.config.maxDeathsPerSession) {
      const reason = `${this.deaths} deaths this session (max ${this.config.maxDeathsPerSession})`;
      return this.processCritical(event, [...phases, "Escalated"], escalatedFrom ?? "RunEnding", reason);
    }
    if (this.consecutiveRunFailures > this.config.maxConsecutiveRunFailures) {
      const reason = `${this.consecutiveRunFailures} consecutive runs ended early (max ${this.config.maxConsecutiveRunFailures})`;
      return this.processCritical(event, [...phases, "Escalated"], escalatedFrom ?? "RunEnding", reason);
    }

    const target = classify(event.kind, this.catalog).runEndState;
    const current = this.sm.currentState();
    let resolutionNote = note;
    if (current === target) {
      resolutionNote = `already in ${target}`;
    } else if (RUN_STATES.includes(current) || this.sm.canTransition(target)) {
      const outcome = await this.sm.requestTransition(target, "preemptive", "recovery");
      if (!outcome.accepted) resolutionNote = outcome.error.message;
    } else {
      resolutionNote = `run already over in ${current}`;
    }

    console.warn(
      `[Recovery] run ending on ${event.kind} -> ${target} (run tally ${this.runEndingTally}, consecutive ${this.consecutiveRunFailures})`
    );
    if (!phases.includes("Escalated")) phases.push("Resolved");
    return {
      event,
      phases,
      severity: "RunEnding",
      escalatedFrom,
      recovered: false,
      resolution: "end-run",
      note: resolutionNote,
    };
  }

  private async processCritical(
    event: ErrorEvent,
    phases: RecoveryPhase[],
    escalatedFrom: ErrorSeverity | undefined,
    reason: string
  ): Promise<RecoveryRecord> {
    console.error(`[Recovery] CRITICAL ${event.kind} in ${event.originState}: ${reason}`);
    if (escalatedFrom) {
      this.emit("ESCALATION", { kind: event.kind, from: escalatedFrom, to: "Critical", note: reason });
    }

    if (this.sm.canTransition("ERROR")) {
      const outcome = await this.sm.requestTransition("ERROR", "preemptive", "recovery");
      if (!outcome.accepted) console.warn(`[Recovery] could not enter ERROR: ${outcome.error.message}`);
    }

    this.emit("CRITICAL", {
      kind: event.kind,
      originState: event.originState,
      reason,
      message: `Bot paused: ${event.kind} (${reason}). Send /resume once fixed.`,
    });
    this.pause(`${event.kind}: ${reason}`);

    if (!phases.includes("Escalated")) phases.push("Resolved");
    return {
      event,
      phases,
      severity: "Critical",
      escalatedFrom,
      recovered: false,
      resolution: "pause",
      note: reason,
    };
  }

  private async attemptRecovery(recovery: RecoveryAction, event: ErrorEvent): Promise<boolean> {
    switch (recovery) {
      case "random-escape": {
        const b = this.config.escapeBounds;
        const x = Math.round(b.minX + this.random() * (b.maxX - b.minX));
        const y = Math.round(b.minY + this.random() * (b.maxY - b.minY));
        return this.perform({ type: "click", x, y });
      }
      case "wait-and-retry":
        await this.sleep(this.config.waitMs);
        return true;
      case "cancel-and-retry": {
        const ok = await this.perform({ type: "press", key: this.cancelKey });
        await this.sleep(this.config.waitMs);
        return ok;
      }
      case "end-of-run-handoff": {
        const current = this.sm.currentState();
        if (!RUN_STATES.includes(current) || current === "RETURNING") return true;
        const outcome = await this.sm.requestTransition("RETURNING", "normal", "recovery");
        return outcome.accepted;
      }
      case "none":
        console.log(`[Recovery] no automatic recovery for ${event.kind}`);
        return false;
    }
  }

  private async perform(action: GameAction): Promise<boolean> {
    if (!this.actions) {
      console.warn(`[Recovery] no action port, cannot ${action.type}`);
      return false;
    }
    try {
      const result = await withTimeout(this.actions.perform(action), this.actionTimeoutMs, `recovery ${action.type}`);
      if (!result.ok) console.warn(`[Recovery] ${action.type} failed: ${result.error}`);
      return result.ok;
    } catch (err: unknown) {
      console.warn(`[Recovery] ${action.type} failed: ${describeError(err)}`);
      return false;
    }
  }

  private remember(record: RecoveryRecord): void {
    this.history.push(record);
    if (this.history.length > this.historySize) this.history.shift();
  }

  private emit(type: EngineEventType, data: Record<string, unknown>): void {
    if (!this.events) return;
    try {
      this.events.publish({ type, timestamp: this.now(), instanceId: this.instanceId, data });
    } catch (err: unknown) {
      console.error(`[Recovery] event sink error: ${describeError(err)}`);
    }
  }
}

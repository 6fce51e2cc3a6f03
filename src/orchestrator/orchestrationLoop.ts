import type {
  ActionPort,
  ActionResult,
  BotState,
  EngineEventSink,
  EngineEventType,
  GameAction,
  Observation,
  ObservationPort,
  ObservationResult,
  RunResult,
} from "../types.js";
import { UNKNOWN } from "../types.js";
import type { BotStateMachine, TransitionRecord } from "./stateMachine.js";
import type { RecoveryCoordinator } from "../recovery/recoveryCoordinator.js";
import type { StuckDetector } from "../recovery/stuckDetector.js";
import type { DomainHandler, HandlerContext, HandlerRegistry } from "../runs/domainHandler.js";
import { isInRunState } from "./transitionGraph.js";
import { TimeoutError, describeError } from "../utils/errors.js";
import { sleepUnlessAborted, withTimeout } from "../utils/timeouts.js";
import { yieldNow } from "../utils/yieldNow.js";

export type LoopSettings = {
  instanceId: string;
  tickIntervalMs: number;
  observationTimeoutMs: number;
  actionTimeoutMs: number;
  confidenceFloor: number;
  runLimit: number; // 0 = unlimited
};

export type TickReport = {
  state: BotState;
  observation: "ok" | "unknown" | "skipped";
  completed?: string; // handler whose result was interpreted this tick
  launched?: string;
};

type HandlerOutcome = { ok: true; result: RunResult } | { ok: false; error: unknown };

type ActiveHandler = {
  handler: DomainHandler;
  tag: string;
  launchState: BotState;
  ownedState: BotState;
  startedAt: number;
  controller: AbortController;
  done: Promise<void>;
  outcome: HandlerOutcome | null;
};

const RUN_ONLY: BotState[] = ["RUNNING", "FIGHTING", "LOOTING"];

/**
 * Main loop: observe, detect faults, interpret finished handlers, drain
 * recovery, launch the handler for the current state, yield.
 *
 * Handlers run as tracked promises between ticks. A handler owns the states
 * it moves into itself; any other transition aborts it through its signal.
 * Without an ActionPort, handler actions fail with "no action port".
 */
export class OrchestrationLoop {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private ticking: Promise<TickReport> | null = null;
  private active: ActiveHandler | null = null;
  private dispatchSeq = 0;
  private completedRuns = 0;
  private inventoryFullReported = false;
  private lastObservationAt: number | null = null;

  constructor(
    private readonly settings: LoopSettings,
    private readonly sm: BotStateMachine,
    private readonly coordinator: RecoveryCoordinator,
    private readonly observer: ObservationPort,
    private readonly actions: ActionPort | null,
    private readonly handlers: HandlerRegistry,
    private readonly stuck: StuckDetector | null = null,
    private readonly events: EngineEventSink | null = null,
    private readonly now: () => number = Date.now
  ) {
    this.sm.onTransition((record) => this.onTransition(record));
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    console.log(`[Loop] started (tick ${this.settings.tickIntervalMs}ms, ${Object.keys(this.handlers).length} handlers)`);
    this.schedule();
  }

  /** Stops ticking, aborts any running handler and waits for it to settle. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.ticking) await this.ticking;
    if (this.active) {
      this.active.controller.abort();
      await this.active.done;
      this.active = null;
    }
    console.log(`[Loop] stopped after ${this.completedRuns} runs`);
  }

  isRunning(): boolean {
    return this.running;
  }

  completedRunCount(): number {
    return this.completedRuns;
  }

  activeHandler(): string | null {
    return this.active?.handler.name ?? null;
  }

  lastObservationTime(): number | null {
    return this.lastObservationAt;
  }

  /** Resolves once the handler in flight (if any) has returned. */
  async idle(): Promise<void> {
    if (this.active) await this.active.done;
  }

  /** One tick. Overlapping calls share the tick in progress. */
  async tick(): Promise<TickReport> {
    if (this.ticking) return this.ticking;
    this.ticking = this.runTick();
    try {
      return await this.ticking;
    } finally {
      this.ticking = null;
    }
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick()
        .catch((err: unknown) => console.error(`[Loop] tick error: ${describeError(err)}`))
        .finally(() => this.schedule());
    }, this.settings.tickIntervalMs);
  }

  private async runTick(): Promise<TickReport> {
    if (this.sm.isStopped()) {
      this.running = false;
      return { state: this.sm.currentState(), observation: "skipped" };
    }
    if (this.coordinator.isPaused()) {
      return { state: this.sm.currentState(), observation: "skipped" };
    }

    const report: TickReport = { state: this.sm.currentState(), observation: "unknown" };

    const obs = await this.observe();
    if (obs) {
      report.observation = "ok";
      this.sm.updateObservation(obs);
      this.lastObservationAt = obs.timestamp;
      this.coordinator.confirmRecovered("observation-timeout");
      this.inspect(obs);
    }

    if (this.active?.outcome) {
      report.completed = this.active.handler.name;
      await this.interpret(this.active);
    }

    await this.coordinator.processPending();

    if (!this.sm.isStopped()) {
      const launched = this.launch();
      if (launched) report.launched = launched;
    }

    report.state = this.sm.currentState();
    await yieldNow();
    return report;
  }

  private async observe(): Promise<Observation | null> {
    let result: ObservationResult;
    try {
      result = await withTimeout(this.observer.observe(), this.settings.observationTimeoutMs, "observe");
    } catch (err: unknown) {
      this.coordinator.submit({ kind: "observation-timeout", message: describeError(err), source: "loop" });
      return null;
    }
    if (result === UNKNOWN) {
      this.coordinator.submit({ kind: "observation-timeout", message: "observation port returned UNKNOWN", source: "loop" });
      return null;
    }
    if (result.confidence < this.settings.confidenceFloor) {
      this.coordinator.submit({
        kind: "observation-timeout",
        message: `"${result.label}" at confidence ${result.confidence.toFixed(2)} below floor ${this.settings.confidenceFloor}`,
        source: "loop",
      });
      return null;
    }
    return result;
  }

  private inspect(obs: Observation): void {
    const state = this.sm.currentState();

    if (obs.label === "dead" && state !== "DEAD") {
      this.coordinator.submit({ kind: "character-death", message: `death screen seen in ${state}`, source: "loop" });
    } else if (obs.label === "disconnected" && state !== "DISCONNECTED") {
      this.coordinator.submit({ kind: "disconnect", message: `disconnect screen seen in ${state}`, source: "loop" });
    } else if (obs.label === "main_menu" && isInRunState(state)) {
      this.coordinator.submit({ kind: "unknown-state", message: `main menu seen in ${state}`, source: "loop" });
    }

    const free = obs.readouts.inventoryFree;
    if (RUN_ONLY.includes(state) && free === 0 && !this.inventoryFullReported) {
      this.inventoryFullReported = true;
      this.coordinator.submit({ kind: "inventory-full", message: "no free inventory slots", source: "loop" });
    } else if (typeof free === "number" && free > 0) {
      this.coordinator.confirmRecovered("inventory-full");
    }

    if (this.stuck && (state === "RUNNING" || state === "RETURNING")) {
      const x = obs.readouts.x;
      const y = obs.readouts.y;
      let moved = false;
      if (typeof x === "number" && typeof y === "number") {
        moved = this.stuck.observe({ kind: "position", x, y, timestamp: obs.timestamp });
      } else if (obs.activity) {
        moved = this.stuck.observe({ kind: "activity", marker: obs.activity, timestamp: obs.timestamp });
      }
      if (moved) this.coordinator.confirmRecovered("stuck");
      this.stuck.isStuck();
    }
  }

  private launch(): string | null {
    if (this.active) return null;
    const state = this.sm.currentState();
    const handler = this.handlers[state];
    if (!handler) return null;

    const tag = `handler:${handler.name}#${++this.dispatchSeq}`;
    const controller = new AbortController();
    const active: ActiveHandler = {
      handler,
      tag,
      launchState: state,
      ownedState: state,
      startedAt: this.now(),
      controller,
      done: Promise.resolve(),
      outcome: null,
    };

    if (handler.kind === "run") {
      this.coordinator.beginRun();
      this.stuck?.reset();
      this.inventoryFullReported = false;
    }

    // Registered before invoking so the handler's first transition is already recognised as its own.
    this.active = active;
    active.done = this.invoke(handler, this.contextFor(active)).then(
      (result) => {
        active.outcome = { ok: true, result };
      },
      (error: unknown) => {
        active.outcome = { ok: false, error };
      }
    );
    console.log(`[Loop] ${handler.name} launched in ${state}`);
    return handler.name;
  }

  // Synchronous throws from execute() become rejections.
  private async invoke(handler: DomainHandler, ctx: HandlerContext): Promise<RunResult> {
    return handler.execute(ctx);
  }

  private contextFor(active: ActiveHandler): HandlerContext {
    return {
      state: active.launchState,
      signal: active.controller.signal,
      currentState: () => this.sm.currentState(),
      observation: () => this.sm.lastObservation(),
      perform: (action) => this.perform(action, active.handler.name),
      requestTransition: (to) => this.sm.requestTransition(to, "normal", active.tag),
      report: (kind, message) => {
        this.coordinator.submit({ kind, message, source: active.handler.name });
      },
      sleep: (ms) => sleepUnlessAborted(ms, active.controller.signal),
    };
  }

  private async perform(action: GameAction, source: string): Promise<ActionResult> {
    if (!this.actions) return { ok: false, error: "no action port" };
    try {
      const result = await withTimeout(this.actions.perform(action), this.settings.actionTimeoutMs, `${source} ${action.type}`);
      if (result.ok) this.coordinator.confirmRecovered("action-timeout");
      return result;
    } catch (err: unknown) {
      if (err instanceof TimeoutError) {
        this.coordinator.submit({ kind: "action-timeout", message: err.message, source });
      }
      return { ok: false, error: describeError(err) };
    }
  }

  private onTransition(record: TransitionRecord): void {
    const active = this.active;
    if (!active) return;
    if (record.requestedBy === active.tag) {
      active.ownedState = record.to;
      return;
    }
    if (!active.controller.signal.aborted) {
      console.log(`[Loop] ${active.handler.name} abandoned: ${record.from} -> ${record.to} by ${record.requestedBy}`);
      active.controller.abort();
    }
  }

  private async interpret(active: ActiveHandler): Promise<void> {
    this.active = null;
    const outcome = active.outcome;
    if (!outcome) return;
    const durationMs = this.now() - active.startedAt;
    const name = active.handler.name;

    if (!outcome.ok) {
      console.error(`[Loop] ${name} threw: ${describeError(outcome.error)}`);
      this.coordinator.submit({ kind: "handler-fault", message: describeError(outcome.error), source: name });
      return;
    }

    const result = outcome.result;
    if (active.controller.signal.aborted || result.aborted) {
      console.log(`[Loop] ${name} result discarded (aborted after ${durationMs}ms)`);
      if (active.handler.kind === "run") this.emitRunComplete(name, false, durationMs, "aborted");
      return;
    }

    if (result.error) {
      this.coordinator.submit({ ...result.error, source: result.error.source ?? name });
    }

    if (active.handler.kind === "run") {
      if (result.success) this.coordinator.recordRunSuccess();
      this.completedRuns += 1;
      this.emitRunComplete(name, result.success, result.durationMs ?? durationMs, result.note);
      if (this.settings.runLimit > 0 && this.completedRuns >= this.settings.runLimit) {
        console.log(`[Loop] run limit ${this.settings.runLimit} reached, stopping`);
        await this.sm.stop("run-limit");
        return;
      }
    }

    if (result.next && this.sm.currentState() === active.ownedState) {
      const next = await this.sm.requestTransition(result.next, "normal", active.tag);
      if (!next.accepted) console.warn(`[Loop] ${name} next state refused: ${next.error.message}`);
    }
  }

  private emitRunComplete(handler: string, success: boolean, durationMs: number, note?: string): void {
    this.emit("RUN_COMPLETE", { handler, success, durationMs, note: note ?? null, runs: this.completedRuns });
  }

  private emit(type: EngineEventType, data: Record<string, unknown>): void {
    if (!this.events) return;
    try {
      this.events.publish({ type, timestamp: this.now(), instanceId: this.settings.instanceId, data });
    } catch (err: unknown) {
      console.error(`[Loop] event sink error: ${describeError(err)}`);
    }
  }
}

import type { BotState, EngineEventSink, Observation, TransitionPriority } from "../types.js";
import type { TransitionGraph } from "./transitionGraph.js";
import { withTimeout } from "../utils/timeouts.js";
import { describeError } from "../utils/errors.js";

export type RejectReason =
  | "invalid_transition"
  | "guard_failed"
  | "already_in_state"
  | "superseded"
  | "busy"
  | "lost_tie"
  | "stopped";

/** The InvalidTransition signal. Carried in a rejected outcome, never thrown by requestTransition. */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: BotState,
    public readonly to: BotState,
    public readonly reason: RejectReason,
    detail?: string
  ) {
    super(`Cannot transition ${from} -> ${to} (${reason}${detail ? `: ${detail}` : ""})`);
    this.name = "InvalidTransitionError";
  }
}

export type TransitionOutcome =
  | { accepted: true; from: BotState; to: BotState; priority: TransitionPriority; requestedBy: string }
  | {
      accepted: false;
      from: BotState;
      to: BotState;
      priority: TransitionPriority;
      requestedBy: string;
      reason: RejectReason;
      error: InvalidTransitionError;
    };

export type TransitionRecord = {
  seq: number;
  from: BotState;
  to: BotState;
  priority: TransitionPriority;
  requestedBy: string;
  at: number;
};

export type StateHook = (from: BotState, to: BotState) => void | Promise<void>;

export type TransitionListener = (record: TransitionRecord) => void;

/** What other components get to see of the state machine. */
export interface TransitionRequester {
  currentState(): BotState;
  canTransition(to: BotState): boolean;
  requestTransition(to: BotState, priority?: TransitionPriority, requestedBy?: string): Promise<TransitionOutcome>;
}

type Ticket = {
  id: number;
  to: BotState;
  priority: TransitionPriority;
  requestedBy: string;
  committed: boolean;
  superseded: boolean;
};

type InFlight = { ticket: Ticket; from: BotState; done: Promise<void> };

export type StateMachineOptions = {
  graph: TransitionGraph;
  instanceId?: string;
  hookTimeoutMs?: number;
  events?: EngineEventSink | null;
  rejectionLogSize?: number;
  now?: () => number;
};

export class BotStateMachine implements TransitionRequester {
  private readonly graph: TransitionGraph;
  private readonly instanceId: string;
  private readonly hookTimeoutMs: number;
  private readonly events: EngineEventSink | null;
  private readonly rejectionLogSize: number;
  private readonly now: () => number;

  private state: BotState = "IDLE";
  private previous: BotState | null = null;
  private enteredAt: number;
  private transitionSeq = 0;
  private ticketSeq = 0;
  private stopped = false;
  private stopping: Promise<void> | null = null;

  private inFlight: InFlight | null = null;
  private pendingPreempt: Ticket | null = null;
  // exit hook already ran for this state (an aborted transition left it behind)
  private exitedFrom: BotState | null = null;

  private latestObservation: Observation | null = null;
  private entryHooks = new Map<BotState, StateHook>();
  private exitHooks = new Map<BotState, StateHook>();
  private listeners: TransitionListener[] = [];
  private rejections: InvalidTransitionError[] = [];

  constructor(opts: StateMachineOptions) {
    this.graph = opts.graph;
    this.instanceId = opts.instanceId ?? "local";
    this.hookTimeoutMs = opts.hookTimeoutMs ?? 1000;
    this.events = opts.events ?? null;
    this.rejectionLogSize = opts.rejectionLogSize ?? 100;
    this.now = opts.now ?? Date.now;
    this.enteredAt = this.now();
  }

  currentState(): BotState {
    return this.state;
  }

  previousState(): BotState | null {
    return this.previous;
  }

  stateDurationMs(): number {
    return this.now() - this.enteredAt;
  }

  transitionCount(): number {
    return this.transitionSeq;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  isBusy(): boolean {
    return this.inFlight !== null || this.pendingPreempt !== null;
  }

  updateObservation(observation: Observation): void {
    this.latestObservation = observation;
  }

  lastObservation(): Observation | null {
    return this.latestObservation;
  }

  onEnter(state: BotState, hook: StateHook): void {
    this.entryHooks.set(state, hook);
  }

  onExit(state: BotState, hook: StateHook): void {
    this.exitHooks.set(state, hook);
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  recentRejections(): InvalidTransitionError[] {
    return [...this.rejections];
  }

  canTransition(to: BotState): boolean {
    if (this.stopped || to === this.state) return false;
    if (!this.graph.has(this.state, to)) return false;
    const guard = this.graph.guardFor(this.state, to);
    return guard ? guard.test(this.latestObservation) : true;
  }

  /**
   * Single mutation point for the bot state.
   *
   * At most one transition is in flight. A preemptive request that arrives
   * while a normal one has not yet committed cancels it; the normal caller
   * gets a `superseded` rejection. Any other request that arrives while a
   * transition is in flight (or a preemptive one is waiting) is rejected.
   */
  async requestTransition(
    to: BotState,
    priority: TransitionPriority = "normal",
    requestedBy = "loop"
  ): Promise<TransitionOutcome> {
    const ticket: Ticket = {
      id: ++this.ticketSeq,
      to,
      priority,
      requestedBy,
      committed: false,
      superseded: false,
    };

    if (this.stopped || this.stopping) {
      return this.reject(ticket, this.state, "stopped");
    }

    if (this.inFlight || this.pendingPreempt) {
      if (priority === "normal") {
        return this.reject(ticket, this.state, "busy", this.describeInFlight());
      }
      if (this.pendingPreempt || this.inFlight?.ticket.priority === "preemptive") {
        return this.reject(ticket, this.state, "lost_tie", "another preemptive request came first");
      }
      // Only a normal transition is in flight here.
      const current = this.inFlight;
      if (current) {
        if (!current.ticket.committed) current.ticket.superseded = true;
        this.pendingPreempt = ticket;
        try {
          await current.done;
        } finally {
          this.pendingPreempt = null;
        }
      }
    }

    return this.apply(ticket);
  }

  /**
   * Terminal. New requests are refused at once; anything already in flight
   * or parked behind it settles first, then the machine moves to STOPPED.
   */
  stop(requestedBy = "operator"): Promise<void> {
    if (this.stopped) return Promise.resolve();
    if (!this.stopping) this.stopping = this.shutdown(requestedBy);
    return this.stopping;
  }

  private async shutdown(requestedBy: string): Promise<void> {
    while (this.inFlight || this.pendingPreempt) {
      if (this.inFlight) {
        await this.inFlight.done;
      } else {
        // parked preempt has not resumed yet
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }
    if (this.state !== "STOPPED") {
      const outcome = await this.apply({
        id: ++this.ticketSeq,
        to: "STOPPED",
        priority: "preemptive",
        requestedBy,
        committed: false,
        superseded: false,
      });
      if (!outcome.accepted) {
        console.warn(`[StateMachine] stop transition rejected: ${outcome.error.message}`);
      }
    }
    this.stopped = true;
  }

  private async apply(ticket: Ticket): Promise<TransitionOutcome> {
    const from = this.state;
    if (this.stopped) return this.reject(ticket, from, "stopped");
    if (ticket.to === from) return this.reject(ticket, from, "already_in_state");
    if (!this.graph.has(from, ticket.to)) return this.reject(ticket, from, "invalid_transition");

    const guard = this.graph.guardFor(from, ticket.to);
    if (guard && !guard.test(this.latestObservation)) {
      return this.reject(ticket, from, "guard_failed", guard.name);
    }

    let release: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.inFlight = { ticket, from, done };

    try {
      if (this.exitedFrom !== from) {
        await this.runHook("exit", this.exitHooks.get(from), from, ticket.to);
        this.exitedFrom = from;
      }

      if (ticket.superseded) {
        return this.reject(ticket, from, "superseded", "a preemptive transition took over");
      }

      this.previous = from;
      this.state = ticket.to;
      this.enteredAt = this.now();
      this.exitedFrom = null;
      ticket.committed = true;

      const record: TransitionRecord = {
        seq: ++this.transitionSeq,
        from,
        to: ticket.to,
        priority: ticket.priority,
        requestedBy: ticket.requestedBy,
        at: this.enteredAt,
      };
      console.log(`[TRANSITION] ${JSON.stringify(record)}`);
      this.notify(record);

      await this.runHook("entry", this.entryHooks.get(ticket.to), from, ticket.to);

      return { accepted: true, from, to: ticket.to, priority: ticket.priority, requestedBy: ticket.requestedBy };
    } finally {
      this.inFlight = null;
      release();
    }
  }

  private async runHook(kind: "entry" | "exit", hook: StateHook | undefined, from: BotState, to: BotState): Promise<void> {
    if (!hook) return;
    const owner = kind === "exit" ? from : to;
    try {
      await withTimeout(Promise.resolve(hook(from, to)), this.hookTimeoutMs, `${kind} hook for ${owner}`);
    } catch (err: unknown) {
      console.error(`[StateMachine] ${kind} hook error for ${owner}: ${describeError(err)}`);
    }
  }

  private notify(record: TransitionRecord): void {
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (err: unknown) {
        console.error(`[StateMachine] transition listener error: ${describeError(err)}`);
      }
    }
    this.emit("TRANSITION", { ...record });
  }

  private reject(ticket: Ticket, from: BotState, reason: RejectReason, detail?: string): TransitionOutcome {
    const error = new InvalidTransitionError(from, ticket.to, reason, detail);
    this.rejections.push(error);
    if (this.rejections.length > this.rejectionLogSize) this.rejections.shift();

    console.warn(`[StateMachine] rejected (${ticket.priority}, by ${ticket.requestedBy}): ${error.message}`);
    this.emit("TRANSITION_REJECTED", {
      from,
      to: ticket.to,
      priority: ticket.priority,
      requestedBy: ticket.requestedBy,
      reason,
      detail: detail ?? null,
    });

    return {
      accepted: false,
      from,
      to: ticket.to,
      priority: ticket.priority,
      requestedBy: ticket.requestedBy,
      reason,
      error,
    };
  }

  private describeInFlight(): string {
    if (this.pendingPreempt) return `preemptive ${this.state} -> ${this.pendingPreempt.to} pending`;
    if (!this.inFlight) return "idle";
    return `${this.inFlight.ticket.priority} ${this.inFlight.from} -> ${this.inFlight.ticket.to} in flight`;
  }

  private emit(type: "TRANSITION" | "TRANSITION_REJECTED", data: Record<string, unknown>): void {
    if (!this.events) return;
    try {
      this.events.publish({ type, timestamp: this.now(), instanceId: this.instanceId, data });
    } catch (err: unknown) {
      console.error(`[StateMachine] event sink error: ${describeError(err)}`);
    }
  }
}

import assert from "node:assert/strict";
import type {
  ActionPort,
  ActionResult,
  BotState,
  EngineEvent,
  EngineEventSink,
  EngineEventType,
  ErrorKind,
  ErrorSignal,
  GameAction,
  Observation,
  ObservationPort,
  ObservationResult,
} from "../src/types.js";
import type { HealthConfig, RecoveryConfig } from "../src/config.js";
import type { HandlerContext } from "../src/runs/domainHandler.js";
import { BotStateMachine, InvalidTransitionError, type RejectReason, type TransitionOutcome } from "../src/orchestrator/stateMachine.js";
import { buildDefaultGraph } from "../src/orchestrator/transitionGraph.js";
import type { BridgeSocketHandlers, SocketFactory } from "../src/bridge/gameBridge.js";

export const TEST_RECOVERY: RecoveryConfig = {
  threshold: 3,
  waitMs: 0,
  maxConsecutiveRunFailures: 6,
  maxDeathsPerSession: 5,
  escapeBounds: { minX: 0, maxX: 100, minY: 0, maxY: 100 },
};

export const TEST_HEALTH: HealthConfig = {
  intervalMs: 10,
  sampleTimeoutMs: 50,
  actionTimeoutMs: 50,
  chickenHealthPercent: 30,
  chickenManaPercent: 0,
  warningHealthPercent: 50,
  potionCooldownMs: 1000,
  potionSettleMs: 0,
  healthPotionKey: "1",
  rejuvPotionKey: "3",
  bufferSize: 5,
};

export const wait = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function obs(label: string, readouts: Record<string, number> = {}, confidence = 0.95): Observation {
  return { label, confidence, timestamp: Date.now(), readouts };
}

export class EventCollector implements EngineEventSink {
  readonly events: EngineEvent[] = [];

  publish(event: EngineEvent): void {
    this.events.push(event);
  }

  ofType(type: EngineEventType): EngineEvent[] {
    return this.events.filter((e) => e.type === type);
  }
}

/** Records every action; `respond` decides the result (ok by default). */
export class FakeActions implements ActionPort {
  readonly performed: GameAction[] = [];

  constructor(private readonly respond: (action: GameAction) => ActionResult | Promise<ActionResult> = () => ({ ok: true })) {}

  async perform(action: GameAction): Promise<ActionResult> {
    this.performed.push(action);
    return this.respond(action);
  }
}

/** Hands out queued results, then repeats the last one. */
export class QueueObserver implements ObservationPort {
  calls = 0;

  constructor(private readonly queue: ObservationResult[]) {}

  push(...results: ObservationResult[]): void {
    this.queue.push(...results);
  }

  async observe(): Promise<ObservationResult> {
    this.calls++;
    const next = this.queue.length > 1 ? this.queue.shift() : this.queue[0];
    return next ?? "UNKNOWN";
  }
}

export class FakeReporter {
  readonly submitted: ErrorSignal[] = [];
  readonly confirmed: ErrorKind[] = [];

  submit(signal: ErrorSignal): void {
    this.submitted.push(signal);
  }

  confirmRecovered(kind: ErrorKind): void {
    this.confirmed.push(kind);
  }
}

export function makeMachine(events: EngineEventSink | null = null, hookTimeoutMs = 100): BotStateMachine {
  return new BotStateMachine({
    graph: buildDefaultGraph({ minHealthToStartRun: 50 }),
    instanceId: "test",
    hookTimeoutMs,
    events,
  });
}

/** Walks the machine along a path of legal transitions, starting from IDLE. */
export async function driveTo(sm: BotStateMachine, path: BotState[]): Promise<void> {
  sm.updateObservation(obs("in_town"));
  for (const to of path) {
    const outcome = await sm.requestTransition(to, "normal", "setup");
    assert.equal(outcome.accepted, true, `setup transition to ${to} refused`);
  }
}

export const TO_RUNNING: BotState[] = ["STARTING", "IN_TOWN", "RUNNING"];

export type FakeContextOptions = {
  state: BotState;
  observation?: Observation | null;
  actions?: FakeActions;
  /** Returns a reject reason to refuse the transition. */
  refuse?: (to: BotState) => RejectReason | null;
};

/** In-process HandlerContext: no state machine, transitions just move `state`. */
export function fakeContext(opts: FakeContextOptions) {
  const controller = new AbortController();
  const actions = opts.actions ?? new FakeActions();
  const transitions: BotState[] = [];
  const reported: ErrorSignal[] = [];
  let state = opts.state;
  let observation = opts.observation ?? null;

  const ctx: HandlerContext = {
    state: opts.state,
    signal: controller.signal,
    currentState: () => state,
    observation: () => observation,
    perform: (action) => actions.perform(action),
    requestTransition: async (to): Promise<TransitionOutcome> => {
      const from = state;
      const reason = opts.refuse?.(to) ?? null;
      if (reason) {
        return {
          accepted: false,
          from,
          to,
          priority: "normal",
          requestedBy: "handler",
          reason,
          error: new InvalidTransitionError(from, to, reason),
        };
      }
      state = to;
      transitions.push(to);
      return { accepted: true, from, to, priority: "normal", requestedBy: "handler" };
    },
    report: (kind, message) => {
      reported.push({ kind, message });
    },
    sleep: () => Promise.resolve(),
  };

  return {
    ctx,
    controller,
    actions,
    transitions,
    reported,
    setObservation: (next: Observation | null) => {
      observation = next;
    },
  };
}

/** Socket that records what is sent; tests drive the handlers by hand. */
export function fakeSocket() {
  const sent: string[] = [];
  let handlers: BridgeSocketHandlers | null = null;
  let closed = 0;
  const factory: SocketFactory = (_url, h) => {
    handlers = h;
    return {
      send: (text) => sent.push(text),
      close: () => {
        closed++;
      },
    };
  };
  const get = (): BridgeSocketHandlers => {
    if (!handlers) throw new Error("socket never opened");
    return handlers;
  };
  return { factory, sent, get, closedCount: () => closed };
}

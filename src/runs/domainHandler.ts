import type { ActionResult, BotState, ErrorKind, GameAction, Observation, RunResult } from "../types.js";
import type { TransitionOutcome } from "../orchestrator/stateMachine.js";

export type HandlerKind = "run" | "routine";

/**
 * What a domain handler gets to touch while it executes. Everything routes
 * back through the engine: transitions through the state machine, faults
 * through the recovery coordinator, input through the bounded action port.
 */
export interface HandlerContext {
  /** State the handler was launched for. */
  readonly state: BotState;
  /** Fires when anyone other than this handler moves the bot to another state. */
  readonly signal: AbortSignal;
  currentState(): BotState;
  observation(): Observation | null;
  perform(action: GameAction): Promise<ActionResult>;
  requestTransition(to: BotState): Promise<TransitionOutcome>;
  report(kind: ErrorKind, message?: string): void;
  sleep(ms: number): Promise<void>;
}

export interface DomainHandler {
  readonly name: string;
  readonly kind: HandlerKind;
  execute(ctx: HandlerContext): Promise<RunResult>;
}

export type HandlerRegistry = Partial<Record<BotState, DomainHandler>>;

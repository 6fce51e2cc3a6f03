import type { RunResult } from "../types.js";
import type { DomainHandler, HandlerContext } from "./domainHandler.js";
import { TimeoutError, describeError } from "../utils/errors.js";
import { sleepUnlessAborted, withTimeout } from "../utils/timeouts.js";

export type RunHistoryEntry = {
  name: string;
  success: boolean;
  aborted: boolean;
  durationMs: number;
  note?: string;
  finishedAt: number;
};

/**
 * Shared shell for farming runs: timing, a hard run timeout, history and
 * cooperative abort. Subclasses implement executeRun() and poll
 * `ctx.signal.aborted` (or call checkAborted) between steps.
 */
export abstract class BaseRun implements DomainHandler {
  readonly kind = "run" as const;
  abstract readonly name: string;

  private history: RunHistoryEntry[] = [];

  constructor(
    protected readonly runTimeoutMs: number,
    private readonly historySize = 100,
    protected readonly now: () => number = Date.now
  ) {}

  protected abstract executeRun(ctx: HandlerContext): Promise<RunResult>;

  async execute(ctx: HandlerContext): Promise<RunResult> {
    const startedAt = this.now();
    console.log(`[Run] ${this.name} starting in ${ctx.state}`);

    // Timeout aborts the inner context too, so the run stops issuing actions.
    const controller = new AbortController();
    const forward = () => controller.abort();
    if (ctx.signal.aborted) controller.abort();
    else ctx.signal.addEventListener("abort", forward, { once: true });
    const inner: HandlerContext = {
      ...ctx,
      signal: controller.signal,
      sleep: (ms) => sleepUnlessAborted(ms, controller.signal),
    };

    let result: RunResult;
    try {
      result = await withTimeout(this.executeRun(inner), this.runTimeoutMs, `${this.name} run`);
    } catch (err: unknown) {
      controller.abort();
      if (err instanceof TimeoutError) {
        result = { success: false, next: "RETURNING", note: `timed out after ${this.runTimeoutMs}ms` };
      } else {
        throw err;
      }
    } finally {
      ctx.signal.removeEventListener("abort", forward);
    }

    if (ctx.signal.aborted && !result.aborted) result = { ...result, success: false, aborted: true };
    const durationMs = this.now() - startedAt;
    result = { ...result, durationMs };

    this.history.push({
      name: this.name,
      success: result.success,
      aborted: result.aborted ?? false,
      durationMs,
      note: result.note,
      finishedAt: this.now(),
    });
    if (this.history.length > this.historySize) this.history.shift();

    const status = result.aborted ? "ABORTED" : result.success ? "SUCCESS" : "FAILED";
    console.log(`[Run] ${this.name} ${status} (${(durationMs / 1000).toFixed(1)}s)${result.note ? ` ${result.note}` : ""}`);
    return result;
  }

  getHistory(): RunHistoryEntry[] {
    return [...this.history];
  }

  protected checkAborted(ctx: HandlerContext): RunResult | null {
    if (!ctx.signal.aborted) return null;
    return { success: false, aborted: true, note: `abandoned in ${ctx.currentState()}` };
  }

  protected failed(note: string, err?: unknown): RunResult {
    return { success: false, next: "RETURNING", note: err === undefined ? note : `${note}: ${describeError(err)}` };
  }
}

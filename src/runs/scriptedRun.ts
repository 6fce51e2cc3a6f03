import type { RunResult } from "../types.js";
import type { HandlerContext } from "./domainHandler.js";
import type { Route } from "./routeLoader.js";
import { BaseRun } from "./baseRun.js";

/** A farming run driven by a route file: optional state change, then the action. */
export class ScriptedRun extends BaseRun {
  readonly name: string;

  constructor(
    private readonly route: Route,
    runTimeoutMs: number,
    now?: () => number
  ) {
    super(runTimeoutMs, 100, now);
    this.name = route.name;
  }

  protected async executeRun(ctx: HandlerContext): Promise<RunResult> {
    let actions = 0;

    for (const [i, step] of this.route.steps.entries()) {
      const aborted = this.checkAborted(ctx);
      if (aborted) return aborted;

      if (step.state && ctx.currentState() !== step.state) {
        const outcome = await ctx.requestTransition(step.state);
        if (!outcome.accepted) {
          if (ctx.signal.aborted) return { success: false, aborted: true, note: "abandoned during step transition" };
          return {
            success: false,
            note: `step ${i + 1}: ${outcome.error.message}`,
            error: { kind: "handler-fault", message: outcome.error.message },
          };
        }
      }

      const times = step.repeat ?? 1;
      for (let n = 0; n < times; n++) {
        if (ctx.signal.aborted) return { success: false, aborted: true, note: `abandoned at step ${i + 1}` };
        if (step.action.type === "wait") {
          await ctx.sleep(step.action.ms);
          continue;
        }
        const result = await ctx.perform(step.action);
        if (!result.ok) return this.failed(`step ${i + 1} ${step.action.type} failed`, result.error);
        actions++;
      }

      if (step.settleMs) await ctx.sleep(step.settleMs);
    }

    return { success: true, next: "RETURNING", note: `${actions} actions` };
  }
}

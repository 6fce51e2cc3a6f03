import type { ActionPort, ErrorSignal, GameAction } from "../types.js";
import type { EscapeConfig } from "../config.js";
import { withTimeout } from "../utils/timeouts.js";
import { describeError } from "../utils/errors.js";

export type EscapeStep = {
  name: string;
  actions: GameAction[];
};

export type EscapeOutcome =
  | { ok: true; step: string; attempts: number }
  | { ok: false; attempts: number; failures: string[] };

/**
 * Ordered exit methods, most reliable first: template-matched Save & Exit,
 * the fixed button position, then hammering the cancel key.
 */
export function buildEscapeSteps(config: EscapeConfig): EscapeStep[] {
  return [
    {
      name: "template-exit",
      actions: [
        { type: "press", key: config.cancelKey },
        { type: "template-click", template: config.saveExitTemplate },
      ],
    },
    {
      name: "fixed-position-exit",
      actions: [
        { type: "press", key: config.cancelKey },
        { type: "click", x: config.saveExitPosition.x, y: config.saveExitPosition.y },
      ],
    },
    {
      name: "cancel-key-repeat",
      actions: Array.from({ length: config.cancelRepeat }, () => ({ type: "press" as const, key: config.cancelKey })),
    },
  ];
}

/**
 * Try each step in order until one completes. Every failed step is reported
 * as an escape-failed signal; running out of steps reports escape-exhausted.
 */
export async function runEscapeSequence(opts: {
  steps: EscapeStep[];
  actions: ActionPort | null;
  actionTimeoutMs: number;
  report: (signal: ErrorSignal) => void;
}): Promise<EscapeOutcome> {
  const failures: string[] = [];
  let attempts = 0;

  for (const step of opts.steps) {
    attempts++;
    const failure = await runStep(step, opts.actions, opts.actionTimeoutMs);
    if (!failure) {
      console.log(`[Health] escape via ${step.name} succeeded`);
      return { ok: true, step: step.name, attempts };
    }
    failures.push(`${step.name}: ${failure}`);
    console.warn(`[Health] escape via ${step.name} failed: ${failure}`);
    opts.report({
      kind: "escape-failed",
      severity: "RunEnding",
      message: `${step.name} failed: ${failure}`,
      source: "health-controller",
    });
  }

  opts.report({
    kind: "escape-exhausted",
    severity: "Critical",
    message: `All ${opts.steps.length} exit methods failed (${failures.join("; ")})`,
    source: "health-controller",
  });
  return { ok: false, attempts, failures };
}

async function runStep(step: EscapeStep, actions: ActionPort | null, timeoutMs: number): Promise<string | null> {
  if (!actions) return "no action port";
  for (const action of step.actions) {
    try {
      const result = await withTimeout(actions.perform(action), timeoutMs, `${step.name} ${action.type}`);
      if (!result.ok) return result.error;
    } catch (err: unknown) {
      return describeError(err);
    }
  }
  return null;
}

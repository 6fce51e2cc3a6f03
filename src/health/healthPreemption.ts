import type {
  ActionPort,
  EngineEventSink,
  ErrorKind,
  ErrorSignal,
  HealthReading,
  ObservationPort,
} from "../types.js";
import type { HealthConfig } from "../config.js";
import type { TransitionRequester } from "../orchestrator/stateMachine.js";
import { runEscapeSequence, type EscapeOutcome, type EscapeStep } from "./escapeSequence.js";
import { describeError } from "../utils/errors.js";
import { sleep as defaultSleep, withTimeout } from "../utils/timeouts.js";

export type HealthStatus = "SAFE" | "WARNING" | "CRITICAL" | "UNKNOWN";

export interface HealthSampler {
  sample(): Promise<HealthReading | null>;
}

/** Sink the controller reports faults to; in production the RecoveryCoordinator. */
export interface ErrorReporter {
  submit(signal: ErrorSignal): unknown;
  confirmRecovered(kind: ErrorKind): void;
}

export type ChickenEvent = {
  timestamp: number;
  healthPercent: number;
  manaPercent?: number;
  reason: string;
  potionAttempted: boolean;
  transitionAccepted: boolean;
  escape?: EscapeOutcome;
};

export type HealthCheckResult = {
  status: HealthStatus;
  reading: HealthReading | null;
  action: "none" | "potion" | "rejuv-saved" | "chicken" | "chicken-rejected" | "latched";
};

export type HealthPreemptionOptions = {
  sampler: HealthSampler;
  stateMachine: TransitionRequester;
  config: HealthConfig;
  escapeSteps: EscapeStep[];
  actions?: ActionPort | null;
  errors?: ErrorReporter | null;
  events?: EngineEventSink | null;
  instanceId?: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

/** Reads health/mana from the observation readouts. */
export function observationHealthSampler(port: ObservationPort): HealthSampler {
  return {
    async sample() {
      const obs = await port.observe();
      if (obs === "UNKNOWN") return null;
      const health = obs.readouts.health;
      if (typeof health !== "number") return null;
      const mana = obs.readouts.mana;
      return { healthPercent: health, manaPercent: typeof mana === "number" ? mana : undefined, timestamp: obs.timestamp };
    },
  };
}

/**
 * Samples health on its own timer and chickens (preemptive transition to
 * CHICKENED plus the escape sequence) when a floor is crossed. It only ever
 * requests transitions; the state machine stays the single writer.
 *
 * Degraded behaviour: without an ActionPort no potions are drunk and every
 * escape step fails; without an ErrorReporter failures are only logged.
 */
export class HealthPreemptionController {
  private readonly sampler: HealthSampler;
  private readonly sm: TransitionRequester;
  private readonly config: HealthConfig;
  private readonly escapeSteps: EscapeStep[];
  private readonly actions: ActionPort | null;
  private readonly errors: ErrorReporter | null;
  private readonly events: EngineEventSink | null;
  private readonly instanceId: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private checking: Promise<HealthCheckResult> | null = null;
  private samples: HealthReading[] = [];
  private chickenTriggered = false;
  private lastPotionAt = Number.NEGATIVE_INFINITY;
  private chickenHistory: ChickenEvent[] = [];

  constructor(opts: HealthPreemptionOptions) {
    this.sampler = opts.sampler;
    this.sm = opts.stateMachine;
    this.config = opts.config;
    this.escapeSteps = opts.escapeSteps;
    this.actions = opts.actions ?? null;
    this.errors = opts.errors ?? null;
    this.events = opts.events ?? null;
    this.instanceId = opts.instanceId ?? "local";
    this.sleep = opts.sleep ?? defaultSleep;
    this.now = opts.now ?? Date.now;
  }

  start(): void {
    if (this.running) {
      console.warn("[Health] monitor already running");
      return;
    }
    this.running = true;
    console.log(`[Health] monitor started (chicken at ${this.config.chickenHealthPercent}%, every ${this.config.intervalMs}ms)`);
    this.schedule();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    console.log("[Health] monitor stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  isChickenTriggered(): boolean {
    return this.chickenTriggered;
  }

  getSamples(): HealthReading[] {
    return [...this.samples];
  }

  getChickenHistory(): ChickenEvent[] {
    return [...this.chickenHistory];
  }

  /** One sample-and-respond pass. Overlapping calls share the pass in progress. */
  async checkNow(): Promise<HealthCheckResult> {
    if (this.checking) return this.checking;
    this.checking = this.check();
    try {
      return await this.checking;
    } finally {
      this.checking = null;
    }
  }

  evaluate(reading: HealthReading | null): HealthStatus {
    if (!reading) return "UNKNOWN";
    if (reading.healthPercent <= this.config.chickenHealthPercent) return "CRITICAL";
    if (
      this.config.chickenManaPercent > 0 &&
      typeof reading.manaPercent === "number" &&
      reading.manaPercent <= this.config.chickenManaPercent
    ) {
      return "CRITICAL";
    }
    if (reading.healthPercent <= this.config.warningHealthPercent) return "WARNING";
    return "SAFE";
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.checkNow()
        .catch((err: unknown) => console.error(`[Health] monitor error: ${describeError(err)}`))
        .finally(() => this.schedule());
    }, this.config.intervalMs);
  }

  private async readSample(): Promise<HealthReading | null> {
    try {
      const reading = await withTimeout(this.sampler.sample(), this.config.sampleTimeoutMs, "health sample");
      if (reading) {
        this.samples.push(reading);
        if (this.samples.length > this.config.bufferSize) this.samples.shift();
        this.errors?.confirmRecovered("health-sample-timeout");
      }
      return reading;
    } catch (err: unknown) {
      this.errors?.submit({ kind: "health-sample-timeout", message: describeError(err), source: "health-controller" });
      return null;
    }
  }

  private async check(): Promise<HealthCheckResult> {
    const reading = await this.readSample();
    const status = this.evaluate(reading);

    if (status !== "CRITICAL" && status !== "UNKNOWN" && this.chickenTriggered && this.sm.currentState() !== "CHICKENED") {
      console.log("[Health] readout back above floor, chicken re-armed");
      this.chickenTriggered = false;
    }

    if (status === "CRITICAL" && reading) return this.handleCritical(reading);
    if (status === "WARNING") {
      const drank = await this.drinkPotion(this.config.healthPotionKey, "health");
      return { status, reading, action: drank ? "potion" : "none" };
    }
    return { status, reading, action: "none" };
  }

  private async handleCritical(reading: HealthReading): Promise<HealthCheckResult> {
    if (this.chickenTriggered) return { status: "CRITICAL", reading, action: "latched" };
    this.chickenTriggered = true;

    console.warn(`[Health] CRITICAL: health ${reading.healthPercent.toFixed(0)}% (floor ${this.config.chickenHealthPercent}%)`);

    const potionAttempted = await this.drinkPotion(this.config.rejuvPotionKey, "rejuv");
    if (potionAttempted) {
      await this.sleep(this.config.potionSettleMs);
      const after = await this.readSample();
      if (after && this.evaluate(after) !== "CRITICAL") {
        console.log(`[Health] rejuv held (${after.healthPercent.toFixed(0)}%), no chicken`);
        this.chickenTriggered = false;
        return { status: "CRITICAL", reading, action: "rejuv-saved" };
      }
    }

    const reason = `health ${reading.healthPercent.toFixed(0)}% <= ${this.config.chickenHealthPercent}%`;
    const outcome = await this.sm.requestTransition("CHICKENED", "preemptive", "health");
    const event: ChickenEvent = {
      timestamp: this.now(),
      healthPercent: reading.healthPercent,
      manaPercent: reading.manaPercent,
      reason,
      potionAttempted,
      transitionAccepted: outcome.accepted,
    };

    if (!outcome.accepted) {
      console.warn(`[Health] chicken transition rejected: ${outcome.error.message}`);
      this.chickenHistory.push(event);
      return { status: "CRITICAL", reading, action: "chicken-rejected" };
    }

    console.warn(`[Health] CHICKEN! ${reason}`);
    event.escape = await runEscapeSequence({
      steps: this.escapeSteps,
      actions: this.actions,
      actionTimeoutMs: this.config.actionTimeoutMs,
      report: (signal) => {
        if (this.errors) this.errors.submit(signal);
        else console.error(`[Health] unreported ${signal.kind}: ${signal.message ?? ""}`);
      },
    });
    this.chickenHistory.push(event);
    this.emitChicken(event);
    return { status: "CRITICAL", reading, action: "chicken" };
  }

  private async drinkPotion(key: string, label: string): Promise<boolean> {
    if (!this.actions) return false;
    const now = this.now();
    if (now - this.lastPotionAt < this.config.potionCooldownMs) return false;
    this.lastPotionAt = now;
    console.log(`[Health] using ${label} potion (key ${key})`);
    try {
      const result = await withTimeout(this.actions.perform({ type: "press", key }), this.config.actionTimeoutMs, `${label} potion`);
      if (!result.ok) console.warn(`[Health] ${label} potion failed: ${result.error}`);
      return result.ok;
    } catch (err: unknown) {
      console.warn(`[Health] ${label} potion failed: ${describeError(err)}`);
      return false;
    }
  }

  private emitChicken(event: ChickenEvent): void {
    if (!this.events) return;
    try {
      this.events.publish({
        type: "CHICKEN",
        timestamp: event.timestamp,
        instanceId: this.instanceId,
        data: {
          healthPercent: event.healthPercent,
          manaPercent: event.manaPercent ?? null,
          reason: event.reason,
          potionAttempted: event.potionAttempted,
          escaped: event.escape?.ok ?? false,
          escapeStep: event.escape?.ok ? event.escape.step : null,
        },
      });
    } catch (err: unknown) {
      console.error(`[Health] event sink error: ${describeError(err)}`);
    }
  }
}

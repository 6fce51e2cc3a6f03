import type { BotStateMachine } from "./orchestrator/stateMachine.js";
import type { OrchestrationLoop } from "./orchestrator/orchestrationLoop.js";
import type { RecoveryCoordinator } from "./recovery/recoveryCoordinator.js";
import type { HealthPreemptionController } from "./health/healthPreemption.js";
import type { SessionStats } from "./stats/sessionStats.js";

export class CommandHandler {
  constructor(
    private sm: BotStateMachine,
    private coordinator: RecoveryCoordinator,
    private loop: OrchestrationLoop,
    private health: HealthPreemptionController,
    private stats: SessionStats,
    private instanceId: string,
    private startedAt: number,
    private onStop: () => Promise<void>
  ) {}

  async status(): Promise<string> {
    const fmt = (ts: number | null) => (ts ? new Date(ts).toISOString() : "n/a");
    const uptime = Math.floor((Date.now() - this.startedAt) / 1000);
    const samples = this.health.getSamples();
    const lastSample = samples[samples.length - 1];
    const tallies = this.coordinator.getTallies();
    const pauseReason = this.coordinator.getPauseReason();

    return [
      "=== Bot Status ===",
      "",
      "🤖 ENGINE:",
      `State: ${this.sm.currentState()} (${Math.floor(this.sm.stateDurationMs() / 1000)}s)`,
      `Handler: ${this.loop.activeHandler() ?? "none"}`,
      `Last observation: ${fmt(this.loop.lastObservationTime())}`,
      this.coordinator.isPaused() ? `⏸ PAUSED: ${pauseReason ?? "n/a"}` : "",
      "",
      "❤️ HEALTH:",
      `Monitor: ${this.health.isRunning() ? "running" : "stopped"}`,
      `Health: ${lastSample ? `${lastSample.healthPercent.toFixed(0)}%` : "n/a"}`,
      `Chickens: ${this.health.getChickenHistory().length}`,
      "",
      "🔁 RECOVERY:",
      `Run-ending this run: ${tallies.runEnding} | Consecutive failed runs: ${tallies.consecutiveRunFailures}`,
      `Deaths: ${tallies.deaths} | Recovery rate: ${this.coordinator.getRecoveryRate().toFixed(0)}%`,
      "",
      "⚙️ SYSTEM:",
      `Instance: ${this.instanceId}`,
      `Uptime: ${uptime}s`,
    ].filter((line, i, all) => line !== "" || all[i - 1] !== "").join("\n");
  }

  async statsReport(): Promise<string> {
    return this.stats.format();
  }

  async pause(reason?: string): Promise<string> {
    if (this.coordinator.isPaused()) {
      return `⏸ Already paused: ${this.coordinator.getPauseReason() ?? "n/a"}`;
    }
    this.coordinator.pause(reason?.trim() || "operator /pause");
    return "⏸ Paused. Send /resume to continue.";
  }

  async resume(): Promise<string> {
    const resumed = await this.coordinator.resume();
    if (!resumed) return "▶️ Not paused.";
    return `▶️ Resumed in ${this.sm.currentState()}.`;
  }

  async stop(): Promise<string> {
    if (this.sm.isStopped()) return "⏹ Already stopped.";
    await this.onStop();
    return "⏹ Stopped. Restart the process to run again.";
  }
}

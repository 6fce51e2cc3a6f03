import { loadEngineConfig } from "./config.js";
import { initTelegram } from "./telegram/telegram.js";
import { AlertGovernor } from "./governor/alertGovernor.js";
import { AlertPublisher } from "./telegram/alertPublisher.js";
import { buildOperatorAlert } from "./telegram/alertFormatter.js";
import { ConsoleEventLog, fanOutSinks } from "./events.js";
import { buildDefaultGraph } from "./orchestrator/transitionGraph.js";
import { BotStateMachine } from "./orchestrator/stateMachine.js";
import { OrchestrationLoop } from "./orchestrator/orchestrationLoop.js";
import { RecoveryCoordinator } from "./recovery/recoveryCoordinator.js";
import { StuckDetector } from "./recovery/stuckDetector.js";
import { HealthPreemptionController, observationHealthSampler } from "./health/healthPreemption.js";
import { buildEscapeSteps } from "./health/escapeSequence.js";
import { GameBridge } from "./bridge/gameBridge.js";
import { loadRoute } from "./runs/routeLoader.js";
import { ScriptedRun } from "./runs/scriptedRun.js";
import {
  DEFAULT_TOWN_SETTINGS,
  InventoryRoutine,
  LevelUpRoutine,
  RejoinRoutine,
  ReturnRoutine,
  TownRoutine,
} from "./runs/townRoutines.js";
import type { HandlerRegistry } from "./runs/domainHandler.js";
import { SessionStats } from "./stats/sessionStats.js";
import { StateStore } from "./persistence/stateStore.js";
import type { PersistedEngineState } from "./persistence/persistedState.js";
import { CommandHandler } from "./commands.js";
import { announceStartupThrottled } from "./utils/startupAnnounce.js";
import { describeError } from "./utils/errors.js";
import { yieldNow } from "./utils/yieldNow.js";
import type { EngineEvent, EngineEventType } from "./types.js";

const config = loadEngineConfig();
const instanceId = config.instanceId;
const startedAt = Date.now();

console.log("=== STARTUP INVENTORY ===");
console.log(`INSTANCE_ID: ${instanceId}`);
console.log(`BRIDGE_URL: ${config.bridgeUrl}`);
console.log(`ROUTE_FILE: ${config.routeFile}`);
console.log(`TICK: ${config.tickIntervalMs}ms | HEALTH: ${config.health.intervalMs}ms | CHICKEN: ${config.health.chickenHealthPercent}%`);
console.log(`ALERT_MODE: ${config.alertMode} | RUN_COUNT: ${config.runCount || "unlimited"}`);
console.log("=========================");

// Operator channel is optional
const telegram = initTelegram();

// Load persisted state
const store = new StateStore(instanceId, config.stateFile);
const persisted = await store.load();

const stats = new SessionStats();
if (persisted) stats.restore(persisted.stats);
const governor = new AlertGovernor(config.alertMode, persisted?.governor);
const publisher = telegram ? new AlertPublisher(governor, telegram.bot, telegram.chatId) : null;
const events = fanOutSinks(new ConsoleEventLog(), stats, ...(publisher ? [publisher] : []));

function emit(type: EngineEventType, data: Record<string, unknown>): EngineEvent {
  const event: EngineEvent = { type, timestamp: Date.now(), instanceId, data };
  events.publish(event);
  return event;
}

const sm = new BotStateMachine({
  graph: buildDefaultGraph(config.guards),
  instanceId,
  hookTimeoutMs: config.hookTimeoutMs,
  events,
});

const bridge = new GameBridge({
  url: config.bridgeUrl,
  staleAfterMs: config.observationTimeoutMs,
  actionTimeoutMs: config.actionTimeoutMs,
  onFault: (signal) => coordinator.submit(signal),
});

const coordinator = new RecoveryCoordinator({
  stateMachine: sm,
  config: config.recovery,
  actions: bridge,
  events,
  instanceId,
  actionTimeoutMs: config.actionTimeoutMs,
  cancelKey: config.keys.cancel,
});

const stuck = new StuckDetector({
  windowSize: config.stuck.windowSize,
  epsilon: config.stuck.epsilon,
  onStuck: (signal) => coordinator.submit(signal),
});

const health = new HealthPreemptionController({
  sampler: observationHealthSampler(bridge),
  stateMachine: sm,
  config: config.health,
  escapeSteps: buildEscapeSteps(config.escape),
  actions: bridge,
  errors: coordinator,
  events,
  instanceId,
});

const route = await loadRoute(config.routeFile);
const town = { ...DEFAULT_TOWN_SETTINGS, townPortalKey: config.keys.townPortal, cancelKey: config.keys.cancel };
const rejoin = new RejoinRoutine(town);
const handlers: HandlerRegistry = {
  IDLE: rejoin,
  STARTING: rejoin,
  DEAD: rejoin,
  CHICKENED: rejoin,
  DISCONNECTED: rejoin,
  IN_TOWN: new TownRoutine(town),
  RUNNING: new ScriptedRun(route, config.runTimeoutMs),
  MANAGING_INVENTORY: new InventoryRoutine(town),
  LEVELING_UP: new LevelUpRoutine(town),
  RETURNING: new ReturnRoutine(town),
};
console.log(`[startup] route "${route.name}" loaded (${route.steps.length} steps)`);

const loop = new OrchestrationLoop(
  {
    instanceId,
    tickIntervalMs: config.tickIntervalMs,
    observationTimeoutMs: config.observationTimeoutMs,
    actionTimeoutMs: config.actionTimeoutMs,
    confidenceFloor: config.confidenceFloor,
    runLimit: config.runCount,
  },
  sm,
  coordinator,
  bridge,
  bridge,
  handlers,
  stuck,
  events
);

let halted = false;
async function haltEngine(reason: string): Promise<void> {
  if (halted) return;
  halted = true;
  health.stop();
  await loop.stop();
  await sm.stop(reason);
  emit("STOPPED", { reason });
}

// A run limit stops the state machine from inside the loop.
sm.onTransition((record) => {
  if (record.to !== "STOPPED") return;
  haltEngine(`stopped by ${record.requestedBy}`).catch((err: unknown) => {
    console.error(`[startup] halt failed: ${describeError(err)}`);
  });
});

function buildPersistedState(): PersistedEngineState {
  return {
    version: 1,
    instanceId,
    savedAt: Date.now(),
    stats: stats.export(),
    governor: governor.exportState(),
  };
}

function logStructuredPulse(): void {
  const samples = health.getSamples();
  const snapshot = stats.snapshot();
  const pulse = {
    state: sm.currentState(),
    stateMs: sm.stateDurationMs(),
    handler: loop.activeHandler(),
    paused: coordinator.isPaused(),
    bridgeConnected: bridge.isConnected(),
    lastObservationAt: loop.lastObservationTime(),
    health: samples[samples.length - 1]?.healthPercent ?? null,
    runs: snapshot.sessionRuns,
    runsPerHour: Number(snapshot.runsPerHour.toFixed(2)),
    recoveryRate: Number(coordinator.getRecoveryRate().toFixed(1)),
    transitions: sm.transitionCount(),
  };
  console.log(`[PULSE] ${JSON.stringify(pulse)}`);
}

const commands = new CommandHandler(sm, coordinator, loop, health, stats, instanceId, startedAt, () =>
  haltEngine("operator /stop")
);

if (telegram && publisher) {
  const { bot, chatId } = telegram;
  const reply = (text: string) => publisher.reply(text);

  bot.onText(/\/status/, async () => {
    await yieldNow();
    await reply(await commands.status());
  });
  bot.onText(/\/stats/, async () => {
    await yieldNow();
    await reply(await commands.statsReport());
  });
  bot.onText(/\/pause(?:\s+(.+))?/, async (_msg, match) => {
    await yieldNow();
    await reply(await commands.pause(match?.[1]));
  });
  bot.onText(/\/resume/, async () => {
    await yieldNow();
    await reply(await commands.resume());
  });
  bot.onText(/\/stop/, async () => {
    await yieldNow();
    await reply(await commands.stop());
  });

  // Startup message (throttled to prevent spam on restart loops)
  const startup = buildOperatorAlert({
    type: "STARTUP",
    timestamp: startedAt,
    instanceId,
    data: { summary: `Route: ${route.name} | Alerts: ${governor.getMode()}` },
  });
  if (startup) {
    await announceStartupThrottled({
      bot,
      chatId,
      instanceId,
      text: startup.text,
      profile: { route: route.name, alertMode: governor.getMode(), runLimit: config.runCount },
    });
  }
} else {
  console.log(`[${instanceId}] ⚠️  No TELEGRAM_BOT_TOKEN - alerts go to the console only`);
}

emit("STARTUP", { route: route.name, alertMode: config.alertMode, runLimit: config.runCount });

// Periodic state persistence (every 15 seconds)
const persistTimer = setInterval(() => {
  store.save(buildPersistedState()).catch((err: unknown) => {
    console.warn(`[persist] save failed: ${describeError(err)}`);
  });
}, 15000);

// Structured pulse (every 60 seconds)
const pulseTimer = setInterval(logStructuredPulse, 60000);
setTimeout(logStructuredPulse, 1000);

bridge.connect();
health.start();
loop.start();

async function shutdown(signal: string): Promise<void> {
  console.log(`[startup] ${signal} received, shutting down`);
  clearInterval(persistTimer);
  clearInterval(pulseTimer);
  try {
    await haltEngine(signal);
    bridge.close();
    await store.save(buildPersistedState());
    await publisher?.flush();
  } catch (err: unknown) {
    console.error(`[startup] shutdown error: ${describeError(err)}`);
  }
  process.exit(0);
}

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

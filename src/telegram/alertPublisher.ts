import type { EngineEvent, EngineEventSink } from "../types.js";
import type { AlertGovernor } from "../governor/alertGovernor.js";
import type { TelegramBotLike } from "./sendTelegramMessageSafe.js";
import { sendTelegramMessageSafe } from "./sendTelegramMessageSafe.js";
import { buildOperatorAlert } from "./alertFormatter.js";
import { describeError } from "../utils/errors.js";

/**
 * Engine event sink that forwards operator-worthy events to Telegram.
 * publish() never blocks or throws; sends go through one serialized queue.
 */
export class AlertPublisher implements EngineEventSink {
  private publishQueue: Promise<void> = Promise.resolve();
  private counters = { sent: 0, blocked: 0, failed: 0 };

  constructor(
    private governor: AlertGovernor,
    private bot: TelegramBotLike,
    private chatId: number
  ) {}

  publish(event: EngineEvent): void {
    const alert = buildOperatorAlert(event);
    if (!alert) return;
    if (!this.governor.shouldSend(event)) {
      this.counters.blocked += 1;
      return;
    }

    this.publishQueue = this.publishQueue.then(async () => {
      const started = Date.now();
      try {
        await sendTelegramMessageSafe(this.bot, this.chatId, alert.text);
        this.counters.sent += 1;
        console.log(`[PUB] done ${event.type} durationMs=${Date.now() - started}`);
      } catch (err: unknown) {
        this.counters.failed += 1;
        console.error(`[PUB] failed ${event.type}: ${describeError(err)}`);
      }
    });
  }

  /** Send a reply outside the governor (command responses). */
  async reply(text: string): Promise<void> {
    this.publishQueue = this.publishQueue.then(() =>
      sendTelegramMessageSafe(this.bot, this.chatId, text).catch((err: unknown) => {
        this.counters.failed += 1;
        console.error(`[PUB] reply failed: ${describeError(err)}`);
      })
    );
    await this.publishQueue;
  }

  /** Resolves once everything queued so far has been sent (or failed). */
  async flush(): Promise<void> {
    await this.publishQueue;
  }

  getCounters(): { sent: number; blocked: number; failed: number } {
    return { ...this.counters };
  }
}

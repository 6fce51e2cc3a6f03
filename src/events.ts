import type { EngineEvent, EngineEventSink, EngineEventType } from "./types.js";
import { describeError } from "./utils/errors.js";

// The state machine already prints its own [TRANSITION] lines.
const CONSOLE_SKIP: ReadonlySet<EngineEventType> = new Set(["TRANSITION", "TRANSITION_REJECTED"]);

/** Writes each engine event as one `[TYPE] {json}` line. */
export class ConsoleEventLog implements EngineEventSink {
  constructor(private readonly skip: ReadonlySet<EngineEventType> = CONSOLE_SKIP) {}

  publish(event: EngineEvent): void {
    if (this.skip.has(event.type)) return;
    const line = `[${event.type}] ${JSON.stringify({ ts: event.timestamp, instanceId: event.instanceId, ...event.data })}`;
    if (event.type === "CRITICAL") console.error(line);
    else if (event.type === "ESCALATION" || event.type === "CHICKEN") console.warn(line);
    else console.log(line);
  }
}

export function fanOutSinks(...sinks: EngineEventSink[]): EngineEventSink {
  return {
    publish(event) {
      for (const sink of sinks) {
        try {
          sink.publish(event);
        } catch (err: unknown) {
          console.error(`[events] sink failed on ${event.type}: ${describeError(err)}`);
        }
      }
    },
  };
}

import type { ErrorEvent, ErrorSeverity } from "../types.js";

/**
 * Processing priority (lower number = handled first). A fatal condition must
 * never wait behind a lesser one that happens to resolve first.
 */
const PRIORITY: Record<ErrorSeverity, number> = {
  Critical: 0,
  RunEnding: 1,
  Recoverable: 2,
};

/**
 * Sort events by severity, then by timestamp, then by arrival order.
 */
export function orderErrorEvents(events: ErrorEvent[]): ErrorEvent[] {
  return [...events].sort((a, b) => {
    const pa = PRIORITY[a.severity];
    const pb = PRIORITY[b.severity];
    if (pa !== pb) return pa - pb;
    if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
    return a.id - b.id;
  });
}

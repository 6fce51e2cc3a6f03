import type { EngineEvent } from "../types.js";

export type OperatorAlert = {
  type: EngineEvent["type"];
  lines: string[];
  text: string;
};

function str(value: unknown, fallback = "n/a"): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function pct(value: unknown): string {
  return typeof value === "number" && Number.isFinite(value) ? `${value.toFixed(0)}%` : "n/a";
}

function seconds(value: unknown): string {
  return typeof value === "number" && Number.isFinite(value) ? `${(value / 1000).toFixed(1)}s` : "n/a";
}

function formatTime(ts: number): string {
  return new Date(ts).toISOString().replace("T", " ").slice(0, 19) + "Z";
}

export function buildOperatorAlert(event: EngineEvent): OperatorAlert | null {
  const d = event.data;
  let lines: string[];

  switch (event.type) {
    case "CRITICAL":
      lines = [
        "🛑 BOT PAUSED",
        `Fault: ${str(d.kind)} in ${str(d.originState)}`,
        `Reason: ${str(d.reason)}`,
        "Send /resume once fixed.",
      ];
      break;
    case "CHICKEN":
      lines = [
        "🐔 CHICKEN",
        `Health: ${pct(d.healthPercent)}${typeof d.manaPercent === "number" ? ` | Mana: ${pct(d.manaPercent)}` : ""}`,
        d.escaped === true ? `Escaped via ${str(d.escapeStep)}` : "⚠️ Escape failed",
      ];
      break;
    case "ESCALATION":
      lines = [`⚠️ ESCALATION ${str(d.from)} → ${str(d.to)}`, `Fault: ${str(d.kind)}`, str(d.note, "")];
      break;
    case "RUN_COMPLETE":
      lines = [
        `${d.success === true ? "✅" : "❌"} ${str(d.handler)} ${d.success === true ? "done" : "failed"} in ${seconds(d.durationMs)}`,
        typeof d.runs === "number" ? `Runs this session: ${d.runs}` : "",
      ];
      break;
    case "STARTUP":
      lines = ["🟢 Bot online", `Instance: ${event.instanceId}`, str(d.summary, "")];
      break;
    case "RESUMED":
      lines = ["▶️ Bot resumed", `Previous pause: ${str(d.previousReason)}`];
      break;
    case "PAUSED":
      lines = ["⏸ Bot paused", `Reason: ${str(d.reason)}`];
      break;
    case "STOPPED":
      lines = ["⏹ Bot stopped", str(d.reason, "")];
      break;
    default:
      return null;
  }

  lines = lines.filter((line) => line.length > 0);
  lines.push(formatTime(event.timestamp));
  return { type: event.type, lines, text: lines.join("\n") };
}

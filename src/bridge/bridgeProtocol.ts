/**
 * Sidecar wire format. One JSON object per WebSocket frame.
 *
 * Inbound (sidecar -> engine):
 *   { "type": "observation", "label", "confidence", "timestamp"?, "readouts"?, "activity"? }
 *   { "type": "unknown", "timestamp"? }
 *   { "type": "action_result", "id", "ok", "error"? }
 *   { "type": "fault", "kind": "disconnect" | "process-crash", "message"? }
 *
 * Outbound (engine -> sidecar):
 *   { "type": "action", "id", "action": GameAction }
 */

import type { ErrorKind, GameAction, Observation } from "../types.js";

export type BridgeFaultKind = Extract<ErrorKind, "disconnect" | "process-crash">;

export type BridgeMessage =
  | { type: "observation"; observation: Observation }
  | { type: "unknown"; timestamp: number }
  | { type: "action_result"; id: number; ok: boolean; error?: string }
  | { type: "fault"; kind: BridgeFaultKind; message?: string };

export type ActionRequest = { type: "action"; id: number; action: GameAction };

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readReadouts(raw: unknown): Record<string, number> | null {
  if (raw === undefined) return {};
  if (!isObject(raw)) return null;
  const out: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== "number" || !Number.isFinite(value)) return null;
    out[key] = value;
  }
  return out;
}

/** Validate one inbound frame. Returns null for anything malformed. */
export function parseBridgeMessage(text: string, receivedAt: number = Date.now()): BridgeMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isObject(raw)) return null;

  const timestamp = typeof raw.timestamp === "number" ? raw.timestamp : receivedAt;

  switch (raw.type) {
    case "observation": {
      if (typeof raw.label !== "string" || raw.label.length === 0) return null;
      if (typeof raw.confidence !== "number" || raw.confidence < 0 || raw.confidence > 1) return null;
      const readouts = readReadouts(raw.readouts);
      if (!readouts) return null;
      const observation: Observation = { label: raw.label, confidence: raw.confidence, timestamp, readouts };
      if (typeof raw.activity === "string" && raw.activity.length > 0) observation.activity = raw.activity;
      return { type: "observation", observation };
    }
    case "unknown":
      return { type: "unknown", timestamp };
    case "action_result": {
      if (typeof raw.id !== "number" || !Number.isInteger(raw.id)) return null;
      if (typeof raw.ok !== "boolean") return null;
      return typeof raw.error === "string"
        ? { type: "action_result", id: raw.id, ok: raw.ok, error: raw.error }
        : { type: "action_result", id: raw.id, ok: raw.ok };
    }
    case "fault": {
      if (raw.kind !== "disconnect" && raw.kind !== "process-crash") return null;
      return typeof raw.message === "string"
        ? { type: "fault", kind: raw.kind, message: raw.message }
        : { type: "fault", kind: raw.kind };
    }
    default:
      return null;
  }
}

export function encodeActionRequest(id: number, action: GameAction): string {
  const request: ActionRequest = { type: "action", id, action };
  return JSON.stringify(request);
}

import WebSocket, { type RawData } from "ws";
import type { ActionPort, ActionResult, ErrorSignal, GameAction, ObservationPort, ObservationResult } from "../types.js";
import { UNKNOWN } from "../types.js";
import { encodeActionRequest, parseBridgeMessage } from "./bridgeProtocol.js";
import { TimeoutError, describeError } from "../utils/errors.js";

export type BridgeSocketHandlers = {
  onOpen: () => void;
  onMessage: (text: string) => void;
  onClose: (code: number, reason: string) => void;
  onError: (err: Error) => void;
};

export interface BridgeSocket {
  send(text: string): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: BridgeSocketHandlers) => BridgeSocket;

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on("open", () => handlers.onOpen());
  ws.on("message", (data: RawData) => handlers.onMessage(rawToString(data)));
  ws.on("close", (code: number, reason: Buffer) => handlers.onClose(code, reason.toString()));
  ws.on("error", (err: Error) => handlers.onError(err));
  return {
    send: (text) => ws.send(text),
    close: () => {
      ws.removeAllListeners();
      ws.on("error", () => {}); // a close during CONNECTING still emits error
      ws.close();
    },
  };
};

export type GameBridgeOptions = {
  url: string;
  staleAfterMs?: number;
  actionTimeoutMs?: number;
  onFault?: ((signal: ErrorSignal) => void) | null;
  socketFactory?: SocketFactory;
  now?: () => number;
};

type PendingAction = { resolve: (result: ActionResult) => void; timer: NodeJS.Timeout };

/**
 * Observation and Action port backed by the vision/input sidecar.
 * Keeps only the latest snapshot; a snapshot older than staleAfterMs reads
 * as UNKNOWN. Reconnects with backoff until close() is called.
 */
export class GameBridge implements ObservationPort, ActionPort {
  private readonly url: string;
  private readonly staleAfterMs: number;
  private readonly actionTimeoutMs: number;
  private readonly onFault: ((signal: ErrorSignal) => void) | null;
  private readonly socketFactory: SocketFactory;
  private readonly now: () => number;

  private socket: BridgeSocket | null = null;
  private connected = false;
  private closed = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectBackoff = 5000;
  private readonly maxBackoff = 60000;

  private latest: ObservationResult = UNKNOWN;
  private latestAt = 0;
  private actionSeq = 0;
  private pending = new Map<number, PendingAction>();
  private droppedFrames = 0;

  constructor(opts: GameBridgeOptions) {
    this.url = opts.url;
    this.staleAfterMs = opts.staleAfterMs ?? 1000;
    this.actionTimeoutMs = opts.actionTimeoutMs ?? 3000;
    this.onFault = opts.onFault ?? null;
    this.socketFactory = opts.socketFactory ?? wsSocketFactory;
    this.now = opts.now ?? Date.now;
  }

  connect(): void {
    if (this.closed || this.socket) return;
    console.log(`[Bridge] connecting to ${this.url} (backoff ${this.reconnectBackoff}ms)`);
    this.socket = this.socketFactory(this.url, {
      onOpen: () => {
        this.connected = true;
        this.reconnectBackoff = 5000;
        console.log("[Bridge] connected");
      },
      onMessage: (text) => this.handleFrame(text),
      onClose: (code, reason) => {
        console.log(`[Bridge] closed (code: ${code}, reason: ${reason || "none"})`);
        this.handleDisconnect();
      },
      onError: (err) => {
        console.error(`[Bridge] socket error: ${err.message}`);
      },
    });
  }

  close(): void {
    this.closed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.socket?.close();
    this.socket = null;
    this.connected = false;
    this.failPending("bridge closed");
  }

  isConnected(): boolean {
    return this.connected;
  }

  getDroppedFrames(): number {
    return this.droppedFrames;
  }

  async observe(): Promise<ObservationResult> {
    if (this.latest === UNKNOWN) return UNKNOWN;
    if (this.now() - this.latestAt > this.staleAfterMs) return UNKNOWN;
    return this.latest;
  }

  perform(action: GameAction): Promise<ActionResult> {
    const socket = this.socket;
    if (!socket || !this.connected) return Promise.resolve({ ok: false, error: "bridge not connected" });

    const id = ++this.actionSeq;
    return new Promise<ActionResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new TimeoutError(`bridge action #${id}`, this.actionTimeoutMs));
      }, this.actionTimeoutMs);
      this.pending.set(id, { resolve, timer });
      try {
        socket.send(encodeActionRequest(id, action));
      } catch (err: unknown) {
        clearTimeout(timer);
        this.pending.delete(id);
        resolve({ ok: false, error: describeError(err) });
      }
    });
  }

  /** Entry point for every inbound frame. */
  handleFrame(text: string): void {
    const receivedAt = this.now();
    const message = parseBridgeMessage(text, receivedAt);
    if (!message) {
      this.droppedFrames++;
      console.warn(`[Bridge] dropped malformed frame: ${text.slice(0, 120)}`);
      return;
    }

    switch (message.type) {
      case "observation":
        this.latest = message.observation;
        this.latestAt = receivedAt;
        break;
      case "unknown":
        this.latest = UNKNOWN;
        this.latestAt = receivedAt;
        break;
      case "action_result": {
        const entry = this.pending.get(message.id);
        if (!entry) {
          console.warn(`[Bridge] action_result for unknown id #${message.id}`);
          return;
        }
        clearTimeout(entry.timer);
        this.pending.delete(message.id);
        entry.resolve(message.ok ? { ok: true } : { ok: false, error: message.error ?? "action failed" });
        break;
      }
      case "fault":
        console.warn(`[Bridge] sidecar fault: ${message.kind}${message.message ? ` (${message.message})` : ""}`);
        this.onFault?.({ kind: message.kind, message: message.message, source: "bridge" });
        break;
    }
  }

  private handleDisconnect(): void {
    this.connected = false;
    this.socket = null;
    this.latest = UNKNOWN;
    this.failPending("bridge disconnected");
    if (this.closed) return;

    const delay = this.reconnectBackoff;
    this.reconnectBackoff = Math.min(this.reconnectBackoff * 2, this.maxBackoff);
    console.log(`[Bridge] will reconnect in ${delay / 1000}s`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private failPending(reason: string): void {
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      entry.resolve({ ok: false, error: `${reason} before result #${id}` });
    }
    this.pending.clear();
  }
}

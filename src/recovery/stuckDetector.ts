import type { ErrorSignal } from "../types.js";

export type PositionSample =
  | { kind: "position"; x: number; y: number; timestamp: number }
  | { kind: "activity"; marker: string; timestamp: number };

export type StuckDetectorOptions = {
  windowSize?: number;
  epsilon?: number;
  onStuck?: ((signal: ErrorSignal) => void) | null;
};

function similar(a: PositionSample, b: PositionSample, epsilon: number): boolean {
  if (a.kind === "position" && b.kind === "position") {
    return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon;
  }
  if (a.kind === "activity" && b.kind === "activity") {
    return a.marker === b.marker;
  }
  return false;
}

/**
 * Flags "no progress" when every sample in a full window sits within epsilon
 * of every other sample (activity markers must be equal).
 *
 * Without an onStuck sink the detector still answers isStuck(); nothing is
 * reported anywhere.
 */
export class StuckDetector {
  readonly windowSize: number;
  readonly epsilon: number;
  private window: PositionSample[] = [];
  private last: PositionSample | null = null;
  private readonly onStuck: ((signal: ErrorSignal) => void) | null;

  constructor(opts: StuckDetectorOptions = {}) {
    this.windowSize = opts.windowSize ?? 5;
    this.epsilon = opts.epsilon ?? 10;
    this.onStuck = opts.onStuck ?? null;
    if (this.windowSize < 2) throw new Error(`Stuck window must hold at least 2 samples, got ${this.windowSize}`);
  }

  /** Returns true when the sample moved away from the previous one. */
  observe(sample: PositionSample): boolean {
    const moved = this.last !== null && !similar(this.last, sample, this.epsilon);
    this.last = sample;
    this.window.push(sample);
    if (this.window.length > this.windowSize) this.window.shift();
    return moved;
  }

  /** True at most once per full window of similar samples; the window is cleared on a hit. */
  isStuck(): boolean {
    if (this.window.length < this.windowSize) return false;

    for (const [i, a] of this.window.entries()) {
      for (const b of this.window.slice(i + 1)) {
        if (!similar(a, b, this.epsilon)) return false;
      }
    }

    const [first] = this.window;
    if (!first) return false;
    const where = first.kind === "position" ? `~(${first.x}, ${first.y})` : `activity "${first.marker}"`;
    const message = `No progress at ${where} for ${this.windowSize} samples`;
    console.warn(`[Stuck] ${message}`);
    this.window = [];
    this.onStuck?.({ kind: "stuck", severity: "Recoverable", message, source: "stuck-detector" });
    return true;
  }

  reset(): void {
    this.window = [];
    this.last = null;
  }

  size(): number {
    return this.window.length;
  }
}

export type RetryBudgetSnapshot = {
  consecutiveFailures: number;
  threshold: number;
  lastReset: number;
  escalations: number;
};

/**
 * Per-kind counter of consecutive failed recoveries. Crossing the threshold
 * reports exactly one escalation and starts counting from zero again.
 */
export class RetryBudget {
  private consecutiveFailures = 0;
  private escalations = 0;
  private lastReset: number;

  constructor(
    readonly threshold: number,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new Error(`Retry threshold must be a positive integer, got ${threshold}`);
    }
    this.lastReset = this.now();
  }

  /** Count one more failure. Returns true when this failure exhausts the budget. */
  recordFailure(): boolean {
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures > this.threshold) {
      this.escalations += 1;
      this.reset();
      return true;
    }
    return false;
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.lastReset = this.now();
  }

  snapshot(): RetryBudgetSnapshot {
    return {
      consecutiveFailures: this.consecutiveFailures,
      threshold: this.threshold,
      lastReset: this.lastReset,
      escalations: this.escalations,
    };
  }
}

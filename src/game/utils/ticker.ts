const sanitizeFiniteNonNegative = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.max(0, value);
};

/**
 * Check-and-reset accumulator for a fixed cadence.
 *
 * Deltas of any size are summed; once the total reaches the interval the
 * ticker fires once and drops back to zero. The excess is not carried over,
 * so a long frame produces a single action rather than a burst.
 */
export class IntervalTicker {
  private readonly intervalSeconds: number;

  private elapsedSeconds = 0;

  constructor(intervalSeconds: number) {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new RangeError(
        `Ticker interval must be a positive number of seconds, got ${intervalSeconds}`,
      );
    }
    this.intervalSeconds = intervalSeconds;
  }

  get interval(): number {
    return this.intervalSeconds;
  }

  get elapsed(): number {
    return this.elapsedSeconds;
  }

  /** Add `deltaSeconds` without checking the interval. */
  accumulate(deltaSeconds: number): void {
    this.elapsedSeconds += sanitizeFiniteNonNegative(deltaSeconds);
  }

  /** Add `deltaSeconds`. Returns `true` when the interval was reached. */
  advance(deltaSeconds: number): boolean {
    this.accumulate(deltaSeconds);

    if (this.elapsedSeconds >= this.intervalSeconds) {
      this.elapsedSeconds = 0;
      return true;
    }

    return false;
  }

  reset(): void {
    this.elapsedSeconds = 0;
  }
}

/**
 * Turns variable frame deltas into whole simulation ticks. Backlog beyond
 * `maxSubSteps` in one frame is dropped rather than carried over.
 */
export class FixedStepRunner {
  private accumulator = 0;
  private totalSteps = 0;

  constructor(
    private readonly fixedStepSeconds: number,
    private readonly maxSubSteps: number = 6
  ) {}

  getTotalSteps(): number {
    return this.totalSteps;
  }

  getPendingSeconds(): number {
    return this.accumulator;
  }

  reset(): void {
    this.accumulator = 0;
    this.totalSteps = 0;
  }

  /** Runs `callback` once per whole tick in the backlog; returns the count. */
  step(deltaSeconds: number, callback: (fixedDelta: number) => void): number {
    if (!Number.isFinite(deltaSeconds) || deltaSeconds <= 0) {
      return 0;
    }

    this.accumulator += deltaSeconds;

    let subStepCount = 0;
    while (this.accumulator >= this.fixedStepSeconds && subStepCount < this.maxSubSteps) {
      callback(this.fixedStepSeconds);
      this.accumulator -= this.fixedStepSeconds;
      subStepCount += 1;
    }

    if (subStepCount === this.maxSubSteps) {
      this.accumulator = 0;
    }

    this.totalSteps += subStepCount;
    return subStepCount;
  }
}

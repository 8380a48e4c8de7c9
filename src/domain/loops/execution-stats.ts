/**
 * Observational counters bumped by the drivers.
 * Never consulted for control decisions.
 */
export interface LoopStatsSnapshot {
  readonly totalIterations: number;
  readonly breaksHit: number;
  readonly continuesHit: number;
}

export class ExecutionStats {
  private totalIterations = 0;
  private breaksHit = 0;
  private continuesHit = 0;

  reset(): void {
    this.totalIterations = 0;
    this.breaksHit = 0;
    this.continuesHit = 0;
  }

  recordIteration(): void {
    this.totalIterations += 1;
  }

  recordBreak(): void {
    this.breaksHit += 1;
  }

  recordContinue(): void {
    this.continuesHit += 1;
  }

  snapshot(): LoopStatsSnapshot {
    return {
      totalIterations: this.totalIterations,
      breaksHit: this.breaksHit,
      continuesHit: this.continuesHit,
    };
  }
}

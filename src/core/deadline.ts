/**
 * Wall-clock deadline shared by every phase of one analysis run.
 */
import { DeadlineError } from '../utils/errors.js';

export type AnalysisPhase = DeadlineError['phase'];

export type Clock = () => number;

export class Deadline {
  private readonly startedAt: number;

  /**
   * @param budgetMs - Allowed run time; undefined means no deadline
   */
  constructor(
    private readonly budgetMs?: number,
    private readonly clock: Clock = Date.now
  ) {
    this.startedAt = clock();
  }

  elapsedMs(): number {
    return this.clock() - this.startedAt;
  }

  /**
   * Time left before the deadline, or undefined without one.
   */
  remainingMs(): number | undefined {
    return this.budgetMs === undefined ? undefined : Math.max(0, this.budgetMs - this.elapsedMs());
  }

  expired(): boolean {
    return this.budgetMs !== undefined && this.elapsedMs() >= this.budgetMs;
  }

  /**
   * @throws DeadlineError once the budget is spent
   */
  check(phase: AnalysisPhase): void {
    if (this.expired()) {
      throw new DeadlineError(phase, this.elapsedMs());
    }
  }
}

import type { ReconnectPolicy } from '../config/types.js';

/**
 * Doubling waits from `initialMs`, capped at `maxMs`; the cap is the final entry.
 * exponentialSchedule(1000, 30000) -> [1000, 2000, 4000, 8000, 16000, 30000]
 */
export function exponentialSchedule(initialMs: number, maxMs: number): number[] {
  const schedule: number[] = [];
  let wait = initialMs;
  while (wait < maxMs) {
    schedule.push(wait);
    wait *= 2;
  }
  schedule.push(maxMs);
  return schedule;
}

/**
 * Hands out the wait before each retry of one recovery run. Jitter only
 * lengthens a wait, and no wait is shorter than the one before it.
 */
export class BackoffSchedule {
  private retries = 0;
  private previousMs = 0;

  constructor(
    private readonly policy: Pick<ReconnectPolicy, 'backoffScheduleMs' | 'jitterRatio'>,
    private readonly random: () => number = Math.random,
  ) {}

  get retriesScheduled(): number {
    return this.retries;
  }

  next(): number {
    const schedule = this.policy.backoffScheduleMs;
    const baseMs = schedule.length > 0 ? schedule[Math.min(this.retries, schedule.length - 1)] : 0;
    this.retries += 1;

    const jitteredMs = Math.round(baseMs * (1 + this.policy.jitterRatio * this.random()));
    this.previousMs = Math.max(jitteredMs, this.previousMs);
    return this.previousMs;
  }
}

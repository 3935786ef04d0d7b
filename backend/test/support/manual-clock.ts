import { PollCancelledError } from "@imbalance-tracker/domain";

import type { Clock } from "../../src/polling/clock";

/**
 * Clock whose sleeps complete immediately and advance `now`. `onSleep` runs before
 * the time moves, so a test can abort the signal or stage the next response.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep: ((ms: number) => void) | null = null;

  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    this.onSleep?.(ms);
    if (signal?.aborted) {
      throw new PollCancelledError();
    }
    this.current += ms;
  }
}

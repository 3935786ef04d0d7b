import { setTimeout as delay } from "node:timers/promises";

import { PollCancelledError } from "@imbalance-tracker/domain";

export const CLOCK = Symbol("CLOCK");

/** Time source and suspension point for the polling loop. */
export interface Clock {
  now(): number;
  /** Resolves after `ms`; rejects with {@link PollCancelledError} once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new PollCancelledError();
    }
    try {
      await delay(Math.max(0, ms), undefined, {signal});
    } catch (error) {
      if (signal?.aborted) {
        throw new PollCancelledError();
      }
      throw error;
    }
  },
};

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PollCancelledError();
  }
}

import { performance } from "node:perf_hooks";

// Until the first occasion has measured its own cost.
export const INITIAL_BETWEEN_OCCASIONS_MS = 10_000;
export const CHEAP_OCCASION_MS = 2_000;
export const CHEAP_BETWEEN_OCCASIONS_MS = 60_000;
// Keeps checkpointing near 1/25th of the run when saves get expensive.
export const OCCASION_COST_FACTOR = 25;

export type OccasionCallback = () => void | Promise<void>;

export interface OccasionThrottleOptions {
  onOccasion?: OccasionCallback;
  clock?: () => number;
  betweenOccasionsMs?: number;
}

/**
 * Adaptive timer shared by all branches of a calculation. Whichever branch
 * first notices that the interval has elapsed fires the callback; the rest
 * carry on without waiting for it.
 */
export class OccasionThrottle {
  private readonly onOccasion?: OccasionCallback;
  private readonly clock: () => number;
  private lastOccasion: number;
  private betweenOccasions: number;
  private busy = false;
  private fired = 0;

  constructor({
    onOccasion,
    clock = () => performance.now(),
    betweenOccasionsMs = INITIAL_BETWEEN_OCCASIONS_MS,
  }: OccasionThrottleOptions = {}) {
    this.onOccasion = onOccasion;
    this.clock = clock;
    this.lastOccasion = clock();
    this.betweenOccasions = betweenOccasionsMs;
  }

  get intervalMs(): number {
    return this.betweenOccasions;
  }

  get occasions(): number {
    return this.fired;
  }

  isDue(): boolean {
    return this.clock() - this.lastOccasion > this.betweenOccasions;
  }

  /**
   * Fire the callback if the interval has elapsed and no other branch is
   * already inside it. Resolves to whether this call fired.
   */
  async maybeFire(): Promise<boolean> {
    if (this.busy || !this.isDue()) return false;
    this.busy = true;
    try {
      await this.fire();
    } finally {
      this.busy = false;
    }
    return true;
  }

  private async fire(): Promise<void> {
    this.lastOccasion = this.clock();
    this.fired += 1;
    if (this.onOccasion) {
      await this.onOccasion();
    }
    const cost = this.clock() - this.lastOccasion;
    this.betweenOccasions =
      cost < CHEAP_OCCASION_MS
        ? CHEAP_BETWEEN_OCCASIONS_MS
        : cost * OCCASION_COST_FACTOR;
  }
}

/**
 * Admission budget for branch computations started without being awaited.
 *
 * A branch that wants to compute a subdirectory asks the pool first. While
 * fewer than `size` admitted branches are still running, the pool starts
 * the task and hands back its promise for the caller to join later.
 * Otherwise it returns null and the caller awaits the task inline. One
 * budget is shared by every level of the recursion.
 */
export class BranchPool {
  readonly size: number;
  private inFlight = 0;
  private peakInFlight = 0;
  private admittedTotal = 0;

  constructor(size: number) {
    this.size = size;
  }

  // A budget of one means strictly sequential recursion.
  get enabled(): boolean {
    return this.size > 1;
  }

  get running(): number {
    return this.inFlight;
  }

  get peak(): number {
    return this.peakInFlight;
  }

  get admitted(): number {
    return this.admittedTotal;
  }

  tryStart(task: () => Promise<void>): Promise<void> | null {
    if (!this.enabled || this.inFlight >= this.size) {
      return null;
    }
    this.inFlight += 1;
    this.admittedTotal += 1;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    return task().finally(() => {
      this.inFlight -= 1;
    });
  }
}

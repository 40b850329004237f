/**
 * Synchronization context shared by the two engines of a sibling pair.
 *
 * Holds the pending flag that marks a selection push as in flight. Each pair
 * owns its own context, so independent pairs never block each other.
 */
export class SyncContext {
  private pending = false;
  private pushCount = 0;

  isPending(): boolean {
    return this.pending;
  }

  /**
   * Run `push` with the pending flag set.
   * @returns false when another push is already in flight and `push` was skipped
   */
  run(push: () => void): boolean {
    if (this.pending) {
      return false;
    }

    this.pending = true;
    try {
      push();
      this.pushCount++;
    } finally {
      this.pending = false;
    }
    return true;
  }

  /**
   * Completed pushes since creation.
   */
  getPushCount(): number {
    return this.pushCount;
  }
}

/**
 * Target -> job id of the deployment currently holding it.
 *
 * Claims are synchronous compare-and-swap operations: nothing can run
 * between the check and the write, so two submissions for the same target
 * can never both win.
 */
export class TargetLockTable {
  private readonly holders = new Map<string, string>();

  /**
   * Claim `target` for `jobId` if it is free. Returns the current holder
   * when the claim fails.
   */
  tryClaim(target: string, jobId: string): { claimed: true } | { claimed: false; heldBy: string } {
    const holder = this.holders.get(target);
    if (holder !== undefined) {
      return { claimed: false, heldBy: holder };
    }

    this.holders.set(target, jobId);
    return { claimed: true };
  }

  /**
   * Release only if `jobId` still holds the lock
   */
  release(target: string, jobId: string): boolean {
    if (this.holders.get(target) !== jobId) return false;

    this.holders.delete(target);
    return true;
  }

  holderOf(target: string): string | undefined {
    return this.holders.get(target);
  }

  get size(): number {
    return this.holders.size;
  }
}

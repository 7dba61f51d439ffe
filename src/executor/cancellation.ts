/**
 * Cooperative cancellation flag, checked by the executor between steps.
 */
export class CancellationToken {
  private requestedAt?: Date;

  get requested(): boolean {
    return this.requestedAt !== undefined;
  }

  get since(): Date | undefined {
    return this.requestedAt;
  }

  /**
   * Returns false when cancellation was already requested
   */
  request(): boolean {
    if (this.requestedAt) return false;
    this.requestedAt = new Date();
    return true;
  }
}

/**
 * Update Queue
 *
 * Unbounded FIFO between the health monitor (producer) and the
 * orchestrator (consumer). Once closed, pushes are refused so the
 * producer can stop.
 */

export class UpdateQueue<T> {
  private items: T[] = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @returns false when the receiving end has been closed
   */
  push(item: T): boolean {
    if (this.closed) return false;
    this.items.push(item);
    return true;
  }

  /** Non-blocking receive. */
  tryShift(): T | null {
    return this.items.shift() ?? null;
  }

  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  close(): void {
    this.closed = true;
    this.items = [];
  }
}

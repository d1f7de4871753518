/**
 * Single-writer queue. Each task starts after the previous one settled;
 * a rejected task does not block the ones behind it.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.pending++;
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  /** Tasks queued or running */
  get size(): number {
    return this.pending;
  }

  private release(): void {
    this.pending--;
  }
}

/**
 * Unbounded many-producer, single-consumer queue. `push` never blocks;
 * `pull` resolves with the oldest item, waiting if none is buffered.
 */
export class EventChannel<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(item: T) => void> = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.buffer.push(item);
    }
  }

  pull(): Promise<T> {
    if (this.buffer.length > 0) {
      const item = this.buffer.shift();
      if (item !== undefined) return Promise.resolve(item);
    }
    return new Promise<T>((resolve) => this.waiters.push(resolve));
  }

  get size(): number {
    return this.buffer.length;
  }
}

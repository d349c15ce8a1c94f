export type WindowSample = {
  timestamp: number;
  requestMs: number;
  isError: boolean;
  dbMs: number;
};

/**
 * Timestamp-ordered FIFO of recent request samples. Eviction advances a head
 * index and compacts the backing array once the dead prefix dominates it.
 */
export class AlertWindow {
  private items: WindowSample[] = [];
  private head = 0;

  append(sample: WindowSample) {
    this.items.push(sample);
  }

  evictBefore(cutoff: number): number {
    const start = this.head;
    while (this.head < this.items.length && this.items[this.head].timestamp < cutoff) {
      this.head += 1;
    }
    const evicted = this.head - start;
    if (this.head > 0 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return evicted;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  samples(): readonly WindowSample[] {
    return this.head === 0 ? this.items : this.items.slice(this.head);
  }
}

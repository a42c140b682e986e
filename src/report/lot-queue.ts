import type { OpenLot } from "../domain/types";

// Drop consumed slots once at least this many have piled up at the front
const COMPACT_THRESHOLD = 64;

/**
 * Open lots of one (identifier, currency) group in acquisition order. The
 * front lot is mutated in place while sells consume it.
 */
export class LotQueue {
  private lots: OpenLot[] = [];
  private head = 0;

  get size(): number {
    return this.lots.length - this.head;
  }

  push(lot: OpenLot): void {
    this.lots.push(lot);
  }

  peek(): OpenLot | undefined {
    return this.head < this.lots.length ? this.lots[this.head] : undefined;
  }

  /** Remove the front lot */
  shift(): void {
    if (this.head >= this.lots.length) return;
    this.head++;
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.lots.length) {
      this.lots = this.lots.slice(this.head);
      this.head = 0;
    }
  }

  toArray(): OpenLot[] {
    return this.lots.slice(this.head);
  }
}

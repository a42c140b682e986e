import { describe, expect, it } from "vitest";
import type { OpenLot } from "../domain/types";
import { LotQueue } from "./lot-queue";

const lot = (n: number): OpenLot => ({
  remainingQuantity: BigInt(n + 1),
  unitPrice: 1n,
  acquisitionDate: null,
});

describe("LotQueue", () => {
  it("serves lots in insertion order", () => {
    const queue = new LotQueue();
    queue.push(lot(0));
    queue.push(lot(1));

    expect(queue.peek()?.remainingQuantity).toBe(1n);
    queue.shift();
    expect(queue.peek()?.remainingQuantity).toBe(2n);
    queue.shift();
    expect(queue.peek()).toBeUndefined();
    expect(queue.size).toBe(0);
  });

  it("lets the front lot be consumed in place", () => {
    const queue = new LotQueue();
    queue.push(lot(4));
    const front = queue.peek();
    if (front) front.remainingQuantity -= 2n;

    expect(queue.toArray()).toEqual([
      { remainingQuantity: 3n, unitPrice: 1n, acquisitionDate: null },
    ]);
  });

  it("ignores shift on an empty queue", () => {
    const queue = new LotQueue();
    queue.shift();
    queue.push(lot(0));
    expect(queue.size).toBe(1);
  });

  it("keeps order after compacting consumed slots", () => {
    const queue = new LotQueue();
    for (let i = 0; i < 100; i++) queue.push(lot(i));
    for (let i = 0; i < 70; i++) queue.shift();

    expect(queue.size).toBe(30);
    expect(queue.peek()?.remainingQuantity).toBe(71n);
    expect(queue.toArray().map((l) => l.remainingQuantity)).toEqual(
      Array.from({ length: 30 }, (_, i) => BigInt(i + 71)),
    );
  });
});

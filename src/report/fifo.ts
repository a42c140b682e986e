import type {
  MatchedLot,
  OpenPosition,
  SaleResult,
  Transaction,
} from "../domain/types";
import { gainAtoms, minAtoms, roundToCents } from "../domain/units";
import {
  groupTransactions,
  sortByDate,
  type TransactionGroup,
} from "./grouping";
import { LotQueue } from "./lot-queue";

export type MatchOptions = {
  roundGains: boolean; // round each lot's gain to cents before summing
};

export type GroupResult = {
  sales: SaleResult[];
  openLots: OpenPosition["lots"];
};

export type FifoResult = {
  sales: SaleResult[];
  openPositions: OpenPosition[];
};

/**
 * Match the sells of one group against its buys, oldest lot first.
 * `transactions` must already be in date order.
 */
export function matchGroup(
  transactions: ReadonlyArray<Transaction>,
  options: MatchOptions,
): GroupResult {
  const queue = new LotQueue();
  const sales: SaleResult[] = [];

  // --- helpers ---

  const addLot = (tx: Transaction) => {
    if (tx.quantity === 0n) return;
    queue.push({
      remainingQuantity: tx.quantity,
      unitPrice: tx.price,
      acquisitionDate: tx.date,
    });
  };

  const sell = (tx: Transaction) => {
    let remaining = tx.quantity;
    let totalGain = 0n;
    const matchedLots: MatchedLot[] = [];

    while (remaining > 0n) {
      const lot = queue.peek();
      if (!lot) {
        // Nothing left to match: the rest has no known cost basis
        matchedLots.push({
          usedQuantity: remaining,
          salePrice: tx.price,
          origin: { kind: "unknown" },
        });
        remaining = 0n;
        continue;
      }

      const used = minAtoms(remaining, lot.remainingQuantity);
      const rawGain = gainAtoms(used, tx.price, lot.unitPrice);
      const gain = options.roundGains ? roundToCents(rawGain) : rawGain;
      totalGain += gain;

      matchedLots.push({
        usedQuantity: used,
        salePrice: tx.price,
        origin: {
          kind: "known",
          costBasis: lot.unitPrice,
          acquisitionDate: lot.acquisitionDate,
          gain,
        },
      });

      lot.remainingQuantity -= used;
      if (lot.remainingQuantity === 0n) queue.shift();
      remaining -= used;
    }

    sales.push({
      rowNumber: tx.rowNumber,
      date: tx.date,
      identifier: tx.identifier,
      currency: tx.currency,
      salePrice: tx.price,
      saleQuantity: tx.quantity,
      totalGain,
      matchedLots,
      extraAttributes: tx.extraAttributes,
    });
  };

  // ---- main loop ----
  for (const tx of transactions) {
    if (tx.kind === "buy") {
      addLot(tx);
    } else {
      sell(tx);
    }
  }

  return { sales, openLots: queue.toArray() };
}

/** Match every group independently. Groups must be date ordered. */
export function matchGroups(
  groups: ReadonlyArray<TransactionGroup>,
  options: MatchOptions,
): FifoResult {
  const sales: SaleResult[] = [];
  const openPositions: OpenPosition[] = [];

  for (const group of groups) {
    const result = matchGroup(group.transactions, options);
    for (const sale of result.sales) sales.push(sale);
    if (result.openLots.length > 0) {
      openPositions.push({
        identifier: group.identifier,
        currency: group.currency,
        lots: result.openLots,
      });
    }
  }

  return { sales, openPositions };
}

/** Sort, group and match a transaction sequence in one pass */
export function computeFifoSales(
  transactions: ReadonlyArray<Transaction>,
  options: MatchOptions,
): FifoResult {
  return matchGroups(groupTransactions(sortByDate(transactions)), options);
}

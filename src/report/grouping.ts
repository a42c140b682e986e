import type { Transaction } from "../domain/types";

export type TransactionGroup = {
  identifier: string;
  currency: string;
  transactions: Transaction[];
};

// Invalid dates sort after every valid one
const compareDates = (a: Date | null, b: Date | null): number => {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a.getTime() - b.getTime();
};

/** Stable ascending sort by date; ties keep their input order */
export function sortByDate(
  transactions: ReadonlyArray<Transaction>,
): Transaction[] {
  return transactions
    .map((tx, index) => ({ tx, index }))
    .sort((a, b) => compareDates(a.tx.date, b.tx.date) || a.index - b.index)
    .map(({ tx }) => tx);
}

const compareText = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Partition by (identifier, currency). Groups come out sorted by identifier,
 * then currency, and each keeps the order of the input.
 */
export function groupTransactions(
  transactions: ReadonlyArray<Transaction>,
): TransactionGroup[] {
  const groups = new Map<string, TransactionGroup>();

  for (const tx of transactions) {
    const key = JSON.stringify([tx.identifier, tx.currency]);
    let group = groups.get(key);
    if (!group) {
      group = {
        identifier: tx.identifier,
        currency: tx.currency,
        transactions: [],
      };
      groups.set(key, group);
    }
    group.transactions.push(tx);
  }

  return Array.from(groups.values()).sort(
    (a, b) =>
      compareText(a.identifier, b.identifier) ||
      compareText(a.currency, b.currency),
  );
}

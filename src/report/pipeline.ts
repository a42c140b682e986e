import type { FifoConfig } from "../config";
import type {
  OpenPosition,
  RawTable,
  RowIssue,
  SaleResult,
} from "../domain/types";
import { normalizeTable } from "../import/normalize";
import { computeFifoSales } from "./fifo";

export type FifoReport = {
  sales: SaleResult[];
  openPositions: OpenPosition[];
  skipped: RowIssue[];
  warnings: RowIssue[];
};

export type GroupSummary = {
  identifier: string;
  currency: string;
  saleCount: number;
  soldQuantity: bigint;
  unknownQuantity: bigint; // sold without a matching buy
  totalGain: bigint;
};

/**
 * Normalize, sort, group and match. Throws only for table-shape problems;
 * bad rows end up in `skipped` or `warnings`.
 */
export function computeFifoReport(
  table: RawTable,
  config: FifoConfig,
): FifoReport {
  const { transactions, skipped, warnings } = normalizeTable(table, config);
  const { sales, openPositions } = computeFifoSales(transactions, {
    roundGains: config.roundGains,
  });
  return { sales, openPositions, skipped, warnings };
}

/** Per (identifier, currency) totals, in the order the sales were produced */
export function summarizeSales(
  sales: ReadonlyArray<SaleResult>,
): GroupSummary[] {
  const summaries = new Map<string, GroupSummary>();

  for (const sale of sales) {
    const key = JSON.stringify([sale.identifier, sale.currency]);
    const summary = summaries.get(key) ?? {
      identifier: sale.identifier,
      currency: sale.currency,
      saleCount: 0,
      soldQuantity: 0n,
      unknownQuantity: 0n,
      totalGain: 0n,
    };

    summary.saleCount += 1;
    summary.soldQuantity += sale.saleQuantity;
    summary.totalGain += sale.totalGain;
    for (const lot of sale.matchedLots) {
      if (lot.origin.kind === "unknown") summary.unknownQuantity += lot.usedQuantity;
    }
    summaries.set(key, summary);
  }

  return Array.from(summaries.values());
}

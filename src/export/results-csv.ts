import { writeFileSync } from "fs";
import { stringify } from "csv-stringify/sync";
import { formatDate } from "../domain/dates";
import type { OpenPosition, SaleResult } from "../domain/types";
import { formatAtoms, formatGain, valueAtoms } from "../domain/units";

export const UNKNOWN = "Unknown";
export const INVALID_DATE = "Invalid Date";

export const BASE_RESULT_COLUMNS = [
  "Identifier",
  "Buy Date",
  "Buy Price",
  "Sell Date",
  "Sell Price",
  "Sell Qty",
  "Used Qty",
  "Gain/Loss",
] as const;

export type ResultRow = Record<string, string>;

export type ResultOptions = {
  outputDateFormat: string;
  includeCurrency: boolean; // only when the source had a currency column
  extraIdentificationColumns: ReadonlyArray<string>;
};

const renderDate = (date: Date | null, pattern: string): string =>
  date === null ? INVALID_DATE : formatDate(date, pattern);

/* -------------------------- Results CSV --------------------------- */

export const resultColumns = (options: ResultOptions): string[] =>
  Array.from(
    new Set([
      ...BASE_RESULT_COLUMNS,
      ...(options.includeCurrency ? ["Currency"] : []),
      ...options.extraIdentificationColumns,
    ]),
  );

/** One row per matched lot, in the order the sales were produced */
export function flattenSaleResults(
  sales: ReadonlyArray<SaleResult>,
  options: ResultOptions,
): ResultRow[] {
  const rows: ResultRow[] = [];

  for (const sale of sales) {
    const sellDate = renderDate(sale.date, options.outputDateFormat);

    for (const lot of sale.matchedLots) {
      const known = lot.origin.kind === "known" ? lot.origin : undefined;
      const row: ResultRow = {
        Identifier: sale.identifier,
        "Buy Date": known
          ? renderDate(known.acquisitionDate, options.outputDateFormat)
          : UNKNOWN,
        "Buy Price": known ? formatAtoms(known.costBasis) : UNKNOWN,
        "Sell Date": sellDate,
        "Sell Price": formatAtoms(sale.salePrice),
        "Sell Qty": formatAtoms(sale.saleQuantity),
        "Used Qty": formatAtoms(lot.usedQuantity),
        "Gain/Loss": known ? formatGain(known.gain) : UNKNOWN,
      };
      if (options.includeCurrency) row.Currency = sale.currency;
      for (const column of options.extraIdentificationColumns) {
        row[column] = sale.extraAttributes.get(column) ?? "";
      }
      rows.push(row);
    }
  }

  return rows;
}

export function buildResultsCsv(
  sales: ReadonlyArray<SaleResult>,
  options: ResultOptions,
): string {
  return stringify(flattenSaleResults(sales, options), {
    header: true,
    columns: resultColumns(options),
  });
}

export function writeResultsCsvFile(
  sales: ReadonlyArray<SaleResult>,
  options: ResultOptions,
  path = "fifo_results.csv",
): void {
  const csv = buildResultsCsv(sales, options);
  writeFileSync(path, csv, "utf8");
  const rowCount = sales.reduce((n, sale) => n + sale.matchedLots.length, 0);
  console.log(`Wrote ${path} (${rowCount} rows)`);
}

/* ------------------------- Open lots CSV -------------------------- */

export function buildOpenLotsCsv(
  positions: ReadonlyArray<OpenPosition>,
  outputDateFormat: string,
): string {
  const rows = [];
  for (const position of positions) {
    for (const lot of position.lots) {
      rows.push({
        Identifier: position.identifier,
        Currency: position.currency,
        Acquired: renderDate(lot.acquisitionDate, outputDateFormat),
        "Unit Price": formatAtoms(lot.unitPrice),
        "Remaining Qty": formatAtoms(lot.remainingQuantity),
        // At acquisition price, not marked to market
        "Remaining Cost": formatGain(
          valueAtoms(lot.remainingQuantity, lot.unitPrice),
        ),
      });
    }
  }

  return stringify(rows, {
    header: true,
    columns: [
      "Identifier",
      "Currency",
      "Acquired",
      "Unit Price",
      "Remaining Qty",
      "Remaining Cost",
    ],
  });
}

export function writeOpenLotsCsvFile(
  positions: ReadonlyArray<OpenPosition>,
  outputDateFormat: string,
  path = "fifo_open_lots.csv",
) {
  writeFileSync(path, buildOpenLotsCsv(positions, outputDateFormat), "utf8");
  console.log(`Wrote ${path}`);
}

import type { FifoConfig } from "../config";
import { parseDate } from "../domain/dates";
import {
  DateParseError,
  MissingValueError,
  RowParseError,
  SchemaError,
} from "../domain/errors";
import {
  NO_CURRENCY,
  type RawCell,
  type RawRecord,
  type RawTable,
  type RowIssue,
  type Transaction,
  type TxKind,
} from "../domain/types";
import { absAtoms, toAtoms } from "../domain/units";

export const MIN_COLUMNS = 4;

export type NormalizeResult = {
  transactions: Transaction[];
  skipped: RowIssue[]; // rows left out of the computation
  warnings: RowIssue[]; // rows kept with a degraded value
};

/** Every column the configuration reads, in mapping order */
export const selectedColumns = (config: FifoConfig): string[] => {
  const { date, type, quantity, price, identifier, currency } = config.columns;
  const columns = [identifier, date, type, quantity, price];
  if (currency !== undefined) columns.push(currency);
  return Array.from(new Set([...columns, ...config.extraIdentificationColumns]));
};

const isMissing = (cell: RawCell): boolean =>
  cell === null ||
  cell === undefined ||
  (typeof cell === "string" && cell.trim() === "") ||
  (typeof cell === "number" && Number.isNaN(cell));

export const cellText = (cell: RawCell): string => {
  if (cell === null || cell === undefined) return "";
  if (cell instanceof Date) return cell.toISOString();
  return String(cell).trim();
};

const classify = (value: string, config: FifoConfig): TxKind | undefined => {
  if (config.buyValues.has(value)) return "buy";
  if (config.sellValues.has(value)) return "sell";
  return undefined;
};

const parseAmount = (
  record: RawRecord,
  column: string,
  field: "quantity" | "price",
  rowNumber: number,
): bigint => {
  const cell = record[column];
  if (typeof cell !== "string" && typeof cell !== "number") {
    throw new RowParseError(rowNumber, field, cellText(cell));
  }
  try {
    return toAtoms(cell);
  } catch {
    throw new RowParseError(rowNumber, field, cell);
  }
};

/**
 * Turn a raw table into transactions. The table shape is checked up front
 * and fails with {@link SchemaError}; everything after that is per row and
 * only ever skips or degrades the offending row.
 */
export function normalizeTable(
  table: RawTable,
  config: FifoConfig,
): NormalizeResult {
  const transactions: Transaction[] = [];
  const skipped: RowIssue[] = [];
  const warnings: RowIssue[] = [];

  if (table.records.length === 0) {
    return { transactions, skipped, warnings };
  }

  if (table.columns.length < MIN_COLUMNS) {
    throw new SchemaError(
      `expected at least ${MIN_COLUMNS} columns, found ${table.columns.length}`,
      { columns: table.columns },
    );
  }

  const selected = selectedColumns(config);
  const absent = selected.filter((column) => !table.columns.includes(column));
  if (absent.length > 0) {
    throw new SchemaError(`mapped column(s) not found: ${absent.join(", ")}`, {
      columns: table.columns,
      absent,
    });
  }

  const { columns } = config;

  table.records.forEach((record, index) => {
    const rowNumber = index + 1;

    const missing = selected.filter((column) => isMissing(record[column]));
    if (missing.length > 0) {
      skipped.push({
        rowNumber,
        reason: "missing_value",
        error: new MissingValueError(rowNumber, missing),
      });
      return;
    }

    let quantity: bigint;
    let price: bigint;
    try {
      // Direction comes from the type column, never from the sign
      quantity = absAtoms(
        parseAmount(record, columns.quantity, "quantity", rowNumber),
      );
      price = parseAmount(record, columns.price, "price", rowNumber);
    } catch (error) {
      if (!(error instanceof RowParseError)) throw error;
      skipped.push({ rowNumber, reason: "invalid_number", error });
      return;
    }

    const typeValue = cellText(record[columns.type]);
    const kind = classify(typeValue, config);
    if (kind === undefined) {
      skipped.push({ rowNumber, reason: "unclassified", value: typeValue });
      return;
    }

    const rawDate = record[columns.date];
    const date = parseDate(rawDate, config.inputDateFormat);
    if (date === null) {
      warnings.push({
        rowNumber,
        reason: "invalid_date",
        error: new DateParseError(rowNumber, cellText(rawDate)),
      });
    }

    const extraAttributes = new Map<string, string>();
    for (const column of config.extraIdentificationColumns) {
      extraAttributes.set(column, cellText(record[column]));
    }

    transactions.push({
      rowNumber,
      date,
      kind,
      quantity,
      price,
      identifier: cellText(record[columns.identifier]),
      currency:
        columns.currency !== undefined
          ? cellText(record[columns.currency])
          : NO_CURRENCY,
      extraAttributes,
    });
  });

  return { transactions, skipped, warnings };
}

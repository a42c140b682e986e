import type {
  DateParseError,
  MissingValueError,
  RowParseError,
} from "./errors";

export const NO_CURRENCY = "N/A";

export type TxKind = "buy" | "sell";

/** One cell of a source table */
export type RawCell = string | number | Date | null | undefined;

export type RawRecord = Record<string, RawCell>;

export type RawTable = {
  columns: string[];
  records: RawRecord[];
};

export type Transaction = Readonly<{
  rowNumber: number; // 1-based data row in the source table
  date: Date | null; // null when the date could not be parsed
  kind: TxKind;
  quantity: bigint; // atoms, always >= 0
  price: bigint; // atoms per unit
  identifier: string;
  currency: string;
  extraAttributes: ReadonlyMap<string, string>;
}>;

export type OpenLot = {
  remainingQuantity: bigint;
  unitPrice: bigint;
  acquisitionDate: Date | null;
};

// Where a matched slice came from
export type LotOrigin =
  | {
      kind: "known";
      costBasis: bigint;
      acquisitionDate: Date | null;
      gain: bigint; // gain atoms, already rounded when rounding is on
    }
  | { kind: "unknown" };

export type MatchedLot = {
  usedQuantity: bigint;
  salePrice: bigint;
  origin: LotOrigin;
};

export type SaleResult = {
  rowNumber: number;
  date: Date | null;
  identifier: string;
  currency: string;
  salePrice: bigint;
  saleQuantity: bigint;
  totalGain: bigint; // sum of known-origin gains only
  matchedLots: MatchedLot[];
  extraAttributes: ReadonlyMap<string, string>;
};

export type OpenPosition = {
  identifier: string;
  currency: string;
  lots: OpenLot[];
};

export type RowIssue =
  | { rowNumber: number; reason: "missing_value"; error: MissingValueError }
  | { rowNumber: number; reason: "invalid_number"; error: RowParseError }
  | { rowNumber: number; reason: "invalid_date"; error: DateParseError }
  | { rowNumber: number; reason: "unclassified"; value: string };

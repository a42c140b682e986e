import { readFileSync } from "fs";
import { parse } from "csv-parse/sync";
import { FileLoadError } from "../domain/errors";
import type { RawRecord, RawTable } from "../domain/types";

/** Parse CSV text whose first line is the header into a raw table */
export function parseCsvTable(content: string): RawTable {
  const lines: string[][] = parse(content, {
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const [header = [], ...body] = lines;
  const records: RawRecord[] = [];
  for (const cells of body) {
    // Rows with nothing in them at all are dropped
    if (cells.every((cell) => cell === "")) continue;

    const record: RawRecord = {};
    header.forEach((column, index) => {
      record[column] = cells[index];
    });
    records.push(record);
  }

  return { columns: header, records };
}

export function loadCsvTable(filePath: string): RawTable {
  try {
    return parseCsvTable(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new FileLoadError(filePath, error);
  }
}

import { mkdtempSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { Transaction, TxKind } from "../domain/types";
import { toAtoms } from "../domain/units";
import { computeFifoSales } from "../report/fifo";
import {
  buildOpenLotsCsv,
  buildResultsCsv,
  flattenSaleResults,
  resultColumns,
  type ResultOptions,
  writeOpenLotsCsvFile,
  writeResultsCsvFile,
} from "./results-csv";

const HEADER =
  "Identifier,Buy Date,Buy Price,Sell Date,Sell Price,Sell Qty,Used Qty,Gain/Loss";

const plain: ResultOptions = {
  outputDateFormat: "yyyy-MM-dd",
  includeCurrency: false,
  extraIdentificationColumns: [],
};

let nextRow = 1;

const createTx = (
  kind: TxKind,
  quantity: string,
  price: string,
  date: Date | null,
  extra: Record<string, string> = {},
): Transaction => ({
  rowNumber: nextRow++,
  date,
  kind,
  quantity: toAtoms(quantity),
  price: toAtoms(price),
  identifier: "ACME",
  currency: "USD",
  extraAttributes: new Map(Object.entries(extra)),
});

const day = (n: number) => new Date(2025, 0, n);

const salesOf = (txs: Transaction[]) =>
  computeFifoSales(txs, { roundGains: true });

describe("resultColumns", () => {
  it("appends currency and extra columns after the fixed ones", () => {
    expect(
      resultColumns({
        ...plain,
        includeCurrency: true,
        extraIdentificationColumns: ["Name", "ISIN"],
      }),
    ).toEqual([...HEADER.split(","), "Currency", "Name", "ISIN"]);
  });

  it("does not repeat an extra column that is already present", () => {
    expect(
      resultColumns({ ...plain, extraIdentificationColumns: ["Identifier"] }),
    ).toEqual(HEADER.split(","));
  });
});

describe("flattenSaleResults", () => {
  it("emits one row per matched lot", () => {
    const { sales } = salesOf([
      createTx("buy", "10", "5", day(1)),
      createTx("buy", "5", "6", day(2)),
      createTx("sell", "12", "8", day(3)),
    ]);

    expect(flattenSaleResults(sales, plain)).toEqual([
      {
        Identifier: "ACME",
        "Buy Date": "2025-01-01",
        "Buy Price": "5",
        "Sell Date": "2025-01-03",
        "Sell Price": "8",
        "Sell Qty": "12",
        "Used Qty": "10",
        "Gain/Loss": "30",
      },
      {
        Identifier: "ACME",
        "Buy Date": "2025-01-02",
        "Buy Price": "6",
        "Sell Date": "2025-01-03",
        "Sell Price": "8",
        "Sell Qty": "12",
        "Used Qty": "2",
        "Gain/Loss": "4",
      },
    ]);
  });

  it("writes Unknown for lots without a matching buy", () => {
    const { sales } = salesOf([createTx("sell", "5", "10", day(1))]);

    expect(flattenSaleResults(sales, plain)).toEqual([
      {
        Identifier: "ACME",
        "Buy Date": "Unknown",
        "Buy Price": "Unknown",
        "Sell Date": "2025-01-01",
        "Sell Price": "10",
        "Sell Qty": "5",
        "Used Qty": "5",
        "Gain/Loss": "Unknown",
      },
    ]);
  });

  it("writes Invalid Date for sales whose date did not parse", () => {
    const { sales } = salesOf([
      createTx("buy", "1", "1", day(1)),
      createTx("sell", "1", "2", null),
    ]);

    const [row] = flattenSaleResults(sales, plain);
    expect(row["Sell Date"]).toBe("Invalid Date");
    expect(row["Buy Date"]).toBe("2025-01-01");
    expect(row["Gain/Loss"]).toBe("1");
  });

  it("uses the output date format", () => {
    const { sales } = salesOf([createTx("sell", "1", "2", day(3))]);

    const [row] = flattenSaleResults(sales, {
      ...plain,
      outputDateFormat: "dd/MM/yyyy",
    });
    expect(row["Sell Date"]).toBe("03/01/2025");
  });

  it("carries currency and extra attributes through", () => {
    const { sales } = salesOf([
      createTx("sell", "1", "2", day(1), { Name: "Acme Corp" }),
    ]);

    const [row] = flattenSaleResults(sales, {
      ...plain,
      includeCurrency: true,
      extraIdentificationColumns: ["Name", "ISIN"],
    });
    expect(row.Currency).toBe("USD");
    expect(row.Name).toBe("Acme Corp");
    expect(row.ISIN).toBe("");
  });
});

describe("buildResultsCsv", () => {
  it("should generate a CSV with headers when there are no sales", () => {
    expect(buildResultsCsv([], plain)).toBe(`${HEADER}\n`);
  });

  it("serializes known and unknown lots", () => {
    const { sales } = salesOf([
      createTx("buy", "3", "2", day(1)),
      createTx("sell", "5", "4", day(2)),
    ]);

    expect(buildResultsCsv(sales, plain)).toBe(
      [
        HEADER,
        "ACME,2025-01-01,2,2025-01-02,4,5,3,6",
        "ACME,Unknown,Unknown,2025-01-02,4,5,2,Unknown",
        "",
      ].join("\n"),
    );
  });

  it("quotes values that contain the delimiter", () => {
    const { sales } = salesOf([
      createTx("sell", "1", "2", day(1), { Name: "Acme, Inc." }),
    ]);

    const csv = buildResultsCsv(sales, {
      ...plain,
      includeCurrency: true,
      extraIdentificationColumns: ["Name"],
    });
    expect(csv.split("\n")[1]).toBe(
      'ACME,Unknown,Unknown,2025-01-01,2,1,1,Unknown,USD,"Acme, Inc."',
    );
  });
});

describe("buildOpenLotsCsv", () => {
  it("lists the lots still open at the end", () => {
    const { openPositions } = salesOf([
      createTx("buy", "10", "5", day(1)),
      createTx("buy", "5", "6", day(2)),
      createTx("sell", "12", "8", day(3)),
    ]);

    expect(buildOpenLotsCsv(openPositions, "yyyy-MM-dd")).toBe(
      [
        "Identifier,Currency,Acquired,Unit Price,Remaining Qty,Remaining Cost",
        "ACME,USD,2025-01-02,6,3,18",
        "",
      ].join("\n"),
    );
  });
});

describe("writing files", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes both reports and logs their paths", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = mkdtempSync(join(tmpdir(), "fifo-out-"));
    const resultsPath = join(dir, "results.csv");
    const openLotsPath = join(dir, "open.csv");
    const { sales, openPositions } = salesOf([
      createTx("buy", "3", "2", day(1)),
      createTx("sell", "5", "4", day(2)),
    ]);

    writeResultsCsvFile(sales, plain, resultsPath);
    writeOpenLotsCsvFile(openPositions, "yyyy-MM-dd", openLotsPath);

    expect(readFileSync(resultsPath, "utf8")).toBe(buildResultsCsv(sales, plain));
    expect(readFileSync(openLotsPath, "utf8")).toBe(
      "Identifier,Currency,Acquired,Unit Price,Remaining Qty,Remaining Cost\n",
    );
    expect(log).toHaveBeenCalledWith(`Wrote ${resultsPath} (2 rows)`);
    expect(log).toHaveBeenCalledWith(`Wrote ${openLotsPath}`);
  });
});

#!/usr/bin/env node
import { loadConfig } from "./config";
import type { RowIssue } from "./domain/types";
import { formatAtoms, formatGain } from "./domain/units";
import {
  writeOpenLotsCsvFile,
  writeResultsCsvFile,
} from "./export/results-csv";
import { loadCsvTable } from "./import/csv";
import { computeFifoReport, summarizeSales } from "./report/pipeline";

const USAGE =
  "Usage: tsx src/main.ts <transactions.csv> <config.json> [results.csv] [open-lots.csv]";

const describeIssue = (issue: RowIssue): string =>
  issue.reason === "unclassified"
    ? `Row ${issue.rowNumber}: type ${JSON.stringify(issue.value)} is neither Buy nor Sell`
    : issue.error.message;

// Match transactions with first in first out and write the gain/loss report
function main() {
  const [
    inputPath,
    configPath,
    resultsPath = "fifo_results.csv",
    openLotsPath = "fifo_open_lots.csv",
  ] = process.argv.slice(2);

  if (!inputPath || !configPath) {
    console.error(USAGE);
    process.exit(1);
  }

  try {
    const config = loadConfig(configPath);

    console.log(`Reading transactions from: ${inputPath}`);
    const table = loadCsvTable(inputPath);

    const report = computeFifoReport(table, config);

    const dropped = report.skipped.filter((i) => i.reason !== "unclassified");
    if (dropped.length > 0) {
      console.warn(`Warning: ${dropped.length} row(s) were skipped.`);
    }
    for (const issue of report.skipped) console.warn(describeIssue(issue));
    for (const issue of report.warnings) console.warn(describeIssue(issue));

    for (const s of summarizeSales(report.sales)) {
      const unknown =
        s.unknownQuantity > 0n
          ? `, ${formatAtoms(s.unknownQuantity)} with unknown cost basis`
          : "";
      console.log(
        `${s.identifier} (${s.currency}): ${s.saleCount} sale(s), gain/loss ${formatGain(s.totalGain)}${unknown}`,
      );
    }

    writeResultsCsvFile(
      report.sales,
      {
        outputDateFormat: config.outputDateFormat,
        includeCurrency: config.columns.currency !== undefined,
        extraIdentificationColumns: config.extraIdentificationColumns,
      },
      resultsPath,
    );
    writeOpenLotsCsvFile(
      report.openPositions,
      config.outputDateFormat,
      openLotsPath,
    );
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}

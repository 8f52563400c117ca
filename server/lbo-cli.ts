/**
 * Runs the LBO model from the command line.
 * Run with: npx tsx server/lbo-cli.ts [--input deal.json] [--xlsx out.xlsx] [--csv outDir] [--no-sensitivity]
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";
import {
  LBO_EXAMPLE_INPUT_FILE,
  createAssumptionSet,
  readAssumptionInputFile,
} from "./services/lboAssumptions";
import { isLBOModelError } from "./services/lboErrors";
import { runLBOModel } from "./services/lboModelService";
import {
  BALANCE_SHEET_COLUMNS,
  CASH_FLOW_COLUMNS,
  INCOME_STATEMENT_COLUMNS,
  exportStatementsCsv,
  formatLBOSummary,
  formatSensitivityTables,
  formatStatementTable,
  generateLBOExcel,
} from "./services/lboReportService";
import { runSensitivityAnalysis } from "./services/sensitivityService";

async function main(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      xlsx: { type: "string" },
      csv: { type: "string" },
      "no-sensitivity": { type: "boolean", default: false },
    },
  });

  const input = readAssumptionInputFile(values.input ?? LBO_EXAMPLE_INPUT_FILE);
  const assumptions = createAssumptionSet(input);
  const result = runLBOModel(assumptions);

  console.log(formatLBOSummary(result));

  const sensitivity = values["no-sensitivity"] ? undefined : runSensitivityAnalysis(assumptions);
  if (sensitivity) {
    console.log("\n" + formatSensitivityTables(sensitivity));
  }

  console.log("\nIncome Statement Projections:");
  console.log(formatStatementTable(result.incomeStatement, INCOME_STATEMENT_COLUMNS));
  console.log("\nCash Flow Projections:");
  console.log(formatStatementTable(result.cashFlow, CASH_FLOW_COLUMNS));
  console.log("\nBalance Sheet Projections:");
  console.log(formatStatementTable(result.balanceSheet, BALANCE_SHEET_COLUMNS));

  if (values.xlsx) {
    const buffer = await generateLBOExcel(result, sensitivity);
    fs.writeFileSync(values.xlsx, buffer);
    console.log(`\n[LBO CLI] Wrote ${values.xlsx}`);
  }

  if (values.csv) {
    fs.mkdirSync(values.csv, { recursive: true });
    const csv = exportStatementsCsv(result);
    for (const [name, content] of Object.entries(csv)) {
      const file = path.join(values.csv, `${name}.csv`);
      fs.writeFileSync(file, content);
      console.log(`[LBO CLI] Wrote ${file}`);
    }
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (isLBOModelError(error)) {
    console.error(`[LBO CLI] ${error.code}: ${error.message}`);
  } else {
    console.error("[LBO CLI] Unexpected error:", error);
  }
  process.exitCode = 1;
});

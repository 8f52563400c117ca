import ExcelJS from "exceljs";
import Papa from "papaparse";
import type {
  BalanceSheetRow,
  CashFlowRow,
  IncomeStatementRow,
  LBOModelResult,
} from "./lboModelService";
import type { SensitivityResult, SensitivityRow } from "./sensitivityService";

// ============ COLUMN DEFINITIONS ============

export interface StatementColumn<Row> {
  header: string;
  value: (row: Row) => number | null;
  format?: "currency" | "percent" | "multiple";
}

export const INCOME_STATEMENT_COLUMNS: StatementColumn<IncomeStatementRow>[] = [
  { header: "Revenue", value: (r) => r.revenue },
  { header: "EBITDA Margin", value: (r) => r.ebitdaMargin, format: "percent" },
  { header: "EBITDA", value: (r) => r.ebitda },
  { header: "Depreciation", value: (r) => r.depreciation },
  { header: "EBIT", value: (r) => r.ebit },
  { header: "Interest Expense", value: (r) => r.interestExpense },
  { header: "EBT", value: (r) => r.ebt },
  { header: "Tax", value: (r) => r.tax },
  { header: "Net Income", value: (r) => r.netIncome },
];

export const CASH_FLOW_COLUMNS: StatementColumn<CashFlowRow>[] = [
  { header: "Net Income", value: (r) => r.netIncome },
  { header: "D&A", value: (r) => r.depreciationAndAmortization },
  { header: "ΔWC", value: (r) => r.workingCapitalChange },
  { header: "Capex", value: (r) => r.capex },
  { header: "Debt Amortization", value: (r) => r.debtAmortization },
  { header: "Interest Paid", value: (r) => r.interestPaid },
  { header: "FCF", value: (r) => r.freeCashFlow },
  { header: "LFCF", value: (r) => r.leveredFreeCashFlow },
  { header: "Cumulative FCF", value: (r) => r.cumulativeLeveredFreeCashFlow },
];

export const BALANCE_SHEET_COLUMNS: StatementColumn<BalanceSheetRow>[] = [
  { header: "Debt", value: (r) => r.debtBalance },
  { header: "Equity", value: (r) => r.equityBalance },
  { header: "Enterprise Value", value: (r) => r.enterpriseValue },
  { header: "Implied EV/EBITDA", value: (r) => r.impliedEvEbitda, format: "multiple" },
];

// ============ TEXT OUTPUT ============

function money(value: number): string {
  return value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatLBOSummary(result: LBOModelResult): string {
  const { assumptions: a, exitValuation, returns, incomeStatement } = result;
  const exitMargin = incomeStatement[incomeStatement.length - 1].ebitdaMargin;

  const lines = [
    `LBO Model Summary for ${a.companyName}`,
    "=".repeat(50),
    `Entry Year: ${a.entryYear}`,
    `Exit Year: ${a.exitYear}`,
    `Holding Period: ${a.holdingPeriod} years`,
    "",
    `Entry EBITDA: $${money(a.entryEBITDA)}M`,
    `Purchase Price (at ${a.purchasePriceMultiple.toFixed(1)}x EBITDA): $${money(a.purchasePrice)}M`,
    "Financing Structure:",
    `  - Debt: $${money(a.debtAmount)}M (${(a.debtPercentage * 100).toFixed(1)}%)`,
    `  - Equity: $${money(a.equityAmount)}M (${((1 - a.debtPercentage) * 100).toFixed(1)}%)`,
    "",
    "Exit Metrics:",
    `Exit EBITDA: $${money(exitValuation.exitEBITDA)}M`,
    `Exit EBITDA Margin: ${(exitMargin * 100).toFixed(1)}%`,
    `Exit Multiple: ${exitValuation.exitMultiple.toFixed(1)}x`,
    `Exit Equity Value: $${money(exitValuation.exitEquityValue)}M`,
    "",
    "Returns:",
    `IRR: ${returns.irr.toFixed(1)}%`,
    `MOIC: ${returns.moic.toFixed(2)}x`,
    `DPI: ${returns.dpi.toFixed(2)}x`,
    `TVPI: ${returns.tvpi.toFixed(2)}x`,
  ];
  return lines.join("\n");
}

function sensitivityTable(title: string, header: string, rows: SensitivityRow[], label: (v: number) => string): string {
  const body = rows.map((r) => `${label(r.value)}\t${r.irr.toFixed(1)}%\t${r.moic.toFixed(2)}x`);
  return [`${title}:`, `${header}\tIRR\tMOIC`, ...body].join("\n");
}

export function formatSensitivityTables(sensitivity: SensitivityResult): string {
  return [
    sensitivityTable("Exit Multiple Sensitivity", "Exit Multiple", sensitivity.exitMultiple, (v) => `${v.toFixed(1)}x`),
    sensitivityTable("Revenue Growth Sensitivity", "Growth Rate", sensitivity.revenueGrowth, (v) => `${v.toFixed(1)}%`),
    sensitivityTable("EBITDA Margin Sensitivity", "Exit Margin", sensitivity.exitMargin, (v) => `${v.toFixed(1)}%`),
  ].join("\n\n");
}

/** Fixed-width table, one line per year, values rounded to two decimals. */
export function formatStatementTable<Row extends { year: number }>(
  rows: readonly Row[],
  columns: readonly StatementColumn<Row>[]
): string {
  const widths = columns.map((c) => Math.max(c.header.length, 12));
  const header = ["Year", ...columns.map((c, i) => c.header.padStart(widths[i]))].join("  ");
  const body = rows.map((row) =>
    [
      String(row.year).padEnd(4),
      ...columns.map((c, i) => {
        const value = c.value(row);
        return (value === null ? "n/a" : value.toFixed(2)).padStart(widths[i]);
      }),
    ].join("  ")
  );
  return [header, ...body].join("\n");
}

// ============ CSV EXPORT ============

function statementCsv<Row extends { year: number }>(
  rows: readonly Row[],
  columns: readonly StatementColumn<Row>[]
): string {
  return Papa.unparse({
    fields: ["Year", ...columns.map((c) => c.header)],
    data: rows.map((row) => [row.year, ...columns.map((c) => c.value(row))]),
  });
}

export function exportStatementsCsv(result: LBOModelResult): {
  incomeStatement: string;
  cashFlow: string;
  balanceSheet: string;
} {
  return {
    incomeStatement: statementCsv(result.incomeStatement, INCOME_STATEMENT_COLUMNS),
    cashFlow: statementCsv(result.cashFlow, CASH_FLOW_COLUMNS),
    balanceSheet: statementCsv(result.balanceSheet, BALANCE_SHEET_COLUMNS),
  };
}

// ============ EXCEL EXPORT ============

const currencyFormat = '"$"#,##0.00';
const percentFormat = "0.0%";
const multipleFormat = '0.00"x"';
const headerFill: ExcelJS.Fill = { type: "pattern", pattern: "solid", fgColor: { argb: "FFE0E0E0" } };

function numFmtFor(format: StatementColumn<unknown>["format"]): string {
  if (format === "percent") return percentFormat;
  if (format === "multiple") return multipleFormat;
  return currencyFormat;
}

function addStatementSheet<Row extends { year: number }>(
  workbook: ExcelJS.Workbook,
  name: string,
  rows: readonly Row[],
  columns: readonly StatementColumn<Row>[]
): ExcelJS.Worksheet {
  const sheet = workbook.addWorksheet(name);
  sheet.columns = [{ width: 25 }, ...rows.map(() => ({ width: 15 }))];

  const header = sheet.addRow(["($M)", ...rows.map((r) => r.year)]);
  header.font = { bold: true };
  header.fill = headerFill;

  for (const column of columns) {
    const excelRow = sheet.addRow([column.header, ...rows.map((r) => column.value(r))]);
    for (let i = 2; i <= rows.length + 1; i++) {
      excelRow.getCell(i).numFmt = numFmtFor(column.format);
    }
  }
  return sheet;
}

function addLabelledValues(
  sheet: ExcelJS.Worksheet,
  entries: [label: string, value: number | string, numFmt?: string][]
): void {
  for (const [label, value, numFmt] of entries) {
    const row = sheet.addRow([label, value]);
    if (numFmt) row.getCell(2).numFmt = numFmt;
  }
}

/**
 * Builds the model workbook: summary, the three statements, returns and,
 * when given, the sensitivity tables. IRR cells hold fractions so Excel's
 * percent format applies.
 */
export function buildLBOWorkbook(result: LBOModelResult, sensitivity?: SensitivityResult): ExcelJS.Workbook {
  const { assumptions: a, exitValuation, returns } = result;
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "LBO Projection Model";
  workbook.created = new Date();

  // ============ EXECUTIVE SUMMARY ============
  const summarySheet = workbook.addWorksheet("Executive_Summary");
  summarySheet.columns = [{ width: 35 }, { width: 20 }];
  summarySheet.getCell("A1").value = `${a.companyName} - LBO Model`;
  summarySheet.getCell("A1").font = { bold: true, size: 16 };
  summarySheet.getCell("A2").value = `Holding Period: ${a.entryYear}-${a.exitYear} (${a.holdingPeriod} years)`;
  summarySheet.addRow([]);
  addLabelledValues(summarySheet, [
    ["Entry EBITDA", a.entryEBITDA, currencyFormat],
    ["Purchase Price Multiple", a.purchasePriceMultiple, multipleFormat],
    ["Purchase Price", a.purchasePrice, currencyFormat],
    ["Debt", a.debtAmount, currencyFormat],
    ["Equity", a.equityAmount, currencyFormat],
    ["Interest Rate", a.interestRate, percentFormat],
    ["Amortization Years", a.amortizationYears],
    ["Tax Rate", a.taxRate, percentFormat],
  ]);

  addStatementSheet(workbook, "Income_Statement", result.incomeStatement, INCOME_STATEMENT_COLUMNS);
  addStatementSheet(workbook, "Cash_Flow", result.cashFlow, CASH_FLOW_COLUMNS);
  addStatementSheet(workbook, "Balance_Sheet", result.balanceSheet, BALANCE_SHEET_COLUMNS);

  // ============ RETURNS ANALYSIS ============
  const returnsSheet = workbook.addWorksheet("Returns_Analysis");
  returnsSheet.columns = [{ width: 30 }, { width: 20 }];
  returnsSheet.getCell("A1").value = "EXIT VALUATION";
  returnsSheet.getCell("A1").font = { bold: true, size: 14 };
  addLabelledValues(returnsSheet, [
    ["Exit Year", exitValuation.exitYear],
    ["Exit EBITDA", exitValuation.exitEBITDA, currencyFormat],
    ["Exit Multiple", exitValuation.exitMultiple, multipleFormat],
    ["Exit Enterprise Value", exitValuation.exitEnterpriseValue, currencyFormat],
    ["Less: Exit Debt", -exitValuation.exitDebt, currencyFormat],
    ["Exit Equity Value", exitValuation.exitEquityValue, currencyFormat],
    ["IRR", returns.irr / 100, percentFormat],
    ["MOIC", returns.moic, multipleFormat],
    ["DPI", returns.dpi, multipleFormat],
    ["TVPI", returns.tvpi, multipleFormat],
  ]);
  returnsSheet.addRow([]);
  const flowsHeader = returnsSheet.addRow(["Equity Cash Flows", ...returns.cashFlows.map((_, t) => `t=${t}`)]);
  flowsHeader.font = { bold: true };
  const flowsRow = returnsSheet.addRow(["($M)", ...returns.cashFlows]);
  for (let i = 2; i <= returns.cashFlows.length + 1; i++) flowsRow.getCell(i).numFmt = currencyFormat;

  // ============ SENSITIVITY ANALYSIS ============
  if (sensitivity) {
    const sensSheet = workbook.addWorksheet("Sensitivity");
    sensSheet.columns = [{ width: 20 }, { width: 12 }, { width: 12 }];
    const sweeps: [string, SensitivityRow[], string][] = [
      ["Exit Multiple", sensitivity.exitMultiple, multipleFormat],
      ["Revenue Growth (%)", sensitivity.revenueGrowth, "0.0"],
      ["Exit Margin (%)", sensitivity.exitMargin, "0.0"],
    ];
    for (const [title, rows, valueFormat] of sweeps) {
      const header = sensSheet.addRow([title, "IRR", "MOIC"]);
      header.font = { bold: true };
      header.fill = headerFill;
      for (const r of rows) {
        const excelRow = sensSheet.addRow([r.value, r.irr / 100, r.moic]);
        excelRow.getCell(1).numFmt = valueFormat;
        excelRow.getCell(2).numFmt = percentFormat;
        excelRow.getCell(3).numFmt = multipleFormat;
      }
      sensSheet.addRow([]);
    }
  }

  return workbook;
}

export async function generateLBOExcel(result: LBOModelResult, sensitivity?: SensitivityResult): Promise<Buffer> {
  const workbook = buildLBOWorkbook(result, sensitivity);
  const buffer = await workbook.xlsx.writeBuffer();
  console.log(`[LBO Report] Workbook for ${result.assumptions.companyName}: ${workbook.worksheets.length} sheets`);
  return Buffer.from(buffer);
}

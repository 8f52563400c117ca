import type { AssumptionSet } from "./lboAssumptions";
import { getLBOConfig } from "./lboConfig";
import { DegenerateHoldingPeriodError, InvalidAssumptionError } from "./lboErrors";
import { solveIRR, type ReturnSolverOptions } from "./returnSolver";

// Depreciation is booked at 80% of the year's capex spend. Fixed convention, not an input.
export const DEPRECIATION_TO_CAPEX = 0.8;
const DAYS_PER_YEAR = 365;

// ============ STATEMENT ROWS ============

export interface IncomeStatementRow {
  year: number;
  revenue: number;
  ebitdaMargin: number;
  ebitda: number;
  depreciation: number;
  ebit: number;
  interestExpense: number;
  ebt: number;
  tax: number;
  netIncome: number;
}

export interface CashFlowRow {
  year: number;
  netIncome: number;
  depreciationAndAmortization: number;
  workingCapitalChange: number;
  capex: number; // negative: cash out
  debtAmortization: number; // negative: principal repaid
  interestPaid: number; // negative
  freeCashFlow: number;
  leveredFreeCashFlow: number;
  cumulativeLeveredFreeCashFlow: number;
}

export interface BalanceSheetRow {
  year: number;
  debtBalance: number;
  equityBalance: number;
  enterpriseValue: number;
  impliedEvEbitda: number | null; // null when EBITDA is zero
}

export interface ExitValuation {
  exitYear: number;
  exitEBITDA: number;
  exitMultiple: number;
  exitEnterpriseValue: number;
  exitDebt: number;
  exitEquityValue: number;
}

export interface LBOReturns {
  irr: number; // percent
  moic: number;
  dpi: number;
  tvpi: number;
  cashFlows: number[];
}

export interface LBOModelResult {
  assumptions: AssumptionSet;
  incomeStatement: readonly IncomeStatementRow[];
  cashFlow: readonly CashFlowRow[];
  balanceSheet: readonly BalanceSheetRow[];
  exitValuation: ExitValuation;
  returns: LBOReturns;
}

export interface LBORunOptions {
  /** Multiple applied to exit-year EBITDA. Defaults to the purchase-price multiple. */
  exitMultiple?: number;
  solver?: ReturnSolverOptions;
  verbose?: boolean;
}

// ============ INCOME STATEMENT ============

function buildIncomeStatement(a: AssumptionSet, log: (message: string) => void): IncomeStatementRow[] {
  const numYears = a.years.length;
  const marginStep = (a.ebitdaMarginExit - a.ebitdaMarginEntry) / (numYears - 1);
  const annualInstallment = a.debtAmount / a.amortizationYears;

  // Interest is charged on the balance already reduced through year t.
  const remainingDebt: number[] = [a.debtAmount];
  for (let t = 1; t < numYears; t++) {
    remainingDebt.push(Math.max(0, remainingDebt[t - 1] - annualInstallment));
  }

  return a.years.map((year, t) => {
    const revenue = a.revenueEntry * Math.pow(1 + a.revenueGrowth, t);
    const ebitdaMargin = a.ebitdaMarginEntry + marginStep * t;
    const ebitda = revenue * ebitdaMargin;
    const depreciation = revenue * a.capexPercent * DEPRECIATION_TO_CAPEX;
    const ebit = ebitda - depreciation;
    const interestExpense = remainingDebt[t] * a.interestRate;
    const ebt = ebit - interestExpense;
    const tax = Math.max(0, ebt * a.taxRate); // no benefit on a pre-tax loss
    const netIncome = ebt - tax;

    log(
      `${year}: Revenue=${revenue.toFixed(2)}M, EBITDA=${ebitda.toFixed(2)}M (${(ebitdaMargin * 100).toFixed(1)}%), ` +
        `Interest=${interestExpense.toFixed(2)}M on ${remainingDebt[t].toFixed(2)}M, Net Income=${netIncome.toFixed(2)}M`
    );

    return { year, revenue, ebitdaMargin, ebitda, depreciation, ebit, interestExpense, ebt, tax, netIncome };
  });
}

// ============ CASH FLOW ============

function buildCashFlow(a: AssumptionSet, income: readonly IncomeStatementRow[]): CashFlowRow[] {
  const annualInstallment = a.debtAmount / a.amortizationYears;
  const rows: CashFlowRow[] = [];
  let remainingBalance = a.debtAmount;
  let cumulative = 0;

  for (let t = 0; t < income.length; t++) {
    const is = income[t];

    const revenueDiff = t === 0 ? 0 : is.revenue - income[t - 1].revenue;
    const arChange = (revenueDiff * a.dso) / DAYS_PER_YEAR;
    const invChange = (revenueDiff * a.dsi) / DAYS_PER_YEAR;
    const apChange = (revenueDiff * a.dpo) / DAYS_PER_YEAR;
    const workingCapitalChange = apChange - (arChange + invChange);

    const capex = -is.revenue * a.capexPercent;

    // Separate running balance from the income-statement schedule; no payment in the acquisition year.
    let debtAmortization = 0;
    if (t > 0) {
      const payment = Math.min(annualInstallment, remainingBalance);
      debtAmortization = -payment;
      remainingBalance -= payment;
    }

    const interestPaid = -is.interestExpense;
    const freeCashFlow = is.netIncome + is.depreciation + workingCapitalChange + capex;
    const leveredFreeCashFlow = freeCashFlow + debtAmortization + interestPaid;
    cumulative += leveredFreeCashFlow;

    rows.push({
      year: is.year,
      netIncome: is.netIncome,
      depreciationAndAmortization: is.depreciation,
      workingCapitalChange,
      capex,
      debtAmortization,
      interestPaid,
      freeCashFlow,
      leveredFreeCashFlow,
      cumulativeLeveredFreeCashFlow: cumulative,
    });
  }
  return rows;
}

// ============ BALANCE SHEET ============

function buildBalanceSheet(
  a: AssumptionSet,
  income: readonly IncomeStatementRow[],
  cashFlow: readonly CashFlowRow[]
): BalanceSheetRow[] {
  const rows: BalanceSheetRow[] = [];
  let debtBalance = a.debtAmount;

  for (let t = 0; t < cashFlow.length; t++) {
    if (t > 0) {
      debtBalance -= -cashFlow[t].debtAmortization;
    }
    // Retained-value proxy: entry equity plus cumulative levered FCF.
    const equityBalance = a.equityAmount + cashFlow[t].cumulativeLeveredFreeCashFlow;
    const enterpriseValue = debtBalance + equityBalance;
    const ebitda = income[t].ebitda;

    rows.push({
      year: cashFlow[t].year,
      debtBalance,
      equityBalance,
      enterpriseValue,
      impliedEvEbitda: ebitda === 0 ? null : enterpriseValue / ebitda,
    });
  }
  return rows;
}

// ============ RETURNS ============

function calculateReturns(
  a: AssumptionSet,
  exitValuation: ExitValuation,
  cashFlow: readonly CashFlowRow[],
  solver: ReturnSolverOptions | undefined
): LBOReturns {
  // Entry cheque, interim levered FCF as distributions, then exit equity.
  const cashFlows = [-a.equityAmount];
  for (let t = 1; t < cashFlow.length - 1; t++) {
    cashFlows.push(cashFlow[t].leveredFreeCashFlow);
  }
  cashFlows.push(exitValuation.exitEquityValue);

  const irr = solveIRR(cashFlows, solver);
  const moic = exitValuation.exitEquityValue / a.equityAmount;
  const distributions = cashFlows.slice(1).reduce((sum, cf) => sum + Math.max(0, cf), 0);
  const dpi = distributions / a.equityAmount;

  return { irr, moic, dpi, tvpi: moic, cashFlows };
}

/**
 * Projects the three statements for every year from entry to exit and
 * derives sponsor returns. Pure: the same AssumptionSet always yields the
 * same result.
 *
 * @throws DegenerateHoldingPeriodError when fewer than two years are projected
 * @throws NoRootError / NonConvergentReturnError from the IRR solve
 */
export function runLBOModel(assumptions: AssumptionSet, options: LBORunOptions = {}): LBOModelResult {
  const verbose = options.verbose ?? getLBOConfig().verbose;
  const log = (message: string) => {
    if (verbose) console.log(`[LBO Model] ${message}`);
  };

  const numYears = assumptions.years.length;
  if (numYears < 2) {
    throw new DegenerateHoldingPeriodError(numYears);
  }

  const exitMultiple = options.exitMultiple ?? assumptions.purchasePriceMultiple;
  if (!Number.isFinite(exitMultiple)) {
    throw new InvalidAssumptionError([`exitMultiple must be a finite number (got ${exitMultiple})`]);
  }

  log(`${assumptions.companyName}: ${assumptions.years[0]}-${assumptions.years[numYears - 1]}`);
  log(
    `Purchase Price=${assumptions.purchasePrice.toFixed(2)}M (${assumptions.purchasePriceMultiple}x ${assumptions.entryEBITDA.toFixed(2)}M), ` +
      `Debt=${assumptions.debtAmount.toFixed(2)}M, Equity=${assumptions.equityAmount.toFixed(2)}M`
  );

  const incomeStatement = buildIncomeStatement(assumptions, log);
  const cashFlow = buildCashFlow(assumptions, incomeStatement);
  const balanceSheet = buildBalanceSheet(assumptions, incomeStatement, cashFlow);

  const exitEBITDA = incomeStatement[numYears - 1].ebitda;
  const exitEnterpriseValue = exitEBITDA * exitMultiple;
  const exitDebt = balanceSheet[numYears - 1].debtBalance;
  const exitValuation: ExitValuation = {
    exitYear: incomeStatement[numYears - 1].year,
    exitEBITDA,
    exitMultiple,
    exitEnterpriseValue,
    exitDebt,
    exitEquityValue: exitEnterpriseValue - exitDebt,
  };

  const returns = calculateReturns(assumptions, exitValuation, cashFlow, options.solver);

  log(
    `Exit: EV=${exitEnterpriseValue.toFixed(2)}M (${exitMultiple}x), Debt=${exitDebt.toFixed(2)}M, ` +
      `Equity=${exitValuation.exitEquityValue.toFixed(2)}M`
  );
  log(`IRR=${returns.irr.toFixed(1)}%, MOIC=${returns.moic.toFixed(2)}x, DPI=${returns.dpi.toFixed(2)}x`);

  return {
    assumptions,
    incomeStatement: Object.freeze(incomeStatement),
    cashFlow: Object.freeze(cashFlow),
    balanceSheet: Object.freeze(balanceSheet),
    exitValuation,
    returns,
  };
}

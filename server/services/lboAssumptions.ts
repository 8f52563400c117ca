import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { InvalidAssumptionError } from "./lboErrors";

// ============ TYPE DEFINITIONS ============

/**
 * Raw deal inputs as a user states them. Percentages are whole numbers
 * (25 means 25%), except `taxRate`, which is already a fraction.
 */
export interface LBOAssumptionInput {
  companyName: string;
  entryYear: number;
  exitYear: number;

  // Target Company Financials
  revenueEntry: number; // $M
  ebitdaMarginEntry: number; // %
  revenueGrowth: number; // % per year, may be negative
  ebitdaMarginExit: number; // %

  // Operating
  capexPercent: number; // % of revenue
  dso: number; // days
  dpo: number; // days
  dsi: number; // days

  // Financing
  purchasePriceMultiple: number; // x entry EBITDA
  debtPercentage: number; // % of purchase price
  interestRate: number; // %
  amortizationYears: number;
  taxRate?: number; // fraction, defaults to 0.21
}

/**
 * Normalized, immutable deal assumptions plus the values derived from them.
 * Every rate here is a fraction.
 */
export interface AssumptionSet {
  readonly input: Readonly<Required<LBOAssumptionInput>>;

  readonly companyName: string;
  readonly entryYear: number;
  readonly exitYear: number;
  readonly revenueEntry: number;
  readonly ebitdaMarginEntry: number;
  readonly revenueGrowth: number;
  readonly ebitdaMarginExit: number;
  readonly capexPercent: number;
  readonly dso: number;
  readonly dpo: number;
  readonly dsi: number;
  readonly purchasePriceMultiple: number;
  readonly debtPercentage: number;
  readonly interestRate: number;
  readonly amortizationYears: number;
  readonly taxRate: number;

  // Derived at construction
  readonly entryEBITDA: number;
  readonly purchasePrice: number;
  readonly debtAmount: number;
  readonly equityAmount: number;
  readonly holdingPeriod: number;
  readonly years: readonly number[];
}

export const DEFAULT_TAX_RATE = 0.21;

// ============ VALIDATION ============

const finite = () => z.number().finite();

const lboAssumptionInputSchema = z.object({
  companyName: z.string().trim().min(1, "company name is required"),
  entryYear: z.number().int(),
  exitYear: z.number().int(),
  revenueEntry: finite(),
  ebitdaMarginEntry: finite(),
  revenueGrowth: finite(),
  ebitdaMarginExit: finite(),
  capexPercent: finite(),
  dso: finite().nonnegative(),
  dpo: finite().nonnegative(),
  dsi: finite().nonnegative(),
  purchasePriceMultiple: finite().positive(),
  debtPercentage: finite().min(0).max(100),
  interestRate: finite(),
  amortizationYears: z.number().int(),
  taxRate: finite().default(DEFAULT_TAX_RATE),
});

type ParsedAssumptionInput = z.output<typeof lboAssumptionInputSchema>;

function rangeIssues(input: ParsedAssumptionInput): string[] {
  const issues: string[] = [];
  const holdingPeriod = input.exitYear - input.entryYear;

  if (input.exitYear <= input.entryYear) {
    issues.push(`exitYear (${input.exitYear}) must be after entryYear (${input.entryYear})`);
  }
  if (holdingPeriod < 1) {
    issues.push(`holding period must be at least 1 year (got ${holdingPeriod})`);
  }
  if (input.amortizationYears <= 0) {
    issues.push(`amortizationYears must be positive (got ${input.amortizationYears})`);
  }
  if (input.revenueEntry <= 0) {
    issues.push(`revenueEntry must be positive (got ${input.revenueEntry})`);
  }
  return issues;
}

// ============ CONSTRUCTION ============

/**
 * Validates raw inputs, converts percentages to fractions and computes the
 * entry financing structure. Throws InvalidAssumptionError before any
 * derived value is produced.
 */
export function createAssumptionSet(raw: LBOAssumptionInput): AssumptionSet {
  const parsed = lboAssumptionInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidAssumptionError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const input = parsed.data;
  const issues = rangeIssues(input);
  if (issues.length > 0) {
    throw new InvalidAssumptionError(issues);
  }

  const ebitdaMarginEntry = input.ebitdaMarginEntry / 100;
  const debtPercentage = input.debtPercentage / 100;

  const entryEBITDA = input.revenueEntry * ebitdaMarginEntry;
  const purchasePrice = entryEBITDA * input.purchasePriceMultiple;
  const debtAmount = purchasePrice * debtPercentage;
  const equityAmount = purchasePrice - debtAmount;

  const years: number[] = [];
  for (let year = input.entryYear; year <= input.exitYear; year++) {
    years.push(year);
  }

  return Object.freeze({
    input: Object.freeze({ ...input }),
    companyName: input.companyName,
    entryYear: input.entryYear,
    exitYear: input.exitYear,
    revenueEntry: input.revenueEntry,
    ebitdaMarginEntry,
    revenueGrowth: input.revenueGrowth / 100,
    ebitdaMarginExit: input.ebitdaMarginExit / 100,
    capexPercent: input.capexPercent / 100,
    dso: input.dso,
    dpo: input.dpo,
    dsi: input.dsi,
    purchasePriceMultiple: input.purchasePriceMultiple,
    debtPercentage,
    interestRate: input.interestRate / 100,
    amortizationYears: input.amortizationYears,
    taxRate: input.taxRate,
    entryEBITDA,
    purchasePrice,
    debtAmount,
    equityAmount,
    holdingPeriod: input.exitYear - input.entryYear,
    years: Object.freeze(years),
  });
}

/**
 * Reads an LBOAssumptionInput from a JSON file. The result still has to go
 * through createAssumptionSet.
 */
export function readAssumptionInputFile(filePath: string): Required<LBOAssumptionInput> {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidAssumptionError([`${filePath}: ${reason}`]);
  }

  const parsed = lboAssumptionInputSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidAssumptionError(
      parsed.error.issues.map((issue) => `${filePath} ${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

// ============ EXAMPLE DEAL ============

export const LBO_EXAMPLE_INPUT_FILE = path.join(__dirname, "..", "fixtures", "acme-lbo.json");

/** Acme Corp, 2023-2028: the deal the CLI runs when no input file is given. */
export const LBO_EXAMPLE_INPUT: Readonly<Required<LBOAssumptionInput>> = Object.freeze(
  readAssumptionInputFile(LBO_EXAMPLE_INPUT_FILE)
);

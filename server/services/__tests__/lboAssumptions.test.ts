import { describe, it } from "node:test";
import assert from "node:assert/strict";
import * as path from "path";
import {
  DEFAULT_TAX_RATE,
  LBO_EXAMPLE_INPUT,
  LBO_EXAMPLE_INPUT_FILE,
  createAssumptionSet,
  readAssumptionInputFile,
  type LBOAssumptionInput,
} from "../lboAssumptions";
import { InvalidAssumptionError } from "../lboErrors";

function invalidIssues(input: LBOAssumptionInput): string[] {
  try {
    createAssumptionSet(input);
  } catch (error) {
    assert.ok(error instanceof InvalidAssumptionError);
    assert.equal(error.code, "INVALID_ASSUMPTION");
    return error.issues;
  }
  assert.fail("expected InvalidAssumptionError");
}

describe("createAssumptionSet", () => {
  it("derives the entry financing structure", () => {
    const a = createAssumptionSet(LBO_EXAMPLE_INPUT);
    assert.equal(a.entryEBITDA, 125);
    assert.equal(a.purchasePrice, 1250);
    assert.equal(a.debtAmount, 750);
    assert.equal(a.equityAmount, 500);
    assert.equal(a.holdingPeriod, 5);
    assert.deepEqual(a.years, [2023, 2024, 2025, 2026, 2027, 2028]);
  });

  it("normalizes percentages and keeps day counts and multiples as given", () => {
    const a = createAssumptionSet(LBO_EXAMPLE_INPUT);
    assert.equal(a.ebitdaMarginEntry, 0.25);
    assert.equal(a.ebitdaMarginExit, 0.3);
    assert.equal(a.revenueGrowth, 0.08);
    assert.equal(a.capexPercent, 0.04);
    assert.equal(a.debtPercentage, 0.6);
    assert.equal(a.interestRate, 0.08);
    assert.equal(a.dso, 45);
    assert.equal(a.dpo, 60);
    assert.equal(a.dsi, 30);
    assert.equal(a.purchasePriceMultiple, 10);
    assert.equal(a.amortizationYears, 5);
  });

  it("defaults the tax rate to 21% when omitted", () => {
    const { taxRate: _omitted, ...withoutTax } = LBO_EXAMPLE_INPUT;
    const a = createAssumptionSet(withoutTax);
    assert.equal(a.taxRate, DEFAULT_TAX_RATE);
    assert.equal(a.input.taxRate, 0.21);
  });

  it("allows negative growth", () => {
    const a = createAssumptionSet({ ...LBO_EXAMPLE_INPUT, revenueGrowth: -5 });
    assert.equal(a.revenueGrowth, -0.05);
  });

  it("is frozen", () => {
    const a = createAssumptionSet(LBO_EXAMPLE_INPUT);
    assert.ok(Object.isFrozen(a));
    assert.ok(Object.isFrozen(a.input));
    assert.ok(Object.isFrozen(a.years));
  });

  it("rejects an exit year that is not after the entry year", () => {
    const issues = invalidIssues({ ...LBO_EXAMPLE_INPUT, exitYear: 2023 });
    assert.deepEqual(issues, [
      "exitYear (2023) must be after entryYear (2023)",
      "holding period must be at least 1 year (got 0)",
    ]);
  });

  it("rejects non-positive amortization years", () => {
    assert.deepEqual(invalidIssues({ ...LBO_EXAMPLE_INPUT, amortizationYears: 0 }), [
      "amortizationYears must be positive (got 0)",
    ]);
  });

  it("rejects non-positive entry revenue", () => {
    assert.deepEqual(invalidIssues({ ...LBO_EXAMPLE_INPUT, revenueEntry: -10 }), [
      "revenueEntry must be positive (got -10)",
    ]);
  });

  it("reports shape problems by field", () => {
    const issues = invalidIssues({ ...LBO_EXAMPLE_INPUT, dso: -1, debtPercentage: 120, entryYear: 2023.5 });
    assert.equal(issues.length, 3);
    assert.ok(issues.some((issue) => issue.startsWith("dso:")));
    assert.ok(issues.some((issue) => issue.startsWith("debtPercentage:")));
    assert.ok(issues.some((issue) => issue.startsWith("entryYear:")));
  });

  it("rejects a blank company name", () => {
    assert.deepEqual(invalidIssues({ ...LBO_EXAMPLE_INPUT, companyName: "   " }), [
      "companyName: company name is required",
    ]);
  });

  it("produces equal sets from equal inputs", () => {
    assert.deepEqual(createAssumptionSet({ ...LBO_EXAMPLE_INPUT }), createAssumptionSet({ ...LBO_EXAMPLE_INPUT }));
  });
});

describe("readAssumptionInputFile", () => {
  it("loads the example deal from its JSON file", () => {
    assert.deepEqual(readAssumptionInputFile(LBO_EXAMPLE_INPUT_FILE), {
      companyName: "Acme Corp",
      entryYear: 2023,
      exitYear: 2028,
      revenueEntry: 500,
      ebitdaMarginEntry: 25,
      revenueGrowth: 8,
      ebitdaMarginExit: 30,
      capexPercent: 4,
      dso: 45,
      dpo: 60,
      dsi: 30,
      purchasePriceMultiple: 10,
      debtPercentage: 60,
      interestRate: 8,
      amortizationYears: 5,
      taxRate: 0.21,
    });
    assert.deepEqual(LBO_EXAMPLE_INPUT, readAssumptionInputFile(LBO_EXAMPLE_INPUT_FILE));
    assert.ok(Object.isFrozen(LBO_EXAMPLE_INPUT));
  });

  it("wraps a missing file in InvalidAssumptionError", () => {
    assert.throws(
      () => readAssumptionInputFile(path.join(__dirname, "does-not-exist.json")),
      (error: unknown) => error instanceof InvalidAssumptionError && error.issues.length === 1
    );
  });
});

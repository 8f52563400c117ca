import { createAssumptionSet, type AssumptionSet } from "./lboAssumptions";
import { getLBOConfig } from "./lboConfig";
import { runLBOModel, type LBOModelResult, type LBORunOptions } from "./lboModelService";

export interface SensitivityRanges {
  exitMultiples: number[]; // x EBITDA
  revenueGrowths: number[]; // % per year
  exitMargins: number[]; // % exit EBITDA margin
}

export interface SensitivityRow {
  value: number;
  irr: number;
  moic: number;
}

export interface SensitivityResult {
  exitMultiple: SensitivityRow[];
  revenueGrowth: SensitivityRow[];
  exitMargin: SensitivityRow[];
}

const around = (base: number): number[] => [base - 2, base - 1, base, base + 1, base + 2];

export function defaultSensitivityRanges(assumptions: AssumptionSet): SensitivityRanges {
  return {
    exitMultiples: around(assumptions.purchasePriceMultiple),
    revenueGrowths: around(assumptions.input.revenueGrowth),
    exitMargins: around(assumptions.input.ebitdaMarginExit),
  };
}

/**
 * One-dimensional sweeps over exit multiple, revenue growth and exit margin.
 * Every point is a full, independent model run; the base case is untouched.
 */
export function runSensitivityAnalysis(
  assumptions: AssumptionSet,
  overrides: Partial<SensitivityRanges> = {},
  options: Pick<LBORunOptions, "solver" | "verbose"> = {}
): SensitivityResult {
  const defaults = defaultSensitivityRanges(assumptions);
  const ranges: SensitivityRanges = {
    exitMultiples: overrides.exitMultiples ?? defaults.exitMultiples,
    revenueGrowths: overrides.revenueGrowths ?? defaults.revenueGrowths,
    exitMargins: overrides.exitMargins ?? defaults.exitMargins,
  };
  const verbose = options.verbose ?? getLBOConfig().verbose;
  const runOptions: LBORunOptions = { solver: options.solver, verbose: false };

  const point = (label: string, value: number, run: () => LBOModelResult): SensitivityRow => {
    const { returns } = run();
    if (verbose) {
      console.log(
        `[LBO Sensitivity] ${label}=${value}: IRR=${returns.irr.toFixed(1)}%, MOIC=${returns.moic.toFixed(2)}x`
      );
    }
    return { value, irr: returns.irr, moic: returns.moic };
  };

  const exitMultiple = ranges.exitMultiples.map((multiple) =>
    point("Exit Multiple", multiple, () => runLBOModel(assumptions, { ...runOptions, exitMultiple: multiple }))
  );

  const revenueGrowth = ranges.revenueGrowths.map((growth) =>
    point("Revenue Growth", growth, () =>
      runLBOModel(createAssumptionSet({ ...assumptions.input, revenueGrowth: growth }), runOptions)
    )
  );

  const exitMargin = ranges.exitMargins.map((margin) =>
    point("Exit Margin", margin, () =>
      runLBOModel(createAssumptionSet({ ...assumptions.input, ebitdaMarginExit: margin }), runOptions)
    )
  );

  return { exitMultiple, revenueGrowth, exitMargin };
}

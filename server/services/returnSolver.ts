import { getLBOConfig } from "./lboConfig";
import { NoRootError, NonConvergentReturnError } from "./lboErrors";

export interface ReturnSolverOptions {
  guess?: number;
  maxIterations?: number;
  tolerance?: number;
}

/** Net present value of evenly spaced cash flows; cashFlows[0] is undiscounted. */
export function npv(rate: number, cashFlows: readonly number[]): number {
  let total = 0;
  for (let t = 0; t < cashFlows.length; t++) {
    total += cashFlows[t] / Math.pow(1 + rate, t);
  }
  return total;
}

function npvDerivative(rate: number, cashFlows: readonly number[]): number {
  let total = 0;
  for (let t = 1; t < cashFlows.length; t++) {
    total -= (t * cashFlows[t]) / Math.pow(1 + rate, t + 1);
  }
  return total;
}

// Candidate rates scanned for a sign change when Newton's method does not settle.
const BRACKET_GRID = [-0.999999, -0.99, -0.9, -0.5, -0.2, 0, 0.2, 0.5, 1, 2, 5, 10, 100, 1000, 1e6];

function newton(
  cashFlows: readonly number[],
  guess: number,
  maxIterations: number,
  tolerance: number,
  residualTolerance: number
): number | null {
  let rate = guess;
  for (let i = 0; i < maxIterations; i++) {
    const value = npv(rate, cashFlows);
    const slope = npvDerivative(rate, cashFlows);
    if (!Number.isFinite(value) || !Number.isFinite(slope) || slope === 0) return null;

    const next = rate - value / slope;
    if (!Number.isFinite(next) || next <= -1) return null;

    if (Math.abs(next - rate) <= tolerance * Math.max(1, Math.abs(rate))) {
      return Math.abs(npv(next, cashFlows)) <= residualTolerance ? next : null;
    }
    rate = next;
  }
  return null;
}

function bisect(
  cashFlows: readonly number[],
  maxIterations: number,
  tolerance: number
): number | null {
  for (let k = 0; k + 1 < BRACKET_GRID.length; k++) {
    let lo = BRACKET_GRID[k];
    let hi = BRACKET_GRID[k + 1];
    let fLo = npv(lo, cashFlows);
    const fHi = npv(hi, cashFlows);
    if (fLo === 0) return lo;
    if (!Number.isFinite(fLo) || !Number.isFinite(fHi) || Math.sign(fLo) === Math.sign(fHi)) continue;

    for (let i = 0; i < maxIterations && hi - lo > tolerance * Math.max(1, Math.abs(lo)); i++) {
      const mid = (lo + hi) / 2;
      const fMid = npv(mid, cashFlows);
      if (fMid === 0) return mid;
      if (Math.sign(fMid) === Math.sign(fLo)) {
        lo = mid;
        fLo = fMid;
      } else {
        hi = mid;
      }
    }
    // Only the first bracket is searched; an unfinished one is a failure.
    return hi - lo <= tolerance * Math.max(1, Math.abs(lo)) ? (lo + hi) / 2 : null;
  }
  return null;
}

/**
 * Internal rate of return of evenly spaced cash flows, as a percentage
 * (24.2 means 24.2%).
 *
 * Newton's method runs first from `guess`; if it diverges or stalls, a
 * bracketing bisection over a fixed rate grid takes over. Each method is
 * bounded by `maxIterations`.
 *
 * @throws NoRootError when the flows never change sign
 * @throws NonConvergentReturnError when no rate can be found
 */
export function solveIRR(cashFlows: readonly number[], options: ReturnSolverOptions = {}): number {
  const { solver } = getLBOConfig();
  const { guess = 0.1, maxIterations = solver.maxIterations, tolerance = solver.tolerance } = options;

  const hasInflow = cashFlows.some((cf) => cf > 0);
  const hasOutflow = cashFlows.some((cf) => cf < 0);
  if (!hasInflow || !hasOutflow) {
    const shape = hasInflow ? "no outflow" : hasOutflow ? "no inflow" : "all zero";
    throw new NoRootError(`Cash flows never change sign (${shape}), IRR is undefined`);
  }

  const scale = cashFlows.reduce((sum, cf) => sum + Math.abs(cf), 0);
  const residualTolerance = 1e-7 * Math.max(1, scale);

  const rate =
    newton(cashFlows, guess, maxIterations, tolerance, residualTolerance) ??
    bisect(cashFlows, maxIterations, tolerance);

  if (rate === null) {
    throw new NonConvergentReturnError(
      `IRR did not converge within ${maxIterations} iterations for ${cashFlows.length} cash flows`
    );
  }
  return rate * 100;
}

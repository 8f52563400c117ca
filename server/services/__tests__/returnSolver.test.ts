import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { NoRootError, NonConvergentReturnError } from "../lboErrors";
import { npv, solveIRR } from "../returnSolver";

function assertClose(actual: number, expected: number, tolerance = 1e-8) {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `expected ${expected} ± ${tolerance}, got ${actual}`
  );
}

describe("npv", () => {
  it("leaves the first flow undiscounted", () => {
    assertClose(npv(0.1, [-100, 110]), 0);
    assertClose(npv(0, [-100, 30, 30]), -40);
  });
});

describe("solveIRR", () => {
  it("returns the rate as a percentage", () => {
    assertClose(solveIRR([-100, 110]), 10);
    assertClose(solveIRR([-100, 0, 121]), 10);
  });

  it("matches the reference buyout cash flows", () => {
    const flows = [
      -500, -144.61903561643834, -111.22767846575339, -76.51483034301368, -40.345285378454776, 2203.9921152000006,
    ];
    const irr = solveIRR(flows);
    assert.ok(Math.abs(irr - 24.212350286796745) / 24.212350286796745 < 1e-6, `got ${irr}`);
  });

  it("falls back to bisection when Newton's method does not settle", () => {
    // from a 500% guess Newton overshoots below -100%
    assertClose(solveIRR([-100, 0, 0, 150], { guess: 5, maxIterations: 100 }), 14.47142425533319, 1e-6);
  });

  it("holds bisection to the configured iteration bound", () => {
    assert.throws(
      () => solveIRR([-100, 0, 0, 150], { guess: 5, maxIterations: 5 }),
      (error: unknown) =>
        error instanceof NonConvergentReturnError && error.message === "IRR did not converge within 5 iterations for 4 cash flows"
    );
  });

  it("finds deeply negative rates", () => {
    assertClose(solveIRR([-100, 1]), -99, 1e-6);
  });

  it("throws NoRootError when every flow is non-negative", () => {
    assert.throws(() => solveIRR([100, 50]), NoRootError);
    assert.throws(() => solveIRR([-0, 5, 10]), NoRootError);
  });

  it("throws NoRootError when every flow is non-positive or zero", () => {
    assert.throws(() => solveIRR([-100, -5]), /no inflow/);
    assert.throws(() => solveIRR([0, 0, 0]), /all zero/);
  });

  it("throws NonConvergentReturnError when flows change sign but have no real rate", () => {
    assert.throws(
      () => solveIRR([1, -3, 2.5]),
      (error: unknown) => error instanceof NonConvergentReturnError && error.code === "NON_CONVERGENT_RETURN"
    );
  });
});

export type LBOErrorCode =
  | "INVALID_ASSUMPTION"
  | "INVALID_CONFIGURATION"
  | "DEGENERATE_HOLDING_PERIOD"
  | "NON_CONVERGENT_RETURN"
  | "NO_ROOT";

/**
 * Base class for every failure raised by the LBO model. Callers switch on
 * `code`; the message is for people.
 */
export class LBOModelError extends Error {
  readonly code: LBOErrorCode;

  constructor(code: LBOErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidAssumptionError extends LBOModelError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_ASSUMPTION", `Invalid LBO assumptions: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class InvalidConfigurationError extends LBOModelError {
  constructor(details: string) {
    super("INVALID_CONFIGURATION", `Invalid LBO environment configuration: ${details}`);
  }
}

export class DegenerateHoldingPeriodError extends LBOModelError {
  constructor(numYears: number) {
    super(
      "DEGENERATE_HOLDING_PERIOD",
      `Projection needs at least 2 years to interpolate EBITDA margin (got ${numYears})`
    );
  }
}

export class NoRootError extends LBOModelError {
  constructor(message = "Cash flows never change sign, IRR is undefined") {
    super("NO_ROOT", message);
  }
}

export class NonConvergentReturnError extends LBOModelError {
  constructor(message: string) {
    super("NON_CONVERGENT_RETURN", message);
  }
}

export function isLBOModelError(error: unknown): error is LBOModelError {
  return error instanceof LBOModelError;
}

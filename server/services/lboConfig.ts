import { z } from "zod";
import { InvalidConfigurationError } from "./lboErrors";

// ============ ENVIRONMENT CONFIGURATION ============
// All knobs come from process.env; anything unset falls back to the defaults below.

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const lboEnvSchema = z.object({
  LBO_MODEL_VERBOSE: booleanFlag.default("false"),
  LBO_IRR_MAX_ITERATIONS: z.coerce.number().int().positive().default(100),
  LBO_IRR_TOLERANCE: z.coerce.number().positive().default(1e-10),
});

export interface LBOConfig {
  verbose: boolean;
  solver: {
    maxIterations: number;
    tolerance: number;
  };
}

export function loadLBOConfig(env: NodeJS.ProcessEnv = process.env): LBOConfig {
  const parsed = lboEnvSchema.safeParse({
    LBO_MODEL_VERBOSE: env.LBO_MODEL_VERBOSE?.trim().toLowerCase() || undefined,
    LBO_IRR_MAX_ITERATIONS: env.LBO_IRR_MAX_ITERATIONS || undefined,
    LBO_IRR_TOLERANCE: env.LBO_IRR_TOLERANCE || undefined,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigurationError(details);
  }

  return {
    verbose: parsed.data.LBO_MODEL_VERBOSE,
    solver: {
      maxIterations: parsed.data.LBO_IRR_MAX_ITERATIONS,
      tolerance: parsed.data.LBO_IRR_TOLERANCE,
    },
  };
}

let cachedConfig: LBOConfig | undefined;

/** Loads process.env on first use and caches the result. */
export function getLBOConfig(): LBOConfig {
  cachedConfig ??= loadLBOConfig();
  return cachedConfig;
}

/**
 * Error taxonomy for the engine.
 *
 * Invalid configuration is a ConfigurationError, returned inside an
 * EngineResult at every public boundary. Results that cannot be computed
 * (division by zero, empty sample sets) are Metrics with a reason code,
 * never a silent zero or Infinity.
 */

import type { ZodError } from "zod";

// ─── Configuration errors ───────────────────────────────────────────────────

export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR";
  readonly issues: ConfigurationIssue[];

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  static fromZod(error: ZodError, context: string): ConfigurationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    return new ConfigurationError(`Invalid ${context}: ${summary}`, issues);
  }
}

// ─── Engine results ─────────────────────────────────────────────────────────

/** Same shape as zod's safeParse result so callers branch on `success`. */
export type EngineResult<T> =
  | { success: true; data: T }
  | { success: false; error: ConfigurationError };

export function ok<T>(data: T): EngineResult<T> {
  return { success: true, data };
}

export function fail<T>(error: ConfigurationError): EngineResult<T> {
  return { success: false, error };
}

// ─── Undefined results ──────────────────────────────────────────────────────

export type UndefinedReason =
  | "NO_FEASIBLE_SAMPLES"
  | "ZERO_ISL_UNIT_COST"
  | "NO_GROUND_STATIONS_SAVED"
  | "NO_OPEX_SAVINGS"
  | "ZERO_BASELINE_CAPEX"
  | "NUMERIC_OVERFLOW";

export type Metric =
  | { defined: true; value: number }
  | { defined: false; reason: UndefinedReason };

export function definedMetric(value: number): Metric {
  return { defined: true, value };
}

export function undefinedMetric(reason: UndefinedReason): Metric {
  return { defined: false, reason };
}

/** Metric from a sum and a count; an empty set is NO_FEASIBLE_SAMPLES. */
export function averageMetric(sum: number, count: number): Metric {
  if (count === 0) return undefinedMetric("NO_FEASIBLE_SAMPLES");
  return definedMetric(sum / count);
}

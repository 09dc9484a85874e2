/**
 * Decision Synthesizer — turns both simulation runs, the cost comparison and
 * the debris assessment into a ranked recommendation.
 *
 * Tipping-point standing outranks raw savings: cost points only go to the
 * crosslinked side once the constellation is at or above the tipping point.
 * Scores inside the tie band are reported as inconclusive.
 */

import type { EngineConfig } from "../config";
import { configOrDefault } from "../config";
import type { CostComparison, CostRoi } from "../cost/comparator";
import { costRoi } from "../cost/comparator";
import type { DebrisAssessment } from "../debris/risk";
import type { ConfigurationIssue, EngineResult, Metric } from "../errors";
import { ConfigurationError, fail, ok } from "../errors";
import type { Logger } from "../logger";
import { createLogger } from "../logger";
import type { Architecture, SimulationRun } from "../simulation/types";
import type { DecisionConfig } from "./config";

export type Verdict = Architecture | "inconclusive";
export type Confidence = "high" | "moderate" | "low";

export type DecisionFactorName =
  | "tipping-point"
  | "cost"
  | "latency"
  | "coverage"
  | "constellation-size"
  | "complexity";

export interface DecisionFactor {
  factor: DecisionFactorName;
  /** Side the points count for; null when the factor favours neither. */
  architecture: Architecture | null;
  /** Signed: the complexity penalty is negative. */
  points: number;
  detail: string;
}

export interface DecisionScores {
  groundOnly: number;
  crosslinked: number;
  /** crosslinked − groundOnly */
  margin: number;
}

export interface Recommendation {
  verdict: Verdict;
  confidence: Confidence;
  summary: string;
  scores: DecisionScores | null;
  factors: DecisionFactor[];
  rationale: string[];
  /** Upstream metrics that had no value, as "path (REASON)". */
  undefinedInputs: string[];
  latencyImprovementPercent: number | null;
  coverageImprovementPoints: number | null;
  roi: CostRoi | null;
}

export interface DecisionInputs {
  groundOnly: SimulationRun;
  crosslinked: SimulationRun;
  costs: CostComparison;
  debris: DebrisAssessment;
}

export interface DecisionOptions {
  config?: EngineConfig;
  logger?: Logger;
}

const INCONCLUSIVE_SUMMARY = "inconclusive — further analysis required";

// ─── Inputs ─────────────────────────────────────────────────────────────────

function checkArchitectures(inputs: DecisionInputs): ConfigurationError | null {
  const issues: ConfigurationIssue[] = [];
  if (inputs.groundOnly.architecture !== "ground-only") {
    issues.push({ path: "groundOnly.architecture", message: `expected ground-only, got ${inputs.groundOnly.architecture}` });
  }
  if (inputs.crosslinked.architecture !== "crosslinked") {
    issues.push({ path: "crosslinked.architecture", message: `expected crosslinked, got ${inputs.crosslinked.architecture}` });
  }
  for (const run of [inputs.groundOnly, inputs.crosslinked]) {
    if (inputs.costs.satelliteCount !== run.satelliteCount) {
      issues.push({
        path: "costs.satelliteCount",
        message: `cost comparison covers ${inputs.costs.satelliteCount} satellites, ${run.architecture} run has ${run.satelliteCount}`,
      });
    }
  }
  if (issues.length === 0) return null;
  const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
  return new ConfigurationError(`Invalid decision inputs: ${summary}`, issues);
}

function undefinedInputs(inputs: DecisionInputs): string[] {
  const metrics: [string, Metric][] = [
    ["groundOnly.averageLatencyMs", inputs.groundOnly.averageLatencyMs],
    ["groundOnly.averageSnrDb", inputs.groundOnly.averageSnrDb],
    ["crosslinked.averageLatencyMs", inputs.crosslinked.averageLatencyMs],
    ["crosslinked.averageSnrDb", inputs.crosslinked.averageSnrDb],
    ["costs.tippingPoint", inputs.costs.tippingPoint],
    ["costs.savingsPercent", inputs.costs.savingsPercent],
    ["costs.paybackYears", inputs.costs.paybackYears],
    ["debris.deorbit.propellantMassKg", inputs.debris.deorbit.propellantMassKg],
    ["debris.deorbit.propulsionSystemMassKg", inputs.debris.deorbit.propulsionSystemMassKg],
    ["debris.deorbit.totalMassPenaltyKg", inputs.debris.deorbit.totalMassPenaltyKg],
  ];
  const missing: string[] = [];
  for (const [path, metric] of metrics) {
    if (!metric.defined) missing.push(`${path} (${metric.reason})`);
  }
  return missing;
}

function debrisRationale(debris: DebrisAssessment): string[] {
  const { sustainability, deorbit } = debris;
  const lines = [
    `Debris sustainability ${sustainability.score}/100 (${sustainability.grade}), collision risk ${debris.collision.riskLevel}.`,
  ];
  if (deorbit.deorbitRequired) {
    lines.push(
      `Natural decay of ${deorbit.naturalDecayYears} years exceeds the ${deorbit.disposalRule.maxDisposalYears}-year ` +
        `${deorbit.disposalRule.authority} rule; active deorbit is required` +
        (deorbit.compliant ? " and fitted." : " but not fitted."),
    );
  } else {
    lines.push(
      `Natural decay of ${deorbit.naturalDecayYears} years is within the ` +
        `${deorbit.disposalRule.maxDisposalYears}-year ${deorbit.disposalRule.authority} rule.`,
    );
  }
  return lines;
}

// ─── Factors ────────────────────────────────────────────────────────────────

interface FactorInputs {
  satelliteCount: number;
  tippingPoint: number;
  savingsPercent: number;
  latencyImprovementPercent: number;
  coverageImprovementPoints: number;
}

function scoreFactors(f: FactorInputs, config: DecisionConfig): DecisionFactor[] {
  const factors: DecisionFactor[] = [];
  const n = f.satelliteCount;
  const tp = f.tippingPoint;
  const aboveTippingPoint = n >= tp;

  if (n >= tp + config.tippingPointComfortMargin) {
    factors.push({ factor: "tipping-point", architecture: "crosslinked", points: 3, detail: `${n} satellites is well above the tipping point of ${tp}` });
  } else if (aboveTippingPoint) {
    factors.push({ factor: "tipping-point", architecture: "crosslinked", points: 2, detail: `${n} satellites meets the tipping point of ${tp}` });
  } else {
    factors.push({ factor: "tipping-point", architecture: "ground-only", points: 2, detail: `${n} satellites is below the tipping point of ${tp}` });
  }

  const savings = f.savingsPercent.toFixed(1);
  if (f.savingsPercent > 30 && aboveTippingPoint) {
    factors.push({ factor: "cost", architecture: "crosslinked", points: 2, detail: `crosslinking saves ${savings}% of CapEx` });
  } else if (f.savingsPercent > 10 && aboveTippingPoint) {
    factors.push({ factor: "cost", architecture: "crosslinked", points: 1, detail: `crosslinking saves ${savings}% of CapEx` });
  } else if (f.savingsPercent < 0) {
    factors.push({ factor: "cost", architecture: "ground-only", points: 2, detail: `crosslinking costs ${(-f.savingsPercent).toFixed(1)}% more CapEx` });
  } else {
    const why = aboveTippingPoint ? "too small to count" : "not credited below the tipping point";
    factors.push({ factor: "cost", architecture: null, points: 0, detail: `${savings}% CapEx savings ${why}` });
  }

  const latency = f.latencyImprovementPercent.toFixed(1);
  if (f.latencyImprovementPercent > 70) {
    factors.push({ factor: "latency", architecture: "crosslinked", points: 2, detail: `latency improves by ${latency}%` });
  } else if (f.latencyImprovementPercent > 40) {
    factors.push({ factor: "latency", architecture: "crosslinked", points: 1, detail: `latency improves by ${latency}%` });
  } else if (f.latencyImprovementPercent < 20) {
    factors.push({ factor: "latency", architecture: "ground-only", points: 1, detail: `latency improves by only ${latency}%` });
  } else {
    factors.push({ factor: "latency", architecture: null, points: 0, detail: `latency improves by ${latency}%` });
  }

  const coverage = f.coverageImprovementPoints.toFixed(1);
  if (f.coverageImprovementPoints > 15) {
    factors.push({ factor: "coverage", architecture: "crosslinked", points: 2, detail: `coverage improves by ${coverage} points` });
  } else if (f.coverageImprovementPoints > 5) {
    factors.push({ factor: "coverage", architecture: "crosslinked", points: 1, detail: `coverage improves by ${coverage} points` });
  } else if (f.coverageImprovementPoints < 0) {
    factors.push({ factor: "coverage", architecture: "ground-only", points: 1, detail: `coverage drops by ${(-f.coverageImprovementPoints).toFixed(1)} points` });
  } else {
    factors.push({ factor: "coverage", architecture: null, points: 0, detail: `coverage changes by ${coverage} points` });
  }

  if (n >= 8) {
    factors.push({ factor: "constellation-size", architecture: "crosslinked", points: 1, detail: `${n} satellites can sustain a crosslink mesh` });
  } else if (n <= 4) {
    factors.push({ factor: "constellation-size", architecture: "ground-only", points: 1, detail: `${n} satellites is too few for a useful mesh` });
  }

  factors.push({
    factor: "complexity",
    architecture: "crosslinked",
    points: -config.crosslinkComplexityPenalty,
    detail: "crosslink routing and acquisition overhead",
  });

  return factors;
}

function totalScores(factors: readonly DecisionFactor[]): DecisionScores {
  let groundOnly = 0;
  let crosslinked = 0;
  for (const f of factors) {
    if (f.architecture === "ground-only") groundOnly += f.points;
    if (f.architecture === "crosslinked") crosslinked += f.points;
  }
  return { groundOnly, crosslinked, margin: crosslinked - groundOnly };
}

// ─── Synthesis ──────────────────────────────────────────────────────────────

export function synthesizeDecision(
  inputs: DecisionInputs,
  options: DecisionOptions = {},
): EngineResult<Recommendation> {
  const mismatch = checkArchitectures(inputs);
  if (mismatch) return fail(mismatch);

  const resolved = configOrDefault(options.config);
  if (!resolved.success) return fail(resolved.error);

  const config = resolved.data;
  const logger = options.logger ?? createLogger("decision");
  const { groundOnly, crosslinked, costs, debris } = inputs;
  const debrisLines = debrisRationale(debris);

  const missing = undefinedInputs(inputs);
  const goLatency = groundOnly.averageLatencyMs;
  const clLatency = crosslinked.averageLatencyMs;
  const { tippingPoint, savingsPercent } = costs;
  if (
    missing.length > 0 ||
    !goLatency.defined ||
    !clLatency.defined ||
    !tippingPoint.defined ||
    !savingsPercent.defined
  ) {
    logger.info(`inconclusive: undefined inputs ${missing.join(", ")}`);
    return ok({
      verdict: "inconclusive",
      confidence: "low",
      summary: INCONCLUSIVE_SUMMARY,
      scores: null,
      factors: [],
      rationale: [`Cannot score: ${missing.join(", ")}.`, ...debrisLines],
      undefinedInputs: missing,
      latencyImprovementPercent: null,
      coverageImprovementPoints: null,
      roi: null,
    });
  }

  const latencyImprovementMs = goLatency.value - clLatency.value;
  const latencyImprovementPercent = (latencyImprovementMs / goLatency.value) * 100;
  const coverageImprovementPoints = crosslinked.coveragePercent - groundOnly.coveragePercent;

  const factors = scoreFactors(
    {
      satelliteCount: costs.satelliteCount,
      tippingPoint: tippingPoint.value,
      savingsPercent: savingsPercent.value,
      latencyImprovementPercent,
      coverageImprovementPoints,
    },
    config.decision,
  );
  const scores = totalScores(factors);
  const belowTippingPoint = costs.satelliteCount < tippingPoint.value;

  let verdict: Verdict;
  let confidence: Confidence;
  if (Math.abs(scores.margin) <= config.decision.tieBand) {
    verdict = "inconclusive";
    confidence = "low";
  } else {
    verdict = scores.margin > 0 ? "crosslinked" : "ground-only";
    confidence = Math.abs(scores.margin) >= config.decision.highConfidenceMargin ? "high" : "moderate";
    if (verdict === "crosslinked" && belowTippingPoint) confidence = "moderate";
  }

  const summary =
    verdict === "inconclusive" ? INCONCLUSIVE_SUMMARY : `${verdict} recommended with ${confidence} confidence`;
  logger.debug(`${summary} (ground-only ${scores.groundOnly}, crosslinked ${scores.crosslinked})`);

  return ok({
    verdict,
    confidence,
    summary,
    scores,
    factors,
    rationale: [...factors.map((f) => f.detail), ...debrisLines],
    undefinedInputs: [],
    latencyImprovementPercent,
    coverageImprovementPoints,
    roi: costRoi(costs, latencyImprovementMs, coverageImprovementPoints, config.costs.roi),
  });
}

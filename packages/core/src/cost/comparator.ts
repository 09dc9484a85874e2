/**
 * Cost Comparator — CapEx/OpEx per architecture, tipping point, payback.
 *
 * Pure arithmetic, no iteration. Divisions that have no meaningful answer
 * return an undefined Metric with a reason instead of Infinity or NaN.
 */

import type { Metric } from "../errors";
import { definedMetric, undefinedMetric } from "../errors";

export interface UnitCosts {
  groundStationUnitCost: number;
  satelliteUnitCost: number;
  /** Inter-satellite-link terminals, per satellite. */
  islUnitCost: number;
  groundStationAnnualOpex: number;
}

/**
 * Commercial LEO averages. Real figures vary widely by vendor and volume:
 * ground stations $1M–20M, laser ISL terminals $300K–500K, 50–200 kg
 * satellites $0.5M–2M.
 */
export const DEFAULT_UNIT_COSTS: UnitCosts = {
  groundStationUnitCost: 5_000_000,
  satelliteUnitCost: 2_000_000,
  islUnitCost: 500_000,
  groundStationAnnualOpex: 500_000,
};

export interface RoiValuation {
  valuePerLatencyMs: number;
  valuePerCoveragePoint: number;
}

export interface CostConfig {
  unitCosts: UnitCosts;
  missionYears: number;
  roi: RoiValuation;
}

export const DEFAULT_COST_CONFIG: CostConfig = {
  unitCosts: DEFAULT_UNIT_COSTS,
  missionYears: 10,
  roi: {
    valuePerLatencyMs: 100_000,
    valuePerCoveragePoint: 50_000,
  },
};

// ─── Result shapes ──────────────────────────────────────────────────────────

export interface ArchitectureCost {
  groundStationCount: number;
  groundStationCapex: number;
  satelliteCapex: number;
  islCapex: number;
  totalCapex: number;
  annualOpex: number;
  /** CapEx plus OpEx over the mission. */
  lifecycleCost: number;
}

export interface CostComparison {
  satelliteCount: number;
  missionYears: number;
  unitCosts: UnitCosts;
  groundOnly: ArchitectureCost;
  crosslinked: ArchitectureCost;
  /** CapEx_ground − CapEx_crosslinked (positive when crosslinking is cheaper). */
  savingsUsd: number;
  savingsPercent: Metric;
  groundStationsSaved: number;
  groundStationReductionPercent: number;
  tippingPoint: Metric;
  annualOpexSavings: number;
  paybackYears: Metric;
  /** Crosslinked CapEx is already lower; payback is reported as 0. */
  paybackImmediate: boolean;
  lifecycleSavings: number;
}

export interface CostInputs {
  satelliteCount: number;
  groundStationsGroundOnly: number;
  groundStationsCrosslinked: number;
  unitCosts: UnitCosts;
  missionYears: number;
}

// ─── Core formulas ──────────────────────────────────────────────────────────

function architectureCost(
  groundStationCount: number,
  satelliteCount: number,
  withIsl: boolean,
  unitCosts: UnitCosts,
  missionYears: number,
): ArchitectureCost {
  const groundStationCapex = groundStationCount * unitCosts.groundStationUnitCost;
  const satelliteCapex = satelliteCount * unitCosts.satelliteUnitCost;
  const islCapex = withIsl ? satelliteCount * unitCosts.islUnitCost : 0;
  const totalCapex = groundStationCapex + satelliteCapex + islCapex;
  const annualOpex = groundStationCount * unitCosts.groundStationAnnualOpex;

  return {
    groundStationCount,
    groundStationCapex,
    satelliteCapex,
    islCapex,
    totalCapex,
    annualOpex,
    lifecycleCost: totalCapex + annualOpex * missionYears,
  };
}

/**
 * Satellite count at which ISL hardware equals the ground-station CapEx saved:
 *
 *   tipping = ⌈(stations saved × station cost) / ISL cost⌉, at least 1
 */
export function tippingPointSatellites(
  groundStationsSaved: number,
  groundStationUnitCost: number,
  islUnitCost: number,
): Metric {
  if (islUnitCost === 0) return undefinedMetric("ZERO_ISL_UNIT_COST");
  if (groundStationsSaved <= 0) return undefinedMetric("NO_GROUND_STATIONS_SAVED");

  const threshold = Math.ceil((groundStationsSaved * groundStationUnitCost) / islUnitCost);
  return definedMetric(Math.max(threshold, 1));
}

/**
 * Years for OpEx savings to recover the extra CapEx of crosslinking.
 * `capexDifference` is CapEx_crosslinked − CapEx_ground.
 */
export function paybackPeriod(
  capexDifference: number,
  annualOpexSavings: number,
): { paybackYears: Metric; immediate: boolean } {
  if (capexDifference <= 0) {
    return { paybackYears: definedMetric(0), immediate: true };
  }
  if (annualOpexSavings <= 0) {
    return { paybackYears: undefinedMetric("NO_OPEX_SAVINGS"), immediate: false };
  }
  return { paybackYears: definedMetric(capexDifference / annualOpexSavings), immediate: false };
}

export function computeCostComparison(inputs: CostInputs): CostComparison {
  const { satelliteCount, unitCosts, missionYears } = inputs;

  const groundOnly = architectureCost(
    inputs.groundStationsGroundOnly,
    satelliteCount,
    false,
    unitCosts,
    missionYears,
  );
  const crosslinked = architectureCost(
    inputs.groundStationsCrosslinked,
    satelliteCount,
    true,
    unitCosts,
    missionYears,
  );

  const savingsUsd = groundOnly.totalCapex - crosslinked.totalCapex;
  const groundStationsSaved = inputs.groundStationsGroundOnly - inputs.groundStationsCrosslinked;
  const annualOpexSavings = groundOnly.annualOpex - crosslinked.annualOpex;
  const payback = paybackPeriod(crosslinked.totalCapex - groundOnly.totalCapex, annualOpexSavings);

  return {
    satelliteCount,
    missionYears,
    unitCosts,
    groundOnly,
    crosslinked,
    savingsUsd,
    savingsPercent:
      groundOnly.totalCapex === 0
        ? undefinedMetric("ZERO_BASELINE_CAPEX")
        : definedMetric((savingsUsd / groundOnly.totalCapex) * 100),
    groundStationsSaved,
    groundStationReductionPercent: (groundStationsSaved / inputs.groundStationsGroundOnly) * 100,
    tippingPoint: tippingPointSatellites(
      groundStationsSaved,
      unitCosts.groundStationUnitCost,
      unitCosts.islUnitCost,
    ),
    annualOpexSavings,
    paybackYears: payback.paybackYears,
    paybackImmediate: payback.immediate,
    lifecycleSavings: groundOnly.lifecycleCost - crosslinked.lifecycleCost,
  };
}

// ─── Return on investment ───────────────────────────────────────────────────

export interface CostRoi {
  costSavingsValue: number;
  latencyImprovementValue: number;
  coverageImprovementValue: number;
  totalValue: number;
  /** Total value relative to crosslinked CapEx. */
  roiPercent: Metric;
}

/**
 * Values latency and coverage improvements in dollars and adds them to the
 * CapEx savings of crosslinking.
 */
export function costRoi(
  comparison: CostComparison,
  latencyImprovementMs: number,
  coverageImprovementPct: number,
  valuation: RoiValuation = DEFAULT_COST_CONFIG.roi,
): CostRoi {
  const latencyImprovementValue = latencyImprovementMs * valuation.valuePerLatencyMs;
  const coverageImprovementValue = coverageImprovementPct * valuation.valuePerCoveragePoint;
  const totalValue = comparison.savingsUsd + latencyImprovementValue + coverageImprovementValue;
  const investment = comparison.crosslinked.totalCapex;

  return {
    costSavingsValue: comparison.savingsUsd,
    latencyImprovementValue,
    coverageImprovementValue,
    totalValue,
    roiPercent:
      investment === 0
        ? undefinedMetric("ZERO_BASELINE_CAPEX")
        : definedMetric((totalValue / investment) * 100),
  };
}

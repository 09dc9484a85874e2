/**
 * Debris Risk Model — collision probability, natural decay, deorbit budget,
 * mitigation cost and a 0–100 sustainability score.
 *
 * Density and decay figures are order-of-magnitude educational estimates,
 * not an authoritative debris environment model. All closed-form.
 */

import type { Metric } from "../errors";
import { definedMetric, undefinedMetric } from "../errors";
import { SECONDS_PER_YEAR, STANDARD_GRAVITY_M_S2 } from "../physics/constants";
import { orbitalVelocityKmPerSec } from "../physics/geometry";

// ─── Disposal rules ─────────────────────────────────────────────────────────

/** A post-mission disposal limit, tagged with when it took effect. */
export interface DisposalRule {
  id: string;
  authority: string;
  maxDisposalYears: number;
  asOf: string;
}

export const DISPOSAL_RULES = {
  fcc5Year: {
    id: "fcc-5-year",
    authority: "FCC",
    maxDisposalYears: 5,
    asOf: "2022-09",
  },
  iadc25Year: {
    id: "iadc-25-year",
    authority: "IADC",
    maxDisposalYears: 25,
    asOf: "2002-10",
  },
} as const satisfies Record<string, DisposalRule>;

// ─── Configuration ──────────────────────────────────────────────────────────

export interface AltitudeBand<T> {
  /** Band applies to altitudes strictly below this bound. */
  belowAltitudeKm: number;
  value: T;
}

export interface DebrisConfig {
  disposalRule: DisposalRule;
  /** Objects per km³, ascending altitude bands. */
  densityBands: AltitudeBand<number>[];
  densityAboveBandsPerKm3: number;
  crossSectionM2: number;
  /** Probability at which each risk level begins. */
  riskThresholds: { moderate: number; high: number; critical: number };
  /** Natural decay years, ascending altitude bands. */
  decayBands: AltitudeBand<number>[];
  /** Above the last decay band: baseYears + yearsPerKm × (alt − fromAltitudeKm). */
  highAltitudeDecay: { baseYears: number; fromAltitudeKm: number; yearsPerKm: number };
  deorbit: {
    targetPerigeeKm: number;
    baseDeltaVMs: number;
    deltaVPerKmMs: number;
    specificImpulseS: number;
    dryMassKg: number;
    propulsionMassFraction: number;
  };
  mitigation: {
    collisionAvoidancePerSatAnnual: number;
    deorbitHardwarePerSat: number;
    insuranceBaseRate: number;
    satelliteValue: number;
    trackingAnnualBase: number;
  };
}

export const DEFAULT_DEBRIS_CONFIG: DebrisConfig = {
  disposalRule: DISPOSAL_RULES.fcc5Year,
  densityBands: [
    { belowAltitudeKm: 600, value: 1e-5 },
    { belowAltitudeKm: 800, value: 1e-4 },
  ],
  densityAboveBandsPerKm3: 1e-3,
  crossSectionM2: 10,
  riskThresholds: { moderate: 0.01, high: 0.05, critical: 0.15 },
  decayBands: [
    { belowAltitudeKm: 400, value: 1 },
    { belowAltitudeKm: 500, value: 5 },
    { belowAltitudeKm: 600, value: 15 },
  ],
  highAltitudeDecay: { baseYears: 100, fromAltitudeKm: 600, yearsPerKm: 5 },
  deorbit: {
    targetPerigeeKm: 200,
    baseDeltaVMs: 50,
    deltaVPerKmMs: 0.5,
    specificImpulseS: 220,
    dryMassKg: 200,
    propulsionMassFraction: 0.1,
  },
  mitigation: {
    collisionAvoidancePerSatAnnual: 50_000,
    deorbitHardwarePerSat: 100_000,
    insuranceBaseRate: 0.02,
    satelliteValue: 2_000_000,
    trackingAnnualBase: 10_000,
  },
};

/** exp(−x) underflows to zero beyond this; P(collision) is then clamped to 1. */
const EXPONENT_CLAMP_LIMIT = 745;

// ─── Result shapes ──────────────────────────────────────────────────────────

export type RiskLevel = "Low" | "Moderate" | "High" | "Critical";
export type SustainabilityGrade = "Excellent" | "Good" | "Acceptable" | "Poor";

export interface CollisionRisk {
  debrisDensityPerKm3: number;
  sweptVolumeKm3: number;
  expectedEncounters: number;
  probability: number;
  annualProbability: number;
  riskLevel: RiskLevel;
  /** The exponent was extreme enough that the probability was clamped. */
  clamped: boolean;
}

export interface DeorbitRequirement {
  naturalDecayYears: number;
  disposalRule: DisposalRule;
  /** Natural decay strictly exceeds the disposal limit. */
  deorbitRequired: boolean;
  compliant: boolean;
  deltaVMs: number;
  propellantMassKg: Metric;
  propulsionSystemMassKg: Metric;
  totalMassPenaltyKg: Metric;
}

export interface MitigationCost {
  collisionAvoidanceAnnual: number;
  collisionAvoidanceTotal: number;
  deorbitHardwareCost: number;
  insuranceAnnual: number;
  insuranceTotal: number;
  trackingAnnual: number;
  trackingTotal: number;
  totalCost: number;
  costPerSatellite: number;
}

export interface SustainabilityScore {
  score: number;
  grade: SustainabilityGrade;
  altitudeScore: number;
  collisionScore: number;
  deorbitScore: number;
  complianceScore: number;
}

export interface DebrisAssessment {
  altitudeKm: number;
  satelliteCount: number;
  missionYears: number;
  hasActiveDeorbit: boolean;
  collision: CollisionRisk;
  deorbit: DeorbitRequirement;
  mitigationCost: MitigationCost;
  sustainability: SustainabilityScore;
  recommendations: string[];
  priority: "High" | "Medium";
}

export interface DebrisInputs {
  altitudeKm: number;
  satelliteCount: number;
  missionYears: number;
  hasActiveDeorbit: boolean;
}

// ─── Collision ──────────────────────────────────────────────────────────────

function bandValue(altitudeKm: number, bands: AltitudeBand<number>[], above: number): number {
  const band = bands.find((b) => altitudeKm < b.belowAltitudeKm);
  return band ? band.value : above;
}

export function debrisDensity(altitudeKm: number, config: DebrisConfig = DEFAULT_DEBRIS_CONFIG): number {
  return bandValue(altitudeKm, config.densityBands, config.densityAboveBandsPerKm3);
}

export function classifyRisk(
  probability: number,
  thresholds: DebrisConfig["riskThresholds"] = DEFAULT_DEBRIS_CONFIG.riskThresholds,
): RiskLevel {
  if (probability < thresholds.moderate) return "Low";
  if (probability < thresholds.high) return "Moderate";
  if (probability < thresholds.critical) return "High";
  return "Critical";
}

/** P = 1 − e^(−x), clamped to [0, 1]. */
function poissonAtLeastOne(expected: number): { probability: number; clamped: boolean } {
  if (!Number.isFinite(expected) || expected >= EXPONENT_CLAMP_LIMIT) {
    return { probability: 1, clamped: true };
  }
  const probability = -Math.expm1(-expected);
  return { probability: Math.min(1, Math.max(0, probability)), clamped: false };
}

/**
 * Collision probability over the mission:
 *
 *   V = A · v · t · n            (swept volume, km³)
 *   P = 1 − exp(−ρ(h) · V)
 */
export function collisionRisk(
  altitudeKm: number,
  satelliteCount: number,
  missionYears: number,
  config: DebrisConfig = DEFAULT_DEBRIS_CONFIG,
): CollisionRisk {
  const density = debrisDensity(altitudeKm, config);
  const crossSectionKm2 = config.crossSectionM2 * 1e-6;
  const volumePerSatPerYear = crossSectionKm2 * orbitalVelocityKmPerSec(altitudeKm) * SECONDS_PER_YEAR;
  const sweptVolumeKm3 = volumePerSatPerYear * satelliteCount * missionYears;
  const expectedEncounters = sweptVolumeKm3 * density;

  const total = poissonAtLeastOne(expectedEncounters);
  const annual = poissonAtLeastOne(expectedEncounters / missionYears);

  return {
    debrisDensityPerKm3: density,
    sweptVolumeKm3,
    expectedEncounters,
    probability: total.probability,
    annualProbability: annual.probability,
    riskLevel: classifyRisk(total.probability, config.riskThresholds),
    clamped: total.clamped || annual.clamped,
  };
}

// ─── Decay & deorbit ────────────────────────────────────────────────────────

/**
 * Natural decay time, non-decreasing in altitude. Bands are half-open, so an
 * altitude exactly on a band edge takes the higher band's value.
 */
export function naturalDecayYears(altitudeKm: number, config: DebrisConfig = DEFAULT_DEBRIS_CONFIG): number {
  const band = config.decayBands.find((b) => altitudeKm < b.belowAltitudeKm);
  if (band) return band.value;

  const { baseYears, fromAltitudeKm, yearsPerKm } = config.highAltitudeDecay;
  return baseYears + Math.max(0, altitudeKm - fromAltitudeKm) * yearsPerKm;
}

export function deorbitRequirement(
  altitudeKm: number,
  hasActiveDeorbit: boolean,
  config: DebrisConfig = DEFAULT_DEBRIS_CONFIG,
): DeorbitRequirement {
  const decayYears = naturalDecayYears(altitudeKm, config);
  const limit = config.disposalRule.maxDisposalYears;
  const deorbitRequired = decayYears > limit;

  const { deorbit } = config;
  const altitudeDropKm = Math.max(0, altitudeKm - deorbit.targetPerigeeKm);
  const deltaVMs = deorbit.baseDeltaVMs + altitudeDropKm * deorbit.deltaVPerKmMs;

  // Tsiolkovsky: m_p = m_dry · (e^(Δv / (Isp·g0)) − 1)
  const massRatio = Math.exp(deltaVMs / (deorbit.specificImpulseS * STANDARD_GRAVITY_M_S2));
  const propellant = deorbit.dryMassKg * (massRatio - 1);

  let propellantMassKg: Metric;
  let propulsionSystemMassKg: Metric;
  let totalMassPenaltyKg: Metric;
  if (Number.isFinite(propellant)) {
    const system = propellant * deorbit.propulsionMassFraction;
    propellantMassKg = definedMetric(propellant);
    propulsionSystemMassKg = definedMetric(system);
    totalMassPenaltyKg = definedMetric(propellant + system);
  } else {
    propellantMassKg = undefinedMetric("NUMERIC_OVERFLOW");
    propulsionSystemMassKg = undefinedMetric("NUMERIC_OVERFLOW");
    totalMassPenaltyKg = undefinedMetric("NUMERIC_OVERFLOW");
  }

  return {
    naturalDecayYears: decayYears,
    disposalRule: config.disposalRule,
    deorbitRequired,
    compliant: !deorbitRequired || hasActiveDeorbit,
    deltaVMs,
    propellantMassKg,
    propulsionSystemMassKg,
    totalMassPenaltyKg,
  };
}

// ─── Mitigation cost ────────────────────────────────────────────────────────

export function mitigationCost(
  satelliteCount: number,
  missionYears: number,
  collision: CollisionRisk,
  deorbitRequired: boolean,
  config: DebrisConfig = DEFAULT_DEBRIS_CONFIG,
): MitigationCost {
  const m = config.mitigation;

  const collisionAvoidanceAnnual = satelliteCount * m.collisionAvoidancePerSatAnnual;
  const deorbitHardwareCost = deorbitRequired ? satelliteCount * m.deorbitHardwarePerSat : 0;
  const insuranceAnnual =
    satelliteCount * m.satelliteValue * m.insuranceBaseRate * (1 + collision.probability);
  // Tracking subscriptions scale sub-linearly with fleet size.
  const trackingAnnual = m.trackingAnnualBase * Math.sqrt(satelliteCount);

  const collisionAvoidanceTotal = collisionAvoidanceAnnual * missionYears;
  const insuranceTotal = insuranceAnnual * missionYears;
  const trackingTotal = trackingAnnual * missionYears;
  const totalCost = collisionAvoidanceTotal + deorbitHardwareCost + insuranceTotal + trackingTotal;

  return {
    collisionAvoidanceAnnual,
    collisionAvoidanceTotal,
    deorbitHardwareCost,
    insuranceAnnual,
    insuranceTotal,
    trackingAnnual,
    trackingTotal,
    totalCost,
    costPerSatellite: totalCost / satelliteCount,
  };
}

// ─── Sustainability ─────────────────────────────────────────────────────────

const ALTITUDE_SCORE_BANDS: AltitudeBand<number>[] = [
  { belowAltitudeKm: 500, value: 30 },
  { belowAltitudeKm: 600, value: 25 },
  { belowAltitudeKm: 700, value: 15 },
];
const ALTITUDE_SCORE_FLOOR = 5;

const COLLISION_SCORE: Record<RiskLevel, number> = {
  Low: 30,
  Moderate: 20,
  High: 10,
  Critical: 0,
};

const DEORBIT_CAPABILITY_SCORE = 25;
const COMPLIANCE_SCORE = 15;

export function gradeSustainability(score: number): SustainabilityGrade {
  if (score >= 85) return "Excellent";
  if (score >= 70) return "Good";
  if (score >= 55) return "Acceptable";
  return "Poor";
}

export function sustainabilityScore(
  altitudeKm: number,
  collision: CollisionRisk,
  deorbit: DeorbitRequirement,
  hasActiveDeorbit: boolean,
): SustainabilityScore {
  const altitudeScore = bandValue(altitudeKm, ALTITUDE_SCORE_BANDS, ALTITUDE_SCORE_FLOOR);
  const collisionScore = COLLISION_SCORE[collision.riskLevel];
  const deorbitScore = hasActiveDeorbit || !deorbit.deorbitRequired ? DEORBIT_CAPABILITY_SCORE : 0;
  const complianceScore = deorbit.compliant ? COMPLIANCE_SCORE : 0;

  const score = Math.min(100, Math.max(0, altitudeScore + collisionScore + deorbitScore + complianceScore));

  return {
    score,
    grade: gradeSustainability(score),
    altitudeScore,
    collisionScore,
    deorbitScore,
    complianceScore,
  };
}

// ─── Recommendations ────────────────────────────────────────────────────────

export function debrisRecommendations(
  altitudeKm: number,
  satelliteCount: number,
  deorbitRequired: boolean,
): { recommendations: string[]; priority: "High" | "Medium" } {
  const recommendations: string[] = [];

  if (deorbitRequired) {
    recommendations.push("Install active deorbit propulsion to meet the disposal rule");
    recommendations.push("Budget for end-of-life maneuvers");
  }
  if (altitudeKm > 700) {
    recommendations.push("Consider a lower altitude for natural decay");
    recommendations.push("Increase debris tracking frequency");
  }
  if (satelliteCount > 50) {
    recommendations.push("Implement automated collision avoidance");
    recommendations.push("Establish a dedicated operations center");
  }
  if (satelliteCount > 100) {
    recommendations.push("Coordinate with national and international debris offices");
    recommendations.push("Share conjunction data through an operator association");
  }

  recommendations.push("Design for demise on reentry");
  recommendations.push("Passivate stored energy at end of life");
  recommendations.push("Track all objects larger than 10 cm");

  return {
    recommendations,
    priority: altitudeKm > 600 || satelliteCount > 50 ? "High" : "Medium",
  };
}

// ─── Assessment ─────────────────────────────────────────────────────────────

export function computeDebrisAssessment(
  inputs: DebrisInputs,
  config: DebrisConfig = DEFAULT_DEBRIS_CONFIG,
): DebrisAssessment {
  const { altitudeKm, satelliteCount, missionYears, hasActiveDeorbit } = inputs;

  const collision = collisionRisk(altitudeKm, satelliteCount, missionYears, config);
  const deorbit = deorbitRequirement(altitudeKm, hasActiveDeorbit, config);
  const advice = debrisRecommendations(altitudeKm, satelliteCount, deorbit.deorbitRequired);

  return {
    altitudeKm,
    satelliteCount,
    missionYears,
    hasActiveDeorbit,
    collision,
    deorbit,
    mitigationCost: mitigationCost(satelliteCount, missionYears, collision, deorbit.deorbitRequired, config),
    sustainability: sustainabilityScore(altitudeKm, collision, deorbit, hasActiveDeorbit),
    recommendations: advice.recommendations,
    priority: advice.priority,
  };
}

/**
 * @crosslink/core — Trade-off engine entrypoint.
 *
 * Ground-relay versus crosslinked constellation analysis: geometry, link
 * budgets, simulation, cost, debris risk and the final recommendation.
 * No UI code. No I/O beyond the bundled station presets.
 */

// ─── Physics ────────────────────────────────────────────────────────────────

export {
  EARTH_RADIUS_KM,
  DEG_TO_RAD,
  RAD_TO_DEG,
  GM_EARTH,
  SPEED_OF_LIGHT_M_S,
  BOLTZMANN_J_PER_K,
  STANDARD_GRAVITY_M_S2,
  SECONDS_PER_YEAR,
  LEO_MAX_ALT_KM,
} from "./physics/constants";

export {
  orbitalRadiusKm,
  orbitalPeriodSeconds,
  angularVelocityRadPerSec,
  orbitalVelocityKmPerSec,
  satellitePositionAt,
  groundStationPosition,
  distanceKm,
  elevationAngleDeg,
  isAboveHorizon,
  lineOfSightClearsEarth,
} from "./physics/geometry";

export type { EciVector, SatelliteElement, GroundStation } from "./physics/geometry";

export { calculateCoverageGeometry } from "./physics/coverage";

export type { CoverageParams, CoverageGeometry } from "./physics/coverage";

export {
  DEFAULT_CROSSLINK_VISIBILITY,
  isSameOrbitalPlane,
  isCrosslinkVisible,
} from "./physics/visibility";

export type { SatelliteState, CrosslinkVisibilityPolicy } from "./physics/visibility";

// ─── Link ───────────────────────────────────────────────────────────────────

export {
  DEFAULT_LINK_BUDGET_CONFIG,
  wavelengthM,
  freeSpacePathLossDb,
  noisePowerDbw,
  isLinkFeasible,
  evaluateLinkBudget,
} from "./link/budget";

export type { LinkBudgetConfig, LinkParameters, LinkBudget } from "./link/budget";

export {
  DEFAULT_LATENCY_CONFIG,
  LATENCY_MODEL_ASSUMPTIONS,
  propagationDelayMs,
  estimateLatency,
} from "./link/latency";

export type { PathType, LatencyConfig, LatencyEstimate } from "./link/latency";

// ─── Simulation ─────────────────────────────────────────────────────────────

export { runSimulation } from "./simulation/simulator";
export type { SimulationOptions } from "./simulation/simulator";

export { buildConstellation, satelliteId } from "./simulation/constellation";
export type { Constellation } from "./simulation/constellation";

export { selectGroundLink } from "./simulation/selection";
export type { GroundCandidate } from "./simulation/selection";

export { GROUND_STATION_PRESETS, getGroundStationPreset } from "./simulation/stations";
export type { GroundStationPresetName } from "./simulation/stations";

export { DEFAULT_SIMULATION_CONFIG } from "./simulation/types";

export type {
  Architecture,
  GroundStationSelection,
  SimulationConfig,
  SatelliteRadio,
  LinkSample,
  LinkKind,
  StepSummary,
  SimulationRun,
} from "./simulation/types";

// ─── Cost ───────────────────────────────────────────────────────────────────

export {
  DEFAULT_UNIT_COSTS,
  DEFAULT_COST_CONFIG,
  tippingPointSatellites,
  paybackPeriod,
  computeCostComparison,
  costRoi,
} from "./cost/comparator";

export type {
  UnitCosts,
  RoiValuation,
  CostConfig,
  ArchitectureCost,
  CostComparison,
  CostInputs,
  CostRoi,
} from "./cost/comparator";

export { compareCosts, withUnitCosts } from "./cost/compare";
export type { CostOptions } from "./cost/compare";

// ─── Debris ─────────────────────────────────────────────────────────────────

export {
  DISPOSAL_RULES,
  DEFAULT_DEBRIS_CONFIG,
  debrisDensity,
  classifyRisk,
  collisionRisk,
  naturalDecayYears,
  deorbitRequirement,
  mitigationCost,
  gradeSustainability,
  sustainabilityScore,
  debrisRecommendations,
  computeDebrisAssessment,
} from "./debris/risk";

export type {
  DisposalRule,
  AltitudeBand,
  DebrisConfig,
  RiskLevel,
  SustainabilityGrade,
  CollisionRisk,
  DeorbitRequirement,
  MitigationCost,
  SustainabilityScore,
  DebrisAssessment,
  DebrisInputs,
} from "./debris/risk";

export { assessDebris } from "./debris/assess";
export type { DebrisOptions } from "./debris/assess";

// ─── Decision ───────────────────────────────────────────────────────────────

export { DEFAULT_DECISION_CONFIG } from "./decision/config";
export type { DecisionConfig } from "./decision/config";

export { synthesizeDecision } from "./decision/synthesizer";

export type {
  Verdict,
  Confidence,
  DecisionFactorName,
  DecisionFactor,
  DecisionScores,
  Recommendation,
  DecisionInputs,
  DecisionOptions,
} from "./decision/synthesizer";

export { evaluateArchitectures } from "./evaluate";
export type { ArchitectureEvaluation, EvaluateOptions } from "./evaluate";

// ─── Configuration, errors, logging ─────────────────────────────────────────

export {
  DEFAULT_ENGINE_CONFIG,
  mergeEngineConfig,
  validateEngineConfig,
  resolveEngineConfig,
  configOrDefault,
} from "./config";

export type { GeometryConfig, EngineConfig, EngineConfigOverrides } from "./config";

export {
  ConfigurationError,
  ok,
  fail,
  definedMetric,
  undefinedMetric,
  averageMetric,
} from "./errors";

export type { ConfigurationIssue, EngineResult, UndefinedReason, Metric } from "./errors";

export { LogLevelSchema, resolveLogLevel, createLogger } from "./logger";
export type { LogLevel, Logger } from "./logger";

// ─── Schemas ────────────────────────────────────────────────────────────────

export {
  // Enum schemas
  ArchitectureSchema,
  GroundStationSelectionSchema,
  // Orbital
  SatelliteElementSchema,
  ConstellationConfigSchema,
  GroundStationSchema,
  // Requests
  SimulationRequestSchema,
  UnitCostsSchema,
  CostRequestSchema,
  DebrisRequestSchema,
  DisposalRuleSchema,
  ScenarioSchema,
  // Configuration
  EngineConfigSchema,
} from "./schemas";

export type {
  ConstellationConfig,
  ParsedConstellationConfig,
  GroundStationInput,
  SimulationRequest,
  CostRequest,
  DebrisRequest,
  Scenario,
} from "./schemas";

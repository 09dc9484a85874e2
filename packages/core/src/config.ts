/**
 * Engine configuration record.
 *
 * Every component receives its section of one EngineConfig value instead of
 * reading module-level constants, so an override for one scenario never
 * reaches another run.
 */

import type { CostConfig, RoiValuation, UnitCosts } from "./cost/comparator";
import { DEFAULT_COST_CONFIG } from "./cost/comparator";
import type { DebrisConfig } from "./debris/risk";
import { DEFAULT_DEBRIS_CONFIG } from "./debris/risk";
import type { DecisionConfig } from "./decision/config";
import { DEFAULT_DECISION_CONFIG } from "./decision/config";
import type { EngineResult } from "./errors";
import { ConfigurationError, fail, ok } from "./errors";
import type { LinkBudgetConfig } from "./link/budget";
import { DEFAULT_LINK_BUDGET_CONFIG } from "./link/budget";
import type { LatencyConfig } from "./link/latency";
import { DEFAULT_LATENCY_CONFIG } from "./link/latency";
import { EngineConfigSchema } from "./schemas";
import type { SimulationConfig } from "./simulation/types";
import { DEFAULT_SIMULATION_CONFIG } from "./simulation/types";

export interface GeometryConfig {
  /** Ground elevation mask (degrees); the mask angle itself is visible. */
  minElevationDeg: number;
}

export interface EngineConfig {
  geometry: GeometryConfig;
  link: LinkBudgetConfig;
  latency: LatencyConfig;
  simulation: SimulationConfig;
  costs: CostConfig;
  debris: DebrisConfig;
  decision: DecisionConfig;
}

function freezeDeep<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null) freezeDeep(child);
  }
  return Object.freeze(value);
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = freezeDeep({
  geometry: { minElevationDeg: 0 },
  link: DEFAULT_LINK_BUDGET_CONFIG,
  latency: DEFAULT_LATENCY_CONFIG,
  simulation: DEFAULT_SIMULATION_CONFIG,
  costs: DEFAULT_COST_CONFIG,
  debris: DEFAULT_DEBRIS_CONFIG,
  decision: DEFAULT_DECISION_CONFIG,
});

// ─── Overrides ──────────────────────────────────────────────────────────────

export interface EngineConfigOverrides {
  geometry?: Partial<GeometryConfig>;
  link?: Partial<LinkBudgetConfig>;
  latency?: Partial<LatencyConfig>;
  simulation?: Partial<SimulationConfig>;
  costs?: Partial<Pick<CostConfig, "missionYears">> & {
    unitCosts?: Partial<UnitCosts>;
    roi?: Partial<RoiValuation>;
  };
  debris?: Partial<
    Pick<
      DebrisConfig,
      "disposalRule" | "densityBands" | "densityAboveBandsPerKm3" | "crossSectionM2" | "decayBands"
    >
  > & {
    riskThresholds?: Partial<DebrisConfig["riskThresholds"]>;
    highAltitudeDecay?: Partial<DebrisConfig["highAltitudeDecay"]>;
    deorbit?: Partial<DebrisConfig["deorbit"]>;
    mitigation?: Partial<DebrisConfig["mitigation"]>;
  };
  decision?: Partial<DecisionConfig>;
}

/** Objects merge key by key; arrays and the disposal rule are replaced whole. */
export function mergeEngineConfig(base: EngineConfig, overrides: EngineConfigOverrides): EngineConfig {
  const costs: NonNullable<EngineConfigOverrides["costs"]> = overrides.costs ?? {};
  const debris: NonNullable<EngineConfigOverrides["debris"]> = overrides.debris ?? {};

  return {
    geometry: { ...base.geometry, ...overrides.geometry },
    link: { ...base.link, ...overrides.link },
    latency: { ...base.latency, ...overrides.latency },
    simulation: { ...base.simulation, ...overrides.simulation },
    costs: {
      ...base.costs,
      ...costs,
      unitCosts: { ...base.costs.unitCosts, ...costs.unitCosts },
      roi: { ...base.costs.roi, ...costs.roi },
    },
    debris: {
      ...base.debris,
      ...debris,
      riskThresholds: { ...base.debris.riskThresholds, ...debris.riskThresholds },
      highAltitudeDecay: { ...base.debris.highAltitudeDecay, ...debris.highAltitudeDecay },
      deorbit: { ...base.debris.deorbit, ...debris.deorbit },
      mitigation: { ...base.debris.mitigation, ...debris.mitigation },
    },
    decision: { ...base.decision, ...overrides.decision },
  };
}

/** Validates a full config and returns a private copy of it. */
export function validateEngineConfig(config: EngineConfig): EngineResult<EngineConfig> {
  const parsed = EngineConfigSchema.safeParse(config);
  if (!parsed.success) {
    return fail(ConfigurationError.fromZod(parsed.error, "engine configuration"));
  }
  return ok(parsed.data);
}

export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG,
): EngineResult<EngineConfig> {
  return validateEngineConfig(mergeEngineConfig(base, overrides));
}

/** A caller-supplied config is validated; the frozen defaults are used as-is. */
export function configOrDefault(config?: EngineConfig): EngineResult<EngineConfig> {
  return config ? validateEngineConfig(config) : ok(DEFAULT_ENGINE_CONFIG);
}

import type { EngineConfig } from "../config";
import { configOrDefault } from "../config";
import type { EngineResult } from "../errors";
import { ConfigurationError, fail, ok } from "../errors";
import type { Logger } from "../logger";
import { createLogger } from "../logger";
import type { CostRequest } from "../schemas";
import { CostRequestSchema } from "../schemas";
import type { CostComparison, UnitCosts } from "./comparator";
import { computeCostComparison } from "./comparator";

export interface CostOptions {
  config?: EngineConfig;
  logger?: Logger;
}

export function withUnitCosts(base: UnitCosts, overrides: Partial<UnitCosts> = {}): UnitCosts {
  return {
    groundStationUnitCost: overrides.groundStationUnitCost ?? base.groundStationUnitCost,
    satelliteUnitCost: overrides.satelliteUnitCost ?? base.satelliteUnitCost,
    islUnitCost: overrides.islUnitCost ?? base.islUnitCost,
    groundStationAnnualOpex: overrides.groundStationAnnualOpex ?? base.groundStationAnnualOpex,
  };
}

/**
 * Validates a cost request and compares both architectures. Unit costs and
 * mission length not given in the request come from the config.
 */
export function compareCosts(request: CostRequest, options: CostOptions = {}): EngineResult<CostComparison> {
  const parsed = CostRequestSchema.safeParse(request);
  if (!parsed.success) {
    return fail(ConfigurationError.fromZod(parsed.error, "cost request"));
  }
  const resolved = configOrDefault(options.config);
  if (!resolved.success) return fail(resolved.error);

  const { costs } = resolved.data;
  const logger = options.logger ?? createLogger("costs");

  const comparison = computeCostComparison({
    satelliteCount: parsed.data.satelliteCount,
    groundStationsGroundOnly: parsed.data.groundStationsGroundOnly,
    groundStationsCrosslinked: parsed.data.groundStationsCrosslinked,
    unitCosts: withUnitCosts(costs.unitCosts, parsed.data.unitCosts),
    missionYears: parsed.data.missionYears ?? costs.missionYears,
  });

  if (!comparison.tippingPoint.defined) {
    logger.debug(`tipping point undefined: ${comparison.tippingPoint.reason}`);
  }
  return ok(comparison);
}

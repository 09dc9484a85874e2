/**
 * One-call comparison of both architectures for a scenario: two simulation
 * runs, the cost comparison, the debris assessment and the recommendation.
 */

import type { EngineConfig } from "./config";
import { configOrDefault } from "./config";
import type { CostComparison } from "./cost/comparator";
import { compareCosts } from "./cost/compare";
import { assessDebris } from "./debris/assess";
import type { DebrisAssessment } from "./debris/risk";
import type { Recommendation } from "./decision/synthesizer";
import { synthesizeDecision } from "./decision/synthesizer";
import type { EngineResult } from "./errors";
import { ConfigurationError, fail, ok } from "./errors";
import type { Logger } from "./logger";
import { createLogger } from "./logger";
import type { CrosslinkVisibilityPolicy } from "./physics/visibility";
import type { Scenario } from "./schemas";
import { ScenarioSchema } from "./schemas";
import { runSimulation } from "./simulation/simulator";
import type { SimulationRun } from "./simulation/types";

export interface ArchitectureEvaluation {
  groundOnly: SimulationRun;
  crosslinked: SimulationRun;
  costs: CostComparison;
  debris: DebrisAssessment;
  recommendation: Recommendation;
}

export interface EvaluateOptions {
  config?: EngineConfig;
  signal?: AbortSignal;
  crosslinkVisibility?: CrosslinkVisibilityPolicy;
  logger?: Logger;
}

export function evaluateArchitectures(
  scenario: Scenario,
  options: EvaluateOptions = {},
): EngineResult<ArchitectureEvaluation> {
  const parsed = ScenarioSchema.safeParse(scenario);
  if (!parsed.success) {
    return fail(ConfigurationError.fromZod(parsed.error, "scenario"));
  }
  const resolved = configOrDefault(options.config);
  if (!resolved.success) return fail(resolved.error);

  const s = parsed.data;
  const config = resolved.data;
  const logger = options.logger ?? createLogger("evaluate");
  const runOptions = {
    config,
    signal: options.signal,
    crosslinkVisibility: options.crosslinkVisibility,
    logger,
  };

  const groundOnly = runSimulation(
    {
      constellation: s.constellation,
      groundStations: s.groundStationsGroundOnly,
      architecture: "ground-only",
      timeSteps: s.timeSteps,
      orbitPeriodMinutes: s.orbitPeriodMinutes,
    },
    runOptions,
  );
  if (!groundOnly.success) return fail(groundOnly.error);

  const crosslinked = runSimulation(
    {
      constellation: s.constellation,
      groundStations: s.groundStationsCrosslinked,
      architecture: "crosslinked",
      timeSteps: s.timeSteps,
      orbitPeriodMinutes: s.orbitPeriodMinutes,
    },
    runOptions,
  );
  if (!crosslinked.success) return fail(crosslinked.error);

  const costs = compareCosts(
    {
      satelliteCount: s.constellation.satelliteCount,
      groundStationsGroundOnly: s.groundStationsGroundOnly.length,
      groundStationsCrosslinked: s.groundStationsCrosslinked.length,
      unitCosts: s.unitCosts,
      missionYears: s.missionYears,
    },
    { config, logger },
  );
  if (!costs.success) return fail(costs.error);

  const debris = assessDebris(
    {
      altitudeKm: s.constellation.altitudeKm,
      satelliteCount: s.constellation.satelliteCount,
      missionYears: s.missionYears,
      hasActiveDeorbit: s.hasActiveDeorbit,
    },
    { config, logger },
  );
  if (!debris.success) return fail(debris.error);

  const recommendation = synthesizeDecision(
    { groundOnly: groundOnly.data, crosslinked: crosslinked.data, costs: costs.data, debris: debris.data },
    { config, logger },
  );
  if (!recommendation.success) return fail(recommendation.error);

  return ok({
    groundOnly: groundOnly.data,
    crosslinked: crosslinked.data,
    costs: costs.data,
    debris: debris.data,
    recommendation: recommendation.data,
  });
}

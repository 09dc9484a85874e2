/**
 * Orbit Simulator — steps a constellation through one orbit period and
 * records, per satellite per step, the link it would use.
 *
 * Steps are independent of each other. They are evaluated in fixed-size
 * ranges, each into a private accumulator, and the ranges are merged in step
 * order, so identical input always yields bit-identical output.
 */

import type { EngineConfig } from "../config";
import { configOrDefault } from "../config";
import type { EngineResult } from "../errors";
import { averageMetric, ConfigurationError, fail, ok } from "../errors";
import type { LinkBudget } from "../link/budget";
import { evaluateLinkBudget } from "../link/budget";
import { estimateLatency, LATENCY_MODEL_ASSUMPTIONS } from "../link/latency";
import type { Logger } from "../logger";
import { createLogger } from "../logger";
import { calculateCoverageGeometry } from "../physics/coverage";
import type { EciVector, GroundStation } from "../physics/geometry";
import { distanceKm, groundStationPosition, isAboveHorizon, satellitePositionAt } from "../physics/geometry";
import type { CrosslinkVisibilityPolicy, SatelliteState } from "../physics/visibility";
import { DEFAULT_CROSSLINK_VISIBILITY, isCrosslinkVisible } from "../physics/visibility";
import type { SimulationRequest } from "../schemas";
import { SimulationRequestSchema } from "../schemas";
import { emptyAccumulator, mergeAccumulators, recordStep } from "./accumulator";
import type { Constellation } from "./constellation";
import { buildConstellation } from "./constellation";
import type { GroundCandidate } from "./selection";
import { selectGroundLink } from "./selection";
import type { Architecture, LinkSample, SimulationRun, StepSummary } from "./types";

export interface SimulationOptions {
  config?: EngineConfig;
  /** Checked between steps; an aborted run returns what it completed. */
  signal?: AbortSignal;
  crosslinkVisibility?: CrosslinkVisibilityPolicy;
  logger?: Logger;
}

const GEOMETRY_ASSUMPTIONS: readonly string[] = [
  "Circular orbits around a spherical Earth; perturbations are not modelled.",
  "Ground stations are fixed in the inertial frame; Earth rotation is not modelled.",
  "Atmospheric loss is a clear-sky constant; precipitation fade is not modelled.",
];

interface StepContext {
  architecture: Architecture;
  constellation: Constellation;
  stations: readonly GroundStation[];
  stationPositions: readonly EciVector[];
  config: EngineConfig;
  visibility: CrosslinkVisibilityPolicy;
}

interface CrosslinkCandidate {
  peerId: string;
  budget: LinkBudget;
}

// ─── Per-satellite evaluation ───────────────────────────────────────────────

function groundCandidates(
  ctx: StepContext,
  satellitePos: EciVector,
): GroundCandidate[] {
  const { radio } = ctx.constellation;
  const candidates: GroundCandidate[] = [];

  ctx.stations.forEach((station, stationIndex) => {
    const stationPos = ctx.stationPositions[stationIndex];
    if (!isAboveHorizon(stationPos, satellitePos, ctx.config.geometry.minElevationDeg)) return;

    const budget = evaluateLinkBudget(
      {
        transmitPowerDbw: radio.transmitPowerDbw,
        transmitGainDbi: radio.antennaGainDbi,
        receiveGainDbi: station.antennaGainDbi,
        frequencyGhz: radio.frequencyGhz,
        distanceKm: distanceKm(stationPos, satellitePos),
        noiseTemperatureK: station.systemTemperatureK,
      },
      ctx.config.link,
    );
    candidates.push({ stationId: station.id, stationIndex, budget });
  });

  return candidates;
}

/** Nearest crosslink-visible neighbour, budgeted with the shared radio on both ends. */
function nearestCrosslink(
  ctx: StepContext,
  states: readonly SatelliteState[],
  index: number,
  timeSeconds: number,
): CrosslinkCandidate | undefined {
  const self = states[index];
  let nearest: { state: SatelliteState; distance: number } | undefined;

  for (let otherIndex = 0; otherIndex < states.length; otherIndex++) {
    if (otherIndex === index) continue;
    const other = states[otherIndex];
    const distance = distanceKm(self.position, other.position);
    // Co-located satellites have no meaningful path loss.
    if (distance <= 0) continue;
    if (!isCrosslinkVisible(ctx.visibility, self, other, timeSeconds)) continue;
    if (!nearest || distance < nearest.distance) nearest = { state: other, distance };
  }

  if (!nearest) return undefined;

  const { radio } = ctx.constellation;
  return {
    peerId: nearest.state.element.id,
    budget: evaluateLinkBudget(
      {
        transmitPowerDbw: radio.transmitPowerDbw,
        transmitGainDbi: radio.antennaGainDbi,
        receiveGainDbi: radio.antennaGainDbi,
        frequencyGhz: radio.frequencyGhz,
        distanceKm: nearest.distance,
      },
      ctx.config.link,
    ),
  };
}

function groundSample(ctx: StepContext, satelliteId: string, candidate: GroundCandidate): LinkSample {
  const { budget } = candidate;
  return {
    kind: "ground",
    satelliteId,
    peerId: candidate.stationId,
    distanceKm: budget.distanceKm,
    receivedPowerDbw: budget.receivedPowerDbw,
    snrDb: budget.snrDb,
    feasible: budget.feasible,
    latencyMs: estimateLatency("ground-relay", [budget.distanceKm], ctx.config.latency).totalMs,
  };
}

function crosslinkSample(ctx: StepContext, satelliteId: string, candidate: CrosslinkCandidate): LinkSample {
  const { budget } = candidate;
  return {
    kind: "crosslink",
    satelliteId,
    peerId: candidate.peerId,
    distanceKm: budget.distanceKm,
    receivedPowerDbw: budget.receivedPowerDbw,
    snrDb: budget.snrDb,
    feasible: budget.feasible,
    latencyMs: estimateLatency("crosslink", [budget.distanceKm], ctx.config.latency).totalMs,
  };
}

/**
 * Crosslinked priority: feasible crosslink, feasible ground link, the nearer
 * of the infeasible candidates, unlinked.
 */
function chooseCrosslinkedSample(
  ctx: StepContext,
  satelliteId: string,
  crosslink: CrosslinkCandidate | undefined,
  ground: GroundCandidate | undefined,
): LinkSample {
  if (crosslink?.budget.feasible) return crosslinkSample(ctx, satelliteId, crosslink);
  if (ground?.budget.feasible) return groundSample(ctx, satelliteId, ground);
  if (crosslink && ground) {
    return ground.budget.distanceKm < crosslink.budget.distanceKm
      ? groundSample(ctx, satelliteId, ground)
      : crosslinkSample(ctx, satelliteId, crosslink);
  }
  if (crosslink) return crosslinkSample(ctx, satelliteId, crosslink);
  if (ground) return groundSample(ctx, satelliteId, ground);
  return { kind: "unlinked", satelliteId, feasible: false };
}

// ─── Step evaluation ────────────────────────────────────────────────────────

function evaluateStep(ctx: StepContext, stepIndex: number, stepSeconds: number): StepSummary {
  const timeSeconds = stepIndex * stepSeconds;
  const states: SatelliteState[] = ctx.constellation.satellites.map((element) => ({
    element,
    position: satellitePositionAt(element, timeSeconds),
  }));

  const assignments = new Map<string, number>();
  const samples: LinkSample[] = [];
  let gatewayAvailable = false;

  states.forEach((state, index) => {
    const satelliteId = state.element.id;
    const ground = selectGroundLink(
      groundCandidates(ctx, state.position),
      ctx.config.simulation.groundStationSelection,
      assignments,
    );
    if (ground?.budget.feasible) gatewayAvailable = true;

    const sample =
      ctx.architecture === "crosslinked"
        ? chooseCrosslinkedSample(ctx, satelliteId, nearestCrosslink(ctx, states, index, timeSeconds), ground)
        : ground
          ? groundSample(ctx, satelliteId, ground)
          : { kind: "unlinked" as const, satelliteId, feasible: false as const };

    if (sample.kind === "ground" && sample.feasible) {
      assignments.set(sample.peerId, (assignments.get(sample.peerId) ?? 0) + 1);
    }
    samples.push(sample);
  });

  let feasibleSatellites = 0;
  let snrSum = 0;
  let latencySum = 0;
  for (const sample of samples) {
    if (sample.kind === "unlinked" || !sample.feasible) continue;
    feasibleSatellites += 1;
    snrSum += sample.snrDb;
    latencySum += sample.latencyMs;
  }

  return {
    stepIndex,
    timeMinutes: timeSeconds / 60,
    samples,
    feasibleSatellites,
    coveragePercent: samples.length === 0 ? 0 : (feasibleSatellites / samples.length) * 100,
    averageSnrDb: averageMetric(snrSum, feasibleSatellites),
    averageLatencyMs: averageMetric(latencySum, feasibleSatellites),
    gatewayAvailable,
  };
}

// ─── Run ────────────────────────────────────────────────────────────────────

function describeVisibility(policy: CrosslinkVisibilityPolicy): string {
  switch (policy.kind) {
    case "same-plane":
      return `Crosslinks are visible between satellites in the same orbital plane (±${policy.toleranceDeg}°).`;
    case "earth-masked":
      return `Crosslinks are visible when the line of sight clears Earth by ${policy.grazingAltitudeKm} km.`;
    case "external":
      return "Crosslink visibility is supplied by the caller.";
  }
}

export function runSimulation(
  request: SimulationRequest,
  options: SimulationOptions = {},
): EngineResult<SimulationRun> {
  const parsed = SimulationRequestSchema.safeParse(request);
  if (!parsed.success) {
    return fail(ConfigurationError.fromZod(parsed.error, "simulation request"));
  }
  const resolved = configOrDefault(options.config);
  if (!resolved.success) return fail(resolved.error);

  const config = resolved.data;
  const logger = options.logger ?? createLogger("simulation");
  const { architecture, timeSteps, orbitPeriodMinutes } = parsed.data;
  const visibility = options.crosslinkVisibility ?? DEFAULT_CROSSLINK_VISIBILITY;

  try {
    const constellation = buildConstellation(parsed.data.constellation);
    const stations = parsed.data.groundStations;
    const ctx: StepContext = {
      architecture,
      constellation,
      stations,
      stationPositions: stations.map(groundStationPosition),
      config,
      visibility,
    };

    const stepSeconds = (orbitPeriodMinutes * 60) / timeSteps;
    const chunkSize = config.simulation.stepChunkSize;
    logger.debug(
      `${architecture}: ${constellation.satellites.length} satellites, ${stations.length} stations, ${timeSteps} steps`,
    );

    const total = emptyAccumulator();
    let cancelled = false;

    for (let start = 0; start < timeSteps && !cancelled; start += chunkSize) {
      const chunk = emptyAccumulator();
      const end = Math.min(start + chunkSize, timeSteps);
      for (let k = start; k < end; k++) {
        if (options.signal?.aborted) {
          cancelled = true;
          break;
        }
        recordStep(chunk, evaluateStep(ctx, k, stepSeconds));
      }
      mergeAccumulators(total, chunk);
    }

    const completedSteps = total.steps.length;
    if (cancelled) logger.info(`${architecture}: cancelled after ${completedSteps} of ${timeSteps} steps`);

    const stepMinutes = stepSeconds / 60;
    return ok({
      architecture,
      satelliteCount: constellation.satellites.length,
      groundStationCount: stations.length,
      timeSteps,
      completedSteps,
      cancelled,
      orbitPeriodMinutes,
      stepSeconds,
      totalSamples: total.totalSamples,
      feasibleSamples: total.feasibleSamples,
      coveragePercent: total.totalSamples === 0 ? 0 : (total.feasibleSamples / total.totalSamples) * 100,
      averageSnrDb: averageMetric(total.snrSumDb, total.feasibleSamples),
      averageLatencyMs: averageMetric(total.latencySumMs, total.feasibleSamples),
      downtimeMinutes: total.stepsWithoutLink * stepMinutes,
      uptimePercent:
        completedSteps === 0 ? 0 : ((completedSteps - total.stepsWithoutLink) / completedSteps) * 100,
      gatewayOutageMinutes: total.stepsWithoutGateway * stepMinutes,
      linkKindCounts: total.linkKindCounts,
      footprint: calculateCoverageGeometry({
        altitudeKm: constellation.altitudeKm,
        minElevationDeg: config.geometry.minElevationDeg,
      }),
      steps: total.steps,
      assumptions: [
        ...GEOMETRY_ASSUMPTIONS,
        ...LATENCY_MODEL_ASSUMPTIONS,
        ...(architecture === "crosslinked" ? [describeVisibility(visibility)] : []),
      ],
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`${architecture}: ${error.message}`);
      return fail(error);
    }
    throw error;
  }
}

/**
 * One-way latency estimate: propagation over the given legs plus a fixed
 * processing delay per path type.
 */

import { ConfigurationError } from "../errors";
import { SPEED_OF_LIGHT_M_S } from "../physics/constants";

export type PathType = "ground-relay" | "crosslink";

export interface LatencyConfig {
  /** Routing, switching and protocol overhead through the terrestrial network. */
  groundRelayProcessingMs: number;
  /** Onboard switching on an already-acquired crosslink. */
  crosslinkProcessingMs: number;
}

export const DEFAULT_LATENCY_CONFIG: LatencyConfig = {
  groundRelayProcessingMs: 50,
  crosslinkProcessingMs: 5,
};

export interface LatencyEstimate {
  pathType: PathType;
  propagationMs: number;
  processingMs: number;
  totalMs: number;
}

/** Simplifications every consumer of latency figures should be told about. */
export const LATENCY_MODEL_ASSUMPTIONS: readonly string[] = [
  "Latency covers the first relay only; routing hops beyond it are not modelled.",
  "Crosslinks are assumed already acquired; link acquisition time is not modelled.",
  "Processing delay is a fixed constant per path type.",
];

export function propagationDelayMs(distanceKm: number): number {
  return ((distanceKm * 1000) / SPEED_OF_LIGHT_M_S) * 1000;
}

export function estimateLatency(
  pathType: PathType,
  legsKm: readonly number[],
  config: LatencyConfig = DEFAULT_LATENCY_CONFIG,
): LatencyEstimate {
  if (legsKm.length === 0) {
    throw new ConfigurationError("A latency path needs at least one leg", [
      { path: "legsKm", message: "must not be empty" },
    ]);
  }
  for (const leg of legsKm) {
    if (!Number.isFinite(leg) || leg < 0) {
      throw new ConfigurationError(`Leg distance must be non-negative, got ${leg} km`, [
        { path: "legsKm", message: "must be >= 0" },
      ]);
    }
  }

  const propagationMs = legsKm.reduce((sum, leg) => sum + propagationDelayMs(leg), 0);
  const processingMs =
    pathType === "crosslink" ? config.crosslinkProcessingMs : config.groundRelayProcessingMs;

  return {
    pathType,
    propagationMs,
    processingMs,
    totalMs: propagationMs + processingMs,
  };
}

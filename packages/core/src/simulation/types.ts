import type { Metric } from "../errors";
import type { CoverageGeometry } from "../physics/coverage";

export type Architecture = "ground-only" | "crosslinked";

/**
 * Which feasible ground station a satellite uses when several are in view.
 * "load-balance" prefers the station with the fewest satellites already
 * assigned in the same step, then the highest SNR.
 */
export type GroundStationSelection = "highest-snr" | "nearest" | "load-balance";

export interface SimulationConfig {
  groundStationSelection: GroundStationSelection;
  /** Steps per accumulator; partial results are merged in step order. */
  stepChunkSize: number;
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  groundStationSelection: "highest-snr",
  stepChunkSize: 25,
};

export interface SatelliteRadio {
  transmitPowerDbw: number;
  antennaGainDbi: number;
  frequencyGhz: number;
}

export type LinkSample =
  | {
      kind: "ground" | "crosslink";
      satelliteId: string;
      peerId: string;
      distanceKm: number;
      receivedPowerDbw: number;
      snrDb: number;
      feasible: boolean;
      latencyMs: number;
    }
  | {
      kind: "unlinked";
      satelliteId: string;
      feasible: false;
    };

export type LinkKind = LinkSample["kind"];

export interface StepSummary {
  stepIndex: number;
  timeMinutes: number;
  samples: LinkSample[];
  feasibleSatellites: number;
  coveragePercent: number;
  averageSnrDb: Metric;
  averageLatencyMs: Metric;
  /** At least one satellite holds a feasible link to a ground station. */
  gatewayAvailable: boolean;
}

export interface SimulationRun {
  architecture: Architecture;
  satelliteCount: number;
  groundStationCount: number;
  timeSteps: number;
  completedSteps: number;
  cancelled: boolean;
  orbitPeriodMinutes: number;
  stepSeconds: number;
  totalSamples: number;
  feasibleSamples: number;
  coveragePercent: number;
  averageSnrDb: Metric;
  averageLatencyMs: Metric;
  /** Simulated time during which no satellite had a feasible link. */
  downtimeMinutes: number;
  uptimePercent: number;
  /** Simulated time during which no satellite reached a ground station. */
  gatewayOutageMinutes: number;
  linkKindCounts: Record<LinkKind, number>;
  footprint: CoverageGeometry;
  steps: StepSummary[];
  assumptions: readonly string[];
}

import type { SatelliteElement } from "../physics/geometry";
import type { ParsedConstellationConfig } from "../schemas";
import type { SatelliteRadio } from "./types";

export interface Constellation {
  altitudeKm: number;
  satellites: SatelliteElement[];
  radio: SatelliteRadio;
}

export function satelliteId(index: number): string {
  return `SAT-${String(index + 1).padStart(2, "0")}`;
}

/**
 * Evenly phased single-plane ring, or the supplied elements verbatim.
 * Satellite i sits at 360·i/n + phaseOffset degrees.
 */
export function buildConstellation(config: ParsedConstellationConfig): Constellation {
  const n = config.satelliteCount;
  const satellites =
    config.elements ??
    Array.from({ length: n }, (_, i) => ({
      id: satelliteId(i),
      altitudeKm: config.altitudeKm,
      inclinationDeg: config.inclinationDeg,
      raanDeg: config.raanDeg,
      initialPhaseDeg: (360 * i) / n + config.phaseOffsetDeg,
    }));

  return {
    altitudeKm: config.altitudeKm,
    satellites,
    radio: {
      transmitPowerDbw: config.transmitPowerDbw,
      antennaGainDbi: config.antennaGainDbi,
      frequencyGhz: config.frequencyGhz,
    },
  };
}

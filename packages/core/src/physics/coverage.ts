/**
 * Satellite Coverage Calculations
 *
 * Ground footprint, coverage cone and slant range of a single satellite,
 * derived from altitude and the ground elevation mask.
 */

import { DEG_TO_RAD, EARTH_RADIUS_KM, RAD_TO_DEG } from "./constants";
import { orbitalRadiusKm } from "./geometry";

export interface CoverageParams {
  /** Satellite altitude in kilometers */
  altitudeKm: number;
  /** Minimum elevation angle from ground station (degrees) */
  minElevationDeg: number;
}

/**
 * Coverage cone geometry and metrics
 */
export interface CoverageGeometry {
  /** Half-angle of the coverage cone seen from the satellite (degrees) */
  halfAngleDeg: number;
  /** Earth-central angle from nadir to footprint edge (degrees) */
  earthCentralAngleDeg: number;
  /** Radius of the ground footprint circle (km, arc length) */
  footprintRadiusKm: number;
  /** Surface area covered on Earth (km²) */
  surfaceAreaKm2: number;
  /** Slant range from satellite to edge of footprint (km) */
  slantRangeKm: number;
}

/**
 * Calculate satellite coverage geometry on a spherical Earth.
 *
 *   λ = acos(R·cos(ε) / (R+h)) − ε      (Earth-central angle)
 *   η = 90° − ε − λ                     (cone half-angle)
 *   footprint = R·λ, cap area = 2πR²(1 − cos λ)
 *   slant range = (R+h)·sin(λ) / cos(ε)
 */
export function calculateCoverageGeometry(params: CoverageParams): CoverageGeometry {
  const { altitudeKm, minElevationDeg } = params;
  const R = EARTH_RADIUS_KM;
  const r = orbitalRadiusKm(altitudeKm);
  const elevationRad = minElevationDeg * DEG_TO_RAD;

  const lambda = Math.acos((R * Math.cos(elevationRad)) / r) - elevationRad;
  const halfAngleRad = Math.PI / 2 - elevationRad - lambda;

  return {
    halfAngleDeg: halfAngleRad * RAD_TO_DEG,
    earthCentralAngleDeg: lambda * RAD_TO_DEG,
    footprintRadiusKm: R * lambda,
    surfaceAreaKm2: 2 * Math.PI * R * R * (1 - Math.cos(lambda)),
    slantRangeKm: (r * Math.sin(lambda)) / Math.cos(elevationRad),
  };
}

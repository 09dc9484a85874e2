/**
 * Crosslink visibility policies.
 *
 * The simulator asks a policy whether two satellites can see each other
 * instead of assuming it, so stricter geometry can be swapped in without
 * touching the simulation loop.
 */

import { DEG_TO_RAD } from "./constants";
import type { EciVector, SatelliteElement } from "./geometry";
import { lineOfSightClearsEarth } from "./geometry";

export interface SatelliteState {
  element: SatelliteElement;
  position: EciVector;
}

export type CrosslinkVisibilityPolicy =
  /** Visible whenever both satellites fly in the same orbital plane. */
  | { kind: "same-plane"; toleranceDeg: number }
  /** Visible when the line between them clears Earth plus a grazing layer. */
  | { kind: "earth-masked"; grazingAltitudeKm: number }
  /** Decided by the caller (e.g. a higher-fidelity model). */
  | {
      kind: "external";
      isVisible: (a: SatelliteState, b: SatelliteState, timeSeconds: number) => boolean;
    };

export const DEFAULT_CROSSLINK_VISIBILITY: CrosslinkVisibilityPolicy = {
  kind: "same-plane",
  toleranceDeg: 0.5,
};

function angleDifferenceDeg(a: number, b: number): number {
  const diff = Math.abs(a - b) % 360;
  return diff > 180 ? 360 - diff : diff;
}

/**
 * Two circular orbits are coplanar when their inclinations match and, unless
 * both are equatorial (RAAN undefined), their ascending nodes match too.
 * A retrograde equatorial orbit (i ≈ 180°) shares the plane of a prograde one.
 */
export function isSameOrbitalPlane(
  a: SatelliteElement,
  b: SatelliteElement,
  toleranceDeg: number,
): boolean {
  const aEquatorial = Math.abs(Math.sin(a.inclinationDeg * DEG_TO_RAD)) < Math.sin(toleranceDeg * DEG_TO_RAD);
  const bEquatorial = Math.abs(Math.sin(b.inclinationDeg * DEG_TO_RAD)) < Math.sin(toleranceDeg * DEG_TO_RAD);
  if (aEquatorial && bEquatorial) return true;

  return (
    Math.abs(a.inclinationDeg - b.inclinationDeg) <= toleranceDeg &&
    angleDifferenceDeg(a.raanDeg, b.raanDeg) <= toleranceDeg
  );
}

export function isCrosslinkVisible(
  policy: CrosslinkVisibilityPolicy,
  a: SatelliteState,
  b: SatelliteState,
  timeSeconds: number,
): boolean {
  switch (policy.kind) {
    case "same-plane":
      return isSameOrbitalPlane(a.element, b.element, policy.toleranceDeg);
    case "earth-masked":
      return lineOfSightClearsEarth(a.position, b.position, policy.grazingAltitudeKm);
    case "external":
      return policy.isVisible(a, b, timeSeconds);
  }
}

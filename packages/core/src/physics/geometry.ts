/**
 * Circular-orbit propagation & line-of-sight geometry.
 *
 * Satellites fly circular orbits around a spherical Earth; ground stations
 * sit fixed in the same inertial frame (Earth rotation is not modelled).
 * All positions are Earth-centred vectors in kilometers.
 */

import { ConfigurationError } from "../errors";
import { DEG_TO_RAD, EARTH_RADIUS_KM, GM_EARTH, RAD_TO_DEG } from "./constants";

// ─── Core Interfaces ────────────────────────────────────────────────────────

/** Earth-centred inertial vector (km). */
export interface EciVector {
  x: number;
  y: number;
  z: number;
}

/**
 * Orbital elements of one satellite on a circular orbit.
 *
 * The same shape is produced by the synthetic constellation builder and by
 * external element sources (TLE adapters), so the simulator never needs to
 * know where an orbit came from.
 */
export interface SatelliteElement {
  id: string;
  altitudeKm: number;
  inclinationDeg: number;
  raanDeg: number;
  /** Argument of latitude at t = 0. */
  initialPhaseDeg: number;
}

export interface GroundStation {
  id: string;
  name?: string;
  latitudeDeg: number;
  longitudeDeg: number;
  altitudeM: number;
  antennaGainDbi: number;
  /** Overrides the configured receiver noise temperature for this site. */
  systemTemperatureK?: number;
}

// ─── Kepler ─────────────────────────────────────────────────────────────────

function assertAltitude(altitudeKm: number): void {
  if (!Number.isFinite(altitudeKm) || altitudeKm <= 0) {
    throw new ConfigurationError(`Altitude must be positive, got ${altitudeKm} km`, [
      { path: "altitudeKm", message: "must be > 0" },
    ]);
  }
}

export function orbitalRadiusKm(altitudeKm: number): number {
  assertAltitude(altitudeKm);
  return EARTH_RADIUS_KM + altitudeKm;
}

/**
 * Orbital period from Kepler's third law:
 *   T = 2π · √(r³ / μ)
 */
export function orbitalPeriodSeconds(altitudeKm: number): number {
  const r = orbitalRadiusKm(altitudeKm);
  return 2 * Math.PI * Math.sqrt((r * r * r) / GM_EARTH);
}

export function angularVelocityRadPerSec(altitudeKm: number): number {
  return (2 * Math.PI) / orbitalPeriodSeconds(altitudeKm);
}

/** Circular orbital speed √(μ / r) in km/s. */
export function orbitalVelocityKmPerSec(altitudeKm: number): number {
  return Math.sqrt(GM_EARTH / orbitalRadiusKm(altitudeKm));
}

// ─── Positions ──────────────────────────────────────────────────────────────

/**
 * Position of a satellite `timeSeconds` after epoch.
 *
 * u = u₀ + ω·t, then the in-plane vector (r·cos u, r·sin u, 0) is rotated
 * by inclination about x and by RAAN about z.
 */
export function satellitePositionAt(element: SatelliteElement, timeSeconds: number): EciVector {
  const r = orbitalRadiusKm(element.altitudeKm);
  const u = element.initialPhaseDeg * DEG_TO_RAD + angularVelocityRadPerSec(element.altitudeKm) * timeSeconds;
  const inc = element.inclinationDeg * DEG_TO_RAD;
  const raan = element.raanDeg * DEG_TO_RAD;

  const cosU = Math.cos(u);
  const sinU = Math.sin(u);
  const cosRaan = Math.cos(raan);
  const sinRaan = Math.sin(raan);
  const cosInc = Math.cos(inc);

  return {
    x: r * (cosRaan * cosU - sinRaan * sinU * cosInc),
    y: r * (sinRaan * cosU + cosRaan * sinU * cosInc),
    z: r * sinU * Math.sin(inc),
  };
}

export function groundStationPosition(station: GroundStation): EciVector {
  const r = EARTH_RADIUS_KM + station.altitudeM / 1000;
  const lat = station.latitudeDeg * DEG_TO_RAD;
  const lon = station.longitudeDeg * DEG_TO_RAD;

  return {
    x: r * Math.cos(lat) * Math.cos(lon),
    y: r * Math.cos(lat) * Math.sin(lon),
    z: r * Math.sin(lat),
  };
}

// ─── Vector helpers ─────────────────────────────────────────────────────────

function subtract(a: EciVector, b: EciVector): EciVector {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

function dot(a: EciVector, b: EciVector): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

function norm(v: EciVector): number {
  return Math.sqrt(dot(v, v));
}

export function distanceKm(a: EciVector, b: EciVector): number {
  return norm(subtract(a, b));
}

// ─── Line of sight ──────────────────────────────────────────────────────────

/**
 * Elevation of a satellite above a station's local horizon (degrees).
 *
 *   sin(ε) = (s − g)·g / (|s − g| · |g|)
 */
export function elevationAngleDeg(stationPos: EciVector, satellitePos: EciVector): number {
  const toSatellite = subtract(satellitePos, stationPos);
  const range = norm(toSatellite);
  const sinElevation = dot(toSatellite, stationPos) / (range * norm(stationPos));
  return Math.asin(Math.max(-1, Math.min(1, sinElevation))) * RAD_TO_DEG;
}

/** Visible when elevation ≥ mask (the mask itself counts as visible). */
export function isAboveHorizon(
  stationPos: EciVector,
  satellitePos: EciVector,
  minElevationDeg: number = 0,
): boolean {
  return elevationAngleDeg(stationPos, satellitePos) >= minElevationDeg;
}

/**
 * True when the straight segment a→b stays above Earth's surface plus
 * `grazingAltitudeKm` (closest approach of the segment to Earth's centre).
 */
export function lineOfSightClearsEarth(
  a: EciVector,
  b: EciVector,
  grazingAltitudeKm: number = 0,
): boolean {
  const ab = subtract(b, a);
  const lengthSq = dot(ab, ab);
  const t = lengthSq === 0 ? 0 : Math.max(0, Math.min(1, -dot(a, ab) / lengthSq));
  const closest = { x: a.x + ab.x * t, y: a.y + ab.y * t, z: a.z + ab.z * t };
  return norm(closest) > EARTH_RADIUS_KM + grazingAltitudeKm;
}

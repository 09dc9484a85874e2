/**
 * Physical & orbital constants used across the geometry, link-budget,
 * latency, and debris calculations.
 */

/** Mean radius of Earth in kilometers (spherical model). */
export const EARTH_RADIUS_KM = 6371;

/** Degrees → radians. */
export const DEG_TO_RAD = Math.PI / 180;

/** Radians → degrees. */
export const RAD_TO_DEG = 180 / Math.PI;

/** Standard gravitational parameter of Earth (km³/s²). */
export const GM_EARTH = 398600.4418;

/** Speed of light in vacuum (m/s). */
export const SPEED_OF_LIGHT_M_S = 299_792_458;

/** Boltzmann constant (J/K). */
export const BOLTZMANN_J_PER_K = 1.380649e-23;

/** Standard gravity (m/s²), used by the rocket equation. */
export const STANDARD_GRAVITY_M_S2 = 9.80665;

/** Julian year in seconds. */
export const SECONDS_PER_YEAR = 365.25 * 24 * 3600;

/** LEO orbit boundary altitude in km. */
export const LEO_MAX_ALT_KM = 2000;

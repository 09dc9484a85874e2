/**
 * @crosslink/elements — orbital elements from TLE sets.
 *
 * Converts catalogue TLEs into the core's SatelliteElement records so real
 * constellations can be fed to the simulator through `constellation.elements`.
 */

export { parseTleText, elementFromTle, elementsFromTle } from './tle'
export type { TleRecord, TleConversion } from './tle'

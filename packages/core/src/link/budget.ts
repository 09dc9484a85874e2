/**
 * Link Budget — Friis transmission in log form.
 *
 *   Pr = Pt + Gt + Gr − Lp − Latm − Lsys        (dBW)
 *   Lp = 20·log10(4π·d / λ),  λ = c / f
 *   SNR = Pr − 10·log10(k·T·B)
 *
 * Atmospheric loss is a clear-sky constant: precipitation fade is not
 * modelled. Pure: no state, no side effects.
 */

import { ConfigurationError } from "../errors";
import { BOLTZMANN_J_PER_K, SPEED_OF_LIGHT_M_S } from "../physics/constants";

export interface LinkBudgetConfig {
  /** Clear-sky atmospheric loss (dB). */
  atmosphericLossDb: number;
  /** Pointing, polarization and implementation margin (dB). */
  systemLossDb: number;
  noiseTemperatureK: number;
  bandwidthHz: number;
  /** Minimum SNR for a usable digital link (dB). */
  snrThresholdDb: number;
}

export const DEFAULT_LINK_BUDGET_CONFIG: LinkBudgetConfig = {
  atmosphericLossDb: 2,
  systemLossDb: 3,
  noiseTemperatureK: 290,
  bandwidthHz: 1e6,
  snrThresholdDb: 10,
};

export interface LinkParameters {
  transmitPowerDbw: number;
  transmitGainDbi: number;
  receiveGainDbi: number;
  frequencyGhz: number;
  distanceKm: number;
  /** Receiver-specific noise temperature; defaults to the config value. */
  noiseTemperatureK?: number;
}

export interface LinkBudget {
  distanceKm: number;
  wavelengthM: number;
  pathLossDb: number;
  receivedPowerDbw: number;
  noisePowerDbw: number;
  snrDb: number;
  /** SNR above the feasibility threshold (negative when infeasible). */
  linkMarginDb: number;
  feasible: boolean;
}

export function wavelengthM(frequencyGhz: number): number {
  if (!Number.isFinite(frequencyGhz) || frequencyGhz <= 0) {
    throw new ConfigurationError(`Frequency must be positive, got ${frequencyGhz} GHz`, [
      { path: "frequencyGhz", message: "must be > 0" },
    ]);
  }
  return SPEED_OF_LIGHT_M_S / (frequencyGhz * 1e9);
}

export function freeSpacePathLossDb(distanceKm: number, frequencyGhz: number): number {
  if (!Number.isFinite(distanceKm) || distanceKm <= 0) {
    throw new ConfigurationError(`Distance must be positive, got ${distanceKm} km`, [
      { path: "distanceKm", message: "must be > 0" },
    ]);
  }
  return 20 * Math.log10((4 * Math.PI * distanceKm * 1000) / wavelengthM(frequencyGhz));
}

export function noisePowerDbw(noiseTemperatureK: number, bandwidthHz: number): number {
  return 10 * Math.log10(BOLTZMANN_J_PER_K * noiseTemperatureK * bandwidthHz);
}

export function isLinkFeasible(snrDb: number, snrThresholdDb: number): boolean {
  return snrDb >= snrThresholdDb;
}

export function evaluateLinkBudget(
  params: LinkParameters,
  config: LinkBudgetConfig = DEFAULT_LINK_BUDGET_CONFIG,
): LinkBudget {
  const pathLossDb = freeSpacePathLossDb(params.distanceKm, params.frequencyGhz);

  const receivedPowerDbw =
    params.transmitPowerDbw +
    params.transmitGainDbi +
    params.receiveGainDbi -
    pathLossDb -
    config.atmosphericLossDb -
    config.systemLossDb;

  const noise = noisePowerDbw(params.noiseTemperatureK ?? config.noiseTemperatureK, config.bandwidthHz);
  const snrDb = receivedPowerDbw - noise;

  return {
    distanceKm: params.distanceKm,
    wavelengthM: wavelengthM(params.frequencyGhz),
    pathLossDb,
    receivedPowerDbw,
    noisePowerDbw: noise,
    snrDb,
    linkMarginDb: snrDb - config.snrThresholdDb,
    feasible: isLinkFeasible(snrDb, config.snrThresholdDb),
  };
}

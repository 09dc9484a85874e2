import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors";
import {
  DEFAULT_LINK_BUDGET_CONFIG,
  evaluateLinkBudget,
  freeSpacePathLossDb,
  isLinkFeasible,
  noisePowerDbw,
  wavelengthM,
} from "../link/budget";
import { estimateLatency, propagationDelayMs } from "../link/latency";

const isl = {
  transmitPowerDbw: 20,
  transmitGainDbi: 20,
  receiveGainDbi: 20,
  frequencyGhz: 2.4,
  distanceKm: 6871,
};

describe("free-space path loss", () => {
  it("grows by 20·log10(2) dB when distance doubles", () => {
    const delta = freeSpacePathLossDb(2000, 2.4) - freeSpacePathLossDb(1000, 2.4);
    expect(delta).toBeCloseTo(6.0206, 4);
  });

  it("is about 160 dB over 1000 km at 2.4 GHz", () => {
    expect(freeSpacePathLossDb(1000, 2.4)).toBeCloseTo(160.05, 1);
  });

  it("rejects non-positive distance and frequency", () => {
    expect(() => freeSpacePathLossDb(0, 2.4)).toThrow(ConfigurationError);
    expect(() => wavelengthM(0)).toThrow(ConfigurationError);
    expect(() => wavelengthM(-1)).toThrow("Frequency must be positive, got -1 GHz");
  });
});

describe("evaluateLinkBudget", () => {
  it("sums gains and losses in dB", () => {
    const budget = evaluateLinkBudget(isl);
    expect(budget.receivedPowerDbw).toBeCloseTo(60 - budget.pathLossDb - 2 - 3, 10);
    expect(budget.noisePowerDbw).toBeCloseTo(-143.975, 3);
    expect(budget.snrDb).toBeCloseTo(budget.receivedPowerDbw - budget.noisePowerDbw, 10);
    expect(budget.linkMarginDb).toBeCloseTo(budget.snrDb - 10, 10);
  });

  it("closes a 6871 km crosslink at about 22 dB", () => {
    const budget = evaluateLinkBudget(isl);
    expect(budget.snrDb).toBeCloseTo(22.18, 1);
    expect(budget.feasible).toBe(true);
  });

  it("uses a receiver-specific noise temperature when given", () => {
    const nominal = evaluateLinkBudget(isl);
    const hot = evaluateLinkBudget({ ...isl, noiseTemperatureK: 580 });
    expect(nominal.snrDb - hot.snrDb).toBeCloseTo(10 * Math.log10(2), 10);
  });

  it("follows the configured losses and threshold", () => {
    const strict = evaluateLinkBudget(isl, { ...DEFAULT_LINK_BUDGET_CONFIG, snrThresholdDb: 30 });
    expect(strict.feasible).toBe(false);
    const lossy = evaluateLinkBudget(isl, { ...DEFAULT_LINK_BUDGET_CONFIG, atmosphericLossDb: 12 });
    expect(evaluateLinkBudget(isl).snrDb - lossy.snrDb).toBeCloseTo(10, 10);
  });

  it("counts the threshold itself as feasible", () => {
    expect(isLinkFeasible(10, 10)).toBe(true);
    expect(isLinkFeasible(9.999, 10)).toBe(false);
  });

  it("computes kTB noise", () => {
    expect(noisePowerDbw(290, 1e6)).toBeCloseTo(-143.975, 3);
  });
});

describe("latency", () => {
  it("takes one second per light-second", () => {
    expect(propagationDelayMs(299_792.458)).toBeCloseTo(1000, 9);
  });

  it("adds the per-path processing delay", () => {
    const crosslink = estimateLatency("crosslink", [6871]);
    expect(crosslink.processingMs).toBe(5);
    expect(crosslink.totalMs).toBeCloseTo((6871 / 299_792.458) * 1000 + 5, 9);

    const relay = estimateLatency("ground-relay", [500, 1500]);
    expect(relay.processingMs).toBe(50);
    expect(relay.propagationMs).toBeCloseTo((2000 / 299_792.458) * 1000, 9);
  });

  it("honours configured processing delays", () => {
    const estimate = estimateLatency("ground-relay", [0], { groundRelayProcessingMs: 80, crosslinkProcessingMs: 1 });
    expect(estimate.totalMs).toBe(80);
  });

  it("rejects empty paths and negative legs", () => {
    expect(() => estimateLatency("crosslink", [])).toThrow(ConfigurationError);
    expect(() => estimateLatency("crosslink", [100, -1])).toThrow("Leg distance must be non-negative, got -1 km");
  });
});

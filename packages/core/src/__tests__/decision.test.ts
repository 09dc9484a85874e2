import { describe, expect, it } from "vitest";
import { resolveEngineConfig } from "../config";
import { computeCostComparison, DEFAULT_UNIT_COSTS } from "../cost/comparator";
import { computeDebrisAssessment, DEFAULT_DEBRIS_CONFIG } from "../debris/risk";
import type { DecisionInputs } from "../decision/synthesizer";
import { synthesizeDecision } from "../decision/synthesizer";
import type { Metric } from "../errors";
import { definedMetric, undefinedMetric } from "../errors";
import { calculateCoverageGeometry } from "../physics/coverage";
import type { Architecture, SimulationRun } from "../simulation/types";

function run(
  architecture: Architecture,
  satelliteCount: number,
  coveragePercent: number,
  averageLatencyMs: Metric,
): SimulationRun {
  return {
    architecture,
    satelliteCount,
    groundStationCount: architecture === "ground-only" ? 5 : 2,
    timeSteps: 100,
    completedSteps: 100,
    cancelled: false,
    orbitPeriodMinutes: 90,
    stepSeconds: 54,
    totalSamples: satelliteCount * 100,
    feasibleSamples: Math.round((satelliteCount * 100 * coveragePercent) / 100),
    coveragePercent,
    averageSnrDb: averageLatencyMs.defined ? definedMetric(25) : undefinedMetric("NO_FEASIBLE_SAMPLES"),
    averageLatencyMs,
    downtimeMinutes: 0,
    uptimePercent: 100,
    gatewayOutageMinutes: 0,
    linkKindCounts: { ground: 0, crosslink: 0, unlinked: 0 },
    footprint: calculateCoverageGeometry({ altitudeKm: 500, minElevationDeg: 0 }),
    steps: [],
    assumptions: [],
  };
}

function inputs(
  satelliteCount: number,
  stations: [number, number],
  go: { coverage: number; latency: Metric },
  cl: { coverage: number; latency: Metric },
  unitCosts = DEFAULT_UNIT_COSTS,
): DecisionInputs {
  return {
    groundOnly: run("ground-only", satelliteCount, go.coverage, go.latency),
    crosslinked: run("crosslinked", satelliteCount, cl.coverage, cl.latency),
    costs: computeCostComparison({
      satelliteCount,
      groundStationsGroundOnly: stations[0],
      groundStationsCrosslinked: stations[1],
      unitCosts,
      missionYears: 10,
    }),
    debris: computeDebrisAssessment({ altitudeKm: 500, satelliteCount, missionYears: 5, hasActiveDeorbit: true }),
  };
}

const strongCrosslink = {
  go: { coverage: 50, latency: definedMetric(60) },
  cl: { coverage: 90, latency: definedMetric(10) },
};

describe("synthesizeDecision", () => {
  it("withholds a verdict below the tipping point despite better performance", () => {
    const result = synthesizeDecision(inputs(6, [5, 2], strongCrosslink.go, strongCrosslink.cl));
    expect(result.success).toBe(true);
    if (!result.success) return;
    const rec = result.data;

    // tipping point 2 to ground-only; latency 2 + coverage 2 − complexity 1 to crosslinked
    expect(rec.scores).toEqual({ groundOnly: 2, crosslinked: 3, margin: 1 });
    expect(rec.verdict).toBe("inconclusive");
    expect(rec.confidence).toBe("low");
    expect(rec.summary).toBe("inconclusive — further analysis required");
    expect(rec.factors.find((f) => f.factor === "cost")).toEqual({
      factor: "cost",
      architecture: null,
      points: 0,
      detail: "32.4% CapEx savings not credited below the tipping point",
    });
    expect(rec.latencyImprovementPercent).toBeCloseTo(83.333, 3);
    expect(rec.coverageImprovementPoints).toBe(40);
    expect(rec.roi?.totalValue).toBe(19_000_000);
  });

  it("never reports crosslinked with high confidence below the tipping point", () => {
    const config = resolveEngineConfig({ decision: { tieBand: 0, highConfidenceMargin: 1 } });
    if (!config.success) throw config.error;

    for (const satelliteCount of [2, 6, 10, 20, 29]) {
      const result = synthesizeDecision(
        inputs(satelliteCount, [5, 2], strongCrosslink.go, strongCrosslink.cl),
        { config: config.data },
      );
      if (!result.success) throw result.error;
      const { verdict, confidence } = result.data;
      expect(verdict === "crosslinked" && confidence === "high").toBe(false);
    }

    // 10 satellites: 2 + 2 + 1 − 1 = 4 against 2, a crosslinked win capped at moderate
    const capped = synthesizeDecision(inputs(10, [5, 2], strongCrosslink.go, strongCrosslink.cl), {
      config: config.data,
    });
    expect(capped.success && [capped.data.verdict, capped.data.confidence]).toEqual(["crosslinked", "moderate"]);
  });

  it("recommends crosslinks with high confidence well above the tipping point", () => {
    const result = synthesizeDecision(inputs(40, [5, 2], strongCrosslink.go, strongCrosslink.cl));
    expect(result.success).toBe(true);
    if (!result.success) return;
    // tipping 3 + latency 2 + coverage 2 + size 1 − 1 against negative savings 2
    expect(result.data.scores).toEqual({ groundOnly: 2, crosslinked: 7, margin: 5 });
    expect(result.data.verdict).toBe("crosslinked");
    expect(result.data.confidence).toBe("high");
    expect(result.data.summary).toBe("crosslinked recommended with high confidence");
  });

  it("recommends ground-only for a small fleet with little to gain", () => {
    const result = synthesizeDecision(
      inputs(3, [3, 2], { coverage: 60, latency: definedMetric(60) }, { coverage: 55, latency: definedMetric(55) }),
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    // tipping 2 + latency 1 + coverage 1 + size 1 against −1
    expect(result.data.scores).toEqual({ groundOnly: 5, crosslinked: -1, margin: -6 });
    expect(result.data.verdict).toBe("ground-only");
    expect(result.data.confidence).toBe("high");
  });

  it("is inconclusive when an upstream metric is undefined", () => {
    const result = synthesizeDecision(
      inputs(6, [5, 2], { coverage: 0, latency: undefinedMetric("NO_FEASIBLE_SAMPLES") }, strongCrosslink.cl),
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.verdict).toBe("inconclusive");
    expect(result.data.confidence).toBe("low");
    expect(result.data.scores).toBeNull();
    expect(result.data.undefinedInputs).toEqual([
      "groundOnly.averageLatencyMs (NO_FEASIBLE_SAMPLES)",
      "groundOnly.averageSnrDb (NO_FEASIBLE_SAMPLES)",
    ]);
  });

  it("is inconclusive when no ground stations are saved", () => {
    const result = synthesizeDecision(inputs(6, [2, 2], strongCrosslink.go, strongCrosslink.cl));
    expect(result.success && result.data.undefinedInputs).toEqual([
      "costs.tippingPoint (NO_GROUND_STATIONS_SAVED)",
      "costs.paybackYears (NO_OPEX_SAVINGS)",
    ]);
  });

  it("is inconclusive when the payback period is undefined", () => {
    const result = synthesizeDecision(
      inputs(40, [5, 4], strongCrosslink.go, strongCrosslink.cl, {
        ...DEFAULT_UNIT_COSTS,
        groundStationAnnualOpex: 0,
      }),
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.verdict).toBe("inconclusive");
    expect(result.data.confidence).toBe("low");
    expect(result.data.scores).toBeNull();
    expect(result.data.undefinedInputs).toEqual(["costs.paybackYears (NO_OPEX_SAVINGS)"]);
  });

  it("is inconclusive when the deorbit budget overflows", () => {
    const base = inputs(40, [5, 2], strongCrosslink.go, strongCrosslink.cl);
    const debris = computeDebrisAssessment(
      { altitudeKm: 500, satelliteCount: 40, missionYears: 5, hasActiveDeorbit: true },
      { ...DEFAULT_DEBRIS_CONFIG, deorbit: { ...DEFAULT_DEBRIS_CONFIG.deorbit, specificImpulseS: 0.001 } },
    );
    const result = synthesizeDecision({ ...base, debris });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.verdict).toBe("inconclusive");
    expect(result.data.scores).toBeNull();
    expect(result.data.undefinedInputs).toEqual([
      "debris.deorbit.propellantMassKg (NUMERIC_OVERFLOW)",
      "debris.deorbit.propulsionSystemMassKg (NUMERIC_OVERFLOW)",
      "debris.deorbit.totalMassPenaltyKg (NUMERIC_OVERFLOW)",
    ]);
  });

  it("adds the debris assessment to the rationale", () => {
    const result = synthesizeDecision(inputs(6, [5, 2], strongCrosslink.go, strongCrosslink.cl));
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.rationale).toContain(
      "Natural decay of 15 years exceeds the 5-year FCC rule; active deorbit is required and fitted.",
    );
  });

  it("rejects swapped architectures", () => {
    const base = inputs(6, [5, 2], strongCrosslink.go, strongCrosslink.cl);
    const result = synthesizeDecision({ ...base, groundOnly: base.crosslinked, crosslinked: base.groundOnly });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe("CONFIGURATION_ERROR");
    expect(result.error.issues.map((i) => i.path)).toEqual(["groundOnly.architecture", "crosslinked.architecture"]);
  });

  it("rejects a ground-only run of a different size", () => {
    const base = inputs(6, [5, 2], strongCrosslink.go, strongCrosslink.cl);
    const result = synthesizeDecision({ ...base, groundOnly: run("ground-only", 8, 50, definedMetric(60)) });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues).toEqual([
      { path: "costs.satelliteCount", message: "cost comparison covers 6 satellites, ground-only run has 8" },
    ]);
  });
});

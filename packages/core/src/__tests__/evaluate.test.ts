import { describe, expect, it } from "vitest";
import { evaluateArchitectures } from "../evaluate";
import type { Scenario } from "../schemas";

const ring = { satelliteCount: 6, altitudeKm: 500 };

function scenario(overrides: Partial<Scenario> = {}): Scenario {
  return {
    constellation: ring,
    groundStationsGroundOnly: [
      { id: "EQ-0", latitudeDeg: 0, longitudeDeg: 0 },
      { id: "EQ-180", latitudeDeg: 0, longitudeDeg: 180 },
    ],
    groundStationsCrosslinked: [{ id: "EQ-0", latitudeDeg: 0, longitudeDeg: 0 }],
    timeSteps: 100,
    orbitPeriodMinutes: 90,
    ...overrides,
  };
}

describe("evaluateArchitectures", () => {
  it("runs both architectures and scores them", () => {
    const result = evaluateArchitectures(scenario());
    expect(result.success).toBe(true);
    if (!result.success) return;
    const { groundOnly, crosslinked, costs, recommendation } = result.data;

    expect(groundOnly.architecture).toBe("ground-only");
    expect(groundOnly.groundStationCount).toBe(2);
    expect(groundOnly.coveragePercent).toBeGreaterThan(0);
    expect(groundOnly.coveragePercent).toBeLessThan(100);
    expect(crosslinked.groundStationCount).toBe(1);
    expect(crosslinked.coveragePercent).toBe(100);

    expect(costs.groundStationsSaved).toBe(1);
    expect(recommendation.scores).not.toBeNull();
    expect(recommendation.coverageImprovementPoints).toBe(100 - groundOnly.coveragePercent);
    expect(recommendation.factors.slice(0, 2)).toEqual([
      {
        factor: "tipping-point",
        architecture: "ground-only",
        points: 2,
        detail: "6 satellites is below the tipping point of 10",
      },
      {
        factor: "cost",
        architecture: null,
        points: 0,
        detail: "9.1% CapEx savings not credited below the tipping point",
      },
    ]);
    expect(recommendation.verdict === "crosslinked" && recommendation.confidence === "high").toBe(false);
  });

  it("favours crosslinks on performance but not with high confidence for six satellites", () => {
    const stations = [
      { id: "SIN", latitudeDeg: 1.35, longitudeDeg: 103.82 },
      { id: "NBO", latitudeDeg: -1.29, longitudeDeg: 36.82 },
      { id: "UIO", latitudeDeg: -0.18, longitudeDeg: -78.47 },
      { id: "LBV", latitudeDeg: 0.39, longitudeDeg: 9.45 },
      { id: "DRW", latitudeDeg: -12.46, longitudeDeg: 130.84 },
    ];
    const result = evaluateArchitectures(
      scenario({
        constellation: { ...ring, transmitPowerDbw: 20, antennaGainDbi: 20, frequencyGhz: 2.4 },
        groundStationsGroundOnly: stations,
        groundStationsCrosslinked: stations.slice(0, 2),
      }),
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    const { groundOnly, crosslinked, costs, recommendation } = result.data;

    expect(crosslinked.coveragePercent).toBeGreaterThanOrEqual(groundOnly.coveragePercent);
    expect(crosslinked.averageLatencyMs.defined).toBe(true);
    expect(groundOnly.averageLatencyMs.defined).toBe(true);
    if (crosslinked.averageLatencyMs.defined && groundOnly.averageLatencyMs.defined) {
      expect(crosslinked.averageLatencyMs.value).toBeLessThan(groundOnly.averageLatencyMs.value);
    }
    expect(costs.tippingPoint).toEqual({ defined: true, value: 30 });
    expect(recommendation.verdict === "crosslinked" && recommendation.confidence === "high").toBe(false);
  });

  it("keeps separate cost and debris horizons unless one is given", () => {
    const defaults = evaluateArchitectures(scenario());
    expect(defaults.success && [defaults.data.costs.missionYears, defaults.data.debris.missionYears]).toEqual([10, 5]);

    const shared = evaluateArchitectures(scenario({ missionYears: 7 }));
    expect(shared.success && [shared.data.costs.missionYears, shared.data.debris.missionYears]).toEqual([7, 7]);
  });

  it("is inconclusive when ground-only never reaches a station", () => {
    const result = evaluateArchitectures(
      scenario({
        groundStationsGroundOnly: [
          { id: "NORTH", latitudeDeg: 60, longitudeDeg: 0 },
          { id: "SOUTH", latitudeDeg: -60, longitudeDeg: 0 },
        ],
        groundStationsCrosslinked: [{ id: "NORTH", latitudeDeg: 60, longitudeDeg: 0 }],
      }),
    );
    expect(result.success).toBe(true);
    if (!result.success) return;
    const { groundOnly, crosslinked, recommendation } = result.data;

    expect(groundOnly.coveragePercent).toBe(0);
    expect(crosslinked.coveragePercent).toBe(100);
    expect(recommendation.verdict).toBe("inconclusive");
    expect(recommendation.confidence).toBe("low");
    expect(recommendation.scores).toBeNull();
    expect(recommendation.undefinedInputs).toEqual([
      "groundOnly.averageLatencyMs (NO_FEASIBLE_SAMPLES)",
      "groundOnly.averageSnrDb (NO_FEASIBLE_SAMPLES)",
    ]);
    expect(recommendation.rationale[recommendation.rationale.length - 1]).toBe(
      "Natural decay of 15 years exceeds the 5-year FCC rule; active deorbit is required and fitted.",
    );
  });

  it("stops both runs when aborted", () => {
    const controller = new AbortController();
    controller.abort();
    const result = evaluateArchitectures(scenario(), { signal: controller.signal });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.groundOnly.cancelled).toBe(true);
    expect(result.data.crosslinked.completedSteps).toBe(0);
    expect(result.data.recommendation.verdict).toBe("inconclusive");
  });

  it("rejects an invalid scenario", () => {
    const result = evaluateArchitectures(scenario({ constellation: { satelliteCount: 6, altitudeKm: 2500 } }));
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      "Invalid scenario: constellation.altitudeKm: altitude must not exceed 2000 km (LEO)",
    );
  });
});

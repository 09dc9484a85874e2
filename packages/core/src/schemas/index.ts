/**
 * Zod runtime validation schemas for the engine's public inputs.
 *
 * These schemas validate external input at system boundaries; anything that
 * fails them is reported as a ConfigurationError before any work starts.
 */

import { z } from "zod";
import type { EngineConfig } from "../config";
import { LEO_MAX_ALT_KM } from "../physics/constants";

// ─── Enum Schemas ───────────────────────────────────────────────────────────

export const ArchitectureSchema = z.enum(["ground-only", "crosslinked"]);

export const GroundStationSelectionSchema = z.enum(["highest-snr", "nearest", "load-balance"]);

/** zod accepts ±Infinity by default; every numeric input must be finite. */
const FiniteNumberSchema = z.number().finite();

// ─── Orbital Schemas ────────────────────────────────────────────────────────

const AltitudeKmSchema = z
  .number()
  .positive("altitude must be positive")
  .max(LEO_MAX_ALT_KM, `altitude must not exceed ${LEO_MAX_ALT_KM} km (LEO)`);

export const SatelliteElementSchema = z.object({
  id: z.string().min(1),
  altitudeKm: AltitudeKmSchema,
  inclinationDeg: FiniteNumberSchema.min(0).max(180),
  raanDeg: FiniteNumberSchema,
  initialPhaseDeg: FiniteNumberSchema,
});

export const ConstellationConfigSchema = z
  .object({
    satelliteCount: FiniteNumberSchema.int().positive(),
    altitudeKm: AltitudeKmSchema,
    inclinationDeg: FiniteNumberSchema.min(0).max(180).optional().default(0),
    raanDeg: FiniteNumberSchema.optional().default(0),
    phaseOffsetDeg: FiniteNumberSchema.optional().default(0),
    transmitPowerDbw: FiniteNumberSchema.optional().default(20),
    antennaGainDbi: FiniteNumberSchema.optional().default(20),
    frequencyGhz: FiniteNumberSchema.positive("frequency must be positive").optional().default(2.4),
    /** Externally supplied orbits; replaces the synthetic evenly-phased ring. */
    elements: z.array(SatelliteElementSchema).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.elements && config.elements.length !== config.satelliteCount) {
      ctx.addIssue({
        code: "custom",
        path: ["elements"],
        message: `expected ${config.satelliteCount} elements, got ${config.elements.length}`,
      });
    }
    if (config.elements) {
      const ids = new Set(config.elements.map((e) => e.id));
      if (ids.size !== config.elements.length) {
        ctx.addIssue({ code: "custom", path: ["elements"], message: "satellite ids must be unique" });
      }
    }
  });

export type ConstellationConfig = z.input<typeof ConstellationConfigSchema>;
export type ParsedConstellationConfig = z.infer<typeof ConstellationConfigSchema>;

export const GroundStationSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  latitudeDeg: FiniteNumberSchema.min(-90).max(90),
  longitudeDeg: FiniteNumberSchema.min(-180).max(180),
  altitudeM: FiniteNumberSchema.optional().default(0),
  antennaGainDbi: FiniteNumberSchema.optional().default(30),
  systemTemperatureK: FiniteNumberSchema.positive().optional(),
});

export type GroundStationInput = z.input<typeof GroundStationSchema>;

const GroundStationSetSchema = z
  .array(GroundStationSchema)
  .min(1, "at least one ground station is required")
  .refine((stations) => new Set(stations.map((s) => s.id)).size === stations.length, {
    message: "ground station ids must be unique",
  });

// ─── Simulation Schemas ─────────────────────────────────────────────────────

export const SimulationRequestSchema = z.object({
  constellation: ConstellationConfigSchema,
  groundStations: GroundStationSetSchema,
  architecture: ArchitectureSchema,
  timeSteps: FiniteNumberSchema.int().positive(),
  orbitPeriodMinutes: FiniteNumberSchema.positive(),
});

export type SimulationRequest = z.input<typeof SimulationRequestSchema>;

// ─── Cost Schemas ───────────────────────────────────────────────────────────

export const UnitCostsSchema = z.object({
  groundStationUnitCost: FiniteNumberSchema.nonnegative(),
  satelliteUnitCost: FiniteNumberSchema.nonnegative(),
  islUnitCost: FiniteNumberSchema.nonnegative(),
  groundStationAnnualOpex: FiniteNumberSchema.nonnegative(),
});

export const CostRequestSchema = z.object({
  satelliteCount: FiniteNumberSchema.int().positive(),
  groundStationsGroundOnly: FiniteNumberSchema.int().positive(),
  groundStationsCrosslinked: FiniteNumberSchema.int().positive(),
  unitCosts: UnitCostsSchema.partial().optional(),
  missionYears: FiniteNumberSchema.positive().optional(),
});

export type CostRequest = z.input<typeof CostRequestSchema>;

// ─── Debris Schemas ─────────────────────────────────────────────────────────

export const DebrisRequestSchema = z.object({
  altitudeKm: AltitudeKmSchema,
  satelliteCount: FiniteNumberSchema.int().positive(),
  missionYears: FiniteNumberSchema.positive().optional().default(5),
  hasActiveDeorbit: z.boolean().optional().default(true),
});

export type DebrisRequest = z.input<typeof DebrisRequestSchema>;

export const DisposalRuleSchema = z.object({
  id: z.string().min(1),
  authority: z.string().min(1),
  maxDisposalYears: FiniteNumberSchema.positive(),
  asOf: z.string().min(1),
});

// ─── Scenario Schema ────────────────────────────────────────────────────────

export const ScenarioSchema = z.object({
  constellation: ConstellationConfigSchema,
  groundStationsGroundOnly: GroundStationSetSchema,
  groundStationsCrosslinked: GroundStationSetSchema,
  timeSteps: FiniteNumberSchema.int().positive(),
  orbitPeriodMinutes: FiniteNumberSchema.positive(),
  /** Applies to both the cost and debris horizons when given. */
  missionYears: FiniteNumberSchema.positive().optional(),
  hasActiveDeorbit: z.boolean().optional().default(true),
  unitCosts: UnitCostsSchema.partial().optional(),
});

export type Scenario = z.input<typeof ScenarioSchema>;

// ─── Engine Configuration Schema ────────────────────────────────────────────

const AltitudeBandSchema = z.object({
  belowAltitudeKm: FiniteNumberSchema.positive(),
  value: FiniteNumberSchema.nonnegative(),
});

const AscendingBandsSchema = z
  .array(AltitudeBandSchema)
  .refine(
    (bands) => bands.every((b, i) => i === 0 || b.belowAltitudeKm > bands[i - 1].belowAltitudeKm),
    { message: "altitude bands must be in ascending order" },
  );

export const EngineConfigSchema = z.object({
  geometry: z.object({
    minElevationDeg: FiniteNumberSchema.min(0).lt(90),
  }),
  link: z.object({
    atmosphericLossDb: FiniteNumberSchema.nonnegative(),
    systemLossDb: FiniteNumberSchema.nonnegative(),
    noiseTemperatureK: FiniteNumberSchema.positive(),
    bandwidthHz: FiniteNumberSchema.positive(),
    snrThresholdDb: FiniteNumberSchema,
  }),
  latency: z.object({
    groundRelayProcessingMs: FiniteNumberSchema.nonnegative(),
    crosslinkProcessingMs: FiniteNumberSchema.nonnegative(),
  }),
  simulation: z.object({
    groundStationSelection: GroundStationSelectionSchema,
    stepChunkSize: FiniteNumberSchema.int().positive(),
  }),
  costs: z.object({
    unitCosts: UnitCostsSchema,
    missionYears: FiniteNumberSchema.positive(),
    roi: z.object({
      valuePerLatencyMs: FiniteNumberSchema.nonnegative(),
      valuePerCoveragePoint: FiniteNumberSchema.nonnegative(),
    }),
  }),
  debris: z.object({
    disposalRule: DisposalRuleSchema,
    densityBands: AscendingBandsSchema,
    densityAboveBandsPerKm3: FiniteNumberSchema.nonnegative(),
    crossSectionM2: FiniteNumberSchema.positive(),
    riskThresholds: z
      .object({
        moderate: FiniteNumberSchema.min(0).max(1),
        high: FiniteNumberSchema.min(0).max(1),
        critical: FiniteNumberSchema.min(0).max(1),
      })
      .refine((t) => t.moderate < t.high && t.high < t.critical, {
        message: "risk thresholds must increase from moderate to critical",
      }),
    decayBands: AscendingBandsSchema.refine(
      (bands) => bands.every((b, i) => i === 0 || b.value >= bands[i - 1].value),
      { message: "decay time must not decrease with altitude" },
    ),
    highAltitudeDecay: z.object({
      baseYears: FiniteNumberSchema.nonnegative(),
      fromAltitudeKm: FiniteNumberSchema.positive(),
      yearsPerKm: FiniteNumberSchema.nonnegative(),
    }),
    deorbit: z.object({
      targetPerigeeKm: FiniteNumberSchema.positive(),
      baseDeltaVMs: FiniteNumberSchema.nonnegative(),
      deltaVPerKmMs: FiniteNumberSchema.nonnegative(),
      specificImpulseS: FiniteNumberSchema.positive(),
      dryMassKg: FiniteNumberSchema.positive(),
      propulsionMassFraction: FiniteNumberSchema.nonnegative(),
    }),
    mitigation: z.object({
      collisionAvoidancePerSatAnnual: FiniteNumberSchema.nonnegative(),
      deorbitHardwarePerSat: FiniteNumberSchema.nonnegative(),
      insuranceBaseRate: FiniteNumberSchema.nonnegative(),
      satelliteValue: FiniteNumberSchema.nonnegative(),
      trackingAnnualBase: FiniteNumberSchema.nonnegative(),
    }),
  }),
  decision: z.object({
    tieBand: FiniteNumberSchema.nonnegative(),
    highConfidenceMargin: FiniteNumberSchema.positive(),
    tippingPointComfortMargin: FiniteNumberSchema.int().nonnegative(),
    crosslinkComplexityPenalty: FiniteNumberSchema.nonnegative(),
  }),
}) satisfies z.ZodType<EngineConfig>;

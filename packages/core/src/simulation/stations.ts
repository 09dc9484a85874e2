import { z } from "zod";
import presets from "../data/ground-stations.json";
import type { GroundStation } from "../physics/geometry";
import { GroundStationSchema } from "../schemas";

export type GroundStationPresetName = "default" | "nasa-nen" | "nasa-dsn";

const PresetFileSchema = z.object({
  default: z.array(GroundStationSchema),
  "nasa-nen": z.array(GroundStationSchema),
  "nasa-dsn": z.array(GroundStationSchema),
});

/** Named station networks bundled with the engine (read-only). */
export const GROUND_STATION_PRESETS: Readonly<Record<GroundStationPresetName, readonly GroundStation[]>> =
  PresetFileSchema.parse(presets);

/** Returns a fresh copy so callers may edit the list for a scenario. */
export function getGroundStationPreset(name: GroundStationPresetName): GroundStation[] {
  return GROUND_STATION_PRESETS[name].map((station) => ({ ...station }));
}

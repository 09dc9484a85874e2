import type { EngineConfig } from "../config";
import { configOrDefault } from "../config";
import type { EngineResult } from "../errors";
import { ConfigurationError, fail, ok } from "../errors";
import type { Logger } from "../logger";
import { createLogger } from "../logger";
import type { DebrisRequest } from "../schemas";
import { DebrisRequestSchema } from "../schemas";
import type { DebrisAssessment } from "./risk";
import { computeDebrisAssessment } from "./risk";

export interface DebrisOptions {
  config?: EngineConfig;
  logger?: Logger;
}

export function assessDebris(request: DebrisRequest, options: DebrisOptions = {}): EngineResult<DebrisAssessment> {
  const parsed = DebrisRequestSchema.safeParse(request);
  if (!parsed.success) {
    return fail(ConfigurationError.fromZod(parsed.error, "debris request"));
  }
  const resolved = configOrDefault(options.config);
  if (!resolved.success) return fail(resolved.error);

  const logger = options.logger ?? createLogger("debris");
  const assessment = computeDebrisAssessment(parsed.data, resolved.data.debris);

  if (!assessment.deorbit.compliant) {
    logger.warn(
      `${assessment.altitudeKm} km decays in ${assessment.deorbit.naturalDecayYears} years, ` +
        `over the ${assessment.deorbit.disposalRule.id} limit with no active deorbit`,
    );
  }
  if (assessment.collision.clamped) {
    logger.warn("collision probability clamped to 1");
  }
  return ok(assessment);
}

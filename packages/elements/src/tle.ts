import * as satellite from 'satellite.js'
import {
  createLogger,
  EARTH_RADIUS_KM,
  GM_EARTH,
  RAD_TO_DEG,
  SatelliteElementSchema,
} from '@crosslink/core'
import type { Logger, SatelliteElement } from '@crosslink/core'

/** One two-line element set, with the optional name line that precedes it. */
export interface TleRecord {
  name: string | null
  line1: string
  line2: string
}

export interface TleConversion {
  elements: SatelliteElement[]
  /** Records that could not be turned into a circular LEO element. */
  skipped: { record: TleRecord; reason: string }[]
}

const isLine1 = (line: string) => line.startsWith('1 ')
const isLine2 = (line: string) => line.startsWith('2 ')

/**
 * Splits 2LE/3LE text into records. Blank lines are ignored; a line that is
 * neither a name nor part of a pair is dropped with a warning.
 */
export function parseTleText(text: string, logger: Logger = createLogger('elements')): TleRecord[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0)

  const records: TleRecord[] = []
  let i = 0
  while (i < lines.length) {
    const line = lines[i]
    if (isLine1(line) && i + 1 < lines.length && isLine2(lines[i + 1])) {
      records.push({ name: null, line1: line, line2: lines[i + 1] })
      i += 2
    } else if (!isLine1(line) && !isLine2(line) && i + 2 < lines.length && isLine1(lines[i + 1]) && isLine2(lines[i + 2])) {
      records.push({ name: line.trim(), line1: lines[i + 1], line2: lines[i + 2] })
      i += 3
    } else {
      logger.warn(`ignoring unpaired TLE line ${i + 1}: ${line}`)
      i += 1
    }
  }
  return records
}

function normalizeDeg(deg: number): number {
  return ((deg % 360) + 360) % 360
}

/**
 * Circular-orbit approximation of a TLE: altitude from the mean motion
 * (a = ∛(μ / n²)), phase as argument of perigee plus mean anomaly.
 */
export function elementFromTle(record: TleRecord): { element: SatelliteElement } | { reason: string } {
  const satrec = satellite.twoline2satrec(record.line1, record.line2)

  // satrec.no is in radians per minute
  const meanMotionRadPerSec = satrec.no / 60
  const semiMajorAxisKm = Math.cbrt(GM_EARTH / (meanMotionRadPerSec * meanMotionRadPerSec))

  const parsed = SatelliteElementSchema.safeParse({
    id: record.name ?? `NORAD-${satrec.satnum.trim()}`,
    altitudeKm: semiMajorAxisKm - EARTH_RADIUS_KM,
    inclinationDeg: satrec.inclo * RAD_TO_DEG,
    raanDeg: normalizeDeg(satrec.nodeo * RAD_TO_DEG),
    initialPhaseDeg: normalizeDeg((satrec.argpo + satrec.mo) * RAD_TO_DEG),
  })

  if (!parsed.success) {
    return { reason: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') }
  }
  return { element: parsed.data }
}

export function elementsFromTle(
  source: string | readonly TleRecord[],
  logger: Logger = createLogger('elements'),
): TleConversion {
  const records = typeof source === 'string' ? parseTleText(source, logger) : source
  const conversion: TleConversion = { elements: [], skipped: [] }

  for (const record of records) {
    const result = elementFromTle(record)
    if ('element' in result) {
      conversion.elements.push(result.element)
    } else {
      logger.warn(`skipping ${record.name ?? record.line1.slice(2, 7)}: ${result.reason}`)
      conversion.skipped.push({ record, reason: result.reason })
    }
  }
  return conversion
}

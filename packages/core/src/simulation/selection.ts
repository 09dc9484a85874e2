import type { LinkBudget } from "../link/budget";
import type { GroundStationSelection } from "./types";

/** A ground station in view of one satellite at one step, already budgeted. */
export interface GroundCandidate {
  stationId: string;
  /** Position in the caller's station list; the final tie-breaker. */
  stationIndex: number;
  budget: LinkBudget;
}

type Comparator = (a: GroundCandidate, b: GroundCandidate) => number;

const byIndex: Comparator = (a, b) => a.stationIndex - b.stationIndex;
const byDistance: Comparator = (a, b) => a.budget.distanceKm - b.budget.distanceKm || byIndex(a, b);
const bySnr: Comparator = (a, b) => b.budget.snrDb - a.budget.snrDb || byIndex(a, b);

function best(candidates: readonly GroundCandidate[], compare: Comparator): GroundCandidate | undefined {
  let chosen: GroundCandidate | undefined;
  for (const candidate of candidates) {
    if (!chosen || compare(candidate, chosen) < 0) chosen = candidate;
  }
  return chosen;
}

/**
 * Picks the station a satellite links to.
 *
 * Among feasible candidates the policy decides; with none feasible the
 * nearest visible station is returned (its sample is infeasible). Returns
 * undefined when no station is in view.
 */
export function selectGroundLink(
  candidates: readonly GroundCandidate[],
  policy: GroundStationSelection,
  assignments: ReadonlyMap<string, number> = new Map(),
): GroundCandidate | undefined {
  const feasible = candidates.filter((c) => c.budget.feasible);
  if (feasible.length === 0) return best(candidates, byDistance);

  switch (policy) {
    case "highest-snr":
      return best(feasible, bySnr);
    case "nearest":
      return best(feasible, byDistance);
    case "load-balance":
      return best(
        feasible,
        (a, b) => (assignments.get(a.stationId) ?? 0) - (assignments.get(b.stationId) ?? 0) || bySnr(a, b),
      );
  }
}

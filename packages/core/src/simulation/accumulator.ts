import type { LinkKind, StepSummary } from "./types";

/** Running totals for a contiguous range of steps. */
export interface RunAccumulator {
  totalSamples: number;
  feasibleSamples: number;
  snrSumDb: number;
  latencySumMs: number;
  stepsWithoutLink: number;
  stepsWithoutGateway: number;
  linkKindCounts: Record<LinkKind, number>;
  steps: StepSummary[];
}

export function emptyAccumulator(): RunAccumulator {
  return {
    totalSamples: 0,
    feasibleSamples: 0,
    snrSumDb: 0,
    latencySumMs: 0,
    stepsWithoutLink: 0,
    stepsWithoutGateway: 0,
    linkKindCounts: { ground: 0, crosslink: 0, unlinked: 0 },
    steps: [],
  };
}

export function recordStep(acc: RunAccumulator, step: StepSummary): void {
  for (const sample of step.samples) {
    acc.totalSamples += 1;
    acc.linkKindCounts[sample.kind] += 1;
    if (sample.kind !== "unlinked" && sample.feasible) {
      acc.feasibleSamples += 1;
      acc.snrSumDb += sample.snrDb;
      acc.latencySumMs += sample.latencyMs;
    }
  }
  if (step.feasibleSatellites === 0) acc.stepsWithoutLink += 1;
  if (!step.gatewayAvailable) acc.stepsWithoutGateway += 1;
  acc.steps.push(step);
}

/** Folds `later` into `earlier` in place; `later` must cover the steps directly after it. */
export function mergeAccumulators(earlier: RunAccumulator, later: RunAccumulator): void {
  earlier.totalSamples += later.totalSamples;
  earlier.feasibleSamples += later.feasibleSamples;
  earlier.snrSumDb += later.snrSumDb;
  earlier.latencySumMs += later.latencySumMs;
  earlier.stepsWithoutLink += later.stepsWithoutLink;
  earlier.stepsWithoutGateway += later.stepsWithoutGateway;
  earlier.linkKindCounts.ground += later.linkKindCounts.ground;
  earlier.linkKindCounts.crosslink += later.linkKindCounts.crosslink;
  earlier.linkKindCounts.unlinked += later.linkKindCounts.unlinked;
  for (const step of later.steps) earlier.steps.push(step);
}

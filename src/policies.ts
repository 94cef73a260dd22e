/**
 * Rotation policies: pure functions from a view of the rotation state to the
 * ad_id that should be served next.
 *
 * A strategy is a tagged value (`{ kind: "least_shown" }`,
 * `{ kind: "best_ctr", performance }`, …). `resolvePolicy` turns it into a
 * RotationPolicy; the rotator then applies the choice to its own state.
 * Policies only read their input, so each one can be tested against the same
 * PolicyInput.
 */

import type { RandomSource } from "./random";
import type { PerformanceIndex, RotationStrategy } from "./types";

export interface PolicyCandidate {
  adId: string;
  weight: number;
  timesShown: number;
  /** Registration order; lower registered earlier */
  ordinal: number;
}

export interface PolicyInput {
  /** Active creatives in registration order; never empty */
  candidates: readonly PolicyCandidate[];
  /** Ordinal of the creative picked by the previous round-robin choice */
  lastRoundRobinOrdinal: number | null;
  random: RandomSource;
}

export type RotationPolicy = (input: PolicyInput) => string;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Picks a candidate with probability proportional to `weightOf`.
 * Returns null when no candidate has a positive weight.
 */
function pickWeighted(
  candidates: readonly PolicyCandidate[],
  weightOf: (candidate: PolicyCandidate) => number,
  random: RandomSource
): string | null {
  const weighted = candidates
    .map((candidate) => ({ candidate, weight: weightOf(candidate) }))
    .filter((entry) => Number.isFinite(entry.weight) && entry.weight > 0);

  const total = weighted.reduce((sum, entry) => sum + entry.weight, 0);
  if (weighted.length === 0 || total <= 0) return null;

  let remaining = random() * total;
  for (const entry of weighted) {
    remaining -= entry.weight;
    if (remaining < 0) return entry.candidate.adId;
  }
  // Float drift can leave `remaining` at ~0 after the last entry.
  return weighted[weighted.length - 1].candidate.adId;
}

function isUsableScore(score: number | undefined): score is number {
  return score !== undefined && Number.isFinite(score) && score >= 0;
}

// ─── Policies ────────────────────────────────────────────────────────────────

/** Next active creative after the previous round-robin pick, wrapping around */
export const roundRobin: RotationPolicy = ({ candidates, lastRoundRobinOrdinal }) => {
  const last = lastRoundRobinOrdinal ?? -1;
  const next = candidates.find((candidate) => candidate.ordinal > last) ?? candidates[0];
  return next.adId;
};

export const weightedRandom: RotationPolicy = ({ candidates, random }) =>
  pickWeighted(candidates, (candidate) => candidate.weight, random) ?? candidates[0].adId;

/** Fewest times shown so far; ties go to the earliest registration */
export const leastShown: RotationPolicy = ({ candidates }) => {
  let best = candidates[0];
  for (const candidate of candidates) {
    if (candidate.timesShown < best.timesShown) best = candidate;
  }
  return best.adId;
};

/**
 * Weighted random over `weight × score`. Creatives without a usable score get
 * the mean of the supplied scores, so new creatives keep getting traffic.
 * Falls back to plain weighted random when no scores are usable.
 */
export function performanceAdaptive(scores?: ReadonlyMap<string, number>): RotationPolicy {
  return (input) => {
    const known = [...(scores?.values() ?? [])].filter(isUsableScore);
    if (known.length === 0) return weightedRandom(input);

    const meanScore = known.reduce((sum, score) => sum + score, 0) / known.length;
    const scoreOf = (adId: string): number => {
      const score = scores?.get(adId);
      return isUsableScore(score) ? score : meanScore;
    };

    return (
      pickWeighted(input.candidates, (c) => c.weight * scoreOf(c.adId), input.random) ??
      weightedRandom(input)
    );
  };
}

/** Highest CTR among creatives with impressions; ties go to the earliest registration */
export function bestCtr(performance: PerformanceIndex): RotationPolicy {
  return (input) => {
    let best: { adId: string; ctr: number } | null = null;
    for (const candidate of input.candidates) {
      const stats = performance.get(candidate.adId);
      if (!stats || stats.impressions === 0) continue;
      if (best === null || stats.ctr > best.ctr) {
        best = { adId: candidate.adId, ctr: stats.ctr };
      }
    }
    return best?.adId ?? weightedRandom(input);
  };
}

/** Lowest cost per click among creatives with clicks; ties go to the earliest registration */
export function lowestCpc(performance: PerformanceIndex): RotationPolicy {
  return (input) => {
    let best: { adId: string; cpcMicros: number } | null = null;
    for (const candidate of input.candidates) {
      const cpcMicros = performance.get(candidate.adId)?.cpcMicros;
      if (cpcMicros === null || cpcMicros === undefined) continue;
      if (best === null || cpcMicros < best.cpcMicros) {
        best = { adId: candidate.adId, cpcMicros };
      }
    }
    return best?.adId ?? weightedRandom(input);
  };
}

export function resolvePolicy(strategy: RotationStrategy): RotationPolicy {
  switch (strategy.kind) {
    case "round_robin":
      return roundRobin;
    case "weighted_random":
      return weightedRandom;
    case "least_shown":
      return leastShown;
    case "performance_adaptive":
      return performanceAdaptive(strategy.scores);
    case "best_ctr":
      return bestCtr(strategy.performance);
    case "lowest_cpc":
      return lowestCpc(strategy.performance);
  }
}

/** CTR per ad, ready to pass as `performance_adaptive` scores */
export function ctrScores(performance: PerformanceIndex): Map<string, number> {
  const scores = new Map<string, number>();
  for (const [adId, stats] of performance) {
    scores.set(adId, stats.ctr);
  }
  return scores;
}

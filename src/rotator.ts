/**
 * CreativeRotator: owns the creative pool and its exposure counters and
 * picks the next creative to serve with a pluggable strategy.
 *
 * Every method is synchronous. On Node's single-threaded event loop a method
 * runs to completion before any other code touches the rotator, so the
 * selection read and the counter update inside `chooseNext` form one atomic
 * step, and reads never observe counters from two different sequence steps.
 *
 * State is in memory only. Use `snapshot()` / `restore()` to persist it or to
 * dry-run a simulation without touching the live counters.
 */

import { z } from "zod";
import {
  DuplicateCreativeError,
  EmptyPoolError,
  UnknownCreativeError,
  ValidationError,
} from "./errors";
import { resolvePolicy, type PolicyCandidate } from "./policies";
import { createSeededRandom, type RandomSource } from "./random";
import type {
  Creative,
  ExposureCounters,
  RotationStatsEntry,
  RotationStrategy,
  SimpleStrategyName,
  SummaryOfChoices,
} from "./types";

const creativeSchema = z.object({
  adId: z.string().min(1),
  weight: z.number().finite().positive().default(1),
  isActive: z.boolean().default(true),
  metadata: z.record(z.unknown()).default({}),
});

/** What `addCreative` accepts; weight, isActive and metadata are optional */
export type CreativeInput = z.input<typeof creativeSchema>;

export interface CreativeEntry {
  creative: Creative;
  counters: ExposureCounters;
  ordinal: number;
}

export interface RotationSnapshot {
  creatives: CreativeEntry[];
  sequence: number;
  nextOrdinal: number;
  lastRoundRobinOrdinal: number | null;
}

export interface CreativeRotatorOptions {
  creatives?: CreativeInput[];
  /** Random source for the weighted strategies (defaults to Math.random) */
  random?: RandomSource;
  /** Shortcut for `random: createSeededRandom(seed)` */
  seed?: number;
}

const SIMPLE_STRATEGIES: Record<SimpleStrategyName, RotationStrategy> = {
  round_robin: { kind: "round_robin" },
  weighted_random: { kind: "weighted_random" },
  least_shown: { kind: "least_shown" },
  performance_adaptive: { kind: "performance_adaptive" },
};

function copyEntry(entry: CreativeEntry): CreativeEntry {
  return {
    creative: { ...entry.creative, metadata: { ...entry.creative.metadata } },
    counters: { ...entry.counters },
    ordinal: entry.ordinal,
  };
}

export class CreativeRotator {
  /** Map iteration order is registration order */
  private entries = new Map<string, CreativeEntry>();
  private sequence = 0;
  private nextOrdinal = 0;
  private lastRoundRobinOrdinal: number | null = null;
  private readonly random: RandomSource;

  constructor(options: CreativeRotatorOptions = {}) {
    this.random =
      options.random ??
      (options.seed !== undefined ? createSeededRandom(options.seed) : Math.random);

    for (const creative of options.creatives ?? []) {
      this.addCreative(creative);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /** Global sequence counter; number of choices made since the last reset */
  get currentSequence(): number {
    return this.sequence;
  }

  has(adId: string): boolean {
    return this.entries.has(adId);
  }

  listCreatives(): Creative[] {
    return [...this.entries.values()].map((entry) => copyEntry(entry).creative);
  }

  /**
   * Registers a creative with zero counters.
   *
   * @throws ValidationError when the creative is malformed (empty id, weight ≤ 0)
   * @throws DuplicateCreativeError when the ad_id is already registered
   */
  addCreative(input: CreativeInput): void {
    const parsed = creativeSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid creative: ${issues}`);
    }

    const creative = parsed.data;
    if (this.entries.has(creative.adId)) {
      throw new DuplicateCreativeError(creative.adId);
    }

    this.entries.set(creative.adId, {
      creative: { ...creative, metadata: { ...creative.metadata } },
      counters: { timesShown: 0, lastShownAt: null },
      ordinal: this.nextOrdinal++,
    });
  }

  /** @throws UnknownCreativeError when the ad_id is not registered */
  removeCreative(adId: string): void {
    if (!this.entries.delete(adId)) {
      throw new UnknownCreativeError(adId);
    }
  }

  /** @throws UnknownCreativeError when the ad_id is not registered */
  setActive(adId: string, isActive: boolean): void {
    this.requireEntry(adId).creative.isActive = isActive;
  }

  /**
   * Picks the next creative, increments its `timesShown`, stamps
   * `lastShownAt` with the current sequence index and advances the sequence.
   *
   * @throws EmptyPoolError when no creative is active
   */
  chooseNext(strategy: RotationStrategy | SimpleStrategyName = "round_robin"): string {
    const resolved = typeof strategy === "string" ? SIMPLE_STRATEGIES[strategy] : strategy;

    const candidates: PolicyCandidate[] = [];
    for (const entry of this.entries.values()) {
      if (!entry.creative.isActive) continue;
      candidates.push({
        adId: entry.creative.adId,
        weight: entry.creative.weight,
        timesShown: entry.counters.timesShown,
        ordinal: entry.ordinal,
      });
    }

    if (candidates.length === 0) {
      throw new EmptyPoolError();
    }

    const adId = resolvePolicy(resolved)({
      candidates,
      lastRoundRobinOrdinal: this.lastRoundRobinOrdinal,
      random: this.random,
    });

    const entry = this.requireEntry(adId);
    entry.counters.timesShown += 1;
    entry.counters.lastShownAt = this.sequence;
    this.sequence += 1;

    if (resolved.kind === "round_robin") {
      this.lastRoundRobinOrdinal = entry.ordinal;
    }

    return adId;
  }

  /** Exposure counters and share of all choices, per registered creative */
  getRotationStats(): Record<string, RotationStatsEntry> {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entry.counters.timesShown;
    }

    const stats: Record<string, RotationStatsEntry> = {};
    for (const [adId, entry] of this.entries) {
      stats[adId] = {
        timesShown: entry.counters.timesShown,
        shareOfTotal: total === 0 ? 0 : entry.counters.timesShown / total,
        lastShownAt: entry.counters.lastShownAt,
      };
    }
    return stats;
  }

  /**
   * Calls `chooseNext` `iterations` times and returns how often each
   * registered creative was picked.
   *
   * This mutates the live counters. For a dry run, take a `snapshot()` first
   * and `restore()` it afterwards.
   */
  simulateRotation(
    iterations: number,
    strategy: RotationStrategy | SimpleStrategyName = "round_robin"
  ): SummaryOfChoices {
    if (!Number.isInteger(iterations) || iterations <= 0) {
      throw new ValidationError(
        `Invalid iterations: ${iterations}. Expected a positive integer.`
      );
    }

    const counts: SummaryOfChoices = {};
    for (const adId of this.entries.keys()) {
      counts[adId] = 0;
    }

    for (let i = 0; i < iterations; i++) {
      const adId = this.chooseNext(strategy);
      counts[adId] = (counts[adId] ?? 0) + 1;
    }

    return counts;
  }

  /** Deep copy of the full rotation state */
  snapshot(): RotationSnapshot {
    return {
      creatives: [...this.entries.values()].map(copyEntry),
      sequence: this.sequence,
      nextOrdinal: this.nextOrdinal,
      lastRoundRobinOrdinal: this.lastRoundRobinOrdinal,
    };
  }

  /**
   * Replaces the current state with a snapshot. The random source is not
   * part of the snapshot and keeps advancing. `nextOrdinal` never falls at or
   * below a restored ordinal, so later registrations still sort last.
   */
  restore(snapshot: RotationSnapshot): void {
    const entries = new Map<string, CreativeEntry>();
    let nextOrdinal = snapshot.nextOrdinal;
    for (const entry of snapshot.creatives) {
      entries.set(entry.creative.adId, copyEntry(entry));
      nextOrdinal = Math.max(nextOrdinal, entry.ordinal + 1);
    }
    this.entries = entries;
    this.sequence = snapshot.sequence;
    this.nextOrdinal = nextOrdinal;
    this.lastRoundRobinOrdinal = snapshot.lastRoundRobinOrdinal;
  }

  /** Zeroes every counter, the sequence and the round-robin position */
  reset(): void {
    for (const entry of this.entries.values()) {
      entry.counters = { timesShown: 0, lastShownAt: null };
    }
    this.sequence = 0;
    this.lastRoundRobinOrdinal = null;
  }

  private requireEntry(adId: string): CreativeEntry {
    const entry = this.entries.get(adId);
    if (!entry) {
      throw new UnknownCreativeError(adId);
    }
    return entry;
  }
}

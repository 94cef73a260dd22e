/**
 * Pure functions over normalized records: summary statistics, filters,
 * per-ad performance and the JSON export.
 *
 * None of these mutate their input; every filter returns a new array.
 */

import { addMicros, divideMicros, formatMicros, toMicros } from "./money";
import type {
  AdRecord,
  AggregatedReport,
  CreativePerformance,
  Decimal,
  PerformanceIndex,
  PerformanceSummary,
  Platform,
  PlatformBreakdown,
  SummaryStats,
} from "./types";

// ─── Summary statistics ──────────────────────────────────────────────────────

interface Totals {
  records: number;
  campaigns: number;
  impressions: number;
  clicks: number;
  spendMicros: number;
}

function accumulate(records: readonly AdRecord[]): Totals {
  const campaigns = new Set<string>();
  let impressions = 0;
  let clicks = 0;
  let spendMicros = 0;

  for (const record of records) {
    campaigns.add(`${record.platform}:${record.campaign_id}`);
    impressions += record.impressions;
    clicks += record.clicks;
    spendMicros = addMicros(spendMicros, toMicros(record.spend));
  }

  return { records: records.length, campaigns: campaigns.size, impressions, clicks, spendMicros };
}

/** Click-through rate in percent, rounded to two decimals; 0 without impressions */
export function computeCtr(clicks: number, impressions: number): number {
  if (impressions === 0) return 0;
  return Math.round((clicks / impressions) * 10_000) / 100;
}

function computeCpc(spendMicros: number, clicks: number): Decimal {
  return formatMicros(divideMicros(spendMicros, clicks));
}

/**
 * Computes totals, CTR, CPC and a per-platform breakdown.
 * Platforms appear in the breakdown in the order they first occur in `records`.
 */
export function getSummaryStats(records: readonly AdRecord[]): SummaryStats {
  const totals = accumulate(records);

  const byPlatform = new Map<Platform, AdRecord[]>();
  const currencies = new Set<string>();
  for (const record of records) {
    const group = byPlatform.get(record.platform) ?? [];
    group.push(record);
    byPlatform.set(record.platform, group);
    currencies.add(record.currency);
  }

  const breakdown: Partial<Record<Platform, PlatformBreakdown>> = {};
  for (const [platform, group] of byPlatform) {
    const sub = accumulate(group);
    breakdown[platform] = {
      records: sub.records,
      campaigns: sub.campaigns,
      impressions: sub.impressions,
      clicks: sub.clicks,
      spend: formatMicros(sub.spendMicros),
      ctr: computeCtr(sub.clicks, sub.impressions),
      cpc: computeCpc(sub.spendMicros, sub.clicks),
    };
  }

  return {
    total_spend: formatMicros(totals.spendMicros),
    total_impressions: totals.impressions,
    total_clicks: totals.clicks,
    ctr: computeCtr(totals.clicks, totals.impressions),
    cpc: computeCpc(totals.spendMicros, totals.clicks),
    total_records: totals.records,
    total_campaigns: totals.campaigns,
    currencies: [...currencies],
    per_platform_breakdown: breakdown,
  };
}

// ─── Filters ─────────────────────────────────────────────────────────────────

export function filterByPlatform(records: readonly AdRecord[], platform: Platform): AdRecord[] {
  return records.filter((record) => record.platform === platform);
}

/** Keeps records with `spend >= minSpend`, compared exactly in micros */
export function filterBySpendThreshold(
  records: readonly AdRecord[],
  minSpend: Decimal | number
): AdRecord[] {
  const threshold = toMicros(minSpend);
  return records.filter((record) => toMicros(record.spend) >= threshold);
}

// ─── Per-ad performance ──────────────────────────────────────────────────────

/**
 * Sums impressions, clicks and spend per ad_id across records
 * (an ad may appear once per day or per platform) and derives CTR / CPC.
 * The result feeds the performance-driven rotation strategies.
 */
export function buildPerformanceIndex(records: readonly AdRecord[]): PerformanceIndex {
  const sums = new Map<string, { impressions: number; clicks: number; spendMicros: number }>();

  for (const record of records) {
    const entry = sums.get(record.ad_id) ?? { impressions: 0, clicks: 0, spendMicros: 0 };
    entry.impressions += record.impressions;
    entry.clicks += record.clicks;
    entry.spendMicros = addMicros(entry.spendMicros, toMicros(record.spend));
    sums.set(record.ad_id, entry);
  }

  const index = new Map<string, CreativePerformance>();
  for (const [adId, entry] of sums) {
    index.set(adId, {
      ...entry,
      ctr: entry.impressions === 0 ? 0 : (entry.clicks / entry.impressions) * 100,
      cpcMicros: entry.clicks === 0 ? null : divideMicros(entry.spendMicros, entry.clicks),
    });
  }
  return index;
}

/**
 * Average CTR / CPC across every creative in the index, plus the best and
 * worst creative by each metric. Ties keep the creative that comes first.
 */
export function summarizePerformance(index: PerformanceIndex): PerformanceSummary {
  let impressions = 0;
  let clicks = 0;
  let spendMicros = 0;
  let bestCtr: { adId: string; perf: CreativePerformance } | null = null;
  let worstCtr: { adId: string; perf: CreativePerformance } | null = null;
  let bestCpc: { adId: string; cpcMicros: number } | null = null;
  let worstCpc: { adId: string; cpcMicros: number } | null = null;

  for (const [adId, perf] of index) {
    impressions += perf.impressions;
    clicks += perf.clicks;
    spendMicros = addMicros(spendMicros, perf.spendMicros);

    if (perf.impressions > 0) {
      if (!bestCtr || perf.ctr > bestCtr.perf.ctr) bestCtr = { adId, perf };
      if (!worstCtr || perf.ctr < worstCtr.perf.ctr) worstCtr = { adId, perf };
    }
    const { cpcMicros } = perf;
    if (cpcMicros !== null) {
      if (!bestCpc || cpcMicros < bestCpc.cpcMicros) bestCpc = { adId, cpcMicros };
      if (!worstCpc || cpcMicros > worstCpc.cpcMicros) worstCpc = { adId, cpcMicros };
    }
  }

  const ranked = (entry: { adId: string; perf: CreativePerformance } | null) =>
    entry && { ad_id: entry.adId, ctr: computeCtr(entry.perf.clicks, entry.perf.impressions) };
  const priced = (entry: { adId: string; cpcMicros: number } | null) =>
    entry && { ad_id: entry.adId, cpc: formatMicros(entry.cpcMicros) };

  return {
    total_creatives: index.size,
    average_ctr: computeCtr(clicks, impressions),
    average_cpc: computeCpc(spendMicros, clicks),
    best_ctr: ranked(bestCtr),
    worst_ctr: ranked(worstCtr),
    best_cpc: priced(bestCpc),
    worst_cpc: priced(worstCpc),
  };
}

// ─── Export ──────────────────────────────────────────────────────────────────

/**
 * Serializes a report as `{ records, summary, errors }`.
 * Spend values are already decimal strings, so no float rounding leaks in.
 */
export function toJson(report: AggregatedReport, pretty: boolean = true): string {
  const document = {
    records: report.records,
    summary: report.summary,
    errors: report.errors,
  };
  return pretty ? JSON.stringify(document, null, 2) : JSON.stringify(document);
}

/**
 * Shared data model for the aggregation pipeline and the creative rotator.
 *
 * Serialized shapes (AdRecord, SummaryStats, PlatformFailure) use snake_case
 * keys, matching the JSON report written to disk. In-process options and
 * rotator types use camelCase.
 */

// ─── Platforms ───────────────────────────────────────────────────────────────

export const PLATFORMS = ["meta", "google"] as const;

export type Platform = (typeof PLATFORMS)[number];

/** Inclusive calendar date range, both ends in YYYY-MM-DD format */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * Non-negative fixed-point amount such as "12.34".
 * Always at least two and at most six fractional digits; see money.ts.
 */
export type Decimal = string;

// ─── Credentials ─────────────────────────────────────────────────────────────

export interface MetaCredentials {
  /** Long-lived access token for the Meta Marketing API */
  accessToken: string;
  /** The ad account ID (numeric, without the "act_" prefix) */
  accountId: string;
}

export interface GoogleAdsCredentials {
  developerToken: string;
  /** OAuth2 access token; refreshing it is the caller's job */
  accessToken: string;
  /** Customer ID, digits only */
  customerId: string;
  /** Manager account ID when accessing a client account through an MCC */
  loginCustomerId?: string;
}

// ─── Platform client capability ──────────────────────────────────────────────

/** Campaign row as returned by a platform client */
export interface RawCampaign {
  campaign_id: string;
  name: string;
}

/** Ad row in the platform's own shape; only the normalizer interprets it */
export type RawAd = Record<string, unknown>;

/**
 * The two-method capability every ad platform exposes to the aggregator.
 * Implementations reject with a PlatformError on failure.
 */
export interface PlatformClient {
  readonly platform: Platform;
  fetchCampaigns(range: DateRange, signal?: AbortSignal): Promise<RawCampaign[]>;
  fetchAds(campaignId: string, range: DateRange, signal?: AbortSignal): Promise<RawAd[]>;
}

// ─── Normalized output ───────────────────────────────────────────────────────

/** One ad's performance over a date range, normalized across platforms */
export interface AdRecord {
  platform: Platform;
  campaign_id: string;
  campaign_name: string;
  ad_id: string;
  ad_name: string;
  date_range: DateRange;
  impressions: number;
  clicks: number;
  spend: Decimal;
  currency: string;
}

/**
 * A fetch failure attached to the report.
 * `campaign_id` is set when only that campaign's ads could not be loaded.
 */
export interface PlatformFailure {
  platform: Platform;
  code: string;
  message: string;
  campaign_id?: string;
}

export interface PlatformBreakdown {
  records: number;
  campaigns: number;
  impressions: number;
  clicks: number;
  spend: Decimal;
  ctr: number;
  cpc: Decimal;
}

export interface SummaryStats {
  total_spend: Decimal;
  total_impressions: number;
  total_clicks: number;
  /** Click-through rate in percent, two decimals */
  ctr: number;
  /** Cost per click; "0.00" without clicks */
  cpc: Decimal;
  total_records: number;
  total_campaigns: number;
  currencies: string[];
  per_platform_breakdown: Partial<Record<Platform, PlatformBreakdown>>;
}

export interface AggregatedReport {
  records: AdRecord[];
  summary: SummaryStats;
  errors: PlatformFailure[];
}

export interface AggregateOptions {
  /** Query all platforms concurrently (default true) */
  parallel?: boolean;
  /** Caller-side cancellation */
  signal?: AbortSignal;
  /** Abort the whole call after this many milliseconds */
  timeoutMs?: number;
}

// ─── Creative rotation ───────────────────────────────────────────────────────

export interface Creative {
  adId: string;
  weight: number;
  isActive: boolean;
  metadata: Record<string, unknown>;
}

export interface ExposureCounters {
  timesShown: number;
  /** Sequence index of the last time this creative was chosen */
  lastShownAt: number | null;
}

/** Per-ad performance derived from aggregated records */
export interface CreativePerformance {
  impressions: number;
  clicks: number;
  spendMicros: number;
  /** Percent, unrounded */
  ctr: number;
  /** null without clicks */
  cpcMicros: number | null;
}

export type PerformanceIndex = ReadonlyMap<string, CreativePerformance>;

/** Averages and extremes over a PerformanceIndex */
export interface PerformanceSummary {
  total_creatives: number;
  /** Percent over all impressions, two decimals */
  average_ctr: number;
  /** Spend over all clicks; "0.00" without clicks */
  average_cpc: Decimal;
  /** Only creatives with impressions are ranked by CTR */
  best_ctr: { ad_id: string; ctr: number } | null;
  worst_ctr: { ad_id: string; ctr: number } | null;
  /** Only creatives with clicks are ranked by CPC; lower is better */
  best_cpc: { ad_id: string; cpc: Decimal } | null;
  worst_cpc: { ad_id: string; cpc: Decimal } | null;
}

export type RotationStrategy =
  | { kind: "round_robin" }
  | { kind: "weighted_random" }
  | { kind: "least_shown" }
  | { kind: "performance_adaptive"; scores?: ReadonlyMap<string, number> }
  | { kind: "best_ctr"; performance: PerformanceIndex }
  | { kind: "lowest_cpc"; performance: PerformanceIndex };

export type RotationStrategyKind = RotationStrategy["kind"];

/** Strategies that can be named without parameters */
export type SimpleStrategyName = "round_robin" | "weighted_random" | "least_shown" | "performance_adaptive";

export interface RotationStatsEntry {
  timesShown: number;
  shareOfTotal: number;
  lastShownAt: number | null;
}

/** Choice counts per registered creative, as returned by simulateRotation */
export type SummaryOfChoices = Record<string, number>;

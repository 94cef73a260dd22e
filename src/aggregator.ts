/**
 * Aggregator: fans out over every registered platform client, normalizes the
 * ad rows and merges them into one report.
 *
 * Partial-failure contract:
 *   - A platform whose campaign list cannot be loaded (or that is still
 *     running when the call is aborted) is reported as failed and its
 *     partial records are discarded.
 *   - A campaign whose ads cannot be loaded, or a row that fails
 *     normalization, is reported with its campaign_id; the rest of the
 *     platform is kept.
 *   - The call throws AllPlatformsFailedError only when every platform failed.
 *
 * Each platform worker buffers its full result before the merge, so the
 * report is ordered by registration → campaign → ad regardless of which
 * platform answered first.
 */

import { abortMessage, linkCancellation, raceAbort } from "./cancellation";
import {
  DEFAULT_AGGREGATION_TIMEOUT_MS,
  DEFAULT_CURRENCY,
  validateDateRange,
  validateTimeoutMs,
} from "./config";
import { AllPlatformsFailedError, PlatformError, ValidationError } from "./errors";
import { isWithinRange, normalizeAd } from "./normalizer";
import {
  filterByPlatform,
  filterBySpendThreshold,
  getSummaryStats,
  toJson,
} from "./summary";
import type {
  AdRecord,
  AggregatedReport,
  AggregateOptions,
  DateRange,
  Decimal,
  Platform,
  PlatformClient,
  PlatformFailure,
  RawAd,
  SummaryStats,
} from "./types";

export interface AggregatorOptions {
  /** Currency for rows that do not carry one (defaults to DEFAULT_CURRENCY) */
  defaultCurrency?: string;
  /** Default per-call timeout (defaults to DEFAULT_AGGREGATION_TIMEOUT_MS) */
  timeoutMs?: number;
}

type PlatformOutcome =
  | { status: "fulfilled"; platform: Platform; records: AdRecord[]; failures: PlatformFailure[] }
  | { status: "failed"; platform: Platform; failure: PlatformFailure };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Maps any thrown value to a report entry */
export function toPlatformFailure(
  platform: Platform,
  err: unknown,
  campaignId?: string
): PlatformFailure {
  let code = "UNEXPECTED";
  if (err instanceof PlatformError) {
    code = err.code !== undefined ? String(err.code) : err.name;
  } else if (err instanceof ValidationError) {
    code = "VALIDATION";
  }

  return {
    platform,
    code,
    message: errorMessage(err),
    ...(campaignId !== undefined ? { campaign_id: campaignId } : {}),
  };
}

export class Aggregator {
  private readonly clients: PlatformClient[] = [];
  private readonly defaultCurrency: string;
  private readonly timeoutMs: number;

  constructor(clients: PlatformClient[] = [], options: AggregatorOptions = {}) {
    this.defaultCurrency = options.defaultCurrency ?? DEFAULT_CURRENCY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_AGGREGATION_TIMEOUT_MS;
    validateTimeoutMs(this.timeoutMs);
    for (const client of clients) {
      this.register(client);
    }
  }

  /** Adds a client; it is queried after every client registered before it */
  register(client: PlatformClient): this {
    this.clients.push(client);
    return this;
  }

  get platforms(): Platform[] {
    return this.clients.map((client) => client.platform);
  }

  /**
   * Fetches campaigns and ads from every registered platform for the
   * inclusive range [startDate, endDate] (YYYY-MM-DD).
   *
   * @throws InvalidDateRangeError when startDate is after endDate
   * @throws ValidationError when timeoutMs is not a usable timer delay
   * @throws AllPlatformsFailedError when no platform succeeded
   */
  async aggregateData(
    startDate: string,
    endDate: string,
    options: AggregateOptions = {}
  ): Promise<AggregatedReport> {
    validateDateRange(startDate, endDate);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    validateTimeoutMs(timeoutMs);
    const range: DateRange = { start: startDate, end: endDate };
    const { parallel = true } = options;
    const clients = [...this.clients];

    if (clients.length === 0) {
      console.warn("⚠  No platform clients registered. Returning an empty report.");
      return { records: [], summary: getSummaryStats([]), errors: [] };
    }

    console.log(
      `\n📊 Aggregating ${clients.length} platform(s) from ${startDate} to ${endDate} ` +
        `(${parallel ? "parallel" : "sequential"})…\n`
    );

    const cancellation = linkCancellation(options.signal, timeoutMs);
    try {
      let outcomes: PlatformOutcome[];
      if (parallel) {
        outcomes = await Promise.all(
          clients.map((client) => this.collectPlatform(client, range, cancellation.signal))
        );
      } else {
        outcomes = [];
        for (const client of clients) {
          outcomes.push(await this.collectPlatform(client, range, cancellation.signal));
        }
      }
      return this.merge(outcomes, range);
    } finally {
      cancellation.dispose();
    }
  }

  getSummaryStats(records: readonly AdRecord[]): SummaryStats {
    return getSummaryStats(records);
  }

  filterByPlatform(records: readonly AdRecord[], platform: Platform): AdRecord[] {
    return filterByPlatform(records, platform);
  }

  filterBySpendThreshold(records: readonly AdRecord[], minSpend: Decimal | number): AdRecord[] {
    return filterBySpendThreshold(records, minSpend);
  }

  toJson(report: AggregatedReport, pretty: boolean = true): string {
    return toJson(report, pretty);
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  /**
   * Runs one platform to completion and never rejects: every failure is
   * turned into an outcome so one platform cannot abort the others.
   */
  private async collectPlatform(
    client: PlatformClient,
    range: DateRange,
    signal: AbortSignal
  ): Promise<PlatformOutcome> {
    const { platform } = client;
    const startedAt = Date.now();

    try {
      console.log(`   ▶ ${platform}: fetching campaigns…`);
      const campaigns = await raceAbort(client.fetchCampaigns(range, signal), signal);

      const records: AdRecord[] = [];
      const failures: PlatformFailure[] = [];

      for (const campaign of campaigns) {
        let ads: RawAd[];
        try {
          ads = await raceAbort(client.fetchAds(campaign.campaign_id, range, signal), signal);
        } catch (err) {
          if (signal.aborted) throw err;
          const failure = toPlatformFailure(platform, err, campaign.campaign_id);
          console.warn(
            `   ⚠  ${platform}: could not fetch ads for campaign ${campaign.campaign_id}: ${failure.message}`
          );
          failures.push(failure);
          continue;
        }

        for (const raw of ads) {
          try {
            records.push(
              normalizeAd(platform, raw, { campaign, range, defaultCurrency: this.defaultCurrency })
            );
          } catch (err) {
            if (!(err instanceof ValidationError)) throw err;
            console.warn(`   ⚠  ${platform}: skipping row in campaign ${campaign.campaign_id}: ${err.message}`);
            failures.push({
              ...toPlatformFailure(platform, err, campaign.campaign_id),
              code: "INVALID_RECORD",
            });
          }
        }
      }

      console.log(
        `   ✓ ${platform}: ${records.length} records from ${campaigns.length} campaigns ` +
          `(${Date.now() - startedAt}ms)`
      );
      return { status: "fulfilled", platform, records, failures };
    } catch (err) {
      const failure: PlatformFailure = signal.aborted
        ? { platform, code: "ABORTED", message: `Aborted: ${abortMessage(signal)}` }
        : toPlatformFailure(platform, err);
      console.error(`   ✗ ${platform} failed: ${failure.message}`);
      return { status: "failed", platform, failure };
    }
  }

  private merge(outcomes: PlatformOutcome[], range: DateRange): AggregatedReport {
    const records: AdRecord[] = [];
    const errors: PlatformFailure[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === "failed") {
        errors.push(outcome.failure);
        continue;
      }

      const inRange = outcome.records.filter((record) => isWithinRange(record, range));
      const dropped = outcome.records.length - inRange.length;
      if (dropped > 0) {
        console.warn(
          `   ⚠  ${outcome.platform}: dropped ${dropped} record(s) outside ${range.start}..${range.end}`
        );
      }
      records.push(...inRange);
      errors.push(...outcome.failures);
    }

    if (outcomes.every((outcome) => outcome.status === "failed")) {
      throw new AllPlatformsFailedError(errors);
    }

    const summary = getSummaryStats(records);
    if (summary.currencies.length > 1) {
      console.warn(
        `⚠  Report mixes currencies (${summary.currencies.join(", ")}); ` +
          "spend totals are not converted."
      );
    }

    console.log(
      `\n✅ ${records.length} records, ${errors.length} error(s), total spend ${summary.total_spend}.\n`
    );

    return { records, summary, errors };
  }
}

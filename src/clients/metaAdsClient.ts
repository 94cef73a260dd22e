/**
 * Meta (Facebook) Marketing API client.
 *
 * Two insights calls per aggregation:
 *
 *   1. GET /act_{id}/insights?level=campaign
 *      → Campaigns that had activity in the requested range.
 *
 *   2. GET /{campaign_id}/insights?level=ad
 *      → One row per ad of that campaign, summed over the range.
 *
 * Both calls follow `paging.next` until the last page.
 *
 * API references:
 *   Insights API:       https://developers.facebook.com/docs/marketing-api/insights
 *   Rate Limiting:      https://developers.facebook.com/docs/marketing-api/overview/rate-limiting
 */

import { z } from "zod";
import { META_BASE_URL, PAGE_LIMIT } from "../config";
import { AuthenticationError, PlatformError, RateLimitError } from "../errors";
import type { DateRange, MetaCredentials, PlatformClient, RawAd, RawCampaign } from "../types";
import { fetchJsonWithRetry } from "./http";

// ─── Meta error codes ────────────────────────────────────────────────────────

/**
 * Meta does NOT use HTTP 429 for rate limiting. It returns HTTP 400 with a
 * specific error code in the JSON body:
 *
 *   Code 4   → App-level rate limit (Insights: subcode 1504022 / 1504039)
 *   Code 17  → Ad-account-level API limit (subcode 2446079)
 *   Code 613 → General call limit
 *   Code 80000, 80003, 80004, 80014 → Business Use Case rate limits
 */
export const RATE_LIMIT_ERROR_CODES: ReadonlySet<number> = new Set([
  4, 17, 613, 80000, 80003, 80004, 80014,
]);

/**
 *   Code 190 → Invalid or expired access token
 *   Code 10  → Insufficient permissions
 *   Code 200 → Permission error (requires specific permission)
 */
export const AUTH_ERROR_CODES: ReadonlySet<number> = new Set([190, 10, 200]);

/** Wait used when the usage headers do not say (5 minutes, the development-tier block) */
const DEFAULT_RATE_LIMIT_WAIT_MS = 5 * 60 * 1000;

const errorEnvelopeSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    error_subcode: z.number().optional(),
    message: z.string().optional(),
  }),
});

const businessUseCaseUsageSchema = z.record(
  z.array(z.object({ estimated_time_to_regain_access: z.number().optional() }).passthrough())
);

const insightsThrottleSchema = z
  .object({ app_id_util_pct: z.number().optional(), acc_id_util_pct: z.number().optional() })
  .passthrough();

function parseHeaderJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

/**
 * Extracts the recommended wait time from response headers.
 *
 *   - X-Business-Use-Case-Usage: `estimated_time_to_regain_access` (minutes)
 *   - X-FB-Ads-Insights-Throttle: utilization percentages, logged only
 *
 * Falls back to 5 minutes if the headers are missing or unparseable.
 */
export function getWaitTimeFromHeaders(headers: Headers): number {
  const bucHeader = headers.get("x-business-use-case-usage");
  if (bucHeader) {
    const usage = businessUseCaseUsageSchema.safeParse(parseHeaderJson(bucHeader));
    if (usage.success) {
      const [firstEntries] = Object.values(usage.data);
      const minutes = firstEntries?.[0]?.estimated_time_to_regain_access;
      if (minutes) {
        return minutes * 60 * 1000;
      }
    }
  }

  const insightsThrottle = headers.get("x-fb-ads-insights-throttle");
  if (insightsThrottle) {
    const throttle = insightsThrottleSchema.safeParse(parseHeaderJson(insightsThrottle));
    if (throttle.success) {
      console.warn(
        `   Insights throttle: app utilization: ${throttle.data.app_id_util_pct}%, ` +
          `account utilization: ${throttle.data.acc_id_util_pct}%`
      );
    }
  }

  return DEFAULT_RATE_LIMIT_WAIT_MS;
}

/** Maps a Graph API error body to a typed error; null when the body carries no `error` */
export function classifyMetaError(response: Response, body: unknown): PlatformError | null {
  const parsed = errorEnvelopeSchema.safeParse(body);
  if (!parsed.success) return null;

  const { code, error_subcode: subcode, message } = parsed.data.error;

  if (code !== undefined && AUTH_ERROR_CODES.has(code)) {
    return new AuthenticationError(message ?? "Authentication failed", "meta", code, subcode);
  }

  if (code !== undefined && RATE_LIMIT_ERROR_CODES.has(code)) {
    return new RateLimitError(
      message ?? "Rate limited",
      "meta",
      code,
      subcode,
      getWaitTimeFromHeaders(response.headers)
    );
  }

  return new PlatformError(
    message ?? `Unknown Meta API error (HTTP ${response.status})`,
    "meta",
    code,
    subcode
  );
}

// ─── Response shapes ─────────────────────────────────────────────────────────

const pagingSchema = z.object({ next: z.string().optional() }).passthrough().optional();

const campaignInsightsPageSchema = z.object({
  data: z.array(
    z
      .object({
        campaign_id: z.string().min(1),
        campaign_name: z.string().optional(),
      })
      .passthrough()
  ),
  paging: pagingSchema,
});

const adInsightsPageSchema = z.object({
  data: z.array(z.record(z.unknown())),
  paging: pagingSchema,
});

// ─── URLs ────────────────────────────────────────────────────────────────────

function timeRange(range: DateRange): string {
  return JSON.stringify({ since: range.start, until: range.end });
}

/**
 * GET /act_{id}/insights at campaign level.
 *
 * Exported for unit testing.
 */
export function buildCampaignInsightsUrl(
  credentials: MetaCredentials,
  range: DateRange,
  limit: number = PAGE_LIMIT
): string {
  const queryParams = new URLSearchParams({
    access_token: credentials.accessToken,
    level: "campaign",
    time_range: timeRange(range),
    fields: "campaign_id,campaign_name",
    limit: String(limit),
  });

  return `${META_BASE_URL}/act_${credentials.accountId}/insights?${queryParams.toString()}`;
}

/**
 * GET /{campaign_id}/insights at ad level.
 *
 * Exported for unit testing.
 */
export function buildAdInsightsUrl(
  campaignId: string,
  credentials: MetaCredentials,
  range: DateRange,
  limit: number = PAGE_LIMIT
): string {
  const fields = [
    "account_currency",
    "campaign_id",
    "ad_id",
    "ad_name",
    "impressions",
    "clicks",
    "spend",
    "date_start",
    "date_stop",
  ].join(",");

  const queryParams = new URLSearchParams({
    access_token: credentials.accessToken,
    level: "ad",
    time_range: timeRange(range),
    fields,
    limit: String(limit),
  });

  return `${META_BASE_URL}/${encodeURIComponent(campaignId)}/insights?${queryParams.toString()}`;
}

// ─── Pagination ──────────────────────────────────────────────────────────────

interface Page<Row> {
  data: Row[];
  paging?: { next?: string };
}

async function fetchAllPages<Row>(
  firstUrl: string,
  schema: z.ZodType<Page<Row>, z.ZodTypeDef, unknown>,
  signal?: AbortSignal
): Promise<Row[]> {
  const rows: Row[] = [];
  let url: string | null = firstUrl;

  while (url) {
    const page: Page<Row> = await fetchJsonWithRetry(url, {
      platform: "meta",
      schema,
      classifyError: classifyMetaError,
      signal,
    });
    rows.push(...page.data);
    url = page.paging?.next ?? null;
  }

  return rows;
}

// ─── Client ──────────────────────────────────────────────────────────────────

export function createMetaAdsClient(credentials: MetaCredentials): PlatformClient {
  return {
    platform: "meta",

    async fetchCampaigns(range: DateRange, signal?: AbortSignal): Promise<RawCampaign[]> {
      const rows = await fetchAllPages(
        buildCampaignInsightsUrl(credentials, range),
        campaignInsightsPageSchema,
        signal
      );

      // One row per campaign is expected; keep the first if Meta repeats one.
      const campaigns = new Map<string, RawCampaign>();
      for (const row of rows) {
        if (!campaigns.has(row.campaign_id)) {
          campaigns.set(row.campaign_id, {
            campaign_id: row.campaign_id,
            name: row.campaign_name ?? "",
          });
        }
      }
      return [...campaigns.values()];
    },

    async fetchAds(campaignId: string, range: DateRange, signal?: AbortSignal): Promise<RawAd[]> {
      return fetchAllPages(
        buildAdInsightsUrl(campaignId, credentials, range),
        adInsightsPageSchema,
        signal
      );
    },
  };
}

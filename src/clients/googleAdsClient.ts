/**
 * Google Ads API client (REST transport).
 *
 * Both calls POST a GAQL query to
 *   /customers/{customer_id}/googleAds:search
 * and follow `nextPageToken` until the last page.
 *
 * API references:
 *   Search:             https://developers.google.com/google-ads/api/rest/reference/rest/v17/customers.googleAds/search
 *   Quotas:             https://developers.google.com/google-ads/api/docs/best-practices/quotas
 */

import { z } from "zod";
import { GOOGLE_ADS_BASE_URL } from "../config";
import { AuthenticationError, PlatformError, RateLimitError, ValidationError } from "../errors";
import type {
  DateRange,
  GoogleAdsCredentials,
  PlatformClient,
  RawAd,
  RawCampaign,
} from "../types";
import { fetchJsonWithRetry } from "./http";

/** Wait used when a quota error carries no Retry-After header */
const DEFAULT_RATE_LIMIT_WAIT_MS = 60 * 1000;

const AUTH_STATUSES: ReadonlySet<string> = new Set(["UNAUTHENTICATED", "PERMISSION_DENIED"]);

const errorEnvelopeSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

function retryAfterMs(headers: Headers): number {
  const seconds = Number(headers.get("retry-after"));
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : DEFAULT_RATE_LIMIT_WAIT_MS;
}

/**
 * Maps a Google API error body to a typed error.
 *
 * Unlike Meta, Google signals errors through the HTTP status:
 *   401 / 403 (UNAUTHENTICATED, PERMISSION_DENIED) → bad token or developer token
 *   429 (RESOURCE_EXHAUSTED)                       → quota exceeded
 */
export function classifyGoogleError(response: Response, body: unknown): PlatformError | null {
  const parsed = errorEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    return response.ok
      ? null
      : new PlatformError(`HTTP error ${response.status}`, "google", response.status);
  }

  const { message, status } = parsed.data.error;
  const code = status ?? parsed.data.error.code ?? response.status;

  if (response.status === 401 || response.status === 403 || (status && AUTH_STATUSES.has(status))) {
    return new AuthenticationError(message ?? "Authentication failed", "google", code);
  }

  if (response.status === 429 || status === "RESOURCE_EXHAUSTED") {
    return new RateLimitError(
      message ?? "Quota exceeded",
      "google",
      code,
      undefined,
      retryAfterMs(response.headers)
    );
  }

  return new PlatformError(
    message ?? `Unknown Google Ads API error (HTTP ${response.status})`,
    "google",
    code
  );
}

// ─── GAQL ────────────────────────────────────────────────────────────────────

/** SELECT … FROM campaign for the inclusive date range */
export function buildCampaignQuery(range: DateRange): string {
  return [
    "SELECT campaign.id, campaign.name, metrics.impressions, metrics.clicks, metrics.cost_micros",
    "FROM campaign",
    `WHERE segments.date BETWEEN '${range.start}' AND '${range.end}'`,
    "ORDER BY campaign.id",
  ].join(" ");
}

/**
 * SELECT … FROM ad_group_ad for one campaign.
 *
 * @throws ValidationError when campaignId is not numeric (it is interpolated into the query)
 */
export function buildAdQuery(campaignId: string, range: DateRange): string {
  if (!/^\d+$/.test(campaignId)) {
    throw new ValidationError(
      `Invalid Google Ads campaign ID: "${campaignId}". Expected digits only.`
    );
  }

  return [
    "SELECT ad_group_ad.ad.id, ad_group_ad.ad.name, customer.currency_code,",
    "metrics.impressions, metrics.clicks, metrics.cost_micros",
    "FROM ad_group_ad",
    `WHERE campaign.id = ${campaignId}`,
    `AND segments.date BETWEEN '${range.start}' AND '${range.end}'`,
    "ORDER BY ad_group_ad.ad.id",
  ].join(" ");
}

export function buildSearchUrl(credentials: GoogleAdsCredentials): string {
  return `${GOOGLE_ADS_BASE_URL}/customers/${credentials.customerId}/googleAds:search`;
}

export function buildHeaders(credentials: GoogleAdsCredentials): Record<string, string> {
  return {
    Authorization: `Bearer ${credentials.accessToken}`,
    "developer-token": credentials.developerToken,
    "Content-Type": "application/json",
    ...(credentials.loginCustomerId ? { "login-customer-id": credentials.loginCustomerId } : {}),
  };
}

// ─── Response shapes ─────────────────────────────────────────────────────────

const searchPageSchema = z.object({
  // An empty result set comes back without `results`
  results: z.array(z.record(z.unknown())).default([]),
  nextPageToken: z.string().optional(),
});

const campaignRowSchema = z.object({
  campaign: z.object({
    id: z.union([z.string().min(1), z.number().int()]).transform(String),
    name: z.string().optional(),
  }),
});

async function searchAll(
  credentials: GoogleAdsCredentials,
  query: string,
  signal?: AbortSignal
): Promise<RawAd[]> {
  const rows: RawAd[] = [];
  let pageToken: string | undefined;

  do {
    const page = await fetchJsonWithRetry(buildSearchUrl(credentials), {
      platform: "google",
      schema: searchPageSchema,
      classifyError: classifyGoogleError,
      signal,
      init: {
        method: "POST",
        headers: buildHeaders(credentials),
        body: JSON.stringify(pageToken ? { query, pageToken } : { query }),
      },
    });
    rows.push(...page.results);
    pageToken = page.nextPageToken || undefined;
  } while (pageToken);

  return rows;
}

// ─── Client ──────────────────────────────────────────────────────────────────

export function createGoogleAdsClient(credentials: GoogleAdsCredentials): PlatformClient {
  return {
    platform: "google",

    async fetchCampaigns(range: DateRange, signal?: AbortSignal): Promise<RawCampaign[]> {
      const rows = await searchAll(credentials, buildCampaignQuery(range), signal);

      const campaigns = new Map<string, RawCampaign>();
      for (const row of rows) {
        const parsed = campaignRowSchema.safeParse(row);
        if (!parsed.success) {
          throw new PlatformError(
            `Unexpected campaign row: ${parsed.error.issues[0]?.message ?? "invalid row"}`,
            "google",
            "INVALID_RESPONSE"
          );
        }
        const { id, name } = parsed.data.campaign;
        if (!campaigns.has(id)) {
          campaigns.set(id, { campaign_id: id, name: name ?? "" });
        }
      }
      return [...campaigns.values()];
    },

    async fetchAds(campaignId: string, range: DateRange, signal?: AbortSignal): Promise<RawAd[]> {
      return searchAll(credentials, buildAdQuery(campaignId, range), signal);
    },
  };
}

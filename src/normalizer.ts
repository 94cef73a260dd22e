/**
 * Normalizer: maps each platform's raw ad row into the common AdRecord shape.
 *
 * Raw rows are validated with zod before mapping. Notable transformations:
 *   - Numeric strings → integers (impressions, clicks)
 *   - Meta `spend` ("12.3") and Google `costMicros` ("12300000") → Decimal "12.30"
 *   - Missing metrics → 0 (Google omits zero-valued metrics from REST responses)
 *   - Missing dates → the requested range
 *
 * A row whose clicks exceed its impressions is kept: platforms do report
 * such rows (late click attribution), so it is logged as an anomaly only.
 */

import { z } from "zod";
import { validateDate } from "./config";
import { ValidationError } from "./errors";
import { formatMicros, parseMicros, toMicros } from "./money";
import type { AdRecord, DateRange, Platform, RawAd, RawCampaign } from "./types";

export interface NormalizeContext {
  campaign: RawCampaign;
  /** The range that was requested; used when the row carries no dates */
  range: DateRange;
  defaultCurrency: string;
}

type Normalizer = (raw: RawAd, context: NormalizeContext) => AdRecord;

// ─── Raw row schemas ─────────────────────────────────────────────────────────

const count = z.coerce.number().int().nonnegative();
const identifier = z.union([z.string().min(1), z.number().int()]).transform(String);
const amount = z.union([z.string(), z.number()]);

const metaAdRowSchema = z.object({
  ad_id: identifier,
  ad_name: z.string().optional(),
  impressions: count.default(0),
  clicks: count.default(0),
  spend: amount.default("0"),
  account_currency: z.string().optional(),
  date_start: z.string().optional(),
  date_stop: z.string().optional(),
});

const googleAdRowSchema = z.object({
  adGroupAd: z.object({
    ad: z.object({
      id: identifier,
      name: z.string().optional(),
    }),
  }),
  metrics: z
    .object({
      impressions: count.default(0),
      clicks: count.default(0),
      costMicros: amount.default("0"),
    })
    .default({}),
  customer: z.object({ currencyCode: z.string().optional() }).optional(),
  segments: z.object({ date: z.string().optional() }).optional(),
});

function parseRow<T extends z.ZodTypeAny>(
  schema: T,
  raw: RawAd,
  platform: Platform
): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid ${platform} ad row: ${issues}`);
  }
  return result.data;
}

// ─── Per-platform mapping ────────────────────────────────────────────────────

function normalizeMetaRow(raw: RawAd, context: NormalizeContext): AdRecord {
  const row = parseRow(metaAdRowSchema, raw, "meta");

  const start = row.date_start ?? context.range.start;
  const end = row.date_stop ?? row.date_start ?? context.range.end;

  return buildRecord("meta", context, {
    ad_id: row.ad_id,
    ad_name: row.ad_name ?? "",
    date_range: { start, end },
    impressions: row.impressions,
    clicks: row.clicks,
    spendMicros: toMicros(row.spend),
    currency: row.account_currency,
  });
}

function normalizeGoogleRow(raw: RawAd, context: NormalizeContext): AdRecord {
  const row = parseRow(googleAdRowSchema, raw, "google");
  const day = row.segments?.date;

  return buildRecord("google", context, {
    ad_id: row.adGroupAd.ad.id,
    ad_name: row.adGroupAd.ad.name ?? "",
    date_range: day ? { start: day, end: day } : { ...context.range },
    impressions: row.metrics.impressions,
    clicks: row.metrics.clicks,
    spendMicros: parseMicros(row.metrics.costMicros),
    currency: row.customer?.currencyCode,
  });
}

const NORMALIZERS: Record<Platform, Normalizer> = {
  meta: normalizeMetaRow,
  google: normalizeGoogleRow,
};

interface RecordFields {
  ad_id: string;
  ad_name: string;
  date_range: DateRange;
  impressions: number;
  clicks: number;
  spendMicros: number;
  currency: string | undefined;
}

function buildRecord(
  platform: Platform,
  context: NormalizeContext,
  fields: RecordFields
): AdRecord {
  validateDate(fields.date_range.start);
  validateDate(fields.date_range.end);

  if (fields.clicks > fields.impressions) {
    console.warn(
      `⚠  ${platform} ad ${fields.ad_id} reports more clicks (${fields.clicks}) ` +
        `than impressions (${fields.impressions}). Keeping the record as reported.`
    );
  }

  // Key order here is the key order of the JSON report.
  const record: AdRecord = {
    platform,
    campaign_id: context.campaign.campaign_id,
    campaign_name: context.campaign.name,
    ad_id: fields.ad_id,
    ad_name: fields.ad_name,
    date_range: Object.freeze({ ...fields.date_range }),
    impressions: fields.impressions,
    clicks: fields.clicks,
    spend: formatMicros(fields.spendMicros),
    currency: fields.currency || context.defaultCurrency,
  };

  return Object.freeze(record);
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Maps one raw ad row from `platform` into a frozen AdRecord.
 * Throws a ValidationError if the row does not match the platform's shape.
 */
export function normalizeAd(
  platform: Platform,
  raw: RawAd,
  context: NormalizeContext
): AdRecord {
  return NORMALIZERS[platform](raw, context);
}

/** True when the record lies entirely inside `range` */
export function isWithinRange(record: AdRecord, range: DateRange): boolean {
  return record.date_range.start >= range.start && record.date_range.end <= range.end;
}

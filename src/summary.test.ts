import {
  buildPerformanceIndex,
  computeCtr,
  filterByPlatform,
  filterBySpendThreshold,
  getSummaryStats,
  summarizePerformance,
  toJson,
} from "./summary";
import { ValidationError } from "./errors";
import type { AdRecord, AggregatedReport } from "./types";

function record(overrides: Partial<AdRecord>): AdRecord {
  return {
    platform: "meta",
    campaign_id: "c1",
    campaign_name: "Campaign",
    ad_id: "a1",
    ad_name: "Ad",
    date_range: { start: "2025-01-01", end: "2025-01-31" },
    impressions: 0,
    clicks: 0,
    spend: "0.00",
    currency: "USD",
    ...overrides,
  };
}

const records: AdRecord[] = [
  record({ ad_id: "m1", impressions: 1000, clicks: 10, spend: "0.10" }),
  record({ ad_id: "m2", campaign_id: "c2", impressions: 500, clicks: 5, spend: "0.20" }),
  record({ platform: "google", ad_id: "g1", impressions: 1500, clicks: 0, spend: "5.00" }),
];

// ─── Summary statistics ──────────────────────────────────────────────────────

describe("computeCtr", () => {
  it("is a percentage rounded to two decimals", () => {
    expect(computeCtr(1, 3)).toBe(33.33);
    expect(computeCtr(0, 0)).toBe(0);
  });
});

describe("getSummaryStats", () => {
  it("returns zeros for no records", () => {
    expect(getSummaryStats([])).toEqual({
      total_spend: "0.00",
      total_impressions: 0,
      total_clicks: 0,
      ctr: 0,
      cpc: "0.00",
      total_records: 0,
      total_campaigns: 0,
      currencies: [],
      per_platform_breakdown: {},
    });
  });

  it("refuses a spend total beyond exact precision", () => {
    const huge = [
      record({ ad_id: "a1", spend: "5000000000.00" }),
      record({ ad_id: "a2", spend: "5000000000.00" }),
    ];
    expect(() => getSummaryStats(huge)).toThrow('Amount out of range: "sum".');
    expect(() => buildPerformanceIndex([huge[0], { ...huge[1], ad_id: "a1" }])).toThrow(
      ValidationError
    );
  });

  it("sums spend exactly and breaks totals down per platform", () => {
    const stats = getSummaryStats(records);

    expect(stats.total_spend).toBe("5.30");
    expect(stats.total_impressions).toBe(3000);
    expect(stats.total_clicks).toBe(15);
    expect(stats.ctr).toBe(0.5);
    expect(stats.cpc).toBe("0.353333");
    expect(stats.total_records).toBe(3);
    // meta:c1, meta:c2 and google:c1 are three distinct campaigns
    expect(stats.total_campaigns).toBe(3);
    expect(stats.currencies).toEqual(["USD"]);
    expect(stats.per_platform_breakdown).toEqual({
      meta: {
        records: 2,
        campaigns: 2,
        impressions: 1500,
        clicks: 15,
        spend: "0.30",
        ctr: 1,
        cpc: "0.02",
      },
      google: {
        records: 1,
        campaigns: 1,
        impressions: 1500,
        clicks: 0,
        spend: "5.00",
        ctr: 0,
        cpc: "0.00",
      },
    });
  });

  it("lists platforms in first-seen order", () => {
    const stats = getSummaryStats([...records].reverse());
    expect(Object.keys(stats.per_platform_breakdown)).toEqual(["google", "meta"]);
  });
});

// ─── Filters ─────────────────────────────────────────────────────────────────

describe("filters", () => {
  it("filterByPlatform keeps order and returns a new array", () => {
    const meta = filterByPlatform(records, "meta");
    expect(meta.map((r) => r.ad_id)).toEqual(["m1", "m2"]);
    expect(meta).not.toBe(records);
  });

  it("filterBySpendThreshold is inclusive and idempotent", () => {
    const once = filterBySpendThreshold(records, "0.20");
    expect(once.map((r) => r.ad_id)).toEqual(["m2", "g1"]);
    expect(filterBySpendThreshold(once, "0.20")).toEqual(once);
  });

  it("filterBySpendThreshold accepts a number", () => {
    expect(filterBySpendThreshold(records, 1).map((r) => r.ad_id)).toEqual(["g1"]);
  });
});

// ─── Performance index ───────────────────────────────────────────────────────

describe("buildPerformanceIndex", () => {
  it("sums per ad and derives CTR and CPC", () => {
    const index = buildPerformanceIndex([
      record({ ad_id: "a1", impressions: 100, clicks: 4, spend: "1.00" }),
      record({ ad_id: "a1", platform: "google", impressions: 100, clicks: 1, spend: "0.50" }),
      record({ ad_id: "a2", impressions: 0, clicks: 0, spend: "0.00" }),
    ]);

    expect(index.get("a1")).toEqual({
      impressions: 200,
      clicks: 5,
      spendMicros: 1_500_000,
      ctr: 2.5,
      cpcMicros: 300_000,
    });
    expect(index.get("a2")).toEqual({
      impressions: 0,
      clicks: 0,
      spendMicros: 0,
      ctr: 0,
      cpcMicros: null,
    });
  });
});

describe("summarizePerformance", () => {
  it("reports averages and the best and worst creative per metric", () => {
    const index = buildPerformanceIndex([
      record({ ad_id: "a1", impressions: 200, clicks: 5, spend: "1.50" }),
      record({ ad_id: "a2", impressions: 0, clicks: 0, spend: "0.00" }),
      record({ ad_id: "a3", impressions: 100, clicks: 1, spend: "0.10" }),
    ]);

    expect(summarizePerformance(index)).toEqual({
      total_creatives: 3,
      average_ctr: 2,
      average_cpc: "0.266667",
      best_ctr: { ad_id: "a1", ctr: 2.5 },
      worst_ctr: { ad_id: "a3", ctr: 1 },
      best_cpc: { ad_id: "a3", cpc: "0.10" },
      worst_cpc: { ad_id: "a1", cpc: "0.30" },
    });
  });

  it("has no rankings for an empty index", () => {
    expect(summarizePerformance(new Map())).toEqual({
      total_creatives: 0,
      average_ctr: 0,
      average_cpc: "0.00",
      best_ctr: null,
      worst_ctr: null,
      best_cpc: null,
      worst_cpc: null,
    });
  });
});

// ─── JSON export ─────────────────────────────────────────────────────────────

describe("toJson", () => {
  const report: AggregatedReport = {
    records: [records[0]],
    summary: getSummaryStats([records[0]]),
    errors: [{ platform: "google", code: "190", message: "Invalid token" }],
  };

  it("writes records, summary and errors in that order", () => {
    const parsed: unknown = JSON.parse(toJson(report));
    expect(parsed).toEqual({
      records: [records[0]],
      summary: report.summary,
      errors: report.errors,
    });
    expect(Object.keys(JSON.parse(toJson(report)))).toEqual(["records", "summary", "errors"]);
  });

  it("keeps spend as a string", () => {
    expect(toJson(report, false)).toContain('"spend":"0.10"');
  });

  it("indents only when pretty", () => {
    expect(toJson(report, false)).not.toContain("\n");
    expect(toJson(report).split("\n")[1]).toBe('  "records": [');
  });
});

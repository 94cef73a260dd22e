/**
 * Meta client tests. `fetch` is replaced by a Jest spy that returns canned
 * Graph API responses.
 */

import { AuthenticationError, PlatformError, RateLimitError } from "../errors";
import type { MetaCredentials } from "../types";
import {
  buildAdInsightsUrl,
  buildCampaignInsightsUrl,
  classifyMetaError,
  createMetaAdsClient,
  getWaitTimeFromHeaders,
} from "./metaAdsClient";

const credentials: MetaCredentials = { accessToken: "test-token", accountId: "123456" };
const range = { start: "2025-01-01", end: "2025-01-31" };

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function mockFetch() {
  return jest.spyOn(globalThis, "fetch");
}

let fetchSpy: ReturnType<typeof mockFetch>;

beforeEach(() => {
  fetchSpy = mockFetch();
  jest.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ─── URLs ────────────────────────────────────────────────────────────────────

describe("buildCampaignInsightsUrl", () => {
  it("queries account insights at campaign level", () => {
    const url = new URL(buildCampaignInsightsUrl(credentials, range));

    expect(url.origin + url.pathname).toBe("https://graph.facebook.com/v21.0/act_123456/insights");
    expect(url.searchParams.get("level")).toBe("campaign");
    expect(url.searchParams.get("access_token")).toBe("test-token");
    expect(url.searchParams.get("fields")).toBe("campaign_id,campaign_name");
    expect(url.searchParams.get("limit")).toBe("50");
    expect(JSON.parse(url.searchParams.get("time_range") ?? "")).toEqual({
      since: "2025-01-01",
      until: "2025-01-31",
    });
  });
});

describe("buildAdInsightsUrl", () => {
  it("queries campaign insights at ad level", () => {
    const url = new URL(buildAdInsightsUrl("987", credentials, range, 25));

    expect(url.pathname).toBe("/v21.0/987/insights");
    expect(url.searchParams.get("level")).toBe("ad");
    expect(url.searchParams.get("limit")).toBe("25");
    expect(url.searchParams.get("fields")?.split(",")).toEqual([
      "account_currency",
      "campaign_id",
      "ad_id",
      "ad_name",
      "impressions",
      "clicks",
      "spend",
      "date_start",
      "date_stop",
    ]);
  });
});

// ─── Error classification ────────────────────────────────────────────────────

describe("classifyMetaError", () => {
  it("returns null for a body without an error", () => {
    expect(classifyMetaError(jsonResponse({}), { data: [] })).toBeNull();
  });

  it("classifies auth error codes", () => {
    const error = classifyMetaError(jsonResponse({}, 400), {
      error: { code: 190, error_subcode: 463, message: "Session has expired" },
    });
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error?.code).toBe(190);
    expect(error?.subcode).toBe(463);
    expect(error?.platform).toBe("meta");
  });

  it("classifies rate-limit codes and reads the wait from the usage header", () => {
    const response = jsonResponse({}, 400, {
      "x-business-use-case-usage": JSON.stringify({
        "123456": [{ type: "ads_insights", estimated_time_to_regain_access: 2 }],
      }),
    });
    const error = classifyMetaError(response, { error: { code: 17, message: "User request limit reached" } });

    expect(error).toBeInstanceOf(RateLimitError);
    if (!(error instanceof RateLimitError)) return;
    expect(error.retryAfterMs).toBe(2 * 60 * 1000);
  });

  it("keeps other codes as a plain PlatformError", () => {
    const error = classifyMetaError(jsonResponse({}, 400), {
      error: { code: 100, message: "Invalid parameter" },
    });
    expect(error).toBeInstanceOf(PlatformError);
    expect(error).not.toBeInstanceOf(AuthenticationError);
    expect(error?.message).toBe("Invalid parameter");
  });
});

describe("getWaitTimeFromHeaders", () => {
  it("falls back to five minutes", () => {
    expect(getWaitTimeFromHeaders(new Headers())).toBe(300_000);
    expect(getWaitTimeFromHeaders(new Headers({ "x-business-use-case-usage": "not json" }))).toBe(
      300_000
    );
  });
});

// ─── Client ──────────────────────────────────────────────────────────────────

describe("createMetaAdsClient", () => {
  it("follows paging.next when listing campaigns", async () => {
    fetchSpy
      .mockResolvedValueOnce(
        jsonResponse({
          data: [{ campaign_id: "1", campaign_name: "One" }],
          paging: { next: "https://graph.facebook.com/v21.0/act_123456/insights?after=abc" },
        })
      )
      .mockResolvedValueOnce(
        jsonResponse({ data: [{ campaign_id: "2", campaign_name: "Two" }, { campaign_id: "1" }] })
      );

    const campaigns = await createMetaAdsClient(credentials).fetchCampaigns(range);

    expect(campaigns).toEqual([
      { campaign_id: "1", name: "One" },
      { campaign_id: "2", name: "Two" },
    ]);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(fetchSpy.mock.calls[1][0]).toBe(
      "https://graph.facebook.com/v21.0/act_123456/insights?after=abc"
    );
  });

  it("returns raw ad rows untouched", async () => {
    const row = { ad_id: "a1", impressions: "10", clicks: "1", spend: "0.50" };
    fetchSpy.mockResolvedValueOnce(jsonResponse({ data: [row] }));

    await expect(createMetaAdsClient(credentials).fetchAds("1", range)).resolves.toEqual([row]);
  });

  it("does not retry authentication errors", async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({ error: { code: 190, message: "Invalid OAuth access token." } }, 400)
    );

    await expect(createMetaAdsClient(credentials).fetchCampaigns(range)).rejects.toBeInstanceOf(
      AuthenticationError
    );
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("rejects a response with an unexpected shape", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ rows: [] }));

    await expect(createMetaAdsClient(credentials).fetchCampaigns(range)).rejects.toMatchObject({
      name: "PlatformError",
      code: "INVALID_RESPONSE",
    });
  });

  it("stops waiting out a rate limit when the signal aborts", async () => {
    const controller = new AbortController();
    fetchSpy.mockResolvedValue(jsonResponse({ error: { code: 4, message: "Too many calls" } }, 400));
    // The rate-limit warning is logged right before the wait starts.
    jest.spyOn(console, "warn").mockImplementation(() => controller.abort(new Error("stop")));

    await expect(
      createMetaAdsClient(credentials).fetchCampaigns(range, controller.signal)
    ).rejects.toThrow("stop");
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });
});

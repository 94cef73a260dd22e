import {
  loadGoogleCredentialsFromEnv,
  loadMetaCredentialsFromEnv,
  normalizeCustomerId,
  readPositiveInt,
  validateAccountId,
  validateDate,
  validateDateRange,
  validateTimeoutMs,
} from "./config";
import { InvalidDateRangeError, ValidationError } from "./errors";

// ─── validateDate ────────────────────────────────────────────────────────────

describe("validateDate", () => {
  it("accepts a valid date in YYYY-MM-DD format", () => {
    expect(() => validateDate("2025-01-15")).not.toThrow();
    expect(() => validateDate("2024-02-29")).not.toThrow();
  });

  it("rejects dates with wrong format", () => {
    expect(() => validateDate("01-15-2025")).toThrow(ValidationError);
    expect(() => validateDate("2025/01/15")).toThrow(ValidationError);
    expect(() => validateDate("")).toThrow(ValidationError);
  });

  it("rejects invalid calendar dates", () => {
    // 2025 is not a leap year
    expect(() => validateDate("2025-02-29")).toThrow(
      'Invalid date: "2025-02-29" is not a valid calendar date.'
    );
    expect(() => validateDate("2025-13-01")).toThrow(ValidationError);
  });
});

// ─── validateDateRange ───────────────────────────────────────────────────────

describe("validateDateRange", () => {
  it("accepts a single-day range", () => {
    expect(() => validateDateRange("2025-03-01", "2025-03-01")).not.toThrow();
  });

  it("throws InvalidDateRangeError when start is after end", () => {
    expect(() => validateDateRange("2025-03-02", "2025-03-01")).toThrow(InvalidDateRangeError);
    expect(() => validateDateRange("2025-03-02", "2025-03-01")).toThrow(
      "Invalid date range: start date 2025-03-02 is after end date 2025-03-01."
    );
  });

  it("validates the format of both ends first", () => {
    expect(() => validateDateRange("2025-03-01", "2025-3-5")).toThrow(
      'Invalid date format: "2025-3-5". Expected YYYY-MM-DD.'
    );
  });
});

// ─── Account and customer IDs ────────────────────────────────────────────────

describe("validateAccountId", () => {
  it("accepts numeric account IDs", () => {
    expect(() => validateAccountId("123456789")).not.toThrow();
  });

  it('rejects account IDs with "act_" prefix', () => {
    expect(() => validateAccountId("act_123456789")).toThrow(ValidationError);
  });
});

describe("normalizeCustomerId", () => {
  it("strips dashes", () => {
    expect(normalizeCustomerId("123-456-7890")).toBe("1234567890");
    expect(normalizeCustomerId("1234567890")).toBe("1234567890");
  });

  it("rejects IDs that are not ten digits", () => {
    expect(() => normalizeCustomerId("123-456")).toThrow(ValidationError);
    expect(() => normalizeCustomerId("abc-def-ghij")).toThrow(ValidationError);
  });
});

// ─── Credentials from the environment ────────────────────────────────────────

describe("credentials from environment", () => {
  const ENV_KEYS = [
    "META_ACCESS_TOKEN",
    "META_ACCOUNT_ID",
    "GOOGLE_ADS_DEVELOPER_TOKEN",
    "GOOGLE_ADS_ACCESS_TOKEN",
    "GOOGLE_ADS_CUSTOMER_ID",
    "GOOGLE_ADS_LOGIN_CUSTOMER_ID",
  ];
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("loads Meta credentials", () => {
    process.env.META_ACCESS_TOKEN = "test-token";
    process.env.META_ACCOUNT_ID = "123456";
    expect(loadMetaCredentialsFromEnv()).toEqual({
      accessToken: "test-token",
      accountId: "123456",
    });
  });

  it("throws when the Meta access token is missing", () => {
    process.env.META_ACCOUNT_ID = "123456";
    expect(() => loadMetaCredentialsFromEnv()).toThrow(/META_ACCESS_TOKEN/);
  });

  it("loads Google credentials without a login customer", () => {
    process.env.GOOGLE_ADS_DEVELOPER_TOKEN = "test-dev-token";
    process.env.GOOGLE_ADS_ACCESS_TOKEN = "test-token";
    process.env.GOOGLE_ADS_CUSTOMER_ID = "123-456-7890";
    expect(loadGoogleCredentialsFromEnv()).toEqual({
      developerToken: "test-dev-token",
      accessToken: "test-token",
      customerId: "1234567890",
    });
  });

  it("normalizes the login customer ID when present", () => {
    process.env.GOOGLE_ADS_DEVELOPER_TOKEN = "test-dev-token";
    process.env.GOOGLE_ADS_ACCESS_TOKEN = "test-token";
    process.env.GOOGLE_ADS_CUSTOMER_ID = "1234567890";
    process.env.GOOGLE_ADS_LOGIN_CUSTOMER_ID = "999-888-7777";
    expect(loadGoogleCredentialsFromEnv().loginCustomerId).toBe("9998887777");
  });

  it("throws when a Google variable is missing", () => {
    process.env.GOOGLE_ADS_DEVELOPER_TOKEN = "test-dev-token";
    expect(() => loadGoogleCredentialsFromEnv()).toThrow(/GOOGLE_ADS_ACCESS_TOKEN/);
  });
});

// ─── Timeouts ────────────────────────────────────────────────────────────────

describe("validateTimeoutMs", () => {
  it("accepts Infinity and delays setTimeout can hold", () => {
    expect(() => validateTimeoutMs(Infinity)).not.toThrow();
    expect(() => validateTimeoutMs(1)).not.toThrow();
    expect(() => validateTimeoutMs(2_147_483_647)).not.toThrow();
  });

  it("rejects everything else", () => {
    for (const value of [0, -5, 1.5, NaN, -Infinity, 2_147_483_648]) {
      expect(() => validateTimeoutMs(value)).toThrow(ValidationError);
    }
  });
});

describe("readPositiveInt", () => {
  afterEach(() => {
    delete process.env.ADS_TEST_INT;
  });

  it("falls back when the variable is unset", () => {
    expect(readPositiveInt("ADS_TEST_INT", 42, 100)).toBe(42);
  });

  it("reads a value within the cap", () => {
    process.env.ADS_TEST_INT = "100";
    expect(readPositiveInt("ADS_TEST_INT", 42, 100)).toBe(100);
  });

  it("rejects a value above the cap", () => {
    process.env.ADS_TEST_INT = "3000000000";
    expect(() => readPositiveInt("ADS_TEST_INT", 42, 2_147_483_647)).toThrow(
      'Invalid ADS_TEST_INT: "3000000000". Expected a positive integer up to 2147483647.'
    );
  });
});

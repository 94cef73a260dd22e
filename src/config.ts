/**
 * Configuration module.
 *
 * Loads credentials and tunables from environment variables (via .env file)
 * and validates all inputs before use.
 */

import dotenv from "dotenv";
import path from "path";
import { InvalidDateRangeError, ValidationError } from "./errors";
import type { GoogleAdsCredentials, MetaCredentials } from "./types";

// Load .env from the project root
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });

/** The Meta Graph API version we target */
export const META_API_VERSION = "v21.0";

/** Base URL for the Meta Graph API */
export const META_BASE_URL = `https://graph.facebook.com/${META_API_VERSION}`;

/** The Google Ads REST API version we target */
export const GOOGLE_ADS_API_VERSION = "v17";

export const GOOGLE_ADS_BASE_URL = `https://googleads.googleapis.com/${GOOGLE_ADS_API_VERSION}`;

/**
 * Page size for insights and search requests.
 *
 * Kept well below the platform maximums: Meta rejects responses that exceed
 * its "data per call" threshold (error subcode 1487534) instead of truncating.
 */
export const PAGE_LIMIT = 50;

/** Maximum number of attempts on transient / rate-limit errors */
export const MAX_RETRIES = 3;

/** Longest delay setTimeout honours; Node fires anything above it after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Upper bound for one aggregateData call (5 minutes unless overridden) */
export const DEFAULT_AGGREGATION_TIMEOUT_MS = readPositiveInt(
  "ADS_AGGREGATION_TIMEOUT_MS",
  5 * 60 * 1000,
  MAX_TIMEOUT_MS
);

/** Currency assumed when a platform row does not carry one */
export const DEFAULT_CURRENCY = process.env.ADS_DEFAULT_CURRENCY || "USD";

export function readPositiveInt(name: string, fallback: number, max: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0 || value > max) {
    throw new ValidationError(
      `Invalid ${name}: "${raw}". Expected a positive integer up to ${max}.`
    );
  }
  return value;
}

// ─── Credentials ─────────────────────────────────────────────────────────────

/**
 * Reads Meta credentials from environment variables.
 * Throws a ValidationError if any required variable is missing.
 */
export function loadMetaCredentialsFromEnv(): MetaCredentials {
  const accessToken = process.env.META_ACCESS_TOKEN;
  const accountId = process.env.META_ACCOUNT_ID;

  if (!accessToken) {
    throw new ValidationError(
      "Missing META_ACCESS_TOKEN environment variable. " +
        "Copy .env.example to .env and fill in your access token."
    );
  }

  if (!accountId) {
    throw new ValidationError(
      "Missing META_ACCOUNT_ID environment variable. " +
        "Copy .env.example to .env and fill in your ad account ID."
    );
  }

  validateAccountId(accountId);

  return { accessToken, accountId };
}

/**
 * Reads Google Ads credentials from environment variables.
 * Throws a ValidationError if any required variable is missing.
 */
export function loadGoogleCredentialsFromEnv(): GoogleAdsCredentials {
  const developerToken = requireGoogleEnv("GOOGLE_ADS_DEVELOPER_TOKEN");
  const accessToken = requireGoogleEnv("GOOGLE_ADS_ACCESS_TOKEN");
  const customerId = normalizeCustomerId(requireGoogleEnv("GOOGLE_ADS_CUSTOMER_ID"));
  const loginCustomerId = process.env.GOOGLE_ADS_LOGIN_CUSTOMER_ID;

  return {
    developerToken,
    accessToken,
    customerId,
    ...(loginCustomerId ? { loginCustomerId: normalizeCustomerId(loginCustomerId) } : {}),
  };
}

function requireGoogleEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new ValidationError(
      `Missing ${name} environment variable. ` +
        "Copy .env.example to .env and fill in your Google Ads credentials."
    );
  }
  return value;
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validates that a date string matches the YYYY-MM-DD format
 * and represents a real calendar date.
 */
export function validateDate(date: string): void {
  const regex = /^\d{4}-\d{2}-\d{2}$/;
  if (!regex.test(date)) {
    throw new ValidationError(
      `Invalid date format: "${date}". Expected YYYY-MM-DD.`
    );
  }

  const [year, month, day] = date.split("-").map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day));

  // If Date rolled over (e.g., Feb 30 → Mar 2), the parts won't match.
  if (
    isNaN(parsed.getTime()) ||
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new ValidationError(
      `Invalid date: "${date}" is not a valid calendar date.`
    );
  }
}

/**
 * Validates both ends and their order. YYYY-MM-DD strings compare
 * correctly as plain strings once both are valid.
 */
export function validateDateRange(startDate: string, endDate: string): void {
  validateDate(startDate);
  validateDate(endDate);

  if (startDate > endDate) {
    throw new InvalidDateRangeError(startDate, endDate);
  }
}

/**
 * Validates an aggregation timeout. `Infinity` turns the timeout off; any
 * other value must be a positive integer that setTimeout can hold.
 */
export function validateTimeoutMs(timeoutMs: number): void {
  if (timeoutMs === Infinity) return;

  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new ValidationError(
      `Invalid timeout: ${timeoutMs}. ` +
        `Expected a positive integer up to ${MAX_TIMEOUT_MS}ms, or Infinity.`
    );
  }
}

/**
 * Validates that the account ID is a numeric string.
 *
 * Meta ad account IDs are purely numeric (e.g., "123456789").
 * The "act_" prefix is added by our code. If the user passes "act_123",
 * the URL would become "act_act_123" which would fail.
 */
export function validateAccountId(accountId: string): void {
  if (!/^\d+$/.test(accountId)) {
    throw new ValidationError(
      `Invalid account ID: "${accountId}". ` +
        `Expected a numeric string (without the "act_" prefix). ` +
        `Example: "123456789".`
    );
  }
}

/**
 * Strips the dashes from a Google Ads customer ID ("123-456-7890")
 * and checks that ten digits remain.
 */
export function normalizeCustomerId(customerId: string): string {
  const digits = customerId.replace(/-/g, "");
  if (!/^\d{10}$/.test(digits)) {
    throw new ValidationError(
      `Invalid customer ID: "${customerId}". Expected 10 digits, e.g. "123-456-7890".`
    );
  }
  return digits;
}

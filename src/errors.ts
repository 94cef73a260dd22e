/**
 * Custom error classes for platform fetches, aggregation and creative rotation.
 *
 * Fetch-level errors (PlatformError and its subclasses) are caught by the
 * aggregator and reported alongside the partial result. Rotation errors and
 * validation errors signal caller misuse and are thrown straight through.
 */

import type { Platform, PlatformFailure } from "./types";

// ─── Platform errors ─────────────────────────────────────────────────────────

/** Base class for every error raised by a platform client */
export class PlatformError extends Error {
  constructor(
    message: string,
    public readonly platform: Platform,
    public readonly code: number | string | undefined,
    public readonly subcode?: number
  ) {
    super(message);
    this.name = "PlatformError";
  }
}

/**
 * Thrown when the platform rate-limits us.
 * Contains the recommended wait time so the caller can decide how to retry.
 */
export class RateLimitError extends PlatformError {
  constructor(
    message: string,
    platform: Platform,
    code: number | string | undefined,
    subcode: number | undefined,
    public readonly retryAfterMs: number
  ) {
    super(message, platform, code, subcode);
    this.name = "RateLimitError";
  }
}

/**
 * Thrown when the platform rejects the credentials
 * (expired token, insufficient permissions, bad developer token).
 */
export class AuthenticationError extends PlatformError {
  constructor(
    message: string,
    platform: Platform,
    code: number | string | undefined,
    subcode?: number
  ) {
    super(message, platform, code, subcode);
    this.name = "AuthenticationError";
  }
}

/** Thrown by `aggregateData` when every registered platform failed. */
export class AllPlatformsFailedError extends Error {
  constructor(public readonly failures: PlatformFailure[]) {
    super(
      "All platforms failed: " +
        failures.map((f) => `${f.platform} (${f.message})`).join("; ")
    );
    this.name = "AllPlatformsFailedError";
  }
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Thrown when input validation fails (bad date, invalid account ID,
 * malformed platform record, etc.).
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class InvalidDateRangeError extends ValidationError {
  constructor(
    public readonly startDate: string,
    public readonly endDate: string
  ) {
    super(`Invalid date range: start date ${startDate} is after end date ${endDate}.`);
    this.name = "InvalidDateRangeError";
  }
}

// ─── Rotation ────────────────────────────────────────────────────────────────

export class RotationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RotationError";
  }
}

export class DuplicateCreativeError extends RotationError {
  constructor(public readonly adId: string) {
    super(`Creative "${adId}" is already registered.`);
    this.name = "DuplicateCreativeError";
  }
}

export class UnknownCreativeError extends RotationError {
  constructor(public readonly adId: string) {
    super(`Creative "${adId}" is not registered.`);
    this.name = "UnknownCreativeError";
  }
}

export class EmptyPoolError extends RotationError {
  constructor() {
    super("No active creatives to choose from.");
    this.name = "EmptyPoolError";
  }
}

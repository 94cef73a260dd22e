/**
 * Public API: cross-platform ad aggregation and creative rotation.
 */

export { Aggregator, toPlatformFailure } from "./aggregator";
export type { AggregatorOptions } from "./aggregator";
export { TimeoutError } from "./cancellation";
export { createGoogleAdsClient } from "./clients/googleAdsClient";
export { createMetaAdsClient } from "./clients/metaAdsClient";
export {
  DEFAULT_AGGREGATION_TIMEOUT_MS,
  DEFAULT_CURRENCY,
  loadGoogleCredentialsFromEnv,
  loadMetaCredentialsFromEnv,
  normalizeCustomerId,
  validateAccountId,
  validateDate,
  validateDateRange,
} from "./config";
export * from "./errors";
export { formatMicros, normalizeDecimal, sumDecimals, toMicros } from "./money";
export { isWithinRange, normalizeAd } from "./normalizer";
export type { NormalizeContext } from "./normalizer";
export { ctrScores, resolvePolicy } from "./policies";
export type { PolicyCandidate, PolicyInput, RotationPolicy } from "./policies";
export { createSeededRandom } from "./random";
export type { RandomSource } from "./random";
export { CreativeRotator } from "./rotator";
export type { CreativeInput, CreativeRotatorOptions, RotationSnapshot } from "./rotator";
export {
  buildPerformanceIndex,
  computeCtr,
  filterByPlatform,
  filterBySpendThreshold,
  getSummaryStats,
  summarizePerformance,
  toJson,
} from "./summary";
export * from "./types";

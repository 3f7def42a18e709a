/**
 * Shared metrics constants for Prometheus instrumentation.
 */

/** Standard label names used across engine metrics */
export const MetricLabels = {
  BACKEND: "backend",
  OUTCOME: "outcome",
  REASON: "reason",
} as const;

/** Standard metric names */
export const MetricNames = {
  ARCHIVE_REQUESTS_TOTAL: "archive_requests_total",
  ARCHIVE_REQUEST_DURATION: "archive_request_duration_seconds",
  ARCHIVE_RETRIES_TOTAL: "archive_request_retries_total",
  MERGE_OUTCOMES_TOTAL: "archive_merge_outcomes_total",
  PACER_DELAY_SECONDS: "archive_pacer_delay_seconds",
} as const;

/** Histogram buckets for archive request duration (seconds) */
export const REQUEST_DURATION_BUCKETS = [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30];

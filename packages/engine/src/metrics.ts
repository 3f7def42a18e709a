import { Counter, Gauge, Histogram, Registry } from "prom-client";
import { MetricLabels, MetricNames, REQUEST_DURATION_BUCKETS } from "@archive-sweep/shared";

/** Registry for fetch engine metrics */
export const registry = new Registry();

/** Archive requests counter */
export const requestsTotal = new Counter({
  name: MetricNames.ARCHIVE_REQUESTS_TOTAL,
  help: "Total number of archive requests",
  labelNames: [MetricLabels.BACKEND, MetricLabels.OUTCOME],
  registers: [registry],
});

/** Archive request duration histogram */
export const requestDuration = new Histogram({
  name: MetricNames.ARCHIVE_REQUEST_DURATION,
  help: "Duration of archive requests in seconds",
  labelNames: [MetricLabels.BACKEND],
  buckets: REQUEST_DURATION_BUCKETS,
  registers: [registry],
});

/** Retries counter */
export const retriesTotal = new Counter({
  name: MetricNames.ARCHIVE_RETRIES_TOTAL,
  help: "Total number of retried archive requests",
  labelNames: [MetricLabels.BACKEND, MetricLabels.REASON],
  registers: [registry],
});

/** Merge outcomes counter */
export const mergeOutcomesTotal = new Counter({
  name: MetricNames.MERGE_OUTCOMES_TOTAL,
  help: "Records merged into result sets, by outcome",
  labelNames: [MetricLabels.OUTCOME],
  registers: [registry],
});

/** Current pacer delay gauge */
export const pacerDelaySeconds = new Gauge({
  name: MetricNames.PACER_DELAY_SECONDS,
  help: "Current inter-request delay chosen by the pacer",
  registers: [registry],
});

export type RequestOutcome = "success" | "error";

/**
 * Record one archive request.
 */
export function recordRequest(params: {
  backend: string;
  outcome: RequestOutcome;
  durationSec: number;
}): void {
  requestsTotal.inc({
    [MetricLabels.BACKEND]: params.backend,
    [MetricLabels.OUTCOME]: params.outcome,
  });
  requestDuration.observe({ [MetricLabels.BACKEND]: params.backend }, params.durationSec);
}

export function recordRetry(backend: string, reason: string): void {
  retriesTotal.inc({ [MetricLabels.BACKEND]: backend, [MetricLabels.REASON]: reason });
}

export function recordMergeOutcomes(counts: Record<string, number>): void {
  for (const [outcome, count] of Object.entries(counts)) {
    if (count > 0) mergeOutcomesTotal.inc({ [MetricLabels.OUTCOME]: outcome }, count);
  }
}

export function updatePacerDelay(delayMs: number): void {
  pacerDelaySeconds.set(delayMs / 1000);
}

/**
 * Get metrics in Prometheus text format.
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

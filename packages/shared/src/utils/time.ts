import { ConfigurationError } from "../errors";
import type { TimeInput } from "../types/query";

const ZONE_SUFFIX = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Normalize a time bound to epoch seconds (UTC). ISO strings without a zone
 * are read as UTC.
 */
export function toEpochSeconds(value: TimeInput): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new ConfigurationError(`Invalid epoch timestamp: ${value}`);
    return Math.floor(value);
  }
  if (value instanceof Date) {
    const ms = value.getTime();
    if (!Number.isFinite(ms)) throw new ConfigurationError("Invalid Date value");
    return Math.floor(ms / 1000);
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10);
  const iso = ZONE_SUFFIX.test(trimmed) || !trimmed.includes("T") ? trimmed : `${trimmed}Z`;
  const ms = new Date(iso).getTime();
  if (!Number.isFinite(ms)) {
    throw new ConfigurationError(
      `Invalid time value "${value}" (expected ISO 8601 or epoch seconds)`,
    );
  }
  return Math.floor(ms / 1000);
}

export function isoFromEpoch(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

/**
 * Split the inclusive integer range [low, high] into `n` contiguous segments.
 * Sizes differ by at most one; earlier segments take the remainder.
 */
export function splitRange(low: number, high: number, n: number): Array<[number, number]> {
  if (high < low) return [];
  const width = high - low + 1;
  const parts = Math.max(1, Math.min(Math.floor(n), width));
  const segmentSize = Math.floor(width / parts);
  let remainder = width % parts;

  const ranges: Array<[number, number]> = [];
  let currentLow = low;
  for (let i = 0; i < parts; i += 1) {
    let currentHigh = currentLow + segmentSize - 1;
    if (remainder > 0) {
      currentHigh += 1;
      remainder -= 1;
    }
    ranges.push([currentLow, currentHigh]);
    currentLow = currentHigh + 1;
  }
  return ranges;
}

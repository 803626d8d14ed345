/**
 * ANALYTICS ENGINE
 * ================
 *
 * Pure functions over a verdict snapshot. No hidden state: the same snapshot
 * always yields the same output. Nothing here assumes the snapshot is sorted;
 * time series keep whatever order the snapshot has.
 */

import { UnknownSensorChannelError, ValidationError } from '../../common/errors.js';
import {
  isSensorChannel,
  SENSOR_CHANNELS,
  UNKNOWN_LOCATION,
  type Verdict,
} from '../verdicts/contracts/verdict.types.js';
import {
  DEFAULT_CONFIDENCE_BINS,
  DEFAULT_LIVE_FEED_LIMIT,
  MAX_CONFIDENCE_BINS,
  MAX_LIVE_FEED_LIMIT,
  type ConfidenceBin,
  type FaultFrequency,
  type LiveFeedRow,
  type LocationCount,
  type SensorSeries,
  type SummaryStats,
} from './analytics.types.js';

const MS_PER_HOUR = 3_600_000;

type Snapshot = readonly Verdict[];

// ═══════════════════════════════════════════════════════════════
// COUNTS
// ═══════════════════════════════════════════════════════════════

function countBy(snapshot: Snapshot, key: (v: Verdict) => string): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const v of snapshot) {
    const k = key(v);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  // count desc, then name asc so equal counts keep a stable order
  return Array.from(counts.entries()).sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

export function faultFrequency(snapshot: Snapshot): FaultFrequency[] {
  return countBy(snapshot, (v) => v.fault_label).map(([label, count]) => ({ label, count }));
}

export function locationHistogram(snapshot: Snapshot): LocationCount[] {
  return countBy(snapshot, (v) => v.location ?? UNKNOWN_LOCATION).map(([location, count]) => ({
    location,
    count,
  }));
}

// ═══════════════════════════════════════════════════════════════
// DISTRIBUTIONS
// ═══════════════════════════════════════════════════════════════

/**
 * Equal-width bins over [0, 1]. The last bin is closed so 1.0 lands in it.
 */
export function confidenceDistribution(snapshot: Snapshot, bins = DEFAULT_CONFIDENCE_BINS): ConfidenceBin[] {
  if (!Number.isInteger(bins) || bins < 1 || bins > MAX_CONFIDENCE_BINS) {
    throw new ValidationError(`Bin count must be an integer in 1..${MAX_CONFIDENCE_BINS}, got ${bins}`);
  }

  const counts = new Array<number>(bins).fill(0);
  for (const v of snapshot) {
    const idx = Math.min(Math.floor(v.confidence * bins), bins - 1);
    counts[idx]++;
  }

  return counts.map((count, i) => ({
    lower: i / bins,
    upper: (i + 1) / bins,
    count,
  }));
}

// ═══════════════════════════════════════════════════════════════
// SENSOR TIME SERIES
// ═══════════════════════════════════════════════════════════════

export function sensorTimeSeries(snapshot: Snapshot, channel: string | undefined): SensorSeries {
  if (!isSensorChannel(channel)) {
    throw new UnknownSensorChannelError(channel, SENSOR_CHANNELS);
  }

  return {
    channel,
    points: snapshot.map((v) => ({ timestamp: v.timestamp, value: v.features[channel] })),
  };
}

// ═══════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════

export function summarize(snapshot: Snapshot): SummaryStats {
  if (snapshot.length === 0) {
    return { available: false, sampleCount: 0 };
  }

  let confidenceSum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of snapshot) {
    confidenceSum += v.confidence;
    const t = v.timestamp.getTime();
    if (t < min) min = t;
    if (t > max) max = t;
  }

  return {
    available: true,
    sampleCount: snapshot.length,
    meanConfidence: confidenceSum / snapshot.length,
    uptimeHours: (max - min) / MS_PER_HOUR,
    firstSeen: new Date(min),
    lastSeen: new Date(max),
  };
}

// ═══════════════════════════════════════════════════════════════
// LIVE FEED
// ═══════════════════════════════════════════════════════════════

export function formatConfidencePercent(confidence: number): string {
  return `${Math.round(confidence * 10_000) / 100}%`;
}

/**
 * First `limit` rows of the snapshot (newest first when the snapshot is)
 */
export function liveFeed(snapshot: Snapshot, limit = DEFAULT_LIVE_FEED_LIMIT): LiveFeedRow[] {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIVE_FEED_LIMIT) {
    throw new ValidationError(`Limit must be an integer in 1..${MAX_LIVE_FEED_LIMIT}, got ${limit}`);
  }

  return snapshot.slice(0, limit).map((v) => ({
    timestamp: v.timestamp,
    fault_label: v.fault_label,
    location: v.location ?? null,
    description: v.description ?? null,
    confidence: formatConfidencePercent(v.confidence),
    source_file: v.source_file,
  }));
}

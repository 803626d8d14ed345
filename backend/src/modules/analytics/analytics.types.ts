/**
 * ANALYTICS — Types
 */

import type { SensorChannel } from '../verdicts/contracts/verdict.types.js';

export interface FaultFrequency {
  label: string;
  count: number;
}

export interface ConfidenceBin {
  lower: number;
  upper: number;
  count: number;
}

export interface LocationCount {
  location: string;
  count: number;
}

export interface SensorPoint {
  timestamp: Date;
  value: number;
}

export interface SensorSeries {
  channel: SensorChannel;
  points: SensorPoint[];
}

/**
 * Empty snapshots report `available: false` rather than zeros or NaN
 */
export type SummaryStats =
  | { available: false; sampleCount: 0 }
  | {
      available: true;
      sampleCount: number;
      meanConfidence: number; // 0..1
      uptimeHours: number;
      firstSeen: Date;
      lastSeen: Date;
    };

export interface LiveFeedRow {
  timestamp: Date;
  fault_label: string;
  location: string | null;
  description: string | null;
  confidence: string; // "87.65%"
  source_file: string;
}

export const DEFAULT_CONFIDENCE_BINS = 20;
export const DEFAULT_LIVE_FEED_LIMIT = 15;
export const MAX_CONFIDENCE_BINS = 1000;
export const MAX_LIVE_FEED_LIMIT = 1000;

/**
 * Analytics engine tests
 */

import { describe, it, expect } from 'vitest';
import { UnknownSensorChannelError, ValidationError } from '../../../common/errors.js';
import type { Verdict } from '../../verdicts/contracts/verdict.types.js';
import { labelled, makeVerdict, T0 } from '../../verdicts/__tests__/verdict.fixtures.js';
import {
  confidenceDistribution,
  faultFrequency,
  formatConfidencePercent,
  liveFeed,
  locationHistogram,
  sensorTimeSeries,
  summarize,
} from '../analytics.service.js';

function mixedSnapshot(): Verdict[] {
  // fault1 ×3, fault2 ×1, normal ×6, interleaved
  const a = labelled('HB1_OVER_TEMP', 3, 0);
  const b = labelled('HB2_HIGH_SIDE_SC', 1, 10);
  const n = labelled('NORMAL_OP', 6, 20);
  return [n[0], a[0], n[1], b[0], n[2], a[1], n[3], n[4], a[2], n[5]];
}

describe('faultFrequency', () => {
  it('counts every label and sums to the sample count', () => {
    const snapshot = mixedSnapshot();

    const freq = faultFrequency(snapshot);

    expect(freq).toEqual([
      { label: 'NORMAL_OP', count: 6 },
      { label: 'HB1_OVER_TEMP', count: 3 },
      { label: 'HB2_HIGH_SIDE_SC', count: 1 },
    ]);
    expect(freq.reduce((s, f) => s + f.count, 0)).toBe(10);
    expect(summarize(snapshot).sampleCount).toBe(10);
  });

  it('is deterministic across call order and input order', () => {
    const snapshot = mixedSnapshot();
    const reversed = [...snapshot].reverse();

    expect(faultFrequency(reversed)).toEqual(faultFrequency(snapshot));
    expect(faultFrequency(snapshot)).toEqual(faultFrequency(snapshot));
    expect(locationHistogram(reversed)).toEqual(locationHistogram(snapshot));
    expect(summarize(reversed)).toEqual(summarize(snapshot));
  });

  it('breaks equal counts by label', () => {
    const snapshot = [...labelled('HB3_OVER_TEMP', 2), ...labelled('HB1_LOW_SIDE_SC', 2)];

    expect(faultFrequency(snapshot).map((f) => f.label)).toEqual(['HB1_LOW_SIDE_SC', 'HB3_OVER_TEMP']);
  });

  it('is empty for an empty snapshot', () => {
    expect(faultFrequency([])).toEqual([]);
  });
});

describe('confidenceDistribution', () => {
  it('buckets into equal-width bins with 1.0 in the last bin', () => {
    const snapshot = [0, 0.05, 0.5, 0.999, 1].map((confidence, i) => makeVerdict(i, { confidence }));

    expect(confidenceDistribution(snapshot, 4)).toEqual([
      { lower: 0, upper: 0.25, count: 2 },
      { lower: 0.25, upper: 0.5, count: 0 },
      { lower: 0.5, upper: 0.75, count: 1 },
      { lower: 0.75, upper: 1, count: 2 },
    ]);
  });

  it('defaults to 20 bins', () => {
    const bins = confidenceDistribution([makeVerdict(0, { confidence: 0.9 })]);

    expect(bins).toHaveLength(20);
    expect(bins[18].count).toBe(1);
  });

  it('rejects a non-positive bin count', () => {
    expect(() => confidenceDistribution([], 0)).toThrow(ValidationError);
    expect(() => confidenceDistribution([], NaN)).toThrow(ValidationError);
  });

  it('rejects a bin count above 1000', () => {
    expect(confidenceDistribution([], 1000)).toHaveLength(1000);
    expect(() => confidenceDistribution([], 1001)).toThrow('Bin count must be an integer in 1..1000, got 1001');
    expect(() => confidenceDistribution([], 5_000_000_000)).toThrow(ValidationError);
  });
});

describe('locationHistogram', () => {
  it('treats a missing location as its own category', () => {
    const snapshot = [
      makeVerdict(0, { location: 'line-1' }),
      makeVerdict(1),
      makeVerdict(2, { location: 'line-1' }),
      makeVerdict(3),
      makeVerdict(4, { location: 'line-2' }),
      makeVerdict(5),
    ];

    expect(locationHistogram(snapshot)).toEqual([
      { location: 'unknown', count: 3 },
      { location: 'line-1', count: 2 },
      { location: 'line-2', count: 1 },
    ]);
  });
});

describe('sensorTimeSeries', () => {
  it('keeps the snapshot order', () => {
    const snapshot = [
      makeVerdict(2, { features: { Ia: 1, Ib: 2, VDC: 47.5, IDC: 5, T1: 38, T2: 39, T3: 40, VD: 0.7 } }),
      makeVerdict(1, { features: { Ia: 1, Ib: 2, VDC: 48.25, IDC: 5, T1: 38, T2: 39, T3: 40, VD: 0.7 } }),
    ];

    expect(sensorTimeSeries(snapshot, 'VDC')).toEqual({
      channel: 'VDC',
      points: [
        { timestamp: new Date(T0 + 2 * 60_000), value: 47.5 },
        { timestamp: new Date(T0 + 60_000), value: 48.25 },
      ],
    });
  });

  it('rejects an unknown channel instead of returning an empty series', () => {
    expect(() => sensorTimeSeries([makeVerdict(0)], 'RPM')).toThrow(UnknownSensorChannelError);
  });

  it('rejects a missing channel selection', () => {
    expect(() => sensorTimeSeries([makeVerdict(0)], undefined)).toThrow('Sensor channel is required');
  });
});

describe('summarize', () => {
  it('reports unavailable for an empty snapshot', () => {
    expect(summarize([])).toEqual({ available: false, sampleCount: 0 });
  });

  it('reports zero uptime for a single sample', () => {
    const summary = summarize([makeVerdict(7, { confidence: 0.8 })]);

    expect(summary).toEqual({
      available: true,
      sampleCount: 1,
      meanConfidence: 0.8,
      uptimeHours: 0,
      firstSeen: new Date(T0 + 7 * 60_000),
      lastSeen: new Date(T0 + 7 * 60_000),
    });
  });

  it('measures uptime between the earliest and latest timestamps', () => {
    const spanMs = 2.5 * 3_600_000;
    const ordered = Array.from({ length: 50 }, (_, i) =>
      makeVerdict(0, { timestamp: new Date(T0 + Math.round((i * spanMs) / 49)) }),
    );
    // arrival order unrelated to time
    const snapshot = [...ordered.slice(25), ...ordered.slice(0, 25).reverse()];

    const summary = summarize(snapshot);

    expect(summary.available).toBe(true);
    if (!summary.available) return;
    expect(summary.sampleCount).toBe(50);
    expect(summary.uptimeHours).toBe(2.5);
    expect(summary.uptimeHours.toFixed(2)).toBe('2.50');
  });

  it('averages confidence over the snapshot', () => {
    const snapshot = [0.6, 0.8, 1].map((confidence, i) => makeVerdict(i, { confidence }));

    const summary = summarize(snapshot);

    expect(summary.available && summary.meanConfidence).toBeCloseTo(0.8, 10);
  });
});

describe('liveFeed', () => {
  it('takes the first rows and formats confidence as a percentage', () => {
    const snapshot = Array.from({ length: 20 }, (_, i) => makeVerdict(20 - i, { confidence: 0.87654 }));

    const rows = liveFeed(snapshot);

    expect(rows).toHaveLength(15);
    expect(rows[0]).toEqual({
      timestamp: new Date(T0 + 20 * 60_000),
      fault_label: 'NORMAL_OP',
      location: null,
      description: null,
      confidence: '87.65%',
      source_file: 'NORMAL_OP.csv',
    });
  });

  it('honours a custom limit', () => {
    expect(liveFeed(mixedSnapshot(), 3)).toHaveLength(3);
    expect(() => liveFeed(mixedSnapshot(), 0)).toThrow(ValidationError);
    expect(liveFeed(mixedSnapshot(), 1000)).toHaveLength(10);
    expect(() => liveFeed(mixedSnapshot(), 1001)).toThrow(ValidationError);
  });
});

describe('formatConfidencePercent', () => {
  it('rounds to two decimals', () => {
    expect(formatConfidencePercent(0.9)).toBe('90%');
    expect(formatConfidencePercent(1)).toBe('100%');
    expect(formatConfidencePercent(0.5)).toBe('50%');
    expect(formatConfidencePercent(0.87654)).toBe('87.65%');
  });
});

/**
 * Report compiler tests
 */

import { describe, it, expect } from 'vitest';
import { makeVerdict } from '../../verdicts/__tests__/verdict.fixtures.js';
import { compileReport, formatTimestamp, reportFileName } from '../report.compiler.js';

const NOW = new Date(Date.UTC(2026, 2, 5, 7, 4, 9));

describe('compileReport', () => {
  it('renders the header and a no-data line for an empty snapshot', () => {
    const report = compileReport([], NOW);

    expect(report.blocks).toEqual([
      { kind: 'title', text: 'Motor Drive Fault Diagnosis Report' },
      { kind: 'spacer', height: 12 },
      { kind: 'paragraph', text: 'Generated: 2026-03-05 07:04:09' },
      { kind: 'spacer', height: 12 },
      { kind: 'paragraph', text: 'No data available.' },
    ]);
  });

  it('renders totals, confidence, uptime and the fault table', () => {
    const snapshot = [
      makeVerdict(90, { fault_label: 'HB1_OVER_TEMP', confidence: 0.8 }),
      makeVerdict(30, { fault_label: 'NORMAL_OP', confidence: 0.85 }),
      makeVerdict(0, { fault_label: 'HB1_OVER_TEMP', confidence: 0.9 }),
    ];

    const report = compileReport(snapshot, NOW);

    expect(report.blocks.slice(4)).toEqual([
      { kind: 'paragraph', text: 'Total Samples Processed: 3' },
      { kind: 'paragraph', text: 'Average Confidence: 85.00%' },
      { kind: 'paragraph', text: 'System Uptime: 1.50 hours' },
      { kind: 'spacer', height: 12 },
      {
        kind: 'table',
        rows: [
          ['Fault', 'Count'],
          ['HB1_OVER_TEMP', 2],
          ['NORMAL_OP', 1],
        ],
      },
      { kind: 'spacer', height: 12 },
    ]);
  });

  it('carries document metadata', () => {
    const report = compileReport([], NOW);

    expect(report.title).toBe('Motor Drive Fault Diagnosis Report');
    expect(report.pageSize).toBe('A4');
    expect(report.generatedAt).toBe('2026-03-05T07:04:09.000Z');
    expect(report.fileName).toBe('fault_report_20260305_070409.json');
  });

  it('reports zero uptime for a single sample', () => {
    const report = compileReport([makeVerdict(0, { confidence: 1 })], NOW);

    expect(report.blocks).toContainEqual({ kind: 'paragraph', text: 'System Uptime: 0.00 hours' });
    expect(report.blocks).toContainEqual({ kind: 'paragraph', text: 'Average Confidence: 100.00%' });
  });
});

describe('timestamps', () => {
  it('formats in UTC with zero padding', () => {
    const d = new Date(Date.UTC(2027, 11, 31, 23, 59, 58));

    expect(formatTimestamp(d)).toBe('2027-12-31 23:59:58');
    expect(reportFileName(d)).toBe('fault_report_20271231_235958.json');
  });
});

/**
 * REPORT COMPILER
 *
 * Title → generation time → either "No data available." or
 * totals, mean confidence, uptime and the fault count table.
 */

import { faultFrequency, summarize } from '../analytics/analytics.service.js';
import type { Verdict } from '../verdicts/contracts/verdict.types.js';
import { REPORT_TITLE, type ReportBlock, type ReportDocument } from './report.types.js';

const SPACER: ReportBlock = { kind: 'spacer', height: 12 };

const pad = (n: number) => String(n).padStart(2, '0');

/** YYYY-MM-DD HH:MM:SS in UTC */
export function formatTimestamp(d: Date): string {
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

export function reportFileName(d: Date): string {
  const stamp =
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
  return `fault_report_${stamp}.json`;
}

export function compileReport(snapshot: readonly Verdict[], now: Date): ReportDocument {
  const blocks: ReportBlock[] = [
    { kind: 'title', text: REPORT_TITLE },
    SPACER,
    { kind: 'paragraph', text: `Generated: ${formatTimestamp(now)}` },
    SPACER,
  ];

  const summary = summarize(snapshot);
  if (!summary.available) {
    blocks.push({ kind: 'paragraph', text: 'No data available.' });
  } else {
    blocks.push(
      { kind: 'paragraph', text: `Total Samples Processed: ${summary.sampleCount}` },
      { kind: 'paragraph', text: `Average Confidence: ${(summary.meanConfidence * 100).toFixed(2)}%` },
      { kind: 'paragraph', text: `System Uptime: ${summary.uptimeHours.toFixed(2)} hours` },
      SPACER,
      {
        kind: 'table',
        rows: [['Fault', 'Count'], ...faultFrequency(snapshot).map((f) => [f.label, f.count])],
      },
      SPACER,
    );
  }

  return {
    title: REPORT_TITLE,
    pageSize: 'A4',
    generatedAt: now.toISOString(),
    fileName: reportFileName(now),
    blocks,
  };
}

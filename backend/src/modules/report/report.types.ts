/**
 * REPORT — Document contract
 *
 * A passive document handed to whatever renders it. Blocks are in reading order;
 * layout belongs to the renderer.
 */

export type ReportBlock =
  | { kind: 'title'; text: string }
  | { kind: 'paragraph'; text: string }
  | { kind: 'spacer'; height: number }
  | { kind: 'table'; rows: Array<Array<string | number>> };

export interface ReportDocument {
  title: string;
  pageSize: 'A4';
  generatedAt: string; // ISO-8601, wall clock of compilation
  fileName: string;
  blocks: ReportBlock[];
}

export const REPORT_TITLE = 'Motor Drive Fault Diagnosis Report';

/**
 * FAULT CORPUS — Types
 *
 * One reference dataset per fault condition. Rows hold the 8 sensor channels;
 * the fault-indicator column (FDD) is read from disk but never kept.
 */

import { FAULT_LABELS, type FaultLabel, type SensorFeatures } from '../verdicts/contracts/verdict.types.js';

export type SensorReading = Readonly<SensorFeatures>;

export interface FaultClassDataset {
  readonly name: string;   // file name, e.g. HB1_OVER_TEMP.csv
  readonly label: FaultLabel;
  readonly rows: ReadonlyArray<SensorReading>;
}

export type CorpusDatasets = ReadonlyMap<string, FaultClassDataset>;

export interface CorpusEntry {
  file: string;
  label: FaultLabel;
}

export interface CorpusLoadFailure {
  file: string;
  reason: string;
}

export interface CorpusLoadResult {
  datasets: CorpusDatasets;
  failures: CorpusLoadFailure[];
}

/**
 * One CSV per label, named after it
 */
export const DEFAULT_CORPUS: readonly CorpusEntry[] = FAULT_LABELS.map((label) => ({
  file: `${label}.csv`,
  label,
}));

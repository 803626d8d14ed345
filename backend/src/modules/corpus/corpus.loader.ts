/**
 * Fault Corpus Loader - startup only
 *
 * Reads the reference CSVs from a local directory into memory once.
 * A missing or corrupt file is logged and skipped; the caller decides
 * whether an empty result is fatal.
 *
 * Expected header: Ia,Ib,VDC,IDC,T1,T2,T3,VD,FDD
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { errorMessage } from '../../common/errors.js';
import { defaultLogger, type Logger } from '../../common/host.deps.js';
import { SENSOR_CHANNELS, type SensorFeatures } from '../verdicts/contracts/verdict.types.js';
import {
  DEFAULT_CORPUS,
  type CorpusEntry,
  type CorpusLoadFailure,
  type CorpusLoadResult,
  type FaultClassDataset,
  type SensorReading,
} from './corpus.types.js';

const CsvRecordsSchema = z.array(z.record(z.string()));

export function loadCorpus(
  dir: string,
  entries: readonly CorpusEntry[] = DEFAULT_CORPUS,
  logger: Logger = defaultLogger,
): CorpusLoadResult {
  const datasets = new Map<string, FaultClassDataset>();
  const failures: CorpusLoadFailure[] = [];

  for (const entry of entries) {
    const filePath = path.resolve(dir, entry.file);
    try {
      const rows = readDatasetFile(filePath);
      datasets.set(entry.file, Object.freeze({ name: entry.file, label: entry.label, rows }));
      logger.info({ file: entry.file, rows: rows.length }, '[Corpus] Loaded dataset');
    } catch (err) {
      const reason = errorMessage(err);
      failures.push({ file: entry.file, reason });
      logger.error({ file: entry.file, reason }, '[Corpus] Failed to load dataset');
    }
  }

  logger.info({ loaded: datasets.size, failed: failures.length }, '[Corpus] Load complete');
  return { datasets, failures };
}

/**
 * Parse one reference file. Throws on anything that would make a sample unusable.
 */
export function readDatasetFile(filePath: string): ReadonlyArray<SensorReading> {
  const raw = fs.readFileSync(filePath, 'utf-8');

  const parsed: unknown = parse(raw, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  const records = CsvRecordsSchema.parse(parsed);

  if (records.length === 0) {
    throw new Error('Dataset has no rows');
  }

  const header = Object.keys(records[0]);
  const missing = SENSOR_CHANNELS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`Missing sensor columns: ${missing.join(', ')}`);
  }

  return Object.freeze(records.map((record, i) => Object.freeze(toReading(record, i + 2))));
}

function toReading(record: Record<string, string>, line: number): SensorFeatures {
  const value = (channel: (typeof SENSOR_CHANNELS)[number]): number => {
    const cell = record[channel];
    const num = cell === undefined || cell === '' ? NaN : Number(cell);
    if (!Number.isFinite(num)) {
      throw new Error(`Non-numeric ${channel} value "${cell ?? ''}" on line ${line}`);
    }
    return num;
  };

  return {
    Ia: value('Ia'),
    Ib: value('Ib'),
    VDC: value('VDC'),
    IDC: value('IDC'),
    T1: value('T1'),
    T2: value('T2'),
    T3: value('T3'),
    VD: value('VD'),
  };
}

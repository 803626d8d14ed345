/**
 * Fault Corpus Loader Tests
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Logger } from '../../../common/host.deps.js';
import { loadCorpus, readDatasetFile } from '../corpus.loader.js';
import { DEFAULT_CORPUS, type CorpusEntry } from '../corpus.types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURES = path.resolve(__dirname, 'fixtures');

const createMockLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('loadCorpus', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('loads every readable dataset with its label', () => {
    const entries: CorpusEntry[] = [
      { file: 'A.csv', label: 'NORMAL_OP' },
      { file: 'B.csv', label: 'HB1_OVER_TEMP' },
    ];

    const { datasets, failures } = loadCorpus(FIXTURES, entries, logger);

    expect(failures).toEqual([]);
    expect(Array.from(datasets.keys())).toEqual(['A.csv', 'B.csv']);
    expect(datasets.get('A.csv')?.label).toBe('NORMAL_OP');
    expect(datasets.get('A.csv')?.rows).toHaveLength(3);
    expect(datasets.get('B.csv')?.rows).toHaveLength(2);
  });

  it('keeps the 8 sensor channels and drops the fault indicator', () => {
    const { datasets } = loadCorpus(FIXTURES, [{ file: 'B.csv', label: 'HB1_OVER_TEMP' }], logger);

    expect(datasets.get('B.csv')?.rows[1]).toEqual({
      Ia: -3.125,
      Ib: 7.75,
      VDC: 47.7,
      IDC: 4.95,
      T1: 83.4,
      T2: 38.3,
      T3: 39.1,
      VD: 0.709,
    });
  });

  it('skips corrupt and missing files and keeps loading the rest', () => {
    const entries: CorpusEntry[] = [
      { file: 'BROKEN.csv', label: 'HB2_HIGH_SIDE_SC' },
      { file: 'A.csv', label: 'NORMAL_OP' },
      { file: 'MISSING.csv', label: 'HB3_OVER_TEMP' },
      { file: 'NO_CHANNELS.csv', label: 'HB2_HIGH_SIDE_OC' },
      { file: 'BAD_VALUE.csv', label: 'HB3_LOW_SIDE_OC' },
      { file: 'EMPTY.csv', label: 'HB12_OVER_TEMP' },
      { file: 'B.csv', label: 'HB1_OVER_TEMP' },
    ];

    const { datasets, failures } = loadCorpus(FIXTURES, entries, logger);

    expect(Array.from(datasets.keys())).toEqual(['A.csv', 'B.csv']);
    expect(failures.map((f) => f.file)).toEqual([
      'BROKEN.csv',
      'MISSING.csv',
      'NO_CHANNELS.csv',
      'BAD_VALUE.csv',
      'EMPTY.csv',
    ]);
    expect(failures[0].reason).toMatch(/Invalid Record Length/);
    expect(failures[1].reason).toMatch(/ENOENT/);
    expect(failures[2].reason).toBe('Missing sensor columns: VDC, IDC, T1, T2, T3, VD');
    expect(failures[3].reason).toBe('Non-numeric T2 value "n/a" on line 3');
    expect(failures[4].reason).toBe('Dataset has no rows');
    expect(logger.error).toHaveBeenCalledTimes(5);
  });

  it('returns an empty map when nothing loads', () => {
    const { datasets, failures } = loadCorpus(path.join(FIXTURES, 'nowhere'), DEFAULT_CORPUS, logger);

    expect(datasets.size).toBe(0);
    expect(failures).toHaveLength(DEFAULT_CORPUS.length);
  });
});

describe('readDatasetFile', () => {
  it('returns frozen rows', () => {
    const rows = readDatasetFile(path.join(FIXTURES, 'A.csv'));

    expect(Object.isFrozen(rows)).toBe(true);
    expect(Object.isFrozen(rows[0])).toBe(true);
    expect(rows[2]).toEqual({ Ia: 2, Ib: -1, VDC: 48, IDC: 5, T1: 38.7, T2: 39.2, T3: 38.7, VD: 0.7 });
  });
});

describe('DEFAULT_CORPUS', () => {
  it('maps each fault label to a CSV named after it', () => {
    expect(DEFAULT_CORPUS).toHaveLength(9);
    expect(DEFAULT_CORPUS[0]).toEqual({ file: 'NORMAL_OP.csv', label: 'NORMAL_OP' });
  });
});

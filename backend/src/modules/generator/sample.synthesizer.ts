/**
 * SAMPLE SYNTHESIZER
 * ==================
 *
 * Draws a fault class uniformly, then a row uniformly within it, and packages
 * the row as a verdict input. No timestamp: the store assigns it on write.
 *
 * Random draws, in order: dataset, row, confidence.
 */

import { CorpusEmptyError } from '../../common/errors.js';
import type { CorpusDatasets } from '../corpus/corpus.types.js';
import { parseVerdictInput, type VerdictInput } from '../verdicts/contracts/verdict.types.js';

/**
 * Uniform source in [0, 1)
 */
export type RandomSource = () => number;

export interface SynthesizerOptions {
  random?: RandomSource;
  confidenceFloor?: number; // lower bound of the emitted confidence band
  location?: string;
}

export interface SynthesizedSample {
  verdict: VerdictInput;
  rowIndex: number;
}

export function pickIndex(random: RandomSource, size: number): number {
  return Math.min(Math.floor(random() * size), size - 1);
}

export class SampleSynthesizer {
  private readonly random: RandomSource;
  private readonly confidenceFloor: number;
  private readonly location?: string;

  constructor(options: SynthesizerOptions = {}) {
    this.random = options.random ?? Math.random;
    this.confidenceFloor = options.confidenceFloor ?? 0.75;
    this.location = options.location;
  }

  synthesize(datasets: CorpusDatasets): SynthesizedSample {
    const pool = Array.from(datasets.values()).filter((d) => d.rows.length > 0);
    if (pool.length === 0) {
      throw new CorpusEmptyError([]);
    }

    const dataset = pool[pickIndex(this.random, pool.length)];
    const rowIndex = pickIndex(this.random, dataset.rows.length);
    const row = dataset.rows[rowIndex];
    const confidence = this.confidenceFloor + this.random() * (1 - this.confidenceFloor);

    const verdict = parseVerdictInput({
      fault_label: dataset.label,
      ...(this.location ? { location: this.location } : {}),
      confidence,
      description: `Synthetic sample from ${dataset.name} row ${rowIndex}`,
      source_file: dataset.name,
      features: {
        Ia: row.Ia,
        Ib: row.Ib,
        VDC: row.VDC,
        IDC: row.IDC,
        T1: row.T1,
        T2: row.T2,
        T3: row.T3,
        VD: row.VD,
      },
    });

    return { verdict, rowIndex };
  }
}

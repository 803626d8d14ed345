/**
 * INGESTION APPENDER
 * ==================
 *
 * Single-writer loop: synthesize → append → audit line → sleep.
 *
 * - A rejected append is logged and the loop carries on; the next cycle is the retry.
 * - stop() cuts the sleep short. An append already in flight completes first,
 *   so a record is either fully submitted or never sent.
 */

import { AppError, CorpusEmptyError, errorMessage } from '../../common/errors.js';
import { defaultLogger, type Logger } from '../../common/host.deps.js';
import type { CorpusDatasets } from '../corpus/corpus.types.js';
import type { VerdictStore } from '../verdicts/storage/verdict.store.port.js';
import type { SampleSynthesizer } from './sample.synthesizer.js';

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

/**
 * setTimeout that resolves early when the signal aborts
 */
export const abortableSleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

export interface AppenderOptions {
  intervalMs: number;
  logger?: Logger;
  sleep?: Sleeper;
}

export interface AppenderRunResult {
  iterations: number;
  submitted: number;
  failed: number;
}

export class IngestionAppender {
  private controller = new AbortController();
  private running = false;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;

  constructor(
    private readonly store: VerdictStore,
    private readonly synthesizer: SampleSynthesizer,
    private readonly options: AppenderOptions,
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(datasets: CorpusDatasets): Promise<AppenderRunResult> {
    if (this.running) {
      throw new AppError('APPENDER_RUNNING', 'Appender loop is already running', 409);
    }
    if (datasets.size === 0) {
      throw new CorpusEmptyError([]);
    }

    this.running = true;
    const signal = this.controller.signal;
    const result: AppenderRunResult = { iterations: 0, submitted: 0, failed: 0 };

    this.logger.info(
      { intervalMs: this.options.intervalMs, datasets: datasets.size },
      '[Appender] Starting data stream',
    );

    try {
      while (!signal.aborted) {
        result.iterations++;

        try {
          const { verdict } = this.synthesizer.synthesize(datasets);
          await this.store.append(verdict);
          result.submitted++;
          this.logger.info(
            {
              count: result.submitted,
              fault: verdict.fault_label,
              Ia: verdict.features.Ia.toFixed(2),
              Ib: verdict.features.Ib.toFixed(2),
              VDC: verdict.features.VDC.toFixed(2),
            },
            `[Appender] #${result.submitted} pushed sample from ${verdict.source_file}`,
          );
        } catch (err) {
          result.failed++;
          this.logger.error(
            { iteration: result.iterations, err: errorMessage(err) },
            '[Appender] Append failed, continuing',
          );
        }

        if (signal.aborted) break;
        await this.sleep(this.options.intervalMs, signal);
      }
    } finally {
      this.running = false;
      this.controller = new AbortController();
    }

    this.logger.info(result, `[Appender] Data stream stopped. Total samples sent: ${result.submitted}`);
    return result;
  }

  /**
   * Request a clean stop; the current iteration finishes first
   */
  stop(): void {
    this.controller.abort();
  }
}

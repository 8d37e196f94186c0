import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import path from 'path';
import { jobLogger } from './logger.js';
import { readTable, writeTable } from './csv.js';
import { ID_COLUMN, KEY_COLUMN, planTargetColumns, selectSourceColumn, type TargetColumn } from './columns.js';
import {
  CancelledError,
  IOError,
  TransientNetworkError,
  TranslationJobError,
  UnsupportedLanguageError,
  ValidationError,
  errorMessage,
  isCellFailureKind,
} from './errors.js';
import { isUntranslatable } from './placeholders.js';
import { DEFAULT_RETRY_OPTIONS, withRetry, type RetryOptions } from './retry.js';
import type {
  CellFailure,
  JobEvents,
  JobOutcome,
  JobState,
  JobSummary,
  Table,
  TextTranslator,
  TranslationJob,
} from './types/translation.types.js';

export interface JobDependencies {
  translator: TextTranslator;
  retry?: Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'maxDelayMs' | 'multiplier'>;
}

interface CellUnit {
  rowIndex: number;
  targetIndex: number;
  target: TargetColumn;
}

interface CellCounters {
  translatedCells: number;
  skippedCells: number;
  failures: Array<CellFailure & { targetIndex: number }>;
}

interface NormalizedJob {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly sourceLang: string;
  readonly targetLangs: readonly string[];
  readonly credential: string;
  readonly overwriteExisting: boolean;
  readonly concurrency: number;
}

function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError(`${field} is required`);
  }
  return value.trim();
}

/**
 * Check a job before any file or network access
 */
export function validateJob(job: TranslationJob): NormalizedJob {
  const inputPath = requireText(job.inputPath, 'inputPath');
  const outputPath = requireText(job.outputPath, 'outputPath');
  const sourceLang = requireText(job.sourceLang, 'sourceLang');
  const credential = requireText(job.credential, 'credential');

  if (path.resolve(inputPath) === path.resolve(outputPath)) {
    throw new ValidationError('outputPath must differ from inputPath');
  }

  if (!Array.isArray(job.targetLangs) || job.targetLangs.length === 0) {
    throw new ValidationError('At least one target language is required');
  }

  const targetLangs: string[] = [];
  const seen = new Set<string>();
  for (const value of job.targetLangs) {
    const language = requireText(value, 'targetLangs[]');
    const normalized = language.toLowerCase();
    if (language === KEY_COLUMN || language === ID_COLUMN) {
      throw new ValidationError(`'${language}' is a reserved column, not a language`);
    }
    if (normalized === sourceLang.toLowerCase()) {
      throw new ValidationError(`Target language '${language}' is the source language`);
    }
    if (seen.has(normalized)) {
      throw new ValidationError(`Target language '${language}' is listed twice`);
    }
    seen.add(normalized);
    targetLangs.push(language);
  }

  const concurrency = job.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError('concurrency must be a positive integer');
  }

  return Object.freeze({
    inputPath,
    outputPath,
    sourceLang,
    targetLangs: Object.freeze(targetLangs),
    credential,
    overwriteExisting: job.overwriteExisting ?? true,
    concurrency,
  });
}

function emptyFailureCounts(): JobSummary['failuresByKind'] {
  return {
    RateLimitError: 0,
    TransientNetworkError: 0,
    UnsupportedLanguageError: 0,
  };
}

function asJobError(error: unknown, inputPath: string): TranslationJobError {
  if (error instanceof TranslationJobError) {
    return error;
  }
  // Anything else escaped from file handling
  return new IOError(errorMessage(error), inputPath, error);
}

/**
 * One translation run over one CSV file.
 *
 * Lifecycle: idle -> running -> completed | failed | cancelled. Events are delivered
 * asynchronously so listeners never hold up the run; `finished` settles after the
 * terminal event has been emitted and never rejects.
 */
export class TranslationJobHandle {
  readonly id: string = randomUUID();
  readonly finished: Promise<JobOutcome>;

  private readonly log = jobLogger(this.id);

  private readonly emitter = new EventEmitter();
  private readonly stop = new AbortController();
  private readonly resolveFinished: (outcome: JobOutcome) => void;
  private readonly memo = new Map<string, Promise<string>>();
  private readonly disabledLanguages = new Map<string, UnsupportedLanguageError>();
  private currentState: JobState = 'idle';
  private cancelRequested = false;
  // Set once the output is being written; the job can no longer be cancelled
  private committing = false;
  private fatalError: TranslationJobError | null = null;
  private rowsDone = 0;
  private rowsTotal = 0;

  constructor(
    readonly job: TranslationJob,
    private readonly deps: JobDependencies
  ) {
    let resolve: (outcome: JobOutcome) => void = () => undefined;
    this.finished = new Promise<JobOutcome>((res) => {
      resolve = res;
    });
    this.resolveFinished = resolve;
  }

  get state(): JobState {
    return this.currentState;
  }

  get progress(): { rowsDone: number; rowsTotal: number } {
    return { rowsDone: this.rowsDone, rowsTotal: this.rowsTotal };
  }

  on<E extends keyof JobEvents>(event: E, listener: (...args: JobEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof JobEvents>(event: E, listener: (...args: JobEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof JobEvents>(event: E, listener: (...args: JobEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Request cooperative cancellation. In-flight calls finish first.
   * Returns false when the job has already ended or is writing its output.
   */
  cancel(): boolean {
    if (this.committing || (this.currentState !== 'idle' && this.currentState !== 'running')) {
      return false;
    }
    if (!this.cancelRequested) {
      this.log.info('Cancellation requested');
      this.cancelRequested = true;
      this.stop.abort();
    }
    return true;
  }

  start(): this {
    if (this.currentState !== 'idle') {
      throw new Error(`Job ${this.id} has already been started`);
    }
    this.run().catch((error: unknown) => {
      this.log.error('Translation job crashed', { error: errorMessage(error) });
    });
    return this;
  }

  private emitAsync<E extends keyof JobEvents>(event: E, ...args: JobEvents[E]): void {
    setImmediate(() => {
      this.emitter.emit(event, ...args);
    });
  }

  private finish(outcome: JobOutcome): void {
    this.currentState = outcome.status;
    setImmediate(() => {
      switch (outcome.status) {
        case 'completed':
          this.emitter.emit('completed', outcome.summary);
          break;
        case 'failed':
          this.emitter.emit('failed', outcome.error);
          break;
        case 'cancelled':
          this.emitter.emit('cancelled');
          break;
      }
      this.resolveFinished(outcome);
    });
  }

  private throwIfCancelled(): void {
    if (this.cancelRequested) {
      throw new CancelledError();
    }
  }

  private async run(): Promise<void> {
    const startTime = Date.now();
    let job: NormalizedJob;

    try {
      job = validateJob(this.job);
    } catch (error) {
      const jobError = asJobError(error, this.job.inputPath);
      this.log.error('Translation job rejected', { error: jobError.message });
      this.finish({ status: 'failed', error: jobError });
      return;
    }

    this.currentState = 'running';

    try {
      this.throwIfCancelled();
      this.log.info('Translation job started', {
        inputPath: job.inputPath,
        outputPath: job.outputPath,
        sourceLang: job.sourceLang,
        targetLangs: job.targetLangs,
      });

      const table = await readTable(job.inputPath, { sourceLang: job.sourceLang });
      this.throwIfCancelled();

      const sourceColumn = selectSourceColumn(table, job.sourceLang);
      const targets = planTargetColumns(table, sourceColumn, [...job.targetLangs]);

      await this.verifyCredential(job.credential);
      this.throwIfCancelled();

      this.rowsTotal = table.rows.length;
      this.emitAsync('progress', 0, this.rowsTotal);

      const counters = await this.translateTable(job, table, sourceColumn, targets);
      this.throwIfCancelled();

      this.committing = true;
      await writeTable(job.outputPath, table);

      const failures = counters.failures
        .sort((a, b) => a.rowIndex - b.rowIndex || a.targetIndex - b.targetIndex)
        .map(({ targetIndex: _targetIndex, ...failure }) => failure);
      const failuresByKind = emptyFailureCounts();
      for (const failure of failures) {
        failuresByKind[failure.kind]++;
      }

      const summary: JobSummary = {
        inputPath: job.inputPath,
        outputPath: job.outputPath,
        rows: table.rows.length,
        translatedCells: counters.translatedCells,
        failedCells: failures.length,
        skippedCells: counters.skippedCells,
        failuresByKind,
        failures,
        durationMs: Date.now() - startTime,
      };

      this.log.info('Translation job completed', {
        duration: `${(summary.durationMs / 1000).toFixed(2)}s`,
        rows: summary.rows,
        translatedCells: summary.translatedCells,
        failedCells: summary.failedCells,
        skippedCells: summary.skippedCells,
      });
      this.finish({ status: 'completed', summary });
    } catch (error) {
      if (error instanceof CancelledError) {
        this.log.warn('Translation job cancelled', { rowsDone: this.rowsDone });
        this.finish({ status: 'cancelled' });
        return;
      }

      const jobError = asJobError(error, job.inputPath);
      this.log.error('Translation job failed', {
        kind: jobError.kind,
        error: jobError.message,
      });
      this.finish({ status: 'failed', error: jobError });
    }
  }

  /**
   * Only a rejected key stops the job here; a flaky check is left to the per-cell retries
   */
  private async verifyCredential(credential: string): Promise<void> {
    try {
      await this.deps.translator.verifyCredential(credential);
    } catch (error) {
      if (error instanceof TranslationJobError && error.kind === 'AuthError') {
        throw error;
      }
      this.log.warn('Credential check failed, continuing', { error: errorMessage(error) });
    }
  }

  private async translateTable(
    job: NormalizedJob,
    table: Table,
    sourceColumn: string,
    targets: TargetColumn[]
  ): Promise<CellCounters> {
    const counters: CellCounters = { translatedCells: 0, skippedCells: 0, failures: [] };
    const units: CellUnit[] = [];
    table.rows.forEach((_row, rowIndex) => {
      targets.forEach((target, targetIndex) => units.push({ rowIndex, targetIndex, target }));
    });

    const remainingPerRow = table.rows.map(() => targets.length);
    let nextUnit = 0;

    const worker = async (): Promise<void> => {
      while (!this.stop.signal.aborted) {
        const unit = units[nextUnit++];
        if (!unit) {
          return;
        }

        try {
          await this.translateCell(job, table, sourceColumn, unit, counters);
        } catch (error) {
          this.fatalError ??= asJobError(error, job.inputPath);
          this.stop.abort();
          return;
        }

        remainingPerRow[unit.rowIndex]--;
        if (remainingPerRow[unit.rowIndex] === 0) {
          this.rowsDone++;
          this.log.debug(`Row ${this.rowsDone}/${this.rowsTotal} done`);
          this.emitAsync('progress', this.rowsDone, this.rowsTotal);
        }
      }
    };

    const poolSize = Math.max(1, Math.min(job.concurrency, units.length));
    await Promise.all(Array.from({ length: poolSize }, () => worker()));

    if (this.fatalError) {
      throw this.fatalError;
    }
    this.throwIfCancelled();
    return counters;
  }

  private async translateCell(
    job: NormalizedJob,
    table: Table,
    sourceColumn: string,
    unit: CellUnit,
    counters: CellCounters
  ): Promise<void> {
    const row = table.rows[unit.rowIndex];
    const { language, column } = unit.target;
    const sourceText = row[sourceColumn] ?? '';
    const current = row[column] ?? '';

    if (!job.overwriteExisting && current.trim()) {
      counters.skippedCells++;
      return;
    }

    if (!sourceText.trim()) {
      row[column] = '';
      counters.skippedCells++;
      return;
    }

    if (isUntranslatable(sourceText)) {
      counters.skippedCells++;
      return;
    }

    const key = row[KEY_COLUMN] ?? '';
    const recordFailure = (error: TranslationJobError): void => {
      if (!isCellFailureKind(error.kind)) {
        throw error;
      }
      counters.failures.push({
        rowIndex: unit.rowIndex,
        targetIndex: unit.targetIndex,
        key,
        targetLang: language,
        kind: error.kind,
        message: error.message,
      });
    };

    const disabled = this.disabledLanguages.get(language);
    if (disabled) {
      recordFailure(disabled);
      return;
    }

    try {
      const translated = await this.translateText(job, sourceText, language);
      row[column] = translated;
      counters.translatedCells++;
      this.log.debug('Cell translated', { key, targetLang: language });
    } catch (error) {
      const cellError = error instanceof TranslationJobError
        ? error
        : new TransientNetworkError(errorMessage(error), { cause: error, retryable: false });

      if (cellError instanceof UnsupportedLanguageError && !this.disabledLanguages.has(language)) {
        this.log.warn(`Target language '${language}' disabled for this job`, { error: cellError.message });
        this.disabledLanguages.set(language, cellError);
      } else if (isCellFailureKind(cellError.kind)) {
        this.log.warn('Cell translation failed', {
          key,
          targetLang: language,
          kind: cellError.kind,
          error: cellError.message,
        });
      }

      recordFailure(cellError);
    }
  }

  /**
   * Identical (text, language) pairs share one call per job
   */
  private translateText(job: NormalizedJob, text: string, targetLang: string): Promise<string> {
    const memoKey = `${targetLang}\u0000${text}`;
    const cached = this.memo.get(memoKey);
    if (cached) {
      return cached;
    }

    const retry = { ...DEFAULT_RETRY_OPTIONS, ...this.deps.retry };
    const pending = withRetry(
      () => this.deps.translator.translate({
        text,
        sourceLang: job.sourceLang,
        targetLang,
        credential: job.credential,
      }),
      {
        ...retry,
        signal: this.stop.signal,
        onRetry: (attempt, error, delayMs) => {
          this.log.warn(`Translation retry ${attempt}/${retry.maxAttempts - 1} after ${delayMs}ms`, {
            targetLang,
            error: errorMessage(error),
          });
        },
      }
    );

    this.memo.set(memoKey, pending);
    pending.catch(() => {
      this.memo.delete(memoKey);
    });
    return pending;
  }
}

export function startTranslationJob(job: TranslationJob, deps: JobDependencies): TranslationJobHandle {
  return new TranslationJobHandle(job, deps).start();
}

export function runTranslationJob(job: TranslationJob, deps: JobDependencies): Promise<JobOutcome> {
  return startTranslationJob(job, deps).finished;
}

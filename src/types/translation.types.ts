/**
 * Types for the CSV translation pipeline
 */

import type { CellFailureKind, TranslationJobError } from '../errors.js';

/**
 * Column name to cell text
 */
export type Row = Record<string, string>;

export interface Table {
  columns: string[];
  rows: Row[];
  // Input started with a UTF-8 BOM; the output keeps the same form
  bom: boolean;
}

export interface TranslationRequest {
  text: string;
  sourceLang: string;
  targetLang: string;
  credential: string;
}

/**
 * A single external translation call
 *
 * Implementations throw a `TranslationJobError` subclass on failure.
 */
export interface TextTranslator {
  translate(request: TranslationRequest): Promise<string>;
  verifyCredential(credential: string): Promise<void>;
}

export interface TranslationJob {
  inputPath: string;
  outputPath: string;
  sourceLang: string;
  targetLangs: string[];
  credential: string;
  // When false, only empty target cells are filled
  overwriteExisting?: boolean;
  // Bounded worker pool size, 1 = sequential
  concurrency?: number;
}

export interface CellFailure {
  rowIndex: number;
  key: string;
  targetLang: string;
  kind: CellFailureKind;
  message: string;
}

export interface JobSummary {
  inputPath: string;
  outputPath: string;
  rows: number;
  translatedCells: number;
  failedCells: number;
  skippedCells: number;
  failuresByKind: Record<CellFailureKind, number>;
  failures: CellFailure[];
  durationMs: number;
}

export type JobState = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';

export type JobOutcome =
  | { status: 'completed'; summary: JobSummary }
  | { status: 'failed'; error: TranslationJobError }
  | { status: 'cancelled' };

export interface JobEvents {
  progress: [rowsDone: number, rowsTotal: number];
  completed: [summary: JobSummary];
  failed: [error: TranslationJobError];
  cancelled: [];
}

export interface FolderSummary {
  files: number;
  rows: number;
  translatedCells: number;
  failedCells: number;
  skippedCells: number;
  errors: number;
}

import { promises as fs } from 'fs';
import path from 'path';
import cron, { type ScheduledTask } from 'node-cron';
import logger from './logger.js';
import { IOError, errorMessage } from './errors.js';
import { runTranslationJob, type JobDependencies } from './orchestrator.js';
import type { FolderSummary } from './types/translation.types.js';

export interface FolderWorkflowOptions {
  inputDir: string;
  outputDir: string;
  sourceLang: string;
  targetLangs: string[];
  credential: string;
  overwriteExisting?: boolean;
  concurrency?: number;
  deps: JobDependencies;
}

export interface SchedulerConfig {
  cronExpression: string;
  timezone?: string;
  // Read on every tick so saved settings apply to the next sweep
  resolveOptions: () => Promise<FolderWorkflowOptions>;
}

let scheduledTask: ScheduledTask | null = null;
let isRunning = false;

async function listCsvFiles(inputDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(inputDir);
  } catch (error) {
    throw new IOError(`Cannot list ${inputDir}: ${errorMessage(error)}`, inputDir, error);
  }

  const files: string[] = [];
  for (const name of entries.sort()) {
    if (!name.toLowerCase().endsWith('.csv')) {
      continue;
    }
    const stat = await fs.stat(path.join(inputDir, name));
    if (stat.isFile()) {
      files.push(name);
    }
  }
  return files;
}

/**
 * Translate every CSV file of `inputDir` into the same file name under `outputDir`.
 * Returns null when a sweep is already in progress.
 */
export async function executeFolderWorkflow(options: FolderWorkflowOptions): Promise<FolderSummary | null> {
  if (isRunning) {
    logger.warn('Folder workflow already running, skipping this execution');
    return null;
  }

  isRunning = true;
  const startTime = Date.now();
  const summary: FolderSummary = {
    files: 0,
    rows: 0,
    translatedCells: 0,
    failedCells: 0,
    skippedCells: 0,
    errors: 0,
  };

  try {
    await fs.mkdir(options.inputDir, { recursive: true });
    await fs.mkdir(options.outputDir, { recursive: true });

    const files = await listCsvFiles(options.inputDir);
    if (files.length === 0) {
      logger.info('No CSV files found in input directory', { inputDir: options.inputDir });
      return summary;
    }

    logger.info('='.repeat(80));
    logger.info(`Found ${files.length} CSV file(s), starting folder workflow`, {
      inputDir: options.inputDir,
      outputDir: options.outputDir,
    });

    for (const [index, fileName] of files.entries()) {
      logger.info(`[${index + 1}/${files.length}] Processing file: ${fileName}`);

      const outcome = await runTranslationJob(
        {
          inputPath: path.join(options.inputDir, fileName),
          outputPath: path.join(options.outputDir, fileName),
          sourceLang: options.sourceLang,
          targetLangs: options.targetLangs,
          credential: options.credential,
          overwriteExisting: options.overwriteExisting,
          concurrency: options.concurrency,
        },
        options.deps
      );

      if (outcome.status === 'completed') {
        summary.files++;
        summary.rows += outcome.summary.rows;
        summary.translatedCells += outcome.summary.translatedCells;
        summary.failedCells += outcome.summary.failedCells;
        summary.skippedCells += outcome.summary.skippedCells;
        continue;
      }

      summary.errors++;
      if (outcome.status === 'failed') {
        logger.error(`Failed to process ${fileName}`, { kind: outcome.error.kind, error: outcome.error.message });
        // Every remaining file would be rejected the same way
        if (outcome.error.kind === 'AuthError' || outcome.error.kind === 'ValidationError') {
          break;
        }
      }
    }

    logger.info('Folder workflow completed', {
      duration: `${((Date.now() - startTime) / 1000).toFixed(2)}s`,
      ...summary,
    });
    logger.info('='.repeat(80));
    return summary;
  } finally {
    isRunning = false;
  }
}

/**
 * Start the folder sweep schedule
 */
export function startScheduler(config: SchedulerConfig): void {
  const { cronExpression, timezone = 'UTC' } = config;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  if (scheduledTask) {
    scheduledTask.stop();
  }

  logger.info('Starting scheduler', { cronExpression, timezone });

  scheduledTask = cron.schedule(
    cronExpression,
    async () => {
      logger.info('Cron job triggered');
      try {
        await executeFolderWorkflow(await config.resolveOptions());
      } catch (error) {
        logger.error('Scheduled folder workflow failed', { error: errorMessage(error) });
      }
    },
    {
      scheduled: true,
      timezone,
    }
  );
}

export function stopScheduler(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }
}

export function isWorkflowRunning(): boolean {
  return isRunning;
}

export function getSchedulerStatus(): {
  isScheduled: boolean;
  isRunning: boolean;
} {
  return {
    isScheduled: scheduledTask !== null,
    isRunning,
  };
}

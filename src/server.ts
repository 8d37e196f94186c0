import path from 'path';
import express, { type NextFunction, type Request, type Response } from 'express';
import logger from './logger.js';
import type { AppConfig } from './config.js';
import { TranslationJobError, errorMessage, type ErrorKind } from './errors.js';
import type { JobManager } from './jobs.js';
import { validateJob, type JobDependencies } from './orchestrator.js';
import { executeFolderWorkflow, getSchedulerStatus, isWorkflowRunning } from './scheduler.js';
import type { Settings, SettingsStore } from './settings.js';
import type { TranslationJob } from './types/translation.types.js';

export interface ServerContext {
  config: AppConfig;
  jobs: JobManager;
  settings: SettingsStore;
  deps: JobDependencies;
}

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  ValidationError: 400,
  AuthError: 401,
  FormatError: 422,
  UnsupportedLanguageError: 422,
  RateLimitError: 429,
  TransientNetworkError: 502,
  IOError: 500,
};

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function asyncHandler(fn: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new HttpError(400, `${field} must be a string`);
  }
  return value.trim() || undefined;
}

function optionalStringArray(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new HttpError(400, `${field} must be an array of strings`);
  }
  return value.map((item) => item.trim()).filter(Boolean);
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new HttpError(400, `${field} must be a boolean`);
  }
  return value;
}

function publicSettings(settings: Settings): Omit<Settings, 'credential'> & { hasCredential: boolean } {
  const { credential, ...rest } = settings;
  return { ...rest, hasCredential: credential.length > 0 };
}

export function createApp(context: ServerContext): express.Express {
  const { config, jobs, settings, deps } = context;
  const app = express();

  app.use(express.json());

  app.use((req, _res, next) => {
    logger.info(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });
    next();
  });

  /**
   * Health check endpoint
   */
  app.get('/health', (_req: Request, res: Response) => {
    const scheduler = getSchedulerStatus();

    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      scheduler,
      jobs: {
        running: jobs.isRunning(),
      },
      environment: {
        translationService: 'DeepL',
        deeplApiUrl: config.deeplApiUrl,
        hasDeeplKey: !!config.deeplApiKey,
        hasSweepSchedule: !!config.sweepCron,
      },
    });
  });

  app.get('/settings', asyncHandler(async (_req, res) => {
    res.json(publicSettings(await settings.load()));
  }));

  app.put('/settings', asyncHandler(async (req, res) => {
    const body = bodyOf(req);
    const changes: Partial<Settings> = {};

    const defaultSourceLang = optionalString(body.defaultSourceLang, 'defaultSourceLang');
    const lastUsedTargetLangs = optionalStringArray(body.lastUsedTargetLangs, 'lastUsedTargetLangs');
    const overwriteExisting = optionalBoolean(body.overwriteExisting, 'overwriteExisting');

    if (defaultSourceLang !== undefined) changes.defaultSourceLang = defaultSourceLang;
    if (lastUsedTargetLangs !== undefined) changes.lastUsedTargetLangs = lastUsedTargetLangs;
    if (overwriteExisting !== undefined) changes.overwriteExisting = overwriteExisting;

    res.json(publicSettings(await settings.update(changes)));
  }));

  /**
   * Verify an API key with the provider, then persist it
   */
  app.post('/credential', asyncHandler(async (req, res) => {
    const apiKey = optionalString(bodyOf(req).apiKey, 'apiKey');
    if (!apiKey) {
      throw new HttpError(400, 'apiKey is required');
    }

    await deps.translator.verifyCredential(apiKey);
    await settings.update({ credential: apiKey });

    logger.info('API key verified and saved');
    res.json({ message: 'API key is valid and has been saved' });
  }));

  /**
   * Start a translation job; progress is polled through GET /jobs/:jobId
   */
  app.post('/jobs', asyncHandler(async (req, res) => {
    const body = bodyOf(req);
    const stored = await settings.load();

    const inputPath = optionalString(body.inputPath, 'inputPath') ?? '';
    const job: TranslationJob = {
      inputPath,
      outputPath: optionalString(body.outputPath, 'outputPath')
        ?? (inputPath ? path.join(config.outputDir, path.basename(inputPath)) : ''),
      sourceLang: optionalString(body.sourceLang, 'sourceLang') ?? stored.defaultSourceLang,
      targetLangs: optionalStringArray(body.targetLangs, 'targetLangs') ?? stored.lastUsedTargetLangs,
      credential: stored.credential || config.deeplApiKey || '',
      overwriteExisting: optionalBoolean(body.overwriteExisting, 'overwriteExisting') ?? stored.overwriteExisting,
      concurrency: config.concurrency,
    };

    validateJob(job);
    const record = jobs.start(job);
    await settings.update({ lastUsedTargetLangs: job.targetLangs });

    res.status(202).json({ jobId: record.jobId, status: record.status, outputPath: job.outputPath });
  }));

  app.get('/jobs', (_req: Request, res: Response) => {
    res.json({ jobs: jobs.list() });
  });

  app.get('/jobs/:jobId', (req: Request, res: Response) => {
    const record = jobs.get(req.params.jobId);
    if (!record) {
      throw new HttpError(404, `Job not found: ${req.params.jobId}`);
    }
    res.json(record);
  });

  app.post('/jobs/:jobId/cancel', (req: Request, res: Response) => {
    const record = jobs.get(req.params.jobId);
    if (!record) {
      throw new HttpError(404, `Job not found: ${req.params.jobId}`);
    }
    if (!jobs.cancel(record.jobId)) {
      throw new HttpError(409, `Job ${record.jobId} can no longer be cancelled`);
    }
    res.status(202).json({ jobId: record.jobId, message: 'Cancellation requested' });
  });

  /**
   * Translate every CSV file of the input folder in the background
   */
  app.post('/sweep', asyncHandler(async (_req, res) => {
    if (isWorkflowRunning()) {
      res.status(409).json({
        error: 'Folder workflow already running',
        message: 'Please wait for the current sweep to complete',
      });
      return;
    }

    const stored = await settings.load();
    const options = {
      inputDir: config.inputDir,
      outputDir: config.outputDir,
      sourceLang: stored.defaultSourceLang,
      targetLangs: stored.lastUsedTargetLangs,
      credential: stored.credential || config.deeplApiKey || '',
      overwriteExisting: stored.overwriteExisting,
      concurrency: config.concurrency,
      deps,
    };

    res.status(202).json({
      message: 'Folder workflow started',
      inputDir: options.inputDir,
      outputDir: options.outputDir,
      timestamp: new Date().toISOString(),
    });

    executeFolderWorkflow(options).catch((error: unknown) => {
      logger.error('Manual folder workflow failed', { error: errorMessage(error) });
    });
  }));

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      path: req.path,
    });
  });

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      logger.warn(`${req.method} ${req.path} rejected`, { status: err.statusCode, error: err.message });
      res.status(err.statusCode).json({ error: err.message });
      return;
    }

    // express.json() rejects unparsable bodies with a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    if (err instanceof TranslationJobError) {
      const status = STATUS_BY_KIND[err.kind] ?? 500;
      logger.warn(`${req.method} ${req.path} failed`, { status, kind: err.kind, error: err.message });
      res.status(status).json({ error: err.message, kind: err.kind });
      return;
    }

    logger.error('Express error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
    });

    res.status(500).json({
      error: 'Internal Server Error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  return app;
}

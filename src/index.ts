import 'dotenv/config';
import type { Server } from 'http';
import logger from './logger.js';
import { loadConfig, type AppConfig } from './config.js';
import { JobManager } from './jobs.js';
import type { JobDependencies } from './orchestrator.js';
import { startScheduler, stopScheduler } from './scheduler.js';
import { createApp } from './server.js';
import { SettingsStore } from './settings.js';
import { DeeplTranslator } from './translator.js';

let server: Server | null = null;
let jobs: JobManager | null = null;

function logEnvironment(config: AppConfig): void {
  if (config.deeplApiKey) {
    logger.info('DeepL API key configured from environment');
  } else {
    logger.info('No DEEPL_API_KEY set, jobs use the key saved through POST /credential');
  }
  logger.info('DeepL endpoint', { url: config.deeplApiUrl ?? 'free or pro, chosen per API key' });
}

/**
 * Initialize application
 */
async function initialize(): Promise<void> {
  try {
    logger.info('Starting csv-localizer...');
    const config = loadConfig();
    logger.level = config.logLevel;
    logEnvironment(config);

    const deps: JobDependencies = {
      translator: new DeeplTranslator({ apiUrl: config.deeplApiUrl, timeoutMs: config.deeplTimeoutMs }),
      retry: config.retry,
    };
    const settings = new SettingsStore(config.settingsPath);
    jobs = new JobManager(deps);

    if (config.sweepCron) {
      startScheduler({
        cronExpression: config.sweepCron,
        timezone: config.timezone,
        resolveOptions: async () => {
          const stored = await settings.load();
          return {
            inputDir: config.inputDir,
            outputDir: config.outputDir,
            sourceLang: stored.defaultSourceLang,
            targetLangs: stored.lastUsedTargetLangs,
            credential: stored.credential || config.deeplApiKey || '',
            overwriteExisting: stored.overwriteExisting,
            concurrency: config.concurrency,
            deps,
          };
        },
      });
    }

    const app = createApp({ config, jobs, settings, deps });
    server = app.listen(config.port, config.host, () => {
      logger.info(`HTTP server listening on ${config.host}:${config.port}`);
      logger.info('Available endpoints:');
      logger.info('  GET  /health              - Health check');
      logger.info('  GET  /settings            - Saved preferences');
      logger.info('  PUT  /settings            - Update preferences');
      logger.info('  POST /credential          - Verify and save the DeepL API key');
      logger.info('  POST /jobs                - Translate one CSV file');
      logger.info('  GET  /jobs/:jobId         - Job progress and summary');
      logger.info('  POST /jobs/:jobId/cancel  - Cancel a running job');
      logger.info('  POST /sweep               - Translate every CSV file of the input folder');
    });
  } catch (error) {
    logger.error('Initialization failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    stopScheduler();

    if (jobs) {
      jobs.cancelAll();
      await jobs.drain();
    }

    if (server) {
      const closing = server;
      await new Promise<void>((resolve, reject) => {
        closing.close((error) => (error ? reject(error) : resolve()));
      });
      logger.info('HTTP server closed');
    }

    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
  process.exit(1);
});

void initialize();

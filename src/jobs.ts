import logger from './logger.js';
import { startTranslationJob, type JobDependencies, type TranslationJobHandle } from './orchestrator.js';
import type { JobState, JobSummary, TranslationJob } from './types/translation.types.js';
import type { ErrorKind } from './errors.js';

export interface JobRecord {
  jobId: string;
  status: JobState;
  inputPath: string;
  outputPath: string;
  sourceLang: string;
  targetLangs: string[];
  rowsDone: number;
  rowsTotal: number;
  createdAt: Date;
  updatedAt: Date;
  summary?: JobSummary;
  error?: { kind: ErrorKind; message: string };
}

const MAX_FINISHED_JOBS = 100;

/**
 * In-memory registry of jobs started from the HTTP layer
 */
export class JobManager {
  private readonly handles = new Map<string, TranslationJobHandle>();
  private readonly records = new Map<string, JobRecord>();

  constructor(private readonly deps: JobDependencies) {}

  start(job: TranslationJob): JobRecord {
    const handle = startTranslationJob(job, this.deps);
    const now = new Date();
    const record: JobRecord = {
      jobId: handle.id,
      status: handle.state,
      inputPath: job.inputPath,
      outputPath: job.outputPath,
      sourceLang: job.sourceLang,
      targetLangs: [...job.targetLangs],
      rowsDone: 0,
      rowsTotal: 0,
      createdAt: now,
      updatedAt: now,
    };

    this.handles.set(handle.id, handle);
    this.records.set(handle.id, record);

    const touch = (changes: Partial<JobRecord>): void => {
      Object.assign(record, changes, { updatedAt: new Date() });
    };

    handle
      .on('progress', (rowsDone, rowsTotal) => touch({ status: 'running', rowsDone, rowsTotal }))
      .on('completed', (summary) => touch({ status: 'completed', summary }))
      .on('failed', (error) => touch({ status: 'failed', error: { kind: error.kind, message: error.message } }))
      .on('cancelled', () => touch({ status: 'cancelled' }));

    handle.finished
      .then(() => {
        this.handles.delete(handle.id);
        this.prune();
      })
      .catch((error: unknown) => {
        logger.error('Job bookkeeping failed', { jobId: handle.id, error: String(error) });
      });

    return record;
  }

  get(jobId: string): JobRecord | null {
    return this.records.get(jobId) ?? null;
  }

  list(): JobRecord[] {
    return [...this.records.values()].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  cancel(jobId: string): boolean {
    return this.handles.get(jobId)?.cancel() ?? false;
  }

  cancelAll(): void {
    for (const handle of this.handles.values()) {
      handle.cancel();
    }
  }

  /**
   * Resolves once every running job has ended
   */
  async drain(): Promise<void> {
    await Promise.all([...this.handles.values()].map((handle) => handle.finished));
  }

  isRunning(): boolean {
    return this.handles.size > 0;
  }

  private prune(): void {
    const finished = this.list().filter((record) => !this.handles.has(record.jobId));
    for (const record of finished.slice(MAX_FINISHED_JOBS)) {
      this.records.delete(record.jobId);
    }
  }
}

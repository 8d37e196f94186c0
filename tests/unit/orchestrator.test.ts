import { promises as fs } from 'fs';
import path from 'path';
import { AuthError, RateLimitError, UnsupportedLanguageError } from '../../src/errors';
import {
    TranslationJobHandle,
    runTranslationJob,
    validateJob,
    type JobDependencies,
} from '../../src/orchestrator';
import type { JobOutcome, JobSummary, TranslationJob } from '../../src/types/translation.types';
import { FakeTranslator } from '../helpers/FakeTranslator';
import { createTempDir, exists, removeTempDir } from '../helpers/tempDir';

function summaryOf(outcome: JobOutcome): JobSummary {
    if (outcome.status !== 'completed') {
        throw new Error(`Expected a completed job, got ${outcome.status}`);
    }
    return outcome.summary;
}

describe('orchestrator', () => {
    let dir: string;
    let translator: FakeTranslator;
    let deps: JobDependencies;

    beforeEach(async () => {
        dir = await createTempDir();
        translator = new FakeTranslator({ 'Hello|de': 'Hallo' });
        deps = { translator, retry: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1 } };
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await removeTempDir(dir);
    });

    async function prepare(content: string, overrides: Partial<TranslationJob> = {}): Promise<TranslationJob> {
        const inputPath = path.join(dir, 'input.csv');
        await fs.writeFile(inputPath, content, 'utf-8');
        return {
            inputPath,
            outputPath: path.join(dir, 'out', 'input.csv'),
            sourceLang: 'en',
            targetLangs: ['de'],
            credential: 'test-key',
            ...overrides,
        };
    }

    function readOutput(job: TranslationJob): Promise<string> {
        return fs.readFile(job.outputPath, 'utf-8');
    }

    describe('validateJob', () => {
        const valid: TranslationJob = {
            inputPath: 'in.csv',
            outputPath: 'out.csv',
            sourceLang: 'en',
            targetLangs: ['de', 'fr'],
            credential: 'test-key',
        };

        it('should apply defaults to a valid job', () => {
            expect(validateJob(valid)).toEqual({
                inputPath: 'in.csv',
                outputPath: 'out.csv',
                sourceLang: 'en',
                targetLangs: ['de', 'fr'],
                credential: 'test-key',
                overwriteExisting: true,
                concurrency: 1,
            });
        });

        it('should reject incomplete or contradictory jobs', () => {
            expect(() => validateJob({ ...valid, credential: ' ' })).toThrow('credential is required');
            expect(() => validateJob({ ...valid, targetLangs: [] })).toThrow('At least one target language is required');
            expect(() => validateJob({ ...valid, outputPath: './in.csv' })).toThrow('outputPath must differ from inputPath');
            expect(() => validateJob({ ...valid, targetLangs: ['EN'] })).toThrow("Target language 'EN' is the source language");
            expect(() => validateJob({ ...valid, targetLangs: ['de', 'DE'] })).toThrow("Target language 'DE' is listed twice");
            expect(() => validateJob({ ...valid, targetLangs: ['Key'] })).toThrow("'Key' is a reserved column, not a language");
            expect(() => validateJob({ ...valid, concurrency: 0 })).toThrow('concurrency must be a positive integer');
        });
    });

    describe('runTranslationJob', () => {
        it('should translate the source column into a new target column', async () => {
            const job = await prepare('Key,en\r\ngreet,Hello\r\n');

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(await readOutput(job)).toBe('Key,en,de\r\ngreet,Hello,Hallo\r\n');
            expect(summary).toMatchObject({
                rows: 1,
                translatedCells: 1,
                failedCells: 0,
                skippedCells: 0,
                failures: [],
            });
            expect(translator.verifiedCredentials).toEqual(['test-key']);
            expect(translator.requests).toEqual([
                { text: 'Hello', sourceLang: 'en', targetLang: 'de', credential: 'test-key' },
            ]);
        });

        it('should overwrite stale translations by default', async () => {
            const job = await prepare('Key,en,de\ngreet,Hello,Veraltet\n');

            await runTranslationJob(job, deps);

            expect(await readOutput(job)).toBe('Key,en,de\r\ngreet,Hello,Hallo\r\n');
        });

        it('should only fill empty cells when overwriting is off', async () => {
            const job = await prepare('Key,en,de\na,One,Eins\nb,Two,\n', { overwriteExisting: false });

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(await readOutput(job)).toBe('Key,en,de\r\na,One,Eins\r\nb,Two,Two-de\r\n');
            expect(translator.textsSentFor('de')).toEqual(['Two']);
            expect(summary).toMatchObject({ translatedCells: 1, skippedCells: 1 });
        });

        it('should record a cell failure after retries and keep going', async () => {
            translator.failWhen((request) => request.text === 'Goodbye', () => new RateLimitError());
            const job = await prepare('Key,en\ngreet,Hello\nbye,Goodbye\n');

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(translator.textsSentFor('de')).toEqual(['Hello', 'Goodbye', 'Goodbye', 'Goodbye']);
            expect(await readOutput(job)).toBe('Key,en,de\r\ngreet,Hello,Hallo\r\nbye,Goodbye,\r\n');
            expect(summary.failures).toEqual([
                {
                    rowIndex: 1,
                    key: 'bye',
                    targetLang: 'de',
                    kind: 'RateLimitError',
                    message: 'Translation rate limit or quota exceeded',
                },
            ]);
            expect(summary.failuresByKind).toEqual({
                RateLimitError: 1,
                TransientNetworkError: 0,
                UnsupportedLanguageError: 0,
            });
            expect(summary).toMatchObject({ translatedCells: 1, failedCells: 1 });
        });

        it('should record unexpected translator errors without retrying', async () => {
            translator.failWhen(() => true, () => new Error('socket closed'));
            const job = await prepare('Key,en\ngreet,Hello\n');

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(translator.requests).toHaveLength(1);
            expect(summary.failures).toEqual([
                { rowIndex: 0, key: 'greet', targetLang: 'de', kind: 'TransientNetworkError', message: 'socket closed' },
            ]);
        });

        it('should clear targets of empty source cells without a call', async () => {
            const job = await prepare('Key,en,de\ngreet,,Alt\n');

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(translator.requests).toHaveLength(0);
            expect(await readOutput(job)).toBe('Key,en,de\r\ngreet,,\r\n');
            expect(summary).toMatchObject({ translatedCells: 0, skippedCells: 1 });
        });

        it('should leave URLs and numbers untouched', async () => {
            const job = await prepare('Key,en,de\na,https://example.com,\nb,42,Old\n');

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(translator.requests).toHaveLength(0);
            expect(await readOutput(job)).toBe('Key,en,de\r\na,https://example.com,\r\nb,42,Old\r\n');
            expect(summary.skippedCells).toBe(2);
        });

        it('should fail before any row when the key is rejected', async () => {
            translator.rejectCredential = true;
            const job = await prepare('Key,en\ngreet,Hello\n');

            const outcome = await runTranslationJob(job, deps);

            expect(outcome.status).toBe('failed');
            expect(outcome.status === 'failed' && outcome.error).toBeInstanceOf(AuthError);
            expect(translator.requests).toHaveLength(0);
            expect(await exists(job.outputPath)).toBe(false);
        });

        it('should abort and write nothing when the key is rejected mid-job', async () => {
            translator.failWhen((request) => request.text === 'Goodbye', () => new AuthError());
            const job = await prepare('Key,en\ngreet,Hello\nbye,Goodbye\nlater,See you\n');

            const outcome = await runTranslationJob(job, deps);

            expect(outcome.status === 'failed' && outcome.error.kind).toBe('AuthError');
            expect(translator.textsSentFor('de')).toEqual(['Hello', 'Goodbye']);
            expect(await exists(job.outputPath)).toBe(false);
        });

        it('should reject an invalid job before touching any file', async () => {
            const job: TranslationJob = {
                inputPath: path.join(dir, 'missing.csv'),
                outputPath: path.join(dir, 'out.csv'),
                sourceLang: 'en',
                targetLangs: [],
                credential: 'test-key',
            };

            const outcome = await runTranslationJob(job, deps);

            expect(outcome.status === 'failed' && outcome.error.kind).toBe('ValidationError');
            expect(translator.verifiedCredentials).toEqual([]);
        });

        it('should fail with FormatError when the source column is missing', async () => {
            const job = await prepare('Key,fr\ngreet,Bonjour\n');

            const outcome = await runTranslationJob(job, deps);

            expect(outcome.status === 'failed' && outcome.error.kind).toBe('FormatError');
            expect(await exists(job.outputPath)).toBe(false);
        });

        it('should disable a target language the provider does not support', async () => {
            translator.failWhen((request) => request.targetLang === 'xx', () => new UnsupportedLanguageError('xx'));
            const job = await prepare('Key,en\na,One\nb,Two\nc,Three\n', { targetLangs: ['xx', 'de'] });

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(translator.textsSentFor('xx')).toEqual(['One']);
            expect(summary.failures.map((failure) => [failure.key, failure.kind, failure.message])).toEqual([
                ['a', 'UnsupportedLanguageError', 'Unsupported language: xx'],
                ['b', 'UnsupportedLanguageError', 'Unsupported language: xx'],
                ['c', 'UnsupportedLanguageError', 'Unsupported language: xx'],
            ]);
            expect(await readOutput(job)).toBe(
                'Key,en,xx,de\r\na,One,,One-de\r\nb,Two,,Two-de\r\nc,Three,,Three-de\r\n'
            );
        });

        it('should write into plugin-style columns and append missing ones', async () => {
            const job = await prepare('Key,Id,English(en),German(de)\na,1,Hello,\n', { targetLangs: ['de', 'fr'] });

            await runTranslationJob(job, deps);

            expect(await readOutput(job)).toBe('Key,Id,English(en),German(de),fr\r\na,1,Hello,Hallo,Hello-fr\r\n');
        });

        it('should call the provider once for repeated source texts', async () => {
            const job = await prepare('Key,en\na,Save\nb,Save\n');

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(translator.requests).toHaveLength(1);
            expect(await readOutput(job)).toBe('Key,en,de\r\na,Save,Save-de\r\nb,Save,Save-de\r\n');
            expect(summary.translatedCells).toBe(2);
        });

        it('should produce identical bytes when run twice on the same input', async () => {
            const job = await prepare('\uFEFFKey,en\ngreet,"Hello"\nlist,"a, b"\n');
            const second = { ...job, outputPath: path.join(dir, 'out', 'second.csv') };

            await runTranslationJob(job, deps);
            await runTranslationJob(second, deps);

            const first = await fs.readFile(job.outputPath);
            expect(first.equals(await fs.readFile(second.outputPath))).toBe(true);
            expect(first.toString('utf-8')).toBe('\uFEFFKey,en,de\r\ngreet,Hello,Hallo\r\nlist,"a, b","a, b-de"\r\n');
        });

        it('should keep row order when cells run concurrently', async () => {
            translator.delayMs = (request) => (request.text === 'One' ? 30 : 1);
            const job = await prepare('Key,en\na,One\nb,Two\nc,Three\n', { targetLangs: ['de', 'fr'], concurrency: 4 });

            const summary = summaryOf(await runTranslationJob(job, deps));

            expect(await readOutput(job)).toBe(
                'Key,en,de,fr\r\na,One,One-de,One-fr\r\nb,Two,Two-de,Two-fr\r\nc,Three,Three-de,Three-fr\r\n'
            );
            expect(summary.translatedCells).toBe(6);
        });

        it('should stop every worker on the first rejected key', async () => {
            const rows = Array.from({ length: 40 }, (_value, index) => `k${index},Text ${index}`);
            translator.delayMs = () => 2;
            translator.failWhen((request) => request.text === 'Text 5', () => new AuthError());
            const job = await prepare(`Key,en\n${rows.join('\n')}\n`, { concurrency: 4 });

            const outcome = await runTranslationJob(job, deps);

            expect(outcome.status).toBe('failed');
            expect(outcome.status === 'failed' && outcome.error.kind).toBe('AuthError');
            expect(translator.requests.length).toBeGreaterThanOrEqual(6);
            expect(translator.requests.length).toBeLessThan(20);
            expect(await exists(job.outputPath)).toBe(false);
        });
    });

    describe('TranslationJobHandle', () => {
        it('should report progress row by row and then complete', async () => {
            const job = await prepare('Key,en\na,One\nb,Two\n');
            const handle = new TranslationJobHandle(job, deps);
            const progress: Array<[number, number]> = [];
            const completed = jest.fn();
            handle.on('progress', (rowsDone, rowsTotal) => progress.push([rowsDone, rowsTotal]));
            handle.on('completed', completed);

            expect(handle.state).toBe('idle');
            handle.start();
            expect(handle.state).toBe('running');
            const outcome = await handle.finished;

            expect(progress).toEqual([[0, 2], [1, 2], [2, 2]]);
            expect(completed).toHaveBeenCalledWith(summaryOf(outcome));
            expect(handle.state).toBe('completed');
            expect(handle.progress).toEqual({ rowsDone: 2, rowsTotal: 2 });
        });

        it('should stop after the in-flight call when cancelled', async () => {
            const job = await prepare('Key,en\na,One\nb,Two\nc,Three\n');
            const handle = new TranslationJobHandle(job, deps);
            const cancelled = jest.fn();
            translator.onTranslate = () => {
                handle.cancel();
            };
            handle.on('cancelled', cancelled);

            const outcome = await handle.start().finished;

            expect(outcome).toEqual({ status: 'cancelled' });
            expect(cancelled).toHaveBeenCalledTimes(1);
            expect(translator.requests).toHaveLength(1);
            expect(await exists(job.outputPath)).toBe(false);
            expect(handle.cancel()).toBe(false);
        });

        it('should refuse cancellation once the output is being written', async () => {
            const job = await prepare('Key,en\na,One\n');
            const handle = new TranslationJobHandle(job, deps);
            const writeFile = fs.writeFile;
            const cancelResults: boolean[] = [];
            jest.spyOn(fs, 'writeFile').mockImplementation((file, data, options) => {
                cancelResults.push(handle.cancel());
                return writeFile(file, data, options);
            });

            const outcome = await handle.start().finished;

            expect(cancelResults).toEqual([false]);
            expect(outcome.status).toBe('completed');
            expect(await readOutput(job)).toBe('Key,en,de\r\na,One,One-de\r\n');
        });

        it('should emit failed with the job error', async () => {
            translator.rejectCredential = true;
            const job = await prepare('Key,en\na,One\n');
            const handle = new TranslationJobHandle(job, deps);
            const failed = jest.fn();
            handle.on('failed', failed);

            await handle.start().finished;

            expect(failed).toHaveBeenCalledWith(expect.any(AuthError));
            expect(handle.state).toBe('failed');
        });

        it('should refuse to start twice', async () => {
            const job = await prepare('Key,en\na,One\n');
            const handle = new TranslationJobHandle(job, deps).start();

            expect(() => handle.start()).toThrow(`Job ${handle.id} has already been started`);
            await handle.finished;
        });
    });
});

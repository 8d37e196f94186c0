import { DEEPL_FREE_API_URL, DEEPL_PRO_API_URL, loadConfig, resolveDeeplApiUrl } from '../../src/config';

const KEYS = [
    'HOST',
    'PORT',
    'LOG_LEVEL',
    'DEEPL_API_KEY',
    'DEEPL_API_URL',
    'DEEPL_TIMEOUT_MS',
    'TRANSLATION_MAX_ATTEMPTS',
    'TRANSLATION_RETRY_DELAY_MS',
    'TRANSLATION_RETRY_MAX_DELAY_MS',
    'TRANSLATION_CONCURRENCY',
    'INPUT_DIR',
    'OUTPUT_DIR',
    'SETTINGS_PATH',
    'SWEEP_CRON',
];

describe('config', () => {
    const saved: Record<string, string | undefined> = {};

    beforeEach(() => {
        for (const key of KEYS) {
            saved[key] = process.env[key];
            delete process.env[key];
        }
    });

    afterEach(() => {
        for (const key of KEYS) {
            if (saved[key] === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = saved[key];
            }
        }
    });

    describe('resolveDeeplApiUrl', () => {
        it('should pick the endpoint from the key plan', () => {
            expect(resolveDeeplApiUrl(undefined)).toBe(DEEPL_FREE_API_URL);
            expect(resolveDeeplApiUrl('test-key:fx')).toBe(DEEPL_FREE_API_URL);
            expect(resolveDeeplApiUrl('test-key')).toBe(DEEPL_PRO_API_URL);
        });

        it('should prefer an explicit URL without trailing slashes', () => {
            expect(resolveDeeplApiUrl('test-key', 'http://localhost:8080//')).toBe('http://localhost:8080');
        });
    });

    describe('loadConfig', () => {
        it('should fall back to defaults', () => {
            const config = loadConfig();

            expect(config).toMatchObject({
                host: '127.0.0.1',
                port: 3000,
                logLevel: 'info',
                deeplApiKey: undefined,
                deeplApiUrl: undefined,
                deeplTimeoutMs: 30000,
                retry: { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 30000 },
                concurrency: 1,
                inputDir: 'input',
                outputDir: 'output',
                settingsPath: 'settings.json',
                sweepCron: undefined,
            });
            expect(Object.isFrozen(config)).toBe(true);
        });

        it('should read values and strip quotes left by .env editors', () => {
            process.env.DEEPL_API_KEY = ' "test-key" ';
            process.env.TRANSLATION_CONCURRENCY = '4';
            process.env.TRANSLATION_MAX_ATTEMPTS = '5';
            process.env.SWEEP_CRON = "'*/15 * * * *'";
            process.env.OUTPUT_DIR = '';
            process.env.HOST = '0.0.0.0';
            process.env.DEEPL_API_URL = 'http://localhost:8080/';

            const config = loadConfig();

            expect(config.deeplApiKey).toBe('test-key');
            expect(config.deeplApiUrl).toBe('http://localhost:8080');
            expect(config.concurrency).toBe(4);
            expect(config.retry.maxAttempts).toBe(5);
            expect(config.sweepCron).toBe('*/15 * * * *');
            expect(config.outputDir).toBe('output');
            expect(config.host).toBe('0.0.0.0');
        });

        it('should reject out-of-range integers', () => {
            process.env.TRANSLATION_CONCURRENCY = '0';
            expect(() => loadConfig()).toThrow('Environment variable TRANSLATION_CONCURRENCY must be an integer >= 1, got: 0');

            process.env.TRANSLATION_CONCURRENCY = 'many';
            expect(() => loadConfig()).toThrow('TRANSLATION_CONCURRENCY must be an integer');
        });
    });
});

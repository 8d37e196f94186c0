import { promises as fs } from 'fs';
import path from 'path';
import logger from './logger.js';
import { IOError, errorMessage } from './errors.js';

/**
 * Preferences persisted between runs
 */
export interface Settings {
  credential: string;
  defaultSourceLang: string;
  lastUsedTargetLangs: string[];
  overwriteExisting: boolean;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  credential: '',
  defaultSourceLang: 'en',
  lastUsedTargetLangs: [],
  overwriteExisting: true,
});

function sanitizeLanguages(input: unknown): string[] {
  if (!Array.isArray(input)) {
    return [...DEFAULT_SETTINGS.lastUsedTargetLangs];
  }

  const seen = new Set<string>();
  for (const value of input) {
    if (typeof value === 'string' && value.trim()) {
      seen.add(value.trim());
    }
  }
  return [...seen];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function sanitizeSettings(input: unknown): Settings {
  if (!isRecord(input)) {
    return { ...DEFAULT_SETTINGS, lastUsedTargetLangs: [...DEFAULT_SETTINGS.lastUsedTargetLangs] };
  }

  return {
    credential: typeof input.credential === 'string' ? input.credential.trim() : DEFAULT_SETTINGS.credential,
    defaultSourceLang: typeof input.defaultSourceLang === 'string' && input.defaultSourceLang.trim()
      ? input.defaultSourceLang.trim()
      : DEFAULT_SETTINGS.defaultSourceLang,
    lastUsedTargetLangs: sanitizeLanguages(input.lastUsedTargetLangs),
    overwriteExisting: typeof input.overwriteExisting === 'boolean'
      ? input.overwriteExisting
      : DEFAULT_SETTINGS.overwriteExisting,
  };
}

/**
 * JSON file backed configuration store
 */
export class SettingsStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Settings> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return sanitizeSettings(undefined);
      }
      logger.warn('Failed to read settings, using defaults', { path: this.filePath, error: errorMessage(error) });
      return sanitizeSettings(undefined);
    }

    try {
      return sanitizeSettings(JSON.parse(raw));
    } catch (error) {
      logger.warn('Settings file is not valid JSON, using defaults', { path: this.filePath, error: errorMessage(error) });
      return sanitizeSettings(undefined);
    }
  }

  async save(settings: Settings): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, `${JSON.stringify(sanitizeSettings(settings), null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new IOError(`Cannot save settings: ${errorMessage(error)}`, this.filePath, error);
    }
  }

  async update(changes: Partial<Settings>): Promise<Settings> {
    const next = sanitizeSettings({ ...(await this.load()), ...changes });
    await this.save(next);
    return next;
  }
}

import axios from 'axios';
import logger from './logger.js';
import { resolveDeeplApiUrl } from './config.js';
import languageTable from './data/deepl-languages.json';
import {
  AuthError,
  RateLimitError,
  TransientNetworkError,
  TranslationJobError,
  UnsupportedLanguageError,
  errorMessage,
} from './errors.js';
import { restorePlaceholders, tokenizePlaceholders } from './placeholders.js';
import type { TextTranslator, TranslationRequest } from './types/translation.types.js';

interface DeeplLanguage {
  source: string;
  target: string;
}

interface DeeplTranslateResponse {
  translations?: Array<{ detected_source_language?: string; text?: string }>;
}

interface DeeplUsageResponse {
  character_count?: number;
  character_limit?: number;
}

interface DeeplErrorBody {
  message?: string;
}

export interface DeeplTranslatorOptions {
  // Fixed endpoint; when absent the free or pro endpoint is picked from each key
  apiUrl?: string;
  timeoutMs?: number;
}

const LANGUAGES: Record<string, DeeplLanguage | undefined> = languageTable;
const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Map a column language code ("de", "pt-BR", "zh-Hant") to the DeepL code
 */
export function toDeeplLanguage(code: string, role: keyof DeeplLanguage): string {
  const language = LANGUAGES[code.trim().toLowerCase()];
  if (!language) {
    throw new UnsupportedLanguageError(code);
  }
  return language[role];
}

/**
 * Turn a failed DeepL call into one of the job error kinds
 */
export function classifyProviderError(error: unknown, request?: Pick<TranslationRequest, 'sourceLang' | 'targetLang'>): TranslationJobError {
  if (error instanceof TranslationJobError) {
    return error;
  }

  if (!axios.isAxiosError<DeeplErrorBody>(error)) {
    return new TransientNetworkError(errorMessage(error), { cause: error, retryable: false });
  }

  const status = error.response?.status;
  const body = error.response?.data;
  const message = typeof body?.message === 'string' ? body.message : error.message;

  if (status === 401 || status === 403) {
    logger.error('DeepL API authentication failed', { status, message });
    return new AuthError('DeepL rejected the API key', error);
  }

  if (status === 429) {
    logger.warn('DeepL rate limit reached', { message });
    return new RateLimitError('DeepL rate limit reached', error);
  }

  if (status === 456) {
    logger.warn('DeepL character quota exceeded', { message });
    return new RateLimitError('DeepL character quota exceeded', error);
  }

  if (status === 400 && /lang/i.test(message)) {
    const pair = request ? `${request.sourceLang} -> ${request.targetLang}` : 'unknown pair';
    logger.error('Unsupported language pair', { status, message, pair });
    return new UnsupportedLanguageError(request?.targetLang ?? 'unknown', `Unsupported language pair: ${pair} (${message})`, error);
  }

  if (status === undefined || status >= 500) {
    return new TransientNetworkError(`DeepL request failed: ${message}`, { cause: error });
  }

  return new TransientNetworkError(`DeepL request failed with status ${status}: ${message}`, {
    cause: error,
    retryable: false,
  });
}

/**
 * DeepL REST client. One call per cell, no retries here: the orchestrator owns retry policy.
 */
export class DeeplTranslator implements TextTranslator {
  private readonly apiUrl?: string;
  private readonly timeoutMs: number;

  constructor(options: DeeplTranslatorOptions = {}) {
    this.apiUrl = options.apiUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private endpoint(credential: string, route: string): string {
    return `${resolveDeeplApiUrl(credential, this.apiUrl)}${route}`;
  }

  private headers(credential: string): Record<string, string> {
    return {
      Authorization: `DeepL-Auth-Key ${credential}`,
      'Content-Type': 'application/json',
    };
  }

  async translate(request: TranslationRequest): Promise<string> {
    const { text, sourceLang, targetLang, credential } = request;

    if (!text.trim()) {
      return '';
    }

    const source = toDeeplLanguage(sourceLang, 'source');
    const target = toDeeplLanguage(targetLang, 'target');
    const tokenized = tokenizePlaceholders(text);

    logger.debug('Sending DeepL translation request', {
      sourceLang: source,
      targetLang: target,
      textLength: text.length,
      placeholders: tokenized.placeholders.size,
    });

    try {
      const response = await axios.post<DeeplTranslateResponse>(
        this.endpoint(credential, '/v2/translate'),
        {
          text: [tokenized.text],
          source_lang: source,
          target_lang: target,
          preserve_formatting: true,
          split_sentences: 'nonewlines',
        },
        {
          headers: this.headers(credential),
          timeout: this.timeoutMs,
        }
      );

      const translated = response.data?.translations?.[0]?.text;
      if (typeof translated !== 'string') {
        throw new TransientNetworkError('DeepL returned no translation', { retryable: false });
      }

      return restorePlaceholders(translated, tokenized.placeholders);
    } catch (error) {
      throw classifyProviderError(error, request);
    }
  }

  /**
   * Check the key with a usage request, which costs no characters
   */
  async verifyCredential(credential: string): Promise<void> {
    if (!credential.trim()) {
      throw new AuthError('DeepL API key not provided');
    }

    try {
      const response = await axios.get<DeeplUsageResponse>(this.endpoint(credential, '/v2/usage'), {
        headers: this.headers(credential),
        timeout: this.timeoutMs,
      });

      logger.info('DeepL API key verified', {
        characterCount: response.data?.character_count,
        characterLimit: response.data?.character_limit,
      });
    } catch (error) {
      throw classifyProviderError(error);
    }
  }
}

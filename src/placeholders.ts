/**
 * Placeholder protection for format strings sent to the translation API
 */

const PLACEHOLDER_PATTERNS: readonly RegExp[] = [
  /\{[^}]*\}/g, // {0}, {name}
  /%[sdif]/g, // %s, %d, %i, %f
  /\$\d+/g, // $1, $2
];

const TOKEN_PREFIX = '§§PH_';
const TOKEN_SUFFIX = '§§';

const URL_RE = /^(https?:\/\/|www\.)/i;
const ONLY_DIGITS_RE = /^\d+(\.\d+)?$/;
const ONLY_PUNCT_OR_SPACE_RE = /^[\p{P}\p{S}\s_]+$/u;

export interface TokenizedText {
  text: string;
  // token -> original placeholder
  placeholders: Map<string, string>;
}

export function tokenizePlaceholders(text: string): TokenizedText {
  const placeholders = new Map<string, string>();
  let index = 0;

  let tokenized = text;
  for (const pattern of PLACEHOLDER_PATTERNS) {
    tokenized = tokenized.replace(pattern, (original) => {
      const token = `${TOKEN_PREFIX}${index}${TOKEN_SUFFIX}`;
      placeholders.set(token, original);
      index++;
      return token;
    });
  }

  return { text: tokenized, placeholders };
}

export function restorePlaceholders(text: string, placeholders: Map<string, string>): string {
  let restored = text;
  for (const [token, original] of placeholders) {
    restored = restored.split(token).join(original);
  }
  return restored;
}

/**
 * Non-empty text that is never worth a translation call: URLs, bare numbers, punctuation
 */
export function isUntranslatable(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) {
    return false;
  }
  return URL_RE.test(trimmed) || ONLY_DIGITS_RE.test(trimmed) || ONLY_PUNCT_OR_SPACE_RE.test(trimmed);
}

import { MissingColumnError, MissingKeyColumnError } from './errors.js';
import type { Table } from './types/translation.types.js';

export const KEY_COLUMN = 'Key';
// Plugin-internal numeric id, carried through untouched
export const ID_COLUMN = 'Id';

export interface TargetColumn {
  language: string;
  column: string;
  // false when the column is appended by this job
  existing: boolean;
}

/**
 * A column belongs to a language when it is named by the code ("de")
 * or uses the plugin's "Language Name(code)" header ("German(de)")
 */
export function columnMatchesLanguage(column: string, languageCode: string): boolean {
  return column === languageCode || column.endsWith(`(${languageCode})`);
}

export function selectKeyColumn(table: Table): string {
  if (!table.columns.includes(KEY_COLUMN)) {
    throw new MissingKeyColumnError(KEY_COLUMN);
  }
  return KEY_COLUMN;
}

function isReserved(column: string): boolean {
  return column === KEY_COLUMN || column === ID_COLUMN;
}

function findLanguageColumn(columns: string[], languageCode: string, exclude: ReadonlySet<string>): string | undefined {
  const candidates = columns.filter((column) => !isReserved(column) && !exclude.has(column));
  // Exact name wins over the "Language Name(code)" form
  return candidates.find((column) => column === languageCode)
    ?? candidates.find((column) => columnMatchesLanguage(column, languageCode));
}

export function selectSourceColumn(table: Table, sourceLangCode: string): string {
  const column = findLanguageColumn(table.columns, sourceLangCode, new Set());
  if (!column) {
    throw new MissingColumnError(sourceLangCode);
  }
  return column;
}

/**
 * Resolve one output column per target language, in request order.
 * Missing columns are appended to `table.columns` and initialised to '' on every row.
 */
export function planTargetColumns(table: Table, sourceColumn: string, targetLangs: string[]): TargetColumn[] {
  const taken = new Set<string>([sourceColumn]);
  const plan: TargetColumn[] = [];

  for (const language of targetLangs) {
    const existing = findLanguageColumn(table.columns, language, taken);
    if (existing) {
      taken.add(existing);
      plan.push({ language, column: existing, existing: true });
      continue;
    }

    table.columns.push(language);
    for (const row of table.rows) {
      row[language] = '';
    }
    taken.add(language);
    plan.push({ language, column: language, existing: false });
  }

  return plan;
}

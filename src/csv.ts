import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { TextDecoder } from 'util';
import { CsvError, parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import logger from './logger.js';
import { selectKeyColumn, selectSourceColumn } from './columns.js';
import { FormatError, IOError, errorMessage } from './errors.js';
import type { Row, Table } from './types/translation.types.js';

const BOM = '\uFEFF';

export interface ReadTableOptions {
  // Also require a column for this language
  sourceLang?: string;
}

function decodeUtf8(buffer: Buffer, filePath: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
  } catch (error) {
    throw new IOError(`File is not valid UTF-8 text: ${filePath}`, filePath, error);
  }
}

function parseRecords(text: string): string[][] {
  try {
    return parse(text, {
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new FormatError(`Malformed CSV: ${error.message}`, error);
    }
    throw error;
  }
}

function toTable(records: string[][], bom: boolean): Table {
  const [header, ...body] = records;
  if (!header || header.length === 0) {
    throw new FormatError('CSV file has no header row');
  }

  const seen = new Set<string>();
  for (const column of header) {
    if (seen.has(column)) {
      throw new FormatError(`Duplicate column name '${column}'`);
    }
    seen.add(column);
  }

  const rows = body.map((record, index) => {
    if (record.length > header.length) {
      // +2: 1-based, after the header line
      throw new FormatError(`Row ${index + 2} has ${record.length} fields, header has ${header.length}`);
    }
    const row: Row = {};
    header.forEach((column, columnIndex) => {
      row[column] = record[columnIndex] ?? '';
    });
    return row;
  });

  return { columns: [...header], rows, bom };
}

function assertUniqueKeys(table: Table, keyColumn: string): void {
  const keys = new Set<string>();
  for (const row of table.rows) {
    const key = row[keyColumn];
    if (!key) {
      continue;
    }
    if (keys.has(key)) {
      throw new FormatError(`Duplicate ${keyColumn} value '${key}'`);
    }
    keys.add(key);
  }
}

/**
 * Read a UTF-8 CSV file (BOM optional) whose first record is the header
 */
export async function readTable(filePath: string, options: ReadTableOptions = {}): Promise<Table> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new IOError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath, error);
  }

  let text = decodeUtf8(buffer, filePath);
  const bom = text.startsWith(BOM);
  if (bom) {
    text = text.slice(BOM.length);
  }

  const table = toTable(parseRecords(text), bom);
  const keyColumn = selectKeyColumn(table);
  assertUniqueKeys(table, keyColumn);

  if (options.sourceLang !== undefined) {
    selectSourceColumn(table, options.sourceLang);
  }

  logger.debug('CSV table loaded', {
    path: filePath,
    rows: table.rows.length,
    columns: table.columns.length,
  });

  return table;
}

export function serializeTable(table: Table): string {
  const records = [
    table.columns,
    ...table.rows.map((row) => table.columns.map((column) => row[column] ?? '')),
  ];

  return stringify(records, {
    bom: table.bom,
    record_delimiter: 'windows',
  });
}

/**
 * Replace `filePath` with the serialized table.
 * The content goes to a sibling temporary file first, so the destination is never left half-written.
 */
export async function writeTable(filePath: string, table: Table): Promise<void> {
  // Unique per call: concurrent writes to one destination must not share a temporary file
  const tempPath = `${filePath}.${randomUUID()}.partial`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, serializeTable(table), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn('Failed to remove temporary output file', {
        path: tempPath,
        error: errorMessage(cleanupError),
      });
    });
    throw new IOError(`Cannot write ${filePath}: ${errorMessage(error)}`, filePath, error);
  }

  logger.debug('CSV table written', { path: filePath, rows: table.rows.length });
}

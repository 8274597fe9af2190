/**
 * Ingestion manifest loading
 * Accepts CSV (header row) or JSON in three shapes:
 * - an array of rows
 * - { documents: [...] }
 * - an object keyed by file name
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { TocEntry } from './types';
import { InvalidInputError } from './errors';

export interface ManifestEntry {
  /** File name (or key) the row was listed under */
  key: string;
  docId: string;
  filename: string | null;
  title: string | null;
  year: number | null;
  specialty: string | null;
  sourceUrl: string | null;
  toc?: TocEntry[];
}

type Row = { [column: string]: unknown };

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
}

function optionalText(value: unknown): string | null {
  return text(value) || null;
}

function parseYear(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  const raw = text(value);
  return /^\d+$/.test(raw) ? parseInt(raw, 10) : null;
}

function stem(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}

function parseToc(value: unknown): TocEntry[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const entries: TocEntry[] = [];
  for (const item of value) {
    if (!isRow(item)) {
      continue;
    }
    const { level, title, page } = item;
    if (typeof level === 'number' && typeof title === 'string' && typeof page === 'number') {
      entries.push({ level, title, page });
    }
  }
  return entries;
}

function rowFileName(row: Row): string {
  return text(row.filename) || text(row.file);
}

function rowDocId(row: Row): string {
  return text(row.doc_id) || text(row.ID) || text(row.id);
}

function toEntry(key: string, row: Row): ManifestEntry {
  const filename = rowFileName(row);
  const entry: ManifestEntry = {
    key,
    docId: rowDocId(row) || stem(key),
    filename: filename || null,
    title: optionalText(row.title) ?? optionalText(row['Наименование']),
    year: parseYear(row.year),
    specialty: optionalText(row.specialty),
    sourceUrl: optionalText(row.source_url)
  };

  const toc = parseToc(row.toc);
  if (toc) {
    entry.toc = toc;
  }
  return entry;
}

function entriesFromRows(rows: unknown[]): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  for (const row of rows) {
    if (!isRow(row)) {
      continue;
    }
    const filename = rowFileName(row);
    if (filename) {
      entries.push(toEntry(filename, row));
    }
  }
  return entries;
}

function entriesFromJson(data: unknown, source: string): ManifestEntry[] {
  if (Array.isArray(data)) {
    return entriesFromRows(data);
  }
  if (isRow(data)) {
    if (Array.isArray(data.documents)) {
      return entriesFromRows(data.documents);
    }
    return Object.entries(data)
      .filter((pair): pair is [string, Row] => isRow(pair[1]))
      .map(([key, row]) => toEntry(key.trim(), row));
  }
  throw new InvalidInputError(`Unsupported manifest JSON format: ${source}`);
}

function entriesFromCsv(content: string): ManifestEntry[] {
  const records: unknown = parse(content, {
    columns: (header: string[]) => header.map(column => column.trim()),
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  });
  if (!Array.isArray(records)) {
    return [];
  }

  const entries: ManifestEntry[] = [];
  for (const row of records) {
    if (!isRow(row)) {
      continue;
    }
    const docId = rowDocId(row);
    const filename = rowFileName(row) || (docId ? `${docId}.pdf` : '');
    if (filename) {
      entries.push(toEntry(filename, row));
    }
  }
  return entries;
}

/**
 * Read a manifest file; entries come back ordered by doc id
 */
export function loadManifest(filePath: string): ManifestEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new InvalidInputError(`Manifest not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let entries: ManifestEntry[];

  if (path.extname(filePath).toLowerCase() === '.csv') {
    entries = entriesFromCsv(content);
  } else {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new InvalidInputError(`Manifest is not valid JSON: ${filePath}`, { cause: error });
    }
    entries = entriesFromJson(data, filePath);
  }

  return entries.sort((a, b) => {
    const left = a.docId || a.key;
    const right = b.docId || b.key;
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

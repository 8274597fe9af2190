/**
 * PDF reading
 * Loads a PDF with pdf.js and returns the whitespace-normalised text of every
 * page (numbered from 1) together with the document outline as a table of
 * contents.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as pdfjs from 'pdfjs-dist/legacy/build/pdf';
import { PageText, TocEntry } from './types';
import { InvalidInputError } from './errors';
import { normalizeSpace } from './text';
import { logger } from './logger';

export interface PdfContent {
  pages: PageText[];
  /** Outline entries in reading order; empty when the PDF has none */
  toc: TocEntry[];
}

type PdfDocument = Awaited<ReturnType<typeof pdfjs.getDocument>['promise']>;

interface OutlineNode {
  title: string;
  dest: string | unknown[] | null;
  items: unknown[];
}

type JsonObject = { [key: string]: unknown };

const STANDARD_FONTS_DIR = path.join(path.dirname(require.resolve('pdfjs-dist/package.json')), 'standard_fonts') + path.sep;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutlineNode(value: unknown): value is OutlineNode {
  return isObject(value) &&
    typeof value.title === 'string' &&
    Array.isArray(value.items) &&
    (value.dest === null || typeof value.dest === 'string' || Array.isArray(value.dest));
}

function isRef(value: unknown): value is { num: number; gen: number } {
  return isObject(value) && typeof value.num === 'number' && typeof value.gen === 'number';
}

/**
 * 1-based page an outline destination points at, or null when it cannot be resolved
 */
async function destinationPage(doc: PdfDocument, dest: string | unknown[] | null): Promise<number | null> {
  const explicit: unknown[] | null = typeof dest === 'string' ? await doc.getDestination(dest) : dest;
  const target: unknown = explicit?.[0];

  if (typeof target === 'number' && Number.isInteger(target)) {
    return target + 1;
  }
  if (!isRef(target)) {
    return null;
  }
  try {
    return (await doc.getPageIndex(target)) + 1;
  } catch (error) {
    logger.warn(`Outline destination ${target.num} ${target.gen} R is not a page`, error instanceof Error ? error.message : error);
    return null;
  }
}

async function readOutline(doc: PdfDocument, firstPage: number): Promise<TocEntry[]> {
  const toc: TocEntry[] = [];

  const walk = async (nodes: unknown[], level: number): Promise<void> => {
    for (const node of nodes) {
      if (!isOutlineNode(node)) {
        continue;
      }
      const page = await destinationPage(doc, node.dest);
      toc.push({ level, title: node.title, page: page ?? firstPage });
      await walk(node.items, level + 1);
    }
  };

  await walk((await doc.getOutline()) ?? [], 1);
  return toc;
}

async function readPages(doc: PdfDocument, filePath: string): Promise<PageText[]> {
  const pages: PageText[] = [];

  for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
    const page = await doc.getPage(pageNumber);
    try {
      const content = await page.getTextContent();
      const text = content.items.map(item => ('str' in item ? item.str : '')).join(' ');
      pages.push({ page: pageNumber, text: normalizeSpace(text) });
    } catch (error) {
      throw new InvalidInputError(`Cannot extract text from page ${pageNumber} of ${filePath}`, { cause: error });
    } finally {
      page.cleanup();
    }
  }

  return pages;
}

export async function readPdf(filePath: string): Promise<PdfContent> {
  let data: Uint8Array;
  try {
    data = new Uint8Array(fs.readFileSync(filePath));
  } catch (error) {
    throw new InvalidInputError(`Cannot read ${filePath}`, { cause: error });
  }

  const task = pdfjs.getDocument({
    data,
    isEvalSupported: false,
    standardFontDataUrl: STANDARD_FONTS_DIR,
    verbosity: pdfjs.VerbosityLevel.ERRORS
  });

  let doc: PdfDocument;
  try {
    doc = await task.promise;
  } catch (error) {
    await task.destroy();
    throw new InvalidInputError(`Not a readable PDF: ${filePath}`, { cause: error });
  }

  try {
    const pages = await readPages(doc, filePath);
    const toc = await readOutline(doc, 1);
    logger.debug(`Read ${pages.length} pages and ${toc.length} outline entries from ${filePath}`);
    return { pages, toc };
  } finally {
    await doc.destroy();
  }
}

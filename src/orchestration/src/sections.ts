/**
 * Section detection
 * Derives the section hierarchy of a document from, in order of preference:
 * - the table of contents embedded in the source file
 * - numbered headings found in the page text ("3.2.1 Diagnosis criteria")
 * - a single section spanning the whole document
 */

import { PageText, Section, TocEntry } from './types';
import { InvalidInputError } from './errors';
import { normalizeSpace } from './text';
import { logger } from './logger';

export const WHOLE_DOCUMENT_PATH = 'document';

const HEADING_PATTERN = /^\s*((?:\d+\.){0,4}\d+)\s+(.+)$/;
const HEADING_SEGMENTS_PER_PAGE = 6;
const MAX_TITLE_LENGTH = 200;

interface SectionStart {
  path: string;
  level: number;
  page: number;
}

/**
 * Scan the leading sentence-like segments of every page for numbered headings.
 * Only the first occurrence of a heading counts.
 */
export function detectHeadingsFromText(pages: PageText[]): SectionStart[] {
  const seen = new Set<string>();
  const starts: SectionStart[] = [];

  for (const page of pages) {
    const segments = page.text.split('. ').slice(0, HEADING_SEGMENTS_PER_PAGE);

    for (const segment of segments) {
      const match = segment.trim().match(HEADING_PATTERN);
      if (!match) {
        continue;
      }

      const code = match[1];
      const title = match[2].slice(0, MAX_TITLE_LENGTH);
      const path = `${code} ${title}`.trim();
      if (seen.has(path)) {
        continue;
      }

      seen.add(path);
      starts.push({
        path,
        level: code.split('.').length,
        page: page.page
      });
    }
  }

  return starts.sort((a, b) => a.page - b.page);
}

function startsFromToc(toc: TocEntry[], firstPage: number, lastPage: number): SectionStart[] {
  return toc
    .map(entry => {
      const page = Number.isInteger(entry.page) && entry.page > 0 ? entry.page : firstPage;
      return {
        path: normalizeSpace(entry.title),
        level: Math.max(1, Math.trunc(entry.level)),
        page: Math.min(lastPage, Math.max(firstPage, page))
      };
    })
    .filter(start => start.path.length > 0)
    .sort((a, b) => a.page - b.page);
}

/**
 * Turn ordered section starts into page-bounded sections.
 * A page belongs to exactly one section: a start on a page already claimed
 * is dropped, and pages before the first start go to a leading whole-document section.
 */
function toSections(docId: string, starts: SectionStart[], firstPage: number, lastPage: number): Section[] {
  const distinct: SectionStart[] = [];
  for (const start of starts) {
    const previous = distinct[distinct.length - 1];
    if (previous && previous.page === start.page) {
      logger.debug(`Section "${start.path}" shares page ${start.page} with "${previous.path}"; merged`);
      continue;
    }
    distinct.push(start);
  }

  if (distinct.length > 0 && distinct[0].page > firstPage) {
    distinct.unshift({ path: WHOLE_DOCUMENT_PATH, level: 1, page: firstPage });
  }

  return distinct.map((start, index) => {
    const next = distinct[index + 1];
    const pageEnd = next ? next.page - 1 : lastPage;
    return {
      docId,
      path: start.path,
      order: index,
      level: start.level,
      pageStart: start.page,
      pageEnd: Math.max(start.page, pageEnd)
    };
  });
}

/**
 * Detect the ordered section list of a document
 */
export function detectSections(docId: string, pages: PageText[], toc?: TocEntry[]): Section[] {
  if (pages.length === 0) {
    throw new InvalidInputError(`Document ${docId} has no pages`);
  }

  const firstPage = pages[0].page;
  const lastPage = pages[pages.length - 1].page;

  const tocStarts = toc ? startsFromToc(toc, firstPage, lastPage) : [];
  if (tocStarts.length > 0) {
    const sections = toSections(docId, tocStarts, firstPage, lastPage);
    logger.debug(`Detected ${sections.length} sections from table of contents for ${docId}`);
    return sections;
  }

  const headingStarts = detectHeadingsFromText(pages);
  if (headingStarts.length > 0) {
    const sections = toSections(docId, headingStarts, firstPage, lastPage);
    logger.debug(`Detected ${sections.length} sections from headings for ${docId}`);
    return sections;
  }

  logger.debug(`No sections detected for ${docId}; using whole document`);
  return [
    {
      docId,
      path: WHOLE_DOCUMENT_PATH,
      order: 0,
      level: 1,
      pageStart: firstPage,
      pageEnd: lastPage
    }
  ];
}

/**
 * Helper utilities for tests
 */

import { Chunk, ChunkRecord, PageText } from '../src/types';
import { stableHash } from '../src/text';

/**
 * A run of n distinct-looking words ("word0 word1 ...")
 */
export function words(n: number, prefix: string = 'word'): string {
  return Array.from({ length: n }, (_, i) => `${prefix}${i}`).join(' ');
}

export function createPages(texts: string[]): PageText[] {
  return texts.map((text, index) => ({ page: index + 1, text }));
}

/**
 * Create a test ChunkRecord; content defaults to a text unique to the id
 */
export function createRecord(chunkId: string, overrides: Partial<ChunkRecord> = {}): ChunkRecord {
  return {
    chunkId,
    docId: 'doc-1',
    sectionPath: '1 Overview',
    pageStart: 1,
    pageEnd: 1,
    chunkType: 'other',
    content: `Content of ${chunkId}`,
    score: 0.5,
    source: 'lexical',
    order: 0,
    ...overrides
  };
}

/**
 * Create a test Chunk ready for upsert
 */
export function createChunk(
  content: string,
  order: number,
  overrides: Partial<Chunk> = {}
): Chunk {
  const docId = overrides.docId ?? 'doc-1';
  const sectionPath = overrides.sectionPath ?? '1 Overview';
  return {
    docId,
    sectionPath,
    pageStart: 1,
    pageEnd: 1,
    content,
    chunkType: 'other',
    tokenCount: 10,
    chunkHash: stableHash(`${docId}|${sectionPath}|${content}`),
    order,
    entityMentions: [],
    ...overrides
  };
}

export interface OutlineItem {
  title: string;
  page: number;
  children?: OutlineItem[];
}

/**
 * A minimal single-font PDF with one line of text per page and an optional outline
 */
export function buildPdf(pageTexts: string[], outline: OutlineItem[] = []): Buffer {
  const objects: string[] = [];
  const reserve = (): number => objects.push('');
  const define = (num: number, body: string): void => {
    objects[num - 1] = body;
  };

  const catalog = reserve();
  const pagesRoot = reserve();
  const font = reserve();
  define(font, '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>');

  const pageIds = pageTexts.map(text => {
    const page = reserve();
    const content = reserve();
    const stream = `BT /F1 12 Tf 72 720 Td (${text}) Tj ET`;
    define(content, `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`);
    define(
      page,
      `<< /Type /Page /Parent ${pagesRoot} 0 R /MediaBox [0 0 612 792] ` +
      `/Resources << /Font << /F1 ${font} 0 R >> >> /Contents ${content} 0 R >>`
    );
    return page;
  });
  define(pagesRoot, `<< /Type /Pages /Kids [${pageIds.map(id => `${id} 0 R`).join(' ')}] /Count ${pageIds.length} >>`);

  const addItems = (items: OutlineItem[], parent: number): number[] => {
    const ids = items.map(() => reserve());
    items.forEach((item, i) => {
      const fields = [
        `/Title (${item.title})`,
        `/Parent ${parent} 0 R`,
        `/Dest [${pageIds[item.page - 1]} 0 R /XYZ 0 792 0]`
      ];
      if (i > 0) {
        fields.push(`/Prev ${ids[i - 1]} 0 R`);
      }
      if (i < ids.length - 1) {
        fields.push(`/Next ${ids[i + 1]} 0 R`);
      }
      const children = addItems(item.children ?? [], ids[i]);
      if (children.length > 0) {
        fields.push(`/First ${children[0]} 0 R /Last ${children[children.length - 1]} 0 R /Count ${children.length}`);
      }
      define(ids[i], `<< ${fields.join(' ')} >>`);
    });
    return ids;
  };

  if (outline.length > 0) {
    const root = reserve();
    const top = addItems(outline, root);
    define(root, `<< /Type /Outlines /First ${top[0]} 0 R /Last ${top[top.length - 1]} 0 R /Count ${top.length} >>`);
    define(catalog, `<< /Type /Catalog /Pages ${pagesRoot} 0 R /Outlines ${root} 0 R >>`);
  } else {
    define(catalog, `<< /Type /Catalog /Pages ${pagesRoot} 0 R >>`);
  }

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root ${catalog} 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(pdf, 'latin1');
}

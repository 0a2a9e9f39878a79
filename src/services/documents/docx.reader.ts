/**
 * Word (.docx) reader: body paragraphs and footnotes as plain text, tables as
 * rows of cell text. Paragraphs inside tables are kept out of the body text.
 */

import JSZip from 'jszip';
import { logger } from '../../utils/logger';
import { EMPTY_DOCUMENT, type DocumentSource } from './document.types';

const DOCUMENT_PART = 'word/document.xml';
const FOOTNOTES_PART = 'word/footnotes.xml';

const PARAGRAPH_PATTERN = /<w:p(?:\s[^>]*)?>([\s\S]*?)<\/w:p>/g;
const RUN_CONTENT_PATTERN = /<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>|<w:tab\/>|<w:br(?:\s[^>]*)?\/>/g;
const FOOTNOTE_PATTERN = /<w:footnote(\s[^>]*)?>([\s\S]*?)<\/w:footnote>/g;
const SEPARATOR_TYPE = /w:type="(?:separator|continuationSeparator|continuationNotice)"/;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-z]+);/g, (entity, body: string) => {
    if (body.startsWith('#x')) return String.fromCodePoint(parseInt(body.slice(2), 16));
    if (body.startsWith('#')) return String.fromCodePoint(parseInt(body.slice(1), 10));
    return NAMED_ENTITIES[body] ?? entity;
  });
}

/**
 * Inner XML of each outermost `<tag>` element, in order. Nested elements of
 * the same tag stay inside their parent's content.
 */
export function topLevelElements(xml: string, tag: string): string[] {
  const marker = new RegExp(`<${tag}(?:\\s[^>]*)?>|</${tag}>`, 'g');
  const elements: string[] = [];
  let depth = 0;
  let start = 0;

  for (const match of xml.matchAll(marker)) {
    const index = match.index ?? 0;
    if (match[0].startsWith('</')) {
      if (depth === 0) continue;
      depth--;
      if (depth === 0) elements.push(xml.slice(start, index));
    } else {
      if (depth === 0) start = index + match[0].length;
      depth++;
    }
  }

  return elements;
}

function removeTopLevel(xml: string, tag: string): string {
  const marker = new RegExp(`<${tag}(?:\\s[^>]*)?>|</${tag}>`, 'g');
  let depth = 0;
  let kept = '';
  let cursor = 0;

  for (const match of xml.matchAll(marker)) {
    const index = match.index ?? 0;
    if (match[0].startsWith('</')) {
      if (depth === 0) continue;
      depth--;
      if (depth === 0) cursor = index + match[0].length;
    } else {
      if (depth === 0) kept += xml.slice(cursor, index);
      depth++;
    }
  }

  return depth === 0 ? kept + xml.slice(cursor) : kept;
}

function paragraphText(paragraphXml: string): string {
  let text = '';
  for (const match of paragraphXml.matchAll(RUN_CONTENT_PATTERN)) {
    if (match[1] !== undefined) {
      text += decodeXmlEntities(match[1]);
    } else if (match[0].startsWith('<w:tab')) {
      text += '\t';
    } else {
      text += '\n';
    }
  }
  return text;
}

function paragraphs(xml: string): string[] {
  return [...xml.matchAll(PARAGRAPH_PATTERN)]
    .map((match) => paragraphText(match[1]))
    .filter((text) => text.trim().length > 0);
}

function tableRows(bodyXml: string): string[][] {
  const rows: string[][] = [];
  for (const table of topLevelElements(bodyXml, 'w:tbl')) {
    for (const row of topLevelElements(table, 'w:tr')) {
      const cells = topLevelElements(row, 'w:tc').map((cell) =>
        paragraphs(removeTopLevel(cell, 'w:tbl'))
          .map((text) => text.trim())
          .join(' ')
      );
      rows.push(cells);
    }
  }
  return rows;
}

function footnoteParagraphs(footnotesXml: string): string[] {
  const found: string[] = [];
  for (const match of footnotesXml.matchAll(FOOTNOTE_PATTERN)) {
    if (SEPARATOR_TYPE.test(match[1] ?? '')) continue;
    found.push(...paragraphs(match[2]));
  }
  return found;
}

/**
 * Parse a .docx archive. An unreadable archive yields an empty document.
 */
export async function readDocx(data: Buffer | Uint8Array): Promise<DocumentSource> {
  try {
    const zip = await JSZip.loadAsync(data);
    const documentPart = zip.file(DOCUMENT_PART);
    if (!documentPart) {
      logger.warn('Archive has no document part');
      return EMPTY_DOCUMENT;
    }

    const documentXml = await documentPart.async('string');
    const bodyMatch = /<w:body>([\s\S]*)<\/w:body>/.exec(documentXml);
    const bodyXml = bodyMatch ? bodyMatch[1] : documentXml;

    const footnotesPart = zip.file(FOOTNOTES_PART);
    const footnotes = footnotesPart ? footnoteParagraphs(await footnotesPart.async('string')) : [];

    const text = [...paragraphs(removeTopLevel(bodyXml, 'w:tbl')), ...footnotes];

    return {
      fullText: text.join('\n'),
      tableRows: tableRows(bodyXml),
    };
  } catch (error) {
    logger.warn({ error }, 'Failed to read docx archive');
    return EMPTY_DOCUMENT;
  }
}

/**
 * Only `.docx` uploads are parsed; anything else is an empty document.
 */
export async function readUploadedDocument(
  filename: string,
  data: Buffer | Uint8Array
): Promise<DocumentSource> {
  if (!filename.toLowerCase().endsWith('.docx')) {
    logger.info({ filename }, 'Skipping unsupported upload');
    return EMPTY_DOCUMENT;
  }
  return readDocx(data);
}

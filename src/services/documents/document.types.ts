/**
 * Plain-text view of an uploaded document.
 */
export interface DocumentSource {
  /** Body paragraphs and footnotes, one paragraph per line */
  fullText: string;
  /** Table rows as cell texts, in document order */
  tableRows: string[][];
}

export const EMPTY_DOCUMENT: DocumentSource = Object.freeze({ fullText: '', tableRows: [] });

/**
 * Output of the document-parsing collaborator
 *
 * Markdown comes back with every heading at a single level; figures are
 * returned separately as base64 payloads keyed by element id.
 */
export interface ParsedDocument {
  markdown: string;

  /**
   * Base64 image payloads keyed by element id
   */
  images: Record<string, string>;
}

/**
 * Anything that can turn a PDF on disk into refined Markdown
 *
 * Implemented by PDFParser; curation jobs depend only on this contract.
 */
export interface MarkdownSource {
  process(pdfPath: string): Promise<string>;
}

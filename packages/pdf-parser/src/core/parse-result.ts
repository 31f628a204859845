import type { ParsedDocument } from '@silverforge/model';

/**
 * Escape a string for literal use inside a RegExp
 */
function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * ParseResult
 *
 * Markdown returned by the Document Parse API together with the figures it
 * extracted. Images stay separate until toMarkdownWithImages() inlines them.
 */
export class ParseResult implements ParsedDocument {
  constructor(
    public markdown: string,
    public readonly images: Record<string, string> = {},
    public readonly rawResponse?: unknown,
  ) {}

  /**
   * Markdown with every `![alt](<imageId>)` reference replaced by a base64 data URI
   */
  toMarkdownWithImages(): string {
    let result = this.markdown;

    for (const [imageId, imageData] of Object.entries(this.images)) {
      const pattern = new RegExp(
        `!\\[([^\\]]*)\\]\\(${escapeRegExp(imageId)}\\)`,
        'g',
      );
      result = result.replace(
        pattern,
        (_match, alt: string) => `![${alt}](data:image/png;base64,${imageData})`,
      );
    }

    return result;
  }
}

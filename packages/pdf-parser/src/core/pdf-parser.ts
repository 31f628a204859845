import type { LoggerMethods } from '@silverforge/logger';
import type { MarkdownSource } from '@silverforge/model';

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { PDF_PARSER } from '../config/constants';
import {
  DocumentParseError,
  ParseInputError,
  ParseRequestError,
  ParserConfigurationError,
} from '../errors/document-parse-error';
import { refineHeadings } from '../processors/heading-refiner';
import {
  type DocumentParseResponse,
  DocumentParseResponseSchema,
} from '../types/document-parse-response';
import { ParseResult } from './parse-result';

export interface PDFParserOptions {
  logger: LoggerMethods;

  /**
   * Upstage API key. Falls back to the UPSTAGE_API_KEY environment variable.
   */
  apiKey?: string;

  /**
   * Document Parse endpoint (default: Upstage production endpoint)
   */
  apiUrl?: string;

  /**
   * Request timeout in milliseconds (default: 180000)
   */
  timeout?: number;
}

export interface PDFParseOptions {
  /**
   * Ask the API for figure payloads (default: true)
   */
  extractImages?: boolean;
}

const IMAGE_CATEGORIES: readonly string[] = PDF_PARSER.IMAGE_CATEGORIES;

/**
 * PDFParser - PDF to Markdown through the Upstage Document Parse API
 *
 * The API returns Markdown whose headings are all at one level; process()
 * runs the result through refineHeadings() to rebuild the hierarchy.
 *
 * @example
 * ```typescript
 * const parser = new PDFParser({ logger: getLogger() });
 *
 * const markdown = await parser.process('paper.pdf');
 * ```
 */
export class PDFParser implements MarkdownSource {
  private readonly logger: LoggerMethods;
  private readonly apiKey?: string;
  private readonly apiUrl: string;
  private readonly timeout: number;

  constructor(options: PDFParserOptions) {
    const {
      logger,
      apiKey,
      apiUrl = PDF_PARSER.API_URL,
      timeout = PDF_PARSER.DEFAULT_TIMEOUT_MS,
    } = options;

    this.logger = logger;
    this.apiKey = apiKey;
    this.apiUrl = apiUrl;
    this.timeout = timeout;
  }

  /**
   * Parse a PDF into Markdown and separately returned figures
   *
   * @throws {ParserConfigurationError} When no API key is configured
   * @throws {ParseInputError} When the file does not exist
   * @throws {ParseRequestError} When the API answers with a non-success status
   * @throws {DocumentParseError} On transport failures or an unexpected response body
   */
  async parse(
    pdfPath: string,
    options: PDFParseOptions = {},
  ): Promise<ParseResult> {
    const { extractImages = true } = options;
    const apiKey = this.resolveApiKey();

    if (!existsSync(pdfPath)) {
      throw new ParseInputError(pdfPath);
    }

    this.logger.info(`[PDFParser] Parsing ${basename(pdfPath)}...`);

    const body = await this.buildRequestBody(pdfPath, extractImages);
    const { payload, raw } = await this.request(apiKey, body);
    const result = this.toParseResult(payload, raw);

    this.logger.info(
      `[PDFParser] Parsed ${basename(pdfPath)}: ${result.markdown.length} chars, ${Object.keys(result.images).length} images`,
    );

    return result;
  }

  /**
   * Parse a PDF into Markdown with figures inlined as data URIs
   */
  async parseToMarkdown(pdfPath: string, extractImages = true): Promise<string> {
    const result = await this.parse(pdfPath, { extractImages });
    return result.toMarkdownWithImages();
  }

  /**
   * Parse a PDF and rebuild its heading hierarchy
   *
   * @returns Refined Markdown with figures inlined
   */
  async process(pdfPath: string): Promise<string> {
    const markdown = await this.parseToMarkdown(pdfPath);
    return refineHeadings(markdown);
  }

  /**
   * Parse a PDF and rebuild its heading hierarchy, keeping figures separate
   */
  async processWithImages(pdfPath: string): Promise<ParseResult> {
    const result = await this.parse(pdfPath, { extractImages: true });
    result.markdown = refineHeadings(result.markdown);
    return result;
  }

  private resolveApiKey(): string {
    const apiKey = this.apiKey ?? process.env[PDF_PARSER.API_KEY_ENV_VAR];
    if (!apiKey) {
      throw new ParserConfigurationError(
        `API key not found. Provide it via options.apiKey or set the ${PDF_PARSER.API_KEY_ENV_VAR} environment variable.`,
      );
    }
    return apiKey;
  }

  private async buildRequestBody(
    pdfPath: string,
    extractImages: boolean,
  ): Promise<FormData> {
    let content: Buffer;
    try {
      content = await readFile(pdfPath);
    } catch (error) {
      throw new ParseInputError(pdfPath, { cause: error });
    }

    const form = new FormData();
    form.append(
      'document',
      new Blob([new Uint8Array(content)], { type: 'application/pdf' }),
      basename(pdfPath),
    );
    form.append('output_format', 'markdown');

    if (extractImages) {
      form.append('base64_encoding', PDF_PARSER.BASE64_ENCODING);
    }

    return form;
  }

  private async request(
    apiKey: string,
    body: FormData,
  ): Promise<{ payload: DocumentParseResponse; raw: unknown }> {
    let response: Response;
    try {
      response = await fetch(this.apiUrl, {
        method: 'POST',
        headers: { Authorization: `Bearer ${apiKey}` },
        body,
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      this.logger.error('[PDFParser] Request failed:', error);
      throw DocumentParseError.fromError('Document Parse request failed', error);
    }

    if (!response.ok) {
      const responseText = await response.text();
      this.logger.error(
        `[PDFParser] Document Parse API returned ${response.status}`,
      );
      throw new ParseRequestError(response.status, responseText);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw DocumentParseError.fromError(
        'Document Parse response is not valid JSON',
        error,
      );
    }

    const parsed = DocumentParseResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new DocumentParseError(
        `Unexpected Document Parse response: ${parsed.error.message}`,
      );
    }

    return { payload: parsed.data, raw: json };
  }

  /**
   * Collect Markdown and figures from the response
   *
   * Figures the Markdown does not reference are appended at the end.
   */
  private toParseResult(
    payload: DocumentParseResponse,
    raw: unknown,
  ): ParseResult {
    let markdown = payload.content?.markdown || payload.content?.text || '';
    const images: Record<string, string> = {};

    for (const element of payload.elements ?? []) {
      if (!element.category || !IMAGE_CATEGORIES.includes(element.category)) {
        continue;
      }

      const imageData = element.base64_encoding;
      if (!imageData) continue;

      images[element.id] = imageData;

      const referenced =
        markdown.includes(`![${element.id}]`) || markdown.includes(element.id);
      if (!referenced) {
        markdown += `\n\n![Figure ${element.id}](data:image/png;base64,${imageData})\n`;
      }
    }

    return new ParseResult(markdown, images, raw);
  }
}

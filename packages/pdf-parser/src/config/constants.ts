/**
 * Configuration constants for PDFParser
 */
export const PDF_PARSER = {
  /**
   * Upstage Document Parse endpoint
   */
  API_URL: 'https://api.upstage.ai/v1/document-ai/document-parse',

  /**
   * Environment variable holding the API key when none is passed in options
   */
  API_KEY_ENV_VAR: 'UPSTAGE_API_KEY',

  /**
   * Request timeout in milliseconds
   */
  DEFAULT_TIMEOUT_MS: 180000,

  /**
   * Element categories whose base64 payloads are collected as images
   */
  IMAGE_CATEGORIES: ['figure', 'chart', 'diagram', 'image'],

  /**
   * Categories the API is asked to return as base64 when images are extracted
   */
  BASE64_ENCODING: "['figure']",
} as const;

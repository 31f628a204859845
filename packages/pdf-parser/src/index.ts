export { PDFParser } from './core/pdf-parser';
export type { PDFParseOptions, PDFParserOptions } from './core/pdf-parser';
export { ParseResult } from './core/parse-result';
export { PDF_PARSER } from './config/constants';
export {
  DocumentParseError,
  ParseInputError,
  ParseRequestError,
  ParserConfigurationError,
} from './errors/document-parse-error';
export {
  HEADING_RULES,
  HeadingRefiner,
  SECTION_NAMES,
  refineHeadings,
} from './processors/heading-refiner';
export type { HeadingDepth, HeadingRule } from './processors/heading-refiner';
export {
  DocumentParseElementSchema,
  DocumentParseResponseSchema,
} from './types/document-parse-response';
export type {
  DocumentParseElement,
  DocumentParseResponse,
} from './types/document-parse-response';

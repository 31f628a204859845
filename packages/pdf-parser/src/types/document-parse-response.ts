import { z } from 'zod';

/**
 * One layout element of a Document Parse response
 *
 * Element ids arrive as numbers; they are normalized to strings because
 * they are used as image keys and matched against Markdown text.
 */
export const DocumentParseElementSchema = z.object({
  id: z
    .union([z.string(), z.number()])
    .optional()
    .transform((id) => (id === undefined ? '' : String(id))),
  category: z.string().optional(),
  page: z.number().optional(),
  base64_encoding: z.string().optional(),
});

/**
 * Fields of the Document Parse response this package reads
 */
export const DocumentParseResponseSchema = z.object({
  content: z
    .object({
      markdown: z.string().nullish(),
      text: z.string().nullish(),
    })
    .optional(),
  elements: z.array(DocumentParseElementSchema).optional(),
});

export type DocumentParseElement = z.infer<typeof DocumentParseElementSchema>;
export type DocumentParseResponse = z.infer<typeof DocumentParseResponseSchema>;

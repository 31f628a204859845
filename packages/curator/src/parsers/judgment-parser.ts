import { z } from 'zod';

const SubScoreSchema = z
  .number()
  .min(0)
  .max(10)
  .transform((score) => Math.round(score));

/**
 * Judgment object the semantic evaluator asks the model for
 *
 * Sub-scores are rounded. overall_score is kept as given, so the pass
 * threshold sees the judge's own value; it has no upper bound here and the
 * curator clamps the blended score instead.
 */
export const SemanticJudgmentSchema = z.object({
  structure_score: SubScoreSchema,
  completeness_score: SubScoreSchema,
  coherence_score: SubScoreSchema,
  overall_score: z.number().min(0),
  issues: z.array(z.string()).default([]),
  recommendation: z.string().default(''),
});

export type SemanticJudgment = z.output<typeof SemanticJudgmentSchema>;

export type JudgmentParseErrorKind =
  | 'empty-response'
  | 'invalid-json'
  | 'schema-mismatch';

export type JudgmentParseResult =
  | { ok: true; judgment: SemanticJudgment }
  | { ok: false; kind: JudgmentParseErrorKind; detail: string };

/**
 * Remove a surrounding Markdown code fence (```json ... ```)
 */
export function stripCodeFence(content: string): string {
  let lines = content.split('\n');

  if (lines[0].startsWith('```')) {
    lines = lines.slice(1);
  }
  if (lines.length > 0 && lines[lines.length - 1].trim().startsWith('```')) {
    lines = lines.slice(0, -1);
  }

  return lines.join('\n').trim();
}

/**
 * Parse a judge completion into a SemanticJudgment
 *
 * Model output is untrusted, so failures are returned as values rather than
 * thrown.
 */
export function parseJudgment(completion: string): JudgmentParseResult {
  let content = completion.trim();
  if (content === '') {
    return { ok: false, kind: 'empty-response', detail: 'Completion is empty' };
  }

  if (content.startsWith('```')) {
    content = stripCodeFence(content);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      kind: 'invalid-json',
      detail: error instanceof Error ? error.message : String(error),
    };
  }

  const parsed = SemanticJudgmentSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      kind: 'schema-mismatch',
      detail: parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    };
  }

  return { ok: true, judgment: parsed.data };
}

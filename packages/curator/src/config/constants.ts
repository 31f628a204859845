/**
 * Judge model used by the semantic evaluator
 *
 * Solar is served through an OpenAI-compatible endpoint.
 */
export const JUDGE_MODEL = {
  BASE_URL: 'https://api.upstage.ai/v1',
  MODEL_ID: 'solar-pro',
  API_KEY_ENV_VAR: 'UPSTAGE_API_KEY',
  TEMPERATURE: 0.1,
  MAX_RETRIES: 3,
} as const;

export const SEMANTIC_EVALUATION = {
  /**
   * Characters of the document sent to the judge
   */
  MAX_CHARS: 3000,
  PASS_SCORE: 70,
  TRUNCATION_NOTICE: '\n\n... (document truncated)',
} as const;

export const TEXT_QUALITY = {
  /**
   * Character error rate must stay below this to pass
   */
  MAX_CER: 0.15,
} as const;

export const CURATION = {
  STRUCTURE_BONUS: 10,
  TEXT_BONUS: 10,
  MAX_SCORE: 100,
  RECOMMENDATION: {
    ALL_PASSED: 'Usable: all checks passed',
    SEMANTIC_REVIEW: 'Usable: semantic review recommended',
    NEEDS_REVISION: 'Needs revision: structural/text issues found',
  },
} as const;

export const CURATION_JOB = {
  DEFAULT_CONCURRENCY: 1,
  RESULT_SUFFIX: '_silver.md',
  PROGRESS: {
    STARTED: 10,
    SOURCE_READY: 20,
    PARSED: 60,
    CURATING: 70,
    CURATED: 90,
    COMPLETED: 100,
  },
} as const;

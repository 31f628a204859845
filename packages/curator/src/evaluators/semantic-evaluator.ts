import type { LoggerMethods } from '@silverforge/logger';
import type { SemanticReport } from '@silverforge/model';
import type { LLMTokenUsageAggregator } from '@silverforge/shared';
import type { LanguageModel } from 'ai';

import { getLogger } from '@silverforge/logger';

import { JUDGE_MODEL, SEMANTIC_EVALUATION } from '../config/constants';
import { createJudgeModel } from '../config/judge-model';
import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';
import { CurationError } from '../errors/curation-error';
import { parseJudgment } from '../parsers/judgment-parser';

export interface SemanticEvaluatorOptions extends BaseLLMComponentOptions {
  /**
   * Characters of the document sent to the judge (default: 3000)
   */
  maxChars?: number;
}

const MANUAL_REVIEW = 'Manual review required';

/**
 * Cut a document to maxChars code points, marking the cut
 *
 * A negative maxChars counts as 0.
 */
export function truncateDocument(markdown: string, maxChars: number): string {
  const limit = Math.max(0, maxChars);
  const chars = [...markdown];
  if (chars.length <= limit) {
    return markdown;
  }
  return chars.slice(0, limit).join('') + SEMANTIC_EVALUATION.TRUNCATION_NOTICE;
}

/**
 * Zero-scored report for any evaluation that could not produce a judgment
 */
function failedReport(
  issue: string,
  recommendation: string,
  rawResponse?: string,
): SemanticReport {
  const report: SemanticReport = {
    structureScore: 0,
    completenessScore: 0,
    coherenceScore: 0,
    overallScore: 0,
    issues: [issue],
    recommendation,
    pass: false,
  };
  if (rawResponse !== undefined) {
    report.rawResponse = rawResponse;
  }
  return report;
}

/**
 * SemanticEvaluator
 *
 * Asks a language model to judge section order, completeness and coherence
 * of a document. The completion is untrusted: configuration, call and parse
 * failures all become zero-scored reports, so evaluate() never rejects.
 */
export class SemanticEvaluator extends TextLLMComponent {
  private readonly maxChars: number;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel | undefined,
    options?: SemanticEvaluatorOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(
      logger,
      model,
      'SemanticEvaluator',
      {
        maxRetries: options?.maxRetries ?? JUDGE_MODEL.MAX_RETRIES,
        temperature: options?.temperature ?? JUDGE_MODEL.TEMPERATURE,
        abortSignal: options?.abortSignal,
      },
      fallbackModel,
      aggregator,
    );
    this.maxChars = options?.maxChars ?? SEMANTIC_EVALUATION.MAX_CHARS;
  }

  async evaluate(
    markdown: string,
    maxChars: number = this.maxChars,
  ): Promise<SemanticReport> {
    if (!this.isConfigured()) {
      this.log('warn', `${JUDGE_MODEL.API_KEY_ENV_VAR} not configured`);
      return failedReport(
        `${JUDGE_MODEL.API_KEY_ENV_VAR} not configured`,
        'Configure API key',
      );
    }

    const document = truncateDocument(markdown, maxChars);

    let completion: string;
    try {
      const { output } = await this.callTextLLM(
        this.buildSystemPrompt(),
        this.buildUserPrompt(document),
        'judgment',
      );
      completion = output;
    } catch (error) {
      const message = CurationError.getErrorMessage(error);
      this.log('error', `Evaluation failed: ${message}`);
      return failedReport(`Evaluation error: ${message}`, MANUAL_REVIEW);
    }

    const parsed = parseJudgment(completion);
    if (!parsed.ok) {
      this.log('warn', `Unusable judgment (${parsed.kind}): ${parsed.detail}`);
      return failedReport(
        'Failed to parse LLM response',
        MANUAL_REVIEW,
        completion,
      );
    }

    const { judgment } = parsed;
    const pass = judgment.overall_score >= SEMANTIC_EVALUATION.PASS_SCORE;

    this.log(
      'info',
      `Judgment: overall=${judgment.overall_score}, pass=${pass}`,
    );

    return {
      structureScore: judgment.structure_score,
      completenessScore: judgment.completeness_score,
      coherenceScore: judgment.coherence_score,
      overallScore: judgment.overall_score,
      issues: judgment.issues,
      recommendation: judgment.recommendation,
      pass,
    };
  }

  protected buildSystemPrompt(): string {
    return 'You are an expert reviewer of academic document quality. You assess Markdown converted from PDF papers and answer with a single JSON object only.';
  }

  protected buildUserPrompt(document: string): string {
    return `Evaluate the quality of the following Markdown document.

[Document]
${document}

[Criteria]
1. Structure (1-10): Are the sections in a logical order?
2. Completeness (1-10): Does it contain the essential parts of an academic paper (Abstract, Introduction, Method, Results, Conclusion, etc.)?
3. Coherence (1-10): Is the content consistent and easy to read?

[Response format]
Respond with JSON only:
{
    "structure_score": 8,
    "completeness_score": 9,
    "coherence_score": 7,
    "overall_score": 80,
    "issues": ["problem found 1", "problem found 2"],
    "recommendation": "Ready for chunking - minor issues only"
}`;
  }
}

export interface EvaluateSemanticOptions extends BaseLLMComponentOptions {
  logger?: LoggerMethods;

  /**
   * Judge model; built from apiKey or UPSTAGE_API_KEY when omitted
   */
  model?: LanguageModel;

  apiKey?: string;
  fallbackModel?: LanguageModel;
  aggregator?: LLMTokenUsageAggregator;
}

/**
 * Judge a document with the default Solar model
 *
 * Resolves to a zero-scored report when no API key is configured, without
 * calling the model.
 */
export async function evaluateSemantic(
  markdown: string,
  maxChars: number = SEMANTIC_EVALUATION.MAX_CHARS,
  options: EvaluateSemanticOptions = {},
): Promise<SemanticReport> {
  const {
    logger = getLogger(),
    apiKey,
    model = createJudgeModel({ apiKey }),
    fallbackModel,
    aggregator,
    ...componentOptions
  } = options;

  const evaluator = new SemanticEvaluator(
    logger,
    model,
    { ...componentOptions, maxChars },
    fallbackModel,
    aggregator,
  );

  return evaluator.evaluate(markdown);
}

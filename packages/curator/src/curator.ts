import type { LoggerMethods } from '@silverforge/logger';
import type {
  CurationReport,
  SemanticReport,
  StructureReport,
  TextQualityReport,
  TokenUsageReport,
} from '@silverforge/model';
import type { LanguageModel } from 'ai';

import { getLogger } from '@silverforge/logger';
import { LLMTokenUsageAggregator } from '@silverforge/shared';

import type { TextComparator } from './comparators/text-comparator';

import { CURATION } from './config/constants';
import { createJudgeModel } from './config/judge-model';
import { CurationError } from './errors/curation-error';
import { SemanticEvaluator } from './evaluators/semantic-evaluator';
import { evaluateStructure } from './evaluators/structure-evaluator';
import { evaluateTextQuality } from './evaluators/text-quality-evaluator';

export interface CuratorOptions {
  logger: LoggerMethods;

  /**
   * Judge model; built from apiKey or UPSTAGE_API_KEY when omitted
   */
  model?: LanguageModel;

  apiKey?: string;
  fallbackModel?: LanguageModel;

  /**
   * Characters of the document sent to the judge (default: 3000)
   */
  maxChars?: number;

  maxRetries?: number;
  temperature?: number;
  abortSignal?: AbortSignal;

  /**
   * CER/WER implementation (default: EditDistanceComparator)
   */
  comparator?: TextComparator;

  /**
   * Shared token usage aggregator; a private one is created when omitted
   */
  aggregator?: LLMTokenUsageAggregator;
}

/**
 * Blend three sub-reports into a curation verdict
 *
 * Score = semantic score + 10 for a structural pass + 10 for a text pass,
 * capped at 100.
 */
export function combineReports(
  textQuality: TextQualityReport,
  structureQuality: StructureReport,
  semanticQuality: SemanticReport,
): CurationReport {
  const pass = textQuality.pass && structureQuality.pass && semanticQuality.pass;

  const overallScore = Math.min(
    CURATION.MAX_SCORE,
    semanticQuality.overallScore +
      (structureQuality.pass ? CURATION.STRUCTURE_BONUS : 0) +
      (textQuality.pass ? CURATION.TEXT_BONUS : 0),
  );

  let recommendation: string;
  if (pass) {
    recommendation = CURATION.RECOMMENDATION.ALL_PASSED;
  } else if (structureQuality.pass && textQuality.pass) {
    recommendation = CURATION.RECOMMENDATION.SEMANTIC_REVIEW;
  } else {
    recommendation = CURATION.RECOMMENDATION.NEEDS_REVISION;
  }

  return {
    pass,
    textQuality,
    structureQuality,
    semanticQuality,
    overallScore,
    recommendation,
  };
}

/**
 * Curator
 *
 * Runs the text-quality, structural and semantic evaluators on one document
 * and combines their reports. The evaluators are independent; the semantic
 * one is the only one that leaves the process.
 *
 * @example
 * ```typescript
 * const curator = new Curator({ logger: getLogger() });
 *
 * const report = await curator.curate(markdown);
 * console.log(report.overallScore, report.recommendation);
 * ```
 */
export class Curator {
  private readonly logger: LoggerMethods;
  private readonly comparator?: TextComparator;
  private readonly aggregator: LLMTokenUsageAggregator;
  private readonly semanticEvaluator: SemanticEvaluator;

  constructor(options: CuratorOptions) {
    this.logger = options.logger;
    this.comparator = options.comparator;
    this.aggregator = options.aggregator ?? new LLMTokenUsageAggregator();
    this.semanticEvaluator = new SemanticEvaluator(
      options.logger,
      options.model ?? createJudgeModel({ apiKey: options.apiKey }),
      {
        maxChars: options.maxChars,
        maxRetries: options.maxRetries,
        temperature: options.temperature,
        abortSignal: options.abortSignal,
      },
      options.fallbackModel,
      this.aggregator,
    );
  }

  /**
   * Evaluate a document on all three axes
   *
   * @param reference - Original text for CER/WER, when available
   */
  async curate(markdown: string, reference?: string): Promise<CurationReport> {
    const [textQuality, structureQuality, semanticQuality] = await Promise.all([
      this.evaluateText(markdown, reference),
      evaluateStructure(markdown),
      this.semanticEvaluator.evaluate(markdown),
    ]);

    const report = combineReports(
      textQuality,
      structureQuality,
      semanticQuality,
    );

    this.logger.info(
      `[Curator] Curation complete: score=${report.overallScore}, pass=${report.pass}`,
    );

    return report;
  }

  /**
   * Token usage of the judge calls made so far
   */
  getTokenUsageReport(): TokenUsageReport {
    return this.aggregator.getReport();
  }

  /**
   * Log judge token usage by component and phase
   */
  logTokenUsage(): void {
    this.aggregator.logSummary(this.logger, 'Curator');
  }

  /**
   * A failing comparator degrades to the reference-free report
   */
  private evaluateText(markdown: string, reference?: string): TextQualityReport {
    try {
      return evaluateTextQuality(markdown, reference, this.comparator);
    } catch (error) {
      this.logger.warn(
        `[Curator] Text comparison failed, skipping CER/WER: ${CurationError.getErrorMessage(error)}`,
      );
      return evaluateTextQuality(markdown);
    }
  }
}

/**
 * Curate a document with the default judge model and a console logger
 *
 * Never rejects because a collaborator failed; degraded evaluations show up
 * as issues in the report.
 */
export async function curate(
  markdown: string,
  reference?: string,
  options: Partial<CuratorOptions> = {},
): Promise<CurationReport> {
  const curator = new Curator({
    ...options,
    logger: options.logger ?? getLogger(),
  });

  const report = await curator.curate(markdown, reference);
  curator.logTokenUsage();

  return report;
}

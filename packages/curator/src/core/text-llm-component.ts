import type { LoggerMethods } from '@silverforge/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@silverforge/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller } from '@silverforge/shared';

import { JudgeConfigurationError } from '../errors/curation-error';
import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for text-based LLM components
 *
 * Extends BaseLLMComponent with a helper for plain-text completions through
 * LLMCaller.callText(). Parsing the completion is left to the subclass.
 *
 * Subclasses: SemanticEvaluator
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel | undefined,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, componentName, options, fallbackModel, aggregator);
  }

  /**
   * Call LLM with text-based prompts
   *
   * @param phase - Phase name for tracking (e.g., 'judgment')
   * @returns Completion text and usage information
   * @throws {JudgeConfigurationError} When no primary model is configured
   */
  protected async callTextLLM(
    systemPrompt: string,
    userPrompt: string,
    phase: string,
  ): Promise<{ output: string; usage: ExtendedTokenUsage }> {
    if (!this.model) {
      throw new JudgeConfigurationError(
        `${this.componentName} has no language model configured`,
      );
    }

    const result = await LLMCaller.callText({
      systemPrompt,
      userPrompt,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      abortSignal: this.abortSignal,
      component: this.componentName,
      phase,
    });

    this.trackUsage(result.usage);

    return {
      output: result.output,
      usage: result.usage,
    };
  }
}

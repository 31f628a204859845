import { type LanguageModel, generateText } from 'ai';

/**
 * Configuration for a plain-text LLM call with fallback support
 */
export interface LLMTextCallConfig {
  /**
   * System prompt for LLM
   */
  systemPrompt: string;

  /**
   * User prompt for LLM
   */
  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model, tried once after the primary model exhausts maxRetries
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model, handled by the AI SDK
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'SemanticEvaluator')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'judgment')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface GenerationResponse<T> {
  output: T;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
}

/**
 * LLMCaller - Centralized LLM API caller with fallback support
 *
 * Wraps AI SDK's generateText:
 * 1. Try primary model (the SDK retries up to maxRetries)
 * 2. If it still fails and a fallbackModel is provided, try the fallback
 * 3. Return usage data with model type indicator
 *
 * The completion is returned as raw text. Callers that expect structured
 * output parse it themselves, since model output is untrusted.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.callText({
 *   systemPrompt: 'You are a document quality reviewer',
 *   userPrompt: 'Rate this markdown...',
 *   primaryModel: upstage.chat('solar-pro'),
 *   maxRetries: 3,
 *   component: 'SemanticEvaluator',
 *   phase: 'judgment',
 * });
 *
 * console.log(result.output);        // Completion text
 * console.log(result.usage);         // Token usage with model info
 * console.log(result.usedFallback);  // Whether fallback was used
 * ```
 */
export class LLMCaller {
  /**
   * Extract model name from LanguageModel object
   *
   * A LanguageModel is either a model id string or a model object.
   */
  private static extractModelName(model: LanguageModel): string {
    if (typeof model === 'string') return model;
    return model.modelId;
  }

  private static buildUsage(
    config: LLMTextCallConfig,
    modelName: string,
    response: GenerationResponse<unknown>,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
      totalTokens: response.usage?.totalTokens ?? 0,
    };
  }

  /**
   * Execute LLM call with fallback support
   *
   * An aborted call is never retried on the fallback model.
   */
  private static async executeWithFallback<TOutput>(
    config: LLMTextCallConfig,
    generateFn: (model: LanguageModel) => Promise<GenerationResponse<TOutput>>,
  ): Promise<LLMCallResult<TOutput>> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await generateFn(config.primaryModel);

      return {
        output: response.output,
        usage: this.buildUsage(config, primaryModelName, response, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      if (config.abortSignal?.aborted) {
        throw primaryError;
      }

      if (!config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await generateFn(config.fallbackModel);

      return {
        output: response.output,
        usage: this.buildUsage(config, fallbackModelName, response, true),
        usedFallback: true,
      };
    }
  }

  /**
   * Call LLM and return the completion text
   *
   * @param config - LLM call configuration
   * @returns Completion text with usage information
   * @throws The last error when every model fails
   */
  static async callText(
    config: LLMTextCallConfig,
  ): Promise<LLMCallResult<string>> {
    return this.executeWithFallback(config, async (model) => {
      const result = await generateText({
        model,
        system: config.systemPrompt,
        prompt: config.userPrompt,
        temperature: config.temperature,
        maxRetries: config.maxRetries,
        abortSignal: config.abortSignal,
      });

      return { output: result.text, usage: result.usage };
    });
  }
}

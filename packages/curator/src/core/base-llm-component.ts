import type { LoggerMethods } from '@silverforge/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@silverforge/shared';
import type { LanguageModel } from 'ai';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Maximum retry count for LLM API (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage tracking via optional aggregator
 * - Standard configuration (model, fallback, retries, temperature)
 *
 * The model is optional so a component can exist without credentials and
 * report that state instead of failing at construction.
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model?: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly componentName: string;
  protected readonly aggregator?: LLMTokenUsageAggregator;
  protected readonly abortSignal?: AbortSignal;

  /**
   * @param logger - Logger instance for logging
   * @param model - Primary language model, undefined when not configured
   * @param componentName - Name of the component for logging (e.g., "SemanticEvaluator")
   * @param options - Optional configuration (maxRetries, temperature)
   * @param fallbackModel - Optional fallback model for retry on failure
   * @param aggregator - Optional token usage aggregator for tracking LLM calls
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel | undefined,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.maxRetries = options?.maxRetries ?? 3;
    this.temperature = options?.temperature ?? 0;
    this.fallbackModel = fallbackModel;
    this.aggregator = aggregator;
    this.abortSignal = options?.abortSignal;
  }

  /**
   * Whether a primary model is available
   */
  isConfigured(): boolean {
    return this.model !== undefined;
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Track token usage to aggregator if available
   */
  protected trackUsage(usage: ExtendedTokenUsage): void {
    if (this.aggregator) {
      this.aggregator.track(usage);
    }
  }

  /**
   * Build system prompt for LLM call
   */
  protected abstract buildSystemPrompt(...args: unknown[]): string;

  /**
   * Build user prompt for LLM call
   */
  protected abstract buildUserPrompt(...args: unknown[]): string;
}

/**
 * Token usage report types
 *
 * Breaks LLM token consumption down by component, phase and model type
 * (primary vs fallback).
 */

export interface TokenUsageReport {
  /**
   * Components in the order they first made an LLM call
   */
  components: ComponentUsageReport[];

  total: TokenUsageSummary;
}

/**
 * Usage for one component, e.g. SemanticEvaluator
 */
export interface ComponentUsageReport {
  component: string;
  phases: PhaseUsageReport[];
  total: TokenUsageSummary;
}

/**
 * Usage for one phase of a component, e.g. 'judgment'
 *
 * Only the model whose call succeeded is recorded, so a phase carries
 * fallback usage only when the primary model failed.
 */
export interface PhaseUsageReport {
  phase: string;
  primary?: ModelUsageDetail;
  fallback?: ModelUsageDetail;
  total: TokenUsageSummary;
}

export interface ModelUsageDetail extends TokenUsageSummary {
  /**
   * Model identifier, e.g. 'solar-pro'
   */
  modelName: string;
}

export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

import type { LoggerMethods } from '@silverforge/logger';
import type {
  ComponentUsageReport,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@silverforge/model';

import type { ExtendedTokenUsage } from './llm-caller';

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 input, 300 output, 1800 total"
 */
function formatTokens(usage: TokenUsageSummary): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptySummary(): TokenUsageSummary {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addTo(target: TokenUsageSummary, usage: TokenUsageSummary): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls
 *
 * Collects usage from every component and reports it once at the end of a
 * curation run, grouped by component, phase and model (primary vs fallback).
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'SemanticEvaluator',
 *   phase: 'judgment',
 *   model: 'primary',
 *   modelName: 'solar-pro',
 *   inputTokens: 1500,
 *   outputTokens: 300,
 *   totalTokens: 1800,
 * });
 *
 * aggregator.logSummary(logger, 'Curator');
 * // [Curator] Token usage summary:
 * // SemanticEvaluator:
 * //   - judgment:
 * //       primary (solar-pro): 1500 input, 300 output, 1800 total
 * // ...
 * ```
 */
export class LLMTokenUsageAggregator {
  private components = new Map<string, ComponentUsageReport>();

  /**
   * Track token usage from an LLM call
   */
  track(usage: ExtendedTokenUsage): void {
    let component = this.components.get(usage.component);
    if (!component) {
      component = { component: usage.component, phases: [], total: emptySummary() };
      this.components.set(usage.component, component);
    }

    let phase = component.phases.find((p) => p.phase === usage.phase);
    if (!phase) {
      phase = { phase: usage.phase, total: emptySummary() };
      component.phases.push(phase);
    }

    const modelKey: keyof Pick<PhaseUsageReport, 'primary' | 'fallback'> =
      usage.model;
    const detail = phase[modelKey] ?? {
      modelName: usage.modelName,
      ...emptySummary(),
    };
    addTo(detail, usage);
    phase[modelKey] = detail;

    addTo(phase.total, usage);
    addTo(component.total, usage);
  }

  /**
   * Get token usage report in structured form
   *
   * The report is a deep copy; tracking more usage afterwards does not change it.
   */
  getReport(): TokenUsageReport {
    const components = Array.from(this.components.values()).map(
      (component) => ({
        component: component.component,
        phases: component.phases.map((phase) => ({
          phase: phase.phase,
          ...(phase.primary && { primary: { ...phase.primary } }),
          ...(phase.fallback && { fallback: { ...phase.fallback } }),
          total: { ...phase.total },
        })),
        total: { ...component.total },
      }),
    );

    return { components, total: this.getTotalUsage() };
  }

  /**
   * Get total usage across all components and phases
   */
  getTotalUsage(): TokenUsageSummary {
    const total = emptySummary();
    for (const component of this.components.values()) {
      addTo(total, component.total);
    }
    return total;
  }

  /**
   * Log token usage summary grouped by component and phase
   *
   * @param owner - Name used as the `[owner]` prefix of the heading line
   */
  logSummary(logger: LoggerMethods, owner: string): void {
    if (this.components.size === 0) {
      logger.info(`[${owner}] No token usage to report`);
      return;
    }

    logger.info(`[${owner}] Token usage summary:`);

    for (const component of this.components.values()) {
      logger.info(`${component.component}:`);

      for (const phase of component.phases) {
        logger.info(`  - ${phase.phase}:`);
        if (phase.primary) {
          logger.info(
            `      primary (${phase.primary.modelName}): ${formatTokens(phase.primary)}`,
          );
        }
        if (phase.fallback) {
          logger.info(
            `      fallback (${phase.fallback.modelName}): ${formatTokens(phase.fallback)}`,
          );
        }
      }

      logger.info(
        `  ${component.component} total: ${formatTokens(component.total)}`,
      );
    }

    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }
}

import type { LoggerMethods } from '@papertrans/logger';
import type {
  ComponentUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@papertrans/model';

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

function addInto(target: TokenUsageSummary, usage: TokenUsageSummary): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

/**
 * LLMTokenUsageAggregator - collects token usage across all LLM calls of a run
 *
 * Groups usage by component, then by phase, and logs one summary at the end
 * of a conversion.
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 * aggregator.track({
 *   component: 'LLMTranslationProvider',
 *   phase: 'translation',
 *   modelName: 'gpt-4o-mini',
 *   inputTokens: 1500,
 *   outputTokens: 300,
 *   totalTokens: 1800,
 * });
 * aggregator.logSummary(logger);
 * // [TokenUsage] LLMTranslationProvider:
 * //   - translation (gpt-4o-mini, 1 calls): 1500 input, 300 output, 1800 total
 * // [TokenUsage] Grand total: 1500 input, 300 output, 1800 total
 * ```
 */
export class LLMTokenUsageAggregator {
  private components = new Map<string, ComponentUsageReport>();

  track(usage: ExtendedTokenUsage): void {
    let component = this.components.get(usage.component);
    if (!component) {
      component = {
        component: usage.component,
        phases: [],
        total: emptySummary(),
      };
      this.components.set(usage.component, component);
    }

    let phase = component.phases.find((p) => p.phase === usage.phase);
    if (!phase) {
      phase = {
        phase: usage.phase,
        modelName: usage.modelName,
        calls: 0,
        total: emptySummary(),
      };
      component.phases.push(phase);
    }

    phase.calls += 1;
    addInto(phase.total, usage);
    addInto(component.total, usage);
  }

  hasUsage(): boolean {
    return this.components.size > 0;
  }

  /**
   * Snapshot of the tracked usage; later tracking does not mutate it
   */
  getReport(): TokenUsageReport {
    const components: ComponentUsageReport[] = [];
    const total = emptySummary();

    for (const component of this.components.values()) {
      components.push({
        component: component.component,
        phases: component.phases.map((phase) => ({
          ...phase,
          total: { ...phase.total },
        })),
        total: { ...component.total },
      });
      addInto(total, component.total);
    }

    return { components, total };
  }

  logSummary(logger: LoggerMethods): void {
    if (!this.hasUsage()) {
      logger.info('[TokenUsage] No LLM calls were made');
      return;
    }

    const report = this.getReport();
    for (const component of report.components) {
      const lines = component.phases.map(
        (phase) =>
          `  - ${phase.phase} (${phase.modelName}, ${phase.calls} calls): ${formatTokens(phase.total)}`,
      );
      logger.info(
        `[TokenUsage] ${component.component}:\n${lines.join('\n')}`,
      );
    }
    logger.info(`[TokenUsage] Grand total: ${formatTokens(report.total)}`);
  }

  reset(): void {
    this.components.clear();
  }
}

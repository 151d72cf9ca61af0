/**
 * Token usage report types
 *
 * Tracks LLM token consumption during a conversion, broken down by component
 * and phase. Empty when the translation provider is not LLM-backed.
 */

/**
 * Input/output/total token counts
 */
export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Usage for one phase of a component (e.g., 'translation')
 */
export interface PhaseUsageReport {
  phase: string;

  /**
   * Model identifier the calls were made against
   */
  modelName: string;

  /**
   * Number of LLM calls made in this phase
   */
  calls: number;

  total: TokenUsageSummary;
}

/**
 * Usage for one component (e.g., 'LLMTranslationProvider')
 */
export interface ComponentUsageReport {
  component: string;
  phases: PhaseUsageReport[];
  total: TokenUsageSummary;
}

/**
 * Usage for a whole conversion
 *
 * Components appear in the order they first reported usage.
 */
export interface TokenUsageReport {
  components: ComponentUsageReport[];
  total: TokenUsageSummary;
}

export { DeadlineExceededError, withDeadline } from './utils/deadline';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
} from './utils/llm-caller';
export { LLMTokenUsageAggregator } from './utils/llm-token-usage-aggregator';

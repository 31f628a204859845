export { ConcurrentPool } from './utils/concurrent-pool';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallResult,
  type LLMTextCallConfig,
} from './utils/llm-caller';
export { LLMTokenUsageAggregator } from './utils/llm-token-usage-aggregator';

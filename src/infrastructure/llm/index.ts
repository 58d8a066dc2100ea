export { AnthropicAdapter, DEFAULT_ANTHROPIC_MODEL } from './AnthropicAdapter';
export type { AnthropicAdapterConfig } from './AnthropicAdapter';
export { OpenAIAdapter, DEFAULT_OPENAI_MODEL } from './OpenAIAdapter';
export type { OpenAIAdapterConfig } from './OpenAIAdapter';
export { GeminiAdapter, DEFAULT_GEMINI_MODEL } from './GeminiAdapter';
export type { GeminiAdapterConfig } from './GeminiAdapter';
export {
  BaseLLMAdapter,
  DEFAULT_RETRY_POLICY,
  REQUEST_TIMEOUT_MS,
  TRUNCATION_MARKER,
  isRetryableStatus,
  limitPayload,
} from './BaseLLMAdapter';
export type { Completion, CompletionRequest, RetryPolicy } from './BaseLLMAdapter';
export { LLMAdapterFactory } from './LLMAdapterFactory';
export type { LLMAdapterFactoryConfig } from './LLMAdapterFactory';
export { extractJSON, parseDecision, renderToolCall, serializeDecision, stripJSONComments } from './DecisionParser';
export {
  SYSTEM_PROMPT,
  SystemPromptBuilder,
  buildDecisionPrompt,
  getPromptConfig,
  setPromptConfig,
  resetPromptConfig,
} from './prompts';
export type { PromptConfig, PayloadOverflow } from './prompts';

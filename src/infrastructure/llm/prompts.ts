/**
 * Prompt templates for the decision service.
 */

import { SystemPromptBuilder } from './prompts/builders/SystemPromptBuilder';

export { SystemPromptBuilder } from './prompts/builders/SystemPromptBuilder';
export {
  buildDecisionPrompt,
  formatBrowserState,
  formatAvailableActions,
  formatElementLine,
  formatHistory,
} from './prompts/builders/DecisionPromptBuilder';
export { getPromptConfig, setPromptConfig, resetPromptConfig, DEFAULT_PROMPT_CONFIG } from './config/prompt-config';
export type { PromptConfig, PayloadOverflow } from './config/prompt-config';

/**
 * The system prompt sent with every decision request.
 */
export const SYSTEM_PROMPT = SystemPromptBuilder.buildDefault();

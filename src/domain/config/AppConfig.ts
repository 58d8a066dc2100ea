/**
 * Domain Configuration Interfaces
 */

export const LLM_PROVIDERS = ['anthropic', 'openai', 'gemini'] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some(provider => provider === value);
}

export type PayloadOverflowMode = 'truncate' | 'fail';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  timeoutMs: number;
  payloadOverflow: PayloadOverflowMode;
}

export interface BrowserConfig {
  headless: boolean;
  timeout: number;
  width: number;
  height: number;
  /** Storage state loaded into the context at launch */
  storageStatePath?: string;
  /** Where storage state is written on exit */
  saveStatePath?: string;
}

export interface AgentConfig {
  maxSteps: number;
}

export interface AppConfig {
  llm: LLMConfig;
  browser: BrowserConfig;
  agent: AgentConfig;
  logLevel: LogLevelName;
}

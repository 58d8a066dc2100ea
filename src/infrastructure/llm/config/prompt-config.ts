/**
 * Configuration for prompt generation and outbound payload limits.
 */

export type PayloadOverflow = 'truncate' | 'fail';

export interface PromptConfig {
  context: {
    /** Elements listed in the browser state, a tighter budget than the ranker's */
    maxElements: number;
    /** Characters of element text shown per line */
    elementTextChars: number;
  };
  /** Sampling temperature for decisions */
  temperature: number;
  tokens: {
    /** Requested response budget */
    decision: number;
    /** Floor the adapters apply to any requested budget */
    minimum: number;
  };
  payload: {
    /** Cap per message and for the system prompt, in bytes */
    maxBytes: number;
    overflow: PayloadOverflow;
  };
}

export const DEFAULT_PROMPT_CONFIG: PromptConfig = {
  context: {
    maxElements: 50,
    elementTextChars: 50,
  },
  temperature: 0,
  tokens: {
    decision: 2000,
    minimum: 900,
  },
  payload: {
    maxBytes: 200_000,
    overflow: 'truncate',
  },
};

let activeConfig: PromptConfig = { ...DEFAULT_PROMPT_CONFIG };

export function getPromptConfig(): PromptConfig {
  return activeConfig;
}

/**
 * Update prompt configuration.
 */
export function setPromptConfig(config: Partial<PromptConfig>): void {
  activeConfig = {
    ...activeConfig,
    ...config,
    context: { ...activeConfig.context, ...config.context },
    tokens: { ...activeConfig.tokens, ...config.tokens },
    payload: { ...activeConfig.payload, ...config.payload },
  };
}

export function resetPromptConfig(): void {
  activeConfig = { ...DEFAULT_PROMPT_CONFIG };
}

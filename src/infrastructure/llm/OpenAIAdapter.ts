import OpenAI from 'openai';
import { DecisionServiceError } from '../../domain/errors/AppErrors';
import { loggers } from '../logging';
import { BaseLLMAdapter, Completion, CompletionRequest, REQUEST_TIMEOUT_MS, RetryPolicy } from './BaseLLMAdapter';
import { renderToolCall } from './DecisionParser';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

/**
 * Configuration for OpenAIAdapter.
 */
export interface OpenAIAdapterConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
  retryPolicy?: RetryPolicy;
  /** Per-request timeout */
  timeoutMs?: number;
}

/**
 * OpenAI Chat Completions implementation of the decision service.
 */
export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider = 'openai';
  readonly model: string;

  private client: OpenAI;

  constructor(config: OpenAIAdapterConfig) {
    super(config.retryPolicy);
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
      timeout: config.timeoutMs ?? REQUEST_TIMEOUT_MS,
    });
    this.model = config.model || DEFAULT_OPENAI_MODEL;
  }

  /**
   * Newer models (o1, o3, gpt-5, etc.) require max_completion_tokens.
   */
  private getTokenConfig(maxTokens: number): { max_tokens?: number; max_completion_tokens?: number } {
    const usesMaxCompletionTokens = /^(o1|o3|o4|gpt-5)/.test(this.model);
    return usesMaxCompletionTokens ? { max_completion_tokens: maxTokens } : { max_tokens: maxTokens };
  }

  protected async complete(request: CompletionRequest): Promise<Completion> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        temperature: request.temperature,
        ...this.getTokenConfig(request.maxTokens),
        tools:
          request.tools.length > 0
            ? request.tools.map(tool => ({
                type: 'function' as const,
                function: {
                  name: tool.name,
                  description: tool.description,
                  parameters: {
                    type: 'object',
                    properties: tool.parameters.properties,
                    required: tool.parameters.required,
                  },
                },
              }))
            : undefined,
      },
      { signal: request.signal }
    );

    const choice = response.choices[0];
    const usage = {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    };

    const toolCall = choice?.message.tool_calls?.[0];
    if (toolCall) {
      loggers.llm.debug('OpenAI tool call', {
        tool: toolCall.function.name,
        args: toolCall.function.arguments.slice(0, 200),
      });
      return { text: renderToolCall(toolCall.function.name, toolCall.function.arguments), usage };
    }

    const text = choice?.message.content ?? '';
    if (text === '') {
      throw new DecisionServiceError('empty response content', this.provider, false);
    }
    loggers.llm.debug('OpenAI response', { finishReason: choice?.finish_reason, ...usage });
    return { text, usage };
  }
}

import Anthropic from '@anthropic-ai/sdk';
import { DecisionServiceError, errorMessage } from '../../domain/errors/AppErrors';
import { loggers } from '../logging';
import {
  BaseLLMAdapter,
  Completion,
  CompletionRequest,
  REQUEST_TIMEOUT_MS,
  RetryPolicy,
  isRetryableStatus,
  statusOf,
} from './BaseLLMAdapter';
import { renderToolCall } from './DecisionParser';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5-20250929';

/**
 * Configuration for the Anthropic adapter.
 */
export interface AnthropicAdapterConfig {
  /** API key for Anthropic */
  apiKey: string;
  model?: string;
  baseURL?: string;
  retryPolicy?: RetryPolicy;
  /** Per-request timeout */
  timeoutMs?: number;
}

const USAGE_LIMIT_MARKER = 'API usage limits';

/**
 * Pulls `{type, message}` out of an Anthropic error body.
 */
function errorBody(error: unknown): { type: string; message: string } | undefined {
  if (!(error instanceof Anthropic.APIError)) {
    return undefined;
  }
  const body: unknown = error.error;
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return undefined;
  }
  const inner: unknown = body.error;
  if (typeof inner !== 'object' || inner === null) {
    return undefined;
  }
  const type = 'type' in inner && typeof inner.type === 'string' ? inner.type : '';
  const message = 'message' in inner && typeof inner.message === 'string' ? inner.message : '';
  return { type, message };
}

/**
 * Anthropic Messages API implementation of the decision service.
 */
export class AnthropicAdapter extends BaseLLMAdapter {
  readonly provider = 'anthropic';
  readonly model: string;

  private client: Anthropic;

  constructor(config: AnthropicAdapterConfig) {
    super(config.retryPolicy);
    // Quotes sometimes survive from shell-exported env files
    this.model = (config.model?.trim() || DEFAULT_ANTHROPIC_MODEL).replace(/^["']|["']$/g, '');
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
      timeout: config.timeoutMs ?? REQUEST_TIMEOUT_MS,
    });
  }

  protected async complete(request: CompletionRequest): Promise<Completion> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system || undefined,
        messages: [{ role: 'user', content: request.user }],
        tools:
          request.tools.length > 0
            ? request.tools.map(tool => ({
                name: tool.name,
                description: tool.description,
                input_schema: {
                  type: 'object' as const,
                  properties: tool.parameters.properties,
                  required: tool.parameters.required,
                },
              }))
            : undefined,
      },
      { signal: request.signal }
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }
    if (text.trim() === '') {
      const toolUse = response.content.find(block => block.type === 'tool_use');
      if (toolUse && toolUse.type === 'tool_use') {
        loggers.llm.debug('Anthropic tool call', { tool: toolUse.name });
        text = renderToolCall(toolUse.name, toolUse.input);
      }
    }

    return {
      text,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }

  protected toServiceError(error: unknown): DecisionServiceError {
    const status = statusOf(error);
    const body = errorBody(error);

    // A spent quota will not recover by retrying
    if (status === 400 && body?.type === 'invalid_request_error' && body.message.includes(USAGE_LIMIT_MARKER)) {
      loggers.llm.warn('API usage limit reached - skipping retries', { message: body.message });
      return new DecisionServiceError(`API usage limit reached: ${body.message}`, this.provider, false, status);
    }

    if (status !== undefined) {
      const detail = body?.message || errorMessage(error);
      const type = body?.type ? ` (type: ${body.type})` : '';
      return new DecisionServiceError(`anthropic ${status}: ${detail}${type}`, this.provider, isRetryableStatus(status), status);
    }
    return super.toServiceError(error);
  }
}

import {
  DecisionOptions,
  DecisionRequest,
  DecisionResponse,
  LLMPort,
} from '../../application/ports/LLMPort';
import { ensureNotCancelled, sleep } from '../../application/services/Cancellation';
import { ToolDefinition } from '../../domain/tools/Tool';
import {
  DecisionServiceError,
  PayloadTooLargeError,
  TaskCancelledError,
  errorMessage,
} from '../../domain/errors/AppErrors';
import { loggers } from '../logging';
import { parseDecision } from './DecisionParser';
import { SYSTEM_PROMPT, buildDecisionPrompt, getPromptConfig, PromptConfig } from './prompts';

export const REQUEST_TIMEOUT_MS = 60_000;
export const TRUNCATION_MARKER = '... [truncated]';

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before retry n is baseDelayMs * 2^(n-1) */
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 500,
};

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * One provider call, after prompts are built and capped.
 */
export interface CompletionRequest {
  system: string;
  user: string;
  tools: readonly ToolDefinition[];
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

export interface Completion {
  /** Reply text, or a tool call rendered as decision JSON */
  text: string;
  usage: TokenUsage;
}

/**
 * Caps a payload at `maxBytes` of UTF-8, truncating or failing per config.
 */
export function limitPayload(field: string, text: string, config: PromptConfig['payload']): string {
  const size = Buffer.byteLength(text, 'utf8');
  if (size <= config.maxBytes) {
    return text;
  }
  if (config.overflow === 'fail') {
    throw new PayloadTooLargeError(field, size, config.maxBytes);
  }
  loggers.llm.warn(`${field} too large, truncating`, { size, limit: config.maxBytes });
  // Cutting a Buffer may split a code point; toString drops the partial sequence to U+FFFD.
  const head = Buffer.from(text, 'utf8').subarray(0, config.maxBytes).toString('utf8').replace(/\uFFFD+$/, '');
  return head + TRUNCATION_MARKER;
}

/**
 * Network failures (no status), rate limits and server errors are worth retrying.
 */
export function isRetryableStatus(status: number | undefined): boolean {
  return status === undefined || status === 429 || status >= 500;
}

/**
 * Reads a numeric `status` off an SDK error, if it has one.
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Shared decision flow for all providers: prompt building, payload caps,
 * retries with exponential backoff and reply parsing. Subclasses only
 * talk to their SDK.
 */
export abstract class BaseLLMAdapter implements LLMPort {
  abstract readonly provider: string;
  abstract readonly model: string;

  /** Whether the provider receives the action catalog as native tools */
  protected readonly nativeTools: boolean = true;

  protected constructor(protected readonly retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  async decideNextAction(request: DecisionRequest, options: DecisionOptions = {}): Promise<DecisionResponse> {
    const startTime = Date.now();
    const config = getPromptConfig();

    const system = limitPayload('system prompt', SYSTEM_PROMPT, config.payload);
    const user = limitPayload('message', buildDecisionPrompt(request, config, !this.nativeTools), config.payload);

    const completion = await this.withRetry(
      () =>
        this.complete({
          system,
          user,
          tools: this.nativeTools ? request.actions : [],
          maxTokens: Math.max(options.maxTokens ?? config.tokens.decision, config.tokens.minimum),
          temperature: options.temperature ?? config.temperature,
          signal: options.signal,
        }),
      options.signal
    );

    loggers.llm.debug('Decision received', {
      provider: this.provider,
      tokens: completion.usage.totalTokens,
      chars: completion.text.length,
    });

    return {
      decision: parseDecision(completion.text),
      rawResponse: completion.text,
      usage: completion.usage,
      latency: Date.now() - startTime,
    };
  }

  /**
   * Sends one request to the provider. Errors propagate unchanged.
   */
  protected abstract complete(request: CompletionRequest): Promise<Completion>;

  /**
   * Maps a provider failure onto DecisionServiceError.
   */
  protected toServiceError(error: unknown): DecisionServiceError {
    if (error instanceof DecisionServiceError) {
      return error;
    }
    const status = statusOf(error);
    const prefix = status === undefined ? 'request failed' : String(status);
    return new DecisionServiceError(`${prefix}: ${errorMessage(error)}`, this.provider, isRetryableStatus(status), status);
  }

  private async withRetry<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let lastError: DecisionServiceError | undefined;

    for (let attempt = 0; attempt <= this.retryPolicy.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.retryPolicy.baseDelayMs * 2 ** (attempt - 1);
        loggers.llm.info('Retrying decision request', { provider: this.provider, attempt, delay });
        await sleep(delay, signal);
      }
      ensureNotCancelled(signal);

      try {
        return await operation();
      } catch (error) {
        if (signal?.aborted) {
          throw new TaskCancelledError();
        }
        lastError = this.toServiceError(error);
        loggers.llm.error('Decision request failed', {
          provider: this.provider,
          attempt,
          status: lastError.status,
          error: lastError.message,
        });
        if (!lastError.retryable) {
          throw lastError;
        }
      }
    }

    throw lastError ?? new DecisionServiceError('no attempts made', this.provider, false);
  }
}

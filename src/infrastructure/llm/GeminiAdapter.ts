import { GoogleGenerativeAI } from '@google/generative-ai';
import { BaseLLMAdapter, Completion, CompletionRequest, REQUEST_TIMEOUT_MS, RetryPolicy } from './BaseLLMAdapter';

export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash';

/**
 * Configuration for GeminiAdapter.
 */
export interface GeminiAdapterConfig {
  apiKey: string;
  model?: string;
  retryPolicy?: RetryPolicy;
  /** Per-request timeout */
  timeoutMs?: number;
}

/**
 * Gemini implementation of the decision service. The action catalog is
 * listed in the prompt rather than sent as function declarations.
 */
export class GeminiAdapter extends BaseLLMAdapter {
  readonly provider = 'gemini';
  readonly model: string;
  protected readonly nativeTools = false;

  private client: GoogleGenerativeAI;
  private timeoutMs: number;

  constructor(config: GeminiAdapterConfig) {
    super(config.retryPolicy);
    this.client = new GoogleGenerativeAI(config.apiKey);
    this.model = config.model || DEFAULT_GEMINI_MODEL;
    this.timeoutMs = config.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  protected async complete(request: CompletionRequest): Promise<Completion> {
    const generativeModel = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: request.system,
    });

    const result = await generativeModel.generateContent(
      {
        contents: [{ role: 'user', parts: [{ text: request.user }] }],
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxTokens,
          responseMimeType: 'application/json',
        },
      },
      { timeout: this.timeoutMs, signal: request.signal }
    );

    const response = result.response;
    const usage = response.usageMetadata;
    return {
      text: response.text(),
      usage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
    };
  }
}

import { PageState } from '../../domain/browser/PageState';
import { Decision, HistoryItem } from '../../domain/agent/ActionTypes';
import { ToolDefinition } from '../../domain/tools/Tool';

/**
 * Everything the decision service needs for one step.
 */
export interface DecisionRequest {
  task: string;
  step: number;
  maxSteps: number;
  /** Bounded history tail */
  history: HistoryItem[];
  pageState: PageState;
  actions: readonly ToolDefinition[];
  /** Task memory summary, echoed into the agent state section */
  memory?: Record<string, unknown>;
  /** Extra instructions from a specialised sub-agent */
  guidance?: string[];
}

/**
 * Response from the LLM.
 */
export interface DecisionResponse {
  decision: Decision;
  /** Raw response content */
  rawResponse: string;
  /** Token usage */
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  /** Response latency in ms */
  latency: number;
}

/**
 * Options for LLM completion.
 */
export interface DecisionOptions {
  /** Maximum tokens in response */
  maxTokens?: number;
  /** Temperature for sampling */
  temperature?: number;
  signal?: AbortSignal;
}

/**
 * Port interface for the decision service.
 */
export interface LLMPort {
  readonly provider: string;

  readonly model: string;

  /**
   * Requests the next action. Transport errors are retried inside; the
   * returned promise rejects with DecisionServiceError or DecisionParseError.
   */
  decideNextAction(request: DecisionRequest, options?: DecisionOptions): Promise<DecisionResponse>;
}

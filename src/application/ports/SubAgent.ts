import { DecisionOptions, DecisionRequest, DecisionResponse, LLMPort } from './LLMPort';

/**
 * A decision maker specialised in one kind of task. The first sub-agent
 * whose `canHandle` accepts the task decides every step of that task;
 * tasks no sub-agent accepts go to the decision service directly.
 */
export interface SubAgent {
  readonly name: string;

  canHandle(task: string): boolean;

  /**
   * Decides the next action, usually by enriching the request before
   * passing it to `llm`. Rejects like `LLMPort.decideNextAction`.
   */
  decideNextAction(request: DecisionRequest, llm: LLMPort, options?: DecisionOptions): Promise<DecisionResponse>;
}

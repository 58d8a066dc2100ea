import { BaseStateHandler, StateHandlerResult, toError } from '../StateHandler';
import { AgentContext, updateContext } from '../AgentContext';
import { AgentState } from '../../../../domain/agent/AgentState';
import { DecisionRequest } from '../../../ports/LLMPort';
import { TaskCancelledError } from '../../../../domain/errors/AppErrors';
import { loggers } from '../../../../infrastructure/logging';

/**
 * Handler for DECIDING state.
 * Asks the decision service for the next action, through the first
 * sub-agent that accepts the task. Any failure here is fatal.
 */
export class DecideHandler extends BaseStateHandler {
  async handle(context: AgentContext): Promise<StateHandlerResult> {
    try {
      if (!context.pageState) {
        throw new Error('Missing page state');
      }

      const request: DecisionRequest = {
        task: context.task,
        step: context.step,
        maxSteps: context.maxSteps,
        history: context.history.slice(-this.deps.historyWindow),
        pageState: context.pageState,
        actions: this.deps.executor.describe(),
        memory: context.memory.toJSON(),
      };
      const options = { maxTokens: this.deps.maxTokens, temperature: 0, signal: this.deps.signal };
      const subAgent = this.deps.subAgents.find(agent => agent.canHandle(context.task));
      if (subAgent) {
        loggers.agent.debug(`Delegating step to ${subAgent.name} agent`);
      }
      const response = subAgent
        ? await subAgent.decideNextAction(request, this.deps.llm, options)
        : await this.deps.llm.decideNextAction(request, options);

      const tokenUsage = {
        promptTokens: context.tokenUsage.promptTokens + response.usage.promptTokens,
        completionTokens: context.tokenUsage.completionTokens + response.usage.completionTokens,
        totalTokens: context.tokenUsage.totalTokens + response.usage.totalTokens,
      };

      const { decision } = response;
      if (decision.reasoning.nextGoal) {
        loggers.agent.debug(`Next goal: ${decision.reasoning.nextGoal}`);
      }
      loggers.llm.debug('Decision received', {
        action: decision.actionName,
        latency: response.latency,
      });

      return this.result(updateContext(context, { decision, tokenUsage }), AgentState.RESOLVING);
    } catch (error) {
      const err = toError(error);
      if (this.deps.signal?.aborted && !(err instanceof TaskCancelledError)) {
        return this.errorResult(context, new TaskCancelledError());
      }
      return this.errorResult(context, err, err instanceof TaskCancelledError ? 'cancelled' : 'decision_error');
    }
  }
}

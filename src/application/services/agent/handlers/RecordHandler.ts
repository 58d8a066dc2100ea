import { BaseStateHandler, StateHandlerResult, toError } from '../StateHandler';
import { AgentContext, clearStep, updateContext } from '../AgentContext';
import { AgentState } from '../../../../domain/agent/AgentState';
import { HistoryItem } from '../../../../domain/agent/ActionTypes';
import { StepCompletedEvent } from '../../../../domain/events/TaskEvents';

/**
 * Handler for RECORDING state.
 * Appends the step outcome to history and task memory.
 */
export class RecordHandler extends BaseStateHandler {
  async handle(context: AgentContext): Promise<StateHandlerResult> {
    try {
      const { decision, pageState, stepOutcome } = context;
      if (!decision || !pageState || !stepOutcome) {
        throw new Error('Missing decision, page state or step outcome');
      }

      const item: HistoryItem = {
        step: context.step,
        action: stepOutcome.action,
        input: decision.actionInput,
        outcome: stepOutcome.outcome,
        success: stepOutcome.success,
        selector: stepOutcome.selector,
        target: context.loopTarget,
        url: pageState.url,
        reasoning: decision.reasoning,
      };

      context.memory.recordAction(context.action?.name ?? decision.actionName);
      const updated = updateContext(context, { history: [...context.history, item] });

      await this.deps.eventBus.publish(new StepCompletedEvent(context.taskId, item, stepOutcome.recovered));

      return this.result(clearStep(updated), AgentState.OBSERVING);
    } catch (error) {
      return this.errorResult(context, toError(error));
    }
  }
}

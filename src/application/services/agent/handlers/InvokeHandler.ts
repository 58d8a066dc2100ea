import { BaseStateHandler, StateHandlerResult, toError } from '../StateHandler';
import { AgentContext, updateContext } from '../AgentContext';
import { AgentState } from '../../../../domain/agent/AgentState';
import { isKnownAction } from '../../../../domain/agent/ActionTypes';
import { errorMessage, TaskCancelledError } from '../../../../domain/errors/AppErrors';
import { ToolResult } from '../../../../domain/tools/Tool';
import { loggers } from '../../../../infrastructure/logging';

export const NO_CHANGE_AFTER_SCROLL =
  'no changes after scroll - content may be in a frame, use collect_texts or read_page';

export function isClickAction(name: string): boolean {
  return name.startsWith('click_');
}

/**
 * Handler for INVOKING state.
 * Runs the resolved action; failures move on to RECOVERING.
 */
export class InvokeHandler extends BaseStateHandler {
  async handle(context: AgentContext): Promise<StateHandlerResult> {
    try {
      const { action, pageState } = context;
      if (!action || !pageState) {
        throw new Error('Missing action or page state');
      }

      const invocation = await this.invoke(context);
      if (!invocation.success) {
        loggers.browser.debug(`${action.name} failed: ${invocation.error ?? 'unknown error'}`);
        return this.result(updateContext(context, { invocation }), AgentState.RECOVERING);
      }

      let observation = invocation.observation;
      if (isKnownAction(action) && action.name === 'scroll_page') {
        await this.wait(this.deps.timings.scrollSettleMs);
        const after = await this.capture();
        if (!after.hasChangedFrom(pageState)) {
          observation = NO_CHANGE_AFTER_SCROLL;
        }
      } else {
        await this.settle(action.name);
      }

      return this.result(
        updateContext(context, {
          invocation,
          stepOutcome: {
            action: action.name,
            outcome: observation,
            success: true,
            selector: invocation.selector,
            recovered: false,
          },
        }),
        AgentState.RECORDING
      );
    } catch (error) {
      return this.errorResult(context, toError(error));
    }
  }

  /**
   * Unexpected driver exceptions are treated like reported failures so
   * they get classified and recovered. Cancellation still propagates.
   */
  private async invoke(context: AgentContext): Promise<ToolResult> {
    const { action, pageState } = context;
    if (!action || !pageState) {
      throw new Error('Missing action or page state');
    }
    const start = Date.now();
    try {
      return await this.deps.executor.execute(action, { pageState, signal: this.deps.signal });
    } catch (error) {
      if (error instanceof TaskCancelledError || this.deps.signal?.aborted) {
        throw error instanceof TaskCancelledError ? error : new TaskCancelledError();
      }
      return {
        success: false,
        observation: '',
        error: errorMessage(error),
        duration: Date.now() - start,
        toolName: action.name,
      };
    }
  }

  private async settle(actionName: string): Promise<void> {
    const { settleMs, clickSettleMs } = this.deps.timings;
    await this.wait(isClickAction(actionName) ? settleMs + clickSettleMs : settleMs);
  }
}

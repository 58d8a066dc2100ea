import { BaseStateHandler, boundedCapture, StateHandlerResult, toError } from '../StateHandler';
import { AgentContext, StepOutcome, updateContext } from '../AgentContext';
import { isClickAction } from './InvokeHandler';
import { AgentState } from '../../../../domain/agent/AgentState';
import { isKnownAction } from '../../../../domain/agent/ActionTypes';
import { classifyError, ErrorKind } from '../../../../domain/errors/ErrorClassifier';
import { RecoveryAttemptedEvent } from '../../../../domain/events/TaskEvents';
import { loggers } from '../../../../infrastructure/logging';

export const TIMEOUT_WITH_CHANGE = 'success (timeout, but page state changed)';

/**
 * Handler for RECOVERING state.
 * Classifies the failure and runs the recovery strategies, unless the same
 * action has already failed repeatedly.
 */
export class RecoverHandler extends BaseStateHandler {
  async handle(context: AgentContext): Promise<StateHandlerResult> {
    try {
      const { action, pageState, invocation } = context;
      if (!action || !pageState || !invocation) {
        throw new Error('Missing action, page state or invocation result');
      }

      const message = invocation.error ?? 'action failed';
      const kind = classifyError(message);
      const failed = (outcome: string): StepOutcome => ({
        action: action.name,
        outcome,
        success: false,
        selector: invocation.selector,
        recovered: false,
      });

      if (kind === ErrorKind.SelectorParse) {
        context.errorLog.add(action.name, kind, context.step);
        return this.record(context, failed('error: invalid selector'));
      }

      const fresh = await this.capture();

      if (
        kind === ErrorKind.Timeout &&
        (fresh.url !== pageState.url || fresh.elementCount !== pageState.elementCount)
      ) {
        loggers.recovery.info(`${action.name} timed out but the page changed`);
        return this.record(context, {
          action: action.name,
          outcome: TIMEOUT_WITH_CHANGE,
          success: true,
          selector: invocation.selector,
          recovered: false,
        });
      }

      // checked before this failure is logged: two earlier failures skip recovery
      const exhausted = context.errorLog.hasRecentRetries(action.name);
      context.errorLog.add(action.name, kind, context.step);

      if (exhausted || !isKnownAction(action)) {
        loggers.recovery.debug(`Skipping recovery for ${action.name}`, { kind, exhausted });
        return this.record(context, failed(`error: ${message}`));
      }

      loggers.recovery.info(`Recovering ${action.name} (${kind})`);
      const outcome = await this.deps.recovery.recover({
        action,
        element: context.element ?? undefined,
        kind,
        freshState: fresh,
        capture: boundedCapture(this.deps),
        signal: this.deps.signal,
      });

      await this.deps.eventBus.publish(
        new RecoveryAttemptedEvent(
          context.taskId,
          context.step,
          action.name,
          kind,
          outcome.attempted,
          outcome.recovered,
          outcome.recovered ? outcome.action : undefined
        )
      );

      if (!outcome.recovered) {
        return this.record(context, failed(`error: ${message}`));
      }

      const { settleMs, clickSettleMs } = this.deps.timings;
      await this.wait(isClickAction(outcome.action) ? settleMs + clickSettleMs : settleMs);

      return this.record(context, {
        action: outcome.action,
        outcome: outcome.result.observation,
        success: true,
        selector: outcome.result.selector,
        recovered: true,
      });
    } catch (error) {
      return this.errorResult(context, toError(error));
    }
  }

  private record(context: AgentContext, stepOutcome: StepOutcome): StateHandlerResult {
    return this.result(updateContext(context, { stepOutcome }), AgentState.RECORDING);
  }
}

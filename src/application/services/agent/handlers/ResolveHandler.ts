import { BaseStateHandler, StateHandlerResult, toError } from '../StateHandler';
import { AgentContext, StepOutcome, updateContext } from '../AgentContext';
import { AgentState } from '../../../../domain/agent/AgentState';
import { AgentAction, isKnownAction, parseAgentAction } from '../../../../domain/agent/ActionTypes';
import { ElementRecord } from '../../../../domain/browser/ElementRecord';
import { ElementNotFoundError, InvalidActionInputError } from '../../../../domain/errors/AppErrors';
import { actionTarget } from '../../LoopGuard';
import { loggers } from '../../../../infrastructure/logging';

/**
 * Handler for RESOLVING state.
 * Turns the decision into a typed action, then applies the loop guard and
 * the security gate. Steps that never reach the driver go straight to RECORDING.
 */
export class ResolveHandler extends BaseStateHandler {
  async handle(context: AgentContext): Promise<StateHandlerResult> {
    try {
      const { decision, pageState } = context;
      if (!decision || !pageState) {
        throw new Error('Missing decision or page state');
      }

      if (decision.finish) {
        return this.result(
          updateContext(context, { finalMessage: decision.message, shouldExit: true, exitReason: 'finished' }),
          AgentState.FINISHED
        );
      }

      let action: AgentAction;
      try {
        action = parseAgentAction(decision.actionName, decision.actionInput);
      } catch (error) {
        if (error instanceof InvalidActionInputError) {
          return this.skip(context, decision.actionName, JSON.stringify(decision.actionInput), {
            action: decision.actionName,
            outcome: `error: ${error.message}`,
            success: false,
            recovered: false,
          });
        }
        throw error;
      }

      let element: ElementRecord | undefined;
      if (isKnownAction(action) && action.name === 'click_by_index') {
        try {
          element = this.deps.resolver.lookup(action.input.index, pageState);
        } catch (error) {
          if (!(error instanceof ElementNotFoundError)) {
            throw error;
          }
          const target = actionTarget(action);
          this.deps.loopGuard.enforce(context.history, { action: action.name, target, url: pageState.url });
          return this.skip(context, action.name, target, {
            action: action.name,
            outcome: `error: ${error.message}`,
            success: false,
            recovered: false,
          });
        }
      }

      const target = actionTarget(action, element);
      this.deps.loopGuard.enforce(context.history, { action: action.name, target, url: pageState.url });

      const verdict = await this.deps.securityGate.check(action, element, this.deps.signal);
      if (!verdict.proceed) {
        return this.skip(context, action.name, target, {
          action: action.name,
          outcome: 'cancelled by user',
          success: false,
          recovered: false,
        });
      }

      loggers.agent.debug(`Invoking ${action.name}`, { target });
      return this.result(
        updateContext(context, { action, element: element ?? null, loopTarget: target }),
        AgentState.INVOKING
      );
    } catch (error) {
      return this.errorResult(context, toError(error));
    }
  }

  private skip(context: AgentContext, name: string, target: string, outcome: StepOutcome): StateHandlerResult {
    loggers.agent.debug(`Step not invoked: ${name}`, { outcome: outcome.outcome });
    return this.result(updateContext(context, { loopTarget: target, stepOutcome: outcome }), AgentState.RECORDING);
  }
}

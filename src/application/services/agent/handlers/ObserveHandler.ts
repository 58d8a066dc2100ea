import { BaseStateHandler, StateHandlerResult, toError } from '../StateHandler';
import { AgentContext, updateContext } from '../AgentContext';
import { AgentState } from '../../../../domain/agent/AgentState';
import { StepLimitError } from '../../../../domain/errors/AppErrors';
import { ensureNotCancelled } from '../../Cancellation';
import { loggers } from '../../../../infrastructure/logging';

/**
 * Handler for OBSERVING state.
 * Starts a step: enforces the step budget and captures a fresh snapshot.
 */
export class ObserveHandler extends BaseStateHandler {
  async handle(context: AgentContext): Promise<StateHandlerResult> {
    try {
      ensureNotCancelled(this.deps.signal);

      if (context.step >= context.maxSteps) {
        return this.errorResult(context, new StepLimitError(context.maxSteps));
      }

      if (context.memory.lastAction === 'navigate') {
        await this.deps.driver.waitForStableDOM({
          timeout: this.deps.timings.stableDomTimeoutMs,
          signal: this.deps.signal,
        });
      }

      const pageState = await this.capture();
      ensureNotCancelled(this.deps.signal);
      context.memory.observe(pageState);

      loggers.snapshot.info(`Page: ${pageState.url} (${pageState.elementCount} elements)`);
      loggers.snapshot.debug(`Elements:\n${pageState.preview()}`);

      return this.result(
        updateContext(context, { step: context.step + 1, pageState }),
        AgentState.DECIDING
      );
    } catch (error) {
      return this.errorResult(context, toError(error));
    }
  }
}

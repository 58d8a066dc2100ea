import { AgentContext, ExitReason } from './AgentContext';
import { AgentState } from '../../../domain/agent/AgentState';
import { PageState } from '../../../domain/browser/PageState';
import { EventBus } from '../../../domain/events/DomainEvent';
import { LoopGuardError, StepLimitError, TaskCancelledError } from '../../../domain/errors/AppErrors';
import { AutomationDriver } from '../../ports/AutomationDriver';
import { LLMPort } from '../../ports/LLMPort';
import { PageStateProvider } from '../../ports/PageStateProvider';
import { SubAgent } from '../../ports/SubAgent';
import { ActionExecutor } from '../ActionExecutor';
import { ActionResolver } from '../ActionResolver';
import { createDeadline, sleep, withDeadline } from '../Cancellation';
import { LoopGuard } from '../LoopGuard';
import { RecoveryService } from '../RecoveryService';
import { SecurityGate } from '../SecurityGate';
import { loggers } from '../../../infrastructure/logging';

/**
 * Result from a state handler execution.
 */
export interface StateHandlerResult {
  /** Updated context after handler execution */
  context: AgentContext;
  /** Next state to transition to */
  nextState: AgentState;
}

/**
 * Interface for state handlers.
 * Each handler processes one state of the task state machine.
 */
export interface StateHandler {
  handle(context: AgentContext): Promise<StateHandlerResult>;
}

/**
 * Waits of the control loop, in milliseconds.
 */
export interface AgentTimings {
  /** Deadline for one snapshot */
  observeTimeoutMs: number;
  /** DOM stability wait after a navigation */
  stableDomTimeoutMs: number;
  /** Settle before re-observing after a successful action */
  settleMs: number;
  /** Extra wait after a click */
  clickSettleMs: number;
  /** Wait after a scroll before checking for changes */
  scrollSettleMs: number;
}

export const DEFAULT_AGENT_TIMINGS: AgentTimings = {
  observeTimeoutMs: 5000,
  stableDomTimeoutMs: 5000,
  settleMs: 800,
  clickSettleMs: 1000,
  scrollSettleMs: 1000,
};

/**
 * Dependencies injected into state handlers.
 */
export interface AgentDependencies {
  driver: AutomationDriver;
  llm: LLMPort;
  /** Checked in order; the first that accepts the task decides its steps */
  subAgents: readonly SubAgent[];
  capture: PageStateProvider;
  executor: ActionExecutor;
  resolver: ActionResolver;
  recovery: RecoveryService;
  loopGuard: LoopGuard;
  securityGate: SecurityGate;
  eventBus: EventBus;
  timings: AgentTimings;
  /** History items sent with each decision request */
  historyWindow: number;
  /** Response token budget for decisions */
  maxTokens: number;
  signal?: AbortSignal;
}

function exitReasonFor(error: Error): ExitReason {
  if (error instanceof TaskCancelledError) return 'cancelled';
  if (error instanceof LoopGuardError) return 'loop_guard';
  if (error instanceof StepLimitError) return 'step_limit';
  return 'error';
}

/**
 * Wraps the page-state provider so every capture is bounded by the
 * observation deadline. A capture that runs out of time yields an empty
 * state for the current URL; cancellation of the parent signal still throws.
 */
export function boundedCapture(
  deps: Pick<AgentDependencies, 'capture' | 'driver' | 'timings'>
): PageStateProvider {
  return async (signal?: AbortSignal): Promise<PageState> => {
    const { observeTimeoutMs } = deps.timings;
    const timedOut = (): PageState => {
      loggers.snapshot.warn(`Snapshot timed out after ${observeTimeoutMs}ms`);
      return PageState.empty(deps.driver.currentUrl());
    };
    const deadline = createDeadline(observeTimeoutMs, signal);
    try {
      return await withDeadline(deps.capture(deadline.signal), observeTimeoutMs, timedOut);
    } catch (error) {
      if (error instanceof TaskCancelledError && deadline.signal.aborted && !signal?.aborted) {
        return timedOut();
      }
      throw error;
    } finally {
      deadline.dispose();
    }
  };
}

/**
 * Abstract base class for state handlers.
 */
export abstract class BaseStateHandler implements StateHandler {
  constructor(protected readonly deps: AgentDependencies) {}

  abstract handle(context: AgentContext): Promise<StateHandlerResult>;

  protected result(context: AgentContext, nextState: AgentState): StateHandlerResult {
    return { context: { ...context, currentState: nextState }, nextState };
  }

  /**
   * Ends the run with a fatal error.
   */
  protected errorResult(context: AgentContext, error: Error, reason?: ExitReason): StateHandlerResult {
    return {
      context: {
        ...context,
        currentState: AgentState.ABORTED,
        error,
        shouldExit: true,
        exitReason: reason ?? exitReasonFor(error),
      },
      nextState: AgentState.ABORTED,
    };
  }

  /**
   * Fresh snapshot bounded by the observation deadline.
   */
  protected capture(): Promise<PageState> {
    return boundedCapture(this.deps)(this.deps.signal);
  }

  protected wait(ms: number): Promise<void> {
    return sleep(ms, this.deps.signal);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

import { randomUUID } from 'crypto';
import { HistoryItem } from '../../domain/agent/ActionTypes';
import { EventBus } from '../../domain/events/DomainEvent';
import { TaskEndedEvent, TaskStartedEvent } from '../../domain/events/TaskEvents';
import { getLogger } from '../../infrastructure/logging';
import { AutomationDriver } from '../ports/AutomationDriver';
import { LLMPort } from '../ports/LLMPort';
import { PageStateProvider } from '../ports/PageStateProvider';
import { SubAgent } from '../ports/SubAgent';
import { UserInteractionPort } from '../ports/UserInteractionPort';
import { ActionExecutor } from './ActionExecutor';
import { ActionResolver } from './ActionResolver';
import {
  AgentDependencies,
  AgentTimings,
  DEFAULT_AGENT_TIMINGS,
  ExitReason,
  TaskStateMachine,
  TokenUsage,
} from './agent';
import { InputValidator, ValidationError } from './InputValidator';
import { LoopGuard, LoopGuardConfig } from './LoopGuard';
import { RecoveryService, RecoveryTimings } from './RecoveryService';
import { SecurityGate } from './SecurityGate';

const logger = getLogger('Agent');

export const DEFAULT_HISTORY_WINDOW = 5;
export const DEFAULT_DECISION_MAX_TOKENS = 2000;

/**
 * Result of one task run. Exactly one of `finalMessage` and `error` is set.
 */
export interface TaskResult {
  taskId: string;
  finalMessage?: string;
  error?: Error;
  exitReason: ExitReason;
  history: HistoryItem[];
  steps: number;
  duration: number;
  tokenUsage: TokenUsage;
}

export interface TaskRunnerOptions {
  timings: Partial<AgentTimings>;
  recoveryTimings: Partial<RecoveryTimings>;
  loopGuard: Partial<LoopGuardConfig>;
  /** Ask before destructive-looking actions */
  securityGate: boolean;
  /** Re-check coordinate clicks against the viewport and hit-testing */
  validateCoordinates: boolean;
  historyWindow: number;
  maxTokens: number;
}

export interface TaskRunnerDeps {
  driver: AutomationDriver;
  llm: LLMPort;
  capture: PageStateProvider;
  user: UserInteractionPort;
  eventBus: EventBus;
  subAgents?: readonly SubAgent[];
}

const DEFAULT_OPTIONS: TaskRunnerOptions = {
  timings: {},
  recoveryTimings: {},
  loopGuard: {},
  securityGate: true,
  validateCoordinates: true,
  historyWindow: DEFAULT_HISTORY_WINDOW,
  maxTokens: DEFAULT_DECISION_MAX_TOKENS,
};

/**
 * Runs one task to completion: a fresh state machine, memory and error
 * log per call, so counters never leak between runs.
 */
export class TaskRunner {
  private readonly options: TaskRunnerOptions;

  constructor(
    private readonly deps: TaskRunnerDeps,
    options: Partial<TaskRunnerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async run(task: string, maxSteps: number, signal?: AbortSignal): Promise<TaskResult> {
    const cleanTask = InputValidator.sanitizeTask(task);
    const validation = InputValidator.validateTaskInputs(cleanTask, maxSteps);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    const taskId = randomUUID();
    const stateMachine = new TaskStateMachine(this.createDependencies(signal));
    const context = TaskStateMachine.createContext(taskId, cleanTask, maxSteps);

    logger.info(`Starting task (max ${maxSteps} steps)`, { taskId });
    await this.deps.eventBus.publish(
      new TaskStartedEvent(taskId, cleanTask, maxSteps, this.deps.driver.currentUrl())
    );

    const finalContext = await stateMachine.run(context);
    const duration = Date.now() - finalContext.startTime;
    const error = finalContext.error ?? undefined;
    const finalMessage = error ? undefined : (finalContext.finalMessage ?? undefined);

    if (error) {
      logger.error(`Task aborted: ${error.message}`, { steps: finalContext.step });
    } else {
      logger.info('Task finished', { steps: finalContext.step });
    }

    await this.deps.eventBus.publish(
      new TaskEndedEvent(
        taskId,
        error ? 'aborted' : 'finished',
        finalContext.step,
        duration,
        finalMessage,
        error?.message
      )
    );

    return {
      taskId,
      finalMessage,
      error,
      exitReason: finalContext.exitReason ?? (error ? 'error' : 'finished'),
      history: finalContext.history,
      steps: finalContext.step,
      duration,
      tokenUsage: finalContext.tokenUsage,
    };
  }

  private createDependencies(signal?: AbortSignal): AgentDependencies {
    const { driver, llm, capture, user, eventBus, subAgents = [] } = this.deps;
    const resolver = new ActionResolver(driver, { validateCoordinates: this.options.validateCoordinates });
    const executor = new ActionExecutor({ driver, resolver, user });
    return {
      driver,
      llm,
      subAgents,
      capture,
      executor,
      resolver,
      recovery: new RecoveryService(executor, resolver, this.options.recoveryTimings),
      loopGuard: new LoopGuard(this.options.loopGuard),
      securityGate: new SecurityGate(user, this.options.securityGate),
      eventBus,
      timings: { ...DEFAULT_AGENT_TIMINGS, ...this.options.timings },
      historyWindow: this.options.historyWindow,
      maxTokens: this.options.maxTokens,
      signal,
    };
  }
}

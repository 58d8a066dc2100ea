import { BaseDomainEvent } from './DomainEvent';
import { HistoryItem } from '../agent/ActionTypes';
import { ErrorKind } from '../errors/ErrorClassifier';

/**
 * Event raised when a task run starts.
 */
export class TaskStartedEvent extends BaseDomainEvent {
  static readonly TYPE = 'task.started';

  constructor(
    taskId: string,
    public readonly task: string,
    public readonly maxSteps: number,
    public readonly startUrl: string
  ) {
    super(TaskStartedEvent.TYPE, taskId);
  }
}

/**
 * Event raised after a step's outcome is appended to history.
 */
export class StepCompletedEvent extends BaseDomainEvent {
  static readonly TYPE = 'task.step_completed';

  constructor(
    taskId: string,
    public readonly item: HistoryItem,
    public readonly recovered: boolean
  ) {
    super(StepCompletedEvent.TYPE, taskId);
  }
}

/**
 * Event raised after the recovery strategies ran for a failed invocation.
 */
export class RecoveryAttemptedEvent extends BaseDomainEvent {
  static readonly TYPE = 'task.recovery_attempted';

  constructor(
    taskId: string,
    public readonly step: number,
    public readonly action: string,
    public readonly errorKind: ErrorKind,
    public readonly strategies: string[],
    public readonly recovered: boolean,
    public readonly recoveredWith?: string
  ) {
    super(RecoveryAttemptedEvent.TYPE, taskId);
  }
}

export type TaskOutcome = 'finished' | 'aborted';

/**
 * Event raised when a task run reaches a terminal state.
 */
export class TaskEndedEvent extends BaseDomainEvent {
  static readonly TYPE = 'task.ended';

  constructor(
    taskId: string,
    public readonly outcome: TaskOutcome,
    public readonly steps: number,
    public readonly durationMs: number,
    public readonly finalMessage?: string,
    public readonly error?: string
  ) {
    super(TaskEndedEvent.TYPE, taskId);
  }
}

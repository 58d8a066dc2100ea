import { EventBus, EventHandler, onEvent } from '../../domain/events/DomainEvent';
import {
  RecoveryAttemptedEvent,
  StepCompletedEvent,
  TaskEndedEvent,
  TaskStartedEvent,
} from '../../domain/events/TaskEvents';
import { loggers } from '../logging';

const SEPARATOR = '────────────────────────────────────────────────────────────';

/**
 * Connects task events to console output and logging.
 */
export class AgentEventHandlers {
  private readonly registered: Array<[string, EventHandler]> = [];

  constructor(
    private readonly eventBus: EventBus,
    private readonly verbose: boolean = false
  ) {}

  register(): void {
    this.track(TaskStartedEvent.TYPE, onEvent(this.eventBus, TaskStartedEvent, e => this.handleTaskStarted(e)));
    this.track(
      StepCompletedEvent.TYPE,
      onEvent(this.eventBus, StepCompletedEvent, e => this.handleStepCompleted(e))
    );
    this.track(
      RecoveryAttemptedEvent.TYPE,
      onEvent(this.eventBus, RecoveryAttemptedEvent, e => this.handleRecoveryAttempted(e))
    );
    this.track(TaskEndedEvent.TYPE, onEvent(this.eventBus, TaskEndedEvent, e => this.handleTaskEnded(e)));
  }

  unregister(): void {
    for (const [eventType, handler] of this.registered) {
      this.eventBus.unsubscribe(eventType, handler);
    }
    this.registered.length = 0;
  }

  private track(eventType: string, handler: EventHandler): void {
    this.registered.push([eventType, handler]);
  }

  private handleTaskStarted(event: TaskStartedEvent): void {
    // eslint-disable-next-line no-console
    console.log(`\n${SEPARATOR}\n🚀 Starting task\n   Task: ${event.task}\n   Max steps: ${event.maxSteps}\n${SEPARATOR}\n`);
    if (this.verbose) {
      loggers.event.info(`Task ${event.aggregateId} started`, { url: event.startUrl });
    }
  }

  private handleStepCompleted(event: StepCompletedEvent): void {
    loggers.agent.step(event.item.step, event.item.action, event.item.outcome, event.recovered);
  }

  private handleRecoveryAttempted(event: RecoveryAttemptedEvent): void {
    if (!this.verbose) {
      return;
    }
    const result = event.recovered ? `recovered with ${event.recoveredWith}` : 'not recovered';
    loggers.event.info(`Step ${event.step} ${event.action} (${event.errorKind}): ${result}`, {
      strategies: event.strategies,
    });
  }

  private handleTaskEnded(event: TaskEndedEvent): void {
    const title = event.outcome === 'finished' ? '✅ Task finished' : '❌ Task aborted';
    const detail = event.outcome === 'finished' ? `   Result: ${event.finalMessage ?? ''}` : `   Error: ${event.error ?? ''}`;
    // eslint-disable-next-line no-console
    console.log(
      `\n${SEPARATOR}\n${title}\n${detail}\n   Steps: ${event.steps}\n   Duration: ${Math.round(event.durationMs / 1000)}s\n${SEPARATOR}\n`
    );
    if (this.verbose) {
      loggers.event.info(`Task ${event.aggregateId} ${event.outcome}`);
    }
  }
}

/**
 * Create and wire up all event handlers.
 */
export function wireUpEventHandlers(eventBus: EventBus, verbose: boolean = false): AgentEventHandlers {
  const handlers = new AgentEventHandlers(eventBus, verbose);
  handlers.register();
  return handlers;
}

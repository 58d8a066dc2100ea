import { AgentState, isTerminalState, isValidTransition } from '../../../domain/agent/AgentState';
import { AgentContext, createInitialContext } from './AgentContext';
import { StateHandler, AgentDependencies, BaseStateHandler, StateHandlerResult } from './StateHandler';
import {
  ObserveHandler,
  DecideHandler,
  ResolveHandler,
  InvokeHandler,
  RecoverHandler,
  RecordHandler,
} from './handlers';

/**
 * Handler for IDLE state - transitions to OBSERVING.
 */
class IdleHandler extends BaseStateHandler {
  async handle(context: AgentContext): Promise<StateHandlerResult> {
    context.memory.reset();
    context.errorLog.clear();
    return this.result(context, AgentState.OBSERVING);
  }
}

/**
 * Task state machine.
 * Manages state transitions and delegates to the handler of each state.
 */
export class TaskStateMachine {
  private state: AgentState = AgentState.IDLE;
  private readonly stateHandlers: Map<AgentState, StateHandler>;

  constructor(deps: AgentDependencies) {
    this.stateHandlers = new Map<AgentState, StateHandler>([
      [AgentState.IDLE, new IdleHandler(deps)],
      [AgentState.OBSERVING, new ObserveHandler(deps)],
      [AgentState.DECIDING, new DecideHandler(deps)],
      [AgentState.RESOLVING, new ResolveHandler(deps)],
      [AgentState.INVOKING, new InvokeHandler(deps)],
      [AgentState.RECOVERING, new RecoverHandler(deps)],
      [AgentState.RECORDING, new RecordHandler(deps)],
    ]);
  }

  /**
   * Execute a single state transition.
   */
  async step(context: AgentContext): Promise<AgentContext> {
    const handler = this.stateHandlers.get(this.state);

    if (!handler) {
      throw new Error(`No handler registered for state: ${this.state}`);
    }

    const result = await handler.handle(context);

    if (!isValidTransition(this.state, result.nextState)) {
      throw new Error(`Invalid state transition: ${this.state} -> ${result.nextState}`);
    }

    this.state = result.nextState;
    return result.context;
  }

  /**
   * Run the state machine until a terminal state.
   */
  async run(context: AgentContext): Promise<AgentContext> {
    let currentContext = context;

    while (!this.isTerminal()) {
      currentContext = await this.step(currentContext);

      if (currentContext.shouldExit) {
        break;
      }
    }

    return currentContext;
  }

  get currentState(): AgentState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalState(this.state);
  }

  reset(): void {
    this.state = AgentState.IDLE;
  }

  static createContext(taskId: string, task: string, maxSteps: number): AgentContext {
    return createInitialContext(taskId, task, maxSteps);
  }
}

/**
 * States of the task control loop.
 */
export enum AgentState {
  /** Before the first observation */
  IDLE = 'IDLE',

  /** Capturing the page snapshot */
  OBSERVING = 'OBSERVING',

  /** Waiting on the decision service */
  DECIDING = 'DECIDING',

  /** Applying loop guard and security gate, resolving element indices */
  RESOLVING = 'RESOLVING',

  /** Running the resolved driver call */
  INVOKING = 'INVOKING',

  /** Trying fallback strategies after a failed invocation */
  RECOVERING = 'RECOVERING',

  /** Appending the step outcome to history and memory */
  RECORDING = 'RECORDING',

  /** Accepted finish decision */
  FINISHED = 'FINISHED',

  /** Fatal error, step exhaustion or cancellation */
  ABORTED = 'ABORTED',
}

export const TERMINAL_STATES: ReadonlySet<AgentState> = new Set([
  AgentState.FINISHED,
  AgentState.ABORTED,
]);

export function isTerminalState(state: AgentState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Allowed transitions. Every non-terminal state may abort.
 */
export const VALID_TRANSITIONS: ReadonlyMap<AgentState, AgentState[]> = new Map([
  [AgentState.IDLE, [AgentState.OBSERVING, AgentState.ABORTED]],
  [AgentState.OBSERVING, [AgentState.DECIDING, AgentState.ABORTED]],
  [AgentState.DECIDING, [AgentState.RESOLVING, AgentState.ABORTED]],
  [
    AgentState.RESOLVING,
    [AgentState.INVOKING, AgentState.RECORDING, AgentState.FINISHED, AgentState.ABORTED],
  ],
  [AgentState.INVOKING, [AgentState.RECORDING, AgentState.RECOVERING, AgentState.ABORTED]],
  [AgentState.RECOVERING, [AgentState.RECORDING, AgentState.ABORTED]],
  [AgentState.RECORDING, [AgentState.OBSERVING, AgentState.ABORTED]],
  [AgentState.FINISHED, []],
  [AgentState.ABORTED, []],
]);

export function isValidTransition(from: AgentState, to: AgentState): boolean {
  const validTargets = VALID_TRANSITIONS.get(from);
  return validTargets?.includes(to) ?? false;
}

import { AgentState } from '../../../domain/agent/AgentState';
import { AgentAction, Decision, HistoryItem } from '../../../domain/agent/ActionTypes';
import { ErrorLog } from '../../../domain/agent/ErrorLog';
import { TaskMemory } from '../../../domain/agent/TaskMemory';
import { ElementRecord } from '../../../domain/browser/ElementRecord';
import { PageState } from '../../../domain/browser/PageState';
import { ToolResult } from '../../../domain/tools/Tool';

/**
 * Token usage tracking across the task.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * What the current step will append to history.
 */
export interface StepOutcome {
  /** Recorded action name; the alternate action when recovery succeeded */
  action: string;
  outcome: string;
  success: boolean;
  selector?: string;
  recovered: boolean;
}

export type ExitReason = 'finished' | 'loop_guard' | 'decision_error' | 'step_limit' | 'cancelled' | 'error';

/**
 * Context object passed between state handlers.
 * Holds all per-task state for the control loop.
 */
export interface AgentContext {
  // Identity
  taskId: string;
  task: string;
  maxSteps: number;

  currentState: AgentState;
  /** 1-based number of the step in progress */
  step: number;

  // Per-step data, cleared after recording
  pageState: PageState | null;
  decision: Decision | null;
  action: AgentAction | null;
  element: ElementRecord | null;
  loopTarget: string;
  invocation: ToolResult | null;
  stepOutcome: StepOutcome | null;

  // Per-task state
  history: HistoryItem[];
  memory: TaskMemory;
  errorLog: ErrorLog;
  tokenUsage: TokenUsage;
  startTime: number;

  // Exit signals
  shouldExit: boolean;
  exitReason: ExitReason | null;
  finalMessage: string | null;
  error: Error | null;
}

/**
 * Creates initial agent context for a new task run.
 */
export function createInitialContext(taskId: string, task: string, maxSteps: number): AgentContext {
  return {
    taskId,
    task,
    maxSteps,
    currentState: AgentState.IDLE,
    step: 0,
    pageState: null,
    decision: null,
    action: null,
    element: null,
    loopTarget: '',
    invocation: null,
    stepOutcome: null,
    history: [],
    memory: new TaskMemory(),
    errorLog: new ErrorLog(),
    tokenUsage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    startTime: Date.now(),
    shouldExit: false,
    exitReason: null,
    finalMessage: null,
    error: null,
  };
}

/**
 * Clones context with optional overrides. Memory and the error log are
 * owned by the run and shared between clones.
 */
export function updateContext(context: AgentContext, updates: Partial<AgentContext>): AgentContext {
  return {
    ...context,
    ...updates,
    tokenUsage: updates.tokenUsage ?? { ...context.tokenUsage },
    history: updates.history ?? [...context.history],
  };
}

/**
 * Clears the per-step fields before the next observation.
 */
export function clearStep(context: AgentContext): AgentContext {
  return updateContext(context, {
    pageState: null,
    decision: null,
    action: null,
    element: null,
    loopTarget: '',
    invocation: null,
    stepOutcome: null,
  });
}

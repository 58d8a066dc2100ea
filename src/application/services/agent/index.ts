// Agent module barrel export
export {
  AgentContext,
  ExitReason,
  StepOutcome,
  TokenUsage,
  clearStep,
  createInitialContext,
  updateContext,
} from './AgentContext';
export {
  AgentDependencies,
  AgentTimings,
  BaseStateHandler,
  DEFAULT_AGENT_TIMINGS,
  StateHandler,
  StateHandlerResult,
} from './StateHandler';
export { TaskStateMachine } from './TaskStateMachine';
export * from './handlers';

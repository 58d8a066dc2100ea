/**
 * Browser Task Agent
 * Public API
 */

export { TaskRunner } from './application/services/TaskRunner';
export type { TaskResult, TaskRunnerDeps, TaskRunnerOptions } from './application/services/TaskRunner';
export type { AutomationDriver, ActionResult, CallOptions } from './application/ports/AutomationDriver';
export type { LLMPort, DecisionRequest, DecisionResponse } from './application/ports/LLMPort';
export type { PageStateProvider } from './application/ports/PageStateProvider';
export type { UserInteractionPort } from './application/ports/UserInteractionPort';
export type { SubAgent } from './application/ports/SubAgent';
export { EmailAgent } from './application/services/subagents';
export { PageState } from './domain/browser/PageState';
export { ElementRecord } from './domain/browser/ElementRecord';
export * from './domain/errors/AppErrors';
export { PlaywrightDriver } from './infrastructure/browser/PlaywrightDriver';
export { PageStateExtractor } from './infrastructure/browser/PageStateExtractor';
export { LLMAdapterFactory } from './infrastructure/llm/LLMAdapterFactory';
export { ConfigFactory } from './infrastructure/config/ConfigFactory';
export { CompositionRoot } from './infrastructure/di/CompositionRoot';

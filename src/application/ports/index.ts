export type {
  AutomationDriver,
  ActionResult,
  CallOptions,
  CollectedText,
  DriverScrollDirection,
  ViewportSize,
} from './AutomationDriver';
export type { LLMPort, DecisionRequest, DecisionResponse, DecisionOptions } from './LLMPort';
export type { UserInteractionPort } from './UserInteractionPort';
export type { PageStateProvider } from './PageStateProvider';
export type { SubAgent } from './SubAgent';

import { getLogger } from '../../infrastructure/logging';
import { AgentAction, isKnownAction } from '../../domain/agent/ActionTypes';
import { ElementRecord } from '../../domain/browser/ElementRecord';
import { findDestructiveKeyword, isAffirmative, KeywordMatch } from '../../domain/classifiers';
import { UserInteractionPort } from '../ports/UserInteractionPort';

const logger = getLogger('Security');

/**
 * What a gated action points at. Only these fields are matched against
 * destructive keywords; typed text of `fill` is deliberately absent.
 */
export interface GateTargets {
  selector?: string;
  role?: string;
  text?: string;
  label?: string;
}

export type GateVerdict =
  | { proceed: true; match?: KeywordMatch }
  | { proceed: false; match: KeywordMatch; answer: string };

/**
 * Collects the fields of an action that the gate inspects, or undefined
 * for actions that are never gated.
 */
export function gateTargets(action: AgentAction, element?: ElementRecord): GateTargets | undefined {
  if (!isKnownAction(action)) {
    return undefined;
  }
  switch (action.name) {
    case 'click_selector':
      return { selector: action.input.selector };
    case 'click_role':
      return { role: action.input.role, text: action.input.name };
    case 'click_text':
      return { text: action.input.text };
    case 'fill':
      return { selector: action.input.selector };
    case 'click_by_index':
      if (!element) {
        return undefined;
      }
      return {
        selector: element.selector,
        role: element.role,
        text: element.text,
        label: element.attrValue('aria-label'),
      };
    default:
      return undefined;
  }
}

/**
 * Builds the question shown to the operator.
 */
export function confirmationPrompt(action: string, targets: GateTargets): string {
  let description = `Action: ${action}`;
  if (targets.selector) description += ` on selector: ${targets.selector}`;
  if (targets.role) description += ` on role: ${targets.role}`;
  if (targets.text) description += ` on text: ${targets.text}`;
  if (targets.label) description += ` on label: ${targets.label}`;
  return `⚠️  SECURITY CHECK: This action may be destructive:\n${description}\n\nDo you want to proceed? (yes/no): `;
}

/**
 * Requires a human confirmation before actions that look destructive.
 */
export class SecurityGate {
  constructor(
    private readonly user: UserInteractionPort,
    private readonly enabled: boolean = true
  ) {}

  /**
   * Returns the destructive keyword match, if the action needs confirmation.
   */
  inspect(action: AgentAction, element?: ElementRecord): KeywordMatch | undefined {
    if (!this.enabled) {
      return undefined;
    }
    const targets = gateTargets(action, element);
    if (!targets) {
      return undefined;
    }
    return findDestructiveKeyword(targets.selector, targets.role, targets.text, targets.label);
  }

  /**
   * Asks the operator when needed. Rejects only on cancellation.
   */
  async check(action: AgentAction, element: ElementRecord | undefined, signal?: AbortSignal): Promise<GateVerdict> {
    const match = this.inspect(action, element);
    if (!match) {
      return { proceed: true };
    }
    const targets = gateTargets(action, element) ?? {};
    logger.warn('Destructive action needs confirmation', {
      action: action.name,
      category: match.category,
      keyword: match.keyword,
    });
    const answer = await this.user.ask(confirmationPrompt(action.name, targets), signal);
    if (isAffirmative(answer)) {
      logger.info('Operator confirmed action', { action: action.name });
      return { proceed: true, match };
    }
    logger.info('Operator declined action', { action: action.name });
    return { proceed: false, match, answer };
  }
}

import { getLogger } from '../../infrastructure/logging';
import { AgentAction, HistoryItem, isKnownAction } from '../../domain/agent/ActionTypes';
import { ElementRecord } from '../../domain/browser/ElementRecord';
import { LoopGuardError } from '../../domain/errors/AppErrors';

const logger = getLogger('LoopGuard');

export interface LoopGuardConfig {
  /** Consecutive identical attempts allowed for most actions */
  defaultLimit: number;
  /** Per-action overrides; 0 disables the guard for that action */
  limits: Record<string, number>;
}

export const DEFAULT_LOOP_GUARD_CONFIG: LoopGuardConfig = {
  defaultLimit: 3,
  limits: {
    // feeds load lazily, so scrolling repeats legitimately
    scroll_page: 20,
    click_by_index: 2,
    request_user_input: 0,
  },
};

/**
 * The tuple compared across steps.
 */
export interface LoopKey {
  action: string;
  target: string;
  url: string;
}

export interface LoopCheckResult {
  blocked: boolean;
  limit: number;
  /** Consecutive trailing history items with the same key */
  count: number;
}

function elementKey(element: ElementRecord): string {
  if (element.hasUsableSelector()) {
    return element.selector;
  }
  // bare role selectors are shared by every unnamed element of that role
  const key = `${element.role}:${element.text}`;
  return element.bbox ? `${key}@${element.bbox}` : key;
}

/**
 * Identifies what an action operates on, for repetition checks.
 * Index clicks use the resolved element so the key survives renumbering.
 */
export function actionTarget(action: AgentAction, element?: ElementRecord): string {
  if (!isKnownAction(action)) {
    return JSON.stringify(action.input);
  }
  switch (action.name) {
    case 'navigate':
      return action.input.url;
    case 'click_by_index':
      if (element) {
        return elementKey(element);
      }
      return `#${action.input.index}`;
    case 'click_text':
    case 'click_text_fuzzy':
      return action.input.text;
    case 'click_role':
      return `${action.input.role}:${action.input.name ?? ''}`;
    case 'click_selector':
    case 'fill':
    case 'scroll_to_element':
    case 'wait_for':
    case 'wait_for_lazy_content':
    case 'collect_texts':
      return action.input.selector;
    case 'click_coordinates':
      return `${action.input.x},${action.input.y}`;
    case 'scroll_page':
      return action.input.direction ?? 'down';
    case 'read_page':
      return action.input.selector ?? '';
    case 'request_user_input':
      return action.input.prompt;
    case 'save_state':
      return action.input.path;
  }
}

/**
 * Aborts a task when the same action keeps being chosen for the same
 * target on the same page.
 */
export class LoopGuard {
  private readonly config: LoopGuardConfig;

  constructor(config: Partial<LoopGuardConfig> = {}) {
    this.config = {
      defaultLimit: config.defaultLimit ?? DEFAULT_LOOP_GUARD_CONFIG.defaultLimit,
      limits: { ...DEFAULT_LOOP_GUARD_CONFIG.limits, ...config.limits },
    };
  }

  limitFor(action: string): number {
    return this.config.limits[action] ?? this.config.defaultLimit;
  }

  /**
   * Counts trailing history items matching the key. The candidate is blocked
   * when that count already reaches the action's limit.
   */
  check(history: readonly HistoryItem[], key: LoopKey): LoopCheckResult {
    const limit = this.limitFor(key.action);
    let count = 0;
    for (let i = history.length - 1; i >= 0; i--) {
      const item = history[i];
      if (item.action !== key.action || item.target !== key.target || item.url !== key.url) {
        break;
      }
      count++;
    }
    return { blocked: limit > 0 && count >= limit, limit, count };
  }

  /**
   * Throws LoopGuardError when the candidate is blocked.
   */
  enforce(history: readonly HistoryItem[], key: LoopKey): void {
    const result = this.check(history, key);
    if (result.blocked) {
      logger.warn('Repeated action refused', {
        action: key.action,
        target: key.target,
        count: result.count,
      });
      throw new LoopGuardError(key.action, result.limit);
    }
  }
}

/**
 * ActionExecutor
 *
 * The toolbox behind the decision service's actions: validates nothing
 * itself (actions arrive parsed), maps each action onto driver calls and
 * turns the outcome into the observation text recorded in history.
 */

import { AgentAction, isKnownAction, KnownAction } from '../../domain/agent/ActionTypes';
import { PageState } from '../../domain/browser/PageState';
import { errorMessage } from '../../domain/errors/AppErrors';
import { ACTION_CATALOG } from '../../domain/tools/ActionCatalog';
import { ToolDefinition, ToolResult } from '../../domain/tools/Tool';
import { Logger, getLogger } from '../../infrastructure/logging';
import { ActionResult, AutomationDriver, CollectedText, DriverScrollDirection } from '../ports/AutomationDriver';
import { UserInteractionPort } from '../ports/UserInteractionPort';
import { ActionResolver } from './ActionResolver';
import { ensureNotCancelled, sleep } from './Cancellation';
import { sanitizeSelector } from './SelectorSanitizer';

export const DEFAULT_SCROLL_DISTANCE = 600;
export const DEFAULT_WAIT_MS = 5000;
export const DEFAULT_READ_CHARS = 5000;
export const DEFAULT_COLLECT_LIMIT = 50;
const LAZY_CONTENT_PRE_WAIT_MS = 500;
const CLICK_TIMEOUT_MS = 10000;
const COLLECT_PREVIEW_COUNT = 5;

export interface ActionExecutorDeps {
  driver: AutomationDriver;
  resolver: ActionResolver;
  user: UserInteractionPort;
}

export interface ExecutionContext {
  /** The snapshot the decision was made on */
  pageState: PageState;
  signal?: AbortSignal;
}

interface Outcome {
  observation: string;
  selector?: string;
}

class ToolFailure extends Error {
  constructor(
    message: string,
    public readonly selector?: string
  ) {
    super(message);
  }
}

const DRIVER_DIRECTIONS: readonly DriverScrollDirection[] = [
  'down',
  'up',
  'top',
  'bottom',
  'page_down',
  'page_up',
];

/**
 * Normalizes a requested direction; `north` means up, anything unknown means down.
 */
export function scrollDirection(direction: string | undefined): DriverScrollDirection {
  const normalized = (direction ?? '').trim().toLowerCase();
  if (normalized === 'north') {
    return 'up';
  }
  return DRIVER_DIRECTIONS.find(d => d === normalized) ?? 'down';
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

/**
 * Formats collected texts for the decision service.
 */
export function formatCollectedTexts(items: CollectedText[]): string {
  if (items.length === 0) {
    return "No items found with selector. Try a different selector like [data-testid*='item'] or [role='option']";
  }
  const lines = [`Found ${items.length} items. Click one with click_selector and its selector.`];
  for (const item of items.slice(0, COLLECT_PREVIEW_COUNT)) {
    let preview = item.text.split('\n')[0];
    if (preview.length > 60) {
      preview = `${preview.slice(0, 60)}...`;
    }
    lines.push(`[${item.index}] text="${preview}" selector=${item.selector}`);
  }
  if (items.length > COLLECT_PREVIEW_COUNT) {
    lines.push(`... and ${items.length - COLLECT_PREVIEW_COUNT} more (see JSON)`);
  }
  lines.push(`Full JSON: ${JSON.stringify({ items, count: items.length })}`);
  return lines.join('\n');
}

/**
 * Executes parsed agent actions against the automation driver.
 */
export class ActionExecutor {
  private logger: Logger;
  private driver: AutomationDriver;
  private resolver: ActionResolver;
  private user: UserInteractionPort;

  constructor(deps: ActionExecutorDeps) {
    this.logger = getLogger('Executor');
    this.driver = deps.driver;
    this.resolver = deps.resolver;
    this.user = deps.user;
  }

  /**
   * Tool definitions advertised to the decision service.
   */
  describe(): readonly ToolDefinition[] {
    return ACTION_CATALOG;
  }

  /**
   * Runs one action. Expected failures come back as `success: false`;
   * only cancellation and ElementNotFoundError propagate.
   */
  async execute(action: AgentAction, context: ExecutionContext): Promise<ToolResult> {
    const start = Date.now();
    try {
      if (!isKnownAction(action)) {
        throw new ToolFailure(`unknown tool ${action.name}`);
      }
      const outcome = await this.run(action, context);
      return {
        success: true,
        observation: outcome.observation,
        selector: outcome.selector,
        duration: Date.now() - start,
        toolName: action.name,
      };
    } catch (error) {
      if (!(error instanceof ToolFailure)) {
        throw error;
      }
      this.logger.debug('Action failed', { action: action.name, error: error.message });
      return {
        success: false,
        observation: '',
        error: error.message,
        selector: error.selector,
        duration: Date.now() - start,
        toolName: action.name,
      };
    }
  }

  private async run(action: KnownAction, context: ExecutionContext): Promise<Outcome> {
    const { signal } = context;

    switch (action.name) {
      case 'navigate': {
        const { url } = action.input;
        this.check(await this.driver.navigate(url, { signal }));
        return { observation: `opened ${url}` };
      }

      case 'click_by_index': {
        const result = await this.resolver.clickByIndex(action.input.index, context.pageState, {
          signal,
          timeout: CLICK_TIMEOUT_MS,
        });
        if (!result.success) {
          throw new ToolFailure(result.error ?? 'click failed', result.selector);
        }
        return { observation: result.observation, selector: result.selector };
      }

      case 'click_text': {
        const { text, exact } = action.input;
        this.check(await this.driver.clickText(text, exact, { signal, timeout: CLICK_TIMEOUT_MS }));
        return { observation: `clicked text ${JSON.stringify(text)}` };
      }

      case 'click_role': {
        const { role, exact } = action.input;
        const name = action.input.name ?? '';
        this.check(await this.driver.clickRole(role, name, exact, { signal, timeout: CLICK_TIMEOUT_MS }));
        return { observation: `clicked role=${role} name=${name}` };
      }

      case 'click_selector': {
        const selector = this.sanitized(action.input.selector);
        this.check(await this.driver.clickSelector(selector, { signal, timeout: DEFAULT_WAIT_MS }), selector);
        return { observation: `clicked selector ${selector}`, selector };
      }

      case 'click_text_fuzzy': {
        const { text } = action.input;
        this.check(await this.driver.clickFuzzyText(text, { signal, timeout: DEFAULT_WAIT_MS }));
        return { observation: `clicked fuzzy text ${text}` };
      }

      case 'click_coordinates': {
        const { x, y } = action.input;
        this.check(await this.driver.clickCoordinates(x, y, { signal }));
        return { observation: `clicked at coordinates (${x}, ${y})` };
      }

      case 'fill': {
        const selector = this.sanitized(action.input.selector);
        this.check(
          await this.driver.fill(selector, action.input.text, { signal, timeout: CLICK_TIMEOUT_MS }),
          selector
        );
        return { observation: `filled ${selector}`, selector };
      }

      case 'scroll_page': {
        const direction = scrollDirection(action.input.direction);
        const distance = positiveOr(action.input.distance, DEFAULT_SCROLL_DISTANCE);
        const result = await this.driver.scroll(direction, distance, { signal });
        this.check(result);
        return { observation: `scrolled ${direction} ${result.data ?? distance}` };
      }

      case 'scroll_to_element': {
        const selector = this.sanitized(action.input.selector);
        this.check(await this.driver.scrollToElement(selector, { signal, timeout: DEFAULT_WAIT_MS }), selector);
        return { observation: `scrolled to element ${selector}`, selector };
      }

      case 'wait_for': {
        const selector = this.sanitized(action.input.selector);
        const timeout = positiveOr(action.input.timeout_ms, DEFAULT_WAIT_MS);
        this.check(await this.driver.waitForVisible(selector, { signal, timeout }), selector);
        return { observation: `waited ${selector}`, selector };
      }

      case 'wait_for_lazy_content': {
        const selector = this.sanitized(action.input.selector);
        const timeout = positiveOr(action.input.timeout_ms, DEFAULT_WAIT_MS);
        await sleep(LAZY_CONTENT_PRE_WAIT_MS, signal);
        const result = await this.driver.waitForVisible(selector, { signal, timeout });
        if (!result.success) {
          throw new ToolFailure(`lazy content not loaded: ${result.error ?? 'timeout'}`, selector);
        }
        return { observation: `lazy content appeared: ${selector}`, selector };
      }

      case 'read_page': {
        const maxChars = positiveOr(action.input.max_chars, DEFAULT_READ_CHARS);
        const result = await this.driver.read(action.input.selector ?? '', { signal });
        this.check(result);
        const content = result.data ?? '';
        return {
          observation: content.length > maxChars ? `${content.slice(0, maxChars)}...` : content,
        };
      }

      case 'collect_texts': {
        const selector = this.sanitized(action.input.selector);
        const limit = positiveOr(action.input.limit, DEFAULT_COLLECT_LIMIT);
        const result = await this.driver.collectTexts(selector, action.input.attribute ?? '', limit, {
          signal,
        });
        this.check(result, selector);
        return { observation: formatCollectedTexts(result.data ?? []), selector };
      }

      case 'request_user_input': {
        try {
          const answer = await this.user.ask(action.input.prompt, signal);
          return { observation: answer };
        } catch (error) {
          ensureNotCancelled(signal);
          throw new ToolFailure(`user input unavailable: ${errorMessage(error)}`);
        }
      }

      case 'save_state': {
        const { path } = action.input;
        this.check(await this.driver.saveState(path));
        return { observation: `state saved to ${path}` };
      }
    }
  }

  private sanitized(selector: string): string {
    const clean = sanitizeSelector(selector);
    if (!clean) {
      throw new ToolFailure('selector is invalid or empty after sanitization');
    }
    return clean;
  }

  private check<T>(result: ActionResult<T>, selector?: string): void {
    if (!result.success) {
      throw new ToolFailure(result.error ?? 'action failed', selector);
    }
  }
}

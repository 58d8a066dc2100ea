import { getLogger } from '../../infrastructure/logging';
import { KnownAction } from '../../domain/agent/ActionTypes';
import { ElementRecord } from '../../domain/browser/ElementRecord';
import { PageState } from '../../domain/browser/PageState';
import { ErrorKind } from '../../domain/errors/ErrorClassifier';
import { ToolResult } from '../../domain/tools/Tool';
import { PageStateProvider } from '../ports/PageStateProvider';
import { ActionExecutor } from './ActionExecutor';
import { ActionResolver } from './ActionResolver';
import { sleep } from './Cancellation';

const logger = getLogger('Recovery');

export type RecoveryStrategy =
  | 'wait_retry'
  | 'alternative_action'
  | 'fuzzy_text'
  | 'coordinates'
  | 'similar_element'
  | 'scroll_retry';

export interface RecoveryTimings {
  waitRetryMs: number;
  scrollSettleMs: number;
  scrollDistance: number;
}

export const DEFAULT_RECOVERY_TIMINGS: RecoveryTimings = {
  waitRetryMs: 2000,
  scrollSettleMs: 1000,
  scrollDistance: 300,
};

export interface RecoveryRequest {
  /** The action that failed */
  action: KnownAction;
  /** Element an index click was resolved to */
  element?: ElementRecord;
  kind: ErrorKind;
  /** A snapshot taken after the failure */
  freshState: PageState;
  capture: PageStateProvider;
  signal?: AbortSignal;
}

export type RecoveryOutcome =
  | {
      recovered: true;
      strategy: RecoveryStrategy;
      /** Name of the action that actually worked */
      action: string;
      result: ToolResult;
      attempted: RecoveryStrategy[];
    }
  | { recovered: false; attempted: RecoveryStrategy[] };

interface Attempt {
  action: string;
  result: ToolResult;
}

const CLICK_ROLE_GUESSES = ['button', 'link', 'menuitem'] as const;
const FUZZY_TEXT_LIMIT = 50;

function firstLine(text: string, limit: number): string {
  const line = text.split('\n')[0].trim();
  return line.length > limit ? line.slice(0, limit) : line;
}

function selectorMatches(candidate: string, selector: string): boolean {
  return candidate !== '' && (candidate === selector || candidate.includes(selector));
}

/**
 * Fallback strategies tried, in a fixed order, after a click or similar
 * action fails. Each strategy runs only for the error kinds it applies to.
 */
export class RecoveryService {
  private readonly timings: RecoveryTimings;

  constructor(
    private readonly executor: ActionExecutor,
    private readonly resolver: ActionResolver,
    timings: Partial<RecoveryTimings> = {}
  ) {
    this.timings = { ...DEFAULT_RECOVERY_TIMINGS, ...timings };
  }

  async recover(request: RecoveryRequest): Promise<RecoveryOutcome> {
    const attempted: RecoveryStrategy[] = [];
    const strategies: Array<[RecoveryStrategy, () => Promise<Attempt | undefined>]> = [
      ['wait_retry', () => this.waitAndRetry(request)],
      ['alternative_action', () => this.alternatives(request)],
      ['fuzzy_text', () => this.fuzzyText(request)],
      ['coordinates', () => this.coordinates(request)],
      ['similar_element', () => this.similarElement(request)],
      ['scroll_retry', () => this.scrollAndRetry(request)],
    ];

    for (const [strategy, run] of strategies) {
      const attempt = await run();
      if (attempt === undefined) {
        continue;
      }
      attempted.push(strategy);
      if (attempt.result.success) {
        logger.info('Recovered', { strategy, original: request.action.name, action: attempt.action });
        return { recovered: true, strategy, action: attempt.action, result: attempt.result, attempted };
      }
      logger.debug('Strategy failed', { strategy, error: attempt.result.error });
    }

    logger.warn('All recovery strategies failed', { action: request.action.name, attempted });
    return { recovered: false, attempted };
  }

  private async waitAndRetry(request: RecoveryRequest): Promise<Attempt | undefined> {
    if (request.kind !== ErrorKind.Timeout && request.kind !== ErrorKind.StaleElement) {
      return undefined;
    }
    await sleep(this.timings.waitRetryMs, request.signal);
    const state = await request.capture(request.signal);
    return this.retryOriginal(request, state);
  }

  /**
   * Re-expresses a click through a different locator family.
   */
  private async alternatives(request: RecoveryRequest): Promise<Attempt | undefined> {
    const candidates = this.alternativeActions(request);
    if (candidates.length === 0) {
      return undefined;
    }
    let last: Attempt | undefined;
    for (const candidate of candidates) {
      last = await this.run(candidate, request);
      if (last.result.success) {
        return last;
      }
    }
    return last;
  }

  alternativeActions(request: RecoveryRequest): KnownAction[] {
    const { action, freshState } = request;
    const alternatives: KnownAction[] = [];

    switch (action.name) {
      case 'click_selector': {
        const match = freshState.elements.find(el => selectorMatches(el.selector, action.input.selector));
        const text = match ? firstLine(match.text, FUZZY_TEXT_LIMIT) : '';
        if (text) {
          alternatives.push({ name: 'click_text', input: { text, exact: false } });
        }
        if (match && match.hasMeaningfulRole()) {
          alternatives.push({
            name: 'click_role',
            input: { role: match.role, name: match.attrValue('aria-label') ?? text, exact: false },
          });
        }
        break;
      }
      case 'click_by_index': {
        const text = request.element ? firstLine(request.element.text, FUZZY_TEXT_LIMIT) : '';
        if (text) {
          alternatives.push({ name: 'click_text', input: { text, exact: false } });
        }
        break;
      }
      case 'click_role': {
        const { role } = action.input;
        const name = action.input.name || freshState.elements.find(el => el.role === role)?.text || '';
        alternatives.push({ name: 'click_selector', input: { selector: `[role='${role}']` } });
        if (name) {
          alternatives.push({ name: 'click_text', input: { text: name, exact: false } });
        }
        break;
      }
      case 'click_text': {
        const { text } = action.input;
        for (const role of CLICK_ROLE_GUESSES) {
          alternatives.push({ name: 'click_role', input: { role, name: text, exact: false } });
        }
        const match = freshState.findByText(text);
        if (match && match.hasUsableSelector()) {
          alternatives.push({ name: 'click_selector', input: { selector: match.selector } });
        }
        break;
      }
      default:
        break;
    }
    return alternatives;
  }

  private async fuzzyText(request: RecoveryRequest): Promise<Attempt | undefined> {
    const element = this.targetElement(request);
    if (request.action.name !== 'click_selector' && request.action.name !== 'click_by_index') {
      return undefined;
    }
    const text = element ? firstLine(element.text, FUZZY_TEXT_LIMIT) : '';
    if (!text) {
      return undefined;
    }
    return this.run({ name: 'click_text_fuzzy', input: { text } }, request);
  }

  private async coordinates(request: RecoveryRequest): Promise<Attempt | undefined> {
    // index clicks already went through the coordinate tier while resolving
    if (request.action.name !== 'click_selector') {
      return undefined;
    }
    const element = this.targetElement(request);
    if (!element || !element.center()) {
      return undefined;
    }
    const start = Date.now();
    const outcome = await this.resolver.clickCenter(element, { signal: request.signal });
    return {
      action: 'click_coordinates',
      result: {
        success: outcome.success,
        observation: outcome.observation,
        error: outcome.error,
        duration: Date.now() - start,
        toolName: 'click_coordinates',
      },
    };
  }

  /**
   * Finds another element whose text contains what the failed action was after.
   */
  private async similarElement(request: RecoveryRequest): Promise<Attempt | undefined> {
    if (request.kind !== ErrorKind.ElementNotFound) {
      return undefined;
    }
    const needle = this.searchText(request);
    if (!needle) {
      return undefined;
    }
    const similar = request.freshState.findByText(needle);
    if (!similar) {
      return undefined;
    }
    if (similar.hasUsableSelector()) {
      return this.run({ name: 'click_selector', input: { selector: similar.selector } }, request);
    }
    if (similar.hasMeaningfulRole()) {
      return this.run(
        { name: 'click_role', input: { role: similar.role, name: similar.text, exact: false } },
        request
      );
    }
    return undefined;
  }

  private async scrollAndRetry(request: RecoveryRequest): Promise<Attempt | undefined> {
    if (request.kind !== ErrorKind.NotInteractable) {
      return undefined;
    }
    const scrolled = await this.run(
      { name: 'scroll_page', input: { direction: 'down', distance: this.timings.scrollDistance } },
      request
    );
    if (!scrolled.result.success) {
      return scrolled;
    }
    await sleep(this.timings.scrollSettleMs, request.signal);
    const state = await request.capture(request.signal);
    return this.retryOriginal(request, state);
  }

  private async retryOriginal(request: RecoveryRequest, state: PageState): Promise<Attempt> {
    if (request.action.name === 'click_by_index' && request.element) {
      const start = Date.now();
      const resolution = await this.resolver.click(request.element, { signal: request.signal });
      return {
        action: 'click_by_index',
        result: {
          success: resolution.success,
          observation: resolution.observation,
          error: resolution.error,
          selector: resolution.selector,
          duration: Date.now() - start,
          toolName: 'click_by_index',
        },
      };
    }
    return this.run(request.action, { ...request, freshState: state });
  }

  private async run(action: KnownAction, request: RecoveryRequest): Promise<Attempt> {
    logger.debug('Trying action', { action: action.name, input: action.input });
    const result = await this.executor.execute(action, {
      pageState: request.freshState,
      signal: request.signal,
    });
    return { action: action.name, result };
  }

  private targetElement(request: RecoveryRequest): ElementRecord | undefined {
    if (request.element) {
      return request.element;
    }
    const { action, freshState } = request;
    if (action.name === 'click_selector') {
      return freshState.elements.find(el => selectorMatches(el.selector, action.input.selector));
    }
    return undefined;
  }

  private searchText(request: RecoveryRequest): string {
    const { action } = request;
    switch (action.name) {
      case 'click_text':
      case 'click_text_fuzzy':
        return action.input.text;
      case 'click_role':
        return action.input.name ?? '';
      case 'click_by_index':
        return request.element ? firstLine(request.element.text, FUZZY_TEXT_LIMIT) : '';
      case 'click_selector': {
        const label = /aria-label\*?=["']([^"']+)["']/.exec(action.input.selector);
        return label ? label[1] : '';
      }
      default:
        return '';
    }
  }
}

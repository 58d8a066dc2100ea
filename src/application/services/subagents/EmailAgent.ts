import { Decision, HistoryItem } from '../../../domain/agent/ActionTypes';
import { ElementRecord } from '../../../domain/browser/ElementRecord';
import { PageState } from '../../../domain/browser/PageState';
import {
  classifyView,
  emailMarkers,
  emailTasks,
  mailControls,
  mailLocations,
  spamContents,
} from '../../../domain/classifiers';
import { errorMessage, TaskCancelledError } from '../../../domain/errors/AppErrors';
import { loggers } from '../../../infrastructure/logging';
import { DecisionOptions, DecisionRequest, DecisionResponse, LLMPort } from '../../ports/LLMPort';
import { SubAgent } from '../../ports/SubAgent';
import { markerScore, TaskMarkers } from '../snapshot/RelevanceRanker';

export const EMAIL_MARKERS: TaskMarkers = {
  classifier: emailMarkers,
  weights: { address: 10, sender: 8, subject: 8, metadata: 7 },
};

/** Matches message rows of common webmail clients. */
export const EMAIL_LIST_SELECTOR =
  "[data-testid*='message'], [data-testid*='mail'], [role='row'][aria-label*='@'], [data-uid]";

export const EMAIL_WAIT_MS = 10000;
const MAX_SCROLLS = 5;
const MAX_LISTED_ROWS = 10;
const ROW_TEXT_CHARS = 80;
const LONG_ROW_TEXT = 30;
const TESTID_ROW_TEXT = 10;
const RECENT_STEPS = 5;
const MAX_ROW_FAILURES = 2;

const ROW_ROLES: ReadonlySet<string> = new Set(['row', 'listitem', 'article', 'option']);
const CONTROL_ROLES: ReadonlySet<string> = new Set(['button', 'link', 'menuitem']);
const MESSAGE_TESTID = /data-testid:[^|]*(message|mail|item|letter)/i;
const LAYOUT_PART = /-(header|footer|layout)\b/i;

function isLayout(el: ElementRecord): boolean {
  const marks = `${el.attr}|${el.selector}`;
  return LAYOUT_PART.test(marks) && !/content/i.test(marks);
}

/**
 * True for elements that look like one message in a mailbox list.
 */
export function isEmailRow(el: ElementRecord): boolean {
  if (isLayout(el)) {
    return false;
  }
  const score = markerScore(el, EMAIL_MARKERS);
  if (ROW_ROLES.has(el.role) && (score > 0 || el.text.length > LONG_ROW_TEXT)) {
    return true;
  }
  if (MESSAGE_TESTID.test(el.attr) && el.text.length > TESTID_ROW_TEXT) {
    return true;
  }
  // an address plus a sender or subject label
  return score >= EMAIL_MARKERS.weights.address + EMAIL_MARKERS.weights.subject;
}

/**
 * Message rows of the page, best-marked first; equal scores keep page order.
 */
export function emailRows(page: PageState): ElementRecord[] {
  return page.elements
    .filter(isEmailRow)
    .map((el, order) => ({ el, order, score: markerScore(el, EMAIL_MARKERS) }))
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .map(entry => entry.el);
}

function findControl(page: PageState, category: 'delete' | 'back'): ElementRecord | undefined {
  return page.elements.find(
    el =>
      CONTROL_ROLES.has(el.role) &&
      el.hasUsableSelector() &&
      mailControls.match(el.text, el.attr)?.category === category
  );
}

function scrollCount(history: readonly HistoryItem[]): number {
  return history.filter(item => item.action === 'scroll_page').length;
}

function isMailPage(page: PageState): boolean {
  return mailLocations.matches(page.url, page.title);
}

function truncate(text: string): string {
  return text.length > ROW_TEXT_CHARS ? `${text.slice(0, ROW_TEXT_CHARS)}...` : text;
}

/**
 * Mailbox-specific instructions for the current page.
 */
export function emailGuidance(page: PageState, history: readonly HistoryItem[]): string[] {
  const lines = ['You are working in a webmail client. Identify messages by sender, subject and date.'];

  if (classifyView(page) === 'single') {
    lines.push('You are viewing a single message. Read it before deciding what to do with it.');
    const remove = findControl(page, 'delete');
    if (remove) {
      lines.push(`To delete this message, click [${remove.index}] (selector: ${remove.selector}).`);
    }
    const back = findControl(page, 'back');
    if (back) {
      lines.push(`To return to the message list, click [${back.index}] (selector: ${back.selector}).`);
    }
    return lines;
  }

  const rows = emailRows(page);
  if (rows.length > 0) {
    lines.push(`Message rows on this page (${rows.length}):`);
    for (const row of rows.slice(0, MAX_LISTED_ROWS)) {
      lines.push(`[${row.index}] ${JSON.stringify(truncate(row.text))}${row.selector ? ` (selector: ${row.selector})` : ''}`);
    }
    lines.push(`To read every subject at once, use collect_texts with selector "${EMAIL_LIST_SELECTOR}".`);
  } else if (isMailPage(page)) {
    lines.push(
      `No message rows are visible yet. Scroll down, or use wait_for with selector "${EMAIL_LIST_SELECTOR}" while the list loads.`
    );
  }

  const scrolls = scrollCount(history);
  if (scrolls > 0) {
    lines.push(`You have scrolled ${scrolls} time(s) in this task.`);
  }
  return lines;
}

function act(actionName: string, actionInput: Record<string, unknown>, nextGoal: string): Decision {
  return { actionName, actionInput, finish: false, message: '', reasoning: { nextGoal } };
}

function recentFailures(history: readonly HistoryItem[], selector: string): number {
  return history
    .slice(-RECENT_STEPS)
    .filter(item => !item.success && item.selector === selector).length;
}

/**
 * Rule-based next step for when the decision service cannot answer.
 * Returns undefined when no rule applies.
 */
export function fallbackDecision(request: DecisionRequest): Decision | undefined {
  const { pageState: page, history } = request;
  const scrolls = scrollCount(history);

  if (classifyView(page) === 'single') {
    const remove = spamContents.matches(page.visibleText) ? findControl(page, 'delete') : undefined;
    if (remove) {
      return act('click_selector', { selector: remove.selector }, 'Delete the spam message');
    }
    const back = findControl(page, 'back');
    if (back) {
      return act('click_selector', { selector: back.selector }, 'Return to the message list');
    }
  }

  const rows = emailRows(page).filter(row => row.hasUsableSelector());
  if (rows.length === 0) {
    if (!isMailPage(page)) {
      return undefined;
    }
    return scrolls < MAX_SCROLLS
      ? act('scroll_page', { direction: 'down', distance: 300 }, 'Look for message rows further down')
      : act('wait_for', { selector: EMAIL_LIST_SELECTOR, timeout_ms: EMAIL_WAIT_MS }, 'Wait for the message list');
  }

  const fresh = rows.find(row => recentFailures(history, row.selector) < MAX_ROW_FAILURES);
  if (fresh) {
    return act('click_selector', { selector: fresh.selector }, 'Open the next message');
  }
  if (scrolls < MAX_SCROLLS) {
    return act('scroll_page', { direction: 'down', distance: 300 }, 'Look for more messages');
  }
  return act('click_selector', { selector: rows[0].selector }, 'Open the first message');
}

/**
 * Sub-agent for mailbox tasks: reading, sorting and deleting messages.
 */
export class EmailAgent implements SubAgent {
  readonly name = 'email';

  canHandle(task: string): boolean {
    return emailTasks.matches(task);
  }

  async decideNextAction(
    request: DecisionRequest,
    llm: LLMPort,
    options?: DecisionOptions
  ): Promise<DecisionResponse> {
    const guidance = [...(request.guidance ?? []), ...emailGuidance(request.pageState, request.history)];
    try {
      return await llm.decideNextAction({ ...request, guidance }, options);
    } catch (error) {
      if (error instanceof TaskCancelledError || options?.signal?.aborted) {
        throw error;
      }
      const decision = fallbackDecision(request);
      if (!decision) {
        throw error;
      }
      loggers.agent.warn(`Decision service failed, ${this.name} agent falls back to ${decision.actionName}`, {
        error: errorMessage(error),
      });
      return {
        decision,
        rawResponse: '',
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        latency: 0,
      };
    }
  }
}

import { DecisionOptions, DecisionRequest, DecisionResponse, LLMPort } from '../../../src/application/ports';
import {
  EMAIL_LIST_SELECTOR,
  EmailAgent,
  emailGuidance,
  emailRows,
  fallbackDecision,
  isEmailRow,
} from '../../../src/application/services/subagents/EmailAgent';
import { Decision, HistoryItem } from '../../../src/domain/agent/ActionTypes';
import { ElementRecord } from '../../../src/domain/browser/ElementRecord';
import { PageState } from '../../../src/domain/browser/PageState';
import { DecisionServiceError, TaskCancelledError } from '../../../src/domain/errors/AppErrors';
import { setGlobalLoggerConfig } from '../../../src/infrastructure/logging';

const INTRO = 'You are working in a webmail client. Identify messages by sender, subject and date.';

const newsletter = ElementRecord.create({
  role: 'listitem',
  text: 'Weekly newsletter about gardening tips',
  selector: '#m1',
  index: 1,
});
const fromAnna = ElementRecord.create({ role: 'listitem', text: 'From: anna@mail.test', selector: '#m2', index: 2 });
const deleteButton = ElementRecord.create({ role: 'button', text: 'Delete', selector: '#del', index: 1 });
const backLink = ElementRecord.create({ role: 'link', text: 'Back to inbox', selector: '#back', index: 2 });

function page(url: string, elements: ElementRecord[], visibleText = ''): PageState {
  return PageState.create({ url, title: 'Mail', visibleText, elements });
}

const inbox = page('https://mail.test/inbox', [newsletter, fromAnna]);
const emptyInbox = page('https://mail.test/inbox', []);

function message(visibleText: string): PageState {
  return page('https://mail.test/message/42', [deleteButton, backLink], visibleText);
}

function item(action: string, success = true, selector?: string): HistoryItem {
  return {
    step: 1,
    action,
    input: {},
    outcome: success ? 'ok' : 'error: element not found or not visible',
    success,
    selector,
    target: selector ?? action,
    url: 'https://mail.test/inbox',
    reasoning: {},
  };
}

function request(pageState: PageState, history: HistoryItem[] = []): DecisionRequest {
  return { task: 'Read my latest email', step: 1, maxSteps: 10, history, pageState, actions: [] };
}

describe('isEmailRow', () => {
  it('should accept list entries with long text or mail markers', () => {
    expect(isEmailRow(newsletter)).toBe(true);
    expect(isEmailRow(fromAnna)).toBe(true);
  });

  it('should accept message test ids with some text', () => {
    const el = ElementRecord.create({ role: 'generic', text: 'Weekly digest', attr: 'data-testid:message-item' });
    expect(isEmailRow(el)).toBe(true);
  });

  it('should accept plain elements with an address and a subject', () => {
    const el = ElementRecord.create({ role: 'generic', text: 'Anna <anna@mail.test>, Subject: Invoice' });
    expect(isEmailRow(el)).toBe(true);
  });

  it('should skip layout parts and plain text', () => {
    const header = ElementRecord.create({
      role: 'row',
      text: 'Inbox: 12 unread messages from your contacts',
      attr: 'class:mail-header',
    });
    expect(isEmailRow(header)).toBe(false);
    expect(isEmailRow(ElementRecord.create({ role: 'generic', text: 'Read the docs' }))).toBe(false);
  });
});

describe('emailRows', () => {
  it('should put the best-marked rows first', () => {
    expect(emailRows(inbox).map(el => el.selector)).toEqual(['#m2', '#m1']);
  });
});

describe('emailGuidance', () => {
  it('should list the message rows of a mailbox', () => {
    expect(emailGuidance(inbox, [item('scroll_page')])).toEqual([
      INTRO,
      'Message rows on this page (2):',
      '[2] "From: anna@mail.test" (selector: #m2)',
      '[1] "Weekly newsletter about gardening tips" (selector: #m1)',
      `To read every subject at once, use collect_texts with selector "${EMAIL_LIST_SELECTOR}".`,
      'You have scrolled 1 time(s) in this task.',
    ]);
  });

  it('should point at the delete and back controls of an open message', () => {
    expect(emailGuidance(message('Hello'), [])).toEqual([
      INTRO,
      'You are viewing a single message. Read it before deciding what to do with it.',
      'To delete this message, click [1] (selector: #del).',
      'To return to the message list, click [2] (selector: #back).',
    ]);
  });

  it('should suggest waiting when the mailbox shows no rows yet', () => {
    expect(emailGuidance(emptyInbox, [])).toEqual([
      INTRO,
      `No message rows are visible yet. Scroll down, or use wait_for with selector "${EMAIL_LIST_SELECTOR}" while the list loads.`,
    ]);
  });
});

describe('fallbackDecision', () => {
  function step(decision: Decision | undefined): [string, Record<string, unknown>] | undefined {
    return decision && [decision.actionName, decision.actionInput];
  }

  it('should delete an open spam message', () => {
    expect(step(fallbackDecision(request(message('Big promo inside! Unsubscribe here'))))).toEqual([
      'click_selector',
      { selector: '#del' },
    ]);
  });

  it('should go back from an ordinary message', () => {
    expect(step(fallbackDecision(request(message('Meeting at noon'))))).toEqual([
      'click_selector',
      { selector: '#back' },
    ]);
  });

  it('should scroll an empty mailbox, then wait for the list', () => {
    expect(step(fallbackDecision(request(emptyInbox)))).toEqual(['scroll_page', { direction: 'down', distance: 300 }]);

    const scrolled = [1, 2, 3, 4, 5].map(() => item('scroll_page'));
    expect(step(fallbackDecision(request(emptyInbox, scrolled)))).toEqual([
      'wait_for',
      { selector: EMAIL_LIST_SELECTOR, timeout_ms: 10000 },
    ]);
  });

  it('should skip rows that kept failing', () => {
    const history = [item('click_selector', false, '#m2'), item('click_selector', false, '#m2')];
    expect(step(fallbackDecision(request(inbox, history)))).toEqual(['click_selector', { selector: '#m1' }]);
  });

  it('should give up outside a mailbox', () => {
    expect(fallbackDecision(request(page('https://shop.test/', [])))).toBeUndefined();
  });
});

describe('EmailAgent', () => {
  const response: DecisionResponse = {
    decision: { actionName: 'click_by_index', actionInput: { index: 2 }, finish: false, message: '', reasoning: {} },
    rawResponse: '{}',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    latency: 1,
  };
  let decide: jest.Mock<Promise<DecisionResponse>, [DecisionRequest, DecisionOptions?]>;
  let llm: LLMPort;
  const agent = new EmailAgent();

  beforeAll(() => {
    setGlobalLoggerConfig({ customHandler: () => undefined });
  });

  afterAll(() => {
    setGlobalLoggerConfig({});
  });

  beforeEach(() => {
    decide = jest.fn<Promise<DecisionResponse>, [DecisionRequest, DecisionOptions?]>();
    llm = { provider: 'fake', model: 'fake-model', decideNextAction: decide };
  });

  it.each([
    ['Прочитай последние 3 письма', true],
    ['Delete the spam from my inbox', true],
    ['Order a large pizza', false],
  ])('should decide whether it handles %p', (task, expected) => {
    expect(agent.canHandle(task)).toBe(expected);
  });

  it('should pass mailbox guidance to the decision service', async () => {
    decide.mockResolvedValue(response);
    const options = { maxTokens: 100 };

    await expect(agent.decideNextAction(request(inbox), llm, options)).resolves.toBe(response);

    const [sent, sentOptions] = decide.mock.calls[0];
    expect(sent.guidance?.slice(0, 2)).toEqual([INTRO, 'Message rows on this page (2):']);
    expect(sentOptions).toBe(options);
  });

  it('should fall back to rules when the decision service fails', async () => {
    decide.mockRejectedValue(new DecisionServiceError('rate limited', 'fake', true, 429));

    const result = await agent.decideNextAction(request(inbox), llm);

    expect(result.decision).toMatchObject({ actionName: 'click_selector', actionInput: { selector: '#m2' } });
    expect(result.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
  });

  it('should rethrow when no rule applies', async () => {
    const error = new DecisionServiceError('rate limited', 'fake', true, 429);
    decide.mockRejectedValue(error);

    await expect(agent.decideNextAction(request(page('https://shop.test/', [])), llm)).rejects.toBe(error);
  });

  it('should rethrow cancellation', async () => {
    decide.mockRejectedValue(new TaskCancelledError());

    await expect(agent.decideNextAction(request(inbox), llm)).rejects.toBeInstanceOf(TaskCancelledError);
  });
});

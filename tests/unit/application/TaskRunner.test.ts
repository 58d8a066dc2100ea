import { DecisionOptions, DecisionRequest, DecisionResponse, LLMPort } from '../../../src/application/ports';
import { NO_CHANGE_AFTER_SCROLL } from '../../../src/application/services/agent/handlers/InvokeHandler';
import { TIMEOUT_WITH_CHANGE } from '../../../src/application/services/agent/handlers/RecoverHandler';
import { ValidationError } from '../../../src/application/services/InputValidator';
import { EmailAgent } from '../../../src/application/services/subagents';
import { TaskRunner, TaskRunnerOptions } from '../../../src/application/services/TaskRunner';
import { Decision } from '../../../src/domain/agent/ActionTypes';
import { ElementRecord } from '../../../src/domain/browser/ElementRecord';
import { PageState } from '../../../src/domain/browser/PageState';
import {
  DecisionServiceError,
  LoopGuardError,
  StepLimitError,
  TaskCancelledError,
} from '../../../src/domain/errors/AppErrors';
import { InMemoryEventBus } from '../../../src/infrastructure/events/InMemoryEventBus';
import { setGlobalLoggerConfig } from '../../../src/infrastructure/logging';
import { failed, FakeAutomationDriver } from '../../fakes/FakeAutomationDriver';

const submit = ElementRecord.create({ role: 'button', text: 'Submit', selector: '#submit', index: 1 });

function page(url: string, ...elements: ElementRecord[]): PageState {
  return PageState.create({ url, title: 'Shop', visibleText: '', elements });
}

function act(actionName: string, actionInput: Record<string, unknown> = {}): Decision {
  return { actionName, actionInput, finish: false, message: '', reasoning: {} };
}

function finish(message: string): Decision {
  return { actionName: 'finish', actionInput: {}, finish: true, message, reasoning: {} };
}

function respond(decision: Decision): DecisionResponse {
  return {
    decision,
    rawResponse: JSON.stringify(decision),
    usage: { promptTokens: 100, completionTokens: 20, totalTokens: 120 },
    latency: 1,
  };
}

const fastOptions: Partial<TaskRunnerOptions> = {
  timings: { observeTimeoutMs: 1000, stableDomTimeoutMs: 0, settleMs: 0, clickSettleMs: 0, scrollSettleMs: 0 },
  recoveryTimings: { waitRetryMs: 0, scrollSettleMs: 0 },
  securityGate: false,
};

describe('TaskRunner', () => {
  let driver: FakeAutomationDriver;
  let decide: jest.Mock<Promise<DecisionResponse>, [DecisionRequest, DecisionOptions?]>;
  let llm: LLMPort;
  let capture: jest.Mock<Promise<PageState>, [AbortSignal?]>;
  let ask: jest.Mock<Promise<string>, [string, AbortSignal?]>;
  let eventBus: InMemoryEventBus;

  beforeAll(() => {
    setGlobalLoggerConfig({ customHandler: () => undefined });
  });

  afterAll(() => {
    setGlobalLoggerConfig({});
  });

  beforeEach(() => {
    driver = new FakeAutomationDriver();
    decide = jest.fn<Promise<DecisionResponse>, [DecisionRequest, DecisionOptions?]>();
    llm = { provider: 'fake', model: 'fake-model', decideNextAction: decide };
    capture = jest.fn<Promise<PageState>, [AbortSignal?]>(async () => page('https://shop.test/cart', submit));
    ask = jest.fn<Promise<string>, [string, AbortSignal?]>(async () => 'yes');
    eventBus = new InMemoryEventBus();
  });

  function runner(options: Partial<TaskRunnerOptions> = {}): TaskRunner {
    return new TaskRunner({ driver, llm, capture, user: { ask }, eventBus }, { ...fastOptions, ...options });
  }

  function mailRunner(): TaskRunner {
    return new TaskRunner(
      { driver, llm, capture, user: { ask }, eventBus, subAgents: [new EmailAgent()] },
      fastOptions
    );
  }

  function script(...decisions: Decision[]): void {
    for (const decision of decisions) {
      decide.mockResolvedValueOnce(respond(decision));
    }
  }

  it('should click an indexed element through its selector and finish', async () => {
    script(act('click_by_index', { index: 1 }), finish('Order placed'));

    const result = await runner().run('Place the order', 5);

    expect(result).toMatchObject({ exitReason: 'finished', finalMessage: 'Order placed', steps: 2 });
    expect(result.error).toBeUndefined();
    expect(result.history).toEqual([
      {
        step: 1,
        action: 'click_by_index',
        input: { index: 1 },
        outcome: 'clicked selector #submit',
        success: true,
        selector: '#submit',
        target: '#submit',
        url: 'https://shop.test/cart',
        reasoning: {},
      },
    ]);
    expect(driver.clickSelector).toHaveBeenCalledWith('#submit', expect.anything());
    expect(driver.clickRole).not.toHaveBeenCalled();
    expect(result.tokenUsage).toEqual({ promptTokens: 200, completionTokens: 40, totalTokens: 240 });
  });

  it('should send the step number and history with each decision request', async () => {
    script(act('click_by_index', { index: 1 }), finish('Done'));

    await runner().run('Place the order', 5);

    const second = decide.mock.calls[1][0];
    expect(second.task).toBe('Place the order');
    expect(second.step).toBe(2);
    expect(second.maxSteps).toBe(5);
    expect(second.history.map(item => item.action)).toEqual(['click_by_index']);
    expect(decide.mock.calls[1][1]).toEqual({ maxTokens: 2000, temperature: 0, signal: undefined });
  });

  it('should ask before destructive clicks and go ahead on yes', async () => {
    script(act('click_selector', { selector: '#submit' }), finish('Submitted'));

    const result = await runner({ securityGate: true }).run('Submit the form', 5);

    expect(ask).toHaveBeenCalledTimes(1);
    expect(ask.mock.calls[0][0]).toContain('Action: click_selector on selector: #submit');
    expect(result.history[0]).toMatchObject({ outcome: 'clicked selector #submit', success: true });
  });

  it('should record a declined destructive click without invoking it', async () => {
    ask.mockResolvedValue('no');
    script(act('click_selector', { selector: '#submit' }), finish('Stopped'));

    const result = await runner({ securityGate: true }).run('Submit the form', 5);

    expect(driver.clickSelector).not.toHaveBeenCalled();
    expect(result.history[0]).toMatchObject({ action: 'click_selector', outcome: 'cancelled by user', success: false });
    expect(result.exitReason).toBe('finished');
  });

  it('should abort on the fourth identical failing click', async () => {
    capture.mockResolvedValue(page('https://shop.test/cart'));
    driver.clickSelector.mockResolvedValue(failed('element not found or not visible: #missing'));
    decide.mockResolvedValue(respond(act('click_selector', { selector: '#missing' })));

    const result = await runner().run('Click the missing button', 10);

    expect(result.exitReason).toBe('loop_guard');
    expect(result.error).toBeInstanceOf(LoopGuardError);
    expect(result.error?.message).toBe('too many repeated actions: click_selector (limit: 3). Try a different action');
    expect(result.finalMessage).toBeUndefined();
    expect(result.steps).toBe(4);
    expect(result.history.map(item => item.outcome)).toEqual([
      'error: element not found or not visible: #missing',
      'error: element not found or not visible: #missing',
      'error: element not found or not visible: #missing',
    ]);
    expect(driver.clickSelector).toHaveBeenCalledTimes(3);
  });

  it('should count a timed-out action that changed the page as a success', async () => {
    capture
      .mockResolvedValueOnce(page('https://shop.test/cart', submit))
      .mockResolvedValueOnce(page('https://shop.test/more', submit));
    driver.clickText.mockResolvedValue(failed('Timeout 10000ms exceeded'));
    script(act('click_text', { text: 'Load more' }), finish('Loaded'));

    const result = await runner().run('Load more items', 5);

    expect(result.history[0]).toMatchObject({
      action: 'click_text',
      outcome: TIMEOUT_WITH_CHANGE,
      success: true,
      url: 'https://shop.test/cart',
    });
    expect(result.exitReason).toBe('finished');
  });

  it('should record the action that worked after recovery', async () => {
    driver.clickSelector.mockResolvedValue(failed('element not found or not visible: #submit'));
    script(act('click_selector', { selector: '#submit' }), finish('Done'));

    const result = await runner().run('Submit the form', 5);

    expect(result.history[0]).toMatchObject({ action: 'click_text', outcome: 'clicked text "Submit"', success: true });
    expect(eventBus.getHistory('task.recovery_attempted')).toHaveLength(1);
  });

  it('should bound every re-capture by the observation deadline', async () => {
    driver.url = 'https://shop.test/cart';
    capture
      .mockResolvedValueOnce(page('https://shop.test/cart'))
      .mockImplementation(() => new Promise<PageState>(() => undefined));
    driver.clickText.mockResolvedValueOnce(failed('Timeout 10000ms exceeded'));
    script(act('click_text', { text: 'Load more' }), finish('Loaded'));

    const result = await runner({
      timings: { observeTimeoutMs: 20, stableDomTimeoutMs: 0, settleMs: 0, clickSettleMs: 0, scrollSettleMs: 0 },
    }).run('Load more items', 5);

    expect(result.exitReason).toBe('finished');
    expect(result.history[0]).toMatchObject({ action: 'click_text', outcome: 'clicked text "Load more"', success: true });
    // observe, failure check, wait-and-retry, second observe
    expect(capture).toHaveBeenCalledTimes(4);
    expect(decide.mock.calls[1][0].pageState.elementCount).toBe(0);
  });

  it('should fall back to an empty page when the scroll re-check hangs', async () => {
    capture
      .mockResolvedValueOnce(page('https://shop.test/cart', submit))
      .mockImplementation(() => new Promise<PageState>(() => undefined));
    script(act('scroll_page', { direction: 'down' }), finish('Scrolled'));

    const result = await runner({
      timings: { observeTimeoutMs: 20, stableDomTimeoutMs: 0, settleMs: 0, clickSettleMs: 0, scrollSettleMs: 0 },
    }).run('Scroll down', 5);

    expect(result.exitReason).toBe('finished');
    expect(result.history[0].outcome).toBe('scrolled down 600');
  });

  it('should let the email agent decide mailbox tasks', async () => {
    script(finish('Nothing new'));

    await mailRunner().run('Read the newest email', 5);

    expect(decide.mock.calls[0][0].guidance?.[0]).toBe(
      'You are working in a webmail client. Identify messages by sender, subject and date.'
    );
  });

  it('should ask the model directly when no sub-agent takes the task', async () => {
    script(finish('Done'));

    await mailRunner().run('Place the order', 5);

    expect(decide.mock.calls[0][0].guidance).toBeUndefined();
  });

  it('should run the email fallback when the model fails on a mailbox', async () => {
    const row = ElementRecord.create({ role: 'listitem', text: 'From: anna@mail.test', selector: '#m1', index: 1 });
    capture.mockResolvedValue(page('https://mail.test/inbox', row));
    decide
      .mockRejectedValueOnce(new DecisionServiceError('rate limited', 'fake', true, 429))
      .mockResolvedValueOnce(respond(finish('Read')));

    const result = await mailRunner().run('Read the newest email', 5);

    expect(result.exitReason).toBe('finished');
    expect(result.history[0]).toMatchObject({ action: 'click_selector', outcome: 'clicked selector #m1', success: true });
    expect(result.tokenUsage.totalTokens).toBe(120);
  });

  it('should stop at the step limit', async () => {
    decide.mockResolvedValue(respond(act('scroll_page', { direction: 'down' })));

    const result = await runner().run('Scroll forever', 2);

    expect(result.exitReason).toBe('step_limit');
    expect(result.error).toBeInstanceOf(StepLimitError);
    expect(result.steps).toBe(2);
    expect(result.history.map(item => item.outcome)).toEqual([NO_CHANGE_AFTER_SCROLL, NO_CHANGE_AFTER_SCROLL]);
  });

  it('should end with a decision error when the model fails', async () => {
    decide.mockRejectedValue(new Error('model returned no JSON'));

    const result = await runner().run('Do something', 5);

    expect(result.exitReason).toBe('decision_error');
    expect(result.error?.message).toBe('model returned no JSON');
    expect(result.steps).toBe(1);
  });

  it('should stop before observing when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await runner().run('Do something', 5, controller.signal);

    expect(result.exitReason).toBe('cancelled');
    expect(result.error).toBeInstanceOf(TaskCancelledError);
    expect(capture).not.toHaveBeenCalled();
  });

  it('should reject an empty task', async () => {
    await expect(runner().run('  \u0007 ', 5)).rejects.toBeInstanceOf(ValidationError);
  });

  it('should publish start, step and end events', async () => {
    script(act('click_by_index', { index: 1 }), finish('Done'));

    await runner().run('Place the order', 5);

    expect(eventBus.getHistory().map(event => event.type)).toEqual([
      'task.started',
      'task.step_completed',
      'task.ended',
    ]);
  });
});

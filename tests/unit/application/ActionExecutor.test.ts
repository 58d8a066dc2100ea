import { UserInteractionPort } from '../../../src/application/ports';
import {
  ActionExecutor,
  formatCollectedTexts,
  scrollDirection,
} from '../../../src/application/services/ActionExecutor';
import { ActionResolver } from '../../../src/application/services/ActionResolver';
import { KnownAction, parseAgentAction } from '../../../src/domain/agent/ActionTypes';
import { PageState } from '../../../src/domain/browser/PageState';
import { ElementNotFoundError, TaskCancelledError } from '../../../src/domain/errors/AppErrors';
import { failed, FakeAutomationDriver, ok } from '../../fakes/FakeAutomationDriver';

describe('ActionExecutor', () => {
  let driver: FakeAutomationDriver;
  let user: UserInteractionPort & { ask: jest.Mock };
  let executor: ActionExecutor;
  const context = { pageState: PageState.empty('https://shop.test/') };

  beforeEach(() => {
    driver = new FakeAutomationDriver();
    user = { ask: jest.fn().mockResolvedValue('42') };
    executor = new ActionExecutor({ driver, resolver: new ActionResolver(driver), user });
  });

  function run(name: string, input: Record<string, unknown>) {
    return executor.execute(parseAgentAction(name, input), context);
  }

  it('should navigate', async () => {
    const result = await run('navigate', { url: 'https://shop.test/deals' });

    expect(result).toMatchObject({ success: true, observation: 'opened https://shop.test/deals', toolName: 'navigate' });
  });

  it('should sanitize selectors before clicking', async () => {
    const result = await run('click_selector', { selector: '  #buy\n' });

    expect(result).toMatchObject({ success: true, observation: 'clicked selector #buy', selector: '#buy' });
    expect(driver.clickSelector).toHaveBeenCalledWith('#buy', { signal: undefined, timeout: 5000 });
  });

  it('should return driver failures with the selector used', async () => {
    driver.clickSelector.mockResolvedValue(failed('element not found or not visible: #buy'));

    const result = await run('click_selector', { selector: '#buy' });

    expect(result).toMatchObject({
      success: false,
      observation: '',
      error: 'element not found or not visible: #buy',
      selector: '#buy',
    });
  });

  it('should reject selectors that sanitize to nothing', async () => {
    const action: KnownAction = { name: 'fill', input: { selector: '\n', text: 'x' } };

    const result = await executor.execute(action, context);

    expect(result.error).toBe('selector is invalid or empty after sanitization');
    expect(driver.fill).not.toHaveBeenCalled();
  });

  it('should describe text and role clicks', async () => {
    expect((await run('click_text', { text: 'Sign in' })).observation).toBe('clicked text "Sign in"');
    expect((await run('click_role', { role: 'tab', name: 'Reviews' })).observation).toBe('clicked role=tab name=Reviews');
    expect((await run('click_text_fuzzy', { text: 'Revie' })).observation).toBe('clicked fuzzy text Revie');
    expect((await run('click_coordinates', { x: 5, y: 6 })).observation).toBe('clicked at coordinates (5, 6)');
  });

  it('should fill inputs', async () => {
    const result = await run('fill', { selector: '#q', text: 'blue mug' });

    expect(result.observation).toBe('filled #q');
    expect(driver.fill).toHaveBeenCalledWith('#q', 'blue mug', { signal: undefined, timeout: 10000 });
  });

  describe('scroll_page', () => {
    it('should map north to up with the default distance', async () => {
      const result = await run('scroll_page', { direction: 'north' });

      expect(result.observation).toBe('scrolled up 600');
      expect(driver.scroll).toHaveBeenCalledWith('up', 600, { signal: undefined });
    });

    it('should treat unknown directions as down', async () => {
      expect((await run('scroll_page', { direction: 'sideways', distance: 250 })).observation).toBe('scrolled down 250');
    });

    it('should report the distance the page actually moved', async () => {
      driver.scroll.mockResolvedValue(ok(0));

      expect((await run('scroll_page', { direction: 'down', distance: 300 })).observation).toBe('scrolled down 0');
    });
  });

  it('should wait for elements with the requested timeout', async () => {
    const result = await run('wait_for', { selector: '.results', timeout_ms: 1500 });

    expect(result.observation).toBe('waited .results');
    expect(driver.waitForVisible).toHaveBeenCalledWith('.results', { signal: undefined, timeout: 1500 });
  });

  it('should report lazy content that never appears', async () => {
    driver.waitForVisible.mockResolvedValue(failed('Timeout 5000ms exceeded'));

    const result = await run('wait_for_lazy_content', { selector: '.feed-item' });

    expect(result.error).toBe('lazy content not loaded: Timeout 5000ms exceeded');
  });

  it('should cut page text to max_chars', async () => {
    driver.read.mockResolvedValue(ok('Hello world'));

    const result = await run('read_page', { max_chars: 5 });

    expect(result.observation).toBe('Hello...');
    expect(driver.read).toHaveBeenCalledWith('', { signal: undefined });
  });

  it('should format collected texts', async () => {
    const items = [{ text: 'Red mug\nDetails', selector: '.item:nth-of-type(1)', index: 0 }];
    driver.collectTexts.mockResolvedValue(ok(items));

    const result = await run('collect_texts', { selector: '.item' });

    expect(result.observation).toBe(
      [
        'Found 1 items. Click one with click_selector and its selector.',
        '[0] text="Red mug" selector=.item:nth-of-type(1)',
        `Full JSON: ${JSON.stringify({ items, count: 1 })}`,
      ].join('\n')
    );
    expect(driver.collectTexts).toHaveBeenCalledWith('.item', '', 50, { signal: undefined });
  });

  it('should return the operator answer', async () => {
    const result = await run('request_user_input', { prompt: 'SMS code?' });

    expect(result.observation).toBe('42');
    expect(user.ask).toHaveBeenCalledWith('SMS code?', undefined);
  });

  it('should turn an unavailable operator into a failure', async () => {
    user.ask.mockRejectedValue(new Error('stdin closed'));

    const result = await run('request_user_input', { prompt: 'SMS code?' });

    expect(result.error).toBe('user input unavailable: stdin closed');
  });

  it('should propagate cancellation while asking the operator', async () => {
    const controller = new AbortController();
    controller.abort();
    user.ask.mockRejectedValue(new TaskCancelledError());

    await expect(
      executor.execute(parseAgentAction('request_user_input', { prompt: 'Code?' }), {
        ...context,
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(TaskCancelledError);
  });

  it('should save state', async () => {
    expect((await run('save_state', { path: './state.json' })).observation).toBe('state saved to ./state.json');
  });

  it('should fail unknown tools', async () => {
    const result = await run('hover', { selector: '#menu' });

    expect(result).toMatchObject({ success: false, error: 'unknown tool hover', toolName: 'hover' });
  });

  it('should propagate a missing index', async () => {
    await expect(run('click_by_index', { index: 3 })).rejects.toBeInstanceOf(ElementNotFoundError);
  });
});

describe('scrollDirection', () => {
  it.each([
    ['down', 'down'],
    ['UP', 'up'],
    ['north', 'up'],
    ['page_down', 'page_down'],
    [undefined, 'down'],
    ['left', 'down'],
  ])('should map %p to %p', (input, expected) => {
    expect(scrollDirection(input)).toBe(expected);
  });
});

describe('formatCollectedTexts', () => {
  it('should suggest other selectors when nothing matched', () => {
    expect(formatCollectedTexts([])).toBe(
      "No items found with selector. Try a different selector like [data-testid*='item'] or [role='option']"
    );
  });

  it('should preview five items and count the rest', () => {
    const items = [1, 2, 3, 4, 5, 6, 7].map(i => ({ text: `Item ${i}`, selector: `.i${i}`, index: i - 1 }));
    const lines = formatCollectedTexts(items).split('\n');

    expect(lines).toHaveLength(8);
    expect(lines[5]).toBe('[4] text="Item 5" selector=.i5');
    expect(lines[6]).toBe('... and 2 more (see JSON)');
  });
});

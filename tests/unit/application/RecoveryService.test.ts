import { ActionExecutor } from '../../../src/application/services/ActionExecutor';
import { ActionResolver } from '../../../src/application/services/ActionResolver';
import { RecoveryRequest, RecoveryService } from '../../../src/application/services/RecoveryService';
import { KnownAction } from '../../../src/domain/agent/ActionTypes';
import { ElementRecord } from '../../../src/domain/browser/ElementRecord';
import { PageState } from '../../../src/domain/browser/PageState';
import { ErrorKind } from '../../../src/domain/errors/ErrorClassifier';
import { failed, FakeAutomationDriver } from '../../fakes/FakeAutomationDriver';

function state(...elements: ElementRecord[]): PageState {
  return PageState.create({ url: 'https://shop.test/', title: 'Shop', visibleText: '', elements });
}

describe('RecoveryService', () => {
  let driver: FakeAutomationDriver;
  let recovery: RecoveryService;
  let capture: jest.Mock<Promise<PageState>, [AbortSignal?]>;

  beforeEach(() => {
    driver = new FakeAutomationDriver();
    const resolver = new ActionResolver(driver);
    const executor = new ActionExecutor({ driver, resolver, user: { ask: jest.fn() } });
    recovery = new RecoveryService(executor, resolver, { waitRetryMs: 0, scrollSettleMs: 0 });
    capture = jest.fn<Promise<PageState>, [AbortSignal?]>(async () => state());
  });

  function request(action: KnownAction, kind: ErrorKind, freshState = state(), element?: ElementRecord): RecoveryRequest {
    return { action, kind, freshState, capture, element };
  }

  it('should retry the original action after a timeout', async () => {
    const outcome = await recovery.recover(
      request({ name: 'click_selector', input: { selector: '#buy' } }, ErrorKind.Timeout)
    );

    expect(outcome).toMatchObject({ recovered: true, strategy: 'wait_retry', action: 'click_selector' });
    expect(capture).toHaveBeenCalledTimes(1);
  });

  it('should click a failed selector target by its text', async () => {
    const buy = ElementRecord.create({ role: 'button', text: 'Buy now', selector: '#buy', index: 1 });

    const outcome = await recovery.recover(
      request({ name: 'click_selector', input: { selector: '#buy' } }, ErrorKind.ElementNotFound, state(buy))
    );

    expect(outcome).toMatchObject({
      recovered: true,
      strategy: 'alternative_action',
      action: 'click_text',
      attempted: ['alternative_action'],
    });
    expect(driver.clickText).toHaveBeenCalledWith('Buy now', false, expect.objectContaining({ timeout: 10000 }));
  });

  it('should try role guesses and then a matching selector for click_text', async () => {
    driver.clickRole.mockResolvedValue(failed('Timeout 10000ms exceeded'));
    const next = ElementRecord.create({ role: 'link', text: 'Next page', selector: '#next', index: 1 });

    const outcome = await recovery.recover(
      request({ name: 'click_text', input: { text: 'Next', exact: false } }, ErrorKind.ElementNotFound, state(next))
    );

    expect(outcome).toMatchObject({ recovered: true, strategy: 'alternative_action', action: 'click_selector' });
    expect(driver.clickRole.mock.calls.map(call => call[0])).toEqual(['button', 'link', 'menuitem']);
    expect(driver.clickSelector).toHaveBeenCalledWith('#next', expect.anything());
  });

  it('should list alternatives for click_role', () => {
    const alternatives = recovery.alternativeActions(
      request({ name: 'click_role', input: { role: 'tab', name: undefined, exact: false } }, ErrorKind.ElementNotFound,
        state(ElementRecord.create({ role: 'tab', text: 'Reviews' })))
    );

    expect(alternatives).toEqual([
      { name: 'click_selector', input: { selector: "[role='tab']" } },
      { name: 'click_text', input: { text: 'Reviews', exact: false } },
    ]);
  });

  it('should scroll and retry when the element is not interactable', async () => {
    driver.clickSelector.mockResolvedValue(failed('element is not interactable'));

    const outcome = await recovery.recover(
      request({ name: 'click_selector', input: { selector: '#hidden' } }, ErrorKind.NotInteractable)
    );

    expect(outcome).toEqual({ recovered: false, attempted: ['scroll_retry'] });
    expect(driver.scroll).toHaveBeenCalledWith('down', 300, { signal: undefined });
    expect(capture).toHaveBeenCalledTimes(1);
  });

  it('should attempt nothing when no strategy applies', async () => {
    const outcome = await recovery.recover(
      request({ name: 'navigate', input: { url: 'https://shop.test/' } }, ErrorKind.Unknown)
    );

    expect(outcome).toEqual({ recovered: false, attempted: [] });
  });

  it('should fall back to fuzzy text for an index click', async () => {
    const element = ElementRecord.create({ role: 'generic', text: 'Add to basket\nfree delivery', index: 3 });
    driver.clickText.mockResolvedValue(failed('element not found or not visible: text=Add to basket'));

    const outcome = await recovery.recover(
      request({ name: 'click_by_index', input: { index: 3 } }, ErrorKind.ElementNotFound, state(element), element)
    );

    expect(outcome).toMatchObject({ recovered: true, strategy: 'fuzzy_text', action: 'click_text_fuzzy' });
    expect(driver.clickFuzzyText).toHaveBeenCalledWith('Add to basket', expect.anything());
  });
});

import { chromium, Browser, BrowserContext, Frame, Locator, Page } from 'playwright';
import * as fs from 'fs';
import * as path from 'path';
import {
  ActionResult,
  AutomationDriver,
  CallOptions,
  CollectedText,
  DriverScrollDirection,
  ViewportSize,
} from '../../application/ports/AutomationDriver';
import { ensureNotCancelled, sleep } from '../../application/services/Cancellation';
import { TaskCancelledError, errorMessage } from '../../domain/errors/AppErrors';
import { loggers } from '../logging';

/**
 * Configuration for the PlaywrightDriver.
 */
export interface PlaywrightDriverConfig {
  /** Run browser in headless mode */
  headless?: boolean;
  /** Default timeout for actions in milliseconds */
  timeout?: number;
  /** Storage state (cookies, local storage) to start from */
  storageStatePath?: string;
  /** Viewport width */
  viewportWidth?: number;
  /** Viewport height */
  viewportHeight?: number;
  /** Attempts for a navigation before it is reported as failed */
  navigationAttempts?: number;
  /** Base delay for exponential backoff in milliseconds */
  retryBaseDelay?: number;
}

const DEFAULT_CONFIG: Required<Omit<PlaywrightDriverConfig, 'storageStatePath'>> = {
  headless: false,
  timeout: 30000,
  viewportWidth: 1280,
  viewportHeight: 720,
  navigationAttempts: 2,
  retryBaseDelay: 1000,
};

const LAUNCH_ARGS = ['--disable-dev-shm-usage', '--no-sandbox'];
const VISIBLE_TIMEOUT_MS = 5000;
const HOVER_PAUSE_MS = 200;
const STABLE_DOM_QUIET_MS = 500;
const FRAME_SEPARATOR = '\n\nFRAME:\n';

/**
 * Builds a selector that addresses the index-th match of `selector` in the frame.
 */
const ELEMENT_SELECTOR_SCRIPT = ([selector, index]: [string, number]): string => {
  try {
    const elements = document.querySelectorAll(selector);
    if (index >= elements.length) return selector;
    const el = elements[index];
    if (el.id) return `#${el.id}`;

    const siblingsWith = (name: string, value: string): Element[] =>
      Array.from(el.parentElement?.children ?? []).filter(c => c.getAttribute(name) === value);

    const testId = el.getAttribute('data-testid');
    if (testId) {
      const same = siblingsWith('data-testid', testId);
      return same.length > 1
        ? `[data-testid="${testId}"]:nth-of-type(${same.indexOf(el) + 1})`
        : `[data-testid="${testId}"]`;
    }
    const role = el.getAttribute('role');
    if (role) {
      const same = siblingsWith('role', role);
      return same.length > 1 ? `[role="${role}"]:nth-of-type(${same.indexOf(el) + 1})` : `[role="${role}"]`;
    }
    return `${selector}:nth-of-type(${index + 1})`;
  } catch {
    return `${selector}:nth-of-type(${index + 1})`;
  }
};

/**
 * Resolves once no DOM mutation was seen for `quietMs`, or after `timeoutMs`.
 */
const STABLE_DOM_SCRIPT = ([quietMs, timeoutMs]: [number, number]): Promise<boolean> =>
  new Promise<boolean>(resolve => {
    let quietTimer = setTimeout(() => finish(true), quietMs);
    const hardTimer = setTimeout(() => finish(false), timeoutMs);
    const observer = new MutationObserver(() => {
      clearTimeout(quietTimer);
      quietTimer = setTimeout(() => finish(true), quietMs);
    });
    function finish(stable: boolean): void {
      observer.disconnect();
      clearTimeout(quietTimer);
      clearTimeout(hardTimer);
      resolve(stable);
    }
    observer.observe(document.documentElement, { childList: true, subtree: true, attributes: true });
  });

/**
 * Rejects with TaskCancelledError when the signal fires before `work` settles.
 * Playwright calls cannot be aborted, so the work itself keeps running.
 */
function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return work;
  }
  ensureNotCancelled(signal);
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new TaskCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Playwright implementation of the AutomationDriver port.
 */
export class PlaywrightDriver implements AutomationDriver {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private config: Required<Omit<PlaywrightDriverConfig, 'storageStatePath'>> & { storageStatePath?: string };

  constructor(config: PlaywrightDriverConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Launches Chromium and opens one page.
   */
  async initialize(): Promise<void> {
    this.browser = await chromium.launch({
      headless: this.config.headless,
      args: LAUNCH_ARGS,
    });

    const storageState = this.config.storageStatePath?.trim();
    this.context = await this.browser.newContext({
      ignoreHTTPSErrors: true,
      storageState: storageState || undefined,
      viewport: {
        width: this.config.viewportWidth,
        height: this.config.viewportHeight,
      },
    });

    this.page = await this.context.newPage();
    this.page.setDefaultTimeout(this.config.timeout);
    loggers.browser.info('Browser launched', { headless: this.config.headless, storageState });
  }

  /**
   * Closes the browser instance.
   */
  async close(): Promise<void> {
    if (this.page) {
      await this.page.close();
      this.page = null;
    }
    if (this.context) {
      await this.context.close();
      this.context = null;
    }
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }

  isReady(): boolean {
    return this.browser !== null && this.page !== null;
  }

  /**
   * The live page, for components that inspect it directly.
   */
  getPage(): Page {
    return this.ensurePage();
  }

  currentUrl(): string {
    return this.page ? this.page.url() : '';
  }

  viewportSize(): ViewportSize | undefined {
    return this.page?.viewportSize() ?? undefined;
  }

  /**
   * Runs an action, retrying with exponential backoff, and reports the
   * outcome instead of throwing. Cancellation is the only error that escapes.
   */
  private async withRetry<T>(
    action: () => Promise<T>,
    actionName: string,
    signal?: AbortSignal,
    attempts = 1
  ): Promise<{ result: T | null; error: string | null; duration: number }> {
    const startTime = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      ensureNotCancelled(signal);
      try {
        const result = await abortable(action(), signal);
        return { result, error: null, duration: Date.now() - startTime };
      } catch (error) {
        if (error instanceof TaskCancelledError) {
          throw error;
        }
        lastError = errorMessage(error);
        if (attempt < attempts) {
          await sleep(this.config.retryBaseDelay * Math.pow(2, attempt - 1), signal);
        }
      }
    }

    loggers.browser.debug(`${actionName} failed`, { error: lastError });
    return {
      result: null,
      error: attempts > 1 ? `${actionName} failed after ${attempts} attempts: ${lastError}` : lastError,
      duration: Date.now() - startTime,
    };
  }

  private async perform(action: () => Promise<unknown>, actionName: string, options: CallOptions = {}, attempts = 1): Promise<ActionResult> {
    const { result, error, duration } = await this.withRetry(
      async () => {
        await action();
        return true;
      },
      actionName,
      options.signal,
      attempts
    );
    return { success: result !== null, error: error ?? undefined, duration };
  }

  private async query<T>(action: () => Promise<T>, actionName: string, options: CallOptions = {}): Promise<ActionResult<T>> {
    const { result, error, duration } = await this.withRetry(action, actionName, options.signal);
    return result === null
      ? { success: false, error: error ?? `${actionName} failed`, duration }
      : { success: true, duration, data: result };
  }

  /**
   * Ensures the page is initialized.
   */
  private ensurePage(): Page {
    if (!this.page) {
      throw new Error('Browser not initialized. Call initialize() first.');
    }
    return this.page;
  }

  private timeout(options: CallOptions, fallback = this.config.timeout): number {
    return options.timeout ?? fallback;
  }

  private async clickVisible(locator: Locator, options: CallOptions): Promise<void> {
    const first = locator.first();
    await first.waitFor({ state: 'visible', timeout: this.timeout(options) });
    await first.click({ timeout: this.timeout(options) });
  }

  async navigate(url: string, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    return this.perform(
      () => page.goto(url, { waitUntil: 'load', timeout: this.timeout(options) }),
      'Navigate',
      options,
      this.config.navigationAttempts
    );
  }

  async clickText(text: string, exact: boolean, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    return this.perform(() => this.clickVisible(page.getByText(text, { exact }), options), 'ClickText', options);
  }

  async clickRole(role: string, name: string, exact: boolean, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    const normalized = role.trim().toLowerCase();
    // The role= engine takes any role string; `s` matches the name exactly, `i` as a substring
    const selector = name
      ? `role=${normalized}[name=${JSON.stringify(name)}${exact ? 's' : 'i'}]`
      : `role=${normalized}`;
    return this.perform(() => this.clickVisible(page.locator(selector), options), 'ClickRole', options);
  }

  async clickSelector(selector: string, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    const first = page.locator(selector).first();
    const visibleTimeout = this.timeout(options, VISIBLE_TIMEOUT_MS);

    const visible = await this.perform(
      () => first.waitFor({ state: 'visible', timeout: visibleTimeout }),
      'WaitForVisible',
      options
    );
    if (!visible.success) {
      return { ...visible, error: `element not found or not visible: ${visible.error ?? ''}` };
    }

    return this.perform(
      async () => {
        // Scrolling and hovering are best-effort; the click below reports real failures
        await first.scrollIntoViewIfNeeded({ timeout: visibleTimeout }).catch((error: unknown) => {
          loggers.browser.debug('Scroll into view failed', { selector, error: errorMessage(error) });
        });
        await first.hover({ timeout: visibleTimeout }).catch((error: unknown) => {
          loggers.browser.debug('Hover failed', { selector, error: errorMessage(error) });
        });
        await sleep(HOVER_PAUSE_MS, options.signal);
        await first.click({ timeout: this.timeout(options) });
      },
      'ClickSelector',
      options
    );
  }

  async clickFuzzyText(text: string, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    const first = page.getByText(text, { exact: false }).first();
    return this.perform(
      async () => {
        await first.waitFor({ state: 'visible', timeout: this.timeout(options, VISIBLE_TIMEOUT_MS) });
        await first.scrollIntoViewIfNeeded().catch((error: unknown) => {
          loggers.browser.debug('Scroll into view failed', { text, error: errorMessage(error) });
        });
        await first.click({ timeout: this.timeout(options) });
      },
      'ClickFuzzyText',
      options
    );
  }

  async clickCoordinates(x: number, y: number, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    return this.perform(() => page.mouse.click(x, y), 'ClickCoordinates', options);
  }

  async elementExistsAt(x: number, y: number): Promise<boolean> {
    const page = this.ensurePage();
    try {
      const point: [number, number] = [x, y];
      return await page.evaluate(([px, py]) => document.elementFromPoint(px, py) !== null, point);
    } catch (error) {
      loggers.browser.debug('Hit test failed', { x, y, error: errorMessage(error) });
      return false;
    }
  }

  async fill(selector: string, text: string, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    const locator = page.locator(selector).first();
    return this.perform(
      async () => {
        await locator.waitFor({ state: 'visible', timeout: this.timeout(options) });
        await locator.fill(text, { timeout: this.timeout(options) });
      },
      'Fill',
      options
    );
  }

  async read(selector: string, options: CallOptions = {}): Promise<ActionResult<string>> {
    const page = this.ensurePage();
    const main = await this.query(async () => {
      if (selector.trim() === '') {
        return page.innerText('body', { timeout: this.timeout(options) });
      }
      const locator = page.locator(selector).first();
      await locator.waitFor({ state: 'visible', timeout: this.timeout(options) });
      return locator.innerText();
    }, 'Read', options);

    // Frames are read even when the main frame fails: content often lives only in an iframe
    let content = main.data ?? '';
    for (const frame of this.childFrames()) {
      ensureNotCancelled(options.signal);
      const frameText = await this.frameText(frame);
      if (frameText.trim() !== '') {
        content += FRAME_SEPARATOR + frameText;
      }
    }

    if (!main.success && content === '') {
      return main;
    }
    return { success: true, duration: main.duration, data: content };
  }

  /**
   * Scrolls the window and reports how far it actually moved, which is
   * less than asked for (or zero) at either end of the page.
   */
  async scroll(
    direction: DriverScrollDirection,
    distance: number,
    options: CallOptions = {}
  ): Promise<ActionResult<number>> {
    const page = this.ensurePage();
    const args: [DriverScrollDirection, number] = [direction, scrollMove(direction, distance)];
    return this.query(
      () =>
        page.evaluate(([dir, move]) => {
          const before = window.scrollY;
          if (dir === 'top') {
            window.scrollTo(0, 0);
          } else if (dir === 'bottom') {
            window.scrollTo(0, document.body.scrollHeight);
          } else {
            window.scrollBy(0, move);
          }
          return Math.round(Math.abs(window.scrollY - before));
        }, args),
      'Scroll',
      options
    );
  }

  async scrollToElement(selector: string, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    return this.perform(
      () => page.locator(selector).first().scrollIntoViewIfNeeded({ timeout: this.timeout(options) }),
      'ScrollToElement',
      options
    );
  }

  async waitForVisible(selector: string, options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    return this.perform(
      () => page.locator(selector).first().waitFor({ state: 'visible', timeout: this.timeout(options, VISIBLE_TIMEOUT_MS) }),
      'WaitFor',
      options
    );
  }

  async waitForStableDOM(options: CallOptions = {}): Promise<ActionResult> {
    const page = this.ensurePage();
    const timeout = this.timeout(options, VISIBLE_TIMEOUT_MS);
    return this.perform(async () => {
      const args: [number, number] = [STABLE_DOM_QUIET_MS, timeout];
      const stable = await page.evaluate(STABLE_DOM_SCRIPT, args);
      if (!stable) {
        loggers.browser.debug('DOM still changing after timeout', { timeout });
      }
    }, 'WaitForStableDOM', options);
  }

  async collectTexts(
    selector: string,
    attribute: string,
    limit: number,
    options: CallOptions = {}
  ): Promise<ActionResult<CollectedText[]>> {
    const page = this.ensurePage();
    return this.query(async () => {
      const items: CollectedText[] = [];
      for (const frame of [page.mainFrame(), ...this.childFrames()]) {
        if (items.length >= limit) {
          break;
        }
        ensureNotCancelled(options.signal);
        await this.collectFromFrame(frame, selector, attribute, limit, items);
      }
      return items;
    }, 'CollectTexts', options);
  }

  async saveState(filePath: string): Promise<ActionResult> {
    const context = this.context;
    if (!context) {
      return { success: false, error: 'Browser not initialized', duration: 0 };
    }
    return this.perform(async () => {
      const state = await context.storageState();
      await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
      await fs.promises.writeFile(filePath, JSON.stringify(state), { mode: 0o600 });
    }, 'SaveState');
  }

  /**
   * Non-main frames in document order.
   */
  private childFrames(): Frame[] {
    const page = this.ensurePage();
    const main = page.mainFrame();
    return page.frames().filter(frame => frame !== main);
  }

  private async frameText(frame: Frame): Promise<string> {
    try {
      return await frame.evaluate(() => (document.body ? document.body.innerText : ''));
    } catch (error) {
      loggers.browser.debug('Frame read failed', { url: frame.url(), error: errorMessage(error) });
      return '';
    }
  }

  private async collectFromFrame(
    frame: Frame,
    selector: string,
    attribute: string,
    limit: number,
    items: CollectedText[]
  ): Promise<void> {
    const locator = frame.locator(selector);
    let count: number;
    try {
      count = await locator.count();
    } catch (error) {
      loggers.browser.debug('Collect failed in frame', { url: frame.url(), error: errorMessage(error) });
      return;
    }

    for (let i = 0; i < count && items.length < limit; i++) {
      const item = locator.nth(i);
      let text: string | null;
      try {
        text = attribute ? await item.getAttribute(attribute) : await item.innerText();
      } catch (error) {
        loggers.browser.debug('Collect skipped element', { index: i, error: errorMessage(error) });
        continue;
      }
      if (!text) {
        continue;
      }
      items.push({ text, selector: await this.itemSelector(frame, selector, i), index: items.length + 1 });
    }
  }

  private async itemSelector(frame: Frame, selector: string, index: number): Promise<string> {
    let built = '';
    try {
      const args: [string, number] = [selector, index];
      built = await frame.evaluate(ELEMENT_SELECTOR_SCRIPT, args);
    } catch (error) {
      loggers.browser.debug('Selector build failed', { selector, index, error: errorMessage(error) });
    }
    if (!built || built.includes('undefined') || built.includes('NaN')) {
      return index === 0 ? `${selector}:first-of-type` : `${selector}:nth-of-type(${index + 1})`;
    }
    return built;
  }
}

/**
 * Vertical offset for a relative scroll; page moves are twice the distance.
 */
export function scrollMove(direction: DriverScrollDirection, distance: number): number {
  switch (direction) {
    case 'up':
      return -distance;
    case 'page_down':
      return distance * 2;
    case 'page_up':
      return -distance * 2;
    default:
      return distance;
  }
}

import { PageState } from '../browser/PageState';
import { classifyView, PageView } from '../classifiers';

/**
 * Cross-step progress signals for one task run.
 * Owned by the task runner; reset at task start.
 */
export class TaskMemory {
  private _lastAction = '';
  private _lastPageState: PageState | undefined;
  private _scrollCount = 0;
  private _view: PageView = 'unknown';

  get lastAction(): string {
    return this._lastAction;
  }

  get lastPageState(): PageState | undefined {
    return this._lastPageState;
  }

  get scrollCount(): number {
    return this._scrollCount;
  }

  get view(): PageView {
    return this._view;
  }

  /**
   * True when the page shows one item (a message, a product) rather than a list.
   */
  get viewingSingleItem(): boolean {
    return this._view === 'single';
  }

  observe(page: PageState): void {
    this._lastPageState = page;
    this._view = classifyView(page);
  }

  recordAction(action: string): void {
    this._lastAction = action;
    if (action === 'scroll_page') {
      this._scrollCount++;
    }
  }

  reset(): void {
    this._lastAction = '';
    this._lastPageState = undefined;
    this._scrollCount = 0;
    this._view = 'unknown';
  }

  toJSON(): Record<string, unknown> {
    return {
      lastAction: this._lastAction,
      url: this._lastPageState?.url ?? '',
      scrollCount: this._scrollCount,
      view: this._view,
    };
  }
}

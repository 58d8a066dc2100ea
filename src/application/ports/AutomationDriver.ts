/**
 * Result of a driver call. Expected failures (not found, timeout) are
 * returned here rather than thrown.
 */
export interface ActionResult<T = undefined> {
  /** Whether the action succeeded */
  success: boolean;
  /** Error message if action failed */
  error?: string;
  /** Duration of the action in milliseconds */
  duration: number;
  /** Payload of read-style calls */
  data?: T;
}

/**
 * Options shared by every driver call.
 */
export interface CallOptions {
  /** Timeout in milliseconds */
  timeout?: number;
  /** Aborts waits promptly when the task is cancelled */
  signal?: AbortSignal;
}

export type DriverScrollDirection = 'down' | 'up' | 'top' | 'bottom' | 'page_down' | 'page_up';

/**
 * A text collected from the page with a selector that addresses it.
 */
export interface CollectedText {
  text: string;
  selector: string;
  index: number;
}

export interface ViewportSize {
  width: number;
  height: number;
}

/**
 * Port for the browser automation primitives the agent drives.
 */
export interface AutomationDriver {
  /**
   * Launches the browser. Must be called before any other operation.
   */
  initialize(): Promise<void>;

  /**
   * Closes the browser and releases resources.
   */
  close(): Promise<void>;

  isReady(): boolean;

  currentUrl(): string;

  viewportSize(): ViewportSize | undefined;

  navigate(url: string, options?: CallOptions): Promise<ActionResult>;

  clickText(text: string, exact: boolean, options?: CallOptions): Promise<ActionResult>;

  clickRole(role: string, name: string, exact: boolean, options?: CallOptions): Promise<ActionResult>;

  /**
   * Waits for the element, scrolls it into view, hovers and clicks.
   */
  clickSelector(selector: string, options?: CallOptions): Promise<ActionResult>;

  /**
   * Clicks the first element whose text contains `text`.
   */
  clickFuzzyText(text: string, options?: CallOptions): Promise<ActionResult>;

  clickCoordinates(x: number, y: number, options?: CallOptions): Promise<ActionResult>;

  /**
   * True when some element is hit-testable at the viewport point.
   */
  elementExistsAt(x: number, y: number): Promise<boolean>;

  fill(selector: string, text: string, options?: CallOptions): Promise<ActionResult>;

  /**
   * Reads inner text of `selector` (the body when empty), followed by the
   * text of every child frame.
   */
  read(selector: string, options?: CallOptions): Promise<ActionResult<string>>;

  /**
   * Scrolls the window and reports the distance requested.
   */
  scroll(direction: DriverScrollDirection, distance: number, options?: CallOptions): Promise<ActionResult<number>>;

  scrollToElement(selector: string, options?: CallOptions): Promise<ActionResult>;

  waitForVisible(selector: string, options?: CallOptions): Promise<ActionResult>;

  /**
   * Waits until the DOM stops changing or the timeout passes.
   */
  waitForStableDOM(options?: CallOptions): Promise<ActionResult>;

  /**
   * Collects text (or an attribute) of matching elements in the main frame, then in iframes.
   */
  collectTexts(
    selector: string,
    attribute: string,
    limit: number,
    options?: CallOptions
  ): Promise<ActionResult<CollectedText[]>>;

  /**
   * Writes cookies and local storage to `path`.
   */
  saveState(path: string): Promise<ActionResult>;
}

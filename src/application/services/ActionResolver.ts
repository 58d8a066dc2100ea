import { getLogger } from '../../infrastructure/logging';
import { ElementRecord } from '../../domain/browser/ElementRecord';
import { PageState } from '../../domain/browser/PageState';
import { ElementNotFoundError } from '../../domain/errors/AppErrors';
import { AutomationDriver, CallOptions } from '../ports/AutomationDriver';
import { ensureNotCancelled } from './Cancellation';
import { sanitizeSelector } from './SelectorSanitizer';

const logger = getLogger('Resolver');

export type ResolutionTier = 'selector' | 'role' | 'coordinates';

export interface TierAttempt {
  tier: ResolutionTier;
  success: boolean;
  error?: string;
}

/**
 * Outcome of resolving an element and clicking it.
 * `success: false` with attempts means "invocation failed after resolution".
 */
export interface ResolutionResult {
  success: boolean;
  element: ElementRecord;
  tier?: ResolutionTier;
  /** Selector used by the selector tier */
  selector?: string;
  observation: string;
  error?: string;
  attempts: TierAttempt[];
  duration: number;
}

export interface ResolverOptions {
  /** Re-check viewport bounds and hit-testing before a coordinate click */
  validateCoordinates: boolean;
}

/**
 * Maps an index-addressed click onto the driver with a fixed fallback order:
 * selector, then role and name, then the bounding-box center.
 * Each tier is invoked at most once per call.
 */
export class ActionResolver {
  private readonly options: ResolverOptions;

  constructor(
    private readonly driver: AutomationDriver,
    options: Partial<ResolverOptions> = {}
  ) {
    this.options = { validateCoordinates: true, ...options };
  }

  /**
   * The tiers available for an element, in the order they will be tried.
   */
  plan(element: ElementRecord): ResolutionTier[] {
    const tiers: ResolutionTier[] = [];
    if (element.hasUsableSelector()) tiers.push('selector');
    if (element.hasMeaningfulRole()) tiers.push('role');
    if (element.center()) tiers.push('coordinates');
    return tiers;
  }

  /**
   * Looks up `index` in the snapshot the decision was made on.
   * Throws ElementNotFoundError when the index is absent.
   */
  lookup(index: number, pageState: PageState): ElementRecord {
    const element = pageState.findByIndex(index);
    if (!element) {
      throw new ElementNotFoundError(index, pageState.availableIndices());
    }
    return element;
  }

  async clickByIndex(index: number, pageState: PageState, options: CallOptions = {}): Promise<ResolutionResult> {
    return this.click(this.lookup(index, pageState), options);
  }

  /**
   * Clicks an element through its available tiers.
   */
  async click(element: ElementRecord, options: CallOptions = {}): Promise<ResolutionResult> {
    const start = Date.now();
    const tiers = this.plan(element);
    const attempts: TierAttempt[] = [];

    if (tiers.length === 0) {
      return {
        success: false,
        element,
        observation: '',
        error: `element not found: index ${element.index} has no selector, role or bounding box`,
        attempts,
        duration: Date.now() - start,
      };
    }

    for (const tier of tiers) {
      ensureNotCancelled(options.signal);
      const outcome = await this.invokeTier(tier, element, options);
      attempts.push({ tier, success: outcome.success, error: outcome.error });
      if (outcome.success) {
        logger.debug('Element resolved', { index: element.index, tier });
        return {
          success: true,
          element,
          tier,
          selector: outcome.selector,
          observation: outcome.observation,
          attempts,
          duration: Date.now() - start,
        };
      }
      logger.debug('Resolution tier failed', { index: element.index, tier, error: outcome.error });
    }

    const last = attempts[attempts.length - 1];
    return {
      success: false,
      element,
      selector: element.hasUsableSelector() ? sanitizeSelector(element.selector) : undefined,
      observation: '',
      error: last?.error ?? 'click failed',
      attempts,
      duration: Date.now() - start,
    };
  }

  /**
   * Clicks the center of the element's bounding box, optionally after
   * checking the point is still on screen and still hits an element.
   */
  async clickCenter(
    element: ElementRecord,
    options: CallOptions = {}
  ): Promise<{ success: boolean; observation: string; error?: string }> {
    const center = element.center();
    if (!center) {
      return { success: false, observation: '', error: 'element has no bounding box' };
    }
    const x = Math.round(center.x);
    const y = Math.round(center.y);

    if (this.options.validateCoordinates) {
      const viewport = this.driver.viewportSize();
      if (viewport && (x < 0 || y < 0 || x > viewport.width || y > viewport.height)) {
        return {
          success: false,
          observation: '',
          error: `coordinates (${x}, ${y}) are outside the viewport`,
        };
      }
      if (!(await this.driver.elementExistsAt(x, y))) {
        return { success: false, observation: '', error: `no element at coordinates (${x}, ${y})` };
      }
    }

    const result = await this.driver.clickCoordinates(x, y, options);
    if (!result.success) {
      return { success: false, observation: '', error: result.error };
    }
    return { success: true, observation: `clicked at coordinates (${x}, ${y})` };
  }

  private async invokeTier(
    tier: ResolutionTier,
    element: ElementRecord,
    options: CallOptions
  ): Promise<{ success: boolean; observation: string; selector?: string; error?: string }> {
    switch (tier) {
      case 'selector': {
        const selector = sanitizeSelector(element.selector);
        const result = await this.driver.clickSelector(selector, options);
        return result.success
          ? { success: true, observation: `clicked selector ${selector}`, selector }
          : { success: false, observation: '', selector, error: result.error };
      }
      case 'role': {
        const result = await this.driver.clickRole(element.role, element.text, false, options);
        return result.success
          ? { success: true, observation: `clicked role=${element.role} name=${element.text}` }
          : { success: false, observation: '', error: result.error };
      }
      case 'coordinates':
        return this.clickCenter(element, options);
    }
  }
}

import { Frame, Page } from 'playwright';
import { PageStateProvider } from '../../application/ports/PageStateProvider';
import { ensureNotCancelled } from '../../application/services/Cancellation';
import { RankerOptions, rankElements } from '../../application/services/snapshot/RelevanceRanker';
import { ElementRecord } from '../../domain/browser/ElementRecord';
import { PageState, VISIBLE_TEXT_LIMIT } from '../../domain/browser/PageState';
import { errorMessage } from '../../domain/errors/AppErrors';
import { loggers } from '../logging';
import { parseAccessibilityTree } from './AccessibilityTreeParser';
import { domWalk, RawDomElement } from './DomWalkScript';

const logger = loggers.snapshot;

export interface ExtractorOptions extends RankerOptions {
  /** Cap on raw nodes collected before ranking */
  collectLimit: number;
}

export const DEFAULT_EXTRACTOR_OPTIONS: ExtractorOptions = {
  collectLimit: 200,
  maxElements: 200,
  maxContentElements: 50,
};

/**
 * Drops repeats of the same node, which appear when a same-origin iframe
 * is walked from its parent document and again through its own frame.
 */
export function dedupeElements(elements: readonly ElementRecord[]): ElementRecord[] {
  const seen = new Set<string>();
  return elements.filter(el => {
    const key = `${el.role}|${el.selector}|${el.text}|${el.bbox}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

const INPUT_ROLES: Record<string, string> = {
  checkbox: 'checkbox',
  radio: 'radio',
  button: 'button',
  submit: 'button',
  reset: 'button',
  image: 'button',
  range: 'slider',
};

/**
 * Role of a walked node: its explicit `role`, else the implicit ARIA role of
 * its tag. Tags without one keep the tag name.
 */
export function domRole(raw: Pick<RawDomElement, 'role' | 'tag' | 'hasHref' | 'attr'>): string {
  if (raw.role) {
    return raw.role;
  }
  switch (raw.tag) {
    case 'a':
      return raw.hasHref ? 'link' : 'a';
    case 'button':
      return 'button';
    case 'select':
      return 'combobox';
    case 'textarea':
      return 'textbox';
    case 'input': {
      const type = (/(?:^|\|)type:([^|]*)/.exec(raw.attr)?.[1] ?? '').toLowerCase();
      return INPUT_ROLES[type] ?? 'textbox';
    }
    default:
      return raw.tag;
  }
}

export function toRecord(raw: RawDomElement): ElementRecord {
  return ElementRecord.create({
    role: domRole(raw),
    text: raw.text,
    attr: raw.attr,
    bbox: raw.bbox,
    selector: raw.selector,
    scrollInfo: raw.scrollInfo,
  });
}

/**
 * Captures ranked page snapshots from the live page. Internal failures
 * yield partial results; only cancellation throws.
 */
export class PageStateExtractor {
  private readonly options: ExtractorOptions;

  constructor(
    private readonly page: () => Page,
    options: Partial<ExtractorOptions> = {}
  ) {
    this.options = { ...DEFAULT_EXTRACTOR_OPTIONS, ...options };
  }

  /**
   * The extractor as the agent's page-state provider.
   */
  provider(): PageStateProvider {
    return signal => this.capture(signal);
  }

  async capture(signal?: AbortSignal): Promise<PageState> {
    ensureNotCancelled(signal);
    const page = this.page();
    const url = page.url();
    const title = await page.title().catch((error: unknown) => {
      logger.debug('Title unavailable', { error: errorMessage(error) });
      return '';
    });
    const visibleText = await page.innerText('body', { timeout: 2000 }).catch((error: unknown) => {
      logger.debug('Body text unavailable', { error: errorMessage(error) });
      return '';
    });

    ensureNotCancelled(signal);
    let elements = await this.fromAccessibilityTree(page);
    if (elements.length === 0) {
      elements = await this.fromDomWalk(page, signal);
    }

    const ranked = rankElements(dedupeElements(elements), this.options);
    logger.debug('Snapshot captured', { url, collected: elements.length, kept: ranked.length });

    return PageState.create({
      url,
      title,
      visibleText: visibleText.trim().slice(0, VISIBLE_TEXT_LIMIT),
      elements: ranked,
    });
  }

  private async fromAccessibilityTree(page: Page): Promise<ElementRecord[]> {
    let session;
    try {
      session = await page.context().newCDPSession(page);
    } catch (error) {
      logger.debug('CDP session unavailable, falling back to DOM walk', { error: errorMessage(error) });
      return [];
    }

    try {
      const tree: unknown = await session.send('Accessibility.getFullAXTree');
      const { elements, stats } = parseAccessibilityTree(tree, this.options.collectLimit);
      logger.debug('Accessibility tree parsed', { elements: elements.length, ...stats });
      return elements;
    } catch (error) {
      logger.debug('Accessibility tree failed, falling back to DOM walk', { error: errorMessage(error) });
      return [];
    } finally {
      await session.detach().catch((error: unknown) => {
        logger.debug('CDP detach failed', { error: errorMessage(error) });
      });
    }
  }

  /**
   * Walks the main frame, then each child frame in document order with
   * whatever budget is left.
   */
  private async fromDomWalk(page: Page, signal?: AbortSignal): Promise<ElementRecord[]> {
    const limit = this.options.collectLimit;
    const main = page.mainFrame();
    const frames: Frame[] = [main, ...page.frames().filter(frame => frame !== main)];

    const elements: ElementRecord[] = [];
    let skippedFrames = 0;
    for (const frame of frames) {
      const remaining = limit - elements.length;
      if (remaining <= 0) {
        break;
      }
      ensureNotCancelled(signal);
      try {
        const raw = await frame.evaluate(domWalk, remaining);
        elements.push(...raw.slice(0, remaining).map(toRecord));
      } catch (error) {
        skippedFrames++;
        logger.debug('Frame walk failed', { url: frame.url(), error: errorMessage(error) });
      }
    }
    logger.debug('DOM walk finished', { found: elements.length, skippedFrames });
    return elements;
  }
}

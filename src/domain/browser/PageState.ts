import { ValueObject } from '../shared/ValueObject';
import { ElementRecord } from './ElementRecord';

/**
 * Derived counts for quick triage of a page.
 */
export interface PageStats {
  totalElements: number;
  links: number;
  iframes: number;
  scrollContainers: number;
  interactive: number;
}

/**
 * Properties for the PageState value object.
 */
export interface PageStateProps {
  url: string;
  title: string;
  /** Body text, truncated */
  visibleText: string;
  elements: ElementRecord[];
  pageStats: PageStats;
}

export const VISIBLE_TEXT_LIMIT = 1200;

const CHANGE_SAMPLE_COUNT = 10;

/**
 * Compacted snapshot of the live page for one step.
 * Rebuilt every step and never persisted.
 */
export class PageState extends ValueObject<PageStateProps> {
  private constructor(props: PageStateProps) {
    super(props);
  }

  /**
   * Creates a PageState, computing stats from the elements when not supplied.
   */
  public static create(
    props: Omit<PageStateProps, 'pageStats'> & { pageStats?: PageStats }
  ): PageState {
    return new PageState({
      url: props.url,
      title: props.title,
      visibleText: props.visibleText.slice(0, VISIBLE_TEXT_LIMIT),
      elements: [...props.elements],
      pageStats: props.pageStats ?? PageState.computeStats(props.elements),
    });
  }

  public static empty(url = '', title = ''): PageState {
    return PageState.create({ url, title, visibleText: '', elements: [] });
  }

  public static computeStats(elements: readonly ElementRecord[]): PageStats {
    const stats: PageStats = {
      totalElements: elements.length,
      links: 0,
      iframes: 0,
      scrollContainers: 0,
      interactive: 0,
    };
    for (const el of elements) {
      if (el.role === 'link' || el.attr.includes('href:')) stats.links++;
      if (el.role === 'document' || el.attr.includes('iframe')) stats.iframes++;
      if (el.scrollInfo) stats.scrollContainers++;
      if (el.hasMeaningfulRole()) stats.interactive++;
    }
    return stats;
  }

  public get url(): string {
    return this.props.url;
  }

  public get title(): string {
    return this.props.title;
  }

  public get visibleText(): string {
    return this.props.visibleText;
  }

  public get elements(): ElementRecord[] {
    return [...this.props.elements];
  }

  public get pageStats(): PageStats {
    return { ...this.props.pageStats };
  }

  public get elementCount(): number {
    return this.props.elements.length;
  }

  /**
   * Finds an element by its ordinal in this snapshot.
   */
  public findByIndex(index: number): ElementRecord | undefined {
    return this.props.elements.find(el => el.index === index);
  }

  /**
   * Finds the first element whose selector matches exactly.
   */
  public findBySelector(selector: string): ElementRecord | undefined {
    return this.props.elements.find(el => el.selector === selector);
  }

  /**
   * Finds the first element whose text contains the needle, case-insensitively.
   */
  public findByText(needle: string): ElementRecord | undefined {
    const lowered = needle.toLowerCase();
    if (!lowered) {
      return undefined;
    }
    return this.props.elements.find(el => el.text.toLowerCase().includes(lowered));
  }

  public availableIndices(): number[] {
    return this.props.elements.map(el => el.index);
  }

  /**
   * True when the URL, the element count or any of the first ten texts differ.
   */
  public hasChangedFrom(previous: PageState | undefined): boolean {
    if (!previous) {
      return true;
    }
    if (previous.url !== this.url || previous.elementCount !== this.elementCount) {
      return true;
    }
    const sampled = Math.min(CHANGE_SAMPLE_COUNT, this.elementCount);
    for (let i = 0; i < sampled; i++) {
      if (this.props.elements[i].text !== previous.props.elements[i].text) {
        return true;
      }
    }
    return false;
  }

  /**
   * Multi-line preview of the first elements for logs.
   */
  public preview(limit = CHANGE_SAMPLE_COUNT): string {
    if (this.elementCount === 0) {
      return 'EMPTY - no elements found!';
    }
    return this.props.elements
      .slice(0, limit)
      .map(el => ` ${el.describe()}`)
      .join('\n');
  }

  public summarize(): string {
    const s = this.props.pageStats;
    return [
      `URL: ${this.url}`,
      `Title: ${this.title}`,
      `Elements: ${s.totalElements} (links: ${s.links}, iframes: ${s.iframes}, scrollable: ${s.scrollContainers}, interactive: ${s.interactive})`,
    ].join('\n');
  }
}

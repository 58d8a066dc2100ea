import { ValueObject } from '../shared/ValueObject';

/**
 * Roles that are always kept in a page snapshot, whatever their relevance score.
 */
export const ACTIONABLE_ROLES: ReadonlySet<string> = new Set([
  'button',
  'link',
  'textbox',
  'checkbox',
  'radio',
  'radiogroup',
  'combobox',
  'listitem',
  'menuitem',
  'tab',
  'option',
  'article',
  'row',
  'list',
  'listbox',
  'treeitem',
  'cell',
]);

/**
 * Roles that carry no meaning on their own.
 */
export const TRIVIAL_ROLES: ReadonlySet<string> = new Set(['', 'generic', 'presentation']);

/**
 * Bounding box of an element in page coordinates.
 */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Properties for an ElementRecord.
 */
export interface ElementRecordProps {
  /** 1-based ordinal, unique within one page snapshot */
  index: number;
  role: string;
  /** Truncated visible text or accessible name */
  text: string;
  /** Flattened `key:value|key:value` attribute summary */
  attr: string;
  /** `"x,y,w,h"` or empty when the element has no layout */
  bbox: string;
  /** Best-effort CSS selector, may be empty */
  selector: string;
  /** Scroll position summary, empty unless the element scrolls */
  scrollInfo: string;
  depth: number;
  /** Only set when sourced from the accessibility tree */
  nodeId?: string;
  parentId?: string;
}

const BARE_ROLE_SELECTOR = /^\[role=["']?[\w-]+["']?\]$/;

/**
 * One interactive or content node of a page snapshot.
 * Indices are only meaningful inside the snapshot that produced them.
 */
export class ElementRecord extends ValueObject<ElementRecordProps> {
  private constructor(props: ElementRecordProps) {
    super(props);
  }

  public static create(props: Partial<ElementRecordProps> & { role: string }): ElementRecord {
    return new ElementRecord({
      index: props.index ?? 0,
      role: props.role,
      text: props.text ?? '',
      attr: props.attr ?? '',
      bbox: props.bbox ?? '',
      selector: props.selector ?? '',
      scrollInfo: props.scrollInfo ?? '',
      depth: props.depth ?? 0,
      nodeId: props.nodeId,
      parentId: props.parentId,
    });
  }

  public get index(): number {
    return this.props.index;
  }

  public get role(): string {
    return this.props.role;
  }

  public get text(): string {
    return this.props.text;
  }

  public get attr(): string {
    return this.props.attr;
  }

  public get bbox(): string {
    return this.props.bbox;
  }

  public get selector(): string {
    return this.props.selector;
  }

  public get scrollInfo(): string {
    return this.props.scrollInfo;
  }

  public get depth(): number {
    return this.props.depth;
  }

  public get nodeId(): string | undefined {
    return this.props.nodeId;
  }

  public get parentId(): string | undefined {
    return this.props.parentId;
  }

  /**
   * Returns a copy carrying a new ordinal.
   */
  public withIndex(index: number): ElementRecord {
    return new ElementRecord({ ...this.props, index });
  }

  public isActionable(): boolean {
    return ACTIONABLE_ROLES.has(this.props.role);
  }

  public hasMeaningfulRole(): boolean {
    return !TRIVIAL_ROLES.has(this.props.role);
  }

  /**
   * A selector is usable when it is more specific than a bare role match.
   */
  public hasUsableSelector(): boolean {
    const selector = this.props.selector.trim();
    return selector !== '' && !BARE_ROLE_SELECTOR.test(selector);
  }

  /**
   * Reads a value out of the attribute summary, e.g. `attrValue('aria-label')`.
   */
  public attrValue(key: string): string | undefined {
    for (const pair of this.props.attr.split('|')) {
      const separator = pair.indexOf(':');
      if (separator > 0 && pair.slice(0, separator) === key) {
        return pair.slice(separator + 1);
      }
    }
    return undefined;
  }

  /**
   * Parses the bbox string; undefined when empty, malformed or zero-sized.
   */
  public boundingBox(): BoundingBox | undefined {
    if (!this.props.bbox) {
      return undefined;
    }
    const parts = this.props.bbox.split(',').map(part => Number(part.trim()));
    if (parts.length !== 4 || parts.some(n => !Number.isFinite(n))) {
      return undefined;
    }
    const [x, y, width, height] = parts;
    if (width <= 0 && height <= 0) {
      return undefined;
    }
    return { x, y, width, height };
  }

  /**
   * Center point of the bounding box, used for coordinate clicks.
   */
  public center(): { x: number; y: number } | undefined {
    const box = this.boundingBox();
    if (!box) {
      return undefined;
    }
    return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
  }

  /**
   * Short form used in logs: `[3]button:"Submit"`.
   */
  public describe(maxText = 40): string {
    const text =
      this.props.text.length > maxText
        ? `${this.props.text.slice(0, maxText)}...`
        : this.props.text;
    const scroll = this.props.scrollInfo ? `(scroll:${this.props.scrollInfo})` : '';
    return `[${this.props.index}]${this.props.role}:"${text}"${scroll}`;
  }

  public toJSON(): ElementRecordProps {
    return this.toValue();
  }
}

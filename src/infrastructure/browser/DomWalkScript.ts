/**
 * Element description produced inside the page by `domWalk`.
 */
export interface RawDomElement {
  /** Explicit `role` attribute, empty when the element has none */
  role: string;
  /** Lowercased tag name */
  tag: string;
  /** Links only count as links with an href */
  hasHref: boolean;
  text: string;
  attr: string;
  bbox: string;
  selector: string;
  scrollInfo: string;
}

/**
 * Walks the document (shadow roots and same-origin iframes included) and
 * describes up to `limit` interactive or scrollable nodes.
 *
 * Runs in the browser through `frame.evaluate`, so it must stay
 * self-contained: no imports and no references to module scope.
 */
export function domWalk(limit: number): RawDomElement[] {
  const CANDIDATES =
    'a,button,input,select,textarea,[role],[tabindex],[data-testid],[data-qa],[data-qa-type],[onclick],div,section,main,article,aside';
  const ATTRIBUTES = ['name', 'aria-label', 'placeholder', 'type', 'value', 'role', 'tabindex', 'data-testid', 'data-qa', 'data-qa-type', 'title'];
  const INTERACTIVE_TAGS = new Set(['A', 'BUTTON', 'INPUT', 'SELECT', 'TEXTAREA']);

  function scrollInfo(el: Element): string {
    const style = window.getComputedStyle(el);
    const overflowY = style.overflowY || style.overflow;
    const overflowX = style.overflowX || style.overflow;
    const scrollable = ['auto', 'scroll', 'overlay'];
    const allowsScroll = scrollable.includes(overflowY) || scrollable.includes(overflowX);
    if (!allowsScroll || !(el.scrollHeight > el.clientHeight || el.scrollWidth > el.clientWidth)) {
      return '';
    }
    if (el.scrollHeight <= el.clientHeight) {
      return '';
    }
    const above = Math.max(0, el.scrollTop);
    const below = Math.max(0, el.scrollHeight - el.clientHeight - el.scrollTop);
    const maxTop = el.scrollHeight - el.clientHeight;
    const percent = maxTop > 0 ? Math.round((el.scrollTop / maxTop) * 100) : 0;
    const pagesAbove = above / el.clientHeight;
    const pagesBelow = below / el.clientHeight;
    if (pagesAbove > 0 || pagesBelow > 0) {
      return `${pagesAbove.toFixed(1)}↑ ${pagesBelow.toFixed(1)}↓ ${percent}%`;
    }
    return '';
  }

  function textOf(el: Element): string {
    const inner = el instanceof HTMLElement ? el.innerText : '';
    const value = el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement ? el.value : '';
    return (inner || el.textContent || value || '').trim().slice(0, 120);
  }

  function siblingsOf(el: Element): Element[] {
    return Array.from(el.parentElement ? el.parentElement.children : []);
  }

  function selectorOf(el: Element, role: string, text: string): string {
    if (el.id) {
      return `#${el.id}`;
    }
    const name = el.getAttribute('name');
    if (name) {
      return `[name="${name}"]`;
    }
    const testId = el.getAttribute('data-testid');
    const label = el.getAttribute('aria-label') || '';
    const textPart = text.split('\n')[0].slice(0, 30).trim();
    const safe = (label || textPart).replace(/["[\]]/g, '').replace(/[\r\n]/g, ' ').trim().slice(0, 40);

    if (testId && safe) {
      return `[data-testid="${testId}"][aria-label*="${safe}"]`;
    }
    if (testId) {
      const same = siblingsOf(el).filter(c => c.getAttribute('data-testid') === testId);
      return same.length > 1
        ? `[data-testid="${testId}"]:nth-of-type(${same.indexOf(el) + 1})`
        : `[data-testid="${testId}"]`;
    }
    if (role && safe) {
      return `[role="${role}"][aria-label*="${safe}"]`;
    }
    if (role) {
      return `[role="${role}"]`;
    }
    const position = siblingsOf(el).filter(c => c.tagName === el.tagName).indexOf(el) + 1;
    return position > 0 ? `${el.tagName.toLowerCase()}:nth-of-type(${position})` : '';
  }

  function collect(root: Document | ShadowRoot, pick: RawDomElement[]): void {
    if (pick.length >= limit) return;
    let nodes: NodeListOf<Element>;
    try {
      nodes = root.querySelectorAll(CANDIDATES);
    } catch {
      return;
    }
    for (const el of Array.from(nodes)) {
      if (pick.length >= limit) break;
      const rect = el.getBoundingClientRect();
      if (rect.width === 0 && rect.height === 0) continue;

      const scroll = scrollInfo(el);
      const interactive = INTERACTIVE_TAGS.has(el.tagName) || el.hasAttribute('role') || el.hasAttribute('tabindex');
      if (!interactive && scroll === '') continue;

      const role = el.getAttribute('role') || '';
      const attr = ATTRIBUTES.map(a => `${a}:${el.getAttribute(a) || ''}`).join('|');
      let text = textOf(el);
      if (scroll !== '' && !text) {
        text = 'scrollable container';
      }

      pick.push({
        role,
        tag: el.tagName.toLowerCase(),
        hasHref: el.hasAttribute('href'),
        text,
        attr,
        bbox: [rect.x, rect.y, rect.width, rect.height].map(n => Math.round(n)).join(','),
        selector: selectorOf(el, role, text),
        scrollInfo: scroll,
      });

      if (el.shadowRoot) {
        collect(el.shadowRoot, pick);
      }
    }
  }

  const pick: RawDomElement[] = [];
  collect(document, pick);

  for (const iframe of Array.from(document.querySelectorAll('iframe'))) {
    if (pick.length >= limit) break;
    try {
      const doc = iframe.contentDocument ?? iframe.contentWindow?.document;
      if (doc) {
        collect(doc, pick);
      }
    } catch {
      // cross-origin frames are walked separately through the frame API
      continue;
    }
  }
  return pick;
}

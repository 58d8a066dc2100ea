const ARIA_LABEL_VALUE_LIMIT = 50;
const ARIA_CONTAINS = /aria-label\*=(["'])(.*?)\1/g;

/**
 * Cleans a selector as written by a language model: unescapes quotes,
 * flattens whitespace and caps `aria-label*=` values, keeping their quotes
 * so the selector stays parseable.
 */
export function sanitizeSelector(selector: string): string {
  if (!selector) {
    return '';
  }
  const flattened = selector
    .replace(/\\"/g, '"')
    .replace(/[\r\n\t]/g, ' ')
    .split(' ')
    .filter(part => part !== '')
    .join(' ');

  return flattened
    .replace(ARIA_CONTAINS, (_match, quote: string, value: string) => {
      const capped = value.length > ARIA_LABEL_VALUE_LIMIT ? value.slice(0, ARIA_LABEL_VALUE_LIMIT) : value;
      return `aria-label*=${quote}${capped}${quote}`;
    })
    .trim();
}

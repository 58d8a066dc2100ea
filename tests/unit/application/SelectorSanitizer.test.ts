import { sanitizeSelector } from '../../../src/application/services/SelectorSanitizer';

describe('sanitizeSelector', () => {
  it('should unescape quotes', () => {
    expect(sanitizeSelector('button[aria-label*=\\"Save\\"]')).toBe('button[aria-label*="Save"]');
  });

  it('should flatten control whitespace and collapse spaces', () => {
    expect(sanitizeSelector('  div  >\n span\t.item  ')).toBe('div > span .item');
  });

  it('should cap aria-label values and keep their quotes', () => {
    const label = 'a'.repeat(60);

    expect(sanitizeSelector(`[aria-label*="${label}"]`)).toBe(`[aria-label*="${'a'.repeat(50)}"]`);
    expect(sanitizeSelector(`[aria-label*='${label}']`)).toBe(`[aria-label*='${'a'.repeat(50)}']`);
  });

  it('should leave short aria-label values alone', () => {
    expect(sanitizeSelector('[role="button"][aria-label*="Send"]')).toBe('[role="button"][aria-label*="Send"]');
  });

  it('should return an empty string for blank input', () => {
    expect(sanitizeSelector('')).toBe('');
    expect(sanitizeSelector(' \n\t ')).toBe('');
  });
});

import { ElementRecord } from '../../../src/domain/browser/ElementRecord';

describe('ElementRecord', () => {
  describe('create', () => {
    it('should fill defaults for missing fields', () => {
      const el = ElementRecord.create({ role: 'button' });

      expect(el.index).toBe(0);
      expect(el.text).toBe('');
      expect(el.attr).toBe('');
      expect(el.bbox).toBe('');
      expect(el.selector).toBe('');
      expect(el.depth).toBe(0);
      expect(el.nodeId).toBeUndefined();
    });

    it('should produce a renumbered copy with withIndex', () => {
      const el = ElementRecord.create({ role: 'link', text: 'Home' });
      const renumbered = el.withIndex(7);

      expect(renumbered.index).toBe(7);
      expect(renumbered.text).toBe('Home');
      expect(el.index).toBe(0);
    });
  });

  describe('roles', () => {
    it('should treat buttons and links as actionable', () => {
      expect(ElementRecord.create({ role: 'button' }).isActionable()).toBe(true);
      expect(ElementRecord.create({ role: 'link' }).isActionable()).toBe(true);
      expect(ElementRecord.create({ role: 'heading' }).isActionable()).toBe(false);
    });

    it('should treat generic and presentation as trivial', () => {
      expect(ElementRecord.create({ role: 'generic' }).hasMeaningfulRole()).toBe(false);
      expect(ElementRecord.create({ role: 'presentation' }).hasMeaningfulRole()).toBe(false);
      expect(ElementRecord.create({ role: 'heading' }).hasMeaningfulRole()).toBe(true);
    });
  });

  describe('hasUsableSelector', () => {
    it('should reject empty and bare role selectors', () => {
      expect(ElementRecord.create({ role: 'button', selector: '' }).hasUsableSelector()).toBe(false);
      expect(ElementRecord.create({ role: 'button', selector: '[role="button"]' }).hasUsableSelector()).toBe(false);
    });

    it('should accept specific selectors', () => {
      expect(ElementRecord.create({ role: 'button', selector: '#submit' }).hasUsableSelector()).toBe(true);
      expect(
        ElementRecord.create({ role: 'button', selector: '[role="button"][aria-label*="Save"]' }).hasUsableSelector()
      ).toBe(true);
    });
  });

  describe('attrValue', () => {
    it('should read values from the attribute summary', () => {
      const el = ElementRecord.create({ role: 'textbox', attr: 'name:email|aria-label:Your email|type:' });

      expect(el.attrValue('name')).toBe('email');
      expect(el.attrValue('aria-label')).toBe('Your email');
      expect(el.attrValue('type')).toBe('');
      expect(el.attrValue('placeholder')).toBeUndefined();
    });
  });

  describe('geometry', () => {
    it('should compute the center of the bounding box', () => {
      const el = ElementRecord.create({ role: 'button', bbox: '10,20,100,40' });

      expect(el.boundingBox()).toEqual({ x: 10, y: 20, width: 100, height: 40 });
      expect(el.center()).toEqual({ x: 60, y: 40 });
    });

    it('should return undefined for empty, malformed and zero-sized boxes', () => {
      expect(ElementRecord.create({ role: 'button', bbox: '' }).center()).toBeUndefined();
      expect(ElementRecord.create({ role: 'button', bbox: '1,2' }).center()).toBeUndefined();
      expect(ElementRecord.create({ role: 'button', bbox: '5,5,0,0' }).center()).toBeUndefined();
    });
  });

  describe('describe', () => {
    it('should format index, role and text', () => {
      expect(ElementRecord.create({ role: 'button', text: 'Submit', index: 3 }).describe()).toBe('[3]button:"Submit"');
    });

    it('should truncate long text and show scroll info', () => {
      const el = ElementRecord.create({ role: 'div', text: 'abcdefghij', index: 1, scrollInfo: '0.0↑ 2.0↓ 0%' });

      expect(el.describe(4)).toBe('[1]div:"abcd..."(scroll:0.0↑ 2.0↓ 0%)');
    });
  });
});

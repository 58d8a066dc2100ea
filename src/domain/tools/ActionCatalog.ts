import { SCROLL_DIRECTIONS } from '../agent/ActionTypes';
import { boolean, defineTool, integer, str, ToolDefinition } from './Tool';

/**
 * Every action the decision service may choose, with its input schema.
 */
export const ACTION_CATALOG: readonly ToolDefinition[] = [
  defineTool('navigate', 'Open a URL', { url: str('URL to open') }, ['url']),
  defineTool(
    'click_by_index',
    'Click an element by its index in the elements list, e.g. [1], [2]. Preferred way to click.',
    { index: integer('element index from the current snapshot (1-based)') },
    ['index']
  ),
  defineTool('click_text', 'Click an element by its visible text', {
    text: str('text to click'),
    exact: boolean('exact match'),
  }, ['text']),
  defineTool('click_role', 'Click an element by ARIA role (button/link/checkbox/radio/option) and name', {
    role: str('ARIA role'),
    name: str('visible label'),
    exact: boolean('exact name match'),
  }, ['role']),
  defineTool('click_selector', 'Click an element by CSS selector, when no index is available', {
    selector: str('CSS selector'),
  }, ['selector']),
  defineTool('click_text_fuzzy', 'Click an element by partial text, when an exact match fails', {
    text: str('partial text to match'),
  }, ['text']),
  defineTool('click_coordinates', 'Click at page coordinates taken from an element bbox. Last resort.', {
    x: integer('x coordinate'),
    y: integer('y coordinate'),
  }, ['x', 'y']),
  defineTool('fill', 'Type text into an input found by CSS selector', {
    selector: str('CSS selector'),
    text: str('text to type'),
  }, ['selector', 'text']),
  defineTool(
    'scroll_page',
    'Scroll the page. Distance is optional and defaults to 600px. Use sparingly.',
    {
      direction: { type: 'string', description: 'scroll direction', enum: SCROLL_DIRECTIONS },
      distance: integer('pixels, optional'),
    }
  ),
  defineTool('scroll_to_element', 'Scroll an element into view before clicking it', {
    selector: str('CSS selector'),
  }, ['selector']),
  defineTool('wait_for', 'Wait until a selector is visible', {
    selector: str('CSS selector'),
    timeout_ms: integer('timeout in ms'),
  }, ['selector']),
  defineTool(
    'wait_for_lazy_content',
    'Wait for content that loads after scrolling (infinite feeds, virtual lists)',
    { selector: str('CSS selector to wait for'), timeout_ms: integer('timeout in ms') },
    ['selector']
  ),
  defineTool(
    'read_page',
    'Read text from the page or an element. Includes iframe content the snapshot may miss.',
    { selector: str('CSS selector, empty for the full page'), max_chars: integer('max characters to return') }
  ),
  defineTool(
    'collect_texts',
    'Collect texts and selectors of all elements matching a selector, including inside iframes. The returned selectors can be clicked.',
    {
      selector: str('CSS selector'),
      attribute: str('attribute to read instead of text'),
      limit: integer('max elements to collect'),
    },
    ['selector']
  ),
  defineTool('request_user_input', 'Ask the user for information (codes, credentials, confirmation)', {
    prompt: str('question to the user'),
  }, ['prompt']),
  defineTool('save_state', 'Save cookies and local storage to a file', { path: str('path to save') }, ['path']),
];

export function findToolDefinition(name: string): ToolDefinition | undefined {
  return ACTION_CATALOG.find(tool => tool.name === name);
}

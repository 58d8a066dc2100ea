import { PageState } from '../browser/PageState';
import { authLocations, captchaPages, loginControls, singleItemUrls } from './rules';

export type PageView = 'single' | 'list' | 'unknown';

const LIST_ROLES: ReadonlySet<string> = new Set(['row', 'listitem', 'article', 'option', 'treeitem']);
const LIST_THRESHOLD = 5;
const INPUT_SELECTOR =
  "input[type='text'], input[type='email'], input[type='password'], textarea, [role='textbox']";

/**
 * Decides whether the page shows a single item or a list of items.
 * URL patterns take precedence over element shape.
 */
export function classifyView(page: PageState): PageView {
  if (singleItemUrls.matches(page.url)) {
    return 'single';
  }
  const listEntries = page.elements.filter(el => LIST_ROLES.has(el.role)).length;
  if (listEntries >= LIST_THRESHOLD) {
    return 'list';
  }
  return 'unknown';
}

export function detectCaptcha(page: PageState): boolean {
  return captchaPages.matches(page.title, page.visibleText);
}

/**
 * Guidance lines for login and authorization pages.
 */
export function loginHints(page: PageState): string[] {
  const hints: string[] = [];
  const elements = page.elements;
  const hasTextbox = elements.some(el => el.role === 'textbox');
  const hasLoginControl = elements.some(
    el => (el.role === 'button' || el.role === 'link') && loginControls.matches(el.text)
  );
  const onAuthPage = authLocations.matches(page.url, page.title);

  if (hasLoginControl && !hasTextbox) {
    hints.push(
      'IMPORTANT: You see a login button or link on the page, but no login form (textbox fields). Click the login button/link first to open the form, then request credentials if needed.'
    );
  }
  if (onAuthPage && !hasTextbox) {
    hints.push(
      `CRITICAL: You are on a login/authorization page but don't see textbox fields in the snapshot. Use collect_texts with selector "${INPUT_SELECTOR}" to find input fields, ask the user for the data with request_user_input, then fill the field by its selector.`
    );
  } else if (onAuthPage && hasTextbox) {
    hints.push(
      'CRITICAL: You see textbox fields on a login/authorization page. If you do not have the login/email/password data, use request_user_input FIRST to ask the user for it, then fill the fields with the received values.'
    );
  }
  if (detectCaptcha(page)) {
    hints.push(
      'CRITICAL: The page shows a CAPTCHA or bot check. Do not try to solve it. Use request_user_input to ask the user to solve it, then continue.'
    );
  }
  return hints;
}

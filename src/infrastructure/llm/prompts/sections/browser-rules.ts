/**
 * Rules for interacting with the page.
 */

export const BROWSER_RULES_SECTION = `<browser_rules>
- Only interact with elements listed in the CURRENT <browser_state>. Elements from earlier steps may no longer exist.
- Prefer click_by_index with an index from the current element list.
- The browser state is refreshed automatically after every action. Do not use wait_for to check whether a click, a form submission or a navigation worked.
- After filling a field the page may change. Check the new element list before the next action.
- Scroll only when there is content above or below the viewport. If expected elements are missing, try scrolling or navigating back.
- Use wait_for only when waiting for the user (for example while they solve a captcha) or for a specific element.
- Do not log in unless the task requires it.
- Before using fill you must have the value. If a textbox needs data you do not have, call request_user_input first. Never fill placeholder values such as "your_password_here".
- Before asking the user for data, check the history: if request_user_input already returned it, reuse that value.
- CAPTCHA RULE: on a captcha page (URL contains "captcha", the title mentions a robot check, or the page says "I'm not a robot"), the only allowed action is request_user_input asking the user to solve it. Never click captcha elements. A reply such as "done" confirms the captcha is solved; it is not data to fill.
- To find input fields missing from the element list, use collect_texts with selector "input[type='text'], input[type='email'], input[type='password'], textarea, [role='textbox']".
- Use read_page to read content and collect_texts to find elements the element list does not show, including content inside frames.
- If clicking a link opens something unexpected, use collect_texts to find its container element and click that instead.
</browser_rules>`;

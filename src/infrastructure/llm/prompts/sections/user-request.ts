/**
 * How to treat the task text.
 */

export const USER_REQUEST_SECTION = `<user_request>
The user request is your objective and stays visible at every step.
- It has the highest priority.
- If it lists explicit steps, follow each of them in order. Do not skip or invent steps.
- If it is open ended, plan the steps yourself.
</user_request>`;

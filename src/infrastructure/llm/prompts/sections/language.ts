/**
 * Keeps replies in the operator's language.
 */

export const LANGUAGE_SECTION = `<language_settings>
- Respond in the language of the user request, including finish messages and request_user_input prompts.
</language_settings>`;

/**
 * Builder for composing system prompts from modular sections.
 */

import { ROLE_SECTION } from '../sections/role';
import { LANGUAGE_SECTION } from '../sections/language';
import { USER_REQUEST_SECTION } from '../sections/user-request';
import { AGENT_HISTORY_SECTION } from '../sections/agent-history';
import { OUTPUT_FORMAT_SECTION } from '../sections/output-format';
import { BROWSER_RULES_SECTION } from '../sections/browser-rules';
import { REASONING_RULES_SECTION } from '../sections/reasoning-rules';
import { ACTION_RULES_SECTION } from '../sections/action-rules';
import { TASK_COMPLETION_SECTION } from '../sections/task-completion';

/**
 * Fluent builder for constructing system prompts.
 *
 * Example:
 * ```typescript
 * const prompt = new SystemPromptBuilder()
 *   .addRole()
 *   .addOutputFormat()
 *   .build();
 * ```
 */
export class SystemPromptBuilder {
  private sections: string[] = [];

  addRole(): this {
    this.sections.push(ROLE_SECTION);
    return this;
  }

  addLanguageSettings(): this {
    this.sections.push(LANGUAGE_SECTION);
    return this;
  }

  addUserRequest(): this {
    this.sections.push(USER_REQUEST_SECTION);
    return this;
  }

  addAgentHistory(): this {
    this.sections.push(AGENT_HISTORY_SECTION);
    return this;
  }

  addOutputFormat(): this {
    this.sections.push(OUTPUT_FORMAT_SECTION);
    return this;
  }

  /**
   * Page interaction rules, including the captcha and login rules.
   */
  addBrowserRules(): this {
    this.sections.push(BROWSER_RULES_SECTION);
    return this;
  }

  addReasoningRules(): this {
    this.sections.push(REASONING_RULES_SECTION);
    return this;
  }

  addActionRules(): this {
    this.sections.push(ACTION_RULES_SECTION);
    return this;
  }

  addTaskCompletion(): this {
    this.sections.push(TASK_COMPLETION_SECTION);
    return this;
  }

  addCustomSection(section: string): this {
    if (section && section.trim()) {
      this.sections.push(section);
    }
    return this;
  }

  build(): string {
    return this.sections.filter(Boolean).join('\n\n');
  }

  /**
   * The system prompt used for every decision.
   */
  static buildDefault(): string {
    return new SystemPromptBuilder()
      .addRole()
      .addLanguageSettings()
      .addUserRequest()
      .addAgentHistory()
      .addOutputFormat()
      .addBrowserRules()
      .addReasoningRules()
      .addActionRules()
      .addTaskCompletion()
      .build();
  }
}

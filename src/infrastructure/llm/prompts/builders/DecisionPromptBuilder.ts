import { HistoryItem } from '../../../../domain/agent/ActionTypes';
import { ElementRecord } from '../../../../domain/browser/ElementRecord';
import { PageState } from '../../../../domain/browser/PageState';
import { loginHints } from '../../../../domain/classifiers';
import { DecisionRequest } from '../../../../application/ports/LLMPort';
import { ToolDefinition } from '../../../../domain/tools/Tool';
import { getPromptConfig, PromptConfig } from '../../config/prompt-config';

const OUTPUT_REMINDER = `OUTPUT FORMAT (strict JSON only, no text outside):
{
  "thinking": "...",
  "evaluation_previous_goal": "...",
  "memory": "...",
  "next_goal": "...",
  "action": "tool_name",
  "input": {}
}

To finish the task, set "action": "finish" and "input": {"message": "your detailed summary"}.
The "message" field is REQUIRED for finish.

Use ONE action per step. Do NOT use multi_tool_use.parallel.`;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function formatElementLine(element: ElementRecord, textChars: number): string {
  return `[${element.index}]${element.role}:${JSON.stringify(truncate(element.text, textChars))}`;
}

/**
 * Formats the history tail as `<step_N>` blocks.
 */
export function formatHistory(history: readonly HistoryItem[]): string {
  return history
    .map(item => {
      const lines: string[] = [];
      if (item.reasoning.evaluationPreviousGoal) {
        lines.push(`Evaluation of Previous Step: ${item.reasoning.evaluationPreviousGoal}`);
      }
      if (item.reasoning.memory) {
        lines.push(`Memory: ${item.reasoning.memory}`);
      }
      if (item.reasoning.nextGoal) {
        lines.push(`Next Goal: ${item.reasoning.nextGoal}`);
      }
      let result = `Action Results: ${item.action} -> ${item.outcome}`;
      if (item.selector) result += ` (selector: ${item.selector})`;
      if (item.url) result += ` (URL: ${item.url})`;
      lines.push(result);
      return `<step_${item.step}>:\n${lines.join('\n')}\n</step_${item.step}>`;
    })
    .join('\n\n');
}

/**
 * Lists the elements (within the prompt budget) followed by login hints.
 */
export function formatBrowserState(page: PageState, config: PromptConfig = getPromptConfig()): string {
  const listed = page.elements.slice(0, config.context.maxElements);
  const lines = [`URL: ${page.url}`, `Title: ${page.title}`, `Elements: showing ${listed.length} of ${page.elementCount}`];
  for (const element of listed) {
    lines.push(formatElementLine(element, config.context.elementTextChars));
  }
  const hints = loginHints(page);
  if (hints.length > 0) {
    lines.push('', ...hints);
  }
  return lines.join('\n');
}

/**
 * Renders the action catalog as text, for providers called without native tools.
 */
export function formatAvailableActions(actions: readonly ToolDefinition[]): string {
  return actions
    .map(tool => {
      const params = Object.entries(tool.parameters.properties).map(([key, schema]) => {
        const optional = tool.parameters.required.includes(key) ? '' : '?';
        return `${key}${optional}: ${schema.type}`;
      });
      return `- ${tool.name}(${params.join(', ')}): ${tool.description}`;
    })
    .join('\n');
}

function formatAgentState(request: DecisionRequest): string {
  const lines = [`Step: ${request.step} of ${request.maxSteps}`];
  for (const [key, value] of Object.entries(request.memory ?? {})) {
    if (value !== '' && value !== undefined) {
      lines.push(`${key}: ${String(value)}`);
    }
  }
  return lines.join('\n');
}

function formatGuidance(request: DecisionRequest): string {
  const guidance = request.guidance ?? [];
  return guidance.length > 0 ? `<task_guidance>\n${guidance.join('\n')}\n</task_guidance>\n\n` : '';
}

/**
 * Builds the per-step user message.
 */
export function buildDecisionPrompt(
  request: DecisionRequest,
  config: PromptConfig = getPromptConfig(),
  listActions = false
): string {
  const actions = listActions
    ? `<available_actions>\n${formatAvailableActions(request.actions)}\n</available_actions>\n\n`
    : '';
  return `${actions}<user_request>
${request.task}
</user_request>

<agent_state>
${formatAgentState(request)}
</agent_state>

<browser_state>
${formatBrowserState(request.pageState, config)}
</browser_state>

<agent_history>
${formatHistory(request.history)}
</agent_history>

${formatGuidance(request)}${OUTPUT_REMINDER}`;
}

import { z } from 'zod';
import { Decision, FINISH_ACTION } from '../../domain/agent/ActionTypes';
import { DecisionParseError } from '../../domain/errors/AppErrors';

const PARALLEL_WRAPPER = 'multi_tool_use.parallel';
const FUNCTION_PREFIX = 'functions.';

const RawDecisionSchema = z.object({
  thinking: z.string().optional(),
  evaluation_previous_goal: z.string().optional(),
  memory: z.string().optional(),
  next_goal: z.string().optional(),
  action: z.string({ required_error: 'decision has no action', invalid_type_error: 'action must be a string' }),
  input: z.unknown().optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the first balanced top-level `{...}` in `text`, with comments
 * removed. Braces inside string literals are ignored.
 */
export function extractJSON(text: string): string {
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\') {
      if (inString) escaped = true;
    } else if (ch === '"') {
      inString = !inString;
    } else if (ch === '{' && !inString) {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && !inString && depth > 0) {
      depth--;
      if (depth === 0 && start !== -1) {
        return stripJSONComments(text.slice(start, i + 1));
      }
    }
  }
  throw new DecisionParseError('json not found', text);
}

/**
 * Removes `//` line comments and block comments outside string literals.
 */
export function stripJSONComments(json: string): string {
  let result = '';
  let inString = false;
  let escaped = false;
  let i = 0;

  while (i < json.length) {
    const ch = json[i];
    if (escaped) {
      result += ch;
      escaped = false;
      i++;
      continue;
    }
    if (ch === '\\' && inString) {
      result += ch;
      escaped = true;
      i++;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      result += ch;
      i++;
      continue;
    }
    if (!inString && ch === '/' && json[i + 1] === '/') {
      while (i < json.length && json[i] !== '\n') i++;
      continue;
    }
    if (!inString && ch === '/' && json[i + 1] === '*') {
      i += 2;
      while (i < json.length - 1 && !(json[i] === '*' && json[i + 1] === '/')) i++;
      i += 2;
      continue;
    }
    result += ch;
    i++;
  }
  return result;
}

/**
 * Unwraps `multi_tool_use.parallel` to its first call: `[{name, ...input}]`.
 */
function unwrapParallel(input: unknown): { name: string; input: Record<string, unknown> } {
  const first = Array.isArray(input) ? input[0] : undefined;
  if (isRecord(first) && typeof first.name === 'string') {
    const { name, ...rest } = first;
    return { name, input: rest };
  }
  throw new DecisionParseError(`${PARALLEL_WRAPPER}: failed to extract first action from input array`);
}

function finishMessage(input: Record<string, unknown>): string {
  for (const key of ['message', 'result', 'text']) {
    const value = input[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return '';
}

/**
 * Parses a decision service reply, which may wrap the JSON object in prose.
 */
export function parseDecision(text: string): Decision {
  const json = extractJSON(text);

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new DecisionParseError(
      `llm json parse: ${error instanceof Error ? error.message : String(error)}`,
      text
    );
  }

  const parsed = RawDecisionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecisionParseError(parsed.error.issues[0]?.message ?? 'invalid decision', text);
  }
  const fields = parsed.data;

  let actionName = fields.action.trim();
  let actionInput: Record<string, unknown>;
  if (actionName === PARALLEL_WRAPPER) {
    const first = unwrapParallel(fields.input);
    actionName = first.name.trim();
    actionInput = first.input;
  } else {
    actionInput = isRecord(fields.input) ? fields.input : {};
  }
  if (actionName.startsWith(FUNCTION_PREFIX)) {
    actionName = actionName.slice(FUNCTION_PREFIX.length);
  }

  const finish = actionName === FINISH_ACTION;
  const message = finish ? finishMessage(actionInput) : '';
  if (finish && message === '') {
    throw new DecisionParseError(
      `finish action requires 'message' field in input (got: ${JSON.stringify(actionInput)})`,
      text
    );
  }

  return {
    actionName,
    actionInput,
    finish,
    message,
    reasoning: {
      thinking: fields.thinking?.trim() || undefined,
      evaluationPreviousGoal: fields.evaluation_previous_goal?.trim() || undefined,
      memory: fields.memory?.trim() || undefined,
      nextGoal: fields.next_goal?.trim() || undefined,
    },
  };
}

/**
 * Renders a decision in the reply format `parseDecision` reads.
 * Native tool calls are normalized through this as well.
 */
export function serializeDecision(decision: Pick<Decision, 'actionName' | 'actionInput'> & Partial<Decision>): string {
  const reasoning = decision.reasoning ?? {};
  return JSON.stringify({
    thinking: reasoning.thinking,
    evaluation_previous_goal: reasoning.evaluationPreviousGoal,
    memory: reasoning.memory,
    next_goal: reasoning.nextGoal,
    action: decision.actionName,
    input: decision.actionInput,
  });
}

/**
 * Renders a native tool call as `{"action": name, "input": {...}}`.
 * Arguments that are not a JSON object become `{}`.
 */
export function renderToolCall(name: string, args: unknown): string {
  let input: unknown = args;
  if (typeof args === 'string') {
    try {
      input = args.trim() === '' ? {} : JSON.parse(args);
    } catch {
      input = {};
    }
  }
  return serializeDecision({ actionName: name, actionInput: isRecord(input) ? input : {} });
}

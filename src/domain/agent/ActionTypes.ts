import { z } from 'zod';
import { InvalidActionInputError } from '../errors/AppErrors';

/**
 * Actions the decision service may choose, besides `finish`.
 */
export const ACTION_NAMES = [
  'navigate',
  'click_by_index',
  'click_text',
  'click_role',
  'click_selector',
  'click_text_fuzzy',
  'click_coordinates',
  'fill',
  'scroll_page',
  'scroll_to_element',
  'wait_for',
  'wait_for_lazy_content',
  'read_page',
  'collect_texts',
  'request_user_input',
  'save_state',
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export const FINISH_ACTION = 'finish';

export const SCROLL_DIRECTIONS = ['down', 'up', 'north', 'top', 'bottom', 'page_down', 'page_up'] as const;

export type ScrollDirection = (typeof SCROLL_DIRECTIONS)[number];

// Field parsers. They accept what decision services actually send (numbers as
// strings, "true" as a boolean) and report problems with stable messages.

function requiredString(key: string) {
  return z.unknown().transform((value, ctx): string => {
    if (value === undefined || value === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `field ${key} required` });
      return z.NEVER;
    }
    if (typeof value === 'number') {
      return String(value);
    }
    if (typeof value !== 'string') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `field ${key} must be string` });
      return z.NEVER;
    }
    if (value.trim() === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `field ${key} empty` });
      return z.NEVER;
    }
    return value;
  });
}

function optionalString() {
  return z.unknown().transform((value): string | undefined => {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return undefined;
  });
}

function optionalBool() {
  return z.unknown().transform((value): boolean => {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.toLowerCase() === 'true';
    return false;
  });
}

function toInt(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Math.trunc(Number(value));
  }
  return undefined;
}

function requiredInt(key: string) {
  return z.unknown().transform((value, ctx): number => {
    if (value === undefined || value === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `field ${key} required` });
      return z.NEVER;
    }
    const parsed = toInt(value);
    if (parsed === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `field ${key} must be integer` });
      return z.NEVER;
    }
    return parsed;
  });
}

function optionalInt() {
  return z.unknown().transform((value): number | undefined => toInt(value));
}

function action<N extends ActionName, S extends z.ZodRawShape>(name: N, shape: S) {
  return z.object({ name: z.literal(name), input: z.object(shape) });
}

/**
 * Typed parameters per known action.
 */
export const KnownActionSchema = z.discriminatedUnion('name', [
  action('navigate', { url: requiredString('url') }),
  action('click_by_index', { index: requiredInt('index') }),
  action('click_text', { text: requiredString('text'), exact: optionalBool() }),
  action('click_role', { role: requiredString('role'), name: optionalString(), exact: optionalBool() }),
  action('click_selector', { selector: requiredString('selector') }),
  action('click_text_fuzzy', { text: requiredString('text') }),
  action('click_coordinates', { x: requiredInt('x'), y: requiredInt('y') }),
  action('fill', { selector: requiredString('selector'), text: requiredString('text') }),
  action('scroll_page', { direction: optionalString(), distance: optionalInt() }),
  action('scroll_to_element', { selector: requiredString('selector') }),
  action('wait_for', { selector: requiredString('selector'), timeout_ms: optionalInt() }),
  action('wait_for_lazy_content', { selector: requiredString('selector'), timeout_ms: optionalInt() }),
  action('read_page', { selector: optionalString(), max_chars: optionalInt() }),
  action('collect_texts', {
    selector: requiredString('selector'),
    attribute: optionalString(),
    limit: optionalInt(),
  }),
  action('request_user_input', { prompt: requiredString('prompt') }),
  action('save_state', { path: requiredString('path') }),
]);

export type KnownAction = z.infer<typeof KnownActionSchema>;

/**
 * An action this build does not know yet, kept with its raw parameters.
 */
export interface GenericAction {
  generic: true;
  name: string;
  input: Record<string, unknown>;
}

export type AgentAction = KnownAction | GenericAction;

export type ActionOf<N extends ActionName> = Extract<KnownAction, { name: N }>;

const KNOWN_NAMES: ReadonlySet<string> = new Set(ACTION_NAMES);

export function isActionName(name: string): name is ActionName {
  return KNOWN_NAMES.has(name);
}

export function isKnownAction(action: AgentAction): action is KnownAction {
  return !('generic' in action);
}

/**
 * Turns a decision's action name and raw input into a typed action.
 * Unknown names become a GenericAction; known names with bad input throw.
 */
export function parseAgentAction(name: string, input: Record<string, unknown>): AgentAction {
  if (!isActionName(name)) {
    return { generic: true, name, input };
  }
  const result = KnownActionSchema.safeParse({ name, input });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidActionInputError(name, issue ? issue.message : `invalid input for ${name}`);
  }
  return result.data;
}

/**
 * Reasoning fields echoed into history for prompt continuity.
 */
export interface DecisionReasoning {
  thinking?: string;
  evaluationPreviousGoal?: string;
  memory?: string;
  nextGoal?: string;
}

/**
 * The next-step instruction from the decision service.
 * `finish` implies a non-empty `message`.
 */
export interface Decision {
  actionName: string;
  actionInput: Record<string, unknown>;
  finish: boolean;
  message: string;
  reasoning: DecisionReasoning;
}

/**
 * Append-only log entry for one executed (or refused) step.
 */
export interface HistoryItem {
  step: number;
  action: string;
  input: Record<string, unknown>;
  /** Observation or `error: ...` text */
  outcome: string;
  success: boolean;
  /** Selector the driver call actually used, if any */
  selector?: string;
  /** Loop-guard target key */
  target: string;
  url: string;
  reasoning: DecisionReasoning;
}

/**
 * Failure classes for driver invocations.
 */
export enum ErrorKind {
  SelectorParse = 'selector_parse_error',
  Timeout = 'timeout',
  ElementNotFound = 'element_not_found',
  NotInteractable = 'not_interactable',
  StaleElement = 'stale_element',
  Network = 'network_error',
  Unknown = 'unknown',
}

interface ClassificationRule {
  kind: ErrorKind;
  patterns: string[];
}

/**
 * Ordered rules; the first match wins. Selector parse errors come first since
 * their messages often also mention timeouts or missing elements.
 */
const RULES: readonly ClassificationRule[] = [
  { kind: ErrorKind.SelectorParse, patterns: ['badstring', 'unsupported token', 'parsing selector'] },
  { kind: ErrorKind.Timeout, patterns: ['timeout'] },
  { kind: ErrorKind.ElementNotFound, patterns: ['not found', 'not visible'] },
  { kind: ErrorKind.NotInteractable, patterns: ['not clickable', 'not interactable'] },
  { kind: ErrorKind.StaleElement, patterns: ['stale', 'detached'] },
  { kind: ErrorKind.Network, patterns: ['network', 'connection'] },
];

/**
 * Maps an invocation error message to its kind.
 */
export function classifyError(message: string): ErrorKind {
  const lowered = message.toLowerCase();
  for (const rule of RULES) {
    if (rule.patterns.some(pattern => lowered.includes(pattern))) {
      return rule.kind;
    }
  }
  return ErrorKind.Unknown;
}

import { KeywordMatch } from './KeywordClassifier';
import { confirmations, destructiveActions } from './rules';

const SHORT_YES: ReadonlySet<string> = new Set(['y', 'д', 'ok']);

/**
 * Finds a destructive keyword in any of the action's targets.
 */
export function findDestructiveKeyword(
  ...targets: Array<string | undefined>
): KeywordMatch | undefined {
  return destructiveActions.match(...targets);
}

/**
 * True for answers like "yes", "Да, конечно" or a bare "y".
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  if (SHORT_YES.has(normalized)) {
    return true;
  }
  return confirmations.matchPrefix(normalized) !== undefined;
}

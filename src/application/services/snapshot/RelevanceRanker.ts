import { ElementRecord } from '../../../domain/browser/ElementRecord';
import { KeywordClassifier } from '../../../domain/classifiers';

export interface RankerOptions {
  /** Total cap on returned elements (M) */
  maxElements: number;
  /** Separate cap on non-actionable elements */
  maxContentElements: number;
}

export const DEFAULT_RANKER_OPTIONS: RankerOptions = {
  maxElements: 200,
  maxContentElements: 50,
};

/**
 * Keywords that make an element relevant to one kind of task, weighted per
 * classifier category.
 */
export interface TaskMarkers {
  classifier: KeywordClassifier;
  weights: Readonly<Record<string, number>>;
}

const READABLE_MIN = 10;
const READABLE_MAX = 200;
const LONG_TEXT = 500;

/**
 * Sum of the weights of every marker category found in the element's text
 * or attributes. Each category counts once.
 */
export function markerScore(el: ElementRecord, markers: TaskMarkers): number {
  return markers.classifier
    .matchAll(el.text, el.attr)
    .reduce((sum, hit) => sum + (markers.weights[hit.category] ?? 0), 0);
}

/**
 * Relevance of a non-actionable element for the decision service.
 */
export function scoreElement(el: ElementRecord, markers?: TaskMarkers): number {
  let score = markers ? markerScore(el, markers) : 0;
  if (el.hasMeaningfulRole()) {
    score += 5;
  }
  if (el.text !== '') {
    score += 3;
    if (el.text.length > READABLE_MIN && el.text.length < READABLE_MAX) {
      score += 2;
    }
  }
  if (el.text.includes('@')) {
    score += 3;
  }
  if (el.attr.includes('data-testid')) {
    score += 3;
  }
  if (el.attr.includes('aria-label')) {
    score += 2;
  }
  if (el.text === '' && el.role === '') {
    score -= 5;
  }
  if (el.text.length > LONG_TEXT) {
    score -= 3;
  }
  return score;
}

/**
 * Keeps every actionable element, then the best-scoring content elements,
 * and renumbers the result 1..K in output order.
 *
 * Actionable elements come first in their original order. Content elements
 * follow by descending score; equal scores keep their original order.
 */
export function rankElements(
  elements: readonly ElementRecord[],
  options: Partial<RankerOptions> = {}
): ElementRecord[] {
  const { maxElements, maxContentElements } = { ...DEFAULT_RANKER_OPTIONS, ...options };

  const actionable: ElementRecord[] = [];
  const scored: Array<{ el: ElementRecord; score: number; order: number }> = [];

  elements.forEach((el, order) => {
    if (el.isActionable()) {
      actionable.push(el);
      return;
    }
    const score = scoreElement(el);
    if (score > 0) {
      scored.push({ el, score, order });
    }
  });

  scored.sort((a, b) => b.score - a.score || a.order - b.order);

  const budget = Math.max(0, Math.min(maxContentElements, maxElements - actionable.length));
  const content = scored.slice(0, budget).map(s => s.el);

  return [...actionable, ...content].map((el, i) => el.withIndex(i + 1));
}

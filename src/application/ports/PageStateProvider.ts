import { PageState } from '../../domain/browser/PageState';

/**
 * Captures a fresh, ranked snapshot of the live page.
 * Implementations return partial results rather than throwing, except on cancellation.
 */
export type PageStateProvider = (signal?: AbortSignal) => Promise<PageState>;

export { KeywordClassifier } from './KeywordClassifier';
export type { KeywordRule, KeywordMatch } from './KeywordClassifier';
export * from './rules';
export { classifyView, detectCaptcha, loginHints } from './PageClassifiers';
export type { PageView } from './PageClassifiers';
export { findDestructiveKeyword, isAffirmative } from './ActionClassifiers';

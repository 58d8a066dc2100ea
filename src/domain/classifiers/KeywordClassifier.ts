/**
 * A named group of keywords. Rules are evaluated in order; the first rule
 * with a matching keyword decides the category.
 */
export interface KeywordRule<C extends string = string> {
  category: C;
  keywords: readonly string[];
}

/**
 * Result of a successful match.
 */
export interface KeywordMatch<C extends string = string> {
  category: C;
  keyword: string;
  /** The input that contained the keyword */
  source: string;
}

/**
 * Case-insensitive substring classifier over an ordered rule list.
 */
export class KeywordClassifier<C extends string = string> {
  private readonly rules: ReadonlyArray<KeywordRule<C>>;

  constructor(
    public readonly name: string,
    rules: ReadonlyArray<KeywordRule<C>>
  ) {
    this.rules = rules.map(rule => ({
      category: rule.category,
      keywords: rule.keywords.map(k => k.toLowerCase()),
    }));
  }

  /**
   * Returns the first match across the inputs, checking rules before inputs
   * so that rule precedence holds regardless of input order.
   */
  match(...inputs: Array<string | undefined>): KeywordMatch<C> | undefined {
    const haystacks = inputs
      .filter((input): input is string => typeof input === 'string' && input !== '')
      .map(input => ({ source: input, lowered: input.toLowerCase() }));

    for (const rule of this.rules) {
      for (const keyword of rule.keywords) {
        const hit = haystacks.find(h => h.lowered.includes(keyword));
        if (hit) {
          return { category: rule.category, keyword, source: hit.source };
        }
      }
    }
    return undefined;
  }

  matches(...inputs: Array<string | undefined>): boolean {
    return this.match(...inputs) !== undefined;
  }

  /**
   * Like `match`, but the keyword must open the input.
   */
  matchPrefix(input: string): KeywordMatch<C> | undefined {
    const lowered = input.toLowerCase();
    for (const rule of this.rules) {
      const keyword = rule.keywords.find(k => lowered.startsWith(k));
      if (keyword !== undefined) {
        return { category: rule.category, keyword, source: input };
      }
    }
    return undefined;
  }

  /**
   * One match per rule that hits any of the inputs, in rule order.
   */
  matchAll(...inputs: Array<string | undefined>): Array<KeywordMatch<C>> {
    const matches: Array<KeywordMatch<C>> = [];
    for (const rule of this.rules) {
      const hit = new KeywordClassifier(this.name, [rule]).match(...inputs);
      if (hit) {
        matches.push(hit);
      }
    }
    return matches;
  }

  /**
   * Returns a classifier with extra rules placed ahead of the existing ones.
   */
  extend(rules: ReadonlyArray<KeywordRule<C>>): KeywordClassifier<C> {
    return new KeywordClassifier(this.name, [...rules, ...this.rules]);
  }
}

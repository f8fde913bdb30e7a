/**
 * A lazily evaluated, side-effect free predicate over one rule context.
 */
export interface RuleMatcher {
  readonly description: string;
  matches(): boolean;
}

export function createMatcher(description: string, predicate: () => boolean): RuleMatcher {
  return {
    description,
    matches: predicate,
  };
}

export function allOf(...matchers: RuleMatcher[]): RuleMatcher {
  return createMatcher(
    `(${matchers.map((matcher) => matcher.description).join(" AND ")})`,
    () => matchers.every((matcher) => matcher.matches()),
  );
}

export function anyOf(...matchers: RuleMatcher[]): RuleMatcher {
  return createMatcher(
    `(${matchers.map((matcher) => matcher.description).join(" OR ")})`,
    () => matchers.some((matcher) => matcher.matches()),
  );
}

export function not(matcher: RuleMatcher): RuleMatcher {
  return createMatcher(`NOT ${matcher.description}`, () => !matcher.matches());
}

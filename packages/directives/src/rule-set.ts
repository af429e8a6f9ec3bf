/** Tag name pattern that accepts any tag. */
export const ANY_TAG = "*";

/** Which tag, carrying which attributes, identifies a native directive. */
export interface TagMatchingRule {
  /** Exact tag name (compared ignoring case) or `*`. */
  readonly tagName: string;
  /** Every name here must be present on the tag; empty means no requirement. */
  readonly requiredAttributes: readonly string[];
}

export interface RuleSet {
  readonly directiveName: string;
  /** Where the directive came from, e.g. the package that registered it. */
  readonly origin: string;
  readonly rules: readonly TagMatchingRule[];
}

export interface RuleSetInit {
  directiveName: string;
  origin: string;
  rules: Iterable<{ tagName: string; requiredAttributes?: Iterable<string> }>;
}

/**
 * Snapshot a directive's rules into a frozen RuleSet. Intended for the
 * registry that discovers directives; duplicate attribute names collapse.
 */
export function createRuleSet(init: RuleSetInit): RuleSet {
  const rules: TagMatchingRule[] = [];
  for (const rule of init.rules) {
    rules.push(
      Object.freeze({
        tagName: rule.tagName,
        requiredAttributes: Object.freeze([...new Set(rule.requiredAttributes ?? [])]),
      }),
    );
  }
  return Object.freeze({
    directiveName: init.directiveName,
    origin: init.origin,
    rules: Object.freeze(rules),
  });
}

/** Default for tags without a native directive: no rules, never matches. */
export const NO_MATCH_RULE_SET: RuleSet = createRuleSet({ directiveName: "", origin: "", rules: [] });

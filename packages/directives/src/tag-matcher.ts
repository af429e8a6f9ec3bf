import { debug } from "@tagwright/kernel";
import { ANY_TAG, NO_MATCH_RULE_SET, type RuleSet, type TagMatchingRule } from "./rule-set.js";

/**
 * Prefix of attributes that bind directive parameters. Templates write these
 * without the prefix: `for` satisfies `asp-for`.
 */
export const DIRECTIVE_BINDING_PREFIX = "asp-";

/**
 * Decides whether a tag, as written in a template, should be handed to the
 * native directive described by a RuleSet.
 *
 * Immutable; one instance can serve any number of concurrent renders.
 */
export class TagMatcher {
  static readonly none = new TagMatcher(NO_MATCH_RULE_SET);

  constructor(private readonly ruleSet: RuleSet) {}

  get directiveName(): string {
    return this.ruleSet.directiveName;
  }

  get origin(): string {
    return this.ruleSet.origin;
  }

  /**
   * @param tagName - tag name as written
   * @param attributeNames - attribute names as written (underscores allowed for hyphens)
   */
  matches(tagName: string, attributeNames: readonly string[]): boolean {
    const matched = this.ruleSet.rules.some((rule) => ruleMatches(rule, tagName, attributeNames));
    if (matched) {
      debug.match("rule.matched", { tagName, directive: this.ruleSet.directiveName });
    }
    return matched;
  }
}

function ruleMatches(rule: TagMatchingRule, tagName: string, attributeNames: readonly string[]): boolean {
  if (rule.tagName !== ANY_TAG && !equalsIgnoreCase(rule.tagName, tagName)) return false;
  if (rule.requiredAttributes.length === 0) return true;
  return rule.requiredAttributes.every((required) =>
    attributeNames.some((candidate) => attributeSatisfies(required, candidate)),
  );
}

/** Whether the attribute `candidate`, as written in a template, provides `required`. */
export function attributeSatisfies(required: string, candidate: string): boolean {
  if (candidate === required) return true;

  if (required.startsWith(DIRECTIVE_BINDING_PREFIX)) {
    // asp_src is not accepted for asp-src; only the bare `src` form.
    if (candidate.length !== required.length - DIRECTIVE_BINDING_PREFIX.length) return false;
    return equalsIgnoreCase(hyphenate(candidate), required.slice(DIRECTIVE_BINDING_PREFIX.length));
  }

  return equalsIgnoreCase(hyphenate(candidate), required);
}

function hyphenate(name: string): string {
  return name.includes("_") ? name.replaceAll("_", "-") : name;
}

// Ordinal: code unit by code unit. A unit is folded only when its upper-case
// form is a single unit, so `ß` never turns into `SS`.
function equalsIgnoreCase(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  if (a === b) return true;
  for (let i = 0; i < a.length; i++) {
    const x = a.charCodeAt(i);
    const y = b.charCodeAt(i);
    if (x !== y && foldCase(x) !== foldCase(y)) return false;
  }
  return true;
}

function foldCase(code: number): number {
  if (code < 0x80) {
    return code >= 0x61 && code <= 0x7a ? code - 0x20 : code;
  }
  const upper = String.fromCharCode(code).toUpperCase();
  return upper.length === 1 ? upper.charCodeAt(0) : code;
}

/**
 * @tagwright/directives - route dynamic tags to native directives
 */

export {
  ANY_TAG,
  NO_MATCH_RULE_SET,
  createRuleSet,
  type RuleSet,
  type RuleSetInit,
  type TagMatchingRule,
} from "./rule-set.js";

export { TagMatcher, DIRECTIVE_BINDING_PREFIX, attributeSatisfies } from "./tag-matcher.js";

import { ConfigurationError } from "./errors.js";
import type { RuleSet } from "./types.js";

/** Non-overlapping occurrences of `search` in `text`, scanning left to right. */
export function countOccurrences(text: string, search: string): number {
  if (!search) return 0;
  let count = 0;
  let index = text.indexOf(search);
  while (index !== -1) {
    count += 1;
    index = text.indexOf(search, index + search.length);
  }
  return count;
}

export function containsAnySearch(text: string, rules: RuleSet): boolean {
  return rules.some((rule) => text.includes(rule.search));
}

export type RuleApplication = {
  content: string;
  /** Occurrences of each rule's search string in the original text, summed. */
  matchCount: number;
};

/**
 * Applies every rule in order over the running result. Replacement text is
 * inserted literally: `$&` and friends have no special meaning.
 */
export function applyRules(original: string, rules: RuleSet): RuleApplication {
  let content = original;
  let matchCount = 0;

  for (const rule of rules) {
    matchCount += countOccurrences(original, rule.search);
    if (content.includes(rule.search)) {
      content = content.split(rule.search).join(rule.replace);
    }
  }

  return { content, matchCount };
}

export function validateRules(rules: RuleSet): void {
  const issues: string[] = [];
  if (rules.length === 0) issues.push("at least one replacement rule is required");
  rules.forEach((rule, index) => {
    if (!rule.search) issues.push(`rule ${index + 1}: search string must not be empty`);
  });
  if (issues.length > 0) throw new ConfigurationError("Invalid replacement rules.", issues);
}

/**
 * Rules whose replacement text reintroduces a search string of the set.
 * Running such a set twice keeps changing the files.
 */
export function findNonIdempotentRules(rules: RuleSet): number[] {
  const offenders: number[] = [];
  rules.forEach((rule, index) => {
    if (rule.search === rule.replace) return;
    if (rules.some((other) => other.search && rule.replace.includes(other.search))) {
      offenders.push(index);
    }
  });
  return offenders;
}

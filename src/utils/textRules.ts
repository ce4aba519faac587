/**
 * Ordered text rewriting.
 *
 * A rule list is applied front to back; each rule sees the output of the
 * previous one, so the order of a list is part of its behavior.
 */

export interface TextRule {
  readonly name: string;
  apply(text: string): string;
}

export function regexRule(name: string, pattern: RegExp, replacement: string): TextRule {
  return {
    name,
    apply: (text) => text.replace(pattern, replacement)
  };
}

/**
 * Replaces every literal occurrence of `search`.
 */
export function literalRule(name: string, search: string, replacement: string): TextRule {
  return {
    name,
    apply: (text) => text.replaceAll(search, replacement)
  };
}

export function applyRules(text: string, rules: readonly TextRule[]): string {
  return rules.reduce((current, rule) => rule.apply(current), text);
}

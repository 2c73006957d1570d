/**
 * Shared helpers for the pattern gate rules.
 */

export interface LabeledPattern {
  pattern: RegExp;
  label: string;
}

/**
 * Normalize text for pattern matching: lowercase, straight apostrophes,
 * single spaces.
 */
export function normalizeQuery(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’ʼ]/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Labels of every pattern that matches, prefixed with the group name
 */
export function matchLabels(text: string, patterns: LabeledPattern[], group: string): string[] {
  const matched: string[] = [];
  for (const { pattern, label } of patterns) {
    if (pattern.test(text)) {
      matched.push(`${group}:${label}`);
    }
  }
  return matched;
}

export function matchesAny(text: string, patterns: LabeledPattern[]): boolean {
  return patterns.some(({ pattern }) => pattern.test(text));
}

/**
 * Checkout action verbs.
 *
 * Equipment nouns alone say nothing about intent; a query only counts as a
 * checkout request when one of these verbs is present.
 */

import type { LabeledPattern } from './patterns.js';
import { matchesAny } from './patterns.js';

export const CHECKOUT_ACTION_PATTERNS: LabeledPattern[] = [
  { pattern: /\b(borrow|borrowing|rent|renting|loan|reserve|reserving)\b/, label: 'borrow' },
  { pattern: /\b(check\s*out|checking\s+out|checkout)\b/, label: 'check_out' },
  { pattern: /\bpick\s+up\b/, label: 'pick_up' },
  { pattern: /\b(get|obtain)\s+(?:a|an|one)\b/, label: 'get_one' },
  { pattern: /\bavailab(?:le|ility)\b/, label: 'availability' },
];

export function hasCheckoutAction(normalized: string): boolean {
  return matchesAny(normalized, CHECKOUT_ACTION_PATTERNS);
}

/**
 * Entry-ambiguous phrasing - gate check 2
 *
 * "Who can I talk to about X" or "I need help with Y" says nothing about
 * which capability is wanted. Such queries are never routed directly: they
 * go to arbitration with no candidate filtering.
 */

import type { GateDecision } from '../router.types.js';
import type { LabeledPattern } from './patterns.js';
import { matchLabels } from './patterns.js';
import { hasCheckoutAction } from './checkout-verbs.js';

const ENTRY_AMBIGUOUS_PATTERNS: LabeledPattern[] = [
  { pattern: /\bwho\s+(?:can|could|should|do)\s+i\s+(?:talk|speak)\s+(?:to|with)\b/, label: 'who_to_talk_to' },
  { pattern: /\bwho\s+(?:can|could|should|do)\s+i\s+contact\b/, label: 'who_to_contact' },
  { pattern: /\bi\s+need\s+help\b/, label: 'need_help' },
  { pattern: /\b(?:problem|issue)s?\s+with\b/, label: 'problem_with' },
  { pattern: /\b(not\s+working|doesn'?t\s+work|won'?t\s+work)\b/, label: 'not_working' },
  { pattern: /\bcan\s+(?:someone|somebody|anyone)\s+help\b/, label: 'someone_help' },
  { pattern: /\bi\s+need\s+assistance\b/, label: 'need_assistance' },
];

export function findEntryAmbiguity(normalized: string): string[] {
  return matchLabels(normalized, ENTRY_AMBIGUOUS_PATTERNS, 'ambiguous');
}

export function checkEntryAmbiguity(normalized: string): GateDecision | null {
  const matchedPatterns = findEntryAmbiguity(normalized);
  if (matchedPatterns.length === 0 || hasCheckoutAction(normalized)) {
    return null;
  }

  return {
    matched: true,
    confidence: 'low',
    forceArbitration: true,
    blockedAgents: new Set<string>(),
    rule: 'entry_ambiguous',
    reason: 'Entry-ambiguous phrase without a clear action',
    matchedPatterns,
  };
}

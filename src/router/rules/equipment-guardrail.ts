/**
 * Equipment checkout guardrail - gate check 3
 *
 * "My laptop is broken" must never be fast-routed to "borrow a laptop".
 * Equipment + problem language + no checkout verb blocks the checkout agent
 * and forces arbitration.
 */

import type { GateDecision } from '../router.types.js';
import type { LabeledPattern } from './patterns.js';
import { matchLabels } from './patterns.js';
import { hasCheckoutAction } from './checkout-verbs.js';

export const EQUIPMENT_CHECKOUT_AGENT = 'equipment_checkout';

const EQUIPMENT_PATTERN =
  /\b(computers?|laptops?|chromebooks?|pcs?|macbooks?|chargers?|adapters?|cameras?|equipment|devices?|ipads?|tablets?|calculators?|headphones?|tripods?)\b/;

const PROBLEM_PATTERNS: LabeledPattern[] = [
  { pattern: /\b(broken|broke|cracked|damaged)\b/, label: 'broken' },
  { pattern: /\b(not|isn'?t|aren'?t|stopped)\s+working\b/, label: 'not_working' },
  { pattern: /\b(doesn'?t|won'?t|can'?t)\s+(work|turn\s+on|charge|connect|boot)\b/, label: 'fails' },
  { pattern: /\b(problems?|issues?|fix)\b/, label: 'problem' },
  { pattern: /\bhelp\b/, label: 'help' },
];

export function mentionsEquipment(normalized: string): boolean {
  return EQUIPMENT_PATTERN.test(normalized);
}

export function checkEquipmentGuardrail(normalized: string): GateDecision | null {
  if (!mentionsEquipment(normalized)) {
    return null;
  }

  const problems = matchLabels(normalized, PROBLEM_PATTERNS, 'equipment_problem');
  if (problems.length === 0 || hasCheckoutAction(normalized)) {
    return null;
  }

  return {
    matched: true,
    confidence: 'low',
    forceArbitration: true,
    blockedAgents: new Set([EQUIPMENT_CHECKOUT_AGENT]),
    rule: 'equipment_guardrail',
    reason: 'Equipment mentioned with problem language but no checkout action',
    matchedPatterns: problems,
  };
}

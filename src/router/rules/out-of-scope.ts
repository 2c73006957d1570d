/**
 * Out-of-scope rule - gate check 1
 *
 * Questions the library cannot answer at all. These are answered by the
 * out_of_scope agent without any search or model call.
 */

import type { GateDecision } from '../router.types.js';
import type { LabeledPattern } from './patterns.js';
import { matchLabels } from './patterns.js';

export const OUT_OF_SCOPE_AGENT = 'out_of_scope';

export type OutOfScopeTopic = 'homework' | 'device_repair' | 'university_admin';

const HOMEWORK_PATTERNS: LabeledPattern[] = [
  { pattern: /\b(what'?s|what\s+is)\s+the\s+answer\s+to\b.*\b(question|problem|homework)\b/, label: 'answer_to' },
  { pattern: /\b(answer|solve|solution)\s+(?:(?:to|for)\s+)?(?:question|problem)\s*#?\d+\b/, label: 'numbered_problem' },
  { pattern: /\bhelp\s+(?:me\s+)?(?:with\s+|on\s+)?(?:my\s+)?homework\b/, label: 'homework_help' },
  { pattern: /\b(?:do|write)\s+my\s+(?:homework|essay|assignment)\b/, label: 'do_my_work' },
];

const DEVICE_REPAIR_PATTERNS: LabeledPattern[] = [
  { pattern: /\b(fix|repair|troubleshoot)\s+(?:my|a|the)\s+(computer|laptop|phone|device|tablet)\b/, label: 'repair_request' },
  { pattern: /\b(computer|laptop|phone|device)\b.*\b(crashed|frozen|virus|malware|blue\s+screen)\b/, label: 'device_failure' },
  { pattern: /\b(wi-?fi|internet|canvas|email|login|password)\b.*\b(issue|problem|broken|not\s+working|down)\b/, label: 'campus_it' },
];

const UNIVERSITY_ADMIN_PATTERNS: LabeledPattern[] = [
  { pattern: /\b(admissions?|tuition|financial\s+aid|housing|dorms?|dining\s+halls?|meal\s+plans?|parking)\b/, label: 'student_services' },
  { pattern: /\b(register|enroll|drop)\s+(?:for\s+|in\s+)?(?:a\s+)?(class|course)(?:es|s)?\b/, label: 'registration' },
  { pattern: /\bcampus\s+(life|events?|activities)\b/, label: 'campus_life' },
];

const TOPICS: Array<{ topic: OutOfScopeTopic; patterns: LabeledPattern[] }> = [
  { topic: 'homework', patterns: HOMEWORK_PATTERNS },
  { topic: 'device_repair', patterns: DEVICE_REPAIR_PATTERNS },
  { topic: 'university_admin', patterns: UNIVERSITY_ADMIN_PATTERNS },
];

/**
 * First out-of-scope topic the (normalized) query falls under, if any
 */
export function findOutOfScopeTopic(normalized: string): { topic: OutOfScopeTopic; matchedPatterns: string[] } | null {
  for (const { topic, patterns } of TOPICS) {
    const matchedPatterns = matchLabels(normalized, patterns, topic);
    if (matchedPatterns.length > 0) {
      return { topic, matchedPatterns };
    }
  }
  return null;
}

export function checkOutOfScope(normalized: string): GateDecision | null {
  const found = findOutOfScopeTopic(normalized);
  if (!found) {
    return null;
  }

  return {
    matched: true,
    agentId: OUT_OF_SCOPE_AGENT,
    confidence: 'high',
    forceArbitration: false,
    blockedAgents: new Set<string>(),
    rule: 'out_of_scope',
    reason: `Out of scope: ${found.topic}`,
    matchedPatterns: found.matchedPatterns,
  };
}

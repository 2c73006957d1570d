/**
 * Fast-path rules - gate check 4
 *
 * High-precision patterns that route without touching the prototype store.
 * Explicit requests (ticket, human) are checked before topical ones so that
 * "open a ticket about library hours" reaches the ticket agent.
 */

import type { GateDecision } from '../router.types.js';
import type { LabeledPattern } from './patterns.js';
import { matchLabels } from './patterns.js';

export interface FastPathRule {
  agentId: string;
  reason: string;
  patterns: LabeledPattern[];
}

const LOCATIONS =
  '(?:library|libraries|king|art|rentschler|wertz|makerspace|maker\\s*space|special\\s+collections?|havighurst|hamilton|middletown|gardner)';
const TIME_WORDS = '(?:hours?|open|opens|close|closes|closing|opening)';

export const FAST_PATH_RULES: FastPathRule[] = [
  {
    agentId: 'ticket_request',
    reason: 'Explicit ticket submission request',
    patterns: [
      { pattern: /\b(put|submit|create|open|file|leave|send)\s+(?:in\s+)?(?:a\s+)?(?:support\s+|help\s+)?ticket\b/, label: 'submit_ticket' },
      { pattern: /\bticket\s+(?:in|for)\s+(?:help|support)\b/, label: 'ticket_for_help' },
    ],
  },
  {
    agentId: 'libchat_handoff',
    reason: 'Explicit human help request',
    patterns: [
      { pattern: /\btalk\s+to\s+(?:a\s+)?(librarian|human|person|staff)\b/, label: 'talk_to_human' },
      { pattern: /\bspeak\s+(?:with|to)\s+(?:a\s+)?(librarian|human|person)\b/, label: 'speak_to_human' },
      { pattern: /\bconnect\s+me\s+(?:to|with)\s+(?:a\s+)?(librarian|human)\b/, label: 'connect_me' },
      { pattern: /\b(human\s+help|live\s+chat)\b/, label: 'human_help' },
    ],
  },
  {
    agentId: 'subject_librarian',
    reason: 'Subject librarian query',
    patterns: [
      { pattern: /\b(subject|liaison)\s+librarians?\b/, label: 'subject_librarian' },
      { pattern: /\blibrarian\s+for\s+\w+/, label: 'librarian_for' },
      { pattern: /\bwho\s+is\s+the\s+\w+\s+librarian\b/, label: 'who_is_librarian' },
    ],
  },
  {
    agentId: 'libcal_hours',
    reason: 'Hours query',
    patterns: [
      { pattern: new RegExp(`\\b${LOCATIONS}\\s+${TIME_WORDS}\\b`), label: 'location_hours' },
      { pattern: new RegExp(`\\b${TIME_WORDS}\\b.*\\b${LOCATIONS}\\b`), label: 'hours_location' },
      { pattern: /\bwhat\s+time\s+(?:does|do|is)\s+.+\s+(open|close)\b/, label: 'what_time' },
      { pattern: /\blibrary\s+schedule\b/, label: 'schedule' },
      { pattern: /\bmaker\s*space\b.*\b(hours?|open|close|when|schedule)\b/, label: 'makerspace_schedule' },
      { pattern: /\b(hours?|open|close|when|schedule)\b.*\bmaker\s*space\b/, label: 'schedule_makerspace' },
    ],
  },
];

export function checkFastPath(normalized: string): GateDecision | null {
  for (const rule of FAST_PATH_RULES) {
    const matchedPatterns = matchLabels(normalized, rule.patterns, rule.agentId);
    if (matchedPatterns.length > 0) {
      return {
        matched: true,
        agentId: rule.agentId,
        confidence: 'high',
        forceArbitration: false,
        blockedAgents: new Set<string>(),
        rule: 'fast_path',
        reason: rule.reason,
        matchedPatterns,
      };
    }
  }
  return null;
}

/**
 * Pattern Gate
 *
 * Cheap, deterministic triage before any network call. Pure function of
 * the query text: no I/O, no state, cannot fail.
 *
 * Checks run in fixed order and the first match wins:
 * 1. out of scope        -> route to out_of_scope
 * 2. entry-ambiguous     -> force arbitration
 * 3. equipment guardrail -> block equipment_checkout, force arbitration
 * 4. fast path           -> route directly
 */

import type { GateDecision } from '../router.types.js';
import { normalizeQuery } from './patterns.js';
import { checkOutOfScope } from './out-of-scope.js';
import { checkEntryAmbiguity } from './entry-ambiguity.js';
import { checkEquipmentGuardrail } from './equipment-guardrail.js';
import { checkFastPath } from './fast-path.js';

const GATE_CHECKS: Array<(normalized: string) => GateDecision | null> = [
  checkOutOfScope,
  checkEntryAmbiguity,
  checkEquipmentGuardrail,
  checkFastPath,
];

export function noGateMatch(): GateDecision {
  return {
    matched: false,
    confidence: 'low',
    forceArbitration: false,
    blockedAgents: new Set<string>(),
    matchedPatterns: [],
  };
}

export function runPatternGate(text: string): GateDecision {
  const normalized = normalizeQuery(text);

  for (const check of GATE_CHECKS) {
    const decision = check(normalized);
    if (decision) {
      return decision;
    }
  }

  return noGateMatch();
}

/**
 * Confidence Arbiter
 *
 * Turns scored candidates into one of three decisions using the margin
 * between the two best agents:
 *
 * | agents | condition                                   | decision     | label  |
 * |--------|---------------------------------------------|--------------|--------|
 * | 0      | -                                           | arbitrate    | low    |
 * | 1      | score >= directScore                        | direct-route | high   |
 * | 1      | score >= lowConfScore                       | direct-route | medium |
 * | 1      | otherwise                                   | arbitrate    | low    |
 * | 2+     | margin < clarifyMargin                      | clarify      | low    |
 * | 2+     | top1 >= directScore and margin >= directMargin   | direct-route | high   |
 * | 2+     | top1 >= lowConfScore and margin >= lowConfMargin | direct-route | medium |
 * | 2+     | otherwise                                   | arbitrate    | low    |
 *
 * Clarify is checked first: a tiny margin means the two agents are
 * indistinguishable no matter how high either score is.
 *
 * Pure and deterministic.
 */

import type {
  AgentScore,
  ArbiterDecision,
  ArbiterThresholds,
  Candidate,
  ConfidenceLabel,
} from '../router.types.js';

/**
 * Group candidates by agent and average their scores.
 * Averaged, not summed: many weak hits must not outrank one strong hit.
 * Sorted by score descending, then agent id.
 */
export function aggregateScores(candidates: Candidate[]): AgentScore[] {
  const groups = new Map<string, { total: number; hits: number; best: Candidate }>();

  for (const candidate of candidates) {
    const group = groups.get(candidate.agentId);
    if (!group) {
      groups.set(candidate.agentId, { total: candidate.score, hits: 1, best: candidate });
      continue;
    }
    group.total += candidate.score;
    group.hits += 1;
    if (candidate.score > group.best.score) {
      group.best = candidate;
    }
  }

  return Array.from(groups.entries())
    .map(([agentId, { total, hits, best }]) => ({
      agentId,
      score: total / hits,
      hits,
      exampleText: best.exampleText,
    }))
    .sort((a, b) => b.score - a.score || a.agentId.localeCompare(b.agentId));
}

function formatScore(value: number): string {
  return value.toFixed(3);
}

/**
 * Decide from already aggregated scores
 */
export function decideFromScores(scores: AgentScore[], thresholds: ArbiterThresholds): ArbiterDecision {
  const [top, second] = scores;

  if (!top) {
    return {
      decision: 'arbitrate',
      topScore: 0,
      confidenceLabel: 'low',
      reason: 'No candidates found',
      scores,
    };
  }

  if (!second) {
    let decision: ArbiterDecision['decision'] = 'arbitrate';
    let confidenceLabel: ConfidenceLabel = 'low';
    let band = 'low';

    if (top.score >= thresholds.directScore) {
      decision = 'direct-route';
      confidenceLabel = 'high';
      band = 'high';
    } else if (top.score >= thresholds.lowConfScore) {
      decision = 'direct-route';
      confidenceLabel = 'medium';
      band = 'medium';
    }

    return {
      decision,
      topAgent: top.agentId,
      topScore: top.score,
      confidenceLabel,
      reason: `Single candidate with ${band} score (${formatScore(top.score)})`,
      scores,
    };
  }

  const margin = top.score - second.score;
  const base = {
    topAgent: top.agentId,
    topScore: top.score,
    margin,
    secondAgent: second.agentId,
    secondScore: second.score,
    scores,
  };

  if (margin < thresholds.clarifyMargin) {
    return {
      ...base,
      decision: 'clarify',
      confidenceLabel: 'low',
      reason: `Scores too close (${formatScore(top.score)} vs ${formatScore(second.score)}, margin ${formatScore(margin)})`,
    };
  }

  if (top.score >= thresholds.directScore && margin >= thresholds.directMargin) {
    return {
      ...base,
      decision: 'direct-route',
      confidenceLabel: 'high',
      reason: `High score (${formatScore(top.score)}) with good margin (${formatScore(margin)})`,
    };
  }

  if (top.score >= thresholds.lowConfScore && margin >= thresholds.lowConfMargin) {
    return {
      ...base,
      decision: 'direct-route',
      confidenceLabel: 'medium',
      reason: `Medium score (${formatScore(top.score)}) with acceptable margin (${formatScore(margin)})`,
    };
  }

  return {
    ...base,
    decision: 'arbitrate',
    confidenceLabel: 'low',
    reason: `Low score (${formatScore(top.score)}) or small margin (${formatScore(margin)})`,
  };
}

export function decideConfidence(candidates: Candidate[], thresholds: ArbiterThresholds): ArbiterDecision {
  return decideFromScores(aggregateScores(candidates), thresholds);
}

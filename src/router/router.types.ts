/**
 * Query Router Types
 *
 * The router decides which downstream agent answers a user question, or
 * asks the user to clarify. It NEVER answers the question itself.
 *
 * Pipeline: check-hint -> pattern-gate -> prototype-search
 *           -> confidence-arbiter -> arbitration -> finalize
 */

export type ConfidenceLabel = 'high' | 'medium' | 'low';

/** How a route was decided (recorded on every result) */
export type RouteMode = 'pattern' | 'similarity' | 'llm-arbitration' | 'fallback';

export type ArbiterVerdict = 'direct-route' | 'arbitrate' | 'clarify';

export type PipelineState =
  | 'check-hint'
  | 'pattern-gate'
  | 'prototype-search'
  | 'confidence-arbiter'
  | 'arbitration'
  | 'finalize';

export type GateRuleKind = 'out_of_scope' | 'entry_ambiguous' | 'equipment_guardrail' | 'fast_path';

/** Value of the clarification option meaning "none of these" */
export const OTHER_OPTION_VALUE = 'other';

export interface RouteQuery {
  readonly text: string;
  /** Agent id picked by the user from a previous clarification */
  readonly resumeHint?: string;
}

/**
 * One similarity-search hit
 */
export interface Candidate {
  agentId: string;

  /** Similarity normalized to 0-1 */
  score: number;

  /** Prototype phrase that matched */
  exampleText: string;

  category: string;
  isActionBased: boolean;
  priority: number;
}

/**
 * Mean score of one agent over its top-K hits
 */
export interface AgentScore {
  agentId: string;
  score: number;
  hits: number;

  /** Example text of the agent's best hit */
  exampleText: string;
}

export interface GateDecision {
  matched: boolean;
  agentId?: string;
  confidence: ConfidenceLabel;

  /** Skip direct routing and the search stage, go straight to arbitration */
  forceArbitration: boolean;

  /** Agents excluded from the search stage */
  blockedAgents: ReadonlySet<string>;

  /** Which rule kind fired */
  rule?: GateRuleKind;
  reason?: string;
  matchedPatterns: string[];
}

export interface ArbiterDecision {
  decision: ArbiterVerdict;
  topAgent?: string;
  topScore: number;

  /** top1 - top2, only present with two or more agents */
  margin?: number;
  secondAgent?: string;
  secondScore?: number;
  confidenceLabel: ConfidenceLabel;
  reason: string;

  /** Aggregated scores, sorted descending */
  scores: AgentScore[];
}

/**
 * Threshold set used by the confidence arbiter
 */
export interface ArbiterThresholds {
  /** Minimum top-1 score for a high-confidence direct route */
  directScore: number;

  /** Minimum margin for a high-confidence direct route */
  directMargin: number;

  /** Minimum top-1 score for a medium-confidence direct route */
  lowConfScore: number;

  /** Minimum margin for a medium-confidence direct route */
  lowConfMargin: number;

  /** Below this margin the top agents are indistinguishable */
  clarifyMargin: number;

  /** Model confidence at or above this is reported as medium, else low */
  arbitrationMediumConfidence: number;
}

export interface ClarificationOption {
  label: string;

  /** Agent id, or OTHER_OPTION_VALUE */
  value: string;
}

export interface Clarification {
  question: string;
  options: ClarificationOption[];

  /** Where the question came from */
  source: 'model' | 'fallback';
}

export interface ArbitrationResolution {
  agentId: string;

  /** 0-1 */
  confidence: number;
  reasoning: string;

  /** model: the LLM chose; synthetic: no call was needed; fallback: the call failed */
  source: 'model' | 'synthetic' | 'fallback';
}

export interface CandidateSummary {
  agentId: string;
  score: number;
  exampleText: string;
}

interface RouteResultBase {
  /** Pipeline states visited, in order */
  stages: PipelineState[];
  decisionTimeMs: number;
}

export interface DirectRouteResult extends RouteResultBase {
  mode: RouteMode;
  agentId: string;
  confidenceLabel: ConfidenceLabel;
  reason: string;
  topCandidates: CandidateSummary[];
}

export interface ClarifyRouteResult extends RouteResultBase {
  mode: 'clarify';
  confidenceLabel: 'low';
  question: string;
  options: ClarificationOption[];
}

export type RouteResult = DirectRouteResult | ClarifyRouteResult;

export interface RouteOptions {
  /** Aborts every in-flight external call; route() then rejects */
  signal?: AbortSignal;
}

export function isClarification(result: RouteResult): result is ClarifyRouteResult {
  return result.mode === 'clarify';
}

/**
 * Query Router - Main Entry Point
 *
 * The router decides which agent answers each query, or asks the user to
 * clarify. It NEVER answers the question itself. It only routes.
 *
 * Stages run as a small state machine:
 *
 *   check-hint -> pattern-gate -> prototype-search -> confidence-arbiter -> finalize
 *                      |                                      |
 *                      +----------> arbitration <-------------+
 *
 * Each request carries its own context; nothing mutable is shared between
 * concurrent calls except the injected clients.
 */

import type {
  ArbiterDecision,
  Candidate,
  CandidateSummary,
  Clarification,
  ConfidenceLabel,
  GateDecision,
  PipelineState,
  RouteMode,
  RouteOptions,
  RouteQuery,
  RouteResult,
} from './router.types.js';
import { OTHER_OPTION_VALUE } from './router.types.js';
import type { CompletionProvider, EmbeddingProvider } from '../llm/types.js';
import type { PrototypeStore } from './prototype.store.js';
import { resolveRouterSettings, type RouterSettings, type RouterSettingsInput } from './router.config.js';
import { RouteCancelledError } from './router.errors.js';
import { runPatternGate, noGateMatch } from './rules/pattern-gate.js';
import { decideConfidence } from './rules/confidence-arbiter.js';
import { PrototypeSearch } from './prototype-search.service.js';
import { ArbitrationService } from './arbitration.service.js';
import logger from '../utils/logger.js';

export interface QueryRouterDeps {
  embedder: EmbeddingProvider;
  store: PrototypeStore;
  llm: CompletionProvider;
}

type StageOutcome =
  | { kind: 'route'; mode: RouteMode; agentId: string; confidenceLabel: ConfidenceLabel; reason: string }
  | { kind: 'clarify'; clarification: Clarification };

interface RouteContext {
  query: RouteQuery;
  signal?: AbortSignal;
  stages: PipelineState[];
  gate: GateDecision;
  candidates: Candidate[];
  arbiter?: ArbiterDecision;
  outcome?: StageOutcome;
}

type StageHandler = (ctx: RouteContext) => PipelineState | Promise<PipelineState>;

const MAX_TOP_CANDIDATES = 3;
const USER_CLARIFICATION_REASON = 'user clarification';

export class QueryRouter {
  readonly settings: RouterSettings;
  private readonly search: PrototypeSearch;
  private readonly arbitration: ArbitrationService;
  private readonly handlers: Record<Exclude<PipelineState, 'finalize'>, StageHandler>;

  /**
   * Throws ConfigurationError when the settings are invalid
   */
  constructor(deps: QueryRouterDeps, settings: RouterSettingsInput = {}) {
    this.settings = resolveRouterSettings(settings);

    this.search = new PrototypeSearch(deps.embedder, deps.store, {
      topK: this.settings.topK,
      embeddingTimeoutMs: this.settings.timeouts.embeddingMs,
      vectorSearchTimeoutMs: this.settings.timeouts.vectorSearchMs,
    });

    this.arbitration = new ArbitrationService(deps.llm, {
      llmTimeoutMs: this.settings.timeouts.llmMs,
      defaultAgentId: this.settings.defaultAgentId,
      clarifyCandidateLimit: this.settings.clarifyCandidateLimit,
    });

    this.handlers = {
      'check-hint': ctx => this.checkHint(ctx),
      'pattern-gate': ctx => this.patternGate(ctx),
      'prototype-search': ctx => this.prototypeSearch(ctx),
      'confidence-arbiter': ctx => this.confidenceArbiter(ctx),
      arbitration: ctx => this.arbitrate(ctx),
    };
  }

  /**
   * Route a query to one agent or produce a clarification question.
   *
   * Never throws for provider failures; rejects with RouteCancelledError
   * only when the caller's signal aborts.
   */
  async route(text: string, resumeHint?: string, options: RouteOptions = {}): Promise<RouteResult> {
    const startTime = Date.now();
    const ctx: RouteContext = {
      query: { text, resumeHint },
      signal: options.signal,
      stages: [],
      gate: noGateMatch(),
      candidates: [],
    };

    let state: PipelineState = 'check-hint';
    while (state !== 'finalize') {
      this.throwIfAborted(ctx, state);
      ctx.stages.push(state);
      state = await this.handlers[state](ctx);
    }
    this.throwIfAborted(ctx, state);
    ctx.stages.push('finalize');

    const result = this.finalize(ctx, Date.now() - startTime);

    logger.info('Route decision', {
      query: text.slice(0, 100),
      mode: result.mode,
      agentId: result.mode === 'clarify' ? undefined : result.agentId,
      confidence: result.confidenceLabel,
      stages: result.stages.join(' > '),
      decisionTimeMs: result.decisionTimeMs,
    });

    return result;
  }

  private throwIfAborted(ctx: RouteContext, state: PipelineState): void {
    if (ctx.signal?.aborted) {
      throw new RouteCancelledError(state);
    }
  }

  private checkHint(ctx: RouteContext): PipelineState {
    const hint = ctx.query.resumeHint?.trim();
    if (!hint || hint === OTHER_OPTION_VALUE) {
      return 'pattern-gate';
    }

    ctx.outcome = {
      kind: 'route',
      mode: 'pattern',
      agentId: hint,
      confidenceLabel: 'high',
      reason: USER_CLARIFICATION_REASON,
    };
    return 'finalize';
  }

  private patternGate(ctx: RouteContext): PipelineState {
    const gate = runPatternGate(ctx.query.text);
    ctx.gate = gate;

    logger.debug('Pattern gate', {
      matched: gate.matched,
      rule: gate.rule,
      agentId: gate.agentId,
      forceArbitration: gate.forceArbitration,
      blocked: Array.from(gate.blockedAgents),
      patterns: gate.matchedPatterns,
    });

    if (gate.forceArbitration) {
      return 'arbitration';
    }

    if (gate.matched && gate.agentId) {
      ctx.outcome = {
        kind: 'route',
        mode: 'pattern',
        agentId: gate.agentId,
        confidenceLabel: gate.confidence,
        reason: gate.reason ?? 'Pattern match',
      };
      return 'finalize';
    }

    return 'prototype-search';
  }

  private async prototypeSearch(ctx: RouteContext): Promise<PipelineState> {
    ctx.candidates = await this.search.search(ctx.query.text, {
      topK: this.settings.topK,
      blockedAgents: ctx.gate.blockedAgents,
      signal: ctx.signal,
    });
    return 'confidence-arbiter';
  }

  private confidenceArbiter(ctx: RouteContext): PipelineState {
    const arbiter = decideConfidence(ctx.candidates, this.settings.thresholds);
    ctx.arbiter = arbiter;

    logger.debug('Confidence arbiter', {
      decision: arbiter.decision,
      topAgent: arbiter.topAgent,
      topScore: arbiter.topScore,
      margin: arbiter.margin,
      reason: arbiter.reason,
    });

    if (arbiter.decision === 'direct-route' && arbiter.topAgent) {
      ctx.outcome = {
        kind: 'route',
        mode: 'similarity',
        agentId: arbiter.topAgent,
        confidenceLabel: arbiter.confidenceLabel,
        reason: arbiter.reason,
      };
      return 'finalize';
    }

    return 'arbitration';
  }

  private async arbitrate(ctx: RouteContext): Promise<PipelineState> {
    const scores = ctx.arbiter?.scores ?? [];

    if (ctx.arbiter?.decision === 'clarify') {
      const clarification = await this.arbitration.clarify(ctx.query.text, scores, { signal: ctx.signal });
      ctx.outcome = { kind: 'clarify', clarification };
      return 'finalize';
    }

    const resolution = await this.arbitration.arbitrate(ctx.query.text, scores, { signal: ctx.signal });

    const fromModel = resolution.source === 'model';
    const confidenceLabel: ConfidenceLabel =
      fromModel && resolution.confidence >= this.settings.thresholds.arbitrationMediumConfidence
        ? 'medium'
        : 'low';

    logger.debug('Arbitration', {
      agentId: resolution.agentId,
      confidence: resolution.confidence,
      source: resolution.source,
    });

    ctx.outcome = {
      kind: 'route',
      mode: fromModel ? 'llm-arbitration' : 'fallback',
      agentId: resolution.agentId,
      confidenceLabel,
      reason: resolution.reasoning,
    };
    return 'finalize';
  }

  private finalize(ctx: RouteContext, decisionTimeMs: number): RouteResult {
    const outcome: StageOutcome = ctx.outcome ?? {
      kind: 'route',
      mode: 'fallback',
      agentId: this.settings.defaultAgentId,
      confidenceLabel: 'low',
      reason: 'No routing decision reached',
    };

    if (outcome.kind === 'clarify') {
      return {
        mode: 'clarify',
        confidenceLabel: 'low',
        question: outcome.clarification.question,
        options: outcome.clarification.options,
        stages: ctx.stages,
        decisionTimeMs,
      };
    }

    const topCandidates: CandidateSummary[] = ctx.candidates
      .slice(0, MAX_TOP_CANDIDATES)
      .map(({ agentId, score, exampleText }) => ({ agentId, score, exampleText }));

    return {
      mode: outcome.mode,
      agentId: outcome.agentId,
      confidenceLabel: outcome.confidenceLabel,
      reason: outcome.reason,
      topCandidates,
      stages: ctx.stages,
      decisionTimeMs,
    };
  }
}

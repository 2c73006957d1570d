import { describe, it, expect, vi } from 'vitest';
import type { ChatMessage, CompletionOptions, CompletionResult, EmbeddingOptions } from '../llm/types.js';
import type { NearestNeighborOptions, PrototypeMatch } from './prototype.store.js';
import type { RouterSettingsInput } from './router.config.js';
import { QueryRouter, ConfigurationError, RouteCancelledError, isClarification } from './index.js';

function match(agentId: string, similarity: number): PrototypeMatch {
  return {
    record: { agentId, exampleText: `${agentId} example`, category: 'general', isActionBased: false, priority: 5 },
    similarity,
  };
}

interface FakeOptions {
  matches?: () => Promise<PrototypeMatch[]>;
  reply?: () => Promise<CompletionResult>;
  settings?: RouterSettingsInput;
}

function createRouter(options: FakeOptions = {}) {
  const embed = vi.fn(async (_text: string, _options?: EmbeddingOptions) => [0.1, 0.2, 0.3]);
  const nearestNeighbors = vi.fn((_vector: number[], _limit: number, _options?: NearestNeighborOptions) =>
    options.matches ? options.matches() : Promise.resolve([])
  );
  const collectionExists = vi.fn(async () => true);
  const complete = vi.fn((_messages: ChatMessage[], _options?: CompletionOptions) =>
    options.reply ? options.reply() : Promise.reject(new Error('unexpected model call'))
  );

  const router = new QueryRouter(
    { embedder: { embed }, store: { nearestNeighbors, collectionExists }, llm: { complete } },
    options.settings
  );

  return { router, embed, nearestNeighbors, complete };
}

function completion(content: string): CompletionResult {
  return { content, tokensUsed: 10, model: 'test-model', provider: 'openai' };
}

describe('QueryRouter', () => {
  it('fast-routes an hours question without external calls', async () => {
    const { router, embed, complete } = createRouter();

    const result = await router.route('What time does King Library close?');

    expect(result).toMatchObject({
      mode: 'pattern',
      agentId: 'libcal_hours',
      confidenceLabel: 'high',
      reason: 'Hours query',
      topCandidates: [],
      stages: ['check-hint', 'pattern-gate', 'finalize'],
    });
    expect(embed).not.toHaveBeenCalled();
    expect(complete).not.toHaveBeenCalled();
  });

  it('sends broken equipment straight to arbitration and lands on the default agent', async () => {
    const { router, nearestNeighbors, complete } = createRouter();

    const result = await router.route("my laptop isn't working");

    expect(result).toMatchObject({
      mode: 'fallback',
      agentId: 'google_site',
      confidenceLabel: 'low',
      stages: ['check-hint', 'pattern-gate', 'arbitration', 'finalize'],
    });
    expect(nearestNeighbors).not.toHaveBeenCalled();
    expect(complete).not.toHaveBeenCalled();
  });

  it('asks for clarification when the top agents are too close', async () => {
    const { router, complete } = createRouter({
      matches: async () => [match('libcal_hours', 0.52), match('equipment_checkout', 0.5)],
      reply: async () =>
        completion(
          '{"question": "Do you want to reserve a room or borrow equipment?", "options": [' +
            '{"label": "Reserve a room", "value": "libcal_hours"}, {"label": "Borrow equipment", "value": "equipment_checkout"}]}'
        ),
    });

    const result = await router.route('I need to reserve a room');

    expect(isClarification(result)).toBe(true);
    expect(result).toMatchObject({
      mode: 'clarify',
      confidenceLabel: 'low',
      question: 'Do you want to reserve a room or borrow equipment?',
      options: [
        { label: 'Reserve a room', value: 'libcal_hours' },
        { label: 'Borrow equipment', value: 'equipment_checkout' },
        { label: 'None of these (type more details)', value: 'other' },
      ],
      stages: ['check-hint', 'pattern-gate', 'prototype-search', 'confidence-arbiter', 'arbitration', 'finalize'],
    });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('routes to the agent the user picked without external calls', async () => {
    const { router, embed, nearestNeighbors, complete } = createRouter();

    const result = await router.route('anything at all', 'libguide');

    expect(result).toMatchObject({
      mode: 'pattern',
      agentId: 'libguide',
      confidenceLabel: 'high',
      reason: 'user clarification',
      stages: ['check-hint', 'finalize'],
    });
    expect(embed).not.toHaveBeenCalled();
    expect(nearestNeighbors).not.toHaveBeenCalled();
    expect(complete).not.toHaveBeenCalled();
  });

  it('ignores the "other" hint and blank hints', async () => {
    const { router } = createRouter();

    const other = await router.route('What time does King Library close?', 'other');
    const blank = await router.route('What time does King Library close?', '   ');

    expect(other).toMatchObject({ mode: 'pattern', agentId: 'libcal_hours' });
    expect(blank).toMatchObject({ mode: 'pattern', agentId: 'libcal_hours' });
  });

  it('degrades to the default agent when the vector store times out', async () => {
    const { router, complete } = createRouter({
      matches: () => new Promise<PrototypeMatch[]>(() => {}),
      settings: { timeouts: { vectorSearchMs: 20 } },
    });

    const result = await router.route('Where can I find journal articles on climate policy?');

    expect(result).toMatchObject({
      mode: 'fallback',
      agentId: 'google_site',
      confidenceLabel: 'low',
      topCandidates: [],
    });
    expect(complete).not.toHaveBeenCalled();
  });

  it('uses the configured default agent', async () => {
    const { router } = createRouter({ settings: { defaultAgentId: 'libchat_handoff' } });

    const result = await router.route('Where can I find journal articles on climate policy?');

    expect(result).toMatchObject({ agentId: 'libchat_handoff', confidenceLabel: 'low' });
  });

  it('routes directly on a clear similarity winner', async () => {
    const { router, complete } = createRouter({
      matches: async () => [
        match('libguide', 0.82),
        match('libguide', 0.8),
        match('libguide', 0.78),
        match('libguide', 0.76),
        match('google_site', 0.5),
      ],
    });

    const result = await router.route('Where can I find journal articles on climate policy?');

    expect(result).toMatchObject({
      mode: 'similarity',
      agentId: 'libguide',
      confidenceLabel: 'high',
      stages: ['check-hint', 'pattern-gate', 'prototype-search', 'confidence-arbiter', 'finalize'],
    });
    if (!isClarification(result)) {
      expect(result.topCandidates).toEqual([
        { agentId: 'libguide', score: 0.82, exampleText: 'libguide example' },
        { agentId: 'libguide', score: 0.8, exampleText: 'libguide example' },
        { agentId: 'libguide', score: 0.78, exampleText: 'libguide example' },
      ]);
    }
    expect(complete).not.toHaveBeenCalled();
  });

  describe('model arbitration', () => {
    const closeCall = async () => [match('libguide', 0.6), match('google_site', 0.55)];

    it('labels a confident model choice as medium', async () => {
      const { router } = createRouter({
        matches: closeCall,
        reply: async () => completion('{"chosen_agent": "google_site", "confidence": 0.9, "reasoning": "Policy question."}'),
      });

      const result = await router.route('Where can I find journal articles on climate policy?');

      expect(result).toMatchObject({
        mode: 'llm-arbitration',
        agentId: 'google_site',
        confidenceLabel: 'medium',
        reason: 'Policy question.',
      });
    });

    it('labels an unsure model choice as low', async () => {
      const { router } = createRouter({
        matches: closeCall,
        reply: async () => completion('{"chosen_agent": "libguide", "confidence": 0.4, "reasoning": "Maybe a guide."}'),
      });

      const result = await router.route('Where can I find journal articles on climate policy?');

      expect(result).toMatchObject({ mode: 'llm-arbitration', agentId: 'libguide', confidenceLabel: 'low' });
    });

    it('falls back to the top agent when the model fails', async () => {
      const { router } = createRouter({
        matches: closeCall,
        reply: () => Promise.reject(new Error('connection reset')),
      });

      const result = await router.route('Where can I find journal articles on climate policy?');

      expect(result).toMatchObject({
        mode: 'fallback',
        agentId: 'libguide',
        confidenceLabel: 'low',
        reason: 'arbitration error',
      });
    });
  });

  describe('cancellation', () => {
    it('rejects when the signal is already aborted', async () => {
      const { router, embed } = createRouter();
      const controller = new AbortController();
      controller.abort();

      await expect(
        router.route('Where can I find journal articles on climate policy?', undefined, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RouteCancelledError);
      expect(embed).not.toHaveBeenCalled();
    });

    it('rejects instead of returning a partial result when aborted mid-search', async () => {
      const { router, complete } = createRouter({ matches: () => new Promise<PrototypeMatch[]>(() => {}) });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      await expect(
        router.route('Where can I find journal articles on climate policy?', undefined, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RouteCancelledError);
      expect(complete).not.toHaveBeenCalled();
    });

    it('rejects when aborted while the model is deciding', async () => {
      const { router, complete } = createRouter({
        matches: async () => [match('libguide', 0.6), match('google_site', 0.55)],
        reply: () => new Promise<CompletionResult>(() => {}),
      });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      await expect(
        router.route('Where can I find journal articles on climate policy?', undefined, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RouteCancelledError);
      expect(complete).toHaveBeenCalledTimes(1);
      expect(complete.mock.calls[0][1]?.signal?.aborted).toBe(true);
    });
  });

  it('refuses invalid thresholds at construction', () => {
    expect(() => createRouter({ settings: { thresholds: { clarifyMargin: 0.1 } } })).toThrow(ConfigurationError);
  });

  it('reports the decision time', async () => {
    const { router } = createRouter();

    const result = await router.route('anything', 'libguide');

    expect(result.decisionTimeMs).toBeGreaterThanOrEqual(0);
  });
});

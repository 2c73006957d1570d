/**
 * Prototype Similarity Search
 *
 * Embeds the query and returns the K nearest curated prototypes, each
 * labeled with an agent. Oversamples (topK * 2) so blocked agents can be
 * dropped without running short.
 *
 * Never throws for external failures: an unreachable store, a missing
 * table or a timeout all yield an empty list, which the arbiter treats as
 * a valid low-confidence outcome.
 */

import type { Candidate } from './router.types.js';
import type { EmbeddingProvider } from '../llm/types.js';
import type { PrototypeStore } from './prototype.store.js';
import { withTimeout } from '../utils/timeout.js';
import { getErrorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface PrototypeSearchSettings {
  topK: number;
  embeddingTimeoutMs: number;
  vectorSearchTimeoutMs: number;
}

export interface PrototypeSearchOptions {
  topK?: number;
  blockedAgents?: ReadonlySet<string>;
  signal?: AbortSignal;
}

const OVERSAMPLE_FACTOR = 2;

function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export class PrototypeSearch {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly store: PrototypeStore,
    private readonly settings: PrototypeSearchSettings
  ) {}

  async search(query: string, options: PrototypeSearchOptions = {}): Promise<Candidate[]> {
    const topK = options.topK ?? this.settings.topK;
    const blocked = options.blockedAgents ?? new Set<string>();

    try {
      const vector = await withTimeout(
        'query embedding',
        this.settings.embeddingTimeoutMs,
        signal => this.embedder.embed(query, { signal }),
        options.signal
      );

      const matches = await withTimeout(
        'prototype search',
        this.settings.vectorSearchTimeoutMs,
        signal => this.store.nearestNeighbors(vector, topK * OVERSAMPLE_FACTOR, { signal }),
        options.signal
      );

      const candidates: Candidate[] = [];
      for (const { record, similarity } of matches) {
        if (blocked.has(record.agentId)) {
          continue;
        }
        candidates.push({
          agentId: record.agentId,
          score: clampScore(similarity),
          exampleText: record.exampleText,
          category: record.category,
          isActionBased: record.isActionBased,
          priority: record.priority,
        });
        if (candidates.length >= topK) {
          break;
        }
      }

      logger.debug('Prototype search results', {
        found: candidates.length,
        blocked: Array.from(blocked),
        top: candidates.slice(0, 3).map(c => `${c.agentId}:${c.score.toFixed(3)}`),
      });

      return candidates;
    } catch (error) {
      logger.warn('Prototype search failed, continuing without candidates', {
        error: getErrorMessage(error),
        query: query.slice(0, 100),
      });
      return [];
    }
  }
}

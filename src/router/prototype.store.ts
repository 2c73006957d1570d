/**
 * Prototype Store - pgvector
 *
 * Read-only access to the curated prototype phrases (8-12 per agent).
 * Population and curation happen elsewhere; the router only queries.
 *
 * Expected table:
 *   agent_id TEXT, example_text TEXT, category TEXT,
 *   is_action_based BOOLEAN, priority INT, embedding VECTOR(n)
 */

import type { Pool } from 'pg';

export interface PrototypeRecord {
  agentId: string;
  exampleText: string;
  category: string;
  isActionBased: boolean;
  priority: number;
}

export interface PrototypeMatch {
  record: PrototypeRecord;

  /** Cosine similarity as reported by the store (may fall outside 0-1) */
  similarity: number;
}

export interface NearestNeighborOptions {
  signal?: AbortSignal;
}

export interface PrototypeStore {
  nearestNeighbors(vector: number[], limit: number, options?: NearestNeighborOptions): Promise<PrototypeMatch[]>;
  collectionExists(): Promise<boolean>;
}

interface PrototypeRow {
  agent_id: string;
  example_text: string | null;
  category: string | null;
  is_action_based: boolean | null;
  priority: number | null;
  similarity: number | string;
}

const DEFAULT_PRIORITY = 5;

export class PgPrototypeStore implements PrototypeStore {
  /**
   * @param table - must already be validated as a plain SQL identifier
   */
  constructor(
    private readonly pool: Pool,
    private readonly table: string
  ) {}

  // pg cannot cancel a running query from the client; statement_timeout on the pool bounds it instead
  async nearestNeighbors(vector: number[], limit: number): Promise<PrototypeMatch[]> {
    const vectorString = `[${vector.join(',')}]`;

    const result = await this.pool.query<PrototypeRow>(
      `SELECT agent_id, example_text, category, is_action_based, priority,
              1 - (embedding <=> $1::vector) AS similarity
       FROM ${this.table}
       ORDER BY embedding <=> $1::vector
       LIMIT $2`,
      [vectorString, limit]
    );

    return result.rows.map(row => ({
      record: {
        agentId: row.agent_id,
        exampleText: row.example_text ?? '',
        category: row.category ?? '',
        isActionBased: row.is_action_based ?? false,
        priority: row.priority ?? DEFAULT_PRIORITY,
      },
      similarity: Number(row.similarity),
    }));
  }

  async collectionExists(): Promise<boolean> {
    const result = await this.pool.query<{ exists: boolean }>(
      'SELECT to_regclass($1) IS NOT NULL AS exists',
      [this.table]
    );
    return result.rows[0]?.exists ?? false;
  }
}

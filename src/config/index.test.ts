import { describe, it, expect } from 'vitest';
import { loadConfig } from './index.js';
import { DEFAULT_THRESHOLDS } from '../router/router.config.js';
import { ConfigurationError } from '../router/router.errors.js';

function configIssues(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('fills defaults around the required API key', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

    expect(config.port).toBe(3010);
    expect(config.openai).toEqual({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      embeddingModel: 'text-embedding-3-large',
    });
    expect(config.prototypeTable).toBe('agent_prototypes');
    expect(config.router.thresholds).toEqual(DEFAULT_THRESHOLDS);
    expect(config.router.topK).toBe(5);
    expect(config.router.defaultAgentId).toBe('google_site');
    expect(config.router.timeouts).toEqual({ embeddingMs: 5000, vectorSearchMs: 3000, llmMs: 8000 });
  });

  it('reads thresholds and limits from the environment', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-secret',
      ROUTER_DIRECT_SCORE_THRESHOLD: '0.7',
      ROUTER_CLARIFY_MARGIN_THRESHOLD: '0.02',
      ROUTER_TOP_K: '8',
      ROUTER_DEFAULT_AGENT: 'libchat_handoff',
      ROUTER_LLM_TIMEOUT_MS: '2500',
      POSTGRES_PORT: '6543',
    });

    expect(config.router.thresholds.directScore).toBe(0.7);
    expect(config.router.thresholds.clarifyMargin).toBe(0.02);
    expect(config.router.topK).toBe(8);
    expect(config.router.defaultAgentId).toBe('libchat_handoff');
    expect(config.router.timeouts.llmMs).toBe(2500);
    expect(config.postgres.port).toBe(6543);
  });

  it('requires an API key', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(configIssues({})).toEqual(['openai.apiKey: OPENAI_API_KEY is required']);
  });

  it('rejects thresholds outside 0-1', () => {
    const issues = configIssues({ OPENAI_API_KEY: 'test-secret', ROUTER_DIRECT_SCORE_THRESHOLD: '1.5' });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^router\.thresholds\.directScore: /);
  });

  it('rejects a clarify margin that is not below the low-confidence margin', () => {
    const issues = configIssues({ OPENAI_API_KEY: 'test-secret', ROUTER_CLARIFY_MARGIN_THRESHOLD: '0.1' });

    expect(issues).toEqual(['router.thresholds.clarifyMargin: clarifyMargin must be below lowConfMargin']);
  });

  it('rejects a table name that is not a plain identifier', () => {
    const issues = configIssues({ OPENAI_API_KEY: 'test-secret', PROTOTYPE_TABLE: 'prototypes; drop table users' });

    expect(issues).toEqual(['prototypeTable: PROTOTYPE_TABLE must be a plain SQL identifier']);
  });

  it('rejects a topK outside 1-50', () => {
    const issues = configIssues({ OPENAI_API_KEY: 'test-secret', ROUTER_TOP_K: '0' });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^router\.topK: /);
  });
});

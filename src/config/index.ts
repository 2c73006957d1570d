import { z } from 'zod';
import dotenv from 'dotenv';
import { getOptionalSecret } from '../utils/secrets.js';
import { routerSettingsSchema, formatIssues } from '../router/router.config.js';
import { ConfigurationError } from '../router/router.errors.js';

dotenv.config();

const SQL_IDENTIFIER = /^[a-z_][a-z0-9_]*(\.[a-z_][a-z0-9_]*)?$/i;

const configSchema = z.object({
  port: z.coerce.number().default(3010),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  cors: z.object({
    origin: z.string().default('http://localhost:3000'),
  }),

  openai: z.object({
    apiKey: z.string({ required_error: 'OPENAI_API_KEY is required' }).min(1, 'OPENAI_API_KEY is required'),
    model: z.string().default('gpt-4o-mini'),
    embeddingModel: z.string().default('text-embedding-3-large'),
  }),

  postgres: z.object({
    host: z.string().default('localhost'),
    port: z.coerce.number().default(5432),
    user: z.string().default('router'),
    password: z.string().default(''),
    database: z.string().default('query_router'),
    maxConnections: z.coerce.number().int().positive().default(10),
  }),

  prototypeTable: z.string().regex(SQL_IDENTIFIER, 'PROTOTYPE_TABLE must be a plain SQL identifier').default('agent_prototypes'),

  router: routerSettingsSchema,
});

export type Config = z.infer<typeof configSchema>;

/**
 * Build the raw (unvalidated) config object from environment variables
 */
function readRawConfig(env: NodeJS.ProcessEnv) {
  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,

    cors: {
      origin: env.CORS_ORIGIN,
    },

    openai: {
      apiKey: getOptionalSecret('openai_api_key', 'OPENAI_API_KEY', env),
      model: env.ROUTER_LLM_MODEL,
      embeddingModel: env.ROUTER_EMBEDDING_MODEL,
    },

    postgres: {
      host: env.POSTGRES_HOST,
      port: env.POSTGRES_PORT,
      user: env.POSTGRES_USER,
      password: getOptionalSecret('postgres_password', 'POSTGRES_PASSWORD', env),
      database: env.POSTGRES_DB,
      maxConnections: env.POSTGRES_MAX_CONNECTIONS,
    },

    prototypeTable: env.PROTOTYPE_TABLE,

    router: {
      thresholds: {
        directScore: env.ROUTER_DIRECT_SCORE_THRESHOLD,
        directMargin: env.ROUTER_DIRECT_MARGIN_THRESHOLD,
        lowConfScore: env.ROUTER_LOWCONF_SCORE_THRESHOLD,
        lowConfMargin: env.ROUTER_LOWCONF_MARGIN_THRESHOLD,
        clarifyMargin: env.ROUTER_CLARIFY_MARGIN_THRESHOLD,
        arbitrationMediumConfidence: env.ROUTER_ARBITRATION_MEDIUM_CONFIDENCE,
      },
      topK: env.ROUTER_TOP_K,
      clarifyCandidateLimit: env.ROUTER_CLARIFY_CANDIDATES,
      defaultAgentId: env.ROUTER_DEFAULT_AGENT,
      timeouts: {
        embeddingMs: env.ROUTER_EMBEDDING_TIMEOUT_MS,
        vectorSearchMs: env.ROUTER_VECTOR_TIMEOUT_MS,
        llmMs: env.ROUTER_LLM_TIMEOUT_MS,
      },
    },
  };
}

/**
 * Load and validate configuration.
 * Throws ConfigurationError listing every problem; callers treat it as fatal.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.safeParse(readRawConfig(env));
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

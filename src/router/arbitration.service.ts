/**
 * Arbitration / Clarification
 *
 * The only stage that talks to the completion model. Two modes:
 * - clarify: the top agents are indistinguishable, ask the user to pick
 * - arbitrate: let the model choose between the top two agents
 *
 * At most one model call per invocation, never retried. Every failure
 * (timeout, transport error, malformed JSON, an agent that was not offered)
 * resolves to a deterministic fallback.
 */

import type {
  AgentScore,
  ArbitrationResolution,
  Clarification,
  ClarificationOption,
} from './router.types.js';
import { OTHER_OPTION_VALUE } from './router.types.js';
import type { CompletionProvider } from '../llm/types.js';
import { agentLabel, OTHER_OPTION_LABEL } from './agent-catalog.js';
import { parseArbitrationResponse, parseClarificationResponse } from './llm-response.parser.js';
import { LlmResponseFormatError } from './router.errors.js';
import { withTimeout } from '../utils/timeout.js';
import { getErrorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface ArbitrationSettings {
  llmTimeoutMs: number;
  defaultAgentId: string;

  /** Agents offered in a clarification question (2-4) */
  clarifyCandidateLimit: number;
}

export interface ArbitrationCallOptions {
  signal?: AbortSignal;
}

export const FALLBACK_QUESTION = 'What are you looking for?';

const SINGLE_AGENT_CONFIDENCE = 0.7;
const DEFAULT_AGENT_CONFIDENCE = 0.5;
const ERROR_FALLBACK_CONFIDENCE = 0.7;

const CLARIFY_SYSTEM_PROMPT = `You help a library chatbot ask a short clarifying question.
The user's request could belong to several services. You are given ONLY the services that are plausible.

Rules:
- Write one short, friendly question.
- Offer one option per listed service, using its id as "value".
- Do NOT invent services, ids or intents that are not listed.
- Keep each label under 8 words.

Respond with JSON only:
{"question": "...", "options": [{"label": "...", "value": "<service id>"}]}`;

const ARBITRATE_SYSTEM_PROMPT = `You route questions for a library chatbot.
Pick the ONE service that should answer the user's request. You may only choose from the two listed services.

Respond with JSON only:
{"chosen_agent": "<service id>", "confidence": <number 0-1>, "reasoning": "<one sentence>"}`;

function describeAgents(agents: AgentScore[]): string {
  return agents
    .map(agent => `- ${agent.agentId}: ${agentLabel(agent.agentId)} (example: "${agent.exampleText}")`)
    .join('\n');
}

function otherOption(): ClarificationOption {
  return { label: OTHER_OPTION_LABEL, value: OTHER_OPTION_VALUE };
}

/**
 * Catalog-label clarification used whenever the model's answer is unusable
 */
export function fallbackClarification(agents: AgentScore[]): Clarification {
  return {
    question: FALLBACK_QUESTION,
    options: [
      ...agents.map(agent => ({ label: agentLabel(agent.agentId), value: agent.agentId })),
      otherOption(),
    ],
    source: 'fallback',
  };
}

export class ArbitrationService {
  constructor(
    private readonly llm: CompletionProvider,
    private readonly settings: ArbitrationSettings
  ) {}

  /**
   * Ask the user to choose between the top agents.
   * One option per offered agent, nothing else, "other" last.
   */
  async clarify(query: string, scores: AgentScore[], options: ArbitrationCallOptions = {}): Promise<Clarification> {
    const agents = scores.slice(0, this.settings.clarifyCandidateLimit);
    if (agents.length === 0) {
      return fallbackClarification(agents);
    }

    try {
      const result = await withTimeout(
        'clarification',
        this.settings.llmTimeoutMs,
        signal =>
          this.llm.complete(
            [
              { role: 'system', content: CLARIFY_SYSTEM_PROMPT },
              { role: 'user', content: `User request: "${query}"\n\nServices:\n${describeAgents(agents)}` },
            ],
            { temperature: 0.2, maxTokens: 300, signal }
          ),
        options.signal
      );

      const parsed = parseClarificationResponse(result.content);
      const offered = new Set(agents.map(agent => agent.agentId));
      const seen = new Set<string>();
      const kept: ClarificationOption[] = [];

      for (const option of parsed.options) {
        if (!offered.has(option.value) || seen.has(option.value)) {
          continue;
        }
        seen.add(option.value);
        kept.push({ label: option.label, value: option.value });
      }

      if (kept.length === 0) {
        throw new LlmResponseFormatError('Clarification response offered no listed service', result.content);
      }

      // Every offered agent stays selectable, with its catalog label if the model skipped it
      for (const agent of agents) {
        if (!seen.has(agent.agentId)) {
          kept.push({ label: agentLabel(agent.agentId), value: agent.agentId });
        }
      }

      return {
        question: parsed.question,
        options: [...kept, otherOption()],
        source: 'model',
      };
    } catch (error) {
      logger.warn('Clarification generation failed, using fallback question', {
        error: getErrorMessage(error),
        agents: agents.map(agent => agent.agentId),
      });
      return fallbackClarification(agents);
    }
  }

  /**
   * Pick one agent out of the top two.
   * Fewer than two agents resolve without calling the model.
   */
  async arbitrate(query: string, scores: AgentScore[], options: ArbitrationCallOptions = {}): Promise<ArbitrationResolution> {
    const [first, second] = scores;

    if (!first) {
      return {
        agentId: this.settings.defaultAgentId,
        confidence: DEFAULT_AGENT_CONFIDENCE,
        reasoning: 'No candidates available, using default agent',
        source: 'synthetic',
      };
    }

    if (!second) {
      return {
        agentId: first.agentId,
        confidence: SINGLE_AGENT_CONFIDENCE,
        reasoning: 'Only one candidate available',
        source: 'synthetic',
      };
    }

    const offered = [first, second];

    try {
      const result = await withTimeout(
        'arbitration',
        this.settings.llmTimeoutMs,
        signal =>
          this.llm.complete(
            [
              { role: 'system', content: ARBITRATE_SYSTEM_PROMPT },
              { role: 'user', content: `User request: "${query}"\n\nServices:\n${describeAgents(offered)}` },
            ],
            { temperature: 0, maxTokens: 200, signal }
          ),
        options.signal
      );

      const parsed = parseArbitrationResponse(result.content);
      if (!offered.some(agent => agent.agentId === parsed.chosen_agent)) {
        throw new LlmResponseFormatError(
          `Arbitration chose an agent that was not offered: ${parsed.chosen_agent}`,
          result.content
        );
      }

      return {
        agentId: parsed.chosen_agent,
        confidence: parsed.confidence,
        reasoning: parsed.reasoning,
        source: 'model',
      };
    } catch (error) {
      logger.warn('Arbitration failed, using top candidate', {
        error: getErrorMessage(error),
        agents: offered.map(agent => agent.agentId),
      });
      return {
        agentId: first.agentId,
        confidence: ERROR_FALLBACK_CONFIDENCE,
        reasoning: 'arbitration error',
        source: 'fallback',
      };
    }
  }
}

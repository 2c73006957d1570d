/**
 * Query Router
 *
 * Decides which agent answers a library help question, or asks the user
 * to clarify. It NEVER answers the question itself.
 */

// Main routing class
export { QueryRouter } from './router.service.js';
export type { QueryRouterDeps } from './router.service.js';

// Stage services
export { PrototypeSearch } from './prototype-search.service.js';
export { ArbitrationService, fallbackClarification } from './arbitration.service.js';
export { PgPrototypeStore } from './prototype.store.js';
export type { PrototypeStore, PrototypeRecord, PrototypeMatch } from './prototype.store.js';

// Configuration and errors
export { resolveRouterSettings, DEFAULT_THRESHOLDS } from './router.config.js';
export type { RouterSettings, RouterSettingsInput } from './router.config.js';
export {
  RouterError,
  ConfigurationError,
  TimeoutError,
  RouteCancelledError,
  LlmResponseFormatError,
} from './router.errors.js';

// Types
export type {
  RouteResult,
  DirectRouteResult,
  ClarifyRouteResult,
  RouteMode,
  ConfidenceLabel,
  Candidate,
  AgentScore,
  GateDecision,
  ArbiterDecision,
  ArbiterThresholds,
  ClarificationOption,
  PipelineState,
} from './router.types.js';
export { isClarification, OTHER_OPTION_VALUE } from './router.types.js';

// Individual rule modules (for testing)
export { runPatternGate } from './rules/pattern-gate.js';
export { aggregateScores, decideConfidence, decideFromScores } from './rules/confidence-arbiter.js';
export { agentLabel, AGENT_LABELS } from './agent-catalog.js';

/**
 * PMD Session Management
 * Subscriptions, lifecycle state and the single outstanding control exchange
 */

// ─────────────────────────────────────────────────────────────────
// Types & Transition Rules
// ─────────────────────────────────────────────────────────────────

export { SessionState, TRANSITION_RULES, REQUEST_STATES } from './types';

export type {
  RequestStates,
  Session,
  OutstandingRequest,
  SessionStateChange,
  SubscriptionChange,
  RegistrySnapshot,
} from './types';

// ─────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────

export { SessionRegistry, InvalidTransitionError } from './SessionRegistry';
export type { RegistryEvents, SessionRegistryOptions } from './SessionRegistry';

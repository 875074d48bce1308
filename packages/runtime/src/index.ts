// @treegate/runtime
// Privilege matching, decision aggregation and the authorization service

// Error types
export {
  RuntimeError,
  ValidationError,
  UnknownActionKindError,
  SubjectMismatchError,
  RoleDefinitionError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type AuthorizationLogger,
  type LogEntry,
  type CapturingLogger,
} from './logger.js';

// Subject matching
export { NodePrivilegeContext, matchesNodeMatcher, matchesSubject } from './matching/index.js';

// Decision aggregation
export {
  DEFAULT_DECISION,
  collectRoleVotes,
  decide,
  governedNodeTypes,
  collectDeniedNodeTypes,
  collectDeniedProperties,
  isPropertyDenied,
  type DefaultDecision,
  type RoleVoteOutcome,
  type RoleVote,
  type PrivilegeDecision,
  type AggregationOptions,
  type DeniedProperties,
} from './decisions/index.js';

// Authorization facade
export {
  AuthorizationService,
  createAuthorizationService,
  type AuthorizationServiceOptions,
} from './authorization/index.js';

// Role definitions
export { parseRoleDefinitions } from './roles/index.js';

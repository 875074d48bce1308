// Decision aggregation exports

export {
  DEFAULT_DECISION,
  collectRoleVotes,
  decide,
  governedNodeTypes,
  collectDeniedNodeTypes,
  collectDeniedProperties,
  isPropertyDenied,
} from './aggregator.js';
export type {
  DefaultDecision,
  RoleVoteOutcome,
  RoleVote,
  PrivilegeDecision,
  AggregationOptions,
  DeniedProperties,
} from './aggregator.js';

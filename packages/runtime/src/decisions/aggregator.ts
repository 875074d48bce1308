// Decision aggregation - folds grant/deny/abstain votes of all roles into one result

import type {
  ActionKind,
  CreateNodePrivilegeRule,
  CreateNodePrivilegeSubject,
  NodeTypeName,
  Permission,
  PrivilegeRule,
  PrivilegeSubject,
  PropertyActionKind,
  PropertyPrivilegeSubject,
  Role,
} from '@treegate/protocol';
import type { AuthorizationContext } from '@treegate/repositories';
import type { AuthorizationLogger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { NodePrivilegeContext } from '../matching/context.js';
import { matchesSubject } from '../matching/subject.js';

/**
 * Decision when no role grants or denies
 */
export type DefaultDecision = 'grant' | 'deny';

export const DEFAULT_DECISION: DefaultDecision = 'deny';

/**
 * How one role votes on a subject:
 * - deny: at least one of its matching rules denies
 * - grant: none denies, at least one grants
 * - abstain: no granting or denying rule of the role matches
 */
export type RoleVoteOutcome = 'grant' | 'deny' | 'abstain';

export type RoleVote = {
  role: string;
  outcome: RoleVoteOutcome;

  /**
   * Rules of the role that matched the subject, in definition order
   */
  matchedRules: PrivilegeRule[];
};

/**
 * Result of a single privilege decision
 */
export type PrivilegeDecision = {
  action: ActionKind;

  /** Whether the action is allowed */
  granted: boolean;

  /**
   * - granted: some role granted, none denied
   * - denied: some role denied
   * - abstained: no role granted or denied; `granted` is the default decision
   */
  outcome: 'granted' | 'denied' | 'abstained';

  /** One vote per role, in role order */
  votes: RoleVote[];

  reason: string;
};

/**
 * Options for aggregation
 */
export type AggregationOptions = {
  /**
   * Decision when no role grants or denies (default: 'deny')
   */
  defaultDecision?: DefaultDecision;

  logger?: AuthorizationLogger;
};

/**
 * Collect the vote of every role of the current actor.
 *
 * One NodePrivilegeContext is created for the subject's node and shared by
 * all rules of this call.
 */
export function collectRoleVotes(
  context: AuthorizationContext,
  action: ActionKind,
  subject: PrivilegeSubject,
  options: Pick<AggregationOptions, 'logger'> = {}
): RoleVote[] {
  const ctx = new NodePrivilegeContext(subject.node, context, options.logger ?? silentLogger);

  return context.roles.getRoles().map((role) => {
    const matchedRules = role
      .rulesOf(action)
      .filter((rule) => matchesSubject(rule, subject, ctx));

    const outcome: RoleVoteOutcome = matchedRules.some((rule) => rule.permission === 'deny')
      ? 'deny'
      : matchedRules.some((rule) => rule.permission === 'grant')
        ? 'grant'
        : 'abstain';

    return { role: role.name, outcome, matchedRules };
  });
}

/**
 * Decide a single action for a subject.
 *
 * Precedence: any deny wins over any grant; any grant wins over abstention;
 * when every role abstains the default decision applies. The result does not
 * depend on role or rule order.
 *
 * @param context - Collaborators (roles, nodes, workspaces, node types)
 * @param action - The action being decided
 * @param subject - Subject matching the action (see PrivilegeSubjectFor)
 * @param options - Default decision and logger
 */
export function decide(
  context: AuthorizationContext,
  action: ActionKind,
  subject: PrivilegeSubject,
  options: AggregationOptions = {}
): PrivilegeDecision {
  const { defaultDecision = DEFAULT_DECISION, logger } = options;
  const votes = collectRoleVotes(context, action, subject, { logger });

  const denyingRoles = votes.filter((vote) => vote.outcome === 'deny').map((vote) => vote.role);
  if (denyingRoles.length > 0) {
    return {
      action,
      granted: false,
      outcome: 'denied',
      votes,
      reason: `Denied by ${formatRoles(denyingRoles)}`,
    };
  }

  const grantingRoles = votes.filter((vote) => vote.outcome === 'grant').map((vote) => vote.role);
  if (grantingRoles.length > 0) {
    return {
      action,
      granted: true,
      outcome: 'granted',
      votes,
      reason: `Granted by ${formatRoles(grantingRoles)}`,
    };
  }

  return {
    action,
    granted: defaultDecision === 'grant',
    outcome: 'abstained',
    votes,
    reason: `No role granted or denied ${action}; default decision is ${defaultDecision}`,
  };
}

/**
 * Node types a create rule governs: its explicit list, or the whole universe
 * when the list is empty.
 */
export function governedNodeTypes(
  rule: CreateNodePrivilegeRule,
  universe: readonly NodeTypeName[]
): readonly NodeTypeName[] {
  return rule.creationNodeTypes.length > 0 ? rule.creationNodeTypes : universe;
}

/**
 * Compute the node types the actor is denied to create below the subject's
 * reference node.
 *
 * For every matching rule of every role, the governed node types are
 * collected into granted, denied or abstained sets by the rule's permission.
 * The result is (abstained − granted) ∪ denied: explicit denies always stay
 * denied, and abstained types are denied unless some rule grants them.
 *
 * @param universe - All node types of the reference node's content repository
 * @returns Denied node types, unique and sorted
 */
export function collectDeniedNodeTypes(
  context: AuthorizationContext,
  subject: CreateNodePrivilegeSubject,
  universe: readonly NodeTypeName[],
  options: Pick<AggregationOptions, 'logger'> = {}
): NodeTypeName[] {
  const granted = new Set<NodeTypeName>();
  const denied = new Set<NodeTypeName>();
  const abstained = new Set<NodeTypeName>();
  const byPermission = { grant: granted, deny: denied, abstain: abstained };

  const rules = matchingRules(context, subject, (role) => role.rulesOf('createNode'), options);
  for (const rule of rules) {
    const target = byPermission[rule.permission];
    for (const nodeTypeName of governedNodeTypes(rule, universe)) {
      target.add(nodeTypeName);
    }
  }

  const effective = new Set<NodeTypeName>(denied);
  for (const nodeTypeName of abstained) {
    if (!granted.has(nodeTypeName)) {
      effective.add(nodeTypeName);
    }
  }

  return [...effective].sort();
}

/**
 * Property names the actor is denied for an action on a node.
 *
 * Property names are an open set, so "every property" is a flag rather than
 * a list. `except` and `names` never overlap.
 */
export type DeniedProperties = {
  /**
   * Every property is denied, except the names in `except`
   */
  all: boolean;

  /**
   * Names granted despite `all` (empty unless `all` is set)
   */
  except: string[];

  /**
   * Names denied individually
   */
  names: string[];
};

/**
 * Check a single property name against a denied-properties result
 */
export function isPropertyDenied(denied: DeniedProperties, propertyName: string): boolean {
  return (
    denied.names.includes(propertyName) || (denied.all && !denied.except.includes(propertyName))
  );
}

type PropertyScope = { all: boolean; names: Set<string> };

/**
 * Compute the properties the actor is denied for a property action on the
 * subject's node.
 *
 * Same algebra as collectDeniedNodeTypes, where a rule without property names
 * governs every property: per property name, a covering deny always denies,
 * a covering grant lifts a covering abstain. Reading a single name out of the
 * result with isPropertyDenied agrees with the boolean decision for that
 * name whenever some rule covers it.
 */
export function collectDeniedProperties(
  context: AuthorizationContext,
  action: PropertyActionKind,
  subject: PropertyPrivilegeSubject,
  options: Pick<AggregationOptions, 'logger'> = {}
): DeniedProperties {
  const scopes: Record<Permission, PropertyScope> = {
    grant: { all: false, names: new Set() },
    deny: { all: false, names: new Set() },
    abstain: { all: false, names: new Set() },
  };

  for (const rule of matchingRules(context, subject, (role) => role.rulesOf(action), options)) {
    const scope = scopes[rule.permission];
    if (rule.propertyNames.length === 0) {
      scope.all = true;
    }
    for (const propertyName of rule.propertyNames) {
      scope.names.add(propertyName);
    }
  }

  const { grant, deny, abstain } = scopes;
  if (deny.all) {
    return { all: true, except: [], names: [] };
  }

  const names = new Set(deny.names);
  for (const propertyName of abstain.names) {
    if (!grant.all && !grant.names.has(propertyName)) {
      names.add(propertyName);
    }
  }

  const all = abstain.all && !grant.all;
  const except = all ? [...grant.names].filter((propertyName) => !deny.names.has(propertyName)) : [];

  return { all, except: except.sort(), names: [...names].sort() };
}

/**
 * Rules of every role that match the subject, in role and rule order.
 * One NodePrivilegeContext is shared by all rules.
 */
function matchingRules<R extends PrivilegeRule>(
  context: AuthorizationContext,
  subject: PrivilegeSubject,
  rulesOf: (role: Role) => readonly R[],
  options: Pick<AggregationOptions, 'logger'>
): R[] {
  const ctx = new NodePrivilegeContext(subject.node, context, options.logger ?? silentLogger);

  return context.roles
    .getRoles()
    .flatMap((role) => rulesOf(role).filter((rule) => matchesSubject(rule, subject, ctx)));
}

function formatRoles(roles: string[]): string {
  const unique = [...new Set(roles)];
  return `${unique.length === 1 ? 'role' : 'roles'} ${unique.map((role) => `"${role}"`).join(', ')}`;
}

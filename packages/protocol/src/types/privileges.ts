// Privilege types - rules attached to roles, and the actions they govern

import type { NodeTypeName } from './common.js';

/**
 * Every action a privilege rule can govern.
 * The set is closed; evaluation switches over it exhaustively.
 */
export const ACTION_KINDS = [
  'readNode',
  'editNode',
  'createNode',
  'removeNode',
  'readNodeProperty',
  'editNodeProperty',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

/**
 * Actions whose subject is the node itself
 */
export type NodeActionKind = 'readNode' | 'editNode' | 'removeNode';

/**
 * Actions whose subject is a node property
 */
export type PropertyActionKind = 'readNodeProperty' | 'editNodeProperty';

/**
 * Check if a string names a known action kind
 */
export function isActionKind(value: string): value is ActionKind {
  return (ACTION_KINDS as readonly string[]).includes(value);
}

/**
 * Permission a rule carries.
 *
 * - grant: the rule votes for the action
 * - deny: the rule votes against the action; deny always wins
 * - abstain: the rule casts no vote, but the items it governs are
 *   implicitly denied unless some other rule grants them
 */
export type Permission = 'grant' | 'deny' | 'abstain';

export const PERMISSIONS = ['grant', 'deny', 'abstain'] as const satisfies readonly Permission[];

/**
 * How a node relates to the node named in a path predicate
 */
export type PathRelation = 'ancestorOf' | 'descendantOf' | 'ancestorOrDescendantOf';

export const PATH_RELATIONS = [
  'ancestorOf',
  'descendantOf',
  'ancestorOrDescendantOf',
] as const satisfies readonly PathRelation[];

/**
 * Describes which nodes a rule applies to.
 *
 * Every present constraint must hold; absent constraints do not restrict.
 * An empty matcher matches every node.
 */
export type NodeMatcher = {
  /**
   * Relation to a node given by aggregate identifier or absolute path
   */
  path?: {
    relation: PathRelation;
    nodePathOrIdentifier: string;
  };

  /**
   * Node type names; the node must be of (or inherit from) one of them
   */
  nodeTypes?: NodeTypeName[];

  /**
   * Workspace names; the node's workspace must be one of them
   */
  workspaces?: string[];

  /**
   * The node's coordinate in `dimension` must be one of `presets`
   */
  dimensionPreset?: {
    dimension: string;
    presets: string[];
  };
};

type PrivilegeRuleBase = {
  /**
   * Optional identifier, used in decision explanations and logs
   */
  id?: string;
  permission: Permission;
  matcher: NodeMatcher;
};

/**
 * Rule for an action on the node itself (read, edit, remove)
 */
export type NodePrivilegeRule = PrivilegeRuleBase & {
  action: NodeActionKind;
};

/**
 * Rule for creating nodes below a reference node.
 * An empty `creationNodeTypes` list governs every node type.
 */
export type CreateNodePrivilegeRule = PrivilegeRuleBase & {
  action: 'createNode';
  creationNodeTypes: NodeTypeName[];
};

/**
 * Rule for reading or editing node properties.
 * An empty `propertyNames` list governs every property.
 */
export type PropertyPrivilegeRule = PrivilegeRuleBase & {
  action: PropertyActionKind;
  propertyNames: string[];
};

export type PrivilegeRule = NodePrivilegeRule | CreateNodePrivilegeRule | PropertyPrivilegeRule;

/**
 * The rule shape for a given action kind
 */
export type PrivilegeRuleFor<K extends ActionKind> = K extends 'createNode'
  ? CreateNodePrivilegeRule
  : K extends PropertyActionKind
    ? PropertyPrivilegeRule
    : NodePrivilegeRule;

/**
 * Plain, serializable description of a role and its rules
 */
export type RoleDefinition = {
  name: string;
  rules: PrivilegeRule[];
};

/**
 * A role held by the current actor.
 * Roles are supplied by a RoleSource; evaluation only reads them.
 */
export interface Role {
  readonly name: string;

  /**
   * Rules of this role for one action kind, in definition order
   */
  rulesOf<K extends ActionKind>(action: K): readonly PrivilegeRuleFor<K>[];
}

function isRuleFor<K extends ActionKind>(rule: PrivilegeRule, action: K): rule is PrivilegeRuleFor<K> {
  return rule.action === action;
}

/**
 * Build a Role from its definition.
 *
 * @example
 * ```typescript
 * const editor = defineRole({
 *   name: 'Editor',
 *   rules: [
 *     {
 *       action: 'editNode',
 *       permission: 'grant',
 *       matcher: { path: { relation: 'descendantOf', nodePathOrIdentifier: '/sites/acme' } },
 *     },
 *   ],
 * });
 *
 * editor.rulesOf('editNode'); // [the rule above]
 * ```
 */
export function defineRole(definition: RoleDefinition): Role {
  const rules: readonly PrivilegeRule[] = [...definition.rules];

  return {
    name: definition.name,
    rulesOf<K extends ActionKind>(action: K): readonly PrivilegeRuleFor<K>[] {
      return rules.filter((rule): rule is PrivilegeRuleFor<K> => isRuleFor(rule, action));
    },
  };
}

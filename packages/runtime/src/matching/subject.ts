// Subject matching - does a rule apply to a subject?

import type { NodeMatcher, PrivilegeRule, PrivilegeSubject } from '@treegate/protocol';
import type { NodePrivilegeContext } from './context.js';

/**
 * Check a node against a rule's matcher.
 *
 * Every present constraint must hold. A present but empty list
 * (e.g. `nodeTypes: []`) can never be satisfied.
 */
export function matchesNodeMatcher(matcher: NodeMatcher, ctx: NodePrivilegeContext): boolean {
  if (matcher.path) {
    const { relation, nodePathOrIdentifier } = matcher.path;
    const matchesPath =
      relation === 'ancestorOf'
        ? ctx.isAncestorNodeOf(nodePathOrIdentifier)
        : relation === 'descendantOf'
          ? ctx.isDescendantNodeOf(nodePathOrIdentifier)
          : ctx.isAncestorOrDescendantNodeOf(nodePathOrIdentifier);
    if (!matchesPath) {
      return false;
    }
  }

  if (matcher.nodeTypes && !ctx.nodeIsOfType(matcher.nodeTypes)) {
    return false;
  }

  if (matcher.workspaces && !ctx.isInWorkspace(matcher.workspaces)) {
    return false;
  }

  if (
    matcher.dimensionPreset &&
    !ctx.isInDimensionPreset(matcher.dimensionPreset.dimension, matcher.dimensionPreset.presets)
  ) {
    return false;
  }

  return true;
}

/**
 * Check if a rule applies to a subject.
 *
 * `ctx` must be the privilege context of `subject.node`.
 *
 * - Node rules apply when their matcher matches the node.
 * - Create rules listing creation node types only apply to subjects creating
 *   one of those types; subjects without a type ("any type") are not filtered.
 * - Property rules listing property names only apply to subjects naming one
 *   of those properties; subjects without a name ("any property") are not filtered.
 */
export function matchesSubject(
  rule: PrivilegeRule,
  subject: PrivilegeSubject,
  ctx: NodePrivilegeContext
): boolean {
  switch (rule.action) {
    case 'readNode':
    case 'editNode':
    case 'removeNode':
      return matchesNodeMatcher(rule.matcher, ctx);

    case 'createNode': {
      const creationNodeType = subject.kind === 'createNode' ? subject.creationNodeType : undefined;
      if (
        creationNodeType !== undefined &&
        rule.creationNodeTypes.length > 0 &&
        !rule.creationNodeTypes.includes(creationNodeType)
      ) {
        return false;
      }
      return matchesNodeMatcher(rule.matcher, ctx);
    }

    case 'readNodeProperty':
    case 'editNodeProperty': {
      const propertyName = subject.kind === 'property' ? subject.propertyName : undefined;
      if (
        propertyName !== undefined &&
        rule.propertyNames.length > 0 &&
        !rule.propertyNames.includes(propertyName)
      ) {
        return false;
      }
      return matchesNodeMatcher(rule.matcher, ctx);
    }

    default: {
      const unhandled: never = rule;
      return unhandled;
    }
  }
}

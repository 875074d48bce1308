// Privilege subjects - what a rule is tested against, one shape per action family

import type { NodeTypeName } from './common.js';
import type { ContentNode } from './nodes.js';
import type { ActionKind, PropertyActionKind } from './privileges.js';

/**
 * Subject for actions on the node itself
 */
export type NodePrivilegeSubject = {
  readonly kind: 'node';
  readonly node: ContentNode;
};

/**
 * Subject for creating a node below `node`.
 * Without `creationNodeType` the subject stands for "any type".
 */
export type CreateNodePrivilegeSubject = {
  readonly kind: 'createNode';
  readonly node: ContentNode;
  readonly creationNodeType?: NodeTypeName;
};

/**
 * Subject for property actions.
 * Without `propertyName` the subject stands for "any property" (bulk queries).
 */
export type PropertyPrivilegeSubject = {
  readonly kind: 'property';
  readonly node: ContentNode;
  readonly propertyName?: string;
};

export type PrivilegeSubject =
  | NodePrivilegeSubject
  | CreateNodePrivilegeSubject
  | PropertyPrivilegeSubject;

/**
 * The subject shape a given action kind is evaluated against
 */
export type PrivilegeSubjectFor<K extends ActionKind> = K extends 'createNode'
  ? CreateNodePrivilegeSubject
  : K extends PropertyActionKind
    ? PropertyPrivilegeSubject
    : NodePrivilegeSubject;

export function nodeSubject(node: ContentNode): NodePrivilegeSubject {
  return { kind: 'node', node };
}

export function createNodeSubject(
  node: ContentNode,
  creationNodeType?: NodeTypeName
): CreateNodePrivilegeSubject {
  return creationNodeType === undefined
    ? { kind: 'createNode', node }
    : { kind: 'createNode', node, creationNodeType };
}

export function propertySubject(node: ContentNode, propertyName?: string): PropertyPrivilegeSubject {
  return propertyName === undefined
    ? { kind: 'property', node }
    : { kind: 'property', node, propertyName };
}

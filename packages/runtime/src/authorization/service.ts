// Authorization Service
//
// API methods to check privileges on nodes and permissions for node actions.
// Each question binds a subject to an action kind and delegates to the
// decision aggregator; nothing here has side effects beyond logging.

import type {
  ActionKind,
  ContentNode,
  NodeTypeName,
  PrivilegeSubject,
  PropertyActionKind,
} from '@treegate/protocol';
import {
  createNodeSubject,
  isActionKind,
  nodeSubject,
  propertySubject,
} from '@treegate/protocol';
import type { AuthorizationContext } from '@treegate/repositories';
import type { AuthorizationLogger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { SubjectMismatchError, UnknownActionKindError } from '../errors.js';
import type {
  DefaultDecision,
  DeniedProperties,
  PrivilegeDecision,
} from '../decisions/index.js';
import {
  DEFAULT_DECISION,
  collectDeniedNodeTypes,
  collectDeniedProperties,
  decide,
} from '../decisions/index.js';

/**
 * Options for the authorization service
 */
export type AuthorizationServiceOptions = {
  /**
   * Decision when no role grants or denies an action.
   * Defaults to 'deny'.
   */
  defaultDecision?: DefaultDecision;

  /**
   * Logger for decisions (defaults to silentLogger)
   */
  logger?: AuthorizationLogger;
};

/**
 * Subject kind each action is evaluated against
 */
const SUBJECT_KIND_BY_ACTION = {
  readNode: 'node',
  editNode: 'node',
  removeNode: 'node',
  createNode: 'createNode',
  readNodeProperty: 'property',
  editNodeProperty: 'property',
} as const satisfies Record<ActionKind, PrivilegeSubject['kind']>;

/**
 * AuthorizationService answers privilege questions for the current actor.
 *
 * The actor's roles come from the context's RoleSource; every call reads a
 * fresh snapshot and keeps no state between calls.
 *
 * @example
 * ```typescript
 * const authorization = createAuthorizationService(context, { logger: consoleLogger });
 *
 * if (authorization.isGrantedToEditNode(node)) {
 *   // show the inline editor
 * }
 *
 * const hidden = authorization.getNodeTypeNamesDeniedForCreation(node);
 * ```
 */
export class AuthorizationService {
  private readonly defaultDecision: DefaultDecision;
  private readonly logger: AuthorizationLogger;

  constructor(
    private readonly context: AuthorizationContext,
    options: AuthorizationServiceOptions = {}
  ) {
    this.defaultDecision = options.defaultDecision ?? DEFAULT_DECISION;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Whether the actor may read (see) the node
   */
  isGrantedToReadNode(node: ContentNode): boolean {
    return this.evaluate('readNode', nodeSubject(node)).granted;
  }

  /**
   * Whether the actor may edit the node
   */
  isGrantedToEditNode(node: ContentNode): boolean {
    return this.evaluate('editNode', nodeSubject(node)).granted;
  }

  /**
   * Whether the actor may create a node of `typeOfNewNode` below `referenceNode`.
   * Without a type, asks whether creating anything is allowed.
   */
  isGrantedToCreateNode(referenceNode: ContentNode, typeOfNewNode?: NodeTypeName): boolean {
    return this.evaluate('createNode', createNodeSubject(referenceNode, typeOfNewNode)).granted;
  }

  /**
   * Node types the actor is *denied* to create below `referenceNode`.
   *
   * Rules without creation node types govern every node type of the
   * reference node's content repository.
   */
  getNodeTypeNamesDeniedForCreation(referenceNode: ContentNode): NodeTypeName[] {
    const universe = this.context.nodeTypes.getNodeTypeNames(
      referenceNode.subgraph.contentRepositoryId
    );
    const denied = collectDeniedNodeTypes(this.context, createNodeSubject(referenceNode), universe, {
      logger: this.logger,
    });

    this.logger.debug('Denied items collected', {
      action: 'createNode',
      nodeAggregateId: referenceNode.nodeAggregateId,
      denied,
    });

    return denied;
  }

  /**
   * Whether the actor may remove the node
   */
  isGrantedToRemoveNode(node: ContentNode): boolean {
    return this.evaluate('removeNode', nodeSubject(node)).granted;
  }

  isGrantedToReadNodeProperty(node: ContentNode, propertyName: string): boolean {
    return this.evaluate('readNodeProperty', propertySubject(node, propertyName)).granted;
  }

  isGrantedToEditNodeProperty(node: ContentNode, propertyName: string): boolean {
    return this.evaluate('editNodeProperty', propertySubject(node, propertyName)).granted;
  }

  /**
   * Properties the actor is denied to edit on the node.
   * `all` is set when a rule without property names denies, or abstains
   * without a grant covering every property.
   */
  getDeniedNodePropertiesForEditing(node: ContentNode): DeniedProperties {
    return this.deniedProperties('editNodeProperty', node);
  }

  /**
   * Properties the actor is denied to read on the node
   */
  getDeniedNodePropertiesForReading(node: ContentNode): DeniedProperties {
    return this.deniedProperties('readNodeProperty', node);
  }

  /**
   * Generic entry point for callers that carry the action as a string.
   *
   * @throws UnknownActionKindError if `action` is not an action kind
   * @throws SubjectMismatchError if the subject does not fit the action
   */
  isGranted(action: string, subject: PrivilegeSubject): boolean {
    return this.explain(action, subject).granted;
  }

  /**
   * Decide an action and return the full decision: outcome, per-role votes
   * and the rules that matched.
   *
   * @throws UnknownActionKindError if `action` is not an action kind
   * @throws SubjectMismatchError if the subject does not fit the action
   */
  explain(action: string, subject: PrivilegeSubject): PrivilegeDecision {
    if (!isActionKind(action)) {
      throw new UnknownActionKindError(action);
    }
    const expectedKind = SUBJECT_KIND_BY_ACTION[action];
    if (subject.kind !== expectedKind) {
      throw new SubjectMismatchError(action, subject.kind, expectedKind);
    }
    return this.evaluate(action, subject);
  }

  private evaluate(action: ActionKind, subject: PrivilegeSubject): PrivilegeDecision {
    const decision = decide(this.context, action, subject, {
      defaultDecision: this.defaultDecision,
      logger: this.logger,
    });

    this.logger.debug('Privilege decided', {
      action,
      nodeAggregateId: subject.node.nodeAggregateId,
      outcome: decision.outcome,
      granted: decision.granted,
    });

    return decision;
  }

  private deniedProperties(action: PropertyActionKind, node: ContentNode): DeniedProperties {
    const denied = collectDeniedProperties(this.context, action, propertySubject(node), {
      logger: this.logger,
    });

    this.logger.debug('Denied items collected', {
      action,
      nodeAggregateId: node.nodeAggregateId,
      denied,
    });

    return denied;
  }
}

/**
 * Create an AuthorizationService instance.
 */
export function createAuthorizationService(
  context: AuthorizationContext,
  options: AuthorizationServiceOptions = {}
): AuthorizationService {
  return new AuthorizationService(context, options);
}

// Node privilege context - the predicates a rule's matcher is built from

import type { ContentNode, NodeAggregateId } from '@treegate/protocol';
import {
  InvalidNodeAggregateIdError,
  getCoordinate,
  parseNodeAggregateId,
  toPathPrefix,
} from '@treegate/protocol';
import type { AuthorizationContext, NodeAccessor } from '@treegate/repositories';
import type { AuthorizationLogger } from '../logger.js';
import { silentLogger } from '../logger.js';

/**
 * Outcome of resolving a path-or-identifier operand.
 *
 * - `decided`: the operand settled the predicate on its own (it named the
 *   node itself, or a node that does not exist)
 * - `path`: compare against this path prefix (always ends in "/")
 */
type ResolvedOperand =
  | { kind: 'decided'; matches: boolean }
  | { kind: 'path'; pathPrefix: string };

/**
 * Evaluates matcher predicates against one node.
 *
 * A context is created per evaluated node. It resolves the node accessor for
 * the node's subgraph on first use and keeps it for its own lifetime only;
 * contexts are never shared between nodes.
 *
 * None of the predicates throw for malformed operands, unknown nodes, nodes
 * the content graph has no path for, or missing workspaces; they evaluate
 * to false instead.
 *
 * @example
 * ```typescript
 * const ctx = new NodePrivilegeContext(node, context);
 *
 * ctx.isDescendantNodeOf('/sites/acme');     // node lives below /sites/acme
 * ctx.nodeIsOfType(['Acme.Site:Document']);  // node is a document
 * ctx.isInDimensionPreset('language', ['de', 'fr']);
 * ```
 */
export class NodePrivilegeContext {
  private nodeAccessor: NodeAccessor | null = null;

  constructor(
    readonly node: ContentNode,
    private readonly context: AuthorizationContext,
    private readonly logger: AuthorizationLogger = silentLogger
  ) {}

  /**
   * Matches if the node is an *ancestor* of the node given by path or identifier.
   *
   * Example: isAncestorNodeOf('/sites/some/path') matches "/sites",
   * "/sites/some" and "/sites/some/path" but not "/sites/some/other".
   */
  isAncestorNodeOf(nodePathOrIdentifier: string): boolean {
    const resolved = this.resolveNodePathOrResult(nodePathOrIdentifier);
    if (resolved.kind === 'decided') {
      return resolved.matches;
    }

    const ownPathPrefix = this.ownPathPrefix();
    return ownPathPrefix !== null && resolved.pathPrefix.startsWith(ownPathPrefix);
  }

  /**
   * Matches if the node is a *descendant* of the node given by path or identifier.
   *
   * Example: isDescendantNodeOf('/sites/some/path') matches "/sites/some/path"
   * and "/sites/some/path/subnode" but not "/sites/some/other".
   */
  isDescendantNodeOf(nodePathOrIdentifier: string): boolean {
    const resolved = this.resolveNodePathOrResult(nodePathOrIdentifier);
    if (resolved.kind === 'decided') {
      return resolved.matches;
    }

    const ownPathPrefix = this.ownPathPrefix();
    return ownPathPrefix !== null && ownPathPrefix.startsWith(resolved.pathPrefix);
  }

  /**
   * Matches if the node is an ancestor or a descendant of the given node.
   *
   * Example: isAncestorOrDescendantNodeOf('/sites/some') matches "/sites",
   * "/sites/some" and "/sites/some/sub" but not "/sites/other".
   */
  isAncestorOrDescendantNodeOf(nodePathOrIdentifier: string): boolean {
    return (
      this.isAncestorNodeOf(nodePathOrIdentifier) || this.isDescendantNodeOf(nodePathOrIdentifier)
    );
  }

  /**
   * Matches if the node is of one of the given node types, or inherits from one.
   */
  nodeIsOfType(nodeTypes: string | string[]): boolean {
    const candidates = Array.isArray(nodeTypes) ? nodeTypes : [nodeTypes];
    const { nodeTypeName } = this.node;

    return candidates.some(
      (candidate) =>
        candidate === nodeTypeName || this.context.nodeTypes.isSubtypeOf(nodeTypeName, candidate)
    );
  }

  /**
   * Matches if the workspace currently pointing at the node's content stream
   * is one of `workspaceNames`. No such workspace: no match.
   */
  isInWorkspace(workspaceNames: string[]): boolean {
    const workspace = this.context.workspaces.findOneByCurrentContentStreamId(
      this.node.subgraph.contentStreamId
    );
    return workspace !== null && workspaceNames.includes(workspace.workspaceName);
  }

  /**
   * Matches if the node's coordinate in `dimension` is one of `presets`.
   *
   * Example: isInDimensionPreset('language', ['de', 'fr']) matches German
   * and French variants.
   */
  isInDimensionPreset(dimension: string, presets: string | string[]): boolean {
    const candidates = Array.isArray(presets) ? presets : [presets];
    const coordinate = getCoordinate(this.node.subgraph.dimensionSpacePoint, dimension);

    return coordinate !== undefined && candidates.includes(coordinate);
  }

  /**
   * Resolve an operand that is either a node aggregate identifier or a path.
   *
   * Identifier-looking operands that fail identifier validation are compared
   * as literal paths.
   */
  private resolveNodePathOrResult(nodePathOrIdentifier: string): ResolvedOperand {
    let nodeAggregateId: NodeAggregateId;
    try {
      nodeAggregateId = parseNodeAggregateId(nodePathOrIdentifier);
    } catch (error) {
      if (error instanceof InvalidNodeAggregateIdError) {
        return { kind: 'path', pathPrefix: toPathPrefix(nodePathOrIdentifier) };
      }
      throw error;
    }

    if (nodeAggregateId === this.node.nodeAggregateId) {
      return { kind: 'decided', matches: true };
    }

    const accessor = this.getNodeAccessor();
    const otherNode = accessor.findByIdentifier(nodeAggregateId);
    if (otherNode === null) {
      this.logger.debug('Matcher operand did not resolve to a node', {
        nodeAggregateId,
        contentStreamId: this.node.subgraph.contentStreamId,
      });
      return { kind: 'decided', matches: false };
    }

    const otherPath = accessor.findNodePath(otherNode);
    if (otherPath === null) {
      return { kind: 'decided', matches: false };
    }

    return { kind: 'path', pathPrefix: toPathPrefix(otherPath) };
  }

  private ownPathPrefix(): string | null {
    const path = this.getNodeAccessor().findNodePath(this.node);
    if (path === null) {
      this.logger.debug('Node has no path in its subgraph', {
        nodeAggregateId: this.node.nodeAggregateId,
        contentStreamId: this.node.subgraph.contentStreamId,
      });
      return null;
    }
    return toPathPrefix(path);
  }

  private getNodeAccessor(): NodeAccessor {
    if (this.nodeAccessor === null) {
      this.nodeAccessor = this.context.nodes.accessorFor(this.node.subgraph);
    }
    return this.nodeAccessor;
  }
}

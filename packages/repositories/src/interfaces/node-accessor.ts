import type {
  ContentNode,
  NodeAggregateId,
  NodePath,
  SubgraphIdentity,
} from '@treegate/protocol';

/**
 * Read access to the nodes of one subgraph.
 *
 * An accessor is bound to the subgraph it was created for: identifiers are
 * resolved within that content stream and dimension space point only.
 */
export interface NodeAccessor {
  /**
   * Find a node of this subgraph by aggregate identifier
   * @returns ContentNode or null if the subgraph has no such node
   */
  findByIdentifier(nodeAggregateId: NodeAggregateId): ContentNode | null;

  /**
   * Absolute path of a node of this subgraph, without trailing slash
   * (the root is "/").
   * @returns NodePath or null if the node does not belong to this subgraph
   */
  findNodePath(node: ContentNode): NodePath | null;
}

/**
 * Hands out node accessors per subgraph.
 *
 * This is the node-locator seam of privilege evaluation. Lookups are
 * synchronous; implementations backed by a database are expected to serve
 * a consistent, pre-fetched snapshot for the duration of one evaluation.
 */
export interface NodeAccessorProvider {
  accessorFor(subgraph: SubgraphIdentity): NodeAccessor;
}

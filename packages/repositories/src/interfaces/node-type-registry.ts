import type { ContentRepositoryId, NodeTypeName } from '@treegate/protocol';

/**
 * Node type hierarchy queries.
 */
export interface NodeTypeRegistry {
  /**
   * Names of all node types known to a content repository.
   * This is the universe a create-node rule with an empty type list governs.
   */
  getNodeTypeNames(contentRepositoryId: ContentRepositoryId): NodeTypeName[];

  /**
   * Whether `nodeTypeName` inherits (directly or transitively) from `superTypeName`.
   * A type is not a sub-type of itself.
   */
  isSubtypeOf(nodeTypeName: NodeTypeName, superTypeName: NodeTypeName): boolean;
}

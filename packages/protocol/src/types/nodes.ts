// Node types - the content tree as seen by privilege evaluation

import type {
  NodeAggregateId,
  ContentStreamId,
  ContentRepositoryId,
  NodeTypeName,
} from './common.js';

/**
 * A dimension space point maps dimension identifiers to coordinates,
 * e.g. `{ language: 'de', market: 'eu' }`.
 *
 * Immutable once attached to a subgraph identity.
 */
export type DimensionSpacePoint = Readonly<Record<string, string>>;

/**
 * Identifies one subgraph of a content repository: a content stream
 * seen from one point in dimension space.
 */
export type SubgraphIdentity = {
  readonly contentRepositoryId: ContentRepositoryId;
  readonly contentStreamId: ContentStreamId;
  readonly dimensionSpacePoint: DimensionSpacePoint;
};

/**
 * A node of the content tree.
 *
 * Nodes are owned by the content graph; privilege evaluation only reads them.
 * The node's path is not part of the node, it is resolved through the
 * node accessor of its subgraph.
 */
export type ContentNode = {
  readonly nodeAggregateId: NodeAggregateId;
  readonly nodeTypeName: NodeTypeName;
  readonly subgraph: SubgraphIdentity;
};

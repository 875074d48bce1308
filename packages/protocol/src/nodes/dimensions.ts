import type { DimensionSpacePoint } from '../types/nodes.js';

/**
 * Coordinate of a dimension space point in one dimension, if it has one
 */
export function getCoordinate(point: DimensionSpacePoint, dimension: string): string | undefined {
  return Object.hasOwn(point, dimension) ? point[dimension] : undefined;
}

/**
 * Stable string form of a dimension space point, independent of key order.
 * Used to key per-subgraph lookups.
 */
export function dimensionSpacePointHash(point: DimensionSpacePoint): string {
  const entries = Object.keys(point)
    .sort()
    .map((dimension) => [dimension, point[dimension]]);
  return JSON.stringify(entries);
}

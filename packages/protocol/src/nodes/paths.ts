// Node path helpers

import type { NodePath } from '../types/common.js';

export const PATH_SEPARATOR = '/';

/**
 * Turn a path into a prefix marker: trailing slashes stripped, exactly one appended.
 *
 * "/sites/a" and "/sites/a//" both become "/sites/a/"; the root "/" stays "/".
 */
export function toPathPrefix(path: NodePath): string {
  return path.replace(/\/+$/, '') + PATH_SEPARATOR;
}

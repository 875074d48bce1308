// Node aggregate identifiers

import type { NodeAggregateId } from '../types/common.js';

/**
 * Lowercase alphanumerics and dashes, 1 to 255 characters
 */
const NODE_AGGREGATE_ID_PATTERN = /^[a-z0-9-]{1,255}$/;

/**
 * Thrown when a string is not a valid node aggregate identifier.
 */
export class InvalidNodeAggregateIdError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid node aggregate identifier "${value}": expected 1-255 characters of [a-z0-9-]`);
    this.name = 'InvalidNodeAggregateIdError';
    this.value = value;
  }
}

/**
 * Check if a string is a valid node aggregate identifier
 */
export function isValidNodeAggregateId(value: string): boolean {
  return NODE_AGGREGATE_ID_PATTERN.test(value);
}

/**
 * Parse a node aggregate identifier.
 *
 * @throws InvalidNodeAggregateIdError if the value does not match the identifier format
 */
export function parseNodeAggregateId(value: string): NodeAggregateId {
  if (!isValidNodeAggregateId(value)) {
    throw new InvalidNodeAggregateIdError(value);
  }
  return value;
}

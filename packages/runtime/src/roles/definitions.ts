// Loading role definitions from configuration documents

import type { RoleDefinition } from '@treegate/protocol';
import { validateRoleDefinitions } from '@treegate/protocol';
import { RoleDefinitionError } from '../errors.js';

/**
 * Parse a role definitions document (`{ "roles": [...] }`).
 *
 * @param input - Parsed JSON or any untrusted value
 * @returns Validated role definitions, ready for a RoleSource
 * @throws RoleDefinitionError listing every issue found
 *
 * @example
 * ```typescript
 * const definitions = parseRoleDefinitions(JSON.parse(await readFile('roles.json', 'utf-8')));
 * const roles = createStaticRoleSource(definitions);
 * ```
 */
export function parseRoleDefinitions(input: unknown): RoleDefinition[] {
  const result = validateRoleDefinitions(input);
  if (!result.valid) {
    throw new RoleDefinitionError(result.issues);
  }
  return result.definitions;
}

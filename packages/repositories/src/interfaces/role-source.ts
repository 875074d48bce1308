import type { Role } from '@treegate/protocol';

/**
 * Supplies the roles of the current actor.
 *
 * How roles are resolved (session, token, configuration) is up to the
 * implementation. The order of the returned roles carries no meaning:
 * evaluation results do not depend on it.
 */
export interface RoleSource {
  getRoles(): readonly Role[];
}

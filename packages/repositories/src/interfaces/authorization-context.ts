import type { NodeAccessorProvider } from './node-accessor.js';
import type { WorkspaceDirectory } from './workspace-directory.js';
import type { RoleSource } from './role-source.js';
import type { NodeTypeRegistry } from './node-type-registry.js';

/**
 * AuthorizationContext bundles every collaborator privilege evaluation reads from.
 *
 * This is the dependency injection point for the runtime: pass one to the
 * authorization service and swap implementations (in-memory, database-backed
 * snapshots) without changing the evaluation code.
 *
 * All collaborators must reflect one consistent snapshot for the duration of
 * an evaluation call.
 *
 * Example usage:
 * ```typescript
 * const context = createInMemoryAuthorizationContext({ roles: [editor] });
 * const authorization = createAuthorizationService(context);
 * authorization.isGrantedToEditNode(node);
 * ```
 */
export interface AuthorizationContext {
  readonly nodes: NodeAccessorProvider;
  readonly workspaces: WorkspaceDirectory;
  readonly roles: RoleSource;
  readonly nodeTypes: NodeTypeRegistry;
}

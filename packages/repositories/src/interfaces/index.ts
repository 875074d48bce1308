// Collaborator interfaces
// These define what privilege evaluation reads, not how it is stored.

export type { NodeAccessor, NodeAccessorProvider } from './node-accessor.js';
export type { WorkspaceDirectory } from './workspace-directory.js';
export type { RoleSource } from './role-source.js';
export type { NodeTypeRegistry } from './node-type-registry.js';
export type { AuthorizationContext } from './authorization-context.js';

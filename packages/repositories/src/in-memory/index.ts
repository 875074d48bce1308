// In-memory collaborator implementations for development and testing
//
// This module provides in-memory implementations of every collaborator
// interface, useful for:
// - Local development without a content repository
// - Fast unit testing
// - Trying out role definitions
//
// Data does not persist between restarts.

import type {
  ContentNode,
  ContentRepositoryId,
  ContentStreamId,
  NodeAggregateId,
  NodePath,
  NodeTypeName,
  Role,
  RoleDefinition,
  SubgraphIdentity,
  Workspace,
} from '@treegate/protocol';
import { defineRole, dimensionSpacePointHash, toPathPrefix } from '@treegate/protocol';
import type {
  AuthorizationContext,
  NodeAccessor,
  NodeAccessorProvider,
  NodeTypeRegistry,
  RoleSource,
  WorkspaceDirectory,
} from '../interfaces/index.js';

// --- Content graph ---

/**
 * Input for adding a node to the in-memory content graph
 */
export type AddNodeInput = {
  nodeAggregateId: NodeAggregateId;
  nodeTypeName: NodeTypeName;
  subgraph: SubgraphIdentity;

  /**
   * Absolute path of the node within its subgraph, e.g. "/sites/acme"
   */
  path: NodePath;
};

type StoredNode = {
  node: ContentNode;
  path: NodePath;
};

/**
 * In-memory content graph: nodes with their paths, grouped by subgraph.
 */
export interface InMemoryContentGraph extends NodeAccessorProvider {
  /**
   * Add a node and return it. Re-adding an identifier in the same subgraph
   * replaces the earlier node.
   */
  addNode(input: AddNodeInput): ContentNode;

  /**
   * Number of stored nodes across all subgraphs
   */
  readonly size: number;

  clear(): void;
}

function subgraphKey(subgraph: SubgraphIdentity): string {
  return [
    subgraph.contentRepositoryId,
    subgraph.contentStreamId,
    dimensionSpacePointHash(subgraph.dimensionSpacePoint),
  ].join('|');
}

function normalizeNodePath(path: NodePath): NodePath {
  const prefix = toPathPrefix(path);
  return prefix === '/' ? prefix : prefix.slice(0, -1);
}

/**
 * Create an in-memory content graph.
 *
 * @example
 * ```typescript
 * const graph = createInMemoryContentGraph();
 * const page = graph.addNode({
 *   nodeAggregateId: 'about-page',
 *   nodeTypeName: 'Acme.Site:Page',
 *   subgraph: { contentRepositoryId: 'default', contentStreamId: 'cs-live', dimensionSpacePoint: {} },
 *   path: '/sites/acme/about',
 * });
 *
 * graph.accessorFor(page.subgraph).findNodePath(page); // "/sites/acme/about"
 * ```
 */
export function createInMemoryContentGraph(): InMemoryContentGraph {
  const subgraphs = new Map<string, Map<NodeAggregateId, StoredNode>>();

  const nodesOf = (subgraph: SubgraphIdentity): Map<NodeAggregateId, StoredNode> => {
    const key = subgraphKey(subgraph);
    let nodes = subgraphs.get(key);
    if (!nodes) {
      nodes = new Map();
      subgraphs.set(key, nodes);
    }
    return nodes;
  };

  return {
    addNode(input) {
      const node: ContentNode = {
        nodeAggregateId: input.nodeAggregateId,
        nodeTypeName: input.nodeTypeName,
        subgraph: input.subgraph,
      };
      nodesOf(input.subgraph).set(input.nodeAggregateId, {
        node,
        path: normalizeNodePath(input.path),
      });
      return node;
    },

    accessorFor(subgraph): NodeAccessor {
      const key = subgraphKey(subgraph);

      return {
        findByIdentifier(nodeAggregateId) {
          return subgraphs.get(key)?.get(nodeAggregateId)?.node ?? null;
        },
        findNodePath(node) {
          return subgraphs.get(key)?.get(node.nodeAggregateId)?.path ?? null;
        },
      };
    },

    get size() {
      let size = 0;
      for (const nodes of subgraphs.values()) {
        size += nodes.size;
      }
      return size;
    },

    clear() {
      subgraphs.clear();
    },
  };
}

// --- Workspaces ---

export interface InMemoryWorkspaceDirectory extends WorkspaceDirectory {
  /**
   * Add or replace a workspace (keyed by name)
   */
  add(workspace: Workspace): void;
}

/**
 * Create an in-memory workspace directory
 */
export function createInMemoryWorkspaceDirectory(
  initial: Workspace[] = []
): InMemoryWorkspaceDirectory {
  const workspaces = new Map<string, Workspace>();
  for (const workspace of initial) {
    workspaces.set(workspace.workspaceName, workspace);
  }

  return {
    add(workspace) {
      workspaces.set(workspace.workspaceName, workspace);
    },
    findOneByCurrentContentStreamId(contentStreamId: ContentStreamId) {
      for (const workspace of workspaces.values()) {
        if (workspace.currentContentStreamId === contentStreamId) {
          return workspace;
        }
      }
      return null;
    },
  };
}

// --- Roles ---

export interface StaticRoleSource extends RoleSource {
  /**
   * Add a role for the current actor
   */
  add(role: Role | RoleDefinition): void;
}

function toRole(role: Role | RoleDefinition): Role {
  return 'rulesOf' in role ? role : defineRole(role);
}

/**
 * Create a role source that always returns the same roles.
 *
 * Accepts ready Roles or plain definitions (e.g. from validateRoleDefinitions).
 */
export function createStaticRoleSource(roles: Array<Role | RoleDefinition> = []): StaticRoleSource {
  const current: Role[] = roles.map(toRole);

  return {
    add(role) {
      current.push(toRole(role));
    },
    getRoles() {
      return [...current];
    },
  };
}

// --- Node types ---

/**
 * Definition of a node type for the in-memory registry
 */
export type NodeTypeDefinition = {
  name: NodeTypeName;

  /**
   * Direct super types
   */
  superTypes?: NodeTypeName[];
};

/**
 * Create an in-memory node type registry.
 *
 * @param nodeTypesByRepository - Node type definitions per content repository.
 * Hierarchy queries consider the definitions of every repository.
 */
export function createInMemoryNodeTypeRegistry(
  nodeTypesByRepository: Record<ContentRepositoryId, NodeTypeDefinition[]> = {}
): NodeTypeRegistry {
  const superTypes = new Map<NodeTypeName, Set<NodeTypeName>>();
  for (const definitions of Object.values(nodeTypesByRepository)) {
    for (const definition of definitions) {
      const known = superTypes.get(definition.name) ?? new Set<NodeTypeName>();
      for (const superType of definition.superTypes ?? []) {
        known.add(superType);
      }
      superTypes.set(definition.name, known);
    }
  }

  return {
    getNodeTypeNames(contentRepositoryId) {
      const definitions = nodeTypesByRepository[contentRepositoryId] ?? [];
      return [...new Set(definitions.map((definition) => definition.name))];
    },

    isSubtypeOf(nodeTypeName, superTypeName) {
      // Breadth-first over declared super types; visited guards against cycles
      const visited = new Set<NodeTypeName>([nodeTypeName]);
      const queue = [...(superTypes.get(nodeTypeName) ?? [])];
      while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined || visited.has(current)) {
          continue;
        }
        if (current === superTypeName) {
          return true;
        }
        visited.add(current);
        queue.push(...(superTypes.get(current) ?? []));
      }
      return false;
    },
  };
}

// --- Authorization context ---

/**
 * Options for the in-memory authorization context
 */
export type InMemoryAuthorizationContextOptions = {
  contentGraph?: InMemoryContentGraph;
  workspaces?: Workspace[];
  roles?: Array<Role | RoleDefinition>;
  nodeTypes?: Record<ContentRepositoryId, NodeTypeDefinition[]>;
};

/**
 * Authorization context with direct access to the in-memory collaborators.
 */
export interface InMemoryAuthorizationContext extends AuthorizationContext {
  readonly nodes: InMemoryContentGraph;
  readonly workspaces: InMemoryWorkspaceDirectory;
  readonly roles: StaticRoleSource;
}

/**
 * Create a complete in-memory authorization context.
 *
 * @example
 * ```typescript
 * const context = createInMemoryAuthorizationContext({
 *   workspaces: [{ workspaceName: 'live', currentContentStreamId: 'cs-live' }],
 *   roles: [{ name: 'Editor', rules: [] }],
 *   nodeTypes: { default: [{ name: 'Acme.Site:Page' }] },
 * });
 *
 * context.nodes.addNode({ ... });
 * ```
 */
export function createInMemoryAuthorizationContext(
  options: InMemoryAuthorizationContextOptions = {}
): InMemoryAuthorizationContext {
  return {
    nodes: options.contentGraph ?? createInMemoryContentGraph(),
    workspaces: createInMemoryWorkspaceDirectory(options.workspaces),
    roles: createStaticRoleSource(options.roles),
    nodeTypes: createInMemoryNodeTypeRegistry(options.nodeTypes),
  };
}

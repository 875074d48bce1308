// @treegate/repositories
// Collaborator interfaces and implementations for privilege evaluation.
//
// This package defines the "contract" for everything evaluation reads: nodes
// and their paths, workspaces, the actor's roles and the node type hierarchy.
// The in-memory implementations fulfil these contracts for development and
// tests; hosts provide their own for production.

export * from './interfaces/index.js';
export * from './in-memory/index.js';

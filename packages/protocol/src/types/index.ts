// Re-export all protocol types

export * from './common.js';
export * from './nodes.js';
export * from './workspaces.js';
export * from './privileges.js';
export * from './subjects.js';

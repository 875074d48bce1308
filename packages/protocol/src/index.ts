// @treegate/protocol
// Content tree, workspace and privilege rule types shared by all packages.

export * from './types/index.js';
export * from './nodes/index.js';
export {
  RoleDefinitionsDocumentSchema,
  validateRoleDefinitions,
  type RoleDefinitionIssue,
  type RoleDefinitionIssueCode,
  type RoleDefinitionValidationResult,
} from './validation/roles.js';

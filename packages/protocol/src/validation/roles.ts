// Role definition validation
//
// Role definitions usually arrive as configuration documents (JSON read by the
// host application). They are validated here before a RoleSource serves them.

import { z } from 'zod';
import type { RoleDefinition } from '../types/privileges.js';
import { PATH_RELATIONS, PERMISSIONS } from '../types/privileges.js';

const PermissionSchema = z.enum(PERMISSIONS);

const NameListSchema = z.array(z.string().min(1));

const NodeMatcherSchema = z
  .object({
    path: z
      .object({
        relation: z.enum(PATH_RELATIONS),
        nodePathOrIdentifier: z.string(),
      })
      .strict()
      .optional(),
    nodeTypes: NameListSchema.optional(),
    workspaces: NameListSchema.optional(),
    dimensionPreset: z
      .object({
        dimension: z.string().min(1),
        presets: z.array(z.string()),
      })
      .strict()
      .optional(),
  })
  .strict();

const ruleFields = {
  id: z.string().min(1).optional(),
  permission: PermissionSchema,
  matcher: NodeMatcherSchema.default({}),
};

const PrivilegeRuleSchema = z.discriminatedUnion('action', [
  z
    .object({
      action: z.enum(['readNode', 'editNode', 'removeNode']),
      ...ruleFields,
    })
    .strict(),
  z
    .object({
      action: z.literal('createNode'),
      ...ruleFields,
      creationNodeTypes: NameListSchema.default([]),
    })
    .strict(),
  z
    .object({
      action: z.enum(['readNodeProperty', 'editNodeProperty']),
      ...ruleFields,
      propertyNames: NameListSchema.default([]),
    })
    .strict(),
]);

const RoleDefinitionSchema = z.object({
  name: z.string().min(1),
  rules: z.array(PrivilegeRuleSchema).default([]),
});

/**
 * Shape of a role definitions document: `{ "roles": [...] }`
 */
export const RoleDefinitionsDocumentSchema = z.object({
  roles: z.array(RoleDefinitionSchema),
});

/**
 * A problem found in a role definitions document
 */
export type RoleDefinitionIssue = {
  /** Dotted path into the document, e.g. "roles.0.rules.2.permission" */
  path: string;
  message: string;
  code: RoleDefinitionIssueCode;
};

export type RoleDefinitionIssueCode = 'INVALID_VALUE' | 'DUPLICATE_ROLE';

export type RoleDefinitionValidationResult =
  | { valid: true; definitions: RoleDefinition[]; issues: RoleDefinitionIssue[] }
  | { valid: false; issues: RoleDefinitionIssue[] };

/**
 * Validate a role definitions document.
 *
 * Missing `matcher`, `creationNodeTypes`, `propertyNames` and `rules` are
 * filled with their empty defaults. Unknown keys are rejected so that a
 * misspelled constraint cannot silently widen a rule.
 *
 * @param input - Parsed JSON (or any untrusted value)
 * @returns The definitions, or the issues that prevent loading them
 */
export function validateRoleDefinitions(input: unknown): RoleDefinitionValidationResult {
  const parsed = RoleDefinitionsDocumentSchema.safeParse(input);

  if (!parsed.success) {
    return {
      valid: false,
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: 'INVALID_VALUE',
      })),
    };
  }

  const definitions: RoleDefinition[] = parsed.data.roles;

  const issues: RoleDefinitionIssue[] = [];
  const seen = new Set<string>();
  definitions.forEach((definition, index) => {
    if (seen.has(definition.name)) {
      issues.push({
        path: `roles.${index}.name`,
        message: `Role "${definition.name}" is defined more than once`,
        code: 'DUPLICATE_ROLE',
      });
    }
    seen.add(definition.name);
  });

  if (issues.length > 0) {
    return { valid: false, issues };
  }

  return { valid: true, definitions, issues: [] };
}

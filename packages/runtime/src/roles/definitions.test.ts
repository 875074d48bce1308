// Tests for loading role definitions

import { describe, it, expect } from 'vitest';
import { createStaticRoleSource } from '@treegate/repositories';
import { parseRoleDefinitions } from './definitions.js';
import { RoleDefinitionError } from '../errors.js';

describe('parseRoleDefinitions', () => {
  it('should return definitions usable by a role source', () => {
    const definitions = parseRoleDefinitions({
      roles: [
        {
          name: 'Editor',
          rules: [
            { action: 'editNode', permission: 'grant' },
            { action: 'editNodeProperty', permission: 'deny', propertyNames: ['title'] },
          ],
        },
      ],
    });

    const [editor] = createStaticRoleSource(definitions).getRoles();

    expect(editor.name).toBe('Editor');
    expect(editor.rulesOf('editNode')).toEqual([
      { action: 'editNode', permission: 'grant', matcher: {} },
    ]);
    expect(editor.rulesOf('editNodeProperty')[0].propertyNames).toEqual(['title']);
  });

  it('should throw a RoleDefinitionError for invalid rules', () => {
    const parse = () =>
      parseRoleDefinitions({
        roles: [{ name: 'Editor', rules: [{ action: 'editNode', permission: 'allow' }] }],
      });

    expect(parse).toThrow(RoleDefinitionError);

    try {
      parse();
      expect.unreachable('parseRoleDefinitions should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(RoleDefinitionError);
      if (error instanceof RoleDefinitionError) {
        expect(error.code).toBe('ROLE_DEFINITION_ERROR');
        expect(error.issues.map((issue) => issue.path)).toEqual(['roles.0.rules.0.permission']);
      }
    }
  });

  it('should name duplicated roles in the error message', () => {
    expect(() => parseRoleDefinitions({ roles: [{ name: 'Editor' }, { name: 'Editor' }] })).toThrow(
      'Invalid role definitions: roles.1.name: Role "Editor" is defined more than once'
    );
  });
});

/**
 * Tests for expanding whole source files.
 */
import { describe, it, expect } from 'vitest';
import { createDefaultRegistry } from '../../../../src/core/annotations/index.js';
import { expandSource, expandSources } from '../../../../src/core/expansion/project.js';
import { AnnotationValidationError } from '../../../../src/utils/errors.js';

const registry = createDefaultRegistry();

const controllerSource = [
  "import { Controller } from './framework';",
  '',
  '/**',
  ' * Users endpoints.',
  ' * !RoutesPrefix users',
  ' */',
  'export class UsersController extends Controller {',
  "  /** !Route GET, list, name: 'users.index' */",
  '  index(): void {}',
  '',
  '  /** Plain helper without directives. */',
  '  helper(): void {}',
  '}',
].join('\n');

const userSource = [
  '/**',
  ' * !Table users',
  ' * !HasMany posts',
  ' */',
  'export class User extends BaseModel {',
  '  /** !Column integer, PrimaryKey, AutoIncrement */',
  '  id = 0;',
  '',
  '  /** !Column string, nullable: false */',
  "  email = '';",
  '}',
].join('\n');

describe('expandSources', () => {
  it('should expand a controller using its extends clause', () => {
    const result = expandSource(controllerSource, 'src/users.controller.ts', { registry });

    expect(result.errors).toEqual([]);
    expect(result.expanded).toBe(2);
    expect(result.descriptors).toHaveLength(1);
    expect(result.descriptors[0].routesPrefix).toBe('users');
    expect(result.descriptors[0].getRoutes()).toEqual([
      { methods: ['GET'], path: '/users/list', name: 'users.index', className: 'UsersController', handler: 'index' },
    ]);
  });

  it('should use configured hierarchy entries for classes outside the sources', () => {
    const result = expandSource(userSource, 'src/user.ts', { registry, hierarchy: { BaseModel: 'Model' } });

    expect(result.errors).toEqual([]);
    expect(result.descriptors.map((d) => d.toJSON())).toEqual([
      {
        className: 'User',
        table: 'users',
        routesPrefix: '',
        routes: [],
        columns: [
          { name: 'id', type: 'integer', nullable: false, primaryKey: true, autoIncrement: true },
          { name: 'email', type: 'string', nullable: false, primaryKey: false, autoIncrement: false },
        ],
        relationships: [
          { type: 'hasMany', name: 'posts', relatedClass: 'Post', foreignKey: 'userId', onDelete: 'Nullify' },
        ],
        attachments: {},
      },
    ]);
  });

  it('should build one hierarchy across files', () => {
    const result = expandSources(
      [
        { filePath: 'src/base-model.ts', content: 'export class BaseModel extends Model {}' },
        { filePath: 'src/user.ts', content: userSource },
      ],
      { registry }
    );

    expect(result.errors).toEqual([]);
    expect(result.descriptors.map((d) => d.className)).toEqual(['User']);
  });

  it('should check against configured base class names', () => {
    const source = ['/** !Table users */', 'export class User extends Entity {}'].join('\n');

    const result = expandSource(source, 'src/user.ts', {
      registry,
      baseClasses: { model: 'Entity', controller: 'Controller' },
    });

    expect(result.errors).toEqual([]);
    expect(result.descriptors[0].table).toBe('users');
  });

  it('should report errors with the file and line of the element', () => {
    const source = ['export class Orphan {', '  /** !Column integer, size: 4 */', '  count = 0;', '}'].join('\n');

    const result = expandSource(source, 'src/orphan.ts', { registry });

    expect(result.expanded).toBe(0);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(AnnotationValidationError);
    expect(result.errors[0]).toMatchObject({
      filePath: 'src/orphan.ts',
      line: 3,
      errors: ['Invalid parameter: "size".'],
    });
  });

  it('should throw when failing fast', () => {
    const source = ['export class Orphan {', '  /** !Column integer, size: 4 */', '  count = 0;', '}'].join('\n');

    expect(() => expandSource(source, 'src/orphan.ts', { registry, failFast: true })).toThrow(
      AnnotationValidationError
    );
  });
});

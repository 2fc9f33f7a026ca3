/**
 * Tests for expandClass.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { StaticClassHierarchy } from '../../../../src/core/annotation/hierarchy.js';
import type { AnnotationContext, AnnotationTarget } from '../../../../src/core/annotation/types.js';
import { createDefaultRegistry } from '../../../../src/core/annotations/index.js';
import { ClassDescriptor } from '../../../../src/core/descriptor/descriptor.js';
import { describeTarget, expandClass } from '../../../../src/core/expansion/expander.js';
import type { AnnotatedElement } from '../../../../src/core/expansion/types.js';
import { AnnotationValidationError, UnknownAnnotationError } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';

const registry = createDefaultRegistry();
const context: AnnotationContext = {
  hierarchy: new StaticClassHierarchy({ UsersController: 'Controller' }),
  baseClasses: { model: 'Model', controller: 'Controller' },
};

function element(kind: AnnotationTarget['kind'], elementName: string, lineNumber: number, comment: string): AnnotatedElement {
  return {
    target: { kind, declaringClassName: 'UsersController', elementName, filePath: 'src/users.controller.ts', lineNumber },
    comment,
  };
}

const controllerElements: AnnotatedElement[] = [
  element('class', 'UsersController', 4, '/**\n * !RoutesPrefix users\n */'),
  element('method', 'list', 8, '/** !Route GET, list */'),
  element('method', 'show', 12, "/** !Route GET, '/users/:id', name: 'users.show' */"),
];

describe('expandClass', () => {
  afterEach(() => {
    logger.setLevel('info');
    vi.restoreAllMocks();
  });

  it('should expand every element in source order', () => {
    const result = expandClass(controllerElements, new ClassDescriptor('UsersController'), { registry, context });

    expect(result.errors).toEqual([]);
    expect(result.expanded).toBe(3);
    expect(result.descriptor.routesPrefix).toBe('users');
    expect(result.descriptor.getRoutes()).toEqual([
      { methods: ['GET'], path: '/users/list', className: 'UsersController', handler: 'list' },
      { methods: ['GET'], path: '/users/:id', name: 'users.show', className: 'UsersController', handler: 'show' },
    ]);
  });

  it('should collect errors per directive and keep expanding the rest', () => {
    const elements = [
      ...controllerElements,
      element('method', 'legacy', 16, '/** !Bogus x */'),
      element('method', 'broken', 20, "/** !Route FETCH, '/x' */"),
    ];

    const result = expandClass(elements, new ClassDescriptor('UsersController'), { registry, context });

    expect(result.expanded).toBe(3);
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toBeInstanceOf(UnknownAnnotationError);
    expect(result.errors[0]).toMatchObject({ filePath: 'src/users.controller.ts', line: 16 });
    expect(result.errors[1]).toBeInstanceOf(AnnotationValidationError);
    expect(result.errors[1]).toMatchObject({ line: 20 });
    expect(result.descriptor.getRoutes()).toHaveLength(2);
  });

  it('should throw the first error when failing fast', () => {
    const elements = [element('method', 'legacy', 16, '/** !Bogus x */'), ...controllerElements];

    expect(() =>
      expandClass(elements, new ClassDescriptor('UsersController'), { registry, context, failFast: true })
    ).toThrow(UnknownAnnotationError);
  });

  it('should know no classes without a context', () => {
    const result = expandClass(controllerElements.slice(0, 1), new ClassDescriptor('UsersController'), { registry });

    expect(result.expanded).toBe(0);
    expect(result.errors[0]).toMatchObject({
      errors: ['RoutesPrefixAnnotation is only valid on objects of type Controller.'],
    });
  });

  it('should log each expansion at debug level', () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.setLevel('debug');

    expandClass(controllerElements, new ClassDescriptor('UsersController'), { registry, context });

    expect(consoleLogSpy).toHaveBeenCalledWith(
      expect.stringContaining('[expand] RouteAnnotation expanded on UsersController.show')
    );
  });
});

describe('describeTarget', () => {
  it('should name classes and members', () => {
    expect(describeTarget(controllerElements[0].target)).toBe('UsersController');
    expect(describeTarget(controllerElements[2].target)).toBe('UsersController.show');
  });
});

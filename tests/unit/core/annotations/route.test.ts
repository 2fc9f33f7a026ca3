/**
 * Tests for !Route and !RoutesPrefix.
 */
import { describe, it, expect } from 'vitest';
import { StaticClassHierarchy } from '../../../../src/core/annotation/hierarchy.js';
import { parseAnnotations } from '../../../../src/core/annotation/pipeline.js';
import type { AnnotationContext, AnnotationTarget } from '../../../../src/core/annotation/types.js';
import { createDefaultRegistry, joinRoutePath } from '../../../../src/core/annotations/index.js';
import { ClassDescriptor } from '../../../../src/core/descriptor/descriptor.js';
import { AnnotationValidationError } from '../../../../src/utils/errors.js';

const registry = createDefaultRegistry();
const context: AnnotationContext = {
  hierarchy: new StaticClassHierarchy({ UsersController: 'Controller' }),
  baseClasses: { model: 'Model', controller: 'Controller' },
};

const HTTP_METHOD_LIST = 'GET, POST, PUT, PATCH, DELETE, HEAD, OPTIONS';

function method(elementName: string, declaringClassName = 'UsersController'): AnnotationTarget {
  return { kind: 'method', declaringClassName, elementName, filePath: 'src/users.controller.ts', lineNumber: 10 };
}

function classTarget(className = 'UsersController'): AnnotationTarget {
  return { kind: 'class', declaringClassName: className, elementName: className, filePath: 'src/users.controller.ts', lineNumber: 3 };
}

function apply(directive: string, target: AnnotationTarget, descriptor: ClassDescriptor): ClassDescriptor {
  const { annotations, errors } = parseAnnotations(`/** ${directive} */`, registry);
  expect(errors).toEqual([]);
  for (const annotation of annotations) {
    annotation.expandAnnotation(target, descriptor, context);
  }
  return descriptor;
}

function validationErrors(directive: string, target: AnnotationTarget): readonly string[] {
  try {
    apply(directive, target, new ClassDescriptor(target.declaringClassName));
  } catch (error) {
    if (error instanceof AnnotationValidationError) return error.errors;
    throw error;
  }
  return [];
}

describe('joinRoutePath', () => {
  it('should keep absolute paths', () => {
    expect(joinRoutePath('/api', '/health')).toBe('/health');
  });

  it('should join relative paths onto the prefix', () => {
    expect(joinRoutePath('api', 'users')).toBe('/api/users');
    expect(joinRoutePath('/api/', 'users')).toBe('/api/users');
  });

  it('should root a relative path without a prefix', () => {
    expect(joinRoutePath('', 'users')).toBe('/users');
  });
});

describe('RouteAnnotation', () => {
  it('should add a named route', () => {
    const descriptor = apply("!Route GET, '/users', name: 'users.index'", method('index'), new ClassDescriptor('UsersController'));

    expect(descriptor.getRoutes()).toEqual([
      { methods: ['GET'], path: '/users', name: 'users.index', className: 'UsersController', handler: 'index' },
    ]);
  });

  it('should accept a list of methods and join the routes prefix', () => {
    const descriptor = new ClassDescriptor('UsersController');
    apply('!RoutesPrefix api', classTarget(), descriptor);
    apply('!Route (GET, POST), search', method('search'), descriptor);

    expect(descriptor.routesPrefix).toBe('api');
    expect(descriptor.getRoutes()).toEqual([
      { methods: ['GET', 'POST'], path: '/api/search', className: 'UsersController', handler: 'search' },
    ]);
  });

  it('should reject an unknown method', () => {
    expect(validationErrors("!Route FETCH, '/x'", method('index'))).toEqual([
      `Parameter 0 is set to "FETCH". Valid values: ${HTTP_METHOD_LIST}.`,
    ]);
  });

  it('should reject an unknown method inside a list', () => {
    expect(validationErrors('!Route (GET, FETCH), x', method('index'))).toEqual([
      `Unknown HTTP method: "FETCH". Valid values: ${HTTP_METHOD_LIST}.`,
    ]);
  });

  it('should require a method and a path', () => {
    expect(validationErrors('!Route GET', method('index'))).toEqual([
      'RouteAnnotation takes exactly 2 unnamed parameters: method and path.',
    ]);
  });

  it('should require a string path', () => {
    expect(validationErrors('!Route GET, 5', method('index'))).toEqual([
      'The route path must be a string, found "5".',
    ]);
  });

  it('should reject unknown keys', () => {
    expect(validationErrors("!Route GET, '/x', as: home", method('index'))).toEqual(['Invalid parameter: "as".']);
  });

  it('should only apply to controllers', () => {
    expect(validationErrors("!Route GET, '/x'", method('run', 'Helper'))).toEqual([
      'RouteAnnotation is only valid on objects of type Controller.',
    ]);
  });

  it('should only apply to methods', () => {
    const property: AnnotationTarget = { ...method('index'), kind: 'property' };

    expect(validationErrors("!Route GET, '/x'", property)).toEqual(['RouteAnnotation is only valid on Methods.']);
  });
});

describe('RoutesPrefixAnnotation', () => {
  it('should require exactly one string', () => {
    expect(validationErrors('!RoutesPrefix', classTarget())).toEqual([
      'RoutesPrefixAnnotation requires exactly 1 parameters.',
    ]);
    expect(validationErrors('!RoutesPrefix 7', classTarget())).toEqual([
      'The routes prefix must be a string, found "7".',
    ]);
  });
});

/**
 * !Route and !RoutesPrefix: controller routing.
 */
import { BaseAnnotation, toStringList, toStringValue } from '../annotation/base.js';
import {
  AnnotationTargets,
  formatParameterValue,
  type AnnotationTarget,
  type ParameterSetter,
} from '../annotation/types.js';
import type { ClassDescriptor } from '../descriptor/descriptor.js';
import { HTTP_METHODS, isHttpMethod, type RouteDefinition } from '../descriptor/types.js';

/**
 * Join a route path onto the controller prefix. Absolute paths ignore the prefix.
 */
export function joinRoutePath(prefix: string, path: string): string {
  if (path.startsWith('/')) return path;
  const base = prefix.replace(/\/+$/, '');
  if (base === '') return `/${path}`;
  return `${base.startsWith('/') ? base : `/${base}`}/${path}`;
}

/**
 * Maps one or more HTTP methods and a path onto a controller method.
 *
 *   !Route GET, '/users/:id', name: users.show
 *   !Route (GET, POST), search
 */
export class RouteAnnotation extends BaseAnnotation {
  readonly annotationName = 'Route';
  readonly targets = AnnotationTargets.METHOD;

  private routeName?: string;

  usage(): string {
    return `!Route ${HTTP_METHODS.join('|')}, path [, name: routeName]`;
  }

  protected bindings(): Record<string, ParameterSetter> {
    return {
      name: (value) => {
        this.routeName = toStringValue(value);
      },
    };
  }

  protected validate(className: string): void {
    const positional = this.positionalParameters();
    if (positional.length !== 2) {
      this.addError(`${this.kindName} takes exactly 2 unnamed parameters: method and path.`);
    }

    const methods = positional[0];
    if (Array.isArray(methods)) {
      if (methods.length === 0) {
        this.addError('At least one HTTP method is required.');
      }
      for (const method of methods) {
        if (!isHttpMethod(method)) {
          this.addError(`Unknown HTTP method: "${formatParameterValue(method)}". Valid values: ${HTTP_METHODS.join(', ')}.`);
        }
      }
    } else if (positional.length > 0) {
      this.acceptedIndexedValues(0, [...HTTP_METHODS]);
    }

    if (positional.length > 1 && typeof positional[1] !== 'string') {
      this.addError(`The route path must be a string, found "${formatParameterValue(positional[1])}".`);
    }

    this.acceptedTypeForKey('name', 'string');
    this.validOnSubclassesOf(className, this.context.baseClasses.controller);
  }

  protected expand(target: AnnotationTarget, descriptor: ClassDescriptor): void {
    const route: RouteDefinition = {
      methods: toStringList(this.values[0]).filter(isHttpMethod),
      path: joinRoutePath(descriptor.routesPrefix, toStringValue(this.values[1])),
      className: target.declaringClassName,
      handler: target.elementName,
    };
    if (this.routeName !== undefined) {
      route.name = this.routeName;
    }
    descriptor.addRoute(route);
  }
}

/**
 * Prefix joined onto every relative !Route path of a controller.
 */
export class RoutesPrefixAnnotation extends BaseAnnotation {
  readonly annotationName = 'RoutesPrefix';
  readonly targets = AnnotationTargets.CLASS;

  usage(): string {
    return '!RoutesPrefix path';
  }

  protected validate(className: string): void {
    this.exactParameterCount(1);
    const [prefix] = this.positionalParameters();
    if (prefix !== undefined && typeof prefix !== 'string') {
      this.addError(`The routes prefix must be a string, found "${formatParameterValue(prefix)}".`);
    }
    this.validOnSubclassesOf(className, this.context.baseClasses.controller);
  }

  protected expand(_target: AnnotationTarget, descriptor: ClassDescriptor): void {
    descriptor.routesPrefix = toStringValue(this.values[0]);
  }
}

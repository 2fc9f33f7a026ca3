/**
 * Expansion type definitions.
 */
import type { AnnotationRegistry } from '../annotation/registry.js';
import type { AnnotationContext, AnnotationTarget } from '../annotation/types.js';
import type { ClassDescriptor } from '../descriptor/descriptor.js';
import type { DocmetaError } from '../../utils/errors.js';

/**
 * A program element and the documentation comment attached to it.
 */
export interface AnnotatedElement {
  target: AnnotationTarget;
  comment: string;
}

/**
 * A class with its annotated elements in source order (class first).
 */
export interface AnnotatedClass {
  className: string;
  /** Name of the extended class, if any */
  extends?: string;
  filePath: string;
  elements: AnnotatedElement[];
}

export interface ExpansionOptions {
  registry: AnnotationRegistry;
  /** Hierarchy and base class names; defaults know no classes */
  context?: AnnotationContext;
  /** Throw the first error instead of collecting them */
  failFast?: boolean;
}

export interface ExpansionResult {
  descriptor: ClassDescriptor;
  /** Number of annotations that reached the expanded state */
  expanded: number;
  errors: DocmetaError[];
}

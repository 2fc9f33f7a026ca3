/**
 * Annotation type definitions.
 */

/**
 * A literal produced by the parameter evaluator.
 * Lists only appear one level below the implicit outer list.
 */
export type ParameterValue = string | number | boolean | ParameterValue[];

/**
 * Evaluated arguments of one directive.
 */
export interface ParameterList {
  /** Unkeyed values in source order */
  positional: ParameterValue[];
  /** Keyed values; keys are lower-cased */
  keyed: Record<string, ParameterValue>;
}

/**
 * One `!Name args` directive found in a comment block.
 */
export interface RawInvocation {
  /** Identifier after the `!` */
  name: string;
  /** Trimmed text following the identifier */
  argumentText: string;
  /** 1-based line within the comment block */
  line: number;
  /** Character offset of the `!` within the comment block */
  offset: number;
}

/**
 * Kind of program element an annotation is attached to.
 */
export type TargetKind = 'class' | 'method' | 'property';

/**
 * Applicability bits. Combine with `|`.
 */
export const AnnotationTargets = {
  CLASS: 1,
  METHOD: 2,
  PROPERTY: 4,
} as const;

export const TARGET_KIND_BITS: Record<TargetKind, number> = {
  class: AnnotationTargets.CLASS,
  method: AnnotationTargets.METHOD,
  property: AnnotationTargets.PROPERTY,
};

/**
 * Display names used when listing the kinds an annotation accepts.
 */
export const TARGET_KIND_LABELS: ReadonlyArray<[string, number]> = [
  ['Classes', AnnotationTargets.CLASS],
  ['Methods', AnnotationTargets.METHOD],
  ['Properties', AnnotationTargets.PROPERTY],
];

/**
 * Labels of every kind set in a target mask, in declaration order.
 */
export function describeTargets(mask: number): string[] {
  return TARGET_KIND_LABELS.filter(([, bit]) => (bit & mask) !== 0).map(([label]) => label);
}

/**
 * Reflection metadata for the element an annotation decorates.
 */
export interface AnnotationTarget {
  kind: TargetKind;
  /** Class declaring the element (the class itself for class targets) */
  declaringClassName: string;
  /** Element name (class, method, or property name) */
  elementName: string;
  filePath: string;
  /** 1-based start line of the element */
  lineNumber: number;
}

/**
 * Answers subclass questions for `validOnSubclassesOf`.
 */
export interface ClassHierarchy {
  isSubclassOf(className: string, baseClassName: string): boolean;
}

/**
 * Names of the framework base classes the built-in annotations check against.
 */
export interface BaseClassNames {
  model: string;
  controller: string;
}

/**
 * Collaborators available while an annotation validates and expands.
 */
export interface AnnotationContext {
  hierarchy: ClassHierarchy;
  baseClasses: BaseClassNames;
}

/**
 * Lifecycle of an annotation instance.
 */
export type AnnotationState =
  | 'parsed'
  | 'type-checked'
  | 'validated'
  | 'bound'
  | 'expanded'
  | 'failed';

/**
 * Typed setter for one keyed parameter.
 */
export type ParameterSetter = (value: ParameterValue) => void;

/**
 * Value type names accepted by `acceptedTypeForKey`.
 */
export type ParameterValueType = 'string' | 'number' | 'boolean' | 'list';

/**
 * Describe the type of a parameter value.
 */
export function typeOfParameter(value: ParameterValue): ParameterValueType {
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  return 'boolean';
}

/**
 * Render a value the way diagnostics quote it.
 */
export function formatParameterValue(value: ParameterValue): string {
  if (Array.isArray(value)) {
    return `(${value.map(formatParameterValue).join(', ')})`;
  }
  return String(value);
}

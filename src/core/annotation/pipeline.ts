/**
 * Turns a documentation comment into annotation instances.
 */
import { ParseError, UnknownAnnotationError, type DocmetaError, type SourcePosition } from '../../utils/errors.js';
import type { BaseAnnotation } from './base.js';
import { evaluateParameters } from './evaluator.js';
import { parseDirectives } from './parser.js';
import type { AnnotationRegistry } from './registry.js';
import type { ParameterList } from './types.js';

/**
 * Annotations found in one comment, plus the directives that failed.
 * A failing directive never prevents its siblings from being parsed.
 */
export interface AnnotationParseResult {
  annotations: BaseAnnotation[];
  errors: DocmetaError[];
}

/**
 * Parse every directive in a comment, evaluate its arguments, and create
 * the registered annotation for it.
 */
export function parseAnnotations(
  comment: string,
  registry: AnnotationRegistry,
  position: SourcePosition = {}
): AnnotationParseResult {
  const annotations: BaseAnnotation[] = [];
  const errors: DocmetaError[] = [];

  for (const invocation of parseDirectives(comment)) {
    let params: ParameterList;
    try {
      params = evaluateParameters(invocation.argumentText);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      errors.push(
        new ParseError(
          `There is an unparseable annotation value: "!${invocation.name} ${invocation.argumentText}" (${error.message})`,
          { annotationName: invocation.name, argumentText: invocation.argumentText },
          position
        )
      );
      continue;
    }

    try {
      annotations.push(registry.create(invocation.name, params, position));
    } catch (error) {
      if (!(error instanceof UnknownAnnotationError)) throw error;
      errors.push(error);
    }
  }

  return { annotations, errors };
}

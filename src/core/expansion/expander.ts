/**
 * Expands every annotation on a class into its descriptor.
 */
import { createDefaultContext } from '../annotation/base.js';
import { parseAnnotations } from '../annotation/pipeline.js';
import type { AnnotationTarget } from '../annotation/types.js';
import type { ClassDescriptor } from '../descriptor/descriptor.js';
import { AnnotationValidationError, type DocmetaError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { AnnotatedElement, ExpansionOptions, ExpansionResult } from './types.js';

/**
 * Apply the annotations of each element, in order, to one descriptor.
 *
 * Parse errors, unknown annotations and validation failures are collected
 * per directive so one bad directive does not hide the others. With
 * `failFast` the first of them is thrown instead.
 */
export function expandClass(
  elements: AnnotatedElement[],
  descriptor: ClassDescriptor,
  options: ExpansionOptions
): ExpansionResult {
  const log = logger.child('expand');
  const context = options.context ?? createDefaultContext();
  const errors: DocmetaError[] = [];
  let expanded = 0;

  const record = (error: DocmetaError): void => {
    if (options.failFast) throw error;
    errors.push(error);
  };

  for (const { target, comment } of elements) {
    const parsed = parseAnnotations(comment, options.registry, {
      filePath: target.filePath,
      line: target.lineNumber,
    });
    parsed.errors.forEach(record);

    for (const annotation of parsed.annotations) {
      try {
        annotation.expandAnnotation(target, descriptor, context);
        expanded++;
        log.debug(`${annotation.kindName} expanded on ${describeTarget(target)}`);
      } catch (error) {
        if (!(error instanceof AnnotationValidationError)) throw error;
        record(error);
      }
    }
  }

  return { descriptor, expanded, errors };
}

export function describeTarget(target: AnnotationTarget): string {
  return target.kind === 'class'
    ? target.declaringClassName
    : `${target.declaringClassName}.${target.elementName}`;
}

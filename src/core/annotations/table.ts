/**
 * !Table and !Source: where a model's rows live.
 */
import { BaseAnnotation, toStringValue } from '../annotation/base.js';
import { AnnotationTargets, type AnnotationTarget } from '../annotation/types.js';
import type { ClassDescriptor } from '../descriptor/descriptor.js';

/**
 * Names the database table a model maps to.
 */
export class TableAnnotation extends BaseAnnotation {
  readonly annotationName = 'Table';
  readonly targets = AnnotationTargets.CLASS;

  usage(): string {
    return '!Table table_name';
  }

  protected validate(className: string): void {
    this.exactParameterCount(1);
    this.validOnSubclassesOf(className, this.context.baseClasses.model);
  }

  protected expand(_target: AnnotationTarget, descriptor: ClassDescriptor): void {
    descriptor.table = toStringValue(this.values[0]);
  }
}

/**
 * Names the data source (connection) a model reads from.
 */
export class SourceAnnotation extends BaseAnnotation {
  readonly annotationName = 'Source';
  readonly targets = AnnotationTargets.CLASS;

  usage(): string {
    return '!Source source_name';
  }

  protected validate(className: string): void {
    this.exactParameterCount(1);
    this.validOnSubclassesOf(className, this.context.baseClasses.model);
  }

  protected expand(_target: AnnotationTarget, descriptor: ClassDescriptor): void {
    descriptor.source = toStringValue(this.values[0]);
  }
}

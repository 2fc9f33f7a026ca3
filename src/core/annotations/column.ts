/**
 * !Column maps a model property onto a table column.
 */
import { BaseAnnotation, toBooleanValue } from '../annotation/base.js';
import {
  AnnotationTargets,
  formatParameterValue,
  type AnnotationTarget,
  type ParameterSetter,
} from '../annotation/types.js';
import type { ClassDescriptor } from '../descriptor/descriptor.js';
import { COLUMN_TYPES, isColumnType, type ColumnDefinition } from '../descriptor/types.js';
import { DocmetaError, ErrorCodes } from '../../utils/errors.js';

const PRIMARY_KEY = 'PrimaryKey';
const AUTO_INCREMENT = 'AutoIncrement';
const MODIFIERS = [PRIMARY_KEY, AUTO_INCREMENT];

export class ColumnAnnotation extends BaseAnnotation {
  readonly annotationName = 'Column';
  readonly targets = AnnotationTargets.PROPERTY;

  private nullable?: boolean;
  private defaultValue?: string | number | boolean;

  usage(): string {
    return `!Column ${COLUMN_TYPES.join('|')} [, ${PRIMARY_KEY}] [, ${AUTO_INCREMENT}] [, nullable: true|false] [, default: value]`;
  }

  protected bindings(): Record<string, ParameterSetter> {
    return {
      nullable: (value) => {
        this.nullable = toBooleanValue(value);
      },
      default: (value) => {
        if (!Array.isArray(value)) {
          this.defaultValue = value;
        }
      },
    };
  }

  protected validate(_className: string): void {
    this.minimumParameterCount(1);
    this.acceptedKeylessValues([...COLUMN_TYPES, ...MODIFIERS]);
    this.acceptedTypeForKey('nullable', 'boolean');

    const types = this.positionalParameters().filter(isColumnType);
    if (types.length === 0) {
      this.addError(`${this.kindName} requires a column type. Valid types: ${COLUMN_TYPES.join(', ')}.`);
    } else if (types.length > 1) {
      this.addError(`${this.kindName} takes a single column type, found: ${types.join(', ')}.`);
    }

    const defaultValue = this.getParameters()?.keyed.default;
    if (Array.isArray(defaultValue)) {
      this.addError(`The "default" parameter must be a single value, found ${formatParameterValue(defaultValue)}.`);
    }
  }

  protected expand(target: AnnotationTarget, descriptor: ClassDescriptor): void {
    const type = this.valueNotIn(MODIFIERS);
    if (!isColumnType(type)) {
      throw new DocmetaError(ErrorCodes.INVALID_ANNOTATION, `${this.kindName} on ${target.elementName} has no column type`);
    }

    const primaryKey = this.isAValue(PRIMARY_KEY);
    const column: ColumnDefinition = {
      name: target.elementName,
      type,
      // Primary keys default to NOT NULL; every other column is nullable unless stated.
      nullable: this.nullable ?? !primaryKey,
      primaryKey,
      autoIncrement: this.isAValue(AUTO_INCREMENT),
    };
    if (this.defaultValue !== undefined) {
      column.defaultValue = this.defaultValue;
    }

    descriptor.addColumn(column);
  }
}

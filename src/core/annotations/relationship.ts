/**
 * !HasMany and !BelongsTo: relations between models.
 */
import { BaseAnnotation, toStringValue } from '../annotation/base.js';
import { AnnotationTargets, type AnnotationTarget, type ParameterSetter } from '../annotation/types.js';
import type { ClassDescriptor } from '../descriptor/descriptor.js';
import {
  ON_DELETE_POLICIES,
  isOnDeletePolicy,
  type OnDeletePolicy,
  type RelationshipDefinition,
  type RelationshipType,
} from '../descriptor/types.js';

const DEFAULT_ON_DELETE: OnDeletePolicy = 'Nullify';

/**
 * Shared parameters and validation for relationship annotations.
 * Subclasses derive the related class and foreign key when they are not given.
 */
abstract class RelationshipAnnotation extends BaseAnnotation {
  readonly targets = AnnotationTargets.CLASS;

  protected abstract readonly relationshipType: RelationshipType;

  protected relatedClass?: string;
  protected foreignKey?: string;
  protected through?: string;
  protected onDelete: OnDeletePolicy = DEFAULT_ON_DELETE;

  protected abstract defaultRelatedClass(relationName: string): string;
  protected abstract defaultForeignKey(relationName: string, declaringClass: string): string;

  usage(): string {
    return (
      `!${this.annotationName} relationName [, class: RelatedClass] [, key: foreignKey] ` +
      `[, through: JoinClass] [, onDelete: ${ON_DELETE_POLICIES.join('|')}]`
    );
  }

  protected bindings(): Record<string, ParameterSetter> {
    return {
      class: (value) => {
        this.relatedClass = toStringValue(value);
      },
      key: (value) => {
        this.foreignKey = toStringValue(value);
      },
      through: (value) => {
        this.through = toStringValue(value);
      },
      ondelete: (value) => {
        if (isOnDeletePolicy(value)) {
          this.onDelete = value;
        }
      },
    };
  }

  protected validate(className: string): void {
    if (this.positionalParameters().length !== 1) {
      this.addError(`${this.kindName} takes exactly one relation name.`);
    }
    for (const key of ['class', 'key', 'through']) {
      this.acceptedTypeForKey(key, 'string');
    }
    this.acceptedValuesForKey('onDelete', [...ON_DELETE_POLICIES]);
    this.validOnSubclassesOf(className, this.context.baseClasses.model);
  }

  protected expand(target: AnnotationTarget, descriptor: ClassDescriptor): void {
    const name = toStringValue(this.values[0]);
    const relationship: RelationshipDefinition = {
      type: this.relationshipType,
      name,
      relatedClass: this.relatedClass ?? this.defaultRelatedClass(name),
      foreignKey: this.foreignKey ?? this.defaultForeignKey(name, target.declaringClassName),
      onDelete: this.onDelete,
    };
    if (this.through !== undefined) {
      relationship.through = this.through;
    }
    descriptor.addRelationship(relationship);
  }
}

/**
 * `!HasMany books` on Author relates to Book through `authorId`.
 */
export class HasManyAnnotation extends RelationshipAnnotation {
  readonly annotationName = 'HasMany';
  protected readonly relationshipType = 'hasMany';

  protected defaultRelatedClass(relationName: string): string {
    return upperFirst(relationName.replace(/s$/, ''));
  }

  protected defaultForeignKey(_relationName: string, declaringClass: string): string {
    return `${lowerFirst(declaringClass)}Id`;
  }
}

/**
 * `!BelongsTo author` on Book relates to Author through `authorId`.
 */
export class BelongsToAnnotation extends RelationshipAnnotation {
  readonly annotationName = 'BelongsTo';
  protected readonly relationshipType = 'belongsTo';

  protected defaultRelatedClass(relationName: string): string {
    return upperFirst(relationName);
  }

  protected defaultForeignKey(relationName: string): string {
    return `${lowerFirst(relationName)}Id`;
  }
}

function upperFirst(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function lowerFirst(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

/**
 * Built-in annotation kinds and the default registry.
 */
import type { AnnotationClass } from '../annotation/base.js';
import { AnnotationRegistry } from '../annotation/registry.js';
import { ColumnAnnotation } from './column.js';
import { BelongsToAnnotation, HasManyAnnotation } from './relationship.js';
import { RouteAnnotation, RoutesPrefixAnnotation } from './route.js';
import { SourceAnnotation, TableAnnotation } from './table.js';

export { ColumnAnnotation } from './column.js';
export { BelongsToAnnotation, HasManyAnnotation } from './relationship.js';
export { RouteAnnotation, RoutesPrefixAnnotation, joinRoutePath } from './route.js';
export { SourceAnnotation, TableAnnotation } from './table.js';

export const BUILTIN_ANNOTATIONS: readonly AnnotationClass[] = [
  TableAnnotation,
  SourceAnnotation,
  ColumnAnnotation,
  HasManyAnnotation,
  BelongsToAnnotation,
  RouteAnnotation,
  RoutesPrefixAnnotation,
];

/**
 * Registry holding the built-in kinds plus any `extra` kinds, already sealed.
 */
export function createDefaultRegistry(extra: AnnotationClass[] = []): AnnotationRegistry {
  return new AnnotationRegistry()
    .registerAll([...BUILTIN_ANNOTATIONS, ...extra])
    .seal();
}

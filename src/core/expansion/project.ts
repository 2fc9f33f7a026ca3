/**
 * Expands annotations across a set of TypeScript sources.
 */
import { DEFAULT_BASE_CLASSES } from '../annotation/base.js';
import { StaticClassHierarchy } from '../annotation/hierarchy.js';
import type { AnnotationRegistry } from '../annotation/registry.js';
import type { AnnotationContext, BaseClassNames } from '../annotation/types.js';
import { ClassDescriptor } from '../descriptor/descriptor.js';
import { TypeScriptReflector } from '../reflection/typescript.js';
import type { DocmetaError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { expandClass } from './expander.js';
import type { AnnotatedClass } from './types.js';

export interface SourceInput {
  filePath: string;
  content: string;
}

export interface ProjectExpansionOptions {
  registry: AnnotationRegistry;
  baseClasses?: BaseClassNames;
  /** Extra child → parent entries for classes outside the scanned sources */
  hierarchy?: Record<string, string>;
  failFast?: boolean;
  reflector?: TypeScriptReflector;
}

export interface ProjectExpansionResult {
  descriptors: ClassDescriptor[];
  expanded: number;
  errors: DocmetaError[];
}

/**
 * Reflect every source, build one hierarchy from all `extends` clauses,
 * then expand each documented class into its own descriptor.
 * Classes are processed in source order.
 */
export function expandSources(sources: SourceInput[], options: ProjectExpansionOptions): ProjectExpansionResult {
  const reflector = options.reflector ?? new TypeScriptReflector();
  const classes: AnnotatedClass[] = sources.flatMap((source) =>
    reflector.collectAnnotatedClasses(source.content, source.filePath)
  );

  const context = createProjectContext(classes, options);
  const descriptors: ClassDescriptor[] = [];
  const errors: DocmetaError[] = [];
  let expanded = 0;

  for (const cls of classes) {
    if (cls.elements.length === 0) continue;

    const result = expandClass(cls.elements, new ClassDescriptor(cls.className), {
      registry: options.registry,
      context,
      failFast: options.failFast,
    });
    descriptors.push(result.descriptor);
    errors.push(...result.errors);
    expanded += result.expanded;
  }

  logger.debug(`Expanded ${expanded} annotation(s) on ${descriptors.length} class(es)`, {
    files: sources.length,
    errors: errors.length,
  });

  return { descriptors, expanded, errors };
}

/**
 * Expand the classes of a single source file.
 */
export function expandSource(
  source: string,
  filePath: string,
  options: ProjectExpansionOptions
): ProjectExpansionResult {
  return expandSources([{ filePath, content: source }], options);
}

function createProjectContext(classes: AnnotatedClass[], options: ProjectExpansionOptions): AnnotationContext {
  const hierarchy = new StaticClassHierarchy(options.hierarchy);
  for (const cls of classes) {
    hierarchy.addClass(cls.className, cls.extends);
  }
  return {
    hierarchy,
    baseClasses: options.baseClasses ?? { ...DEFAULT_BASE_CLASSES },
  };
}

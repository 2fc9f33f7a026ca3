/**
 * Annotation registry - maps directive names to annotation classes.
 *
 * A registry is populated once at startup, sealed, and then only read.
 * It is passed explicitly to the pipeline, so independent registries can
 * coexist (tests build their own).
 */
import { ErrorCodes, RegistryError, UnknownAnnotationError, type SourcePosition } from '../../utils/errors.js';
import type { AnnotationClass, BaseAnnotation } from './base.js';
import { AnnotationTargets, type ParameterList } from './types.js';

const ANNOTATION_SUFFIX = 'Annotation';
const ALL_TARGETS = AnnotationTargets.CLASS | AnnotationTargets.METHOD | AnnotationTargets.PROPERTY;

/**
 * Canonical registry key for a directive identifier.
 * Identifiers that already carry the suffix are returned unchanged.
 */
export function canonicalAnnotationName(identifier: string): string {
  if (identifier.endsWith(ANNOTATION_SUFFIX) && identifier.length > ANNOTATION_SUFFIX.length) {
    return identifier;
  }
  return `${identifier}${ANNOTATION_SUFFIX}`;
}

export class AnnotationRegistry {
  private readonly registered = new Map<string, AnnotationClass>();
  private sealed = false;

  /**
   * Register an annotation class under `<annotationName>Annotation`.
   * Registering a name again replaces the earlier class.
   */
  register(kind: AnnotationClass): this {
    if (this.sealed) {
      throw new RegistryError(
        ErrorCodes.REGISTRY_SEALED,
        `Cannot register ${kind.name}: the annotation registry is sealed`
      );
    }

    const instance = new kind();
    if ((instance.targets & ALL_TARGETS) === 0) {
      throw new RegistryError(
        ErrorCodes.EMPTY_TARGET_MASK,
        `${instance.kindName} must apply to at least one of class, method or property`,
        { targets: instance.targets }
      );
    }

    this.registered.set(instance.kindName, kind);
    return this;
  }

  registerAll(kinds: AnnotationClass[]): this {
    for (const kind of kinds) {
      this.register(kind);
    }
    return this;
  }

  /**
   * End registration. Lookups are safe to share once sealed.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  has(identifier: string): boolean {
    return this.registered.has(canonicalAnnotationName(identifier));
  }

  /**
   * Resolve a directive identifier ("Route" or "RouteAnnotation") to its class.
   * @throws UnknownAnnotationError if nothing is registered under the name
   */
  lookup(identifier: string, position?: SourcePosition): AnnotationClass {
    const canonical = canonicalAnnotationName(identifier);
    const kind = this.registered.get(canonical);
    if (!kind) {
      throw new UnknownAnnotationError(canonical.slice(0, -ANNOTATION_SUFFIX.length), position);
    }
    return kind;
  }

  /**
   * Create a fresh instance of a registered annotation, initialized with `params`.
   */
  create(identifier: string, params: ParameterList, position?: SourcePosition): BaseAnnotation {
    const kind = this.lookup(identifier, position);
    return new kind().init(params);
  }

  /**
   * Canonical names of all registered annotations, sorted.
   */
  names(): string[] {
    return this.sortedEntries().map(([name]) => name);
  }

  /**
   * Registered annotation classes, in name order.
   */
  kinds(): AnnotationClass[] {
    return this.sortedEntries().map(([, kind]) => kind);
  }

  /**
   * One fresh instance per registered kind, for listing usage and targets.
   */
  describeKinds(): BaseAnnotation[] {
    return this.kinds().map((kind) => new kind());
  }

  private sortedEntries(): Array<[string, AnnotationClass]> {
    return [...this.registered.entries()].sort(([a], [b]) => a.localeCompare(b));
  }
}

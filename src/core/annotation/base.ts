/**
 * Base class for class, method and property annotations.
 * New annotation kinds are introduced by extending BaseAnnotation and
 * registering the subclass with an AnnotationRegistry.
 */
import type { ClassDescriptor } from '../descriptor/descriptor.js';
import { AnnotationValidationError, DocmetaError, ErrorCodes } from '../../utils/errors.js';
import { StaticClassHierarchy } from './hierarchy.js';
import {
  TARGET_KIND_BITS,
  describeTargets,
  formatParameterValue,
  typeOfParameter,
  type AnnotationContext,
  type AnnotationState,
  type AnnotationTarget,
  type BaseClassNames,
  type ParameterList,
  type ParameterSetter,
  type ParameterValue,
  type ParameterValueType,
} from './types.js';

export const DEFAULT_BASE_CLASSES: BaseClassNames = {
  model: 'Model',
  controller: 'Controller',
};

/**
 * Constructor of a concrete annotation kind.
 */
export type AnnotationClass = new () => BaseAnnotation;

export type CaseNormalization = 'upper' | 'lower';

export function createDefaultContext(): AnnotationContext {
  return {
    hierarchy: new StaticClassHierarchy(),
    baseClasses: { ...DEFAULT_BASE_CLASSES },
  };
}

/**
 * Base class for annotation kinds.
 *
 * Subclasses declare where they may appear (`targets`), how they are used
 * (`usage`), the rules their parameters must satisfy (`validate`), typed
 * setters for keyed parameters (`bindings`), and how they change the class
 * descriptor (`expand`).
 */
export abstract class BaseAnnotation {
  /** Directive identifier, e.g. "Route" for `!Route` */
  abstract readonly annotationName: string;
  /** Bitmask of AnnotationTargets this kind may decorate */
  abstract readonly targets: number;

  /**
   * Human-readable description of the directive's parameters.
   */
  abstract usage(): string;

  /**
   * Append an error for every rule the parameters break.
   * Runs before binding, so it reads `this.parameters` through the
   * validation helpers.
   */
  protected abstract validate(className: string): void;

  /**
   * Mutate the descriptor. Only reached when validation found no errors.
   */
  protected abstract expand(target: AnnotationTarget, descriptor: ClassDescriptor): void;

  /**
   * Typed setters for keyed parameters, by lower-case key.
   * Any other key is reported as an invalid parameter.
   */
  protected bindings(): Record<string, ParameterSetter> {
    return {};
  }

  protected errors: string[] = [];
  protected values: ParameterValue[] = [];
  protected parameters: ParameterList | null = { positional: [], keyed: {} };
  protected context: AnnotationContext = createDefaultContext();
  private currentState: AnnotationState = 'parsed';

  /** Canonical registry name, e.g. "RouteAnnotation" */
  get kindName(): string {
    return `${this.annotationName}Annotation`;
  }

  get state(): AnnotationState {
    return this.currentState;
  }

  /**
   * Initialize parameters, lower-casing keys.
   */
  init(parameters: ParameterList): this {
    const keyed = Object.fromEntries(
      Object.entries(parameters.keyed).map(([key, value]) => [key.toLowerCase(), value])
    );
    this.parameters = { positional: [...parameters.positional], keyed };
    return this;
  }

  getErrors(): readonly string[] {
    return this.errors;
  }

  /**
   * Parameters awaiting binding; null once bound.
   */
  getParameters(): ParameterList | null {
    return this.parameters;
  }

  /**
   * Positional values, available after binding.
   */
  getValues(): readonly ParameterValue[] {
    return this.values;
  }

  /**
   * Drive the annotation through type checking, validation, binding and
   * expansion. Every error is collected before any is reported.
   *
   * @throws AnnotationValidationError when the annotation is misapplied or invalid
   */
  expandAnnotation(
    target: AnnotationTarget,
    descriptor: ClassDescriptor,
    context?: AnnotationContext
  ): ClassDescriptor {
    if (this.currentState !== 'parsed') {
      throw new DocmetaError(
        ErrorCodes.ANNOTATION_REUSED,
        `${this.kindName} has already been processed (state: ${this.currentState})`
      );
    }
    if (context) {
      this.context = context;
    }

    // Is this kind allowed on a class, method or property?
    let typeError = false;
    if ((TARGET_KIND_BITS[target.kind] & this.targets) === 0) {
      this.addError(`${this.kindName} is only valid on ${describeTargets(this.targets).join(', ')}.`);
      typeError = true;
    }
    this.currentState = 'type-checked';

    this.acceptedKeys(Object.keys(this.bindings()));
    this.validate(target.declaringClassName);
    this.currentState = 'validated';

    if (this.errors.length > 0) {
      this.currentState = 'failed';
      throw this.createDiagnostic(target, typeError);
    }

    this.bind();
    this.expand(target, descriptor);
    this.currentState = 'expanded';

    return descriptor;
  }

  /**
   * Keyed parameters go through their setters, positional ones onto `values`.
   */
  private bind(): void {
    const params = this.params();
    const setters = this.bindings();

    for (const [key, value] of Object.entries(params.keyed)) {
      if (hasKey(setters, key)) {
        setters[key](value);
      }
    }
    this.values.push(...params.positional);

    this.parameters = null;
    this.currentState = 'bound';
  }

  private createDiagnostic(target: AnnotationTarget, typeError: boolean): AnnotationValidationError {
    const element =
      target.kind === 'property'
        ? `property "${target.declaringClassName}.${target.elementName}"`
        : `${target.kind} "${target.elementName}"`;

    let message = `Invalid ${this.kindName} on ${element}. `;
    if (!typeError) {
      message += `Expected usage: \n${this.usage()}`;
    }
    message += `\n == Errors == \n * ${this.errors.join('\n * ')}`;

    return new AnnotationValidationError(
      this.kindName,
      message,
      [...this.errors],
      target,
      typeError
    );
  }

  protected addError(message: string): void {
    if (!this.errors.includes(message)) {
      this.errors.push(message);
    }
  }

  private params(): ParameterList {
    return this.parameters ?? { positional: [], keyed: {} };
  }

  /**
   * Positional parameters awaiting binding, for kind-specific validation.
   */
  protected positionalParameters(): readonly ParameterValue[] {
    return this.params().positional;
  }

  /* Validation helpers */

  /**
   * Every keyed parameter must be one of `keys`.
   */
  protected acceptedKeys(keys: string[]): void {
    const accepted = keys.map((k) => k.toLowerCase());
    for (const key of Object.keys(this.params().keyed)) {
      if (!accepted.includes(key)) {
        this.addError(`Invalid parameter: "${key}".`);
      }
    }
  }

  /**
   * Every key in `keys` must be present.
   */
  protected requiredKeys(keys: string[]): void {
    const keyed = this.params().keyed;
    for (const key of keys.map((k) => k.toLowerCase())) {
      if (!hasKey(keyed, key)) {
        this.addError(`${this.kindName} requires a '${key}' parameter.`);
      }
    }
  }

  /**
   * Every positional value must be one of `values`. Case-sensitive.
   */
  protected acceptedKeylessValues(values: ParameterValue[]): void {
    for (const value of this.params().positional) {
      if (!containsValue(values, value)) {
        this.addError(`Unknown parameter: "${formatParameterValue(value)}".`);
      }
    }
  }

  /**
   * The positional value at `index` must be one of `values`.
   */
  protected acceptedIndexedValues(index: number, values: ParameterValue[]): void {
    const valid = values.map(formatParameterValue).join(', ');
    const positional = this.params().positional;

    if (index >= positional.length) {
      this.addError(`Parameter ${index} is missing. Valid values: ${valid}.`);
      return;
    }
    const value = positional[index];
    if (!containsValue(values, value)) {
      this.addError(`Parameter ${index} is set to "${formatParameterValue(value)}". Valid values: ${valid}.`);
    }
  }

  /**
   * If `key` is present its value must be one of `values`, optionally
   * upper- or lower-casing string values before comparing.
   */
  protected acceptedValuesForKey(key: string, values: ParameterValue[], caseNormalization?: CaseNormalization): void {
    const lowerKey = key.toLowerCase();
    const keyed = this.params().keyed;
    if (!hasKey(keyed, lowerKey)) return;

    const actual = keyed[lowerKey];
    let compared = actual;
    if (typeof actual === 'string' && caseNormalization === 'upper') {
      compared = actual.toUpperCase();
    } else if (typeof actual === 'string' && caseNormalization === 'lower') {
      compared = actual.toLowerCase();
    }

    if (!containsValue(values, compared)) {
      this.addError(
        `The "${lowerKey}" parameter is set to "${formatParameterValue(actual)}". ` +
          `Valid values: ${values.map(formatParameterValue).join(', ')}.`
      );
    }
  }

  /**
   * If `key` is present its value must have the given type.
   */
  protected acceptedTypeForKey(key: string, type: ParameterValueType): void {
    const lowerKey = key.toLowerCase();
    const keyed = this.params().keyed;
    if (!hasKey(keyed, lowerKey)) return;

    const actual = typeOfParameter(keyed[lowerKey]);
    if (actual !== type) {
      this.addError(`The "${lowerKey}" parameter must be a ${type}, found a ${actual}.`);
    }
  }

  /**
   * Only keyed parameters are accepted.
   */
  protected acceptsNoKeylessValues(): void {
    this.acceptedKeylessValues([]);
  }

  /**
   * Only positional parameters are accepted.
   */
  protected acceptsNoKeyedValues(): void {
    this.acceptedKeys([]);
  }

  /**
   * The annotated class must extend `baseClass`, directly or indirectly.
   */
  protected validOnSubclassesOf(annotatedClass: string, baseClass: string): void {
    if (!this.context.hierarchy.isSubclassOf(annotatedClass, baseClass)) {
      this.addError(`${this.kindName} is only valid on objects of type ${baseClass}.`);
    }
  }

  protected minimumParameterCount(count: number): void {
    if (this.parameterCount() < count) {
      this.addError(`${this.kindName} takes at least ${count} parameters.`);
    }
  }

  protected maximumParameterCount(count: number): void {
    if (this.parameterCount() > count) {
      this.addError(`${this.kindName} takes at most ${count} parameters.`);
    }
  }

  protected exactParameterCount(count: number): void {
    if (this.parameterCount() !== count) {
      this.addError(`${this.kindName} requires exactly ${count} parameters.`);
    }
  }

  private parameterCount(): number {
    const params = this.params();
    return params.positional.length + Object.keys(params.keyed).length;
  }

  /* Value helpers */

  /**
   * Is `value` among the positional parameters (before or after binding)?
   */
  isAValue(value: ParameterValue): boolean {
    return containsValue([...this.params().positional, ...this.values], value);
  }

  /**
   * First positional value not in `values`. The Column annotation uses this
   * to find the column type among modifiers such as PrimaryKey.
   */
  valueNotIn(values: ParameterValue[]): ParameterValue | undefined {
    return [...this.params().positional, ...this.values].find((v) => !containsValue(values, v));
  }
}

function hasKey(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

function sameValue(a: ParameterValue, b: ParameterValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => sameValue(item, b[i]));
  }
  return a === b;
}

function containsValue(values: ParameterValue[], value: ParameterValue): boolean {
  return values.some((candidate) => sameValue(candidate, value));
}

/* Setter coercions */

export function toStringValue(value: ParameterValue): string {
  return Array.isArray(value) ? formatParameterValue(value) : String(value);
}

export function toBooleanValue(value: ParameterValue): boolean {
  if (typeof value === 'string') return value.toLowerCase() === 'true';
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

export function toStringList(value: ParameterValue): string[] {
  return Array.isArray(value) ? value.map(toStringValue) : [String(value)];
}

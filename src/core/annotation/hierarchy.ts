/**
 * Class hierarchy built from `extends` relations.
 */
import type { ClassHierarchy } from './types.js';

/**
 * Answers subclass questions from a child → parent map.
 * Cycles in the map are treated as "not a subclass".
 */
export class StaticClassHierarchy implements ClassHierarchy {
  private readonly parents = new Map<string, string>();

  constructor(parents: Record<string, string> = {}) {
    for (const [child, parent] of Object.entries(parents)) {
      this.parents.set(child, parent);
    }
  }

  /**
   * Record that `className` extends `parentName`.
   */
  addClass(className: string, parentName: string | undefined): this {
    if (parentName) {
      this.parents.set(className, parentName);
    }
    return this;
  }

  getParent(className: string): string | undefined {
    return this.parents.get(className);
  }

  /**
   * Ancestors of a class, nearest first.
   */
  getAncestors(className: string): string[] {
    const chain: string[] = [];
    const seen = new Set<string>([className]);
    let current = this.parents.get(className);

    while (current && !seen.has(current)) {
      chain.push(current);
      seen.add(current);
      current = this.parents.get(current);
    }

    return chain;
  }

  isSubclassOf(className: string, baseClassName: string): boolean {
    return this.getAncestors(className).includes(baseClassName);
  }
}

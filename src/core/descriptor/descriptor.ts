/**
 * Mutable metadata record for one class under expansion.
 */
import type { ColumnDefinition, RelationshipDefinition, RouteDefinition } from './types.js';

/**
 * Plain-object form of a descriptor, used for output.
 */
export interface ClassDescriptorData {
  className: string;
  table?: string;
  source?: string;
  routesPrefix: string;
  routes: RouteDefinition[];
  columns: ColumnDefinition[];
  relationships: RelationshipDefinition[];
  attachments: Record<string, unknown>;
}

/**
 * Collects routes, columns and relationships declared through annotations.
 * Annotations only append to or set fields on the descriptor.
 */
export class ClassDescriptor {
  table?: string;
  source?: string;
  routesPrefix = '';

  private readonly routes: RouteDefinition[] = [];
  private readonly columns: ColumnDefinition[] = [];
  private readonly relationships: RelationshipDefinition[] = [];
  private readonly attachments = new Map<string, unknown>();

  constructor(readonly className: string) {}

  addRoute(route: RouteDefinition): this {
    this.routes.push(route);
    return this;
  }

  addColumn(column: ColumnDefinition): this {
    this.columns.push(column);
    return this;
  }

  addRelationship(relationship: RelationshipDefinition): this {
    this.relationships.push(relationship);
    return this;
  }

  getRoutes(): readonly RouteDefinition[] {
    return this.routes;
  }

  getColumns(): readonly ColumnDefinition[] {
    return this.columns;
  }

  getRelationships(): readonly RelationshipDefinition[] {
    return this.relationships;
  }

  /**
   * Attach free-form metadata for annotation kinds defined outside this package.
   */
  set(key: string, value: unknown): this {
    this.attachments.set(key, value);
    return this;
  }

  get(key: string): unknown {
    return this.attachments.get(key);
  }

  toJSON(): ClassDescriptorData {
    return {
      className: this.className,
      ...(this.table !== undefined && { table: this.table }),
      ...(this.source !== undefined && { source: this.source }),
      routesPrefix: this.routesPrefix,
      routes: [...this.routes],
      columns: [...this.columns],
      relationships: [...this.relationships],
      attachments: Object.fromEntries(this.attachments),
    };
  }
}

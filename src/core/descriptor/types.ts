/**
 * Descriptor entry type definitions.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'];

/**
 * A route mapping an HTTP method and path onto a controller method.
 */
export interface RouteDefinition {
  methods: HttpMethod[];
  /** Full path, joined with the class routes prefix when relative */
  path: string;
  /** Optional route name for reverse routing */
  name?: string;
  /** Controller class and method handling the route */
  className: string;
  handler: string;
}

export type ColumnType =
  | 'string'
  | 'text'
  | 'integer'
  | 'decimal'
  | 'float'
  | 'time'
  | 'timestamp'
  | 'date'
  | 'datetime'
  | 'blob'
  | 'boolean';

export const COLUMN_TYPES: readonly ColumnType[] = [
  'string',
  'text',
  'integer',
  'decimal',
  'float',
  'time',
  'timestamp',
  'date',
  'datetime',
  'blob',
  'boolean',
];

/**
 * A persisted property of a model.
 */
export interface ColumnDefinition {
  /** Property the column maps to */
  name: string;
  type: ColumnType;
  nullable: boolean;
  primaryKey: boolean;
  autoIncrement: boolean;
  defaultValue?: string | number | boolean;
}

export type RelationshipType = 'hasMany' | 'belongsTo';

export type OnDeletePolicy = 'Cascade' | 'Delete' | 'Nullify';

export const ON_DELETE_POLICIES: readonly OnDeletePolicy[] = ['Cascade', 'Delete', 'Nullify'];

/**
 * A relation between two models.
 */
export interface RelationshipDefinition {
  type: RelationshipType;
  name: string;
  /** Related model class */
  relatedClass: string;
  /** Foreign key column */
  foreignKey: string;
  /** Join model for many-through relations */
  through?: string;
  onDelete: OnDeletePolicy;
}

function includesString(values: readonly string[], value: unknown): value is string {
  return typeof value === 'string' && values.includes(value);
}

export function isHttpMethod(value: unknown): value is HttpMethod {
  return includesString(HTTP_METHODS, value);
}

export function isColumnType(value: unknown): value is ColumnType {
  return includesString(COLUMN_TYPES, value);
}

export function isOnDeletePolicy(value: unknown): value is OnDeletePolicy {
  return includesString(ON_DELETE_POLICIES, value);
}

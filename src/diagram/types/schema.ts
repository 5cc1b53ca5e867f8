/**
 * Column schema types: column descriptors and foreign-key declarations
 * shared by ERD entities and ETL nodes.
 */

export interface ColumnDefinition {
  /** Row id, unique within the owning node's column list. */
  id?: string;
  name: string;
  /** Free-form type tag (int, string, datetime…). Empty means unspecified. */
  dataType: string;
  isPrimaryKey: boolean;
  isForeignKey: boolean;
  isNullable: boolean;
  defaultValue?: string;
  description?: string;
}

export type ColumnSchema = ColumnDefinition[];

export interface ForeignKeyDefinition {
  name: string;
  /** Local columns, order matters for composite keys. */
  columns: string[];
  referencedEntity: string;
  /** Must line up with `columns` index by index. */
  referencedColumns: string[];
  onDelete: string;
  onUpdate: string;
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * ERD entity: a table whose columns each get a `link` input and output
 * port carrying the column's row id, so edges can join specific columns.
 */
import { v4 as uuid } from "uuid";
import { PROPERTY_KEYS } from "../constants";
import { InvalidArgumentError } from "../engine/errors";
import {
  type ColumnInput,
  columnDefinitionSchema,
  findColumn,
} from "../lib/column-schema";
import { type ForeignKeyInput, foreignKeyDefinitionSchema } from "../lib/foreign-keys";
import { readColumnSchema, readEntityName, readForeignKeys } from "../lib/properties";
import type { Port, PortDirection } from "../types/diagram";
import type { ColumnDefinition, ColumnSchema, ForeignKeyDefinition } from "../types/schema";
import { BaseDiagramNode } from "./base";

export interface ErdEntityOptions {
  /** Defaults to the node name. */
  entityName?: string;
  columns?: ColumnInput[];
  foreignKeys?: ForeignKeyInput[];
}

export class ErdEntityNode extends BaseDiagramNode {
  readonly family = "generic" as const;

  constructor(id: string, name: string, options: ErdEntityOptions = {}) {
    super(id, name);
    this.defineProperty<string>({
      name: PROPERTY_KEYS.entityName,
      type: "string",
      defaultValue: options.entityName ?? "",
    });
    this.defineProperty<ColumnSchema>({
      name: PROPERTY_KEYS.columns,
      type: "schema",
      defaultValue: [],
    });
    this.defineProperty<ForeignKeyDefinition[]>({
      name: PROPERTY_KEYS.foreignKeys,
      type: "foreign-keys",
      defaultValue: [],
    });
    for (const column of options.columns ?? []) this.addColumn(column);
    for (const fk of options.foreignKeys ?? []) this.addForeignKey(fk);
  }

  get entityName(): string {
    return readEntityName(this);
  }

  get columns(): ColumnSchema {
    return readColumnSchema(this, PROPERTY_KEYS.columns) ?? [];
  }

  get foreignKeys(): ForeignKeyDefinition[] {
    return readForeignKeys(this);
  }

  addColumn(input: ColumnInput): ColumnDefinition {
    const parsed = columnDefinitionSchema.parse(input);
    const column: ColumnDefinition = { ...parsed, id: parsed.id ?? uuid() };
    const existing = this.columns;
    if (findColumn(existing, column.name)) {
      throw new InvalidArgumentError(
        `Column ${column.name} already exists on ${this.name}`,
        "input",
      );
    }
    this.setPropertyValue(PROPERTY_KEYS.columns, [...existing, column]);
    this.addInput("link", { label: column.name, rowId: column.id });
    this.addOutput("link", { label: column.name, rowId: column.id });
    return column;
  }

  addForeignKey(input: ForeignKeyInput): ForeignKeyDefinition {
    const fk = foreignKeyDefinitionSchema.parse(input);
    if (fk.columns.length !== fk.referencedColumns.length) {
      throw new InvalidArgumentError(
        `Foreign key ${fk.name} names ${fk.columns.length} column(s) but references ${fk.referencedColumns.length}`,
        "input",
      );
    }
    this.setPropertyValue(PROPERTY_KEYS.foreignKeys, [...this.foreignKeys, fk]);
    return fk;
  }

  /** The port bound to a column, looked up by column name. */
  columnPort(columnName: string, direction: PortDirection): Port | undefined {
    const column = findColumn(this.columns, columnName);
    if (!column) return undefined;
    const ports = direction === "input" ? this.inputs : this.outputs;
    return ports.find((p) => p.rowId === column.id);
  }
}

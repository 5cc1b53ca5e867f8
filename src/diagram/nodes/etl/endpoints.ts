/**
 * Source/target endpoints of an ETL flow with declared schemas.
 */
import { PROPERTY_KEYS } from "../../constants";
import { type ColumnInput, columnSchemaSchema } from "../../lib/column-schema";
import { readColumnSchema } from "../../lib/properties";
import type { ColumnSchema } from "../../types/schema";
import { EtlNode, ROWS_PORT_TYPE } from "./etl-node";

export class EtlSourceNode extends EtlNode {
  constructor(id: string, name: string, schema: ColumnInput[] = []) {
    super(id, name, "Source");
    this.defineProperty<ColumnSchema>({
      name: PROPERTY_KEYS.outputSchema,
      type: "schema",
      defaultValue: columnSchemaSchema.parse(schema),
    });
    this.addOutput(ROWS_PORT_TYPE, { label: "rows" });
  }
}

export class EtlTargetNode extends EtlNode {
  constructor(id: string, name: string, expected: ColumnInput[] = []) {
    super(id, name, "Target");
    this.defineProperty<ColumnSchema>({
      name: PROPERTY_KEYS.expectedSchema,
      type: "schema",
      defaultValue: columnSchemaSchema.parse(expected),
    });
    this.addInput(ROWS_PORT_TYPE, { label: "rows" });
  }

  get expectedSchema(): ColumnSchema | null {
    return readColumnSchema(this, PROPERTY_KEYS.expectedSchema);
  }
}

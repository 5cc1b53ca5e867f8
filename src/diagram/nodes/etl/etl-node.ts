/**
 * ETL node bases. Every step carries a `Kind`; steps that derive their
 * columns from upstream opt into schema inference and store the result as
 * their `OutputSchema`.
 */
import { PROPERTY_KEYS } from "../../constants";
import { readColumnSchema, readString } from "../../lib/properties";
import type {
  InferenceResult,
  SchemaInference,
  UpstreamSchemaLookup,
} from "../../types/diagram";
import type { ColumnSchema } from "../../types/schema";
import { BaseDiagramNode } from "../base";

export const ETL_KINDS = [
  "Source",
  "Target",
  "Filter",
  "Sort",
  "Derive",
  "Join",
  "Aggregate",
] as const;

export type EtlKind = (typeof ETL_KINDS)[number];

/** Port type for row streams between ETL steps. */
export const ROWS_PORT_TYPE = "array";

export abstract class EtlNode extends BaseDiagramNode {
  readonly family = "generic" as const;

  constructor(id: string, name: string, kind: EtlKind) {
    super(id, name);
    this.defineProperty<string>({
      name: PROPERTY_KEYS.kind,
      type: "string",
      defaultValue: kind,
      choices: ETL_KINDS,
    });
  }

  get kind(): string {
    return readString(this, PROPERTY_KEYS.kind) ?? "";
  }

  get outputSchema(): ColumnSchema | null {
    return readColumnSchema(this, PROPERTY_KEYS.outputSchema);
  }
}

export abstract class DerivedEtlNode extends EtlNode implements SchemaInference {
  constructor(id: string, name: string, kind: EtlKind) {
    super(id, name, kind);
    this.defineProperty<ColumnSchema | null>({
      name: PROPERTY_KEYS.outputSchema,
      type: "schema",
      defaultValue: null,
    });
  }

  protected abstract deriveSchema(upstream: UpstreamSchemaLookup): InferenceResult;

  inferOutputSchema(upstream: UpstreamSchemaLookup): InferenceResult {
    const result = this.deriveSchema(upstream);
    if (result.status === "success") {
      this.setPropertyValue(PROPERTY_KEYS.outputSchema, result.schema);
    } else if (result.status === "skipped") {
      this.setPropertyValue(PROPERTY_KEYS.outputSchema, null);
    }
    return result;
  }

  schemaInference(): SchemaInference {
    return this;
  }
}

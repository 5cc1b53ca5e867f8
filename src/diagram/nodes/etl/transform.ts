/**
 * Row-wise transform (filter, sort, derive). Passes the upstream columns
 * through and adds its derived columns, replacing any with the same name.
 */
import { z } from "zod";
import { PROPERTY_KEYS } from "../../constants";
import {
  columnDefinitionSchema,
  equalsIgnoreCase,
  parseList,
} from "../../lib/column-schema";
import { isBlank } from "../../lib/properties";
import type { InferenceResult, UpstreamSchemaLookup } from "../../types/diagram";
import type { ColumnDefinition } from "../../types/schema";
import { DerivedEtlNode, ROWS_PORT_TYPE } from "./etl-node";

export const derivedColumnSchema = columnDefinitionSchema.extend({
  expression: z.string().default(""),
});

export type DerivedColumn = z.output<typeof derivedColumnSchema>;
export type DerivedColumnInput = z.input<typeof derivedColumnSchema>;

export type TransformKind = "Filter" | "Sort" | "Derive";

export class EtlTransformNode extends DerivedEtlNode {
  constructor(id: string, name: string, kind: TransformKind = "Filter") {
    super(id, name, kind);
    this.defineProperty<DerivedColumn[]>({
      name: PROPERTY_KEYS.derivedColumns,
      type: "list",
      defaultValue: [],
    });
    this.addInput(ROWS_PORT_TYPE, { label: "in" });
    this.addOutput(ROWS_PORT_TYPE, { label: "out" });
  }

  addDerivedColumn(input: DerivedColumnInput): void {
    const current = this.getPropertyValue(PROPERTY_KEYS.derivedColumns);
    const parsed = parseList(current ?? [], derivedColumnSchema);
    const existing = parsed.success ? parsed.data : [];
    this.setPropertyValue(PROPERTY_KEYS.derivedColumns, [
      ...existing,
      derivedColumnSchema.parse(input),
    ]);
  }

  protected deriveSchema(upstream: UpstreamSchemaLookup): InferenceResult {
    const input = upstream(0);
    if (!input) return { status: "skipped", reason: "no schema on input 0" };

    const raw = this.getPropertyValue(PROPERTY_KEYS.derivedColumns);
    const parsed = parseList(isBlank(raw) ? [] : raw, derivedColumnSchema);
    if (!parsed.success) {
      return { status: "error", error: `${PROPERTY_KEYS.derivedColumns}: ${parsed.error}` };
    }
    // drop `expression`, keep the column shape
    const derived: ColumnDefinition[] = parsed.data.map((d) => columnDefinitionSchema.parse(d));

    const schema = input.map(
      (column) => derived.find((d) => equalsIgnoreCase(d.name, column.name)) ?? column,
    );
    for (const d of derived) {
      if (!input.some((c) => equalsIgnoreCase(c.name, d.name))) schema.push(d);
    }
    return { status: "success", schema };
  }
}

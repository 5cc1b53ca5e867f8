/**
 * Group-by aggregate.
 */
import { z } from "zod";
import { PROPERTY_KEYS } from "../../constants";
import { findColumn, parseList } from "../../lib/column-schema";
import { isBlank } from "../../lib/properties";
import type { InferenceResult, UpstreamSchemaLookup } from "../../types/diagram";
import type { ColumnSchema } from "../../types/schema";
import { DerivedEtlNode, ROWS_PORT_TYPE } from "./etl-node";

export const AGGREGATE_FUNCTIONS = ["count", "sum", "avg", "min", "max"] as const;

export const aggregateSchema = z.object({
  column: z.string().min(1),
  fn: z.enum(AGGREGATE_FUNCTIONS),
  alias: z.string().optional(),
});

export type Aggregate = z.output<typeof aggregateSchema>;

export interface AggregateOptions {
  groupBy?: string[];
  aggregates?: Aggregate[];
}

/** Accepts a string list or comma-separated text. */
function toNameList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string").map((v) => v.trim());
  }
  if (typeof value === "string") {
    return value
      .split(",")
      .map((v) => v.trim())
      .filter((v) => v !== "");
  }
  return [];
}

function resultType(fn: Aggregate["fn"], sourceType: string): string {
  if (fn === "count") return "int";
  if (fn === "avg") return "decimal";
  return sourceType;
}

export class EtlAggregateNode extends DerivedEtlNode {
  constructor(id: string, name: string, options: AggregateOptions = {}) {
    super(id, name, "Aggregate");
    this.defineProperty<string[]>({
      name: PROPERTY_KEYS.groupBy,
      type: "list",
      defaultValue: options.groupBy ?? [],
    });
    this.defineProperty<Aggregate[]>({
      name: PROPERTY_KEYS.aggregates,
      type: "list",
      defaultValue: options.aggregates ?? [],
    });
    this.addInput(ROWS_PORT_TYPE, { label: "in" });
    this.addOutput(ROWS_PORT_TYPE, { label: "out" });
  }

  get groupBy(): string[] {
    return toNameList(this.getPropertyValue(PROPERTY_KEYS.groupBy));
  }

  protected deriveSchema(upstream: UpstreamSchemaLookup): InferenceResult {
    const input = upstream(0);
    if (!input) return { status: "skipped", reason: "no schema on input 0" };

    const raw = this.getPropertyValue(PROPERTY_KEYS.aggregates);
    const aggregates = parseList(isBlank(raw) ? [] : raw, aggregateSchema);
    if (!aggregates.success) {
      return { status: "error", error: `${PROPERTY_KEYS.aggregates}: ${aggregates.error}` };
    }

    const schema: ColumnSchema = [];
    for (const name of this.groupBy) {
      const column = findColumn(input, name);
      if (!column) return { status: "error", error: `Unknown group-by column: ${name}` };
      schema.push({ ...column, isPrimaryKey: false, isForeignKey: false });
    }

    for (const agg of aggregates.data) {
      const alias =
        agg.alias?.trim() || (agg.column === "*" ? agg.fn : `${agg.fn}_${agg.column}`);
      let sourceType = "";
      if (agg.column !== "*" || agg.fn !== "count") {
        const column = findColumn(input, agg.column);
        if (!column) {
          return { status: "error", error: `Unknown aggregate column: ${agg.column}` };
        }
        sourceType = column.dataType;
      }
      schema.push({
        name: alias,
        dataType: resultType(agg.fn, sourceType),
        isPrimaryKey: false,
        isForeignKey: false,
        isNullable: agg.fn !== "count",
      });
    }
    return { status: "success", schema };
  }
}

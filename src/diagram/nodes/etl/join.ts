/**
 * Two-input join. Output is the left columns followed by the right columns
 * whose names do not collide; outer sides become nullable.
 */
import { JOIN_KIND, PROPERTY_KEYS } from "../../constants";
import { findColumn } from "../../lib/column-schema";
import { readString } from "../../lib/properties";
import type { InferenceResult, UpstreamSchemaLookup } from "../../types/diagram";
import type { ColumnSchema } from "../../types/schema";
import { DerivedEtlNode, ROWS_PORT_TYPE } from "./etl-node";

export const JOIN_TYPES = ["Inner", "Left", "Right", "Full"] as const;
export type JoinType = (typeof JOIN_TYPES)[number];

export interface JoinOptions {
  joinType?: JoinType;
  leftKey?: string;
  rightKey?: string;
}

function nullable(schema: ColumnSchema): ColumnSchema {
  return schema.map((c) => ({ ...c, isNullable: true }));
}

export class EtlJoinNode extends DerivedEtlNode {
  constructor(id: string, name: string, options: JoinOptions = {}) {
    super(id, name, JOIN_KIND);
    this.defineProperty<string>({
      name: PROPERTY_KEYS.joinType,
      type: "string",
      defaultValue: options.joinType ?? "Inner",
      choices: JOIN_TYPES,
    });
    this.defineProperty<string>({
      name: PROPERTY_KEYS.joinKeyLeft,
      type: "string",
      defaultValue: options.leftKey ?? "",
    });
    this.defineProperty<string>({
      name: PROPERTY_KEYS.joinKeyRight,
      type: "string",
      defaultValue: options.rightKey ?? "",
    });
    this.addInput(ROWS_PORT_TYPE, { label: "left" });
    this.addInput(ROWS_PORT_TYPE, { label: "right" });
    this.addOutput(ROWS_PORT_TYPE, { label: "out" });
  }

  get joinType(): string {
    return (readString(this, PROPERTY_KEYS.joinType) ?? "Inner").toLowerCase();
  }

  protected deriveSchema(upstream: UpstreamSchemaLookup): InferenceResult {
    const left = upstream(0);
    const right = upstream(1);
    if (!left || !right) {
      return { status: "skipped", reason: "both join inputs need a schema" };
    }
    const type = this.joinType;
    const leftSide = type === "right" || type === "full" ? nullable(left) : left;
    const rightSide = type === "left" || type === "full" ? nullable(right) : right;
    const extra = rightSide.filter((c) => !findColumn(left, c.name));
    return { status: "success", schema: [...leftSide, ...extra] };
  }
}

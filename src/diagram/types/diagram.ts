/**
 * Diagram node and port types: the shape the engine expects from host nodes.
 */

import type { ColumnSchema } from "./schema";

export type PortDirection = "input" | "output";

/**
 * Port data-type tag. The primitive tags take part in the compatibility
 * table; domain tags ("link", "transition", "file"…) only match themselves
 * or "any".
 */
export type PortDataType =
  | "string"
  | "number"
  | "object"
  | "array"
  | "boolean"
  | "any"
  | (string & {});

export interface Port {
  readonly id: string;
  readonly owner: DiagramNode;
  readonly direction: PortDirection;
  readonly dataType: PortDataType;
  readonly label?: string;
  /** Identifies a column when the owner is a tabular entity. */
  readonly rowId?: string;
  isAvailable: boolean;
  connection: Port | null;
}

export type NodeFamily = "automation" | "generic";

export type AutomationNodeType =
  | "Trigger"
  | "Action"
  | "Condition"
  | "DataSource"
  | "Transform"
  | "Output";

export type PropertyType =
  | "string"
  | "number"
  | "boolean"
  | "schema"
  | "foreign-keys"
  | "list";

export interface NodeProperty<T = unknown> {
  name: string;
  type: PropertyType;
  defaultValue: T;
  currentValue?: T;
  choices?: readonly string[];
  description?: string;
}

export type UpstreamSchemaLookup = (inputIndex: number) => ColumnSchema | null;

/** skipped: inputs not wired yet, nothing to infer from. */
export type InferenceResult =
  | { status: "success"; schema: ColumnSchema }
  | { status: "skipped"; reason: string }
  | { status: "error"; error: string };

/** Capability for nodes whose output schema derives from their inputs. */
export interface SchemaInference {
  inferOutputSchema(upstream: UpstreamSchemaLookup): InferenceResult;
}

export interface DiagramNode {
  readonly id: string;
  readonly name: string;
  readonly family: NodeFamily;
  readonly inputs: readonly Port[];
  readonly outputs: readonly Port[];
  getProperty(key: string): NodeProperty | undefined;
  /** Current value, falling back to the declared default. */
  getPropertyValue(key: string): unknown;
  setPropertyValue(key: string, value: unknown): void;
  schemaInference(): SchemaInference | null;
}

export interface AutomationDiagramNode extends DiagramNode {
  readonly family: "automation";
  readonly nodeType: AutomationNodeType;
}

export function isAutomationNode(
  node: DiagramNode,
): node is AutomationDiagramNode {
  return node.family === "automation";
}

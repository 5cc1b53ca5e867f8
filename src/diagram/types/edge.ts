/**
 * Edge types: connection lines between an output port and an input port.
 */

import type { Port } from "./diagram";
import type { ColumnSchema } from "./schema";

export type EdgeStatus = "normal" | "warning" | "error";

/**
 * exclusive: single-use ports, availability tracked (automation nodes).
 * shared: fan-out and fan-in allowed, availability untouched.
 */
export type EdgePolicy = "exclusive" | "shared";

/** ERD multiplicity markers drawn at each end of a line. */
export type Multiplicity =
  | "unspecified"
  | "zero-or-one"
  | "one-only"
  | "one-or-many"
  | "zero-or-many"
  | "many"
  | "one";

export type DataFlowDirection = "none" | "forward" | "backward" | "bidirectional";

export interface EdgeLabels {
  start?: string;
  middle?: string;
  end?: string;
}

export interface Edge {
  id: string;
  source: Port;
  target: Port;
  policy: EdgePolicy;
  status: EdgeStatus;
  statusColor: string | null;
  showStatusIndicator: boolean;
  schema: ColumnSchema | null;
  expectedSchema: ColumnSchema | null;
  sourceRowId: string | null;
  targetRowId: string | null;
  startMultiplicity: Multiplicity;
  endMultiplicity: Multiplicity;
  flowDirection: DataFlowDirection;
  isDataFlowAnimated: boolean;
  dataFlowColor: string | null;
  labels: EdgeLabels;
}

export interface MultiplicityPreset {
  start?: Multiplicity;
  end?: Multiplicity;
}

export type RejectionReason =
  | "missing-port"
  | "no-available-port"
  | "direction"
  | "type-mismatch"
  | "node-type"
  | "duplicate"
  | "cycle";

export interface ConnectionValidationResult {
  valid: boolean;
  reason?: RejectionReason;
}

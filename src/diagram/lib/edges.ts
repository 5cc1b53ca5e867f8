/**
 * Edge construction and status helpers.
 */
import { v4 as uuid } from "uuid";
import type { DiagramNode, Port } from "../types/diagram";
import type { Edge, EdgePolicy, MultiplicityPreset } from "../types/edge";

export function createEdge(
  source: Port,
  target: Port,
  policy: EdgePolicy,
): Edge {
  return {
    id: uuid(),
    source,
    target,
    policy,
    status: "normal",
    statusColor: null,
    showStatusIndicator: false,
    schema: null,
    expectedSchema: null,
    sourceRowId: source.rowId ?? null,
    targetRowId: target.rowId ?? null,
    startMultiplicity: "unspecified",
    endMultiplicity: "unspecified",
    flowDirection: "forward",
    isDataFlowAnimated: false,
    dataFlowColor: null,
    labels: {},
  };
}

export function markWarning(edge: Edge, color: string): void {
  edge.status = "warning";
  edge.statusColor = color;
  edge.showStatusIndicator = true;
}

export function resetStatus(edge: Edge): void {
  edge.status = "normal";
  edge.statusColor = null;
  edge.showStatusIndicator = false;
}

export function applyMultiplicity(
  edge: Edge,
  preset: MultiplicityPreset | null,
): void {
  if (!preset) return;
  if (preset.start) edge.startMultiplicity = preset.start;
  if (preset.end) edge.endMultiplicity = preset.end;
}

export function touches(edge: Edge, node: DiagramNode): boolean {
  return edge.source.owner === node || edge.target.owner === node;
}

/** True when the edge links the two nodes, in either direction. */
export function links(edge: Edge, a: DiagramNode, b: DiagramNode): boolean {
  return (
    (edge.source.owner === a && edge.target.owner === b) ||
    (edge.source.owner === b && edge.target.owner === a)
  );
}

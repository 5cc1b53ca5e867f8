/**
 * Referential check for column-level edges between ERD entities.
 *
 * An edge is valid when one column is flagged FK and the other PK, or when
 * either entity declares a foreign key naming the pair at the same index.
 */
import { PROPERTY_KEYS } from "../constants";
import type { DiagramNode } from "../types/diagram";
import type { Edge } from "../types/edge";
import type { ColumnDefinition } from "../types/schema";
import { equalsIgnoreCase } from "./column-schema";
import {
  type InvalidPayloadHandler,
  readColumnSchema,
  readEntityName,
  readForeignKeys,
} from "./properties";

export type PkFkOutcome = "skipped" | "valid" | "invalid";

export function findColumnByRowId(
  node: DiagramNode,
  rowId: string,
  onInvalid?: InvalidPayloadHandler,
): ColumnDefinition | undefined {
  const columns = readColumnSchema(node, PROPERTY_KEYS.columns, onInvalid);
  return columns?.find((c) => c.id === rowId);
}

/** Does `owner` declare `localColumn` → `referenced`.`referencedColumn`? */
export function declaresForeignKey(
  owner: DiagramNode,
  localColumn: string,
  referenced: DiagramNode,
  referencedColumn: string,
  onInvalid?: InvalidPayloadHandler,
): boolean {
  const entity = readEntityName(referenced);
  return readForeignKeys(owner, onInvalid).some(
    (fk) =>
      equalsIgnoreCase(fk.referencedEntity, entity) &&
      fk.columns.some(
        (column, i) =>
          i < fk.referencedColumns.length &&
          equalsIgnoreCase(column, localColumn) &&
          equalsIgnoreCase(fk.referencedColumns[i], referencedColumn),
      ),
  );
}

export function validatePkFk(
  edge: Edge,
  onInvalid?: InvalidPayloadHandler,
): PkFkOutcome {
  if (!edge.sourceRowId || !edge.targetRowId) return "skipped";
  const sourceNode = edge.source.owner;
  const targetNode = edge.target.owner;
  const s = findColumnByRowId(sourceNode, edge.sourceRowId, onInvalid);
  const t = findColumnByRowId(targetNode, edge.targetRowId, onInvalid);
  if (!s || !t) return "skipped";

  const flagged =
    (s.isForeignKey && t.isPrimaryKey) || (s.isPrimaryKey && t.isForeignKey);
  if (flagged) return "valid";

  const declared =
    declaresForeignKey(sourceNode, s.name, targetNode, t.name, onInvalid) ||
    declaresForeignKey(targetNode, t.name, sourceNode, s.name, onInvalid);
  return declared ? "valid" : "invalid";
}

/**
 * Typed readers over the node property bag.
 */
import { PROPERTY_KEYS } from "../constants";
import type { DiagramNode } from "../types/diagram";
import type { ColumnSchema, ForeignKeyDefinition } from "../types/schema";
import { parseColumnSchema } from "./column-schema";
import { parseForeignKeys } from "./foreign-keys";

export type InvalidPayloadHandler = (key: string, error: string) => void;

export function readString(
  node: DiagramNode,
  key: string,
): string | undefined {
  const value = node.getPropertyValue(key);
  if (value === undefined || value === null) return undefined;
  return typeof value === "string" ? value : String(value);
}

export function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === "string" && value.trim() === "")
  );
}

/** Reads a column list; missing, blank or malformed values read as null. */
export function readColumnSchema(
  node: DiagramNode,
  key: string,
  onInvalid?: InvalidPayloadHandler,
): ColumnSchema | null {
  const value = node.getPropertyValue(key);
  if (isBlank(value)) return null;
  const parsed = parseColumnSchema(value);
  if (!parsed.success) {
    onInvalid?.(key, parsed.error);
    return null;
  }
  return parsed.data;
}

export function readForeignKeys(
  node: DiagramNode,
  onInvalid?: InvalidPayloadHandler,
): ForeignKeyDefinition[] {
  const value = node.getPropertyValue(PROPERTY_KEYS.foreignKeys);
  if (isBlank(value)) return [];
  const parsed = parseForeignKeys(value);
  if (!parsed.success) {
    onInvalid?.(PROPERTY_KEYS.foreignKeys, parsed.error);
    return [];
  }
  return parsed.data;
}

/** Declared entity name, else the node name. */
export function readEntityName(node: DiagramNode): string {
  const declared = readString(node, PROPERTY_KEYS.entityName);
  return declared && declared.trim() !== "" ? declared : node.name;
}

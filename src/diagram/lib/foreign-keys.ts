/**
 * Foreign key declarations: interchange parsing and serialization.
 */
import { z } from "zod";
import type { ForeignKeyDefinition, ParseResult } from "../types/schema";
import { decodeJson, formatZodError } from "./column-schema";

export const foreignKeyDefinitionSchema = z.object({
  name: z.string().default(""),
  columns: z.array(z.string()).default([]),
  referencedEntity: z.string().default(""),
  referencedColumns: z.array(z.string()).default([]),
  onDelete: z.string().default(""),
  onUpdate: z.string().default(""),
});

export const foreignKeyListSchema = z.array(foreignKeyDefinitionSchema);

export type ForeignKeyInput = z.input<typeof foreignKeyDefinitionSchema>;

export function parseForeignKeys(
  input: unknown,
): ParseResult<ForeignKeyDefinition[]> {
  const decoded = decodeJson(input);
  if (!decoded.success) return decoded;
  const parsed = foreignKeyListSchema.safeParse(decoded.data);
  if (!parsed.success) {
    return { success: false, error: formatZodError(parsed.error) };
  }
  return { success: true, data: parsed.data };
}

export function serializeForeignKeys(keys: ForeignKeyDefinition[]): string {
  return JSON.stringify(keys);
}

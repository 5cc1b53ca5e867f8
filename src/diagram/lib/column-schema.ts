/**
 * Column schema parsing, serialization and comparison.
 *
 * Properties may carry either the typed column list or its JSON text; both
 * go through the same zod schema before the engine sees them.
 */
import { z } from "zod";
import type {
  ColumnDefinition,
  ColumnSchema,
  ParseResult,
} from "../types/schema";

export const columnDefinitionSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string(),
  dataType: z.string().default(""),
  isPrimaryKey: z.boolean().default(false),
  isForeignKey: z.boolean().default(false),
  isNullable: z.boolean().default(true),
  defaultValue: z.string().optional(),
  description: z.string().optional(),
});

export const columnSchemaSchema = z.array(columnDefinitionSchema);

/** A column as callers may write it, with defaults still to apply. */
export type ColumnInput = z.input<typeof columnDefinitionSchema>;

export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Decodes JSON text; non-string input is returned untouched. */
export function decodeJson(input: unknown): ParseResult<unknown> {
  if (typeof input !== "string") return { success: true, data: input };
  try {
    return { success: true, data: JSON.parse(input) };
  } catch (err) {
    return {
      success: false,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseColumnSchema(input: unknown): ParseResult<ColumnSchema> {
  const decoded = decodeJson(input);
  if (!decoded.success) return decoded;
  const parsed = columnSchemaSchema.safeParse(decoded.data);
  if (!parsed.success) {
    return { success: false, error: formatZodError(parsed.error) };
  }
  return { success: true, data: parsed.data };
}

/** Decodes and validates a list whose items follow `item`. */
export function parseList<S extends z.ZodTypeAny>(
  input: unknown,
  item: S,
): ParseResult<z.output<S>[]> {
  const decoded = decodeJson(input);
  if (!decoded.success) return decoded;
  const parsed = z.array(item).safeParse(decoded.data);
  if (!parsed.success) {
    return { success: false, error: formatZodError(parsed.error) };
  }
  return { success: true, data: parsed.data };
}

export function serializeColumnSchema(schema: ColumnSchema): string {
  return JSON.stringify(schema);
}

export function findColumn(
  schema: ColumnSchema,
  name: string,
): ColumnDefinition | undefined {
  return schema.find((c) => equalsIgnoreCase(c.name, name));
}

/**
 * True when every expected column is present in `actual` by name and, where
 * both sides give a data type, the types agree. Extra actual columns are fine.
 */
export function schemasCompatible(
  expected: ColumnSchema,
  actual: ColumnSchema,
): boolean {
  return expected.every((e) => {
    const a = findColumn(actual, e.name);
    if (!a) return false;
    if (!e.dataType || !a.dataType) return true;
    return equalsIgnoreCase(e.dataType, a.dataType);
  });
}

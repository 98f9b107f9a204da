import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const identifier = z
  .string()
  .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, 'must be a plain SQL identifier');

const ColumnSchema = z.object({
  name: identifier,
  type: z.string().min(1),
});

const RelationshipSchema = z.object({
  left_table: identifier,
  left_column: identifier,
  right_table: identifier,
  right_column: identifier,
  type: z
    .enum(['one_to_one', 'one_to_many', 'many_to_one', 'many_to_many'])
    .default('many_to_one'),
});

export const WarehouseSchemaFileSchema = z
  .object({
    tables: z
      .array(
        z.object({
          name: identifier,
          description: z.string().optional(),
          columns: z.array(ColumnSchema).optional(),
        }),
      )
      .min(1),
    relationships: z.array(RelationshipSchema).default([]),
  })
  .superRefine((value, ctx) => {
    const names = new Set(value.tables.map((t) => t.name.toLowerCase()));
    value.relationships.forEach((rel, i) => {
      for (const table of [rel.left_table, rel.right_table]) {
        if (!names.has(table.toLowerCase())) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['relationships', i],
            message: `Relationship references undeclared table "${table}"`,
          });
        }
      }
    });
  });

export type WarehouseSchemaConfig = z.infer<typeof WarehouseSchemaFileSchema>;
export type ColumnInfo = z.infer<typeof ColumnSchema>;
export type Relationship = z.infer<typeof RelationshipSchema>;

export function parseWarehouseSchema(raw: unknown): WarehouseSchemaConfig {
  return WarehouseSchemaFileSchema.parse(raw);
}

export function loadWarehouseSchema(file: string): WarehouseSchemaConfig {
  const resolved = path.resolve(file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf8'));
  } catch (err) {
    throw new Error(`Cannot read warehouse schema file ${resolved}`, {
      cause: err,
    });
  }
  return parseWarehouseSchema(raw);
}

// packages/core/src/schemas.ts
import { z } from 'zod';
import type { Where } from './types';

const IDENT = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const QUALIFIED = /^[a-zA-Z_][a-zA-Z0-9_]*(\.[a-zA-Z_][a-zA-Z0-9_]*)?$/;

export const Identifier = z.string().regex(IDENT, 'must be an identifier ([a-zA-Z_][a-zA-Z0-9_]*)');

export const WhereOpEnum = z.enum([
  'eq','neq',
  'gt','gte','lt','lte',
  'in','nin',
  'between','exists','is',
  'like','contains','ilike'
]);

const IS_OPERANDS = new Set(['null','not_null','true','false']);

export const WhereLeaf = z.object({
  field: z.string().regex(QUALIFIED, 'must be a column or table.column'),
  op: WhereOpEnum,
  value: z.unknown().optional()
}).strict().superRefine((leaf, ctx) => {
  if (leaf.op === 'is' && !IS_OPERANDS.has(String(leaf.value))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported is-operand: ${String(leaf.value)}` });
  }
  if (leaf.op === 'between' && !(Array.isArray(leaf.value) && leaf.value.length === 2)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'between takes [start, end]' });
  }
});

export const WhereSchema: z.ZodType<Where> = z.lazy(() =>
  z.union([
    z.object({ and: z.array(WhereSchema) }).strict(),
    z.object({ or: z.array(WhereSchema) }).strict(),
    WhereLeaf
  ])
);

export const NetworkOptionsSchema = z.object({
  through: Identifier.optional(),
  joinTable: Identifier.optional(),
  foreignKey: Identifier.optional(),
  associationForeignKey: Identifier.optional(),
  filter: WhereSchema.optional()
}).strict();

export const HasManyOptionsSchema = z.object({
  table: Identifier,
  foreignKey: Identifier,
  primaryKey: Identifier.optional(),
  filter: WhereSchema.optional()
}).strict();

export const CatalogSchema = z.object({
  version: z.string(),
  entities: z.array(z.object({
    name: Identifier,
    primaryKey: Identifier.optional(),
    fields: z.array(z.object({
      name: Identifier,
      type: z.enum(['string','number','boolean','datetime','json']),
      ref: z.object({ entity: Identifier, field: Identifier }).strict().optional()
    }).strict())
  }).strict())
}).strict();

// networks.json
export const NetworksFileSchema = z.object({
  version: z.literal('networks/0.1'),
  catalog: z.string().optional(),          // path relative to the networks file
  nodes: z.array(z.object({
    entity: Identifier,
    table: Identifier.optional(),
    primaryKey: Identifier.optional(),
    hasMany: z.array(HasManyOptionsSchema.extend({ name: Identifier })).default([]),
    networks: z.array(NetworkOptionsSchema.extend({ name: Identifier })).default([]),
    unions: z.array(z.object({ name: Identifier, sources: z.array(Identifier) }).strict()).default([])
  }).strict())
}).strict();
export type NetworksFile = z.infer<typeof NetworksFileSchema>;

// Errors
export const Errors = {
  CONFIG: (msg: string) => ({ code: 'NET_CONFIG', message: msg }),
  NOT_FOUND: (ids: readonly unknown[]) => ({
    code: 'NET_NOT_FOUND',
    message: `Couldn't find all records with ids (${ids.map(String).join(',')})`,
    details: { ids }
  }),
  UNKNOWN: (kind: string, name: string) => ({ code: 'NET_UNKNOWN', message: `Unknown ${kind}: ${name}` }),
  UNSUPPORTED: (msg: string) => ({ code: 'NET_UNSUPPORTED', message: msg })
} as const;

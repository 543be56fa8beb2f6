import { z } from 'zod';

/** Fact records stay loose; alias extraction decides what is usable. */
export const RawFactSchema = z.record(z.string(), z.unknown());

const factArraySchema = z.array(RawFactSchema);

/** A bare array of facts or an object with a `facts` array. */
export const FactListSchema = z
  .union([factArraySchema, z.object({ facts: factArraySchema })])
  .transform(value => (Array.isArray(value) ? value : value.facts));

export const TaxonomySchema = z.object({
  name: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  elements: z.record(z.string(), z.unknown()),
  roles: z.record(z.string(), z.unknown()),
});

export const ExtensionSchemaFile = z.object({
  prefix: z.string().optional(),
  elements: z.array(z.unknown()),
});

export const MapperFileSchema = z.object({
  statements: z.object({
    balance_sheet: FactListSchema.optional(),
    income_statement: FactListSchema.optional(),
    cash_flow: FactListSchema.optional(),
    other: FactListSchema.optional(),
  }).strict(),
  facts: factArraySchema.optional(),
});

export type MapperFile = z.infer<typeof MapperFileSchema>;

/**
 * Per-shape property schema table.
 *
 * Loaded once from `property-schemas.json`, validated, expanded (property
 * groups merged into each shape) and frozen. Shared read-only by every scene.
 */

import { z } from 'zod';
import type { PropertySpec, ShapeKind, ShapeSchema } from '@/types/scene';
import { SHAPE_KINDS } from '@/types/scene';
import type { Value } from '@/types/value';
import { parseHexColor } from '@/features/values/utils/value-model';
import schemaTable from '../data/property-schemas.json';

const hexColorSchema = z.string().refine((hex) => parseHexColor(hex) !== null, {
  message: 'Must be a valid hex color (e.g., #ffffff)',
});

const propertySpecSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('number'),
    default: z.number().optional(),
    animatable: z.boolean().default(true),
  }),
  z.object({
    type: z.literal('point'),
    default: z.tuple([z.number(), z.number()]).optional(),
    animatable: z.boolean().default(true),
  }),
  z.object({
    type: z.literal('color'),
    default: hexColorSchema.optional(),
    animatable: z.boolean().default(true),
  }),
  z.object({
    type: z.literal('text'),
    default: z.string().optional(),
    animatable: z.boolean().default(true),
  }),
]);

type RawPropertySpec = z.infer<typeof propertySpecSchema>;

const propertyMapSchema = z.record(z.string().min(1), propertySpecSchema);

const schemaTableSchema = z
  .object({
    groups: z.record(z.string().min(1), propertyMapSchema),
    shapes: z.record(
      z.string(),
      z.object({
        groups: z.array(z.string()),
        properties: propertyMapSchema,
      })
    ),
  })
  .superRefine((table, ctx) => {
    for (const kind of SHAPE_KINDS) {
      const shape = table.shapes[kind];
      if (!shape) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing schema for shape "${kind}"` });
        continue;
      }
      for (const group of shape.groups) {
        if (!(group in table.groups)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Shape "${kind}" uses unknown property group "${group}"`,
          });
        }
      }
    }
  });

function toDefaultValue(spec: RawPropertySpec): Value | undefined {
  switch (spec.type) {
    case 'number':
      return spec.default === undefined ? undefined : { type: 'number', value: spec.default };
    case 'point':
      return spec.default === undefined
        ? undefined
        : { type: 'point', x: spec.default[0], y: spec.default[1] };
    case 'color':
      return spec.default === undefined ? undefined : (parseHexColor(spec.default) ?? undefined);
    case 'text':
      return spec.default === undefined ? undefined : { type: 'text', value: spec.default };
  }
}

function toPropertySpec(raw: RawPropertySpec): PropertySpec {
  const defaultValue = toDefaultValue(raw);
  const spec: PropertySpec = { type: raw.type, animatable: raw.animatable };
  if (defaultValue) spec.default = Object.freeze(defaultValue);
  return Object.freeze(spec);
}

/**
 * Validate and expand a raw schema table.
 * Later entries override earlier ones: shape-specific properties win over
 * group properties, and later groups win over earlier groups.
 */
export function buildSchemaTable(raw: unknown): ReadonlyMap<ShapeKind, ShapeSchema> {
  const table = schemaTableSchema.parse(raw);
  const result = new Map<ShapeKind, ShapeSchema>();

  for (const kind of SHAPE_KINDS) {
    const shape = table.shapes[kind];
    if (!shape) continue;

    const properties = new Map<string, PropertySpec>();
    for (const group of shape.groups) {
      for (const [name, spec] of Object.entries(table.groups[group] ?? {})) {
        properties.set(name, toPropertySpec(spec));
      }
    }
    for (const [name, spec] of Object.entries(shape.properties)) {
      properties.set(name, toPropertySpec(spec));
    }
    result.set(kind, properties);
  }

  return result;
}

/** Process-wide schema table */
export const PROPERTY_SCHEMAS: ReadonlyMap<ShapeKind, ShapeSchema> = buildSchemaTable(schemaTable);

export function isShapeKind(name: string): name is ShapeKind {
  return (SHAPE_KINDS as readonly string[]).includes(name);
}

/**
 * Get the schema for a shape kind
 */
export function getShapeSchema(kind: ShapeKind): ShapeSchema {
  const schema = PROPERTY_SCHEMAS.get(kind);
  if (!schema) {
    // buildSchemaTable guarantees every kind is present
    throw new Error(`No property schema for shape "${kind}"`);
  }
  return schema;
}

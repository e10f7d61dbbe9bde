/**
 * Zod Validation Schemas for Parse Trees
 *
 * Validates the JSON form of a parsed document before it reaches the scene
 * model builder. Only structure is checked here; shape kinds, property names
 * and value types are checked against the schema table by the builder.
 */

import { z } from 'zod';
import type { ParsedDocument } from '@/types/parse-tree';
import { ParseTreeError } from '@/lib/diagnostics';

// ============================================================================
// Value Schemas
// ============================================================================

const finiteNumber = z.number().finite();

const rawValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('number'), value: finiteNumber }),
  z.object({ kind: z.literal('tuple'), x: finiteNumber, y: finiteNumber }),
  z.object({ kind: z.literal('hex_color'), hex: z.string() }),
  z.object({ kind: z.literal('string'), value: z.string() }),
]);

const timeValueSchema = z.object({
  value: finiteNumber.min(0, 'Times cannot be negative'),
  unit: z.enum(['s', 'ms']),
});

const propertySchema = z.object({
  name: z.string().min(1),
  value: rawValueSchema,
});

// ============================================================================
// Block Schemas
// ============================================================================

const objectSchema = z.object({
  shape: z.string().min(1),
  id: z.string().min(1),
  properties: z.array(propertySchema).default([]),
});

const sceneSchema = z.object({
  name: z.string().min(1),
  duration: timeValueSchema.optional(),
  objects: z.array(objectSchema).default([]),
});

const animationSchema = z.object({
  start: timeValueSchema,
  end: timeValueSchema.optional(),
  target: z.string().min(1),
  property: z.string().min(1),
  to: rawValueSchema,
  easing: z.string().min(1).optional(),
});

const timelineSchema = z.object({
  scene: z.string().min(1),
  animations: z.array(animationSchema).default([]),
});

const cameraSchema = z.object({
  properties: z.array(propertySchema).default([]),
});

export const documentSchema: z.ZodType<ParsedDocument, z.ZodTypeDef, unknown> = z.object({
  camera: cameraSchema.optional(),
  scenes: z.array(sceneSchema),
  timelines: z.array(timelineSchema).default([]),
});

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Format Zod errors into human-readable messages
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path ? `${path}: ` : ''}${issue.message}`;
  });
}

/**
 * Validate a parse tree given as JSON-compatible data.
 * @throws ParseTreeError listing every structural problem
 */
export function parseDocumentTree(data: unknown): ParsedDocument {
  const result = documentSchema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = formatValidationErrors(result.error);
  throw new ParseTreeError(`Invalid parse tree: ${issues.length} problem(s)\n${issues.join('\n')}`, issues);
}

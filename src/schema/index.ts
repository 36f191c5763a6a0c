/**
 * Profile Schema Module
 *
 * Declares the sections and fields a company profile may contain, compiles
 * each field's declared shape to a zod validator, and produces the
 * versioned schema description handed to extraction capabilities.
 */

import { z } from 'zod';
import { ResearchError } from '../errors/index.js';
import { deepFreeze } from '../profile/index.js';
import type { JsonValue } from '../types/index.js';
import defaultSchemaDefinition from './default-schema.json';

// ============================================================================
// Field Shapes
// ============================================================================

/**
 * Declared shape of a profile field (tagged by `type`)
 */
export type FieldShape =
  | { type: 'string'; description?: string }
  | { type: 'number'; description?: string; minimum?: number; maximum?: number; integer?: boolean }
  | { type: 'boolean'; description?: string }
  | { type: 'enum'; description?: string; values: string[] }
  | { type: 'array'; description?: string; items: FieldShape; maxItems?: number }
  | { type: 'object'; description?: string; properties: Record<string, FieldShape> };

const description = z.string().optional();

const FieldShapeSchema: z.ZodType<FieldShape> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('string'), description }),
    z.object({
      type: z.literal('number'),
      description,
      minimum: z.number().optional(),
      maximum: z.number().optional(),
      integer: z.boolean().optional(),
    }),
    z.object({ type: z.literal('boolean'), description }),
    z.object({ type: z.literal('enum'), description, values: z.array(z.string().min(1)).min(1) }),
    z.object({
      type: z.literal('array'),
      description,
      items: FieldShapeSchema,
      maxItems: z.number().int().positive().optional(),
    }),
    z.object({ type: z.literal('object'), description, properties: z.record(FieldShapeSchema) }),
  ])
);

const SectionSchema = z.object({
  key: z.string().regex(/^[a-z][a-z0-9_]*$/, 'section keys are lower snake case'),
  label: z.string().min(1),
  description: z.string().default(''),
  required: z.boolean().default(true),
  weight: z.number().positive().default(1),
  queryHints: z.array(z.string().min(1)).default([]),
  fields: z.record(FieldShapeSchema).refine((fields) => Object.keys(fields).length > 0, {
    message: 'a section declares at least one field',
  }),
  /** Sections whose score blends in advertising-intelligence confidence */
  advertisingSignal: z.object({
    weight: z.number().min(0).max(1).default(0.2),
    fallbackConfidence: z.number().min(0).max(1).default(0.5),
  }).optional(),
});

const ProfileSchemaSchema = z.object({
  version: z.string().min(1),
  sections: z.array(SectionSchema).min(1),
}).superRefine((schema, ctx) => {
  const seen = new Set<string>();
  for (const section of schema.sections) {
    if (seen.has(section.key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate section key: ${section.key}` });
    }
    seen.add(section.key);
  }
});

export type SectionDefinition = z.output<typeof SectionSchema>;
export type ProfileSchema = Readonly<z.output<typeof ProfileSchemaSchema>>;
export type ProfileSchemaInput = z.input<typeof ProfileSchemaSchema>;

/**
 * Versioned, serializable description passed to extraction capabilities
 */
export interface SchemaDescription {
  version: string;
  sections: Array<{
    key: string;
    label: string;
    description: string;
    required: boolean;
    fields: Record<string, FieldShape>;
  }>;
}

// ============================================================================
// Definition
// ============================================================================

/**
 * Validate and freeze a schema definition
 *
 * @throws ResearchError (CONFIG_INVALID) when the definition is malformed
 */
export function parseSchema(definition: unknown): ProfileSchema {
  const result = ProfileSchemaSchema.safeParse(definition);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ResearchError('CONFIG_INVALID', `Invalid profile schema: ${errors.join('; ')}`, { details: errors });
  }
  return deepFreeze(result.data);
}

export function defineSchema(definition: ProfileSchemaInput): ProfileSchema {
  return parseSchema(definition);
}

let defaultSchema: ProfileSchema | null = null;

/**
 * The built-in marketing profile schema
 */
export function loadDefaultSchema(): ProfileSchema {
  if (!defaultSchema) {
    defaultSchema = parseSchema(defaultSchemaDefinition);
  }
  return defaultSchema;
}

export function getSection(schema: ProfileSchema, key: string): SectionDefinition | undefined {
  return schema.sections.find((section) => section.key === key);
}

/**
 * `section.field` paths declared by the schema, in declaration order
 */
export function declaredPaths(schema: ProfileSchema): string[] {
  return schema.sections.flatMap((section) => Object.keys(section.fields).map((field) => `${section.key}.${field}`));
}

export function describeSchema(schema: ProfileSchema): SchemaDescription {
  return {
    version: schema.version,
    sections: schema.sections.map((section) => ({
      key: section.key,
      label: section.label,
      description: section.description,
      required: section.required,
      fields: section.fields,
    })),
  };
}

// ============================================================================
// Shape Validation
// ============================================================================

type JsonValidator = z.ZodType<JsonValue, z.ZodTypeDef, unknown>;

const validatorCache = new WeakMap<FieldShape, JsonValidator>();

function isDefined(entry: [string, JsonValue | undefined]): entry is [string, JsonValue] {
  return entry[1] !== undefined;
}

function compileShape(shape: FieldShape): JsonValidator {
  const cached = validatorCache.get(shape);
  if (cached) {
    return cached;
  }

  let validator: JsonValidator;
  switch (shape.type) {
    case 'string':
      validator = z.string();
      break;
    case 'number': {
      let num = z.number().finite();
      if (shape.integer) {
        num = num.int();
      }
      if (shape.minimum !== undefined) {
        num = num.min(shape.minimum);
      }
      if (shape.maximum !== undefined) {
        num = num.max(shape.maximum);
      }
      validator = num;
      break;
    }
    case 'boolean':
      validator = z.boolean();
      break;
    case 'enum': {
      const allowed = shape.values;
      validator = z.string().refine((value) => allowed.includes(value), {
        message: `expected one of: ${allowed.join(', ')}`,
      });
      break;
    }
    case 'array': {
      const items = z.array(compileShape(shape.items));
      validator = shape.maxItems !== undefined ? items.max(shape.maxItems) : items;
      break;
    }
    case 'object': {
      const properties: Record<string, JsonValidator> = {};
      for (const [key, child] of Object.entries(shape.properties)) {
        properties[key] = compileShape(child);
      }
      validator = z
        .object(properties)
        .partial()
        .transform((value): Record<string, JsonValue> => Object.fromEntries(Object.entries(value).filter(isDefined)));
      break;
    }
  }

  validatorCache.set(shape, validator);
  return validator;
}

export type ShapeCheck =
  | { ok: true; value: JsonValue }
  | { ok: false; message: string };

/**
 * Check a value against a declared field shape. Unknown keys inside nested
 * objects are stripped; any other mismatch rejects the whole value.
 */
export function checkShape(shape: FieldShape, value: unknown): ShapeCheck {
  const result = compileShape(shape).safeParse(value);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  const issue = result.error.errors[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return { ok: false, message: `${issue?.message ?? 'invalid value'}${where}` };
}

export default {
  defineSchema,
  parseSchema,
  loadDefaultSchema,
  describeSchema,
  declaredPaths,
  getSection,
  checkShape,
};

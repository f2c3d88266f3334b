/**
 * Zod schemas for resource definitions.
 *
 * @module schema/validation
 * @category Schema
 */

import { z } from 'zod';
import { ResourceDefinitionError } from '../errors';

// ============================================================================
// Zod Schemas for Definition Validation
// ============================================================================

const IDENTIFIER = /^[_A-Za-z][_0-9A-Za-z]*$/;

const ScalarTypeSchema = z.enum(['id', 'string', 'int', 'float', 'boolean']);

export const HandlerParameterSchema = z.object({
  name: z.string().regex(IDENTIFIER, 'must be a valid GraphQL name'),
  type: ScalarTypeSchema,
  list: z.boolean(),
  required: z.boolean(),
  default: z.union([z.string(), z.number(), z.boolean(), z.array(z.union([z.string(), z.number()]))]).optional(),
  description: z.string().optional(),
}).strict();

export const HandlerSchema = z.object({
  name: z.string().regex(IDENTIFIER, 'must be a valid GraphQL name'),
  kind: z.enum(['GET', 'MULTI_GET', 'FINDER', 'SINGLE_ELEMENT_FINDER', 'UNKNOWN']),
  parameters: z.array(HandlerParameterSchema),
}).strict();

const ScalarFieldSchema = z.object({
  type: ScalarTypeSchema,
  list: z.boolean(),
  nullable: z.boolean(),
  description: z.string().optional(),
}).strict();

const RelationSpecSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('forward'),
    target: z.string().min(1),
  }).strict(),
  z.object({
    kind: z.literal('reverse'),
    relationType: z.enum(['FINDER', 'MULTI_GET', 'GET', 'SINGLE_ELEMENT_FINDER', 'UNKNOWN']),
    arguments: z.record(z.string(), z.string()),
  }).strict(),
]);

const RelationFieldSchema = z.object({
  target: z.string().regex(/^.+\.v\d+$/, "must be a resource key such as 'courses.v1'"),
  relation: RelationSpecSchema,
  description: z.string().optional(),
}).strict().superRefine((field, ctx) => {
  if (field.relation.kind === 'forward' && field.relation.target !== field.target) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['relation', 'target'],
      message: `must equal the relation field target '${field.target}'`,
    });
  }
});

export const ResourceDescriptorSchema = z.object({
  name: z.string().regex(IDENTIFIER, 'must be a valid GraphQL name'),
  version: z.number().int().nonnegative(),
  handlers: z.array(HandlerSchema).superRefine((handlers, ctx) => {
    const seen = new Set<string>();
    handlers.forEach((h, index) => {
      if (seen.has(h.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `duplicate handler name '${h.name}'`,
        });
      }
      seen.add(h.name);
    });
  }),
  schema: z.object({
    fields: z.record(z.string().regex(IDENTIFIER), ScalarFieldSchema),
    relations: z.record(z.string().regex(IDENTIFIER), RelationFieldSchema),
  }).strict().optional(),
  description: z.string().optional(),
}).strict();

/**
 * Parse `input` with `schema`, throwing a {@link ResourceDefinitionError}
 * that lists every failing path.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, subject: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `${path ? `${path}: ` : ''}${issue.message}`;
    });
    throw new ResourceDefinitionError(subject, issues);
  }
  return result.data;
}

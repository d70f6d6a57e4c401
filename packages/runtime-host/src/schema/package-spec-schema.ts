/**
 * Strata Runtime Host: Package Schema File Validation
 *
 * zod schemas for the JSON package files FilePackageLoader reads. A file
 * that passes is a PackageSpec ready for bindPackage(); `$ref` targets are
 * checked later, by the binder.
 */

import { z } from 'zod';
import type {
  ComplexTypeSpec,
  FunctionSpec,
  PackageSpec,
  PropertySpec,
  ResourceSpec,
} from '@strata/kernel';

const primitiveName = z.enum(['string', 'number', 'integer', 'boolean', 'array', 'object']);

const constant = z.union([z.string(), z.number(), z.boolean()]);

export const propertySpecSchema: z.ZodType<PropertySpec> = z.lazy(() =>
  z.object({
    type: primitiveName.optional(),
    items: propertySpecSchema.optional(),
    additionalProperties: propertySpecSchema.optional(),
    $ref: z.string().optional(),
    oneOf: z.array(propertySpecSchema).optional(),
    const: constant.optional(),
    description: z.string().optional(),
  }),
);

const propertyMap = z.record(z.string(), propertySpecSchema);

const objectSpecSchema = z.object({
  properties: propertyMap.optional(),
  required: z.array(z.string()).optional(),
});

const complexTypeSpecSchema: z.ZodType<ComplexTypeSpec> = objectSpecSchema.extend({
  type: primitiveName,
  enum: z.array(z.object({ name: z.string().optional(), value: constant })).optional(),
  description: z.string().optional(),
});

const resourceSpecSchema: z.ZodType<ResourceSpec> = objectSpecSchema.extend({
  inputProperties: propertyMap.optional(),
  requiredInputs: z.array(z.string()).optional(),
  isComponent: z.boolean().optional(),
  description: z.string().optional(),
});

const functionSpecSchema: z.ZodType<FunctionSpec> = z.object({
  inputs: objectSpecSchema.optional(),
  outputs: objectSpecSchema.optional(),
  returnType: propertySpecSchema.optional(),
  description: z.string().optional(),
});

export const packageSpecSchema: z.ZodType<PackageSpec> = z.object({
  name: z.string().min(1, 'package name is required'),
  version: z.string().optional(),
  resources: z.record(z.string(), resourceSpecSchema).optional(),
  functions: z.record(z.string(), functionSpecSchema).optional(),
  types: z.record(z.string(), complexTypeSpecSchema).optional(),
  provider: resourceSpecSchema.optional(),
});

/** `path.to.field: message; ...`, one entry per zod issue. */
export function formatIssues(issues: ReadonlyArray<z.ZodIssue>): string {
  return issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path === '' ? issue.message : `${path}: ${issue.message}`;
    })
    .join('; ');
}

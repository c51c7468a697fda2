/**
 * Zod schemas for the exported FHIR R4 collection Bundle.
 *
 * Only the resources the export produces are checked in detail; any other
 * resource in `entry` needs just a `resourceType`.
 */

import { z } from 'zod';

const RelatedArtifactSchema = z
  .object({
    type: z.string(),
    display: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const ActionSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().optional(),
  })
  .passthrough();

export const PlanDefinitionSchema = z
  .object({
    resourceType: z.literal('PlanDefinition'),
    id: z.string().min(1),
    title: z.string().min(1),
    status: z.string().default('active'),
    description: z.string().optional(),
    useContext: z.array(z.unknown()).optional(),
    action: z.array(ActionSchema).optional(),
    relatedArtifact: z.array(RelatedArtifactSchema).optional(),
  })
  .passthrough();

export const CarePlanSchema = z
  .object({
    resourceType: z.literal('CarePlan'),
    id: z.string().min(1).default('protocol-recommendations'),
    status: z.string().default('active'),
    intent: z.string().default('plan'),
    title: z.string().default('Imaging Protocol Recommendations'),
    description: z.string().default('Recommendations for imaging protocol selection and supportive care.'),
    activity: z
      .array(z.object({ detail: z.object({ description: z.string() }).passthrough() }).passthrough())
      .default([]),
    note: z.array(z.object({ text: z.string() }).passthrough()).default([]),
  })
  .passthrough();

const OtherResourceSchema = z
  .object({ resourceType: z.string().min(1) })
  .passthrough()
  .refine((r) => r.resourceType !== 'CarePlan' && r.resourceType !== 'PlanDefinition');

export const ResourceSchema = z.union([CarePlanSchema, PlanDefinitionSchema, OtherResourceSchema]);

export const BundleSchema = z
  .object({
    resourceType: z.literal('Bundle').default('Bundle'),
    type: z.literal('collection').default('collection'),
    entry: z.array(z.object({ resource: ResourceSchema }).passthrough()),
  })
  .passthrough();

export type Bundle = z.infer<typeof BundleSchema>;
export type CarePlan = z.infer<typeof CarePlanSchema>;
export type PlanDefinition = z.infer<typeof PlanDefinitionSchema>;

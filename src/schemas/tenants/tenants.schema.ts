import { z } from 'zod'

const RETENTION_PATTERN = /^[0-9]+(d|h|w|m|y)$/

const retentionDuration = z
  .string()
  .regex(RETENTION_PATTERN, 'Retention must look like 30d, 24h, 1w, 6m or 1y')

export const RetentionPolicySchema = z.object({
  logs: retentionDuration.optional(),
  metrics: retentionDuration.optional(),
  traces: retentionDuration.optional(),
  profiles: retentionDuration.optional(),
})

export const TenantParametersSchema = z.object({
  tenantId: z.string().min(1, 'tenantId is required'),
  orgId: z.string().min(1, 'orgId is required'),
  admins: z.array(z.string()).optional(),
  viewerGroups: z.array(z.string().min(1)).optional(),
  editorGroups: z.array(z.string().min(1)).optional(),
  adminGroups: z.array(z.string().min(1)).optional(),
  retention: RetentionPolicySchema,
})

// Stored values are trusted verbatim: retention is opaque to the reconciler
export const StoredTenantParametersSchema = TenantParametersSchema.extend({
  retention: z.object({
    logs: z.string().optional(),
    metrics: z.string().optional(),
    traces: z.string().optional(),
    profiles: z.string().optional(),
  }),
})

export const TenantObservationSchema = z.object({
  tenantId: z.string(),
  orgId: z.string(),
  admins: z.array(z.string()),
  viewerGroups: z.array(z.string()),
  editorGroups: z.array(z.string()),
  adminGroups: z.array(z.string()).default([]),
  retention: StoredTenantParametersSchema.shape.retention,
  lastUpdated: z.string(),
})

export const TenantConditionsSchema = z.object({
  ready: z.enum(['Available', 'Creating', 'Deleting', 'ReconcileError']),
  message: z.string().nullable(),
  lastReconciledAt: z.string().nullable(),
})

export const TenantResponseSchema = z.object({
  kind: z.literal('Tenant'),
  uid: z.string(),
  name: z.string(),
  spec: StoredTenantParametersSchema,
  status: z.object({
    atProvider: TenantObservationSchema.nullable(),
    conditions: TenantConditionsSchema,
  }),
  deletionRequestedAt: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
})

export const TenantNameParamsSchema = z.object({
  name: z.string().min(1),
})

export const CreateTenantSchema = z.object({
  name: z
    .string()
    .min(1, 'Name is required')
    .max(253, 'Name must be at most 253 characters')
    .regex(
      /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/,
      'Name must be lower case alphanumeric, "-" or "."',
    ),
  spec: TenantParametersSchema,
})

export const UpdateTenantSchema = z.object({
  spec: TenantParametersSchema,
})

export const GetTenantsResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  tenants: z.array(TenantResponseSchema),
})

export const TenantStateSchema = z.enum(['Absent', 'ExistsNotSynced', 'Synced'])

export const TenantMutationResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  tenant: TenantResponseSchema.nullable(),
  state: TenantStateSchema.nullable(),
})

export type TenantResponse = z.infer<typeof TenantResponseSchema>
export type TenantMutationResponse = z.infer<typeof TenantMutationResponseSchema>

import { z } from 'zod'

export const OrgMappingEntrySchema = z.object({
  subject: z.string(),
  orgId: z.string(),
  role: z.enum(['Viewer', 'Editor', 'Admin']),
})

export const OrgMappingResponseSchema = z.object({
  success: z.boolean(),
  orgMapping: z.string(),
  entries: z.array(OrgMappingEntrySchema),
  tenantCount: z.number(),
})

export type OrgMappingResponse = z.infer<typeof OrgMappingResponseSchema>

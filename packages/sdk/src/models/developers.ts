/**
 * The developer account that owns the API key
 */

import { z } from 'zod'
import { DocumentSchema, PermissionLevelSchema } from './common'

export const DeveloperCompanyPermissionSchema = z.object({
  company_id: z.string(),
  name: z.string().nullable(),
  permission: PermissionLevelSchema,
})
export type DeveloperCompanyPermission = z.infer<typeof DeveloperCompanyPermissionSchema>

export const MeDeveloperSchema = DocumentSchema.extend({
  username: z.string(),
  email: z.string(),
  key_generated: z.coerce.date().nullable(),
  companies: z.array(DeveloperCompanyPermissionSchema),
})
export type MeDeveloper = z.infer<typeof MeDeveloperSchema>

/**
 * Returned once, right after a key is regenerated
 */
export const MeDeveloperWithApiKeySchema = MeDeveloperSchema.extend({
  api_key: z.string(),
})
export type MeDeveloperWithApiKey = z.infer<typeof MeDeveloperWithApiKeySchema>

export const UpdateMeDeveloperRequestSchema = z.object({
  username: z.string().optional(),
  email: z.string().email().optional(),
})
export type UpdateMeDeveloperRequest = z.input<typeof UpdateMeDeveloperRequestSchema>

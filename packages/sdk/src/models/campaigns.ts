import { z } from 'zod'
import { DocumentSchema } from './common'

/** Desperation and danger run from 0 to 5 */
const trackLevel = z.number().int().min(0).max(5)

export const CampaignSchema = DocumentSchema.extend({
  name: z.string(),
  description: z.string().nullish(),
  asset_ids: z.array(z.string()).default([]),
  desperation: z.number().int().default(0),
  danger: z.number().int().default(0),
  company_id: z.string(),
})
export type Campaign = z.infer<typeof CampaignSchema>

export const CreateCampaignRequestSchema = z.object({
  name: z.string().min(3).max(50),
  description: z.string().min(3).optional(),
  asset_ids: z.array(z.string()).optional(),
  desperation: trackLevel.optional(),
  danger: trackLevel.optional(),
})
export type CreateCampaignRequest = z.input<typeof CreateCampaignRequestSchema>

export const UpdateCampaignRequestSchema = z.object({
  name: z.string().min(3).max(50).optional(),
  description: z.string().min(3).optional(),
  asset_ids: z.array(z.string()).optional(),
  desperation: trackLevel.optional(),
  danger: trackLevel.optional(),
})
export type UpdateCampaignRequest = z.input<typeof UpdateCampaignRequestSchema>

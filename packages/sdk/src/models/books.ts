/**
 * Books of a campaign and the chapters inside them
 */

import { z } from 'zod'
import { DocumentSchema } from './common'

const name = z.string().min(3).max(50)
const description = z.string().min(3)

export const CampaignBookSchema = DocumentSchema.extend({
  name: z.string(),
  description: z.string().nullish(),
  asset_ids: z.array(z.string()).default([]),
  number: z.number().int(),
  campaign_id: z.string(),
})
export type CampaignBook = z.infer<typeof CampaignBookSchema>

export const CreateBookRequestSchema = z.object({
  name,
  description: description.optional(),
})
export type CreateBookRequest = z.input<typeof CreateBookRequestSchema>

export const UpdateBookRequestSchema = z.object({
  name: name.optional(),
  description: description.optional(),
})
export type UpdateBookRequest = z.input<typeof UpdateBookRequestSchema>

export const CampaignChapterSchema = DocumentSchema.extend({
  name: z.string(),
  description: z.string().nullish(),
  asset_ids: z.array(z.string()).default([]),
  number: z.number().int(),
  book_id: z.string(),
})
export type CampaignChapter = z.infer<typeof CampaignChapterSchema>

export const CreateChapterRequestSchema = CreateBookRequestSchema
export type CreateChapterRequest = CreateBookRequest

export const UpdateChapterRequestSchema = UpdateBookRequestSchema
export type UpdateChapterRequest = UpdateBookRequest

/** Position of a book in its campaign, or of a chapter in its book */
export const RenumberRequestSchema = z.object({
  number: z.number().int().min(1),
})

/**
 * Users belong to a company and collect experience per campaign
 */

import { z } from 'zod'
import { DocumentSchema, UserRoleSchema } from './common'

export const DiscordProfileSchema = z.object({
  id: z.string().nullish(),
  username: z.string().nullish(),
  global_name: z.string().nullish(),
  avatar_id: z.string().nullish(),
  avatar_url: z.string().nullish(),
  discriminator: z.string().nullish(),
  email: z.string().nullish(),
  verified: z.boolean().nullish(),
})
export type DiscordProfile = z.infer<typeof DiscordProfileSchema>

export const CampaignExperienceSchema = z.object({
  campaign_id: z.string(),
  xp_current: z.number().int().default(0),
  xp_total: z.number().int().default(0),
  cool_points: z.number().int().default(0),
})
export type CampaignExperience = z.infer<typeof CampaignExperienceSchema>

export const UserSchema = DocumentSchema.extend({
  name_first: z.string().nullish(),
  name_last: z.string().nullish(),
  username: z.string(),
  email: z.string(),
  role: UserRoleSchema.nullish(),
  company_id: z.string(),
  discord_profile: DiscordProfileSchema.nullish(),
  campaign_experience: z.array(CampaignExperienceSchema).default([]),
  asset_ids: z.array(z.string()).default([]),
})
export type User = z.infer<typeof UserSchema>

const personName = z.string().min(3).max(50)

export const CreateUserRequestSchema = z.object({
  name_first: personName.optional(),
  name_last: personName.optional(),
  username: z.string().min(3).max(50),
  email: z.string().email(),
  role: UserRoleSchema,
  discord_profile: DiscordProfileSchema.optional(),
  requesting_user_id: z.string().min(1),
})
export type CreateUserRequest = z.input<typeof CreateUserRequestSchema>

export const UpdateUserRequestSchema = z.object({
  name_first: personName.optional(),
  name_last: personName.optional(),
  username: z.string().min(3).max(50).optional(),
  email: z.string().email().optional(),
  role: UserRoleSchema.optional(),
  discord_profile: DiscordProfileSchema.optional(),
  requesting_user_id: z.string().min(1),
})
export type UpdateUserRequest = z.input<typeof UpdateUserRequestSchema>

/**
 * Body of the xp and cool point endpoints
 */
export const ExperienceAmountRequestSchema = z.object({
  amount: z.number().int().positive(),
  campaign_id: z.string().min(1),
  requesting_user_id: z.string().min(1),
})
export type ExperienceAmountRequest = z.input<typeof ExperienceAmountRequestSchema>

import { z } from 'zod'
import {
  DocumentSchema,
  FreeTraitChangesPermissionSchema,
  GrantXPPermissionSchema,
  ManageCampaignPermissionSchema,
  PermissionLevelSchema,
} from './common'
import { UserSchema } from './users'

export const CompanySettingsSchema = z.object({
  character_autogen_xp_cost: z.number().int().nullish(),
  character_autogen_num_choices: z.number().int().nullish(),
  permission_manage_campaign: ManageCampaignPermissionSchema.nullish(),
  permission_grant_xp: GrantXPPermissionSchema.nullish(),
  permission_free_trait_changes: FreeTraitChangesPermissionSchema.nullish(),
})
export type CompanySettings = z.infer<typeof CompanySettingsSchema>

export const CompanySchema = DocumentSchema.extend({
  name: z.string(),
  description: z.string().nullable(),
  email: z.string(),
  user_ids: z.array(z.string()),
  settings: CompanySettingsSchema.nullable(),
})
export type Company = z.infer<typeof CompanySchema>

export const CompanyPermissionsSchema = z.object({
  company_id: z.string(),
  name: z.string().nullable(),
  permission: PermissionLevelSchema,
})
export type CompanyPermissions = z.infer<typeof CompanyPermissionsSchema>

/**
 * A new company comes with its first admin user
 */
export const NewCompanyResponseSchema = z.object({
  company: CompanySchema,
  admin_user: UserSchema,
})
export type NewCompanyResponse = z.infer<typeof NewCompanyResponseSchema>

const companyName = z.string().min(3).max(50)

export const CreateCompanyRequestSchema = z.object({
  name: companyName,
  email: z.string().email(),
  description: z.string().min(3).optional(),
  settings: CompanySettingsSchema.optional(),
})
export type CreateCompanyRequest = z.input<typeof CreateCompanyRequestSchema>

export const UpdateCompanyRequestSchema = z.object({
  name: companyName.optional(),
  email: z.string().email().optional(),
  description: z.string().min(3).optional(),
  settings: CompanySettingsSchema.optional(),
})
export type UpdateCompanyRequest = z.input<typeof UpdateCompanyRequestSchema>

export const GrantAccessRequestSchema = z.object({
  developer_id: z.string().min(1),
  permission: PermissionLevelSchema,
})
export type GrantAccessRequest = z.input<typeof GrantAccessRequestSchema>

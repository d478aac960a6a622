/**
 * Value sets and sub-records shared across resources
 */

import { z } from 'zod'

export const CharacterClassSchema = z.enum(['VAMPIRE', 'WEREWOLF', 'MAGE', 'HUNTER', 'GHOUL', 'MORTAL'])
export const CharacterTypeSchema = z.enum(['PLAYER', 'NPC', 'STORYTELLER', 'DEVELOPER'])
export const CharacterStatusSchema = z.enum(['ALIVE', 'DEAD'])
export const GameVersionSchema = z.enum(['V4', 'V5'])
export const UserRoleSchema = z.enum(['ADMIN', 'STORYTELLER', 'PLAYER'])
export const PermissionLevelSchema = z.enum(['USER', 'ADMIN', 'OWNER', 'REVOKE'])
export const ManageCampaignPermissionSchema = z.enum(['UNRESTRICTED', 'STORYTELLER'])
export const GrantXPPermissionSchema = z.enum(['UNRESTRICTED', 'PLAYER', 'STORYTELLER'])
export const FreeTraitChangesPermissionSchema = z.enum(['UNRESTRICTED', 'WITHIN_24_HOURS', 'STORYTELLER'])
export const AssetTypeSchema = z.enum(['image', 'text', 'audio', 'video', 'document', 'archive', 'other'])
export const AssetParentTypeSchema = z.enum([
  'character',
  'campaign',
  'campaignbook',
  'campaignchapter',
  'user',
  'company',
  'unknown',
])

export type CharacterClass = z.infer<typeof CharacterClassSchema>
export type CharacterType = z.infer<typeof CharacterTypeSchema>
export type CharacterStatus = z.infer<typeof CharacterStatusSchema>
export type GameVersion = z.infer<typeof GameVersionSchema>
export type UserRole = z.infer<typeof UserRoleSchema>
export type PermissionLevel = z.infer<typeof PermissionLevelSchema>
export type AssetType = z.infer<typeof AssetTypeSchema>
export type AssetParentType = z.infer<typeof AssetParentTypeSchema>

/**
 * Fields every stored document carries
 */
export const DocumentSchema = z.object({
  id: z.string(),
  date_created: z.coerce.date(),
  date_modified: z.coerce.date(),
})

/**
 * A stored file
 */
export const AssetSchema = DocumentSchema.extend({
  asset_type: AssetTypeSchema,
  mime_type: z.string(),
  original_filename: z.string(),
  public_url: z.string(),
  uploaded_by: z.string(),
  company_id: z.string(),
  parent_type: AssetParentTypeSchema.nullish(),
  parent_id: z.string().nullish(),
})
export type Asset = z.infer<typeof AssetSchema>

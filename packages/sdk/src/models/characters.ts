/**
 * Player and non-player characters of a campaign
 */

import { z } from 'zod'
import {
  CharacterClassSchema,
  CharacterStatusSchema,
  CharacterTypeSchema,
  DocumentSchema,
  GameVersionSchema,
} from './common'

export const CharacterSpecialtySchema = z.object({
  id: z.string().nullish(),
  name: z.string(),
  trait_id: z.string().nullish(),
})
export type CharacterSpecialty = z.infer<typeof CharacterSpecialtySchema>

export const VampireAttributesSchema = z.object({
  clan_id: z.string().nullish(),
  clan_name: z.string().nullish(),
  generation: z.number().int().nullish(),
  sire: z.string().nullish(),
  bane: z.record(z.unknown()).nullish(),
  compulsion: z.record(z.unknown()).nullish(),
})

export const WerewolfAttributesSchema = z.object({
  tribe_id: z.string().nullish(),
  tribe_name: z.string().nullish(),
  auspice_id: z.string().nullish(),
  auspice_name: z.string().nullish(),
  pack_name: z.string().nullish(),
})

export const MageAttributesSchema = z.object({
  sphere: z.string().nullish(),
})

export const HunterEdgeSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  pool: z.string().nullish(),
  system: z.string().nullish(),
  type: z.string().nullish(),
  perks: z
    .array(z.object({ id: z.string(), name: z.string(), description: z.string().nullish() }))
    .default([]),
})

export const HunterAttributesSchema = z.object({
  creed: z.string().nullish(),
  edges: z.array(HunterEdgeSchema).default([]),
})

export const CharacterSchema = DocumentSchema.extend({
  date_killed: z.coerce.date().nullish(),
  character_class: CharacterClassSchema,
  type: CharacterTypeSchema.default('PLAYER'),
  game_version: GameVersionSchema,
  status: CharacterStatusSchema.default('ALIVE'),
  starting_points: z.number().int().default(0),
  name_first: z.string(),
  name_last: z.string(),
  name_nick: z.string().nullish(),
  name: z.string(),
  name_full: z.string(),
  age: z.number().int().nullish(),
  biography: z.string().nullish(),
  demeanor: z.string().nullish(),
  nature: z.string().nullish(),
  concept_id: z.string().nullish(),
  user_creator_id: z.string(),
  user_player_id: z.string(),
  company_id: z.string(),
  campaign_id: z.string(),
  asset_ids: z.array(z.string()).default([]),
  character_trait_ids: z.array(z.string()).default([]),
  specialties: z.array(CharacterSpecialtySchema).default([]),
  vampire_attributes: VampireAttributesSchema.nullish(),
  werewolf_attributes: WerewolfAttributesSchema.nullish(),
  mage_attributes: MageAttributesSchema.nullish(),
  hunter_attributes: HunterAttributesSchema.nullish(),
})
export type Character = z.infer<typeof CharacterSchema>

const characterName = z.string().min(3)

export const CreateCharacterRequestSchema = z.object({
  character_class: CharacterClassSchema,
  game_version: GameVersionSchema,
  name_first: characterName,
  name_last: characterName,
  type: CharacterTypeSchema.optional(),
  name_nick: z.string().min(3).max(50).optional(),
  age: z.number().int().min(0).optional(),
  biography: z.string().min(3).optional(),
  demeanor: z.string().min(3).max(50).optional(),
  nature: z.string().min(3).max(50).optional(),
  concept_id: z.string().optional(),
  user_player_id: z.string().optional(),
  asset_ids: z.array(z.string()).optional(),
  vampire_attributes: VampireAttributesSchema.optional(),
  werewolf_attributes: WerewolfAttributesSchema.optional(),
  mage_attributes: MageAttributesSchema.optional(),
  hunter_attributes: HunterAttributesSchema.optional(),
})
export type CreateCharacterRequest = z.input<typeof CreateCharacterRequestSchema>

export const UpdateCharacterRequestSchema = CreateCharacterRequestSchema.partial().extend({
  status: CharacterStatusSchema.optional(),
  date_killed: z.coerce.date().optional(),
})
export type UpdateCharacterRequest = z.input<typeof UpdateCharacterRequestSchema>

/**
 * Query filters of the character list endpoint
 */
export interface CharacterListFilters {
  userPlayerId?: string
  userCreatorId?: string
  characterClass?: z.infer<typeof CharacterClassSchema>
  characterType?: z.infer<typeof CharacterTypeSchema>
  status?: z.infer<typeof CharacterStatusSchema>
}

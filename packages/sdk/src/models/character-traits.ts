/**
 * Traits and the values a character holds in them
 */

import { z } from 'zod'
import { CharacterClassSchema, DocumentSchema, GameVersionSchema } from './common'

const dotRange = z.number().int().min(0).max(100)

export const TraitSchema = DocumentSchema.extend({
  name: z.string(),
  description: z.string().nullish(),
  link: z.string().nullish(),
  show_when_zero: z.boolean().default(true),
  max_value: z.number().int().default(5),
  min_value: z.number().int().default(0),
  is_custom: z.boolean().default(false),
  initial_cost: z.number().int().default(1),
  upgrade_cost: z.number().int().default(2),
  sheet_section_name: z.string().nullish(),
  sheet_section_id: z.string().nullish(),
  parent_category_name: z.string().nullish(),
  parent_category_id: z.string(),
  custom_for_character_id: z.string().nullish(),
  advantage_category_id: z.string().nullish(),
  advantage_category_name: z.string().nullish(),
  character_classes: z.array(CharacterClassSchema).default([]),
  game_versions: z.array(GameVersionSchema).default([]),
})
export type Trait = z.infer<typeof TraitSchema>

export const CharacterTraitSchema = z.object({
  id: z.string(),
  character_id: z.string(),
  value: z.number().int(),
  trait: TraitSchema,
})
export type CharacterTrait = z.infer<typeof CharacterTraitSchema>

export const AssignCharacterTraitRequestSchema = z.object({
  trait_id: z.string().min(1),
  value: z.number().int(),
})
export type AssignCharacterTraitRequest = z.input<typeof AssignCharacterTraitRequestSchema>

/**
 * A custom trait that exists only on this character
 */
export const CreateCharacterTraitRequestSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  max_value: dotRange.default(5),
  min_value: dotRange.default(0),
  show_when_zero: z.boolean().default(true),
  parent_category_id: z.string().min(1),
  initial_cost: z.number().int().optional(),
  upgrade_cost: z.number().int().optional(),
  value: z.number().int().optional(),
})
export type CreateCharacterTraitRequest = z.input<typeof CreateCharacterTraitRequestSchema>

export const TraitValueChangeRequestSchema = z.object({
  num_dots: z.number().int().positive(),
})

export interface CharacterTraitListFilters {
  parentCategoryId?: string
}

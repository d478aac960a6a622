/**
 * Dice rolls and their results
 */

import { z } from 'zod'
import { DocumentSchema } from './common'

export const DiceSizeSchema = z.union([
  z.literal(2),
  z.literal(4),
  z.literal(6),
  z.literal(8),
  z.literal(10),
  z.literal(20),
  z.literal(100),
])
export type DiceSize = z.infer<typeof DiceSizeSchema>

export const RollResultTypeSchema = z.enum(['SUCCESS', 'FAILURE', 'BOTCH', 'CRITICAL', 'MESSY_CRITICAL', 'OTHER'])
export type RollResultType = z.infer<typeof RollResultTypeSchema>

export const DicerollResultSchema = z.object({
  total_result: z.number().int().nullish(),
  total_result_type: RollResultTypeSchema,
  total_result_humanized: z.string(),
  total_dice_roll: z.array(z.number().int()).default([]),
  player_roll: z.array(z.number().int()).default([]),
  desperation_roll: z.array(z.number().int()).default([]),
  total_dice_roll_emoji: z.string(),
  total_dice_roll_shortcode: z.string(),
  player_roll_emoji: z.string(),
  player_roll_shortcode: z.string(),
  desperation_roll_emoji: z.string(),
  desperation_roll_shortcode: z.string(),
})
export type DicerollResult = z.infer<typeof DicerollResultSchema>

export const DicerollSchema = DocumentSchema.extend({
  dice_size: DiceSizeSchema,
  difficulty: z.number().int().nullish(),
  num_dice: z.number().int(),
  num_desperation_dice: z.number().int().default(0),
  comment: z.string().nullish(),
  trait_ids: z.array(z.string()).default([]),
  user_id: z.string().nullish(),
  character_id: z.string().nullish(),
  campaign_id: z.string().nullish(),
  company_id: z.string(),
  result: DicerollResultSchema.nullish(),
})
export type Diceroll = z.infer<typeof DicerollSchema>

export const CreateDicerollRequestSchema = z.object({
  dice_size: DiceSizeSchema,
  difficulty: z.number().int().min(0).optional(),
  num_dice: z.number().int().min(1),
  num_desperation_dice: z.number().int().min(0).optional(),
  comment: z.string().optional(),
  trait_ids: z.array(z.string()).optional(),
  character_id: z.string().optional(),
  campaign_id: z.string().optional(),
})
export type CreateDicerollRequest = z.input<typeof CreateDicerollRequestSchema>

export const QuickrollDicerollRequestSchema = z.object({
  quickroll_id: z.string().min(1),
  character_id: z.string().min(1),
  comment: z.string().optional(),
  difficulty: z.number().int().min(0).optional(),
  num_desperation_dice: z.number().int().min(0).optional(),
})
export type QuickrollDicerollRequest = z.input<typeof QuickrollDicerollRequestSchema>

/**
 * Query filters of the dice roll list endpoint
 */
export interface DicerollListFilters {
  userId?: string
  characterId?: string
  campaignId?: string
}

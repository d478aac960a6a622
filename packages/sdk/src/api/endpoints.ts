/**
 * API endpoint definitions for the Chronicle REST API
 */

import { API_ENDPOINTS } from '../core/constants'

/**
 * Substitute `{name}` placeholders in a path template, URL-encoding each value
 */
export function buildPath(template: string, params: Record<string, string> = {}): string {
  let path = template
  for (const [key, value] of Object.entries(params)) {
    path = path.replace(`{${key}}`, encodeURIComponent(value))
  }
  return path
}

export interface BookScope {
  companyId: string
  userId: string
  campaignId: string
  bookId: string
}

export interface CharacterScope {
  companyId: string
  userId: string
  campaignId: string
  characterId: string
}

/** Ways of moving a character trait's value */
export type TraitValueChange =
  | 'increase'
  | 'decrease'
  | 'xpPurchase'
  | 'xpRefund'
  | 'startingPointsPurchase'
  | 'startingPointsRefund'

const TRAIT_CHANGE_ENDPOINTS = {
  increase: 'INCREASE',
  decrease: 'DECREASE',
  xpPurchase: 'XP_PURCHASE',
  xpRefund: 'XP_REFUND',
  startingPointsPurchase: 'STARTING_POINTS_PURCHASE',
  startingPointsRefund: 'STARTING_POINTS_REFUND',
} as const satisfies Record<TraitValueChange, keyof typeof API_ENDPOINTS.CHARACTER_TRAIT>

function bookParams(scope: BookScope): Record<string, string> {
  return {
    company_id: scope.companyId,
    user_id: scope.userId,
    campaign_id: scope.campaignId,
    book_id: scope.bookId,
  }
}

function characterParams(scope: CharacterScope): Record<string, string> {
  return {
    company_id: scope.companyId,
    user_id: scope.userId,
    campaign_id: scope.campaignId,
    character_id: scope.characterId,
  }
}

/**
 * Construct API paths with proper parameter substitution.
 * Paths are relative to the configured base URL.
 */
export class APIEndpoints {
  // System endpoints
  health(): string {
    return API_ENDPOINTS.HEALTH
  }

  // Developer endpoints
  developerMe(): string {
    return API_ENDPOINTS.DEVELOPER.ME
  }

  developerMeNewKey(): string {
    return API_ENDPOINTS.DEVELOPER.ME_NEW_KEY
  }

  // Company endpoints
  companyList(): string {
    return API_ENDPOINTS.COMPANY.LIST
  }

  companyGet(companyId: string): string {
    return buildPath(API_ENDPOINTS.COMPANY.GET, { company_id: companyId })
  }

  companyAccess(companyId: string): string {
    return buildPath(API_ENDPOINTS.COMPANY.ACCESS, { company_id: companyId })
  }

  // User endpoints
  userList(companyId: string): string {
    return buildPath(API_ENDPOINTS.USER.LIST, { company_id: companyId })
  }

  userGet(companyId: string, userId: string): string {
    return buildPath(API_ENDPOINTS.USER.GET, { company_id: companyId, user_id: userId })
  }

  userAssetUpload(companyId: string, userId: string): string {
    return buildPath(API_ENDPOINTS.USER.ASSET_UPLOAD, { company_id: companyId, user_id: userId })
  }

  userExperience(companyId: string, userId: string, campaignId: string): string {
    return buildPath(API_ENDPOINTS.USER.EXPERIENCE, {
      company_id: companyId,
      user_id: userId,
      campaign_id: campaignId,
    })
  }

  userXpAdd(companyId: string, userId: string): string {
    return buildPath(API_ENDPOINTS.USER.XP_ADD, { company_id: companyId, user_id: userId })
  }

  userXpRemove(companyId: string, userId: string): string {
    return buildPath(API_ENDPOINTS.USER.XP_REMOVE, { company_id: companyId, user_id: userId })
  }

  userCpAdd(companyId: string, userId: string): string {
    return buildPath(API_ENDPOINTS.USER.CP_ADD, { company_id: companyId, user_id: userId })
  }

  // Campaign endpoints
  campaignList(companyId: string, userId: string): string {
    return buildPath(API_ENDPOINTS.CAMPAIGN.LIST, { company_id: companyId, user_id: userId })
  }

  campaignGet(companyId: string, userId: string, campaignId: string): string {
    return buildPath(API_ENDPOINTS.CAMPAIGN.GET, {
      company_id: companyId,
      user_id: userId,
      campaign_id: campaignId,
    })
  }

  // Book endpoints
  bookList(companyId: string, userId: string, campaignId: string): string {
    return buildPath(API_ENDPOINTS.BOOK.LIST, { company_id: companyId, user_id: userId, campaign_id: campaignId })
  }

  bookGet(companyId: string, userId: string, campaignId: string, bookId: string): string {
    return buildPath(API_ENDPOINTS.BOOK.GET, {
      company_id: companyId,
      user_id: userId,
      campaign_id: campaignId,
      book_id: bookId,
    })
  }

  bookNumber(companyId: string, userId: string, campaignId: string, bookId: string): string {
    return buildPath(API_ENDPOINTS.BOOK.NUMBER, {
      company_id: companyId,
      user_id: userId,
      campaign_id: campaignId,
      book_id: bookId,
    })
  }

  // Chapter endpoints
  chapterList(scope: BookScope): string {
    return buildPath(API_ENDPOINTS.CHAPTER.LIST, bookParams(scope))
  }

  chapterGet(scope: BookScope, chapterId: string): string {
    return buildPath(API_ENDPOINTS.CHAPTER.GET, { ...bookParams(scope), chapter_id: chapterId })
  }

  chapterNumber(scope: BookScope, chapterId: string): string {
    return buildPath(API_ENDPOINTS.CHAPTER.NUMBER, { ...bookParams(scope), chapter_id: chapterId })
  }

  // Character endpoints
  characterList(companyId: string, userId: string, campaignId: string): string {
    return buildPath(API_ENDPOINTS.CHARACTER.LIST, {
      company_id: companyId,
      user_id: userId,
      campaign_id: campaignId,
    })
  }

  characterGet(companyId: string, userId: string, campaignId: string, characterId: string): string {
    return buildPath(API_ENDPOINTS.CHARACTER.GET, {
      company_id: companyId,
      user_id: userId,
      campaign_id: campaignId,
      character_id: characterId,
    })
  }

  // Character trait endpoints
  characterTraitList(scope: CharacterScope): string {
    return buildPath(API_ENDPOINTS.CHARACTER_TRAIT.LIST, characterParams(scope))
  }

  characterTraitCreate(scope: CharacterScope): string {
    return buildPath(API_ENDPOINTS.CHARACTER_TRAIT.CREATE, characterParams(scope))
  }

  characterTraitGet(scope: CharacterScope, characterTraitId: string): string {
    return buildPath(API_ENDPOINTS.CHARACTER_TRAIT.GET, {
      ...characterParams(scope),
      character_trait_id: characterTraitId,
    })
  }

  characterTraitChange(scope: CharacterScope, characterTraitId: string, change: TraitValueChange): string {
    return buildPath(API_ENDPOINTS.CHARACTER_TRAIT[TRAIT_CHANGE_ENDPOINTS[change]], {
      ...characterParams(scope),
      character_trait_id: characterTraitId,
    })
  }

  // Dice roll endpoints
  dicerollList(companyId: string, userId: string): string {
    return buildPath(API_ENDPOINTS.DICEROLL.LIST, { company_id: companyId, user_id: userId })
  }

  dicerollGet(companyId: string, userId: string, dicerollId: string): string {
    return buildPath(API_ENDPOINTS.DICEROLL.GET, {
      company_id: companyId,
      user_id: userId,
      diceroll_id: dicerollId,
    })
  }

  dicerollQuickroll(companyId: string, userId: string): string {
    return buildPath(API_ENDPOINTS.DICEROLL.QUICKROLL, { company_id: companyId, user_id: userId })
  }
}

export const endpoints = new APIEndpoints()

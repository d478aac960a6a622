import { type CharacterScope, type TraitValueChange, endpoints } from '../api/endpoints'
import type { ChronicleClient } from '../core/chronicle-client'
import type { QueryParams } from '../http/types'
import {
  AssignCharacterTraitRequestSchema,
  type CharacterTrait,
  type CharacterTraitListFilters,
  CharacterTraitSchema,
  type CreateCharacterTraitRequest,
  CreateCharacterTraitRequestSchema,
  TraitValueChangeRequestSchema,
} from '../models/character-traits'
import type { Page } from '../pagination/page'
import {
  BaseService,
  type CallOptions,
  compactParams,
  type IterOptions,
  type PageOptions,
  type WriteOptions,
} from './base'

function filterParams(filters: CharacterTraitListFilters): QueryParams | undefined {
  return compactParams({ parent_category_id: filters.parentCategoryId })
}

/**
 * Trait values of one character.
 *
 * `increase`/`decrease` change a value for free where the company allows it.
 * The purchase and refund pairs spend or return experience or starting points.
 */
export class CharacterTraitsService extends BaseService {
  readonly scope: Readonly<CharacterScope>

  constructor(
    client: ChronicleClient,
    userId: string,
    campaignId: string,
    characterId: string,
    companyId?: string
  ) {
    super(client)
    this.scope = Object.freeze({
      companyId: BaseService.resolveCompanyId(client, companyId),
      userId,
      campaignId,
      characterId,
    })
  }

  async getPage(options: PageOptions & CharacterTraitListFilters = {}): Promise<Page<CharacterTrait>> {
    return this.paginator.fetchPageAs(endpoints.characterTraitList(this.scope), CharacterTraitSchema, {
      limit: options.limit,
      offset: options.offset,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  async listAll(options: IterOptions & CharacterTraitListFilters = {}): Promise<CharacterTrait[]> {
    return this.paginator.collectAllAs(endpoints.characterTraitList(this.scope), CharacterTraitSchema, {
      limit: options.pageSize,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  iterAll(options: IterOptions & CharacterTraitListFilters = {}): AsyncGenerator<CharacterTrait, void, undefined> {
    return this.paginator.iterateAllAs(endpoints.characterTraitList(this.scope), CharacterTraitSchema, {
      limit: options.pageSize,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  async get(characterTraitId: string, options: CallOptions = {}): Promise<CharacterTrait> {
    const response = await this.executor.get(endpoints.characterTraitGet(this.scope, characterTraitId), options)
    return this.parseRecord(CharacterTraitSchema, response)
  }

  async delete(characterTraitId: string, options: CallOptions = {}): Promise<void> {
    await this.executor.delete(endpoints.characterTraitGet(this.scope, characterTraitId), options)
  }

  /**
   * Give the character an existing trait at `value`
   */
  async assign(traitId: string, value: number, options: WriteOptions = {}): Promise<CharacterTrait> {
    const body = this.validateRequest(AssignCharacterTraitRequestSchema, { trait_id: traitId, value })
    const response = await this.executor.post(endpoints.characterTraitCreate(this.scope), { ...options, json: body })
    return this.parseRecord(CharacterTraitSchema, response)
  }

  /**
   * Create a custom trait for this character only
   */
  async create(request: CreateCharacterTraitRequest, options: WriteOptions = {}): Promise<CharacterTrait> {
    const body = this.validateRequest(CreateCharacterTraitRequestSchema, request)
    const response = await this.executor.post(endpoints.characterTraitCreate(this.scope), { ...options, json: body })
    return this.parseRecord(CharacterTraitSchema, response)
  }

  async increase(characterTraitId: string, numDots: number, options: WriteOptions = {}): Promise<CharacterTrait> {
    return this.changeValue('increase', characterTraitId, numDots, options)
  }

  async decrease(characterTraitId: string, numDots: number, options: WriteOptions = {}): Promise<CharacterTrait> {
    return this.changeValue('decrease', characterTraitId, numDots, options)
  }

  async purchaseXp(characterTraitId: string, numDots: number, options: WriteOptions = {}): Promise<CharacterTrait> {
    return this.changeValue('xpPurchase', characterTraitId, numDots, options)
  }

  async refundXp(characterTraitId: string, numDots: number, options: WriteOptions = {}): Promise<CharacterTrait> {
    return this.changeValue('xpRefund', characterTraitId, numDots, options)
  }

  async purchaseStartingPoints(
    characterTraitId: string,
    numDots: number,
    options: WriteOptions = {}
  ): Promise<CharacterTrait> {
    return this.changeValue('startingPointsPurchase', characterTraitId, numDots, options)
  }

  async refundStartingPoints(
    characterTraitId: string,
    numDots: number,
    options: WriteOptions = {}
  ): Promise<CharacterTrait> {
    return this.changeValue('startingPointsRefund', characterTraitId, numDots, options)
  }

  private async changeValue(
    change: TraitValueChange,
    characterTraitId: string,
    numDots: number,
    options: WriteOptions
  ): Promise<CharacterTrait> {
    const body = this.validateRequest(TraitValueChangeRequestSchema, { num_dots: numDots })
    const response = await this.executor.post(endpoints.characterTraitChange(this.scope, characterTraitId, change), {
      ...options,
      json: body,
    })
    return this.parseRecord(CharacterTraitSchema, response)
  }
}

import { endpoints } from '../api/endpoints'
import type { ChronicleClient } from '../core/chronicle-client'
import type { QueryParams } from '../http/types'
import {
  type Character,
  type CharacterListFilters,
  CharacterSchema,
  type CreateCharacterRequest,
  CreateCharacterRequestSchema,
  type UpdateCharacterRequest,
  UpdateCharacterRequestSchema,
} from '../models/characters'
import type { Page } from '../pagination/page'
import {
  BaseService,
  type CallOptions,
  compactParams,
  type IterOptions,
  type PageOptions,
  type WriteOptions,
} from './base'

function filterParams(filters: CharacterListFilters): QueryParams | undefined {
  return compactParams({
    user_player_id: filters.userPlayerId,
    user_creator_id: filters.userCreatorId,
    character_class: filters.characterClass,
    character_type: filters.characterType,
    status: filters.status,
  })
}

/**
 * Characters of one campaign
 */
export class CharactersService extends BaseService {
  readonly companyId: string
  readonly userId: string
  readonly campaignId: string

  constructor(client: ChronicleClient, userId: string, campaignId: string, companyId?: string) {
    super(client)
    this.companyId = BaseService.resolveCompanyId(client, companyId)
    this.userId = userId
    this.campaignId = campaignId
  }

  private get listPath(): string {
    return endpoints.characterList(this.companyId, this.userId, this.campaignId)
  }

  private itemPath(characterId: string): string {
    return endpoints.characterGet(this.companyId, this.userId, this.campaignId, characterId)
  }

  async getPage(options: PageOptions & CharacterListFilters = {}): Promise<Page<Character>> {
    return this.paginator.fetchPageAs(this.listPath, CharacterSchema, {
      limit: options.limit,
      offset: options.offset,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  async listAll(options: IterOptions & CharacterListFilters = {}): Promise<Character[]> {
    return this.paginator.collectAllAs(this.listPath, CharacterSchema, {
      limit: options.pageSize,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  iterAll(options: IterOptions & CharacterListFilters = {}): AsyncGenerator<Character, void, undefined> {
    return this.paginator.iterateAllAs(this.listPath, CharacterSchema, {
      limit: options.pageSize,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  async get(characterId: string, options: CallOptions = {}): Promise<Character> {
    const response = await this.executor.get(this.itemPath(characterId), options)
    return this.parseRecord(CharacterSchema, response)
  }

  async create(request: CreateCharacterRequest, options: WriteOptions = {}): Promise<Character> {
    const body = this.validateRequest(CreateCharacterRequestSchema, request)
    const response = await this.executor.post(this.listPath, { ...options, json: body })
    return this.parseRecord(CharacterSchema, response)
  }

  async update(characterId: string, request: UpdateCharacterRequest, options: WriteOptions = {}): Promise<Character> {
    const body = this.validateRequest(UpdateCharacterRequestSchema, request)
    const response = await this.executor.patch(this.itemPath(characterId), { ...options, json: body })
    return this.parseRecord(CharacterSchema, response)
  }

  async delete(characterId: string, options: CallOptions = {}): Promise<void> {
    await this.executor.delete(this.itemPath(characterId), options)
  }
}

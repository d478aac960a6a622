import { endpoints } from '../api/endpoints'
import type { ChronicleClient } from '../core/chronicle-client'
import type { QueryParams } from '../http/types'
import {
  type CreateDicerollRequest,
  CreateDicerollRequestSchema,
  type Diceroll,
  type DicerollListFilters,
  DicerollSchema,
  type QuickrollDicerollRequest,
  QuickrollDicerollRequestSchema,
} from '../models/dicerolls'
import type { Page } from '../pagination/page'
import {
  BaseService,
  type CallOptions,
  compactParams,
  type IterOptions,
  type PageOptions,
  type WriteOptions,
} from './base'

function filterParams(filters: DicerollListFilters): QueryParams | undefined {
  return compactParams({
    userid: filters.userId,
    characterid: filters.characterId,
    campaignid: filters.campaignId,
  })
}

/**
 * Dice rolls made by one user
 */
export class DicerollsService extends BaseService {
  readonly companyId: string
  readonly userId: string

  constructor(client: ChronicleClient, userId: string, companyId?: string) {
    super(client)
    this.companyId = BaseService.resolveCompanyId(client, companyId)
    this.userId = userId
  }

  private get listPath(): string {
    return endpoints.dicerollList(this.companyId, this.userId)
  }

  async getPage(options: PageOptions & DicerollListFilters = {}): Promise<Page<Diceroll>> {
    return this.paginator.fetchPageAs(this.listPath, DicerollSchema, {
      limit: options.limit,
      offset: options.offset,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  async listAll(options: IterOptions & DicerollListFilters = {}): Promise<Diceroll[]> {
    return this.paginator.collectAllAs(this.listPath, DicerollSchema, {
      limit: options.pageSize,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  iterAll(options: IterOptions & DicerollListFilters = {}): AsyncGenerator<Diceroll, void, undefined> {
    return this.paginator.iterateAllAs(this.listPath, DicerollSchema, {
      limit: options.pageSize,
      params: filterParams(options),
      signal: options.signal,
    })
  }

  async get(dicerollId: string, options: CallOptions = {}): Promise<Diceroll> {
    const response = await this.executor.get(endpoints.dicerollGet(this.companyId, this.userId, dicerollId), options)
    return this.parseRecord(DicerollSchema, response)
  }

  /**
   * Roll dice on the server and store the result
   */
  async create(request: CreateDicerollRequest, options: WriteOptions = {}): Promise<Diceroll> {
    const body = this.validateRequest(CreateDicerollRequestSchema, request)
    const response = await this.executor.post(this.listPath, { ...options, json: body })
    return this.parseRecord(DicerollSchema, response)
  }

  /**
   * Roll the dice pool of a saved quickroll for a character
   */
  async createFromQuickroll(request: QuickrollDicerollRequest, options: WriteOptions = {}): Promise<Diceroll> {
    const body = this.validateRequest(QuickrollDicerollRequestSchema, request)
    const response = await this.executor.post(endpoints.dicerollQuickroll(this.companyId, this.userId), {
      ...options,
      json: body,
    })
    return this.parseRecord(DicerollSchema, response)
  }
}

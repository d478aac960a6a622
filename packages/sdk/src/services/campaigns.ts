import { endpoints } from '../api/endpoints'
import type { ChronicleClient } from '../core/chronicle-client'
import {
  type Campaign,
  CampaignSchema,
  type CreateCampaignRequest,
  CreateCampaignRequestSchema,
  type UpdateCampaignRequest,
  UpdateCampaignRequestSchema,
} from '../models/campaigns'
import type { Page } from '../pagination/page'
import { BaseService, type CallOptions, type IterOptions, type PageOptions, type WriteOptions } from './base'

/**
 * Campaigns visible to one user of a company
 */
export class CampaignsService extends BaseService {
  readonly companyId: string
  readonly userId: string

  constructor(client: ChronicleClient, userId: string, companyId?: string) {
    super(client)
    this.companyId = BaseService.resolveCompanyId(client, companyId)
    this.userId = userId
  }

  private get listPath(): string {
    return endpoints.campaignList(this.companyId, this.userId)
  }

  async getPage(options: PageOptions = {}): Promise<Page<Campaign>> {
    return this.paginator.fetchPageAs(this.listPath, CampaignSchema, options)
  }

  async listAll(options: IterOptions = {}): Promise<Campaign[]> {
    return this.paginator.collectAllAs(this.listPath, CampaignSchema, {
      limit: options.pageSize,
      signal: options.signal,
    })
  }

  iterAll(options: IterOptions = {}): AsyncGenerator<Campaign, void, undefined> {
    return this.paginator.iterateAllAs(this.listPath, CampaignSchema, {
      limit: options.pageSize,
      signal: options.signal,
    })
  }

  async get(campaignId: string, options: CallOptions = {}): Promise<Campaign> {
    const response = await this.executor.get(endpoints.campaignGet(this.companyId, this.userId, campaignId), options)
    return this.parseRecord(CampaignSchema, response)
  }

  async create(request: CreateCampaignRequest, options: WriteOptions = {}): Promise<Campaign> {
    const body = this.validateRequest(CreateCampaignRequestSchema, request)
    const response = await this.executor.post(this.listPath, { ...options, json: body })
    return this.parseRecord(CampaignSchema, response)
  }

  async update(campaignId: string, request: UpdateCampaignRequest, options: WriteOptions = {}): Promise<Campaign> {
    const body = this.validateRequest(UpdateCampaignRequestSchema, request)
    const response = await this.executor.patch(endpoints.campaignGet(this.companyId, this.userId, campaignId), {
      ...options,
      json: body,
    })
    return this.parseRecord(CampaignSchema, response)
  }

  async delete(campaignId: string, options: CallOptions = {}): Promise<void> {
    await this.executor.delete(endpoints.campaignGet(this.companyId, this.userId, campaignId), options)
  }
}

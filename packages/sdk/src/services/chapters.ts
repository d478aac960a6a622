import { type BookScope, endpoints } from '../api/endpoints'
import type { ChronicleClient } from '../core/chronicle-client'
import {
  type CampaignChapter,
  CampaignChapterSchema,
  type CreateChapterRequest,
  CreateChapterRequestSchema,
  RenumberRequestSchema,
  type UpdateChapterRequest,
  UpdateChapterRequestSchema,
} from '../models/books'
import type { Page } from '../pagination/page'
import { BaseService, type CallOptions, type IterOptions, type PageOptions, type WriteOptions } from './base'

/**
 * Chapters of one campaign book
 */
export class ChaptersService extends BaseService {
  readonly scope: Readonly<BookScope>

  constructor(client: ChronicleClient, userId: string, campaignId: string, bookId: string, companyId?: string) {
    super(client)
    this.scope = Object.freeze({
      companyId: BaseService.resolveCompanyId(client, companyId),
      userId,
      campaignId,
      bookId,
    })
  }

  async getPage(options: PageOptions = {}): Promise<Page<CampaignChapter>> {
    return this.paginator.fetchPageAs(endpoints.chapterList(this.scope), CampaignChapterSchema, options)
  }

  async listAll(options: IterOptions = {}): Promise<CampaignChapter[]> {
    return this.paginator.collectAllAs(endpoints.chapterList(this.scope), CampaignChapterSchema, {
      limit: options.pageSize,
      signal: options.signal,
    })
  }

  iterAll(options: IterOptions = {}): AsyncGenerator<CampaignChapter, void, undefined> {
    return this.paginator.iterateAllAs(endpoints.chapterList(this.scope), CampaignChapterSchema, {
      limit: options.pageSize,
      signal: options.signal,
    })
  }

  async get(chapterId: string, options: CallOptions = {}): Promise<CampaignChapter> {
    const response = await this.executor.get(endpoints.chapterGet(this.scope, chapterId), options)
    return this.parseRecord(CampaignChapterSchema, response)
  }

  async create(request: CreateChapterRequest, options: WriteOptions = {}): Promise<CampaignChapter> {
    const body = this.validateRequest(CreateChapterRequestSchema, request)
    const response = await this.executor.post(endpoints.chapterList(this.scope), { ...options, json: body })
    return this.parseRecord(CampaignChapterSchema, response)
  }

  async update(chapterId: string, request: UpdateChapterRequest, options: WriteOptions = {}): Promise<CampaignChapter> {
    const body = this.validateRequest(UpdateChapterRequestSchema, request)
    const response = await this.executor.patch(endpoints.chapterGet(this.scope, chapterId), {
      ...options,
      json: body,
    })
    return this.parseRecord(CampaignChapterSchema, response)
  }

  async delete(chapterId: string, options: CallOptions = {}): Promise<void> {
    await this.executor.delete(endpoints.chapterGet(this.scope, chapterId), options)
  }

  async renumber(chapterId: string, number: number, options: CallOptions = {}): Promise<CampaignChapter> {
    const body = this.validateRequest(RenumberRequestSchema, { number })
    const response = await this.executor.put(endpoints.chapterNumber(this.scope, chapterId), {
      ...options,
      json: body,
    })
    return this.parseRecord(CampaignChapterSchema, response)
  }
}

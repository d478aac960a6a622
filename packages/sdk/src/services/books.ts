import { endpoints } from '../api/endpoints'
import type { ChronicleClient } from '../core/chronicle-client'
import {
  type CampaignBook,
  CampaignBookSchema,
  type CreateBookRequest,
  CreateBookRequestSchema,
  RenumberRequestSchema,
  type UpdateBookRequest,
  UpdateBookRequestSchema,
} from '../models/books'
import type { Page } from '../pagination/page'
import { BaseService, type CallOptions, type IterOptions, type PageOptions, type WriteOptions } from './base'

/**
 * Books of one campaign, kept in a contiguous numbered order
 */
export class BooksService extends BaseService {
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
    return endpoints.bookList(this.companyId, this.userId, this.campaignId)
  }

  private itemPath(bookId: string): string {
    return endpoints.bookGet(this.companyId, this.userId, this.campaignId, bookId)
  }

  async getPage(options: PageOptions = {}): Promise<Page<CampaignBook>> {
    return this.paginator.fetchPageAs(this.listPath, CampaignBookSchema, options)
  }

  async listAll(options: IterOptions = {}): Promise<CampaignBook[]> {
    return this.paginator.collectAllAs(this.listPath, CampaignBookSchema, {
      limit: options.pageSize,
      signal: options.signal,
    })
  }

  iterAll(options: IterOptions = {}): AsyncGenerator<CampaignBook, void, undefined> {
    return this.paginator.iterateAllAs(this.listPath, CampaignBookSchema, {
      limit: options.pageSize,
      signal: options.signal,
    })
  }

  async get(bookId: string, options: CallOptions = {}): Promise<CampaignBook> {
    const response = await this.executor.get(this.itemPath(bookId), options)
    return this.parseRecord(CampaignBookSchema, response)
  }

  async create(request: CreateBookRequest, options: WriteOptions = {}): Promise<CampaignBook> {
    const body = this.validateRequest(CreateBookRequestSchema, request)
    const response = await this.executor.post(this.listPath, { ...options, json: body })
    return this.parseRecord(CampaignBookSchema, response)
  }

  async update(bookId: string, request: UpdateBookRequest, options: WriteOptions = {}): Promise<CampaignBook> {
    const body = this.validateRequest(UpdateBookRequestSchema, request)
    const response = await this.executor.patch(this.itemPath(bookId), { ...options, json: body })
    return this.parseRecord(CampaignBookSchema, response)
  }

  async delete(bookId: string, options: CallOptions = {}): Promise<void> {
    await this.executor.delete(this.itemPath(bookId), options)
  }

  /**
   * Move a book to position `number` (from 1). The server shifts the others.
   */
  async renumber(bookId: string, number: number, options: CallOptions = {}): Promise<CampaignBook> {
    const body = this.validateRequest(RenumberRequestSchema, { number })
    const response = await this.executor.put(
      endpoints.bookNumber(this.companyId, this.userId, this.campaignId, bookId),
      { ...options, json: body }
    )
    return this.parseRecord(CampaignBookSchema, response)
  }
}

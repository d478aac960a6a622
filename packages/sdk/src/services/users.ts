import { lookup } from 'mime-types'
import { endpoints } from '../api/endpoints'
import type { ChronicleClient } from '../core/chronicle-client'
import type { FilePayload } from '../http/types'
import { type Asset, AssetSchema, type UserRole } from '../models/common'
import {
  type CampaignExperience,
  CampaignExperienceSchema,
  type CreateUserRequest,
  CreateUserRequestSchema,
  type ExperienceAmountRequest,
  ExperienceAmountRequestSchema,
  type UpdateUserRequest,
  UpdateUserRequestSchema,
  type User,
  UserSchema,
} from '../models/users'
import type { Page } from '../pagination/page'
import {
  BaseService,
  type CallOptions,
  compactParams,
  type IterOptions,
  type PageOptions,
  type WriteOptions,
} from './base'

export interface UserListFilters {
  userRole?: UserRole
}

export interface UploadAssetOptions extends WriteOptions {
  /** Defaults to the type implied by the file name */
  contentType?: string
}

/**
 * Users of one company
 */
export class UsersService extends BaseService {
  readonly companyId: string

  constructor(client: ChronicleClient, companyId?: string) {
    super(client)
    this.companyId = BaseService.resolveCompanyId(client, companyId)
  }

  async getPage(options: PageOptions & UserListFilters = {}): Promise<Page<User>> {
    return this.paginator.fetchPageAs(endpoints.userList(this.companyId), UserSchema, {
      ...options,
      params: compactParams({ user_role: options.userRole }),
    })
  }

  async listAll(options: IterOptions & UserListFilters = {}): Promise<User[]> {
    const items: User[] = []
    for await (const user of this.iterAll(options)) {
      items.push(user)
    }
    return items
  }

  iterAll(options: IterOptions & UserListFilters = {}): AsyncGenerator<User, void, undefined> {
    return this.paginator.iterateAllAs(endpoints.userList(this.companyId), UserSchema, {
      limit: options.pageSize,
      params: compactParams({ user_role: options.userRole }),
      signal: options.signal,
    })
  }

  async get(userId: string, options: CallOptions = {}): Promise<User> {
    const response = await this.executor.get(endpoints.userGet(this.companyId, userId), options)
    return this.parseRecord(UserSchema, response)
  }

  async create(request: CreateUserRequest, options: WriteOptions = {}): Promise<User> {
    const body = this.validateRequest(CreateUserRequestSchema, request)
    const response = await this.executor.post(endpoints.userList(this.companyId), { ...options, json: body })
    return this.parseRecord(UserSchema, response)
  }

  async update(userId: string, request: UpdateUserRequest, options: WriteOptions = {}): Promise<User> {
    const body = this.validateRequest(UpdateUserRequestSchema, request)
    const response = await this.executor.patch(endpoints.userGet(this.companyId, userId), {
      ...options,
      json: body,
    })
    return this.parseRecord(UserSchema, response)
  }

  async delete(userId: string, requestingUserId: string, options: CallOptions = {}): Promise<void> {
    await this.executor.delete(endpoints.userGet(this.companyId, userId), {
      ...options,
      params: { requesting_user_id: requestingUserId },
    })
  }

  async getExperience(userId: string, campaignId: string, options: CallOptions = {}): Promise<CampaignExperience> {
    const response = await this.executor.get(endpoints.userExperience(this.companyId, userId, campaignId), options)
    return this.parseRecord(CampaignExperienceSchema, response)
  }

  async addXp(userId: string, request: ExperienceAmountRequest, options: WriteOptions = {}): Promise<CampaignExperience> {
    return this.changeExperience(endpoints.userXpAdd(this.companyId, userId), request, options)
  }

  async removeXp(
    userId: string,
    request: ExperienceAmountRequest,
    options: WriteOptions = {}
  ): Promise<CampaignExperience> {
    return this.changeExperience(endpoints.userXpRemove(this.companyId, userId), request, options)
  }

  /**
   * Cool points also add experience on the server
   */
  async addCoolPoints(
    userId: string,
    request: ExperienceAmountRequest,
    options: WriteOptions = {}
  ): Promise<CampaignExperience> {
    return this.changeExperience(endpoints.userCpAdd(this.companyId, userId), request, options)
  }

  async uploadAsset(
    userId: string,
    filename: string,
    content: Uint8Array | Blob | string,
    options: UploadAssetOptions = {}
  ): Promise<Asset> {
    const { contentType, ...callOptions } = options
    const file: FilePayload = {
      filename,
      content,
      contentType: contentType ?? (lookup(filename) || 'application/octet-stream'),
    }
    const response = await this.executor.postFile(endpoints.userAssetUpload(this.companyId, userId), file, callOptions)
    return this.parseRecord(AssetSchema, response)
  }

  private async changeExperience(
    path: string,
    request: ExperienceAmountRequest,
    options: WriteOptions
  ): Promise<CampaignExperience> {
    const body = this.validateRequest(ExperienceAmountRequestSchema, request)
    const response = await this.executor.post(path, { ...options, json: body })
    return this.parseRecord(CampaignExperienceSchema, response)
  }
}

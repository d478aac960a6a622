import { endpoints } from '../api/endpoints'
import {
  type MeDeveloper,
  MeDeveloperSchema,
  type MeDeveloperWithApiKey,
  MeDeveloperWithApiKeySchema,
  type UpdateMeDeveloperRequest,
  UpdateMeDeveloperRequestSchema,
} from '../models/developers'
import { BaseService, type CallOptions, type WriteOptions } from './base'

/**
 * The developer account behind the current API key
 */
export class DevelopersService extends BaseService {
  async getMe(options: CallOptions = {}): Promise<MeDeveloper> {
    const response = await this.executor.get(endpoints.developerMe(), options)
    return this.parseRecord(MeDeveloperSchema, response)
  }

  async updateMe(request: UpdateMeDeveloperRequest, options: WriteOptions = {}): Promise<MeDeveloper> {
    const body = this.validateRequest(UpdateMeDeveloperRequestSchema, request)
    const response = await this.executor.patch(endpoints.developerMe(), { ...options, json: body })
    return this.parseRecord(MeDeveloperSchema, response)
  }

  /**
   * Issue a new API key. The previous key stops working immediately, so the
   * client must be rebuilt with the returned key.
   */
  async regenerateApiKey(options: WriteOptions = {}): Promise<MeDeveloperWithApiKey> {
    const response = await this.executor.post(endpoints.developerMeNewKey(), options)
    return this.parseRecord(MeDeveloperWithApiKeySchema, response)
  }
}

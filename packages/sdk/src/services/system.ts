import { endpoints } from '../api/endpoints'
import { type SystemHealth, SystemHealthSchema } from '../models/system'
import { BaseService, type CallOptions } from './base'

export class SystemService extends BaseService {
  /**
   * Check API, database and cache health
   */
  async health(options: CallOptions = {}): Promise<SystemHealth> {
    const response = await this.executor.get(endpoints.health(), options)
    return this.parseRecord(SystemHealthSchema, response)
  }
}

import { endpoints } from '../api/endpoints'
import {
  type Company,
  type CompanyPermissions,
  CompanyPermissionsSchema,
  CompanySchema,
  type CreateCompanyRequest,
  CreateCompanyRequestSchema,
  type GrantAccessRequest,
  GrantAccessRequestSchema,
  type NewCompanyResponse,
  NewCompanyResponseSchema,
  type UpdateCompanyRequest,
  UpdateCompanyRequestSchema,
} from '../models/companies'
import type { Page } from '../pagination/page'
import { BaseService, type CallOptions, type IterOptions, type PageOptions, type WriteOptions } from './base'

export class CompaniesService extends BaseService {
  async getPage(options: PageOptions = {}): Promise<Page<Company>> {
    return this.paginator.fetchPageAs(endpoints.companyList(), CompanySchema, options)
  }

  async listAll(options: IterOptions = {}): Promise<Company[]> {
    return this.paginator.collectAllAs(endpoints.companyList(), CompanySchema, {
      limit: options.pageSize,
      signal: options.signal,
    })
  }

  iterAll(options: IterOptions = {}): AsyncGenerator<Company, void, undefined> {
    return this.paginator.iterateAllAs(endpoints.companyList(), CompanySchema, {
      limit: options.pageSize,
      signal: options.signal,
    })
  }

  async get(companyId: string, options: CallOptions = {}): Promise<Company> {
    const response = await this.executor.get(endpoints.companyGet(companyId), options)
    return this.parseRecord(CompanySchema, response)
  }

  async create(request: CreateCompanyRequest, options: WriteOptions = {}): Promise<NewCompanyResponse> {
    const body = this.validateRequest(CreateCompanyRequestSchema, request)
    const response = await this.executor.post(endpoints.companyList(), { ...options, json: body })
    return this.parseRecord(NewCompanyResponseSchema, response)
  }

  async update(companyId: string, request: UpdateCompanyRequest, options: WriteOptions = {}): Promise<Company> {
    const body = this.validateRequest(UpdateCompanyRequestSchema, request)
    const response = await this.executor.patch(endpoints.companyGet(companyId), { ...options, json: body })
    return this.parseRecord(CompanySchema, response)
  }

  async delete(companyId: string, options: CallOptions = {}): Promise<void> {
    await this.executor.delete(endpoints.companyGet(companyId), options)
  }

  /**
   * Grant, change or revoke (permission REVOKE) a developer's access
   */
  async grantAccess(
    companyId: string,
    request: GrantAccessRequest,
    options: WriteOptions = {}
  ): Promise<CompanyPermissions> {
    const body = this.validateRequest(GrantAccessRequestSchema, request)
    const response = await this.executor.post(endpoints.companyAccess(companyId), { ...options, json: body })
    return this.parseRecord(CompanyPermissionsSchema, response)
  }
}

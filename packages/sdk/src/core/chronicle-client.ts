import type { Logger } from '@chronicle-api/shared/logger'
import { RequestExecutor } from '../http/executor'
import { createFetchTransport } from '../http/transport'
import { Paginator } from '../pagination/paginator'
import { BooksService } from '../services/books'
import { CampaignsService } from '../services/campaigns'
import { ChaptersService } from '../services/chapters'
import { CharacterTraitsService } from '../services/character-traits'
import { CharactersService } from '../services/characters'
import { CompaniesService } from '../services/companies'
import { DevelopersService } from '../services/developers'
import { DicerollsService } from '../services/dicerolls'
import { SystemService } from '../services/system'
import { UsersService } from '../services/users'
import { logger as defaultLogger } from '../utils/logger'
import type { SleepFn } from '../utils/retry'
import { resolveConfig } from './config'
import type { ChronicleClientConfig, ResolvedConfig } from './types'

/**
 * Hooks for tests
 */
export interface ChronicleClientInternals {
  sleep?: SleepFn
  random?: () => number
}

/**
 * Entry point of the SDK. Holds the validated configuration and hands out
 * resource services bound to it.
 *
 * @example
 * ```ts
 * const client = new ChronicleClient({ baseUrl: 'https://api.example.com', apiKey: 'test-key' })
 * const companies = await client.companies.listAll()
 * const roll = await client.dicerolls(userId, companyId).create({ dice_size: 10, num_dice: 5 })
 * client.close()
 * ```
 */
export class ChronicleClient {
  readonly config: ResolvedConfig
  readonly executor: RequestExecutor
  readonly paginator: Paginator
  readonly logger: Logger

  private readonly closeController = new AbortController()
  private systemService?: SystemService
  private developersService?: DevelopersService
  private companiesService?: CompaniesService

  constructor(config: ChronicleClientConfig, internals: ChronicleClientInternals = {}) {
    this.config = resolveConfig(config)
    this.logger = config.logger ?? defaultLogger
    this.executor = new RequestExecutor({
      config: this.config,
      transport: config.transport ?? createFetchTransport(),
      logger: this.logger,
      sleep: internals.sleep,
      random: internals.random,
      signal: this.closeController.signal,
    })
    this.paginator = new Paginator(this.executor)
  }

  get system(): SystemService {
    this.systemService ??= new SystemService(this)
    return this.systemService
  }

  get developer(): DevelopersService {
    this.developersService ??= new DevelopersService(this)
    return this.developersService
  }

  get companies(): CompaniesService {
    this.companiesService ??= new CompaniesService(this)
    return this.companiesService
  }

  users(companyId?: string): UsersService {
    return new UsersService(this, companyId)
  }

  campaigns(userId: string, companyId?: string): CampaignsService {
    return new CampaignsService(this, userId, companyId)
  }

  books(userId: string, campaignId: string, companyId?: string): BooksService {
    return new BooksService(this, userId, campaignId, companyId)
  }

  chapters(userId: string, campaignId: string, bookId: string, companyId?: string): ChaptersService {
    return new ChaptersService(this, userId, campaignId, bookId, companyId)
  }

  characters(userId: string, campaignId: string, companyId?: string): CharactersService {
    return new CharactersService(this, userId, campaignId, companyId)
  }

  characterTraits(
    userId: string,
    campaignId: string,
    characterId: string,
    companyId?: string
  ): CharacterTraitsService {
    return new CharacterTraitsService(this, userId, campaignId, characterId, companyId)
  }

  dicerolls(userId: string, companyId?: string): DicerollsService {
    return new DicerollsService(this, userId, companyId)
  }

  get isClosed(): boolean {
    return this.closeController.signal.aborted
  }

  /**
   * Abort calls in flight. Later calls fail with RequestAbortedError.
   */
  close(): void {
    if (this.isClosed) {
      return
    }
    this.closeController.abort()
    this.logger.debug('Client closed')
  }
}

import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { resolveConfig } from '../src/core/config'
import { RequestExecutor } from '../src/http/executor'
import { Page } from '../src/pagination/page'
import { MAX_PAGE_LIMIT, Paginator } from '../src/pagination/paginator'
import { ResponseParseError } from '../src/utils/error'
import {
  TEST_CONFIG,
  jsonResponse,
  pagedServer,
  recordingSleep,
  requestAt,
  scriptedTransport,
  silentLogger,
  textResponse,
} from './setup'

function createPaginator(transport: ReturnType<typeof scriptedTransport>): Paginator {
  const executor = new RequestExecutor({
    config: resolveConfig(TEST_CONFIG),
    transport,
    logger: silentLogger,
    sleep: recordingSleep(),
  })
  return new Paginator(executor)
}

const records = Array.from({ length: 25 }, (_, index) => ({ id: `item-${index}` }))

describe('Page', () => {
  it('should derive navigation values', () => {
    const page = new Page({ items: [1, 2, 3], limit: 3, offset: 3, total: 10 })

    expect(page.hasMore).toBe(true)
    expect(page.nextOffset).toBe(6)
    expect(page.totalPages).toBe(4)
    expect(page.currentPage).toBe(2)
  })

  it('should report the last page', () => {
    const page = new Page({ items: [9], limit: 3, offset: 9, total: 10 })

    expect(page.hasMore).toBe(false)
    expect(page.currentPage).toBe(4)
  })

  it('should report zero pages for a zero limit', () => {
    const page = new Page({ items: [], limit: 0, offset: 0, total: 10 })

    expect(page.totalPages).toBe(0)
    expect(page.currentPage).toBe(0)
  })

  it('should map items and keep metadata', () => {
    const page = new Page({ items: [1, 2], limit: 2, offset: 4, total: 9 }).map(value => value * 10)

    expect(page.items).toEqual([10, 20])
    expect(page.offset).toBe(4)
    expect(page.total).toBe(9)
  })
})

describe('Paginator', () => {
  describe('fetchPage', () => {
    it('should clamp limit and offset', async () => {
      const transport = scriptedTransport(jsonResponse(200, { items: [], limit: 100, offset: 0, total: 0 }))

      await createPaginator(transport).fetchPage('/items', { limit: 999, offset: -5 })

      expect(requestAt(transport, 0).query).toEqual({ limit: MAX_PAGE_LIMIT, offset: 0 })
    })

    it('should send defaults and extra params', async () => {
      const transport = scriptedTransport(jsonResponse(200, { items: [], limit: 10, offset: 0, total: 0 }))

      await createPaginator(transport).fetchPage('/items', { params: { status: 'ALIVE' } })

      expect(requestAt(transport, 0).query).toEqual({ limit: 10, offset: 0, status: 'ALIVE' })
    })

    it('should clamp a negative limit to zero', async () => {
      const transport = scriptedTransport(jsonResponse(200, {}))

      await createPaginator(transport).fetchPage('/items', { limit: -1 })

      expect(requestAt(transport, 0).query).toEqual({ limit: 0, offset: 0 })
    })

    it('should replace non-finite limit and offset with the defaults', async () => {
      const transport = scriptedTransport(jsonResponse(200, {}))
      const paginator = createPaginator(transport)

      await paginator.fetchPage('/items', { limit: Number.NaN, offset: Number.NaN })
      await paginator.fetchPage('/items', { limit: Number.POSITIVE_INFINITY, offset: 20 })

      expect(requestAt(transport, 0).query).toEqual({ limit: 10, offset: 0 })
      expect(requestAt(transport, 1).query).toEqual({ limit: 10, offset: 20 })
    })

    it('should default missing body fields', async () => {
      const transport = scriptedTransport(jsonResponse(200, {}))

      const page = await createPaginator(transport).fetchPage('/items')

      expect(page.items).toEqual([])
      expect(page.total).toBe(0)
      expect(page.hasMore).toBe(false)
    })

    it('should reject a body that is not a page', async () => {
      const transport = scriptedTransport(jsonResponse(200, { items: 'nope' }))

      await expect(createPaginator(transport).fetchPage('/items')).rejects.toBeInstanceOf(ResponseParseError)
    })

    it('should reject a body that is not JSON', async () => {
      const transport = scriptedTransport(textResponse(200, '<html>'))

      await expect(createPaginator(transport).fetchPage('/items')).rejects.toBeInstanceOf(ResponseParseError)
    })

    it('should validate items against a schema', async () => {
      const transport = scriptedTransport(jsonResponse(200, { items: [{ id: 1 }], limit: 10, offset: 0, total: 1 }))
      const schema = z.object({ id: z.string() })

      await expect(createPaginator(transport).fetchPageAs('/items', schema)).rejects.toBeInstanceOf(
        ResponseParseError
      )
    })
  })

  describe('iterateAll', () => {
    it('should yield every item in order', async () => {
      const transport = scriptedTransport(pagedServer(records))
      const seen: unknown[] = []

      for await (const item of createPaginator(transport).iterateAll('/items', { limit: 10 })) {
        seen.push(item)
      }

      expect(seen).toEqual(records)
      expect(transport.mock.calls.map(call => call[0].query?.offset)).toEqual([0, 10, 20])
    })

    it('should default to the maximum page size', async () => {
      const transport = scriptedTransport(pagedServer(records))

      await createPaginator(transport).collectAll('/items')

      expect(transport).toHaveBeenCalledOnce()
      expect(requestAt(transport, 0).query).toEqual({ limit: 100, offset: 0 })
    })

    it('should only fetch a page when it is needed', async () => {
      const transport = scriptedTransport(pagedServer(records))
      const iterator = createPaginator(transport).iterateAll('/items', { limit: 10 })

      const first = await iterator.next()

      expect(first.value).toEqual({ id: 'item-0' })
      expect(transport).toHaveBeenCalledOnce()
      await iterator.return(undefined)
    })

    it('should stop on an empty page even if total says otherwise', async () => {
      const transport = scriptedTransport(pagedServer(records.slice(0, 5), 50))

      const items = await createPaginator(transport).collectAll('/items', { limit: 5 })

      expect(items).toHaveLength(5)
      expect(transport).toHaveBeenCalledTimes(2)
    })

    it('should stop when the page carries no limit', async () => {
      const transport = scriptedTransport(jsonResponse(200, { items: [1, 2], offset: 0, total: 5 }))

      const items = await createPaginator(transport).collectAll('/items')

      expect(items).toEqual([1, 2])
      expect(transport).toHaveBeenCalledOnce()
    })

    it('should advance by the requested limit when the page carries none', async () => {
      const transport = scriptedTransport(jsonResponse(200, { items: [1, 2], offset: 0, total: 5 }))

      const items = await createPaginator(transport).collectAll('/items', { limit: 2 })

      expect(items).toHaveLength(6)
      expect(transport.mock.calls.map(call => call[0].query?.offset)).toEqual([0, 2, 4])
    })

    it('should stop when the server repeats an earlier offset', async () => {
      const transport = scriptedTransport(jsonResponse(200, { items: [1, 2], limit: 2, offset: 0, total: 5 }))

      const items = await createPaginator(transport).collectAll('/items', { limit: 2 })

      expect(items).toEqual([1, 2, 1, 2])
      expect(transport).toHaveBeenCalledTimes(2)
    })

    it('should use the maximum page size for a non-finite limit', async () => {
      const transport = scriptedTransport(pagedServer(records))

      await createPaginator(transport).collectAll('/items', { limit: Number.NaN })

      expect(requestAt(transport, 0).query).toEqual({ limit: 100, offset: 0 })
    })

    it('should pass params to every page', async () => {
      const transport = scriptedTransport(pagedServer(records))

      await createPaginator(transport).collectAll('/items', { limit: 20, params: { role: 'PLAYER' } })

      expect(transport.mock.calls.map(call => call[0].query)).toEqual([
        { limit: 20, offset: 0, role: 'PLAYER' },
        { limit: 20, offset: 20, role: 'PLAYER' },
      ])
    })
  })

  describe('collectAllAs', () => {
    it('should return typed items', async () => {
      const transport = scriptedTransport(pagedServer(records))
      const schema = z.object({ id: z.string() })

      const items = await createPaginator(transport).collectAllAs('/items', schema, { limit: 10 })

      expect(items).toHaveLength(25)
      expect(items[24]?.id).toBe('item-24')
    })
  })
})

import { afterEach, describe, expect, it, vi } from 'vitest'
import { buildUrl, createFetchTransport } from '../src/http/transport'
import type { TransportRequest } from '../src/http/types'
import { ConnectionError, RequestAbortedError, TimeoutError } from '../src/utils/error'

function baseRequest(overrides: Partial<TransportRequest> = {}): TransportRequest {
  return {
    method: 'GET',
    url: 'https://api.chronicle.test/api/v1/health',
    headers: { Accept: 'application/json', 'X-API-KEY': 'test-secret' },
    timeout: 1000,
    ...overrides,
  }
}

function stubFetch(impl: (input: unknown, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl)
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

function initOf(fetchMock: ReturnType<typeof stubFetch>): RequestInit {
  const init = fetchMock.mock.calls[0]?.[1]
  if (!init) {
    throw new Error('fetch was not called with options')
  }
  return init
}

describe('buildUrl', () => {
  it('should skip empty values and repeat arrays', () => {
    const url = buildUrl('https://api.chronicle.test/items', {
      limit: 10,
      skip: undefined,
      none: null,
      tag: ['a', 'b'],
      active: true,
    })

    expect(url).toBe('https://api.chronicle.test/items?limit=10&tag=a&tag=b&active=true')
  })

  it('should leave the URL alone without params', () => {
    expect(buildUrl('https://api.chronicle.test/items')).toBe('https://api.chronicle.test/items')
    expect(buildUrl('https://api.chronicle.test/items', { skip: undefined })).toBe('https://api.chronicle.test/items')
  })
})

describe('createFetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should return status, lower-cased headers and raw body', async () => {
    stubFetch(async () => new Response('{"ok":true}', { status: 201, headers: { 'X-Request-Id': 'r-1' } }))
    const transport = createFetchTransport()

    const response = await transport(baseRequest())

    expect(response.status).toBe(201)
    expect(response.headers['x-request-id']).toBe('r-1')
    expect(response.body).toBe('{"ok":true}')
  })

  it('should return error statuses instead of throwing', async () => {
    stubFetch(async () => new Response('nope', { status: 503 }))

    const response = await createFetchTransport()(baseRequest())

    expect(response.status).toBe(503)
    expect(response.body).toBe('nope')
  })

  it('should serialise JSON bodies', async () => {
    const fetchMock = stubFetch(async () => new Response('{}'))

    await createFetchTransport()(baseRequest({ method: 'POST', json: { name: 'Acme' }, query: { dry: false } }))

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.chronicle.test/api/v1/health?dry=false')
    const init = initOf(fetchMock)
    expect(init.method).toBe('POST')
    expect(init.body).toBe('{"name":"Acme"}')
    expect(init.headers).toEqual({
      Accept: 'application/json',
      'X-API-KEY': 'test-secret',
      'Content-Type': 'application/json',
    })
  })

  it('should URL-encode form bodies', async () => {
    const fetchMock = stubFetch(async () => new Response('{}'))

    await createFetchTransport()(baseRequest({ method: 'POST', form: { grant: 'yes', scope: 'a b' } }))

    const body = initOf(fetchMock).body
    expect(body).toBeInstanceOf(URLSearchParams)
    expect(String(body)).toBe('grant=yes&scope=a+b')
  })

  it('should send files as multipart without a content type', async () => {
    const fetchMock = stubFetch(async () => new Response('{}'))

    await createFetchTransport()(
      baseRequest({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-API-KEY': 'test-secret' },
        file: { filename: 'portrait.png', content: new Uint8Array([1, 2, 3]), contentType: 'image/png' },
      })
    )

    const init = initOf(fetchMock)
    expect(init.headers).toEqual({ 'X-API-KEY': 'test-secret' })
    const body = init.body
    if (!(body instanceof FormData)) {
      throw new Error('expected FormData')
    }
    const file = body.get('file')
    if (file === null || typeof file === 'string') {
      throw new Error('expected a file part')
    }
    expect(file.name).toBe('portrait.png')
    expect(file.type).toBe('image/png')
    expect(file.size).toBe(3)
  })

  it('should wrap fetch failures in ConnectionError', async () => {
    const cause = new TypeError('fetch failed')
    stubFetch(async () => {
      throw cause
    })

    const failure = createFetchTransport()(baseRequest())

    await expect(failure).rejects.toBeInstanceOf(ConnectionError)
    await expect(failure).rejects.toMatchObject({ cause })
  })

  it('should raise TimeoutError when the timer fires', async () => {
    stubFetch(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        })
    )

    await expect(createFetchTransport()(baseRequest({ timeout: 5 }))).rejects.toBeInstanceOf(TimeoutError)
  })

  it('should raise RequestAbortedError when the caller aborts', async () => {
    stubFetch(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        })
    )
    const controller = new AbortController()

    const pending = createFetchTransport()(baseRequest({ signal: controller.signal }))
    controller.abort()

    await expect(pending).rejects.toBeInstanceOf(RequestAbortedError)
  })
})

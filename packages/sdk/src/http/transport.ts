/**
 * fetch-based transport
 */

import { ConnectionError, RequestAbortedError, TimeoutError } from '../utils/error'
import { combineSignals } from '../utils/retry'
import type { QueryParams, Transport, TransportRequest } from './types'

/**
 * Append query params to a URL. Undefined and null values are skipped,
 * arrays become repeated keys.
 */
export function buildUrl(url: string, query?: QueryParams): string {
  if (!query) {
    return url
  }

  const search = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    const values = Array.isArray(value) ? value : [value]
    for (const item of values) {
      if (item === undefined || item === null) {
        continue
      }
      search.append(key, String(item))
    }
  }

  const encoded = search.toString()
  if (!encoded) {
    return url
  }
  return `${url}${url.includes('?') ? '&' : '?'}${encoded}`
}

function buildBody(request: TransportRequest, headers: Record<string, string>): FormData | URLSearchParams | string | undefined {
  if (request.file) {
    // fetch sets the multipart boundary itself
    for (const name of Object.keys(headers)) {
      if (name.toLowerCase() === 'content-type') {
        delete headers[name]
      }
    }
    const { filename, content, contentType } = request.file
    const blob = content instanceof Blob ? content : new Blob([content], contentType ? { type: contentType } : {})
    const formData = new FormData()
    if (request.form) {
      for (const [key, value] of Object.entries(request.form)) {
        formData.append(key, value)
      }
    }
    formData.append('file', blob, filename)
    return formData
  }

  if (request.form) {
    return new URLSearchParams(request.form)
  }

  if (request.json !== undefined) {
    if (!Object.keys(headers).some(name => name.toLowerCase() === 'content-type')) {
      headers['Content-Type'] = 'application/json'
    }
    return JSON.stringify(request.json)
  }

  return undefined
}

/**
 * Transport backed by the global fetch.
 */
export function createFetchTransport(fetchImpl: typeof fetch = globalThis.fetch): Transport {
  return async request => {
    const headers = { ...request.headers }
    const body = buildBody(request, headers)

    const timeoutController = new AbortController()
    const timer = setTimeout(() => timeoutController.abort(), request.timeout)
    const { signal, cleanup } = combineSignals(request.signal, timeoutController.signal)

    try {
      const response = await fetchImpl(buildUrl(request.url, request.query), {
        method: request.method,
        headers,
        body,
        signal,
      })
      const text = await response.text()

      const responseHeaders: Record<string, string> = {}
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value
      })

      return { status: response.status, headers: responseHeaders, body: text }
    } catch (error) {
      if (request.signal?.aborted) {
        throw new RequestAbortedError('Request was aborted', error)
      }
      if (timeoutController.signal.aborted) {
        throw new TimeoutError(`Request timed out after ${request.timeout}ms`, error)
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new ConnectionError(`Connection failed: ${reason}`, error)
    } finally {
      clearTimeout(timer)
      cleanup()
    }
  }
}

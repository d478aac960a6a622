/**
 * Shared fixtures for SDK tests. Nothing here touches the network: every
 * client runs on a scripted in-process transport.
 */

import { vi } from 'vitest'
import { type LogEntry, LogLevel, Logger } from '@chronicle-api/shared/logger'
import { ChronicleClient } from '../src/core/chronicle-client'
import type { ChronicleClientConfig } from '../src/core/types'
import type { TransportRequest, TransportResponse } from '../src/http/types'

export const TEST_CONFIG: ChronicleClientConfig = {
  baseUrl: 'https://api.chronicle.test',
  apiKey: 'test-secret',
}

export const TEST_TIMESTAMP = '2024-03-01T12:00:00Z'

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): TransportResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  }
}

export function textResponse(status: number, body: string, headers: Record<string, string> = {}): TransportResponse {
  return { status, headers, body }
}

export type Reply =
  | TransportResponse
  | Error
  | ((request: TransportRequest) => TransportResponse | Promise<TransportResponse>)

/**
 * Transport that answers with the given replies in order; the last one
 * repeats once the script runs out
 */
export function scriptedTransport(...replies: Reply[]) {
  let index = 0
  return vi.fn(async (request: TransportRequest): Promise<TransportResponse> => {
    const reply = replies[Math.min(index, replies.length - 1)]
    index++
    if (reply === undefined) {
      throw new Error('No reply scripted')
    }
    if (reply instanceof Error) {
      throw reply
    }
    if (typeof reply === 'function') {
      return reply(request)
    }
    return reply
  })
}

/**
 * Serves `items` as an offset-paginated list endpoint
 */
export function pagedServer(items: unknown[], total: number = items.length) {
  return (request: TransportRequest): TransportResponse => {
    const limit = Number(request.query?.limit ?? 10)
    const offset = Number(request.query?.offset ?? 0)
    return jsonResponse(200, { items: items.slice(offset, offset + limit), limit, offset, total })
  }
}

/**
 * Logger that keeps every entry in memory
 */
export function captureLogger(level: LogLevel = LogLevel.DEBUG): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const logger = new Logger({ level, sink: entry => entries.push(entry) })
  return { logger, entries }
}

export const silentLogger = new Logger({ level: LogLevel.SILENT })

export function recordingSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => {})
}

export function createTestClient(
  transport: ReturnType<typeof scriptedTransport>,
  overrides: Partial<ChronicleClientConfig> = {}
): ChronicleClient {
  return new ChronicleClient(
    { ...TEST_CONFIG, logger: silentLogger, transport, ...overrides },
    { sleep: recordingSleep(), random: () => 0 }
  )
}

/**
 * The request the transport received on its nth call
 */
export function requestAt(transport: ReturnType<typeof scriptedTransport>, index: number): TransportRequest {
  const call = transport.mock.calls[index]
  if (!call) {
    throw new Error(`Transport was called ${transport.mock.calls.length} times, wanted call ${index}`)
  }
  return call[0]
}

import { describe, expect, it } from 'vitest'
import { canRetry, generateIdempotencyKey } from '../src/http/idempotency'

describe('canRetry', () => {
  it('should always allow GET, PUT and DELETE', () => {
    expect(canRetry('GET', {})).toBe(true)
    expect(canRetry('PUT', {})).toBe(true)
    expect(canRetry('DELETE', {})).toBe(true)
  })

  it('should refuse POST and PATCH without a key', () => {
    expect(canRetry('POST', {})).toBe(false)
    expect(canRetry('PATCH', { 'X-API-KEY': 'test-secret' })).toBe(false)
  })

  it('should allow POST and PATCH with a key', () => {
    expect(canRetry('POST', { 'Idempotency-Key': 'x' })).toBe(true)
    expect(canRetry('PATCH', { 'idempotency-key': 'x' })).toBe(true)
  })
})

describe('generateIdempotencyKey', () => {
  it('should return distinct v4 UUIDs', () => {
    const first = generateIdempotencyKey()
    const second = generateIdempotencyKey()

    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
    expect(first).not.toBe(second)
  })
})

import { describe, expect, it } from 'vitest'
import { ErrorCode } from '@chronicle-api/shared/errors'
import { LogLevel } from '@chronicle-api/shared/logger'
import { type Outcome, classifyResponse } from '../src/http/classifier'
import {
  APIError,
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
} from '../src/utils/error'
import { captureLogger, jsonResponse, textResponse } from './setup'

const context = { method: 'GET', path: '/api/v1/companies' }

function faultOf(outcome: Outcome): APIError {
  if (outcome.kind !== 'fault') {
    throw new Error(`Expected a fault, got ${outcome.kind}`)
  }
  return outcome.error
}

describe('classifyResponse', () => {
  it('should pass 2xx responses through', () => {
    const response = jsonResponse(201, { id: 'c1' })
    const outcome = classifyResponse(response, context)

    expect(outcome).toEqual({ kind: 'success', response })
  })

  it('should expose field problems of a 400 response', () => {
    const body = '{"detail":"Validation failed","invalid_parameters":[{"field":"name","message":"required"}]}'
    const error = faultOf(classifyResponse(textResponse(400, body), context))

    expect(error).toBeInstanceOf(ValidationError)
    expect(error.message).toBe('Validation failed')
    expect(error.status).toBe(400)
    expect(error.rawBody).toBe(body)
    expect(error.code).toBe(ErrorCode.VALIDATION_ERROR)
    if (!(error instanceof ValidationError)) {
      throw new Error('not a ValidationError')
    }
    expect(error.invalidParameters).toEqual([{ field: 'name', message: 'required' }])
  })

  it.each([
    [401, AuthenticationError, ErrorCode.AUTHENTICATION_FAILED],
    [403, AuthorizationError, ErrorCode.PERMISSION_DENIED],
    [404, NotFoundError, ErrorCode.NOT_FOUND],
    [409, ConflictError, ErrorCode.CONFLICT],
  ])('should map %i to its error class', (status, ErrorClass, code) => {
    const error = faultOf(classifyResponse(jsonResponse(status, { detail: 'nope' }), context))

    expect(error).toBeInstanceOf(ErrorClass)
    expect(error.status).toBe(status)
    expect(error.code).toBe(code)
    expect(error.message).toBe('nope')
  })

  it('should read rate-limit values from headers', () => {
    const response = jsonResponse(429, { detail: 'Slow down' }, { ratelimit: '"default";r=0;t=5' })
    const error = faultOf(classifyResponse(response, context))

    expect(error).toBeInstanceOf(RateLimitError)
    if (!(error instanceof RateLimitError)) {
      throw new Error('not a RateLimitError')
    }
    expect(error.retryAfter).toBe(5)
    expect(error.remaining).toBe(0)
    expect(error.code).toBe(ErrorCode.RATE_LIMITED)
  })

  it('should never take rate-limit values from the body', () => {
    const response = jsonResponse(429, { detail: 'Slow down', retry_after: 99, remaining: 3 })
    const error = faultOf(classifyResponse(response, context))

    if (!(error instanceof RateLimitError)) {
      throw new Error('not a RateLimitError')
    }
    expect(error.retryAfter).toBeUndefined()
    expect(error.remaining).toBeUndefined()
  })

  it('should map the 5xx range to ServerError', () => {
    expect(faultOf(classifyResponse(textResponse(500, ''), context))).toBeInstanceOf(ServerError)
    expect(faultOf(classifyResponse(textResponse(503, ''), context))).toBeInstanceOf(ServerError)
    expect(faultOf(classifyResponse(textResponse(599, ''), context))).toBeInstanceOf(ServerError)
  })

  it('should fall back to APIError for unmapped statuses', () => {
    const error = faultOf(classifyResponse(jsonResponse(418, { detail: 'teapot' }), context))

    expect(error).toBeInstanceOf(APIError)
    expect(error).not.toBeInstanceOf(ServerError)
    expect(error.status).toBe(418)
    expect(error.code).toBe(ErrorCode.API_ERROR)
  })

  it('should classify independently of the method', () => {
    const get = faultOf(classifyResponse(textResponse(409, ''), { method: 'GET', path: '/x' }))
    const post = faultOf(classifyResponse(textResponse(409, ''), { method: 'POST', path: '/x' }))

    expect(get.constructor).toBe(post.constructor)
  })

  describe('message extraction', () => {
    it('should use the raw text of a non-JSON body', () => {
      const error = faultOf(classifyResponse(textResponse(502, 'Bad Gateway'), context))

      expect(error.message).toBe('Bad Gateway')
      expect(error.responseData).toEqual({})
    })

    it('should use HTTP status for an empty body', () => {
      const error = faultOf(classifyResponse(textResponse(500, ''), context))

      expect(error.message).toBe('HTTP 500')
    })

    it('should use the raw body when JSON has no detail', () => {
      const error = faultOf(classifyResponse(textResponse(409, '{"title":"Conflict"}'), context))

      expect(error.message).toBe('{"title":"Conflict"}')
      expect(error.title).toBe('Conflict')
    })

    it('should serialise a detail that is not a string', () => {
      const body = '{"detail":[{"loc":["body","name"],"msg":"field required"}],"title":"Bad"}'
      const error = faultOf(classifyResponse(textResponse(400, body), context))

      expect(error.message).toBe('[{"loc":["body","name"],"msg":"field required"}]')
    })

    it('should serialise an object detail', () => {
      const error = faultOf(classifyResponse(jsonResponse(500, { detail: { reason: 'db down' } }), context))

      expect(error.message).toBe('{"reason":"db down"}')
    })
  })

  describe('logging', () => {
    it('should log authentication failures as errors', () => {
      const { logger, entries } = captureLogger()
      classifyResponse(jsonResponse(401, { detail: 'bad key' }), context, logger)

      expect(entries).toHaveLength(1)
      expect(entries[0]?.level).toBe(LogLevel.ERROR)
    })

    it('should log missing resources at debug level', () => {
      const { logger, entries } = captureLogger()
      classifyResponse(jsonResponse(404, { detail: 'gone' }), context, logger)

      expect(entries.map(entry => entry.level)).toEqual([LogLevel.DEBUG])
    })

    it('should log refused requests as warnings', () => {
      const { logger, entries } = captureLogger()
      classifyResponse(jsonResponse(409, { detail: 'exists' }), context, logger)

      expect(entries.map(entry => entry.level)).toEqual([LogLevel.WARN])
    })
  })
})

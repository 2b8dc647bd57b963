/**
 * Core API request utilities and types
 */

import type { CdevConnection, HttpMethod } from '../types.js'

import { ProtocolError, TransportError } from '../errors.js'
import { logger } from '../logger.js'

/**
 * Outcome of one HTTP exchange. `status` is 0 when the request never got a response.
 */
export interface ApiResponse {
  cause?: unknown
  data?: unknown
  error?: string
  ok: boolean
  parseError?: string
  status: number
}

/**
 * Scheme, host and port every locator is appended to
 */
export function urlPrefix(connection: CdevConnection): string {
  return `http://${connection.host}:${connection.port}`
}

/**
 * Basic authorization header value, only when both username and password are set
 */
export function authorizationHeader(connection: CdevConnection): string | undefined {
  if (!connection.username || !connection.password) {
    return undefined
  }

  const token = Buffer.from(`${connection.username}:${connection.password}`).toString('base64')
  return `Basic ${token}`
}

/**
 * Make one authenticated request against a server-issued locator.
 * Never throws: failures are reported on the response.
 */
export async function apiRequest(
  connection: CdevConnection,
  method: HttpMethod,
  locator: string,
  body?: object
): Promise<ApiResponse> {
  const url = urlPrefix(connection) + locator

  logger.apiCall(method, locator)
  if (body) {
    logger.requestBody(body)
  }

  const requestId = `${method} ${locator} ${Date.now()}`
  logger.timeStart(requestId, `${method} ${locator}`)

  const headers: Record<string, string> = {
    accept: 'application/json',
  }

  const authorization = authorizationHeader(connection)
  if (authorization) {
    headers.Authorization = authorization
  }

  let requestBody: string | undefined
  if (body) {
    headers['Content-Type'] = 'application/json'
    requestBody = JSON.stringify(body)
  }

  let response: Response
  const startTime = performance.now()
  try {
    response = await fetch(url, {
      body: requestBody,
      headers,
      method,
    })
  } catch (error) {
    logger.timeEnd(requestId)
    const message = error instanceof Error ? error.message : String(error)
    logger.debug('Request failed:', message)

    return {
      cause: error,
      error: message,
      ok: false,
      status: 0,
    }
  }

  let text: string
  try {
    text = await response.text()
  } catch (error) {
    logger.timeEnd(requestId)
    const message = error instanceof Error ? error.message : String(error)
    logger.debug('Reading response failed:', message)

    return {
      cause: error,
      error: message,
      ok: false,
      status: 0,
    }
  }

  logger.timeEnd(requestId)
  logger.apiResponse(response.status, response.statusText, Math.round(performance.now() - startTime))

  const result: ApiResponse = {
    ok: response.ok,
    status: response.status,
  }

  if (!response.ok) {
    result.error = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`
    logger.debug('Error response:', text)
  }

  if (text.trim() !== '') {
    try {
      result.data = JSON.parse(text)
      logger.responseData(result.data)
    } catch (error) {
      result.parseError = error instanceof Error ? error.message : String(error)
    }
  }

  return result
}

/**
 * Unwrap the decoded body of a successful response, or throw
 */
export function expectData(response: ApiResponse, method: HttpMethod, locator: string): unknown {
  if (!response.ok) {
    throw new TransportError(
      `${method} ${locator} failed: ${response.error ?? 'unknown error'}`,
      response.status,
      response.cause
    )
  }

  if (response.parseError !== undefined) {
    throw new ProtocolError(`Invalid server response from ${locator}: ${response.parseError}`)
  }

  return response.data
}

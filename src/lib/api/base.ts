/**
 * Base API class shared by the resource modules
 */

import type { CdevConnection, HttpMethod } from '../types.js'

import { isOperationEnvelope } from '../entities.js'
import { apiRequest, expectData } from './request.js'

export class BaseApi {
  constructor(protected connection: CdevConnection) {}

  /**
   * Request a resource and decode its body
   */
  protected async fetchResource<T>(
    method: HttpMethod,
    locator: string,
    decode: (value: unknown) => T,
    body?: object
  ): Promise<T> {
    const response = await apiRequest(this.connection, method, locator, body)
    return decode(expectData(response, method, locator))
  }

  /**
   * Request an operation. An error status that still carries an operation
   * body is returned as a failed operation instead of thrown.
   */
  protected async fetchOperation<T>(
    method: HttpMethod,
    locator: string,
    decode: (value: unknown) => T,
    body?: object
  ): Promise<T> {
    const response = await apiRequest(this.connection, method, locator, body)
    if (!response.ok && response.status > 0 && isOperationEnvelope(response.data)) {
      return decode(response.data)
    }

    return decode(expectData(response, method, locator))
  }
}

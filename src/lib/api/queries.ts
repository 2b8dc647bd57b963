/**
 * SQL queries API module
 */

import {
  decodeQueryOperation,
  isOperationEnvelope,
  type Namespace,
  type Query,
  type QueryOperation,
  type QueryPlanOperation,
} from '../entities.js'
import { BaseApi } from './base.js'
import { apiRequest, expectData } from './request.js'

export class QueriesApi extends BaseApi {
  async add(namespace: Namespace, sql: string): Promise<QueryOperation> {
    return this.fetchOperation('PUT', namespace.queries, decodeQueryOperation, { content: sql })
  }

  /**
   * Run a query. Running it again re-runs it.
   */
  async execute(query: Query): Promise<QueryOperation> {
    return this.fetchOperation('POST', query.id, decodeQueryOperation, { action: 'execute' })
  }

  /**
   * Fetch a query's plan; the plan body is returned as the server sent it
   */
  async plan(query: Query): Promise<QueryPlanOperation> {
    const response = await apiRequest(this.connection, 'GET', query.plan)

    if (!response.ok && response.status > 0 && isOperationEnvelope(response.data)) {
      const failed = decodeQueryOperation(response.data)
      return failed.errors === undefined
        ? { kind: 'plan', success: failed.success }
        : { errors: failed.errors, kind: 'plan', success: failed.success }
    }

    const plan = expectData(response, 'GET', query.plan)
    return plan === undefined ? { kind: 'plan', success: true } : { kind: 'plan', plan, success: true }
  }
}

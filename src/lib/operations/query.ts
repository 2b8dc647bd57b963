/**
 * Query Operations
 */

import type { QueryOperation, QueryPlanOperation } from '../entities.js'
import type { OperationContext } from './context.js'

import { requireNamespace } from './context.js'

export interface QueryRunResult {
  added: QueryOperation
  executed?: QueryOperation
}

export interface QueryPlanResult {
  added: QueryOperation
  plan?: QueryPlanOperation
}

/**
 * Add a query to the namespace and execute it. Execution is skipped when the add failed.
 */
export async function runQuery(ctx: OperationContext, sql: string): Promise<QueryRunResult> {
  const namespace = await requireNamespace(ctx)
  const added = await ctx.client.addQuery(namespace, sql)

  if (!added.success || !added.query) {
    return { added }
  }

  return { added, executed: await ctx.client.executeQuery(added.query) }
}

/**
 * Add a query to the namespace and fetch its plan
 */
export async function explainQuery(ctx: OperationContext, sql: string): Promise<QueryPlanResult> {
  const namespace = await requireNamespace(ctx)
  const added = await ctx.client.addQuery(namespace, sql)

  if (!added.success || !added.query) {
    return { added }
  }

  return { added, plan: await ctx.client.getQueryPlan(added.query) }
}

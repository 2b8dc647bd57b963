/**
 * Shared Operation Context
 *
 * Connects to a server once per command and carries the client and the
 * namespace the command works in.
 */

import type { Namespace } from '../entities.js'
import type { ConnectionOptions } from '../types.js'

import { CdevClient } from '../api/index.js'
import { CdevError } from '../errors.js'
import { InstanceRegistry, resolveConnection } from '../instances.js'

/**
 * Error thrown when an operation cannot proceed
 */
export class OperationError extends CdevError {
  constructor(code: string, message: string) {
    super(code, message)
    this.name = 'OperationError'
  }
}

export interface OperationContext {
  client: CdevClient
  namespaceName: string
}

export interface CreateContextOptions extends ConnectionOptions {
  namespace: string
  registry?: InstanceRegistry
}

/**
 * Resolve connection settings and connect (runs server discovery)
 */
export async function createContext(options: CreateContextOptions): Promise<OperationContext> {
  const registry = options.registry ?? InstanceRegistry.load()
  const client = await CdevClient.connect(resolveConnection(options, registry))

  return {
    client,
    namespaceName: options.namespace,
  }
}

/**
 * Look up the context's namespace on the server
 *
 * @throws OperationError if the server has no such namespace
 */
export async function requireNamespace(ctx: OperationContext): Promise<Namespace> {
  const namespace = await ctx.client.findNamespace(ctx.namespaceName)
  if (!namespace) {
    throw new OperationError('NAMESPACE_NOT_FOUND', `Namespace "${ctx.namespaceName}" not found`)
  }

  return namespace
}

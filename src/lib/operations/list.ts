/**
 * Listing Operations
 */

import type { OperationContext } from './context.js'

import { fileKind, hasExtension, isSystemName, ROUTINE_TYPES, type RoutineType } from '../source-files.js'
import { requireNamespace } from './context.js'

export interface ListOptions {
  system?: boolean
}

export interface ListRoutinesOptions extends ListOptions {
  types?: RoutineType[]
}

export async function listNamespaces(ctx: OperationContext): Promise<string[]> {
  const namespaces = await ctx.client.getNamespaces()
  return namespaces.map(namespace => namespace.name).sort()
}

/**
 * Names of the namespace's classes, system classes included unless `system` is false
 */
export async function listClasses(ctx: OperationContext, options: ListOptions = {}): Promise<string[]> {
  const namespace = await requireNamespace(ctx)
  const files = await ctx.client.getFiles(namespace)

  return files
    .filter(file => fileKind(file.name) === 'class')
    .filter(file => options.system !== false || !isSystemName(file.name))
    .map(file => file.name)
    .sort()
}

/**
 * Names of the namespace's routines of the given types (all routine types by default)
 */
export async function listRoutines(ctx: OperationContext, options: ListRoutinesOptions = {}): Promise<string[]> {
  const namespace = await requireNamespace(ctx)
  const files = await ctx.client.getFiles(namespace)
  const types = options.types && options.types.length > 0 ? options.types : ROUTINE_TYPES

  return files
    .filter(file => hasExtension(file.name, types))
    .filter(file => options.system !== false || !isSystemName(file.name))
    .map(file => file.name)
    .sort()
}

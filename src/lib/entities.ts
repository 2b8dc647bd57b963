/**
 * Entity model for the dev API resource graph
 *
 * Every entity is decoded from the server's JSON with a zod schema.
 * Optional fields stay absent when the server leaves them out, so a
 * file without `content` (listed, not fetched) can be told apart from
 * a file whose content is the empty string.
 */

import { z } from 'zod'

import { DecodeError } from './errors.js'

// Opaque path issued by the server, echoed back verbatim
const locator = z.string()

// ========== Resources ==========

export const rootSchema = z.object({
  namespaces: locator,
})

export const namespaceSchema = z.object({
  files: locator,
  id: locator,
  name: z.string(),
  queries: locator,
  xml: locator,
})

export const fileSchema = z.object({
  content: z.string().optional(),
  generatedfiles: locator.optional(),
  id: locator,
  name: z.string(),
  url: z.string().optional(),
  xml: locator.optional(),
})

export const xmlSchema = z.object({
  content: z.string().optional(),
  id: locator,
})

export const querySchema = z.object({
  cached: z.boolean(),
  content: z.string().optional(),
  id: locator,
  plan: locator,
})

export type Root = z.output<typeof rootSchema>
export type Namespace = z.output<typeof namespaceSchema>
export type CdevFile = z.output<typeof fileSchema>
export type XmlDocument = z.output<typeof xmlSchema>
export type Query = z.output<typeof querySchema>

// ========== Operations ==========

const envelope = {
  errors: z.unknown().optional(),
  success: z.boolean(),
}

export const fileOperationSchema = z
  .object({ ...envelope, file: fileSchema.optional() })
  .transform(op => ({ kind: 'file' as const, ...op }))

export const xmlOperationSchema = z
  .object({ ...envelope, file: fileSchema.optional(), xml: xmlSchema.optional() })
  .transform(op => ({ kind: 'xml' as const, ...op }))

export const queryOperationSchema = z
  .object({ ...envelope, query: querySchema.optional(), resultset: z.unknown().optional() })
  .transform(op => ({ kind: 'query' as const, ...op }))

export type FileOperation = z.output<typeof fileOperationSchema>
export type XmlOperation = z.output<typeof xmlOperationSchema>
export type QueryOperation = z.output<typeof queryOperationSchema>

/**
 * Outcome of fetching a query plan. `plan` holds the decoded body as sent.
 */
export interface QueryPlanOperation {
  errors?: unknown
  kind: 'plan'
  plan?: unknown
  success: boolean
}

export type Operation = FileOperation | QueryOperation | QueryPlanOperation | XmlOperation

/**
 * An operation the server accepted but reported as failed
 */
export type OperationFailure<T extends Operation = Operation> = T & { success: false }

export function isFailure<T extends Operation>(op: T): op is OperationFailure<T> {
  return !op.success
}

/**
 * True when a JSON value looks like an operation result
 */
export function isOperationEnvelope(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'success' in value && typeof value.success === 'boolean'
}

/**
 * Render an `errors` payload as text lines
 */
export function describeErrors(errors: unknown): string[] {
  if (errors === undefined || errors === null) return []
  if (typeof errors === 'string') return [errors]
  if (Array.isArray(errors)) return errors.flatMap(error => describeErrors(error))

  if (typeof errors === 'object') {
    for (const key of ['message', 'error', 'desc']) {
      const value: unknown = Reflect.get(errors, key)
      if (typeof value === 'string') return [value]
    }
  }

  return [JSON.stringify(errors)]
}

// ========== Decoding ==========

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}

function decode<S extends z.ZodTypeAny>(schema: S, entity: string, value: unknown): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new DecodeError(entity, formatIssues(result.error))
  }

  return result.data
}

export const decodeRoot = (value: unknown): Root => decode(rootSchema, 'root', value)
export const decodeNamespace = (value: unknown): Namespace => decode(namespaceSchema, 'namespace', value)
export const decodeNamespaces = (value: unknown): Namespace[] => decode(z.array(namespaceSchema), 'namespace list', value)
export const decodeFile = (value: unknown): CdevFile => decode(fileSchema, 'file', value)
export const decodeFiles = (value: unknown): CdevFile[] => decode(z.array(fileSchema), 'file list', value)
export const decodeXml = (value: unknown): XmlDocument => decode(xmlSchema, 'xml', value)
export const decodeQuery = (value: unknown): Query => decode(querySchema, 'query', value)
export const decodeFileOperation = (value: unknown): FileOperation => decode(fileOperationSchema, 'file operation', value)
export const decodeXmlOperation = (value: unknown): XmlOperation => decode(xmlOperationSchema, 'xml operation', value)
export const decodeQueryOperation = (value: unknown): QueryOperation => decode(queryOperationSchema, 'query operation', value)

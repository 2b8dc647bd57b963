/**
 * Output formatting for operation results
 */

import type { UploadResult } from './operations/files.js'

import { describeErrors, type Operation } from './entities.js'
import { logger } from './logger.js'

/**
 * One-line summary: the action on success, the action and the server's errors on failure
 */
export function summarizeOperation(action: string, op: Operation): string {
  if (op.success) {
    return action
  }

  const errors = describeErrors(op.errors)
  return errors.length > 0 ? `${action} failed: ${errors.join('; ')}` : `${action} failed`
}

/**
 * Print an operation's outcome with ✓ or ✗ and return whether it succeeded
 */
export function reportOperation(action: string, op: Operation): boolean {
  const summary = summarizeOperation(action, op)
  if (op.success) {
    logger.success(summary)
  } else {
    logger.fail(summary)
  }

  return op.success
}

/**
 * Text form of a resultset or plan: strings as sent, anything else as indented JSON
 */
export function formatPayload(payload: unknown): string {
  if (typeof payload === 'string') {
    return payload
  }

  return JSON.stringify(payload, null, 2) ?? ''
}

/**
 * Print the save and compile outcome of one uploaded file
 */
export function reportUpload(result: UploadResult): boolean {
  if (result.error !== undefined) {
    logger.fail(`${result.name}: ${result.error}`)
    return false
  }

  if (!result.save || !reportOperation(`${result.created ? 'Created' : 'Updated'} ${result.name}`, result.save)) {
    return false
  }

  return result.compile === undefined || reportOperation(`Compiled ${result.name}`, result.compile)
}

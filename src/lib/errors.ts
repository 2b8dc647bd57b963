/**
 * Error taxonomy for the dev API client
 *
 * Thrown errors cover failures the caller cannot treat as data: discovery
 * failures, unreadable responses and failed requests. A server reporting
 * `success: false` is not an error here; it comes back on the operation
 * wrapper (see entities.ts).
 */

/**
 * Base class for every error raised by the client
 */
export class CdevError extends Error {
  code: string

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.code = code
    this.name = 'CdevError'
  }
}

/**
 * The server could not be reached during discovery
 */
export class ConnectionError extends CdevError {
  constructor(message: string, cause?: unknown) {
    super('CONNECTION_FAILED', message, { cause })
    this.name = 'ConnectionError'
  }
}

/**
 * The server answered, but not with the expected resource shape
 */
export class ProtocolError extends CdevError {
  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(options?.code ?? 'INVALID_RESPONSE', message, { cause: options?.cause })
    this.name = 'ProtocolError'
  }
}

/**
 * A JSON value did not match the entity it was decoded as
 */
export class DecodeError extends ProtocolError {
  entity: string
  issues: string[]

  constructor(entity: string, issues: string[]) {
    super(`Cannot decode ${entity}: ${issues.join('; ')}`, { code: 'DECODE_FAILED' })
    this.entity = entity
    this.issues = issues
    this.name = 'DecodeError'
  }
}

/**
 * A request failed after the client was connected.
 * `status` is 0 when no HTTP response arrived at all.
 */
export class TransportError extends CdevError {
  status: number

  constructor(message: string, status: number, cause?: unknown) {
    super('TRANSPORT_FAILED', message, { cause })
    this.status = status
    this.name = 'TransportError'
  }
}

/**
 * Caller input rejected before any request was made
 */
export class ValidationError extends CdevError {
  constructor(code: 'INVALID_FILE_NAME' | 'INVALID_INSTANCE' | 'MISSING_CONTENT' | 'MISSING_LOCATOR', message: string) {
    super(code, message)
    this.name = 'ValidationError'
  }
}

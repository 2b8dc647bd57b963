/**
 * Files API module (classes, routines and generated code)
 */

import {
  type CdevFile,
  decodeFile,
  decodeFileOperation,
  decodeFiles,
  type FileOperation,
  type Namespace,
} from '../entities.js'
import { ValidationError } from '../errors.js'
import { normalizeLineEndings, validateFileName } from '../source-files.js'
import { BaseApi } from './base.js'

export class FilesApi extends BaseApi {
  /**
   * Create a file in a namespace. Content is sent with CRLF line endings.
   */
  async add(namespace: Namespace, name: string, content: string): Promise<FileOperation> {
    const problem = validateFileName(name)
    if (problem) {
      throw new ValidationError('INVALID_FILE_NAME', problem)
    }

    return this.fetchOperation('PUT', namespace.files, decodeFileOperation, {
      content: normalizeLineEndings(content),
      name,
    })
  }

  /**
   * Compile a file. An empty spec leaves the flags to the server.
   */
  async compile(file: CdevFile, spec = ''): Promise<FileOperation> {
    return this.fetchOperation('POST', file.id, decodeFileOperation, { action: 'compile', spec })
  }

  async find(namespace: Namespace, name: string): Promise<CdevFile | null> {
    const files = await this.list(namespace)
    return files.find(file => file.name === name) ?? null
  }

  async get(file: CdevFile): Promise<CdevFile> {
    return this.fetchResource('GET', file.id, decodeFile)
  }

  /**
   * Files produced by compiling this one. A file that was never compiled has none.
   */
  async listGenerated(file: CdevFile): Promise<CdevFile[]> {
    if (file.generatedfiles === undefined) {
      return []
    }

    return this.fetchResource('GET', file.generatedfiles, decodeFiles)
  }

  /**
   * List a namespace's files, without content
   */
  async list(namespace: Namespace): Promise<CdevFile[]> {
    return this.fetchResource('GET', namespace.files, decodeFiles)
  }

  async put(file: CdevFile): Promise<FileOperation> {
    const body: CdevFile = file.content === undefined
      ? file
      : { ...file, content: normalizeLineEndings(file.content) }

    return this.fetchOperation('PUT', file.id, decodeFileOperation, body)
  }
}

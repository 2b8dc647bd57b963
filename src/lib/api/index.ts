/**
 * Dev API client
 * Main entry point that composes all API modules
 */

import type {
  CdevFile,
  FileOperation,
  Namespace,
  Query,
  QueryOperation,
  QueryPlanOperation,
  Root,
  XmlDocument,
  XmlOperation,
} from '../entities.js'
import type { CdevConnection } from '../types.js'

import { decodeRoot } from '../entities.js'
import { ConnectionError, ProtocolError } from '../errors.js'
import { FilesApi } from './files.js'
import { NamespacesApi } from './namespaces.js'
import { QueriesApi } from './queries.js'
import { apiRequest, urlPrefix } from './request.js'
import { XmlApi } from './xml.js'

/**
 * Fixed discovery path; everything else is reached through locators it returns
 */
export const ROOT_LOCATOR = '/csp/sys/dev/'

/**
 * Client for one server. Create it with `CdevClient.connect`, which performs
 * the discovery request; a client only exists once discovery succeeded.
 *
 * @example
 * const client = await CdevClient.connect({ host: 'localhost', port: 57772, username: '_SYSTEM', password: 'SYS' })
 * const user = await client.findNamespace('USER')
 * const files = await client.getFiles(user)
 */
export class CdevClient {
  private readonly filesApi: FilesApi
  private readonly namespacesApi: NamespacesApi
  private readonly queriesApi: QueriesApi
  private readonly xmlApi: XmlApi

  private constructor(
    readonly connection: CdevConnection,
    readonly root: Root
  ) {
    this.filesApi = new FilesApi(connection)
    this.namespacesApi = new NamespacesApi(connection, root)
    this.queriesApi = new QueriesApi(connection)
    this.xmlApi = new XmlApi(connection)
  }

  /**
   * Discover the server's root resource and return a connected client
   *
   * @throws ConnectionError when the server cannot be reached
   * @throws ProtocolError when the server's answer is not a dev API root
   */
  static async connect(connection: CdevConnection): Promise<CdevClient> {
    const response = await apiRequest(connection, 'GET', ROOT_LOCATOR)

    if (response.status === 0) {
      throw new ConnectionError(
        `Cannot connect to server at ${urlPrefix(connection)}: ${response.error ?? 'unknown error'}`,
        response.cause
      )
    }

    if (!response.ok) {
      throw new ProtocolError(`Invalid server response: ${response.error ?? 'unknown error'}`)
    }

    if (response.parseError !== undefined) {
      throw new ProtocolError(`Invalid server response: ${response.parseError}`)
    }

    try {
      return new CdevClient(connection, decodeRoot(response.data))
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ProtocolError(`Invalid server response: ${message}`, { cause: error })
    }
  }

  get urlPrefix(): string {
    return urlPrefix(this.connection)
  }

  // ========== Namespaces ==========

  findNamespace(name: string): Promise<Namespace | null> {
    return this.namespacesApi.find(name)
  }

  getNamespaces(): Promise<Namespace[]> {
    return this.namespacesApi.list()
  }

  // ========== Files ==========

  addFile(namespace: Namespace, name: string, content: string): Promise<FileOperation> {
    return this.filesApi.add(namespace, name, content)
  }

  compileFile(file: CdevFile, spec = ''): Promise<FileOperation> {
    return this.filesApi.compile(file, spec)
  }

  findFile(namespace: Namespace, name: string): Promise<CdevFile | null> {
    return this.filesApi.find(namespace, name)
  }

  getFile(file: CdevFile): Promise<CdevFile> {
    return this.filesApi.get(file)
  }

  getFiles(namespace: Namespace): Promise<CdevFile[]> {
    return this.filesApi.list(namespace)
  }

  getGeneratedFiles(file: CdevFile): Promise<CdevFile[]> {
    return this.filesApi.listGenerated(file)
  }

  putFile(file: CdevFile): Promise<FileOperation> {
    return this.filesApi.put(file)
  }

  // ========== XML ==========

  addXml(namespace: Namespace, content: string): Promise<XmlOperation> {
    return this.xmlApi.add(namespace, content)
  }

  getXml(file: CdevFile): Promise<XmlDocument> {
    return this.xmlApi.get(file)
  }

  putXml(xml: XmlDocument): Promise<XmlOperation> {
    return this.xmlApi.put(xml)
  }

  // ========== Queries ==========

  addQuery(namespace: Namespace, sql: string): Promise<QueryOperation> {
    return this.queriesApi.add(namespace, sql)
  }

  executeQuery(query: Query): Promise<QueryOperation> {
    return this.queriesApi.execute(query)
  }

  getQueryPlan(query: Query): Promise<QueryPlanOperation> {
    return this.queriesApi.plan(query)
  }
}

export { apiRequest, authorizationHeader, expectData, urlPrefix } from './request.js'
export type { ApiResponse } from './request.js'

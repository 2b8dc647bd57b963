/**
 * Namespaces API module
 */

import type { CdevConnection } from '../types.js'

import { decodeNamespaces, type Namespace, type Root } from '../entities.js'
import { BaseApi } from './base.js'

export class NamespacesApi extends BaseApi {
  constructor(connection: CdevConnection, private root: Root) {
    super(connection)
  }

  async find(name: string): Promise<Namespace | null> {
    const wanted = name.toUpperCase()
    const namespaces = await this.list()
    return namespaces.find(namespace => namespace.name.toUpperCase() === wanted) ?? null
  }

  async list(): Promise<Namespace[]> {
    return this.fetchResource('GET', this.root.namespaces, decodeNamespaces)
  }
}

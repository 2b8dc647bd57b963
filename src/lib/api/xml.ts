/**
 * XML export/import API module
 */

import {
  type CdevFile,
  decodeXml,
  decodeXmlOperation,
  type Namespace,
  type XmlDocument,
  type XmlOperation,
} from '../entities.js'
import { ValidationError } from '../errors.js'
import { BaseApi } from './base.js'

export class XmlApi extends BaseApi {
  /**
   * Import an XML export into a namespace. The server works out which file it describes.
   */
  async add(namespace: Namespace, content: string): Promise<XmlOperation> {
    return this.fetchOperation('PUT', namespace.xml, decodeXmlOperation, { content })
  }

  async get(file: CdevFile): Promise<XmlDocument> {
    if (file.xml === undefined) {
      throw new ValidationError('MISSING_LOCATOR', `File "${file.name}" has no XML export`)
    }

    return this.fetchResource('GET', file.xml, decodeXml)
  }

  async put(xml: XmlDocument): Promise<XmlOperation> {
    if (xml.content === undefined) {
      throw new ValidationError('MISSING_CONTENT', `XML document "${xml.id}" has no content to send`)
    }

    return this.fetchOperation('PUT', xml.id, decodeXmlOperation, { content: xml.content })
  }
}

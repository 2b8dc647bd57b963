/**
 * In-process stand-in for a server's dev API
 *
 * Replaces globalThis.fetch while installed. Keeps a small in-memory
 * namespace/file/query model so tests can round-trip through the client,
 * and records every request it receives.
 */

export const ORIGIN = 'http://devhost:57772'
export const ROOT = '/csp/sys/dev/'
export const NAMESPACES = '/csp/sys/dev/namespaces'

export interface RecordedRequest {
  body?: unknown
  headers: Record<string, string>
  method: string
  path: string
}

export interface FakeReply {
  body?: unknown
  // Headers arrive, then reading the body fails with this message
  brokenBody?: string
  raw?: string
  status?: number
}

interface StoredFile {
  compiled: boolean
  content: string
  name: string
}

interface StoredQuery {
  content: string
}

const NAMESPACE_NAMES = ['SAMPLES', 'USER']

export function namespaceJson(name: string) {
  return {
    files: `/csp/sys/dev/${name}/files`,
    id: `/csp/sys/dev/namespaces/${name}`,
    name,
    queries: `/csp/sys/dev/${name}/queries`,
    xml: `/csp/sys/dev/${name}/xml`,
  }
}

function stemOf(name: string): string {
  return name.slice(0, name.lastIndexOf('.'))
}

function extensionOf(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1)
}

export class FakeDevServer {
  readonly files = new Map<string, StoredFile>()
  readonly queries = new Map<string, StoredQuery>()
  readonly requests: RecordedRequest[] = []
  unreachable = false

  private originalFetch: typeof fetch | undefined
  private overrides = new Map<string, FakeReply>()

  constructor() {
    this.seed('SAMPLES', 'Sample.Person.cls', 'Class Sample.Person Extends %Persistent\r\n{\r\n}\r\n')
    this.seed('SAMPLES', '%Library.Persistent.cls', 'Class %Library.Persistent\r\n{\r\n}\r\n')
    this.seed('SAMPLES', 'LDAP.mac', 'LDAP ; LDAP samples\r\n quit\r\n')
    this.seed('SAMPLES', 'LDAP.int', 'LDAP ; LDAP samples\r\n quit\r\n')
    this.seed('SAMPLES', '%occStatus.inc', '#define OK 1\r\n')
  }

  /**
   * Locator of a file in a namespace
   */
  static fileLocator(namespace: string, name: string): string {
    return `/csp/sys/dev/${namespace}/files/${name}`
  }

  install(): void {
    this.originalFetch = globalThis.fetch
    globalThis.fetch = this.fetch
  }

  /**
   * Answer `method path` with a fixed reply instead of the model
   */
  reply(method: string, path: string, reply: FakeReply): void {
    this.overrides.set(`${method} ${path}`, reply)
  }

  restore(): void {
    if (this.originalFetch) {
      globalThis.fetch = this.originalFetch
    }
  }

  seed(namespace: string, name: string, content: string): void {
    this.files.set(FakeDevServer.fileLocator(namespace, name), { compiled: false, content, name })
  }

  private readonly fetch: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : (input instanceof URL ? input.href : input.url)
    if (this.unreachable) {
      throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:57772') })
    }

    const headers: Record<string, string> = {}
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value
    })

    const request: RecordedRequest = {
      headers,
      method: init?.method ?? 'GET',
      path: url.startsWith(ORIGIN) ? url.slice(ORIGIN.length) : url,
    }
    if (typeof init?.body === 'string') {
      request.body = JSON.parse(init.body)
    }

    this.requests.push(request)

    const reply = this.overrides.get(`${request.method} ${request.path}`) ?? this.route(request)
    if (reply.brokenBody !== undefined) {
      const message = reply.brokenBody
      const stream = new ReadableStream({
        start(controller) {
          controller.error(new Error(message))
        },
      })
      return new Response(stream, { status: reply.status ?? 200 })
    }

    const text = reply.raw ?? (reply.body === undefined ? '' : JSON.stringify(reply.body))
    return new Response(text, {
      headers: { 'content-type': 'application/json' },
      status: reply.status ?? 200,
    })
  }

  private compile(locator: string, file: StoredFile): FakeReply {
    if (file.content.includes('SYNTAX ERROR')) {
      return { body: { errors: [{ message: `ERROR #5030: syntax error in ${file.name}` }], success: false }, status: 500 }
    }

    file.compiled = true
    return { body: { file: this.fileJson(locator, file), success: true } }
  }

  private fileJson(locator: string, file: StoredFile) {
    const namespace = locator.split('/')[4]
    return {
      content: file.content,
      id: locator,
      name: file.name,
      xml: `/csp/sys/dev/${namespace}/xml/${file.name}`,
      ...(file.compiled && { generatedfiles: `${locator}/generated` }),
    }
  }

  private generated(namespace: string, file: StoredFile): FakeReply {
    const name = `${stemOf(file.name)}.1.int`
    const locator = FakeDevServer.fileLocator(namespace, name)
    this.files.set(locator, { compiled: false, content: `${stemOf(file.name)}.1 ; generated\r\n`, name })
    return { body: [{ id: locator, name }] }
  }

  private importXml(namespace: string, content: string): FakeReply {
    const classMatch = /<Class name="([^"]+)">/.exec(content)
    const routineMatch = /<Routine name="([^"]+)" type="([A-Z]+)">/.exec(content)
    const body = /<!\[CDATA\[([\s\S]*)]]>/.exec(content)

    let name: string
    if (classMatch) {
      name = `${classMatch[1]}.cls`
    } else if (routineMatch) {
      name = `${routineMatch[1]}.${routineMatch[2].toLowerCase()}`
    } else {
      return { body: { errors: ['No class or routine found in XML'], success: false }, status: 400 }
    }

    const locator = FakeDevServer.fileLocator(namespace, name)
    const existing = this.files.get(locator)
    const file: StoredFile = { compiled: existing?.compiled ?? false, content: body ? body[1] : '', name }
    this.files.set(locator, file)

    const { content: _content, ...listed } = this.fileJson(locator, file)
    return {
      body: {
        file: listed,
        success: true,
        xml: { id: `/csp/sys/dev/${namespace}/xml/${name}` },
      },
    }
  }

  private route(request: RecordedRequest): FakeReply {
    const { method, path } = request

    if (path === ROOT && method === 'GET') {
      return { body: { namespaces: NAMESPACES } }
    }

    if (path === NAMESPACES && method === 'GET') {
      return { body: NAMESPACE_NAMES.map(name => namespaceJson(name)) }
    }

    const match = /^\/csp\/sys\/dev\/([A-Z]+)\/(files|queries|xml)(?:\/(.+))?$/.exec(path)
    if (!match || !NAMESPACE_NAMES.includes(match[1])) {
      return { body: { error: 'Not Found' }, status: 404 }
    }

    const [, namespace, collection, rest] = match
    const body = typeof request.body === 'object' && request.body !== null ? request.body : {}
    const field = (key: string): unknown => Reflect.get(body, key)

    if (collection === 'files') {
      return this.routeFiles(namespace, method, rest, field)
    }

    if (collection === 'xml') {
      const content = field('content')
      if (method === 'PUT' && typeof content === 'string') {
        return this.importXml(namespace, content)
      }

      if (method === 'GET' && rest !== undefined) {
        const file = this.files.get(FakeDevServer.fileLocator(namespace, rest))
        if (file) {
          return { body: { content: this.xmlFor(file), id: path } }
        }
      }

      return { body: { error: 'Not Found' }, status: 404 }
    }

    return this.routeQueries(namespace, method, rest, field)
  }

  private routeFiles(namespace: string, method: string, rest: string | undefined, field: (key: string) => unknown): FakeReply {
    const prefix = `/csp/sys/dev/${namespace}/files/`

    if (rest === undefined) {
      if (method === 'GET') {
        return {
          body: [...this.files.entries()]
            .filter(([locator]) => locator.startsWith(prefix))
            .map(([id, file]) => ({ id, name: file.name })),
        }
      }

      const name = field('name')
      const content = field('content')
      if (method === 'PUT' && typeof name === 'string' && typeof content === 'string') {
        const locator = prefix + name
        const file: StoredFile = { compiled: false, content, name }
        this.files.set(locator, file)
        return { body: { file: this.fileJson(locator, file), success: true } }
      }

      return { body: { errors: ['name and content are required'], success: false }, status: 400 }
    }

    if (rest.endsWith('/generated') && method === 'GET') {
      const file = this.files.get(prefix + rest.slice(0, -'/generated'.length))
      if (file?.compiled) {
        return this.generated(namespace, file)
      }

      return { body: { error: 'Not Found' }, status: 404 }
    }

    const locator = prefix + rest
    const file = this.files.get(locator)
    if (!file) {
      return { body: { error: 'Not Found' }, status: 404 }
    }

    if (method === 'GET') {
      return { body: this.fileJson(locator, file) }
    }

    const content = field('content')
    if (method === 'PUT' && typeof content === 'string') {
      file.content = content
      file.compiled = false
      return { body: { file: this.fileJson(locator, file), success: true } }
    }

    if (method === 'POST' && field('action') === 'compile') {
      return this.compile(locator, file)
    }

    return { body: { errors: ['Unsupported request'], success: false }, status: 400 }
  }

  private routeQueries(namespace: string, method: string, rest: string | undefined, field: (key: string) => unknown): FakeReply {
    const prefix = `/csp/sys/dev/${namespace}/queries`

    if (rest === undefined && method === 'PUT') {
      const sql = field('content')
      if (typeof sql !== 'string' || !/^\s*SELECT\s/i.test(sql)) {
        return { body: { errors: ['SQLCODE -1: invalid SQL statement'], success: false } }
      }

      const locator = `${prefix}/${this.queries.size + 1}`
      this.queries.set(locator, { content: sql })
      return {
        body: {
          query: { cached: false, content: sql, id: locator, plan: `${locator}/plan` },
          success: true,
        },
      }
    }

    if (rest?.endsWith('/plan') && method === 'GET') {
      const query = this.queries.get(`${prefix}/${rest.slice(0, -'/plan'.length)}`)
      if (query) {
        return { body: { content: `Read master map for: ${query.content}`, id: `${prefix}/${rest}` } }
      }
    }

    const query = rest === undefined ? undefined : this.queries.get(`${prefix}/${rest}`)
    if (query && method === 'POST' && field('action') === 'execute') {
      const columns = (/^\s*SELECT\s+(.+?)\s+FROM\s/i.exec(query.content)?.[1] ?? '')
        .split(',')
        .map(column => column.trim())

      return {
        body: {
          query: { cached: true, content: query.content, id: `${prefix}/${rest}`, plan: `${prefix}/${rest}/plan` },
          resultset: { columns, rows: [] },
          success: true,
        },
      }
    }

    return { body: { error: 'Not Found' }, status: 404 }
  }

  private xmlFor(file: StoredFile): string {
    const element = extensionOf(file.name) === 'cls'
      ? `<Class name="${stemOf(file.name)}">`
      : `<Routine name="${stemOf(file.name)}" type="${extensionOf(file.name).toUpperCase()}">`
    const closing = extensionOf(file.name) === 'cls' ? '</Class>' : '</Routine>'
    return `<?xml version="1.0"?>\r\n<Export>${element}<![CDATA[${file.content}]]>${closing}</Export>\r\n`
  }
}

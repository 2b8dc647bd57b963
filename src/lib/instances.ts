/**
 * Instance registry - named servers in ~/.cdev/instances.yaml
 */

import * as yaml from 'js-yaml'
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { z } from 'zod'

import type { CdevConnection, CdevInstance, ConnectionOptions } from './types.js'

import { ValidationError } from './errors.js'
import { logger } from './logger.js'

export const DEFAULT_HOST = 'localhost'
export const DEFAULT_PORT = 57_772
export const DEFAULT_USERNAME = '_SYSTEM'
export const DEFAULT_PASSWORD = 'SYS'

// YAML file structure
const instancesYamlSchema = z.object({
  default: z.string().optional(),
  instances: z.record(z.object({
    host: z.string(),
    password: z.string().optional(),
    port: z.number().int().positive(),
    username: z.string().optional(),
  })),
})

type InstancesYaml = z.infer<typeof instancesYamlSchema>

/**
 * Directory holding cdev's own files (CDEV_HOME or ~/.cdev)
 */
export function getCdevHome(): string {
  return process.env.CDEV_HOME || join(homedir(), '.cdev')
}

export function getInstancesPath(): string {
  return join(getCdevHome(), 'instances.yaml')
}

export class InstanceRegistry {
  private defaultInstance: string | undefined
  private instances: Map<string, CdevInstance> = new Map()

  private constructor(readonly path: string) {}

  /**
   * Load the registry. A missing or unreadable file gives an empty registry.
   */
  static load(path?: string): InstanceRegistry {
    const registry = new InstanceRegistry(path ?? getInstancesPath())

    if (!existsSync(registry.path)) {
      return registry
    }

    let parsed: unknown
    try {
      parsed = yaml.load(readFileSync(registry.path, 'utf8'))
    } catch (error) {
      logger.warn(`Ignoring ${registry.path}: ${error instanceof Error ? error.message : String(error)}`)
      return registry
    }

    const result = instancesYamlSchema.safeParse(parsed)
    if (!result.success) {
      logger.warn(`Ignoring ${registry.path}: ${result.error.issues[0]?.message ?? 'invalid format'}`)
      return registry
    }

    for (const [name, entry] of Object.entries(result.data.instances)) {
      registry.add({ ...entry, name })
    }

    if (result.data.default && registry.get(result.data.default)) {
      registry.defaultInstance = result.data.default
    }

    return registry
  }

  /**
   * Add or replace an instance
   */
  add(instance: CdevInstance): void {
    const existing = this.get(instance.name)
    if (existing) {
      this.instances.delete(existing.name)
    }

    this.instances.set(instance.name, instance)
  }

  /**
   * Look up an instance by name, ignoring case
   */
  get(name: string): CdevInstance | undefined {
    const wanted = name.toUpperCase()
    return [...this.instances.values()].find(instance => instance.name.toUpperCase() === wanted)
  }

  getDefault(): CdevInstance | undefined {
    return this.defaultInstance === undefined ? undefined : this.get(this.defaultInstance)
  }

  listNames(): string[] {
    return [...this.instances.keys()]
  }

  remove(name: string): boolean {
    const existing = this.get(name)
    if (!existing) return false

    this.instances.delete(existing.name)
    if (this.defaultInstance !== undefined && this.defaultInstance.toUpperCase() === existing.name.toUpperCase()) {
      this.defaultInstance = undefined
    }

    return true
  }

  save(): void {
    const dir = dirname(this.path)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }

    const data: InstancesYaml = { instances: {} }
    if (this.defaultInstance) {
      data.default = this.defaultInstance
    }

    for (const instance of this.instances.values()) {
      data.instances[instance.name] = {
        host: instance.host,
        port: instance.port,
        ...(instance.username !== undefined && { username: instance.username }),
        ...(instance.password !== undefined && { password: instance.password }),
      }
    }

    writeFileSync(this.path, yaml.dump(data, { indent: 2, lineWidth: -1, noRefs: true }), 'utf8')
  }

  setDefault(name: string): void {
    const instance = this.get(name)
    if (!instance) {
      throw new ValidationError('INVALID_INSTANCE', `Instance "${name}" not found`)
    }

    this.defaultInstance = instance.name
  }
}

/**
 * Work out where to connect.
 * Priority: explicit host/port > named instance > default instance > built-in defaults.
 * Username and password options override whatever the instance entry says.
 */
export function resolveConnection(options: ConnectionOptions, registry: InstanceRegistry): CdevConnection {
  let base: Partial<CdevConnection> = {}

  if (options.instance) {
    const instance = registry.get(options.instance)
    if (!instance) {
      const known = registry.listNames()
      throw new ValidationError(
        'INVALID_INSTANCE',
        `Instance "${options.instance}" not found. Known instances: ${known.length > 0 ? known.join(', ') : 'none'}`
      )
    }

    logger.configResolution('instance', instance.name)
    base = instance
  } else if (options.host === undefined && options.port === undefined) {
    const instance = registry.getDefault()
    if (instance) {
      logger.configResolution('default instance', instance.name)
      base = instance
    }
  }

  const connection: CdevConnection = {
    host: options.host ?? base.host ?? DEFAULT_HOST,
    password: options.password ?? base.password ?? DEFAULT_PASSWORD,
    port: options.port ?? base.port ?? DEFAULT_PORT,
    username: options.username ?? base.username ?? DEFAULT_USERNAME,
  }

  logger.configResolution('connection', { host: connection.host, port: connection.port, username: connection.username })
  return connection
}

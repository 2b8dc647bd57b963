export {run} from '@oclif/core'

export {CdevClient, ROOT_LOCATOR} from './lib/api/index.js'
export type {ApiResponse} from './lib/api/index.js'
export * from './lib/entities.js'
export * from './lib/errors.js'
export {InstanceRegistry, resolveConnection} from './lib/instances.js'
export {normalizeLineEndings} from './lib/source-files.js'
export type {CdevConnection, CdevInstance, ConnectionOptions} from './lib/types.js'

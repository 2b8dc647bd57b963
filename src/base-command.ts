import {Command, Flags} from '@oclif/core'

import {CdevError} from './lib/errors.js'
import {logger, resolveVerbosity} from './lib/logger.js'
import {createContext, type OperationContext} from './lib/operations/index.js'

export interface ConnectionFlags {
  host?: string
  instance?: string
  namespace: string
  password?: string
  username?: string
  verbose: boolean
  'web-server-port'?: number
}

export default abstract class BaseCommand extends Command {
  static baseFlags = {
    host: Flags.string({
      char: 'H',
      description: 'Server host name',
      exclusive: ['instance'],
    }),
    instance: Flags.string({
      char: 'I',
      description: 'Instance name from ~/.cdev/instances.yaml',
      exclusive: ['host', 'web-server-port'],
    }),
    namespace: Flags.string({
      char: 'N',
      default: 'USER',
      description: 'Namespace to work in',
      env: 'CDEV_NAMESPACE',
    }),
    password: Flags.string({
      char: 'P',
      description: 'Password [default: SYS]',
      env: 'CDEV_PASSWORD',
    }),
    username: Flags.string({
      char: 'U',
      description: 'User name [default: _SYSTEM]',
      env: 'CDEV_USERNAME',
    }),
    verbose: Flags.boolean({
      char: 'V',
      default: false,
      description: 'Output details',
    }),
    'web-server-port': Flags.integer({
      char: 'W',
      description: 'Web server port [default: 57772]',
      exclusive: ['instance'],
      min: 1,
    }),
  }

  static flags = BaseCommand.baseFlags

  /**
   * Set verbosity from the flags and connect to the server
   */
  protected async connect(flags: ConnectionFlags): Promise<OperationContext> {
    logger.setLevel(resolveVerbosity(flags.verbose ? 1 : undefined))

    try {
      return await createContext({
        host: flags.host,
        instance: flags.instance,
        namespace: flags.namespace,
        password: flags.password,
        port: flags['web-server-port'],
        username: flags.username,
      })
    } catch (error) {
      return this.handleError(error)
    }
  }

  /**
   * Exit with the message of a client error; rethrow anything else
   */
  protected handleError(error: unknown): never {
    if (error instanceof CdevError) {
      this.error(error.message, {code: error.code, exit: 1})
    }

    throw error
  }

  protected stringArgv(argv: unknown[]): string[] {
    return argv.filter((arg): arg is string => typeof arg === 'string')
  }
}

import {Args, Command, Flags} from '@oclif/core'

import {CdevError} from '../../lib/errors.js'
import {DEFAULT_HOST, DEFAULT_PORT, InstanceRegistry} from '../../lib/instances.js'

export default class InstanceAdd extends Command {
  static args = {
    name: Args.string({
      description: 'Instance name',
      required: true,
    }),
  }

  static description = 'Add or update a named server instance'

  static examples = [
    '<%= config.bin %> <%= command.id %> LOCAL',
    '<%= config.bin %> <%= command.id %> STAGING -H staging.internal -W 57773 -U dev -P test-secret --default',
  ]

  static override flags = {
    default: Flags.boolean({
      default: false,
      description: 'Make this the default instance',
    }),
    host: Flags.string({
      char: 'H',
      default: DEFAULT_HOST,
      description: 'Server host name',
    }),
    password: Flags.string({
      char: 'P',
      description: 'Password',
    }),
    username: Flags.string({
      char: 'U',
      description: 'User name',
    }),
    'web-server-port': Flags.integer({
      char: 'W',
      default: DEFAULT_PORT,
      description: 'Web server port',
      min: 1,
    }),
  }

  async run(): Promise<void> {
    const {args, flags} = await this.parse(InstanceAdd)
    const registry = InstanceRegistry.load()
    const exists = registry.get(args.name) !== undefined

    registry.add({
      host: flags.host,
      name: args.name,
      port: flags['web-server-port'],
      ...(flags.username !== undefined && {username: flags.username}),
      ...(flags.password !== undefined && {password: flags.password}),
    })

    // The first instance becomes the default
    const setAsDefault = flags.default || registry.listNames().length === 1
    try {
      if (setAsDefault) registry.setDefault(args.name)
      registry.save()
    } catch (error) {
      if (error instanceof CdevError) this.error(error.message, {exit: 1})
      throw error
    }

    this.log(`Instance '${args.name}' ${exists ? 'updated' : 'added'} in ${registry.path}`)
    if (setAsDefault) {
      this.log(`Default instance set to '${args.name}'`)
    }
  }
}

import {Command, Flags} from '@oclif/core'

import {InstanceRegistry} from '../../lib/instances.js'

export default class InstanceList extends Command {
  static description = 'List the named server instances'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --details',
  ]

  static override flags = {
    details: Flags.boolean({
      char: 'd',
      default: false,
      description: 'Show host, port and user of each instance',
    }),
  }

  async run(): Promise<void> {
    const {flags} = await this.parse(InstanceList)
    const registry = InstanceRegistry.load()
    const names = registry.listNames().sort()

    if (names.length === 0) {
      this.log(`No instances found in ${registry.path}`)
      this.log(`Add one using '${this.config.bin} instance add'`)
      return
    }

    const defaultName = registry.getDefault()?.name
    for (const name of names) {
      const marker = name === defaultName ? ' [DEFAULT]' : ''
      const instance = registry.get(name)
      if (flags.details && instance) {
        this.log(`${name}${marker}: ${instance.host}:${instance.port} (${instance.username ?? 'default user'})`)
      } else {
        this.log(`${name}${marker}`)
      }
    }
  }
}

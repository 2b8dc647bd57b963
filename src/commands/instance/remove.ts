import {Args, Command} from '@oclif/core'

import {InstanceRegistry} from '../../lib/instances.js'

export default class InstanceRemove extends Command {
  static args = {
    name: Args.string({
      description: 'Instance name',
      required: true,
    }),
  }

  static description = 'Remove a named server instance'

  static examples = ['<%= config.bin %> <%= command.id %> STAGING']

  async run(): Promise<void> {
    const {args} = await this.parse(InstanceRemove)
    const registry = InstanceRegistry.load()

    if (!registry.remove(args.name)) {
      const known = registry.listNames()
      this.error(`Instance '${args.name}' not found. Known instances: ${known.length > 0 ? known.join(', ') : 'none'}`, {exit: 1})
    }

    registry.save()
    this.log(`Instance '${args.name}' removed`)
  }
}

import {Args, Command} from '@oclif/core'

import {CdevError} from '../../lib/errors.js'
import {InstanceRegistry} from '../../lib/instances.js'

export default class InstanceSetDefault extends Command {
  static args = {
    name: Args.string({
      description: 'Instance to use when no -H, -W or -I is given',
      required: true,
    }),
  }

  static description = 'Set the default server instance'

  static examples = [
    `$ cdev instance set-default STAGING
Default instance set to 'STAGING'
`,
  ]

  async run(): Promise<void> {
    const {args} = await this.parse(InstanceSetDefault)
    const registry = InstanceRegistry.load()

    try {
      registry.setDefault(args.name)
    } catch (error) {
      if (error instanceof CdevError) this.error(error.message, {exit: 1})
      throw error
    }

    registry.save()
    this.log(`Default instance set to '${registry.getDefault()?.name ?? args.name}'`)
  }
}

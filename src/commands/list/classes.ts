import {Flags} from '@oclif/core'

import BaseCommand from '../../base-command.js'
import {listClasses} from '../../lib/operations/index.js'

export default class ListClasses extends BaseCommand {
  static description = 'List the classes in a namespace'

  static examples = [
    '<%= config.bin %> <%= command.id %> -N SAMPLES',
    '<%= config.bin %> <%= command.id %> -N SAMPLES --no-system',
  ]

  static override flags = {
    ...BaseCommand.baseFlags,
    'no-system': Flags.boolean({
      char: 's',
      default: false,
      description: 'Hide system classes',
    }),
  }

  async run(): Promise<void> {
    const {flags} = await this.parse(ListClasses)
    const ctx = await this.connect(flags)

    try {
      for (const name of await listClasses(ctx, {system: !flags['no-system']})) {
        this.log(name)
      }
    } catch (error) {
      this.handleError(error)
    }
  }
}

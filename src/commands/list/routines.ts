import {Flags} from '@oclif/core'

import BaseCommand from '../../base-command.js'
import {listRoutines} from '../../lib/operations/index.js'
import {isRoutineType, ROUTINE_TYPES} from '../../lib/source-files.js'

export default class ListRoutines extends BaseCommand {
  static description = 'List the routines in a namespace'

  static examples = [
    '<%= config.bin %> <%= command.id %> -N SAMPLES',
    '<%= config.bin %> <%= command.id %> -N SAMPLES -t mac -t inc --no-system',
  ]

  static override flags = {
    ...BaseCommand.baseFlags,
    'no-system': Flags.boolean({
      char: 's',
      default: false,
      description: 'Hide system routines',
    }),
    type: Flags.string({
      char: 't',
      description: 'Routine type to include (repeatable)',
      multiple: true,
      options: [...ROUTINE_TYPES],
    }),
  }

  async run(): Promise<void> {
    const {flags} = await this.parse(ListRoutines)
    const ctx = await this.connect(flags)
    const types = (flags.type ?? []).filter(isRoutineType)

    try {
      for (const name of await listRoutines(ctx, {system: !flags['no-system'], types})) {
        this.log(name)
      }
    } catch (error) {
      this.handleError(error)
    }
  }
}

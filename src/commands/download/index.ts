import {Args, Flags} from '@oclif/core'

import BaseCommand from '../../base-command.js'
import {logger} from '../../lib/logger.js'
import {type DownloadResult, downloadFiles} from '../../lib/operations/index.js'

export default class Download extends BaseCommand {
  static args = {
    names: Args.string({
      description: 'Classes or routines to download, e.g. Sample.Person.cls',
      required: true,
    }),
  }

  static description = 'Download classes or routines'

  static examples = [
    '<%= config.bin %> <%= command.id %> Sample.Person.cls LDAP.mac',
    '<%= config.bin %> <%= command.id %> -N SAMPLES -d ./src Sample.Person.cls',
  ]

  static override flags = {
    ...BaseCommand.baseFlags,
    dir: Flags.string({
      char: 'd',
      default: '.',
      description: 'Directory to write files to',
    }),
  }

  static strict = false

  async run(): Promise<void> {
    const {argv, flags} = await this.parse(Download)
    const ctx = await this.connect(flags)

    let results: DownloadResult[]
    try {
      results = await downloadFiles(ctx, this.stringArgv(argv), flags.dir)
    } catch (error) {
      this.handleError(error)
    }

    let failures = 0
    for (const result of results) {
      if (result.path === undefined) {
        logger.fail(`${result.name}: ${result.error ?? 'not downloaded'}`)
        failures++
      } else {
        logger.success(`Downloaded ${result.name} → ${result.path}`)
      }
    }

    if (failures > 0) {
      this.error(`${failures} of ${results.length} file(s) failed`, {exit: 1})
    }
  }
}

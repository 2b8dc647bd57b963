import {Args, Flags} from '@oclif/core'

import BaseCommand from '../../base-command.js'
import {reportOperation} from '../../lib/format.js'
import {logger} from '../../lib/logger.js'
import {importXmlFiles, type ImportResult} from '../../lib/operations/index.js'

export default class Import extends BaseCommand {
  static args = {
    files: Args.string({
      description: 'XML export files to import',
      required: true,
    }),
  }

  static description = 'Import and compile XML exports of classes or routines'

  static examples = [
    '<%= config.bin %> <%= command.id %> Sample.Person.xml',
  ]

  static override flags = {
    ...BaseCommand.baseFlags,
    spec: Flags.string({
      char: 'c',
      default: '',
      description: 'Compiler flags (server defaults when empty)',
    }),
  }

  static strict = false

  async run(): Promise<void> {
    const {argv, flags} = await this.parse(Import)
    const ctx = await this.connect(flags)

    let results: ImportResult[]
    try {
      results = await importXmlFiles(ctx, this.stringArgv(argv), flags.spec)
    } catch (error) {
      this.handleError(error)
    }

    let failures = 0
    for (const result of results) {
      if (result.error !== undefined || !result.import) {
        logger.fail(`${result.path}: ${result.error ?? 'not imported'}`)
        failures++
        continue
      }

      const target = result.import.file ? ` as ${result.import.file.name}` : ''
      if (!reportOperation(`Imported ${result.path}${target}`, result.import)) {
        failures++
        continue
      }

      if (result.compile && !reportOperation(`Compiled ${result.import.file?.name ?? result.path}`, result.compile)) {
        failures++
      }
    }

    if (failures > 0) {
      this.error(`${failures} of ${results.length} file(s) failed`, {exit: 1})
    }
  }
}

import {Args, Flags} from '@oclif/core'
import {writeFileSync} from 'node:fs'

import BaseCommand from '../../base-command.js'
import {logger} from '../../lib/logger.js'
import {type ExportResult, exportXml} from '../../lib/operations/index.js'

export default class Export extends BaseCommand {
  static args = {
    names: Args.string({
      description: 'Classes or routines to export',
      required: true,
    }),
  }

  static description = 'Export classes or routines as XML'

  static examples = [
    '<%= config.bin %> <%= command.id %> Sample.Person.cls',
    '<%= config.bin %> <%= command.id %> -o person.xml Sample.Person.cls',
  ]

  static override flags = {
    ...BaseCommand.baseFlags,
    output: Flags.string({
      char: 'o',
      description: 'File to write to (stdout when not given)',
    }),
  }

  static strict = false

  async run(): Promise<void> {
    const {argv, flags} = await this.parse(Export)
    const ctx = await this.connect(flags)

    let results: ExportResult[]
    try {
      results = await exportXml(ctx, this.stringArgv(argv))
    } catch (error) {
      this.handleError(error)
    }

    const documents: string[] = []
    for (const result of results) {
      if (result.content === undefined) {
        logger.error(`✗ ${result.name}: ${result.error ?? 'not exported'}`)
      } else {
        documents.push(result.content)
      }
    }

    if (flags.output) {
      writeFileSync(flags.output, documents.join('\n'), 'utf8')
      logger.fileOp('write', flags.output)
    } else {
      for (const document of documents) {
        this.log(document)
      }
    }

    if (documents.length < results.length) {
      this.error(`${results.length - documents.length} of ${results.length} file(s) failed`, {exit: 1})
    }
  }
}

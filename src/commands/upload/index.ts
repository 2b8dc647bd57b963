import {Args, Flags} from '@oclif/core'

import BaseCommand from '../../base-command.js'
import {reportUpload} from '../../lib/format.js'
import {uploadFiles, type UploadResult} from '../../lib/operations/index.js'

export default class Upload extends BaseCommand {
  static args = {
    files: Args.string({
      description: 'Class or routine files to upload',
      required: true,
    }),
  }

  static description = 'Upload and compile classes or routines'

  static examples = [
    '<%= config.bin %> <%= command.id %> Sample.Person.cls',
    '<%= config.bin %> <%= command.id %> -N SAMPLES -c ck src/*.cls src/*.mac',
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
    const {argv, flags} = await this.parse(Upload)
    const ctx = await this.connect(flags)

    let results: UploadResult[]
    try {
      results = await uploadFiles(ctx, this.stringArgv(argv), flags.spec)
    } catch (error) {
      this.handleError(error)
    }

    let failures = 0
    for (const result of results) {
      if (!reportUpload(result)) failures++
    }

    if (failures > 0) {
      this.error(`${failures} of ${results.length} file(s) failed`, {exit: 1})
    }
  }
}


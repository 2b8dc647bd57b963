import {Args, Flags} from '@oclif/core'
import {spawnSync} from 'node:child_process'

import BaseCommand from '../../base-command.js'
import {reportUpload} from '../../lib/format.js'
import {logger} from '../../lib/logger.js'
import {editFiles, type EditResult, OperationError} from '../../lib/operations/index.js'

/**
 * Open files in $VISUAL or $EDITOR (vi when neither is set) and wait for it to exit
 */
function openEditor(paths: string[]): void {
  const editor = process.env.VISUAL || process.env.EDITOR || 'vi'
  const [command, ...editorArgs] = editor.trim().split(/\s+/)

  const result = spawnSync(command, [...editorArgs, ...paths], {stdio: 'inherit'})
  if (result.error) {
    throw new OperationError('EDITOR_FAILED', `Cannot start editor "${editor}": ${result.error.message}`)
  }

  if (result.status !== 0) {
    throw new OperationError('EDITOR_FAILED', `Editor "${editor}" exited with status ${result.status}`)
  }
}

export default class Edit extends BaseCommand {
  static args = {
    names: Args.string({
      description: 'Classes or routines to edit',
      required: true,
    }),
  }

  static description = 'Edit classes or routines in your editor, then upload and compile the changes'

  static examples = [
    '<%= config.bin %> <%= command.id %> Sample.Person.cls',
    'EDITOR="code --wait" <%= config.bin %> <%= command.id %> Sample.Person.cls LDAP.mac',
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
    const {argv, flags} = await this.parse(Edit)
    const ctx = await this.connect(flags)

    let result: EditResult
    try {
      result = await editFiles(ctx, this.stringArgv(argv), openEditor, flags.spec)
    } catch (error) {
      this.handleError(error)
    }

    let failures = 0
    for (const download of result.downloads) {
      if (download.path === undefined) {
        logger.fail(`${download.name}: ${download.error ?? 'not downloaded'}`)
        failures++
      }
    }

    for (const name of result.unchanged) {
      logger.info(`  ${name} unchanged`)
    }

    for (const upload of result.uploads) {
      if (!reportUpload(upload)) failures++
    }

    if (failures > 0) {
      this.error(`${failures} file(s) failed`, {exit: 1})
    }
  }
}

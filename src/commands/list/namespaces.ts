import BaseCommand from '../../base-command.js'
import {listNamespaces} from '../../lib/operations/index.js'

export default class ListNamespaces extends BaseCommand {
  static description = 'List the namespaces on the server'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> -I LOCAL',
  ]

  static override flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const {flags} = await this.parse(ListNamespaces)
    const ctx = await this.connect(flags)

    try {
      for (const name of await listNamespaces(ctx)) {
        this.log(name)
      }
    } catch (error) {
      this.handleError(error)
    }
  }
}

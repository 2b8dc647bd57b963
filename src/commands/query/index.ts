import {Args, Flags} from '@oclif/core'

import BaseCommand from '../../base-command.js'
import {formatPayload, reportOperation} from '../../lib/format.js'
import {explainQuery, runQuery} from '../../lib/operations/index.js'

export default class Query extends BaseCommand {
  static args = {
    sql: Args.string({
      description: 'SQL statement',
      required: true,
    }),
  }

  static description = 'Run an SQL query in a namespace'

  static examples = [
    `<%= config.bin %> <%= command.id %> -N SAMPLES "SELECT Name, SSN FROM Sample.Person"`,
    `<%= config.bin %> <%= command.id %> --plan "SELECT Name FROM Sample.Person WHERE Age > 30"`,
  ]

  static override flags = {
    ...BaseCommand.baseFlags,
    plan: Flags.boolean({
      default: false,
      description: 'Show the query plan instead of running the query',
    }),
  }

  async run(): Promise<void> {
    const {args, flags} = await this.parse(Query)
    const ctx = await this.connect(flags)

    try {
      if (flags.plan) {
        const {added, plan} = await explainQuery(ctx, args.sql)
        if (!reportOperation('Query added', added) || !plan) this.exit(1)
        if (!reportOperation('Plan fetched', plan)) this.exit(1)
        this.log(formatPayload(plan.plan))
        return
      }

      const {added, executed} = await runQuery(ctx, args.sql)
      if (!reportOperation('Query added', added) || !executed) this.exit(1)
      if (!reportOperation('Query executed', executed)) this.exit(1)
      this.log(formatPayload(executed.resultset))
    } catch (error) {
      this.handleError(error)
    }
  }
}

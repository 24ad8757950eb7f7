import pc from 'picocolors'
import cac from 'cac'

import { getSupportedReleases } from '../core/releases/get-supported-releases'
import { getUploadGlobalTag } from '../core/tasks/get-upload-global-tag'
import { normalizeConditionsTask } from './normalize-conditions-task'
import { resolveRelease } from '../core/releases/resolve-release'
import { loadCliReleaseTable } from './load-cli-release-table'
import { getTicketRoute } from '../core/tasks/get-ticket-route'
import { toTicketIssue } from '../core/tasks/to-ticket-issue'
import { printRecommendation } from './print-recommendation'
import { composeTags } from '../core/tags/compose-tags'
import { loadCliMetadata } from './load-cli-metadata'
import { parseTagList } from './parse-tag-list'
import { version } from '../package.json'
import { printError } from './print-error'

/** Options shared by every command. */
interface GlobalOptions {
  /** Release table configuration file. */
  config?: string
}

/** Options of the `recommend` command. */
interface RecommendOptions extends GlobalOptions {
  /** Tags of the input files (repeatable, comma-separated). */
  baseTags?: string[] | string

  /** Tags set by the user (repeatable, comma-separated). */
  userTags?: string[] | string

  /** Input metadata file. */
  metadata?: string

  /** Print the recommendation as JSON. */
  json: boolean
}

/** Options of the `releases` command. */
interface ReleasesOptions extends GlobalOptions {
  /** List light releases. */
  light: boolean
}

/** Options of the `ticket` command. */
interface TicketOptions extends GlobalOptions {
  /** Print the complete issue record instead of the route. */
  legacy: boolean
}

/**
 * Runs a command action, reporting failures and exiting with code 1.
 *
 * @param action - Command body.
 */
async function runAction(action: () => Promise<void> | void): Promise<void> {
  try {
    await action()
  } catch (error) {
    printError(error)
    process.exit(1)
  }
}

/** Run the CLI. */
export function run(): void {
  let cli = cac('conditions-advisor')

  cli
    .help()
    .version(version)
    .option('--config <file>', 'Release table configuration (YAML or JSON)')

  cli
    .command('resolve [release]', 'Resolve the supported release to use')
    .action((release: string | undefined, options: GlobalOptions) =>
      runAction(async () => {
        let table = await loadCliReleaseTable(options.config)
        let resolved = resolveRelease(release ?? null, table)
        if (release && resolved !== release) {
          console.warn(
            pc.yellow(`${release} is not supported, resolved to ${resolved}`),
          )
        }
        console.info(resolved)
      }),
    )

  cli
    .command('releases', 'List supported releases, newest first')
    .option('--light', 'List light releases')
    .action((options: ReleasesOptions) =>
      runAction(async () => {
        let table = await loadCliReleaseTable(options.config)
        for (let release of getSupportedReleases(
          { light: options.light },
          table,
        )) {
          console.info(release)
        }
      }),
    )

  cli
    .command('recommend <release>', 'Recommend global tags for a job')
    .option('--base-tags <tags>', 'Global tags of the input files (repeatable)')
    .option('--user-tags <tags>', 'Global tags set by the user (repeatable)')
    .option('--metadata <file>', 'Metadata of the input files (YAML or JSON)')
    .option('--json', 'Print the recommendation as JSON')
    .action((release: string, options: RecommendOptions) =>
      runAction(async () => {
        let table = await loadCliReleaseTable(options.config)
        let metadata = await loadCliMetadata(options.metadata)
        let userTags = parseTagList(options.userTags)

        let recommendation = composeTags(
          release,
          parseTagList(options.baseTags),
          userTags.length > 0 ? userTags : null,
          metadata,
          table,
        )

        if (options.json) {
          console.info(JSON.stringify(recommendation, null, 2))
          return
        }
        printRecommendation(recommendation)
      }),
    )

  cli
    .command('upload-tag <task>', 'Show the global tag uploads of a task go to')
    .action((task: string) =>
      runAction(() => {
        let tag = getUploadGlobalTag(normalizeConditionsTask(task))
        console.info(tag ?? pc.gray('none (a new tag is created per request)'))
      }),
    )

  cli
    .command('ticket <task>', 'Show the ticket routing of a task')
    .option('--legacy', 'Print the complete issue record')
    .action((task: string, options: TicketOptions) =>
      runAction(() => {
        let route = getTicketRoute(normalizeConditionsTask(task))
        let output = options.legacy ? toTicketIssue(route) : route
        console.info(JSON.stringify(output, null, 2))
      }),
    )

  cli.command('', 'Show usage').action(() => {
    cli.outputHelp()
  })

  cli.parse()
}

#!/usr/bin/env tsx
import { program } from 'commander'
import { type LabelsyncClient, createClient } from './client'
import { formatContainers, formatOutcome, formatRepositories, outcomeVerdict } from './format'

const DEFAULT_API_URL = process.env.LABELSYNC_API_URL ?? 'http://localhost:3000'

program
  .name('labelsync')
  .description('Trigger repository syncs and inspect their outcomes')
  .version('0.1.0')

/**
 * Run a command against the API, printing the error and exiting 1 on failure.
 */
function run(url: string, fn: (client: LabelsyncClient) => Promise<void>, label: string) {
  return fn(createClient(url)).catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : `${label} failed`)
    process.exit(1)
  })
}

function print(json: boolean, value: unknown, text: () => string) {
  console.log(json ? JSON.stringify(value, null, 2) : text())
}

program
  .command('repos')
  .description('List registered repositories')
  .option('-u, --url <url>', 'Labelsync API URL', DEFAULT_API_URL)
  .option('--json', 'Print raw JSON')
  .action((options: { url: string; json?: boolean }) =>
    run(
      options.url,
      async (client) => {
        const repositories = await client.repositories()
        print(!!options.json, repositories, () => formatRepositories(repositories))
      },
      'List',
    ),
  )

program
  .command('sync <name>')
  .description('Sync a repository and restart its dependent containers')
  .option('-u, --url <url>', 'Labelsync API URL', DEFAULT_API_URL)
  .option('--json', 'Print raw JSON')
  .action((name: string, options: { url: string; json?: boolean }) =>
    run(
      options.url,
      async (client) => {
        const outcome = await client.sync(name)
        print(!!options.json, outcome, () => formatOutcome(outcome))
        if (outcomeVerdict(outcome) !== 'success') process.exitCode = 1
      },
      'Sync',
    ),
  )

program
  .command('sync-all')
  .description('Sync every active repository')
  .option('-u, --url <url>', 'Labelsync API URL', DEFAULT_API_URL)
  .option('--json', 'Print raw JSON')
  .action((options: { url: string; json?: boolean }) =>
    run(
      options.url,
      async (client) => {
        const result = await client.syncAll()
        print(!!options.json, result, () =>
          [
            ...result.results.map((entry) =>
              entry.outcome
                ? formatOutcome(entry.outcome)
                : `${entry.repositoryName} [rejected] ${entry.error ?? ''}`,
            ),
            `${result.succeeded}/${result.total} repositories synced`,
          ].join('\n'),
        )
        if (result.succeeded < result.total) process.exitCode = 1
      },
      'Sync all',
    ),
  )

program
  .command('history')
  .description('Show recent operations')
  .option('-u, --url <url>', 'Labelsync API URL', DEFAULT_API_URL)
  .option('-r, --repository <name>', 'Only operations for this repository')
  .option('-n, --limit <count>', 'Number of operations', '20')
  .option('--json', 'Print raw JSON')
  .action((options: { url: string; repository?: string; limit: string; json?: boolean }) =>
    run(
      options.url,
      async (client) => {
        const outcomes = await client.history({
          repository: options.repository,
          limit: Number.parseInt(options.limit, 10),
        })
        print(!!options.json, outcomes, () =>
          outcomes.length === 0 ? 'No operations logged' : outcomes.map(formatOutcome).join('\n\n'),
        )
      },
      'History',
    ),
  )

program
  .command('containers')
  .description('List containers that declare a repository dependency')
  .option('-u, --url <url>', 'Labelsync API URL', DEFAULT_API_URL)
  .option('-r, --repository <name>', 'Only containers depending on this repository')
  .option('-a, --all', 'Include containers without a restart label')
  .option('--json', 'Print raw JSON')
  .action((options: { url: string; repository?: string; all?: boolean; json?: boolean }) =>
    run(
      options.url,
      async (client) => {
        const containers = await client.containers({
          repository: options.repository,
          all: options.all,
        })
        print(!!options.json, containers, () => formatContainers(containers))
      },
      'Containers',
    ),
  )

await program.parseAsync()

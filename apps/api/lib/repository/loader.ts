/**
 * Repository registry file
 *
 * Reads `repositories:` from a YAML file and upserts the entries into the
 * store at startup.
 */

import { readFileSync } from 'node:fs'
import {
  type RepositoryRegistration,
  type ValidationError,
  safeParseRepositoriesFile,
} from '@labelsync/core'
import { parse as parseYaml } from 'yaml'
import type { Logger } from '../logger'
import type { SqliteRepositoryStore } from './store'

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} syntax and only replaces variables that are set.
 */
export function interpolateEnvVars(content: string, env: NodeJS.ProcessEnv = process.env): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
    if (varName in env) {
      return env[varName] ?? ''
    }
    return match
  })
}

export class RepositoriesFileError extends Error {
  constructor(
    public readonly file: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid repositories file ${file}:\n${errorList}`)
    this.name = 'RepositoriesFileError'
  }
}

/**
 * Load and validate a repositories YAML file.
 */
export function loadRepositoriesFile(filePath: string): RepositoryRegistration[] {
  const content = readFileSync(filePath, 'utf-8')

  let raw: unknown
  try {
    raw = parseYaml(interpolateEnvVars(content))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new RepositoriesFileError(filePath, [{ path: '/', message }])
  }

  const result = safeParseRepositoriesFile(raw)
  if (!result.success) {
    throw new RepositoriesFileError(filePath, result.errors)
  }
  return result.data.repositories
}

/**
 * Upsert registrations into the store. Repositories missing from the file are
 * left untouched.
 */
export function seedRepositories(
  store: SqliteRepositoryStore,
  registrations: RepositoryRegistration[],
  logger?: Logger,
): number {
  for (const registration of registrations) {
    store.register(registration)
    logger?.debug(
      { repository: registration.name, branch: registration.branch },
      'Repository registered',
    )
  }
  logger?.info({ count: registrations.length }, 'Repositories seeded')
  return registrations.length
}

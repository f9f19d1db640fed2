/**
 * Git credentials
 *
 * Credentials are handed to git through the environment and `-c` options of
 * the single invocation; nothing is written to the working tree's config.
 */

import { type Repository, isHttpUrl, isSshUrl } from '@labelsync/core'

export type GitCredentials =
  | { kind: 'ssh'; privateKeyPath: string }
  | { kind: 'https'; username: string; token: string }

export interface CredentialResolver {
  /**
   * Credentials for a repository, or undefined to use git's defaults.
   */
  resolve(repository: Repository): GitCredentials | undefined
}

export interface CredentialOptions {
  sshKeyPath?: string
  httpsUsername?: string
  httpsToken?: string
}

/**
 * Applies the SSH key to SSH-style URLs and the token to HTTPS URLs.
 */
export function createCredentialResolver(options: CredentialOptions): CredentialResolver {
  return {
    resolve(repository) {
      if (options.sshKeyPath && isSshUrl(repository.url)) {
        return { kind: 'ssh', privateKeyPath: options.sshKeyPath }
      }
      if (options.httpsToken && isHttpUrl(repository.url)) {
        return {
          kind: 'https',
          username: options.httpsUsername ?? 'x-access-token',
          token: options.httpsToken,
        }
      }
      return undefined
    },
  }
}

export interface GitInvocationAuth {
  env: Record<string, string>
  configArgs: string[]
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

/**
 * Translate credentials into environment variables and `-c` options.
 */
export function toInvocationAuth(credentials: GitCredentials | undefined): GitInvocationAuth {
  if (!credentials) {
    return { env: {}, configArgs: [] }
  }

  if (credentials.kind === 'ssh') {
    return {
      env: {
        GIT_SSH_COMMAND: [
          'ssh',
          '-i',
          shellQuote(credentials.privateKeyPath),
          '-o IdentitiesOnly=yes',
          '-o StrictHostKeyChecking=accept-new',
          '-o BatchMode=yes',
        ].join(' '),
      },
      configArgs: [],
    }
  }

  const basic = Buffer.from(`${credentials.username}:${credentials.token}`).toString('base64')
  return {
    env: {},
    configArgs: ['-c', `http.extraHeader=Authorization: Basic ${basic}`],
  }
}

/**
 * Helpers for git repository URLs.
 */

/**
 * Extract the repository name from a clone URL.
 *
 * @example extractRepoNameFromUrl('git@github.com:acme/svc-backend.git') // 'svc-backend'
 * @example extractRepoNameFromUrl('https://github.com/acme/svc-backend') // 'svc-backend'
 */
export function extractRepoNameFromUrl(url: string): string {
  const trimmed = url.trim()
  if (!trimmed) return 'unknown'

  let path: string
  if (/^[\w.-]+@[\w.-]+:/.test(trimmed)) {
    // scp-like syntax: user@host:owner/repo.git
    path = trimmed.slice(trimmed.indexOf(':') + 1)
  } else {
    try {
      path = new URL(trimmed).pathname
    } catch {
      path = trimmed
    }
  }

  path = path.replace(/\/+$/, '').replace(/\.git$/, '')
  const name = path.split('/').pop() ?? ''
  const sanitized = name.replace(/[^\w.-]/g, '_')
  return sanitized || 'unknown'
}

/**
 * Whether the URL is reached over SSH (scp-like or ssh://).
 */
export function isSshUrl(url: string): boolean {
  return url.startsWith('ssh://') || /^[\w.-]+@[\w.-]+:/.test(url)
}

/**
 * Whether the URL is reached over HTTP(S).
 */
export function isHttpUrl(url: string): boolean {
  return url.startsWith('https://') || url.startsWith('http://')
}

/**
 * Turn a repository name into a safe directory name.
 */
export function toDirectoryName(name: string): string {
  const sanitized = name.replace(/[^\w.-]/g, '_').replace(/^\.+/, '_')
  return sanitized || 'unknown'
}

/**
 * Branch name from a git ref, or undefined for tags and other refs.
 *
 * @example branchFromRef('refs/heads/main') // 'main'
 */
export function branchFromRef(ref: string | undefined): string | undefined {
  if (!ref?.startsWith('refs/heads/')) return undefined
  return ref.slice('refs/heads/'.length)
}

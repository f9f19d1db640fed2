/**
 * Parse duration string (e.g., "30s", "5m", "1000ms") to milliseconds
 */
export function parseDuration(duration: string): number {
  const match = duration.trim().match(/^(\d+)(ms|s|m|h)$/)
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}`)
  }
  const value = Number.parseInt(match[1], 10)
  const unit = match[2]
  switch (unit) {
    case 'ms':
      return value
    case 's':
      return value * 1000
    case 'm':
      return value * 60 * 1000
    case 'h':
      return value * 60 * 60 * 1000
    default:
      throw new Error(`Unknown duration unit: ${unit}`)
  }
}

/**
 * Format milliseconds to duration string
 */
export function formatDuration(ms: number): string {
  if (ms > 0 && ms % (60 * 60 * 1000) === 0) return `${ms / (60 * 60 * 1000)}h`
  if (ms > 0 && ms % (60 * 1000) === 0) return `${ms / (60 * 1000)}m`
  if (ms > 0 && ms % 1000 === 0) return `${ms / 1000}s`
  return `${ms}ms`
}

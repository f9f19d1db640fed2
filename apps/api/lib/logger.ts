/**
 * Structured Logger
 *
 * Creates a pino-based logger shared across all services. Outputs JSON;
 * services take a child logger tagged with their component name.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ level, base: { service: 'labelsync' } })
}

/**
 * Prometheus Metrics Module
 *
 * Central registry and exports for all labelsync metrics.
 * Follows Prometheus naming conventions with labelsync_ prefix.
 */

// Registry and system metrics
export { registry, startTime, systemInfo } from './registry'

export * from './orchestration'
export * from './http'

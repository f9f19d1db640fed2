/**
 * Orchestration Metrics
 *
 * Signals, git syncs, container restarts and the operation log writer.
 */

import { Counter, Gauge, Histogram } from 'prom-client'
import { registry } from './registry'

// Clones of large repositories can take minutes
const orchestrationBuckets = [0.5, 1, 5, 10, 30, 60, 120, 300]
const restartBuckets = [0.5, 1, 2.5, 5, 10, 30, 60]

export const signalsTotal = new Counter({
  name: 'labelsync_signals_total',
  help: 'Update signals by trigger and outcome status',
  labelNames: ['trigger', 'status'],
  registers: [registry],
})

export const signalsRejectedTotal = new Counter({
  name: 'labelsync_signals_rejected_total',
  help: 'Update signals refused before any work started',
  labelNames: ['reason'],
  registers: [registry],
})

export const orchestrationDuration = new Histogram({
  name: 'labelsync_orchestration_duration_seconds',
  help: 'Time from lock acquisition to logged outcome',
  labelNames: ['trigger'],
  buckets: orchestrationBuckets,
  registers: [registry],
})

export const syncOperationsTotal = new Counter({
  name: 'labelsync_sync_operations_total',
  help: 'Repository syncs by operation and result',
  labelNames: ['operation', 'status'],
  registers: [registry],
})

export const syncErrorsTotal = new Counter({
  name: 'labelsync_sync_errors_total',
  help: 'Repository sync failures by kind',
  labelNames: ['kind'],
  registers: [registry],
})

export const containerRestartsTotal = new Counter({
  name: 'labelsync_container_restarts_total',
  help: 'Dependent container restarts by action',
  labelNames: ['action'],
  registers: [registry],
})

export const containerRestartDuration = new Histogram({
  name: 'labelsync_container_restart_duration_seconds',
  help: 'Duration of a single container restart',
  buckets: restartBuckets,
  registers: [registry],
})

export const operationsInFlight = new Gauge({
  name: 'labelsync_operations_in_flight',
  help: 'Orchestrations currently holding a repository lock',
  registers: [registry],
})

export const operationsQueued = new Gauge({
  name: 'labelsync_operations_queued',
  help: 'Orchestrations waiting for a repository lock',
  registers: [registry],
})

export const operationLogDroppedTotal = new Counter({
  name: 'labelsync_operation_log_dropped_total',
  help: 'Outcomes dropped because the log queue was full',
  registers: [registry],
})

export const operationLogFailuresTotal = new Counter({
  name: 'labelsync_operation_log_failures_total',
  help: 'Outcomes the log sink failed to persist',
  registers: [registry],
})

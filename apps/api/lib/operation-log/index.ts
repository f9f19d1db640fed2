export {
  SqliteOperationLog,
  type OperationLogListener,
  type OperationLogSink,
  type OperationQuery,
} from './sink'
export {
  OperationLogWriter,
  type OperationLogWriterConfig,
  type OperationLogWriterStats,
} from './writer'

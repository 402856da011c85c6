export {
  type AuditLogLevel,
  type AuditLogEntry,
  type LogFormatter,
  type LogTransport,
  type AuditLogger,
  type LogContext,
  LOG_LEVELS,
  isLogLevel,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  AuditLoggerImpl,
  createAuditLogger,
  createSilentLogger,
} from "./logger.js";

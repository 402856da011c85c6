/**
 * Scope Audit Logging Subsystem
 *
 * Structured, levelled logging with named subsystems and pluggable transports.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type AuditLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type AuditLogEntry = {
  timestamp: Date;
  level: AuditLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  runId?: string;
  rootId?: string;
  scopeId?: string;
};

export type LogFormatter = (entry: AuditLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: AuditLogEntry): void;
}

export type LogContext = {
  runId?: string;
  rootId?: string;
  scopeId?: string;
};

export interface AuditLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): AuditLogger;
  withContext(context: LogContext): AuditLogger;
  setLevel(level: AuditLogLevel): void;
  getLevel(): AuditLogLevel;
  isLevelEnabled(level: AuditLogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<AuditLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export const LOG_LEVELS: readonly AuditLogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function isLogLevel(value: string): value is AuditLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function shouldLog(level: AuditLogLevel, minLevel: AuditLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<AuditLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: AuditLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.runId) contextParts.push(`run=${entry.runId}`);
    if (entry.rootId) contextParts.push(`root=${entry.rootId}`);
    if (entry.scopeId) contextParts.push(`scope=${entry.scopeId}`);
    if (contextParts.length > 0) parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes to stderr so that stdout stays free for report output.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: AuditLogEntry): void {
    process.stderr.write(`${this.formatter(entry)}\n`);
  }
}

/**
 * Keeps entries in memory. Used by tests and by callers that attach logs to a report.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: AuditLogEntry[] = [];

  write(entry: AuditLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: AuditLogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

type LevelRef = { level: AuditLogLevel };

export class AuditLoggerImpl implements AuditLogger {
  readonly subsystem: string;
  private levelRef: LevelRef;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: AuditLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    levelRef?: LevelRef;
  }) {
    this.subsystem = options.subsystem;
    // Children share the parent's level so setLevel on the root applies everywhere.
    this.levelRef = options.levelRef ?? { level: options.level ?? "info" };
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): AuditLogger {
    return new AuditLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      levelRef: this.levelRef,
      transports: this.transports,
      context: this.context,
    });
  }

  withContext(context: LogContext): AuditLogger {
    return new AuditLoggerImpl({
      subsystem: this.subsystem,
      levelRef: this.levelRef,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  setLevel(level: AuditLogLevel): void {
    this.levelRef.level = level;
  }

  getLevel(): AuditLogLevel {
    return this.levelRef.level;
  }

  isLevelEnabled(level: AuditLogLevel): boolean {
    return shouldLog(level, this.levelRef.level);
  }

  private log(level: AuditLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.levelRef.level)) return;

    const entry: AuditLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      metadata: meta,
      runId: this.context.runId,
      rootId: this.context.rootId,
      scopeId: this.context.scopeId,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createAuditLogger(
  subsystem: string,
  options?: { level?: AuditLogLevel; transports?: LogTransport[] },
): AuditLogger {
  return new AuditLoggerImpl({
    subsystem: `scope-audit/${subsystem}`,
    level: options?.level ?? "info",
    transports: options?.transports,
  });
}

/** Logger that drops everything. Default for library callers that pass none. */
export function createSilentLogger(): AuditLogger {
  return new AuditLoggerImpl({ subsystem: "scope-audit", level: "fatal", transports: [] });
}

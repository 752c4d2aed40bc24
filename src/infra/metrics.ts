/**
 * Observability / Metrics
 * =======================
 *
 * Structured metrics collection and levelled logging for the pipeline.
 * Every component owns a collector tagged with its name; entries go to an
 * in-memory ring and to a sink (console by default).
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log level.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  component: string;
  context?: Record<string, unknown>;
}

/**
 * Receives every entry at or above the collector's minimum level.
 */
export type LogSink = (entry: LogEntry) => void;

/**
 * Histogram summary.
 */
export interface HistogramStats {
  count: number;
  sum: number;
  avg: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
}

/**
 * Options for MetricsCollector.
 */
export interface MetricsCollectorOptions {
  /**
   * Entries below this level are dropped.
   * @default process.env.MCQ_LOG_LEVEL ?? 'info'
   */
  min_level?: LogLevel;

  /**
   * Output for entries.
   * @default consoleSink
   */
  sink?: LogSink;

  /**
   * Entries kept in memory.
   * @default 1000
   */
  max_logs?: number;
}

// =============================================================================
// Sinks
// =============================================================================

/**
 * Console output for development.
 */
export const consoleSink: LogSink = (entry) => {
  const prefix = `[${entry.component}]`;
  const context = entry.context ?? '';
  switch (entry.level) {
    case 'debug':
      console.debug(prefix, entry.message, context);
      break;
    case 'info':
      console.log(prefix, entry.message, context);
      break;
    case 'warn':
      console.warn(prefix, entry.message, context);
      break;
    case 'error':
      console.error(prefix, entry.message, context);
      break;
  }
};

/**
 * Discards output; entries stay readable through getLogs().
 */
export const silentSink: LogSink = () => {};

/**
 * Parse a log level from untrusted input.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
    ? normalized
    : undefined;
}

// =============================================================================
// Metrics Collector
// =============================================================================

/**
 * Metrics collector.
 */
export class MetricsCollector {
  private counters: Map<string, { value: number; labels: Record<string, string> }> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private logs: LogEntry[] = [];

  readonly component: string;
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly maxLogs: number;

  constructor(component: string, options: MetricsCollectorOptions = {}) {
    this.component = component;
    this.minLevel = options.min_level ?? parseLogLevel(process.env.MCQ_LOG_LEVEL) ?? 'info';
    this.sink = options.sink ?? consoleSink;
    this.maxLogs = options.max_logs ?? 1000;
  }

  // ===========================================================================
  // Counters
  // ===========================================================================

  /**
   * Increment a counter.
   */
  increment(name: string, value: number = 1, labels: Record<string, string> = {}): void {
    const key = this.buildKey(name, labels);
    const existing = this.counters.get(key);

    if (existing) {
      existing.value += value;
    } else {
      this.counters.set(key, { value, labels });
    }
  }

  /**
   * Get counter value.
   */
  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(this.buildKey(name, labels))?.value ?? 0;
  }

  // ===========================================================================
  // Histograms
  // ===========================================================================

  /**
   * Record a histogram value.
   */
  recordHistogram(name: string, value: number, labels: Record<string, string> = {}): void {
    const key = this.buildKey(name, labels);
    const values = this.histograms.get(key);

    if (values) {
      values.push(value);
      if (values.length > 1000) {
        values.splice(0, values.length - 1000);
      }
    } else {
      this.histograms.set(key, [value]);
    }
  }

  /**
   * Get histogram statistics.
   */
  getHistogramStats(name: string, labels: Record<string, string> = {}): HistogramStats | null {
    const values = this.histograms.get(this.buildKey(name, labels));
    if (!values || values.length === 0) {
      return null;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const count = sorted.length;
    const sum = sorted.reduce((a, b) => a + b, 0);
    const at = (q: number): number => sorted[Math.min(count - 1, Math.floor(count * q))] ?? 0;

    return {
      count,
      sum,
      avg: sum / count,
      min: at(0),
      max: sorted[count - 1] ?? 0,
      p50: at(0.5),
      p95: at(0.95),
    };
  }

  // ===========================================================================
  // Timers
  // ===========================================================================

  /**
   * Start a timer; the returned function records and returns elapsed ms.
   */
  startTimer(name: string, labels: Record<string, string> = {}): () => number {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.recordHistogram(name, duration, labels);
      return duration;
    };
  }

  // ===========================================================================
  // Logging
  // ===========================================================================

  /**
   * Log a message.
   */
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      component: this.component,
    };
    if (context) entry.context = context;

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    this.sink(entry);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Get logs, optionally filtered by level.
   */
  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.logs.filter((l) => l.level === level) : [...this.logs];
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private buildKey(name: string, labels: Record<string, string>): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}|${labelStr}`;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a metrics collector.
 */
export function createMetricsCollector(
  component: string,
  options?: MetricsCollectorOptions
): MetricsCollector {
  return new MetricsCollector(component, options);
}

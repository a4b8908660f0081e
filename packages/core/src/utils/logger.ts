/**
 * Simple Logger with run_id and action tracking
 */

export interface LogContext {
  run_id?: string;
  action?: string;
  service?: string;
  [key: string]: unknown;
}

type LogFn = (message: string, context?: Omit<LogContext, 'service'>) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

type Sink = (line: string) => void;

let infoSink: Sink = line => console.log(line);

/**
 * Send INFO/DEBUG lines to stderr, for commands whose stdout carries data.
 * `routeLogsToStderr(false)` restores stdout.
 */
export function routeLogsToStderr(enabled = true): void {
  infoSink = enabled ? line => console.error(line) : line => console.log(line);
}

function formatValue(value: unknown): unknown {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (value instanceof Date) return value.toISOString();
  return value;
}

export function formatLog(level: string, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const parts = [
    `[${timestamp}]`,
    `[${level}]`,
  ];

  if (context?.service) {
    parts.push(`[${context.service}]`);
  }

  if (context?.action) {
    parts.push(`[${context.action}]`);
  }

  if (context?.run_id) {
    parts.push(`[run:${context.run_id.substring(0, 8)}]`);
  }

  parts.push(message);

  if (context) {
    const { service: _service, action: _action, run_id: _runId, ...rest } = context;
    const extras = Object.entries(rest).filter(([, v]) => v !== undefined);
    if (extras.length > 0) {
      const fields: Record<string, unknown> = {};
      for (const [k, v] of extras) fields[k] = formatValue(v);
      parts.push(JSON.stringify(fields));
    }
  }

  return parts.join(' ');
}

export function createLogger(service: string, base: Omit<LogContext, 'service'> = {}): Logger {
  const merge = (context?: Omit<LogContext, 'service'>): LogContext => ({ ...base, ...context, service });

  return {
    info(message: string, context?: Omit<LogContext, 'service'>) {
      infoSink(formatLog('INFO', message, merge(context)));
    },

    warn(message: string, context?: Omit<LogContext, 'service'>) {
      console.warn(formatLog('WARN', message, merge(context)));
    },

    error(message: string, context?: Omit<LogContext, 'service'>) {
      console.error(formatLog('ERROR', message, merge(context)));
    },

    debug(message: string, context?: Omit<LogContext, 'service'>) {
      if (process.env.DEBUG) {
        infoSink(formatLog('DEBUG', message, merge(context)));
      }
    },
  };
}

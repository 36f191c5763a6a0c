/**
 * Observability Module
 *
 * Logger and metrics contracts shared by every pipeline component.
 * Components accept these as optional dependencies and fall back to the
 * JSON console logger and no-op metrics below.
 */

// =============================================================================
// Interfaces
// =============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

// =============================================================================
// Default Implementations
// =============================================================================

type Level = 'info' | 'warn' | 'error' | 'debug';

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function resolveMinLevel(): Level {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return raw === 'debug' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

/**
 * Create a JSON console logger bound to a module name.
 * One line per entry: `{level, module, message, ...meta, timestamp}`.
 */
export function createLogger(module: string, minLevel: Level = resolveMinLevel()): Logger {
  const write = (level: Level, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }
    const line = JSON.stringify({ level, module, message, ...meta, timestamp: new Date().toISOString() });
    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    debug: (message, meta) => write('debug', message, meta),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => { /* no-op */ },
  warn: () => { /* no-op */ },
  error: () => { /* no-op */ },
  debug: () => { /* no-op */ },
};

/**
 * Default no-op metrics implementation
 */
export const noopMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default {
  createLogger,
  silentLogger,
  noopMetrics,
  errorMessage,
};

/**
 * Request Logger Middleware
 *
 * One line per request with method, path, status and response time.
 * Colorized outside production; health checks are skipped.
 *
 * Output:
 *   [API] POST    /api/sessions/sess_1/interactions 200 - 4ms
 */

import type { MiddlewareHandler, Context } from 'hono';

export interface LoggerConfig {
  prefix: string;
  includeTimestamp: boolean;
  /** Path prefixes that are not logged */
  skipPaths: string[];
  colorize: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  return colors.green;
}

function formatResponseTime(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Formats one log line. Exported for tests.
 */
export function formatLogLine(
  config: LoggerConfig,
  method: string,
  path: string,
  status: number,
  elapsedMs: number
): string {
  const line = config.colorize
    ? [
        config.prefix,
        `${colors.cyan}${method.padEnd(7)}${colors.reset}`,
        path,
        `${getStatusColor(status)}${status}${colors.reset}`,
        '-',
        `${colors.dim}${formatResponseTime(elapsedMs)}${colors.reset}`,
      ].join(' ')
    : `${config.prefix} ${method} ${path} ${status} - ${formatResponseTime(elapsedMs)}`;

  return config.includeTimestamp ? `[${new Date().toISOString()}] ${line}` : line;
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c: Context, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const elapsedMs = Math.round(performance.now() - startTime);

    console.log(formatLogLine(finalConfig, c.req.method, path, c.res.status, elapsedMs));
  };
}

/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Facade-match logger - consistent console logging across packages
 *
 * Log levels:
 * - error: Always logged - fatal preconditions
 * - warn: Always logged - skipped elements, unpaired studs, missing headers
 * - info: Logged when FACADE_DEBUG=true - stage summaries
 * - debug: Logged when FACADE_DEBUG=true - per-element decisions
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component/module name (e.g., 'Bounds', 'DoorGrouper', 'Matcher') */
  component: string;
  /** Operation being performed (e.g., 'pairStuds', 'assignHeaders') */
  operation?: string;
  /** Element id if applicable */
  elementId?: number;
  /** Element kind if applicable */
  elementType?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export type Logger = ReturnType<typeof createLogger>;

function isDebugEnabled(): boolean {
  return process.env.FACADE_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.elementId !== undefined) {
    prefix += ` #${ctx.elementId}`;
  }
  if (ctx.elementType) {
    prefix += ` (${ctx.elementType})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string) {
  return {
    /** Always visible. Use for the fatal precondition that ends a run. */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        console.error(`${prefix} ${message}:`, formatError(error));
      } else {
        console.error(`${prefix} ${message}`);
      }
    },

    /** Always visible. Use for recoverable issues recorded as warnings. */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /** Only visible when FACADE_DEBUG=true */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /** Only visible when FACADE_DEBUG=true */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },
  };
}

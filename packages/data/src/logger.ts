/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * fem-canon logger - consistent diagnostics across packages
 *
 * Log levels:
 * - error: Always logged - failures that abort a conversion run
 * - warn: Always logged - diagnostics such as an unsupported model variant
 * - info: Logged when FEM_DEBUG is set - run progress
 * - debug: Logged when FEM_DEBUG is set - per-field details
 *
 * Enable debug logging with the FEM_DEBUG=true environment variable.
 */

export interface LogContext {
  /** Component name (e.g., 'FormatB', 'Classifier', 'Serializer') */
  component: string;
  /** Operation being performed (e.g., 'extractProperties', 'loadSource') */
  operation?: string;
  /** Channel group name if applicable */
  group?: string;
  /** Channel index within the group */
  channel?: number;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

function isDebugEnabled(): boolean {
  return process.env.FEM_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.group) {
    prefix += ` ${ctx.group}`;
    if (ctx.channel !== undefined) {
      prefix += `[${ctx.channel}]`;
    }
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
export function createLogger(component: string): Logger {
  return {
    /**
     * Log an error - always visible
     */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        console.error(`${prefix} ${message}:`, formatError(error));
      } else {
        console.error(`${prefix} ${message}`);
      }
    },

    /**
     * Log a warning - always visible
     */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a recovered failure (an omitted optional field) - visible when FEM_DEBUG=true
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      console.debug(`${prefix} ${message} (recovered):`, formatError(error));
    },
  };
}

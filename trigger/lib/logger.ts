/**
 * Engine logger on top of the Trigger.dev run logger.
 *
 * Inside a run every entry lands in the run's log with its properties; outside
 * one the SDK logger drops entries. Level filtering is the project's
 * `logLevel` in trigger.config.ts. Child loggers merge their bindings into
 * every entry, and Error values are flattened to name/message/stack.
 */

import { logger as runLogger } from "@trigger.dev/sdk";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

/** Where entries go. The SDK's `logger` by default. */
export interface LogSink {
  debug(message: string, properties?: Record<string, unknown>): void;
  info(message: string, properties?: Record<string, unknown>): void;
  warn(message: string, properties?: Record<string, unknown>): void;
  error(message: string, properties?: Record<string, unknown>): void;
}

type Level = keyof LogSink;

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

export function createLogger(service: string, bindings: LogMeta = {}, sink: LogSink = runLogger): Logger {
  function write(level: Level, message: string, meta?: LogMeta) {
    const properties: LogMeta = { service, ...bindings };
    if (meta) {
      for (const [key, value] of Object.entries(meta)) {
        properties[key] = serialize(value);
      }
    }
    sink[level](message, properties);
  }

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (extra) => createLogger(service, { ...bindings, ...extra }, sink),
  };
}

export const logger = createLogger("foia-campaign-engine");

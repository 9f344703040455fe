/**
 * Logger contract shared by the loader pipeline.
 *
 * Components take an optional logger and fall back to the console logger,
 * which tags every line with "[objdb]". Configuring levels or sinks is left
 * to the host application.
 */

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export function createConsoleLogger(prefix = "[objdb]"): Logger {
  const emit = (write: (...args: unknown[]) => void, message: string, meta?: LogMeta) => {
    if (meta === undefined) {
      write(`${prefix} ${message}`);
    } else {
      write(`${prefix} ${message}`, meta);
    }
  };

  return {
    info: (message, meta) => emit(console.info, message, meta),
    warn: (message, meta) => emit(console.warn, message, meta),
    error: (message, meta) => emit(console.error, message, meta),
  };
}

export const consoleLogger: Logger = createConsoleLogger();

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Flatten an unknown failure into loggable metadata. */
export function errorMeta(err: unknown): LogMeta {
  if (err instanceof Error) {
    const meta: LogMeta = { error: err.message, stack: err.stack };
    if (err.cause !== undefined) {
      meta["cause"] = err.cause instanceof Error ? err.cause.message : String(err.cause);
    }
    return meta;
  }
  return { error: String(err) };
}

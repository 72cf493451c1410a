export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export const DEFAULT_LOGGER: Logger = {
  //1.- Route per-init diagnostics through console.debug so they stay out of default output.
  debug: (...args: unknown[]) => console.debug(...args),
  info: (...args: unknown[]) => console.info(...args),
  //2.- Warnings flag misuse such as querying heights before a planet was initialised.
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
};

export function mergeLogger(overrides?: Partial<Logger>): Logger {
  //1.- Merge the optional overrides with the default console logger so callers can inject spies in tests.
  return {
    debug: overrides?.debug ?? DEFAULT_LOGGER.debug,
    info: overrides?.info ?? DEFAULT_LOGGER.info,
    warn: overrides?.warn ?? DEFAULT_LOGGER.warn,
    error: overrides?.error ?? DEFAULT_LOGGER.error,
  };
}

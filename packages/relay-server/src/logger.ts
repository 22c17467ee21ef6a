export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

/**
 * Wraps a logger so every line starts with a bracketed component tag such as
 * `[session 1234]` or `[upstream]`.
 */
export function withPrefix(logger: Logger, prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    info: (message) => logger.info(`${tag} ${message}`),
    warn: (message) => logger.warn(`${tag} ${message}`),
    error: (message) => logger.error(`${tag} ${message}`),
    ...(logger.debug
      ? { debug: (message: string) => logger.debug?.(`${tag} ${message}`) }
      : {}),
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  verbose(message: string): void;
}

export function logVerbose(enabled: boolean, message: string): void {
  if (enabled) {
    console.error(message);
  }
}

export function createConsoleLogger(verbose: boolean): Logger {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.error(`[repomap] warning: ${message}`),
    verbose: (message) => logVerbose(verbose, message),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  verbose: () => undefined,
};

/** Wraps a logger so each distinct warning is emitted at most once. */
export function warnOnce(logger: Logger): (key: string, message: string) => void {
  const seen = new Set<string>();
  return (key, message) => {
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    logger.warn(message);
  };
}

import debugFactory from 'debug';

export type Logger = {
  error: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
};

/** `error` always prints; `debug` goes through the `debug` namespace and only when verbose. */
export const createLogger = (namespace = 'dftemplate', verbose = false): Logger => {
  const dbg = debugFactory(namespace);
  if (verbose) {
    dbg.enabled = true;
  }

  return {
    error: (message, ...args) => {
      // eslint-disable-next-line no-console
      console.error(`[ERROR] ${namespace}: ${message}`, ...args);
    },
    debug: (message, ...args) => {
      if (verbose) {
        dbg(message, ...args);
      }
    },
  };
};

/**
 * Logger shape accepted by the registry and CLI. Hosts pass their own
 * subsystem logger; `debug` is optional.
 */
export type OptionsLogger = {
  debug?: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

/**
 * Route logger output through a runtime's `log`/`error` writers, prefixing
 * each line with its level. Debug lines are only kept when `debug` is set.
 */
export function createRuntimeLogger(params: {
  log: (msg: string) => void;
  error: (msg: string) => void;
  debug?: boolean;
}): OptionsLogger {
  const { log, error } = params;
  return {
    debug: params.debug ? (msg) => log(`[debug] ${msg}`) : undefined,
    info: (msg) => log(`[info] ${msg}`),
    warn: (msg) => error(`[warn] ${msg}`),
    error: (msg) => error(`[error] ${msg}`),
  };
}

import type { PolicyAdapterLogger } from "./types.js";

const noop = (): void => {};

export const silentLogger: PolicyAdapterLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export function createConsoleLogger(prefix = "[policy-adapter]"): PolicyAdapterLogger {
  return {
    debug: (msg) => console.debug(`${prefix} ${msg}`),
    info: (msg) => console.info(`${prefix} ${msg}`),
    warn: (msg) => console.warn(`${prefix} ${msg}`),
    error: (msg) => console.error(`${prefix} ${msg}`),
  };
}

/** Injected logger wins; otherwise console under `verbose`, silent by default. */
export function resolveLogger(logger: PolicyAdapterLogger | undefined, verbose: boolean): PolicyAdapterLogger {
  if (logger) return logger;
  return verbose ? createConsoleLogger() : silentLogger;
}

import consola from "consola";

/**
 * Where `generate()` and the Vite plugin report progress. The parser and the
 * codegen engine never log.
 */
export interface QselectLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  start(message: string): void;
  /** End-of-run summary */
  box(summary: LogSummary): void;
}

export interface LogSummary {
  title: string;
  /** One entry per line */
  message: string;
}

/**
 * CLI logger
 */
export function createConsolaLogger(): QselectLogger {
  return {
    info: (message) => consola.info(message),
    success: (message) => consola.success(message),
    warn: (message) => consola.warn(message),
    error: (message) => consola.error(message),
    start: (message) => consola.start(message),
    box: (summary) => consola.box(summary),
  };
}

/**
 * The part of Vite's `Logger` the plugin writes to, so the main entry does
 * not import vite
 */
export interface ViteLoggerLike {
  info(msg: string, options?: { timestamp?: boolean }): void;
  warn(msg: string, options?: { timestamp?: boolean }): void;
  error(msg: string, options?: { timestamp?: boolean }): void;
}

const VITE_PREFIX = "[qselect]";

/**
 * Logger for the Vite plugin. Vite has no success, start or box levels, so
 * those go to `info`; a summary becomes its title followed by indented lines.
 */
export function createViteLogger(viteLogger: ViteLoggerLike): QselectLogger {
  const write =
    (level: keyof ViteLoggerLike) =>
    (message: string): void =>
      viteLogger[level](`${VITE_PREFIX} ${message}`, { timestamp: true });

  const info = write("info");

  return {
    info,
    success: info,
    start: info,
    warn: write("warn"),
    error: write("error"),
    box: ({ title, message }) => {
      info(title);
      for (const line of message.split("\n")) {
        info(`  ${line}`);
      }
    },
  };
}

export function createSilentLogger(): QselectLogger {
  const noop = (): void => {};
  return {
    info: noop,
    success: noop,
    warn: noop,
    error: noop,
    start: noop,
    box: noop,
  };
}

export const defaultLogger = createConsolaLogger();

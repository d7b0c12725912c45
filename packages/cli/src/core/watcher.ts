import { isAbsolute, relative, resolve } from "node:path";

import { watch } from "chokidar";
import fg from "fast-glob";
import picomatch from "picomatch";

import { errorMessage } from "./errors";

import type { FSWatcher } from "chokidar";

export interface WatcherOptions {
  /** Path to the config file to watch */
  configPath: string;
  /** Glob pattern(s) for SDL schema files to watch */
  schemaPatterns: string | string[];
  /** Directory the patterns are relative to (default: process.cwd()) */
  cwd?: string;
  /** Debounce delay in milliseconds (default: 200) */
  debounceMs?: number;
  /** Called when the config file changes */
  onConfigChange: () => void | Promise<void>;
  /** Called when schema files are added, changed or removed */
  onSchemaChange: () => void | Promise<void>;
  /** Called when an error occurs in the watcher or a change handler */
  onError?: (error: Error) => void;
}

export interface Watcher {
  /** Start watching files */
  start: () => Promise<void>;
  /** Stop watching files */
  stop: () => Promise<void>;
  /** Get the list of schema files being watched */
  getWatchedSchemas: () => string[];
}

/**
 * Extract the base directory from a glob pattern.
 * Returns the static part of the path before any glob characters.
 *
 * Examples:
 * - "./schema/**\/*.graphql" -> "./schema"
 * - "src/*.graphql" -> "src"
 * - "**\/*.graphql" -> "."
 */
export function getGlobBaseDir(pattern: string): string {
  const globChars = ["*", "?", "[", "{", "(", "!"];

  let firstGlobIndex = pattern.length;
  for (const char of globChars) {
    const index = pattern.indexOf(char);
    if (index !== -1 && index < firstGlobIndex) {
      firstGlobIndex = index;
    }
  }

  const staticPart = pattern.slice(0, firstGlobIndex);

  // A pattern without glob characters names a file; watch its directory
  const lastSepIndex = Math.max(
    staticPart.lastIndexOf("/"),
    staticPart.lastIndexOf("\\"),
  );

  if (lastSepIndex === -1) {
    return ".";
  }

  const baseDir = staticPart.slice(0, lastSepIndex);
  return baseDir || ".";
}

/**
 * Get unique base directories from multiple glob patterns.
 */
export function getWatchDirs(patterns: string[]): string[] {
  const dirs = new Set<string>();
  for (const pattern of patterns) {
    dirs.add(getGlobBaseDir(pattern));
  }
  return Array.from(dirs);
}

/**
 * Build a predicate matching file paths (absolute or relative to `cwd`)
 * against glob patterns written relative to `cwd`.
 */
export function createPathMatcher(
  patterns: string[],
  cwd: string,
): (filePath: string) => boolean {
  const isMatch = picomatch(patterns.map((p) => p.replace(/^\.\//, "")));
  return (filePath) => {
    const path = isAbsolute(filePath) ? relative(cwd, filePath) : filePath;
    return isMatch(path.replace(/\\/g, "/").replace(/^\.\//, ""));
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

/**
 * Creates a debounced function that delays invoking the callback
 * until after the specified wait time has elapsed since the last call.
 */
function debounce(
  fn: () => void | Promise<void>,
  waitMs: number,
  onError: (error: Error) => void,
): () => void {
  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  return () => {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    timeoutId = setTimeout(() => {
      timeoutId = null;
      try {
        const result = fn();
        if (result instanceof Promise) {
          result.catch((error: unknown) => onError(toError(error)));
        }
      } catch (error) {
        onError(toError(error));
      }
    }, waitMs);
  };
}

const watchOptions = {
  ignoreInitial: true,
  awaitWriteFinish: {
    stabilityThreshold: 100,
    pollInterval: 50,
  },
};

/**
 * Create a file watcher for the config file and schema files.
 *
 * Rapid changes are debounced into one callback; config changes and schema
 * changes are reported separately.
 */
export function createWatcher(options: WatcherOptions): Watcher {
  const {
    configPath,
    schemaPatterns,
    cwd = process.cwd(),
    debounceMs = 200,
    onConfigChange,
    onSchemaChange,
    onError = () => {},
  } = options;

  let configWatcher: FSWatcher | null = null;
  let schemaWatcher: FSWatcher | null = null;
  let watchedSchemas: string[] = [];

  const debouncedConfigChange = debounce(onConfigChange, debounceMs, onError);
  const debouncedSchemaChange = debounce(onSchemaChange, debounceMs, onError);

  const start = async () => {
    const patterns = Array.isArray(schemaPatterns)
      ? schemaPatterns
      : [schemaPatterns];

    watchedSchemas = await fg(patterns, {
      cwd,
      absolute: true,
      onlyFiles: true,
    });

    configWatcher = watch(configPath, watchOptions);

    configWatcher.on("change", () => {
      debouncedConfigChange();
    });

    configWatcher.on("error", (error: unknown) => {
      onError(toError(error));
    });

    const isMatch = createPathMatcher(patterns, cwd);

    // chokidar v4+ doesn't support globs: watch base directories and filter
    schemaWatcher = watch(getWatchDirs(patterns), { ...watchOptions, cwd });

    schemaWatcher.on("add", (filePath) => {
      if (!isMatch(filePath)) return;

      const absolutePath = resolve(cwd, filePath);
      if (!watchedSchemas.includes(absolutePath)) {
        watchedSchemas.push(absolutePath);
      }
      debouncedSchemaChange();
    });

    schemaWatcher.on("change", (filePath) => {
      if (!isMatch(filePath)) return;

      debouncedSchemaChange();
    });

    schemaWatcher.on("unlink", (filePath) => {
      if (!isMatch(filePath)) return;

      const absolutePath = resolve(cwd, filePath);
      watchedSchemas = watchedSchemas.filter((f) => f !== absolutePath);
      debouncedSchemaChange();
    });

    schemaWatcher.on("error", (error: unknown) => {
      onError(toError(error));
    });
  };

  const stop = async () => {
    if (configWatcher) {
      await configWatcher.close();
      configWatcher = null;
    }
    if (schemaWatcher) {
      await schemaWatcher.close();
      schemaWatcher = null;
    }
    watchedSchemas = [];
  };

  const getWatchedSchemas = () => {
    return [...watchedSchemas];
  };

  return {
    start,
    stop,
    getWatchedSchemas,
  };
}

/**
 * Setup keyboard input handling for interactive watch mode.
 *
 * @param handlers - Callback handlers for keyboard events
 * @returns A cleanup function to restore stdin state
 */
export function setupKeyboardInput(handlers: {
  onRefresh: () => void;
  onQuit: () => void;
}): () => void {
  if (!process.stdin.isTTY) {
    return () => {};
  }

  process.stdin.setRawMode(true);
  process.stdin.resume();
  process.stdin.setEncoding("utf8");

  const handleKeypress = (key: string) => {
    if (key === "r" || key === "R") {
      handlers.onRefresh();
      return;
    }

    // q, Q or Ctrl+C
    if (key === "q" || key === "Q" || key === "\u0003") {
      handlers.onQuit();
    }
  };

  process.stdin.on("data", handleKeypress);

  return () => {
    process.stdin.removeListener("data", handleKeypress);
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
  };
}

/**
 * Clear the console screen.
 * Only clears if stdout is a TTY (not piped).
 */
export function clearConsole(): void {
  if (process.stdout.isTTY) {
    // ANSI escape sequence to clear screen and move cursor to top-left
    process.stdout.write("\x1B[2J\x1B[0f");
  }
}

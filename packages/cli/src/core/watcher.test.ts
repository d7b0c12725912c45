import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { mockWatcher } = vi.hoisted(() => ({
  mockWatcher: {
    on: vi.fn(),
    close: vi.fn(async () => {}),
  },
}));

// Both the config and the schema watcher share one mock
vi.mock("chokidar", () => ({
  watch: vi.fn(() => mockWatcher),
}));

vi.mock("fast-glob", () => ({
  default: vi.fn(() =>
    Promise.resolve(["/project/schema/a.graphql", "/project/schema/b.graphql"]),
  ),
}));

// Import after mocks are set up
import { watch } from "chokidar";
import fg from "fast-glob";

import {
  createPathMatcher,
  createWatcher,
  getGlobBaseDir,
  getWatchDirs,
} from "./watcher";

/**
 * Handlers registered for an event, in registration order:
 * config watcher first, schema watcher second
 */
function handlersFor(event: string): Array<(path?: unknown) => void> {
  return mockWatcher.on.mock.calls
    .filter((call) => call[0] === event)
    .map((call) => call[1]);
}

const baseOptions = {
  configPath: "/project/qselect.config.ts",
  schemaPatterns: "schema/**/*.graphql",
  cwd: "/project",
};

describe("createWatcher", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves schema patterns on start", async () => {
    const watcher = createWatcher({
      ...baseOptions,
      schemaPatterns: ["schema/**/*.graphql", "extra/*.graphql"],
      onConfigChange: vi.fn(),
      onSchemaChange: vi.fn(),
    });

    await watcher.start();

    expect(fg).toHaveBeenCalledWith(
      ["schema/**/*.graphql", "extra/*.graphql"],
      { cwd: "/project", absolute: true, onlyFiles: true },
    );
    expect(watcher.getWatchedSchemas()).toEqual([
      "/project/schema/a.graphql",
      "/project/schema/b.graphql",
    ]);
  });

  it("returns an empty list before start", () => {
    const watcher = createWatcher({
      ...baseOptions,
      onConfigChange: vi.fn(),
      onSchemaChange: vi.fn(),
    });

    expect(watcher.getWatchedSchemas()).toEqual([]);
  });

  it("watches the config file and the schema base directories", async () => {
    const watcher = createWatcher({
      ...baseOptions,
      schemaPatterns: ["schema/**/*.graphql", "lib/*.graphql"],
      onConfigChange: vi.fn(),
      onSchemaChange: vi.fn(),
    });

    await watcher.start();

    const awaitWriteFinish = { stabilityThreshold: 100, pollInterval: 50 };
    expect(watch).toHaveBeenNthCalledWith(1, "/project/qselect.config.ts", {
      ignoreInitial: true,
      awaitWriteFinish,
    });
    expect(watch).toHaveBeenNthCalledWith(2, ["schema", "lib"], {
      ignoreInitial: true,
      awaitWriteFinish,
      cwd: "/project",
    });
  });

  it("calls onConfigChange after the debounce delay", async () => {
    const onConfigChange = vi.fn();
    const watcher = createWatcher({
      ...baseOptions,
      debounceMs: 100,
      onConfigChange,
      onSchemaChange: vi.fn(),
    });

    await watcher.start();
    handlersFor("change")[0]?.();

    expect(onConfigChange).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(100);
    expect(onConfigChange).toHaveBeenCalledTimes(1);
  });

  it("debounces rapid schema changes into one call", async () => {
    const onSchemaChange = vi.fn();
    const watcher = createWatcher({
      ...baseOptions,
      debounceMs: 100,
      onConfigChange: vi.fn(),
      onSchemaChange,
    });

    await watcher.start();
    const schemaChange = handlersFor("change")[1];

    schemaChange?.("schema/a.graphql");
    await vi.advanceTimersByTimeAsync(50);
    schemaChange?.("schema/b.graphql");
    await vi.advanceTimersByTimeAsync(50);

    expect(onSchemaChange).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(100);
    expect(onSchemaChange).toHaveBeenCalledTimes(1);
  });

  it("ignores files outside the schema patterns", async () => {
    const onSchemaChange = vi.fn();
    const watcher = createWatcher({
      ...baseOptions,
      debounceMs: 100,
      onConfigChange: vi.fn(),
      onSchemaChange,
    });

    await watcher.start();
    handlersFor("change")[1]?.("schema/notes.md");
    await vi.advanceTimersByTimeAsync(200);

    expect(onSchemaChange).not.toHaveBeenCalled();
  });

  it("tracks added and removed schema files", async () => {
    const onSchemaChange = vi.fn();
    const watcher = createWatcher({
      ...baseOptions,
      debounceMs: 100,
      onConfigChange: vi.fn(),
      onSchemaChange,
    });

    await watcher.start();

    handlersFor("add")[0]?.("schema/c.graphql");
    expect(watcher.getWatchedSchemas()).toContain("/project/schema/c.graphql");

    handlersFor("add")[0]?.("schema/c.graphql");
    expect(watcher.getWatchedSchemas()).toHaveLength(3);

    handlersFor("unlink")[0]?.("schema/a.graphql");
    expect(watcher.getWatchedSchemas()).toEqual([
      "/project/schema/b.graphql",
      "/project/schema/c.graphql",
    ]);

    await vi.advanceTimersByTimeAsync(100);
    expect(onSchemaChange).toHaveBeenCalledTimes(1);
  });

  it("reports a rejected change handler through onError", async () => {
    const onError = vi.fn();
    const watcher = createWatcher({
      ...baseOptions,
      debounceMs: 100,
      onConfigChange: () => Promise.reject(new Error("boom")),
      onSchemaChange: vi.fn(),
      onError,
    });

    await watcher.start();
    handlersFor("change")[0]?.();
    await vi.advanceTimersByTimeAsync(100);

    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    expect(onError).toHaveBeenCalledWith(new Error("boom"));
  });

  it("converts non-Error watcher errors to Error", async () => {
    const onError = vi.fn();
    const watcher = createWatcher({
      ...baseOptions,
      onConfigChange: vi.fn(),
      onSchemaChange: vi.fn(),
      onError,
    });

    await watcher.start();
    handlersFor("error")[0]?.("string error");

    expect(onError).toHaveBeenCalledWith(new Error("string error"));
  });

  it("closes both watchers and clears the file list on stop", async () => {
    const watcher = createWatcher({
      ...baseOptions,
      onConfigChange: vi.fn(),
      onSchemaChange: vi.fn(),
    });

    await watcher.start();
    await watcher.stop();

    expect(mockWatcher.close).toHaveBeenCalledTimes(2);
    expect(watcher.getWatchedSchemas()).toEqual([]);
  });
});

describe("getGlobBaseDir", () => {
  it("returns the static prefix of a glob", () => {
    expect(getGlobBaseDir("./schema/**/*.graphql")).toBe("./schema");
    expect(getGlobBaseDir("src/*.graphql")).toBe("src");
  });

  it("returns '.' for a glob at the root", () => {
    expect(getGlobBaseDir("**/*.graphql")).toBe(".");
  });

  it("returns the directory of a plain file path", () => {
    expect(getGlobBaseDir("./schema.graphql")).toBe(".");
    expect(getGlobBaseDir("api/schema.graphql")).toBe("api");
  });
});

describe("getWatchDirs", () => {
  it("deduplicates base directories", () => {
    expect(
      getWatchDirs(["schema/*.graphql", "schema/**/*.gql", "lib/*.graphql"]),
    ).toEqual(["schema", "lib"]);
  });
});

describe("createPathMatcher", () => {
  const isMatch = createPathMatcher(["./schema/**/*.graphql"], "/project");

  it("matches relative paths", () => {
    expect(isMatch("schema/types/user.graphql")).toBe(true);
  });

  it("matches absolute paths under cwd", () => {
    expect(isMatch("/project/schema/user.graphql")).toBe(true);
  });

  it("rejects other files", () => {
    expect(isMatch("schema/user.ts")).toBe(false);
    expect(isMatch("/elsewhere/schema/user.graphql")).toBe(false);
  });
});

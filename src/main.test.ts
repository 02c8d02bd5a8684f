import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { USAGE } from "./cli";
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, main } from "./main";
import type { MainDeps } from "./main";
import { createTestConfig } from "./test-utils/db";

function createDeps(overrides: Partial<MainDeps> = {}) {
  const logger = pino({ level: "silent" });
  const fatal = vi.spyOn(logger, "fatal");
  const printed: Array<string> = [];
  const errors: Array<string> = [];
  const deps: MainDeps = {
    createLogger: vi.fn(() => logger),
    loadConfig: vi.fn(() => createTestConfig()),
    runSetup: vi.fn().mockResolvedValue(undefined),
    executeRun: vi.fn().mockResolvedValue(undefined),
    print: (line) => printed.push(line),
    printError: (text) => errors.push(text),
    env: {},
    ...overrides,
  };
  return { deps, fatal, printed, errors };
}

describe("main", () => {
  it("should print the usage and exit 0 for --help", async () => {
    const { deps, printed } = createDeps();

    expect(await main(["--help"], deps)).toBe(EXIT_OK);
    expect(printed).toEqual([USAGE]);
  });

  it("should exit 2 for a zero lookback without loading config", async () => {
    const { deps, errors } = createDeps();

    const code = await main(["run", "--lookback-days", "0"], deps);

    expect(code).toBe(EXIT_USAGE);
    expect(errors).toEqual([
      `error: --lookback-days must be a positive integer, got "0"\n\n${USAGE}\n`,
    ]);
    expect(deps.loadConfig).not.toHaveBeenCalled();
    expect(deps.executeRun).not.toHaveBeenCalled();
  });

  it("should exit 1 and log a fatal line when config fails to load", async () => {
    const { deps, fatal } = createDeps({
      loadConfig: vi.fn(() => {
        throw new Error("invalid configuration in the environment:\n  - llm.provider: bad");
      }),
    });

    const code = await main(["run"], deps);

    expect(code).toBe(EXIT_FAILURE);
    expect(fatal).toHaveBeenCalledWith(
      {
        command: "run",
        error: "invalid configuration in the environment:\n  - llm.provider: bad",
      },
      "command failed",
    );
    expect(deps.executeRun).not.toHaveBeenCalled();
  });

  it("should exit 1 when the run itself fails", async () => {
    const { deps, fatal } = createDeps({
      executeRun: vi.fn().mockRejectedValue(new Error("briefing send failed: quota")),
    });

    expect(await main(["run", "--dry-run"], deps)).toBe(EXIT_FAILURE);
    expect(fatal).toHaveBeenCalledWith(
      { command: "run", error: "briefing send failed: quota" },
      "command failed",
    );
  });

  it("should pass the config path and run setup", async () => {
    const { deps } = createDeps();

    const code = await main(["-v", "--config", "custom.yaml", "setup"], deps);

    expect(code).toBe(EXIT_OK);
    expect(deps.createLogger).toHaveBeenCalledWith("debug");
    expect(deps.loadConfig).toHaveBeenCalledWith("custom.yaml");
    expect(deps.runSetup).toHaveBeenCalledTimes(1);
  });

  it("should fall back to CONFIG_PATH from the environment", async () => {
    const { deps } = createDeps({ env: { CONFIG_PATH: "env.yaml" } });

    expect(await main(["run"], deps)).toBe(EXIT_OK);
    expect(deps.createLogger).toHaveBeenCalledWith(undefined);
    expect(deps.loadConfig).toHaveBeenCalledWith("env.yaml");
    expect(deps.executeRun).toHaveBeenCalledWith(
      expect.objectContaining({ name: "run" }),
      expect.objectContaining({ databasePath: expect.any(String) }),
      expect.anything(),
      deps.print,
    );
  });
});

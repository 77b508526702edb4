/**
 * CLI Tests
 *
 * Commands run in-process with injected streams, exit and signals.
 */
import { err, ok } from "neverthrow";
import { describe, expect, test, vi } from "vitest";

vi.mock("../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  setLogLevel: vi.fn(),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

import { type ProgramDependencies, createProgram, resolveLogLevel } from "../cli.js";
import type { DeviceClient } from "../device/index.js";
import { unreachable } from "../device/index.js";
import { setLogLevel } from "../logger.js";
import {
  COLLECTED_AT,
  TEST_ADDRESS,
  createReading,
  sequenceClient,
} from "./fixtures.js";

function harness(client: DeviceClient = sequenceClient([ok(createReading())])) {
  const handlers = new Map<NodeJS.Signals, () => void>();
  const close = vi.fn((callback?: (err?: Error) => void) => callback?.());
  const deps = {
    env: {},
    createClient: vi.fn(() => client),
    stdout: vi.fn(),
    stderr: vi.fn(),
    exit: vi.fn(),
    onSignal: vi.fn((signal: NodeJS.Signals, handler: () => void) => {
      handlers.set(signal, handler);
    }),
    listen: vi.fn(() => ({ close })),
  } satisfies ProgramDependencies;

  const program = createProgram(deps).exitOverride();
  for (const command of program.commands) {
    command.exitOverride().configureOutput({ writeErr: () => undefined });
  }
  const run = (...args: string[]) => program.parseAsync(args, { from: "user" });

  return { deps, handlers, close, run };
}

describe("CLI", () => {
  // ===========================================================================
  // onescrap
  // ===========================================================================

  describe("onescrap", () => {
    test("prints one JSON line for a successful poll", async () => {
      const { deps, run } = harness();

      await run("onescrap", "--address", TEST_ADDRESS);

      expect(deps.stdout).toHaveBeenCalledTimes(1);
      const line = String(deps.stdout.mock.calls[0]?.[0]);
      expect(line.endsWith("\n")).toBe(true);
      expect(JSON.parse(line)).toMatchObject({
        device_power_watts: 12.5,
        device_state: 1,
        timestamp: new Date(COLLECTED_AT).toISOString(),
      });
      expect(deps.exit).not.toHaveBeenCalled();
    });

    test("reports an unreachable device on stderr and exits 1", async () => {
      const { deps, run } = harness(
        sequenceClient([
          err(
            unreachable(
              TEST_ADDRESS,
              "No Wemo device answered on ports 49153, 49152, 49154, 49151, 49155",
            ),
          ),
        ]),
      );

      await run("onescrap", "--address", TEST_ADDRESS);

      expect(deps.stdout).not.toHaveBeenCalled();
      expect(deps.stderr).toHaveBeenCalledWith(
        `Error: Device ${TEST_ADDRESS} unreachable: No Wemo device answered on ports 49153, 49152, 49154, 49151, 49155\n`,
      );
      expect(deps.exit).toHaveBeenCalledWith(1);
    });

    test("passes device options to the client", async () => {
      const { deps, run } = harness();

      await run(
        "onescrap",
        "-a",
        TEST_ADDRESS,
        "--device-port",
        "49153",
        "-t",
        "2000",
      );

      expect(deps.createClient).toHaveBeenCalledWith({
        address: TEST_ADDRESS,
        port: 49153,
        timeoutMs: 2000,
      });
    });

    test("reports invalid options as a configuration error", async () => {
      const { deps, run } = harness();

      await run("onescrap", "-a", TEST_ADDRESS, "--timeout", "abc");

      expect(deps.stderr).toHaveBeenCalledWith(
        "❌ Invalid configuration: DEVICE_TIMEOUT_MS: Expected number, received nan\n",
      );
      expect(deps.exit).toHaveBeenCalledWith(1);
      expect(deps.createClient).not.toHaveBeenCalled();
    });

    test("requires an address", async () => {
      const { run } = harness();

      await expect(run("onescrap")).rejects.toMatchObject({
        code: "commander.missingMandatoryOptionValue",
      });
    });
  });

  // ===========================================================================
  // scrap
  // ===========================================================================

  describe("scrap", () => {
    test("queries once with the default frequency", async () => {
      const { deps, run } = harness();

      await run("scrap", "-a", TEST_ADDRESS);

      expect(deps.stdout).toHaveBeenCalledTimes(1);
      expect(deps.onSignal).not.toHaveBeenCalled();
    });

    test("rejects a negative frequency", async () => {
      const { run } = harness();

      await expect(run("scrap", "-a", TEST_ADDRESS, "-f", "-1")).rejects.toMatchObject({
        code: "commander.invalidArgument",
      });
    });
  });

  // ===========================================================================
  // start
  // ===========================================================================

  describe("start", () => {
    test("serves on the default port and exits 0 on SIGTERM", async () => {
      const { deps, handlers, close, run } = harness();

      await run("start", "--address", TEST_ADDRESS);

      expect(deps.listen).toHaveBeenCalledWith(expect.anything(), 8080);
      expect([...handlers.keys()]).toEqual(["SIGHUP", "SIGTERM", "SIGINT", "SIGQUIT"]);

      handlers.get("SIGTERM")?.();

      await vi.waitFor(() => {
        expect(deps.exit).toHaveBeenCalledWith(0);
      });
      expect(close).toHaveBeenCalledTimes(1);
    });

    test("uses the --port option", async () => {
      const { deps, handlers, run } = harness();

      await run("start", "-a", TEST_ADDRESS, "--port", "9105");

      expect(deps.listen).toHaveBeenCalledWith(expect.anything(), 9105);
      handlers.get("SIGINT")?.();
      await vi.waitFor(() => {
        expect(deps.exit).toHaveBeenCalledWith(0);
      });
    });

    test("refuses a timeout not below the interval", async () => {
      const { deps, run } = harness();

      await run("start", "-a", TEST_ADDRESS, "-i", "5000", "-t", "5000");

      expect(deps.stderr).toHaveBeenCalledWith(
        "❌ Invalid configuration: DEVICE_TIMEOUT_MS: DEVICE_TIMEOUT_MS must be lower than POLL_INTERVAL_MS\n",
      );
      expect(deps.listen).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Log levels
  // ===========================================================================

  describe("log level", () => {
    test("resolves verbosity flags", () => {
      expect(resolveLogLevel({ debug: 0, quiet: false }, "warn")).toBe("warn");
      expect(resolveLogLevel({ debug: 1, quiet: false }, "warn")).toBe("info");
      expect(resolveLogLevel({ debug: 2, quiet: false }, "warn")).toBe("debug");
      expect(resolveLogLevel({ debug: 2, quiet: true }, "warn")).toBe("error");
    });

    test("applies --quiet before the command runs", async () => {
      const { run } = harness();

      await run("--quiet", "onescrap", "-a", TEST_ADDRESS);

      expect(setLogLevel).toHaveBeenCalledWith("error");
    });

    test("counts repeated -d flags", async () => {
      const { run } = harness();

      await run("-d", "-d", "onescrap", "-a", TEST_ADDRESS);

      expect(setLogLevel).toHaveBeenCalledWith("debug");
    });
  });
});

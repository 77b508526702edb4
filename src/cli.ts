/**
 * Command-line program.
 *
 * - start    - poll on an interval and serve Prometheus metrics
 * - scrap    - poll at --frequency Hz and print JSON lines (0 = once)
 * - onescrap - poll once, print JSON, exit non-zero on failure
 *
 * Side effects (process streams, signals, exit) are injected so the
 * commands can be exercised in-process.
 */
import { Command, InvalidArgumentError } from "commander";

import {
  type Config,
  type ConfigInput,
  type LogLevel,
  getDaemonConfig,
  getDeviceConfig,
  loadConfig,
  runtimeEnv,
} from "./config.js";
import { createDaemon, type Listen } from "./daemon/index.js";
import {
  createWemoClient,
  type DeviceClient,
  formatDeviceError,
  type WemoClientOptions,
} from "./device/index.js";
import { createLogger, setLogLevel } from "./logger.js";
import { runOneShot, runRepeatedScrap } from "./oneshot/index.js";

const log = createLogger("cli");

/**
 * Signals that trigger graceful shutdown.
 */
export const SHUTDOWN_SIGNALS: ReadonlyArray<NodeJS.Signals> = [
  "SIGHUP",
  "SIGTERM",
  "SIGINT",
  "SIGQUIT",
];

export type ProgramDependencies = Readonly<{
  env: NodeJS.ProcessEnv;
  createClient: (options: WemoClientOptions) => DeviceClient;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  exit: (code: number) => void;
  onSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  listen?: Listen;
}>;

export const defaultDependencies: ProgramDependencies = {
  env: process.env,
  createClient: createWemoClient,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  exit: (code) => process.exit(code),
  onSignal: (signal, handler) => {
    process.on(signal, handler);
  },
};

type GlobalOptions = {
  debug: number;
  quiet: boolean;
};

type DeviceOptions = {
  address: string;
  timeout?: string;
  devicePort?: string;
};

type StartOptions = DeviceOptions & {
  port?: string;
  interval?: string;
  metricsPath?: string;
};

type ScrapOptions = DeviceOptions & {
  frequency: number;
};

// =============================================================================
// Option Helpers
// =============================================================================

/**
 * Level from verbosity flags. --quiet wins; -d → info, -dd → debug.
 */
export function resolveLogLevel(
  options: GlobalOptions,
  fallback: LogLevel,
): LogLevel {
  if (options.quiet) {
    return "error";
  }
  if (options.debug >= 2) {
    return "debug";
  }
  if (options.debug === 1) {
    return "info";
  }
  return fallback;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function parseFrequency(value: string): number {
  const frequency = Number(value);
  if (!Number.isFinite(frequency) || frequency < 0) {
    throw new InvalidArgumentError("Frequency must be a number >= 0.");
  }
  return frequency;
}

function deviceInput(options: DeviceOptions): ConfigInput {
  return {
    DEVICE_ADDRESS: options.address,
    DEVICE_TIMEOUT_MS: options.timeout,
    DEVICE_PORT: options.devicePort,
  };
}

// =============================================================================
// Program
// =============================================================================

export function createProgram(
  deps: ProgramDependencies = defaultDependencies,
): Command {
  const program = new Command();

  /**
   * Parse config or report it and exit 1.
   */
  const configOrExit = (input: ConfigInput): Config | null => {
    const result = loadConfig(input, deps.env);
    if (result.isErr()) {
      deps.stderr(`❌ ${result.error.message}\n`);
      deps.exit(1);
      return null;
    }
    return result.value;
  };

  const clientFor = (config: Config): DeviceClient =>
    deps.createClient(getDeviceConfig(config));

  program
    .name("wemo-insight-exporter")
    .description("Wemo Insight power statistics to Prometheus exporter")
    .option(
      "-d, --debug",
      "verbosity: -d info, -dd debug (default warn)",
      increaseVerbosity,
      0,
    )
    .option("--quiet", "mute all logs except errors", false)
    .hook("preAction", (thisCommand) => {
      const level = resolveLogLevel(
        thisCommand.opts<GlobalOptions>(),
        runtimeEnv.LOG_LEVEL,
      );
      setLogLevel(level);
      log.debug({ level }, "Log level set");
    });

  // ===========================================================================
  // start
  // ===========================================================================

  program
    .command("start")
    .description(
      "poll the device on a fixed interval and serve Prometheus metrics",
    )
    .requiredOption("-a, --address <ip>", "Wemo IP address")
    .option("-p, --port <port>", "Prometheus port (default 8080)")
    .option("-i, --interval <ms>", "poll interval in ms (default 30000)")
    .option("-t, --timeout <ms>", "device query timeout in ms (default 10000)")
    .option("--device-port <port>", "fixed device UPnP port (skips probing)")
    .option("--metrics-path <path>", "metrics path (default /metrics)")
    .action((options: StartOptions) => {
      const config = configOrExit({
        ...deviceInput(options),
        PORT: options.port,
        POLL_INTERVAL_MS: options.interval,
        METRICS_PATH: options.metricsPath,
      });
      if (!config) {
        return;
      }

      const daemon = createDaemon({
        settings: getDaemonConfig(config),
        client: clientFor(config),
        listen: deps.listen,
      });

      let shuttingDown = false;
      const shutdown = (signal: NodeJS.Signals): void => {
        if (shuttingDown) {
          log.warn({ signal }, "Shutdown already in progress");
          return;
        }
        shuttingDown = true;
        log.info({ signal }, `${signal} received. Shutting down gracefully...`);

        daemon
          .stop()
          .then((outcome) => {
            log.info({ outcome }, "Shutdown complete");
            deps.exit(0);
          })
          .catch((error: unknown) => {
            log.error({ error }, "Shutdown failed");
            deps.exit(1);
          });
      };

      for (const signal of SHUTDOWN_SIGNALS) {
        deps.onSignal(signal, () => shutdown(signal));
      }

      daemon.start();
    });

  // ===========================================================================
  // scrap / onescrap
  // ===========================================================================

  const scrapOnce = async (options: DeviceOptions): Promise<void> => {
    const config = configOrExit(deviceInput(options));
    if (!config) {
      return;
    }

    const result = await runOneShot({
      client: clientFor(config),
      write: (line) => deps.stdout(`${line}\n`),
    });

    if (result.isErr()) {
      deps.stderr(`Error: ${formatDeviceError(result.error)}\n`);
      deps.exit(1);
    }
  };

  program
    .command("scrap")
    .description(
      "scrap the device and print JSON lines; --frequency 0 queries once",
    )
    .requiredOption("-a, --address <ip>", "Wemo IP address")
    .option(
      "-f, --frequency <hz>",
      "sampling frequency in Hz, 0 = once",
      parseFrequency,
      0,
    )
    .option("-t, --timeout <ms>", "device query timeout in ms (default 10000)")
    .option("--device-port <port>", "fixed device UPnP port (skips probing)")
    .action(async (options: ScrapOptions) => {
      if (options.frequency === 0) {
        await scrapOnce(options);
        return;
      }

      const config = configOrExit(deviceInput(options));
      if (!config) {
        return;
      }

      const controller = new AbortController();
      for (const signal of SHUTDOWN_SIGNALS) {
        deps.onSignal(signal, () => {
          log.info({ signal }, "Exiting");
          controller.abort();
        });
      }

      await runRepeatedScrap({
        client: clientFor(config),
        write: (line) => deps.stdout(`${line}\n`),
        frequencyHz: options.frequency,
        signal: controller.signal,
      });
    });

  program
    .command("onescrap")
    .description("scrap the device once and print JSON; non-zero exit on failure")
    .requiredOption("-a, --address <ip>", "Wemo IP address")
    .option("-t, --timeout <ms>", "device query timeout in ms (default 10000)")
    .option("--device-port <port>", "fixed device UPnP port (skips probing)")
    .action(async (options: DeviceOptions) => {
      await scrapOnce(options);
    });

  return program;
}

/**
 * Typed configuration - environment variables merged with CLI options,
 * parsed with Zod. CLI options win over the environment.
 *
 * Two layers:
 * - Runtime environment (NODE_ENV, LOG_LEVEL) parsed at import, needed by
 *   the logger before any command runs. Invalid values crash immediately.
 * - Command configuration (device, server, polling) parsed per command via
 *   loadConfig(), returned as a Result so the CLI decides how to fail.
 *
 * @see Rule #47, #61-65 (Typed Config Schema, All Config in .env)
 */
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

// =============================================================================
// Runtime Environment
// =============================================================================

const LogLevelSchema = z.enum([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const RuntimeEnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Runtime environment"),
  LOG_LEVEL: LogLevelSchema.default("warn").describe(
    "Pino log level (overridden by --debug / --quiet)",
  ),
});

const parsedEnv = RuntimeEnvSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error("❌ Invalid runtime environment:");
  console.error(parsedEnv.error.format());
  process.exit(1);
}

export const runtimeEnv = parsedEnv.data;

// =============================================================================
// Command Configuration
// =============================================================================

/**
 * Optional numeric value - empty string becomes undefined.
 */
const optionalPort = z.preprocess(
  (val) => (val === "" || val === undefined ? undefined : val),
  z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .optional()
    .describe("Fixed device UPnP port (skips port probing)"),
);

export const ConfigSchema = z
  .object({
    // ==========================================================================
    // Device
    // ==========================================================================
    DEVICE_ADDRESS: z
      .string({ required_error: "DEVICE_ADDRESS is required (--address)" })
      .trim()
      .min(1, "DEVICE_ADDRESS is required (--address)")
      .describe("Wemo Insight IP address or hostname"),
    DEVICE_PORT: optionalPort,
    DEVICE_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(10_000)
      .describe("Timeout for one complete device query (ms)"),

    // ==========================================================================
    // Polling
    // ==========================================================================
    POLL_INTERVAL_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(30_000)
      .describe("Fixed interval between device polls (ms)"),

    // ==========================================================================
    // HTTP Exporter
    // ==========================================================================
    PORT: z.coerce
      .number()
      .int()
      .min(0)
      .max(65535)
      .default(8080)
      .describe("Prometheus HTTP server port"),
    METRICS_PATH: z
      .string()
      .startsWith("/", "METRICS_PATH must start with /")
      .default("/metrics")
      .describe("Path serving the Prometheus exposition"),
    SHUTDOWN_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(15_000)
      .describe("Upper bound for graceful shutdown (ms)"),
  })
  .refine((cfg) => cfg.DEVICE_TIMEOUT_MS < cfg.POLL_INTERVAL_MS, {
    message: "DEVICE_TIMEOUT_MS must be lower than POLL_INTERVAL_MS",
    path: ["DEVICE_TIMEOUT_MS"],
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Raw values accepted by loadConfig - strings from env/CLI or numbers.
 */
export type ConfigInput = Partial<
  Record<keyof Config, string | number | undefined>
>;

export type ConfigError = Readonly<{
  type: "INVALID_CONFIG";
  message: string;
  issues: ReadonlyArray<string>;
}>;

/**
 * Parse command configuration from environment plus CLI overrides.
 * Undefined overrides fall back to the environment value.
 *
 * @example
 * const result = loadConfig({ DEVICE_ADDRESS: "192.168.1.40", PORT: "9100" });
 */
export function loadConfig(
  overrides: ConfigInput,
  env: NodeJS.ProcessEnv = process.env,
): Result<Config, ConfigError> {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const parsed = ConfigSchema.safeParse({ ...pickConfigKeys(env), ...defined });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    return err({
      type: "INVALID_CONFIG",
      message: `Invalid configuration: ${issues.join("; ")}`,
      issues,
    });
  }

  return ok(parsed.data);
}

const CONFIG_KEYS: ReadonlyArray<keyof Config> = [
  "DEVICE_ADDRESS",
  "DEVICE_PORT",
  "DEVICE_TIMEOUT_MS",
  "POLL_INTERVAL_MS",
  "PORT",
  "METRICS_PATH",
  "SHUTDOWN_TIMEOUT_MS",
];

function pickConfigKeys(env: NodeJS.ProcessEnv): ConfigInput {
  const picked: ConfigInput = {};
  for (const key of CONFIG_KEYS) {
    if (env[key] !== undefined) {
      picked[key] = env[key];
    }
  }
  return picked;
}

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Device client configuration for the device layer.
 */
export function getDeviceConfig(config: Config): Readonly<{
  address: string;
  port: number | undefined;
  timeoutMs: number;
}> {
  return {
    address: config.DEVICE_ADDRESS,
    port: config.DEVICE_PORT,
    timeoutMs: config.DEVICE_TIMEOUT_MS,
  };
}

/**
 * Daemon (scheduler + HTTP exporter) configuration.
 */
export function getDaemonConfig(config: Config): Readonly<{
  port: number;
  metricsPath: string;
  intervalMs: number;
  shutdownTimeoutMs: number;
}> {
  return {
    port: config.PORT,
    metricsPath: config.METRICS_PATH,
    intervalMs: config.POLL_INTERVAL_MS,
    shutdownTimeoutMs: config.SHUTDOWN_TIMEOUT_MS,
  };
}

#!/usr/bin/env node
/**
 * Wemo Insight Exporter - Application Entry Point
 *
 * Parses the command line and runs one of:
 * - start    (Prometheus HTTP exporter with background polling)
 * - scrap    (JSON lines at a fixed frequency, once by default)
 * - onescrap (single JSON reading)
 *
 * Examples:
 *   wemo-insight-exporter start --address 192.168.1.40 --port 8080
 *   wemo-insight-exporter --quiet onescrap --address 192.168.1.40
 */
import { createProgram } from "./cli.js";
import { createLogger } from "./logger.js";

const log = createLogger("cli");

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    log.fatal({ error: message }, "Command crashed");
    process.exitCode = 1;
  });

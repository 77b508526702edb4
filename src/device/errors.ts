/**
 * Device Module - Error Types
 *
 * Typed error unions for Wemo Insight queries.
 * Errors are values, not exceptions.
 *
 * @see Rule #16 (Type Safety), #31 (Errors Carry Context)
 */

/**
 * Errors that can occur during a device query.
 * TIMEOUT is the expected steady-state failure of a briefly offline plug.
 */
export type DeviceError =
  | {
      readonly type: "UNREACHABLE";
      readonly address: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PROTOCOL_ERROR";
      readonly address: string;
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "TIMEOUT";
      readonly address: string;
      readonly message: string;
      readonly timeoutMs: number;
    };

export type DeviceErrorType = DeviceError["type"];

/**
 * Create an UNREACHABLE error.
 */
export function unreachable(
  address: string,
  message: string,
  cause?: Error,
): DeviceError {
  if (cause) {
    return { type: "UNREACHABLE", address, message, cause };
  }
  return { type: "UNREACHABLE", address, message };
}

/**
 * Create a PROTOCOL_ERROR.
 */
export function protocolError(
  address: string,
  message: string,
  responseData?: unknown,
): DeviceError {
  if (responseData !== undefined) {
    return { type: "PROTOCOL_ERROR", address, message, responseData };
  }
  return { type: "PROTOCOL_ERROR", address, message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(address: string, timeoutMs: number): DeviceError {
  return {
    type: "TIMEOUT",
    address,
    message: `No response within ${timeoutMs}ms`,
    timeoutMs,
  };
}

/**
 * Format a DeviceError for logging.
 */
export function formatDeviceError(error: DeviceError): string {
  switch (error.type) {
    case "UNREACHABLE":
      return `Device ${error.address} unreachable: ${error.message}`;
    case "PROTOCOL_ERROR":
      return `Protocol error from ${error.address}: ${error.message}`;
    case "TIMEOUT":
      return `Device ${error.address} timed out: ${error.message}`;
  }
}

/**
 * Device Module - Pure Transformations
 *
 * XML and InsightParams parsing, SOAP envelope building.
 * No side effects, no I/O - just data in, data out.
 *
 * @see Rule #5 (Pure Transformations), #8 (Immutability)
 */
import { XMLParser } from "fast-xml-parser";

import type { DeviceState, InsightDescription, Reading } from "./schema.js";
import {
  INSIGHT_PARAMS_FIELD_COUNT,
  INSIGHT_SERVICE_TYPE,
  InsightResponseSchema,
  SetupDocumentSchema,
} from "./schema.js";

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName) => tagName === "service",
});

function parseXml(xml: string): unknown {
  try {
    return parser.parse(xml);
  } catch {
    return null;
  }
}

// =============================================================================
// setup.xml
// =============================================================================

/**
 * Extract the Insight control endpoint from a setup.xml device description.
 *
 * @returns InsightDescription or null when the document is not a Wemo
 * device exposing the Insight service
 */
export function parseSetupDocument(xml: string): InsightDescription | null {
  const parsed = SetupDocumentSchema.safeParse(parseXml(xml));
  if (!parsed.success) {
    return null;
  }

  const { device } = parsed.data.root;
  if (!device.deviceType.startsWith("urn:Belkin:device:")) {
    return null;
  }

  const insight = device.serviceList.service.find(
    (service) => service.serviceType === INSIGHT_SERVICE_TYPE,
  );
  if (!insight || insight.controlURL === "") {
    return null;
  }

  return {
    deviceType: device.deviceType,
    friendlyName: device.friendlyName ? device.friendlyName : null,
    controlUrl: insight.controlURL.startsWith("/")
      ? insight.controlURL
      : `/${insight.controlURL}`,
  };
}

// =============================================================================
// SOAP
// =============================================================================

/**
 * SOAP envelope for the GetInsightParams action (no arguments).
 */
export function buildInsightRequest(): string {
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">',
    "<s:Body>",
    `<u:GetInsightParams xmlns:u="${INSIGHT_SERVICE_TYPE}"></u:GetInsightParams>`,
    "</s:Body>",
    "</s:Envelope>",
  ].join("");
}

/**
 * Extract the raw InsightParams string from a SOAP response.
 *
 * @returns The `|`-separated params or null if the envelope is unexpected
 */
export function parseInsightResponse(xml: string): string | null {
  const parsed = InsightResponseSchema.safeParse(parseXml(xml));
  if (!parsed.success) {
    return null;
  }
  return parsed.data.Envelope.Body.GetInsightParamsResponse.InsightParams;
}

// =============================================================================
// InsightParams
// =============================================================================

/**
 * Map the device's state code. 8 = relay on, load below threshold.
 */
export function parseDeviceState(code: string): DeviceState | null {
  switch (code.trim()) {
    case "0":
      return "off";
    case "1":
      return "on";
    case "8":
      return "standby";
    default:
      return null;
  }
}

/**
 * Parse a numeric field. Garbled values become NaN so the mapper can
 * emit its sentinel instead of failing the whole reading.
 */
export function parseNumericField(value: string | undefined): number {
  if (value === undefined || value.trim() === "") {
    return Number.NaN;
  }
  return Number(value);
}

/**
 * Parse the InsightParams string into a Reading.
 *
 * Layout:
 * state|lastchange|onfor|ontoday|ontotal|timeperiod|_|currentmw|todaymw|totalmw|powerthreshold
 *
 * @returns Reading or null when the field count or state code is wrong
 *
 * @example
 * parseInsightParams("1|1700000000|60|120|3600|1209600|0|12500|600000|20400000|8000", ctx)
 * // { state: "on", currentPowerMilliwatts: 12500, ... }
 */
export function parseInsightParams(
  raw: string,
  context: Readonly<{ address: string; deviceType: string; collectedAt: number }>,
): Reading | null {
  const fields = raw.split("|");
  if (fields.length < INSIGHT_PARAMS_FIELD_COUNT) {
    return null;
  }

  const [
    stateCode = "",
    lastChange,
    onFor,
    onToday,
    onTotal,
    ,
    ,
    currentMw,
    todayMw,
    totalMw,
    threshold,
  ] = fields;

  const state = parseDeviceState(stateCode);
  if (state === null) {
    return null;
  }

  return {
    address: context.address,
    deviceType: context.deviceType,
    state,
    lastChange: parseNumericField(lastChange) * 1000,
    onForSeconds: parseNumericField(onFor),
    onTodaySeconds: parseNumericField(onToday),
    onTotalSeconds: parseNumericField(onTotal),
    currentPowerMilliwatts: parseNumericField(currentMw),
    todayMilliwattMinutes: parseNumericField(todayMw),
    totalMilliwattMinutes: parseNumericField(totalMw),
    powerThresholdMilliwatts: parseNumericField(threshold),
    collectedAt: context.collectedAt,
  };
}

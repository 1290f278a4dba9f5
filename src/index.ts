export {
  BoPiClient,
  withBoPiClient,
  type BoPiClientConfig,
  type BoPiPayload,
  type HttpMethod,
  type RequestOptions,
} from "./client.js";
export {
  BoPiConfigError,
  BoPiConnectionError,
  BoPiError,
  BoPiMissingFieldError,
  BoPiValidationError,
  isBoPiError,
  type BoPiErrorCode,
  type BoPiErrorOptions,
} from "./errors.js";
export { normalizeSensor, requireNonNegative, requireRange } from "./helpers.js";
export { parseSensorState, SENSORS_PATH, type SensorState } from "./sensors.js";

import { BoPiMissingFieldError, BoPiValidationError } from "./errors.js";
import { normalizeSensor, requireNonNegative, requireRange } from "./helpers.js";

/** Endpoint returning every sensor reading in one JSON object. */
export const SENSORS_PATH = "/allsensorsv2";

export interface SensorState {
  /** pH, 0–14. `null` when the probe is disconnected. */
  phValue: number | null;
  /** Redox potential in mV. */
  redoxValue: number | null;
  /** Water temperature in °C. */
  waterTemperature: number | null;
  /** Temperature inside the enclosure in °C. */
  boxTemperature: number | null;
  /** Relative humidity inside the enclosure, 0–100 %. */
  boxHumidity: number | null;
  /** Seconds since the device booted. */
  uptime: number;
}

type SensorField = Exclude<keyof SensorState, "uptime">;

interface SensorBounds {
  key: string;
  min: number;
  max: number;
}

const SENSOR_FIELDS: Record<SensorField, SensorBounds> = {
  phValue: { key: "phvalue", min: 0, max: 14 },
  redoxValue: { key: "redoxvalue", min: 0, max: 1000 },
  waterTemperature: { key: "watertemperature", min: -55, max: 125 },
  boxTemperature: { key: "boxtemperature", min: -40, max: 80 },
  boxHumidity: { key: "boxhumidity", min: 0, max: 100 },
};

const UPTIME_KEY = "uptime";

function requireNumber(data: Record<string, unknown>, key: string): number {
  if (!(key in data)) {
    throw new BoPiMissingFieldError(key);
  }
  const value = data[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new BoPiValidationError(key, `${key} must be a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readSensor(data: Record<string, unknown>, bounds: SensorBounds): number | null {
  const value = normalizeSensor(requireNumber(data, bounds.key));
  if (value !== null) {
    requireRange(bounds.key, value, bounds.min, bounds.max);
  }
  return value;
}

/**
 * Builds a {@link SensorState} from the decoded `/allsensorsv2` payload.
 *
 * Fields are checked in declaration order; the first missing or invalid one
 * aborts the whole mapping.
 */
export function parseSensorState(data: Record<string, unknown>): SensorState {
  const phValue = readSensor(data, SENSOR_FIELDS.phValue);
  const redoxValue = readSensor(data, SENSOR_FIELDS.redoxValue);
  const waterTemperature = readSensor(data, SENSOR_FIELDS.waterTemperature);
  const boxTemperature = readSensor(data, SENSOR_FIELDS.boxTemperature);
  const boxHumidity = readSensor(data, SENSOR_FIELDS.boxHumidity);

  const uptime = requireNumber(data, UPTIME_KEY);
  requireNonNegative(UPTIME_KEY, uptime);

  return { phValue, redoxValue, waterTemperature, boxTemperature, boxHumidity, uptime };
}

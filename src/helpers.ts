import { BoPiValidationError } from "./errors.js";

/** Reading reported by the firmware when a probe is unplugged. */
const DISCONNECTED_SENSOR = -127;

/** Maps the disconnected-sensor reading to `null`; every other value passes through. */
export function normalizeSensor(value: number): number | null {
  return value === DISCONNECTED_SENSOR ? null : value;
}

export function requireNonNegative(field: string, value: number): void {
  if (value < 0) {
    throw new BoPiValidationError(field, `${field} must be non-negative, got ${value}`);
  }
}

/** Throws unless `min <= value <= max`. */
export function requireRange(field: string, value: number, min: number, max: number): void {
  if (value < min || value > max) {
    throw new BoPiValidationError(
      field,
      `${field} must be between ${min} and ${max}, got ${value}`,
    );
  }
}

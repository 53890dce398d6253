/**
 * Runtime type guards for values crossing a system boundary: configuration
 * files, decoded outcome documents and caller-supplied query parameters.
 */

const HASH32_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const HEX_DATA_PATTERN = /^0x([0-9a-fA-F]{2})*$/;

/**
 * Check whether `value` is a 0x-prefixed 32-byte hex string.
 *
 * @param value - The value to check.
 */
export function isHash32(value: unknown): value is string {
  return typeof value === 'string' && HASH32_PATTERN.test(value);
}

/**
 * Check whether `value` is a 0x-prefixed 20-byte address.
 *
 * @param value - The value to check.
 */
export function isAddress(value: unknown): value is string {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

/**
 * Check whether `value` is 0x-prefixed hex data of whole bytes. `"0x"`
 * (empty data) is accepted.
 */
export function isHexData(value: unknown): value is string {
  return typeof value === 'string' && HEX_DATA_PATTERN.test(value);
}

/** Check whether `value` is a safe integer `>= 0`. */
export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/** Check whether `value` is a safe integer `> 0`. */
export function isPositiveInteger(value: unknown): value is number {
  return isNonNegativeInteger(value) && value > 0;
}

/**
 * Check whether `value` is a decimal or 0x-hex integer string, the form
 * JSON documents use for 256-bit quantities.
 */
export function isIntegerString(value: unknown): value is string {
  return typeof value === 'string' && /^(0x[0-9a-fA-F]+|[0-9]+)$/.test(value);
}

/**
 * Check whether `value` is a plain object (not an array, null, or an object
 * with a non-Object prototype).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

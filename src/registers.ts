/**
 * Register value codec: 16-bit holding register values to and from
 * big-endian byte pairs.
 */

/** True for an integer in the unsigned 16-bit range. */
export function isRegisterValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

/** Serialize register values as consecutive big-endian byte pairs. */
export function encodeRegisters(values: readonly number[]): number[] {
  const bytes: number[] = [];
  for (const v of values) {
    bytes.push((v >> 8) & 0xff, v & 0xff);
  }
  return bytes;
}

/**
 * Interpret consecutive pairs of bytes as big-endian register values.
 *
 * A trailing unpaired byte is dropped. Response parsers reject odd byte
 * counts before calling this, so the drop only applies to direct callers.
 */
export function decodeRegisters(bytes: ArrayLike<number>): number[] {
  const values: number[] = [];
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    values.push(((bytes[i] << 8) | bytes[i + 1]) & 0xffff);
  }
  return values;
}

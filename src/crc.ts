/**
 * CRC-16 (Modbus) calculation utilities.
 *
 * The checksum uses the reflected polynomial 0xA001 with an initial value
 * of 0xFFFF. On the wire it is appended low byte first.
 */

const CRC_TABLE = new Uint16Array(256);

for (let i = 0; i < 256; i++) {
  let crc = i;
  for (let bit = 0; bit < 8; bit++) {
    crc = (crc & 1) !== 0 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
  }
  CRC_TABLE[i] = crc;
}

/**
 * Calculate the Modbus CRC16 of `bytes`.
 *
 * @returns The 16-bit CRC value (0xFFFF for empty input)
 */
export function calculateCRC16(bytes: ArrayLike<number>): number {
  let crc = 0xffff;
  for (let i = 0; i < bytes.length; i++) {
    crc = (crc >>> 8) ^ CRC_TABLE[(crc ^ bytes[i]) & 0xff];
  }
  return crc & 0xffff;
}

/** Return a copy of `bytes` with its CRC appended (low byte, high byte). */
export function appendCRC16(bytes: readonly number[]): number[] {
  const crc = calculateCRC16(bytes);
  return [...bytes, crc & 0xff, (crc >> 8) & 0xff];
}

/** Read the trailing CRC of a frame (low byte first). */
export function readTrailingCRC16(frame: ArrayLike<number>): number {
  const lo = frame[frame.length - 2];
  const hi = frame[frame.length - 1];
  return ((hi << 8) | lo) & 0xffff;
}

/**
 * True when the trailing two bytes of `frame` match the CRC of every byte
 * before them.
 */
export function hasValidCRC16(frame: Uint8Array): boolean {
  if (frame.length < 2) return false;
  return (
    readTrailingCRC16(frame) === calculateCRC16(frame.subarray(0, -2))
  );
}

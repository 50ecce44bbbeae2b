/**
 * Framing modes and the size constants that depend on them.
 */

/**
 * Wire framing used by a client for its whole lifetime.
 *
 * - `tcp`: MBAP header (transaction id, protocol id, length) then the PDU.
 * - `rtu-over-tcp`: RTU frame (unit id, PDU, CRC) carried over a TCP stream.
 */
export type FramingMode = "tcp" | "rtu-over-tcp";

export function isFramingMode(value: unknown): value is FramingMode {
  return value === "tcp" || value === "rtu-over-tcp";
}

/** Transaction id (2) + protocol id (2) + length (2). */
export const MBAP_HEADER_LENGTH = 6;
/** Trailing CRC of an RTU frame. */
export const CRC_LENGTH = 2;

/** Upper bound of a single receive; sized for the largest read response. */
export const MAX_RESPONSE_LENGTH = 256;

/** Largest register count a single write can carry (byte count is one byte). */
export const MAX_WRITE_REGISTERS = 127;

/**
 * Bytes a read response occupies around its data region.
 *
 * tcp: MBAP (6) + unit id + function code + byte count.
 * rtu-over-tcp: unit id + function code + byte count + CRC.
 */
export function readResponseOverhead(mode: FramingMode): number {
  return mode === "tcp" ? MBAP_HEADER_LENGTH + 3 : 3 + CRC_LENGTH;
}

/**
 * Largest read count whose response still fits {@link MAX_RESPONSE_LENGTH}
 * (123 for tcp, 125 for rtu-over-tcp).
 */
export function maxReadCount(mode: FramingMode): number {
  return Math.floor((MAX_RESPONSE_LENGTH - readResponseOverhead(mode)) / 2);
}

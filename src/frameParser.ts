/**
 * Pure functions for validating and decoding Modbus response frames.
 *
 * Response bytes are untrusted: every length, parity and checksum bound is
 * checked before any register is read.
 */

import { createErr, createOk, isOk, type Result } from "option-t/plain_result";
import { calculateCRC16, hasValidCRC16, readTrailingCRC16 } from "./crc.ts";
import {
  ModbusAckMismatchError,
  ModbusCRCError,
  ModbusExceptionError,
  ModbusFrameError,
  type ModbusResponseError,
} from "./errors.ts";
import { CRC_LENGTH, type FramingMode, MBAP_HEADER_LENGTH } from "./framing.ts";
import {
  isExceptionFunctionCode,
  WRITE_MULTIPLE_REGISTERS,
} from "./functionCodes.ts";
import { decodeRegisters } from "./registers.ts";

/** Offset of the byte count in a tcp read response (after MBAP, unit, fc). */
const TCP_BYTE_COUNT_OFFSET = MBAP_HEADER_LENGTH + 2;
/** Offset of the byte count in an rtu read response (after unit, fc). */
const RTU_BYTE_COUNT_OFFSET = 2;

/** Smallest acceptable write acknowledgement per mode. */
const TCP_WRITE_ACK_LENGTH = 12;
const RTU_WRITE_ACK_LENGTH = 8;
/** unit id + function code + exception code + CRC. */
const RTU_EXCEPTION_LENGTH = 5;

/**
 * Validate a read holding registers response and decode its registers.
 *
 * tcp checks only length and parity; the MBAP header is not compared with
 * the request. rtu-over-tcp checks the CRC first, then the exception flag,
 * then length and parity.
 */
export function parseReadResponse(
  frame: Uint8Array,
  mode: FramingMode,
): Result<number[], ModbusResponseError> {
  return mode === "tcp" ? parseTcpReadResponse(frame) : parseRtuReadResponse(frame);
}

function parseTcpReadResponse(
  frame: Uint8Array,
): Result<number[], ModbusResponseError> {
  const dataStart = TCP_BYTE_COUNT_OFFSET + 1;
  if (frame.length < dataStart) {
    return createErr(
      new ModbusFrameError(
        `TCP response too short (minimum ${dataStart} bytes, got ${frame.length})`,
      ),
    );
  }
  const byteCount = frame[TCP_BYTE_COUNT_OFFSET];
  return decodeDataRegion(frame, dataStart, byteCount, 0);
}

function parseRtuReadResponse(
  frame: Uint8Array,
): Result<number[], ModbusResponseError> {
  if (frame.length < RTU_EXCEPTION_LENGTH) {
    return createErr(
      new ModbusFrameError(
        `RTU response too short (minimum ${RTU_EXCEPTION_LENGTH} bytes, got ${frame.length})`,
      ),
    );
  }
  const crcError = checkCRC(frame);
  if (crcError) return createErr(crcError);

  if (isExceptionFunctionCode(frame[1])) {
    return createErr(new ModbusExceptionError(frame[2]));
  }

  const byteCount = frame[RTU_BYTE_COUNT_OFFSET];
  return decodeDataRegion(frame, RTU_BYTE_COUNT_OFFSET + 1, byteCount, CRC_LENGTH);
}

function decodeDataRegion(
  frame: Uint8Array,
  dataStart: number,
  byteCount: number,
  trailer: number,
): Result<number[], ModbusResponseError> {
  const dataEnd = dataStart + byteCount;
  if (frame.length < dataEnd + trailer) {
    return createErr(
      new ModbusFrameError(
        `Incomplete frame: byte count ${byteCount} needs ${dataEnd + trailer} bytes, got ${frame.length}`,
      ),
    );
  }
  if (byteCount % 2 !== 0) {
    return createErr(
      new ModbusFrameError(`Odd data byte count ${byteCount}`),
    );
  }
  return createOk(decodeRegisters(frame.subarray(dataStart, dataEnd)));
}

/**
 * Validate a write multiple registers acknowledgement.
 *
 * tcp: at least 12 bytes with 0x10 at offset 7. rtu-over-tcp: at least 8
 * bytes with a matching trailing CRC; the echoed unit id, function code and
 * address are not compared. Exception frames are reported as such but are
 * never the difference between success and failure.
 */
export function parseWriteResponse(
  frame: Uint8Array,
  mode: FramingMode,
): Result<void, ModbusResponseError> {
  return mode === "tcp" ? parseTcpWriteResponse(frame) : parseRtuWriteResponse(frame);
}

function parseTcpWriteResponse(
  frame: Uint8Array,
): Result<void, ModbusResponseError> {
  const fcOffset = MBAP_HEADER_LENGTH + 1;
  if (frame.length < TCP_WRITE_ACK_LENGTH) {
    if (frame.length > fcOffset + 1 && isExceptionFunctionCode(frame[fcOffset])) {
      return createErr(new ModbusExceptionError(frame[fcOffset + 1]));
    }
    return createErr(
      new ModbusFrameError(
        `TCP acknowledge too short (minimum ${TCP_WRITE_ACK_LENGTH} bytes, got ${frame.length})`,
      ),
    );
  }
  const fc = frame[fcOffset];
  if (fc !== WRITE_MULTIPLE_REGISTERS) {
    return createErr(
      new ModbusAckMismatchError(
        `function code 0x${fc.toString(16).padStart(2, "0")} at offset ${fcOffset}`,
      ),
    );
  }
  return createOk(undefined);
}

function parseRtuWriteResponse(
  frame: Uint8Array,
): Result<void, ModbusResponseError> {
  if (frame.length < RTU_WRITE_ACK_LENGTH) {
    if (
      frame.length >= RTU_EXCEPTION_LENGTH &&
      hasValidCRC16(frame) &&
      isExceptionFunctionCode(frame[1])
    ) {
      return createErr(new ModbusExceptionError(frame[2]));
    }
    return createErr(
      new ModbusFrameError(
        `RTU acknowledge too short (minimum ${RTU_WRITE_ACK_LENGTH} bytes, got ${frame.length})`,
      ),
    );
  }
  const crcError = checkCRC(frame);
  return crcError ? createErr(crcError) : createOk(undefined);
}

/** Boolean view of {@link parseWriteResponse}. */
export function isWriteAcknowledged(frame: Uint8Array, mode: FramingMode): boolean {
  return isOk(parseWriteResponse(frame, mode));
}

function checkCRC(frame: Uint8Array): ModbusCRCError | null {
  const expected = calculateCRC16(frame.subarray(0, -CRC_LENGTH));
  const received = readTrailingCRC16(frame);
  return expected === received ? null : new ModbusCRCError(expected, received);
}

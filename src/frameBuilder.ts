/**
 * Pure functions for building Modbus request frames (TCP and RTU over TCP).
 *
 * The PDU (unit id, function code, data) is assembled first; framing then
 * either prefixes the MBAP header with the PDU length or appends the CRC.
 */

import { appendCRC16 } from "./crc.ts";
import { ModbusRequestError } from "./errors.ts";
import {
  type FramingMode,
  MAX_WRITE_REGISTERS,
  maxReadCount,
} from "./framing.ts";
import {
  FUNCTION_CODE_LABELS,
  type FunctionCode,
  READ_HOLDING_REGISTERS,
  WRITE_MULTIPLE_REGISTERS,
} from "./functionCodes.ts";
import { encodeRegisters, isRegisterValue } from "./registers.ts";

/**
 * Build a read holding registers (FC03) request.
 *
 * tcp: `00 00 00 00 00 06 uu 03 aa aa cc cc` (12 bytes).
 * rtu-over-tcp: `uu 03 aa aa cc cc crcLo crcHi` (8 bytes).
 *
 * @throws ModbusRequestError when an argument is out of range.
 */
export function buildReadRequest(
  unitId: number,
  address: number,
  count: number,
  mode: FramingMode,
): Uint8Array {
  const fc = READ_HOLDING_REGISTERS;
  assertUnitId(fc, unitId);
  assertAddress(fc, address);
  const max = maxReadCount(mode);
  if (!Number.isInteger(count) || count < 0 || count > max) {
    throw new ModbusRequestError(
      `${FUNCTION_CODE_LABELS[fc]}: count must be an integer in 0-${max}, got ${count}`,
    );
  }

  const pdu = [
    unitId,
    fc,
    (address >> 8) & 0xff,
    address & 0xff,
    (count >> 8) & 0xff,
    count & 0xff,
  ];
  return buildFrame(pdu, mode);
}

/**
 * Build a write multiple registers (FC16) request.
 *
 * FC16 is used whatever the number of values, including a single one.
 *
 * @throws ModbusRequestError when an argument is out of range, including
 *         writes of more than 127 registers whose byte count would not fit
 *         in one byte.
 */
export function buildWriteRequest(
  unitId: number,
  address: number,
  values: readonly number[],
  mode: FramingMode,
): Uint8Array {
  const fc = WRITE_MULTIPLE_REGISTERS;
  assertUnitId(fc, unitId);
  assertAddress(fc, address);
  if (values.length === 0 || values.length > MAX_WRITE_REGISTERS) {
    throw new ModbusRequestError(
      `${FUNCTION_CODE_LABELS[fc]}: expected 1-${MAX_WRITE_REGISTERS} values, got ${values.length}`,
    );
  }
  const invalid = values.findIndex((v) => !isRegisterValue(v));
  if (invalid !== -1) {
    throw new ModbusRequestError(
      `${FUNCTION_CODE_LABELS[fc]}: value at index ${invalid} must be 0-65535, got ${values[invalid]}`,
    );
  }

  const quantity = values.length;
  const pdu = [
    unitId,
    fc,
    (address >> 8) & 0xff,
    address & 0xff,
    (quantity >> 8) & 0xff,
    quantity & 0xff,
    quantity * 2,
    ...encodeRegisters(values),
  ];
  return buildFrame(pdu, mode);
}

/**
 * Frame a PDU for the given mode.
 *
 * For tcp the length field is derived from the finished PDU, so it is
 * embedded once and never patched. For rtu-over-tcp the CRC16 is appended
 * low byte first.
 */
export function buildFrame(pdu: readonly number[], mode: FramingMode): Uint8Array {
  if (mode === "rtu-over-tcp") {
    return new Uint8Array(appendCRC16(pdu));
  }
  const length = pdu.length;
  return new Uint8Array([
    0x00,
    0x00, // transaction id
    0x00,
    0x00, // protocol id
    (length >> 8) & 0xff,
    length & 0xff,
    ...pdu,
  ]);
}

function assertUnitId(fc: FunctionCode, unitId: number): void {
  if (!Number.isInteger(unitId) || unitId < 0 || unitId > 0xff) {
    throw new ModbusRequestError(
      `${FUNCTION_CODE_LABELS[fc]}: unit id must be 0-255, got ${unitId}`,
    );
  }
}

function assertAddress(fc: FunctionCode, address: number): void {
  if (!Number.isInteger(address) || address < 0 || address > 0xffff) {
    throw new ModbusRequestError(
      `${FUNCTION_CODE_LABELS[fc]}: address must be 0-65535, got ${address}`,
    );
  }
}

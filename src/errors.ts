/**
 * Unified error types and exception code mapping for Modbus operations.
 *
 * Every error carries a `kind` discriminant so callers can branch on the
 * failure without `instanceof` chains.
 */

/** Modbus exception codes as defined in the application protocol. */
export const MODBUS_EXCEPTION_CODES = {
  1: "Illegal function",
  2: "Illegal data address (address does not exist)",
  3: "Illegal data value",
  4: "Slave device failure",
  5: "Acknowledge",
  6: "Slave device busy",
  8: "Memory parity error",
  10: "Gateway path unavailable",
  11: "Gateway target device failed to respond",
} as const;

/** Exception codes with a known label. */
export type KnownExceptionCode = keyof typeof MODBUS_EXCEPTION_CODES;

/** Failure categories reported by the client. */
export type ModbusErrorKind =
  | "transport"
  | "malformed"
  | "crc"
  | "exception"
  | "ack-mismatch"
  | "busy"
  | "request";

export function isKnownExceptionCode(code: number): code is KnownExceptionCode {
  return Object.hasOwn(MODBUS_EXCEPTION_CODES, code);
}

/** Human readable label for an exception code. */
export function describeExceptionCode(code: number): string {
  return isKnownExceptionCode(code)
    ? MODBUS_EXCEPTION_CODES[code]
    : `Unknown exception ${code}`;
}

/** Base error class for Modbus-related errors. */
export abstract class ModbusError extends Error {
  abstract readonly kind: ModbusErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ModbusError";
  }
}

/** Connect, send or receive failed, or the exchange was closed/aborted. */
export class ModbusTransportError extends ModbusError {
  readonly kind = "transport";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ModbusTransportError";
  }
}

/** Error for frames that violate a length or parity bound. */
export class ModbusFrameError extends ModbusError {
  readonly kind = "malformed";

  constructor(message: string) {
    super(`Frame error: ${message}`);
    this.name = "ModbusFrameError";
  }
}

/** Error for CRC validation failures. */
export class ModbusCRCError extends ModbusError {
  readonly kind = "crc";

  constructor(
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(
      `CRC error (expected 0x${expected.toString(16).padStart(4, "0")}, received 0x${received.toString(16).padStart(4, "0")})`,
    );
    this.name = "ModbusCRCError";
  }
}

/** Error for Modbus exception responses (function code | 0x80). */
export class ModbusExceptionError extends ModbusError {
  readonly kind = "exception";

  constructor(public readonly exceptionCode: number) {
    super(`${describeExceptionCode(exceptionCode)} (code: ${exceptionCode})`);
    this.name = "ModbusExceptionError";
  }
}

/** Error for write acknowledgements that do not echo the request. */
export class ModbusAckMismatchError extends ModbusError {
  readonly kind = "ack-mismatch";

  constructor(message: string) {
    super(`Acknowledge mismatch: ${message}`);
    this.name = "ModbusAckMismatchError";
  }
}

/** Error for concurrent request attempts. */
export class ModbusBusyError extends ModbusError {
  readonly kind = "busy";

  constructor() {
    super("Another request is in progress");
    this.name = "ModbusBusyError";
  }
}

/** Error for request arguments that cannot be encoded. */
export class ModbusRequestError extends ModbusError {
  readonly kind = "request";

  constructor(message: string) {
    super(message);
    this.name = "ModbusRequestError";
  }
}

/** Errors produced while validating a response frame. */
export type ModbusResponseError =
  | ModbusFrameError
  | ModbusCRCError
  | ModbusExceptionError
  | ModbusAckMismatchError;

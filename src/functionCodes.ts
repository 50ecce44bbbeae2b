/**
 * Function code metadata for the operations this client issues.
 */

/** Read holding registers. */
export const READ_HOLDING_REGISTERS = 0x03;
/** Write multiple holding registers. Used for every write, even one register. */
export const WRITE_MULTIPLE_REGISTERS = 0x10;

/** Numeric union of supported function codes. */
export type FunctionCode =
  | typeof READ_HOLDING_REGISTERS
  | typeof WRITE_MULTIPLE_REGISTERS;

export const FUNCTION_CODE_LABELS: Record<FunctionCode, string> = {
  [READ_HOLDING_REGISTERS]: "Read Holding Registers",
  [WRITE_MULTIPLE_REGISTERS]: "Write Multiple Registers",
};

/** Bit set on the function code of an exception response. */
export const EXCEPTION_FLAG = 0x80;

/** True when the function byte of a response marks an exception. */
export function isExceptionFunctionCode(code: number): boolean {
  return (code & EXCEPTION_FLAG) !== 0;
}

import { describe, expect, it } from "vitest";
import {
  describeExceptionCode,
  isKnownExceptionCode,
  ModbusBusyError,
  ModbusError,
  ModbusExceptionError,
  ModbusTransportError,
} from "../src/errors.ts";

describe("errors", () => {
  it("labels known exception codes", () => {
    expect(describeExceptionCode(1)).toBe("Illegal function");
    expect(describeExceptionCode(11)).toBe(
      "Gateway target device failed to respond",
    );
  });

  it("falls back for unknown exception codes", () => {
    expect(isKnownExceptionCode(7)).toBe(false);
    expect(new ModbusExceptionError(7).message).toBe(
      "Unknown exception 7 (code: 7)",
    );
  });

  it("keeps the exception code on the error", () => {
    const error = new ModbusExceptionError(3);
    expect(error.exceptionCode).toBe(3);
    expect(error.name).toBe("ModbusExceptionError");
    expect(error).toBeInstanceOf(ModbusError);
  });

  it("keeps the cause of transport errors", () => {
    const cause = new Error("ECONNRESET");
    const error = new ModbusTransportError("Receive failed", { cause });
    expect(error.kind).toBe("transport");
    expect(error.cause).toBe(cause);
  });

  it("reports busy errors with a fixed message", () => {
    const error = new ModbusBusyError();
    expect(error.kind).toBe("busy");
    expect(error.message).toBe("Another request is in progress");
  });
});

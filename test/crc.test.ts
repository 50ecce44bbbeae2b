import { describe, expect, it } from "vitest";
import {
  appendCRC16,
  calculateCRC16,
  hasValidCRC16,
  readTrailingCRC16,
} from "../src/crc.ts";

describe("CRC16 Calculation", () => {
  it("calculates CRC16 for empty array", () => {
    expect(calculateCRC16([])).toBe(0xffff);
  });

  it("calculates CRC16 for single byte", () => {
    expect(calculateCRC16([0x01])).toBe(0x807e);
  });

  it("matches the serial line guide example (11 03 00 6B 00 03 -> 76 87)", () => {
    expect(calculateCRC16([0x11, 0x03, 0x00, 0x6b, 0x00, 0x03])).toBe(0x8776);
  });

  it("matches common read request vectors", () => {
    expect(calculateCRC16([0x01, 0x03, 0x00, 0x00, 0x00, 0x01])).toBe(0x0a84);
    expect(calculateCRC16([0x01, 0x03, 0x00, 0x00, 0x00, 0x0a])).toBe(0xcdc5);
  });

  it("accepts Uint8Array input", () => {
    expect(calculateCRC16(new Uint8Array([0x01, 0x03, 0x02, 0x00, 0x0a]))).toBe(
      0x4338,
    );
  });

  it("is deterministic", () => {
    const data = [0x01, 0x10, 0x00, 0x01, 0x00, 0x02];
    expect(calculateCRC16(data)).toBe(calculateCRC16([...data]));
  });
});

describe("CRC helpers", () => {
  it("appendCRC16 appends low byte first without mutating input", () => {
    const pdu = [0x01, 0x83, 0x02];
    expect(appendCRC16(pdu)).toEqual([0x01, 0x83, 0x02, 0xc0, 0xf1]);
    expect(pdu).toEqual([0x01, 0x83, 0x02]);
  });

  it("readTrailingCRC16 reads low byte first", () => {
    expect(readTrailingCRC16([0x01, 0x03, 0x84, 0x0a])).toBe(0x0a84);
  });

  it("hasValidCRC16 accepts a correct frame and rejects a corrupted one", () => {
    const frame = new Uint8Array([0x01, 0x03, 0x00, 0x00, 0x00, 0x01, 0x84, 0x0a]);
    expect(hasValidCRC16(frame)).toBe(true);
    frame[3] = 0x01;
    expect(hasValidCRC16(frame)).toBe(false);
  });

  it("hasValidCRC16 rejects frames shorter than the CRC", () => {
    expect(hasValidCRC16(new Uint8Array([0xff]))).toBe(false);
  });
});

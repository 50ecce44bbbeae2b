import { describe, expect, it } from "vitest";
import { ModbusRequestError } from "../src/errors.ts";
import {
  buildFrame,
  buildReadRequest,
  buildWriteRequest,
} from "../src/frameBuilder.ts";

describe("Frame Builder", () => {
  describe("buildReadRequest", () => {
    it("builds a TCP read request with a fixed length of 6", () => {
      const frame = buildReadRequest(1, 0x006b, 3, "tcp");
      expect(Array.from(frame)).toEqual([
        0x00, 0x00, 0x00, 0x00, // transaction + protocol id
        0x00, 0x06, // length
        0x01, 0x03, // unit id, function code
        0x00, 0x6b, // address
        0x00, 0x03, // count
      ]);
    });

    it("builds an RTU-over-TCP read request with CRC low byte first", () => {
      const frame = buildReadRequest(0x11, 0x006b, 3, "rtu-over-tcp");
      expect(Array.from(frame)).toEqual([
        0x11, 0x03, 0x00, 0x6b, 0x00, 0x03, 0x76, 0x87,
      ]);
    });

    it("splits address and count into big-endian bytes", () => {
      const frame = buildReadRequest(1, 0xabcd, 0x007d, "rtu-over-tcp");
      expect(Array.from(frame.subarray(2, 6))).toEqual([0xab, 0xcd, 0x00, 0x7d]);
    });

    it("accepts a zero count", () => {
      expect(Array.from(buildReadRequest(1, 0, 0, "tcp"))).toEqual([
        0, 0, 0, 0, 0, 6, 1, 3, 0, 0, 0, 0,
      ]);
    });

    it("rejects counts whose response would not fit a single receive", () => {
      expect(buildReadRequest(1, 0, 123, "tcp")).toHaveLength(12);
      expect(() => buildReadRequest(1, 0, 124, "tcp")).toThrow(ModbusRequestError);
      expect(buildReadRequest(1, 0, 125, "rtu-over-tcp")).toHaveLength(8);
      expect(() => buildReadRequest(1, 0, 126, "rtu-over-tcp")).toThrow(
        "count must be an integer in 0-125, got 126",
      );
    });

    it("rejects out of range unit ids and addresses", () => {
      expect(() => buildReadRequest(256, 0, 1, "tcp")).toThrow(
        "Read Holding Registers: unit id must be 0-255, got 256",
      );
      expect(() => buildReadRequest(1, -1, 1, "tcp")).toThrow(ModbusRequestError);
      expect(() => buildReadRequest(1, 0x10000, 1, "tcp")).toThrow(ModbusRequestError);
      expect(() => buildReadRequest(1, 0, 1.5, "tcp")).toThrow(ModbusRequestError);
    });
  });

  describe("buildWriteRequest", () => {
    it("builds a TCP write request with the length derived from the PDU", () => {
      const frame = buildWriteRequest(0x11, 0x0001, [0x000a, 0x0102], "tcp");
      expect(Array.from(frame)).toEqual([
        0x00, 0x00, 0x00, 0x00,
        0x00, 0x0b, // 11 bytes from unit id onward
        0x11, 0x10,
        0x00, 0x01, // address
        0x00, 0x02, // register count
        0x04, // byte count
        0x00, 0x0a, 0x01, 0x02,
      ]);
    });

    it("builds an RTU-over-TCP write request with CRC over the PDU", () => {
      const frame = buildWriteRequest(0x11, 0x0001, [0x000a, 0x0102], "rtu-over-tcp");
      expect(Array.from(frame)).toEqual([
        0x11, 0x10, 0x00, 0x01, 0x00, 0x02, 0x04, 0x00, 0x0a, 0x01, 0x02, 0xc6,
        0xf0,
      ]);
    });

    it("uses FC16 for a single register", () => {
      const frame = buildWriteRequest(1, 0, [0xffff], "tcp");
      expect(Array.from(frame)).toEqual([
        0, 0, 0, 0, 0, 9, 0x01, 0x10, 0, 0, 0, 1, 2, 0xff, 0xff,
      ]);
    });

    it("accepts 127 registers and embeds a two-byte length", () => {
      const values = Array.from({ length: 127 }, (_, i) => i);
      const frame = buildWriteRequest(1, 0, values, "tcp");
      expect(frame).toHaveLength(6 + 7 + 254);
      expect(frame[4]).toBe(0x01);
      expect(frame[5]).toBe(0x05);
      expect(frame[12]).toBe(254);
    });

    it("rejects writes whose byte count would overflow one byte", () => {
      const values = new Array<number>(128).fill(0);
      expect(() => buildWriteRequest(1, 0, values, "rtu-over-tcp")).toThrow(
        "Write Multiple Registers: expected 1-127 values, got 128",
      );
    });

    it("rejects empty writes", () => {
      expect(() => buildWriteRequest(1, 0, [], "tcp")).toThrow(ModbusRequestError);
    });

    it("rejects values outside the register range", () => {
      expect(() => buildWriteRequest(1, 0, [1, 0x10000], "tcp")).toThrow(
        "value at index 1 must be 0-65535, got 65536",
      );
      expect(() => buildWriteRequest(1, 0, [-1], "tcp")).toThrow(ModbusRequestError);
      expect(() => buildWriteRequest(1, 0, [0.5], "tcp")).toThrow(ModbusRequestError);
    });
  });

  describe("buildFrame", () => {
    it("prefixes the MBAP header for tcp", () => {
      expect(Array.from(buildFrame([0x01, 0x03], "tcp"))).toEqual([
        0, 0, 0, 0, 0, 2, 0x01, 0x03,
      ]);
    });

    it("appends the CRC for rtu-over-tcp", () => {
      expect(Array.from(buildFrame([0x01, 0x83, 0x02], "rtu-over-tcp"))).toEqual([
        0x01, 0x83, 0x02, 0xc0, 0xf1,
      ]);
    });
  });
});

export {
  ModbusClient,
  type ReadHoldingRegistersRequest,
  type RequestOptions,
  type StateChangeHandler,
  type WriteHoldingRegistersRequest,
} from "./client.ts";
export {
  type ClientConfig,
  DEFAULT_UNIT_ID,
  MAX_WAITING_TIMEOUT,
  resolveClientConfig,
} from "./config.ts";
export { appendCRC16, calculateCRC16, hasValidCRC16 } from "./crc.ts";
export {
  describeExceptionCode,
  MODBUS_EXCEPTION_CODES,
  ModbusAckMismatchError,
  ModbusBusyError,
  ModbusCRCError,
  ModbusError,
  type ModbusErrorKind,
  ModbusExceptionError,
  ModbusFrameError,
  ModbusRequestError,
  type ModbusResponseError,
  ModbusTransportError,
} from "./errors.ts";
export { buildReadRequest, buildWriteRequest } from "./frameBuilder.ts";
export {
  isWriteAcknowledged,
  parseReadResponse,
  parseWriteResponse,
} from "./frameParser.ts";
export {
  type FramingMode,
  MAX_RESPONSE_LENGTH,
  MAX_WRITE_REGISTERS,
  maxReadCount,
} from "./framing.ts";
export {
  READ_HOLDING_REGISTERS,
  WRITE_MULTIPLE_REGISTERS,
} from "./functionCodes.ts";
export { decodeRegisters, encodeRegisters } from "./registers.ts";
export { receive, type ReceiveOptions } from "./stream.ts";
export { MockTransport, type MockTransportOptions } from "./transport/mock-transport.ts";
export { TcpTransport, type TcpSocket } from "./transport/tcp-transport.ts";
export {
  type ConnectionState,
  type IModbusTransport,
  type TcpTransportConfig,
  type TransportConfig,
  toConnectionState,
} from "./transport/transport.ts";
export { toHex } from "./utils/format.ts";

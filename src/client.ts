/**
 * Modbus client for holding register access over a TCP stream.
 *
 * The client owns one transport and one framing mode. Each public operation
 * is a single exchange: build the request, send it, wait for exactly one
 * response chunk, validate it, and return a {@link Result}. Failures are
 * returned, never thrown, and only fail the exchange that produced them.
 */
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import {
  type ClientConfig,
  type ResolvedClientConfig,
  resolveClientConfig,
} from "./config.ts";
import {
  ModbusBusyError,
  type ModbusError,
  ModbusRequestError,
  type ModbusResponseError,
  ModbusTransportError,
} from "./errors.ts";
import { EventEmitter } from "./events.ts";
import { buildReadRequest, buildWriteRequest } from "./frameBuilder.ts";
import { parseReadResponse, parseWriteResponse } from "./frameParser.ts";
import { type FramingMode, MAX_RESPONSE_LENGTH } from "./framing.ts";
import { receive } from "./stream.ts";
import {
  type ConnectionState,
  type IModbusTransport,
  toConnectionState,
} from "./transport/transport.ts";

export interface ReadHoldingRegistersRequest {
  /** Defaults to the client's unit id. */
  unitId?: number;
  address: number;
  count: number;
}

export interface WriteHoldingRegistersRequest {
  /** Defaults to the client's unit id. */
  unitId?: number;
  address: number;
  values: readonly number[];
}

/** Optional per-request controls. There is no built-in timeout. */
export interface RequestOptions {
  signal?: AbortSignal;
}

export type StateChangeHandler = (state: ConnectionState) => void;

/**
 * Event types emitted by the client. `request` and `response` carry the raw
 * frames for logging.
 */
type ModbusClientEvents = {
  statechange: [ConnectionState];
  request: [Uint8Array];
  response: [Uint8Array];
  error: [ModbusError];
};

export class ModbusClient extends EventEmitter<ModbusClientEvents> {
  readonly #config: ResolvedClientConfig;
  #transport: IModbusTransport | null = null;
  /** Aborting removes the client's listeners from the current transport. */
  #transportListeners: AbortController | null = null;
  /** Set while an exchange is in flight (single in-flight request policy). */
  #busy = false;

  constructor(config: ClientConfig) {
    super();
    this.#config = resolveClientConfig(config);
  }

  get mode(): FramingMode {
    return this.#config.mode;
  }

  get unitId(): number {
    return this.#config.unitId;
  }

  get connected(): boolean {
    return this.#transport?.connected ?? false;
  }

  /**
   * Open a connection to `host:port`.
   *
   * Every state the transport reports is passed to `onStateChange` (and the
   * `statechange` event) in order, one call per transition. The new transport
   * replaces the current one at once; the replaced one is closed before the
   * new one connects. An attempt replaced by a later `connect()` resolves
   * with an error.
   */
  async connect(
    host: string,
    port: number,
    onStateChange?: StateChangeHandler,
  ): Promise<Result<void, ModbusTransportError>> {
    const previous = this.#transport;
    const previousListeners = this.#transportListeners;

    const transport = this.#config.createTransport({
      host,
      port,
      type: "tcp",
      waitingTimeout: this.#config.waitingTimeout,
    });
    const listeners = new AbortController();
    transport.addEventListener(
      "statechange",
      (ev) => {
        const state = toConnectionState(ev.detail);
        onStateChange?.(state);
        this.emit("statechange", state);
      },
      { signal: listeners.signal },
    );
    this.#transport = transport;
    this.#transportListeners = listeners;

    try {
      if (previous) {
        await closeTransport(previous, previousListeners);
      }
      await transport.connect();
    } catch (error) {
      this.#release(transport, listeners);
      const failure = new ModbusTransportError(
        `Connect to ${host}:${port} failed`,
        { cause: error },
      );
      this.emit("error", failure);
      return createErr(failure);
    }

    if (this.#transport !== transport) {
      await closeTransport(transport, listeners);
      const replaced = new ModbusTransportError(
        `Connection to ${host}:${port} was replaced`,
      );
      this.emit("error", replaced);
      return createErr(replaced);
    }
    return createOk(undefined);
  }

  /**
   * Close the connection. A pending exchange resolves with a
   * {@link ModbusTransportError}.
   */
  async disconnect(): Promise<void> {
    const transport = this.#transport;
    if (!transport) return;
    const listeners = this.#transportListeners;
    this.#transport = null;
    this.#transportListeners = null;
    await closeTransport(transport, listeners);
  }

  /**
   * Read `count` holding registers starting at `address` (FC03).
   *
   * Resolves with the register values in ascending address order.
   */
  async readHoldingRegisters(
    request: ReadHoldingRegistersRequest,
    options: RequestOptions = {},
  ): Promise<Result<number[], ModbusError>> {
    const unitId = request.unitId ?? this.#config.unitId;
    const mode = this.#config.mode;
    return this.#exchange(
      () => buildReadRequest(unitId, request.address, request.count, mode),
      (frame) => parseReadResponse(frame, mode),
      options,
    );
  }

  /**
   * Write `values` to consecutive holding registers starting at `address`
   * (FC16, whatever the number of values).
   */
  async writeHoldingRegisters(
    request: WriteHoldingRegistersRequest,
    options: RequestOptions = {},
  ): Promise<Result<void, ModbusError>> {
    const unitId = request.unitId ?? this.#config.unitId;
    const mode = this.#config.mode;
    return this.#exchange(
      () => buildWriteRequest(unitId, request.address, request.values, mode),
      (frame) => parseWriteResponse(frame, mode),
      options,
    );
  }

  async #exchange<T>(
    encode: () => Uint8Array,
    decode: (frame: Uint8Array) => Result<T, ModbusResponseError>,
    options: RequestOptions,
  ): Promise<Result<T, ModbusError>> {
    const transport = this.#transport;
    if (!transport || !transport.connected) {
      return this.#fail(new ModbusTransportError("Transport not connected"));
    }
    if (this.#busy) {
      return this.#fail(new ModbusBusyError());
    }

    let request: Uint8Array;
    try {
      request = encode();
    } catch (error) {
      if (error instanceof ModbusRequestError) return this.#fail(error);
      throw error;
    }

    this.#busy = true;
    const exchange = new AbortController();
    const outer = options.signal;
    if (outer?.aborted) {
      exchange.abort(outer.reason);
    } else {
      outer?.addEventListener("abort", () => exchange.abort(outer.reason), {
        once: true,
        signal: exchange.signal,
      });
    }

    try {
      const pending = receive(transport, {
        maxLength: MAX_RESPONSE_LENGTH,
        minLength: 1,
        signal: exchange.signal,
      });

      this.emit("request", request);
      try {
        transport.postMessage(request);
      } catch (error) {
        exchange.abort(error);
        await pending;
        return this.#fail(
          new ModbusTransportError("Send failed", { cause: error }),
        );
      }

      const received = await pending;
      if (isErr(received)) {
        return this.#fail(unwrapErr(received));
      }
      const frame = unwrapOk(received);
      this.emit("response", frame);

      const decoded = decode(frame);
      if (isErr(decoded)) {
        return this.#fail(unwrapErr(decoded));
      }
      return createOk(unwrapOk(decoded));
    } finally {
      exchange.abort();
      this.#busy = false;
    }
  }

  #fail<T>(error: ModbusError): Result<T, ModbusError> {
    this.emit("error", error);
    return createErr(error);
  }

  /** Drop `transport` unless a later `connect()` already replaced it. */
  #release(transport: IModbusTransport, listeners: AbortController): void {
    listeners.abort();
    if (this.#transport === transport) {
      this.#transport = null;
      this.#transportListeners = null;
    }
  }
}

async function closeTransport(
  transport: IModbusTransport,
  listeners: AbortController | null,
): Promise<void> {
  try {
    await transport.disconnect();
  } finally {
    listeners?.abort();
  }
}

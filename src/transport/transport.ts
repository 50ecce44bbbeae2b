/**
 * Transport abstraction for Modbus communication (MessagePort-like interface).
 *
 * The client only needs a byte pipe with connection state notifications.
 * Implementations mirror a subset of the `MessagePort`/`WebSocket` style so
 * they can be swapped (TCP socket / mock).
 *
 * - Uses DOM `addEventListener` semantics; listeners are removed through the
 *   `signal` option.
 * - Narrow surface: `connect()`, `disconnect()`, `postMessage()`.
 * - Inbound data is delivered as `Uint8Array` via `message` events.
 * - State changes are observable via `statechange`, whose `detail` carries
 *   the new {@link ConnectionState}.
 */

/** Configuration for a TCP socket transport. */
export interface TcpTransportConfig {
  type: "tcp";
  host: string;
  port: number;
  /**
   * Milliseconds after which a connection attempt that has not completed is
   * reported as `waiting`. The attempt itself continues.
   */
  waitingTimeout?: number;
}

/** Configuration for the in-memory / test oriented mock transport. */
export interface MockTransportConfig {
  type: "mock";
  name?: string;
}

/** Discriminated union of all supported transport configuration objects. */
export type TransportConfig = TcpTransportConfig | MockTransportConfig;

/** States a connection reports over its lifetime. */
export const CONNECTION_STATES = [
  "preparing",
  "ready",
  "waiting",
  "failed",
  "cancelled",
  "unknown",
] as const;

/**
 * Lifecycle states reported by a transport. `unknown` stands for any
 * signal outside the recognised set.
 */
export type ConnectionState = (typeof CONNECTION_STATES)[number];

/**
 * Map a transport-reported signal to a {@link ConnectionState}.
 *
 * Unrecognised signals become `unknown` instead of being dropped.
 */
export function toConnectionState(signal: string): ConnectionState {
  const match = CONNECTION_STATES.find((state) => state === signal);
  return match ?? "unknown";
}

/** Event emitted when raw bytes are received from the underlying link. */
export interface TransportMessageEvent extends CustomEvent<Uint8Array> {}
/** Event emitted on transport level errors (I/O, disconnection, etc.). */
export interface TransportErrorEvent extends CustomEvent<Error> {
  /** Shortcut reference to the error object (mirrors WebSocket semantics). */
  readonly error: Error;
}
/** Strongly typed event map used by transports. */
export type TransportEventMap = {
  /** Fired after a successful `connect()`. */
  open: Event;
  /** Fired after `disconnect()` or an unexpected closure. */
  close: Event;
  /** Fired whenever {@link ConnectionState} transitions. New state in `detail`. */
  statechange: CustomEvent<ConnectionState>;
  /** Fired for each received binary chunk. */
  message: TransportMessageEvent;
  /** Fired on I/O errors; the error is available via `detail` and `.error`. */
  error: TransportErrorEvent;
};

/**
 * Minimal contract implemented by every transport.
 *
 * No buffering or reassembly is required: chunks are emitted as they are
 * observed on the underlying medium.
 */
export interface IModbusTransport {
  /** User supplied configuration discriminator for the transport. */
  readonly config: TransportConfig;
  /** Current lifecycle state. */
  readonly state: ConnectionState;
  /** Convenience boolean alias for `state === "ready"`. */
  readonly connected: boolean;

  /** Establish a connection / open underlying resources. */
  connect(): Promise<void>;
  /** Gracefully close the transport if open. */
  disconnect(): Promise<void>;
  /**
   * Send raw bytes. Throws if not connected. Sending the same bytes twice
   * has no effect on transport state beyond the second write.
   */
  postMessage(data: Uint8Array): void;
  /** Register an event listener. */
  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void;
}

/** Factory function responsible for instantiating a transport for `config`. */
export type TransportFactory<T extends TransportConfig = TransportConfig> = (
  config: T,
) => IModbusTransport;

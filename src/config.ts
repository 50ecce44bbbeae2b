/**
 * Client configuration and defaults.
 */
import { ModbusRequestError } from "./errors.ts";
import { type FramingMode, isFramingMode } from "./framing.ts";
import { TcpTransport } from "./transport/tcp-transport.ts";
import type {
  TcpTransportConfig,
  TransportFactory,
} from "./transport/transport.ts";

/** Unit id used when a request does not name one. */
export const DEFAULT_UNIT_ID = 1;

/** Largest delay `setTimeout` honours; Node fires longer delays after 1 ms. */
export const MAX_WAITING_TIMEOUT = 2 ** 31 - 1;

export interface ClientConfig {
  /** Framing used for every request of the client. */
  mode: FramingMode;
  /** Default unit id for requests. Defaults to {@link DEFAULT_UNIT_ID}. */
  unitId?: number;
  /** Forwarded to {@link TcpTransportConfig.waitingTimeout}. */
  waitingTimeout?: number;
  /** Creates the transport on `connect()`. Defaults to {@link TcpTransport}. */
  createTransport?: TransportFactory<TcpTransportConfig>;
}

export type ResolvedClientConfig = Required<Omit<ClientConfig, "waitingTimeout">> &
  Pick<ClientConfig, "waitingTimeout">;

/**
 * Apply defaults and validate a client configuration.
 *
 * @throws ModbusRequestError for an unknown mode, a unit id outside 0-255 or
 *         a waiting timeout outside 0-{@link MAX_WAITING_TIMEOUT}.
 */
export function resolveClientConfig(config: ClientConfig): ResolvedClientConfig {
  if (!isFramingMode(config.mode)) {
    throw new ModbusRequestError(`Unknown framing mode: ${String(config.mode)}`);
  }
  const unitId = config.unitId ?? DEFAULT_UNIT_ID;
  if (!Number.isInteger(unitId) || unitId < 0 || unitId > 0xff) {
    throw new ModbusRequestError(`Unit id must be 0-255, got ${unitId}`);
  }
  const { waitingTimeout } = config;
  if (
    waitingTimeout !== undefined &&
    !(waitingTimeout >= 0 && waitingTimeout <= MAX_WAITING_TIMEOUT)
  ) {
    throw new ModbusRequestError(
      `Waiting timeout must be 0-${MAX_WAITING_TIMEOUT} ms, got ${waitingTimeout}`,
    );
  }
  return {
    createTransport:
      config.createTransport ?? ((transportConfig) => new TcpTransport(transportConfig)),
    mode: config.mode,
    unitId,
    waitingTimeout,
  };
}

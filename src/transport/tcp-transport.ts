/**
 * TCP transport implementation backed by Node's `net.Socket`.
 *
 * Carries both Modbus TCP and RTU-over-TCP frames; framing is the client's
 * concern, this layer only moves bytes and reports connection state.
 */
import { Socket } from "node:net";
import { toHex } from "../utils/format.ts";
import type {
  ConnectionState,
  IModbusTransport,
  TcpTransportConfig,
  TransportEventMap,
} from "./transport.ts";

/** Default delay before a pending connection attempt is reported as `waiting`. */
export const DEFAULT_WAITING_TIMEOUT = 3000;

/** The part of `net.Socket` the transport relies on. */
export interface TcpSocket {
  connect(port: number, host: string): unknown;
  write(data: Uint8Array, callback?: (error?: Error | null) => void): boolean;
  destroy(error?: Error): unknown;
  setNoDelay(noDelay?: boolean): unknown;
  on(event: "connect" | "close", listener: () => void): unknown;
  on(event: "data", listener: (data: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface TcpTransportOptions {
  /** Socket constructor; tests substitute an in-process fake. */
  createSocket?: () => TcpSocket;
}

export class TcpTransport implements IModbusTransport {
  // idle until the first connect()
  private _state: ConnectionState = "cancelled";
  private socket: TcpSocket | null = null;
  private waitingTimer: ReturnType<typeof setTimeout> | null = null;
  /** In-flight connection attempt, shared by concurrent `connect()` calls. */
  private connecting: Promise<void> | null = null;
  /** Set from `disconnect()` until the socket reports `close`. */
  private closing: Promise<void> | null = null;
  private readonly target = new EventTarget();
  private readonly createSocket: () => TcpSocket;

  constructor(
    public readonly config: TcpTransportConfig,
    options: TcpTransportOptions = {},
  ) {
    this.createSocket = options.createSocket ?? (() => new Socket());
  }

  get state(): ConnectionState {
    return this._state;
  }

  get connected(): boolean {
    return this._state === "ready";
  }

  /**
   * Open the socket. Resolves once connected, rejects with the socket error
   * if the attempt fails. Calls made while an attempt is pending share it;
   * calls made while a disconnect is in progress wait for the close first.
   */
  async connect(): Promise<void> {
    if (this._state === "ready") {
      return;
    }
    if (this.closing) {
      await this.closing;
    }
    if (this.connecting) {
      return this.connecting;
    }
    const attempt: Promise<void> = this.open().finally(() => {
      if (this.connecting === attempt) this.connecting = null;
    });
    this.connecting = attempt;
    return attempt;
  }

  private open(): Promise<void> {
    const { host, port } = this.config;
    const socket = this.createSocket();
    this.socket = socket;
    this.setState("preparing");
    console.log(`TcpTransport: connecting to ${host}:${port}`);

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      this.waitingTimer = setTimeout(() => {
        this.waitingTimer = null;
        if (!settled) this.setState("waiting");
      }, this.config.waitingTimeout ?? DEFAULT_WAITING_TIMEOUT);

      socket.on("connect", () => {
        settled = true;
        this.clearWaitingTimer();
        socket.setNoDelay(true);
        console.log(`TcpTransport: connected to ${host}:${port}`);
        this.setState("ready");
        this.dispatch("open");
        resolve();
      });

      socket.on("data", (data) => {
        this.dispatchMessage(new Uint8Array(data));
      });

      socket.on("error", (error) => {
        console.error(`TcpTransport: socket error: ${error.message}`);
        this.clearWaitingTimer();
        if (!this.closing) this.setState("failed");
        this.dispatchError(error);
        if (!settled) {
          settled = true;
          reject(error);
        }
      });

      socket.on("close", () => {
        this.clearWaitingTimer();
        if (this.socket === socket) this.socket = null;
        if (!this.closing && this._state !== "failed") {
          console.warn(`TcpTransport: connection to ${host}:${port} closed by peer`);
          this.setState("failed");
        }
        this.dispatch("close");
        if (!settled) {
          settled = true;
          reject(new Error(`Connection to ${host}:${port} closed`));
        }
      });

      socket.connect(port, host);
    });
  }

  /**
   * Close the socket if open. Resolves once the socket reports `close`.
   * Safe to call repeatedly.
   */
  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    if (this.closing) {
      return this.closing;
    }
    this.connecting = null;
    this.clearWaitingTimer();
    this.setState("cancelled");
    const closing = new Promise<void>((resolve) => {
      socket.on("close", () => {
        this.closing = null;
        resolve();
      });
    });
    this.closing = closing;
    socket.destroy();
    return closing;
  }

  /**
   * Write raw bytes. Write failures surface through an `error` event.
   */
  postMessage(data: Uint8Array): void {
    if (this._state !== "ready" || !this.socket) {
      throw new Error("Transport not connected");
    }
    this.socket.write(data, (error) => {
      if (error) {
        console.error(
          `TcpTransport: write of [${toHex(data)}] failed: ${error.message}`,
        );
        this.dispatchError(error);
      }
    });
  }

  private clearWaitingTimer(): void {
    if (this.waitingTimer) {
      clearTimeout(this.waitingTimer);
      this.waitingTimer = null;
    }
  }

  private setState(newState: ConnectionState): void {
    if (this._state !== newState) {
      this._state = newState;
      this.dispatch(
        "statechange",
        new CustomEvent("statechange", { detail: newState }),
      );
    }
  }

  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.target.addEventListener(type, listener as EventListener, options);
  }

  private dispatch(type: keyof TransportEventMap, event?: Event) {
    this.target.dispatchEvent(event ?? new Event(type));
  }
  private dispatchMessage(data: Uint8Array) {
    this.dispatch("message", new CustomEvent("message", { detail: data }));
  }
  private dispatchError(error: Error) {
    const ev = Object.assign(
      new CustomEvent<Error>("error", { detail: error }),
      { error },
    );
    this.dispatch("error", ev);
  }
}

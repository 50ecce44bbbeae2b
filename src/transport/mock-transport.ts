// Mock transport implementation for testing
// Provides a controllable transport that can simulate various scenarios

import type {
  ConnectionState,
  IModbusTransport,
  MockTransportConfig,
  TransportEventMap,
} from "./transport.ts";

/** Options controlling test / simulation behaviour of {@link MockTransport}. */
export interface MockTransportOptions {
  /** When true `connect()` will reject with `errorMessage`. */
  shouldFailConnect?: boolean;
  /** When true sending data triggers an error event & throws. */
  shouldFailSend?: boolean;
  /** Error message used for simulated failures. */
  errorMessage?: string;
  /** Predefined auto response map keyed by CSV stringified request bytes. */
  autoResponses?: Map<string, Uint8Array>;
}

/**
 * In-memory transport used for unit tests and demos.
 *
 * Provides deterministic control over error injection, state reports and
 * automatic responses so protocol logic can be validated without a socket.
 */
export class MockTransport implements IModbusTransport {
  private _state: ConnectionState = "cancelled";
  private options: MockTransportOptions;
  private readonly target = new EventTarget();

  /** Frames passed to `postMessage`, oldest first. */
  public sentData: Uint8Array[] = [];

  constructor(
    public readonly config: MockTransportConfig = { type: "mock" },
    options: MockTransportOptions = {},
  ) {
    this.options = {
      autoResponses: new Map(),
      errorMessage: "Mock transport error",
      shouldFailConnect: false,
      shouldFailSend: false,
      ...options,
    };
  }

  get state(): ConnectionState {
    return this._state;
  }

  get connected(): boolean {
    return this._state === "ready";
  }

  /** Establish a simulated connection (`preparing` then `ready`). */
  async connect(): Promise<void> {
    if (this._state === "ready") {
      return;
    }

    this.setState("preparing");
    await Promise.resolve();

    if (this.options.shouldFailConnect) {
      this.setState("failed");
      throw new Error(this.options.errorMessage);
    }

    this.setState("ready");
    this.dispatch("open");
  }

  /** Terminate the simulated connection. */
  async disconnect(): Promise<void> {
    if (this._state !== "ready") {
      return;
    }
    this.setState("cancelled");
    this.dispatch("close");
  }

  /**
   * Record the outbound frame and emit its auto response, if one is
   * registered, on the next macrotask.
   */
  postMessage(data: Uint8Array): void {
    if (this._state !== "ready") {
      throw new Error("Transport not connected");
    }
    if (this.options.shouldFailSend) {
      const error = new Error(this.options.errorMessage);
      this.dispatchError(error);
      throw error;
    }
    this.sentData.push(new Uint8Array(data));
    const response = this.options.autoResponses?.get(Array.from(data).join(","));
    if (response) {
      setTimeout(() => {
        if (this._state === "ready") this.dispatchMessage(response);
      }, 1);
    }
  }

  // Testing utilities
  /** Manually inject inbound data as if it was received from the peer. */
  public simulateData(data: Uint8Array): void {
    if (this._state === "ready") {
      this.dispatchMessage(data);
    }
  }

  /** Simulate a transport level error (transitions to `failed`). */
  public simulateError(error: Error): void {
    this.setState("failed");
    this.dispatchError(error);
  }

  /** Simulate an abrupt closure by the peer (fires `close`). */
  public simulateDisconnect(): void {
    if (this._state === "ready") {
      this.setState("failed");
      this.dispatch("close");
    }
  }

  /** Report an arbitrary state transition. */
  public simulateState(state: ConnectionState): void {
    this.setState(state);
  }

  /** Returns the last recorded outbound frame (if any). */
  public getLastSentData(): Uint8Array | undefined {
    return this.sentData[this.sentData.length - 1];
  }

  /**
   * Register an auto response which will be emitted shortly after a matching
   * request is observed.
   */
  public setAutoResponse(request: Uint8Array, response: Uint8Array): void {
    const dataKey = Array.from(request).join(",");
    if (!this.options.autoResponses) {
      this.options.autoResponses = new Map();
    }
    this.options.autoResponses.set(dataKey, response);
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

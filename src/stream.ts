/**
 * Bounded receive over transport events.
 *
 * Keeps the acquisition of response bytes separate from the framing logic
 * in the frame parser.
 */
import { createErr, createOk, type Result } from "option-t/plain_result";
import { ModbusTransportError } from "./errors.ts";
import { MAX_RESPONSE_LENGTH } from "./framing.ts";
import type { IModbusTransport } from "./transport/transport.ts";

export interface ReceiveOptions {
  /** Resolve once at least this many bytes arrived. Defaults to 1. */
  minLength?: number;
  /** Bytes beyond this bound are discarded. Defaults to 256. */
  maxLength?: number;
  signal?: AbortSignal;
}

/**
 * Wait for the next response from `transport`.
 *
 * Listeners are attached before this function returns, so a caller can
 * start receiving, then send, and not miss a response that arrives
 * synchronously. Chunks are accumulated until `minLength` is reached. The
 * result is an error when the transport reports an error, closes, or
 * `signal` aborts first.
 */
export function receive(
  transport: IModbusTransport,
  options: ReceiveOptions = {},
): Promise<Result<Uint8Array, ModbusTransportError>> {
  const { minLength = 1, maxLength = MAX_RESPONSE_LENGTH, signal } = options;

  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(createErr(abortError(signal)));
      return;
    }

    // Aborting `listeners` removes every handler registered below.
    const listeners = new AbortController();
    const chunks: Uint8Array[] = [];
    let received = 0;

    const finish = (result: Result<Uint8Array, ModbusTransportError>) => {
      listeners.abort();
      signal?.removeEventListener("abort", onAbort);
      resolve(result);
    };

    const onAbort = () => {
      if (signal) finish(createErr(abortError(signal)));
    };

    transport.addEventListener(
      "message",
      (ev) => {
        chunks.push(ev.detail);
        received += ev.detail.length;
        if (received >= minLength) {
          finish(createOk(concat(chunks, received).subarray(0, maxLength)));
        }
      },
      { signal: listeners.signal },
    );
    transport.addEventListener(
      "error",
      (ev) => {
        finish(
          createErr(
            new ModbusTransportError(`Receive failed: ${ev.detail.message}`, {
              cause: ev.detail,
            }),
          ),
        );
      },
      { signal: listeners.signal },
    );
    transport.addEventListener(
      "close",
      () => {
        finish(createErr(new ModbusTransportError("Connection closed")));
      },
      { signal: listeners.signal },
    );
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function abortError(signal: AbortSignal): ModbusTransportError {
  return new ModbusTransportError("Aborted", { cause: signal.reason });
}

function concat(chunks: Uint8Array[], length: number): Uint8Array {
  if (chunks.length === 1) return chunks[0];
  const out = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

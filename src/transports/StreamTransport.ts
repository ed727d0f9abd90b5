/**
 * Pull-based streaming transport used by the receive loop.
 *
 * One instance carries one connection: `open` once, `receive` until a close
 * frame or an error, then `close` to release it.
 */

export type FrameOpcode = 'text' | 'binary' | 'close';

/**
 * Outcome of one receive: `count` payload bytes were written at the start of
 * the caller's buffer. `final` is false while more fragments of the same
 * message follow.
 */
export interface ReceiveResult {
  opcode: FrameOpcode;
  count: number;
  final: boolean;
}

export interface StreamTransport {
  /**
   * Perform the handshake. Rejects if `signal` aborts first.
   */
  open(url: string, signal: AbortSignal): Promise<void>;

  /**
   * Wait for the next frame and copy at most `buffer.length` payload bytes
   * into `buffer`. Rejects once `signal` aborts, or with a fault.
   */
  receive(buffer: Buffer, signal: AbortSignal): Promise<ReceiveResult>;

  /**
   * Release the connection. Safe to call more than once.
   */
  close(): void;
}

/**
 * Streaming transport using the `ws` package.
 *
 * `ws` delivers whole messages through events; this transport queues them and
 * hands each one out in frames no larger than the caller's read buffer, so the
 * receive loop sees the same fragment sequence whatever the server sent.
 */

import { WebSocket } from 'ws';
import type { ClientOptions, RawData } from 'ws';
import createDebug from 'debug';
import { TransportFaultError, toError } from '../errors.ts';
import type { ReceiveResult, StreamTransport } from './StreamTransport.ts';

const debug = createDebug('rtm-stream:ws-transport');

const ABNORMAL_CLOSURE = 1006;

type QueueItem =
  | { kind: 'message'; opcode: 'text' | 'binary'; data: Buffer }
  | { kind: 'close'; code: number; reason: string }
  | { kind: 'fault'; error: Error };

interface PartialMessage {
  opcode: 'text' | 'binary';
  data: Buffer;
  offset: number;
}

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

function abortReason(signal: AbortSignal): Error {
  return toError(signal.reason);
}

export class WsStreamTransport implements StreamTransport {
  private _options: ClientOptions;
  private _ws: WebSocket | null = null;
  private _queue: QueueItem[] = [];
  private _current: PartialMessage | null = null;
  private _wake: (() => void) | null = null;
  private _closeReceived = false;
  private _released = false;

  constructor(options: ClientOptions = {}) {
    this._options = options;
  }

  open(url: string, signal: AbortSignal): Promise<void> {
    if (this._ws || this._released) {
      return Promise.reject(new TransportFaultError('Transport already opened'));
    }
    if (signal.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        signal.removeEventListener('abort', onAbort);
        if (err) reject(err);
        else resolve();
      };

      const onAbort = () => {
        debug('Handshake to %s aborted', url);
        finish(abortReason(signal));
        ws.terminate();
      };

      debug('Connecting to %s', url);
      const ws = new WebSocket(url, this._options);
      this._ws = ws;
      signal.addEventListener('abort', onAbort);

      ws.on('open', () => {
        debug('Connected to %s', url);
        finish();
      });

      ws.on('message', (data: RawData, isBinary: boolean) => {
        this._push({ kind: 'message', opcode: isBinary ? 'binary' : 'text', data: toBuffer(data) });
      });

      ws.on('close', (code: number, reason: Buffer) => {
        const reasonText = reason.toString();
        debug('Closed by %s (code: %d)', url, code);
        if (!settled) {
          finish(new TransportFaultError(`WebSocket closed before open (code: ${code})`));
          return;
        }
        // 1006: the socket ended without a close frame.
        if (code === ABNORMAL_CLOSURE) {
          const error = new TransportFaultError(`Connection to ${url} dropped (code: ${code})`);
          this._push({ kind: 'fault', error });
          return;
        }
        this._push({ kind: 'close', code, reason: reasonText });
      });

      ws.on('error', (err: Error) => {
        debug('WebSocket error on %s: %o', url, err);
        if (!settled) {
          finish(err);
          return;
        }
        this._push({ kind: 'fault', error: err });
      });
    });
  }

  /**
   * Messages, close and fault notices received but not yet handed out.
   */
  get queued(): number {
    return this._queue.length;
  }

  async receive(buffer: Buffer, signal: AbortSignal): Promise<ReceiveResult> {
    if (!this._ws) {
      throw new TransportFaultError('Transport is not open');
    }
    if (this._closeReceived) {
      throw new TransportFaultError('Transport already received a close frame');
    }

    if (!this._current) {
      const item = await this._next(signal);

      if (item.kind === 'close') {
        this._closeReceived = true;
        return { opcode: 'close', count: 0, final: true };
      }
      if (item.kind === 'fault') {
        throw new TransportFaultError(item.error.message, { cause: item.error });
      }

      this._current = { opcode: item.opcode, data: item.data, offset: 0 };
    }

    const current = this._current;
    const count = Math.min(buffer.length, current.data.length - current.offset);
    current.data.copy(buffer, 0, current.offset, current.offset + count);
    current.offset += count;

    const final = current.offset >= current.data.length;
    if (final) {
      this._current = null;
    }

    return { opcode: current.opcode, count, final };
  }

  close(): void {
    const ws = this._ws;
    if (!ws) return;
    this._released = true;

    if (ws.readyState === WebSocket.OPEN) {
      ws.close(1000);
    } else if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    }

    this._ws = null;
    this._queue = [];
    this._current = null;
  }

  private _push(item: QueueItem): void {
    if (this._released) return;
    this._queue.push(item);
    const wake = this._wake;
    if (wake) {
      this._wake = null;
      wake();
    }
  }

  private async _next(signal: AbortSignal): Promise<QueueItem> {
    for (;;) {
      if (signal.aborted) {
        throw abortReason(signal);
      }

      const item = this._queue.shift();
      if (item) return item;

      await new Promise<void>((resolve, reject) => {
        const onAbort = () => {
          this._wake = null;
          reject(abortReason(signal));
        };
        this._wake = () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        };
        signal.addEventListener('abort', onAbort, { once: true });
      });
    }
  }
}

/**
 * Test utilities: a scripted in-process transport, event recording and
 * in-process WebSocket servers.
 */

import type { EventEmitter } from 'events';
import { once } from 'node:events';
import { WebSocketServer } from 'ws';
import type { ServerOptions, WebSocket } from 'ws';
import { RtmClient } from '../src/RtmClient.ts';
import type { ReceiveResult, StreamTransport } from '../src/transports/StreamTransport.ts';
import type {
  CloseEvent,
  ParseErrorInfo,
  RawMessageInfo,
  RtmClientEvents,
  RtmClientOptions,
  RunState,
} from '../src/types.ts';
import type { MessageEvent, ReactionAddedEvent } from '../src/wire.ts';

export type ScriptedFrame =
  | { kind: 'frame'; opcode: 'text' | 'binary'; data: Buffer; final: boolean }
  | { kind: 'close' }
  | { kind: 'fault'; error: Error };

export function textFrame(text: string, final = true): ScriptedFrame {
  return { kind: 'frame', opcode: 'text', data: Buffer.from(text, 'utf8'), final };
}

export function bytesFrame(data: Buffer, opcode: 'text' | 'binary', final = true): ScriptedFrame {
  return { kind: 'frame', opcode, data, final };
}

export function closeFrame(): ScriptedFrame {
  return { kind: 'close' };
}

export function faultFrame(error: Error): ScriptedFrame {
  return { kind: 'fault', error };
}

/**
 * How `open()` behaves: succeed, wait until the handshake signal aborts, wait
 * for `finishOpen()`, or fail with the given error.
 */
export type OpenBehavior = 'resolve' | 'hang' | 'deferred' | Error;

/**
 * In-process transport whose frames are pushed by the test.
 */
export class ScriptedTransport implements StreamTransport {
  openedUrl: string | null = null;
  closeCount = 0;
  readonly bufferSizes: number[] = [];

  private _openBehavior: OpenBehavior;
  private _frames: ScriptedFrame[] = [];
  private _wake: (() => void) | null = null;
  private _finishOpen: (() => void) | null = null;

  constructor(openBehavior: OpenBehavior = 'resolve') {
    this._openBehavior = openBehavior;
  }

  push(...frames: ScriptedFrame[]): void {
    this._frames.push(...frames);
    const wake = this._wake;
    if (wake) {
      this._wake = null;
      wake();
    }
  }

  open(url: string, signal: AbortSignal): Promise<void> {
    this.openedUrl = url;
    const behavior = this._openBehavior;

    if (behavior === 'resolve') return Promise.resolve();
    if (behavior === 'hang' || behavior === 'deferred') {
      return new Promise((resolve, reject) => {
        if (behavior === 'deferred') this._finishOpen = () => resolve();
        signal.addEventListener('abort', () => reject(new Error('handshake aborted')), { once: true });
      });
    }
    return Promise.reject(behavior);
  }

  /**
   * Complete a handshake opened with the 'deferred' behavior.
   */
  finishOpen(): void {
    const finish = this._finishOpen;
    if (!finish) throw new Error('No deferred handshake pending');
    this._finishOpen = null;
    finish();
  }

  async receive(buffer: Buffer, signal: AbortSignal): Promise<ReceiveResult> {
    this.bufferSizes.push(buffer.length);
    const frame = await this._next(signal);

    switch (frame.kind) {
      case 'close':
        return { opcode: 'close', count: 0, final: true };
      case 'fault':
        throw frame.error;
      case 'frame':
        if (frame.data.length > buffer.length) {
          throw new Error(
            `Scripted frame of ${frame.data.length} bytes does not fit a ${buffer.length} byte buffer`
          );
        }
        frame.data.copy(buffer);
        return { opcode: frame.opcode, count: frame.data.length, final: frame.final };
    }
  }

  close(): void {
    this.closeCount++;
  }

  private async _next(signal: AbortSignal): Promise<ScriptedFrame> {
    for (;;) {
      if (signal.aborted) {
        throw new Error('receive aborted');
      }

      const frame = this._frames.shift();
      if (frame) return frame;

      await new Promise<void>((resolve, reject) => {
        const onAbort = () => {
          this._wake = null;
          reject(new Error('receive aborted'));
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

/**
 * An RtmClient wired to scripted transports, one per connect.
 */
export function createScriptedClient(
  options: Omit<RtmClientOptions, 'createTransport'> = {},
  openBehavior: OpenBehavior = 'resolve'
) {
  const transports: ScriptedTransport[] = [];
  const client = new RtmClient({
    ...options,
    createTransport: () => {
      const transport = new ScriptedTransport(openBehavior);
      transports.push(transport);
      return transport;
    },
  });

  const current = (): ScriptedTransport => {
    const transport = transports[transports.length - 1];
    if (!transport) throw new Error('No transport created yet');
    return transport;
  };

  return { client, transports, current };
}

/**
 * Everything an emitter published, in arrival order.
 */
export interface EventLog {
  order: string[];
  states: RunState[];
  raw: RawMessageInfo[];
  hello: number;
  messages: MessageEvent[];
  reactions: ReactionAddedEvent[];
  parseErrors: ParseErrorInfo[];
  closed: CloseEvent[];
}

export function recordEvents(emitter: EventEmitter<RtmClientEvents>): EventLog {
  const log: EventLog = {
    order: [],
    states: [],
    raw: [],
    hello: 0,
    messages: [],
    reactions: [],
    parseErrors: [],
    closed: [],
  };

  emitter.on('state', (state) => {
    log.order.push(`state:${state}`);
    log.states.push(state);
  });
  emitter.on('raw_message', (info) => {
    log.order.push('raw_message');
    log.raw.push(info);
  });
  emitter.on('hello', () => {
    log.order.push('hello');
    log.hello++;
  });
  emitter.on('message', (message) => {
    log.order.push('message');
    log.messages.push(message);
  });
  emitter.on('reaction_added', (reaction) => {
    log.order.push('reaction_added');
    log.reactions.push(reaction);
  });
  emitter.on('parse_error', (info) => {
    log.order.push('parse_error');
    log.parseErrors.push(info);
  });
  emitter.on('closed', (event) => {
    log.order.push(`closed:${event.reason}`);
    log.closed.push(event);
  });

  return log;
}

/**
 * A `ws` server on an ephemeral loopback port.
 */
export interface TestServer {
  server: WebSocketServer;
  url: string;
  close: () => Promise<void>;
}

export async function startServer(
  onConnection: (socket: WebSocket) => void,
  options: Omit<ServerOptions, 'host' | 'port' | 'server' | 'noServer'> = {}
): Promise<TestServer> {
  const server = new WebSocketServer({ ...options, host: '127.0.0.1', port: 0 });
  server.on('connection', onConnection);
  await once(server, 'listening');

  const address = server.address();
  if (typeof address === 'string') {
    throw new Error(`Unexpected server address: ${address}`);
  }

  return {
    server,
    url: `ws://127.0.0.1:${address.port}/`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const socket of server.clients) socket.terminate();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 2000)
 * @param pollInterval - How often to check condition in milliseconds (default: 5)
 * @returns Promise that resolves when condition is true, rejects on timeout
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 2000,
  pollInterval = 5
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

/**
 * Run an action with the process's uncaughtException listeners swapped for a
 * collector, and return what was thrown.
 *
 * @param action - Code expected to raise uncaught exceptions
 * @param settle - Extra time to let deferred throws fire (default: 20)
 */
export async function captureUncaught(action: () => Promise<void>, settle = 20): Promise<unknown[]> {
  const errors: unknown[] = [];
  const originalListeners = process.listeners('uncaughtException');
  const collect = (err: Error) => {
    errors.push(err);
  };

  process.removeAllListeners('uncaughtException');
  process.on('uncaughtException', collect);
  try {
    await action();
    await delay(settle);
  } finally {
    process.off('uncaughtException', collect);
    for (const listener of originalListeners) {
      process.on('uncaughtException', listener);
    }
  }

  return errors;
}

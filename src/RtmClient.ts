/**
 * RtmClient - real-time messaging client.
 *
 * Owns one WebSocket connection at a time and republishes the events it
 * receives. There is no automatic reconnection: after `closed`, call
 * `connect()` (or `start()`) again.
 */

import { EventEmitter } from 'events';
import createDebug from 'debug';
import {
  ConnectionError,
  GatewayError,
  HandshakeTimeoutError,
  InvalidRunningStateError,
  toError,
} from './errors.ts';
import { RunStateMachine } from './lifecycle/RunStateMachine.ts';
import { ShutdownCoordinator } from './lifecycle/ShutdownCoordinator.ts';
import { FrameReceiver } from './receive/FrameReceiver.ts';
import { MessageRouter } from './routing/MessageRouter.ts';
import type { StreamTransport } from './transports/StreamTransport.ts';
import { WsStreamTransport } from './transports/WsStreamTransport.ts';
import { RunState } from './types.ts';
import type { CloseEvent, ConnectResult, RtmClientEvents, RtmClientOptions } from './types.ts';
import { compileSchema } from './validation.ts';
import { RtmConnectResponseSchema } from './wire.ts';
import type { RtmConnectResponse } from './wire.ts';

const debug = createDebug('rtm-stream:client');

export const DEFAULT_READ_BUFFER_SIZE = 4096;
export const DEFAULT_CONNECT_TIMEOUT = 5000;

/**
 * Timeout value that disables the handshake bound.
 */
export const INFINITE_TIMEOUT = -1;

/**
 * Largest handshake timeout in milliseconds; `setTimeout` cannot wait longer.
 */
export const MAX_TIMEOUT = 2_147_483_647;

const connectResponseValidator = compileSchema(RtmConnectResponseSchema);

/**
 * The request/response web API, reduced to the one call the client needs:
 * `rtm.connect`, which reserves a WebSocket URL. Resolves with the decoded
 * response body; the client validates it.
 */
export interface RtmGateway {
  rtmConnect(): Promise<unknown>;
}

interface Connection {
  transport: StreamTransport;
  shutdown: ShutdownCoordinator;
}

function assertReadBufferSize(value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`readBufferSize must be an integer strictly greater than zero, got ${value}`);
  }
}

function assertMaxMessageBytes(value: number | null): void {
  if (value !== null && (!Number.isInteger(value) || value < 1)) {
    throw new RangeError(`maxMessageBytes must be null or an integer strictly greater than zero, got ${value}`);
  }
}

function assertTimeout(value: number): void {
  if (!Number.isInteger(value) || value < INFINITE_TIMEOUT || value > MAX_TIMEOUT) {
    throw new RangeError(
      `timeout must be an integer between ${INFINITE_TIMEOUT} and ${MAX_TIMEOUT}, got ${value}`
    );
  }
}

/**
 * Client for the RTM WebSocket API.
 *
 * @example
 * ```typescript
 * const client = new RtmClient();
 * client.on('message', (msg) => console.log(msg.channel, msg.text));
 * client.on('closed', ({ reason, error }) => console.log('closed', reason, error));
 *
 * const result = await client.start(gateway);
 * if (result.type !== 'success') throw new Error(result.type);
 *
 * // later
 * await client.disconnect();
 * ```
 */
export class RtmClient extends EventEmitter<RtmClientEvents> {
  private _state: RunStateMachine;
  private _router: MessageRouter;
  private _createTransport: () => StreamTransport;
  private _readBufferSize: number;
  private _maxMessageBytes: number | null;
  private _connectTimeout: number;
  private _connection: Connection | null = null;
  private _session: RtmConnectResponse | null = null;

  constructor(options: RtmClientOptions = {}) {
    super();

    const readBufferSize = options.readBufferSize ?? DEFAULT_READ_BUFFER_SIZE;
    const maxMessageBytes = options.maxMessageBytes ?? null;
    const connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
    assertReadBufferSize(readBufferSize);
    assertMaxMessageBytes(maxMessageBytes);
    assertTimeout(connectTimeout);

    this._readBufferSize = readBufferSize;
    this._maxMessageBytes = maxMessageBytes;
    this._connectTimeout = connectTimeout;
    this._createTransport = options.createTransport ?? (() => new WsStreamTransport());

    this._state = new RunStateMachine((state, previous) => this.emit('state', state, previous));
    this._router = new MessageRouter(this);
  }

  get state(): RunState {
    return this._state.current;
  }

  get connected(): boolean {
    return this._state.is(RunState.STARTED);
  }

  /**
   * The `rtm.connect` response of the last successful `start()`.
   */
  get session(): RtmConnectResponse | null {
    return this._session;
  }

  /**
   * Read buffer size in bytes. Can only be changed while stopped.
   */
  get readBufferSize(): number {
    return this._readBufferSize;
  }

  set readBufferSize(value: number) {
    assertReadBufferSize(value);
    this._assertStopped();
    if (this._readBufferSize === value) return;

    debug('readBufferSize changed: %d -> %d', this._readBufferSize, value);
    this._readBufferSize = value;
  }

  /**
   * Largest reassembled message accepted, in bytes, or null for no limit.
   * Can only be changed while stopped.
   */
  get maxMessageBytes(): number | null {
    return this._maxMessageBytes;
  }

  set maxMessageBytes(value: number | null) {
    assertMaxMessageBytes(value);
    this._assertStopped();
    this._maxMessageBytes = value;
  }

  /**
   * Default handshake timeout in milliseconds, or -1 for none.
   */
  get connectTimeout(): number {
    return this._connectTimeout;
  }

  set connectTimeout(value: number) {
    assertTimeout(value);
    this._connectTimeout = value;
  }

  /**
   * Ask the gateway for a WebSocket URL, then connect to it.
   */
  async start(gateway: RtmGateway, timeout = this._connectTimeout): Promise<ConnectResult> {
    assertTimeout(timeout);
    if (!this._state.is(RunState.STOPPED)) {
      return { type: 'invalid_running_state', state: this._state.current };
    }

    let response: RtmConnectResponse;
    try {
      response = connectResponseValidator.validate(await gateway.rtmConnect());
    } catch (err) {
      debug('rtm.connect failed: %o', err);
      return { type: 'gateway_failed', error: new GatewayError('rtm.connect failed', { cause: err }) };
    }

    if (!response.ok || response.url === undefined) {
      const reason = response.error ?? 'no url returned';
      debug('rtm.connect refused: %s', reason);
      return { type: 'gateway_failed', error: new GatewayError(`rtm.connect refused: ${reason}`) };
    }

    const result = await this.connect(response.url, timeout);
    if (result.type === 'success') {
      this._session = response;
    }
    return result;
  }

  /**
   * Connect to the RTM WebSocket URL.
   *
   * @param url - Absolute WebSocket URL, usually from `rtm.connect`
   * @param timeout - Handshake timeout in milliseconds, -1 for none
   */
  async connect(url: string | URL, timeout = this._connectTimeout): Promise<ConnectResult> {
    const href = new URL(url).href;
    assertTimeout(timeout);

    if (!this._state.tryTransition(RunState.STOPPED, RunState.STARTING)) {
      return { type: 'invalid_running_state', state: this._state.current };
    }

    let transport: StreamTransport;
    try {
      transport = this._createTransport();
    } catch (err) {
      this._state.transition(RunState.STARTING, RunState.STOPPED);
      throw err;
    }

    const handshake = new AbortController();
    const timer =
      timeout === INFINITE_TIMEOUT ? null : setTimeout(() => handshake.abort(), timeout);

    try {
      await transport.open(href, handshake.signal);
    } catch (err) {
      transport.close();
      this._state.transition(RunState.STARTING, RunState.STOPPED);

      if (handshake.signal.aborted) {
        debug("Connection to '%s' timeout", href);
        return { type: 'handshake_timeout', error: new HandshakeTimeoutError(href, timeout) };
      }

      debug("Connection to '%s' failed: %o", href, err);
      return {
        type: 'handshake_failed',
        error: new ConnectionError(`Connection to '${href}' failed: ${toError(err).message}`, { cause: err }),
      };
    } finally {
      if (timer) clearTimeout(timer);
    }

    const connection: Connection = { transport, shutdown: new ShutdownCoordinator() };
    this._connection = connection;
    this._state.transition(RunState.STARTING, RunState.STARTED);

    const receiver = new FrameReceiver({
      transport,
      shutdown: connection.shutdown,
      state: this._state,
      router: this._router,
      readBufferSize: this._readBufferSize,
      maxMessageBytes: this._maxMessageBytes,
      onClosed: (event) => this._handleClosed(connection, event),
    });

    receiver.run().catch((err: unknown) => {
      debug('receive loop exit failed: %o', err);
      // Nothing awaits the loop; surface the failure like a throwing listener would.
      queueMicrotask(() => {
        throw err;
      });
    });

    return { type: 'success' };
  }

  /**
   * Request a disconnection and wait until the receive loop has exited.
   *
   * @returns false if the client was not started
   */
  async disconnect(): Promise<boolean> {
    const connection = this._connection;
    if (!connection || !this._state.tryTransition(RunState.STARTED, RunState.STOPPING)) {
      return false;
    }

    debug('Disconnecting');
    connection.shutdown.cancel();
    await connection.shutdown.completed;

    debug('Disconnected');
    return true;
  }

  private _assertStopped(): void {
    if (!this._state.is(RunState.STOPPED)) {
      throw new InvalidRunningStateError(this._state.current, RunState.STOPPED);
    }
  }

  private _handleClosed(connection: Connection, event: CloseEvent): void {
    if (this._connection === connection) {
      this._connection = null;
    }
    debug('closed (reason: %s)', event.reason);
    this.emit('closed', event);
  }
}

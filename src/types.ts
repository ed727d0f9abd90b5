/**
 * Public type definitions for the RTM client.
 */

import type { StreamTransport } from './transports/StreamTransport.ts';
import type {
  ConnectionError,
  GatewayError,
  HandshakeTimeoutError,
  ValidationError,
} from './errors.ts';
import type { MessageEvent, ReactionAddedEvent } from './wire.ts';

/**
 * Lifecycle of the WebSocket connectivity process.
 */
export const RunState = {
  STOPPED: 'stopped',
  STARTING: 'starting',
  STARTED: 'started',
  STOPPING: 'stopping',
} as const;

export type RunState = (typeof RunState)[keyof typeof RunState];

/**
 * Why the connection was closed.
 */
export const CloseReason = {
  /** The server sent a close frame. */
  REMOTE_CLOSE: 'remote_close',
  /** `disconnect()` was called. */
  USER_REQUESTED: 'user_requested',
  /** An error tore the connection down. */
  FAULT: 'fault',
} as const;

export type CloseReason = (typeof CloseReason)[keyof typeof CloseReason];

export interface CloseEvent {
  reason: CloseReason;
  /** Set when `reason` is `fault`. */
  error?: Error;
}

export type ConnectResult =
  | { type: 'success' }
  | { type: 'invalid_running_state'; state: RunState }
  | { type: 'handshake_timeout'; error: HandshakeTimeoutError }
  | { type: 'handshake_failed'; error: ConnectionError }
  | { type: 'gateway_failed'; error: GatewayError };

export type ConnectResultType = ConnectResult['type'];

/**
 * Every complete text message, before any typed dispatch.
 */
export interface RawMessageInfo {
  /** Top-level `type` value, or null when it could not be determined. */
  type: string | null;
  message: string;
}

export interface ParseErrorInfo {
  type: string;
  message: string;
  error: ValidationError;
}

/**
 * Events emitted by RtmClient
 */
export interface RtmClientEvents {
  state: [state: RunState, previous: RunState];
  raw_message: [info: RawMessageInfo];
  hello: [];
  message: [message: MessageEvent];
  reaction_added: [reaction: ReactionAddedEvent];
  parse_error: [info: ParseErrorInfo];
  closed: [event: CloseEvent];
}

export interface RtmClientOptions {
  /** Read buffer size in bytes (default: 4096) */
  readBufferSize?: number;
  /** Default handshake timeout in milliseconds, -1 for none (default: 5000) */
  connectTimeout?: number;
  /** Largest reassembled message accepted, in bytes (default: no limit) */
  maxMessageBytes?: number | null;
  /** Transport factory, called once per connect (default: ws) */
  createTransport?: () => StreamTransport;
}

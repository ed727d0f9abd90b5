/**
 * rtm-stream: client for real-time messaging over a single WebSocket.
 *
 * ## Public API
 * - `RtmClient` with `connect` / `start` / `disconnect`
 * - `WsStreamTransport`, the default transport
 * - error classes and the wire schemas of the recognised events
 *
 * ## Example
 * ```ts
 * import { RtmClient } from 'rtm-stream';
 *
 * const client = new RtmClient({ readBufferSize: 8192 });
 * client.on('hello', () => console.log('ready'));
 * client.on('reaction_added', (r) => console.log(r.user, 'reacted with', r.reaction));
 * client.on('closed', ({ reason }) => console.log('closed:', reason));
 *
 * const result = await client.connect('wss://rtm.example.test/websocket/abc');
 * if (result.type !== 'success') console.error(result);
 * ```
 *
 * @packageDocumentation
 */

export {
  RtmClient,
  DEFAULT_READ_BUFFER_SIZE,
  DEFAULT_CONNECT_TIMEOUT,
  INFINITE_TIMEOUT,
  MAX_TIMEOUT,
} from './RtmClient.ts';
export type { RtmGateway } from './RtmClient.ts';
export { WsStreamTransport } from './transports/WsStreamTransport.ts';
export { RunState, CloseReason } from './types.ts';
export {
  ErrorCode,
  InvalidRunningStateError,
  HandshakeTimeoutError,
  ConnectionError,
  TransportFaultError,
  ValidationError,
  MessageTooLargeError,
  GatewayError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';
export {
  EventType,
  MessageEventSchema,
  ReactionAddedEventSchema,
  ReactionItemSchema,
  RtmConnectResponseSchema,
} from './wire.ts';
export { scanType } from './routing/scanType.ts';

// Type-only exports
export type {
  CloseEvent,
  ConnectResult,
  ConnectResultType,
  RawMessageInfo,
  ParseErrorInfo,
  RtmClientEvents,
  RtmClientOptions,
} from './types.ts';
export type { ErrorCodeType } from './errors.ts';
export type {
  EventTypeName,
  MessageEvent,
  ReactionItem,
  ReactionAddedEvent,
  RtmConnectResponse,
} from './wire.ts';
export type { FrameOpcode, ReceiveResult, StreamTransport } from './transports/StreamTransport.ts';

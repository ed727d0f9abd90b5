/**
 * Wire schemas for RTM events.
 *
 * Every text frame carries one JSON object whose top-level string `type`
 * selects the event kind. Only the kinds below are validated and dispatched;
 * other kinds are still valid input and surface as raw messages.
 */

import { Type } from 'typebox';
import type { Static } from 'typebox';

export const MessageEventSchema = Type.Object({
  type: Type.Literal('message'),
  channel: Type.String(),
  user: Type.Optional(Type.String()),
  text: Type.Optional(Type.String()),
  thread_ts: Type.Optional(Type.String()),
  ts: Type.String(),
  team: Type.Optional(Type.String()),
  source_team: Type.Optional(Type.String()),
});

export const MessageItemSchema = Type.Object({
  type: Type.Literal('message'),
  channel: Type.String(),
  ts: Type.String(),
});

export const FileItemSchema = Type.Object({
  type: Type.Literal('file'),
  file: Type.String(),
});

export const FileCommentItemSchema = Type.Object({
  type: Type.Literal('file_comment'),
  file: Type.String(),
  file_comment: Type.String(),
});

export const ReactionItemSchema = Type.Union([MessageItemSchema, FileItemSchema, FileCommentItemSchema]);

export const ReactionAddedEventSchema = Type.Object({
  type: Type.Literal('reaction_added'),
  user: Type.String(),
  reaction: Type.String(),
  item_user: Type.Optional(Type.String()),
  item: ReactionItemSchema,
  event_ts: Type.Optional(Type.String()),
});

/**
 * Response of the web API's `rtm.connect` method.
 */
export const RtmConnectResponseSchema = Type.Object({
  ok: Type.Boolean(),
  url: Type.Optional(Type.String()),
  error: Type.Optional(Type.String()),
  warning: Type.Optional(Type.String()),
  team: Type.Optional(
    Type.Object({
      id: Type.String(),
      name: Type.Optional(Type.String()),
      domain: Type.Optional(Type.String()),
    })
  ),
  self: Type.Optional(
    Type.Object({
      id: Type.String(),
      name: Type.Optional(Type.String()),
    })
  ),
});

export type MessageEvent = Static<typeof MessageEventSchema>;
export type ReactionItem = Static<typeof ReactionItemSchema>;
export type ReactionAddedEvent = Static<typeof ReactionAddedEventSchema>;
export type RtmConnectResponse = Static<typeof RtmConnectResponseSchema>;

/**
 * Event kinds the router validates and dispatches.
 */
export const EventType = {
  HELLO: 'hello',
  MESSAGE: 'message',
  REACTION_ADDED: 'reaction_added',
} as const;

export type EventTypeName = (typeof EventType)[keyof typeof EventType];

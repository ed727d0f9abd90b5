/**
 * Routes complete logical messages to the client's subscribers.
 *
 * Every text message is announced as `raw_message` first. Recognised kinds are
 * then validated and emitted under their own event name; a payload that fails
 * validation becomes a `parse_error` event instead.
 */

import type { EventEmitter } from 'events';
import createDebug from 'debug';
import { ValidationError } from '../errors.ts';
import { compileSchema } from '../validation.ts';
import { EventType, MessageEventSchema, ReactionAddedEventSchema } from '../wire.ts';
import type { FrameOpcode } from '../transports/StreamTransport.ts';
import type { RtmClientEvents } from '../types.ts';
import { scanType } from './scanType.ts';

const debug = createDebug('rtm-stream:router');

const messageValidator = compileSchema(MessageEventSchema);
const reactionAddedValidator = compileSchema(ReactionAddedEventSchema);

export class MessageRouter {
  private _events: EventEmitter<RtmClientEvents>;

  constructor(events: EventEmitter<RtmClientEvents>) {
    this._events = events;
  }

  /**
   * Dispatch one logical message. Subscriber exceptions propagate to the
   * caller.
   */
  route(opcode: Exclude<FrameOpcode, 'close'>, payload: Buffer): void {
    if (opcode === 'binary') {
      debug('binary message, %d bytes long', payload.length);
      return;
    }

    this.routeText(payload.toString('utf8'));
  }

  routeText(message: string): void {
    const type = scanType(message);
    debug('type: %s', type ?? '(null)');

    this._events.emit('raw_message', { type, message });

    switch (type) {
      case EventType.HELLO:
        this._events.emit('hello');
        break;

      case EventType.MESSAGE: {
        const parsed = this._parse(type, message, messageValidator.parse);
        if (parsed) this._events.emit('message', parsed);
        break;
      }

      case EventType.REACTION_ADDED: {
        const parsed = this._parse(type, message, reactionAddedValidator.parse);
        if (parsed) this._events.emit('reaction_added', parsed);
        break;
      }

      default:
        debug("message of type '%s' not supported yet", type ?? '(null)');
        break;
    }
  }

  private _parse<T>(type: string, message: string, parse: (text: string) => T): T | null {
    try {
      return parse(message);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      debug('Invalid %s payload: %s', type, err.message);
      this._events.emit('parse_error', { type, message, error: err });
      return null;
    }
  }
}

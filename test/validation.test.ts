/**
 * Validation system tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { compileSchema } from '../src/validation.ts';
import { ValidationError } from '../src/errors.ts';
import { MessageEventSchema, ReactionAddedEventSchema, RtmConnectResponseSchema } from '../src/wire.ts';

describe('Validation', () => {
  describe('check', () => {
    it('should accept a message event with optional fields omitted', () => {
      const validator = compileSchema(MessageEventSchema);

      assert.ok(validator.check({ type: 'message', channel: 'C1', ts: '1.0' }));
      assert.ok(!validator.check({ type: 'message', ts: '1.0' })); // missing channel
      assert.ok(!validator.check({ type: 'hello', channel: 'C1', ts: '1.0' })); // wrong kind
      assert.ok(!validator.check('invalid'));
    });

    it('should discriminate reaction items', () => {
      const validator = compileSchema(ReactionAddedEventSchema);
      const base = { type: 'reaction_added', user: 'U1', reaction: 'wave' };

      assert.ok(validator.check({ ...base, item: { type: 'message', channel: 'C1', ts: '1.0' } }));
      assert.ok(validator.check({ ...base, item: { type: 'file', file: 'F1' } }));
      assert.ok(!validator.check({ ...base, item: { type: 'file', channel: 'C1' } }));
      assert.ok(!validator.check(base)); // missing item
    });
  });

  describe('validate', () => {
    it('should return the value itself when valid', () => {
      const validator = compileSchema(RtmConnectResponseSchema);
      const response = { ok: true, url: 'wss://rtm.test/', self: { id: 'U1' } };

      assert.strictEqual(validator.validate(response), response);
    });

    it('should throw ValidationError when invalid', () => {
      const validator = compileSchema(RtmConnectResponseSchema);

      assert.throws(
        () => validator.validate({ ok: 'true' }),
        (err: unknown) => {
          assert.ok(err instanceof ValidationError);
          assert.strictEqual(err.code, 'VALIDATION_FAILED');
          assert.match(err.message, /^Validation failed! /);
          return true;
        }
      );
    });
  });

  describe('parse', () => {
    it('should parse and validate JSON text', () => {
      const validator = compileSchema(MessageEventSchema);

      assert.deepStrictEqual(validator.parse('{"type":"message","channel":"C1","ts":"1.0","text":"hi"}'), {
        type: 'message',
        channel: 'C1',
        ts: '1.0',
        text: 'hi',
      });
    });

    it('should report malformed JSON as a ValidationError with the syntax error as cause', () => {
      const validator = compileSchema(MessageEventSchema);

      assert.throws(
        () => validator.parse('{"type":'),
        (err: unknown) => {
          assert.ok(err instanceof ValidationError);
          assert.match(err.message, /^Validation failed! \/: /);
          assert.ok(err.cause instanceof SyntaxError);
          return true;
        }
      );
    });
  });
});

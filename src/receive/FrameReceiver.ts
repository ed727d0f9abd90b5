/**
 * Receive loop for one connection.
 *
 * Pulls frames off the transport into a fixed read buffer, reassembles
 * fragmented messages and hands each complete one to the router. Exactly one
 * exit per loop: the transport is released, the run state settles to stopped,
 * `closed` is reported and the completion signal fires, whichever way the loop
 * ended.
 */

import createDebug from 'debug';
import { MessageTooLargeError, TransportFaultError, toError } from '../errors.ts';
import type { RunStateMachine } from '../lifecycle/RunStateMachine.ts';
import type { ShutdownCoordinator } from '../lifecycle/ShutdownCoordinator.ts';
import type { MessageRouter } from '../routing/MessageRouter.ts';
import type { ReceiveResult, StreamTransport } from '../transports/StreamTransport.ts';
import { CloseReason, RunState } from '../types.ts';
import type { CloseEvent } from '../types.ts';
import { ReassemblyBuffer } from './ReassemblyBuffer.ts';

const debug = createDebug('rtm-stream:receiver');

export interface FrameReceiverOptions {
  transport: StreamTransport;
  shutdown: ShutdownCoordinator;
  state: RunStateMachine;
  router: MessageRouter;
  readBufferSize: number;
  maxMessageBytes: number | null;
  /** Reports the close event; runs after the state has reached stopped. */
  onClosed: (event: CloseEvent) => void;
}

export class FrameReceiver {
  private _options: FrameReceiverOptions;
  private _reassembly: ReassemblyBuffer;
  private _started = false;

  constructor(options: FrameReceiverOptions) {
    this._options = options;
    this._reassembly = new ReassemblyBuffer(options.readBufferSize, options.maxMessageBytes);
  }

  /**
   * Run until cancelled, closed by the remote peer, or faulted. Rejects only
   * if something in the exit path itself threw, after the exit has completed.
   */
  async run(): Promise<void> {
    if (this._started) {
      throw new Error('FrameReceiver can only run once');
    }
    this._started = true;

    let event: CloseEvent;
    try {
      event = await this._receiveLoop();
    } catch (err) {
      debug('receive loop failed: %o', err);
      event = { reason: CloseReason.FAULT, error: toError(err) };
    }

    this._exit(event);
  }

  private async _receiveLoop(): Promise<CloseEvent> {
    const { transport, shutdown, router, readBufferSize } = this._options;
    const { signal } = shutdown;
    const buffer = Buffer.alloc(readBufferSize);

    while (!signal.aborted) {
      let frame: ReceiveResult;
      try {
        frame = await transport.receive(buffer, signal);
      } catch (err) {
        if (signal.aborted) break;

        debug('socket faulted: %o', err);
        const error =
          err instanceof TransportFaultError
            ? err
            : new TransportFaultError(toError(err).message, { cause: err });
        return { reason: CloseReason.FAULT, error };
      }

      if (frame.opcode === 'close') {
        debug('close frame received');
        return { reason: CloseReason.REMOTE_CLOSE };
      }

      const chunk = buffer.subarray(0, frame.count);

      if (!frame.final) {
        this._reassembly.append(chunk);
        continue;
      }

      let payload: Buffer;
      if (this._reassembly.isOpen) {
        payload = this._reassembly.complete(chunk);
      } else {
        this._checkSize(chunk.length);
        payload = chunk;
      }

      router.route(frame.opcode, payload);
    }

    return { reason: CloseReason.USER_REQUESTED };
  }

  private _checkSize(size: number): void {
    const limit = this._options.maxMessageBytes;
    if (limit !== null && size > limit) {
      throw new MessageTooLargeError(size, limit);
    }
  }

  private _exit(event: CloseEvent): void {
    const { transport, shutdown, state, onClosed } = this._options;
    const errors: unknown[] = [];
    const attempt = (step: () => void) => {
      try {
        step();
      } catch (err) {
        errors.push(err);
      }
    };

    debug('exiting (reason: %s)', event.reason);
    this._reassembly.reset();

    attempt(() => transport.close());
    // A loop that ends on its own still passes through stopping.
    attempt(() => state.tryTransition(RunState.STARTED, RunState.STOPPING));
    attempt(() => state.tryTransition(RunState.STOPPING, RunState.STOPPED));
    attempt(() => onClosed(event));

    shutdown.complete();

    if (errors.length === 1) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new AggregateError(errors, 'Receive loop exit failed');
    }
  }
}

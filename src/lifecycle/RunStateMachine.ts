/**
 * Run state of one client's connectivity process.
 *
 * Transitions follow stopped → starting → started → stopping → stopped. The
 * only shortcut is starting → stopped, taken when the handshake fails.
 * `tryTransition` checks and writes without yielding, so two callers can never
 * both claim the same state. Errors thrown by the change listener are rethrown
 * from a microtask after the transition has committed.
 */

import createDebug from 'debug';
import { RunState } from '../types.ts';

const debug = createDebug('rtm-stream:state');

const ALLOWED: Record<RunState, readonly RunState[]> = {
  [RunState.STOPPED]: [RunState.STARTING],
  [RunState.STARTING]: [RunState.STARTED, RunState.STOPPED],
  [RunState.STARTED]: [RunState.STOPPING],
  [RunState.STOPPING]: [RunState.STOPPED],
};

function canTransition(from: RunState, to: RunState): boolean {
  return ALLOWED[from].includes(to);
}

export class RunStateMachine {
  private _state: RunState = RunState.STOPPED;
  private _onChange: (state: RunState, previous: RunState) => void;

  constructor(onChange: (state: RunState, previous: RunState) => void = () => {}) {
    this._onChange = onChange;
  }

  get current(): RunState {
    return this._state;
  }

  is(state: RunState): boolean {
    return this._state === state;
  }

  /**
   * Move from `from` to `to` if the machine is currently in `from`.
   */
  tryTransition(from: RunState, to: RunState): boolean {
    if (this._state !== from) return false;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal run state transition: ${from} -> ${to}`);
    }

    this._state = to;
    debug('state changed: %s -> %s', from, to);
    try {
      this._onChange(to, from);
    } catch (err) {
      // The transition stands; a failing listener must not unwind the caller.
      debug('state listener failed: %o', err);
      queueMicrotask(() => {
        throw err;
      });
    }
    return true;
  }

  /**
   * Like `tryTransition`, but the caller owns the current state.
   */
  transition(from: RunState, to: RunState): void {
    if (!this.tryTransition(from, to)) {
      throw new Error(`Expected run state '${from}', found '${this._state}'`);
    }
  }
}

/**
 * Growable accumulation buffer for messages that span several frames.
 *
 * Storage is kept between messages and only grows; `complete()` returns a view
 * into it that stays valid until the next `append()`.
 */

import { MessageTooLargeError } from '../errors.ts';

const MIN_CAPACITY = 1024;

export class ReassemblyBuffer {
  private _storage: Buffer;
  private _length = 0;
  private _open = false;
  private _maxBytes: number | null;

  constructor(initialCapacity = MIN_CAPACITY, maxBytes: number | null = null) {
    this._storage = Buffer.allocUnsafe(Math.max(initialCapacity, MIN_CAPACITY));
    this._maxBytes = maxBytes;
  }

  /**
   * Whether a multi-frame message is in progress.
   */
  get isOpen(): boolean {
    return this._open;
  }

  get length(): number {
    return this._length;
  }

  get capacity(): number {
    return this._storage.length;
  }

  append(chunk: Uint8Array): void {
    const needed = this._length + chunk.length;
    if (this._maxBytes !== null && needed > this._maxBytes) {
      throw new MessageTooLargeError(needed, this._maxBytes);
    }

    if (needed > this._storage.length) {
      let capacity = this._storage.length * 2;
      while (capacity < needed) capacity *= 2;
      const grown = Buffer.allocUnsafe(capacity);
      this._storage.copy(grown, 0, 0, this._length);
      this._storage = grown;
    }

    this._storage.set(chunk, this._length);
    this._length = needed;
    this._open = true;
  }

  /**
   * Append the final fragment and take the whole message.
   */
  complete(finalChunk: Uint8Array): Buffer {
    this.append(finalChunk);
    const message = this._storage.subarray(0, this._length);
    this.reset();
    return message;
  }

  /**
   * Drop any in-progress message.
   */
  reset(): void {
    this._length = 0;
    this._open = false;
  }
}

// framing.ts: Terminator-delimited frame extraction from a byte stream
//
// Guards against two denial-of-service shapes:
//  - unbounded memory: a frame may not grow past maxFrameLength;
//  - slow loris: bytes already known to be terminator-free are never rescanned,
//    so total search work is linear in the bytes received however they are chunked.

import type { Readable } from "node:stream";
import { FrameTooLongError, IncompleteFrameError } from "./errors.js";
import { LIMITS, TERMINATOR } from "./protocol.js";

/** Source of raw bytes. An empty chunk means the peer closed the stream. */
export interface ByteSource {
  receiveSome(maxBytes: number): Promise<Uint8Array>;
}

export interface FrameReceiverOptions {
  terminator?: Uint8Array;
  maxFrameLength?: number;
  receiveSize?: number;
}

/**
 * Growable byte buffer with cheap front removal.
 * Consumed bytes only advance `head`; the live region is moved back to the start
 * when the dead prefix is at least as large as it, keeping removal amortized O(1).
 */
export class FrameBuffer {
  private storage: Buffer;
  private head = 0;
  private tail = 0;

  constructor(initialCapacity = 256) {
    this.storage = Buffer.alloc(initialCapacity);
  }

  get length(): number {
    return this.tail - this.head;
  }

  /** Bytes currently allocated, live or not. */
  get capacity(): number {
    return this.storage.length;
  }

  append(chunk: Uint8Array): void {
    if (this.tail + chunk.length > this.storage.length) {
      const live = this.length;
      if (this.head >= live && live + chunk.length <= this.storage.length) {
        this.storage.copyWithin(0, this.head, this.tail);
      } else {
        let size = this.storage.length * 2;
        while (size < live + chunk.length) size *= 2;
        const grown = Buffer.alloc(size);
        this.storage.copy(grown, 0, this.head, this.tail);
        this.storage = grown;
      }
      this.head = 0;
      this.tail = live;
    }
    this.storage.set(chunk, this.tail);
    this.tail += chunk.length;
  }

  /** Index of `needle` relative to the live region, or -1. */
  indexOf(needle: Uint8Array, from: number): number {
    return this.storage.subarray(this.head, this.tail).indexOf(needle, from);
  }

  /** Copy out the first `length` bytes, then drop `consume` bytes from the front. */
  take(length: number, consume: number): Buffer {
    const out = Buffer.from(this.storage.subarray(this.head, this.head + length));
    this.head += consume;
    if (this.head === this.tail) {
      this.head = 0;
      this.tail = 0;
    }
    return out;
  }
}

export class FrameReceiver implements AsyncIterable<Buffer> {
  readonly terminator: Uint8Array;
  readonly maxFrameLength: number;
  private readonly receiveSize: number;
  private readonly buffer = new FrameBuffer();
  private nextFindIdx = 0;
  private scanned = 0;

  constructor(private readonly source: ByteSource, opts: FrameReceiverOptions = {}) {
    this.terminator = opts.terminator ?? TERMINATOR;
    if (this.terminator.length === 0) throw new Error("Terminator must not be empty");
    this.maxFrameLength = opts.maxFrameLength ?? LIMITS.MAX_FRAME_LENGTH;
    this.receiveSize = opts.receiveSize ?? LIMITS.RECEIVE_SIZE;
  }

  /** Total bytes examined by terminator searches so far. */
  get bytesScanned(): number {
    return this.scanned;
  }

  /** Next frame, or null once the stream has ended cleanly between frames. */
  async receive(): Promise<Buffer | null> {
    for (;;) {
      const len = this.buffer.length;
      this.scanned += Math.max(0, len - this.nextFindIdx);
      const idx = this.buffer.indexOf(this.terminator, this.nextFindIdx);

      if (idx >= 0) {
        this.nextFindIdx = 0;
        return this.buffer.take(idx, idx + this.terminator.length);
      }

      if (len > this.maxFrameLength) {
        throw new FrameTooLongError(len, this.maxFrameLength);
      }
      // resume where this search stopped, leaving room for a split terminator
      this.nextFindIdx = Math.max(0, len - this.terminator.length + 1);

      const chunk = await this.source.receiveSome(this.receiveSize);
      if (chunk.length === 0) {
        if (this.buffer.length > 0) throw new IncompleteFrameError(this.buffer.length);
        return null;
      }
      this.buffer.append(chunk);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Buffer> {
    for (;;) {
      const frame = await this.receive();
      if (frame === null) return;
      yield frame;
    }
  }
}

/**
 * Adapt a Node readable (e.g. net.Socket) to a ByteSource.
 * Chunks larger than the requested size are handed out across several calls.
 */
export function streamSource(stream: Readable): ByteSource {
  const iterator: AsyncIterator<unknown> = stream[Symbol.asyncIterator]();
  let pending: Buffer = Buffer.alloc(0);

  return {
    async receiveSome(maxBytes: number): Promise<Uint8Array> {
      while (pending.length === 0) {
        const next = await iterator.next();
        if (next.done) return new Uint8Array(0);
        pending = toBuffer(next.value);
      }
      const chunk = pending.subarray(0, maxBytes);
      pending = pending.subarray(chunk.length);
      return chunk;
    },
  };
}

function toBuffer(value: unknown): Buffer {
  if (Buffer.isBuffer(value)) return value;
  if (typeof value === "string") return Buffer.from(value, "utf-8");
  if (value instanceof Uint8Array) return Buffer.from(value);
  throw new TypeError(`Unexpected chunk type from stream: ${typeof value}`);
}

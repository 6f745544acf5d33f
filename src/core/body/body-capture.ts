/**
 * Body capture for inspection. The engine drains the request body through a BodyBuffer,
 * which retains what it read; the pipeline then chains that retained copy with whatever
 * the engine left unread so downstream consumers see the original bytes exactly once.
 */

import { PassThrough, Readable } from 'stream';

export type ReadUpToResult = {
  body: Buffer;
  /** True when the source reached end-of-stream. */
  ended: boolean;
};

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  return Buffer.from(String(chunk));
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('request body read aborted');
}

/**
 * Reads at most `max` bytes from source without destroying it. Bytes past `max` in the
 * last chunk are pushed back, so the source can still be piped for the remainder.
 */
export function readUpTo(source: Readable, max: number, signal?: AbortSignal): Promise<ReadUpToResult> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));
  if (source.readableEnded) return Promise.resolve({ body: Buffer.alloc(0), ended: true });
  if (max <= 0) return Promise.resolve({ body: Buffer.alloc(0), ended: false });

  return new Promise<ReadUpToResult>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let length = 0;

    const cleanup = () => {
      source.off('readable', onReadable);
      source.off('end', onEnd);
      source.off('error', onError);
      signal?.removeEventListener('abort', onAbort);
    };
    const finish = (ended: boolean) => {
      cleanup();
      resolve({ body: Buffer.concat(chunks, length), ended });
    };

    function onReadable() {
      let chunk: unknown;
      while (length < max && (chunk = source.read()) !== null) {
        const buf = toBuffer(chunk);
        const take = Math.min(buf.length, max - length);
        chunks.push(buf.subarray(0, take));
        length += take;
        if (take < buf.length) source.unshift(buf.subarray(take));
      }
      if (length >= max) finish(false);
    }
    function onEnd() {
      finish(true);
    }
    function onError(err: Error) {
      cleanup();
      reject(err);
    }
    function onAbort() {
      cleanup();
      if (signal) reject(abortReason(signal));
    }

    source.on('readable', onReadable);
    source.once('end', onEnd);
    source.once('error', onError);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type BodyIngestOptions = {
  /** Maximum bytes retained. */
  limit: number;
  signal?: AbortSignal;
};

export type BodyIngestOutcome = {
  bytesRead: number;
  /** True when the source held more than `limit` bytes; the surplus stays unread. */
  exceeded: boolean;
};

/**
 * Retains request-body bytes an engine reads so they can be replayed afterwards.
 * One buffer per transaction.
 */
export class BodyBuffer {
  private retained: Buffer = Buffer.alloc(0);

  get length(): number {
    return this.retained.length;
  }

  /** Returns the retained bytes. */
  bytes(): Buffer {
    return this.retained;
  }

  async ingest(source: Readable, options: BodyIngestOptions): Promise<BodyIngestOutcome> {
    const { limit, signal } = options;
    // One byte past the limit tells a body of exactly `limit` bytes from a longer one.
    const { body } = await readUpTo(source, limit + 1, signal);
    let kept = body;
    let exceeded = false;
    if (body.length > limit) {
      kept = body.subarray(0, limit);
      source.unshift(body.subarray(limit));
      exceeded = true;
    }
    this.retained = this.retained.length ? Buffer.concat([this.retained, kept]) : kept;
    return { bytesRead: kept.length, exceeded };
  }

  /** Fresh stream over the retained bytes. */
  reader(): Readable {
    const out = new PassThrough();
    out.end(this.retained);
    return out;
  }

  reset(): void {
    this.retained = Buffer.alloc(0);
  }
}

/**
 * Returns a stream that yields all of head, then all of tail. Errors on either side
 * destroy the combined stream. A tail that already ended contributes nothing.
 */
export function concatBodyStreams(head: Readable, tail: Readable | null): Readable {
  const out = new PassThrough();
  head.once('error', (err) => out.destroy(err));
  tail?.once('error', (err) => out.destroy(err));
  // Destroying the combined stream releases both sides; the tail is then the caller's to drain.
  out.once('close', () => {
    head.unpipe(out);
    tail?.unpipe(out);
  });
  head.once('end', () => {
    if (out.destroyed) return;
    if (tail) tail.pipe(out);
    else out.end();
  });
  head.pipe(out, { end: false });
  return out;
}

/**
 * Lets the unread rest of a request body flow into nowhere. Needed once part of it was
 * read: Node no longer drains such a request itself, and a keep-alive connection would
 * stall behind the leftover bytes.
 */
export function discardBody(source: Readable): void {
  if (source.destroyed || source.readableEnded) return;
  source.unpipe();
  source.resume();
}

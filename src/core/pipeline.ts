/**
 * Drives one transaction through connection, URI, header and body phases.
 * Each phase may end the run with an interruption; later phases then never start.
 * Releasing the transaction is the caller's job (see guard.ts).
 */

import type { Readable } from 'stream';
import type { BodyIngestResult, InspectionTransaction } from '../types/engine';
import type { InspectionPhase, Interruption, RequestView } from '../types/schema';
import { concatBodyStreams } from './body/body-capture';
import { EngineIOError } from './errors';
import { describeError } from './log';

export type PhaseResult = {
  /** Last phase that ran. */
  phase: InspectionPhase;
  interruption?: Interruption;
  /** Replay stream for downstream handlers; set only when the body was consumed and allowed. */
  body?: Readable;
};

function feedConnection(tx: InspectionTransaction, view: RequestView): void {
  tx.processConnection(view.remote.host, view.remote.port ?? 0, view.local?.host ?? '', view.local?.port ?? 0);
}

function feedHeaders(tx: InspectionTransaction, view: RequestView): void {
  for (const [key, values] of view.headers) {
    for (const value of values) tx.addRequestHeader(key, value);
  }
  if (view.host !== '') {
    tx.addRequestHeader('Host', view.host);
    tx.setServerName(view.host);
  }
  if (view.transferEncoding !== undefined) {
    tx.addRequestHeader('Transfer-Encoding', view.transferEncoding);
  }
}

/**
 * Runs the phases in order. Body read or evaluation failures surface as EngineIOError;
 * any other throw from the engine propagates unchanged. A replay stream is only
 * returned on allow; the caller drains the original body otherwise.
 */
export async function runInspectionPhases(tx: InspectionTransaction, view: RequestView): Promise<PhaseResult> {
  feedConnection(tx, view);
  tx.processURI(view.uri, view.method, view.protocol);

  feedHeaders(tx, view);
  const headerInterruption = tx.processRequestHeaders();
  if (headerInterruption) {
    return { phase: 'headers', interruption: headerInterruption };
  }

  let body: Readable | undefined;
  if (tx.isRequestBodyAccessible() && view.body !== null) {
    let ingested: BodyIngestResult;
    try {
      ingested = await tx.readRequestBodyFrom(view.body);
    } catch (err) {
      throw new EngineIOError(`reading request body failed: ${describeError(err)}`, { cause: err });
    }
    if (ingested.interruption) {
      return { phase: 'body', interruption: ingested.interruption };
    }
    body = concatBodyStreams(tx.requestBodyReader(), view.body);
  }

  let bodyInterruption: Interruption | undefined;
  try {
    bodyInterruption = await tx.processRequestBody();
  } catch (err) {
    body?.destroy();
    throw new EngineIOError(`request body evaluation failed: ${describeError(err)}`, { cause: err });
  }
  if (bodyInterruption) {
    // Nobody will read the replay; dropping it unpipes the original body.
    body?.destroy();
    return { phase: 'body', interruption: bodyInterruption };
  }
  return { phase: 'body', ...(body !== undefined && { body }) };
}

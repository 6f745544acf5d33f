/**
 * Boundary to the external rule engine. Only the calls the pipeline drives are modelled;
 * rule loading and matching stay inside the engine.
 */

import type { Context } from '@opentelemetry/api';
import type { Readable } from 'stream';
import type {
  DebugLogger,
  Interruption,
  MatchedRuleEvent,
  RuleEngineMode,
} from './schema';

/** Configuration assembled for the engine factory; unset limits are omitted. */
export type EngineConfig = {
  /** Absolute paths, in load order. */
  directivesFiles: string[];
  rootDir?: string;
  ruleEngine: RuleEngineMode;
  requestBody: {
    access: boolean;
    limit?: number;
    inMemoryLimit?: number;
  };
  responseBody: {
    access: boolean;
    limit?: number;
    mimeTypes?: string[];
  };
  debugLogger?: DebugLogger;
  /** Present only when the error log is enabled. */
  onRuleMatched?: (event: MatchedRuleEvent) => void;
};

/** Result of draining a request body into the engine. */
export type BodyIngestResult = {
  interruption?: Interruption;
  bytesRead: number;
};

/** Per-request engine state. Owned by exactly one request; must be closed. */
export interface InspectionTransaction {
  readonly id: string;
  processConnection(clientHost: string, clientPort: number, serverHost: string, serverPort: number): void;
  processURI(uri: string, method: string, protocol: string): void;
  addRequestHeader(key: string, value: string): void;
  setServerName(host: string): void;
  processRequestHeaders(): Interruption | undefined;
  isRequestBodyAccessible(): boolean;
  /** Rejects when the source stream fails. */
  readRequestBodyFrom(source: Readable): Promise<BodyIngestResult>;
  /** Bytes retained by the last ingestion, replayed from the start. */
  requestBodyReader(): Readable;
  processRequestBody(): Promise<Interruption | undefined>;
  isRuleEngineOff(): boolean;
  /** Flushes audit logging for the transaction. */
  processLogging(): void;
  close(): void | Promise<void>;
}

/** Options for engines that accept per-request context. */
export type TransactionOptions = {
  context: Context;
  /** Aborted when the client disconnects before the response is written. */
  signal: AbortSignal;
};

export interface InspectionEngine {
  newTransaction(): InspectionTransaction;
}

/** Optional capability: transactions that observe request context and cancellation. */
export interface ContextAwareInspectionEngine extends InspectionEngine {
  newTransactionWithOptions(options: TransactionOptions): InspectionTransaction;
}

export type EngineFactory = (config: EngineConfig) => InspectionEngine | Promise<InspectionEngine>;

/** Returns true when the engine can create transactions bound to request context. */
export function supportsTransactionOptions(
  engine: InspectionEngine
): engine is ContextAwareInspectionEngine {
  return 'newTransactionWithOptions' in engine && typeof engine.newTransactionWithOptions === 'function';
}

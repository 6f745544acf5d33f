/**
 * Data model shared by the pipeline, the adapters and the engine boundary.
 */

import type { Readable } from 'stream';

/** Rule engine mode forwarded to the engine; `Off` makes every transaction bypass inspection. */
export type RuleEngineMode = 'On' | 'Off' | 'DetectionOnly';

/** Severity attached to a matched rule. */
export type RuleSeverity =
  | 'emergency'
  | 'alert'
  | 'critical'
  | 'error'
  | 'warning'
  | 'notice'
  | 'info'
  | 'debug';

/**
 * Decision issued by the engine to stop processing a request.
 * `status` is 0 when the rule did not set one.
 */
export type Interruption = {
  ruleId: number;
  /** Disruptive action verb, e.g. 'deny', 'drop', 'redirect'. */
  action: string;
  status: number;
  /** Action argument (redirect target etc.); empty when unused. */
  data: string;
};

/** Passed to the error-log callback whenever a rule fires. */
export type MatchedRuleEvent = {
  severity: RuleSeverity;
  errorLog: string;
  ruleId: number;
};

/** Debug sink handed to the engine unchanged. */
export interface DebugLogger {
  debug(message: string, fields?: Record<string, unknown>): void;
  trace?(message: string, fields?: Record<string, unknown>): void;
}

/** Engine behaviour settings supplied by the application. */
export type WafConfig = {
  /** Rule files, loaded in order. Every entry must exist at init. */
  directivesFiles: string[];
  /** Base directory for relative directives paths; defaults to the working directory. */
  rootDir?: string;
  ruleEngine?: RuleEngineMode;

  requestBodyAccess?: boolean;
  requestBodyLimit?: number;
  requestBodyInMemoryLimit?: number;

  responseBodyAccess?: boolean;
  responseBodyLimit?: number;
  responseBodyMimeTypes?: string[];

  debugLogger?: DebugLogger;
  enableErrorLog?: boolean;

  /** Status returned for interruptions whose action is not an explicit deny. */
  defaultBlockStatus?: number;
};

/** Remote or local endpoint; `port` is absent when it could not be decomposed. */
export type Endpoint = {
  host: string;
  port?: number;
};

/**
 * Protocol-neutral projection of an inbound request.
 * Header keys are matched case-insensitively; the first spelling seen is kept.
 */
export type RequestView = {
  readonly method: string;
  readonly uri: string;
  /** e.g. 'HTTP/1.1'. */
  readonly protocol: string;
  readonly headers: ReadonlyMap<string, readonly string[]>;
  readonly remote: Endpoint;
  readonly local?: Endpoint;
  /** Host header value, or the framework hostname when the header is absent. */
  readonly host: string;
  /** First Transfer-Encoding token, when the header is present. */
  readonly transferEncoding?: string;
  /** Null when the request carries no body. */
  readonly body: Readable | null;
};

/**
 * Server-specific request shape the adapters hand to the guard.
 * `rawHeaders` is the flat name/value list Node keeps on IncomingMessage.
 */
export type NativeRequest = {
  method?: string;
  url?: string;
  httpVersion?: string;
  rawHeaders: readonly string[];
  remoteAddress?: string;
  remotePort?: number;
  localAddress?: string;
  localPort?: number;
  /** Framework-derived hostname used when no Host header was sent. */
  hostname?: string;
  body: Readable | null;
  /** Installs the replayed body for downstream consumers. */
  replaceBody?(body: Readable): void;
};

/** Inspection phases, in execution order. */
export type InspectionPhase = 'connection' | 'uri' | 'headers' | 'body';

/** Payload of every response the gateway writes itself. */
export type WafResponseBody = {
  code: 0;
  msg: string;
};

/**
 * Projects a server-specific request into the RequestView the pipeline drives.
 * Pure: reads the native request, never consumes its body.
 */

import type { Endpoint, NativeRequest, RequestView } from '../types/schema';
import { RequestConversionError } from './errors';
import { hasRequestBody, parseContentLengthHeader } from './runtime/http-body';

/** Carried as dedicated RequestView fields; the pipeline re-adds them as synthetic headers. */
const DEDICATED_HEADERS = new Set(['host', 'transfer-encoding']);

/**
 * Builds a case-insensitive header multimap from Node's flat rawHeaders list,
 * keeping every value in arrival order under the first spelling of its name.
 */
export function headersFromRaw(rawHeaders: readonly string[]): Map<string, string[]> {
  if (rawHeaders.length % 2 !== 0) {
    throw new RequestConversionError('raw header list has an odd number of entries');
  }
  const headers = new Map<string, string[]>();
  const spelling = new Map<string, string>();
  for (let i = 0; i < rawHeaders.length; i += 2) {
    const name = rawHeaders[i] ?? '';
    const value = rawHeaders[i + 1] ?? '';
    const lower = name.toLowerCase();
    const key = spelling.get(lower) ?? name;
    spelling.set(lower, key);
    const values = headers.get(key);
    if (values) values.push(value);
    else headers.set(key, [value]);
  }
  return headers;
}

function lookup(headers: ReadonlyMap<string, readonly string[]>, name: string): readonly string[] | undefined {
  for (const [key, values] of headers) {
    if (key.toLowerCase() === name) return values;
  }
  return undefined;
}

function toPort(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isInteger(value)) return undefined;
  return value >= 0 && value <= 65535 ? value : undefined;
}

/** First coding of a Transfer-Encoding value ("gzip, chunked" -> "gzip"). */
export function firstTransferCoding(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const token = value.split(',')[0]?.trim();
  return token ? token : undefined;
}

/**
 * Projects the native request. Throws RequestConversionError when the request line
 * cannot be recovered or the raw header list is malformed.
 */
export function buildRequestView(native: NativeRequest): RequestView {
  if (typeof native.method !== 'string' || native.method === '') {
    throw new RequestConversionError('request method is missing');
  }
  if (typeof native.url !== 'string' || native.url === '') {
    throw new RequestConversionError('request URL is missing');
  }

  const all = headersFromRaw(native.rawHeaders);
  const headers = new Map<string, string[]>();
  for (const [key, values] of all) {
    if (!DEDICATED_HEADERS.has(key.toLowerCase())) headers.set(key, values);
  }

  const host = lookup(all, 'host')?.[0] || native.hostname || '';
  const transferEncoding = firstTransferCoding(lookup(all, 'transfer-encoding')?.[0]);
  const contentLength = parseContentLengthHeader(lookup(all, 'content-length'));

  const remote: Endpoint = { host: native.remoteAddress ?? '' };
  const remotePort = toPort(native.remotePort);
  if (remotePort !== undefined) remote.port = remotePort;

  let local: Endpoint | undefined;
  if (native.localAddress !== undefined) {
    local = { host: native.localAddress };
    const localPort = toPort(native.localPort);
    if (localPort !== undefined) local.port = localPort;
  }

  return {
    method: native.method,
    uri: native.url,
    protocol: `HTTP/${native.httpVersion || '1.1'}`,
    headers,
    remote,
    ...(local !== undefined && { local }),
    host,
    ...(transferEncoding !== undefined && { transferEncoding }),
    body: native.body !== null && hasRequestBody(contentLength, transferEncoding) ? native.body : null,
  };
}

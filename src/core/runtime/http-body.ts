/** A request has a body when it declares a non-zero length or a transfer coding. */
export function hasRequestBody(contentLength: number | undefined, transferEncoding: string | undefined): boolean {
  if (transferEncoding !== undefined && transferEncoding !== '') return true;
  return contentLength !== undefined && contentLength > 0;
}

/** Parses a content-length header value; returns undefined for absent/invalid values. */
export function parseContentLengthHeader(values?: readonly string[]): number | undefined {
  const value = values?.[0];
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

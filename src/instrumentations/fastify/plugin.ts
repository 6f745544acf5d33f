/**
 * Fastify plugin for the WAF: onRequest inspects the request (body included) before any
 * route code runs; preParsing hands the replayed body to Fastify's content-type parser.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import type { IncomingMessage } from 'http';
import type { Readable } from 'stream';
import { inspectRequest } from '../../core/guard';
import type { GuardOutcome } from '../../core/guard';
import type { NativeRequest } from '../../types/schema';

const replayBodies = new WeakMap<FastifyRequest, Readable>();

/**
 * Node's rawHeaders keeps duplicates in order. Headers present only in the parsed map
 * (e.g. defaults filled in by light-my-request) are appended after them.
 */
export function collectRawHeaders(raw: Pick<IncomingMessage, 'rawHeaders' | 'headers'>): string[] {
  const list = Array.isArray(raw.rawHeaders) ? [...raw.rawHeaders] : [];
  const seen = new Set<string>();
  for (let i = 0; i < list.length; i += 2) seen.add((list[i] ?? '').toLowerCase());
  for (const [name, value] of Object.entries(raw.headers)) {
    if (seen.has(name) || value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) list.push(name, v);
  }
  return list;
}

function toNativeRequest(request: FastifyRequest): NativeRequest {
  const { raw } = request;
  return {
    method: raw.method,
    url: raw.url,
    httpVersion: raw.httpVersion,
    rawHeaders: collectRawHeaders(raw),
    remoteAddress: request.ip,
    remotePort: raw.socket?.remotePort,
    localAddress: raw.socket?.localAddress,
    localPort: raw.socket?.localPort,
    hostname: request.hostname,
    body: raw,
    replaceBody: (body) => {
      replayBodies.set(request, body);
    },
  };
}

async function wafOnRequest(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
  const aborter = new AbortController();
  const onClose = () => {
    if (!reply.raw.writableFinished) aborter.abort(new Error('client disconnected'));
  };
  reply.raw.once('close', onClose);

  let outcome: GuardOutcome;
  try {
    outcome = await inspectRequest(toNativeRequest(request), { signal: aborter.signal });
  } finally {
    reply.raw.off('close', onClose);
  }

  if (outcome.action === 'allow') return undefined;
  if (outcome.action === 'block') reply.headers(outcome.headers);
  reply.code(outcome.status).send(outcome.payload);
  return reply;
}

async function wafPreParsing(request: FastifyRequest, _reply: FastifyReply, payload: Readable): Promise<Readable> {
  const replay = replayBodies.get(request);
  if (!replay) return payload;
  replayBodies.delete(request);
  return replay;
}

async function waf(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', wafOnRequest);
  fastify.addHook('preParsing', wafPreParsing);
}

/** Registers the WAF hooks on the root instance so they cover every route. */
export const wafFastifyPlugin = fp(waf, { name: 'waf-gate', fastify: '4.x' });

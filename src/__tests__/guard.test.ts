/**
 * Request guard: lifecycle preconditions, bypass, block/allow outcomes, fault isolation
 * and exactly-once transaction release.
 */

import { trace } from '@opentelemetry/api';
import { Readable } from 'stream';
import { finished } from 'stream/promises';

import {
  BLOCKED_HEADER,
  inspectRequest,
  MSG_CONVERSION_FAILED,
  MSG_INIT_FAILED,
  MSG_INTERNAL_ERROR,
  MSG_NOT_INITIALIZED,
  MSG_PROCESSING_FAILED,
} from '../core/guard';
import { initGlobalWaf, resetGlobalWaf, setBlockMessage } from '../core/lifecycle';
import { consoleLogger, setWafLogger } from '../core/log';
import type { InspectionEngine } from '../types/engine';
import type { NativeRequest } from '../types/schema';
import type { FakeRules } from './helpers/fake-engine';
import { deny, FakeContextEngine, FakeEngine } from './helpers/fake-engine';
import { silentLogger, writeDirectivesFile } from './helpers/waf-fixtures';

async function drain(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  return Buffer.concat(chunks).toString();
}

function postRequest(body: string, extra: Partial<NativeRequest> = {}): NativeRequest {
  return {
    method: 'POST',
    url: '/submit',
    httpVersion: '1.1',
    rawHeaders: [
      'Host',
      'app.test',
      'Content-Type',
      'application/x-www-form-urlencoded',
      'Content-Length',
      String(Buffer.byteLength(body)),
    ],
    remoteAddress: '203.0.113.9',
    remotePort: 50000,
    body: Readable.from([Buffer.from(body)]),
    ...extra,
  };
}

async function ready<E extends InspectionEngine>(engine: E, defaultBlockStatus?: number): Promise<E> {
  await initGlobalWaf({ directivesFiles: [writeDirectivesFile()], defaultBlockStatus }, () => engine);
  return engine;
}

async function readyFake(rules: FakeRules = {}): Promise<FakeEngine> {
  return ready(new FakeEngine(rules));
}

describe('inspectRequest', () => {
  let logger: ReturnType<typeof silentLogger>;

  beforeEach(() => {
    resetGlobalWaf();
    logger = silentLogger();
    setWafLogger(logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(() => {
    setWafLogger(consoleLogger);
  });

  it('answers 500 before initialization has completed and creates no transaction', async () => {
    const engine = new FakeEngine();
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const pending = initGlobalWaf({ directivesFiles: [writeDirectivesFile()] }, async () => {
      await gate;
      return engine;
    });

    const outcome = await inspectRequest(postRequest('a=1'));

    expect(outcome).toEqual({ action: 'error', status: 500, payload: { code: 0, msg: MSG_NOT_INITIALIZED } });
    expect(engine.transactions).toHaveLength(0);
    openGate();
    await pending;
  });

  it('answers 500 without init at all', async () => {
    const outcome = await inspectRequest(postRequest('a=1'));

    expect(outcome).toEqual({ action: 'error', status: 500, payload: { code: 0, msg: MSG_NOT_INITIALIZED } });
  });

  it('answers 500 after a failed initialization', async () => {
    await expect(initGlobalWaf({ directivesFiles: ['/no/such/rules.conf'] }, () => new FakeEngine())).rejects.toThrow();

    const outcome = await inspectRequest(postRequest('a=1'));

    expect(outcome).toEqual({ action: 'error', status: 500, payload: { code: 0, msg: MSG_INIT_FAILED } });
  });

  it('answers 500 for an unconvertible request without creating a transaction', async () => {
    const engine = await readyFake();

    const outcome = await inspectRequest(postRequest('a=1', { method: undefined }));

    expect(outcome).toEqual({ action: 'error', status: 500, payload: { code: 0, msg: MSG_CONVERSION_FAILED } });
    expect(engine.transactions).toHaveLength(0);
  });

  it('allows everything without running phases when the rule engine is off', async () => {
    const engine = await readyFake({ ruleEngineOff: true, onHeaders: () => deny(1) });

    const outcome = await inspectRequest(postRequest('a=1'));

    expect(outcome).toEqual({ action: 'allow' });
    expect(engine.last?.calls).toEqual([]);
    expect(engine.last?.logged).toBe(1);
    expect(engine.last?.closed).toBe(1);
  });

  it('blocks with the block message, marker header and the deny status', async () => {
    const engine = await readyFake({
      onBody: (seen) => (seen.body.toString().includes('<script>') ? deny(941100, 403) : undefined),
    });
    setBlockMessage('Request blocked by gateway');
    const replaceBody = jest.fn();

    const outcome = await inspectRequest(postRequest('name=<script>alert(1)</script>', { replaceBody }));

    expect(outcome).toEqual({
      action: 'block',
      status: 403,
      headers: { [BLOCKED_HEADER]: 'true' },
      payload: { code: 0, msg: 'Request blocked by gateway' },
      interruption: deny(941100, 403),
    });
    expect(replaceBody).not.toHaveBeenCalled();
    expect(engine.last?.logged).toBe(1);
    expect(engine.last?.closed).toBe(1);
  });

  it('uses the configured default status for non-deny interruptions', async () => {
    await ready(new FakeEngine({ onHeaders: () => ({ ruleId: 7, action: 'drop', status: 0, data: '' }) }), 429);

    const outcome = await inspectRequest(postRequest('a=1'));

    expect(outcome.action === 'block' && outcome.status).toBe(429);
  });

  it('installs a replay body carrying the exact original bytes on allow', async () => {
    const engine = await readyFake();
    const original = 'name=bob&note=hello%20world';
    const replaceBody = jest.fn<void, [Readable]>();

    const outcome = await inspectRequest(postRequest(original, { replaceBody }));

    expect(outcome).toEqual({ action: 'allow' });
    expect(replaceBody).toHaveBeenCalledTimes(1);
    const replay = replaceBody.mock.calls[0]?.[0];
    expect(replay && (await drain(replay))).toBe(original);
    expect(engine.last?.closed).toBe(1);
  });

  it('does not replace the body of a request without one', async () => {
    await readyFake();
    const replaceBody = jest.fn();

    const outcome = await inspectRequest({
      method: 'GET',
      url: '/?id=1 OR 1=1',
      rawHeaders: ['Host', 'app.test'],
      body: Readable.from([]),
      replaceBody,
    });

    expect(outcome).toEqual({ action: 'allow' });
    expect(replaceBody).not.toHaveBeenCalled();
  });

  async function blockLargeBody(rules: FakeRules): Promise<{ status: number | false; source: Readable }> {
    await readyFake(rules);
    const request = postRequest('payload=' + 'x'.repeat(64 * 1024));
    const source = request.body;
    if (!source) throw new Error('request has no body');
    const outcome = await inspectRequest(request);
    return { status: outcome.action === 'block' && outcome.status, source };
  }

  it('drains the unread rest of a body stopped by the body limit', async () => {
    const { status, source } = await blockLargeBody({ bodyLimit: 8, onBodyLimit: deny(200002, 413) });

    expect(status).toBe(413);
    await expect(finished(source)).resolves.toBeUndefined();
  });

  it('drains the unread rest of a body stopped by a body rule', async () => {
    const { status, source } = await blockLargeBody({ bodyLimit: 8, onBody: () => deny(942100, 403) });

    expect(status).toBe(403);
    await expect(finished(source)).resolves.toBeUndefined();
  });

  it('answers 500 on a body read failure and still releases once', async () => {
    const engine = await readyFake({ failOn: 'readRequestBodyFrom' });

    const outcome = await inspectRequest(postRequest('a=1'));

    expect(outcome).toEqual({ action: 'error', status: 500, payload: { code: 0, msg: MSG_PROCESSING_FAILED } });
    expect(engine.last?.logged).toBe(1);
    expect(engine.last?.closed).toBe(1);
  });

  it('isolates unexpected engine faults and still releases once', async () => {
    const engine = await readyFake({ failOn: 'addRequestHeader' });

    const outcome = await inspectRequest(postRequest('a=1'));

    expect(outcome).toEqual({ action: 'error', status: 500, payload: { code: 0, msg: MSG_INTERNAL_ERROR } });
    expect(engine.last?.logged).toBe(1);
    expect(engine.last?.closed).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('WAF inspection fault', {
      tx: 'tx-1',
      error: 'header table corrupted',
    });
  });

  it('logs a failing close without changing the outcome', async () => {
    const engine = await readyFake();
    const tx = engine.newTransaction();
    jest.spyOn(engine, 'newTransaction').mockReturnValue(tx);
    jest.spyOn(tx, 'close').mockImplementation(() => {
      throw new Error('audit sink offline');
    });

    const outcome = await inspectRequest(postRequest('a=1'));

    expect(outcome).toEqual({ action: 'allow' });
    expect(logger.error).toHaveBeenCalledWith('WAF transaction close failed', {
      tx: tx.id,
      error: 'audit sink offline',
    });
  });

  it('passes the caller signal to context-aware engines', async () => {
    const engine = await ready(new FakeContextEngine());
    const controller = new AbortController();

    await inspectRequest(postRequest('a=1'), { signal: controller.signal });

    expect(engine.optionsSeen).toHaveLength(1);
    expect(engine.optionsSeen[0]?.signal).toBe(controller.signal);
  });

  it('tags the active span with the block outcome', async () => {
    await readyFake({ onHeaders: () => deny(913100, 406) });
    const setAttribute = jest.fn();
    jest.spyOn(trace, 'getActiveSpan').mockReturnValue({ setAttribute } as unknown as ReturnType<
      typeof trace.getActiveSpan
    >);

    await inspectRequest(postRequest('a=1'));

    expect(setAttribute.mock.calls).toEqual([
      ['waf.phase', 'headers'],
      ['waf.blocked', true],
      ['waf.action', 'deny'],
      ['waf.rule_id', 913100],
      ['waf.status', 406],
    ]);
  });
});

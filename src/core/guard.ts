/**
 * Framework-neutral request guard. Checks the engine lifecycle, projects the request,
 * runs the inspection phases inside one transaction and turns the result into an
 * outcome the framework adapter applies. The transaction is released exactly once on
 * every path after it was created.
 */

import { context, trace } from '@opentelemetry/api';
import type { Context } from '@opentelemetry/api';
import { tagInspection } from '../bindings/waf-span';
import type { InspectionTransaction } from '../types/engine';
import type { Interruption, NativeRequest, RequestView, WafResponseBody } from '../types/schema';
import { discardBody } from './body/body-capture';
import { EngineIOError } from './errors';
import { getBlockMessage, getWafState } from './lifecycle';
import { describeError, getWafLogger } from './log';
import { runInspectionPhases } from './pipeline';
import { buildRequestView } from './request-view';
import { statusFromInterruption } from './status';

export const BLOCKED_HEADER = 'X-WAF-Blocked';

export const MSG_INIT_FAILED = 'WAF initialization failed';
export const MSG_NOT_INITIALIZED = 'WAF instance not initialized';
export const MSG_CONVERSION_FAILED = 'Failed to convert request';
export const MSG_PROCESSING_FAILED = 'WAF request processing failed';
export const MSG_INTERNAL_ERROR = 'Internal WAF error';

export type GuardOutcome =
  | { action: 'allow' }
  | {
      action: 'block';
      status: number;
      headers: Readonly<Record<string, string>>;
      payload: WafResponseBody;
      interruption: Interruption;
    }
  | { action: 'error'; status: 500; payload: WafResponseBody };

export type InspectOptions = {
  /** OTel context for engines that accept one; defaults to the active context. */
  context?: Context;
  /** Fires when the client goes away; forwarded to context-aware engines. */
  signal?: AbortSignal;
};

const ALLOW: GuardOutcome = { action: 'allow' };

function failure(msg: string): GuardOutcome {
  return { action: 'error', status: 500, payload: { code: 0, msg } };
}

async function release(tx: InspectionTransaction): Promise<void> {
  const log = getWafLogger();
  try {
    tx.processLogging();
  } catch (err) {
    log.error('WAF transaction logging failed', { tx: tx.id, error: describeError(err) });
  }
  try {
    await tx.close();
  } catch (err) {
    log.error('WAF transaction close failed', { tx: tx.id, error: describeError(err) });
  }
}

/**
 * Inspects one request. Never rejects: every fault becomes an `error` outcome with a
 * fixed diagnostic, and engine details only reach the log.
 */
export async function inspectRequest(native: NativeRequest, options: InspectOptions = {}): Promise<GuardOutcome> {
  const current = getWafState();
  if (current.status === 'failed') return failure(MSG_INIT_FAILED);
  if (current.status !== 'ready') return failure(MSG_NOT_INITIALIZED);

  const log = getWafLogger();
  let view: RequestView;
  try {
    view = buildRequestView(native);
  } catch (err) {
    log.warn('WAF request conversion failed', { error: describeError(err) });
    return failure(MSG_CONVERSION_FAILED);
  }

  let tx: InspectionTransaction;
  try {
    tx = current.newTransaction({
      context: options.context ?? context.active(),
      signal: options.signal ?? new AbortController().signal,
    });
  } catch (err) {
    log.error('WAF transaction creation failed', { error: describeError(err) });
    return failure(MSG_INTERNAL_ERROR);
  }

  const span = trace.getActiveSpan();
  let allowed = false;
  try {
    if (tx.isRuleEngineOff()) {
      tagInspection(span, { bypassed: true });
      allowed = true;
      return ALLOW;
    }

    const result = await runInspectionPhases(tx, view);
    if (result.interruption) {
      const status = statusFromInterruption(result.interruption, current.defaultBlockStatus);
      tagInspection(span, { phase: result.phase, interruption: result.interruption, status });
      log.info('WAF request blocked', {
        tx: tx.id,
        phase: result.phase,
        rule_id: result.interruption.ruleId,
        action: result.interruption.action,
        status,
      });
      return {
        action: 'block',
        status,
        headers: { [BLOCKED_HEADER]: 'true' },
        payload: { code: 0, msg: getBlockMessage() },
        interruption: result.interruption,
      };
    }

    if (result.body) native.replaceBody?.(result.body);
    tagInspection(span, { phase: result.phase });
    allowed = true;
    return ALLOW;
  } catch (err) {
    if (err instanceof EngineIOError) {
      log.error('WAF request processing failed', { tx: tx.id, error: err.message });
      return failure(MSG_PROCESSING_FAILED);
    }
    log.error('WAF inspection fault', { tx: tx.id, error: describeError(err) });
    return failure(MSG_INTERNAL_ERROR);
  } finally {
    if (!allowed && view.body) discardBody(view.body);
    await release(tx);
  }
}

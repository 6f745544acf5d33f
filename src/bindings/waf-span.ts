/**
 * Typed binding for tagging the active request span with the inspection outcome.
 */

import type { InspectionPhase, Interruption } from '../types/schema';

/** Span-like with setAttribute (OTel Span or test span). */
type SpanLike = { setAttribute?(key: string, value: string | number | boolean): unknown } | undefined;

export type InspectionTag = {
  phase?: InspectionPhase;
  interruption?: Interruption;
  status?: number;
  /** True when the rule engine was switched off for the transaction. */
  bypassed?: boolean;
};

/**
 * Tags the span with the last phase that ran and, for an interruption, its action,
 * response status and rule id. No-op without a span.
 */
export function tagInspection(span: SpanLike, tag: InspectionTag): void {
  if (!span?.setAttribute) return;
  if (tag.phase !== undefined) span.setAttribute('waf.phase', tag.phase);
  if (tag.bypassed) span.setAttribute('waf.bypassed', true);
  span.setAttribute('waf.blocked', tag.interruption !== undefined);
  if (tag.interruption) {
    span.setAttribute('waf.action', tag.interruption.action);
    span.setAttribute('waf.rule_id', tag.interruption.ruleId);
  }
  if (tag.status !== undefined) span.setAttribute('waf.status', tag.status);
}

/** WafSpan namespace for tagInspection. */
export const WafSpan = { tagInspection };

/**
 * Process-wide logger. Console by default; applications can route it elsewhere at boot.
 */

import type { MatchedRuleEvent } from '../types/schema';

export interface WafLogger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

const PREFIX = '[waf]';

export const consoleLogger: WafLogger = {
  debug: (message, fields) => console.debug(PREFIX, message, fields ?? ''),
  info: (message, fields) => console.info(PREFIX, message, fields ?? ''),
  warn: (message, fields) => console.warn(PREFIX, message, fields ?? ''),
  error: (message, fields) => console.error(PREFIX, message, fields ?? ''),
};

let activeLogger: WafLogger = consoleLogger;

export function setWafLogger(logger: WafLogger): void {
  activeLogger = logger;
}

export function getWafLogger(): WafLogger {
  return activeLogger;
}

/** Default error-log callback handed to the engine. */
export function logMatchedRule(event: MatchedRuleEvent): void {
  activeLogger.warn('WAF rule matched', {
    severity: event.severity,
    error_log: event.errorLog,
    rule_id: event.ruleId,
  });
}

/** Renders an unknown thrown value for log fields. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

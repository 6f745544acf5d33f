/**
 * Public API: lifecycle, block message, the framework-neutral guard and the Fastify plugin.
 */

import {
  getBlockMessage,
  getWafState,
  initGlobalWaf,
  initGlobalWafFromConfigFile,
  initGlobalWafFromPaths,
  setBlockMessage,
} from './core/lifecycle';
import { inspectRequest } from './core/guard';
import { statusFromInterruption } from './core/status';
import { setWafLogger } from './core/log';
import { wafFastifyPlugin } from './instrumentations/fastify/plugin';

export {
  getBlockMessage,
  getWafState,
  initGlobalWaf,
  initGlobalWafFromConfigFile,
  initGlobalWafFromPaths,
  resetGlobalWaf,
  setBlockMessage,
  buildEngineConfig,
} from './core/lifecycle';
export type { TransactionFactory, WafState } from './core/lifecycle';
export { BLOCKED_HEADER, inspectRequest } from './core/guard';
export type { GuardOutcome, InspectOptions } from './core/guard';
export { runInspectionPhases } from './core/pipeline';
export type { PhaseResult } from './core/pipeline';
export { buildRequestView } from './core/request-view';
export { DEFAULT_BLOCK_STATUS, statusFromInterruption } from './core/status';
export { BodyBuffer, concatBodyStreams, discardBody, readUpTo } from './core/body/body-capture';
export type { BodyIngestOptions, BodyIngestOutcome, ReadUpToResult } from './core/body/body-capture';
export {
  DirectivesNotFoundError,
  EngineIOError,
  RequestConversionError,
  WafError,
  WafInitializationError,
} from './core/errors';
export { consoleLogger, getWafLogger, logMatchedRule, setWafLogger } from './core/log';
export type { WafLogger } from './core/log';
export { ConfigManager, DEFAULT_CONFIG_PATH, WafFileConfigSchema } from './config/config-manager';
export type { WafFileConfig } from './config/config-manager';
export { DEFAULT_BLOCK_MESSAGE, defaultWafConfig } from './config/defaults';
export { tagInspection } from './bindings/waf-span';
export { wafFastifyPlugin } from './instrumentations/fastify/plugin';
export { supportsTransactionOptions } from './types/engine';
export type {
  BodyIngestResult,
  ContextAwareInspectionEngine,
  EngineConfig,
  EngineFactory,
  InspectionEngine,
  InspectionTransaction,
  TransactionOptions,
} from './types/engine';
export type {
  DebugLogger,
  Endpoint,
  InspectionPhase,
  Interruption,
  MatchedRuleEvent,
  NativeRequest,
  RequestView,
  RuleEngineMode,
  RuleSeverity,
  WafConfig,
  WafResponseBody,
} from './types/schema';

/** Namespace object for applications that prefer a single import. */
export const waf = {
  init: initGlobalWaf,
  initFromPaths: initGlobalWafFromPaths,
  initFromConfigFile: initGlobalWafFromConfigFile,
  state: getWafState,
  setBlockMessage,
  getBlockMessage,
  setLogger: setWafLogger,
  inspect: inspectRequest,
  statusFor: statusFromInterruption,
  fastify: wafFastifyPlugin,
};

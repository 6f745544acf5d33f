/**
 * Process-wide engine lifecycle: one construction attempt, shared by every caller,
 * with its outcome recorded for the request path to check. Also owns the block message.
 */

import fs from 'fs';
import path from 'path';
import { DEFAULT_BLOCK_MESSAGE, defaultWafConfig } from '../config/defaults';
import { ConfigManager } from '../config/config-manager';
import type {
  EngineConfig,
  EngineFactory,
  InspectionEngine,
  InspectionTransaction,
  TransactionOptions,
} from '../types/engine';
import { supportsTransactionOptions } from '../types/engine';
import type { WafConfig } from '../types/schema';
import { DirectivesNotFoundError, WafInitializationError } from './errors';
import { describeError, getWafLogger, logMatchedRule } from './log';
import { DEFAULT_BLOCK_STATUS } from './status';

/** Creates a transaction, bound to request context when the engine supports it. */
export type TransactionFactory = (options: TransactionOptions) => InspectionTransaction;

export type WafState =
  | { status: 'uninitialized' }
  | { status: 'initializing' }
  | { status: 'ready'; engine: InspectionEngine; newTransaction: TransactionFactory; defaultBlockStatus: number }
  | { status: 'failed'; error: Error };

let state: WafState = { status: 'uninitialized' };
let initPromise: Promise<void> | undefined;
let blockMessage = DEFAULT_BLOCK_MESSAGE;

/** Resolves directives against rootDir and checks each one is readable. */
async function resolveDirectives(cfg: WafConfig): Promise<string[]> {
  const base = cfg.rootDir ?? process.cwd();
  const resolved: string[] = [];
  for (const file of cfg.directivesFiles) {
    const full = path.resolve(base, file);
    try {
      await fs.promises.access(full, fs.constants.R_OK);
    } catch (err) {
      throw new DirectivesNotFoundError(full, err);
    }
    resolved.push(full);
  }
  return resolved;
}

/** Assembles the engine configuration; unset limits and empty lists are left out. */
export function buildEngineConfig(cfg: WafConfig, directivesFiles: string[]): EngineConfig {
  const positive = (n: number | undefined): n is number => n !== undefined && n > 0;
  return {
    directivesFiles,
    ...(cfg.rootDir !== undefined && { rootDir: cfg.rootDir }),
    ruleEngine: cfg.ruleEngine ?? 'On',
    requestBody: {
      access: cfg.requestBodyAccess ?? false,
      ...(positive(cfg.requestBodyLimit) && { limit: cfg.requestBodyLimit }),
      ...(positive(cfg.requestBodyInMemoryLimit) && { inMemoryLimit: cfg.requestBodyInMemoryLimit }),
    },
    responseBody: {
      access: cfg.responseBodyAccess ?? false,
      ...(positive(cfg.responseBodyLimit) && { limit: cfg.responseBodyLimit }),
      ...(cfg.responseBodyMimeTypes !== undefined &&
        cfg.responseBodyMimeTypes.length > 0 && { mimeTypes: cfg.responseBodyMimeTypes }),
    },
    ...(cfg.debugLogger !== undefined && { debugLogger: cfg.debugLogger }),
    ...(cfg.enableErrorLog === true && { onRuleMatched: logMatchedRule }),
  };
}

function pickTransactionFactory(engine: InspectionEngine): TransactionFactory {
  if (supportsTransactionOptions(engine)) {
    return (options) => engine.newTransactionWithOptions(options);
  }
  return () => engine.newTransaction();
}

async function construct(cfg: WafConfig, factory: EngineFactory): Promise<void> {
  let engine: InspectionEngine;
  try {
    const directives = await resolveDirectives(cfg);
    try {
      engine = await factory(buildEngineConfig(cfg, directives));
    } catch (err) {
      throw new WafInitializationError(`engine rejected configuration: ${describeError(err)}`, { cause: err });
    }
  } catch (err) {
    const error = err instanceof Error ? err : new WafInitializationError(String(err));
    state = { status: 'failed', error };
    getWafLogger().error('WAF initialization failed', { error: error.message });
    throw error;
  }
  state = {
    status: 'ready',
    engine,
    newTransaction: pickTransactionFactory(engine),
    defaultBlockStatus: cfg.defaultBlockStatus ?? DEFAULT_BLOCK_STATUS,
  };
}

/**
 * Constructs the global engine. Only the first call does any work; later calls (with any
 * config) get the same promise. Rejects with DirectivesNotFoundError or
 * WafInitializationError; the failure is permanent.
 */
export function initGlobalWaf(cfg: WafConfig, factory: EngineFactory): Promise<void> {
  if (!initPromise) {
    state = { status: 'initializing' };
    initPromise = construct(cfg, factory);
  }
  return initPromise;
}

/**
 * Convenience entry: with paths, only the directives are set and every other option
 * stays unset; without, defaultWafConfig() is used.
 */
export function initGlobalWafFromPaths(factory: EngineFactory, ...paths: string[]): Promise<void> {
  if (paths.length > 0) {
    return initGlobalWaf({ directivesFiles: paths }, factory);
  }
  return initGlobalWaf(defaultWafConfig(), factory);
}

/**
 * Loads .waf/config.yml (or configPath), applies its block message, and initializes.
 * Config errors throw before any construction attempt is recorded. Once an attempt
 * exists the file is not read again and its promise is returned.
 */
export function initGlobalWafFromConfigFile(factory: EngineFactory, configPath?: string): Promise<void> {
  if (initPromise) return initPromise;
  const mgr = new ConfigManager(configPath);
  setBlockMessage(mgr.blockMessage());
  return initGlobalWaf(mgr.toWafConfig(), factory);
}

export function getWafState(): WafState {
  return state;
}

/** Replaces the block message when given a non-empty string. Call at startup only. */
export function setBlockMessage(msg?: string): void {
  if (msg) blockMessage = msg;
}

export function getBlockMessage(): string {
  return blockMessage;
}

/** Returns the module to its pristine state. For tests. */
export function resetGlobalWaf(): void {
  state = { status: 'uninitialized' };
  initPromise = undefined;
  blockMessage = DEFAULT_BLOCK_MESSAGE;
}

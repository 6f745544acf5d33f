/**
 * Config loader for .waf/config.yml.
 * Read synchronously at boot, before the engine is constructed.
 */

import fs from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import type { WafConfig } from '../types/schema';
import { defaultWafConfig } from './defaults';

export const DEFAULT_CONFIG_PATH = './.waf/config.yml';

const positiveInt = z.number().int().positive();

export const WafFileConfigSchema = z
  .object({
    directivesFiles: z.array(z.string().min(1)).min(1).optional(),
    rootDir: z.string().optional(),
    ruleEngine: z.enum(['On', 'Off', 'DetectionOnly']).optional(),
    requestBody: z
      .object({
        access: z.boolean().optional(),
        limit: positiveInt.optional(),
        inMemoryLimit: positiveInt.optional(),
      })
      .strict()
      .optional(),
    responseBody: z
      .object({
        access: z.boolean().optional(),
        limit: positiveInt.optional(),
        mimeTypes: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    enableErrorLog: z.boolean().optional(),
    defaultBlockStatus: z.number().int().min(100).max(599).optional(),
    blockMessage: z.string().optional(),
  })
  .strict();

export type WafFileConfig = z.infer<typeof WafFileConfigSchema>;

/**
 * Reads and validates the YAML config. Throws on a missing file, bad YAML, or a
 * shape the schema rejects. Accepts an optional configPath for tests.
 */
export class ConfigManager {
  private cfg: WafFileConfig;

  constructor(configPath: string = process.env.WAF_CONFIG_PATH ?? DEFAULT_CONFIG_PATH) {
    const raw = fs.readFileSync(configPath, 'utf8');
    // An empty document parses to null; treat it as "all defaults".
    this.cfg = WafFileConfigSchema.parse(parse(raw) ?? {});
  }

  /** Returns the validated file contents. */
  get(): WafFileConfig {
    return this.cfg;
  }

  /** Custom block message, when the file sets a non-empty one. */
  blockMessage(): string | undefined {
    return this.cfg.blockMessage || undefined;
  }

  /** Merges the file over defaultWafConfig(). */
  toWafConfig(): WafConfig {
    const base = defaultWafConfig();
    const { requestBody, responseBody } = this.cfg;
    return {
      ...base,
      ...(this.cfg.directivesFiles !== undefined && { directivesFiles: this.cfg.directivesFiles }),
      ...(this.cfg.rootDir !== undefined && { rootDir: this.cfg.rootDir }),
      ...(this.cfg.ruleEngine !== undefined && { ruleEngine: this.cfg.ruleEngine }),
      ...(requestBody?.access !== undefined && { requestBodyAccess: requestBody.access }),
      ...(requestBody?.limit !== undefined && { requestBodyLimit: requestBody.limit }),
      ...(requestBody?.inMemoryLimit !== undefined && { requestBodyInMemoryLimit: requestBody.inMemoryLimit }),
      ...(responseBody?.access !== undefined && { responseBodyAccess: responseBody.access }),
      ...(responseBody?.limit !== undefined && { responseBodyLimit: responseBody.limit }),
      ...(responseBody?.mimeTypes !== undefined && { responseBodyMimeTypes: responseBody.mimeTypes }),
      ...(this.cfg.enableErrorLog !== undefined && { enableErrorLog: this.cfg.enableErrorLog }),
      ...(this.cfg.defaultBlockStatus !== undefined && { defaultBlockStatus: this.cfg.defaultBlockStatus }),
    };
  }
}

/**
 * Toy inspection engine for the example server. Each non-comment line of the
 * directives files is a literal; a request whose decoded URI, header values or body
 * contains one (case-insensitively) is denied. Real deployments plug in a rule engine.
 */

import fs from 'fs';
import type { Readable } from 'stream';
import { BodyBuffer } from '../../src/core/body/body-capture';
import type {
  BodyIngestResult,
  EngineConfig,
  InspectionEngine,
  InspectionTransaction,
} from '../../src/types/engine';
import type { Interruption } from '../../src/types/schema';

const FIRST_RULE_ID = 100001;
const DEFAULT_BODY_LIMIT = 1024 * 1024;

type Literal = { ruleId: number; text: string };

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    return value;
  }
}

class DemoTransaction implements InspectionTransaction {
  private readonly body = new BodyBuffer();
  private readonly headerValues: string[] = [];
  private uri = '';

  constructor(
    readonly id: string,
    private readonly literals: readonly Literal[],
    private readonly config: EngineConfig
  ) {}

  private match(haystack: string, phase: string): Interruption | undefined {
    const lower = haystack.toLowerCase();
    const hit = this.literals.find((l) => lower.includes(l.text));
    if (!hit) return undefined;
    this.config.onRuleMatched?.({
      severity: 'critical',
      errorLog: `literal "${hit.text}" found in ${phase}`,
      ruleId: hit.ruleId,
    });
    if (this.config.ruleEngine === 'DetectionOnly') return undefined;
    return { ruleId: hit.ruleId, action: 'deny', status: 403, data: hit.text };
  }

  processConnection(): void {}

  processURI(uri: string): void {
    this.uri = safeDecode(uri);
  }

  addRequestHeader(_key: string, value: string): void {
    this.headerValues.push(value);
  }

  setServerName(): void {}

  processRequestHeaders(): Interruption | undefined {
    return this.match(this.uri, 'uri') ?? this.match(this.headerValues.join('\n'), 'headers');
  }

  isRequestBodyAccessible(): boolean {
    return this.config.requestBody.access;
  }

  async readRequestBodyFrom(source: Readable): Promise<BodyIngestResult> {
    const limit = this.config.requestBody.limit ?? DEFAULT_BODY_LIMIT;
    const { bytesRead, exceeded } = await this.body.ingest(source, { limit });
    if (exceeded) {
      return { interruption: { ruleId: 200002, action: 'deny', status: 413, data: 'body limit' }, bytesRead };
    }
    return { bytesRead };
  }

  requestBodyReader(): Readable {
    return this.body.reader();
  }

  async processRequestBody(): Promise<Interruption | undefined> {
    return this.match(safeDecode(this.body.bytes().toString('utf8')), 'body');
  }

  isRuleEngineOff(): boolean {
    return this.config.ruleEngine === 'Off';
  }

  processLogging(): void {
    this.config.debugLogger?.debug(`transaction ${this.id} finished`);
  }

  close(): void {
    this.body.reset();
  }
}

class DemoEngine implements InspectionEngine {
  private counter = 0;

  constructor(
    private readonly literals: readonly Literal[],
    private readonly config: EngineConfig
  ) {}

  newTransaction(): InspectionTransaction {
    this.counter += 1;
    return new DemoTransaction(`demo-${this.counter}`, this.literals, this.config);
  }
}

/** EngineFactory for initGlobalWaf: loads literals from every directives file in order. */
export async function createDemoEngine(config: EngineConfig): Promise<InspectionEngine> {
  const literals: Literal[] = [];
  for (const file of config.directivesFiles) {
    const text = await fs.promises.readFile(file, 'utf8');
    for (const line of text.split(/\r?\n/)) {
      const trimmed = line.trim().toLowerCase();
      if (!trimmed || trimmed.startsWith('#')) continue;
      literals.push({ ruleId: FIRST_RULE_ID + literals.length, text: trimmed });
    }
  }
  return new DemoEngine(literals, config);
}

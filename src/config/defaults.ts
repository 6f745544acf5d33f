import type { WafConfig } from '../types/schema';

export const DEFAULT_BLOCK_MESSAGE = 'Request blocked by Web Application Firewall';

/** Configuration used when the application supplies none. */
export function defaultWafConfig(): WafConfig {
  return {
    directivesFiles: ['./conf/waf.conf'],
    ruleEngine: 'On',

    requestBodyAccess: true,
    requestBodyLimit: 10 * 1024 * 1024,
    requestBodyInMemoryLimit: 128 * 1024,

    responseBodyAccess: false,
    responseBodyLimit: 512 * 1024,
    responseBodyMimeTypes: ['text/html', 'text/plain', 'application/json', 'application/xml'],

    enableErrorLog: true,
    defaultBlockStatus: 403,
  };
}

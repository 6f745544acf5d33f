/**
 * Fastify instrumentation package entry point.
 */
export { wafFastifyPlugin, collectRawHeaders } from './plugin';

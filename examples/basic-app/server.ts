/**
 * Basic-app example: a Fastify server guarded by the WAF plugin and the demo engine.
 *
 * How to run: `npm run build` at the repo root, then from this directory (it reads
 * ./.waf/config.yml and ./conf/waf.conf):
 *   node ../../dist/examples/basic-app/server.js
 *
 * Try:
 *   curl 'http://localhost:3000/search?q=1%20OR%201=1'          -> 403
 *   curl -d 'comment=<script>alert(1)</script>' localhost:3000/comments  -> 403
 *   curl -d 'comment=hello' localhost:3000/comments             -> 200, echoes the body
 *
 * Env: PORT (default 3000), WAF_CONFIG_PATH.
 */

import Fastify from 'fastify';
import { initGlobalWafFromConfigFile, wafFastifyPlugin } from '../../src/api';
import { createDemoEngine } from './demo-engine';

const PORT = parseInt(process.env.PORT ?? '3000', 10);

async function start(): Promise<void> {
  // Engine construction happens once, before the server accepts traffic.
  await initGlobalWafFromConfigFile(createDemoEngine);

  const app = Fastify();
  app.addContentTypeParser('application/x-www-form-urlencoded', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });
  await app.register(wafFastifyPlugin);

  app.get('/ping', async () => 'ok');

  app.get<{ Querystring: { q?: string } }>('/search', async (request) => ({
    q: request.query.q ?? '',
    results: [],
  }));

  app.post('/comments', async (request) => ({ received: request.body }));

  await app.listen({ port: PORT });
  console.log(`basic-app listening on http://localhost:${PORT}`);
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});

import { serve } from '@hono/node-server';
import type { AddressInfo } from 'net';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
console.log(`[server] Starting ${config.appName} (env=${config.env}, debug=${config.debug})...`);

const app = createApp(config);

serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info: AddressInfo) => {
  console.log(`[server] running on http://${info.address}:${info.port}`);
});

import { serve } from '@hono/node-server';
import { app } from './app.js';
import { env } from './config/env.js';

const port = env.PORT;
const version = '1.0.0';

// Structured startup logging
console.log(JSON.stringify({
  timestamp: new Date().toISOString(),
  event: 'server_starting',
  version,
  environment: env.NODE_ENV,
  port,
}));

serve({
  fetch: app.fetch,
  port,
}, (info) => {
  // Structured ready logging
  console.log(JSON.stringify({
    timestamp: new Date().toISOString(),
    event: 'server_ready',
    version,
    environment: env.NODE_ENV,
    port: info.port,
    url: `http://localhost:${info.port}`,
  }));
});

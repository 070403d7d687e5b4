import { serve } from '@hono/node-server';
import { createApp } from '../src/app';
import { loadConfig } from '../src/utils/config';
import { setLogLevel } from '../src/utils/logger';

const config = loadConfig(process.env);
setLogLevel(config.logLevel);

const app = createApp({ config });

console.log(`🚀 Remote ZIP inspector starting...`);
console.log(`🌐 Server: http://${config.host}:${config.port}`);
console.log(`📁 Reports: ${config.report.outputDir}`);

serve({
  fetch: app.fetch,
  port: config.port,
  hostname: config.host,
});

console.log(`✅ Inspector running on http://${config.host}:${config.port}`);

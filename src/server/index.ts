/**
 * texbridge HTTP service entry
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfig } from '../utils/config';
import { createApp } from './app';

const config = loadConfig();
const app = createApp(config.parser);

serve({ fetch: app.fetch, port: config.port }, () => {
  console.log(`🚀 texbridge service running on port ${config.port}`);
});

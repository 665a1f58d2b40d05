import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import { Container } from './container.js';
import { logger } from './logger.js';

const config = loadConfig();
logger.level = config.logLevel;

const container = await Container.create(config);
const app = createApp(container);

// ============================================
// INICIO DEL SERVIDOR
// ============================================
serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info(
      {
        port: info.port,
        health: `http://localhost:${info.port}/health`,
        webhook: `http://localhost:${info.port}/webhook`,
        signatureMode: config.line.signatureMode,
      },
      '🚀 LINE chat relay escuchando'
    );
  }
);
